export class RegistryError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = "RegistryError";
  }
}

export class ActivityNotFoundError extends RegistryError {
  constructor(readonly activityName: string) {
    super("Activity not found", 404);
    this.name = "ActivityNotFoundError";
  }
}

/** Duplicate signup, or unregistering an email that never signed up. */
export class ParticipantConflictError extends RegistryError {
  constructor(
    message: string,
    readonly activityName: string,
    readonly email: string,
  ) {
    super(message, 400);
    this.name = "ParticipantConflictError";
  }
}

export function isRegistryError(err: unknown): err is RegistryError {
  return err instanceof RegistryError;
}
