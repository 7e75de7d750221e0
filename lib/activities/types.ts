export interface Activity {
  description: string;
  schedule: string;
  /** Informational only; signups are not capped. */
  max_participants: number;
  participants: string[];
}

export type ActivityMap = Record<string, Activity>;

export interface RegistryResult {
  message: string;
}
