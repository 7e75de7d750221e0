import { NextRequest, NextResponse } from "next/server";
import type { ActivityRegistry } from "./registry";
import type { RegistryResult } from "./types";
import { isRegistryError } from "./errors";
import { participantQuerySchema } from "@/lib/validation/schemas";
import { validateQuery, isValidationError } from "@/lib/validation/validate";

export type ActivityParams = { params: Promise<{ activityName: string }> };

type ParticipantAction = (activityName: string, email: string) => RegistryResult;

function toErrorResponse(scope: string, err: unknown): NextResponse {
  if (isRegistryError(err)) {
    return NextResponse.json({ detail: err.message }, { status: err.status });
  }
  console.error(`[${scope}] unexpected failure:`, err);
  throw err;
}

function createParticipantHandler(scope: string, action: ParticipantAction) {
  return async function POST(request: NextRequest, { params }: ActivityParams) {
    const { activityName } = await params;

    const validated = validateQuery(participantQuerySchema, request);
    if (isValidationError(validated)) return validated;
    const { email } = validated.data;

    try {
      const result = action(activityName, email);
      console.debug(`[${scope}] ok`, { activityName, email });
      return NextResponse.json(result);
    } catch (e) {
      return toErrorResponse(scope, e);
    }
  };
}

export function createListActivitiesHandler(registry: ActivityRegistry) {
  return async function GET() {
    const activities = registry.list();
    console.debug("[activities/GET] listed", {
      activityCount: Object.keys(activities).length,
    });
    return NextResponse.json(activities);
  };
}

export function createSignupHandler(registry: ActivityRegistry) {
  return createParticipantHandler("activities/signup", (name, email) =>
    registry.signUp(name, email),
  );
}

export function createUnregisterHandler(registry: ActivityRegistry) {
  return createParticipantHandler("activities/unregister", (name, email) =>
    registry.unregister(name, email),
  );
}
