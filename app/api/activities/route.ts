import { activityRegistry } from "@/lib/activities";
import { createListActivitiesHandler } from "@/lib/activities/handlers";

export const dynamic = "force-dynamic";

export const GET = createListActivitiesHandler(activityRegistry);
