import { createActivityRegistry } from "./registry";
import { loadSeedActivities } from "./seed";

// Built once per server process; route handlers receive it explicitly.
export const activityRegistry = createActivityRegistry(loadSeedActivities());
