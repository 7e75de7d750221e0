import fs from "fs";
import path from "path";
import { z } from "zod";
import type { ActivityMap } from "./types";

export class SeedError extends Error {
  constructor(
    message: string,
    readonly file?: string,
  ) {
    super(file ? `${message} (${file})` : message);
    this.name = "SeedError";
  }
}

const activitySchema = z.object({
  description: z.string(),
  schedule: z.string(),
  max_participants: z.number().int().positive(),
  participants: z
    .array(z.string().min(1))
    .refine((list) => new Set(list).size === list.length, {
      message: "participants must be unique",
    }),
});

export const seedSchema = z.record(z.string().min(1), activitySchema);

export function defaultSeedPath(): string {
  return (
    process.env.ACTIVITIES_SEED_PATH ||
    path.join(process.cwd(), "data", "activities.json")
  );
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.join(".");
      return where ? `${where}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

export function parseSeedActivities(raw: unknown, file?: string): ActivityMap {
  const parsed = seedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SeedError(`Invalid activity seed: ${describeIssues(parsed.error)}`, file);
  }
  return parsed.data;
}

export function loadSeedActivities(file: string = defaultSeedPath()): ActivityMap {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (e) {
    throw new SeedError(
      `Cannot read activity seed: ${e instanceof Error ? e.message : String(e)}`,
      file,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new SeedError("Activity seed is not valid JSON", file);
  }

  const activities = parseSeedActivities(raw, file);
  console.info("[activities/seed] loaded", {
    file,
    activityCount: Object.keys(activities).length,
  });
  return activities;
}
