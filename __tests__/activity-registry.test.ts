import { describe, it, expect, beforeEach } from "vitest";
import { ActivityRegistry, createActivityRegistry } from "@/lib/activities/registry";
import {
  ActivityNotFoundError,
  ParticipantConflictError,
  isRegistryError,
} from "@/lib/activities/errors";
import type { ActivityMap } from "@/lib/activities/types";

const SEED: ActivityMap = {
  "Chess Club": {
    description: "Strategy games after school",
    schedule: "Fridays, 3:30 PM - 5:00 PM",
    max_participants: 12,
    participants: ["michael@mergington.edu", "daniel@mergington.edu"],
  },
  "Art Club": {
    description: "Painting and drawing",
    schedule: "Thursdays, 3:30 PM - 5:00 PM",
    max_participants: 2,
    participants: [],
  },
};

describe("ActivityRegistry", () => {
  let registry: ActivityRegistry;

  beforeEach(() => {
    registry = createActivityRegistry(SEED);
  });

  describe("list", () => {
    it("returns every seeded activity", () => {
      const activities = registry.list();
      expect(Object.keys(activities)).toEqual(["Chess Club", "Art Club"]);
      expect(activities["Chess Club"]).toEqual(SEED["Chess Club"]);
    });

    it("returns a snapshot the caller cannot mutate through", () => {
      const activities = registry.list();
      activities["Chess Club"].participants.push("intruder@mergington.edu");

      expect(registry.get("Chess Club")?.participants).toEqual([
        "michael@mergington.edu",
        "daniel@mergington.edu",
      ]);
    });
  });

  describe("get", () => {
    it("returns undefined for an unknown activity", () => {
      expect(registry.get("Underwater Basket Weaving")).toBeUndefined();
    });
  });

  describe("signUp", () => {
    it("appends the email and confirms", () => {
      const result = registry.signUp("Chess Club", "new@mergington.edu");

      expect(result.message).toBe("Signed up new@mergington.edu for Chess Club");
      expect(registry.get("Chess Club")?.participants).toEqual([
        "michael@mergington.edu",
        "daniel@mergington.edu",
        "new@mergington.edu",
      ]);
    });

    it("leaves the seed object untouched", () => {
      registry.signUp("Chess Club", "new@mergington.edu");
      expect(SEED["Chess Club"].participants).toHaveLength(2);
    });

    it("rejects an email that is already signed up", () => {
      let caught: unknown;
      try {
        registry.signUp("Chess Club", "michael@mergington.edu");
      } catch (e) {
        caught = e;
      }

      expect(caught).toBeInstanceOf(ParticipantConflictError);
      expect(isRegistryError(caught) && caught.status).toBe(400);
      expect(caught).toHaveProperty(
        "message",
        "Student is already signed up for this activity",
      );
      expect(registry.get("Chess Club")?.participants).toHaveLength(2);
    });

    it("rejects an unknown activity", () => {
      expect(() =>
        registry.signUp("Nonexistent Club", "new@mergington.edu"),
      ).toThrow(ActivityNotFoundError);
      expect(() =>
        registry.signUp("Nonexistent Club", "new@mergington.edu"),
      ).toThrow("Activity not found");
    });

    it("lets one email join several activities", () => {
      registry.signUp("Chess Club", "busy@mergington.edu");
      registry.signUp("Art Club", "busy@mergington.edu");

      expect(registry.get("Chess Club")?.participants).toContain("busy@mergington.edu");
      expect(registry.get("Art Club")?.participants).toEqual(["busy@mergington.edu"]);
    });

    it("does not cap signups at max_participants", () => {
      registry.signUp("Art Club", "a@mergington.edu");
      registry.signUp("Art Club", "b@mergington.edu");
      registry.signUp("Art Club", "c@mergington.edu");

      expect(registry.get("Art Club")?.participants).toHaveLength(3);
    });
  });

  describe("unregister", () => {
    it("removes the email and confirms", () => {
      const result = registry.unregister("Chess Club", "michael@mergington.edu");

      expect(result.message).toBe(
        "Unregistered michael@mergington.edu from Chess Club",
      );
      expect(registry.get("Chess Club")?.participants).toEqual([
        "daniel@mergington.edu",
      ]);
    });

    it("rejects an email that is not registered", () => {
      expect(() =>
        registry.unregister("Chess Club", "nobody@mergington.edu"),
      ).toThrow("Student is not registered for this activity");
    });

    it("rejects an unknown activity", () => {
      expect(() =>
        registry.unregister("Nonexistent Club", "michael@mergington.edu"),
      ).toThrow(ActivityNotFoundError);
    });

    it("allows signing up again after unregistering", () => {
      registry.signUp("Art Club", "rejoin@mergington.edu");
      registry.unregister("Art Club", "rejoin@mergington.edu");
      registry.signUp("Art Club", "rejoin@mergington.edu");

      expect(registry.get("Art Club")?.participants).toEqual([
        "rejoin@mergington.edu",
      ]);
    });
  });
});
