"use client";

import { useState, useEffect, useCallback } from "react";
import type { ActivityMap } from "@/lib/activities/types";

export type ParticipantAction = "signup" | "unregister";

export interface MutationResult {
  ok: boolean;
  message: string;
}

interface MutationResponse {
  message?: string;
  detail?: string;
}

function participantUrl(action: ParticipantAction, activityName: string, email: string) {
  return `/api/activities/${encodeURIComponent(activityName)}/${action}?email=${encodeURIComponent(email)}`;
}

export function useActivities() {
  const [activities, setActivities] = useState<ActivityMap>({});
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  const loadActivities = useCallback(async () => {
    setError(null);
    try {
      const res = await fetch("/api/activities");
      if (!res.ok) {
        setError(`Failed to load activities (${res.status})`);
        setActivities({});
        return;
      }
      const data: ActivityMap = await res.json();
      setActivities(data);
    } catch {
      setError("Failed to load activities");
      setActivities({});
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    void loadActivities();
  }, [loadActivities]);

  const mutate = useCallback(
    async (
      action: ParticipantAction,
      activityName: string,
      email: string
    ): Promise<MutationResult> => {
      try {
        const res = await fetch(participantUrl(action, activityName, email), {
          method: "POST",
        });
        const data: MutationResponse = await res.json();
        if (!res.ok) {
          return {
            ok: false,
            message: data.detail || `Request failed (${res.status})`,
          };
        }
        await loadActivities();
        return { ok: true, message: data.message ?? "" };
      } catch {
        return { ok: false, message: "Request failed, please try again" };
      }
    },
    [loadActivities]
  );

  const signUp = useCallback(
    (activityName: string, email: string) => mutate("signup", activityName, email),
    [mutate]
  );

  const unregister = useCallback(
    (activityName: string, email: string) =>
      mutate("unregister", activityName, email),
    [mutate]
  );

  return {
    activities,
    loading,
    error,
    refresh: loadActivities,
    signUp,
    unregister,
  };
}
