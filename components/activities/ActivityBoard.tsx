"use client";

import { useState } from "react";
import { AlertCircle, RefreshCw } from "lucide-react";
import { useActivities, type MutationResult } from "@/hooks/useActivities";
import { ActivityCard } from "./ActivityCard";
import { SignupForm } from "./SignupForm";

export function ActivityBoard() {
  const { activities, loading, error, refresh, signUp, unregister } = useActivities();
  const [result, setResult] = useState<MutationResult | null>(null);

  const names = Object.keys(activities);

  async function handleUnregister(activityName: string, email: string) {
    setResult(await unregister(activityName, email));
  }

  return (
    <div className="board">
      <section>
        <h3>Available Activities</h3>
        {loading ? (
          <p className="muted">Loading activities...</p>
        ) : error ? (
          <div className="error-state">
            <AlertCircle className="icon" />
            <p>{error}</p>
            <button type="button" onClick={() => void refresh()}>
              <RefreshCw className="icon" />
              Retry
            </button>
          </div>
        ) : (
          <div className="activity-list">
            {names.map((name) => (
              <ActivityCard
                key={name}
                name={name}
                activity={activities[name]}
                onUnregister={(email) => void handleUnregister(name, email)}
              />
            ))}
          </div>
        )}
      </section>

      <section>
        <h3>Sign Up for an Activity</h3>
        <SignupForm activityNames={names} onSignUp={signUp} onResult={setResult} />
        {result && (
          <p role="status" className={result.ok ? "message success" : "message error"}>
            {result.message}
          </p>
        )}
      </section>
    </div>
  );
}
