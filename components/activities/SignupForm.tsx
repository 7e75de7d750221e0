"use client";

import { useState, type FormEvent } from "react";
import { UserPlus } from "lucide-react";
import type { MutationResult } from "@/hooks/useActivities";

interface SignupFormProps {
  activityNames: string[];
  onSignUp: (activityName: string, email: string) => Promise<MutationResult>;
  onResult: (result: MutationResult) => void;
}

export function SignupForm({ activityNames, onSignUp, onResult }: SignupFormProps) {
  const [email, setEmail] = useState("");
  const [activityName, setActivityName] = useState("");
  const [submitting, setSubmitting] = useState(false);

  async function handleSubmit(e: FormEvent<HTMLFormElement>) {
    e.preventDefault();
    if (!email || !activityName) return;

    setSubmitting(true);
    try {
      const result = await onSignUp(activityName, email);
      if (result.ok) setEmail("");
      onResult(result);
    } finally {
      setSubmitting(false);
    }
  }

  return (
    <form className="signup-form" aria-label="Sign up for an activity" onSubmit={(e) => void handleSubmit(e)}>
      <label htmlFor="signup-email">Student email</label>
      <input
        id="signup-email"
        type="email"
        required
        placeholder="your-email@mergington.edu"
        value={email}
        onChange={(e) => setEmail(e.target.value)}
      />
      <label htmlFor="signup-activity">Activity</label>
      <select
        id="signup-activity"
        required
        value={activityName}
        onChange={(e) => setActivityName(e.target.value)}
      >
        <option value="">-- Select an activity --</option>
        {activityNames.map((name) => (
          <option key={name} value={name}>
            {name}
          </option>
        ))}
      </select>
      <button type="submit" disabled={submitting}>
        <UserPlus className="icon" />
        Sign Up
      </button>
    </form>
  );
}
