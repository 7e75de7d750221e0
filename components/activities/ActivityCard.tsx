"use client";

import { CalendarClock, Trash2, Users } from "lucide-react";
import type { Activity } from "@/lib/activities/types";

interface ActivityCardProps {
  name: string;
  activity: Activity;
  onUnregister: (email: string) => void;
}

export function ActivityCard({ name, activity, onUnregister }: ActivityCardProps) {
  const spotsLeft = activity.max_participants - activity.participants.length;

  return (
    <article className="activity-card" data-testid={`activity-${name}`}>
      <h4>{name}</h4>
      <p>{activity.description}</p>
      <p className="activity-meta">
        <CalendarClock className="icon" />
        {activity.schedule}
      </p>
      <p className="activity-meta">
        <Users className="icon" />
        {spotsLeft} spots left
      </p>
      <div className="participants">
        <h5>Participants</h5>
        {activity.participants.length === 0 ? (
          <p className="muted">No participants yet</p>
        ) : (
          <ul>
            {activity.participants.map((email) => (
              <li key={email}>
                <span>{email}</span>
                <button
                  type="button"
                  className="icon-button"
                  aria-label={`Unregister ${email}`}
                  title="Unregister"
                  onClick={() => onUnregister(email)}
                >
                  <Trash2 className="icon" />
                </button>
              </li>
            ))}
          </ul>
        )}
      </div>
    </article>
  );
}
