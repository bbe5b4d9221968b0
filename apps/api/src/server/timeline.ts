/**
 * @fileoverview Timeline events: a fixed, in-memory list of care events
 *
 * Event timestamps are stored as offsets and resolved against the moment the
 * store is created, so the list always looks recent.
 */

import type { TimelineEvent, TimelineEventType, TimelineQuery } from "@assessment/shared";

import { NotFoundError } from "./errors.js";

type TimelineSeed = Omit<TimelineEvent, "timestamp"> & {
  /** Minutes before store creation */
  minutesAgo: number;
};

const NOTE: TimelineEventType = "Note";
const AUDIT: TimelineEventType = "Audit";

export const TIMELINE_SEED: readonly TimelineSeed[] = [
  { id: 1, title: "Patient Admitted", description: "Patient admitted to the hospital", message: "Patient John Doe admitted.", type: AUDIT, minutesAgo: 2 * 24 * 60 },
  { id: 2, title: "Initial Assessment", description: "Nurse performed initial assessment", message: "Initial assessment completed by Nurse Jane.", type: NOTE, minutesAgo: 29 * 60 },
  { id: 3, title: "Medication Administered", description: "Administered prescribed medication", message: "Administered 500mg of medication X.", type: AUDIT, minutesAgo: 20 * 60 },
  { id: 4, title: "Follow-up Visit", description: "Doctor's follow-up visit", message: "Follow-up visit by Dr. Smith.", type: NOTE, minutesAgo: 10 * 60 },
  { id: 5, title: "Discharge Planning", description: "Planning for patient discharge", message: "Discharge planning initiated.", type: AUDIT, minutesAgo: 2 * 60 },
  { id: 6, title: "Patient Discharged", description: "Patient discharged from the hospital", message: "Patient John Doe discharged.", type: AUDIT, minutesAgo: 30 },
  { id: 7, title: "Post-Discharge Call", description: "Nurse called patient post-discharge", message: "Post-discharge call completed.", type: NOTE, minutesAgo: 10 },
  { id: 8, title: "Lab Results Received", description: "Received lab results for patient", message: "Lab results for patient John Doe received.", type: AUDIT, minutesAgo: 60 },
  { id: 9, title: "Physical Therapy Session", description: "Conducted physical therapy session", message: "Physical therapy session completed.", type: NOTE, minutesAgo: 3 * 60 },
  { id: 10, title: "Dietary Consultation", description: "Dietary consultation with nutritionist", message: "Dietary consultation conducted.", type: NOTE, minutesAgo: 4 * 60 },
  { id: 11, title: "Medication Review", description: "Reviewed patient's medications", message: "Medication review completed.", type: AUDIT, minutesAgo: 6 * 60 },
  { id: 12, title: "Vaccination Administered", description: "Administered flu vaccination", message: "Flu vaccination administered.", type: AUDIT, minutesAgo: 8 * 60 },
];

export const DEFAULT_TIMELINE_LIMIT = 10;

export class TimelineStore {
  private readonly events: readonly TimelineEvent[];

  constructor(now: Date = new Date(), seed: readonly TimelineSeed[] = TIMELINE_SEED) {
    this.events = seed.map(({ minutesAgo, ...event }) => ({
      ...event,
      timestamp: new Date(now.getTime() - minutesAgo * 60_000).toISOString(),
    }));
  }

  /**
   * Newest first, optionally filtered by exact type, capped at `limit`.
   * An empty `type` does not filter.
   */
  listEvents(query: TimelineQuery): TimelineEvent[] {
    const { type, limit } = query;

    return this.events
      .filter((event) => !type || event.type === type)
      .sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp))
      .slice(0, limit);
  }

  getEvent(id: number): TimelineEvent {
    const event = this.events.find((e) => e.id === id);
    if (!event) {
      throw new NotFoundError("Timeline event not found");
    }
    return event;
  }
}
