export type TimelineEventType = "Note" | "Audit";

export type TimelineEvent = {
  id: number;
  title: string;
  description: string;
  /** ISO-8601 timestamp */
  timestamp: string;
  message: string;
  type: TimelineEventType;
};

export type TimelineQuery = {
  /** Exact match on `type`; any string is accepted */
  type?: string;
  limit: number;
};
