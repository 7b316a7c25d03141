import type { CalendarEventPayload } from "../lib/types";

export type InsertedEvent = {
  id: string | null;
  htmlLink: string | null;
};

export interface EventSink {
  insert(payload: CalendarEventPayload): Promise<InsertedEvent>;
}

export class SinkInitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SinkInitError";
  }
}

export class SinkError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = "SinkError";
  }
}
