import { createLogger } from "../lib/log";
import type { CalendarEventPayload } from "../lib/types";
import type { EventSink, InsertedEvent } from "./types";

const log = createLogger("dry-run");

export class DryRunSink implements EventSink {
  readonly payloads: CalendarEventPayload[] = [];

  async insert(payload: CalendarEventPayload): Promise<InsertedEvent> {
    this.payloads.push(payload);
    log.info(`Would create '${payload.summary}' at ${payload.start.dateTime}`);
    log.info(payload.description);
    return { id: null, htmlLink: null };
  }
}
