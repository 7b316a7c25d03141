import { google, type calendar_v3 } from "googleapis";
import { CALENDAR_SCOPES } from "../config/sources";
import { createLogger, describeError } from "../lib/log";
import type { CalendarEventPayload } from "../lib/types";
import { SinkError, SinkInitError, type EventSink, type InsertedEvent } from "./types";

const log = createLogger("calendar");

export const getErrorStatus = (error: unknown): number | null => {
  if (!error || typeof error !== "object") {
    return null;
  }
  const code: unknown = Reflect.get(error, "code");
  if (typeof code === "number") {
    return code;
  }
  if (typeof code === "string" && /^\d{3}$/.test(code)) {
    return Number(code);
  }
  const response: unknown = Reflect.get(error, "response");
  if (response && typeof response === "object") {
    const status: unknown = Reflect.get(response, "status");
    if (typeof status === "number") {
      return status;
    }
  }
  return null;
};

// The slice of calendar.events the sink calls.
export type CalendarEventsApi = {
  insert(params: calendar_v3.Params$Resource$Events$Insert): Promise<{ data: calendar_v3.Schema$Event }>;
};

export class GoogleCalendarSink implements EventSink {
  constructor(
    private readonly events: CalendarEventsApi,
    private readonly calendarId: string,
  ) {}

  async insert(payload: CalendarEventPayload): Promise<InsertedEvent> {
    try {
      const response = await this.events.insert({
        calendarId: this.calendarId,
        requestBody: payload,
      });
      log.success(`Event created: ${payload.summary}`);
      return { id: response.data.id ?? null, htmlLink: response.data.htmlLink ?? null };
    } catch (error) {
      const status = getErrorStatus(error);
      throw new SinkError(`Calendar insert failed${status ? ` (${status})` : ""}: ${describeError(error)}`, status);
    }
  }
}

export const createGoogleCalendarSink = async (options: {
  calendarId: string;
  credentialsPath: string;
}): Promise<GoogleCalendarSink> => {
  log.info("Initializing Google Calendar service...");
  try {
    const auth = new google.auth.GoogleAuth({
      keyFile: options.credentialsPath,
      scopes: CALENDAR_SCOPES,
    });
    await auth.getClient();
    const calendar = google.calendar({ version: "v3", auth });
    log.success("Google Calendar service initialized.");
    return new GoogleCalendarSink(calendar.events, options.calendarId);
  } catch (error) {
    throw new SinkInitError(`Failed to initialize Google Calendar service: ${describeError(error)}`, {
      cause: error,
    });
  }
};
