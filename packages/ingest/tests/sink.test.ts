import { beforeEach, describe, expect, it, vi } from "vitest";
import { DryRunSink } from "../src/sink/dry-run";
import { GoogleCalendarSink, getErrorStatus, type CalendarEventsApi } from "../src/sink/google";
import { SinkError } from "../src/sink/types";
import type { CalendarEventPayload } from "../src/lib/types";

const PAYLOAD: CalendarEventPayload = {
  summary: "Acme Ltd Analyst/Concall",
  description: "Announcement link (PDF): https://example.com/a.pdf",
  start: { dateTime: "2024-03-15T10:30:00+05:30", timeZone: "Asia/Kolkata" },
  end: { dateTime: "2024-03-15T11:00:00+05:30", timeZone: "Asia/Kolkata" },
  location: "Virtual",
  attendees: [],
  extendedProperties: { private: { eventKey: "k1" } },
};

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

describe("getErrorStatus", () => {
  it("reads numeric and string codes and response status", () => {
    expect(getErrorStatus({ code: 403 })).toBe(403);
    expect(getErrorStatus({ code: "404" })).toBe(404);
    expect(getErrorStatus({ code: "ECONNRESET" })).toBeNull();
    expect(getErrorStatus({ response: { status: 500 } })).toBe(500);
    expect(getErrorStatus("boom")).toBeNull();
  });
});

describe("GoogleCalendarSink", () => {
  it("inserts the payload into the configured calendar", async () => {
    const insert = vi.fn<CalendarEventsApi["insert"]>(async () => ({
      data: { id: "evt-1", htmlLink: "https://calendar.example.com/evt-1" },
    }));
    const sink = new GoogleCalendarSink({ insert }, "team@example.com");

    await expect(sink.insert(PAYLOAD)).resolves.toEqual({
      id: "evt-1",
      htmlLink: "https://calendar.example.com/evt-1",
    });
    expect(insert).toHaveBeenCalledWith({ calendarId: "team@example.com", requestBody: PAYLOAD });
  });

  it("wraps insert failures with their status", async () => {
    const sink = new GoogleCalendarSink(
      {
        insert: async () => {
          throw Object.assign(new Error("Forbidden"), { code: 403 });
        },
      },
      "primary",
    );
    const error = await sink.insert(PAYLOAD).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(SinkError);
    expect(error).toMatchObject({ status: 403, message: "Calendar insert failed (403): Forbidden" });
  });

  it("reports server errors with their status", async () => {
    const sink = new GoogleCalendarSink(
      {
        insert: async () => {
          throw Object.assign(new Error("Backend Error"), { code: 503 });
        },
      },
      "primary",
    );
    await expect(sink.insert(PAYLOAD)).rejects.toMatchObject({ status: 503, message: "Calendar insert failed (503): Backend Error" });
  });
});

describe("DryRunSink", () => {
  it("collects payloads without an event id", async () => {
    const sink = new DryRunSink();
    await expect(sink.insert(PAYLOAD)).resolves.toEqual({ id: null, htmlLink: null });
    expect(sink.payloads).toEqual([PAYLOAD]);
  });
});
