import { DateTime } from "luxon";
import { buildEventKey } from "./idempotency";
import { createLogger } from "./log";
import type { EventSettings } from "./settings";
import type { CalendarEventPayload, ExtractedFields, MatchResult } from "./types";

const log = createLogger("event");

export type ComposeOptions = EventSettings & {
  now?: Date;
};

export const parseStartTime = (
  date: string,
  time: string,
  formats: string[],
  timeZone: string,
): DateTime | null => {
  if (!date.trim() || !time.trim()) {
    return null;
  }
  const combined = `${date.trim()} ${time.trim()}`;
  for (const format of formats) {
    const parsed = DateTime.fromFormat(combined, format, { zone: timeZone, locale: "en-US" });
    if (parsed.isValid) {
      return parsed;
    }
  }
  return null;
};

const toIso = (value: DateTime) => value.toISO({ suppressMilliseconds: true }) ?? value.toString();

export const buildDescription = (
  match: MatchResult,
  fields: ExtractedFields,
  eventKey: string,
  tag: string,
) =>
  [
    `Announcement link (PDF): ${match.entry.link}`,
    `Date: ${fields.date}`,
    `Time: ${fields.time}`,
    `Dial-in info: ${fields.dialIn}`,
    `Registration link: ${fields.registrationLink}`,
    `Host: ${fields.host}`,
    `Contacts: ${fields.contacts.join(", ")}`,
    `Event key: ${eventKey}`,
    tag,
  ].join("\n");

export const composeEvent = (
  name: string,
  match: MatchResult,
  fields: ExtractedFields,
  options: ComposeOptions,
): CalendarEventPayload => {
  const eventKey = buildEventKey(match.entry.link, name);
  let start = parseStartTime(fields.date, fields.time, options.dateFormats, options.timeZone);
  if (!start) {
    log.warn(`Failed to parse date/time '${fields.date} ${fields.time}'; using current time.`);
    start = DateTime.fromJSDate(options.now ?? new Date(), { zone: options.timeZone });
  }
  const end = start.plus({ minutes: options.durationMinutes });

  return {
    summary: `${name} Analyst/Concall`,
    description: buildDescription(match, fields, eventKey, options.tag),
    start: { dateTime: toIso(start), timeZone: options.timeZone },
    end: { dateTime: toIso(end), timeZone: options.timeZone },
    location: options.location,
    // A guest invite needs domain-wide delegation on service accounts, so it is opt-in.
    attendees: options.guestEmail ? [{ email: options.guestEmail }] : [],
    extendedProperties: { private: { eventKey } },
  };
};
