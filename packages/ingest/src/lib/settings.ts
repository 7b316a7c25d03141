import { IANAZone } from "luxon";
import {
  ALLOWED_KEYWORDS,
  DEFAULT_DATE_FORMATS,
  EVENT_LOCATION,
  EVENT_TAG,
  FEED_URL,
} from "../config/sources";
import { createLogger } from "./log";

export type MatchMode = "first" | "all";

export type RetrySettings = {
  attempts: number;
  backoffMs: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
};

export type EventSettings = {
  timeZone: string;
  dateFormats: string[];
  durationMinutes: number;
  location: string;
  tag: string;
  guestEmail: string | null;
};

export type PipelineConfig = {
  feedUrl: string;
  companyFile: string;
  calendarId: string;
  credentialsPath: string;
  threshold: number;
  keywords: string[];
  matchMode: MatchMode;
  futureOnly: boolean;
  dryRun: boolean;
  ledgerPath: string;
  reportPath: string;
  retry: RetrySettings;
  event: EventSettings;
};

type Env = Record<string, string | undefined>;

const log = createLogger("settings");
const DEFAULT_TIME_ZONE = "Asia/Kolkata";

const coercePositiveInt = (value: string | undefined) => {
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return Math.floor(parsed);
};

export const getThreshold = (env: Env = process.env): number => {
  const parsed = Number(env.CONCALL_FUZZY_THRESHOLD);
  if (!env.CONCALL_FUZZY_THRESHOLD || !Number.isFinite(parsed)) {
    return 98;
  }
  return Math.min(100, Math.max(0, Math.round(parsed)));
};

export const getMatchMode = (env: Env = process.env): MatchMode =>
  env.CONCALL_MATCH_MODE?.toLowerCase() === "all" ? "all" : "first";

export const getDateFormats = (env: Env = process.env): string[] => {
  const formats = (env.CONCALL_DATE_FORMATS ?? "")
    .split("|")
    .map((format) => format.trim())
    .filter(Boolean);
  return formats.length ? formats : [...DEFAULT_DATE_FORMATS];
};

export const getGuestEmail = (env: Env = process.env): string | null => {
  const value = env.GCAL_GUEST_EMAIL?.trim();
  return value ? value : null;
};

export const getTimeZone = (env: Env = process.env): string => {
  const value = env.CONCALL_TIMEZONE?.trim();
  if (!value) {
    return DEFAULT_TIME_ZONE;
  }
  if (!IANAZone.isValidZone(value)) {
    log.warn(`Unknown time zone '${value}'; using ${DEFAULT_TIME_ZONE}.`);
    return DEFAULT_TIME_ZONE;
  }
  return value;
};

export const isDryRun = (env: Env = process.env): boolean => env.CONCALL_DRY_RUN === "1";

export const DEFAULT_CONFIG: PipelineConfig = {
  feedUrl: FEED_URL,
  companyFile: "companies.txt",
  calendarId: "primary",
  credentialsPath: "service-account.json",
  threshold: 98,
  keywords: [...ALLOWED_KEYWORDS],
  matchMode: "first",
  futureOnly: false,
  dryRun: false,
  ledgerPath: "artifacts/processed-events.json",
  reportPath: "artifacts/concall-report.json",
  retry: {
    attempts: 3,
    backoffMs: 2000,
    connectTimeoutMs: 10_000,
    readTimeoutMs: 90_000,
  },
  event: {
    timeZone: DEFAULT_TIME_ZONE,
    dateFormats: [...DEFAULT_DATE_FORMATS],
    durationMinutes: 30,
    location: EVENT_LOCATION,
    tag: EVENT_TAG,
    guestEmail: null,
  },
};

export const loadPipelineConfig = (env: Env = process.env): PipelineConfig => ({
  ...DEFAULT_CONFIG,
  feedUrl: env.CONCALL_FEED_URL ?? DEFAULT_CONFIG.feedUrl,
  companyFile: env.CONCALL_COMPANY_FILE ?? DEFAULT_CONFIG.companyFile,
  calendarId: env.CONCALL_CALENDAR_ID ?? DEFAULT_CONFIG.calendarId,
  credentialsPath: env.GOOGLE_APPLICATION_CREDENTIALS ?? DEFAULT_CONFIG.credentialsPath,
  threshold: getThreshold(env),
  matchMode: getMatchMode(env),
  futureOnly: env.CONCALL_FUTURE_ONLY === "1",
  dryRun: isDryRun(env),
  ledgerPath: env.CONCALL_LEDGER_PATH ?? DEFAULT_CONFIG.ledgerPath,
  reportPath: env.CONCALL_REPORT_PATH ?? DEFAULT_CONFIG.reportPath,
  retry: {
    ...DEFAULT_CONFIG.retry,
    attempts: coercePositiveInt(env.CONCALL_FETCH_ATTEMPTS) ?? DEFAULT_CONFIG.retry.attempts,
    backoffMs: coercePositiveInt(env.CONCALL_BACKOFF_MS) ?? DEFAULT_CONFIG.retry.backoffMs,
  },
  event: {
    ...DEFAULT_CONFIG.event,
    timeZone: getTimeZone(env),
    dateFormats: getDateFormats(env),
    durationMinutes: coercePositiveInt(env.CONCALL_EVENT_MINUTES) ?? DEFAULT_CONFIG.event.durationMinutes,
    guestEmail: getGuestEmail(env),
  },
});
