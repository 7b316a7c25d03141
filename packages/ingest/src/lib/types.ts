export type FeedEntry = {
  title: string;
  summary: string | null;
  link: string;
  publishedAt: Date | null;
};

export type MatchResult = {
  entry: FeedEntry;
  name: string;
  score: number;
};

export type ExtractedFields = {
  date: string;
  time: string;
  dialIn: string;
  registrationLink: string;
  host: string;
  contacts: string[];
};

export type TextField = Exclude<keyof ExtractedFields, "contacts">;

export type EventDateTime = {
  dateTime: string;
  timeZone: string;
};

export type CalendarEventPayload = {
  summary: string;
  description: string;
  start: EventDateTime;
  end: EventDateTime;
  location: string;
  attendees: Array<{ email: string }>;
  extendedProperties: {
    private: {
      eventKey: string;
    };
  };
};

// Sink initialization failures are the only fatal ones; they are thrown before the pipeline starts.
export type FailureKind = "transient" | "parse" | "item";

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: FailureKind; reason: string; stage?: PipelineStage };

export type PipelineStage = "match" | "extract" | "compose" | "ledger" | "sink";

export type CompanyOutcome =
  | { status: "created"; company: string; title: string; link: string; eventKey: string; eventId: string | null }
  | { status: "skipped_duplicate"; company: string; title: string; link: string; eventKey: string }
  | { status: "no_match"; company: string }
  | { status: "failed"; company: string; stage: PipelineStage; reason: string; title?: string };

export type OutcomeStatus = CompanyOutcome["status"];

export type RunSummary = {
  entryCount: number;
  companyCount: number;
  outcomes: CompanyOutcome[];
  counts: Record<OutcomeStatus, number>;
};
