import { beforeEach, describe, expect, it, vi } from "vitest";
import type { DocumentExtractor } from "../src/lib/extract";
import { emptyFields } from "../src/lib/fields";
import { buildEventKey } from "../src/lib/idempotency";
import { runPipeline } from "../src/lib/pipeline";
import { DEFAULT_CONFIG, type PipelineConfig } from "../src/lib/settings";
import type { CalendarEventPayload, FeedEntry } from "../src/lib/types";
import { MemoryLedger } from "../src/repo/memory";
import { DryRunSink } from "../src/sink/dry-run";
import { GoogleCalendarSink } from "../src/sink/google";
import { SinkError, type EventSink, type InsertedEvent } from "../src/sink/types";

const NOW = new Date("2024-03-01T00:00:00Z");

const entry = (title: string, link: string, summary: string | null = null): FeedEntry => ({
  title,
  summary,
  link,
  publishedAt: null,
});

const ACME_CONCALL = entry(
  "Acme Ltd — Concall with Analysts",
  "https://example.com/acme-concall.pdf",
  "institutional investors invited",
);
const ACME_MEET = entry("Acme Ltd — Investor Meet", "https://example.com/acme-meet.pdf");
const BETA_BOARD = entry("Beta Industries — Board Meeting", "https://example.com/beta-board.pdf");
const GAMMA_CALL = entry("Gamma Corp — Earnings Call", "https://example.com/gamma-call.pdf");

const config: PipelineConfig = { ...DEFAULT_CONFIG, threshold: 90 };

const createExtractor = () => {
  const extractFields = vi.fn<DocumentExtractor["extractFields"]>(async () => ({
    ...emptyFields(),
    date: "15-Mar-2024",
    time: "10:30 AM",
  }));
  return { extractFields };
};

class RecordingSink implements EventSink {
  payloads: CalendarEventPayload[] = [];
  failures = new Map<string, SinkError>();

  async insert(payload: CalendarEventPayload): Promise<InsertedEvent> {
    const failure = this.failures.get(payload.summary);
    if (failure) {
      throw failure;
    }
    this.payloads.push(payload);
    return { id: `evt-${this.payloads.length}`, htmlLink: null };
  }
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("runPipeline", () => {
  it("creates events for matched companies and records the rest", async () => {
    const sink = new RecordingSink();
    const ledger = new MemoryLedger();
    const extractor = createExtractor();

    const summary = await runPipeline({
      names: ["Acme Ltd", "Beta Industries"],
      entries: [ACME_CONCALL, BETA_BOARD],
      config,
      extractor,
      sink,
      ledger,
      now: NOW,
    });

    expect(summary.outcomes).toEqual([
      {
        status: "created",
        company: "Acme Ltd",
        title: ACME_CONCALL.title,
        link: ACME_CONCALL.link,
        eventKey: buildEventKey(ACME_CONCALL.link, "Acme Ltd"),
        eventId: "evt-1",
      },
      { status: "no_match", company: "Beta Industries" },
    ]);
    expect(summary.counts).toEqual({ created: 1, skipped_duplicate: 0, no_match: 1, failed: 0 });
    expect(extractor.extractFields).toHaveBeenCalledWith(ACME_CONCALL.link);
    expect(sink.payloads.map((payload) => payload.summary)).toEqual(["Acme Ltd Analyst/Concall"]);
    expect(sink.payloads[0]?.start.dateTime).toBe("2024-03-15T10:30:00+05:30");
    expect(ledger.entries).toHaveLength(1);
    expect(ledger.entries[0]?.eventId).toBe("evt-1");
  });

  it("skips announcements already in the ledger on a second run", async () => {
    const sink = new RecordingSink();
    const ledger = new MemoryLedger();
    const deps = {
      names: ["Acme Ltd"],
      entries: [ACME_CONCALL],
      config,
      extractor: createExtractor(),
      sink,
      ledger,
      now: NOW,
    };

    await runPipeline(deps);
    const second = await runPipeline(deps);

    expect(second.outcomes.map((outcome) => outcome.status)).toEqual(["skipped_duplicate"]);
    expect(sink.payloads).toHaveLength(1);
    expect(deps.extractor.extractFields).toHaveBeenCalledTimes(1);
  });

  it("acts on one announcement per company by default", async () => {
    const sink = new RecordingSink();
    await runPipeline({
      names: ["Acme Ltd"],
      entries: [ACME_CONCALL, ACME_MEET],
      config,
      extractor: createExtractor(),
      sink,
      ledger: new MemoryLedger(),
      now: NOW,
    });

    expect(sink.payloads).toHaveLength(1);
    expect(sink.payloads[0]?.description).toContain(ACME_CONCALL.link);
  });

  it("acts on every announcement in all mode", async () => {
    const sink = new RecordingSink();
    const summary = await runPipeline({
      names: ["Acme Ltd"],
      entries: [ACME_CONCALL, ACME_MEET],
      config: { ...config, matchMode: "all" },
      extractor: createExtractor(),
      sink,
      ledger: new MemoryLedger(),
      now: NOW,
    });

    expect(summary.counts.created).toBe(2);
    expect(sink.payloads).toHaveLength(2);
  });

  it("keeps going after a company fails at the sink", async () => {
    const sink = new RecordingSink();
    sink.failures.set("Acme Ltd Analyst/Concall", new SinkError("Calendar insert failed (500)", 500));

    const summary = await runPipeline({
      names: ["Acme Ltd", "Gamma Corp"],
      entries: [ACME_CONCALL, GAMMA_CALL],
      config,
      extractor: createExtractor(),
      sink,
      ledger: new MemoryLedger(),
      now: NOW,
    });

    expect(summary.outcomes[0]).toEqual({
      status: "failed",
      company: "Acme Ltd",
      stage: "sink",
      reason: "Calendar insert failed (500)",
      title: ACME_CONCALL.title,
    });
    expect(summary.outcomes[1]?.status).toBe("created");
    expect(sink.payloads.map((payload) => payload.summary)).toEqual(["Gamma Corp Analyst/Concall"]);
  });

  it("does not record a failed insert in the ledger", async () => {
    const sink = new RecordingSink();
    sink.failures.set("Acme Ltd Analyst/Concall", new SinkError("Calendar insert failed (503)", 503));
    const ledger = new MemoryLedger();

    await runPipeline({
      names: ["Acme Ltd"],
      entries: [ACME_CONCALL],
      config,
      extractor: createExtractor(),
      sink,
      ledger,
      now: NOW,
    });

    expect(ledger.entries).toEqual([]);
  });

  it("continues with the next company when the calendar refuses one insert", async () => {
    const created: string[] = [];
    const sink = new GoogleCalendarSink(
      {
        insert: async (params) => {
          const summary = params.requestBody?.summary ?? "";
          if (summary.startsWith("Acme")) {
            throw Object.assign(new Error("Forbidden"), { code: 403 });
          }
          created.push(summary);
          return { data: { id: "evt-gamma" } };
        },
      },
      "primary",
    );

    const summary = await runPipeline({
      names: ["Acme Ltd", "Gamma Corp"],
      entries: [ACME_CONCALL, GAMMA_CALL],
      config: { ...config, event: { ...config.event, guestEmail: "guest@example.com" } },
      extractor: createExtractor(),
      sink,
      ledger: new MemoryLedger(),
      now: NOW,
    });

    expect(created).toEqual(["Gamma Corp Analyst/Concall"]);
    expect(summary.outcomes[0]).toMatchObject({
      status: "failed",
      stage: "sink",
      reason: "Calendar insert failed (403): Forbidden",
    });
    expect(summary.outcomes[1]).toMatchObject({ status: "created", eventId: "evt-gamma" });
  });

  it("leaves the ledger untouched on a dry run", async () => {
    const ledger = new MemoryLedger();
    const deps = {
      names: ["Acme Ltd"],
      entries: [ACME_CONCALL],
      config: { ...config, dryRun: true },
      extractor: createExtractor(),
      sink: new DryRunSink(),
      ledger,
      now: NOW,
    };

    const first = await runPipeline(deps);
    const second = await runPipeline(deps);

    expect(first.outcomes.map((outcome) => outcome.status)).toEqual(["created"]);
    expect(second.outcomes.map((outcome) => outcome.status)).toEqual(["created"]);
    expect(ledger.entries).toEqual([]);
    expect(deps.sink.payloads).toHaveLength(2);
  });

  it("reports a ledger read failure for that company only", async () => {
    const ledger = new MemoryLedger();
    vi.spyOn(ledger, "has").mockRejectedValueOnce(new Error("disk unavailable"));
    const sink = new RecordingSink();

    const summary = await runPipeline({
      names: ["Acme Ltd", "Gamma Corp"],
      entries: [ACME_CONCALL, GAMMA_CALL],
      config,
      extractor: createExtractor(),
      sink,
      ledger,
      now: NOW,
    });

    expect(summary.outcomes.map((outcome) => outcome.status)).toEqual(["failed", "created"]);
    expect(summary.outcomes[0]).toMatchObject({ stage: "ledger", reason: "disk unavailable" });
  });
});
