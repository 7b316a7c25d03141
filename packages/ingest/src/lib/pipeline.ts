import type { EventLedger } from "../repo/types";
import { SinkError, type EventSink } from "../sink/types";
import { composeEvent } from "./event";
import type { DocumentExtractor } from "./extract";
import { buildEventKey } from "./idempotency";
import { createLogger, describeError } from "./log";
import { matchEntries, pickBestMatch } from "./match";
import type { PipelineConfig } from "./settings";
import type {
  CompanyOutcome,
  FailureKind,
  FeedEntry,
  MatchResult,
  OutcomeStatus,
  PipelineStage,
  Result,
  RunSummary,
} from "./types";

export type PipelineDeps = {
  names: string[];
  entries: FeedEntry[];
  config: PipelineConfig;
  extractor: DocumentExtractor;
  sink: EventSink;
  ledger: EventLedger;
  now?: Date;
};

const log = createLogger("pipeline");

const failure = (error: FailureKind, stage: PipelineStage, cause: unknown): Result<never> => ({
  ok: false,
  error,
  stage,
  reason: describeError(cause),
});

const attempt = async <T>(
  stage: PipelineStage,
  run: () => Promise<T> | T,
  classify: (error: unknown) => FailureKind,
): Promise<Result<T>> => {
  try {
    return { ok: true, value: await run() };
  } catch (error) {
    return failure(classify(error), stage, error);
  }
};

const classifySinkError = (error: unknown): FailureKind => (error instanceof SinkError ? "transient" : "item");

const processMatch = async (
  name: string,
  match: MatchResult,
  deps: PipelineDeps,
): Promise<Result<CompanyOutcome>> => {
  const { entry } = match;
  const eventKey = buildEventKey(entry.link, name);

  const seen = await attempt("ledger", () => deps.ledger.has(eventKey), () => "transient");
  if (!seen.ok) {
    return seen;
  }
  if (seen.value) {
    log.info(`Already processed '${entry.title}' for ${name} (key ${eventKey}); skipping.`);
    return {
      ok: true,
      value: { status: "skipped_duplicate", company: name, title: entry.title, link: entry.link, eventKey },
    };
  }

  log.info(`Downloading and parsing document for: ${entry.title}`);
  const fields = await attempt("extract", () => deps.extractor.extractFields(entry.link), () => "item");
  if (!fields.ok) {
    return fields;
  }

  const payload = await attempt(
    "compose",
    () => composeEvent(name, match, fields.value, { ...deps.config.event, now: deps.now }),
    () => "parse",
  );
  if (!payload.ok) {
    return payload;
  }

  log.info(`Creating calendar event for ${name}: ${entry.title}`);
  const inserted = await attempt("sink", () => deps.sink.insert(payload.value), classifySinkError);
  if (!inserted.ok) {
    return inserted;
  }

  if (deps.config.dryRun) {
    log.info(`Dry run: not recording key ${eventKey} in the ledger.`);
    return {
      ok: true,
      value: { status: "created", company: name, title: entry.title, link: entry.link, eventKey, eventId: inserted.value.id },
    };
  }

  const recorded = await attempt(
    "ledger",
    () =>
      deps.ledger.record({
        key: eventKey,
        company: name,
        link: entry.link,
        title: entry.title,
        eventId: inserted.value.id,
        createdAt: (deps.now ?? new Date()).toISOString(),
      }),
    () => "transient",
  );
  if (!recorded.ok) {
    log.error(`Event created but not recorded in ledger (key ${eventKey}): ${recorded.reason}`);
  }

  return {
    ok: true,
    value: {
      status: "created",
      company: name,
      title: entry.title,
      link: entry.link,
      eventKey,
      eventId: inserted.value.id,
    },
  };
};

const selectMatches = (matches: MatchResult[], config: PipelineConfig) => {
  if (config.matchMode === "all") {
    return matches;
  }
  const best = pickBestMatch(matches, config.futureOnly);
  return best ? [best] : [];
};

export const summarizeOutcomes = (
  outcomes: CompanyOutcome[],
  entryCount: number,
  companyCount: number,
): RunSummary => {
  const counts: Record<OutcomeStatus, number> = {
    created: 0,
    skipped_duplicate: 0,
    no_match: 0,
    failed: 0,
  };
  for (const outcome of outcomes) {
    counts[outcome.status] += 1;
  }
  return { entryCount, companyCount, outcomes, counts };
};

export const runPipeline = async (deps: PipelineDeps): Promise<RunSummary> => {
  const { names, entries, config } = deps;
  const outcomes: CompanyOutcome[] = [];

  for (const name of names) {
    log.info(`Processing company: ${name}`);
    const matches = matchEntries(entries, [name], {
      threshold: config.threshold,
      keywords: config.keywords,
      futureOnly: config.futureOnly,
      now: deps.now,
    });

    if (!matches.length) {
      log.info(`No Analyst/Concall found for: ${name}`);
      outcomes.push({ status: "no_match", company: name });
      continue;
    }

    for (const match of selectMatches(matches, config)) {
      const result = await processMatch(name, match, deps).catch((error: unknown) =>
        failure("item", "match", error),
      );

      if (result.ok) {
        outcomes.push(result.value);
        continue;
      }

      log.error(`Processing ${name} failed at ${result.stage ?? "match"}: ${result.reason}`);
      outcomes.push({
        status: "failed",
        company: name,
        stage: result.stage ?? "match",
        reason: result.reason,
        title: match.entry.title,
      });
    }
  }

  const summary = summarizeOutcomes(outcomes, entries.length, names.length);
  log.info(
    `Run finished: ${summary.counts.created} created, ${summary.counts.skipped_duplicate} duplicates, ` +
      `${summary.counts.no_match} without match, ${summary.counts.failed} failed.`,
  );
  return summary;
};
