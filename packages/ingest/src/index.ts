import { loadDotEnv } from "./lib/env";
import { createDocumentExtractor } from "./lib/extract";
import { createLogger, describeError } from "./lib/log";
import { runPipeline, summarizeOutcomes } from "./lib/pipeline";
import { buildRunReport, writeReportSummary, writeRunReport, type RunReport } from "./lib/report";
import { fetchFeedEntries } from "./lib/rss";
import { loadPipelineConfig, type PipelineConfig } from "./lib/settings";
import { loadWatchlist } from "./lib/watchlist";
import type { RunSummary } from "./lib/types";
import { FileLedger } from "./repo/file";
import { DryRunSink } from "./sink/dry-run";
import { createGoogleCalendarSink } from "./sink/google";
import type { EventSink } from "./sink/types";

const log = createLogger("main");

const publishReport = (report: RunReport, config: PipelineConfig) => {
  writeRunReport(report, config.reportPath);
  writeReportSummary(report);
  log.info(`Report written to ${config.reportPath}`);
};

const main = async () => {
  const envPath = loadDotEnv();
  log.info(`Concall calendar run started${envPath ? ` (env from ${envPath})` : ""}`);
  const config = loadPipelineConfig();

  let summary: RunSummary = summarizeOutcomes([], 0, 0);
  try {
    const sink: EventSink = config.dryRun
      ? new DryRunSink()
      : await createGoogleCalendarSink({
          calendarId: config.calendarId,
          credentialsPath: config.credentialsPath,
        });

    const names = loadWatchlist(config.companyFile);
    if (!names.length) {
      log.warn("Watchlist is empty; nothing to do.");
    }
    summary = summarizeOutcomes([], 0, names.length);

    const entries = names.length ? await fetchFeedEntries(config.feedUrl) : [];
    summary = await runPipeline({
      names,
      entries,
      config,
      extractor: createDocumentExtractor(config.retry),
      sink,
      ledger: new FileLedger(config.ledgerPath),
    });
  } catch (error) {
    log.fatal(`Run failed: ${describeError(error)}`);
    publishReport(buildRunReport(summary, config, new Date(), describeError(error)), config);
    process.exitCode = 1;
    return;
  }

  publishReport(buildRunReport(summary, config), config);
  log.success("Run complete.");
};

main().catch((error) => {
  log.fatal(`Run failed: ${describeError(error)}`);
  process.exitCode = 1;
});
