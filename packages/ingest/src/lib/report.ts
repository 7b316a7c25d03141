import { appendFileSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { PipelineConfig } from "./settings";
import type { CompanyOutcome, OutcomeStatus, RunSummary } from "./types";

export type RunReport = {
  generatedAt: string;
  feedUrl: string;
  threshold: number;
  matchMode: string;
  futureOnly: boolean;
  dryRun: boolean;
  entries: number;
  companies: number;
  counts: Record<OutcomeStatus, number>;
  outcomes: CompanyOutcome[];
  error: string | null;
};

export const buildRunReport = (
  summary: RunSummary,
  config: PipelineConfig,
  now = new Date(),
  error: string | null = null,
): RunReport => ({
  generatedAt: now.toISOString(),
  feedUrl: config.feedUrl,
  threshold: config.threshold,
  matchMode: config.matchMode,
  futureOnly: config.futureOnly,
  dryRun: config.dryRun,
  entries: summary.entryCount,
  companies: summary.companyCount,
  counts: { ...summary.counts },
  outcomes: summary.outcomes,
  error,
});

export const writeRunReport = (report: RunReport, filePath: string) => {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
};

const describeOutcome = (outcome: CompanyOutcome) => {
  switch (outcome.status) {
    case "created":
      return `- **${outcome.company}**: created - ${outcome.title}`;
    case "skipped_duplicate":
      return `- **${outcome.company}**: already on calendar - ${outcome.title}`;
    case "no_match":
      return `- **${outcome.company}**: no matching announcement`;
    case "failed":
      return `- **${outcome.company}**: failed at ${outcome.stage} (${outcome.reason})`;
  }
};

export const formatReportSummary = (report: RunReport) => {
  const lines: string[] = [];
  lines.push("## Concall Calendar Run");
  lines.push("");
  lines.push(`Feed entries: **${report.entries}** | companies: **${report.companies}**`);
  lines.push(
    `Created **${report.counts.created}** | duplicates **${report.counts.skipped_duplicate}** | ` +
      `no match **${report.counts.no_match}** | failed **${report.counts.failed}**`,
  );
  if (report.error) {
    lines.push("");
    lines.push(`**Run aborted:** ${report.error}`);
  }
  if (report.dryRun) {
    lines.push("");
    lines.push("_Dry run: no events were sent to the calendar._");
  }
  lines.push("");
  lines.push("### Outcomes");
  for (const outcome of report.outcomes) {
    lines.push(describeOutcome(outcome));
  }
  return `${lines.join("\n")}\n`;
};

export const writeReportSummary = (report: RunReport) => {
  const summaryPath = process.env.GITHUB_STEP_SUMMARY;
  if (!summaryPath) {
    return;
  }
  appendFileSync(summaryPath, formatReportSummary(report), "utf-8");
};
