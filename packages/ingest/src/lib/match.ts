import { createLogger, describeError } from "./log";
import { normalize } from "./normalize";
import { partialRatio } from "./similarity";
import type { FeedEntry, MatchResult } from "./types";

export type MatchOptions = {
  threshold: number;
  keywords: string[];
  futureOnly?: boolean;
  now?: Date;
};

const log = createLogger("match");

export const normalizeKeywords = (keywords: string[]) =>
  Array.from(new Set(keywords.map((keyword) => normalize(keyword)).filter(Boolean)));

const matchEntry = (
  entry: FeedEntry,
  names: Array<{ name: string; normalized: string }>,
  keywords: string[],
  threshold: number,
): MatchResult | null => {
  const title = normalize(entry.title);
  const summary = normalize(entry.summary);
  const corpus = `${title} ${summary}`;
  const keywordHit = keywords.some((keyword) => corpus.includes(keyword));
  if (!keywordHit) {
    return null;
  }

  // Similarity is scored against the title alone; summaries are too noisy to identify a company.
  for (const { name, normalized } of names) {
    const score = partialRatio(normalized, title);
    if (score >= threshold) {
      return { entry, name, score };
    }
  }
  return null;
};

export const matchEntries = (
  entries: FeedEntry[],
  names: string[],
  options: MatchOptions,
): MatchResult[] => {
  const keywords = normalizeKeywords(options.keywords);
  const normalizedNames = names.map((name) => ({ name, normalized: normalize(name) }));
  const now = options.now ?? new Date();
  const matches: MatchResult[] = [];

  for (const entry of entries) {
    try {
      if (options.futureOnly && !(entry.publishedAt && entry.publishedAt.getTime() > now.getTime())) {
        continue;
      }
      const match = matchEntry(entry, normalizedNames, keywords, options.threshold);
      if (match) {
        log.info(`${match.name}: '${entry.title}' (score=${Math.round(match.score)})`);
        matches.push(match);
      }
    } catch (error) {
      log.error(`While matching '${entry.title || "Unknown"}': ${describeError(error)}`);
    }
  }

  if (options.futureOnly) {
    matches.sort(
      (a, b) => (b.entry.publishedAt?.getTime() ?? 0) - (a.entry.publishedAt?.getTime() ?? 0),
    );
  }
  return matches;
};

export const pickBestMatch = (matches: MatchResult[], futureOnly = false): MatchResult | null => {
  if (!matches.length) {
    return null;
  }
  if (futureOnly) {
    return matches[0] ?? null;
  }
  return matches.reduce((best, match) => (match.score > best.score ? match : best));
};
