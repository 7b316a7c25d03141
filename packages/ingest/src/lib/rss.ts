import Parser from "rss-parser";
import { FEED_USER_AGENT } from "../config/sources";
import { fetchText, type FetchLike } from "./fetcher";
import { createLogger, describeError } from "./log";
import type { FeedEntry } from "./types";

const parser = new Parser();
const log = createLogger("feed");

const parseDate = (value?: string) => {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
};

export const parseFeedEntries = async (xml: string): Promise<FeedEntry[]> => {
  const feed = await parser.parseString(xml);
  return (feed.items ?? []).map((item) => ({
    title: item.title ?? "",
    summary: item.contentSnippet ?? item.content ?? item.summary ?? null,
    link: item.link ?? item.guid ?? "",
    publishedAt: parseDate(item.isoDate) ?? parseDate(item.pubDate),
  }));
};

export const fetchFeedEntries = async (
  feedUrl: string,
  options: { timeoutMs?: number; fetchImpl?: FetchLike } = {},
): Promise<FeedEntry[]> => {
  log.info(`Fetching feed from ${feedUrl} ...`);
  let xml: string;
  try {
    xml = await fetchText(feedUrl, {
      timeoutMs: options.timeoutMs ?? 30000,
      headers: { "User-Agent": FEED_USER_AGENT },
      fetchImpl: options.fetchImpl,
    });
  } catch (error) {
    log.error(`Failed to fetch feed: ${describeError(error)}`);
    return [];
  }

  try {
    const entries = await parseFeedEntries(xml);
    log.success(`${entries.length} entries fetched from feed.`);
    return entries;
  } catch (error) {
    log.error(`Failed to parse feed: ${describeError(error)}`);
    return [];
  }
};
