import { existsSync, readFileSync } from "fs";
import { createLogger } from "./log";

const log = createLogger("watchlist");

export const parseWatchlist = (contents: string) => {
  if (contents.includes(",")) {
    return contents
      .split(",")
      .map((name) => name.trim())
      .filter(Boolean);
  }
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
};

export const loadWatchlist = (filePath: string) => {
  log.info(`Reading company names from ${filePath}...`);
  if (!existsSync(filePath)) {
    log.error(`Company file ${filePath} does not exist.`);
    return [];
  }
  const names = parseWatchlist(readFileSync(filePath, "utf-8"));
  log.success(`Loaded companies: ${names.join(", ")}`);
  return names;
};
