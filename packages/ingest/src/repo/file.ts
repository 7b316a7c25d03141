import { existsSync } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import type { EventLedger, LedgerEntry } from "./types";

const readString = (value: object, key: string) => {
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : null;
};

const toLedgerEntry = (value: unknown): LedgerEntry | null => {
  if (!value || typeof value !== "object") {
    return null;
  }
  const key = readString(value, "key");
  const company = readString(value, "company");
  const link = readString(value, "link");
  if (!key || !company || link === null) {
    return null;
  }
  return {
    key,
    company,
    link,
    title: readString(value, "title") ?? "",
    eventId: readString(value, "eventId"),
    createdAt: readString(value, "createdAt") ?? "",
  };
};

/** JSON-array ledger on disk. Loaded once, rewritten on every record. */
export class FileLedger implements EventLedger {
  private entries: Map<string, LedgerEntry> | null = null;

  constructor(private readonly filePath: string) {}

  private async load() {
    if (this.entries) {
      return this.entries;
    }
    const entries = new Map<string, LedgerEntry>();
    if (existsSync(this.filePath)) {
      const parsed: unknown = JSON.parse(await readFile(this.filePath, "utf-8"));
      if (!Array.isArray(parsed)) {
        throw new Error(`Ledger at ${this.filePath} is not a JSON array`);
      }
      for (const item of parsed) {
        const entry = toLedgerEntry(item);
        if (entry) {
          entries.set(entry.key, entry);
        }
      }
    }
    this.entries = entries;
    return entries;
  }

  async has(key: string): Promise<boolean> {
    const entries = await this.load();
    return entries.has(key);
  }

  async record(entry: LedgerEntry): Promise<void> {
    const entries = await this.load();
    if (entries.has(entry.key)) {
      return;
    }
    entries.set(entry.key, entry);
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(Array.from(entries.values()), null, 2)}\n`, "utf-8");
  }

  async list(): Promise<LedgerEntry[]> {
    const entries = await this.load();
    return Array.from(entries.values());
  }
}
