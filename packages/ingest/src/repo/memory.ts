import type { EventLedger, LedgerEntry } from "./types";

export class MemoryLedger implements EventLedger {
  entries: LedgerEntry[] = [];

  constructor(initial: LedgerEntry[] = []) {
    this.entries = [...initial];
  }

  async has(key: string): Promise<boolean> {
    return this.entries.some((entry) => entry.key === key);
  }

  async record(entry: LedgerEntry): Promise<void> {
    const existing = this.entries.find((item) => item.key === entry.key);
    if (existing) {
      existing.eventId = existing.eventId ?? entry.eventId;
      return;
    }
    this.entries.push({ ...entry });
  }

  async list(): Promise<LedgerEntry[]> {
    return [...this.entries];
  }
}
