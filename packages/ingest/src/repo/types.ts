export type LedgerEntry = {
  key: string;
  company: string;
  link: string;
  title: string;
  eventId: string | null;
  createdAt: string;
};

export interface EventLedger {
  has(key: string): Promise<boolean>;
  record(entry: LedgerEntry): Promise<void>;
  list(): Promise<LedgerEntry[]>;
}
