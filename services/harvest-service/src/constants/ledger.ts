export const LEDGER_HEADER = [
  "Date",
  "Category",
  "Keyword",
  "Headline",
  "Source",
  "URL",
  "Summary",
  "Extraction Timestamp",
] as const;

export const LEDGER_URL_COLUMN = 5;

export const EXPLAINER_TABLE = "Explainer Script";
export const EXPLAINER_HEADER = ["Date", "Explainer"] as const;

export const ONE_SHEET_TABLE = "One Sheet";
export const ONE_SHEET_HEADER = ["Date", "One Sheet Briefing"] as const;

export const LEDGER_KEY_PREFIX = "ledger";

export function dailyLedgerName(date: string): string {
  return `Daily Digest ${date}`;
}
