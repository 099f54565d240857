/**
 * Search hit that may point at an article detail page
 */
export interface CandidateResult {
  type: "event" | "other";
  start: string | null;
  slug: string;
  title: string | null;
}

/**
 * Fields recovered from a detail page. Missing values hold the
 * "N/A" sentinel, never undefined.
 */
export interface ArticleFields {
  headline: string;
  source: string;
  summary: string;
  url: string;
}

export interface ArticleRecord {
  date: string;
  category: string;
  keyword: string;
  headline: string;
  source: string;
  url: string;
  summary: string;
  extractedAt: string;
}

export type SkipReason =
  | "not-event"
  | "stale"
  | "extraction-failed"
  | "duplicate"
  | "not-relevant";

export interface SkippedArticle {
  keyword: string;
  slug: string | null;
  title: string | null;
  reason: SkipReason;
}

export interface HarvestSummary {
  date: string;
  ledger: string;
  inserted: number;
  updated: number;
  records: ArticleRecord[];
  skipped: SkippedArticle[];
}
