import { ArticleFields, CandidateResult } from "../interfaces/article";
import { RelevanceClassifier } from "../interfaces/relevance";
import { logger } from "../logger";
import { DAY_MS, parseTimestamp } from "../utils/time";

export const DEFAULT_WINDOW_DAYS = 2;

/**
 * Trailing-window check on a candidate's start time.
 *
 * Policy: a missing or unparseable timestamp counts as recent. Malformed
 * upstream dates are let through rather than silently dropping articles.
 */
export function isRecent(
  start: string | null,
  { now, windowDays = DEFAULT_WINDOW_DAYS }: { now: number; windowDays?: number }
): boolean {
  if (!start) {
    logger.info("No date provided, treating as recent");
    return true;
  }

  const published = parseTimestamp(start);
  if (!published) {
    logger.warn({ start }, "Unparseable article date, treating as recent");
    return true;
  }

  return published.getTime() >= now - windowDays * DAY_MS;
}

/**
 * Soft relevance gate: only an explicit "no" rejects.
 */
export async function isRelevant(
  fields: ArticleFields,
  classifier?: RelevanceClassifier
): Promise<boolean> {
  if (!classifier) return true;

  try {
    const verdict = await classifier.classify(fields);

    if (verdict === "unclear") {
      logger.warn({ headline: fields.headline }, "Unclear relevance verdict, keeping article");
    }
    return verdict !== "no";
  } catch (err) {
    logger.error({ err, headline: fields.headline }, "Relevance classification failed, keeping article");
    return true;
  }
}

/**
 * Combined gate for a candidate and its extracted fields. The harvest
 * run applies `isRecent` and `isRelevant` separately, with the page
 * fetch in between, so stale candidates never cost a request.
 */
export async function acceptArticle(
  candidate: CandidateResult,
  fields: ArticleFields,
  {
    now,
    windowDays,
    classifier,
  }: { now: number; windowDays?: number; classifier?: RelevanceClassifier }
): Promise<boolean> {
  if (!isRecent(candidate.start, { now, windowDays })) return false;
  return isRelevant(fields, classifier);
}
