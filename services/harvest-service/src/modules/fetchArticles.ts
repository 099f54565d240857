import axios, { AxiosInstance } from "axios";
import Bottleneck from "bottleneck";
import { CandidateResult } from "../interfaces/article";
import { SearchEnvelopeSchema, SearchItemSchema } from "../schemas/search.schema";
import { REQUEST_TIMEOUT_MS, SEARCH_URL, SITE_HEADERS } from "../constants/site";
import { siteLimiter } from "./siteLimiter";
import { logger } from "../logger";
import { sleep as defaultSleep, Sleep } from "../utils/time";

// -------------------------------------------------
// Retry policy
// -------------------------------------------------
export const MAX_ATTEMPTS = 3;

const BACKOFF_BASE_MS = 1_000;
const BACKOFF_MIN_MS = 5_000;
const BACKOFF_MAX_MS = 20_000;

/**
 * Delay before the attempt following `attempt` (1-based).
 */
export function backoffDelay(attempt: number): number {
  const exponential = BACKOFF_BASE_MS * 2 ** (attempt - 1);
  return Math.min(BACKOFF_MAX_MS, Math.max(BACKOFF_MIN_MS, exponential));
}

/**
 * Only responses the server answered with an error status are retried.
 * Timeouts, resets and other transport failures carry no response.
 */
function isHttpStatusError(err: unknown): boolean {
  return axios.isAxiosError(err) && err.response !== undefined;
}

/**
 * Search the news site for one keyword.
 * Never throws: every failure ends as an empty candidate list.
 */
export async function fetchArticles({
  keyword,
  axiosClient,
  limiter = siteLimiter,
  sleep = defaultSleep,
}: {
  keyword: string;
  axiosClient: AxiosInstance;
  limiter?: Bottleneck;
  sleep?: Sleep;
}): Promise<CandidateResult[]> {
  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    try {
      const response = await limiter.schedule(() =>
        axiosClient.post(
          SEARCH_URL,
          { url: keyword },
          { headers: SITE_HEADERS, timeout: REQUEST_TIMEOUT_MS }
        )
      );

      return toCandidates(keyword, response.data);
    } catch (err) {
      if (!isHttpStatusError(err)) {
        logger.error({ err, keyword }, "Search request failed, treating as no results");
        return [];
      }

      const status = axios.isAxiosError(err) ? err.response?.status : undefined;

      if (attempt === MAX_ATTEMPTS) {
        logger.error(
          { keyword, status, attempts: attempt },
          "Search retries exhausted, treating as no results"
        );
        return [];
      }

      const delayMs = backoffDelay(attempt);
      logger.warn(
        { keyword, status, attempt, delayMs },
        "Search request returned an error status, retrying"
      );
      await sleep(delayMs);
    }
  }

  return [];
}

/**
 * Accepts either `{ searchResults: [...] }` or a bare array.
 */
export function toCandidates(keyword: string, payload: unknown): CandidateResult[] {
  let items: unknown[];

  if (Array.isArray(payload)) {
    items = payload;
  } else {
    const envelope = SearchEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      logger.warn(
        { keyword, payloadType: typeof payload },
        "Unexpected search response format"
      );
      return [];
    }
    items = envelope.data.searchResults;
  }

  const candidates: CandidateResult[] = [];

  for (const item of items) {
    const parsed = SearchItemSchema.safeParse(item);
    if (!parsed.success) {
      logger.warn(
        { keyword, issues: parsed.error.issues },
        "Skipping invalid search result"
      );
      continue;
    }

    candidates.push({
      type: parsed.data.type === "event" ? "event" : "other",
      start: parsed.data.start ?? null,
      slug: parsed.data.slug,
      title: parsed.data.title ?? null,
    });
  }

  logger.debug({ keyword, count: candidates.length }, "Search results received");
  return candidates;
}
