import { AxiosInstance } from "axios";
import Bottleneck from "bottleneck";
import {
  ArticleRecord,
  CandidateResult,
  HarvestSummary,
  SkipReason,
} from "../interfaces/article";
import { Table, TableStore } from "../interfaces/ledger";
import { RelevanceClassifier } from "../interfaces/relevance";
import { LEDGER_HEADER, dailyLedgerName } from "../constants/ledger";
import { NOT_AVAILABLE, articleUrl } from "../constants/site";
import { fetchArticles } from "./fetchArticles";
import { extractArticle } from "./extractArticle";
import { DEFAULT_WINDOW_DAYS, isRecent, isRelevant } from "./articleFilter";
import { ensureHeader, keysOf, mergeRecord } from "./ledgerMerge";
import { KeywordCache } from "./keywordCache";
import { siteLimiter } from "./siteLimiter";
import { logger } from "../logger";
import { formatDate, parseTimestamp, sleep as defaultSleep, Sleep } from "../utils/time";

export interface HarvestDeps {
  axiosClient: AxiosInstance;
  store: TableStore;
  keywords: KeywordCache;
  classifier?: RelevanceClassifier;
  limiter?: Bottleneck;
  sleep?: Sleep;
  clock?: () => number;
  windowDays?: number;
  keywordDelayMs?: number;
  writeDelayMs?: number;
}

interface KeywordContext {
  category: string;
  keyword: string;
}

/**
 * Mutable state of one run: the day's ledger and its bookkeeping.
 */
class RunState {
  readonly summary: HarvestSummary;

  constructor(
    readonly ledgerName: string,
    public table: Table,
    /** URLs already stored before this run started */
    readonly priorUrls: Set<string>,
    date: string
  ) {
    this.summary = {
      date,
      ledger: ledgerName,
      inserted: 0,
      updated: 0,
      records: [],
      skipped: [],
    };
  }

  skip(ctx: KeywordContext, candidate: CandidateResult, reason: SkipReason): void {
    logger.info(
      { keyword: ctx.keyword, slug: candidate.slug, title: candidate.title, reason },
      "Skipping article"
    );
    this.summary.skipped.push({
      keyword: ctx.keyword,
      slug: candidate.slug || null,
      title: candidate.title,
      reason,
    });
  }
}

/** Calendar part of the start time as published, else the run date */
function recordDate(start: string | null, runDate: string): string {
  return start && parseTimestamp(start) ? start.trim().slice(0, 10) : runDate;
}

async function openLedger(store: TableStore, name: string): Promise<Table> {
  const stored = await store.readTable(name);
  const table = ensureHeader(stored, LEDGER_HEADER);

  if (table !== stored) {
    await store.writeTable(name, table);
    logger.info({ ledger: name }, "Ledger header written");
  }
  return table;
}

/**
 * Fetch, filter, extract and record every active keyword, one at a time.
 * Per-article failures are skipped; ledger failures end the run.
 */
export async function runHarvest(deps: HarvestDeps): Promise<HarvestSummary> {
  const {
    axiosClient,
    store,
    keywords,
    classifier,
    limiter = siteLimiter,
    sleep = defaultSleep,
    clock = Date.now,
    windowDays = DEFAULT_WINDOW_DAYS,
    keywordDelayMs = 5_000,
    writeDelayMs = 2_000,
  } = deps;

  const startedAt = clock();
  const date = formatDate(startedAt);
  const ledgerName = dailyLedgerName(date);

  const categories = await keywords.getOrRefresh(startedAt);

  const ledger = await openLedger(store, ledgerName);
  const state = new RunState(ledgerName, ledger, keysOf(ledger), date);

  logger.info(
    { ledger: ledgerName, categories: categories.size, existing: state.priorUrls.size },
    "Harvest started"
  );

  for (const [category, keywordList] of categories) {
    for (const keyword of keywordList) {
      const ctx = { category, keyword };
      logger.info(ctx, "Searching keyword");

      const candidates = await fetchArticles({ keyword, axiosClient, limiter, sleep });
      await sleep(keywordDelayMs);

      for (const candidate of candidates) {
        const written = await processCandidate(ctx, candidate, state, {
          axiosClient,
          store,
          classifier,
          limiter,
          clock,
          windowDays,
        });
        if (written) await sleep(writeDelayMs);
      }
    }
  }

  logger.info(
    {
      ledger: ledgerName,
      inserted: state.summary.inserted,
      updated: state.summary.updated,
      skipped: state.summary.skipped.length,
      durationMs: clock() - startedAt,
    },
    "Harvest complete"
  );
  return state.summary;
}

/**
 * Returns true when a row was written to the ledger.
 */
async function processCandidate(
  ctx: KeywordContext,
  candidate: CandidateResult,
  state: RunState,
  {
    axiosClient,
    store,
    classifier,
    limiter,
    clock,
    windowDays,
  }: {
    axiosClient: AxiosInstance;
    store: TableStore;
    classifier?: RelevanceClassifier;
    limiter: Bottleneck;
    clock: () => number;
    windowDays: number;
  }
): Promise<boolean> {
  if (candidate.type !== "event") {
    state.skip(ctx, candidate, "not-event");
    return false;
  }

  if (!isRecent(candidate.start, { now: clock(), windowDays })) {
    state.skip(ctx, candidate, "stale");
    return false;
  }

  if (candidate.slug && state.priorUrls.has(articleUrl(candidate.slug))) {
    state.skip(ctx, candidate, "duplicate");
    return false;
  }

  const fields = await extractArticle({ slug: candidate.slug, axiosClient, limiter });
  if (fields.url === NOT_AVAILABLE) {
    state.skip(ctx, candidate, "extraction-failed");
    return false;
  }

  if (!(await isRelevant(fields, classifier))) {
    state.skip(ctx, candidate, "not-relevant");
    return false;
  }

  const record: ArticleRecord = {
    date: recordDate(candidate.start, state.summary.date),
    category: ctx.category,
    keyword: ctx.keyword,
    headline: fields.headline,
    source: fields.source,
    url: fields.url,
    summary: fields.summary,
    extractedAt: new Date(clock()).toISOString(),
  };

  const { action, table } = mergeRecord(record, state.table);
  await store.writeTable(state.ledgerName, table);
  state.table = table;

  if (action === "inserted") {
    state.summary.inserted++;
    state.summary.records.push(record);
  } else {
    state.summary.updated++;
    const i = state.summary.records.findIndex((r) => r.url === record.url);
    if (i !== -1) state.summary.records[i] = record;
  }

  logger.info({ ...ctx, url: record.url, action }, "Article recorded");
  return true;
}
