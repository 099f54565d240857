import { AxiosInstance } from "axios";
import Bottleneck from "bottleneck";
import * as cheerio from "cheerio";
import { ArticleFields } from "../interfaces/article";
import {
  ARTICLE_PAGE_PARAMS,
  ATTRIBUTION_MARKERS,
  HEADLINE_SELECTORS,
  LEGACY_SOURCE_SELECTORS,
  NOT_AVAILABLE,
  OUTLET_DOMAINS,
  REQUEST_TIMEOUT_MS,
  SITE_HEADERS,
  SOURCE_BADGE_CLASS,
  SUMMARY_LIST_CLASS,
  SUMMARY_SPAN_CLASS,
  articleUrl,
} from "../constants/site";
import { firstMatch, nonEmpty, nonEmptyList, Strategy } from "../utils/cascade";
import { siteLimiter } from "./siteLimiter";
import { logger } from "../logger";

type Page = cheerio.CheerioAPI;

export const UNAVAILABLE_ARTICLE: Readonly<ArticleFields> = {
  headline: NOT_AVAILABLE,
  source: NOT_AVAILABLE,
  summary: NOT_AVAILABLE,
  url: NOT_AVAILABLE,
};

function clean(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function unique(texts: string[]): string[] {
  const seen: string[] = [];
  for (const text of texts) {
    if (text && !seen.includes(text)) seen.push(text);
  }
  return seen;
}

function textsOf($: Page, selector: string): string[] {
  return $(selector)
    .toArray()
    .map((el) => clean($(el).text()));
}

function textsWhereClassContains($: Page, tag: string, fragment: string): string[] {
  return $(tag)
    .filter((_, el) => ($(el).attr("class") ?? "").toLowerCase().includes(fragment))
    .toArray()
    .map((el) => clean($(el).text()));
}

// -------------------------------------------------
// Headline
// -------------------------------------------------
export function headlineStrategies($: Page): Strategy<string>[] {
  return HEADLINE_SELECTORS.map(
    (selector) => () => nonEmpty(clean($(selector).first().text()))
  );
}

// -------------------------------------------------
// Source attribution
// -------------------------------------------------

/** Tier 1: attribution badges, one label per badge */
export function badgeSources($: Page): string[] | null {
  const sources: string[] = [];
  $(`div[class="${SOURCE_BADGE_CLASS}"]`).each((_, badge) => {
    const label = clean($(badge).find("span").first().text());
    if (label) sources.push(label);
  });
  return nonEmptyList(sources);
}

/**
 * Tier 2 patterns, each yielding one text per matched element (empty
 * texts included). The first pattern that matches any element owns the
 * tier, even when all of its texts are empty.
 */
export function legacySourcePatterns($: Page): Array<() => string[]> {
  return [
    ...LEGACY_SOURCE_SELECTORS.map((selector) => () => textsOf($, selector)),
    () =>
      $("a")
        .filter((_, el) => {
          const href = ($(el).attr("href") ?? "").toLowerCase();
          return OUTLET_DOMAINS.some((domain) => href.includes(domain));
        })
        .toArray()
        .map((el) => clean($(el).text())),
    () => textsWhereClassContains($, "span", "source"),
    () => textsWhereClassContains($, "div", "publisher"),
    () => textsWhereClassContains($, "span", "byline"),
  ];
}

export function legacySources($: Page): string[] | null {
  for (const pattern of legacySourcePatterns($)) {
    const texts = pattern();
    if (texts.length > 0) return nonEmptyList(unique(texts));
  }
  return null;
}

/** Tier 3: any block whose text reads like an attribution line */
export function attributionTextSources($: Page): string[] | null {
  const texts = $("span, div, p")
    .toArray()
    .map((el) => clean($(el).text()))
    .filter((text) => {
      const lower = text.toLowerCase();
      return ATTRIBUTION_MARKERS.some((marker) => lower.includes(marker));
    });
  return nonEmptyList(unique(texts));
}

export function sourceStrategies($: Page): Strategy<string[]>[] {
  return [
    () => badgeSources($),
    () => legacySources($),
    () => attributionTextSources($),
  ];
}

// -------------------------------------------------
// Summary
// -------------------------------------------------
export function summaryStrategies($: Page): Strategy<string>[] {
  return [
    () => {
      const items = $(`ul[class="${SUMMARY_LIST_CLASS}"]`)
        .first()
        .find("li")
        .toArray()
        .map((li) => clean($(li).text()))
        .filter(Boolean);
      return nonEmpty(items.join(" "));
    },
    () => nonEmpty(clean($(`span[class="${SUMMARY_SPAN_CLASS}"]`).first().text())),
    () => nonEmpty(($('meta[name="description"]').attr("content") ?? "").trim()),
  ];
}

/**
 * Pure extraction over an already-fetched detail page.
 */
export function parseArticlePage(html: string, slug: string): ArticleFields {
  const $ = cheerio.load(html);

  const headline = firstMatch(headlineStrategies($)) ?? NOT_AVAILABLE;
  const sources = firstMatch(sourceStrategies($));
  const summary = firstMatch(summaryStrategies($)) ?? NOT_AVAILABLE;

  if (!sources) {
    logger.warn({ slug }, "No sources found on article page");
  }
  if (summary === NOT_AVAILABLE) {
    logger.warn({ slug }, "No summary found on article page");
  }

  return {
    headline,
    source: sources ? sources.join(", ") : NOT_AVAILABLE,
    summary,
    url: articleUrl(slug),
  };
}

/**
 * Fetch and parse one article detail page. Any failure yields the
 * all-sentinel record so a bad page never aborts the batch.
 */
export async function extractArticle({
  slug,
  axiosClient,
  limiter = siteLimiter,
}: {
  slug: string;
  axiosClient: AxiosInstance;
  limiter?: Bottleneck;
}): Promise<ArticleFields> {
  if (!slug) {
    logger.warn("No slug provided for article extraction");
    return { ...UNAVAILABLE_ARTICLE };
  }

  try {
    const response = await limiter.schedule(() =>
      axiosClient.get<string>(articleUrl(slug), {
        params: ARTICLE_PAGE_PARAMS,
        headers: SITE_HEADERS,
        timeout: REQUEST_TIMEOUT_MS,
        responseType: "text",
      })
    );

    if (typeof response.data !== "string") {
      throw new Error("ARTICLE_PAGE_NOT_HTML");
    }

    const fields = parseArticlePage(response.data, slug);
    logger.debug({ slug, source: fields.source }, "Article extracted");
    return fields;
  } catch (err) {
    logger.error({ err, slug }, "Error extracting article");
    return { ...UNAVAILABLE_ARTICLE };
  }
}
