export const SEARCH_URL = "https://web-api-cdn.ground.news/api/public/search/url";
export const ARTICLE_BASE_URL = "https://ground.news/article";

// Auxiliary query parameter the detail page expects
export const ARTICLE_PAGE_PARAMS = { _rsc: "19oxi" } as const;

export const REQUEST_TIMEOUT_MS = 10_000;

export const SITE_HEADERS = {
  accept: "*/*",
  "accept-language": "en-US,en;q=0.9",
  "content-type": "application/json",
  origin: "https://ground.news",
  referer: "https://ground.news/",
  "user-agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/137.0.0.0 Safari/537.36",
  "x-gn-v": "web",
} as const;

export const NOT_AVAILABLE = "N/A";

export function articleUrl(slug: string): string {
  return `${ARTICLE_BASE_URL}/${slug}`;
}

// -------------------------------------------------
// Page structure
// -------------------------------------------------
export const SOURCE_BADGE_CLASS =
  "flex font-bold bg-light-light dark:bg-tertiary-light dark:text-dark-primary rounded-full px-[0.6rem] py-[5px] gap-[8px] items-center shrink-0";

export const SUMMARY_LIST_CLASS = "list-outside list-disc pl-[8px] tablet:pl-[1rem]";

export const SUMMARY_SPAN_CLASS = "font-normal text-18 leading-9 break-words w-full";

export const HEADLINE_SELECTORS = ["h1", ".headline", ".article-title"] as const;

export const LEGACY_SOURCE_SELECTORS = [
  ".source",
  ".publication",
  ".article-source",
  ".publisher",
  ".source-attribution",
  ".byline",
  ".source-container",
  ".publisher-name",
  ".source-name",
  ".source-link",
  ".primary-source",
  ".article-meta",
] as const;

export const OUTLET_DOMAINS = [
  "cnn.com",
  "reuters.com",
  "nytimes.com",
  "npr.org",
  "foxnews.com",
] as const;

export const ATTRIBUTION_MARKERS = ["published by", "source:"] as const;
