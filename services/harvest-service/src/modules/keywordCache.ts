import { KeywordMap, KeywordSource } from "../interfaces/keyword";
import { logger } from "../logger";

export const KEYWORD_CACHE_TTL_MS = 5 * 60_000;

/**
 * Process-lifetime cache in front of a KeywordSource.
 * Populated on first use, reloaded once older than `ttlMs`.
 */
export class KeywordCache {
  private cached: KeywordMap | null = null;
  private loadedAt = 0;

  constructor(
    private readonly source: KeywordSource,
    private readonly ttlMs: number = KEYWORD_CACHE_TTL_MS,
    private readonly clock: () => number = Date.now
  ) {}

  async getOrRefresh(now: number = this.clock()): Promise<KeywordMap> {
    if (this.cached && now - this.loadedAt < this.ttlMs) {
      logger.debug("Using cached keywords");
      return this.cached;
    }

    const keywords = await this.source.load();
    this.cached = keywords;
    this.loadedAt = now;
    return keywords;
  }

  invalidate(): void {
    this.cached = null;
    this.loadedAt = 0;
  }
}
