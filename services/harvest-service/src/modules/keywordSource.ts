import fs from "fs";
import { KeywordEntry, KeywordMap, KeywordSource } from "../interfaces/keyword";
import { KeywordFileSchema } from "../schemas/keyword.schema";
import { FALLBACK_KEYWORDS } from "../constants/keywords";
import { KeywordSourceUnavailableError } from "../errors";
import { logger } from "../logger";

export function buildKeywordMap(entries: readonly KeywordEntry[]): KeywordMap {
  const map: KeywordMap = new Map();

  for (const { category, keyword, active } of entries) {
    if (!active) continue;

    const keywords = map.get(category);
    if (keywords) {
      keywords.push(keyword);
    } else {
      map.set(category, [keyword]);
    }
  }
  return map;
}

export async function loadKeywordFile(path: string): Promise<KeywordEntry[]> {
  const raw = await fs.promises.readFile(path, "utf8");
  const parsed = KeywordFileSchema.safeParse(JSON.parse(raw));

  if (!parsed.success) {
    logger.warn({ path, issues: parsed.error.issues }, "Keyword file schema mismatch");
    throw new Error("KEYWORD_FILE_SCHEMA_MISMATCH");
  }
  return parsed.data;
}

/**
 * Keyword taxonomy read from a JSON file, falling back to the
 * built-in list when the file cannot be used.
 */
export class FileKeywordSource implements KeywordSource {
  constructor(
    private readonly path: string,
    private readonly fallback: readonly KeywordEntry[] = FALLBACK_KEYWORDS
  ) {}

  async load(): Promise<KeywordMap> {
    let map: KeywordMap;

    try {
      map = buildKeywordMap(await loadKeywordFile(this.path));
    } catch (err) {
      logger.error({ err, path: this.path }, "Error loading keywords, using fallback categories");
      return this.loadFallback();
    }

    if (map.size === 0) {
      logger.warn({ path: this.path }, "No active keywords in file, using fallback categories");
      return this.loadFallback();
    }

    logger.info({ categories: map.size }, "Loaded keyword categories");
    return map;
  }

  private loadFallback(): KeywordMap {
    const map = buildKeywordMap(this.fallback);
    if (map.size === 0) {
      throw new KeywordSourceUnavailableError();
    }
    return map;
  }
}
