export interface KeywordEntry {
  category: string;
  keyword: string;
  active: boolean;
}

/** Category name -> keywords, both in source order */
export type KeywordMap = Map<string, string[]>;

export interface KeywordSource {
  load(): Promise<KeywordMap>;
}
