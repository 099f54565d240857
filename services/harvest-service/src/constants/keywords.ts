import { KeywordEntry } from "../interfaces/keyword";

/** Used when the keyword file is missing, unreadable or empty */
export const FALLBACK_KEYWORDS: readonly KeywordEntry[] = [
  { category: "Press & Information Freedom", keyword: "press freedom", active: true },
  { category: "Press & Information Freedom", keyword: "journalist arrested", active: true },
  { category: "Press & Information Freedom", keyword: "book ban", active: true },
  { category: "Press & Information Freedom", keyword: "disinformation", active: true },
  { category: "Voting Rights & Election Integrity", keyword: "voter suppression", active: true },
  { category: "Voting Rights & Election Integrity", keyword: "gerrymandering", active: true },
  { category: "Voting Rights & Election Integrity", keyword: "election interference", active: true },
  { category: "Judicial & Legal Integrity", keyword: "court independence", active: true },
  { category: "Judicial & Legal Integrity", keyword: "due process", active: true },
  { category: "Judicial & Legal Integrity", keyword: "rule of law", active: true },
];
