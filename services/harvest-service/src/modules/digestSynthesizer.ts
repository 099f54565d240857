import OpenAI from "openai";
import { Table, TableSchema, TableStore } from "../interfaces/ledger";
import {
  EXPLAINER_HEADER,
  EXPLAINER_TABLE,
  LEDGER_HEADER,
  ONE_SHEET_HEADER,
  ONE_SHEET_TABLE,
} from "../constants/ledger";
import { EXPLAINER_PROMPT, ONE_SHEET_PROMPT, fillTemplate } from "../constants/prompts";
import { headerMatches, upsertRow } from "./ledgerMerge";
import { stripMarkdown } from "../utils/text";
import { logger } from "../logger";

export type DigestKind = "explainer" | "one-sheet";

interface DigestProfile {
  table: string;
  schema: TableSchema;
  prompt: string;
  maxTokens: number;
}

const DIGESTS: Record<DigestKind, DigestProfile> = {
  explainer: {
    table: EXPLAINER_TABLE,
    schema: { header: EXPLAINER_HEADER, keyColumn: 0 },
    prompt: EXPLAINER_PROMPT,
    maxTokens: 300,
  },
  "one-sheet": {
    table: ONE_SHEET_TABLE,
    schema: { header: ONE_SHEET_HEADER, keyColumn: 0 },
    prompt: ONE_SHEET_PROMPT,
    maxTokens: 1000,
  },
};

const column = (name: (typeof LEDGER_HEADER)[number]) => LEDGER_HEADER.indexOf(name);

/**
 * Numbered prompt input built from the ledger's data rows.
 */
export function buildSummariesText(ledger: Table): string {
  const rows = headerMatches(ledger, LEDGER_HEADER) ? ledger.slice(1) : [];

  return rows
    .map((row, i) => {
      const category = row[column("Category")] || "Unknown";
      const keyword = row[column("Keyword")] || "Unknown";
      const headline = row[column("Headline")] || "Unknown";
      const summary = row[column("Summary")] || "No summary available";
      return `\n${i + 1}. [${category} - ${keyword}] ${headline}\n   Summary: ${summary}\n`;
    })
    .join("");
}

/**
 * One generative-text call. Any failure or empty answer yields null.
 */
export async function generateDigest(
  kind: DigestKind,
  ledger: Table,
  { openai, model = "gpt-4o-mini" }: { openai: OpenAI; model?: string }
): Promise<string | null> {
  const profile = DIGESTS[kind];

  try {
    const prompt = fillTemplate(profile.prompt, {
      summaries_text: buildSummariesText(ledger),
    });

    const response = await openai.chat.completions.create({
      model,
      messages: [{ role: "user", content: prompt }],
      max_tokens: profile.maxTokens,
      temperature: 0.5,
    });

    const text = stripMarkdown(response.choices[0]?.message.content ?? "");
    if (!text) {
      logger.warn({ kind }, "Digest generation returned no text");
      return null;
    }

    logger.info({ kind, length: text.length }, "Digest generated");
    return text;
  } catch (err) {
    logger.error({ err, kind }, "Error generating digest");
    return null;
  }
}

/**
 * Stores a digest as the row for `date`, replacing an earlier one.
 */
export async function saveDigest(
  kind: DigestKind,
  text: string,
  { store, date }: { store: TableStore; date: string }
): Promise<void> {
  const profile = DIGESTS[kind];
  const current = await store.readTable(profile.table);
  const { action, table } = upsertRow([date, text], current, profile.schema);

  await store.writeTable(profile.table, table);
  logger.info({ kind, date, action, table: profile.table }, "Digest saved");
}

export type DigestResult = Record<DigestKind, string | null>;

/**
 * Generates and stores both digests for the day. Skipped entirely
 * when there is no model client.
 */
export async function synthesizeDigests({
  ledger,
  date,
  store,
  openai,
  model,
}: {
  ledger: Table;
  date: string;
  store: TableStore;
  openai?: OpenAI;
  model?: string;
}): Promise<DigestResult> {
  const result: DigestResult = { explainer: null, "one-sheet": null };

  if (!openai) {
    logger.warn("OpenAI client not available, skipping digest generation");
    return result;
  }

  for (const kind of ["explainer", "one-sheet"] as const) {
    const text = await generateDigest(kind, ledger, { openai, model });
    if (text) {
      await saveDigest(kind, text, { store, date });
      result[kind] = text;
    }
  }
  return result;
}
