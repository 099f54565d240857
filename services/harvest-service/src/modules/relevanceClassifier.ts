import OpenAI from "openai";
import { ArticleFields } from "../interfaces/article";
import { RelevanceClassifier, RelevanceVerdict } from "../interfaces/relevance";
import { RELEVANCE_PROMPT, fillTemplate } from "../constants/prompts";
import { stripMarkdown } from "../utils/text";

export function toVerdict(answer: string): RelevanceVerdict {
  const normalized = stripMarkdown(answer).replace(/#/g, "").trim().toUpperCase();

  if (normalized === "YES") return "yes";
  if (normalized === "NO") return "no";
  return "unclear";
}

/**
 * Asks a chat model whether an article is domestic US news.
 */
export class OpenAIRelevanceClassifier implements RelevanceClassifier {
  constructor(
    private readonly openai: OpenAI,
    private readonly model: string = "gpt-4o-mini"
  ) {}

  async classify(fields: ArticleFields): Promise<RelevanceVerdict> {
    const prompt = fillTemplate(RELEVANCE_PROMPT, {
      headline: fields.headline,
      summary: fields.summary,
      source: fields.source,
    });

    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      max_tokens: 10,
      temperature: 0.1,
    });

    return toVerdict(response.choices[0]?.message.content ?? "");
  }
}
