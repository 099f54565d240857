// Templates use {placeholder} tokens filled by fillTemplate()

export const EXPLAINER_PROMPT =
  "You are a U.S.-based political journalist creating a 60-second daily briefing " +
  "for an audience deeply concerned with American democracy. Write a concise, " +
  "compelling script summarizing the top democracy-impacting news of the day. " +
  "Start with 'Today in American democracy...' and prioritize 3-4 stories.\n" +
  "Spreadsheet input:\n{summaries_text}";

export const ONE_SHEET_PROMPT =
  "Create a one-sheet briefing document covering the most critical " +
  "democracy-related news. Organize it into thematic sections and focus on the " +
  "impact on democratic institutions.\n" +
  "Spreadsheet input:\n{summaries_text}";

export const RELEVANCE_PROMPT =
  "Determine if this news article is about United States domestic news or " +
  "politics. Return 'YES' for US domestic news, 'NO' for international.\n" +
  "Article: Headline: {headline}, Summary: {summary}, Source: {source}";

export function fillTemplate(
  template: string,
  values: Record<string, string>
): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in values ? values[name] : match
  );
}
