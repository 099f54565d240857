/** Removes the heading and bold markers chat models like to add */
export function stripMarkdown(text: string): string {
  return text
    .replace(/\*\*/g, "")
    .replace(/###/g, "")
    .replace(/##/g, "")
    .replace(/# /g, "")
    .trim();
}
