export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Calendar date (UTC) as YYYY-MM-DD */
export function formatDate(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}

const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/i;

/**
 * Parses an ISO-8601 date or date-time. Date-times without a zone
 * designator are read as UTC. Anything else, including other date
 * formats the runtime would accept, is treated as unparseable.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  const match = value?.trim().match(ISO_TIMESTAMP);
  if (!match) return null;

  const [, date, time, zone] = match;
  const offset = zone
    ? zone.toUpperCase().replace(/^([+-]\d{2})(\d{2})$/, "$1:$2")
    : "Z";
  const parsed = new Date(time ? `${date}T${time}${offset}` : `${date}T00:00:00${offset}`);

  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
