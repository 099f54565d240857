/** One tier of an extraction cascade: a value, or null when it found nothing */
export type Strategy<T> = () => T | null;

/**
 * Runs strategies in order and returns the first non-null result.
 * Later strategies are never evaluated once one succeeds.
 */
export function firstMatch<T>(strategies: ReadonlyArray<Strategy<T>>): T | null {
  for (const strategy of strategies) {
    const result = strategy();
    if (result !== null) return result;
  }
  return null;
}

export function nonEmpty(text: string | undefined | null): string | null {
  return text ? text : null;
}

export function nonEmptyList<T>(items: T[]): T[] | null {
  return items.length > 0 ? items : null;
}
