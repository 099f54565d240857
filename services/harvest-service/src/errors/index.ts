/**
 * The ledger could not be read or written. Ends the run.
 */
export class LedgerUnavailableError extends Error {
  constructor(
    readonly table: string,
    options?: { cause?: unknown }
  ) {
    super(`Ledger table "${table}" is unavailable`, options);
    this.name = "LedgerUnavailableError";
  }
}

/**
 * No keywords could be loaded, not even the built-in fallback.
 */
export class KeywordSourceUnavailableError extends Error {
  constructor(options?: { cause?: unknown }) {
    super("No keywords available for harvesting", options);
    this.name = "KeywordSourceUnavailableError";
  }
}
