/**
 * Error taxonomy shared by the journal engine and the HTTP layer.
 * Every class carries a stable `code` and the HTTP status it maps to.
 */

export abstract class JournalError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed user input, rejected before any state changes. */
export class InvalidInputError extends JournalError {
  readonly code = "INVALID_INPUT";
  readonly status = 400;
}

export type ProviderFailureKind = "InvalidAddress" | "RateLimited" | "Timeout" | "Unknown";

const PROVIDER_STATUS: Record<ProviderFailureKind, number> = {
  InvalidAddress: 400,
  RateLimited: 429,
  Timeout: 504,
  Unknown: 502,
};

const PROVIDER_MESSAGES: Record<ProviderFailureKind, string> = {
  InvalidAddress: "Invalid wallet address format. Please check your address.",
  RateLimited: "Rate limited by the trade-data provider. Please wait a moment and try again.",
  Timeout: "Connection timeout. Please check your internet connection and try again.",
  Unknown: "Failed to fetch data from the trade-data provider.",
};

export class ProviderError extends JournalError {
  readonly code: string;
  readonly status: number;

  constructor(
    readonly kind: ProviderFailureKind,
    detail?: string,
    options?: { cause?: unknown },
  ) {
    const base = PROVIDER_MESSAGES[kind];
    super(kind === "Unknown" && detail ? `${base} ${detail}` : base, options);
    this.code = `PROVIDER_${kind.replace(/([a-z])([A-Z])/g, "$1_$2").toUpperCase()}`;
    this.status = PROVIDER_STATUS[kind];
  }
}

/** Primary journal file and its backup are both unreadable. */
export class CorruptJournalError extends JournalError {
  readonly code = "CORRUPT_JOURNAL";
  readonly status = 422;

  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Journal file ${path} is corrupted and no readable backup exists`, options);
  }
}

export class NotFoundError extends JournalError {
  readonly code = "NOT_FOUND";
  readonly status = 404;
}

/** Contract violation: a tag category outside the fixed four. */
export class UnknownCategoryError extends JournalError {
  readonly code = "UNKNOWN_CATEGORY";
  readonly status = 500;

  constructor(readonly category: string) {
    super(`Unknown tag category: ${category}`);
  }
}
