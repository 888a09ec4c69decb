/**
 * Base class for every error raised by the crawler engine
 */
export class CrawlerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// === Fetch failures ===

export class HttpStatusError extends CrawlerError {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string
  ) {
    super(`HTTP ${status}: ${statusText} (${url})`);
  }
}

// === Shape failures: the whole document is unusable ===

export class ShapeError extends CrawlerError {}

export class TableNotFoundError extends ShapeError {}

export class BlobNotFoundError extends ShapeError {}

// === Field-level failures: only the row or field is skipped ===

export class ParseError extends CrawlerError {
  constructor(
    message: string,
    readonly input: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class UnsupportedTermError extends ParseError {
  constructor(input: string) {
    super(`unsupported term: "${input}"`, input);
  }
}

/**
 * The input is a column header or row label, not a term
 */
export class TermHeaderError extends ParseError {
  constructor(input: string) {
    super(`term header: "${input}"`, input);
  }
}

export class UnsupportedRateError extends ParseError {
  constructor(input: string) {
    super(`unsupported interest rate: "${input}"`, input);
  }
}

export class UnsupportedDateError extends ParseError {
  constructor(input: string, reason = "unsupported date") {
    super(`${reason}: "${input}"`, input);
  }
}

export class UnsupportedAvgMonthError extends ParseError {
  constructor(input: string, reason = "unsupported average month") {
    super(`${reason}: "${input}"`, input);
  }
}

export class PayloadReferenceError extends ParseError {}

// === Orchestration ===

export class ChannelClosedError extends CrawlerError {
  constructor() {
    super("push on closed channel");
  }
}

/**
 * Message of an unknown thrown value, for logging
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
