import type { Span } from "./span.js";

/**
 * Thrown to unwind the current pass after a fatal diagnostic has been
 * emitted. Carries no message of its own: the diagnostic is the report.
 */
export class FatalError extends Error {
  constructor(message = "aborting due to previous error") {
    super(message);
    this.name = "FatalError";
  }
}

/** An internal invariant was violated. Never recoverable. */
export class ExplicitBug extends Error {
  constructor(message: string) {
    super(`internal error: ${message}`);
    this.name = "ExplicitBug";
  }
}

/** Raised by the lexer and parser; callers convert it into a diagnostic. */
export class ParseError extends Error {
  constructor(
    message: string,
    readonly span: Span,
  ) {
    super(message);
    this.name = "ParseError";
  }
}
