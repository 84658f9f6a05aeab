/**
 * Source spans.
 *
 * A span is a half-open byte range `[lo, hi)` into the session's source map,
 * tagged with the syntax context that records its hygiene provenance.
 * Spans are plain immutable values: stamping a span with a new context
 * produces a new span.
 */

/** Index into the session's syntax-context table. */
export type SyntaxContextId = number;

/** The empty context every unexpanded span starts in. */
export const ROOT_CTXT: SyntaxContextId = 0;

export interface Span {
  readonly lo: number;
  readonly hi: number;
  readonly ctxt: SyntaxContextId;
}

/** Placeholder span for generated nodes with no meaningful location. */
export const DUMMY_SP: Span = Object.freeze({ lo: 0, hi: 0, ctxt: ROOT_CTXT });

export function span(lo: number, hi: number, ctxt: SyntaxContextId = ROOT_CTXT): Span {
  return { lo, hi, ctxt };
}

export function isDummy(sp: Span): boolean {
  return sp.lo === 0 && sp.hi === 0;
}

export function withCtxt(sp: Span, ctxt: SyntaxContextId): Span {
  return { lo: sp.lo, hi: sp.hi, ctxt };
}

export function shrinkToLo(sp: Span): Span {
  return { lo: sp.lo, hi: sp.lo, ctxt: sp.ctxt };
}

export function shrinkToHi(sp: Span): Span {
  return { lo: sp.hi, hi: sp.hi, ctxt: sp.ctxt };
}

/**
 * Join two spans into one covering both. When only one side carries a
 * non-root context, that context wins.
 */
export function spanTo(from: Span, to: Span): Span {
  if (isDummy(from)) return to;
  if (isDummy(to)) return from;
  const ctxt = from.ctxt === ROOT_CTXT ? to.ctxt : from.ctxt;
  return { lo: Math.min(from.lo, to.lo), hi: Math.max(from.hi, to.hi), ctxt };
}

export function spanEquals(a: Span, b: Span): boolean {
  return a.lo === b.lo && a.hi === b.hi && a.ctxt === b.ctxt;
}

/** Stable map key for a span. */
export function spanKey(sp: Span): string {
  return `${sp.lo}:${sp.hi}:${sp.ctxt}`;
}

/** Language edition a macro was defined in. */
export type Edition = "2015" | "2018";

export const DEFAULT_EDITION: Edition = "2018";

export function isEdition(value: unknown): value is Edition {
  return value === "2015" || value === "2018";
}
