/**
 * Session error-code registry.
 *
 * Codes live in `ParseSess.registeredDiagnostics`, one table per session.
 * Every operation holds the lock for exactly one lookup-or-insert and reports
 * its diagnostics after releasing it.
 */

import { spanEquals, type ErrorInfo, type ExtCtxt, type Span } from "@expandite/core";

export const MAX_DESCRIPTION_WIDTH = 80;

/** Footnote lines such as `[docs]: https://...` are exempt from the width limit. */
export function isFootnoteUrl(line: string): boolean {
  return line.startsWith("[") && line.includes("]:") && line.includes("http");
}

/** Problems with a description; an empty list means it is well formed. */
export function checkDescription(code: string, description: string): string[] {
  const problems: string[] = [];
  if (!description.startsWith("\n") || !description.endsWith("\n")) {
    problems.push(`description for error code ${code} doesn't start and end with a newline`);
  }
  const tooLong = description.split(/\r?\n/).some((line) => [...line].length > MAX_DESCRIPTION_WIDTH && !isFootnoteUrl(line));
  if (tooLong) {
    problems.push(
      `description for error code ${code} contains a line longer than ${MAX_DESCRIPTION_WIDTH} characters.\n` +
        "if you're inserting a long URL use the footnote style to bypass this check.",
    );
  }
  return problems;
}

/**
 * Register `code`. A malformed description is reported but does not stop
 * the registration; a code that is already registered keeps its entry.
 *
 * @returns whether a new entry was inserted
 */
export function registerDiagnostic(ecx: ExtCtxt, span: Span, code: string, description?: string): boolean {
  if (description !== undefined) {
    for (const problem of checkDescription(code, description)) ecx.spanErr(span, problem);
  }

  const inserted = ecx.parseSess.registeredDiagnostics.withLock((diagnostics) => {
    if (diagnostics.has(code)) return false;
    const info: ErrorInfo = {};
    if (description !== undefined) info.description = description;
    diagnostics.set(code, info);
    return true;
  });

  if (!inserted) ecx.spanErr(span, `diagnostic code ${code} already registered`);
  return inserted;
}

type UseOutcome = { type: "first" } | { type: "repeat" } | { type: "reused"; previous: Span } | { type: "unregistered" };

/** Record a use of `code` at `span`. */
export function markDiagnosticUsed(ecx: ExtCtxt, span: Span, code: string): void {
  const outcome = ecx.parseSess.registeredDiagnostics.withLock((diagnostics): UseOutcome => {
    const info = diagnostics.get(code);
    if (info === undefined) return { type: "unregistered" };
    if (info.useSite === undefined) {
      info.useSite = span;
      return { type: "first" };
    }
    if (spanEquals(info.useSite, span)) return { type: "repeat" };
    return { type: "reused", previous: info.useSite };
  });

  switch (outcome.type) {
    case "first":
    case "repeat":
      break;
    case "reused":
      ecx.structSpanWarn(span, `diagnostic code ${code} already used`).spanNote(outcome.previous, "previous invocation").emit();
      break;
    case "unregistered":
      ecx.spanErr(span, `used diagnostic code ${code} not registered`);
      break;
  }
}

/** `(code, description)` for every code with a description, ascending by code. */
export function buildDiagnosticArray(ecx: ExtCtxt): Array<[string, string]> {
  const entries = ecx.parseSess.registeredDiagnostics.withLock((diagnostics) => [...diagnostics.entries()]);
  const described: Array<[string, string]> = [];
  for (const [code, info] of entries) {
    if (info.description !== undefined) described.push([code, info.description]);
  }
  return described.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
