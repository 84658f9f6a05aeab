/**
 * Attribute helpers: lookup by name, meta-item parsing, used/known marks,
 * and the stability and deprecation attributes carried by macro definitions.
 */

import {
  litFromToken,
  pathFromIdents,
  pathIs,
  type Attribute,
  type Ident,
  type Lit,
  type MetaItem,
  type NestedMetaItem,
} from "./ast.js";
import { ParseError } from "./errors.js";
import { isIdentToken, isPunct } from "./lexer.js";
import type { ParseSess } from "./session.js";
import { spanTo, type Span } from "./span.js";
import type { Cursor, TokenStream } from "./tokenstream.js";

export function findByName(attrs: readonly Attribute[], name: string): Attribute | undefined {
  return attrs.find((attr) => pathIs(attr.path, name));
}

export function containsName(attrs: readonly Attribute[], name: string): boolean {
  return findByName(attrs, name) !== undefined;
}

export function markUsed(sess: ParseSess, attr: Attribute): void {
  sess.usedAttrs.add(attr.id);
}

export function isUsed(sess: ParseSess, attr: Attribute): boolean {
  return sess.usedAttrs.has(attr.id);
}

export function markKnown(sess: ParseSess, attr: Attribute): void {
  sess.knownAttrs.add(attr.id);
}

export function isKnown(sess: ParseSess, attr: Attribute): boolean {
  return sess.knownAttrs.has(attr.id);
}

// ============================================================================
// Meta items
// ============================================================================

/** Parse an attribute as a meta item. Throws {@link ParseError}. */
export function parseMeta(attr: Attribute): MetaItem {
  switch (attr.args.type) {
    case "empty":
      return { path: attr.path, kind: { type: "word" }, span: attr.span };
    case "eq":
      return { path: attr.path, kind: { type: "name-value", lit: attr.args.lit }, span: attr.span };
    case "delimited":
      if (attr.args.delim !== "paren") {
        throw new ParseError("expected `(` in attribute arguments", attr.span);
      }
      return { path: attr.path, kind: { type: "list", items: parseNestedMetaList(attr.args.tokens, attr.span) }, span: attr.span };
  }
}

/** The meta item of an attribute, or `undefined` if it is malformed. */
function metaItem(attr: Attribute): MetaItem | undefined {
  try {
    return parseMeta(attr);
  } catch (error) {
    if (error instanceof ParseError) return undefined;
    throw error;
  }
}

/** `@name(a, b)` → `[a, b]`; `undefined` for any other shape. */
export function metaItemList(attr: Attribute): NestedMetaItem[] | undefined {
  const meta = metaItem(attr);
  return meta?.kind.type === "list" ? meta.kind.items : undefined;
}

function parseNestedMetaList(tokens: TokenStream, fallback: Span): NestedMetaItem[] {
  const cursor = tokens.cursor();
  const items: NestedMetaItem[] = [];
  while (!cursor.atEnd()) {
    items.push(parseNestedMeta(cursor, fallback));
    const sep = cursor.token();
    if (sep === undefined) {
      if (cursor.atEnd()) break;
      throw new ParseError("expected `,` in meta item list", fallback);
    }
    if (!isPunct(sep, ",")) {
      throw new ParseError(`expected \`,\`, found \`${sep.text}\``, sep.span);
    }
    cursor.bump();
  }
  return items;
}

function parseNestedMeta(cursor: Cursor, fallback: Span): NestedMetaItem {
  const token = cursor.token();
  if (token !== undefined) {
    const lit = litFromToken(token);
    if (lit !== undefined) {
      cursor.bump();
      return { type: "lit", lit };
    }
  }
  return { type: "meta", meta: parseMetaItem(cursor, fallback) };
}

/** `path`, `path = lit` or `path(nested, ...)` at the cursor. */
export function parseMetaItem(cursor: Cursor, fallback: Span): MetaItem {
  const idents: Ident[] = [];
  for (;;) {
    const token = cursor.token();
    if (token === undefined || !isIdentToken(token) || litFromToken(token) !== undefined) {
      throw new ParseError("expected identifier in meta item", token?.span ?? fallback);
    }
    cursor.bump();
    idents.push({ name: token.text, span: token.span });
    const next = cursor.token();
    if (next === undefined || !isPunct(next, "::")) break;
    cursor.bump();
  }
  const pathSpan = spanTo(idents[0].span, idents[idents.length - 1].span);
  const path = pathFromIdents(idents, pathSpan);

  const next = cursor.current();
  if (next?.type === "token" && isPunct(next.token, "=")) {
    cursor.bump();
    const litToken = cursor.token();
    const lit = litToken === undefined ? undefined : litFromToken(litToken);
    if (litToken === undefined || lit === undefined) {
      throw new ParseError("expected literal after `=` in meta item", litToken?.span ?? pathSpan);
    }
    cursor.bump();
    return { path, kind: { type: "name-value", lit }, span: spanTo(pathSpan, lit.span) };
  }
  if (next?.type === "delimited" && next.delim === "paren") {
    cursor.bump();
    const items = parseNestedMetaList(next.stream, next.openSpan);
    return { path, kind: { type: "list", items }, span: spanTo(pathSpan, next.closeSpan) };
  }
  return { path, kind: { type: "word" }, span: pathSpan };
}

/** Single-segment name of a nested meta item; literals have none. */
export function nestedIdent(item: NestedMetaItem): Ident | undefined {
  if (item.type !== "meta" || item.meta.path.segments.length !== 1) return undefined;
  return item.meta.path.segments[0].ident;
}

export function nestedSpan(item: NestedMetaItem): Span {
  return item.type === "meta" ? item.meta.span : item.lit.span;
}

export function listContainsName(items: readonly NestedMetaItem[], name: string): boolean {
  return items.some((item) => item.type === "meta" && pathIs(item.meta.path, name));
}

function litStr(lit: Lit): string | undefined {
  return lit.kind.type === "str" ? lit.kind.value : undefined;
}

// ============================================================================
// Stability and deprecation
// ============================================================================

export type StabilityLevel =
  | { type: "stable"; since: string }
  | { type: "unstable"; reason?: string; issue?: string };

export interface Stability {
  level: StabilityLevel;
  feature: string;
}

export interface Deprecation {
  since?: string;
  note?: string;
}

/**
 * Read `key = "value"` pairs from a list attribute, reporting unknown keys
 * and non-string values. Returns `undefined` if anything was reported.
 */
function readStringPairs(
  sess: ParseSess,
  attr: Attribute,
  allowed: readonly string[],
): Map<string, string> | undefined {
  const handler = sess.spanDiagnostic;
  const items = metaItemList(attr);
  if (items === undefined) {
    handler.spanErrWithCode(attr.span, "incorrect meta item", "E0539");
    return undefined;
  }
  const pairs = new Map<string, string>();
  let ok = true;
  for (const item of items) {
    const name = nestedIdent(item)?.name;
    if (item.type !== "meta" || name === undefined) {
      handler.spanErrWithCode(nestedSpan(item), "unsupported literal", "E0565");
      ok = false;
      continue;
    }
    if (!allowed.includes(name)) {
      handler.spanErrWithCode(item.meta.span, `unknown meta item '${name}'`, "E0541");
      ok = false;
      continue;
    }
    if (pairs.has(name)) {
      handler.spanErrWithCode(item.meta.span, `multiple '${name}' items`, "E0538");
      ok = false;
      continue;
    }
    const value = item.meta.kind.type === "name-value" ? litStr(item.meta.kind.lit) : undefined;
    if (value === undefined) {
      handler.spanErrWithCode(item.meta.span, "incorrect meta item", "E0539");
      ok = false;
      continue;
    }
    pairs.set(name, value);
  }
  return ok ? pairs : undefined;
}

/** Parse `@stable(feature, since)` / `@unstable(feature, reason, issue)`. */
export function findStability(sess: ParseSess, attrs: readonly Attribute[]): Stability | undefined {
  const handler = sess.spanDiagnostic;
  let found: Stability | undefined;
  let reported = false;

  for (const attr of attrs) {
    const isStable = pathIs(attr.path, "stable");
    if (!isStable && !pathIs(attr.path, "unstable")) continue;
    markUsed(sess, attr);

    if (found !== undefined || reported) {
      handler.spanErrWithCode(attr.span, "multiple stability levels", "E0544");
      continue;
    }

    const pairs = readStringPairs(sess, attr, isStable ? ["feature", "since"] : ["feature", "reason", "issue"]);
    if (pairs === undefined) {
      reported = true;
      continue;
    }
    const feature = pairs.get("feature");
    if (feature === undefined) {
      handler.spanErrWithCode(attr.span, "missing 'feature'", "E0546");
      reported = true;
      continue;
    }
    if (isStable) {
      const since = pairs.get("since");
      if (since === undefined) {
        handler.spanErrWithCode(attr.span, "missing 'since'", "E0542");
        reported = true;
        continue;
      }
      found = { level: { type: "stable", since }, feature };
    } else {
      found = { level: { type: "unstable", reason: pairs.get("reason"), issue: pairs.get("issue") }, feature };
    }
  }
  return found;
}

/** Parse `@deprecated`, `@deprecated = "note"` or `@deprecated(since, note)`. */
export function findDeprecation(sess: ParseSess, attrs: readonly Attribute[], itemSpan: Span): Deprecation | undefined {
  const handler = sess.spanDiagnostic;
  let found: Deprecation | undefined;

  for (const attr of attrs) {
    if (!pathIs(attr.path, "deprecated")) continue;
    markUsed(sess, attr);

    if (found !== undefined) {
      handler.spanErrWithCode(itemSpan, "multiple deprecated attributes", "E0550");
      break;
    }

    switch (attr.args.type) {
      case "empty":
        found = {};
        break;
      case "eq":
        found = { note: litStr(attr.args.lit) };
        break;
      case "delimited": {
        const pairs = readStringPairs(sess, attr, ["since", "note"]);
        if (pairs === undefined) continue;
        found = { since: pairs.get("since"), note: pairs.get("note") };
        break;
      }
    }
  }
  return found;
}
