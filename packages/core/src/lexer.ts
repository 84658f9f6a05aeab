/**
 * Lexer for macro input.
 *
 * Wraps TypeScript's scanner and merges adjacent single-character tokens
 * that form the path separator `::`, the return arrow `->` and `>=`
 * (the scanner only ever yields a bare `>`). Merging uses
 * source-position adjacency (t2.start === t1.end), so `: :` stays two tokens.
 */

import * as ts from "typescript";
import { ParseError } from "./errors.js";
import { ROOT_CTXT, span, type Span, type SyntaxContextId } from "./span.js";

export interface Token {
  kind: ts.SyntaxKind;
  /** Source text of the token, including quotes for string literals. */
  text: string;
  /** Cooked value of string and numeric literals. */
  value?: string;
  span: Span;
  isCustomOperator?: boolean;
}

interface CustomOperatorDef {
  symbol: string;
  chars: string[];
}

const CUSTOM_OPERATORS: CustomOperatorDef[] = [
  { symbol: "::", chars: [":", ":"] },
  { symbol: "->", chars: ["-", ">"] },
  { symbol: ">=", chars: [">", "="] },
];

export interface LexOptions {
  /** Global position of the first character of `source`. */
  base?: number;
  ctxt?: SyntaxContextId;
  /** Give every token this span instead of its own position. */
  fixedSpan?: Span;
}

interface RawToken {
  kind: ts.SyntaxKind;
  text: string;
  value?: string;
  start: number;
  end: number;
}

/**
 * Tokenize source text. Throws {@link ParseError} on the first lexical
 * error the scanner reports.
 */
export function tokenize(source: string, options: LexOptions = {}): Token[] {
  const base = options.base ?? 0;
  const ctxt = options.ctxt ?? ROOT_CTXT;
  const errors: Array<{ message: string; pos: number; length: number }> = [];

  const scanner = ts.createScanner(
    ts.ScriptTarget.Latest,
    true,
    ts.LanguageVariant.Standard,
    source,
    (message, length) => {
      errors.push({ message: message.message, pos: scanner.getTokenStart(), length });
    },
  );

  const raw: RawToken[] = [];
  while (scanner.scan() !== ts.SyntaxKind.EndOfFileToken) {
    const kind = scanner.getToken();
    const start = scanner.getTokenStart();
    const end = scanner.getTextPos();
    const token: RawToken = { kind, text: scanner.getTokenText(), start, end };
    if (kind === ts.SyntaxKind.StringLiteral || kind === ts.SyntaxKind.NumericLiteral) {
      token.value = scanner.getTokenValue();
    }
    raw.push(token);
  }

  if (errors.length > 0) {
    const firstError = errors[0];
    const at = options.fixedSpan ?? span(base + firstError.pos, base + firstError.pos + firstError.length, ctxt);
    throw new ParseError(firstError.message, at);
  }

  return mergeCustomOperators(raw).map((t) => {
    const token: Token = {
      kind: t.kind,
      text: t.text,
      span: options.fixedSpan ?? span(base + t.start, base + t.end, ctxt),
    };
    if (t.value !== undefined) token.value = t.value;
    if (t.kind === ts.SyntaxKind.Unknown) token.isCustomOperator = true;
    return token;
  });
}

function mergeCustomOperators(tokens: RawToken[]): RawToken[] {
  const result: RawToken[] = [];
  let i = 0;

  while (i < tokens.length) {
    let merged = false;

    for (const op of CUSTOM_OPERATORS) {
      if (i + op.chars.length > tokens.length) continue;

      let matches = true;
      for (let j = 0; j < op.chars.length; j++) {
        const token = tokens[i + j];
        if (token.text !== op.chars[j] || (j > 0 && token.start !== tokens[i + j - 1].end)) {
          matches = false;
          break;
        }
      }

      if (matches) {
        const first = tokens[i];
        const last = tokens[i + op.chars.length - 1];
        result.push({ kind: ts.SyntaxKind.Unknown, text: op.symbol, start: first.start, end: last.end });
        i += op.chars.length;
        merged = true;
        break;
      }
    }

    if (!merged) {
      result.push(tokens[i]);
      i++;
    }
  }

  return result;
}

/** Identifiers and keywords both name things in the macro surface syntax. */
export function isIdentToken(token: Token): boolean {
  return (
    token.kind === ts.SyntaxKind.Identifier ||
    (token.kind >= ts.SyntaxKind.FirstKeyword && token.kind <= ts.SyntaxKind.LastKeyword)
  );
}

export function isIdentNamed(token: Token, name: string): boolean {
  return isIdentToken(token) && token.text === name;
}

export function isPunct(token: Token, text: string): boolean {
  return !isIdentToken(token) && !isLiteralToken(token) && token.text === text;
}

function isLiteralToken(token: Token): boolean {
  return (
    token.kind === ts.SyntaxKind.StringLiteral ||
    token.kind === ts.SyntaxKind.NumericLiteral ||
    token.kind === ts.SyntaxKind.TrueKeyword ||
    token.kind === ts.SyntaxKind.FalseKeyword
  );
}

export function isStringToken(token: Token): boolean {
  return token.kind === ts.SyntaxKind.StringLiteral;
}
