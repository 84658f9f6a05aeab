/**
 * Token trees and token streams.
 *
 * A token stream is an immutable sequence of token trees; a tree is either a
 * single token or a delimited group (`()`, `[]`, `{}`) holding a nested
 * stream. Macro inputs and token-based macro outputs are token streams.
 */

import * as ts from "typescript";
import { ParseError } from "./errors.js";
import { tokenize, isIdentToken, type LexOptions, type Token } from "./lexer.js";
import { spanTo, type Span } from "./span.js";

export type Delimiter = "paren" | "bracket" | "brace";

export type TokenTree =
  | { type: "token"; token: Token }
  | { type: "delimited"; delim: Delimiter; openSpan: Span; closeSpan: Span; stream: TokenStream };

export const OPEN_DELIM: Record<Delimiter, string> = { paren: "(", bracket: "[", brace: "{" };
const CLOSE_DELIM: Record<Delimiter, string> = { paren: ")", bracket: "]", brace: "}" };

function openDelimiter(kind: ts.SyntaxKind): Delimiter | undefined {
  switch (kind) {
    case ts.SyntaxKind.OpenParenToken:
      return "paren";
    case ts.SyntaxKind.OpenBracketToken:
      return "bracket";
    case ts.SyntaxKind.OpenBraceToken:
      return "brace";
    default:
      return undefined;
  }
}

function closeDelimiter(kind: ts.SyntaxKind): Delimiter | undefined {
  switch (kind) {
    case ts.SyntaxKind.CloseParenToken:
      return "paren";
    case ts.SyntaxKind.CloseBracketToken:
      return "bracket";
    case ts.SyntaxKind.CloseBraceToken:
      return "brace";
    default:
      return undefined;
  }
}

export function treeSpan(tree: TokenTree): Span {
  return tree.type === "token" ? tree.token.span : spanTo(tree.openSpan, tree.closeSpan);
}

export class TokenStream {
  private readonly items: readonly TokenTree[];

  constructor(trees: readonly TokenTree[] = []) {
    this.items = trees;
  }

  static empty(): TokenStream {
    return new TokenStream();
  }

  /** Group a flat token list into trees. */
  static fromTokens(tokens: readonly Token[]): TokenStream {
    const stack: Array<{ delim: Delimiter; open: Token; trees: TokenTree[] }> = [];
    let trees: TokenTree[] = [];

    for (const token of tokens) {
      const open = openDelimiter(token.kind);
      if (open !== undefined) {
        stack.push({ delim: open, open: token, trees });
        trees = [];
        continue;
      }

      const close = closeDelimiter(token.kind);
      if (close !== undefined) {
        const frame = stack.pop();
        if (frame === undefined) {
          throw new ParseError(`unexpected close delimiter: \`${token.text}\``, token.span);
        }
        if (frame.delim !== close) {
          throw new ParseError(`incorrect close delimiter: \`${token.text}\``, token.span);
        }
        const group: TokenTree = {
          type: "delimited",
          delim: close,
          openSpan: frame.open.span,
          closeSpan: token.span,
          stream: new TokenStream(trees),
        };
        trees = frame.trees;
        trees.push(group);
        continue;
      }

      trees.push({ type: "token", token });
    }

    const unclosed = stack.pop();
    if (unclosed !== undefined) {
      throw new ParseError("this file contains an unclosed delimiter", unclosed.open.span);
    }
    return new TokenStream(trees);
  }

  /** Lex and group source text. */
  static parse(source: string, options: LexOptions = {}): TokenStream {
    return TokenStream.fromTokens(tokenize(source, options));
  }

  /** Number of top-level trees. */
  get length(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  trees(): readonly TokenTree[] {
    return this.items;
  }

  get(index: number): TokenTree | undefined {
    return this.items[index];
  }

  concat(...others: TokenStream[]): TokenStream {
    return new TokenStream([...this.items, ...others.flatMap((o) => o.items)]);
  }

  slice(start: number, end?: number): TokenStream {
    return new TokenStream(this.items.slice(start, end));
  }

  span(): Span | undefined {
    const first = this.items[0];
    const last = this.items[this.items.length - 1];
    if (first === undefined || last === undefined) return undefined;
    return spanTo(treeSpan(first), treeSpan(last));
  }

  /** Copy of this stream with every token (and delimiter) given `sp`. */
  respan(sp: Span): TokenStream {
    return new TokenStream(
      this.items.map((tree): TokenTree =>
        tree.type === "token"
          ? { type: "token", token: { ...tree.token, span: sp } }
          : { type: "delimited", delim: tree.delim, openSpan: sp, closeSpan: sp, stream: tree.stream.respan(sp) },
      ),
    );
  }

  cursor(): Cursor {
    return new Cursor(this);
  }

  toString(): string {
    let out = "";
    let prev: TokenTree | undefined;
    for (const tree of this.items) {
      if (prev !== undefined && spaceBetween(prev, tree)) out += " ";
      out += treeToString(tree);
      prev = tree;
    }
    return out;
  }
}

function treeToString(tree: TokenTree): string {
  if (tree.type === "token") return tree.token.text;
  const inner = tree.stream.toString();
  if (tree.delim === "brace") {
    return inner.length === 0 ? "{}" : `{ ${inner} }`;
  }
  return `${OPEN_DELIM[tree.delim]}${inner}${CLOSE_DELIM[tree.delim]}`;
}

const NO_SPACE_BEFORE = new Set([",", ";", ".", ":", "::"]);
const NO_SPACE_AFTER = new Set([".", "::", "@", "!"]);

function spaceBetween(prev: TokenTree, next: TokenTree): boolean {
  if (next.type === "token") {
    if (!isIdentToken(next.token) && NO_SPACE_BEFORE.has(next.token.text)) return false;
    if (next.token.text === "!" && prev.type === "token" && isIdentToken(prev.token)) return false;
  }
  if (prev.type === "token" && !isIdentToken(prev.token) && NO_SPACE_AFTER.has(prev.token.text)) {
    return false;
  }
  if (next.type === "delimited" && next.delim !== "brace") {
    if (prev.type === "delimited") return false;
    if (isIdentToken(prev.token)) return false;
  }
  return true;
}

/** Read position over the top-level trees of a stream. */
export class Cursor {
  private pos = 0;

  constructor(private readonly stream: TokenStream) {}

  get position(): number {
    return this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.stream.length;
  }

  current(): TokenTree | undefined {
    return this.stream.get(this.pos);
  }

  peek(offset = 0): TokenTree | undefined {
    return this.stream.get(this.pos + offset);
  }

  /** Current token, if the current tree is a plain token. */
  token(offset = 0): Token | undefined {
    const tree = this.peek(offset);
    return tree?.type === "token" ? tree.token : undefined;
  }

  bump(): TokenTree | undefined {
    const tree = this.stream.get(this.pos);
    if (tree !== undefined) this.pos++;
    return tree;
  }

  reset(position: number): void {
    this.pos = position;
  }

  /** Trees from `start` up to the current position. */
  since(start: number): TokenStream {
    return this.stream.slice(start, this.pos);
  }

  remaining(): TokenStream {
    return this.stream.slice(this.pos);
  }

  clone(): Cursor {
    const cloned = new Cursor(this.stream);
    cloned.pos = this.pos;
    return cloned;
  }
}

/** Lex printed text with every token carrying `sp`; used for nodes with no captured tokens. */
export function lexSynthetic(text: string, sp: Span): TokenStream {
  return TokenStream.parse(text, { fixedSpan: sp });
}
