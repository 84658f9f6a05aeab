/**
 * Targets of attribute and derive macros.
 */

import type { Attribute, Expr, ForeignItem, ImplItem, Item, Stmt, TraitItem } from "./ast.js";
import { ExplicitBug } from "./errors.js";
import { printExpr, printForeignItem, printImplItem, printItem, printStmt, printTraitItem } from "./print.js";
import type { Span } from "./span.js";
import { lexSynthetic, TokenStream } from "./tokenstream.js";

export type Annotatable =
  | { kind: "item"; item: Item }
  | { kind: "trait-item"; item: TraitItem }
  | { kind: "impl-item"; item: ImplItem }
  | { kind: "foreign-item"; item: ForeignItem }
  | { kind: "stmt"; stmt: Stmt }
  | { kind: "expr"; expr: Expr };

export function annotatableSpan(target: Annotatable): Span {
  switch (target.kind) {
    case "item":
    case "trait-item":
    case "impl-item":
    case "foreign-item":
      return target.item.span;
    case "stmt":
      return target.stmt.span;
    case "expr":
      return target.expr.span;
  }
}

export function annotatableAttrs(target: Annotatable): readonly Attribute[] {
  switch (target.kind) {
    case "item":
    case "trait-item":
    case "impl-item":
    case "foreign-item":
      return target.item.attrs;
    case "expr":
      return target.expr.attrs;
    case "stmt": {
      const stmt = target.stmt;
      switch (stmt.kind) {
        case "local":
        case "mac":
          return stmt.attrs;
        case "item":
          return stmt.item.attrs;
        case "expr":
        case "semi":
          return stmt.expr.attrs;
        case "empty":
          return [];
      }
    }
  }
}

/** Copy of `target` carrying `attrs` in place of its outer attributes. */
export function withAttrs(target: Annotatable, attrs: Attribute[]): Annotatable {
  switch (target.kind) {
    case "item":
      return { kind: "item", item: { ...target.item, attrs } };
    case "trait-item":
      return { kind: "trait-item", item: { ...target.item, attrs } };
    case "impl-item":
      return { kind: "impl-item", item: { ...target.item, attrs } };
    case "foreign-item":
      return { kind: "foreign-item", item: { ...target.item, attrs } };
    case "expr":
      return { kind: "expr", expr: { ...target.expr, attrs } };
    case "stmt": {
      const stmt = target.stmt;
      switch (stmt.kind) {
        case "local":
        case "mac":
          return { kind: "stmt", stmt: { ...stmt, attrs } };
        case "item":
          return { kind: "stmt", stmt: { ...stmt, item: { ...stmt.item, attrs } } };
        case "expr":
        case "semi":
          return { kind: "stmt", stmt: { ...stmt, expr: { ...stmt.expr, attrs } } };
        case "empty":
          return target;
      }
    }
  }
}

/** Only structs, enums and unions accept `derive`. */
export function deriveAllowed(target: Annotatable): boolean {
  if (target.kind !== "item") return false;
  const kind = target.item.kind;
  return kind === "struct" || kind === "enum" || kind === "union";
}

function wrongKind(expected: string, target: Annotatable): never {
  throw new ExplicitBug(`expected annotatable ${expected}, found ${target.kind}`);
}

export function expectItem(target: Annotatable): Item {
  return target.kind === "item" ? target.item : wrongKind("item", target);
}

export function expectTraitItem(target: Annotatable): TraitItem {
  return target.kind === "trait-item" ? target.item : wrongKind("trait item", target);
}

export function expectImplItem(target: Annotatable): ImplItem {
  return target.kind === "impl-item" ? target.item : wrongKind("impl item", target);
}

export function expectForeignItem(target: Annotatable): ForeignItem {
  return target.kind === "foreign-item" ? target.item : wrongKind("foreign item", target);
}

export function expectExpr(target: Annotatable): Expr {
  return target.kind === "expr" ? target.expr : wrongKind("expression", target);
}

function capturedTokens(target: Annotatable): TokenStream | undefined {
  switch (target.kind) {
    case "item":
    case "trait-item":
    case "impl-item":
    case "foreign-item":
      return target.item.tokens;
    case "stmt":
      return target.stmt.kind === "item" ? target.stmt.item.tokens : undefined;
    case "expr":
      return undefined;
  }
}

function printAnnotatable(target: Annotatable): string {
  switch (target.kind) {
    case "item":
      return printItem(target.item);
    case "trait-item":
      return printTraitItem(target.item);
    case "impl-item":
      return printImplItem(target.item);
    case "foreign-item":
      return printForeignItem(target.item);
    case "stmt":
      return printStmt(target.stmt);
    case "expr":
      return printExpr(target.expr);
  }
}

/**
 * Token input for token-based attribute and derive macros: the captured
 * tokens behind the remaining outer attributes, or the printed form re-lexed
 * at the node's span when nothing was captured.
 */
export function annotatableToTokens(target: Annotatable): TokenStream {
  const tokens = capturedTokens(target);
  if (tokens === undefined) return lexSynthetic(printAnnotatable(target), annotatableSpan(target));
  return TokenStream.empty().concat(...annotatableAttrs(target).map((attr) => attr.tokens), tokens);
}
