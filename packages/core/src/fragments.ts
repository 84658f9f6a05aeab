/**
 * AST fragments: the syntactic categories a macro call site can expect.
 *
 * The kind is fixed by where the invocation appears, never by what the
 * macro produced.
 */

import { mkStmt, type Expr, type ForeignItem, type ImplItem, type Item, type Pat, type Stmt, type TraitItem, type Ty } from "./ast.js";
import {
  expectExpr,
  expectForeignItem,
  expectImplItem,
  expectItem,
  expectTraitItem,
  type Annotatable,
} from "./annotatable.js";
import { ExplicitBug } from "./errors.js";
import { DummyResult, type MacResult } from "./mac-result.js";
import { unreachable } from "./safety.js";
import type { Span } from "./span.js";

export const AST_FRAGMENT_KINDS = [
  "expr",
  "pat",
  "items",
  "stmts",
  "ty",
  "impl-items",
  "trait-items",
  "foreign-items",
] as const;

export type AstFragmentKind = (typeof AST_FRAGMENT_KINDS)[number];

export type AstFragment =
  | { kind: "expr"; expr: Expr }
  | { kind: "pat"; pat: Pat }
  | { kind: "items"; items: Item[] }
  | { kind: "stmts"; stmts: Stmt[] }
  | { kind: "ty"; ty: Ty }
  | { kind: "impl-items"; items: ImplItem[] }
  | { kind: "trait-items"; items: TraitItem[] }
  | { kind: "foreign-items"; items: ForeignItem[] };

const DESCRIPTIONS: Record<AstFragmentKind, string> = {
  expr: "expression",
  pat: "pattern",
  items: "item",
  stmts: "statement",
  ty: "type",
  "impl-items": "impl item",
  "trait-items": "trait item",
  "foreign-items": "foreign item",
};

export function fragmentKindDescr(kind: AstFragmentKind): string {
  return DESCRIPTIONS[kind];
}

/** Ask `result` for a fragment of `kind`; `undefined` means unsupported. */
export function makeFragmentFromMacResult(kind: AstFragmentKind, result: MacResult): AstFragment | undefined {
  switch (kind) {
    case "expr": {
      const expr = result.makeExpr();
      return expr && { kind, expr };
    }
    case "pat": {
      const pat = result.makePat();
      return pat && { kind, pat };
    }
    case "items": {
      const items = result.makeItems();
      return items && { kind, items };
    }
    case "stmts": {
      const stmts = result.makeStmts();
      return stmts && { kind, stmts };
    }
    case "ty": {
      const ty = result.makeTy();
      return ty && { kind, ty };
    }
    case "impl-items": {
      const items = result.makeImplItems();
      return items && { kind, items };
    }
    case "trait-items": {
      const items = result.makeTraitItems();
      return items && { kind, items };
    }
    case "foreign-items": {
      const items = result.makeForeignItems();
      return items && { kind, items };
    }
    default:
      return unreachable(kind, "fragment kind");
  }
}

/** Error placeholder of `kind`; total because {@link DummyResult} supports every kind. */
export function dummyFragment(kind: AstFragmentKind, sp: Span): AstFragment {
  const fragment = makeFragmentFromMacResult(kind, DummyResult.any(sp));
  if (fragment === undefined) throw new ExplicitBug(`dummy result cannot produce a ${fragmentKindDescr(kind)}`);
  return fragment;
}

function wrongFragment(expected: AstFragmentKind, fragment: AstFragment): never {
  throw new ExplicitBug(`expected ${fragmentKindDescr(expected)} fragment, found ${fragmentKindDescr(fragment.kind)}`);
}

export function expectFragmentExpr(fragment: AstFragment): Expr {
  return fragment.kind === "expr" ? fragment.expr : wrongFragment("expr", fragment);
}

export function expectFragmentPat(fragment: AstFragment): Pat {
  return fragment.kind === "pat" ? fragment.pat : wrongFragment("pat", fragment);
}

export function expectFragmentTy(fragment: AstFragment): Ty {
  return fragment.kind === "ty" ? fragment.ty : wrongFragment("ty", fragment);
}

export function expectFragmentItems(fragment: AstFragment): Item[] {
  return fragment.kind === "items" ? fragment.items : wrongFragment("items", fragment);
}

export function expectFragmentStmts(fragment: AstFragment): Stmt[] {
  return fragment.kind === "stmts" ? fragment.stmts : wrongFragment("stmts", fragment);
}

export function expectFragmentImplItems(fragment: AstFragment): ImplItem[] {
  return fragment.kind === "impl-items" ? fragment.items : wrongFragment("impl-items", fragment);
}

export function expectFragmentTraitItems(fragment: AstFragment): TraitItem[] {
  return fragment.kind === "trait-items" ? fragment.items : wrongFragment("trait-items", fragment);
}

export function expectFragmentForeignItems(fragment: AstFragment): ForeignItem[] {
  return fragment.kind === "foreign-items" ? fragment.items : wrongFragment("foreign-items", fragment);
}

function annotatableToStmt(target: Annotatable): Stmt {
  switch (target.kind) {
    case "stmt":
      return target.stmt;
    case "item":
      return mkStmt({ kind: "item", item: target.item }, target.item.span);
    case "expr":
      return mkStmt({ kind: "expr", expr: target.expr }, target.expr.span);
    default:
      throw new ExplicitBug(`a ${target.kind} cannot appear in statement position`);
  }
}

/** Collect the output of legacy attribute and derive macros as a fragment of `kind`. */
export function fragmentFromAnnotatables(kind: AstFragmentKind, list: readonly Annotatable[]): AstFragment {
  switch (kind) {
    case "items":
      return { kind, items: list.map(expectItem) };
    case "impl-items":
      return { kind, items: list.map(expectImplItem) };
    case "trait-items":
      return { kind, items: list.map(expectTraitItem) };
    case "foreign-items":
      return { kind, items: list.map(expectForeignItem) };
    case "stmts":
      return { kind, stmts: list.map(annotatableToStmt) };
    case "expr": {
      const [only, ...rest] = list;
      if (only === undefined || rest.length > 0) {
        throw new ExplicitBug(`expected exactly one expression, found ${list.length}`);
      }
      return { kind, expr: expectExpr(only) };
    }
    case "pat":
    case "ty":
      throw new ExplicitBug(`a ${fragmentKindDescr(kind)} cannot be annotated`);
    default:
      return unreachable(kind, "fragment kind");
  }
}
