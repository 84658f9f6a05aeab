/**
 * Expansion results.
 *
 * A legacy function-like macro returns a {@link MacResult}; the expander asks
 * it for exactly the fragment kind of the call site. Each `make*` accessor
 * consumes the result: a second query yields `undefined`.
 */

import {
  mkExpr,
  mkPat,
  mkStmt,
  mkTy,
  type Expr,
  type ForeignItem,
  type ImplItem,
  type Item,
  type Pat,
  type Stmt,
  type TraitItem,
  type Ty,
} from "./ast.js";
import type { Span } from "./span.js";

export abstract class MacResult {
  makeExpr(): Expr | undefined {
    return undefined;
  }

  makePat(): Pat | undefined {
    return undefined;
  }

  makeItems(): Item[] | undefined {
    return undefined;
  }

  makeImplItems(): ImplItem[] | undefined {
    return undefined;
  }

  makeTraitItems(): TraitItem[] | undefined {
    return undefined;
  }

  makeForeignItems(): ForeignItem[] | undefined {
    return undefined;
  }

  /** Defaults to a single expression statement when an expression is available. */
  makeStmts(): Stmt[] | undefined {
    const expr = this.makeExpr();
    return expr === undefined ? undefined : [mkStmt({ kind: "expr", expr }, expr.span)];
  }

  makeTy(): Ty | undefined {
    return undefined;
  }
}

export interface MacEagerSlots {
  expr?: Expr;
  pat?: Pat;
  items?: Item[];
  implItems?: ImplItem[];
  traitItems?: TraitItem[];
  foreignItems?: ForeignItem[];
  stmts?: Stmt[];
  ty?: Ty;
}

/** A result built from whichever slots the extension populated. */
export class MacEager extends MacResult {
  private slots: MacEagerSlots;

  constructor(slots: MacEagerSlots) {
    super();
    this.slots = { ...slots };
  }

  static expr(expr: Expr): MacEager {
    return new MacEager({ expr });
  }

  static pat(pat: Pat): MacEager {
    return new MacEager({ pat });
  }

  static items(items: Item[]): MacEager {
    return new MacEager({ items });
  }

  static implItems(implItems: ImplItem[]): MacEager {
    return new MacEager({ implItems });
  }

  static traitItems(traitItems: TraitItem[]): MacEager {
    return new MacEager({ traitItems });
  }

  static foreignItems(foreignItems: ForeignItem[]): MacEager {
    return new MacEager({ foreignItems });
  }

  static stmts(stmts: Stmt[]): MacEager {
    return new MacEager({ stmts });
  }

  static ty(ty: Ty): MacEager {
    return new MacEager({ ty });
  }

  private take<K extends keyof MacEagerSlots>(slot: K): MacEagerSlots[K] {
    const value = this.slots[slot];
    this.slots = {};
    return value;
  }

  override makeExpr(): Expr | undefined {
    return this.take("expr");
  }

  /** Falls back to a literal pattern when the expression slot holds a literal. */
  override makePat(): Pat | undefined {
    if (this.slots.pat !== undefined) return this.take("pat");
    const expr = this.take("expr");
    if (expr?.kind === "lit") return mkPat({ kind: "lit", expr }, expr.span);
    return undefined;
  }

  override makeItems(): Item[] | undefined {
    return this.take("items");
  }

  override makeImplItems(): ImplItem[] | undefined {
    return this.take("implItems");
  }

  override makeTraitItems(): TraitItem[] | undefined {
    return this.take("traitItems");
  }

  override makeForeignItems(): ForeignItem[] | undefined {
    return this.take("foreignItems");
  }

  override makeStmts(): Stmt[] | undefined {
    if (this.slots.stmts !== undefined) return this.take("stmts");
    return super.makeStmts();
  }

  override makeTy(): Ty | undefined {
    return this.take("ty");
  }
}

/**
 * Placeholder result for an invocation that already failed (`any`) or
 * intentionally produces nothing (`anyValid`).
 */
export class DummyResult extends MacResult {
  private constructor(
    readonly isError: boolean,
    readonly span: Span,
  ) {
    super();
  }

  /** The error variant: a diagnostic has already been reported. */
  static any(sp: Span): DummyResult {
    return new DummyResult(true, sp);
  }

  static anyValid(sp: Span): DummyResult {
    return new DummyResult(false, sp);
  }

  static rawExpr(sp: Span, isError: boolean): Expr {
    return mkExpr(isError ? { kind: "err" } : { kind: "tup", elems: [] }, sp);
  }

  static rawPat(sp: Span): Pat {
    return mkPat({ kind: "wild" }, sp);
  }

  static rawTy(sp: Span, isError: boolean): Ty {
    return mkTy(isError ? { kind: "err" } : { kind: "tup", elems: [] }, sp);
  }

  override makeExpr(): Expr {
    return DummyResult.rawExpr(this.span, this.isError);
  }

  override makePat(): Pat {
    return DummyResult.rawPat(this.span);
  }

  override makeItems(): Item[] {
    return [];
  }

  override makeImplItems(): ImplItem[] {
    return [];
  }

  override makeTraitItems(): TraitItem[] {
    return [];
  }

  override makeForeignItems(): ForeignItem[] {
    return [];
  }

  override makeStmts(): Stmt[] {
    return [mkStmt({ kind: "expr", expr: DummyResult.rawExpr(this.span, this.isError) }, this.span)];
  }

  override makeTy(): Ty {
    return DummyResult.rawTy(this.span, this.isError);
  }
}
