/**
 * In-place AST traversal.
 *
 * Subclasses override the hooks they care about and call the `walk*`
 * methods to continue into children. List positions are flat-mapped, so a
 * hook can replace one node with any number of nodes of the same category.
 */

import {
  mkStmt,
  type Block,
  type Expr,
  type FnDecl,
  type ForeignItem,
  type ImplItem,
  type Item,
  type Pat,
  type Stmt,
  type TraitItem,
  type Ty,
  type VariantData,
} from "./ast.js";
import type { AstFragment } from "./fragments.js";
import { unreachable } from "./safety.js";

export abstract class MutVisitor {
  visitFragment(fragment: AstFragment): AstFragment {
    switch (fragment.kind) {
      case "expr":
        return { kind: "expr", expr: this.visitExpr(fragment.expr) };
      case "pat":
        return { kind: "pat", pat: this.visitPat(fragment.pat) };
      case "ty":
        return { kind: "ty", ty: this.visitTy(fragment.ty) };
      case "items":
        return { kind: "items", items: fragment.items.flatMap((item) => this.flatMapItem(item)) };
      case "stmts":
        return { kind: "stmts", stmts: fragment.stmts.flatMap((stmt) => this.flatMapStmt(stmt)) };
      case "impl-items":
        return { kind: "impl-items", items: fragment.items.flatMap((item) => this.flatMapImplItem(item)) };
      case "trait-items":
        return { kind: "trait-items", items: fragment.items.flatMap((item) => this.flatMapTraitItem(item)) };
      case "foreign-items":
        return { kind: "foreign-items", items: fragment.items.flatMap((item) => this.flatMapForeignItem(item)) };
      default:
        return unreachable(fragment, "fragment");
    }
  }

  flatMapItem(item: Item): Item[] {
    this.walkItem(item);
    return [item];
  }

  flatMapImplItem(item: ImplItem): ImplItem[] {
    this.walkImplItem(item);
    return [item];
  }

  flatMapTraitItem(item: TraitItem): TraitItem[] {
    this.walkTraitItem(item);
    return [item];
  }

  flatMapForeignItem(item: ForeignItem): ForeignItem[] {
    this.walkForeignItem(item);
    return [item];
  }

  flatMapStmt(stmt: Stmt): Stmt[] {
    return this.walkFlatMapStmt(stmt);
  }

  visitExpr(expr: Expr): Expr {
    this.walkExpr(expr);
    return expr;
  }

  visitPat(pat: Pat): Pat {
    this.walkPat(pat);
    return pat;
  }

  visitTy(ty: Ty): Ty {
    this.walkTy(ty);
    return ty;
  }

  visitBlock(block: Block): void {
    block.stmts = block.stmts.flatMap((stmt) => this.flatMapStmt(stmt));
  }

  // -------------------------------------------------------------------------
  // Walkers
  // -------------------------------------------------------------------------

  protected walkItem(item: Item): void {
    switch (item.kind) {
      case "const":
        item.ty = this.visitTy(item.ty);
        item.expr = this.visitExpr(item.expr);
        break;
      case "static":
        item.ty = this.visitTy(item.ty);
        item.expr = this.visitExpr(item.expr);
        break;
      case "fn":
        this.walkFnDecl(item.decl);
        this.visitBlock(item.body);
        break;
      case "struct":
      case "union":
        this.walkVariantData(item.data);
        break;
      case "enum":
        for (const variant of item.variants) this.walkVariantData(variant.data);
        break;
      case "mod":
        item.items = item.items.flatMap((child) => this.flatMapItem(child));
        break;
      case "trait":
        item.items = item.items.flatMap((child) => this.flatMapTraitItem(child));
        break;
      case "impl":
        item.selfTy = this.visitTy(item.selfTy);
        item.items = item.items.flatMap((child) => this.flatMapImplItem(child));
        break;
      case "foreign-mod":
        item.items = item.items.flatMap((child) => this.flatMapForeignItem(child));
        break;
      case "type-alias":
        item.ty = this.visitTy(item.ty);
        break;
      case "macro-def":
      case "mac":
        break;
      default:
        unreachable(item, "item kind");
    }
  }

  protected walkImplItem(item: ImplItem): void {
    switch (item.kind) {
      case "const":
        item.ty = this.visitTy(item.ty);
        item.expr = this.visitExpr(item.expr);
        break;
      case "fn":
        this.walkFnDecl(item.decl);
        this.visitBlock(item.body);
        break;
      case "type":
        item.ty = this.visitTy(item.ty);
        break;
      case "mac":
        break;
      default:
        unreachable(item, "impl item kind");
    }
  }

  protected walkTraitItem(item: TraitItem): void {
    switch (item.kind) {
      case "const":
        item.ty = this.visitTy(item.ty);
        if (item.expr) item.expr = this.visitExpr(item.expr);
        break;
      case "fn":
        this.walkFnDecl(item.decl);
        if (item.body) this.visitBlock(item.body);
        break;
      case "type":
      case "mac":
        break;
      default:
        unreachable(item, "trait item kind");
    }
  }

  protected walkForeignItem(item: ForeignItem): void {
    switch (item.kind) {
      case "fn":
        this.walkFnDecl(item.decl);
        break;
      case "static":
        item.ty = this.visitTy(item.ty);
        break;
      case "type":
      case "mac":
        break;
      default:
        unreachable(item, "foreign item kind");
    }
  }

  protected walkFnDecl(decl: FnDecl): void {
    for (const param of decl.inputs) {
      param.pat = this.visitPat(param.pat);
      param.ty = this.visitTy(param.ty);
    }
    if (decl.output) decl.output = this.visitTy(decl.output);
  }

  protected walkVariantData(data: VariantData): void {
    if (data.type === "unit") return;
    for (const field of data.fields) field.ty = this.visitTy(field.ty);
  }

  protected walkFlatMapStmt(stmt: Stmt): Stmt[] {
    switch (stmt.kind) {
      case "item":
        return this.flatMapItem(stmt.item).map((item) =>
          item === stmt.item ? stmt : mkStmt({ kind: "item", item }, item.span),
        );
      case "local":
        stmt.pat = this.visitPat(stmt.pat);
        if (stmt.ty) stmt.ty = this.visitTy(stmt.ty);
        if (stmt.init) stmt.init = this.visitExpr(stmt.init);
        return [stmt];
      case "expr":
      case "semi":
        stmt.expr = this.visitExpr(stmt.expr);
        return [stmt];
      case "mac":
      case "empty":
        return [stmt];
      default:
        return unreachable(stmt, "statement kind");
    }
  }

  protected walkExpr(expr: Expr): void {
    switch (expr.kind) {
      case "tup":
      case "array":
        expr.elems = expr.elems.map((e) => this.visitExpr(e));
        break;
      case "call":
        expr.callee = this.visitExpr(expr.callee);
        expr.args = expr.args.map((e) => this.visitExpr(e));
        break;
      case "field":
        expr.base = this.visitExpr(expr.base);
        break;
      case "struct":
        for (const field of expr.fields) field.expr = this.visitExpr(field.expr);
        break;
      case "binary":
        expr.left = this.visitExpr(expr.left);
        expr.right = this.visitExpr(expr.right);
        break;
      case "unary":
      case "ref":
        expr.operand = this.visitExpr(expr.operand);
        break;
      case "paren":
        expr.inner = this.visitExpr(expr.inner);
        break;
      case "block":
        this.visitBlock(expr.block);
        break;
      case "lit":
      case "path":
      case "mac":
      case "err":
        break;
      default:
        unreachable(expr, "expression kind");
    }
  }

  protected walkPat(pat: Pat): void {
    switch (pat.kind) {
      case "lit":
        pat.expr = this.visitExpr(pat.expr);
        break;
      case "tuple":
        pat.elems = pat.elems.map((p) => this.visitPat(p));
        break;
      case "wild":
      case "ident":
      case "mac":
        break;
      default:
        unreachable(pat, "pattern kind");
    }
  }

  protected walkTy(ty: Ty): void {
    switch (ty.kind) {
      case "tup":
        ty.elems = ty.elems.map((t) => this.visitTy(t));
        break;
      case "array":
        ty.elem = this.visitTy(ty.elem);
        ty.len = this.visitExpr(ty.len);
        break;
      case "ref":
        ty.inner = this.visitTy(ty.inner);
        break;
      case "path":
      case "infer":
      case "mac":
      case "err":
        break;
      default:
        unreachable(ty, "type kind");
    }
  }
}
