/**
 * Expansion Context
 *
 * One {@link ExtCtxt} serves one expansion pass. Every extension receives it
 * and uses it to stamp spans with hygiene marks, report diagnostics, resolve
 * paths relative to the invoking file, build syntax nodes, and expand its own
 * arguments eagerly.
 *
 * The current {@link ExpansionData} frame is swapped in for the duration of
 * each invocation, so `callSite()`, `expansionCause()` and the hygiene
 * helpers always describe the invocation being expanded.
 */

import * as nodePath from "path";
import {
  DUMMY_NODE_ID,
  ident,
  mkExpr,
  mkPat,
  mkStmt,
  mkTy,
  pathFromIdents,
  type BinOp,
  type Block,
  type Expr,
  type FnDecl,
  type Ident,
  type ImplItem,
  type Item,
  type ItemKind,
  type LitKind,
  type Param,
  type Pat,
  type Path,
  type Stmt,
  type Ty,
} from "./ast.js";
import { config } from "./config.js";
import type { DiagnosticBuilder } from "./diagnostics.js";
import { ParseError } from "./errors.js";
import { MacroExpander } from "./expand.js";
import { expectFragmentExpr } from "./fragments.js";
import { expnKindDescr, isRootExpn, ROOT_EXPN_ID, type ExpnData, type ExpnId, type Transparency } from "./hygiene.js";
import { Parser } from "./parser.js";
import type { Resolver } from "./resolver.js";
import type { ParseSess } from "./session.js";
import { fileNameToString, type SourceMap } from "./source-map.js";
import { DUMMY_SP, spanKey, type Edition, type Span } from "./span.js";
import type { TokenStream } from "./tokenstream.js";

// ============================================================================
// Expansion frames and configuration
// ============================================================================

export interface ModuleData {
  modPath: Ident[];
  /** Directory that `mod name;` declarations in this module are relative to. */
  directory: string;
}

/** Whether the current code may declare out-of-line modules. */
export type DirectoryOwnership = { type: "owned"; relative?: Ident } | { type: "unowned-via-block" };

export interface ExpansionData {
  id: ExpnId;
  depth: number;
  module: ModuleData;
  directoryOwnership: DirectoryOwnership;
  /** Span of the type in `let x: T = mac!()`, for parsers that need it. */
  priorTypeAscription?: Span;
}

export interface ExpansionConfig {
  crateName: string;
  edition: Edition;
  recursionLimit: number;
  traceMac: boolean;
  verbose: boolean;
}

export const ExpansionConfig = {
  default(crateName: string): ExpansionConfig {
    return { crateName, edition: "2018", recursionLimit: 64, traceMac: false, verbose: false };
  },

  /** Expansion settings from the loaded {@link config}. */
  fromConfig(crateName: string): ExpansionConfig {
    return {
      crateName,
      edition: config.get("edition"),
      recursionLimit: config.get("recursionLimit"),
      traceMac: config.get("traceMacros"),
      verbose: config.get("verbose"),
    };
  },
};

interface TraceEntry {
  span: Span;
  notes: string[];
}

// ============================================================================
// ExtCtxt
// ============================================================================

export class ExtCtxt {
  /** Directory of the crate root; `mod` directories are relative to it. */
  rootPath = "";
  currentExpansion: ExpansionData;
  private readonly traces = new Map<string, TraceEntry>();

  constructor(
    readonly parseSess: ParseSess,
    readonly ecfg: ExpansionConfig,
    readonly resolver: Resolver,
  ) {
    this.currentExpansion = {
      id: ROOT_EXPN_ID,
      depth: 0,
      module: { modPath: [], directory: "" },
      directoryOwnership: { type: "owned" },
    };
  }

  get sourceMap(): SourceMap {
    return this.parseSess.sourceMap;
  }

  /** Expander for eager expansion of arguments; does not assign node ids. */
  expander(): MacroExpander {
    return new MacroExpander(this, false);
  }

  monotonicExpander(): MacroExpander {
    return new MacroExpander(this, true);
  }

  newParserFromTts(tts: TokenStream): Parser {
    return new Parser(tts, this.callSite());
  }

  /** Run `fn` with `data` as the current expansion frame. */
  withExpansion<T>(data: ExpansionData, fn: () => T): T {
    const previous = this.currentExpansion;
    this.currentExpansion = data;
    try {
      return fn();
    } finally {
      this.currentExpansion = previous;
    }
  }

  currentExpnData(): ExpnData {
    return this.parseSess.hygiene.getExpnData(this.currentExpansion.id);
  }

  callSite(): Span {
    return this.currentExpnData().callSite;
  }

  // -------------------------------------------------------------------------
  // Hygiene
  // -------------------------------------------------------------------------

  private withCtxtFromMark(sp: Span, transparency: Transparency): Span {
    return this.parseSess.hygiene.spanWithMark(sp, this.currentExpansion.id, transparency);
  }

  /** Names resolve at the macro definition only. */
  withDefSiteCtxt(sp: Span): Span {
    return this.withCtxtFromMark(sp, "opaque");
  }

  /** Names resolve as if written at the invocation. */
  withCallSiteCtxt(sp: Span): Span {
    return this.withCtxtFromMark(sp, "transparent");
  }

  /** Local bindings are hygienic, items are not. */
  withLegacyCtxt(sp: Span): Span {
    return this.withCtxtFromMark(sp, "semi-transparent");
  }

  /**
   * The outermost call site that caused the current expansion, walking up
   * through parent expansions. Stops before the root and at an `include`
   * frame, which does not count as a macro cause.
   */
  expansionCause(): Span | undefined {
    const hygiene = this.parseSess.hygiene;
    let expnId = this.currentExpansion.id;
    let lastMacro: Span | undefined;
    for (let steps = 0; steps <= hygiene.expnCount; steps++) {
      const data = hygiene.getExpnData(expnId);
      if (isRootExpn(data) || expnKindDescr(data.kind) === "include") return lastMacro;
      expnId = hygiene.outerExpn(data.callSite.ctxt);
      lastMacro = data.callSite;
    }
    return this.bug("cycle in expansion call sites");
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  structSpanWarn(sp: Span, msg: string): DiagnosticBuilder {
    return this.parseSess.spanDiagnostic.structSpanWarn(sp, msg);
  }

  structSpanErr(sp: Span, msg: string): DiagnosticBuilder {
    return this.parseSess.spanDiagnostic.structSpanErr(sp, msg);
  }

  structSpanFatal(sp: Span, msg: string): DiagnosticBuilder {
    return this.parseSess.spanDiagnostic.structSpanFatal(sp, msg);
  }

  /** Emit a fatal error and unwind the pass. */
  spanFatal(sp: Span, msg: string): never {
    throw this.parseSess.spanDiagnostic.spanFatal(sp, msg);
  }

  /**
   * Emit an error. Expansion continues; the driver aborts once the pass is
   * over if any error was reported.
   */
  spanErr(sp: Span, msg: string): void {
    this.parseSess.spanDiagnostic.spanErr(sp, msg);
  }

  spanErrWithCode(sp: Span, msg: string, code: string): void {
    this.parseSess.spanDiagnostic.spanErrWithCode(sp, msg, code);
  }

  mutSpanErr(sp: Span, msg: string): DiagnosticBuilder {
    return this.parseSess.spanDiagnostic.structSpanErr(sp, msg);
  }

  spanWarn(sp: Span, msg: string): void {
    this.parseSess.spanDiagnostic.spanWarn(sp, msg);
  }

  spanUnimpl(sp: Span, msg: string): never {
    return this.parseSess.spanDiagnostic.spanUnimpl(sp, msg);
  }

  spanBug(sp: Span, msg: string): never {
    return this.parseSess.spanDiagnostic.spanBug(sp, msg);
  }

  bug(msg: string): never {
    return this.parseSess.spanDiagnostic.bug(msg);
  }

  /** Report a parser failure as an ordinary error. */
  emitParseError(error: ParseError): void {
    this.spanErr(error.span, error.message);
  }

  traceMacros(): boolean {
    return this.ecfg.traceMac;
  }

  setTraceMacros(enabled: boolean): void {
    this.ecfg.traceMac = enabled;
  }

  /** Remember a note for `trace_macros` output, grouped by span. */
  traceNote(sp: Span, note: string): void {
    const key = spanKey(sp);
    const entry = this.traces.get(key);
    if (entry) entry.notes.push(note);
    else this.traces.set(key, { span: sp, notes: [note] });
  }

  /** Emit the collected trace notes, one `trace_macro` note per span. */
  traceMacrosDiag(): void {
    for (const { span, notes } of this.traces.values()) {
      const db = this.parseSess.spanDiagnostic.spanNoteDiag(span, "trace_macro");
      for (const note of notes) db.note(note);
      db.emit();
    }
    this.traces.clear();
  }

  checkUnusedMacros(): void {
    this.resolver.checkUnusedMacros();
  }

  // -------------------------------------------------------------------------
  // Paths
  // -------------------------------------------------------------------------

  /**
   * Resolve a path written in a macro invocation against the file that
   * contains the invocation after expansion, not the macro definition. No
   * file is touched.
   */
  resolvePath(path: string, sp: Span): string {
    if (nodePath.isAbsolute(path)) return path;
    const callsite = this.parseSess.hygiene.sourceCallsite(sp);
    const fileName = this.sourceMap.spanToFilename(callsite);
    if (fileName.kind !== "real") {
      return this.spanBug(callsite, `cannot resolve relative path in non-file source \`${fileNameToString(fileName)}\``);
    }
    return nodePath.join(nodePath.dirname(fileName.path), path);
  }

  identOf(name: string, sp: Span): Ident {
    return ident(name, sp);
  }

  /** `$crate::a::b`, with `$crate` resolved at the definition site. */
  stdPath(components: readonly string[]): Ident[] {
    const defSite = this.withDefSiteCtxt(DUMMY_SP);
    return [ident("$crate", defSite), ...components.map((name) => ident(name, DUMMY_SP))];
  }

  // -------------------------------------------------------------------------
  // Node Creation Utilities
  // -------------------------------------------------------------------------

  path(sp: Span, names: readonly string[]): Path {
    return pathFromIdents(names.map((name) => ident(name, sp)), sp);
  }

  pathGlobal(sp: Span, names: readonly string[]): Path {
    return pathFromIdents(names.map((name) => ident(name, sp)), sp, true);
  }

  pathIdent(sp: Span, id: Ident): Path {
    return pathFromIdents([id], sp);
  }

  exprLit(sp: Span, kind: LitKind): Expr {
    return mkExpr({ kind: "lit", lit: { kind, span: sp } }, sp);
  }

  exprStr(sp: Span, value: string): Expr {
    return this.exprLit(sp, { type: "str", value });
  }

  exprNum(sp: Span, value: number): Expr {
    return this.exprLit(sp, { type: "num", value, text: String(value) });
  }

  exprBool(sp: Span, value: boolean): Expr {
    return this.exprLit(sp, { type: "bool", value });
  }

  exprTuple(sp: Span, elems: Expr[]): Expr {
    return mkExpr({ kind: "tup", elems }, sp);
  }

  exprVec(sp: Span, elems: Expr[]): Expr {
    return mkExpr({ kind: "array", elems }, sp);
  }

  exprPath(path: Path): Expr {
    return mkExpr({ kind: "path", path }, path.span);
  }

  exprIdent(sp: Span, id: Ident): Expr {
    return this.exprPath(this.pathIdent(sp, id));
  }

  exprSelf(sp: Span): Expr {
    return this.exprIdent(sp, ident("self", sp));
  }

  exprCall(sp: Span, callee: Expr, args: Expr[]): Expr {
    return mkExpr({ kind: "call", callee, args }, sp);
  }

  exprField(sp: Span, base: Expr, field: Ident): Expr {
    return mkExpr({ kind: "field", base, ident: field }, sp);
  }

  exprStruct(sp: Span, path: Path, fields: Array<{ ident: Ident; expr: Expr }>): Expr {
    return mkExpr({ kind: "struct", path, fields: fields.map((f) => ({ ...f, span: sp })) }, sp);
  }

  exprDeref(sp: Span, operand: Expr): Expr {
    return mkExpr({ kind: "unary", op: "*", operand }, sp);
  }

  exprAddrOf(sp: Span, operand: Expr): Expr {
    return mkExpr({ kind: "ref", mutable: false, operand }, sp);
  }

  exprBinary(sp: Span, op: BinOp, left: Expr, right: Expr): Expr {
    return mkExpr({ kind: "binary", op, left, right }, sp);
  }

  exprBlock(block: Block): Expr {
    return mkExpr({ kind: "block", block }, block.span);
  }

  exprErr(sp: Span): Expr {
    return mkExpr({ kind: "err" }, sp);
  }

  stmtExpr(expr: Expr): Stmt {
    return mkStmt({ kind: "expr", expr }, expr.span);
  }

  stmtSemi(expr: Expr): Stmt {
    return mkStmt({ kind: "semi", expr }, expr.span);
  }

  stmtLet(sp: Span, mutable: boolean, name: Ident, init: Expr): Stmt {
    const pat = mkPat({ kind: "ident", ident: name, mutable }, sp);
    return mkStmt({ kind: "local", pat, init, attrs: [] }, sp);
  }

  stmtItem(item: Item): Stmt {
    return mkStmt({ kind: "item", item }, item.span);
  }

  block(sp: Span, stmts: Stmt[]): Block {
    return { id: DUMMY_NODE_ID, stmts, span: sp };
  }

  blockExpr(expr: Expr): Block {
    return this.block(expr.span, [this.stmtExpr(expr)]);
  }

  tyPath(path: Path): Ty {
    return mkTy({ kind: "path", path }, path.span);
  }

  tyIdent(sp: Span, id: Ident): Ty {
    return this.tyPath(this.pathIdent(sp, id));
  }

  tyTuple(sp: Span, elems: Ty[]): Ty {
    return mkTy({ kind: "tup", elems }, sp);
  }

  tyArray(sp: Span, elem: Ty, len: number): Ty {
    return mkTy({ kind: "array", elem, len: this.exprNum(sp, len) }, sp);
  }

  tyRef(sp: Span, inner: Ty, mutable = false): Ty {
    return mkTy({ kind: "ref", mutable, inner }, sp);
  }

  tyInfer(sp: Span): Ty {
    return mkTy({ kind: "infer" }, sp);
  }

  patWild(sp: Span): Pat {
    return mkPat({ kind: "wild" }, sp);
  }

  patIdent(sp: Span, id: Ident, mutable = false): Pat {
    return mkPat({ kind: "ident", ident: id, mutable }, sp);
  }

  patLit(sp: Span, expr: Expr): Pat {
    return mkPat({ kind: "lit", expr }, sp);
  }

  patTuple(sp: Span, elems: Pat[]): Pat {
    return mkPat({ kind: "tuple", elems }, sp);
  }

  /** `&self` receiver. */
  paramSelfRef(sp: Span): Param {
    const selfTy = this.tyIdent(sp, ident("Self", sp));
    return { pat: this.patIdent(sp, ident("self", sp)), ty: this.tyRef(sp, selfTy), selfKind: "ref", span: sp };
  }

  param(sp: Span, name: Ident, ty: Ty): Param {
    return { pat: this.patIdent(sp, name), ty, span: sp };
  }

  fnDecl(inputs: Param[], output?: Ty): FnDecl {
    return { inputs, output };
  }

  item(sp: Span, name: Ident, kind: ItemKind, vis = false): Item {
    return { ...kind, ident: name, attrs: [], vis, id: DUMMY_NODE_ID, span: sp };
  }

  itemConst(sp: Span, name: Ident, ty: Ty, expr: Expr, vis = false): Item {
    return this.item(sp, name, { kind: "const", ty, expr }, vis);
  }

  itemImpl(sp: Span, traitRef: Path | undefined, selfTy: Ty, items: ImplItem[]): Item {
    return this.item(sp, ident("", sp), { kind: "impl", traitRef, selfTy, items });
  }

  implItemFn(sp: Span, name: Ident, decl: FnDecl, body: Block): ImplItem {
    return { kind: "fn", decl, body, ident: name, attrs: [], vis: false, id: DUMMY_NODE_ID, span: sp };
  }
}

// ============================================================================
// Argument helpers for built-in macros
// ============================================================================

export type SpannedString =
  | { ok: true; value: string; span: Span }
  /** `diagnostic` is absent when the error was already reported. */
  | { ok: false; diagnostic?: DiagnosticBuilder };

/**
 * Expand `expr` eagerly and read it as a string literal. A literal or
 * expression that already failed produces no new diagnostic; anything else
 * returns an unemitted error the caller may extend.
 */
export function exprToSpannedString(cx: ExtCtxt, expr: Expr, errMsg: string): SpannedString {
  const expanded = expectFragmentExpr(cx.expander().fullyExpandFragment({ kind: "expr", expr }));
  switch (expanded.kind) {
    case "lit":
      switch (expanded.lit.kind.type) {
        case "str":
          return { ok: true, value: expanded.lit.kind.value, span: expanded.span };
        case "err":
          return { ok: false };
        default:
          return { ok: false, diagnostic: cx.structSpanErr(expanded.lit.span, errMsg) };
      }
    case "err":
      return { ok: false };
    default:
      return { ok: false, diagnostic: cx.structSpanErr(expanded.span, errMsg) };
  }
}

export function exprToString(cx: ExtCtxt, expr: Expr, errMsg: string): string | undefined {
  const result = exprToSpannedString(cx, expr, errMsg);
  if (result.ok) return result.value;
  result.diagnostic?.emit();
  return undefined;
}

/** Report an error if `tts` is not empty. */
export function checkZeroTts(cx: ExtCtxt, sp: Span, tts: TokenStream, name: string): void {
  if (!tts.isEmpty()) cx.spanErr(sp, `${name} takes no arguments`);
}

/** The single string-literal argument of `name!("...")`, with an optional trailing comma. */
export function getSingleStrFromTts(cx: ExtCtxt, sp: Span, tts: TokenStream, name: string): string | undefined {
  const parser = cx.newParserFromTts(tts);
  if (parser.atEnd()) {
    cx.spanErr(sp, `${name} takes 1 argument`);
    return undefined;
  }
  let expr: Expr;
  try {
    expr = parser.parseExpr();
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    cx.emitParseError(error);
    return undefined;
  }
  parser.eat(",");
  if (!parser.atEnd()) cx.spanErr(sp, `${name} takes 1 argument`);
  return exprToString(cx, expr, "argument must be a string literal");
}

/** Comma-separated expressions, each expanded eagerly. */
export function getExprsFromTts(cx: ExtCtxt, sp: Span, tts: TokenStream): Expr[] | undefined {
  const parser = cx.newParserFromTts(tts);
  const exprs: Expr[] = [];
  while (!parser.atEnd()) {
    let expr: Expr;
    try {
      expr = parser.parseExpr();
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      cx.emitParseError(error);
      return undefined;
    }
    exprs.push(expectFragmentExpr(cx.expander().fullyExpandFragment({ kind: "expr", expr })));
    if (parser.eat(",")) continue;
    if (!parser.atEnd()) {
      cx.spanErr(sp, "expected token: `,`");
      return undefined;
    }
  }
  return exprs;
}
