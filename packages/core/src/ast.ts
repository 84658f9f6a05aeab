/**
 * Syntax tree for the macro surface language.
 *
 * Every node is a plain object discriminated by `kind`, carrying a node id
 * (`DUMMY_NODE_ID` until the monotonic expander numbers it) and a span.
 * Items additionally keep the tokens they were parsed from, which is what
 * token-based attribute and derive macros receive as input.
 */

import * as ts from "typescript";
import type { Token } from "./lexer.js";
import type { Span } from "./span.js";
import type { Delimiter, TokenStream } from "./tokenstream.js";

export type NodeId = number;

export const DUMMY_NODE_ID: NodeId = -1;

/** Id of the crate root module. */
export const CRATE_NODE_ID: NodeId = 0;

export interface Ident {
  name: string;
  span: Span;
}

export interface PathSegment {
  ident: Ident;
}

export interface Path {
  /** Leading `::`. */
  global: boolean;
  segments: PathSegment[];
  span: Span;
}

export type LitKind =
  | { type: "str"; value: string }
  /** `text` is the literal as written; printing uses it. */
  | { type: "num"; value: number; text: string }
  | { type: "bool"; value: boolean }
  /** A literal that failed to lex or cook; already reported. */
  | { type: "err"; text: string };

export interface Lit {
  kind: LitKind;
  span: Span;
}

export interface MacCall {
  path: Path;
  delim: Delimiter;
  args: TokenStream;
  span: Span;
}

export type AttrArgs =
  | { type: "empty" }
  | { type: "delimited"; delim: Delimiter; tokens: TokenStream }
  | { type: "eq"; lit: Lit };

export interface Attribute {
  /** Unique per session; used to track known and used attributes. */
  id: number;
  path: Path;
  args: AttrArgs;
  /** Full `@path(args)` tokens as written. */
  tokens: TokenStream;
  span: Span;
}

export type MetaItemKind =
  | { type: "word" }
  | { type: "list"; items: NestedMetaItem[] }
  | { type: "name-value"; lit: Lit };

export interface MetaItem {
  path: Path;
  kind: MetaItemKind;
  span: Span;
}

export type NestedMetaItem = { type: "meta"; meta: MetaItem } | { type: "lit"; lit: Lit };

interface NodeCommon {
  id: NodeId;
  span: Span;
}

export type BinOp = "+" | "-" | "*" | "/" | "%" | "==" | "!=" | "<" | "<=" | ">" | ">=" | "&&" | "||";

export type UnOp = "-" | "!" | "*";

export interface Field {
  ident: Ident;
  expr: Expr;
  span: Span;
}

export type ExprKind =
  | { kind: "lit"; lit: Lit }
  | { kind: "path"; path: Path }
  | { kind: "tup"; elems: Expr[] }
  | { kind: "array"; elems: Expr[] }
  | { kind: "call"; callee: Expr; args: Expr[] }
  | { kind: "field"; base: Expr; ident: Ident }
  | { kind: "struct"; path: Path; fields: Field[] }
  | { kind: "binary"; op: BinOp; left: Expr; right: Expr }
  | { kind: "unary"; op: UnOp; operand: Expr }
  | { kind: "ref"; mutable: boolean; operand: Expr }
  | { kind: "paren"; inner: Expr }
  | { kind: "block"; block: Block }
  | { kind: "mac"; mac: MacCall }
  /** Placeholder for an expression whose error was already reported. */
  | { kind: "err" };

export type Expr = ExprKind & NodeCommon & { attrs: Attribute[] };

export interface Block {
  id: NodeId;
  stmts: Stmt[];
  span: Span;
}

export type PatKind =
  | { kind: "wild" }
  | { kind: "ident"; ident: Ident; mutable: boolean }
  | { kind: "lit"; expr: Expr }
  | { kind: "tuple"; elems: Pat[] }
  | { kind: "mac"; mac: MacCall };

export type Pat = PatKind & NodeCommon;

export type TyKind =
  | { kind: "path"; path: Path }
  | { kind: "tup"; elems: Ty[] }
  | { kind: "array"; elem: Ty; len: Expr }
  | { kind: "ref"; mutable: boolean; inner: Ty }
  | { kind: "infer" }
  | { kind: "mac"; mac: MacCall }
  | { kind: "err" };

export type Ty = TyKind & NodeCommon;

export type MacStmtStyle = "semicolon" | "braces" | "no-semicolon";

export type StmtKind =
  | { kind: "local"; pat: Pat; ty?: Ty; init?: Expr; attrs: Attribute[] }
  | { kind: "item"; item: Item }
  /** Trailing expression without a semicolon. */
  | { kind: "expr"; expr: Expr }
  | { kind: "semi"; expr: Expr }
  | { kind: "mac"; mac: MacCall; style: MacStmtStyle; attrs: Attribute[] }
  | { kind: "empty" };

export type Stmt = StmtKind & NodeCommon;

export interface Param {
  pat: Pat;
  ty: Ty;
  /** `self` / `&self` receivers print in their short form. */
  selfKind?: "value" | "ref";
  span: Span;
}

export interface FnDecl {
  inputs: Param[];
  output?: Ty;
}

export interface FieldDef {
  ident?: Ident;
  ty: Ty;
  vis: boolean;
  span: Span;
}

export type VariantData =
  | { type: "struct"; fields: FieldDef[] }
  | { type: "tuple"; fields: FieldDef[] }
  | { type: "unit" };

export interface Variant {
  ident: Ident;
  data: VariantData;
  attrs: Attribute[];
  span: Span;
}

export type ItemKind =
  | { kind: "const"; ty: Ty; expr: Expr }
  | { kind: "static"; ty: Ty; expr: Expr; mutable: boolean }
  | { kind: "fn"; decl: FnDecl; body: Block }
  | { kind: "struct"; data: VariantData }
  | { kind: "enum"; variants: Variant[] }
  | { kind: "union"; data: VariantData }
  | { kind: "mod"; items: Item[]; inline: boolean }
  | { kind: "trait"; items: TraitItem[] }
  | { kind: "impl"; traitRef?: Path; selfTy: Ty; items: ImplItem[] }
  | { kind: "foreign-mod"; abi?: string; items: ForeignItem[] }
  | { kind: "type-alias"; ty: Ty }
  /** `macro name = target;` defines `name!` as an alias of `target!`. */
  | { kind: "macro-def"; target: Path }
  | { kind: "mac"; mac: MacCall };

interface ItemCommon extends NodeCommon {
  ident: Ident;
  attrs: Attribute[];
  /** `pub` */
  vis: boolean;
  /** Tokens the item was parsed from, excluding its outer attributes. */
  tokens?: TokenStream;
}

export type Item = ItemKind & ItemCommon;

export type ImplItemKind =
  | { kind: "const"; ty: Ty; expr: Expr }
  | { kind: "fn"; decl: FnDecl; body: Block }
  | { kind: "type"; ty: Ty }
  | { kind: "mac"; mac: MacCall };

export type ImplItem = ImplItemKind & ItemCommon;

export type TraitItemKind =
  | { kind: "const"; ty: Ty; expr?: Expr }
  | { kind: "fn"; decl: FnDecl; body?: Block }
  | { kind: "type" }
  | { kind: "mac"; mac: MacCall };

export type TraitItem = TraitItemKind & ItemCommon;

export type ForeignItemKind =
  | { kind: "fn"; decl: FnDecl }
  | { kind: "static"; ty: Ty; mutable: boolean }
  | { kind: "type" }
  | { kind: "mac"; mac: MacCall };

export type ForeignItem = ForeignItemKind & ItemCommon;

export interface Crate {
  items: Item[];
  attrs: Attribute[];
  span: Span;
}

// ============================================================================
// Small helpers
// ============================================================================

export function ident(name: string, sp: Span): Ident {
  return { name, span: sp };
}

export function pathFromIdents(idents: Ident[], sp: Span, global = false): Path {
  return { global, segments: idents.map((i) => ({ ident: i })), span: sp };
}

export function pathToString(path: Path): string {
  const joined = path.segments.map((s) => s.ident.name).join("::");
  return path.global ? `::${joined}` : joined;
}

/** Whether a path is the single identifier `name`. */
export function pathIs(path: Path, name: string): boolean {
  return !path.global && path.segments.length === 1 && path.segments[0].ident.name === name;
}

let nextAttrId = 0;

export function mkAttrId(): number {
  return nextAttrId++;
}

/** Literal node for a literal token, or `undefined` if the token is not one. */
export function litFromToken(token: Token): Lit | undefined {
  switch (token.kind) {
    case ts.SyntaxKind.StringLiteral:
      return { kind: { type: "str", value: token.value ?? "" }, span: token.span };
    case ts.SyntaxKind.NumericLiteral: {
      const value = Number(token.value ?? token.text);
      return Number.isNaN(value)
        ? { kind: { type: "err", text: token.text }, span: token.span }
        : { kind: { type: "num", value, text: token.text }, span: token.span };
    }
    case ts.SyntaxKind.TrueKeyword:
      return { kind: { type: "bool", value: true }, span: token.span };
    case ts.SyntaxKind.FalseKeyword:
      return { kind: { type: "bool", value: false }, span: token.span };
    default:
      return undefined;
  }
}

export const BINOP_PRECEDENCE: Readonly<Record<BinOp, number>> = {
  "||": 1,
  "&&": 2,
  "==": 3,
  "!=": 3,
  "<": 3,
  "<=": 3,
  ">": 3,
  ">=": 3,
  "+": 4,
  "-": 4,
  "*": 5,
  "/": 5,
  "%": 5,
};

const BINOPS: readonly BinOp[] = ["||", "&&", "==", "!=", "<", "<=", ">", ">=", "+", "-", "*", "/", "%"];

export function asBinOp(text: string): BinOp | undefined {
  return BINOPS.find((op) => op === text);
}

export function mkExpr(kind: ExprKind, sp: Span, attrs: Attribute[] = []): Expr {
  return { ...kind, id: DUMMY_NODE_ID, span: sp, attrs };
}

export function mkPat(kind: PatKind, sp: Span): Pat {
  return { ...kind, id: DUMMY_NODE_ID, span: sp };
}

export function mkTy(kind: TyKind, sp: Span): Ty {
  return { ...kind, id: DUMMY_NODE_ID, span: sp };
}

export function mkStmt(kind: StmtKind, sp: Span): Stmt {
  return { ...kind, id: DUMMY_NODE_ID, span: sp };
}
