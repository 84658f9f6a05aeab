/**
 * Recursive-descent parser for the macro surface syntax.
 *
 * A parser works over one token stream; delimited groups are parsed by
 * sub-parsers over the group's inner stream. Every failure is thrown as a
 * {@link ParseError} carrying the span of the offending token, and callers
 * decide whether that becomes a diagnostic.
 *
 * @example
 * ```typescript
 * const parser = new Parser(TokenStream.parse("1 + 2 * x"));
 * const expr = parser.parseExpr();
 * parser.expectEof();
 * ```
 */

import {
  BINOP_PRECEDENCE,
  DUMMY_NODE_ID,
  asBinOp,
  ident,
  litFromToken,
  mkAttrId,
  mkExpr,
  mkPat,
  mkStmt,
  mkTy,
  pathFromIdents,
  type AttrArgs,
  type Attribute,
  type BinOp,
  type Block,
  type Crate,
  type Expr,
  type Field,
  type FieldDef,
  type FnDecl,
  type ForeignItem,
  type Ident,
  type ImplItem,
  type Item,
  type ItemKind,
  type MacCall,
  type MetaItem,
  type Param,
  type Pat,
  type Path,
  type Stmt,
  type TraitItem,
  type Ty,
  type VariantData,
  type Variant,
} from "./ast.js";
import { parseMetaItem } from "./attr.js";
import { ParseError } from "./errors.js";
import type { AstFragment, AstFragmentKind } from "./fragments.js";
import { isIdentNamed, isIdentToken, isPunct, isStringToken } from "./lexer.js";
import { unreachable } from "./safety.js";
import type { ParseSess } from "./session.js";
import type { FileName } from "./source-map.js";
import { DUMMY_SP, isDummy, shrinkToHi, shrinkToLo, span, spanTo, type Span } from "./span.js";
import { OPEN_DELIM, TokenStream, treeSpan, type Cursor, type TokenTree } from "./tokenstream.js";

type DelimitedTree = Extract<TokenTree, { type: "delimited" }>;

/** Keywords that start an item when they appear in statement position. */
const ITEM_KEYWORDS = new Set([
  "pub",
  "const",
  "static",
  "fn",
  "struct",
  "enum",
  "union",
  "mod",
  "trait",
  "impl",
  "extern",
  "type",
  "macro",
]);

export class Parser {
  private readonly cursor: Cursor;
  private readonly eofSpan: Span;
  private prevSpan: Span;

  constructor(stream: TokenStream, fallback: Span = DUMMY_SP) {
    this.cursor = stream.cursor();
    const whole = stream.span();
    this.eofSpan = whole === undefined || isDummy(whole) ? fallback : shrinkToHi(whole);
    this.prevSpan = whole === undefined ? fallback : shrinkToLo(whole);
  }

  // ==========================================================================
  // Token helpers
  // ==========================================================================

  atEnd(): boolean {
    return this.cursor.atEnd();
  }

  /** Span of the current tree, or the end of input. */
  currentSpan(): Span {
    const tree = this.cursor.current();
    return tree === undefined ? this.eofSpan : treeSpan(tree);
  }

  /** Source text of the current token (the opening delimiter for a group). */
  currentText(): string | undefined {
    const tree = this.cursor.current();
    if (tree === undefined) return undefined;
    return tree.type === "token" ? tree.token.text : OPEN_DELIM[tree.delim];
  }

  check(text: string): boolean {
    const token = this.cursor.token();
    return token !== undefined && isPunct(token, text);
  }

  checkKeyword(name: string): boolean {
    const token = this.cursor.token();
    return token !== undefined && isIdentNamed(token, name);
  }

  eat(text: string): boolean {
    if (!this.check(text)) return false;
    this.bump();
    return true;
  }

  eatKeyword(name: string): boolean {
    if (!this.checkKeyword(name)) return false;
    this.bump();
    return true;
  }

  expect(text: string): void {
    if (!this.eat(text)) throw this.expected(`\`${text}\``);
  }

  expectEof(): void {
    if (!this.atEnd()) {
      throw new ParseError(`unexpected token: ${this.describeCurrent()}`, this.currentSpan());
    }
  }

  private bump(): TokenTree | undefined {
    const tree = this.cursor.bump();
    if (tree !== undefined) this.prevSpan = treeSpan(tree);
    return tree;
  }

  private span(start: Span): Span {
    return spanTo(start, this.prevSpan);
  }

  private describeCurrent(): string {
    const text = this.currentText();
    return text === undefined ? "end of input" : `\`${text}\``;
  }

  private expected(what: string): ParseError {
    return new ParseError(`expected ${what}, found ${this.describeCurrent()}`, this.currentSpan());
  }

  private group(delim: DelimitedTree["delim"], what: string): DelimitedTree {
    const tree = this.cursor.current();
    if (tree?.type !== "delimited" || tree.delim !== delim) throw this.expected(what);
    this.bump();
    return tree;
  }

  private commaList<T>(group: DelimitedTree, parse: (p: Parser) => T): { items: T[]; trailingComma: boolean } {
    const p = new Parser(group.stream, group.openSpan);
    const items: T[] = [];
    let trailingComma = false;
    while (!p.atEnd()) {
      items.push(parse(p));
      trailingComma = false;
      if (p.atEnd()) break;
      p.expect(",");
      trailingComma = true;
    }
    return { items, trailingComma };
  }

  private inner<T>(group: DelimitedTree, parse: (p: Parser) => T): T {
    const p = new Parser(group.stream, group.openSpan);
    const result = parse(p);
    p.expectEof();
    return result;
  }

  // ==========================================================================
  // Names and paths
  // ==========================================================================

  parseIdent(): Ident {
    const token = this.cursor.token();
    if (token === undefined || !isIdentToken(token) || litFromToken(token) !== undefined) {
      throw this.expected("identifier");
    }
    this.bump();
    return ident(token.text, token.span);
  }

  parsePath(): Path {
    const start = this.currentSpan();
    const global = this.eat("::");
    const idents = [this.parseIdent()];
    while (this.eat("::")) {
      idents.push(this.parseIdent());
    }
    return pathFromIdents(idents, this.span(start), global);
  }

  private startsPath(): boolean {
    const token = this.cursor.token();
    if (token === undefined) return false;
    return isPunct(token, "::") || (isIdentToken(token) && litFromToken(token) === undefined);
  }

  /** `!` and a delimited group after an already parsed path. */
  private parseMacAfterPath(path: Path, start: Span): MacCall {
    this.expect("!");
    const tree = this.cursor.current();
    if (tree?.type !== "delimited") throw this.expected("one of `(`, `[`, or `{`");
    this.bump();
    return { path, delim: tree.delim, args: tree.stream, span: this.span(start) };
  }

  private checkMacAfterPath(): boolean {
    return this.check("!") && this.cursor.peek(1)?.type === "delimited";
  }

  // ==========================================================================
  // Attributes
  // ==========================================================================

  /** Zero or more `@path`, `@path(tokens)` or `@path = lit`. */
  parseOuterAttributes(): Attribute[] {
    const attrs: Attribute[] = [];
    while (this.check("@")) {
      const startPos = this.cursor.position;
      const start = this.currentSpan();
      this.bump();
      const path = this.parsePath();
      let args: AttrArgs = { type: "empty" };
      const tree = this.cursor.current();
      if (tree?.type === "delimited") {
        this.bump();
        args = { type: "delimited", delim: tree.delim, tokens: tree.stream };
      } else if (this.eat("=")) {
        const token = this.cursor.token();
        const lit = token === undefined ? undefined : litFromToken(token);
        if (lit === undefined) throw this.expected("literal");
        this.bump();
        args = { type: "eq", lit };
      }
      attrs.push({ id: mkAttrId(), path, args, tokens: this.cursor.since(startPos), span: this.span(start) });
    }
    return attrs;
  }

  parseMetaItem(): MetaItem {
    return parseMetaItem(this.cursor, this.currentSpan());
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  parseExpr(): Expr {
    return this.parseBinary(1);
  }

  private peekBinOp(): BinOp | undefined {
    const token = this.cursor.token();
    if (token === undefined || isIdentToken(token) || !isPunct(token, token.text)) return undefined;
    return asBinOp(token.text);
  }

  private parseBinary(minPrecedence: number): Expr {
    const start = this.currentSpan();
    let left = this.parseUnary();
    for (;;) {
      const op = this.peekBinOp();
      if (op === undefined || BINOP_PRECEDENCE[op] < minPrecedence) return left;
      this.bump();
      const right = this.parseBinary(BINOP_PRECEDENCE[op] + 1);
      left = mkExpr({ kind: "binary", op, left, right }, this.span(start));
    }
  }

  private parseUnary(): Expr {
    const start = this.currentSpan();
    for (const op of ["-", "!", "*"] as const) {
      if (this.eat(op)) {
        const operand = this.parseUnary();
        return mkExpr({ kind: "unary", op, operand }, this.span(start));
      }
    }
    if (this.eat("&")) {
      const mutable = this.eatKeyword("mut");
      const operand = this.parseUnary();
      return mkExpr({ kind: "ref", mutable, operand }, this.span(start));
    }
    return this.parsePostfix(this.parsePrimary(), start);
  }

  private parsePostfix(base: Expr, start: Span): Expr {
    let expr = base;
    for (;;) {
      const tree = this.cursor.current();
      if (tree?.type === "delimited" && tree.delim === "paren") {
        this.bump();
        const { items } = this.commaList(tree, (p) => p.parseExpr());
        expr = mkExpr({ kind: "call", callee: expr, args: items }, this.span(start));
      } else if (this.check(".")) {
        this.bump();
        const field = this.parseIdent();
        expr = mkExpr({ kind: "field", base: expr, ident: field }, this.span(start));
      } else {
        return expr;
      }
    }
  }

  private parsePrimary(): Expr {
    const start = this.currentSpan();
    const tree = this.cursor.current();
    if (tree === undefined) throw this.expected("expression");

    if (tree.type === "delimited") {
      this.bump();
      switch (tree.delim) {
        case "paren": {
          const { items, trailingComma } = this.commaList(tree, (p) => p.parseExpr());
          if (items.length === 1 && !trailingComma) {
            return mkExpr({ kind: "paren", inner: items[0] }, this.span(start));
          }
          return mkExpr({ kind: "tup", elems: items }, this.span(start));
        }
        case "bracket": {
          const { items } = this.commaList(tree, (p) => p.parseExpr());
          return mkExpr({ kind: "array", elems: items }, this.span(start));
        }
        case "brace":
          return mkExpr({ kind: "block", block: this.blockFromGroup(tree) }, this.span(start));
      }
    }

    const lit = litFromToken(tree.token);
    if (lit !== undefined) {
      this.bump();
      return mkExpr({ kind: "lit", lit }, lit.span);
    }

    if (this.startsPath()) {
      const path = this.parsePath();
      if (this.checkMacAfterPath()) {
        const mac = this.parseMacAfterPath(path, start);
        return mkExpr({ kind: "mac", mac }, mac.span);
      }
      const next = this.cursor.current();
      if (next?.type === "delimited" && next.delim === "brace" && looksLikeStructBody(next)) {
        this.bump();
        const { items } = this.commaList(next, (p) => p.parseField());
        return mkExpr({ kind: "struct", path, fields: items }, this.span(start));
      }
      return mkExpr({ kind: "path", path }, path.span);
    }

    throw this.expected("expression");
  }

  private parseField(): Field {
    const start = this.currentSpan();
    const name = this.parseIdent();
    this.expect(":");
    const expr = this.parseExpr();
    return { ident: name, expr, span: this.span(start) };
  }

  private blockFromGroup(group: DelimitedTree): Block {
    const stmts = this.inner(group, (p) => p.parseStmts());
    return { id: DUMMY_NODE_ID, stmts, span: spanTo(group.openSpan, group.closeSpan) };
  }

  parseBlock(): Block {
    return this.blockFromGroup(this.group("brace", "`{`"));
  }

  // ==========================================================================
  // Patterns and types
  // ==========================================================================

  parsePat(): Pat {
    const start = this.currentSpan();
    const tree = this.cursor.current();
    if (tree === undefined) throw this.expected("pattern");

    if (tree.type === "delimited") {
      if (tree.delim !== "paren") throw this.expected("pattern");
      this.bump();
      const { items } = this.commaList(tree, (p) => p.parsePat());
      return mkPat({ kind: "tuple", elems: items }, this.span(start));
    }

    const token = tree.token;
    if (isIdentNamed(token, "_")) {
      this.bump();
      return mkPat({ kind: "wild" }, token.span);
    }
    if (litFromToken(token) !== undefined || isPunct(token, "-")) {
      const expr = this.parseUnary();
      return mkPat({ kind: "lit", expr }, expr.span);
    }
    if (this.eatKeyword("mut")) {
      const name = this.parseIdent();
      return mkPat({ kind: "ident", ident: name, mutable: true }, this.span(start));
    }
    const path = this.parsePath();
    if (this.checkMacAfterPath()) {
      const mac = this.parseMacAfterPath(path, start);
      return mkPat({ kind: "mac", mac }, mac.span);
    }
    if (path.global || path.segments.length !== 1) {
      throw new ParseError("expected identifier pattern, found path", path.span);
    }
    return mkPat({ kind: "ident", ident: path.segments[0].ident, mutable: false }, path.span);
  }

  parseTy(): Ty {
    const start = this.currentSpan();
    const tree = this.cursor.current();
    if (tree === undefined) throw this.expected("type");

    if (tree.type === "delimited") {
      this.bump();
      switch (tree.delim) {
        case "paren": {
          const { items, trailingComma } = this.commaList(tree, (p) => p.parseTy());
          if (items.length === 1 && !trailingComma) return items[0];
          return mkTy({ kind: "tup", elems: items }, this.span(start));
        }
        case "bracket":
          return this.inner(tree, (p) => {
            const elem = p.parseTy();
            p.expect(";");
            const len = p.parseExpr();
            return mkTy({ kind: "array", elem, len }, spanTo(tree.openSpan, tree.closeSpan));
          });
        case "brace":
          throw new ParseError("expected type, found `{`", tree.openSpan);
      }
    }

    if (isIdentNamed(tree.token, "_")) {
      this.bump();
      return mkTy({ kind: "infer" }, tree.token.span);
    }
    if (this.eat("&")) {
      const mutable = this.eatKeyword("mut");
      const inner = this.parseTy();
      return mkTy({ kind: "ref", mutable, inner }, this.span(start));
    }
    if (!this.startsPath()) throw this.expected("type");
    const path = this.parsePath();
    if (this.checkMacAfterPath()) {
      const mac = this.parseMacAfterPath(path, start);
      return mkTy({ kind: "mac", mac }, mac.span);
    }
    return mkTy({ kind: "path", path }, path.span);
  }

  // ==========================================================================
  // Items
  // ==========================================================================

  parseItems(): Item[] {
    const items: Item[] = [];
    while (!this.atEnd()) {
      if (this.eat(";")) continue;
      items.push(this.parseItem());
    }
    return items;
  }

  parseItem(): Item {
    return this.parseItemAfterAttrs(this.parseOuterAttributes());
  }

  private parseItemAfterAttrs(attrs: Attribute[]): Item {
    const startPos = this.cursor.position;
    const start = this.currentSpan();
    const vis = this.eatKeyword("pub");
    const { name, kind } = this.parseItemKind(start);
    return {
      ...kind,
      ident: name,
      attrs,
      vis,
      tokens: this.cursor.since(startPos),
      id: DUMMY_NODE_ID,
      span: this.span(start),
    };
  }

  private parseItemKind(start: Span): { name: Ident; kind: ItemKind } {
    const keywordSpan = this.currentSpan();

    if (this.eatKeyword("const")) {
      const name = this.parseIdent();
      this.expect(":");
      const ty = this.parseTy();
      this.expect("=");
      const expr = this.parseExpr();
      this.expect(";");
      return { name, kind: { kind: "const", ty, expr } };
    }
    if (this.eatKeyword("static")) {
      const mutable = this.eatKeyword("mut");
      const name = this.parseIdent();
      this.expect(":");
      const ty = this.parseTy();
      this.expect("=");
      const expr = this.parseExpr();
      this.expect(";");
      return { name, kind: { kind: "static", ty, expr, mutable } };
    }
    if (this.eatKeyword("fn")) {
      const name = this.parseIdent();
      const decl = this.parseFnDecl();
      const body = this.parseBlock();
      return { name, kind: { kind: "fn", decl, body } };
    }
    if (this.eatKeyword("struct")) {
      const name = this.parseIdent();
      return { name, kind: { kind: "struct", data: this.parseStructData() } };
    }
    if (this.eatKeyword("union")) {
      const name = this.parseIdent();
      return { name, kind: { kind: "union", data: this.parseStructData() } };
    }
    if (this.eatKeyword("enum")) {
      const name = this.parseIdent();
      const body = this.group("brace", "`{`");
      const { items } = this.commaList(body, (p) => p.parseVariant());
      return { name, kind: { kind: "enum", variants: items } };
    }
    if (this.eatKeyword("mod")) {
      const name = this.parseIdent();
      if (this.eat(";")) return { name, kind: { kind: "mod", items: [], inline: false } };
      const body = this.group("brace", "`{` or `;`");
      return { name, kind: { kind: "mod", items: this.inner(body, (p) => p.parseItems()), inline: true } };
    }
    if (this.eatKeyword("trait")) {
      const name = this.parseIdent();
      const body = this.group("brace", "`{`");
      return { name, kind: { kind: "trait", items: this.inner(body, (p) => p.parseTraitItems()) } };
    }
    if (this.eatKeyword("impl")) {
      const first = this.parseTy();
      let traitRef: Path | undefined;
      let selfTy = first;
      if (this.eatKeyword("for")) {
        if (first.kind !== "path") throw new ParseError("expected a trait, found type", first.span);
        traitRef = first.path;
        selfTy = this.parseTy();
      }
      const body = this.group("brace", "`{`");
      const items = this.inner(body, (p) => p.parseImplItems());
      return { name: ident("", keywordSpan), kind: { kind: "impl", traitRef, selfTy, items } };
    }
    if (this.eatKeyword("extern")) {
      const abiToken = this.cursor.token();
      let abi: string | undefined;
      if (abiToken !== undefined && isStringToken(abiToken)) {
        this.bump();
        abi = abiToken.value;
      }
      const body = this.group("brace", "`{`");
      const items = this.inner(body, (p) => p.parseForeignItems());
      return { name: ident("", keywordSpan), kind: { kind: "foreign-mod", abi, items } };
    }
    if (this.eatKeyword("type")) {
      const name = this.parseIdent();
      this.expect("=");
      const ty = this.parseTy();
      this.expect(";");
      return { name, kind: { kind: "type-alias", ty } };
    }
    if (this.eatKeyword("macro")) {
      const name = this.parseIdent();
      this.expect("=");
      const target = this.parsePath();
      this.expect(";");
      return { name, kind: { kind: "macro-def", target } };
    }
    if (this.startsPath()) {
      const mac = this.parseItemMac(start);
      return { name: ident("", mac.path.span), kind: { kind: "mac", mac } };
    }
    throw this.expected("item");
  }

  private parseItemMac(start: Span): MacCall {
    const path = this.parsePath();
    const mac = this.parseMacAfterPath(path, start);
    if (mac.delim !== "brace") this.expect(";");
    return mac;
  }

  private parseFnDecl(): FnDecl {
    const params = this.group("paren", "`(`");
    const { items } = this.commaList(params, (p) => p.parseParam());
    const output = this.eat("->") ? this.parseTy() : undefined;
    return { inputs: items, output };
  }

  private parseParam(): Param {
    const start = this.currentSpan();
    const selfTy = (sp: Span): Ty => mkTy({ kind: "path", path: pathFromIdents([ident("Self", sp)], sp) }, sp);
    if (this.checkKeyword("self")) {
      const name = this.parseIdent();
      return { pat: mkPat({ kind: "ident", ident: name, mutable: false }, name.span), ty: selfTy(name.span), selfKind: "value", span: name.span };
    }
    const next = this.cursor.token(1);
    if (this.check("&") && next !== undefined && isIdentNamed(next, "self")) {
      this.bump();
      const name = this.parseIdent();
      const sp = this.span(start);
      const ty = mkTy({ kind: "ref", mutable: false, inner: selfTy(name.span) }, sp);
      return { pat: mkPat({ kind: "ident", ident: name, mutable: false }, name.span), ty, selfKind: "ref", span: sp };
    }
    const pat = this.parsePat();
    this.expect(":");
    const ty = this.parseTy();
    return { pat, ty, span: this.span(start) };
  }

  private parseStructData(): VariantData {
    if (this.eat(";")) return { type: "unit" };
    const tree = this.cursor.current();
    if (tree?.type === "delimited" && tree.delim === "paren") {
      this.bump();
      const { items } = this.commaList(tree, (p) => p.parseFieldDef(false));
      this.expect(";");
      return { type: "tuple", fields: items };
    }
    const body = this.group("brace", "`{`, `(`, or `;`");
    return { type: "struct", fields: this.commaList(body, (p) => p.parseFieldDef(true)).items };
  }

  private parseFieldDef(named: boolean): FieldDef {
    const start = this.currentSpan();
    const vis = this.eatKeyword("pub");
    if (!named) {
      const ty = this.parseTy();
      return { ty, vis, span: this.span(start) };
    }
    const name = this.parseIdent();
    this.expect(":");
    const ty = this.parseTy();
    return { ident: name, ty, vis, span: this.span(start) };
  }

  private parseVariant(): Variant {
    const attrs = this.parseOuterAttributes();
    const start = this.currentSpan();
    const name = this.parseIdent();
    const tree = this.cursor.current();
    let data: VariantData = { type: "unit" };
    if (tree?.type === "delimited" && tree.delim === "paren") {
      this.bump();
      data = { type: "tuple", fields: this.commaList(tree, (p) => p.parseFieldDef(false)).items };
    } else if (tree?.type === "delimited" && tree.delim === "brace") {
      this.bump();
      data = { type: "struct", fields: this.commaList(tree, (p) => p.parseFieldDef(true)).items };
    }
    return { ident: name, data, attrs, span: this.span(start) };
  }

  parseImplItems(): ImplItem[] {
    const items: ImplItem[] = [];
    while (!this.atEnd()) items.push(this.parseImplItem());
    return items;
  }

  parseImplItem(): ImplItem {
    const attrs = this.parseOuterAttributes();
    const startPos = this.cursor.position;
    const start = this.currentSpan();
    const vis = this.eatKeyword("pub");
    const common = (name: Ident) => ({
      ident: name,
      attrs,
      vis,
      tokens: this.cursor.since(startPos),
      id: DUMMY_NODE_ID,
      span: this.span(start),
    });

    if (this.eatKeyword("const")) {
      const name = this.parseIdent();
      this.expect(":");
      const ty = this.parseTy();
      this.expect("=");
      const expr = this.parseExpr();
      this.expect(";");
      return { kind: "const", ty, expr, ...common(name) };
    }
    if (this.eatKeyword("fn")) {
      const name = this.parseIdent();
      const decl = this.parseFnDecl();
      const body = this.parseBlock();
      return { kind: "fn", decl, body, ...common(name) };
    }
    if (this.eatKeyword("type")) {
      const name = this.parseIdent();
      this.expect("=");
      const ty = this.parseTy();
      this.expect(";");
      return { kind: "type", ty, ...common(name) };
    }
    if (!this.startsPath()) throw this.expected("impl item");
    const mac = this.parseItemMac(start);
    return { kind: "mac", mac, ...common(ident("", mac.path.span)) };
  }

  parseTraitItems(): TraitItem[] {
    const items: TraitItem[] = [];
    while (!this.atEnd()) items.push(this.parseTraitItem());
    return items;
  }

  parseTraitItem(): TraitItem {
    const attrs = this.parseOuterAttributes();
    const startPos = this.cursor.position;
    const start = this.currentSpan();
    const vis = this.eatKeyword("pub");
    const common = (name: Ident) => ({
      ident: name,
      attrs,
      vis,
      tokens: this.cursor.since(startPos),
      id: DUMMY_NODE_ID,
      span: this.span(start),
    });

    if (this.eatKeyword("const")) {
      const name = this.parseIdent();
      this.expect(":");
      const ty = this.parseTy();
      const expr = this.eat("=") ? this.parseExpr() : undefined;
      this.expect(";");
      return { kind: "const", ty, expr, ...common(name) };
    }
    if (this.eatKeyword("fn")) {
      const name = this.parseIdent();
      const decl = this.parseFnDecl();
      const body = this.eat(";") ? undefined : this.parseBlock();
      return { kind: "fn", decl, body, ...common(name) };
    }
    if (this.eatKeyword("type")) {
      const name = this.parseIdent();
      this.expect(";");
      return { kind: "type", ...common(name) };
    }
    if (!this.startsPath()) throw this.expected("trait item");
    const mac = this.parseItemMac(start);
    return { kind: "mac", mac, ...common(ident("", mac.path.span)) };
  }

  parseForeignItems(): ForeignItem[] {
    const items: ForeignItem[] = [];
    while (!this.atEnd()) items.push(this.parseForeignItem());
    return items;
  }

  parseForeignItem(): ForeignItem {
    const attrs = this.parseOuterAttributes();
    const startPos = this.cursor.position;
    const start = this.currentSpan();
    const vis = this.eatKeyword("pub");
    const common = (name: Ident) => ({
      ident: name,
      attrs,
      vis,
      tokens: this.cursor.since(startPos),
      id: DUMMY_NODE_ID,
      span: this.span(start),
    });

    if (this.eatKeyword("fn")) {
      const name = this.parseIdent();
      const decl = this.parseFnDecl();
      this.expect(";");
      return { kind: "fn", decl, ...common(name) };
    }
    if (this.eatKeyword("static")) {
      const mutable = this.eatKeyword("mut");
      const name = this.parseIdent();
      this.expect(":");
      const ty = this.parseTy();
      this.expect(";");
      return { kind: "static", ty, mutable, ...common(name) };
    }
    if (this.eatKeyword("type")) {
      const name = this.parseIdent();
      this.expect(";");
      return { kind: "type", ...common(name) };
    }
    if (!this.startsPath()) throw this.expected("foreign item");
    const mac = this.parseItemMac(start);
    return { kind: "mac", mac, ...common(ident("", mac.path.span)) };
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  parseStmts(): Stmt[] {
    const stmts: Stmt[] = [];
    while (!this.atEnd()) {
      if (this.eat(";")) continue;
      stmts.push(this.parseStmt());
    }
    return stmts;
  }

  parseStmt(): Stmt {
    const start = this.currentSpan();
    const attrs = this.parseOuterAttributes();

    if (this.eatKeyword("let")) {
      const pat = this.parsePat();
      const ty = this.eat(":") ? this.parseTy() : undefined;
      const init = this.eat("=") ? this.parseExpr() : undefined;
      this.expect(";");
      return mkStmt({ kind: "local", pat, ty, init, attrs }, this.span(start));
    }

    const token = this.cursor.token();
    if (token !== undefined && isIdentToken(token) && ITEM_KEYWORDS.has(token.text) && !this.startsMacCall()) {
      const item = this.parseItemAfterAttrs(attrs);
      return mkStmt({ kind: "item", item }, item.span);
    }

    const mac = this.tryParseMacStmt(start, attrs);
    if (mac !== undefined) return mac;

    const expr = this.parseExpr();
    expr.attrs = attrs;
    if (this.eat(";")) return mkStmt({ kind: "semi", expr }, this.span(start));
    if (this.atEnd() || expr.kind === "block") return mkStmt({ kind: "expr", expr }, this.span(start));
    throw this.expected("`;`");
  }

  private startsMacCall(): boolean {
    const next = this.cursor.token(1);
    return next !== undefined && isPunct(next, "!");
  }

  /**
   * A macro call in statement position is a statement when it ends the
   * input, is followed by `;`, or is brace-delimited. Anything else is the
   * start of an expression and the cursor is rewound.
   */
  private tryParseMacStmt(start: Span, attrs: Attribute[]): Stmt | undefined {
    if (!this.startsPath()) return undefined;
    const position = this.cursor.position;
    const prevSpan = this.prevSpan;
    const path = this.parsePath();
    if (!this.checkMacAfterPath()) {
      this.rewind(position, prevSpan);
      return undefined;
    }
    const mac = this.parseMacAfterPath(path, start);
    if (this.eat(";")) return mkStmt({ kind: "mac", mac, style: "semicolon", attrs }, this.span(start));
    if (mac.delim === "brace") return mkStmt({ kind: "mac", mac, style: "braces", attrs }, this.span(start));
    if (this.atEnd()) return mkStmt({ kind: "mac", mac, style: "no-semicolon", attrs }, this.span(start));
    this.rewind(position, prevSpan);
    return undefined;
  }

  private rewind(position: number, prevSpan: Span): void {
    this.cursor.reset(position);
    this.prevSpan = prevSpan;
  }

  // ==========================================================================
  // Fragments
  // ==========================================================================

  /** Parse the whole remaining input as a fragment of `kind`, without requiring the end of input. */
  parseFragment(kind: AstFragmentKind): AstFragment {
    switch (kind) {
      case "expr":
        return { kind, expr: this.parseExpr() };
      case "pat":
        return { kind, pat: this.parsePat() };
      case "ty":
        return { kind, ty: this.parseTy() };
      case "items":
        return { kind, items: this.parseItems() };
      case "stmts":
        return { kind, stmts: this.parseStmts() };
      case "impl-items":
        return { kind, items: this.parseImplItems() };
      case "trait-items":
        return { kind, items: this.parseTraitItems() };
      case "foreign-items":
        return { kind, items: this.parseForeignItems() };
      default:
        return unreachable(kind, "fragment kind");
    }
  }
}

function looksLikeStructBody(group: DelimitedTree): boolean {
  if (group.stream.isEmpty()) return true;
  const first = group.stream.get(0);
  const second = group.stream.get(1);
  return (
    first?.type === "token" &&
    isIdentToken(first.token) &&
    second?.type === "token" &&
    isPunct(second.token, ":")
  );
}

/** Register `text` in the session source map and parse it as a crate. */
export function parseCrateFromSource(sess: ParseSess, fileName: FileName, text: string): Crate {
  const file = sess.sourceMap.addFile(fileName, text);
  const whole = span(file.startPos, file.endPos);
  const stream = TokenStream.parse(text, { base: file.startPos });
  const items = new Parser(stream, whole).parseItems();
  return { items, attrs: [], span: whole };
}

