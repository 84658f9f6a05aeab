/**
 * File Inclusion Macros
 *
 * - `include_str!("path")` embeds a file's contents as a string literal
 * - `include!("path")` parses a file as an expression or as items, whichever
 *   the call site expects
 *
 * Relative paths are resolved against the file containing the invocation.
 * Included files are added to the session source map, so spans inside them
 * point at the included text.
 */

import * as fs from "fs";
import {
  DummyResult,
  MacEager,
  MacResult,
  ParseError,
  Parser,
  TokenStream,
  getSingleStrFromTts,
  realFileName,
  span,
  type Expr,
  type ExtCtxt,
  type Item,
  type LegacyBangExpander,
  type Span,
} from "@expandite/core";

type ReadResult = { ok: true; path: string; text: string } | { ok: false };

/** Resolve and read the file named by the macro's single string argument. */
function readArgumentFile(ecx: ExtCtxt, sp: Span, tts: TokenStream, name: string): ReadResult {
  const arg = getSingleStrFromTts(ecx, sp, tts, name);
  if (arg === undefined) return { ok: false };
  const path = ecx.resolvePath(arg, sp);

  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(path);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    ecx.spanErr(sp, `couldn't read ${path}: ${reason}`);
    return { ok: false };
  }

  try {
    return { ok: true, path, text: new TextDecoder("utf-8", { fatal: true }).decode(bytes) };
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    ecx.spanErr(sp, `${path} wasn't a utf-8 file`);
    return { ok: false };
  }
}

export const expandIncludeStr: LegacyBangExpander = (ecx, callSite, tts) => {
  const sp = ecx.withDefSiteCtxt(callSite);
  const file = readArgumentFile(ecx, sp, tts, "include_str!");
  if (!file.ok) return DummyResult.any(sp);
  ecx.sourceMap.addFile(realFileName(file.path), file.text);
  return MacEager.expr(ecx.exprStr(sp, file.text));
};

/** Parses the included file lazily, as whatever fragment the call site asks for. */
class IncludeResult extends MacResult {
  private used = false;

  constructor(
    private readonly ecx: ExtCtxt,
    private readonly tokens: TokenStream,
    private readonly fileSpan: Span,
    private readonly sp: Span,
  ) {
    super();
  }

  private parser(): Parser | undefined {
    if (this.used) return undefined;
    this.used = true;
    return new Parser(this.tokens, this.fileSpan);
  }

  override makeExpr(): Expr | undefined {
    const parser = this.parser();
    if (parser === undefined) return undefined;
    let expr: Expr;
    try {
      expr = parser.parseExpr();
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.ecx.emitParseError(error);
      return DummyResult.rawExpr(this.sp, true);
    }
    if (!parser.atEnd()) {
      this.ecx.spanErr(parser.currentSpan(), "include macro expected single expression in source");
    }
    return expr;
  }

  override makeItems(): Item[] | undefined {
    const parser = this.parser();
    if (parser === undefined) return undefined;
    try {
      return parser.parseItems();
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.ecx.emitParseError(error);
      return [];
    }
  }
}

export const expandInclude: LegacyBangExpander = (ecx, callSite, tts) => {
  const sp = ecx.withDefSiteCtxt(callSite);
  const file = readArgumentFile(ecx, sp, tts, "include!");
  if (!file.ok) return DummyResult.any(sp);

  const source = ecx.sourceMap.addFile(realFileName(file.path), file.text);
  let tokens: TokenStream;
  try {
    tokens = TokenStream.parse(file.text, { base: source.startPos });
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    ecx.emitParseError(error);
    return DummyResult.any(sp);
  }
  return new IncludeResult(ecx, tokens, span(source.startPos, source.endPos), sp);
};
