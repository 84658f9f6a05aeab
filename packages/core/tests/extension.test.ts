/**
 * Tests for syntax extensions, expansion results and definition attributes
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  DUMMY_SP,
  DummyResult,
  MacEager,
  ParseSess,
  Parser,
  SyntaxExtension,
  TokenStream,
  isUsed,
  mkExpr,
  printExpr,
  span,
  type Attribute,
  type SyntaxExtensionKind,
} from "@expandite/core";

const BANG: SyntaxExtensionKind = { type: "legacy-bang", expander: (_ecx, sp) => DummyResult.any(sp) };

function attrs(source: string): Attribute[] {
  return new Parser(TokenStream.parse(source, { base: 1 })).parseOuterAttributes();
}

function numExpr(value: number) {
  return mkExpr({ kind: "lit", lit: { kind: { type: "num", value, text: String(value) }, span: DUMMY_SP } }, DUMMY_SP);
}

describe("SyntaxExtension", () => {
  let sess: ParseSess;

  beforeEach(() => {
    sess = new ParseSess();
  });

  function build(source: string, name = "m", kind: SyntaxExtensionKind = BANG): SyntaxExtension {
    return SyntaxExtension.fromAttributes(sess, kind, span(1, 2), ["helper"], "2015", name, attrs(source));
  }

  function messages(): string[] {
    return sess.spanDiagnostic.diagnostics().map((d) => d.message);
  }

  it("should use neutral defaults", () => {
    const ext = SyntaxExtension.default(BANG, "2018");
    expect(ext.span).toEqual(DUMMY_SP);
    expect(ext.allowInternalUnstable).toBeUndefined();
    expect(ext.allowInternalUnsafe).toBe(false);
    expect(ext.localInnerMacros).toBe(false);
    expect(ext.helperAttrs).toEqual([]);
    expect(ext.isBuiltin).toBe(false);
    expect(ext.isDeriveCopy).toBe(false);
    expect(ext.edition).toBe("2018");
  });

  it("should map every kind to its invocation category", () => {
    const derive: SyntaxExtensionKind = { type: "legacy-derive", expander: () => [] };
    const attr: SyntaxExtensionKind = { type: "attr", expander: (_ecx, _sp, _a, item) => item };
    const tokenBang: SyntaxExtensionKind = { type: "bang", expander: (_ecx, _sp, input) => input };
    const legacyAttr: SyntaxExtensionKind = { type: "legacy-attr", expander: (_ecx, _sp, _meta, item) => [item] };
    const tokenDerive: SyntaxExtensionKind = { type: "derive", expander: () => TokenStream.empty() };
    expect(SyntaxExtension.default(BANG, "2018").macroKind()).toBe("bang");
    expect(SyntaxExtension.default(tokenBang, "2018").macroKind()).toBe("bang");
    expect(SyntaxExtension.default(attr, "2018").macroKind()).toBe("attr");
    expect(SyntaxExtension.default(legacyAttr, "2018").macroKind()).toBe("attr");
    expect(SyntaxExtension.nonMacroAttr(true, "2018").macroKind()).toBe("attr");
    expect(SyntaxExtension.default(derive, "2018").macroKind()).toBe("derive");
    expect(SyntaxExtension.default(tokenDerive, "2018").macroKind()).toBe("derive");
    expect(SyntaxExtension.dummyDerive("2018").macroKind()).toBe("derive");
  });

  it("should read metadata from attributes", () => {
    const ext = build("@allow_internal_unstable(foo, bar) @allow_internal_unsafe @macro_export(local_inner_macros)");
    expect(ext.allowInternalUnstable).toEqual(["foo", "bar"]);
    expect(ext.allowInternalUnsafe).toBe(true);
    expect(ext.localInnerMacros).toBe(true);
    expect(ext.helperAttrs).toEqual(["helper"]);
    expect(ext.edition).toBe("2015");
    expect(ext.span).toEqual(span(1, 2));
    expect(messages()).toEqual([]);
  });

  it("should warn about a bare allow_internal_unstable and allow everything", () => {
    const ext = build("@allow_internal_unstable");
    expect(ext.allowInternalUnstable).toEqual(["allow_internal_unstable_backcompat_hack"]);
    expect(sess.spanDiagnostic.diagnostics()[0]?.level).toBe("warning");
  });

  it("should report non-identifier feature names and keep the rest", () => {
    const ext = build('@allow_internal_unstable(foo, "bar")');
    expect(ext.allowInternalUnstable).toEqual(["foo"]);
    expect(messages()).toEqual(["allow internal unstable expects feature names"]);
  });

  it("should only flag the built-in Copy as derive-copy", () => {
    const derive: SyntaxExtensionKind = { type: "legacy-derive", expander: () => [] };
    expect(build("@builtin_macro", "Copy", derive).isDeriveCopy).toBe(true);
    expect(build("@builtin_macro", "Clone", derive).isDeriveCopy).toBe(false);
    expect(build("", "Copy", derive).isDeriveCopy).toBe(false);
    expect(build("@builtin_macro", "Clone", derive).isBuiltin).toBe(true);
  });

  it("should read stability and deprecation", () => {
    const source = '@unstable(feature = "fancy", issue = "42") @deprecated(since = "1.2", note = "use other")';
    const parsed = attrs(source);
    const ext = SyntaxExtension.fromAttributes(sess, BANG, DUMMY_SP, [], "2018", "m", parsed);
    expect(ext.stability).toEqual({ level: { type: "unstable", reason: undefined, issue: "42" }, feature: "fancy" });
    expect(ext.deprecation).toEqual({ since: "1.2", note: "use other" });
    expect(parsed.every((attr) => isUsed(sess, attr))).toBe(true);
  });

  it("should report malformed stability attributes", () => {
    build('@stable(feature = "a") @stable(feature = "a", since = "1.0")');
    expect(sess.spanDiagnostic.diagnostics().map((d) => [d.code, d.message])).toEqual([
      ["E0542", "missing 'since'"],
      ["E0544", "multiple stability levels"],
    ]);
  });

  it("should record provenance for an invocation", () => {
    const ext = build("@allow_internal_unsafe");
    const data = ext.expnData(3, span(10, 20), "m");
    expect(data).toMatchObject({
      kind: { type: "macro", macroKind: "bang", descr: "m" },
      parent: 3,
      callSite: span(10, 20),
      defSite: span(1, 2),
      allowInternalUnsafe: true,
      edition: "2015",
    });
  });
});

describe("MacEager", () => {
  it("should hand out its result once", () => {
    const result = MacEager.expr(numExpr(1));
    expect(result.makeExpr()?.kind).toBe("lit");
    expect(result.makeExpr()).toBeUndefined();
  });

  it("should not offer kinds it was not given", () => {
    const result = MacEager.items([]);
    expect(result.makeExpr()).toBeUndefined();
    expect(result.makeTy()).toBeUndefined();

    const exprOnly = MacEager.expr(numExpr(1));
    expect(exprOnly.makeTy()).toBeUndefined();
    expect(exprOnly.makeItems()).toBeUndefined();
    expect(exprOnly.makeExpr()?.kind).toBe("lit");
  });

  it("should turn a literal expression into a pattern", () => {
    const pat = MacEager.expr(numExpr(7)).makePat();
    expect(pat?.kind).toBe("lit");
  });

  it("should reject a non-literal expression as a pattern", () => {
    const path = mkExpr({ kind: "tup", elems: [] }, DUMMY_SP);
    expect(MacEager.expr(path).makePat()).toBeUndefined();
  });

  it("should wrap an expression as a statement", () => {
    const stmts = MacEager.expr(numExpr(1)).makeStmts();
    expect(stmts).toHaveLength(1);
    expect(stmts?.[0]?.kind).toBe("expr");
  });
});

describe("DummyResult", () => {
  it("should produce placeholders of every kind", () => {
    const sp = span(4, 8);
    const error = DummyResult.any(sp);
    expect(printExpr(error.makeExpr())).toBe("(/*ERROR*/)");
    expect(error.makeItems()).toEqual([]);
    expect(error.makePat().kind).toBe("wild");
    expect(error.makeTy().kind).toBe("err");
    expect(error.makeExpr().span).toEqual(sp);
  });

  it("should produce unit when no error was reported", () => {
    const valid = DummyResult.anyValid(DUMMY_SP);
    expect(printExpr(valid.makeExpr())).toBe("()");
    expect(valid.makeTy().kind).toBe("tup");
    expect(valid.isError).toBe(false);
  });

  it("should give a single unit statement", () => {
    const stmts = DummyResult.anyValid(DUMMY_SP).makeStmts();
    expect(stmts).toHaveLength(1);
    const [stmt] = stmts;
    expect(stmt?.kind).toBe("expr");
    expect(stmt?.kind === "expr" ? printExpr(stmt.expr) : undefined).toBe("()");
  });
});
