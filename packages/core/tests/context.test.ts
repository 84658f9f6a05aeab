/**
 * Tests for the expansion context and the argument helpers built-in macros use
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  DUMMY_SP,
  ExpansionConfig,
  ExplicitBug,
  ExtCtxt,
  MacEager,
  MacroResolver,
  ParseSess,
  SyntaxExtension,
  TokenStream,
  checkZeroTts,
  getExprsFromTts,
  getSingleStrFromTts,
  ident,
  parseCrateFromSource,
  printExpr,
  realFileName,
  span,
  type Span,
} from "@expandite/core";

function setup() {
  const sess = new ParseSess();
  const resolver = new MacroResolver(sess);
  const ecx = new ExtCtxt(sess, ExpansionConfig.default("demo"), resolver);
  return { sess, resolver, ecx };
}

function errorsOf(sess: ParseSess): string[] {
  return sess.spanDiagnostic.diagnostics().map((d) => d.message);
}

describe("ExtCtxt", () => {
  it("should name the outermost call site as the cause", () => {
    const { sess, resolver, ecx } = setup();
    const causes: Array<Span | undefined> = [];
    const probe = SyntaxExtension.default(
      {
        type: "legacy-bang",
        expander: (cx, sp) => {
          causes.push(cx.expansionCause());
          return MacEager.expr(cx.exprNum(sp, 0));
        },
      },
      "2018",
    );
    // `relay!` emits `probe!()` with spans that carry only its own mark.
    const relay = SyntaxExtension.default(
      { type: "bang", expander: (cx) => TokenStream.parse("probe!()", { fixedSpan: cx.withDefSiteCtxt(DUMMY_SP) }) },
      "2018",
    );
    resolver.registerBuiltinMacro(ident("probe", DUMMY_SP), probe);
    resolver.registerBuiltinMacro(ident("relay", DUMMY_SP), relay);

    const crate = parseCrateFromSource(sess, realFileName("/src/lib.ex"), "const A: u32 = relay!();");
    ecx.monotonicExpander().expandCrate(crate);
    expect(causes).toEqual([span(16, 24)]);
  });

  it("should walk through every nested expansion to the outermost call", () => {
    const { sess, resolver, ecx } = setup();
    const causes: Array<Span | undefined> = [];
    const probe = SyntaxExtension.default(
      {
        type: "legacy-bang",
        expander: (cx, sp) => {
          causes.push(cx.expansionCause());
          return MacEager.expr(cx.exprNum(sp, 0));
        },
      },
      "2018",
    );
    const relayTo = (target: string) =>
      SyntaxExtension.default(
        { type: "bang", expander: (cx) => TokenStream.parse(`${target}!()`, { fixedSpan: cx.withDefSiteCtxt(DUMMY_SP) }) },
        "2018",
      );
    resolver.registerBuiltinMacro(ident("probe", DUMMY_SP), probe);
    resolver.registerBuiltinMacro(ident("middle", DUMMY_SP), relayTo("probe"));
    resolver.registerBuiltinMacro(ident("outer", DUMMY_SP), relayTo("middle"));

    const crate = parseCrateFromSource(sess, realFileName("/src/lib.ex"), "const A: u32 = outer!();");
    ecx.monotonicExpander().expandCrate(crate);
    expect(causes).toEqual([span(16, 24)]);
  });

  it("should stop at an include frame", () => {
    const { sess, resolver, ecx } = setup();
    const causes: Array<Span | undefined> = [];
    const include = SyntaxExtension.default(
      {
        type: "legacy-bang",
        expander: (cx, sp) => {
          causes.push(cx.expansionCause());
          return MacEager.expr(cx.exprNum(sp, 0));
        },
      },
      "2018",
    );
    const relay = SyntaxExtension.default(
      { type: "bang", expander: (cx) => TokenStream.parse("include!()", { fixedSpan: cx.withDefSiteCtxt(DUMMY_SP) }) },
      "2018",
    );
    resolver.registerBuiltinMacro(ident("include", DUMMY_SP), include);
    resolver.registerBuiltinMacro(ident("relay", DUMMY_SP), relay);

    const crate = parseCrateFromSource(sess, realFileName("/src/lib.ex"), "const A: u32 = relay!();");
    ecx.monotonicExpander().expandCrate(crate);
    expect(causes).toEqual([undefined]);
  });

  it("should have no cause outside any expansion", () => {
    const { ecx } = setup();
    expect(ecx.expansionCause()).toBeUndefined();
    expect(ecx.callSite()).toEqual(DUMMY_SP);
  });

  it("should restore the expansion frame after a throw", () => {
    const { ecx } = setup();
    const outer = ecx.currentExpansion;
    const frame = { ...outer, id: ecx.parseSess.hygiene.freshExpn(), depth: 1 };
    expect(() =>
      ecx.withExpansion(frame, () => {
        throw new Error("inside");
      }),
    ).toThrow("inside");
    expect(ecx.currentExpansion).toBe(outer);
  });

  describe("resolvePath", () => {
    it("should resolve relative to the invoking file", () => {
      const { sess, ecx } = setup();
      const file = sess.sourceMap.addFile(realFileName("/proj/src/lib.ex"), "x");
      expect(ecx.resolvePath("data/a.txt", span(file.startPos, file.startPos + 1))).toBe("/proj/src/data/a.txt");
    });

    it("should keep absolute paths", () => {
      const { ecx } = setup();
      expect(ecx.resolvePath("/etc/a.txt", DUMMY_SP)).toBe("/etc/a.txt");
    });

    it("should treat a relative path in a non-file source as a bug", () => {
      const { ecx } = setup();
      expect(() => ecx.resolvePath("a.txt", DUMMY_SP)).toThrow(ExplicitBug);
      expect(() => ecx.resolvePath("a.txt", DUMMY_SP)).toThrow(
        "internal error: cannot resolve relative path in non-file source `<anon>`",
      );
    });
  });

  it("should group trace notes by span and emit them once", () => {
    const { sess, ecx } = setup();
    ecx.traceNote(span(1, 2), "expanding `a! {  }`");
    ecx.traceNote(span(5, 6), "expanding `b! {  }`");
    ecx.traceNote(span(1, 2), "to `1`");
    ecx.traceMacrosDiag();
    ecx.traceMacrosDiag();

    const notes = sess.spanDiagnostic.diagnostics();
    expect(notes.map((d) => [d.level, d.message, d.span])).toEqual([
      ["note", "trace_macro", span(1, 2)],
      ["note", "trace_macro", span(5, 6)],
    ]);
    expect(notes[0]?.children.map((c) => c.message)).toEqual(["expanding `a! {  }`", "to `1`"]);
  });

  it("should toggle tracing on its configuration", () => {
    const { ecx } = setup();
    expect(ecx.traceMacros()).toBe(false);
    ecx.setTraceMacros(true);
    expect(ecx.ecfg.traceMac).toBe(true);
  });

  it("should root standard paths at the definition site", () => {
    const { ecx } = setup();
    expect(ecx.stdPath(["clone", "Clone"]).map((i) => i.name)).toEqual(["$crate", "clone", "Clone"]);
  });
});

describe("argument helpers", () => {
  let sess: ParseSess;
  let resolver: MacroResolver;
  let ecx: ExtCtxt;
  const sp = span(1, 2);

  beforeEach(() => {
    ({ sess, resolver, ecx } = setup());
  });

  it("should reject arguments where none are taken", () => {
    checkZeroTts(ecx, sp, TokenStream.empty(), "m!");
    checkZeroTts(ecx, sp, TokenStream.parse("x"), "m!");
    expect(errorsOf(sess)).toEqual(["m! takes no arguments"]);
  });

  it("should read a single string with an optional trailing comma", () => {
    expect(getSingleStrFromTts(ecx, sp, TokenStream.parse('"a",'), "m!")).toBe("a");
    expect(errorsOf(sess)).toEqual([]);
  });

  it("should report a missing or extra argument", () => {
    expect(getSingleStrFromTts(ecx, sp, TokenStream.empty(), "m!")).toBeUndefined();
    expect(getSingleStrFromTts(ecx, sp, TokenStream.parse('"a" "b"'), "m!")).toBe("a");
    expect(errorsOf(sess)).toEqual(["m! takes 1 argument", "m! takes 1 argument"]);
  });

  it("should require a string literal", () => {
    expect(getSingleStrFromTts(ecx, sp, TokenStream.parse("1"), "m!")).toBeUndefined();
    expect(errorsOf(sess)).toEqual(["argument must be a string literal"]);
  });

  it("should expand each argument eagerly", () => {
    const seven = SyntaxExtension.default(
      { type: "legacy-bang", expander: (cx, at) => MacEager.expr(cx.exprNum(at, 7)) },
      "2018",
    );
    resolver.registerBuiltinMacro(ident("seven", DUMMY_SP), seven);
    const exprs = getExprsFromTts(ecx, sp, TokenStream.parse("seven!(), 1 + 1,"));
    expect(exprs?.map(printExpr)).toEqual(["7", "1 + 1"]);
  });

  it("should require commas between arguments", () => {
    expect(getExprsFromTts(ecx, sp, TokenStream.parse("1 2"))).toBeUndefined();
    expect(errorsOf(sess)).toEqual(["expected token: `,`"]);
  });
});
