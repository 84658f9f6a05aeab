/**
 * Tests for the macro expander and the reference resolver
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import {
  DUMMY_NODE_ID,
  DUMMY_SP,
  ExpansionConfig,
  ExtCtxt,
  FatalError,
  MacEager,
  MacroResolver,
  ParseSess,
  SyntaxExtension,
  TokenStream,
  ident,
  parseCrateFromSource,
  printItem,
  realFileName,
  type SyntaxExtensionKind,
} from "@expandite/core";

function ext(kind: SyntaxExtensionKind, helperAttrs: string[] = []): SyntaxExtension {
  return new SyntaxExtension(kind, "2018", { helperAttrs });
}

/** `seven!()` expands to the literal 7. */
const SEVEN = ext({ type: "legacy-bang", expander: (ecx, sp) => MacEager.expr(ecx.exprNum(sp, 7)) });

/** A bang macro whose output is `text`, spanned at the call site. */
function emits(text: string): SyntaxExtension {
  return ext({ type: "bang", expander: (_ecx, sp) => TokenStream.parse(text, { fixedSpan: sp }) });
}

/** A token derive producing an empty impl of `name` for `S`. */
function implFor(name: string, helperAttrs: string[] = []): SyntaxExtension {
  return ext(
    { type: "derive", expander: (_ecx, sp) => TokenStream.parse(`impl ${name} for S {}`, { fixedSpan: sp }) },
    helperAttrs,
  );
}

interface Setup {
  macros?: Record<string, SyntaxExtension>;
  ecfg?: Partial<ExpansionConfig>;
}

function expand(source: string, { macros = {}, ecfg = {} }: Setup = {}) {
  const sess = new ParseSess();
  const resolver = new MacroResolver(sess);
  for (const [name, extension] of Object.entries(macros)) {
    resolver.registerBuiltinMacro(ident(name, DUMMY_SP), extension);
  }
  const ecx = new ExtCtxt(sess, { ...ExpansionConfig.default("demo"), ...ecfg }, resolver);
  const crate = parseCrateFromSource(sess, realFileName("/project/src/lib.ex"), source);
  const expanded = ecx.monotonicExpander().expandCrate(crate);
  const diagnostics = sess.spanDiagnostic.diagnostics();
  return {
    sess,
    expanded,
    printed: expanded.items.map(printItem),
    errors: diagnostics.filter((d) => d.level === "error").map((d) => d.message),
    diagnostics,
  };
}

describe("MacroExpander", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("function-like macros", () => {
    it("should splice a legacy expansion in expression position", () => {
      const { printed, errors, expanded } = expand("const A: u32 = seven!();", { macros: { seven: SEVEN } });
      expect(errors).toEqual([]);
      expect(printed).toEqual(["const A: u32 = 7;"]);
      expect(expanded.items[0]?.id).not.toBe(DUMMY_NODE_ID);
    });

    it("should leave literals no macro touches as written", () => {
      const source = "const A: u64 = 18446744073709551615;\nconst B: f64 = 1.0;\nconst C: u32 = 0x10;";
      const { printed } = expand(source);
      expect(printed).toEqual(["const A: u64 = 18446744073709551615;", "const B: f64 = 1.0;", "const C: u32 = 0x10;"]);
    });

    it("should parse token output in the position of the call", () => {
      const double = ext({
        type: "bang",
        expander: (_ecx, sp, input) => input.concat(TokenStream.parse("* 2", { fixedSpan: sp })),
      });
      const { printed } = expand("const A: u32 = double!(1 + 1);", { macros: { double } });
      expect(printed).toEqual(["const A: u32 = 1 + 1 * 2;"]);
    });

    it("should put the statement semicolon on the expansion", () => {
      const { printed } = expand("fn f() { seven!(); }", { macros: { seven: SEVEN } });
      expect(printed).toEqual(["fn f() { 7; }"]);
    });

    it("should report tokens left over after the expansion", () => {
      const { printed, diagnostics } = expand("const A: u32 = junk!();", { macros: { junk: emits("1 2") } });
      expect(printed).toEqual(["const A: u32 = 1;"]);
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]?.message).toBe("macro expansion ignores token `2` and any following");
      expect(diagnostics[0]?.children.map((c) => c.message)).toEqual([
        "caused by the macro expansion here",
        "the usage of `junk!` is likely invalid in expression context",
      ]);
    });

    it("should reject a result without the requested kind", () => {
      const onlyItems = ext({ type: "legacy-bang", expander: () => MacEager.items([]) });
      const { printed, errors } = expand("const A: u32 = only_items!();", { macros: { only_items: onlyItems } });
      expect(errors).toEqual(["non-expression macro in expression position: only_items"]);
      expect(printed).toEqual(["const A: u32 = (/*ERROR*/);"]);
    });

    it("should expand the output of an expansion", () => {
      const { printed, errors } = expand("outer!();", {
        macros: { outer: emits("const B: u32 = seven!();"), seven: SEVEN },
      });
      expect(errors).toEqual([]);
      expect(printed).toEqual(["const B: u32 = 7;"]);
    });

    it("should stop at the recursion limit", () => {
      const sess = new ParseSess();
      const resolver = new MacroResolver(sess);
      resolver.registerBuiltinMacro(ident("again", DUMMY_SP), emits("again!();"));
      const ecx = new ExtCtxt(sess, { ...ExpansionConfig.default("demo"), recursionLimit: 4 }, resolver);
      const crate = parseCrateFromSource(sess, realFileName("/r.ex"), "again!();");

      expect(() => ecx.monotonicExpander().expandCrate(crate)).toThrow(FatalError);
      const fatal = sess.spanDiagnostic.diagnostics().find((d) => d.level === "fatal");
      expect(fatal?.message).toBe("recursion limit reached while expanding the macro `again`");
      expect(fatal?.children).toEqual([
        { level: "help", message: "consider raising `recursionLimit` to 8 in the expandite configuration" },
      ]);
    });

    it("should log each expansion when verbose", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      expand("const A: u32 = seven!();", { macros: { seven: SEVEN }, ecfg: { verbose: true } });
      expect(log).toHaveBeenCalledWith("[expandite] Expanding bang macro: seven");
    });
  });

  describe("resolution", () => {
    it("should report a missing macro and leave a placeholder", () => {
      const { printed, errors } = expand("const A: u32 = nope!();");
      expect(errors).toEqual(["cannot find macro `nope` in this scope"]);
      expect(printed).toEqual(["const A: u32 = (/*ERROR*/);"]);
    });

    it("should retry an invocation once an expansion defines its macro", () => {
      const { printed, diagnostics } = expand("const A: u32 = later!();\ndefine!();", {
        macros: { define: emits("macro later = seven;"), seven: SEVEN },
      });
      expect(diagnostics).toEqual([]);
      expect(printed).toEqual(["const A: u32 = 7;", "macro later = seven;"]);
    });

    it("should report nothing for a derive group that is still undetermined", () => {
      let seenByDefine: string[] | undefined;
      const define = ext({
        type: "bang",
        expander: (ecx, sp) => {
          seenByDefine = ecx.parseSess.spanDiagnostic.diagnostics().map((d) => d.message);
          return TokenStream.parse("macro Later = B;", { fixedSpan: sp });
        },
      });
      const { diagnostics } = expand("@allow_internal_unstable macro Al = A;\n@derive(Al, Later) struct S;\ndefine!();", {
        macros: {
          allow_internal_unstable: SyntaxExtension.nonMacroAttr(true, "2018"),
          A: implFor("A"),
          B: implFor("B"),
          define,
        },
      });
      expect(seenByDefine).toEqual([]);
      expect(diagnostics.map((d) => [d.level, d.message.split(".")[0]])).toEqual([
        ["warning", "allow_internal_unstable expects list of feature names"],
      ]);
    });

    it("should scope definitions to their module", () => {
      const source = [
        "mod a { macro m = seven; const X: u32 = m!(); }",
        "const Y: u32 = a::m!();",
        "const Z: u32 = m!();",
      ].join("\n");
      const { printed, errors } = expand(source, { macros: { seven: SEVEN } });
      expect(errors).toEqual(["cannot find macro `m` in this scope"]);
      expect(printed).toEqual([
        "mod a { macro m = seven; const X: u32 = 7; }",
        "const Y: u32 = 7;",
        "const Z: u32 = (/*ERROR*/);",
      ]);
    });

    it("should warn about a definition nothing uses", () => {
      const { diagnostics } = expand("macro unused = seven;", { macros: { seven: SEVEN } });
      expect(diagnostics.map((d) => [d.level, d.message])).toEqual([["warning", "unused macro definition"]]);
    });

    it("should report a macro used as the wrong kind and keep the attribute", () => {
      const { printed, errors } = expand("@seven fn f() {}", { macros: { seven: SEVEN } });
      expect(errors).toEqual(["expected attribute, found macro `seven`"]);
      expect(printed).toEqual(["@seven fn f() {}"]);
    });
  });

  describe("attribute macros", () => {
    it("should replace the item with the token output", () => {
      const wrap = ext({
        type: "attr",
        expander: (_ecx, sp, args, item) =>
          item.concat(TokenStream.parse(`fn ${args.toString()}() {}`, { fixedSpan: sp })),
      });
      const { printed, errors } = expand("@wrap(g) fn f() {}", { macros: { wrap } });
      expect(errors).toEqual([]);
      expect(printed).toEqual(["fn f() {}", "fn g() {}"]);
    });

    it("should keep an inert attribute", () => {
      const inline = SyntaxExtension.nonMacroAttr(true, "2018");
      const { printed, errors } = expand("@inline fn f() {}", { macros: { inline } });
      expect(errors).toEqual([]);
      expect(printed).toEqual(["@inline fn f() {}"]);
    });
  });

  describe("derives", () => {
    it("should append derive output in the order written", () => {
      const { printed, errors } = expand("@derive(B, A) struct S;", {
        macros: { A: implFor("A"), B: implFor("B") },
      });
      expect(errors).toEqual([]);
      expect(printed).toEqual(["struct S;", "impl B for S {}", "impl A for S {}"]);
    });

    it("should accept the helper attributes of its derives", () => {
      const { printed, errors } = expand("@derive(Show) @skip struct S;", {
        macros: { Show: implFor("Show", ["skip"]) },
      });
      expect(errors).toEqual([]);
      expect(printed).toEqual(["@skip struct S;", "impl Show for S {}"]);
    });

    it("should report an unknown derive and keep the item", () => {
      const { printed, errors } = expand("@derive(Nope) struct S;");
      expect(errors).toEqual(["cannot find derive macro `Nope` in this scope"]);
      expect(printed).toEqual(["struct S;"]);
    });

    it("should reject derive on a function", () => {
      const { printed, errors } = expand("@derive(A) fn f() {}", { macros: { A: implFor("A") } });
      expect(errors).toEqual(["`derive` may only be applied to structs, enums and unions"]);
      expect(printed).toEqual(["fn f() {}"]);
    });
  });
});
