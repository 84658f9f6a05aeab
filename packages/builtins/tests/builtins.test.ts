import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import {
  DUMMY_SP,
  ExpansionConfig,
  ExtCtxt,
  MacroResolver,
  ParseSess,
  SpecialDerives,
  SyntaxExtension,
  TokenStream,
  ident,
  parseCrateFromSource,
  printItem,
  realFileName,
  type ExpnId,
} from "@expandite/core";
import { BUILTIN_MACROS, registerBuiltins } from "../src/index.js";

interface ExpandOptions {
  file?: string;
  crateName?: string;
  extra?: (resolver: MacroResolver, sess: ParseSess) => void;
}

function expand(source: string, options: ExpandOptions = {}) {
  const sess = new ParseSess();
  const resolver = new MacroResolver(sess);
  registerBuiltins(resolver, sess);
  options.extra?.(resolver, sess);
  const ecx = new ExtCtxt(sess, ExpansionConfig.default(options.crateName ?? "demo"), resolver);
  const crate = parseCrateFromSource(sess, realFileName(options.file ?? "/project/src/lib.ex"), source);
  const expanded = ecx.monotonicExpander().expandCrate(crate);
  const diagnostics = sess.spanDiagnostic.diagnostics();
  return {
    sess,
    resolver,
    printed: expanded.items.map(printItem),
    errors: diagnostics.filter((d) => d.level === "error").map((d) => d.message),
    diagnostics,
  };
}

describe("registerBuiltins", () => {
  it("should reject a second registration of every name", () => {
    const sess = new ParseSess();
    const resolver = new MacroResolver(sess);
    registerBuiltins(resolver, sess);
    registerBuiltins(resolver, sess);

    const messages = sess.spanDiagnostic.diagnostics().map((d) => d.message);
    expect(messages).toHaveLength(BUILTIN_MACROS.length);
    expect(new Set(messages)).toEqual(new Set(["attempted to define built-in macro more than once"]));
  });
});

describe("concat! and stringify!", () => {
  it("should join literals of every kind", () => {
    const { printed, errors } = expand('const S: &str = concat!("a", 1, true, -2, stringify!(x + y));');
    expect(errors).toEqual([]);
    expect(printed).toEqual(['const S: &str = "a1true-2x + y";']);
  });

  it("should keep numeric literals as written", () => {
    const { printed, errors } = expand("const S: &str = concat!(1.0, 0x10, -2.50);");
    expect(errors).toEqual([]);
    expect(printed).toEqual(['const S: &str = "1.00x10-2.50";']);
  });

  it("should print tokens with their usual spacing", () => {
    const { printed } = expand("const S: &str = stringify!(a::b, c!(d));");
    expect(printed).toEqual(['const S: &str = "a::b, c!(d)";']);
  });

  it("should report a non-literal argument", () => {
    const { printed, diagnostics } = expand('const S: &str = concat!("a", x);');
    expect(printed).toEqual(["const S: &str = (/*ERROR*/);"]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.message).toBe("expected a literal");
    expect(diagnostics[0]?.children.map((c) => c.message)).toEqual([
      'only literals (like `"foo"`, `42` and `3.14`) can be passed to `concat!()`',
    ]);
  });
});

describe("location macros", () => {
  it("should report the line, column and file of the call", () => {
    const source = ["const L: u32 = line!();", "const C: u32 = column!();", "const F: &str = file!();"].join("\n");
    const { printed, errors } = expand(source);
    expect(errors).toEqual([]);
    expect(printed).toEqual(["const L: u32 = 1;", "const C: u32 = 16;", 'const F: &str = "/project/src/lib.ex";']);
  });

  it("should report the outermost call for macro-generated invocations", () => {
    // `relay!` emits a `line!()` whose tokens carry no position of their own.
    const source = "const A: u32 = 0;\nconst B: u32 = relay!();";
    const { printed, errors } = expand(source, {
      extra: (resolver, sess) => {
        const ext = SyntaxExtension.default(
          {
            type: "bang",
            expander: (ecx) => TokenStream.parse("line!()", { fixedSpan: ecx.withDefSiteCtxt(DUMMY_SP) }),
          },
          sess.edition,
        );
        resolver.registerBuiltinMacro(ident("relay", DUMMY_SP), ext);
      },
    });
    expect(errors).toEqual([]);
    expect(printed).toEqual(["const A: u32 = 0;", "const B: u32 = 2;"]);
  });

  it("should name the enclosing modules from the crate root", () => {
    const { printed } = expand("mod outer { mod inner { const P: &str = module_path!(); } }", { crateName: "app" });
    expect(printed).toEqual(['mod outer { mod inner { const P: &str = "app::outer::inner"; } }']);
  });

  it("should reject arguments", () => {
    const { errors } = expand("const L: u32 = line!(1);");
    expect(errors).toEqual(["line! takes no arguments"]);
  });
});

describe("include! and include_str!", () => {
  let dir: string;
  let entry: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "expandite-include-"));
    entry = path.join(dir, "lib.ex");
    fs.writeFileSync(path.join(dir, "data.txt"), "hello\n");
    fs.writeFileSync(path.join(dir, "value.ex"), "40 + 2");
    fs.writeFileSync(path.join(dir, "items.ex"), "const A: u32 = 1;\nconst L: u32 = line!();");
    fs.writeFileSync(path.join(dir, "binary.bin"), Buffer.from([0xff, 0xfe]));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should embed a file relative to the including file", () => {
    const { printed, errors, sess } = expand('const T: &str = include_str!("data.txt");', { file: entry });
    expect(errors).toEqual([]);
    expect(printed).toEqual(['const T: &str = "hello\\n";']);
    expect(sess.sourceMap.allFiles()).toHaveLength(2);
  });

  it("should report a missing file", () => {
    const { printed, errors } = expand('const T: &str = include_str!("missing.txt");', { file: entry });
    expect(printed).toEqual(["const T: &str = (/*ERROR*/);"]);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.startsWith(`couldn't read ${path.join(dir, "missing.txt")}: ENOENT`)).toBe(true);
  });

  it("should reject a file that is not utf-8", () => {
    const { errors } = expand('const T: &str = include_str!("binary.bin");', { file: entry });
    expect(errors).toEqual([`${path.join(dir, "binary.bin")} wasn't a utf-8 file`]);
  });

  it("should parse an included expression", () => {
    const { printed, errors } = expand('const V: u32 = include!("value.ex");', { file: entry });
    expect(errors).toEqual([]);
    expect(printed).toEqual(["const V: u32 = 40 + 2;"]);
  });

  it("should parse included items and expand macros inside them", () => {
    const { printed, errors } = expand('include!("items.ex");', { file: entry });
    expect(errors).toEqual([]);
    expect(printed).toEqual(["const A: u32 = 1;", "const L: u32 = 2;"]);
  });
});

describe("compile_error! and trace_macros!", () => {
  it("should report its message", () => {
    const { printed, errors } = expand('compile_error!("boom");\nconst A: u32 = 1;');
    expect(errors).toEqual(["boom"]);
    expect(printed).toEqual(["const A: u32 = 1;"]);
  });

  it("should trace expansions while enabled", () => {
    const source = [
      "trace_macros!(true);",
      "const S: &str = stringify!(a);",
      "trace_macros!(false);",
      "const T: &str = stringify!(b);",
    ].join("\n");
    const { printed, diagnostics } = expand(source);
    expect(printed).toEqual(['const S: &str = "a";', 'const T: &str = "b";']);

    const traces = diagnostics.filter((d) => d.message === "trace_macro");
    expect(traces).toHaveLength(2);
    expect(traces[0]?.children.map((c) => c.message)).toEqual(["expanding `stringify! { a }`", 'to `"a"`']);
    expect(traces[1]?.children.map((c) => c.message)).toEqual(["expanding `trace_macros! { false }`", "to ``"]);
  });

  it("should accept only a boolean", () => {
    const { errors } = expand("trace_macros!(maybe);");
    expect(errors).toEqual(["trace_macros! accepts only `true` or `false`"]);
  });
});

describe("derives", () => {
  it("should clone a Copy type by dereferencing", () => {
    const { printed, errors } = expand("@derive(Clone, Copy) struct P { x: i32 }");
    expect(errors).toEqual([]);
    expect(printed).toEqual([
      "struct P { x: i32 }",
      "impl Clone for P { fn clone(&self) -> P { *self } }",
      "impl Copy for P {}",
    ]);
  });

  it("should take the Copy form whichever derive comes first", () => {
    const { printed } = expand("@derive(Copy, Clone) struct P { x: i32 }");
    expect(printed).toEqual([
      "struct P { x: i32 }",
      "impl Copy for P {}",
      "impl Clone for P { fn clone(&self) -> P { *self } }",
    ]);
  });

  it("should clone each field otherwise", () => {
    const { printed } = expand("@derive(Clone) struct Q { a: u8, b: u8 }");
    expect(printed).toEqual([
      "struct Q { a: u8, b: u8 }",
      "impl Clone for Q { fn clone(&self) -> Q { Q { a: Clone::clone(&self.a), b: Clone::clone(&self.b) } } }",
    ]);
  });

  it("should require Copy to clone an enum", () => {
    const { printed, errors } = expand("@derive(Clone) enum E { A, B }");
    expect(printed).toEqual(["enum E { A, B }"]);
    expect(errors).toEqual(["`Clone` can only be derived for enums that also derive `Copy`"]);
  });

  it("should compare fields and record the derives", () => {
    const { printed, errors, sess, resolver } = expand("@derive(PartialEq, Eq) struct R { a: u8, b: u8 }");
    expect(errors).toEqual([]);
    expect(printed).toEqual([
      "struct R { a: u8, b: u8 }",
      "impl PartialEq for R { fn eq(&self, other: &R) -> bool { self.a == other.a && self.b == other.b } }",
      "impl Eq for R { fn assert_receiver_is_total_eq(&self) {} }",
    ]);

    const hygiene = sess.hygiene;
    let container: ExpnId | undefined;
    for (let id = 1; id < hygiene.expnCount; id++) {
      if (!hygiene.hasExpnData(id)) continue;
      const kind = hygiene.getExpnData(id).kind;
      if (kind.type === "macro" && kind.descr === "derive") container = id;
    }
    if (container === undefined) throw new Error("no derive container");
    expect(resolver.hasDerives(container, SpecialDerives.PartialEq | SpecialDerives.Eq)).toBe(true);
    expect(resolver.hasDerives(container, SpecialDerives.Copy)).toBe(false);
  });

  it("should build defaults for named and tuple structs", () => {
    const { printed } = expand("@derive(Default) struct D { n: u32 }\n@derive(Default) struct T(u8, u8);");
    expect(printed).toEqual([
      "struct D { n: u32 }",
      "impl Default for D { fn default() -> D { D { n: Default::default() } } }",
      "struct T(u8, u8);",
      "impl Default for T { fn default() -> T { T(Default::default(), Default::default()) } }",
    ]);
  });

  it("should reject Default on an enum", () => {
    const { printed, errors } = expand("@derive(Default) enum E { A }");
    expect(printed).toEqual(["enum E { A }"]);
    expect(errors).toEqual(["`Default` cannot be derived for enums, only structs"]);
  });

  it("should reject derive on a function", () => {
    const { printed, errors } = expand("@derive(Clone) fn f() {}");
    expect(printed).toEqual(["fn f() {}"]);
    expect(errors).toEqual(["`derive` may only be applied to structs, enums and unions"]);
  });
});

describe("inert attributes", () => {
  it("should stay on their item", () => {
    const { printed, errors } = expand("@inline fn f() {}");
    expect(errors).toEqual([]);
    expect(printed).toEqual(["@inline fn f() {}"]);
  });

  it("should report and keep unknown attributes", () => {
    const { printed, errors } = expand("@frobnicate fn f() {}");
    expect(errors).toEqual(["cannot find attribute macro `frobnicate` in this scope"]);
    expect(printed).toEqual(["@frobnicate fn f() {}"]);
  });
});
