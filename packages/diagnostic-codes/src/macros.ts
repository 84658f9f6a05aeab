/**
 * The three registry macros:
 *
 * - `__register_diagnostic!(E0001)` / `__register_diagnostic!(E0001, "\n...\n")`
 * - `__diagnostic_used!(E0001)`
 * - `__build_diagnostic_array!(crate, DIAGNOSTICS)`
 *
 * They are emitted by other macros, never written by hand, so an argument
 * list of the wrong shape is a bug in the caller rather than a user error.
 */

import {
  DUMMY_SP,
  MacEager,
  SyntaxExtension,
  ident,
  isIdentToken,
  isPunct,
  isStringToken,
  type Edition,
  type ExtCtxt,
  type Ident,
  type LegacyBangExpander,
  type MacResult,
  type Resolver,
  type Span,
  type Token,
  type TokenStream,
  type Ty,
} from "@expandite/core";
import { buildDiagnosticArray, markDiagnosticUsed, registerDiagnostic } from "./registry.js";

function tokenAt(tts: TokenStream, index: number): Token | undefined {
  const tree = tts.get(index);
  return tree?.type === "token" ? tree.token : undefined;
}

function expectIdent(ecx: ExtCtxt, span: Span, tts: TokenStream, index: number, macroName: string): Ident {
  const token = tokenAt(tts, index);
  if (token === undefined || !isIdentToken(token)) {
    return ecx.spanBug(span, `\`${macroName}!\` expects an identifier at argument position ${index}`);
  }
  return ident(token.text, token.span);
}

export const expandDiagnosticUsed: LegacyBangExpander = (ecx, span, tts): MacResult => {
  if (tts.length !== 1) return ecx.spanBug(span, "`__diagnostic_used!` takes exactly one code");
  const code = expectIdent(ecx, span, tts, 0, "__diagnostic_used");
  markDiagnosticUsed(ecx, span, code.name);
  return MacEager.expr(ecx.exprTuple(span, []));
};

export const expandRegisterDiagnostic: LegacyBangExpander = (ecx, span, tts): MacResult => {
  const code = expectIdent(ecx, span, tts, 0, "__register_diagnostic");

  let description: string | undefined;
  if (tts.length === 3) {
    const comma = tokenAt(tts, 1);
    const lit = tokenAt(tts, 2);
    if (comma === undefined || !isPunct(comma, ",") || lit === undefined || !isStringToken(lit)) {
      return ecx.spanBug(span, "`__register_diagnostic!` expects `CODE, \"description\"`");
    }
    description = lit.value ?? "";
  } else if (tts.length !== 1) {
    return ecx.spanBug(span, "`__register_diagnostic!` takes a code and an optional description");
  }

  registerDiagnostic(ecx, span, code.name, description);
  return MacEager.items([]);
};

/** `pub const NAME: [(&str, &str); N] = [("E0001", "..."), ...];` */
export const expandBuildDiagnosticArray: LegacyBangExpander = (ecx, span, tts): MacResult => {
  if (tts.length !== 3) return ecx.spanBug(span, "`__build_diagnostic_array!` expects `crate, NAME`");
  const name = expectIdent(ecx, span, tts, 2, "__build_diagnostic_array");

  const entries = buildDiagnosticArray(ecx).map(([code, description]) =>
    ecx.exprTuple(span, [ecx.exprStr(span, code), ecx.exprStr(span, description)]),
  );

  const strRef = (): Ty => ecx.tyRef(span, ecx.tyIdent(span, ecx.identOf("str", span)));
  const ty = ecx.tyArray(span, ecx.tyTuple(span, [strRef(), strRef()]), entries.length);
  const item = ecx.itemConst(span, name, ty, ecx.exprVec(span, entries), true);
  return MacEager.items([item]);
};

export interface DiagnosticMacro {
  name: string;
  expander: LegacyBangExpander;
}

export const DIAGNOSTIC_MACROS: readonly DiagnosticMacro[] = [
  { name: "__diagnostic_used", expander: expandDiagnosticUsed },
  { name: "__register_diagnostic", expander: expandRegisterDiagnostic },
  { name: "__build_diagnostic_array", expander: expandBuildDiagnosticArray },
];

/** Register the registry macros with default extension metadata. */
export function registerDiagnosticMacros(resolver: Resolver, edition: Edition): void {
  for (const { name, expander } of DIAGNOSTIC_MACROS) {
    resolver.registerBuiltinMacro(ident(name, DUMMY_SP), SyntaxExtension.default({ type: "legacy-bang", expander }, edition));
  }
}
