/**
 * Registration of every built-in extension with a resolver.
 *
 * Built-ins are built from attributes like any other macro, with the
 * `@builtin_macro` marker, so `SyntaxExtension.isBuiltin` (and
 * `isDeriveCopy` for `Copy`) come out of the same code path user macros take.
 */

import {
  DUMMY_SP,
  Parser,
  SyntaxExtension,
  TokenStream,
  ident,
  type Attribute,
  type Edition,
  type ParseSess,
  type Resolver,
  type SyntaxExtensionKind,
} from "@expandite/core";
import { DIAGNOSTIC_MACROS } from "@expandite/diagnostic-codes";
import { expandCompileError, expandTraceMacros } from "./control.js";
import { deriveClone, deriveCopy, deriveDefault, deriveEq, derivePartialEq } from "./derive.js";
import { expandInclude, expandIncludeStr } from "./include.js";
import { expandColumn, expandFile, expandLine, expandModPath } from "./location.js";
import { expandConcat, expandStringify } from "./text.js";

export interface BuiltinMacro {
  name: string;
  kind: SyntaxExtensionKind;
  helperAttrs?: readonly string[];
}

/** Attributes that stay on their item for later passes. */
export const INERT_ATTRIBUTES: readonly string[] = [
  "doc",
  "allow",
  "inline",
  "test",
  "macro_export",
  "allow_internal_unstable",
  "allow_internal_unsafe",
  "builtin_macro",
  "stable",
  "unstable",
  "deprecated",
  "must_use",
];

export const BUILTIN_MACROS: readonly BuiltinMacro[] = [
  { name: "concat", kind: { type: "legacy-bang", expander: expandConcat } },
  { name: "stringify", kind: { type: "legacy-bang", expander: expandStringify } },
  { name: "line", kind: { type: "legacy-bang", expander: expandLine } },
  { name: "column", kind: { type: "legacy-bang", expander: expandColumn } },
  { name: "file", kind: { type: "legacy-bang", expander: expandFile } },
  { name: "module_path", kind: { type: "legacy-bang", expander: expandModPath } },
  { name: "include", kind: { type: "legacy-bang", expander: expandInclude } },
  { name: "include_str", kind: { type: "legacy-bang", expander: expandIncludeStr } },
  { name: "compile_error", kind: { type: "legacy-bang", expander: expandCompileError } },
  { name: "trace_macros", kind: { type: "legacy-bang", expander: expandTraceMacros } },
  { name: "Copy", kind: { type: "legacy-derive", expander: deriveCopy } },
  { name: "Clone", kind: { type: "legacy-derive", expander: deriveClone } },
  { name: "PartialEq", kind: { type: "legacy-derive", expander: derivePartialEq } },
  { name: "Eq", kind: { type: "legacy-derive", expander: deriveEq } },
  { name: "Default", kind: { type: "legacy-derive", expander: deriveDefault } },
  ...DIAGNOSTIC_MACROS.map(({ name, expander }): BuiltinMacro => ({ name, kind: { type: "legacy-bang", expander } })),
  ...INERT_ATTRIBUTES.map((name): BuiltinMacro => ({ name, kind: { type: "non-macro-attr", markUsed: false } })),
];

function builtinMarker(): Attribute[] {
  return new Parser(TokenStream.parse("@builtin_macro", { fixedSpan: DUMMY_SP })).parseOuterAttributes();
}

export function registerBuiltins(resolver: Resolver, sess: ParseSess, edition: Edition = sess.edition): void {
  for (const { name, kind, helperAttrs = [] } of BUILTIN_MACROS) {
    const ext = SyntaxExtension.fromAttributes(sess, kind, DUMMY_SP, helperAttrs, edition, name, builtinMarker());
    resolver.registerBuiltinMacro(ident(name, DUMMY_SP), ext);
  }
  if (sess.verbose) {
    console.log(`[expandite] Registered ${BUILTIN_MACROS.length} built-in extensions`);
  }
}
