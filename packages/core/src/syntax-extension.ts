/**
 * Syntax Extensions
 *
 * A syntax extension is what a macro name resolves to: one callable, tagged
 * by the shape of its input and output, plus the metadata the expander and
 * later passes need (definition span, stability, unstable/unsafe escapes,
 * derive helper attributes, edition).
 *
 * Token-based kinds (`bang`, `attr`, `derive`) see raw token streams and
 * return tokens that the expander parses at the call site. Legacy kinds see
 * parsed syntax and return it directly.
 *
 * @example
 * ```typescript
 * const ext = SyntaxExtension.default(
 *   { type: "legacy-bang", expander: (ecx, sp) => MacEager.expr(ecx.exprStr(sp, "hi")) },
 *   "2018",
 * );
 * ext.macroKind(); // "bang"
 * ```
 */

import type { Annotatable } from "./annotatable.js";
import type { Attribute, MetaItem } from "./ast.js";
import { containsName, findByName, findDeprecation, findStability, listContainsName, metaItemList, nestedIdent, nestedSpan, type Deprecation, type Stability } from "./attr.js";
import type { ExtCtxt } from "./context.js";
import type { ExpnData, ExpnId, MacroKind } from "./hygiene.js";
import { DummyResult, type MacResult } from "./mac-result.js";
import { unreachable } from "./safety.js";
import type { ParseSess } from "./session.js";
import { DUMMY_SP, type Edition, type Span } from "./span.js";
import type { TokenStream } from "./tokenstream.js";

/** Function-like macro over tokens: `name!(tokens)` → tokens. */
export type BangExpander = (ecx: ExtCtxt, span: Span, input: TokenStream) => TokenStream;

/** Function-like macro producing syntax directly. */
export type LegacyBangExpander = (ecx: ExtCtxt, span: Span, input: TokenStream) => MacResult;

/** Attribute macro over tokens: receives the attribute arguments and the annotated item separately. */
export type AttrExpander = (ecx: ExtCtxt, span: Span, annotation: TokenStream, annotated: TokenStream) => TokenStream;

/** Attribute or derive macro over parsed syntax. */
export type MultiItemExpander = (ecx: ExtCtxt, span: Span, meta: MetaItem, item: Annotatable) => Annotatable[];

/** Derive over tokens; the output is appended after the item. */
export type DeriveExpander = (ecx: ExtCtxt, span: Span, input: TokenStream) => TokenStream;

export type SyntaxExtensionKind =
  | { type: "bang"; expander: BangExpander }
  | { type: "legacy-bang"; expander: LegacyBangExpander }
  | { type: "attr"; expander: AttrExpander }
  | { type: "legacy-attr"; expander: MultiItemExpander }
  /** Inert attribute: stays on the item, optionally marked used. */
  | { type: "non-macro-attr"; markUsed: boolean }
  | { type: "derive"; expander: DeriveExpander }
  | { type: "legacy-derive"; expander: MultiItemExpander };

const BACKCOMPAT_FEATURE = "allow_internal_unstable_backcompat_hack";

export function macroKindDescr(kind: MacroKind): string {
  switch (kind) {
    case "bang":
      return "macro";
    case "attr":
      return "attribute macro";
    case "derive":
      return "derive macro";
  }
}

export interface SyntaxExtensionProps {
  span: Span;
  allowInternalUnstable?: readonly string[];
  allowInternalUnsafe: boolean;
  localInnerMacros: boolean;
  stability?: Stability;
  deprecation?: Deprecation;
  helperAttrs: readonly string[];
  isBuiltin: boolean;
  isDeriveCopy: boolean;
}

export class SyntaxExtension {
  /** Definition span. */
  readonly span: Span;
  readonly allowInternalUnstable?: readonly string[];
  readonly allowInternalUnsafe: boolean;
  readonly localInnerMacros: boolean;
  readonly stability?: Stability;
  readonly deprecation?: Deprecation;
  /** Attribute names a derive claims on the item; only meaningful for derives. */
  readonly helperAttrs: readonly string[];
  readonly isBuiltin: boolean;
  /** The built-in `Copy` derive. Known without looking at the definition. */
  readonly isDeriveCopy: boolean;

  constructor(
    readonly kind: SyntaxExtensionKind,
    readonly edition: Edition,
    props: Partial<SyntaxExtensionProps> = {},
  ) {
    this.span = props.span ?? DUMMY_SP;
    this.allowInternalUnstable = props.allowInternalUnstable;
    this.allowInternalUnsafe = props.allowInternalUnsafe ?? false;
    this.localInnerMacros = props.localInnerMacros ?? false;
    this.stability = props.stability;
    this.deprecation = props.deprecation;
    this.helperAttrs = props.helperAttrs ?? [];
    this.isBuiltin = props.isBuiltin ?? false;
    this.isDeriveCopy = props.isDeriveCopy ?? false;
  }

  static default(kind: SyntaxExtensionKind, edition: Edition): SyntaxExtension {
    return new SyntaxExtension(kind, edition);
  }

  /**
   * Build an extension, reading its metadata from the attributes on the
   * macro definition. Malformed attributes are reported and the extension
   * is still built.
   */
  static fromAttributes(
    sess: ParseSess,
    kind: SyntaxExtensionKind,
    span: Span,
    helperAttrs: readonly string[],
    edition: Edition,
    name: string,
    attrs: readonly Attribute[],
  ): SyntaxExtension {
    const handler = sess.spanDiagnostic;

    let allowInternalUnstable: string[] | undefined;
    const unstableAttr = findByName(attrs, "allow_internal_unstable");
    if (unstableAttr !== undefined) {
      const list = metaItemList(unstableAttr);
      if (list === undefined) {
        handler.spanWarn(
          unstableAttr.span,
          "allow_internal_unstable expects list of feature names. In the future this will become a hard error. " +
            "Please use `allow_internal_unstable(foo, bar)` to only allow the `foo` and `bar` features",
        );
        allowInternalUnstable = [BACKCOMPAT_FEATURE];
      } else {
        allowInternalUnstable = [];
        for (const item of list) {
          const feature = nestedIdent(item);
          if (feature === undefined) {
            handler.spanErr(nestedSpan(item), "allow internal unstable expects feature names");
            continue;
          }
          allowInternalUnstable.push(feature.name);
        }
      }
    }

    let localInnerMacros = false;
    const macroExport = findByName(attrs, "macro_export");
    if (macroExport !== undefined) {
      const list = metaItemList(macroExport);
      if (list !== undefined) localInnerMacros = listContainsName(list, "local_inner_macros");
    }

    const isBuiltin = containsName(attrs, "builtin_macro");

    return new SyntaxExtension(kind, edition, {
      span,
      allowInternalUnstable,
      allowInternalUnsafe: containsName(attrs, "allow_internal_unsafe"),
      localInnerMacros,
      stability: findStability(sess, attrs),
      deprecation: findDeprecation(sess, attrs, span),
      helperAttrs,
      isBuiltin,
      isDeriveCopy: isBuiltin && name === "Copy",
    });
  }

  /** Stand-in for an unresolved function-like macro. */
  static dummyBang(edition: Edition): SyntaxExtension {
    return SyntaxExtension.default({ type: "legacy-bang", expander: (_ecx, sp) => DummyResult.any(sp) }, edition);
  }

  /** Stand-in for an unresolved derive; produces nothing. */
  static dummyDerive(edition: Edition): SyntaxExtension {
    return SyntaxExtension.default({ type: "legacy-derive", expander: () => [] }, edition);
  }

  static nonMacroAttr(markUsed: boolean, edition: Edition): SyntaxExtension {
    return SyntaxExtension.default({ type: "non-macro-attr", markUsed }, edition);
  }

  /** The invocation category this extension can be called through. */
  macroKind(): MacroKind {
    switch (this.kind.type) {
      case "bang":
      case "legacy-bang":
        return "bang";
      case "attr":
      case "legacy-attr":
      case "non-macro-attr":
        return "attr";
      case "derive":
      case "legacy-derive":
        return "derive";
      default:
        return unreachable(this.kind, "syntax extension kind");
    }
  }

  /** Provenance record for one invocation of this extension. */
  expnData(parent: ExpnId, callSite: Span, descr: string): ExpnData {
    return {
      kind: { type: "macro", macroKind: this.macroKind(), descr },
      parent,
      callSite,
      defSite: this.span,
      allowInternalUnstable: this.allowInternalUnstable,
      allowInternalUnsafe: this.allowInternalUnsafe,
      localInnerMacros: this.localInnerMacros,
      edition: this.edition,
    };
  }
}
