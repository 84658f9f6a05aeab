/**
 * Macro invocations collected from a fragment, waiting to be resolved and
 * expanded.
 */

import { annotatableSpan, type Annotatable } from "./annotatable.js";
import { pathToString, type Attribute, type MacCall, type Path } from "./ast.js";
import type { ExpansionData } from "./context.js";
import type { AstFragmentKind } from "./fragments.js";
import type { ExpnId, MacroKind } from "./hygiene.js";
import type { Span } from "./span.js";

export type InvocationKind =
  | { type: "bang"; mac: MacCall; span: Span }
  | { type: "attr"; attr: Attribute; item: Annotatable }
  | { type: "derive"; path: Path; item: Annotatable }
  /** Every `@derive(...)` path on one item, in declaration order. */
  | { type: "derive-container"; derives: Path[]; item: Annotatable };

export interface Invocation {
  kind: InvocationKind;
  /** Syntactic category expected at the call site. */
  fragmentKind: AstFragmentKind;
  /** Frame the invocation expands in; `expansionData.id` is its own fresh id. */
  expansionData: ExpansionData;
  /** Expansion whose output contains the invocation. */
  parent: ExpnId;
}

export function invocationSpan(invoc: Invocation): Span {
  switch (invoc.kind.type) {
    case "bang":
      return invoc.kind.span;
    case "attr":
      return invoc.kind.attr.span;
    case "derive":
      return invoc.kind.path.span;
    case "derive-container":
      return annotatableSpan(invoc.kind.item);
  }
}

/** Macro kind the invocation site asks for. */
export function invocationMacroKind(invoc: Invocation): MacroKind {
  switch (invoc.kind.type) {
    case "bang":
      return "bang";
    case "attr":
      return "attr";
    case "derive":
    case "derive-container":
      return "derive";
  }
}

/** Name shown in diagnostics and expansion descriptions. */
export function invocationPathString(invoc: Invocation): string {
  switch (invoc.kind.type) {
    case "bang":
      return pathToString(invoc.kind.mac.path);
    case "attr":
      return pathToString(invoc.kind.attr.path);
    case "derive":
      return pathToString(invoc.kind.path);
    case "derive-container":
      return "derive";
  }
}
