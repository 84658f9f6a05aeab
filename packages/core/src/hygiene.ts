/**
 * Macro Hygiene Data
 *
 * Tracks the provenance of every piece of generated syntax. Each macro
 * invocation is assigned an expansion id; the id's {@link ExpnData} records
 * who called it (the call site), where the macro was defined (the def site),
 * and which expansion it was nested in (the parent).
 *
 * Spans point at an expansion through a syntax context: a chain of
 * `(expansion, transparency)` marks. Marks are only ever appended, and the
 * same `(parent, expansion, transparency)` triple always yields the same
 * context id, so contexts can be compared by id.
 *
 * Transparency decides how identifiers carrying the mark resolve:
 * - `opaque`: against the macro definition site only (def-site hygiene)
 * - `semi-transparent`: locals are hygienic, items resolve at the call site
 * - `transparent`: as if written at the call site
 *
 * @example
 * ```typescript
 * const hygiene = new HygieneData();
 * const expn = hygiene.freshExpn(data);
 * const stamped = hygiene.spanWithMark(callSite, expn, "opaque");
 * hygiene.outerExpn(stamped.ctxt) === expn; // true
 * ```
 */

import { ExplicitBug } from "./errors.js";
import {
  DEFAULT_EDITION,
  DUMMY_SP,
  ROOT_CTXT,
  withCtxt,
  type Edition,
  type Span,
  type SyntaxContextId,
} from "./span.js";

/** Identifies one macro expansion. */
export type ExpnId = number;

export const ROOT_EXPN_ID: ExpnId = 0;

export type Transparency = "opaque" | "semi-transparent" | "transparent";

/** The three invocation categories a macro can be called through. */
export type MacroKind = "bang" | "attr" | "derive";

export type ExpnKind = { type: "root" } | { type: "macro"; macroKind: MacroKind; descr: string };

/** Provenance record attached to an expansion id. Set exactly once. */
export interface ExpnData {
  readonly kind: ExpnKind;
  /** Expansion the invocation was found in. */
  readonly parent: ExpnId;
  readonly callSite: Span;
  /** Span of the macro definition. */
  readonly defSite: Span;
  readonly allowInternalUnstable?: readonly string[];
  readonly allowInternalUnsafe: boolean;
  readonly localInnerMacros: boolean;
  readonly edition: Edition;
}

function rootExpnData(edition: Edition = DEFAULT_EDITION): ExpnData {
  return {
    kind: { type: "root" },
    parent: ROOT_EXPN_ID,
    callSite: DUMMY_SP,
    defSite: DUMMY_SP,
    allowInternalUnsafe: false,
    localInnerMacros: false,
    edition,
  };
}

/** Description of an expansion kind; `"include"` marks textual inclusion. */
export function expnKindDescr(kind: ExpnKind): string {
  return kind.type === "root" ? "root" : kind.descr;
}

export function isRootExpn(data: ExpnData): boolean {
  return data.kind.type === "root";
}

interface SyntaxContextData {
  readonly outerExpn: ExpnId;
  readonly transparency: Transparency;
  readonly parent: SyntaxContextId;
}

export class HygieneData {
  private readonly expnData: (ExpnData | undefined)[];
  private readonly contexts: SyntaxContextData[] = [
    { outerExpn: ROOT_EXPN_ID, transparency: "opaque", parent: ROOT_CTXT },
  ];
  private readonly markCache = new Map<string, SyntaxContextId>();

  constructor(
    edition: Edition = DEFAULT_EDITION,
    private readonly verbose = false,
  ) {
    this.expnData = [rootExpnData(edition)];
  }

  /** Allocate a new expansion id, optionally recording its data right away. */
  freshExpn(data?: ExpnData): ExpnId {
    const id = this.expnData.length;
    this.expnData.push(data);
    if (this.verbose) {
      console.log(`[expandite:hygiene] fresh expansion #${id}${data ? ` (${expnKindDescr(data.kind)})` : ""}`);
    }
    return id;
  }

  setExpnData(id: ExpnId, data: ExpnData): void {
    this.checkId(id);
    if (this.expnData[id] !== undefined) {
      throw new ExplicitBug(`expansion data is reset for an expansion ID #${id}`);
    }
    this.expnData[id] = data;
  }

  hasExpnData(id: ExpnId): boolean {
    this.checkId(id);
    return this.expnData[id] !== undefined;
  }

  getExpnData(id: ExpnId): ExpnData {
    this.checkId(id);
    const data = this.expnData[id];
    if (data === undefined) {
      throw new ExplicitBug(`no expansion data for expansion ID #${id}`);
    }
    return data;
  }

  parent(id: ExpnId): ExpnId {
    return this.getExpnData(id).parent;
  }

  /** Whether `id` is `ancestor` or nested (transitively) inside it. */
  isDescendantOf(id: ExpnId, ancestor: ExpnId): boolean {
    let current = id;
    while (current !== ancestor) {
      if (current === ROOT_EXPN_ID) return false;
      const data = this.expnData[current];
      if (data === undefined) return false;
      current = data.parent;
    }
    return true;
  }

  /**
   * Extend `ctxt` with the mark `(expn, transparency)`. The result is
   * memoized, so equal chains share one id.
   */
  applyMark(ctxt: SyntaxContextId, expn: ExpnId, transparency: Transparency): SyntaxContextId {
    this.checkCtxt(ctxt);
    const key = `${ctxt}:${expn}:${transparency}`;
    const cached = this.markCache.get(key);
    if (cached !== undefined) return cached;

    const id = this.contexts.length;
    this.contexts.push({ outerExpn: expn, transparency, parent: ctxt });
    this.markCache.set(key, id);
    return id;
  }

  outerExpn(ctxt: SyntaxContextId): ExpnId {
    this.checkCtxt(ctxt);
    return this.contexts[ctxt].outerExpn;
  }

  outerTransparency(ctxt: SyntaxContextId): Transparency {
    this.checkCtxt(ctxt);
    return this.contexts[ctxt].transparency;
  }

  parentCtxt(ctxt: SyntaxContextId): SyntaxContextId {
    this.checkCtxt(ctxt);
    return this.contexts[ctxt].parent;
  }

  outerExpnData(ctxt: SyntaxContextId): ExpnData {
    return this.getExpnData(this.outerExpn(ctxt));
  }

  /** Marks of a context, innermost last. */
  marks(ctxt: SyntaxContextId): Array<[ExpnId, Transparency]> {
    const result: Array<[ExpnId, Transparency]> = [];
    let current = ctxt;
    while (current !== ROOT_CTXT) {
      const data = this.contexts[current];
      result.push([data.outerExpn, data.transparency]);
      current = data.parent;
    }
    return result.reverse();
  }

  /**
   * Stamp a span with a single mark on top of the root context. Whatever
   * context the span carried before is dropped, never extended.
   */
  spanWithMark(sp: Span, expn: ExpnId, transparency: Transparency): Span {
    return withCtxt(sp, this.applyMark(ROOT_CTXT, expn, transparency));
  }

  /** Follow call sites out of all expansions back to written source. */
  sourceCallsite(sp: Span): Span {
    let current = sp;
    let guard = 0;
    while (current.ctxt !== ROOT_CTXT) {
      const data = this.outerExpnData(current.ctxt);
      if (isRootExpn(data)) break;
      current = data.callSite;
      if (++guard > this.expnData.length) {
        throw new ExplicitBug("cycle in expansion call sites");
      }
    }
    return current;
  }

  get expnCount(): number {
    return this.expnData.length;
  }

  private checkId(id: ExpnId): void {
    if (!Number.isInteger(id) || id < 0 || id >= this.expnData.length) {
      throw new ExplicitBug(`unknown expansion ID #${id}`);
    }
  }

  private checkCtxt(ctxt: SyntaxContextId): void {
    if (!Number.isInteger(ctxt) || ctxt < 0 || ctxt >= this.contexts.length) {
      throw new ExplicitBug(`unknown syntax context #${ctxt}`);
    }
  }
}
