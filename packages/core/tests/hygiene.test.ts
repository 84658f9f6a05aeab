/**
 * Tests for spans, syntax contexts and expansion provenance
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  DUMMY_SP,
  ExplicitBug,
  HygieneData,
  Lock,
  ROOT_CTXT,
  ROOT_EXPN_ID,
  SourceMap,
  realFileName,
  span,
  spanTo,
  withCtxt,
  type ExpnData,
} from "@expandite/core";

function macroData(parent: number, callSite = DUMMY_SP, descr = "m"): ExpnData {
  return {
    kind: { type: "macro", macroKind: "bang", descr },
    parent,
    callSite,
    defSite: DUMMY_SP,
    allowInternalUnsafe: false,
    localInnerMacros: false,
    edition: "2018",
  };
}

describe("spanTo", () => {
  it("should cover both spans", () => {
    expect(spanTo(span(10, 12), span(4, 6))).toEqual({ lo: 4, hi: 12, ctxt: ROOT_CTXT });
  });

  it("should keep the non-root context", () => {
    expect(spanTo(span(1, 2), span(3, 4, 7))).toEqual({ lo: 1, hi: 4, ctxt: 7 });
  });

  it("should ignore a dummy side", () => {
    expect(spanTo(DUMMY_SP, span(3, 4))).toEqual(span(3, 4));
    expect(spanTo(span(3, 4), DUMMY_SP)).toEqual(span(3, 4));
  });
});

describe("HygieneData", () => {
  let hygiene: HygieneData;

  beforeEach(() => {
    hygiene = new HygieneData();
  });

  it("should start with the root expansion", () => {
    expect(hygiene.expnCount).toBe(1);
    expect(hygiene.getExpnData(ROOT_EXPN_ID).kind).toEqual({ type: "root" });
  });

  it("should set expansion data exactly once", () => {
    const id = hygiene.freshExpn();
    expect(hygiene.hasExpnData(id)).toBe(false);
    hygiene.setExpnData(id, macroData(ROOT_EXPN_ID));
    expect(hygiene.hasExpnData(id)).toBe(true);
    expect(() => hygiene.setExpnData(id, macroData(ROOT_EXPN_ID))).toThrow(
      "internal error: expansion data is reset for an expansion ID #1",
    );
  });

  it("should reject unknown ids", () => {
    expect(() => hygiene.getExpnData(5)).toThrow(ExplicitBug);
    expect(() => hygiene.outerExpn(3)).toThrow("internal error: unknown syntax context #3");
  });

  it("should report missing data as a bug", () => {
    const id = hygiene.freshExpn();
    expect(() => hygiene.getExpnData(id)).toThrow(`internal error: no expansion data for expansion ID #${id}`);
  });

  it("should follow parents for descendant checks", () => {
    const outer = hygiene.freshExpn(macroData(ROOT_EXPN_ID));
    const inner = hygiene.freshExpn(macroData(outer));
    const sibling = hygiene.freshExpn(macroData(ROOT_EXPN_ID));

    expect(hygiene.isDescendantOf(inner, outer)).toBe(true);
    expect(hygiene.isDescendantOf(inner, ROOT_EXPN_ID)).toBe(true);
    expect(hygiene.isDescendantOf(outer, outer)).toBe(true);
    expect(hygiene.isDescendantOf(sibling, outer)).toBe(false);
    expect(hygiene.parent(inner)).toBe(outer);
  });

  it("should share one context for equal mark chains", () => {
    const expn = hygiene.freshExpn(macroData(ROOT_EXPN_ID));
    const a = hygiene.applyMark(ROOT_CTXT, expn, "opaque");
    const b = hygiene.applyMark(ROOT_CTXT, expn, "opaque");
    const c = hygiene.applyMark(ROOT_CTXT, expn, "transparent");

    expect(a).toBe(b);
    expect(c).not.toBe(a);
    expect(hygiene.outerExpn(a)).toBe(expn);
    expect(hygiene.outerTransparency(c)).toBe("transparent");
    expect(hygiene.parentCtxt(a)).toBe(ROOT_CTXT);
  });

  it("should list marks innermost last", () => {
    const first = hygiene.freshExpn(macroData(ROOT_EXPN_ID));
    const second = hygiene.freshExpn(macroData(first));
    const ctxt = hygiene.applyMark(hygiene.applyMark(ROOT_CTXT, first, "opaque"), second, "semi-transparent");

    expect(hygiene.marks(ctxt)).toEqual([
      [first, "opaque"],
      [second, "semi-transparent"],
    ]);
  });

  it("should replace rather than extend the context in spanWithMark", () => {
    const first = hygiene.freshExpn(macroData(ROOT_EXPN_ID));
    const second = hygiene.freshExpn(macroData(first));
    const marked = hygiene.spanWithMark(span(1, 2), first, "opaque");
    const remarked = hygiene.spanWithMark(marked, second, "opaque");

    expect(hygiene.marks(remarked.ctxt)).toEqual([[second, "opaque"]]);
  });

  it("should walk call sites back to written source", () => {
    const written = span(40, 50);
    const outer = hygiene.freshExpn(macroData(ROOT_EXPN_ID, written));
    const outerSite = hygiene.spanWithMark(span(60, 61), outer, "opaque");
    const inner = hygiene.freshExpn(macroData(outer, outerSite));
    const generated = hygiene.spanWithMark(span(70, 71), inner, "opaque");

    expect(hygiene.sourceCallsite(generated)).toEqual(written);
    expect(hygiene.sourceCallsite(written)).toBe(written);
  });
});

describe("SourceMap", () => {
  it("should give every file its own position range", () => {
    const map = new SourceMap();
    const a = map.addFile(realFileName("/a.ex"), "ab\ncd");
    const b = map.addFile(realFileName("/b.ex"), "xyz");

    expect(a.startPos).toBe(1);
    expect(b.startPos).toBe(a.endPos + 1);
    expect(map.lookupFile(b.startPos)).toBe(b);
    expect(map.lookupFile(0)).toBeUndefined();
  });

  it("should report 1-based lines and columns", () => {
    const map = new SourceMap();
    const file = map.addFile(realFileName("/a.ex"), "ab\ncd");
    const loc = map.lookupLineCol(file.startPos + 4);

    expect(loc?.line).toBe(2);
    expect(loc?.col).toBe(2);
    expect(map.spanToString(span(file.startPos + 3, file.startPos + 4))).toBe("/a.ex:2:1");
    expect(map.spanToSnippet(span(file.startPos, file.startPos + 2))).toBe("ab");
    expect(file.lineText(2)).toBe("cd");
  });

  it("should name unknown positions", () => {
    const map = new SourceMap();
    expect(map.spanToFilename(DUMMY_SP)).toEqual({ kind: "anon" });
    expect(map.spanToString(withCtxt(DUMMY_SP, 0))).toBe("<unknown>");
  });
});

describe("Lock", () => {
  it("should release after the critical section, even on throw", () => {
    const lock = new Lock(new Map<string, number>());
    expect(() =>
      lock.withLock(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(lock.isHeld).toBe(false);
    expect(lock.withLock((map) => map.size)).toBe(0);
  });

  it("should treat re-entry as a bug", () => {
    const lock = new Lock(0);
    expect(() => lock.withLock(() => lock.withLock((v) => v))).toThrow("internal error: lock is already held");
    expect(lock.isHeld).toBe(false);
  });
});
