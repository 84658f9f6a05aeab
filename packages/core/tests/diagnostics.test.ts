/**
 * Tests for the diagnostic handler and renderer
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  ExplicitBug,
  FatalError,
  Handler,
  SourceMap,
  printDiagnostics,
  realFileName,
  renderDiagnostic,
  renderDiagnostics,
  span,
  type Diagnostic,
} from "@expandite/core";

describe("Handler", () => {
  let handler: Handler;

  beforeEach(() => {
    handler = new Handler();
  });

  it("should report nothing until a builder is emitted", () => {
    const builder = handler.structSpanErr(span(1, 2), "bad").code("E0001").note("more");
    expect(handler.diagnostics()).toEqual([]);

    builder.emit();
    builder.emit();
    expect(handler.diagnostics()).toEqual([
      { level: "error", message: "bad", code: "E0001", span: span(1, 2), children: [{ level: "note", message: "more" }] },
    ]);
  });

  it("should drop a cancelled builder", () => {
    const builder = handler.structSpanWarn(span(1, 2), "never mind");
    builder.cancel();
    builder.emit();
    expect(builder.cancelled).toBe(true);
    expect(handler.diagnostics()).toEqual([]);
  });

  it("should count errors but not warnings or notes", () => {
    handler.spanWarn(span(1, 2), "w");
    handler.spanNoteDiag(span(1, 2), "n").emit();
    expect(handler.hasErrors()).toBe(false);
    expect(() => handler.abortIfErrors()).not.toThrow();

    handler.spanErrWithCode(span(1, 2), "e", "E0002");
    expect(handler.errCount()).toBe(1);
    expect(handler.diagnostics()[2]?.code).toBe("E0002");
    expect(() => handler.abortIfErrors()).toThrow(FatalError);
  });

  it("should emit a fatal diagnostic and hand back the error", () => {
    const error = handler.spanFatal(span(3, 4), "stop");
    expect(error).toBeInstanceOf(FatalError);
    expect(error.message).toBe("aborting due to previous error");
    expect(handler.diagnostics()[0]?.level).toBe("fatal");
    expect(handler.errCount()).toBe(1);
  });

  it("should throw internal errors after recording them", () => {
    expect(() => handler.spanBug(span(1, 2), "broken")).toThrow(ExplicitBug);
    expect(() => handler.bug("worse")).toThrow("internal error: worse");
    expect(handler.diagnostics().map((d) => [d.level, d.message])).toEqual([
      ["bug", "broken"],
      ["bug", "worse"],
    ]);
  });

  it("should forward every diagnostic to the emitter", () => {
    const seen: string[] = [];
    const forwarding = new Handler({ emitter: (d) => seen.push(d.message) });
    forwarding.spanWarn(span(1, 2), "first");
    forwarding.spanErr(span(1, 2), "second");
    expect(seen).toEqual(["first", "second"]);
  });
});

describe("renderDiagnostic", () => {
  const sourceMap = new SourceMap();
  sourceMap.addFile(realFileName("/a.ex"), "let x = 1;\nfoo!();");

  it("should point at the span under its source line", () => {
    const diagnostic: Diagnostic = {
      level: "error",
      code: "E0001",
      message: "boom",
      span: span(12, 18),
      children: [{ level: "note", message: "see here" }],
    };
    expect(renderDiagnostic(diagnostic, sourceMap, { colors: false }).split("\n")).toEqual([
      "error[E0001]: boom",
      "  --> /a.ex:2:1",
      "   |",
      " 2 | foo!();",
      "   | ^^^^^^",
      "   = note: see here",
    ]);
  });

  it("should label internal errors", () => {
    const text = renderDiagnostic({ level: "bug", message: "oops", children: [] }, sourceMap, { colors: false });
    expect(text).toBe("error: internal compiler error: oops");
  });

  it("should add colors on request", () => {
    const text = renderDiagnostic({ level: "warning", message: "w", children: [] }, sourceMap, { colors: true });
    expect(text).toBe("\x1b[1m\x1b[33mwarning\x1b[0m: \x1b[1mw\x1b[0m");
  });

  it("should summarize errors and warnings", () => {
    const diagnostics: Diagnostic[] = [
      { level: "error", message: "e", children: [] },
      { level: "warning", message: "w", children: [] },
    ];
    expect(renderDiagnostics(diagnostics, sourceMap, { colors: false })).toBe(
      "error: e\n\nwarning: w\n\n1 error, 1 warning generated",
    );
  });

  it("should write nothing when there is nothing to report", () => {
    const written: string[] = [];
    printDiagnostics([], sourceMap, { writer: (text) => written.push(text) });
    printDiagnostics([{ level: "note", message: "n", children: [] }], sourceMap, {
      colors: false,
      writer: (text) => written.push(text),
    });
    expect(written).toEqual(["note: n"]);
  });
});
