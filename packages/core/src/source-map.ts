/**
 * Session source map.
 *
 * Every file added to the session occupies its own range of global byte
 * positions, so a span alone identifies its file. Position 0 is never
 * allocated, which keeps {@link DUMMY_SP} distinct from real text.
 */

import type { Span } from "./span.js";

export type FileName =
  | { kind: "real"; path: string }
  | { kind: "macro-expansion" }
  | { kind: "anon" }
  | { kind: "custom"; name: string };

export function realFileName(path: string): FileName {
  return { kind: "real", path };
}

export function fileNameToString(name: FileName): string {
  switch (name.kind) {
    case "real":
      return name.path;
    case "macro-expansion":
      return "<macro expansion>";
    case "anon":
      return "<anon>";
    case "custom":
      return `<${name.name}>`;
  }
}

export class SourceFile {
  private lineStarts: number[] | undefined;

  constructor(
    readonly name: FileName,
    readonly text: string,
    readonly startPos: number,
  ) {}

  get endPos(): number {
    return this.startPos + this.text.length;
  }

  contains(pos: number): boolean {
    return pos >= this.startPos && pos <= this.endPos;
  }

  /** 1-based line and column of a global position inside this file. */
  lineCol(pos: number): { line: number; col: number } {
    const starts = this.getLineStarts();
    const offset = pos - this.startPos;
    let lo = 0;
    let hi = starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (starts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, col: offset - starts[lo] + 1 };
  }

  lineText(line: number): string {
    const starts = this.getLineStarts();
    const start = starts[line - 1];
    if (start === undefined) return "";
    const next = starts[line];
    const end = next === undefined ? this.text.length : next - 1;
    return this.text.slice(start, end).replace(/\r$/, "");
  }

  private getLineStarts(): number[] {
    if (this.lineStarts === undefined) {
      const starts = [0];
      for (let i = 0; i < this.text.length; i++) {
        if (this.text.charCodeAt(i) === 10) starts.push(i + 1);
      }
      this.lineStarts = starts;
    }
    return this.lineStarts;
  }
}

export interface Loc {
  file: SourceFile;
  line: number;
  col: number;
}

export class SourceMap {
  private readonly files: SourceFile[] = [];
  private nextStart = 1;

  addFile(name: FileName, text: string): SourceFile {
    const file = new SourceFile(name, text, this.nextStart);
    this.files.push(file);
    this.nextStart = file.endPos + 1;
    return file;
  }

  allFiles(): readonly SourceFile[] {
    return this.files;
  }

  lookupFile(pos: number): SourceFile | undefined {
    return this.files.find((file) => file.contains(pos));
  }

  lookupLineCol(pos: number): Loc | undefined {
    const file = this.lookupFile(pos);
    if (file === undefined) return undefined;
    return { file, ...file.lineCol(pos) };
  }

  spanToFilename(sp: Span): FileName {
    return this.lookupFile(sp.lo)?.name ?? { kind: "anon" };
  }

  spanToSnippet(sp: Span): string | undefined {
    const file = this.lookupFile(sp.lo);
    if (file === undefined || !file.contains(sp.hi)) return undefined;
    return file.text.slice(sp.lo - file.startPos, sp.hi - file.startPos);
  }

  /** `file:line:col` for a span, as used by diagnostics and `file!()`. */
  spanToString(sp: Span): string {
    const loc = this.lookupLineCol(sp.lo);
    if (loc === undefined) return "<unknown>";
    return `${fileNameToString(loc.file.name)}:${loc.line}:${loc.col}`;
  }
}
