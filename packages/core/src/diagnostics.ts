/**
 * Diagnostics System
 *
 * Every report made during parsing and expansion flows through one
 * {@link Handler}, which accumulates diagnostics, counts errors, and
 * optionally forwards each diagnostic to an emitter as it is emitted.
 *
 * Severities:
 * - `warning`, `error`: non-fatal; the pass continues
 * - `fatal`: emitted, then the caller unwinds with {@link FatalError}
 * - `bug`: an internal invariant failed; always thrown as {@link ExplicitBug}
 *
 * @example
 * ```typescript
 * handler
 *   .structSpanWarn(span, "diagnostic code E0001 already used")
 *   .spanNote(previous, "previous invocation")
 *   .emit();
 * ```
 */

import { config } from "./config.js";
import { ExplicitBug, FatalError } from "./errors.js";
import { fileNameToString, type SourceMap } from "./source-map.js";
import type { Span } from "./span.js";

export type Level = "bug" | "fatal" | "error" | "warning" | "note" | "help";

export interface SubDiagnostic {
  level: "note" | "help";
  message: string;
  span?: Span;
}

export interface Diagnostic {
  level: Level;
  message: string;
  /** Stable error code such as `E0001`. */
  code?: string;
  span?: Span;
  children: SubDiagnostic[];
}

function isErrorLevel(level: Level): boolean {
  return level === "error" || level === "fatal" || level === "bug";
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for one diagnostic. Nothing is reported until `emit()`;
 * a cancelled builder reports nothing.
 */
export class DiagnosticBuilder {
  private readonly diagnostic: Diagnostic;
  private done = false;

  constructor(
    private readonly handler: Handler,
    level: Level,
    message: string,
    span?: Span,
  ) {
    this.diagnostic = { level, message, span, children: [] };
  }

  get level(): Level {
    return this.diagnostic.level;
  }

  get message(): string {
    return this.diagnostic.message;
  }

  setSpan(span: Span): this {
    this.diagnostic.span = span;
    return this;
  }

  code(code: string): this {
    this.diagnostic.code = code;
    return this;
  }

  note(message: string): this {
    this.diagnostic.children.push({ level: "note", message });
    return this;
  }

  spanNote(span: Span, message: string): this {
    this.diagnostic.children.push({ level: "note", message, span });
    return this;
  }

  help(message: string): this {
    this.diagnostic.children.push({ level: "help", message });
    return this;
  }

  spanHelp(span: Span, message: string): this {
    this.diagnostic.children.push({ level: "help", message, span });
    return this;
  }

  emit(): void {
    if (this.done) return;
    this.done = true;
    this.handler.emitDiagnostic(this.diagnostic);
  }

  cancel(): void {
    this.done = true;
  }

  get cancelled(): boolean {
    return this.done;
  }
}

// ============================================================================
// Handler
// ============================================================================

export interface HandlerOptions {
  /** Called with every diagnostic as it is emitted. */
  emitter?: (diagnostic: Diagnostic) => void;
}

export class Handler {
  private readonly emitted: Diagnostic[] = [];
  private errors = 0;

  constructor(private readonly options: HandlerOptions = {}) {}

  emitDiagnostic(diagnostic: Diagnostic): void {
    this.emitted.push(diagnostic);
    if (isErrorLevel(diagnostic.level)) this.errors++;
    this.options.emitter?.(diagnostic);
  }

  structSpanWarn(span: Span, message: string): DiagnosticBuilder {
    return new DiagnosticBuilder(this, "warning", message, span);
  }

  structSpanErr(span: Span, message: string): DiagnosticBuilder {
    return new DiagnosticBuilder(this, "error", message, span);
  }

  structSpanFatal(span: Span, message: string): DiagnosticBuilder {
    return new DiagnosticBuilder(this, "fatal", message, span);
  }

  structErr(message: string): DiagnosticBuilder {
    return new DiagnosticBuilder(this, "error", message);
  }

  /** Note-level diagnostic attached to a span; used for macro traces. */
  spanNoteDiag(span: Span, message: string): DiagnosticBuilder {
    return new DiagnosticBuilder(this, "note", message, span);
  }

  spanErr(span: Span, message: string): void {
    this.structSpanErr(span, message).emit();
  }

  spanErrWithCode(span: Span, message: string, code: string): void {
    this.structSpanErr(span, message).code(code).emit();
  }

  spanWarn(span: Span, message: string): void {
    this.structSpanWarn(span, message).emit();
  }

  /**
   * Emit a fatal diagnostic and return the error for the caller to throw,
   * so that control flow stays visible at the call site.
   */
  spanFatal(span: Span, message: string): FatalError {
    this.structSpanFatal(span, message).emit();
    return new FatalError();
  }

  spanBug(span: Span, message: string): never {
    new DiagnosticBuilder(this, "bug", message, span).emit();
    throw new ExplicitBug(message);
  }

  spanUnimpl(span: Span, message: string): never {
    return this.spanBug(span, `unimplemented ${message}`);
  }

  bug(message: string): never {
    new DiagnosticBuilder(this, "bug", message).emit();
    throw new ExplicitBug(message);
  }

  errCount(): number {
    return this.errors;
  }

  hasErrors(): boolean {
    return this.errors > 0;
  }

  /** Unwind if any error has been reported so far. */
  abortIfErrors(): void {
    if (this.hasErrors()) throw new FatalError();
  }

  diagnostics(): readonly Diagnostic[] {
    return this.emitted;
  }
}

// ============================================================================
// CLI Renderer
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or EXPANDITE_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

type ColorName = keyof typeof COLORS;

function colorsFromEnv(): boolean {
  const env = process.env;
  return !env.NO_COLOR && !env.EXPANDITE_NO_COLOR && env.FORCE_COLOR !== "0";
}

function levelColor(level: Level): ColorName {
  switch (level) {
    case "bug":
    case "fatal":
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "note":
      return "green";
    case "help":
      return "cyan";
  }
}

function levelLabel(level: Level): string {
  switch (level) {
    case "bug":
      return "error: internal compiler error";
    case "fatal":
      return "error";
    default:
      return level;
  }
}

export interface RenderOptions {
  /** Whether to use colors (default: the `colors` setting, else auto-detect) */
  colors?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: (text: string) => void;
}

/**
 * Render one diagnostic in the familiar compiler format.
 *
 * @example Output:
 * ```
 * error[E0001]: diagnostic code E0001 already registered
 *   --> src/lib.ex:3:1
 *    |
 *  3 | __register_diagnostic!(E0001);
 *    | ^^^^^^^^^^^^^^^^^^^^^^^^^^^^^
 *    |
 * ```
 */
export function renderDiagnostic(
  diagnostic: Diagnostic,
  sourceMap: SourceMap,
  options: RenderOptions = {},
): string {
  const useColors = options.colors ?? config.get("colors") ?? colorsFromEnv();
  const color = (text: string, ...styles: ColorName[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const lines: string[] = [];
  const levelClr = levelColor(diagnostic.level);
  const code = diagnostic.code ? `[${diagnostic.code}]` : "";
  lines.push(`${color(`${levelLabel(diagnostic.level)}${code}`, "bold", levelClr)}: ${color(diagnostic.message, "bold")}`);

  if (diagnostic.span) {
    renderSnippet(lines, diagnostic.span, sourceMap, color, levelClr);
  }

  for (const child of diagnostic.children) {
    if (child.span) {
      lines.push(`${color(child.level, "bold", levelColor(child.level))}: ${child.message}`);
      renderSnippet(lines, child.span, sourceMap, color, "blue");
    } else {
      lines.push(`   ${color(`= ${child.level}:`, "bold")} ${child.message}`);
    }
  }

  return lines.join("\n");
}

function renderSnippet(
  lines: string[],
  sp: Span,
  sourceMap: SourceMap,
  color: (text: string, ...styles: ColorName[]) => string,
  underlineColor: ColorName,
): void {
  const start = sourceMap.lookupLineCol(sp.lo);
  if (start === undefined) return;
  const { file, line, col } = start;
  const numWidth = Math.max(2, String(line).length);
  const gutter = " ".repeat(numWidth);
  const lineText = file.lineText(line);
  const end = file.contains(sp.hi) ? file.lineCol(sp.hi) : start;
  const endCol = end.line === line ? end.col : lineText.length + 1;

  lines.push(`${gutter}${color("-->", "blue")} ${fileNameToString(file.name)}:${line}:${col}`);
  lines.push(`${gutter} ${color("|", "blue")}`);
  lines.push(`${color(String(line).padStart(numWidth, " "), "blue")} ${color("|", "blue")} ${lineText}`);
  const underline = " ".repeat(col - 1) + "^".repeat(Math.max(1, endCol - col));
  lines.push(`${gutter} ${color("|", "blue")} ${color(underline, underlineColor)}`);
}

/** Render every diagnostic followed by an error/warning summary line. */
export function renderDiagnostics(
  diagnostics: readonly Diagnostic[],
  sourceMap: SourceMap,
  options: RenderOptions = {},
): string {
  if (diagnostics.length === 0) return "";

  const blocks = diagnostics.map((d) => renderDiagnostic(d, sourceMap, options));
  const errorCount = diagnostics.filter((d) => isErrorLevel(d.level)).length;
  const warnCount = diagnostics.filter((d) => d.level === "warning").length;

  const parts: string[] = [];
  if (errorCount > 0) parts.push(`${errorCount} error${errorCount > 1 ? "s" : ""}`);
  if (warnCount > 0) parts.push(`${warnCount} warning${warnCount > 1 ? "s" : ""}`);
  if (parts.length > 0) blocks.push(`${parts.join(", ")} generated`);

  return blocks.join("\n\n");
}

export function printDiagnostics(
  diagnostics: readonly Diagnostic[],
  sourceMap: SourceMap,
  options: RenderOptions = {},
): void {
  const writer = options.writer ?? ((text: string) => console.error(text));
  const text = renderDiagnostics(diagnostics, sourceMap, options);
  if (text.length > 0) writer(text);
}
