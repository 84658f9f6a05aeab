/**
 * `concat!` and `stringify!`.
 */

import {
  DummyResult,
  MacEager,
  getExprsFromTts,
  type Expr,
  type LegacyBangExpander,
  type Span,
} from "@expandite/core";

type LiteralText = { type: "text"; value: string } | { type: "error" } | { type: "missing" };

function literalText(expr: Expr): LiteralText {
  if (expr.kind === "err") return { type: "error" };
  if (expr.kind === "unary" && expr.op === "-" && expr.operand.kind === "lit" && expr.operand.lit.kind.type === "num") {
    return { type: "text", value: `-${expr.operand.lit.kind.text}` };
  }
  if (expr.kind !== "lit") return { type: "missing" };
  const kind = expr.lit.kind;
  switch (kind.type) {
    case "str":
      return { type: "text", value: kind.value };
    case "num":
      return { type: "text", value: kind.text };
    case "bool":
      return { type: "text", value: String(kind.value) };
    case "err":
      return { type: "error" };
  }
}

/** Concatenate literal arguments, each expanded first, into one string literal. */
export const expandConcat: LegacyBangExpander = (ecx, sp, tts) => {
  const exprs = getExprsFromTts(ecx, sp, tts);
  if (exprs === undefined) return DummyResult.any(sp);

  let accumulator = "";
  const missing: Span[] = [];
  let hasErrors = false;
  for (const expr of exprs) {
    const text = literalText(expr);
    switch (text.type) {
      case "text":
        accumulator += text.value;
        break;
      case "error":
        hasErrors = true;
        break;
      case "missing":
        missing.push(expr.span);
        break;
    }
  }

  const [first, ...rest] = missing;
  if (first !== undefined) {
    const db = ecx.structSpanErr(first, "expected a literal");
    for (const other of rest) db.spanNote(other, "expected a literal");
    db.note("only literals (like `\"foo\"`, `42` and `3.14`) can be passed to `concat!()`").emit();
    return DummyResult.any(sp);
  }
  if (hasErrors) return DummyResult.any(sp);

  return MacEager.expr(ecx.exprStr(ecx.withDefSiteCtxt(sp), accumulator));
};

/** The argument tokens, printed. */
export const expandStringify: LegacyBangExpander = (ecx, sp, tts) =>
  MacEager.expr(ecx.exprStr(ecx.withDefSiteCtxt(sp), tts.toString()));
