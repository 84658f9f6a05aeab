/**
 * `compile_error!` and `trace_macros!`.
 */

import { DummyResult, getSingleStrFromTts, isIdentNamed, type LegacyBangExpander } from "@expandite/core";

/** Reports its argument as an error at the call site. */
export const expandCompileError: LegacyBangExpander = (ecx, sp, tts) => {
  const message = getSingleStrFromTts(ecx, sp, tts, "compile_error!");
  if (message !== undefined) ecx.spanErr(sp, message);
  return DummyResult.any(sp);
};

/** `trace_macros!(true)` / `trace_macros!(false)`; expands to nothing. */
export const expandTraceMacros: LegacyBangExpander = (ecx, sp, tts) => {
  const tree = tts.length === 1 ? tts.get(0) : undefined;
  const token = tree?.type === "token" ? tree.token : undefined;
  if (token !== undefined && isIdentNamed(token, "true")) {
    ecx.setTraceMacros(true);
  } else if (token !== undefined && isIdentNamed(token, "false")) {
    ecx.setTraceMacros(false);
  } else {
    ecx.spanErr(sp, "trace_macros! accepts only `true` or `false`");
  }
  return DummyResult.anyValid(sp);
};
