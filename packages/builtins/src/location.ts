/**
 * Location macros: `line!`, `column!`, `file!` and `module_path!`.
 *
 * The first three report the outermost macro call that led here, so a
 * `line!()` produced by another macro names the line the user wrote.
 */

import {
  DummyResult,
  MacEager,
  checkZeroTts,
  fileNameToString,
  type ExtCtxt,
  type LegacyBangExpander,
  type Loc,
  type MacResult,
  type Span,
  type TokenStream,
} from "@expandite/core";

function withTopmostLoc(
  ecx: ExtCtxt,
  sp: Span,
  tts: TokenStream,
  name: string,
  make: (topmost: Span, loc: Loc) => MacResult,
): MacResult {
  checkZeroTts(ecx, sp, tts, name);
  const topmost = ecx.expansionCause() ?? sp;
  const loc = ecx.sourceMap.lookupLineCol(topmost.lo);
  if (loc === undefined) {
    ecx.spanErr(sp, `\`${name}\` used outside of any source file`);
    return DummyResult.any(sp);
  }
  return make(topmost, loc);
}

export const expandLine: LegacyBangExpander = (ecx, sp, tts) =>
  withTopmostLoc(ecx, sp, tts, "line!", (topmost, loc) => MacEager.expr(ecx.exprNum(topmost, loc.line)));

/** 1-based. */
export const expandColumn: LegacyBangExpander = (ecx, sp, tts) =>
  withTopmostLoc(ecx, sp, tts, "column!", (topmost, loc) => MacEager.expr(ecx.exprNum(topmost, loc.col)));

export const expandFile: LegacyBangExpander = (ecx, sp, tts) =>
  withTopmostLoc(ecx, sp, tts, "file!", (topmost, loc) =>
    MacEager.expr(ecx.exprStr(topmost, fileNameToString(loc.file.name))),
  );

/** `crate::outer::inner`, starting from the crate name. */
export const expandModPath: LegacyBangExpander = (ecx, sp, tts) => {
  checkZeroTts(ecx, sp, tts, "module_path!");
  const modPath = [ecx.ecfg.crateName, ...ecx.currentExpansion.module.modPath.map((id) => id.name)];
  return MacEager.expr(ecx.exprStr(sp, modPath.join("::")));
};
