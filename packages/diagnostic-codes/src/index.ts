/**
 * @expandite/diagnostic-codes
 *
 * Per-session registry of diagnostic codes and the macros that register,
 * use and export them.
 */

export {
  MAX_DESCRIPTION_WIDTH,
  buildDiagnosticArray,
  checkDescription,
  isFootnoteUrl,
  markDiagnosticUsed,
  registerDiagnostic,
} from "./registry.js";
export {
  DIAGNOSTIC_MACROS,
  expandBuildDiagnosticArray,
  expandDiagnosticUsed,
  expandRegisterDiagnostic,
  registerDiagnosticMacros,
  type DiagnosticMacro,
} from "./macros.js";
