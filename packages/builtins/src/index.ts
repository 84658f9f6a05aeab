/**
 * @expandite/builtins - Built-in Extensions
 *
 * Function-like macros, derives and inert attributes available to every
 * crate once `registerBuiltins` has run against the session's resolver.
 */

export { BUILTIN_MACROS, INERT_ATTRIBUTES, registerBuiltins, type BuiltinMacro } from "./register.js";
export { expandConcat, expandStringify } from "./text.js";
export { expandColumn, expandFile, expandLine, expandModPath } from "./location.js";
export { expandInclude, expandIncludeStr } from "./include.js";
export { expandCompileError, expandTraceMacros } from "./control.js";
export { deriveClone, deriveCopy, deriveDefault, deriveEq, derivePartialEq } from "./derive.js";
