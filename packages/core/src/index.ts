/**
 * Core module exports for @expandite/core
 *
 * This package provides:
 * - Source locations, hygiene and the session (spans, source map, handler)
 * - Tokens, syntax tree, parser and printer for the macro surface syntax
 * - Syntax extensions, the expansion context and the macro expander
 * - Name resolution contract with a reference resolver
 */

// Source locations and hygiene
export * from "./span.js";
export * from "./source-map.js";
export * from "./hygiene.js";

// Session and diagnostics
export * from "./errors.js";
export * from "./diagnostics.js";
export { Lock } from "./lock.js";
export { ParseSess, type ErrorInfo, type ErrorMap, type ParseSessOptions } from "./session.js";

// Tokens and syntax
export * from "./lexer.js";
export * from "./tokenstream.js";
export * from "./ast.js";
export * from "./attr.js";
export { Parser, parseCrateFromSource } from "./parser.js";
export * from "./print.js";
export { MutVisitor } from "./visit.js";

// Expansion
export * from "./annotatable.js";
export * from "./fragments.js";
export { MacResult, MacEager, DummyResult, type MacEagerSlots } from "./mac-result.js";
export * from "./syntax-extension.js";
export * from "./invocation.js";
export * from "./resolver.js";
export * from "./context.js";
export { MacroExpander } from "./expand.js";
export { createGenericRegistry, moduleKey, type GenericRegistry, type RegistryOptions, type DuplicateStrategy } from "./registry.js";

// Runtime Safety Primitives
export { unreachable } from "./safety.js";

// Configuration System
export { config, defineConfig, validateConfig, type ExpanditeConfig, type ResolvedConfig } from "./config.js";
