/**
 * Macro Name Resolution
 *
 * The expander never looks names up itself. It asks a {@link Resolver},
 * which may answer "indeterminate" when the name could still be defined by a
 * later expansion; the expander then retries the invocation on a later pass.
 * An indeterminate answer never has a side effect.
 *
 * {@link MacroResolver} is the reference implementation: built-in macros
 * registered by name, plus user macros declared as aliases
 * (`macro name = target;`) and scoped by module.
 */

import { containsName } from "./attr.js";
import {
  CRATE_NODE_ID,
  DUMMY_NODE_ID,
  pathIs,
  pathToString,
  type Attribute,
  type Block,
  type Ident,
  type Item,
  type NodeId,
  type Path,
  type Stmt,
} from "./ast.js";
import type { AstFragment } from "./fragments.js";
import { ROOT_EXPN_ID, type ExpnId, type MacroKind } from "./hygiene.js";
import { invocationMacroKind, type Invocation } from "./invocation.js";
import { createGenericRegistry, moduleKey, type GenericRegistry } from "./registry.js";
import type { ParseSess } from "./session.js";
import type { Edition, Span } from "./span.js";
import { macroKindDescr, SyntaxExtension } from "./syntax-extension.js";

/** Derives later passes can take shortcuts on. Combined with `|`. */
export enum SpecialDerives {
  None = 0,
  PartialEq = 1 << 0,
  Eq = 1 << 1,
  Copy = 1 << 2,
}

export type ResolveOutcome =
  | { type: "single"; ext: SyntaxExtension }
  /** One extension per derive path, in declaration order. */
  | { type: "derive-container"; exts: SyntaxExtension[] }
  | { type: "indeterminate" };

export interface Resolver {
  nextNodeId(): NodeId;

  /** Expansion that owns the module with this node id. */
  getModuleScope(id: NodeId): ExpnId;

  /** Record definitions produced by expansion `expn`. */
  visitAstFragmentWithPlaceholders(expn: ExpnId, fragment: AstFragment): void;

  registerBuiltinMacro(ident: Ident, ext: SyntaxExtension): void;

  /**
   * @param eagerExpansionRoot - expansion that started the current eager
   *   expansion; the crate root scope outside of one
   * @param force - no later pass can define the name, so report it missing
   */
  resolveMacroInvocation(invoc: Invocation, eagerExpansionRoot: ExpnId, force: boolean): ResolveOutcome;

  checkUnusedMacros(): void;

  hasDerives(expn: ExpnId, derives: SpecialDerives): boolean;

  /** Union `derives` into the flags recorded for `expn`. */
  addDerives(expn: ExpnId, derives: SpecialDerives): void;
}

// ============================================================================
// Reference resolver
// ============================================================================

interface MacroDef {
  name: string;
  modPath: readonly string[];
  target: Path;
  attrs: Attribute[];
  span: Span;
  /** Expansion whose tree the definition was spliced into. */
  scope: ExpnId;
}

/**
 * `base` is the extension at the end of the alias chain; `defs` is the chain
 * that led to it, outermost first.
 */
type Lookup = { type: "found"; base: SyntaxExtension; defs: MacroDef[] } | { type: "missing" };

function expectedDescr(kind: MacroKind): string {
  switch (kind) {
    case "bang":
      return "macro";
    case "attr":
      return "attribute";
    case "derive":
      return "derive macro";
  }
}

export class MacroResolver implements Resolver {
  private nodeIds = CRATE_NODE_ID;
  private readonly builtins: GenericRegistry<string, SyntaxExtension> = createGenericRegistry({
    name: "BuiltinMacros",
  });
  private readonly userMacros: GenericRegistry<string, MacroDef[]> = createGenericRegistry({
    name: "UserMacros",
    duplicateStrategy: "merge",
    merge: (existing, incoming) => [...existing, ...incoming],
  });
  private readonly specialDerives: GenericRegistry<ExpnId, SpecialDerives> = createGenericRegistry({
    name: "SpecialDerives",
    duplicateStrategy: "merge",
    merge: (existing, incoming) => existing | incoming,
  });
  private readonly moduleScopes = new Map<NodeId, ExpnId>([[CRATE_NODE_ID, ROOT_EXPN_ID]]);
  /** Module path each resolved invocation expands in. */
  private readonly expnModules = new Map<ExpnId, readonly string[]>([[ROOT_EXPN_ID, []]]);
  private readonly extCache = new WeakMap<MacroDef, SyntaxExtension>();
  private readonly usedDefs = new WeakSet<MacroDef>();
  private readonly allDefs: MacroDef[] = [];

  constructor(
    private readonly sess: ParseSess,
    private readonly edition: Edition = sess.edition,
  ) {}

  nextNodeId(): NodeId {
    return ++this.nodeIds;
  }

  getModuleScope(id: NodeId): ExpnId {
    const scope = this.moduleScopes.get(id);
    if (scope === undefined) return this.sess.spanDiagnostic.bug(`no module scope recorded for node ${id}`);
    return scope;
  }

  registerBuiltinMacro(ident: Ident, ext: SyntaxExtension): void {
    if (this.builtins.has(ident.name)) {
      this.sess.spanDiagnostic.spanErr(ident.span, "attempted to define built-in macro more than once");
      return;
    }
    this.builtins.set(ident.name, ext);
  }

  visitAstFragmentWithPlaceholders(expn: ExpnId, fragment: AstFragment): void {
    const scope = expn === ROOT_EXPN_ID ? ROOT_EXPN_ID : this.sess.hygiene.parent(expn);
    const modPath = this.moduleOf(expn);
    switch (fragment.kind) {
      case "items":
        this.visitItems(fragment.items, modPath, expn, scope);
        break;
      case "stmts":
        this.visitStmts(fragment.stmts, modPath, expn, scope);
        break;
      default:
        break;
    }
  }

  resolveMacroInvocation(invoc: Invocation, eagerExpansionRoot: ExpnId, force: boolean): ResolveOutcome {
    const kind = invoc.kind;
    const modPath = invoc.expansionData.module.modPath.map((i) => i.name);
    const scopes = [invoc.parent, eagerExpansionRoot];

    if (kind.type === "derive-container") {
      const lookups = kind.derives.map((path) => ({ path, found: this.lookup(path, modPath, scopes) }));
      if (!force && lookups.some(({ found }) => found.type === "missing")) return { type: "indeterminate" };
      const exts = lookups.map(({ path, found }) => this.finish(found, path, "derive"));
      this.expnModules.set(invoc.expansionData.id, modPath);
      return { type: "derive-container", exts };
    }

    const path = kind.type === "bang" ? kind.mac.path : kind.type === "attr" ? kind.attr.path : kind.path;
    const found = this.lookup(path, modPath, scopes);
    if (found.type === "missing" && !force) return { type: "indeterminate" };
    const ext = this.finish(found, path, invocationMacroKind(invoc));
    this.expnModules.set(invoc.expansionData.id, modPath);
    if (this.sess.verbose) {
      console.log(`[expandite] Resolved ${macroKindDescr(ext.macroKind())} ${pathToString(path)}`);
    }
    return { type: "single", ext };
  }

  checkUnusedMacros(): void {
    for (const def of this.allDefs) {
      if (this.usedDefs.has(def) || containsName(def.attrs, "macro_export")) continue;
      this.sess.spanDiagnostic.spanWarn(def.span, "unused macro definition");
    }
  }

  hasDerives(expn: ExpnId, derives: SpecialDerives): boolean {
    return ((this.specialDerives.get(expn) ?? SpecialDerives.None) & derives) === derives;
  }

  addDerives(expn: ExpnId, derives: SpecialDerives): void {
    this.specialDerives.set(expn, derives);
  }

  // -------------------------------------------------------------------------
  // Lookup
  // -------------------------------------------------------------------------

  /** Final answer for a determinate lookup; reports missing names and kind mismatches. */
  private finish(found: Lookup, path: Path, expected: MacroKind): SyntaxExtension {
    const handler = this.sess.spanDiagnostic;
    const name = pathToString(path);
    if (found.type === "missing") {
      handler.spanErr(path.span, `cannot find ${macroKindDescr(expected)} \`${name}\` in this scope`);
      return this.dummyFor(expected);
    }
    for (const def of found.defs) this.usedDefs.add(def);
    const ext = this.aliasExt(found);
    const actual = ext.macroKind();
    if (actual !== expected) {
      handler.spanErr(path.span, `expected ${expectedDescr(expected)}, found ${macroKindDescr(actual)} \`${name}\``);
      return this.dummyFor(expected);
    }
    return ext;
  }

  /**
   * Build the extension for each definition in the chain, innermost first.
   * Definition attributes are read here, so malformed ones are reported only
   * once a lookup is final.
   */
  private aliasExt(found: Extract<Lookup, { type: "found" }>): SyntaxExtension {
    let ext = found.base;
    for (const def of [...found.defs].reverse()) {
      const cached = this.extCache.get(def);
      if (cached) {
        ext = cached;
        continue;
      }
      ext = SyntaxExtension.fromAttributes(this.sess, ext.kind, def.span, ext.helperAttrs, this.edition, def.name, def.attrs);
      this.extCache.set(def, ext);
    }
    return ext;
  }

  private dummyFor(kind: MacroKind): SyntaxExtension {
    switch (kind) {
      case "bang":
        return SyntaxExtension.dummyBang(this.edition);
      case "attr":
        return SyntaxExtension.nonMacroAttr(true, this.edition);
      case "derive":
        return SyntaxExtension.dummyDerive(this.edition);
    }
  }

  /** Side-effect free: nothing is reported and no extension is built. */
  private lookup(path: Path, modPath: readonly string[], scopes: readonly ExpnId[], seen = new Set<MacroDef>()): Lookup {
    const names = path.segments.map((s) => s.ident.name);
    const [first, ...rest] = names;
    const last = names[names.length - 1];
    if (first === undefined || last === undefined) return { type: "missing" };

    const candidates: string[] = [];
    if (path.global || first === "crate" || first === "$crate") {
      const absolute = path.global ? names : rest;
      candidates.push(absolute.join("::"));
    } else if (names.length > 1) {
      candidates.push(moduleKey([...modPath, ...names.slice(0, -1)], last), names.join("::"));
    } else {
      for (let len = modPath.length; len >= 0; len--) candidates.push(moduleKey(modPath.slice(0, len), last));
    }

    for (const key of candidates) {
      const defs = this.userMacros.get(key);
      if (defs === undefined) continue;
      for (let i = defs.length - 1; i >= 0; i--) {
        const def = defs[i];
        if (def === undefined || seen.has(def) || !this.isVisible(def, scopes)) continue;
        const target = this.followAlias(def, seen);
        if (target.type === "found") return target;
      }
    }

    const builtinName = pathIs(path, last) || ((first === "$crate" || path.global) && names.length <= 2) ? last : undefined;
    const builtin = builtinName === undefined ? undefined : this.builtins.get(builtinName);
    return builtin === undefined ? { type: "missing" } : { type: "found", base: builtin, defs: [] };
  }

  private isVisible(def: MacroDef, scopes: readonly ExpnId[]): boolean {
    return scopes.some((scope) => this.sess.hygiene.isDescendantOf(scope, def.scope));
  }

  private followAlias(def: MacroDef, seen: Set<MacroDef>): Lookup {
    seen.add(def);
    const target = this.lookup(def.target, def.modPath, [def.scope], seen);
    seen.delete(def);
    return target.type === "found" ? { ...target, defs: [def, ...target.defs] } : target;
  }

  // -------------------------------------------------------------------------
  // Definition collection
  // -------------------------------------------------------------------------

  private moduleOf(expn: ExpnId): readonly string[] {
    let current = expn;
    for (let steps = 0; steps <= this.sess.hygiene.expnCount; steps++) {
      const modPath = this.expnModules.get(current);
      if (modPath !== undefined) return modPath;
      if (current === ROOT_EXPN_ID) break;
      current = this.sess.hygiene.parent(current);
    }
    return [];
  }

  private visitItems(items: readonly Item[], modPath: readonly string[], expn: ExpnId, scope: ExpnId): void {
    for (const item of items) this.visitItem(item, modPath, expn, scope);
  }

  private visitItem(item: Item, modPath: readonly string[], expn: ExpnId, scope: ExpnId): void {
    switch (item.kind) {
      case "macro-def": {
        const def: MacroDef = {
          name: item.ident.name,
          modPath,
          target: item.target,
          attrs: item.attrs,
          span: item.span,
          scope,
        };
        this.userMacros.set(moduleKey(modPath, def.name), [def]);
        this.allDefs.push(def);
        break;
      }
      case "mod":
        if (item.id !== DUMMY_NODE_ID) this.moduleScopes.set(item.id, expn);
        this.visitItems(item.items, [...modPath, item.ident.name], expn, scope);
        break;
      case "fn":
        this.visitBlock(item.body, modPath, expn, scope);
        break;
      default:
        break;
    }
  }

  private visitBlock(block: Block, modPath: readonly string[], expn: ExpnId, scope: ExpnId): void {
    this.visitStmts(block.stmts, modPath, expn, scope);
  }

  private visitStmts(stmts: readonly Stmt[], modPath: readonly string[], expn: ExpnId, scope: ExpnId): void {
    for (const stmt of stmts) {
      if (stmt.kind === "item") this.visitItem(stmt.item, modPath, expn, scope);
    }
  }
}
