/**
 * Macro Expander
 *
 * Drives expansion of a fragment to a fixpoint:
 *
 * 1. Collect every macro call and macro attribute in the fragment as an
 *    {@link Invocation}, each with a fresh expansion id.
 * 2. Resolve invocations through the {@link Resolver}. Indeterminate ones are
 *    set aside and retried once everything else has been tried; a round that
 *    makes no progress is followed by a forced round, which turns remaining
 *    failures into errors.
 * 3. Expand each resolved invocation inside its own expansion frame and
 *    collect the invocations in its output, depth first.
 * 4. Splice all outputs back into the fragment.
 */

import * as nodePath from "path";
import {
  annotatableAttrs,
  annotatableSpan,
  annotatableToTokens,
  deriveAllowed,
  withAttrs,
  type Annotatable,
} from "./annotatable.js";
import {
  DUMMY_NODE_ID,
  mkStmt,
  pathIs,
  pathToString,
  type Attribute,
  type Block,
  type Crate,
  type Expr,
  type ForeignItem,
  type ImplItem,
  type Item,
  type MetaItem,
  type NestedMetaItem,
  type Pat,
  type Path,
  type Stmt,
  type TraitItem,
  type Ty,
} from "./ast.js";
import { isKnown, markKnown, markUsed, metaItemList, parseMeta } from "./attr.js";
import type { DirectoryOwnership, ExpansionData, ExtCtxt, ModuleData } from "./context.js";
import { ExplicitBug, FatalError, ParseError } from "./errors.js";
import {
  dummyFragment,
  expectFragmentExpr,
  expectFragmentForeignItems,
  expectFragmentImplItems,
  expectFragmentItems,
  expectFragmentPat,
  expectFragmentStmts,
  expectFragmentTraitItems,
  expectFragmentTy,
  fragmentFromAnnotatables,
  fragmentKindDescr,
  makeFragmentFromMacResult,
  type AstFragment,
  type AstFragmentKind,
} from "./fragments.js";
import type { ExpnData } from "./hygiene.js";
import { invocationMacroKind, invocationPathString, invocationSpan, type Invocation } from "./invocation.js";
import { Parser } from "./parser.js";
import { printFragment } from "./print.js";
import { SpecialDerives, type ResolveOutcome } from "./resolver.js";
import { unreachable } from "./safety.js";
import { DUMMY_SP, ROOT_CTXT, withCtxt, type Span } from "./span.js";
import type { SyntaxExtension } from "./syntax-extension.js";
import { TokenStream } from "./tokenstream.js";
import { MutVisitor } from "./visit.js";

/** An invocation plus the node its output replaces. */
interface PendingInvocation {
  invoc: Invocation;
  node: object;
}

interface Collected {
  fragment: AstFragment;
  invocations: PendingInvocation[];
}

export class MacroExpander {
  constructor(
    private readonly cx: ExtCtxt,
    /** Assign node ids and report definitions to the resolver. Off for eager expansion. */
    private readonly monotonic: boolean,
  ) {}

  expandCrate(crate: Crate): Crate {
    const cx = this.cx;
    const fileName = cx.sourceMap.spanToFilename(crate.span);
    const directory = fileName.kind === "real" ? nodePath.dirname(fileName.path) : "";
    cx.rootPath = directory;
    cx.currentExpansion = {
      ...cx.currentExpansion,
      module: { modPath: [], directory },
      directoryOwnership: { type: "owned" },
    };

    const fragment = this.fullyExpandFragment({ kind: "items", items: crate.items });
    cx.checkUnusedMacros();
    cx.traceMacrosDiag();
    return { ...crate, items: expectFragmentItems(fragment) };
  }

  /** Expand every invocation in `input`, including those produced by expansions. */
  fullyExpandFragment(input: AstFragment): AstFragment {
    const cx = this.cx;
    const orig = cx.currentExpansion;
    const expanded = new Map<object, AstFragment>();

    const collected = this.collectInvocations(input);
    let invocations = collected.invocations.reverse();
    let undetermined: PendingInvocation[] = [];
    let progress = false;
    // Eager expansion has no later pass to wait for.
    let force = !this.monotonic;

    for (;;) {
      const pending = invocations.pop();
      if (pending === undefined) {
        if (undetermined.length === 0) break;
        invocations = undetermined.reverse();
        undetermined = [];
        force = !progress;
        progress = false;
        continue;
      }

      const { invoc } = pending;
      const eagerExpansionRoot = this.monotonic ? invoc.expansionData.id : orig.id;
      const outcome = cx.resolver.resolveMacroInvocation(invoc, eagerExpansionRoot, force);
      if (outcome.type === "indeterminate") {
        undetermined.push(pending);
        continue;
      }

      progress = true;
      const result = cx.withExpansion(invoc.expansionData, () => this.expandResolved(invoc, outcome));
      expanded.set(pending.node, result.fragment);
      invocations.push(...result.invocations.reverse());
    }

    return new PlaceholderExpander(expanded).visitFragment(collected.fragment);
  }

  private collectInvocations(fragment: AstFragment): Collected {
    const cx = this.cx;
    const collector = new InvocationCollector(cx, this.monotonic);
    const result = collector.visitFragment(fragment);
    if (this.monotonic) {
      cx.resolver.visitAstFragmentWithPlaceholders(cx.currentExpansion.id, result);
    }
    return { fragment: result, invocations: collector.invocations };
  }

  /** Runs inside the invocation's expansion frame. */
  private expandResolved(invoc: Invocation, outcome: Exclude<ResolveOutcome, { type: "indeterminate" }>): Collected {
    const cx = this.cx;
    const hygiene = cx.parseSess.hygiene;
    const callSite = invocationSpan(invoc);

    if (outcome.type === "single") {
      const ext = outcome.ext;
      hygiene.setExpnData(invoc.expansionData.id, ext.expnData(invoc.parent, callSite, invocationPathString(invoc)));
      if (cx.ecfg.verbose) {
        console.log(`[expandite] Expanding ${invocationMacroKind(invoc)} macro: ${invocationPathString(invoc)}`);
      }
      return this.collectInvocations(this.expandInvoc(invoc, ext));
    }

    const containerData: ExpnData = {
      kind: { type: "macro", macroKind: "attr", descr: "derive" },
      parent: invoc.parent,
      callSite,
      defSite: DUMMY_SP,
      allowInternalUnsafe: false,
      localInnerMacros: false,
      edition: cx.ecfg.edition,
    };
    hygiene.setExpnData(invoc.expansionData.id, containerData);
    return this.expandDeriveContainer(invoc, outcome.exts);
  }

  private expandDeriveContainer(invoc: Invocation, exts: SyntaxExtension[]): Collected {
    const cx = this.cx;
    const sess = cx.parseSess;
    if (invoc.kind.type !== "derive-container") return cx.bug("derive extensions for a non-derive invocation");
    const { derives, item } = invoc.kind;
    const kind = invoc.fragmentKind;
    const stripped = withAttrs(
      item,
      annotatableAttrs(item).filter((attr) => !pathIs(attr.path, "derive")),
    );

    if (!deriveAllowed(item)) {
      const attr = annotatableAttrs(item).find((a) => pathIs(a.path, "derive"));
      cx.spanErr(attr?.span ?? annotatableSpan(item), "`derive` may only be applied to structs, enums and unions");
      return this.collectInvocations(fragmentFromAnnotatables(kind, [stripped]));
    }

    const helperAttrs = new Set(exts.flatMap((ext) => ext.helperAttrs));
    for (const attr of helperAttributes(stripped)) {
      if (helperAttrs.has(pathToString(attr.path))) {
        markKnown(sess, attr);
        markUsed(sess, attr);
      }
    }
    if (exts.some((ext) => ext.isDeriveCopy)) {
      cx.resolver.addDerives(invoc.expansionData.id, SpecialDerives.Copy);
    }

    const result = this.collectInvocations(fragmentFromAnnotatables(kind, [stripped]));
    const pieces: AstFragment[] = [result.fragment];
    const invocations = [...result.invocations];

    derives.forEach((path, i) => {
      const ext = exts[i];
      if (ext === undefined) return;
      const id = sess.hygiene.freshExpn(ext.expnData(invoc.expansionData.id, path.span, pathToString(path)));
      const data: ExpansionData = { ...invoc.expansionData, id };
      const deriveInvoc: Invocation = {
        kind: { type: "derive", path, item: stripped },
        fragmentKind: kind,
        expansionData: data,
        parent: invoc.expansionData.id,
      };
      const piece = cx.withExpansion(data, () => this.collectInvocations(this.expandInvoc(deriveInvoc, ext)));
      pieces.push(piece.fragment);
      invocations.push(...piece.invocations);
    });

    return { fragment: concatFragments(kind, pieces), invocations };
  }

  private expandInvoc(invoc: Invocation, ext: SyntaxExtension): AstFragment {
    const cx = this.cx;
    const { depth } = cx.currentExpansion;
    if (depth > cx.ecfg.recursionLimit) {
      const data = cx.currentExpnData();
      const descr = data.kind.type === "macro" ? data.kind.descr : "root";
      cx.structSpanFatal(data.callSite, `recursion limit reached while expanding the macro \`${descr}\``)
        .help(`consider raising \`recursionLimit\` to ${cx.ecfg.recursionLimit * 2} in the expandite configuration`)
        .emit();
      cx.traceMacrosDiag();
      throw new FatalError();
    }

    const kind = invoc.fragmentKind;
    const span = invocationSpan(invoc);
    const ik = invoc.kind;
    const extKind = ext.kind;

    switch (ik.type) {
      case "bang": {
        // Read once: the extension itself may toggle tracing.
        const tracing = cx.ecfg.traceMac;
        if (tracing) {
          cx.traceNote(cx.parseSess.hygiene.sourceCallsite(span), `expanding \`${pathToString(ik.mac.path)}! { ${ik.mac.args.toString()} }\``);
        }
        let fragment: AstFragment;
        if (extKind.type === "bang") {
          fragment = this.parseAstFragment(extKind.expander(cx, span, ik.mac.args), kind, ik.mac.path, span);
        } else if (extKind.type === "legacy-bang") {
          const made = makeFragmentFromMacResult(kind, extKind.expander(cx, span, ik.mac.args));
          if (made === undefined) {
            const descr = fragmentKindDescr(kind);
            cx.spanErr(span, `non-${descr} macro in ${descr} position: ${pathToString(ik.mac.path)}`);
            cx.traceMacrosDiag();
            fragment = dummyFragment(kind, span);
          } else {
            fragment = made;
          }
        } else {
          return cx.spanBug(span, `${extKind.type} extension invoked as a function-like macro`);
        }
        if (tracing) {
          cx.traceNote(cx.parseSess.hygiene.sourceCallsite(span), `to \`${printFragment(fragment)}\``);
        }
        return fragment;
      }

      case "attr": {
        const { attr, item } = ik;
        switch (extKind.type) {
          case "attr": {
            let args: TokenStream;
            if (attr.args.type === "delimited") {
              args = attr.args.tokens;
            } else {
              if (attr.args.type === "eq") cx.spanErr(span, "key-value macro attributes are not supported");
              args = TokenStream.empty();
            }
            const output = extKind.expander(cx, span, args, annotatableToTokens(item));
            return this.parseAstFragment(output, kind, attr.path, span);
          }
          case "legacy-attr": {
            let meta: MetaItem;
            try {
              meta = parseMeta(attr);
            } catch (error) {
              if (!(error instanceof ParseError)) throw error;
              cx.emitParseError(error);
              return dummyFragment(kind, span);
            }
            return fragmentFromAnnotatables(kind, extKind.expander(cx, span, meta, item));
          }
          case "non-macro-attr": {
            markKnown(cx.parseSess, attr);
            if (extKind.markUsed) markUsed(cx.parseSess, attr);
            return fragmentFromAnnotatables(kind, [withAttrs(item, [...annotatableAttrs(item), attr])]);
          }
          default:
            return cx.spanBug(span, `${extKind.type} extension invoked as an attribute`);
        }
      }

      case "derive": {
        const { path, item } = ik;
        if (!deriveAllowed(item)) return dummyFragment(kind, span);
        switch (extKind.type) {
          case "derive":
            return this.parseAstFragment(extKind.expander(cx, span, annotatableToTokens(item)), kind, path, span);
          case "legacy-derive": {
            const meta: MetaItem = { path, kind: { type: "word" }, span };
            return fragmentFromAnnotatables(kind, extKind.expander(cx, span, meta, item));
          }
          default:
            return cx.spanBug(span, `${extKind.type} extension invoked as a derive`);
        }
      }

      case "derive-container":
        return cx.spanBug(span, "derive container expanded as a single invocation");

      default:
        return unreachable(ik, "invocation kind");
    }
  }

  /** Parse token output at the call site; a failure becomes an error plus a placeholder. */
  private parseAstFragment(tokens: TokenStream, kind: AstFragmentKind, path: Path, span: Span): AstFragment {
    const cx = this.cx;
    const parser = new Parser(tokens, span);
    let fragment: AstFragment;
    try {
      fragment = parser.parseFragment(kind);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      cx.spanErr(span, error.message);
      cx.traceMacrosDiag();
      return dummyFragment(kind, span);
    }
    if (!parser.atEnd()) {
      cx.structSpanErr(
        withCtxt(parser.currentSpan(), ROOT_CTXT),
        `macro expansion ignores token \`${parser.currentText() ?? ""}\` and any following`,
      )
        .spanNote(span, "caused by the macro expansion here")
        .note(`the usage of \`${pathToString(path)}!\` is likely invalid in ${fragmentKindDescr(kind)} context`)
        .emit();
    }
    return fragment;
  }
}

function helperAttributes(target: Annotatable): Attribute[] {
  const attrs = [...annotatableAttrs(target)];
  if (target.kind === "item" && target.item.kind === "enum") {
    for (const variant of target.item.variants) attrs.push(...variant.attrs);
  }
  return attrs;
}

function concatFragments(kind: AstFragmentKind, pieces: readonly AstFragment[]): AstFragment {
  switch (kind) {
    case "items":
      return { kind, items: pieces.flatMap(expectFragmentItems) };
    case "stmts":
      return { kind, stmts: pieces.flatMap(expectFragmentStmts) };
    case "impl-items":
      return { kind, items: pieces.flatMap(expectFragmentImplItems) };
    case "trait-items":
      return { kind, items: pieces.flatMap(expectFragmentTraitItems) };
    case "foreign-items":
      return { kind, items: pieces.flatMap(expectFragmentForeignItems) };
    case "expr":
    case "pat":
    case "ty": {
      const [only, ...rest] = pieces;
      if (only === undefined || rest.length > 0) {
        throw new ExplicitBug(`a ${fragmentKindDescr(kind)} cannot take derive output`);
      }
      return only;
    }
    default:
      return unreachable(kind, "fragment kind");
  }
}

// ============================================================================
// Collection
// ============================================================================

type AttrInvocation =
  | { type: "attr"; attr: Attribute; remaining: Attribute[] }
  | { type: "derive"; derives: Path[] };

/** Finds invocations, numbering nodes in monotonic mode. Does not descend into invocations. */
class InvocationCollector extends MutVisitor {
  readonly invocations: PendingInvocation[] = [];
  private module: ModuleData;
  private ownership: DirectoryOwnership;
  private priorTypeAscription: Span | undefined;

  constructor(
    private readonly cx: ExtCtxt,
    private readonly monotonic: boolean,
  ) {
    super();
    this.module = cx.currentExpansion.module;
    this.ownership = cx.currentExpansion.directoryOwnership;
  }

  private assignId(node: { id: number }): void {
    if (this.monotonic && node.id === DUMMY_NODE_ID) node.id = this.cx.resolver.nextNodeId();
  }

  private collect(node: object, kind: Invocation["kind"], fragmentKind: AstFragmentKind): void {
    const cx = this.cx;
    const current = cx.currentExpansion;
    const data: ExpansionData = {
      id: cx.parseSess.hygiene.freshExpn(),
      depth: current.depth + 1,
      module: this.module,
      directoryOwnership: this.ownership,
    };
    if (this.priorTypeAscription !== undefined) data.priorTypeAscription = this.priorTypeAscription;
    this.invocations.push({ node, invoc: { kind, fragmentKind, expansionData: data, parent: current.id } });
  }

  /** The first attribute that still needs resolving, or every `derive` if that comes first. */
  private classify(attrs: readonly Attribute[]): AttrInvocation | undefined {
    const sess = this.cx.parseSess;
    const index = attrs.findIndex((attr) => !isKnown(sess, attr));
    const attr = attrs[index];
    if (attr === undefined) return undefined;
    if (!pathIs(attr.path, "derive")) {
      return { type: "attr", attr, remaining: attrs.filter((_, i) => i !== index) };
    }

    const derives: Path[] = [];
    const remaining: Attribute[] = [];
    for (const a of attrs) {
      if (pathIs(a.path, "derive")) derives.push(...this.derivePaths(a));
      else remaining.push(a);
    }
    if (derives.length === 0) return this.classify(remaining);
    return { type: "derive", derives };
  }

  private derivePaths(attr: Attribute): Path[] {
    const cx = this.cx;
    let list: NestedMetaItem[] | undefined;
    try {
      list = metaItemList(attr);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      cx.emitParseError(error);
      return [];
    }
    if (list === undefined) {
      cx.structSpanErr(attr.span, "malformed `derive` attribute input")
        .help("missing traits to be derived: `@derive(Trait1, Trait2, ...)`")
        .emit();
      return [];
    }
    const paths: Path[] = [];
    for (const nested of list) {
      if (nested.type === "meta") paths.push(nested.meta.path);
      else cx.spanErr(nested.lit.span, "expected path to a trait, found literal");
    }
    return paths;
  }

  /** Collects an attribute invocation on `target`; false when there is none. */
  private collectAttr(target: Annotatable, node: object, fragmentKind: AstFragmentKind): boolean {
    const found = this.classify(annotatableAttrs(target));
    if (found === undefined) return false;
    if (found.type === "attr") {
      this.collect(node, { type: "attr", attr: found.attr, item: withAttrs(target, found.remaining) }, fragmentKind);
    } else {
      this.collect(node, { type: "derive-container", derives: found.derives, item: target }, fragmentKind);
    }
    return true;
  }

  override flatMapItem(item: Item): Item[] {
    if (this.collectAttr({ kind: "item", item }, item, "items")) return [item];
    if (item.kind === "mac") {
      this.collect(item, { type: "bang", mac: item.mac, span: item.span }, "items");
      return [item];
    }
    this.assignId(item);
    if (item.kind !== "mod") return super.flatMapItem(item);

    if (!item.inline && this.ownership.type === "unowned-via-block") {
      this.cx.spanErr(item.span, "cannot declare a non-inline module inside a block");
    }
    const outerModule = this.module;
    const outerOwnership = this.ownership;
    this.module = {
      modPath: [...outerModule.modPath, item.ident],
      directory: nodePath.join(outerModule.directory, item.ident.name),
    };
    this.ownership = { type: "owned" };
    try {
      return super.flatMapItem(item);
    } finally {
      this.module = outerModule;
      this.ownership = outerOwnership;
    }
  }

  override flatMapImplItem(item: ImplItem): ImplItem[] {
    if (this.collectAttr({ kind: "impl-item", item }, item, "impl-items")) return [item];
    if (item.kind === "mac") {
      this.collect(item, { type: "bang", mac: item.mac, span: item.span }, "impl-items");
      return [item];
    }
    this.assignId(item);
    return super.flatMapImplItem(item);
  }

  override flatMapTraitItem(item: TraitItem): TraitItem[] {
    if (this.collectAttr({ kind: "trait-item", item }, item, "trait-items")) return [item];
    if (item.kind === "mac") {
      this.collect(item, { type: "bang", mac: item.mac, span: item.span }, "trait-items");
      return [item];
    }
    this.assignId(item);
    return super.flatMapTraitItem(item);
  }

  override flatMapForeignItem(item: ForeignItem): ForeignItem[] {
    if (this.collectAttr({ kind: "foreign-item", item }, item, "foreign-items")) return [item];
    if (item.kind === "mac") {
      this.collect(item, { type: "bang", mac: item.mac, span: item.span }, "foreign-items");
      return [item];
    }
    this.assignId(item);
    return super.flatMapForeignItem(item);
  }

  override flatMapStmt(stmt: Stmt): Stmt[] {
    if (stmt.kind === "mac") {
      this.collect(stmt, { type: "bang", mac: stmt.mac, span: stmt.span }, "stmts");
      return [stmt];
    }
    if (stmt.kind !== "item" && this.collectAttr({ kind: "stmt", stmt }, stmt, "stmts")) return [stmt];
    this.assignId(stmt);
    if (stmt.kind === "local" && stmt.ty !== undefined && stmt.init?.kind === "mac") {
      const outer = this.priorTypeAscription;
      this.priorTypeAscription = stmt.ty.span;
      try {
        return super.flatMapStmt(stmt);
      } finally {
        this.priorTypeAscription = outer;
      }
    }
    return super.flatMapStmt(stmt);
  }

  override visitExpr(expr: Expr): Expr {
    if (expr.kind === "mac") {
      this.collect(expr, { type: "bang", mac: expr.mac, span: expr.span }, "expr");
      return expr;
    }
    this.assignId(expr);
    return super.visitExpr(expr);
  }

  override visitPat(pat: Pat): Pat {
    if (pat.kind === "mac") {
      this.collect(pat, { type: "bang", mac: pat.mac, span: pat.span }, "pat");
      return pat;
    }
    this.assignId(pat);
    return super.visitPat(pat);
  }

  override visitTy(ty: Ty): Ty {
    if (ty.kind === "mac") {
      this.collect(ty, { type: "bang", mac: ty.mac, span: ty.span }, "ty");
      return ty;
    }
    this.assignId(ty);
    return super.visitTy(ty);
  }

  override visitBlock(block: Block): void {
    this.assignId(block);
    const outer = this.ownership;
    this.ownership = { type: "unowned-via-block" };
    try {
      super.visitBlock(block);
    } finally {
      this.ownership = outer;
    }
  }
}

// ============================================================================
// Splicing
// ============================================================================

/** Replaces each invocation node with its (recursively spliced) output. */
class PlaceholderExpander extends MutVisitor {
  constructor(private readonly expanded: Map<object, AstFragment>) {
    super();
  }

  private take(node: object): AstFragment | undefined {
    const fragment = this.expanded.get(node);
    if (fragment === undefined) return undefined;
    this.expanded.delete(node);
    return this.visitFragment(fragment);
  }

  override flatMapItem(item: Item): Item[] {
    const fragment = this.take(item);
    return fragment ? expectFragmentItems(fragment) : super.flatMapItem(item);
  }

  override flatMapImplItem(item: ImplItem): ImplItem[] {
    const fragment = this.take(item);
    return fragment ? expectFragmentImplItems(fragment) : super.flatMapImplItem(item);
  }

  override flatMapTraitItem(item: TraitItem): TraitItem[] {
    const fragment = this.take(item);
    return fragment ? expectFragmentTraitItems(fragment) : super.flatMapTraitItem(item);
  }

  override flatMapForeignItem(item: ForeignItem): ForeignItem[] {
    const fragment = this.take(item);
    return fragment ? expectFragmentForeignItems(fragment) : super.flatMapForeignItem(item);
  }

  override flatMapStmt(stmt: Stmt): Stmt[] {
    const fragment = this.take(stmt);
    if (fragment === undefined) return super.flatMapStmt(stmt);
    const stmts = expectFragmentStmts(fragment);
    // `mac!(...);` puts its semicolon on the last statement it expands to.
    const last = stmts[stmts.length - 1];
    if (stmt.kind === "mac" && stmt.style === "semicolon" && last?.kind === "expr") {
      return [...stmts.slice(0, -1), mkStmt({ kind: "semi", expr: last.expr }, last.span)];
    }
    return stmts;
  }

  override visitExpr(expr: Expr): Expr {
    const fragment = this.take(expr);
    return fragment ? expectFragmentExpr(fragment) : super.visitExpr(expr);
  }

  override visitPat(pat: Pat): Pat {
    const fragment = this.take(pat);
    return fragment ? expectFragmentPat(fragment) : super.visitPat(pat);
  }

  override visitTy(ty: Ty): Ty {
    const fragment = this.take(ty);
    return fragment ? expectFragmentTy(fragment) : super.visitTy(ty);
  }
}
