/**
 * Built-in Derives
 *
 * Each derive receives the annotated struct, enum or union and returns the
 * impl to append after it. Generated code carries definition-site spans.
 *
 * `Clone` takes the shallow form (`*self`) when the same item also derives
 * `Copy`; the expander records that flag before any derive of the group runs,
 * so the order inside `@derive(...)` does not matter.
 */

import {
  SpecialDerives,
  expectItem,
  type Annotatable,
  type Expr,
  type ExtCtxt,
  type FieldDef,
  type Ident,
  type ImplItem,
  type Item,
  type ExpnId,
  type MultiItemExpander,
  type Path,
  type Span,
  type VariantData,
} from "@expandite/core";

function implFor(ecx: ExtCtxt, sp: Span, traitPath: Path, target: Item, items: ImplItem[]): Annotatable {
  const selfTy = ecx.tyIdent(sp, target.ident);
  return { kind: "item", item: ecx.itemImpl(sp, traitPath, selfTy, items) };
}

function fieldIdent(ecx: ExtCtxt, sp: Span, field: FieldDef, index: number): Ident {
  return field.ident ?? ecx.identOf(String(index), sp);
}

function variantData(item: Item): VariantData | undefined {
  return item.kind === "struct" || item.kind === "union" ? item.data : undefined;
}

/** `Name { a: f(a), .. }`, `Name(f(0), ..)` or `Name`. */
function construct(ecx: ExtCtxt, sp: Span, name: Ident, data: VariantData, field: (id: Ident) => Expr): Expr {
  const path = ecx.pathIdent(sp, name);
  switch (data.type) {
    case "unit":
      return ecx.exprPath(path);
    case "tuple":
      return ecx.exprCall(
        sp,
        ecx.exprPath(path),
        data.fields.map((f, i) => field(fieldIdent(ecx, sp, f, i))),
      );
    case "struct":
      return ecx.exprStruct(
        sp,
        path,
        data.fields.map((f, i) => {
          const id = fieldIdent(ecx, sp, f, i);
          return { ident: id, expr: field(id) };
        }),
      );
  }
}

function fieldIdents(ecx: ExtCtxt, sp: Span, data: VariantData): Ident[] {
  return data.type === "unit" ? [] : data.fields.map((f, i) => fieldIdent(ecx, sp, f, i));
}

/** Expansion that the derive group was expanded in. */
function containerExpn(ecx: ExtCtxt): ExpnId {
  return ecx.currentExpnData().parent;
}

export const deriveCopy: MultiItemExpander = (ecx, span, meta, annotatable) => {
  const sp = ecx.withDefSiteCtxt(span);
  return [implFor(ecx, sp, meta.path, expectItem(annotatable), [])];
};

export const deriveClone: MultiItemExpander = (ecx, span, meta, annotatable) => {
  const sp = ecx.withDefSiteCtxt(span);
  const target = expectItem(annotatable);
  const selfTy = ecx.tyIdent(sp, target.ident);
  const shallow = target.kind === "union" || ecx.resolver.hasDerives(containerExpn(ecx), SpecialDerives.Copy);

  let body: Expr;
  if (shallow) {
    body = ecx.exprDeref(sp, ecx.exprSelf(sp));
  } else {
    const data = variantData(target);
    if (data === undefined) {
      ecx.spanErr(span, "`Clone` can only be derived for enums that also derive `Copy`");
      return [];
    }
    body = construct(ecx, sp, target.ident, data, (id) =>
      ecx.exprCall(sp, ecx.exprPath(ecx.path(sp, ["Clone", "clone"])), [
        ecx.exprAddrOf(sp, ecx.exprField(sp, ecx.exprSelf(sp), id)),
      ]),
    );
  }

  const method = ecx.implItemFn(
    sp,
    ecx.identOf("clone", sp),
    ecx.fnDecl([ecx.paramSelfRef(sp)], selfTy),
    ecx.blockExpr(body),
  );
  return [implFor(ecx, sp, meta.path, target, [method])];
};

function rejectUnion(ecx: ExtCtxt, span: Span, target: Item): boolean {
  if (target.kind !== "union") return false;
  ecx.spanErr(span, "this trait cannot be derived for unions");
  return true;
}

export const derivePartialEq: MultiItemExpander = (ecx, span, meta, annotatable) => {
  ecx.resolver.addDerives(containerExpn(ecx), SpecialDerives.PartialEq);
  const sp = ecx.withDefSiteCtxt(span);
  const target = expectItem(annotatable);
  if (rejectUnion(ecx, span, target)) return [];
  const data = variantData(target);
  if (data === undefined) {
    ecx.spanErr(span, "`PartialEq` can only be derived for structs");
    return [];
  }

  const other = ecx.identOf("other", sp);
  const comparisons = fieldIdents(ecx, sp, data).map((id) =>
    ecx.exprBinary(sp, "==", ecx.exprField(sp, ecx.exprSelf(sp), id), ecx.exprField(sp, ecx.exprIdent(sp, other), id)),
  );
  const [first, ...rest] = comparisons;
  const body = first === undefined ? ecx.exprBool(sp, true) : rest.reduce((acc, cmp) => ecx.exprBinary(sp, "&&", acc, cmp), first);

  const decl = ecx.fnDecl(
    [ecx.paramSelfRef(sp), ecx.param(sp, other, ecx.tyRef(sp, ecx.tyIdent(sp, target.ident)))],
    ecx.tyIdent(sp, ecx.identOf("bool", sp)),
  );
  const method = ecx.implItemFn(sp, ecx.identOf("eq", sp), decl, ecx.blockExpr(body));
  return [implFor(ecx, sp, meta.path, target, [method])];
};

export const deriveEq: MultiItemExpander = (ecx, span, meta, annotatable) => {
  ecx.resolver.addDerives(containerExpn(ecx), SpecialDerives.Eq);
  const sp = ecx.withDefSiteCtxt(span);
  const target = expectItem(annotatable);
  const method = ecx.implItemFn(
    sp,
    ecx.identOf("assert_receiver_is_total_eq", sp),
    ecx.fnDecl([ecx.paramSelfRef(sp)]),
    ecx.block(sp, []),
  );
  return [implFor(ecx, sp, meta.path, target, [method])];
};

export const deriveDefault: MultiItemExpander = (ecx, span, meta, annotatable) => {
  const sp = ecx.withDefSiteCtxt(span);
  const target = expectItem(annotatable);
  if (rejectUnion(ecx, span, target)) return [];
  const data = variantData(target);
  if (data === undefined) {
    ecx.spanErr(span, "`Default` cannot be derived for enums, only structs");
    return [];
  }

  const body = construct(ecx, sp, target.ident, data, () =>
    ecx.exprCall(sp, ecx.exprPath(ecx.path(sp, ["Default", "default"])), []),
  );
  const method = ecx.implItemFn(
    sp,
    ecx.identOf("default", sp),
    ecx.fnDecl([], ecx.tyIdent(sp, target.ident)),
    ecx.blockExpr(body),
  );
  return [implFor(ecx, sp, meta.path, target, [method])];
};
