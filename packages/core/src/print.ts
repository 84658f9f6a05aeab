/**
 * Pretty printer for the syntax tree.
 *
 * Output is single-line and re-parses to an equivalent tree; token-based
 * macros that receive a synthesized item get exactly this text, re-lexed.
 */

import {
  BINOP_PRECEDENCE,
  pathToString,
  type Attribute,
  type Block,
  type Expr,
  type FieldDef,
  type FnDecl,
  type ForeignItem,
  type ImplItem,
  type Item,
  type Lit,
  type MacCall,
  type Param,
  type Pat,
  type Stmt,
  type TraitItem,
  type Ty,
  type VariantData,
} from "./ast.js";
import type { AstFragment } from "./fragments.js";
import { unreachable } from "./safety.js";

function printLit(lit: Lit): string {
  switch (lit.kind.type) {
    case "str":
      return JSON.stringify(lit.kind.value);
    case "num":
      return lit.kind.text;
    case "bool":
      return String(lit.kind.value);
    case "err":
      return lit.kind.text;
  }
}

export function printMac(mac: MacCall): string {
  const args = mac.args.toString();
  switch (mac.delim) {
    case "paren":
      return `${pathToString(mac.path)}!(${args})`;
    case "bracket":
      return `${pathToString(mac.path)}![${args}]`;
    case "brace":
      return args.length === 0 ? `${pathToString(mac.path)}! {}` : `${pathToString(mac.path)}! { ${args} }`;
  }
}

function printAttr(attr: Attribute): string {
  return attr.tokens.toString();
}

function attrsPrefix(attrs: readonly Attribute[]): string {
  return attrs.map((a) => `${printAttr(a)} `).join("");
}

function tuple(parts: string[]): string {
  return parts.length === 1 ? `(${parts[0]},)` : `(${parts.join(", ")})`;
}

function operand(expr: Expr, minPrecedence: number): string {
  const text = printExpr(expr);
  if (expr.kind === "binary" && BINOP_PRECEDENCE[expr.op] < minPrecedence) return `(${text})`;
  return text;
}

export function printExpr(expr: Expr): string {
  switch (expr.kind) {
    case "lit":
      return printLit(expr.lit);
    case "path":
      return pathToString(expr.path);
    case "tup":
      return tuple(expr.elems.map(printExpr));
    case "array":
      return `[${expr.elems.map(printExpr).join(", ")}]`;
    case "call":
      return `${operand(expr.callee, 6)}(${expr.args.map(printExpr).join(", ")})`;
    case "field":
      return `${operand(expr.base, 6)}.${expr.ident.name}`;
    case "struct": {
      const fields = expr.fields.map((f) => `${f.ident.name}: ${printExpr(f.expr)}`);
      return fields.length === 0 ? `${pathToString(expr.path)} {}` : `${pathToString(expr.path)} { ${fields.join(", ")} }`;
    }
    case "binary": {
      const prec = BINOP_PRECEDENCE[expr.op];
      return `${operand(expr.left, prec)} ${expr.op} ${operand(expr.right, prec + 1)}`;
    }
    case "unary":
      return `${expr.op}${operand(expr.operand, 6)}`;
    case "ref":
      return `&${expr.mutable ? "mut " : ""}${operand(expr.operand, 6)}`;
    case "paren":
      return `(${printExpr(expr.inner)})`;
    case "block":
      return printBlock(expr.block);
    case "mac":
      return printMac(expr.mac);
    case "err":
      return "(/*ERROR*/)";
    default:
      return unreachable(expr, "expression");
  }
}

export function printBlock(block: Block): string {
  if (block.stmts.length === 0) return "{}";
  return `{ ${block.stmts.map(printStmt).join(" ")} }`;
}

export function printPat(pat: Pat): string {
  switch (pat.kind) {
    case "wild":
      return "_";
    case "ident":
      return `${pat.mutable ? "mut " : ""}${pat.ident.name}`;
    case "lit":
      return printExpr(pat.expr);
    case "tuple":
      return tuple(pat.elems.map(printPat));
    case "mac":
      return printMac(pat.mac);
    default:
      return unreachable(pat, "pattern");
  }
}

export function printTy(ty: Ty): string {
  switch (ty.kind) {
    case "path":
      return pathToString(ty.path);
    case "tup":
      return tuple(ty.elems.map(printTy));
    case "array":
      return `[${printTy(ty.elem)}; ${printExpr(ty.len)}]`;
    case "ref":
      return `&${ty.mutable ? "mut " : ""}${printTy(ty.inner)}`;
    case "infer":
      return "_";
    case "mac":
      return printMac(ty.mac);
    case "err":
      return "(/*ERROR*/)";
    default:
      return unreachable(ty, "type");
  }
}

export function printStmt(stmt: Stmt): string {
  switch (stmt.kind) {
    case "local": {
      const ty = stmt.ty ? `: ${printTy(stmt.ty)}` : "";
      const init = stmt.init ? ` = ${printExpr(stmt.init)}` : "";
      return `${attrsPrefix(stmt.attrs)}let ${printPat(stmt.pat)}${ty}${init};`;
    }
    case "item":
      return printItem(stmt.item);
    case "expr":
      return printExpr(stmt.expr);
    case "semi":
      return `${printExpr(stmt.expr)};`;
    case "mac":
      return `${attrsPrefix(stmt.attrs)}${printMac(stmt.mac)}${stmt.style === "semicolon" ? ";" : ""}`;
    case "empty":
      return ";";
    default:
      return unreachable(stmt, "statement");
  }
}

function paramToString(param: Param): string {
  if (param.selfKind === "value") return "self";
  if (param.selfKind === "ref") return "&self";
  return `${printPat(param.pat)}: ${printTy(param.ty)}`;
}

function fnSignature(name: string, decl: FnDecl): string {
  const output = decl.output ? ` -> ${printTy(decl.output)}` : "";
  return `fn ${name}(${decl.inputs.map(paramToString).join(", ")})${output}`;
}

function fieldToString(field: FieldDef): string {
  const vis = field.vis ? "pub " : "";
  return field.ident ? `${vis}${field.ident.name}: ${printTy(field.ty)}` : `${vis}${printTy(field.ty)}`;
}

function variantDataToString(name: string, data: VariantData, terminated: boolean): string {
  switch (data.type) {
    case "unit":
      return terminated ? `${name};` : name;
    case "tuple":
      return `${name}(${data.fields.map(fieldToString).join(", ")})${terminated ? ";" : ""}`;
    case "struct":
      return data.fields.length === 0 ? `${name} {}` : `${name} { ${data.fields.map(fieldToString).join(", ")} }`;
  }
}

function braced(parts: string[]): string {
  return parts.length === 0 ? "{}" : `{ ${parts.join(" ")} }`;
}

export function printItem(item: Item): string {
  const prefix = `${attrsPrefix(item.attrs)}${item.vis ? "pub " : ""}`;
  const name = item.ident.name;
  switch (item.kind) {
    case "const":
      return `${prefix}const ${name}: ${printTy(item.ty)} = ${printExpr(item.expr)};`;
    case "static":
      return `${prefix}static ${item.mutable ? "mut " : ""}${name}: ${printTy(item.ty)} = ${printExpr(item.expr)};`;
    case "fn":
      return `${prefix}${fnSignature(name, item.decl)} ${printBlock(item.body)}`;
    case "struct":
      return `${prefix}struct ${variantDataToString(name, item.data, true)}`;
    case "union":
      return `${prefix}union ${variantDataToString(name, item.data, true)}`;
    case "enum": {
      const variants = item.variants.map((v) => `${attrsPrefix(v.attrs)}${variantDataToString(v.ident.name, v.data, false)}`);
      return `${prefix}enum ${name} ${variants.length === 0 ? "{}" : `{ ${variants.join(", ")} }`}`;
    }
    case "mod":
      return item.inline ? `${prefix}mod ${name} ${braced(item.items.map(printItem))}` : `${prefix}mod ${name};`;
    case "trait":
      return `${prefix}trait ${name} ${braced(item.items.map(printTraitItem))}`;
    case "impl": {
      const head = item.traitRef ? `${pathToString(item.traitRef)} for ${printTy(item.selfTy)}` : printTy(item.selfTy);
      return `${prefix}impl ${head} ${braced(item.items.map(printImplItem))}`;
    }
    case "foreign-mod": {
      const abi = item.abi !== undefined ? ` ${JSON.stringify(item.abi)}` : "";
      return `${prefix}extern${abi} ${braced(item.items.map(printForeignItem))}`;
    }
    case "type-alias":
      return `${prefix}type ${name} = ${printTy(item.ty)};`;
    case "macro-def":
      return `${prefix}macro ${name} = ${pathToString(item.target)};`;
    case "mac":
      return `${prefix}${printMac(item.mac)}${item.mac.delim === "brace" ? "" : ";"}`;
    default:
      return unreachable(item, "item");
  }
}

export function printImplItem(item: ImplItem): string {
  const prefix = `${attrsPrefix(item.attrs)}${item.vis ? "pub " : ""}`;
  switch (item.kind) {
    case "const":
      return `${prefix}const ${item.ident.name}: ${printTy(item.ty)} = ${printExpr(item.expr)};`;
    case "fn":
      return `${prefix}${fnSignature(item.ident.name, item.decl)} ${printBlock(item.body)}`;
    case "type":
      return `${prefix}type ${item.ident.name} = ${printTy(item.ty)};`;
    case "mac":
      return `${prefix}${printMac(item.mac)}${item.mac.delim === "brace" ? "" : ";"}`;
    default:
      return unreachable(item, "impl item");
  }
}

export function printTraitItem(item: TraitItem): string {
  const prefix = `${attrsPrefix(item.attrs)}${item.vis ? "pub " : ""}`;
  switch (item.kind) {
    case "const": {
      const init = item.expr ? ` = ${printExpr(item.expr)}` : "";
      return `${prefix}const ${item.ident.name}: ${printTy(item.ty)}${init};`;
    }
    case "fn":
      return `${prefix}${fnSignature(item.ident.name, item.decl)}${item.body ? ` ${printBlock(item.body)}` : ";"}`;
    case "type":
      return `${prefix}type ${item.ident.name};`;
    case "mac":
      return `${prefix}${printMac(item.mac)}${item.mac.delim === "brace" ? "" : ";"}`;
    default:
      return unreachable(item, "trait item");
  }
}

export function printForeignItem(item: ForeignItem): string {
  const prefix = `${attrsPrefix(item.attrs)}${item.vis ? "pub " : ""}`;
  switch (item.kind) {
    case "fn":
      return `${prefix}${fnSignature(item.ident.name, item.decl)};`;
    case "static":
      return `${prefix}static ${item.mutable ? "mut " : ""}${item.ident.name}: ${printTy(item.ty)};`;
    case "type":
      return `${prefix}type ${item.ident.name};`;
    case "mac":
      return `${prefix}${printMac(item.mac)}${item.mac.delim === "brace" ? "" : ";"}`;
    default:
      return unreachable(item, "foreign item");
  }
}

export function printFragment(fragment: AstFragment): string {
  switch (fragment.kind) {
    case "expr":
      return printExpr(fragment.expr);
    case "pat":
      return printPat(fragment.pat);
    case "ty":
      return printTy(fragment.ty);
    case "stmts":
      return fragment.stmts.map(printStmt).join(" ");
    case "items":
      return fragment.items.map(printItem).join("\n");
    case "impl-items":
      return fragment.items.map(printImplItem).join("\n");
    case "trait-items":
      return fragment.items.map(printTraitItem).join("\n");
    case "foreign-items":
      return fragment.items.map(printForeignItem).join("\n");
    default:
      return unreachable(fragment, "fragment");
  }
}
