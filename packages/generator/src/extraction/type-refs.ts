import ts from "typescript";
import type { CollectionKind, TypeRef } from "../model/types.js";
import { typeIdOf } from "./ast-helpers.js";

export interface TypeRefContext {
  readonly checker: ts.TypeChecker;
  /** Type parameters of the declaring class; names here become `param` references. */
  readonly typeParameters: ReadonlySet<string>;
}

export type TypeReadResult =
  | { readonly ok: true; readonly ref: TypeRef; readonly collection: CollectionKind | null }
  | { readonly ok: false; readonly reason: string };

const COLLECTION_REFERENCES: Readonly<Record<string, CollectionKind>> = {
  Array: "array",
  ReadonlyArray: "readonly-array",
  Iterable: "iterable",
};

/**
 * Read a dependency target, unwrapping one level of collection.
 *
 * `IPlugin[]`, `readonly IPlugin[]`, `Array<IPlugin>`, `ReadonlyArray<IPlugin>` and
 * `Iterable<IPlugin>` all read as `IPlugin` with a collection kind.
 */
export function readDependencyType(node: ts.TypeNode, ctx: TypeRefContext): TypeReadResult {
  const unwrapped = unwrapCollection(node);
  const ref = readTargetType(unwrapped.element, ctx);
  if (typeof ref === "string") return { ok: false, reason: ref };
  return { ok: true, ref, collection: unwrapped.collection };
}

/**
 * Read a reference that must name a class, interface or type parameter.
 * Returns the failure reason as a string.
 */
export function readTargetType(node: ts.TypeNode, ctx: TypeRefContext): TypeRef | string {
  if (ts.isParenthesizedTypeNode(node)) return readTargetType(node.type, ctx);
  if (ts.isTypeReferenceNode(node)) {
    return readReference(node.typeName, node.typeArguments, ctx);
  }
  return `'${node.getText()}' is not a class or interface type`;
}

/**
 * Read a heritage clause entry (`extends Base<T>`, `implements IFoo`).
 */
export function readHeritageType(node: ts.ExpressionWithTypeArguments, ctx: TypeRefContext): TypeRef | null {
  const expr = node.expression;
  if (!ts.isIdentifier(expr) && !ts.isPropertyAccessExpression(expr)) return null;
  const name = expr.getText();
  const args = (node.typeArguments ?? []).map((arg) => readTypeArgument(arg, ctx));
  return { kind: "named", name, id: resolveDeclarationId(expr, ctx.checker), args };
}

function readReference(
  typeName: ts.EntityName,
  typeArguments: ts.NodeArray<ts.TypeNode> | undefined,
  ctx: TypeRefContext,
): TypeRef {
  const name = entityNameText(typeName);
  if (ts.isIdentifier(typeName) && !typeArguments && ctx.typeParameters.has(name)) {
    return { kind: "param", name };
  }
  const args = (typeArguments ?? []).map((arg) => readTypeArgument(arg, ctx));
  return { kind: "named", name, id: resolveDeclarationId(typeName, ctx.checker), args };
}

/**
 * Generic arguments may be anything (`Map<string, Item>`); non-references are kept
 * as opaque text so they still render.
 */
function readTypeArgument(node: ts.TypeNode, ctx: TypeRefContext): TypeRef {
  const read = readTargetType(node, ctx);
  if (typeof read !== "string") return read;
  return { kind: "named", name: node.getText(), id: null, args: [] };
}

function unwrapCollection(node: ts.TypeNode): { element: ts.TypeNode; collection: CollectionKind | null } {
  if (ts.isParenthesizedTypeNode(node)) return unwrapCollection(node.type);
  if (ts.isArrayTypeNode(node)) return { element: node.elementType, collection: "array" };
  if (
    ts.isTypeOperatorNode(node) &&
    node.operator === ts.SyntaxKind.ReadonlyKeyword &&
    ts.isArrayTypeNode(node.type)
  ) {
    return { element: node.type.elementType, collection: "readonly-array" };
  }
  if (ts.isTypeReferenceNode(node) && ts.isIdentifier(node.typeName)) {
    const kind = COLLECTION_REFERENCES[node.typeName.text];
    const element = node.typeArguments?.[0];
    if (kind && element && node.typeArguments?.length === 1) {
      return { element, collection: kind };
    }
  }
  return { element: node, collection: null };
}

/**
 * Follow import aliases to the class or interface declaration.
 * Declarations in `.d.ts` files (and unresolvable names) have no id.
 */
function resolveDeclarationId(node: ts.Node, checker: ts.TypeChecker): string | null {
  let symbol = checker.getSymbolAtLocation(node);
  if (!symbol) return null;
  if (symbol.flags & ts.SymbolFlags.Alias) {
    symbol = checker.getAliasedSymbol(symbol);
  }
  const declaration = symbol.declarations?.find(
    (d): d is ts.ClassDeclaration | ts.InterfaceDeclaration =>
      ts.isClassDeclaration(d) || ts.isInterfaceDeclaration(d),
  );
  if (!declaration?.name) return null;
  const sourceFile = declaration.getSourceFile();
  if (sourceFile.isDeclarationFile) return null;
  return typeIdOf(sourceFile.fileName, declaration.name.text);
}

function entityNameText(name: ts.EntityName): string {
  return ts.isIdentifier(name) ? name.text : `${entityNameText(name.left)}.${name.right.text}`;
}
