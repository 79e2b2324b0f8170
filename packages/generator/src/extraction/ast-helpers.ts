import ts from "typescript";
import type { SourceLocation, TypeId } from "../model/types.js";

/**
 * A decorator reduced to what marker reading needs.
 * Handles `@name`, `@name(args)`, `@name<T>(args)` and `@ns.name(args)`.
 */
export interface DecoratorCall {
  readonly name: string;
  readonly args: readonly ts.Expression[];
  readonly typeArgs: readonly ts.TypeNode[];
  readonly node: ts.Decorator;
}

export function readDecorator(dec: ts.Decorator): DecoratorCall | null {
  const expr = dec.expression;
  if (ts.isIdentifier(expr)) {
    return { name: expr.text, args: [], typeArgs: [], node: dec };
  }
  if (ts.isPropertyAccessExpression(expr) && ts.isIdentifier(expr.name)) {
    return { name: expr.name.text, args: [], typeArgs: [], node: dec };
  }
  if (ts.isCallExpression(expr)) {
    const name = calleeName(expr.expression);
    if (!name) return null;
    return { name, args: expr.arguments, typeArgs: expr.typeArguments ?? [], node: dec };
  }
  return null;
}

export function decoratorsOf(node: ts.Node): readonly ts.Decorator[] {
  return (ts.canHaveDecorators(node) ? ts.getDecorators(node) : undefined) ?? [];
}

export function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  return modifiers?.some((m) => m.kind === kind) ?? false;
}

/**
 * Get a property assignment from an object literal by name.
 */
export function getProp(obj: ts.ObjectLiteralExpression, name: string): ts.PropertyAssignment | undefined {
  return obj.properties.find(
    (p): p is ts.PropertyAssignment =>
      ts.isPropertyAssignment(p) &&
      ((ts.isIdentifier(p.name) && p.name.text === name) || (ts.isStringLiteralLike(p.name) && p.name.text === name)),
  );
}

/**
 * Statically readable marker argument.
 * `"x"` → string, `true` → boolean, `Enum.Member` → member.
 */
export type LiteralValue =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "member"; readonly owner: string; readonly member: string };

export function readLiteral(expr: ts.Expression): LiteralValue | null {
  if (ts.isParenthesizedExpression(expr)) return readLiteral(expr.expression);
  if (ts.isAsExpression(expr) || ts.isSatisfiesExpression(expr)) return readLiteral(expr.expression);
  if (ts.isStringLiteralLike(expr)) return { kind: "string", value: expr.text };
  if (expr.kind === ts.SyntaxKind.TrueKeyword) return { kind: "boolean", value: true };
  if (expr.kind === ts.SyntaxKind.FalseKeyword) return { kind: "boolean", value: false };
  if (ts.isPropertyAccessExpression(expr) && ts.isIdentifier(expr.name)) {
    return { kind: "member", owner: expr.expression.getText(), member: expr.name.text };
  }
  return null;
}

export function typeIdOf(fileName: string, name: string): TypeId {
  return `${normalizeFileName(fileName)}#${name}`;
}

export function normalizeFileName(fileName: string): string {
  return fileName.replace(/\\/g, "/");
}

export function locationOf(node: ts.Node, sourceFile: ts.SourceFile): SourceLocation {
  return {
    file: normalizeFileName(sourceFile.fileName),
    start: node.getStart(sourceFile),
    end: node.getEnd(),
  };
}

/**
 * Offset just after the class body's opening brace.
 */
export function classBodyStart(node: ts.ClassDeclaration, sourceFile: ts.SourceFile): number {
  for (const child of node.getChildren(sourceFile)) {
    if (child.kind === ts.SyntaxKind.OpenBraceToken) {
      return child.getEnd();
    }
  }
  // Fallback: scan the text from the class name onward
  const text = sourceFile.text;
  const from = node.name ? node.name.getEnd() : node.getStart(sourceFile);
  const brace = text.indexOf("{", from);
  return brace >= 0 ? brace + 1 : -1;
}

/**
 * Names exported through `export { A, B as C }` (local names).
 */
/**
 * Local names exported through `export { ... }` lists, mapped to the name they are
 * exported under. A named alias is preferred over `default`.
 * `export { Impl as Service }` → Impl ↦ "Service"
 */
export function collectExportedNames(sourceFile: ts.SourceFile): ReadonlyMap<string, string> {
  const names = new Map<string, string>();
  for (const statement of sourceFile.statements) {
    if (!ts.isExportDeclaration(statement) || statement.moduleSpecifier || statement.isTypeOnly) continue;
    const clause = statement.exportClause;
    if (!clause || !ts.isNamedExports(clause)) continue;
    for (const element of clause.elements) {
      if (element.isTypeOnly) continue;
      const local = (element.propertyName ?? element.name).text;
      const exported = element.name.text;
      if (names.get(local) === undefined || names.get(local) === "default") names.set(local, exported);
    }
  }
  return names;
}

function calleeName(callee: ts.Expression): string | null {
  if (ts.isIdentifier(callee)) return callee.text;
  if (ts.isPropertyAccessExpression(callee) && ts.isIdentifier(callee.name)) return callee.name.text;
  return null;
}
