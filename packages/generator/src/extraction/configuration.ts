import ts from "typescript";
import type { ConfigurationValueKind } from "../model/types.js";

export interface ConfigurationFieldType {
  readonly kind: ConfigurationValueKind;
  readonly optional: boolean;
}

/**
 * Value kind of a configuration-bound field, from its annotation.
 * `string`, `number`, `boolean`, `string[]` (also `readonly string[]`,
 * `Array<string>`), each optionally `| undefined`.
 */
export function readConfigurationType(node: ts.TypeNode): ConfigurationFieldType | null {
  if (ts.isParenthesizedTypeNode(node)) return readConfigurationType(node.type);
  if (ts.isUnionTypeNode(node)) {
    const defined = node.types.filter((member) => member.kind !== ts.SyntaxKind.UndefinedKeyword);
    const [only] = defined;
    if (!only || defined.length !== 1 || defined.length === node.types.length) return null;
    const inner = readConfigurationType(only);
    return inner && { kind: inner.kind, optional: true };
  }
  switch (node.kind) {
    case ts.SyntaxKind.StringKeyword:
      return { kind: "string", optional: false };
    case ts.SyntaxKind.NumberKeyword:
      return { kind: "number", optional: false };
    case ts.SyntaxKind.BooleanKeyword:
      return { kind: "boolean", optional: false };
  }
  return isStringList(node) ? { kind: "string-list", optional: false } : null;
}

function isStringList(node: ts.TypeNode): boolean {
  if (ts.isArrayTypeNode(node)) return node.elementType.kind === ts.SyntaxKind.StringKeyword;
  if (ts.isTypeOperatorNode(node) && node.operator === ts.SyntaxKind.ReadonlyKeyword) return isStringList(node.type);
  if (ts.isTypeReferenceNode(node) && ts.isIdentifier(node.typeName)) {
    const name = node.typeName.text;
    const args = node.typeArguments ?? [];
    return (name === "Array" || name === "ReadonlyArray") && args.length === 1 && args[0]?.kind === ts.SyntaxKind.StringKeyword;
  }
  return false;
}

/** Why `key` cannot address a configuration value, or null. Sections nest with `:`. */
export function configurationKeyProblem(key: string): string | null {
  if (key.trim().length === 0) return "it is empty";
  if (key.includes("::")) return "it contains '::'";
  if (key.startsWith(":") || key.endsWith(":")) return "it starts or ends with ':'";
  if (/[\0\r\n\t]/.test(key)) return "it contains a control character";
  return null;
}
