import type { CollectionKind, NamedTypeRef, TypeRef } from "./types.js";

/** Binding of type parameter names to references, used for generic substitution. */
export type Substitution = ReadonlyMap<string, TypeRef>;

export const EMPTY_SUBSTITUTION: Substitution = new Map();

export class SubstitutionError extends Error {
  constructor(public readonly parameter: string) {
    super(`Type parameter '${parameter}' has no binding`);
    this.name = "SubstitutionError";
  }
}

export function named(name: string, id: string | null, args: readonly TypeRef[] = []): NamedTypeRef {
  return { kind: "named", name, id, args };
}

/**
 * Replace type parameters with their bindings.
 * Throws `SubstitutionError` for a parameter that is not bound.
 */
export function substitute(ref: TypeRef, substitution: Substitution): TypeRef {
  if (ref.kind === "param") {
    const bound = substitution.get(ref.name);
    if (!bound) throw new SubstitutionError(ref.name);
    return bound;
  }
  if (ref.args.length === 0) return ref;
  return { ...ref, args: ref.args.map((arg) => substitute(arg, substitution)) };
}

/**
 * Build a substitution for `parameters` from `args`.
 * Missing arguments stay unbound; extra arguments are ignored.
 */
export function bindParameters(
  parameters: readonly string[],
  args: readonly TypeRef[],
): Map<string, TypeRef> {
  const binding = new Map<string, TypeRef>();
  parameters.forEach((name, index) => {
    const arg = args[index];
    if (arg) binding.set(name, arg);
  });
  return binding;
}

/** Identity key: definition plus arguments. */
export function typeKey(ref: TypeRef): string {
  if (ref.kind === "param") return `$${ref.name}`;
  const head = ref.id ?? `?${ref.name}`;
  if (ref.args.length === 0) return head;
  return `${head}<${ref.args.map(typeKey).join(",")}>`;
}

/**
 * Source text for a reference.
 * "IRepository<User>", "Map<string, Item>"
 */
export function renderTypeRef(ref: TypeRef): string {
  if (ref.kind === "param") return ref.name;
  if (ref.args.length === 0) return ref.name;
  return `${ref.name}<${ref.args.map(renderTypeRef).join(", ")}>`;
}

export function renderCollection(element: string, collection: CollectionKind | null): string {
  switch (collection) {
    case null:
      return element;
    case "array":
      return needsParens(element) ? `(${element})[]` : `${element}[]`;
    case "readonly-array":
      return needsParens(element) ? `readonly (${element})[]` : `readonly ${element}[]`;
    case "iterable":
      return `Iterable<${element}>`;
  }
}

/** True when any part of the reference is a type parameter. */
export function isOpen(ref: TypeRef): boolean {
  if (ref.kind === "param") return true;
  return ref.args.some(isOpen);
}

/** Simple name without qualification: "ns.ILogger" → "ILogger". */
export function simpleName(ref: TypeRef): string {
  const dot = ref.name.lastIndexOf(".");
  return dot >= 0 ? ref.name.slice(dot + 1) : ref.name;
}

function needsParens(text: string): boolean {
  return /[|&\s]/.test(text.replace(/<[^>]*>/g, ""));
}

/**
 * Token a contract is registered under. Open generics drop their arguments:
 * "IRepository<User>" stays as is, "IRepository<T>" → "IRepository<>", "IMap<K, V>" → "IMap<,>".
 */
export function registrationToken(ref: TypeRef): string {
  if (ref.kind === "named" && ref.args.length > 0 && isOpen(ref)) {
    return `${ref.name}<${",".repeat(ref.args.length - 1)}>`;
  }
  return renderTypeRef(ref);
}
