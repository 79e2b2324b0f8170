import type { TypeDescriptor, TypeId, TypeRef } from "../model/types.js";
import { SubstitutionError, bindParameters, substitute, typeKey, type Substitution } from "../model/type-ref.js";

export interface InheritanceFrame {
  readonly type: TypeDescriptor;
  /** Maps the frame's type parameters into the derived class's scope. */
  readonly substitution: Substitution;
}

export interface BaseChain {
  /** Root-most first; excludes the class itself. */
  readonly frames: readonly InheritanceFrame[];
  /** Set when the walk came back to a class it had already visited. */
  readonly cycleAt: TypeId | null;
}

/** Each type parameter bound to itself. */
export function identitySubstitution(type: TypeDescriptor): Substitution {
  return new Map(type.typeParameters.map((name): [string, TypeRef] => [name, { kind: "param", name }]));
}

/**
 * Walk `extends` from `type` toward the root.
 *
 * The walk stops at a base declared outside the analyzed sources and at an
 * inheritance cycle.
 */
export function walkBaseChain(type: TypeDescriptor, types: ReadonlyMap<TypeId, TypeDescriptor>): BaseChain {
  const frames: InheritanceFrame[] = [];
  const visited = new Set<TypeId>([type.id]);
  let current = type;
  let substitution = identitySubstitution(type);
  let cycleAt: TypeId | null = null;

  while (true) {
    const ref = current.base;
    if (!ref || ref.kind !== "named" || ref.id === null) break;
    const baseId = ref.id;
    if (visited.has(baseId)) {
      cycleAt = baseId;
      break;
    }
    const base = types.get(baseId);
    if (!base || base.kind !== "class") break;
    visited.add(baseId);

    substitution = bindArguments(base, ref.args, substitution);
    frames.push({ type: base, substitution });
    current = base;
  }

  return { frames: frames.reverse(), cycleAt };
}

/**
 * Every interface `type` implements, directly, through its bases and through
 * interfaces those extend. Ordered by first appearance, nearest class first.
 */
export function collectInterfaces(
  type: TypeDescriptor,
  chain: BaseChain,
  types: ReadonlyMap<TypeId, TypeDescriptor>,
): TypeRef[] {
  const result: TypeRef[] = [];
  const seen = new Set<string>();
  const frames: InheritanceFrame[] = [
    { type, substitution: identitySubstitution(type) },
    ...[...chain.frames].reverse(),
  ];

  const visit = (ref: TypeRef, substitution: Substitution): void => {
    const resolved = trySubstitute(ref, substitution);
    if (!resolved || resolved.kind !== "named") return;
    const key = typeKey(resolved);
    if (seen.has(key)) return;
    seen.add(key);
    result.push(resolved);

    const declaration = resolved.id === null ? undefined : types.get(resolved.id);
    if (declaration?.kind !== "interface") return;
    const inner = bindParameters(declaration.typeParameters, resolved.args);
    for (const parent of declaration.interfaces) visit(parent, inner);
  };

  for (const frame of frames) {
    for (const ref of frame.type.interfaces) visit(ref, frame.substitution);
  }
  return result;
}

/** Base class references nearest first, substituted into `type`'s scope. */
export function collectBases(type: TypeDescriptor, chain: BaseChain): TypeRef[] {
  const bases: TypeRef[] = [];
  const frames: InheritanceFrame[] = [{ type, substitution: identitySubstitution(type) }, ...[...chain.frames].reverse()];
  for (const frame of frames) {
    const base = frame.type.base;
    if (!base) continue;
    const resolved = trySubstitute(base, frame.substitution);
    if (resolved) bases.push(resolved);
  }
  return bases;
}

/** Arguments that cannot be substituted leave their parameter unbound. */
function bindArguments(base: TypeDescriptor, args: readonly TypeRef[], outer: Substitution): Substitution {
  const binding = new Map<string, TypeRef>();
  base.typeParameters.forEach((name, index) => {
    const arg = args[index];
    const resolved = arg ? trySubstitute(arg, outer) : null;
    if (resolved) binding.set(name, resolved);
  });
  return binding;
}

function trySubstitute(ref: TypeRef, substitution: Substitution): TypeRef | null {
  try {
    return substitute(ref, substitution);
  } catch (error) {
    if (error instanceof SubstitutionError) return null;
    throw error;
  }
}
