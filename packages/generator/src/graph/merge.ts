import type { DependencyDescriptor, TypeDescriptor } from "../model/types.js";
import { renderCollection, renderTypeRef, typeKey } from "../model/type-ref.js";
import type { GeneratorEmitter } from "../diagnostics/emitter.js";
import { debug } from "../shared/debug.js";

/** Identity of a dependency target: type key plus whether it is a collection. */
export function dependencyKey(dep: Pick<DependencyDescriptor, "target" | "collection">): string {
  return dep.collection === null ? typeKey(dep.target) : `${typeKey(dep.target)}[]`;
}

/**
 * Merge a class's own declarations into one ordered list.
 *
 * - repeated within one `DependsOn`: first kept
 * - repeated across `DependsOn`s or fields: first kept
 * - declared by a field and a `DependsOn`: the field replaces the bulk entry
 */
export function mergeOwnDependencies(
  type: TypeDescriptor,
  declared: readonly DependencyDescriptor[],
  emitter: GeneratorEmitter,
): DependencyDescriptor[] {
  const merged: DependencyDescriptor[] = [];
  const byKey = new Map<string, DependencyDescriptor>();

  for (const dep of declared) {
    const key = dependencyKey(dep);
    const existing = byKey.get(key);
    if (!existing) {
      byKey.set(key, dep);
      merged.push(dep);
      continue;
    }

    const shown = renderCollection(renderTypeRef(dep.target), dep.collection);
    const existingSource = existing.source;
    const source = dep.source;

    if (source.kind === "field" && existingSource.kind === "bulk") {
      emitter.emit("wirekit/dependency/conflicting-declaration-styles", {
        message: `'${type.name}' declares '${shown}' both in DependsOn and on field '${source.fieldName}'; the field declaration is used.`,
        types: [type.id],
        location: dep.location,
      });
      merged.splice(merged.indexOf(existing), 1);
      merged.push(dep);
      byKey.set(key, dep);
      continue;
    }

    if (
      source.kind === "bulk" &&
      existingSource.kind === "bulk" &&
      source.declarationIndex === existingSource.declarationIndex
    ) {
      emitter.emit("wirekit/dependency/duplicate-in-declaration", {
        message: `'${shown}' is listed more than once in one DependsOn on '${type.name}'.`,
        types: [type.id],
        location: dep.location,
      });
    } else {
      emitter.emit("wirekit/dependency/duplicate-across-declarations", {
        message: `'${type.name}' declares '${shown}' more than once; a single dependency is kept.`,
        types: [type.id],
        location: dep.location,
      });
    }
    debug.graph("merge.duplicate", { type: type.id, target: shown });
  }

  return merged;
}
