import type { TypeDescriptor, TypeId, TypeRef } from "../model/types.js";
import { isOpen, typeKey } from "../model/type-ref.js";

interface Implementation {
  readonly type: TypeId;
  /** The contract as the implementing class names it. */
  readonly contract: TypeRef;
}

/**
 * Contract definition id → non-abstract classes that extend or implement it.
 */
export class ImplementationIndex {
  private readonly byContract = new Map<TypeId, Implementation[]>();

  constructor(private readonly types: ReadonlyMap<TypeId, TypeDescriptor>) {}

  add(type: TypeDescriptor, contracts: readonly TypeRef[]): void {
    if (type.kind !== "class" || type.abstract) return;
    for (const contract of contracts) {
      if (contract.kind !== "named" || contract.id === null) continue;
      let list = this.byContract.get(contract.id);
      if (!list) {
        list = [];
        this.byContract.set(contract.id, list);
      }
      list.push({ type: type.id, contract });
    }
  }

  /**
   * Classes that can satisfy `target`, sorted by id.
   *
   * A concrete class resolves to itself. An interface or abstract class resolves to
   * its implementations whose contract matches `target` exactly, or that are open
   * generic and match by definition.
   */
  candidates(target: TypeRef): TypeId[] {
    if (target.kind !== "named" || target.id === null) return [];
    const declaration = this.types.get(target.id);
    if (!declaration) return [];
    if (declaration.kind === "class" && !declaration.abstract) return [declaration.id];

    const key = typeKey(target);
    const found = new Set<TypeId>();
    for (const impl of this.byContract.get(target.id) ?? []) {
      if (typeKey(impl.contract) === key || isOpen(impl.contract) || isOpen(target)) {
        found.add(impl.type);
      }
    }
    return [...found].sort();
  }
}
