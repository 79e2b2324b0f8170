import type { ConditionalRule, InstanceSharing, Lifetime, TypeId, TypeRef } from "../model/types.js";
import type { RawDiagnostic } from "../diagnostics/types.js";
import type { GeneratorDiagnosticCode } from "../diagnostics/catalog.js";

/** One `services.addX(token, ...)` call. */
export interface PlannedRegistration {
  readonly implementation: TypeId;
  readonly lifetime: Lifetime;
  /** The contract registered; the class itself for the concrete registration. */
  readonly contract: TypeRef;
  readonly token: string;
  /** Token of the concrete registration this one resolves through (shared instances). */
  readonly forwardTo: string | null;
  readonly condition: ConditionalRule | null;
}

export interface PlannedService {
  readonly type: TypeId;
  readonly lifetime: Lifetime;
  readonly sharing: InstanceSharing;
  readonly condition: ConditionalRule | null;
  readonly registrations: readonly PlannedRegistration[];
}

/**
 * Conditional registrations of one contract token.
 * Exclusive groups render as a single if / else-if chain.
 */
export interface ConditionalGroup {
  readonly token: string;
  readonly exclusive: boolean;
  readonly registrations: readonly PlannedRegistration[];
}

export type PlanEntry =
  | { readonly kind: "registration"; readonly registration: PlannedRegistration }
  | { readonly kind: "group"; readonly group: ConditionalGroup };

export interface RegistrationPlan {
  /** Planned classes, sorted by id. */
  readonly services: readonly PlannedService[];
  /** Emission order: unconditional registrations in place, conditional ones grouped where their token first appears. */
  readonly entries: readonly PlanEntry[];
  readonly diagnostics: readonly RawDiagnostic<GeneratorDiagnosticCode>[];
}
