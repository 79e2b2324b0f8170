import type { SourceLocation, TypeId } from "../model/types.js";

/** UI severity is a presentation signal that can be tuned by policy without changing code. */
export type DiagnosticSeverity = "error" | "warning" | "info";
/** Impact captures the real consequence if ignored, which can differ from UI severity. */
export type DiagnosticImpact =
  | "blocking" // Generated output for the type is missing or unusable.
  | "degraded" // Output is produced but likely wrong at run time.
  | "informational"; // No behavioral impact; context only.
/** Actionability communicates how safe automation is (autofix vs guidance vs human). */
export type DiagnosticActionability = "autofix" | "guided" | "manual" | "none";
/** Stage tags where the diagnostic was produced. */
export type DiagnosticStage = "extract" | "graph" | "cycles" | "lifetimes" | "registration" | "emit";
/** Status tracks lifecycle (canonical vs migration cases). */
export type DiagnosticStatus = "canonical" | "proposed" | "deprecated";
/** Category is the primary axis for policy and reporting. */
export type DiagnosticCategory =
  | "marker"
  | "dependency"
  | "cycle"
  | "lifetime"
  | "registration"
  | "conditional"
  | "configuration"
  | "emit"
  | "internal";

/** Fallback data shape when exact fields are unknown at compile time. */
export type DiagnosticDataRecord = Record<string, unknown>;

/** Data keys an emit must (or may) carry; anything else is rejected at emit time. */
export type DiagnosticDataRequirement = {
  readonly required?: readonly string[];
  readonly optional?: readonly string[];
};

/** Single source of truth for severity, policy, and presentation metadata. */
export type DiagnosticSpec = {
  readonly category: DiagnosticCategory;
  readonly status: DiagnosticStatus;
  readonly defaultSeverity: DiagnosticSeverity;
  readonly impact: DiagnosticImpact;
  readonly actionability: DiagnosticActionability;
  readonly stages: readonly DiagnosticStage[];
  readonly description: string;
  readonly data?: DiagnosticDataRequirement;
};

/** Preserves literal types (especially stages) without boilerplate in callers. */
export function defineDiagnostic<const TSpec extends DiagnosticSpec>(spec: TSpec): TSpec {
  return spec;
}

/** Catalog is the authoritative registry of codes and metadata. */
export type DiagnosticsCatalog = Record<string, DiagnosticSpec>;
/** Code key type used for emitter typing. */
export type DiagnosticCode<Catalog extends DiagnosticsCatalog> = keyof Catalog & string;

/* =============================================================================
 * INSTANCES
 * ============================================================================= */

export interface RawDiagnostic<Code extends string = string> {
  readonly code: Code;
  readonly message: string;
  readonly stage: DiagnosticStage;
  /** Per-instance override of the catalog default. */
  readonly severity?: DiagnosticSeverity;
  readonly types: readonly TypeId[];
  readonly location: SourceLocation | null;
  readonly data?: Readonly<DiagnosticDataRecord>;
}

export interface ResolvedDiagnostic extends RawDiagnostic {
  readonly severity: DiagnosticSeverity;
  readonly category: DiagnosticCategory;
  readonly impact: DiagnosticImpact;
  readonly actionability: DiagnosticActionability;
  readonly suppressed?: boolean;
  readonly suppressionReason?: "policy" | "disabled";
}

/* =============================================================================
 * POLICY
 * ============================================================================= */

export type DiagnosticOverride = {
  readonly severity?: DiagnosticSeverity | "off";
  readonly impact?: DiagnosticImpact;
};

export type DiagnosticsPolicyConfig = {
  /** Suppress the entire diagnostic surface; code emission is unaffected. */
  readonly disabled?: boolean;
  readonly defaults?: DiagnosticOverride;
  readonly categories?: Partial<Record<DiagnosticCategory, DiagnosticOverride>>;
  readonly codes?: Partial<Record<string, DiagnosticOverride>>;
};
