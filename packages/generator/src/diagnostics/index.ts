export { generatorDiagnostics } from "./catalog.js";
export type { GeneratorDiagnosticCode } from "./catalog.js";
export { createDiagnosticEmitter, createGeneratorEmitter } from "./emitter.js";
export type { DiagnosticEmitter, GeneratorEmitter, EmitDiagnosticInput } from "./emitter.js";
export { resolvePolicy } from "./policy.js";
export { aggregateDiagnostics, countBySeverity } from "./aggregate.js";
export type { AggregatedDiagnostics, AggregationContext } from "./aggregate.js";
export { defineDiagnostic } from "./types.js";
export type {
  DiagnosticSeverity,
  DiagnosticImpact,
  DiagnosticActionability,
  DiagnosticStage,
  DiagnosticStatus,
  DiagnosticCategory,
  DiagnosticDataRecord,
  DiagnosticSpec,
  DiagnosticsCatalog,
  DiagnosticCode,
  RawDiagnostic,
  ResolvedDiagnostic,
  DiagnosticOverride,
  DiagnosticsPolicyConfig,
} from "./types.js";
