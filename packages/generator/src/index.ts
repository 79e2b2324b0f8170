/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

export { generate, type GeneratedFile, type GenerationResult } from "./generate.js";
export {
  GENERATION_STAGES,
  GENERATION_STAGE_ORDER,
  type GenerationStageKey,
  type GenerationStageOutputs,
} from "./pipeline/stages.js";

// Stages
export { extractDescriptors, extractClass, extractInterface, MARKERS, type ExtractionResult } from "./extraction/index.js";
export {
  buildDependencyGraph,
  allDependencies,
  takesConfiguration,
  CONFIGURATION_PARAMETER,
  CONFIGURATION_TOKEN,
  type DependencyGraph,
  type GraphEdge,
  type GraphNode,
  type LifetimeSource,
  type ResolvedDependency,
} from "./graph/index.js";
export { detectCycles, type CyclePath, type CycleReport } from "./cycles/index.js";
export { compareLifetimes, validateLifetimes, type LifetimeReport, type LifetimeViolation } from "./lifetimes/index.js";
export {
  planRegistrations,
  type ConditionalGroup,
  type PlanEntry,
  type PlannedRegistration,
  type PlannedService,
  type RegistrationPlan,
} from "./registration/index.js";
export {
  emitConstructor,
  emitConstructors,
  emitRegistrationModule,
  injectConstructors,
  renderCondition,
  moduleSpecifier,
  applyEdits,
  insert,
  type ConstructorArtifact,
  type ConstructorReport,
  type RegistrationArtifact,
  type SourceEdit,
} from "./emit/index.js";

// Naming
export { resolveIdentifier, parameterName, fieldParameterName, rawDependencyName, pluralize } from "./naming/naming.js";

// Model
export type {
  CollectionKind,
  ConditionalRule,
  ConfigurationBinding,
  ConfigurationValueKind,
  DependencyDescriptor,
  DependencySource,
  ExportType,
  InstanceSharing,
  Lifetime,
  NamingConvention,
  NamingOptions,
  RegistrationMode,
  SourceLocation,
  TypeDescriptor,
  TypeId,
  TypeKind,
  TypeRef,
} from "./model/types.js";
export { LIFETIMES, LIFETIME_RANK, DEFAULT_NAMING } from "./model/types.js";
export { renderTypeRef, registrationToken, typeKey } from "./model/type-ref.js";

// Configuration
export {
  normalizeOptions,
  parseLifetime,
  DEFAULT_LIFETIME,
  DEFAULT_OUT_FILE,
  type GeneratorOptions,
  type ResolvedGeneratorOptions,
} from "./config/options.js";

// Diagnostics
export * from "./diagnostics/index.js";

// Logging & debug
export { nullLogger, type Logger } from "./types.js";
export { debug, configureDebug, refreshDebugChannels, isDebugEnabled, type DebugConfig } from "./shared/debug.js";
