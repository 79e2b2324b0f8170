import { defineDiagnostic, type DiagnosticsCatalog } from "./types.js";

// ============================================================================
// Markers
// ============================================================================

const markerDiagnostics = {
  "wirekit/marker/malformed": defineDiagnostic({
    category: "marker",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    stages: ["extract"],
    description: "A marker argument could not be read statically; defaults were used or the entry was skipped.",
    data: { optional: ["marker", "detail"] },
  }),
  "wirekit/marker/multiple-lifetimes": defineDiagnostic({
    category: "marker",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "manual",
    stages: ["extract"],
    description: "More than one lifetime marker on a class; the first one is used.",
    data: { required: ["lifetimes"] },
  }),
} as const satisfies DiagnosticsCatalog;

// ============================================================================
// Dependencies
// ============================================================================

const dependencyDiagnostics = {
  "wirekit/dependency/unresolved": defineDiagnostic({
    category: "dependency",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    stages: ["graph"],
    description: "A dependency has no implementation anywhere in the analyzed sources.",
  }),
  "wirekit/dependency/unregistered-implementation": defineDiagnostic({
    category: "dependency",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "guided",
    stages: ["graph"],
    description: "Implementations of a dependency exist, but none is registered as a service.",
  }),
  "wirekit/dependency/duplicate-in-declaration": defineDiagnostic({
    category: "dependency",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "informational",
    actionability: "autofix",
    stages: ["graph"],
    description: "The same type is listed more than once in one DependsOn declaration.",
  }),
  "wirekit/dependency/duplicate-across-declarations": defineDiagnostic({
    category: "dependency",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "informational",
    actionability: "autofix",
    stages: ["graph"],
    description: "The same type is declared by more than one DependsOn declaration or field.",
  }),
  "wirekit/dependency/conflicting-declaration-styles": defineDiagnostic({
    category: "dependency",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "informational",
    actionability: "autofix",
    stages: ["graph"],
    description: "A type is declared both by an @Inject field and by DependsOn; the field wins.",
  }),
  "wirekit/dependency/duplicate-identifier": defineDiagnostic({
    category: "dependency",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "manual",
    stages: ["graph"],
    description: "Two dependencies of a class (own or inherited) generate the same field or parameter name.",
    data: { required: ["identifier"] },
  }),
  "wirekit/dependency/generic-substitution-failed": defineDiagnostic({
    category: "dependency",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    stages: ["graph"],
    description: "An inherited generic dependency could not be closed over the derived class's type arguments.",
    data: { required: ["parameter"] },
  }),
  "wirekit/dependency/inheritance-cycle": defineDiagnostic({
    category: "dependency",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "manual",
    stages: ["graph"],
    description: "The base-class chain loops back on itself; inherited dependencies stop at the loop.",
  }),
} as const satisfies DiagnosticsCatalog;

// ============================================================================
// Cycles & Lifetimes
// ============================================================================

const graphDiagnostics = {
  "wirekit/cycle/circular-dependency": defineDiagnostic({
    category: "cycle",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    stages: ["cycles"],
    description: "Services depend on each other in a loop and cannot be constructed.",
    data: { required: ["path"] },
  }),
  "wirekit/lifetime/singleton-captures-scoped": defineDiagnostic({
    category: "lifetime",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "guided",
    stages: ["lifetimes"],
    description: "A Singleton service captures a Scoped dependency.",
  }),
  "wirekit/lifetime/singleton-captures-transient": defineDiagnostic({
    category: "lifetime",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "informational",
    actionability: "guided",
    stages: ["lifetimes"],
    description: "A Singleton service captures a Transient dependency.",
  }),
  "wirekit/lifetime/inheritance-mismatch": defineDiagnostic({
    category: "lifetime",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "guided",
    stages: ["lifetimes"],
    description: "A Singleton service inherits a dependency with a shorter lifetime from its base chain.",
    data: { required: ["dependencyLifetime"] },
  }),
} as const satisfies DiagnosticsCatalog;

// ============================================================================
// Registration & Conditions
// ============================================================================

const registrationDiagnostics = {
  "wirekit/registration/skip-target-not-implemented": defineDiagnostic({
    category: "registration",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "autofix",
    stages: ["registration"],
    description: "SkipRegistration names a contract the class does not implement.",
  }),
  "wirekit/registration/skip-has-no-effect": defineDiagnostic({
    category: "registration",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "informational",
    actionability: "autofix",
    stages: ["registration"],
    description: "SkipRegistration on a class registered as DirectOnly has nothing to skip.",
  }),
  "wirekit/registration/missing-lifetime": defineDiagnostic({
    category: "registration",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "guided",
    stages: ["registration"],
    description: "RegisterAsAll or ConditionalService used without an explicit lifetime marker.",
  }),
  "wirekit/registration/register-as-not-implemented": defineDiagnostic({
    category: "registration",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "autofix",
    stages: ["registration"],
    description: "RegisterAs lists a contract the class does not implement.",
  }),
  "wirekit/registration/register-as-duplicate": defineDiagnostic({
    category: "registration",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "informational",
    actionability: "autofix",
    stages: ["registration"],
    description: "RegisterAs lists the same contract more than once.",
  }),
  "wirekit/registration/register-as-non-interface": defineDiagnostic({
    category: "registration",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "informational",
    actionability: "guided",
    stages: ["registration"],
    description: "RegisterAs lists a class rather than an interface.",
  }),
  "wirekit/registration/service-not-exported": defineDiagnostic({
    category: "registration",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "autofix",
    stages: ["registration"],
    description: "A service class is not exported, so the registration module cannot import it.",
  }),
  "wirekit/conditional/conflicting-conditions": defineDiagnostic({
    category: "conditional",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "manual",
    stages: ["registration"],
    description: "A value appears in both the positive and the negated form of a condition.",
  }),
  "wirekit/conditional/empty-conditions": defineDiagnostic({
    category: "conditional",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "informational",
    actionability: "autofix",
    stages: ["registration"],
    description: "ConditionalService without any condition; the class is registered unconditionally.",
  }),
  "wirekit/conditional/config-key-without-comparison": defineDiagnostic({
    category: "conditional",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "manual",
    stages: ["registration"],
    description: "configValue is set without equals or notEquals.",
  }),
  "wirekit/conditional/comparison-without-config-key": defineDiagnostic({
    category: "conditional",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "manual",
    stages: ["registration"],
    description: "equals or notEquals is set without configValue.",
  }),
  "wirekit/conditional/empty-config-key": defineDiagnostic({
    category: "conditional",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "autofix",
    stages: ["registration"],
    description: "configValue is blank.",
  }),
  "wirekit/conditional/multiple-conditions": defineDiagnostic({
    category: "conditional",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    stages: ["registration"],
    description: "More than one ConditionalService on a class; only the first is used.",
  }),
} as const satisfies DiagnosticsCatalog;

// ============================================================================
// Configuration binding
// ============================================================================

const configurationDiagnostics = {
  "wirekit/configuration/invalid-key": defineDiagnostic({
    category: "configuration",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "manual",
    stages: ["extract"],
    description: "An InjectConfiguration key is empty, has an empty section, or contains a control character; the field is not bound.",
    data: { required: ["key"] },
  }),
  "wirekit/configuration/unsupported-type": defineDiagnostic({
    category: "configuration",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    stages: ["extract"],
    description: "A configuration-bound field is not typed string, number, boolean or string[]; the field is not bound.",
    data: { required: ["typeText"] },
  }),
  "wirekit/configuration/static-field": defineDiagnostic({
    category: "configuration",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    actionability: "manual",
    stages: ["extract"],
    description: "InjectConfiguration on a static field; configuration is bound per instance, so the field is skipped.",
  }),
} as const satisfies DiagnosticsCatalog;

// ============================================================================
// Emission & Internal
// ============================================================================

const emitDiagnostics = {
  "wirekit/emit/explicit-constructor": defineDiagnostic({
    category: "emit",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "blocking",
    actionability: "manual",
    stages: ["emit"],
    description: "The class declares its own constructor, so no constructor is generated for its dependencies.",
  }),
  "wirekit/internal/error": defineDiagnostic({
    category: "internal",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "none",
    stages: ["extract", "graph", "cycles", "lifetimes", "registration", "emit"],
    description: "An unexpected failure while processing one type; other types were processed normally.",
    data: { optional: ["detail"] },
  }),
} as const satisfies DiagnosticsCatalog;

export const generatorDiagnostics = {
  ...markerDiagnostics,
  ...dependencyDiagnostics,
  ...graphDiagnostics,
  ...registrationDiagnostics,
  ...configurationDiagnostics,
  ...emitDiagnostics,
} as const satisfies DiagnosticsCatalog;

export type GeneratorDiagnosticCode = keyof typeof generatorDiagnostics & string;
