import type {
  DiagnosticOverride,
  DiagnosticSpec,
  DiagnosticsCatalog,
  DiagnosticsPolicyConfig,
  RawDiagnostic,
  ResolvedDiagnostic,
} from "./types.js";
import { generatorDiagnostics } from "./catalog.js";

/**
 * Attach catalog metadata and apply policy overrides.
 *
 * Override precedence (later wins): defaults → category → code.
 * A per-instance severity sits below every override.
 */
export function resolvePolicy(
  diagnostics: readonly RawDiagnostic[],
  policy: DiagnosticsPolicyConfig | undefined,
  catalog: DiagnosticsCatalog = generatorDiagnostics,
): ResolvedDiagnostic[] {
  return diagnostics.map((diag) => {
    const normalized = normalizeDiagnostic(diag, catalog[diag.code]);
    if (!policy) return normalized;
    if (policy.disabled) return { ...normalized, suppressed: true, suppressionReason: "disabled" };
    return applyPolicy(normalized, policy);
  });
}

function normalizeDiagnostic(diag: RawDiagnostic, spec: DiagnosticSpec | undefined): ResolvedDiagnostic {
  return {
    ...diag,
    severity: diag.severity ?? spec?.defaultSeverity ?? "error",
    category: spec?.category ?? "internal",
    impact: spec?.impact ?? "degraded",
    actionability: spec?.actionability ?? "manual",
  };
}

function applyPolicy(diagnostic: ResolvedDiagnostic, policy: DiagnosticsPolicyConfig): ResolvedDiagnostic {
  const overrides: DiagnosticOverride[] = [];
  if (policy.defaults) overrides.push(policy.defaults);
  const categoryOverride = policy.categories?.[diagnostic.category];
  if (categoryOverride) overrides.push(categoryOverride);
  const codeOverride = policy.codes?.[diagnostic.code];
  if (codeOverride) overrides.push(codeOverride);

  let next: ResolvedDiagnostic = diagnostic;
  for (const override of overrides) {
    next = applyOverride(next, override);
  }
  return next;
}

function applyOverride(diagnostic: ResolvedDiagnostic, override: DiagnosticOverride): ResolvedDiagnostic {
  if (override.severity === "off") {
    return { ...diagnostic, suppressed: true, suppressionReason: "policy" };
  }

  return {
    ...diagnostic,
    ...(override.severity ? { severity: override.severity, suppressed: false } : {}),
    ...(override.impact ? { impact: override.impact } : {}),
  };
}
