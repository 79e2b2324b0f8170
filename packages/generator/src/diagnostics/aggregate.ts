import type { DiagnosticSeverity, ResolvedDiagnostic } from "./types.js";

export interface AggregatedDiagnostics {
  /** Visible diagnostics, de-duplicated and sorted. */
  readonly diagnostics: readonly ResolvedDiagnostic[];
  readonly suppressed: readonly ResolvedDiagnostic[];
}

export interface AggregationContext {
  sort?: boolean;
  dedupe?: boolean;
}

export function aggregateDiagnostics(
  resolved: readonly ResolvedDiagnostic[],
  context: AggregationContext = {},
): AggregatedDiagnostics {
  const sort = context.sort ?? true;
  const dedupe = context.dedupe ?? true;

  let visible = resolved.filter((diag) => !diag.suppressed);
  const suppressed = resolved.filter((diag) => diag.suppressed === true);
  if (dedupe) visible = dedupeDiagnostics(visible);
  if (sort) visible.sort(compareDiagnostics);

  return { diagnostics: visible, suppressed };
}

export function countBySeverity(
  diagnostics: readonly ResolvedDiagnostic[],
): Record<DiagnosticSeverity, number> {
  const counts: Record<DiagnosticSeverity, number> = { error: 0, warning: 0, info: 0 };
  for (const diag of diagnostics) counts[diag.severity]++;
  return counts;
}

function dedupeDiagnostics(diags: readonly ResolvedDiagnostic[]): ResolvedDiagnostic[] {
  const seen = new Set<string>();
  const out: ResolvedDiagnostic[] = [];
  for (const diag of diags) {
    const location = diag.location;
    const key = location
      ? `${diag.code}:${location.file}:${location.start}:${location.end}:${diag.message}`
      : `${diag.code}:${diag.message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(diag);
  }
  return out;
}

function compareDiagnostics(a: ResolvedDiagnostic, b: ResolvedDiagnostic): number {
  const fileA = a.location?.file ?? "";
  const fileB = b.location?.file ?? "";
  if (fileA !== fileB) return fileA < fileB ? -1 : 1;
  const locA = a.location;
  const locB = b.location;
  if (locA && locB) {
    const startDelta = locA.start - locB.start;
    if (startDelta !== 0) return startDelta;
  } else if (locA) {
    return -1;
  } else if (locB) {
    return 1;
  }
  if (a.code !== b.code) return a.code < b.code ? -1 : 1;
  return a.message < b.message ? -1 : a.message > b.message ? 1 : 0;
}
