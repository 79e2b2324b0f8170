import type ts from "typescript";
import { normalizeOptions, type GeneratorOptions, type ResolvedGeneratorOptions } from "./config/options.js";
import { detectCycles } from "./cycles/detector.js";
import { aggregateDiagnostics } from "./diagnostics/aggregate.js";
import { resolvePolicy } from "./diagnostics/policy.js";
import type { RawDiagnostic, ResolvedDiagnostic } from "./diagnostics/types.js";
import { emitConstructors } from "./emit/constructor.js";
import { injectConstructors } from "./emit/inject.js";
import { emitRegistrationModule } from "./emit/registration.js";
import { normalizeFileName } from "./extraction/ast-helpers.js";
import { extractDescriptors } from "./extraction/extractor.js";
import { buildDependencyGraph } from "./graph/builder.js";
import { validateLifetimes } from "./lifetimes/validator.js";
import { planRegistrations } from "./registration/planner.js";
import { GENERATION_STAGES, GENERATION_STAGE_ORDER, type GenerationStageOutputs } from "./pipeline/stages.js";
import { nullLogger, type Logger } from "./types.js";

export interface GeneratedFile {
  readonly fileName: string;
  /** `source`: a copy of a user file with constructors inserted. */
  readonly kind: "source" | "registration";
  readonly text: string;
}

export interface GenerationResult {
  readonly options: ResolvedGeneratorOptions;
  readonly stages: GenerationStageOutputs;
  readonly files: readonly GeneratedFile[];
  /** Visible diagnostics after policy, de-duplicated and sorted. */
  readonly diagnostics: readonly ResolvedDiagnostic[];
  readonly suppressed: readonly ResolvedDiagnostic[];
  readonly hasErrors: boolean;
}

/**
 * Run every stage over `program` and collect the generated files.
 *
 * Never throws for problems in the analyzed code; those surface as diagnostics.
 */
export function generate(
  program: ts.Program,
  options: GeneratorOptions = {},
  logger: Logger = nullLogger,
): GenerationResult {
  const resolved = normalizeOptions(options);

  const extraction = extractDescriptors(program, logger);
  const graph = buildDependencyGraph(extraction, resolved, logger);
  const cycles = detectCycles(graph, logger);
  const lifetimes = validateLifetimes(graph, resolved, logger);
  const plan = planRegistrations(graph, logger);
  const constructors = emitConstructors(graph, logger, resolved.runtimeModule);
  const registration = emitRegistrationModule(plan, graph, resolved);

  const stages: GenerationStageOutputs = {
    [GENERATION_STAGES.extract]: extraction,
    [GENERATION_STAGES.graph]: graph,
    [GENERATION_STAGES.cycles]: cycles,
    [GENERATION_STAGES.lifetimes]: lifetimes,
    [GENERATION_STAGES.registration]: plan,
    [GENERATION_STAGES.emit]: { constructors, registration },
  };

  const files: GeneratedFile[] = [];
  const touched = new Set(constructors.artifacts.map((a) => a.file));
  for (const sourceFile of program.getSourceFiles()) {
    if (!touched.has(normalizeFileName(sourceFile.fileName))) continue;
    files.push({
      fileName: normalizeFileName(sourceFile.fileName),
      kind: "source",
      text: injectConstructors(sourceFile, constructors.artifacts),
    });
  }
  files.sort((a, b) => (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0));
  files.push({ fileName: registration.fileName, kind: "registration", text: registration.text });

  const raw: RawDiagnostic[] = GENERATION_STAGE_ORDER.flatMap((stage) => stageDiagnostics(stages, stage));
  const { diagnostics, suppressed } = aggregateDiagnostics(resolvePolicy(raw, resolved.diagnostics));
  const hasErrors = diagnostics.some((d) => d.severity === "error");

  logger.info(
    `[wirekit] Generation complete: ${files.length} files, ${diagnostics.length} diagnostics` +
      (suppressed.length > 0 ? ` (${suppressed.length} suppressed)` : ""),
  );
  return { options: resolved, stages, files, diagnostics, suppressed, hasErrors };
}

function stageDiagnostics(
  stages: GenerationStageOutputs,
  stage: (typeof GENERATION_STAGE_ORDER)[number],
): readonly RawDiagnostic[] {
  if (stage === GENERATION_STAGES.emit) {
    const emit = stages[stage];
    return [...emit.constructors.diagnostics, ...emit.registration.diagnostics];
  }
  return stages[stage].diagnostics;
}
