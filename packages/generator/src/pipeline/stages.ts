import type { CycleReport } from "../cycles/detector.js";
import type { ConstructorReport } from "../emit/constructor.js";
import type { RegistrationArtifact } from "../emit/registration.js";
import type { ExtractionResult } from "../extraction/extractor.js";
import type { DependencyGraph } from "../graph/types.js";
import type { LifetimeReport } from "../lifetimes/validator.js";
import type { RegistrationPlan } from "../registration/types.js";

export const GENERATION_STAGES = {
  extract: "10-extract",
  graph: "20-graph",
  cycles: "30-cycles",
  lifetimes: "40-lifetimes",
  registration: "50-registration",
  emit: "60-emit",
} as const;

export type GenerationStageKey = typeof GENERATION_STAGES[keyof typeof GENERATION_STAGES];

export const GENERATION_STAGE_ORDER: readonly GenerationStageKey[] = [
  GENERATION_STAGES.extract,
  GENERATION_STAGES.graph,
  GENERATION_STAGES.cycles,
  GENERATION_STAGES.lifetimes,
  GENERATION_STAGES.registration,
  GENERATION_STAGES.emit,
];

export interface GenerationStageOutputs {
  "10-extract": ExtractionResult;
  "20-graph": DependencyGraph;
  "30-cycles": CycleReport;
  "40-lifetimes": LifetimeReport;
  "50-registration": RegistrationPlan;
  "60-emit": {
    constructors: ConstructorReport;
    registration: RegistrationArtifact;
  };
}
