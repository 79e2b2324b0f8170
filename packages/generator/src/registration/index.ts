export { planRegistrations } from "./planner.js";
export { checkConditions, isMutuallyExclusive, type ConditionCheck } from "./conditions.js";
export type {
  ConditionalGroup,
  PlanEntry,
  PlannedRegistration,
  PlannedService,
  RegistrationPlan,
} from "./types.js";
