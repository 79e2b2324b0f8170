import type { ConditionalRule, TypeDescriptor } from "../model/types.js";
import type { GeneratorEmitter } from "../diagnostics/emitter.js";
import type { PlannedRegistration } from "./types.js";

export type ConditionCheck =
  /** Register under this rule. */
  | { readonly kind: "conditional"; readonly rule: ConditionalRule }
  /** No usable rule; register unconditionally. */
  | { readonly kind: "unconditional" }
  /** An error-level problem; do not register. */
  | { readonly kind: "invalid" };

/**
 * Pick and validate the condition of a class.
 */
export function checkConditions(type: TypeDescriptor, emitter: GeneratorEmitter): ConditionCheck {
  const [rule, ...rest] = type.conditions;
  if (!rule) return { kind: "unconditional" };

  if (rest.length > 0) {
    emitter.emit("wirekit/conditional/multiple-conditions", {
      message: `'${type.name}' has ${type.conditions.length} ConditionalService markers; only the first is used.`,
      types: [type.id],
      location: rest[0]?.location ?? rule.location,
    });
  }

  if (isEmpty(rule)) {
    emitter.emit("wirekit/conditional/empty-conditions", {
      message: `ConditionalService on '${type.name}' has no conditions; the class is registered unconditionally.`,
      types: [type.id],
      location: rule.location,
    });
    return { kind: "unconditional" };
  }

  let valid = true;
  const fail = (
    code:
      | "wirekit/conditional/conflicting-conditions"
      | "wirekit/conditional/empty-config-key"
      | "wirekit/conditional/config-key-without-comparison"
      | "wirekit/conditional/comparison-without-config-key",
    message: string,
  ): void => {
    valid = false;
    emitter.emit(code, { message, types: [type.id], location: rule.location });
  };

  for (const value of rule.environment) {
    if (rule.notEnvironment.includes(value)) {
      fail(
        "wirekit/conditional/conflicting-conditions",
        `ConditionalService on '${type.name}' both requires and excludes environment '${value}'.`,
      );
    }
  }
  if (rule.equals !== null && rule.notEquals.includes(rule.equals)) {
    fail(
      "wirekit/conditional/conflicting-conditions",
      `ConditionalService on '${type.name}' both requires and excludes config value '${rule.equals}'.`,
    );
  }

  const hasComparison = rule.equals !== null || rule.notEquals.length > 0;
  if (rule.configKey !== null && rule.configKey.trim() === "") {
    fail("wirekit/conditional/empty-config-key", `ConditionalService on '${type.name}' has a blank configValue.`);
  } else if (rule.configKey !== null && !hasComparison) {
    fail(
      "wirekit/conditional/config-key-without-comparison",
      `ConditionalService on '${type.name}' reads '${rule.configKey}' but sets neither equals nor notEquals.`,
    );
  } else if (rule.configKey === null && hasComparison) {
    fail(
      "wirekit/conditional/comparison-without-config-key",
      `ConditionalService on '${type.name}' sets equals or notEquals without configValue.`,
    );
  }

  return valid ? { kind: "conditional", rule } : { kind: "invalid" };
}

function isEmpty(rule: ConditionalRule): boolean {
  return (
    rule.environment.length === 0 &&
    rule.notEnvironment.length === 0 &&
    rule.configKey === null &&
    rule.equals === null &&
    rule.notEquals.length === 0
  );
}

/**
 * At most one member of an exclusive group can match at a time.
 *
 * Requires more than one implementation, and either more than one distinct
 * environment value or a single config key compared against more than one value.
 */
export function isMutuallyExclusive(registrations: readonly PlannedRegistration[]): boolean {
  const implementations = new Set(registrations.map((r) => r.implementation));
  if (implementations.size < 2) return false;

  const environments = new Set<string>();
  const configKeys = new Set<string>();
  const equalsValues = new Set<string>();
  for (const { condition } of registrations) {
    if (!condition) continue;
    for (const value of condition.environment) environments.add(value);
    if (condition.configKey !== null && condition.equals !== null) {
      configKeys.add(condition.configKey.trim());
      equalsValues.add(condition.equals);
    }
  }
  return environments.size > 1 || (configKeys.size === 1 && equalsValues.size > 1);
}
