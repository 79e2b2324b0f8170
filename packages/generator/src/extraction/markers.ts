import type { InstanceSharing, Lifetime, NamingConvention, RegistrationMode } from "../model/types.js";
import type { LiteralValue } from "./ast-helpers.js";

/** Decorator names recognized on classes and fields. */
export const MARKERS = {
  singleton: "Singleton",
  scoped: "Scoped",
  transient: "Transient",
  dependsOn: "DependsOn",
  inject: "Inject",
  injectConfiguration: "InjectConfiguration",
  externalService: "ExternalService",
  registerAsAll: "RegisterAsAll",
  registerAs: "RegisterAs",
  skipRegistration: "SkipRegistration",
  conditionalService: "ConditionalService",
} as const;

export const LIFETIME_MARKERS: Readonly<Record<string, Lifetime>> = {
  [MARKERS.singleton]: "Singleton",
  [MARKERS.scoped]: "Scoped",
  [MARKERS.transient]: "Transient",
};

const CONVENTIONS: Readonly<Record<string, NamingConvention>> = {
  camelCase: "camelCase",
  CamelCase: "camelCase",
  PascalCase: "PascalCase",
  snake_case: "snake_case",
  SnakeCase: "snake_case",
};

const MODES: Readonly<Record<string, RegistrationMode>> = {
  DirectOnly: "DirectOnly",
  All: "All",
  Exclusionary: "Exclusionary",
};

const SHARINGS: Readonly<Record<string, InstanceSharing>> = {
  Separate: "Separate",
  Shared: "Shared",
};

// Strings use the runtime value, members the constant's key (`NamingConvention.SnakeCase`).

export function namingConventionOf(value: LiteralValue | null): NamingConvention | null {
  return lookup(CONVENTIONS, value);
}

export function registrationModeOf(value: LiteralValue | null): RegistrationMode | null {
  return lookup(MODES, value);
}

export function instanceSharingOf(value: LiteralValue | null): InstanceSharing | null {
  return lookup(SHARINGS, value);
}

function lookup<T>(table: Readonly<Record<string, T>>, value: LiteralValue | null): T | null {
  if (!value) return null;
  switch (value.kind) {
    case "string":
      return table[value.value] ?? null;
    case "member":
      return table[value.member] ?? null;
    case "boolean":
      return null;
  }
}

/** `"Dev, Staging,"` → `["Dev", "Staging"]` */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
