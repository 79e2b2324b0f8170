import type { Lifetime } from "../model/types.js";
import type { DiagnosticsPolicyConfig } from "../diagnostics/types.js";

/**
 * Generator options as a user writes them (config file, CLI flags, API).
 */
export interface GeneratorOptions {
  /**
   * Lifetime for classes that ask to be registered without a lifetime marker.
   * Case-insensitive; anything unrecognized falls back to Scoped.
   * @default "Scoped"
   */
  defaultLifetime?: string;

  /**
   * Run the lifetime validator.
   * @default true
   */
  lifetimeValidation?: boolean;

  /**
   * Environment variable the registration module reads for environment conditions.
   * @default "NODE_ENV"
   */
  environmentVariable?: string;

  /** @default "registerServices" */
  registrationFunctionName?: string;

  /**
   * Module the registration module imports container types from.
   * @default "@wirekit/annotations"
   */
  runtimeModule?: string;

  /**
   * Registration module path, relative to `rootDir`.
   * @default "src/registrations.generated.ts"
   */
  outFile?: string;

  /**
   * Directory relative paths are resolved from.
   * @default "/" for in-memory programs, the project directory in the CLI
   */
  rootDir?: string;

  diagnostics?: DiagnosticsPolicyConfig;
}

export interface ResolvedGeneratorOptions {
  readonly defaultLifetime: Lifetime;
  readonly lifetimeValidation: boolean;
  readonly environmentVariable: string;
  readonly registrationFunctionName: string;
  readonly runtimeModule: string;
  readonly outFile: string;
  readonly rootDir: string;
  readonly diagnostics: DiagnosticsPolicyConfig;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_LIFETIME: Lifetime = "Scoped";
export const DEFAULT_ENVIRONMENT_VARIABLE = "NODE_ENV";
export const DEFAULT_REGISTRATION_FUNCTION = "registerServices";
export const DEFAULT_RUNTIME_MODULE = "@wirekit/annotations";
export const DEFAULT_OUT_FILE = "src/registrations.generated.ts";
export const DEFAULT_ROOT_DIR = "/";

/**
 * Parse a lifetime name case-insensitively.
 * "singleton" → "Singleton", " TRANSIENT " → "Transient", "forever" → null
 */
export function parseLifetime(value: string | undefined): Lifetime | null {
  switch (value?.trim().toLowerCase()) {
    case "singleton":
      return "Singleton";
    case "scoped":
      return "Scoped";
    case "transient":
      return "Transient";
    default:
      return null;
  }
}

export function normalizeOptions(options: GeneratorOptions = {}): ResolvedGeneratorOptions {
  return {
    defaultLifetime: parseLifetime(options.defaultLifetime) ?? DEFAULT_LIFETIME,
    lifetimeValidation: options.lifetimeValidation ?? true,
    environmentVariable: nonBlank(options.environmentVariable) ?? DEFAULT_ENVIRONMENT_VARIABLE,
    registrationFunctionName: nonBlank(options.registrationFunctionName) ?? DEFAULT_REGISTRATION_FUNCTION,
    runtimeModule: nonBlank(options.runtimeModule) ?? DEFAULT_RUNTIME_MODULE,
    outFile: nonBlank(options.outFile) ?? DEFAULT_OUT_FILE,
    rootDir: normalizeDir(nonBlank(options.rootDir) ?? DEFAULT_ROOT_DIR),
    diagnostics: options.diagnostics ?? {},
  };
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function normalizeDir(dir: string): string {
  const slashed = dir.replace(/\\/g, "/");
  return slashed.length > 1 && slashed.endsWith("/") ? slashed.slice(0, -1) : slashed;
}
