/**
 * wirekit CLI - Config File Loading
 *
 * This file contains:
 * 1. The config file shape and its runtime validation
 * 2. Discovery (walking up from the project directory)
 * 3. `extends` chains and `.ts` config bundling
 * 4. Merging (command line over file, file over base)
 */

import { createHash } from "node:crypto";
import { mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { createRequire } from "node:module";
import { basename, dirname, extname, isAbsolute, join, parse as parsePath, resolve as resolvePath } from "node:path";
import { pathToFileURL } from "node:url";
import {
  generatorDiagnostics,
  type DiagnosticCategory,
  type DiagnosticImpact,
  type DiagnosticOverride,
  type DiagnosticSeverity,
  type DiagnosticsPolicyConfig,
  type GeneratorOptions,
} from "@wirekit/generator";

export interface WirekitConfig extends GeneratorOptions {
  /** Config this one builds on: a relative path, a directory or a package. */
  extends?: string;
  /** tsconfig.json of the analyzed project. Relative paths resolve against the config file. */
  project?: string;
  /**
   * Directory the transformed source tree is written to, relative to `rootDir`.
   * @default ".wirekit"
   */
  outDir?: string;
}

export interface LoadedConfig {
  readonly config: WirekitConfig;
  /** The file discovery found (the last link of an `extends` chain is loaded first). */
  readonly file: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly file: string | null = null,
  ) {
    super(file ? `${file}: ${message}` : message);
    this.name = "ConfigError";
  }
}

/**
 * Config file names to search for, in priority order.
 */
export const CONFIG_FILE_NAMES = [
  "wirekit.config.ts",
  "wirekit.config.mjs",
  "wirekit.config.js",
  "wirekit.config.json",
] as const;

const CONFIG_EXTENSIONS = [".ts", ".mjs", ".js", ".json"] as const;

// ============================================================================
// Loading
// ============================================================================

/** Bundled `.ts` configs, beside the config file. */
const CONFIG_CACHE_DIR = join(".wirekit-cache", "config");

/**
 * Find and load the nearest config file, walking up from `searchFrom` (a directory,
 * or a file whose directory is used) until `stopAt`, the filesystem root by default.
 */
export async function loadConfigFile(searchFrom: string, stopAt?: string): Promise<LoadedConfig | null> {
  const from = resolvePath(searchFrom);
  const start = isFile(from) ? dirname(from) : from;
  const limit = stopAt === undefined ? parsePath(start).root : resolvePath(stopAt);
  for (const dir of ancestors(start, limit)) {
    const file = configFileIn(dir);
    if (file !== null) return { config: await loadChain(file, []), file };
  }
  return null;
}

/**
 * Load a config file named explicitly (`--config`).
 */
export async function loadConfigFromPath(configPath: string): Promise<LoadedConfig> {
  const file = resolvePath(configPath);
  if (!isFile(file)) {
    throw new ConfigError("config file not found", file);
  }
  return { config: await loadChain(file, []), file };
}

function* ancestors(dir: string, stopAt: string): Generator<string> {
  let current = dir;
  while (true) {
    yield current;
    const parent = dirname(current);
    if (current === stopAt || parent === current) return;
    current = parent;
  }
}

function configFileIn(dir: string): string | null {
  return CONFIG_FILE_NAMES.map((name) => join(dir, name)).find(isFile) ?? null;
}

/** `file` merged over everything it extends; `chain` lists the files that led here. */
async function loadChain(file: string, chain: readonly string[]): Promise<WirekitConfig> {
  if (chain.includes(file)) {
    throw new ConfigError(`Circular config extends detected: ${[...chain, file].join(" -> ")}`);
  }
  const dir = dirname(file);
  const config = resolveRelativePaths(await loadConfigModule(file), dir);
  if (config.extends === undefined) return config;
  const base = await loadChain(resolveExtends(config.extends, dir), [...chain, file]);
  return mergeConfigs(base, config);
}

/**
 * The config file an `extends` names. A relative or absolute path may omit the
 * extension or name a directory; anything else is an installed package whose
 * root holds a `wirekit.config.*`.
 */
function resolveExtends(specifier: string, fromDir: string): string {
  const target = specifier.startsWith(".") || isAbsolute(specifier)
    ? resolvePath(fromDir, specifier)
    : packageRoot(specifier, fromDir);
  const file =
    target === null
      ? null
      : isDirectory(target)
        ? configFileIn(target)
        : ([target, ...CONFIG_EXTENSIONS.map((ext) => target + ext)].find(isFile) ?? null);
  if (file === null) {
    throw new ConfigError(`extended config '${specifier}' not found`, fromDir);
  }
  return file;
}

function packageRoot(name: string, fromDir: string): string | null {
  try {
    return dirname(createRequire(join(fromDir, "package.json")).resolve(`${name}/package.json`));
  } catch (error) {
    if (isResolutionFailure(error)) return null;
    throw error;
  }
}

function isResolutionFailure(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "MODULE_NOT_FOUND" || error.code === "ERR_PACKAGE_PATH_NOT_EXPORTED";
}

async function loadConfigModule(configPath: string): Promise<WirekitConfig> {
  const ext = extname(configPath).toLowerCase();
  if (ext === ".json") {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (error) {
      throw new ConfigError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`, configPath);
    }
    return parseConfig(raw, configPath);
  }

  const modulePath = ext === ".ts" ? await compileTsConfig(configPath) : configPath;
  const mod: unknown = await import(pathToFileURL(modulePath).href);
  const raw = isRecord(mod) ? (mod["default"] ?? mod["config"] ?? mod) : mod;
  return parseConfig(raw, configPath);
}

/** ESM bundle of a `.ts` config, reused while its content is unchanged. Packages stay external. */
async function compileTsConfig(file: string): Promise<string> {
  const source = readFileSync(file, "utf-8");
  const hash = createHash("sha256").update(file).update(source).digest("hex").slice(0, 8);
  const outfile = join(dirname(file), CONFIG_CACHE_DIR, `${basename(file, ".ts")}.${hash}.mjs`);
  if (isFile(outfile)) return outfile;

  const { build } = await import("esbuild");
  let text: string;
  try {
    const result = await build({
      entryPoints: [file],
      bundle: true,
      packages: "external",
      platform: "node",
      format: "esm",
      target: "node20",
      write: false,
      logLevel: "silent",
    });
    const [output] = result.outputFiles ?? [];
    text = output?.text ?? "";
  } catch (error) {
    throw new ConfigError(`cannot compile: ${error instanceof Error ? error.message : String(error)}`, file);
  }
  mkdirSync(dirname(outfile), { recursive: true });
  writeFileSync(outfile, text, "utf-8");
  return outfile;
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function resolveRelativePaths(config: WirekitConfig, dir: string): WirekitConfig {
  return {
    ...config,
    ...(config.project !== undefined ? { project: resolvePath(dir, config.project) } : {}),
    ...(config.rootDir !== undefined ? { rootDir: resolvePath(dir, config.rootDir) } : {}),
  };
}

// ============================================================================
// Validation
// ============================================================================

const STRING_OPTIONS = [
  "extends",
  "project",
  "outDir",
  "defaultLifetime",
  "environmentVariable",
  "registrationFunctionName",
  "runtimeModule",
  "outFile",
  "rootDir",
] as const;

type StringOption = (typeof STRING_OPTIONS)[number];

const SEVERITIES = ["error", "warning", "info", "off"] as const;
const IMPACTS = ["blocking", "degraded", "informational"] as const;

const CATEGORIES: ReadonlySet<string> = new Set(Object.values(generatorDiagnostics).map((spec) => spec.category));
const CODES: ReadonlySet<string> = new Set(Object.keys(generatorDiagnostics));

/**
 * Check a loaded config value. Unknown options are errors so typos surface.
 */
export function parseConfig(raw: unknown, file: string | null = null): WirekitConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("config must export an object", file);
  }

  const config: WirekitConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (isStringOption(key)) {
      if (typeof value !== "string") throw new ConfigError(`'${key}' must be a string`, file);
      config[key] = value;
    } else if (key === "lifetimeValidation") {
      if (typeof value !== "boolean") throw new ConfigError(`'${key}' must be true or false`, file);
      config.lifetimeValidation = value;
    } else if (key === "diagnostics") {
      config.diagnostics = parsePolicy(value, file);
    } else {
      throw new ConfigError(`unknown option '${key}'`, file);
    }
  }
  return config;
}

function parsePolicy(raw: unknown, file: string | null): DiagnosticsPolicyConfig {
  if (!isRecord(raw)) throw new ConfigError("'diagnostics' must be an object", file);

  let disabled: boolean | undefined;
  let defaults: DiagnosticOverride | undefined;
  const categories: Partial<Record<DiagnosticCategory, DiagnosticOverride>> = {};
  const codes: Record<string, DiagnosticOverride> = {};

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "disabled":
        if (typeof value !== "boolean") throw new ConfigError("'diagnostics.disabled' must be true or false", file);
        disabled = value;
        break;
      case "defaults":
        defaults = parseOverride(value, "diagnostics.defaults", file);
        break;
      case "categories":
        for (const [category, override] of entriesOf(value, "diagnostics.categories", file)) {
          if (!isCategory(category)) throw new ConfigError(`unknown diagnostic category '${category}'`, file);
          categories[category] = parseOverride(override, `diagnostics.categories.${category}`, file);
        }
        break;
      case "codes":
        for (const [code, override] of entriesOf(value, "diagnostics.codes", file)) {
          if (!CODES.has(code)) throw new ConfigError(`unknown diagnostic code '${code}'`, file);
          codes[code] = parseOverride(override, `diagnostics.codes.${code}`, file);
        }
        break;
      default:
        throw new ConfigError(`unknown option 'diagnostics.${key}'`, file);
    }
  }

  return {
    ...(disabled !== undefined ? { disabled } : {}),
    ...(defaults ? { defaults } : {}),
    ...(Object.keys(categories).length > 0 ? { categories } : {}),
    ...(Object.keys(codes).length > 0 ? { codes } : {}),
  };
}

function parseOverride(raw: unknown, path: string, file: string | null): DiagnosticOverride {
  if (!isRecord(raw)) throw new ConfigError(`'${path}' must be an object`, file);
  const { severity, impact, ...rest } = raw;
  const [extra] = Object.keys(rest);
  if (extra !== undefined) throw new ConfigError(`unknown option '${path}.${extra}'`, file);

  let override: DiagnosticOverride = {};
  if (severity !== undefined) {
    if (!isSeverity(severity)) {
      throw new ConfigError(`'${path}.severity' must be one of ${SEVERITIES.join(", ")}`, file);
    }
    override = { ...override, severity };
  }
  if (impact !== undefined) {
    if (!isImpact(impact)) {
      throw new ConfigError(`'${path}.impact' must be one of ${IMPACTS.join(", ")}`, file);
    }
    override = { ...override, impact };
  }
  return override;
}

function entriesOf(raw: unknown, path: string, file: string | null): [string, unknown][] {
  if (!isRecord(raw)) throw new ConfigError(`'${path}' must be an object`, file);
  return Object.entries(raw);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringOption(key: string): key is StringOption {
  return STRING_OPTIONS.some((option) => option === key);
}

function isSeverity(value: unknown): value is DiagnosticSeverity | "off" {
  return SEVERITIES.some((severity) => severity === value);
}

function isImpact(value: unknown): value is DiagnosticImpact {
  return IMPACTS.some((impact) => impact === value);
}

function isCategory(value: string): value is DiagnosticCategory {
  return CATEGORIES.has(value);
}

// ============================================================================
// Merging
// ============================================================================

/**
 * Merge configs with proper precedence: `override` wins field by field, and the
 * diagnostics policy is merged per section.
 */
export function mergeConfigs(base: WirekitConfig | null, override: WirekitConfig): WirekitConfig {
  if (!base) {
    return override;
  }

  const merged: WirekitConfig = { ...base, ...override };
  const diagnostics = mergePolicies(base.diagnostics, override.diagnostics);
  if (diagnostics) merged.diagnostics = diagnostics;
  return merged;
}

function mergePolicies(
  base?: DiagnosticsPolicyConfig,
  override?: DiagnosticsPolicyConfig,
): DiagnosticsPolicyConfig | undefined {
  if (!base) return override;
  if (!override) return base;

  return {
    ...base,
    ...override,
    defaults: { ...base.defaults, ...override.defaults },
    categories: { ...base.categories, ...override.categories },
    codes: { ...base.codes, ...override.codes },
  };
}
