import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import type ts from "typescript";
import { countBySeverity, generate, type GenerationResult, type ResolvedDiagnostic } from "@wirekit/generator";
import { parseArgs, usage, UsageError, type CliOptions } from "./args.js";
import { ConfigError, loadConfigFile, loadConfigFromPath, mergeConfigs, type WirekitConfig } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import { createProgramFromTsconfig } from "./program.js";

export const DEFAULT_OUT_DIR = ".wirekit";

export interface RunEnvironment {
  readonly cwd: string;
  readonly stdout?: (text: string) => void;
  readonly stderr?: (text: string) => void;
}

/** A file the run writes (or, under `--check`, compares). */
export interface OutputFile {
  readonly path: string;
  readonly text: string;
}

/**
 * Entry point behind the `wirekit` binary.
 *
 * @returns 0 on success, 1 for error diagnostics or stale output under `--check`,
 * 2 for usage and config errors
 */
export async function main(argv: readonly string[], env: RunEnvironment): Promise<number> {
  const stdout = env.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = env.stderr ?? ((text: string) => process.stderr.write(text));

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      stderr(`wirekit: ${error.message}\n\n${usage()}`);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    stdout(usage());
    return 0;
  }

  try {
    return await run(options, { ...env, stdout, stderr });
  } catch (error) {
    if (error instanceof ConfigError) {
      stderr(`wirekit: ${error.message}\n`);
      return 2;
    }
    throw error;
  }
}

export async function run(options: CliOptions, env: RunEnvironment): Promise<number> {
  const stdout = env.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = env.stderr ?? ((text: string) => process.stderr.write(text));
  const logger = createConsoleLogger({
    verbose: options.verbose,
    out: (line) => stdout(`${line}\n`),
    err: (line) => stderr(`${line}\n`),
  });

  const cwd = resolve(env.cwd);
  const loaded =
    options.config !== null
      ? await loadConfigFromPath(resolve(cwd, options.config))
      : await loadConfigFile(options.project !== null ? resolve(cwd, options.project) : cwd);
  if (loaded) {
    logger.info(`[wirekit] Loaded config from ${loaded.file}`);
  }

  const config = mergeConfigs(loaded?.config ?? null, flagsConfig(options, cwd));
  const tsconfig = config.project ?? join(cwd, "tsconfig.json");
  const rootDir = config.rootDir ?? dirname(tsconfig);
  const outDir = resolve(rootDir, config.outDir ?? DEFAULT_OUT_DIR);

  const program = createProgramFromTsconfig(tsconfig, logger);
  const result = generate(program, { ...config, rootDir: toPosix(rootDir) }, logger);

  for (const diagnostic of result.diagnostics) {
    stdout(`${formatDiagnostic(diagnostic, program, cwd)}\n`);
  }
  const counts = countBySeverity(result.diagnostics);
  stdout(`Found ${plural(counts.error, "error")}, ${plural(counts.warning, "warning")}.\n`);

  const outputs = planOutputs(program, result, rootDir, outDir);
  if (options.check) {
    const stale = outputs.filter((file) => !existsSync(file.path) || readFileSync(file.path, "utf-8") !== file.text);
    if (stale.length > 0) {
      stdout(`${plural(stale.length, "file")} out of date:\n`);
      for (const file of stale) stdout(`  ${relative(cwd, file.path)}\n`);
      return 1;
    }
    logger.info(`[wirekit] ${plural(outputs.length, "file")} up to date`);
  } else {
    for (const file of outputs) {
      mkdirSync(dirname(file.path), { recursive: true });
      writeFileSync(file.path, file.text, "utf-8");
    }
    logger.info(`[wirekit] Wrote ${plural(outputs.length, "file")} to ${relative(cwd, outDir) || "."}`);
  }

  return result.hasErrors ? 1 : 0;
}

function flagsConfig(options: CliOptions, cwd: string): WirekitConfig {
  return {
    ...(options.project !== null ? { project: resolve(cwd, options.project) } : {}),
    ...(options.outDir !== null ? { outDir: options.outDir } : {}),
  };
}

/**
 * The transformed source tree: every project source under `rootDir`, mirrored into
 * `outDir`, with generated files in place of their originals.
 */
export function planOutputs(
  program: ts.Program,
  result: GenerationResult,
  rootDir: string,
  outDir: string,
): OutputFile[] {
  const generated = new Map(result.files.map((file) => [toPosix(resolve(file.fileName)), file.text]));
  const outputs: OutputFile[] = [];

  for (const sourceFile of program.getSourceFiles()) {
    if (sourceFile.isDeclarationFile || program.isSourceFileFromExternalLibrary(sourceFile)) continue;
    const fileName = resolve(sourceFile.fileName);
    if (!isInside(rootDir, fileName) || isInside(outDir, fileName)) continue;
    const key = toPosix(fileName);
    outputs.push({ path: join(outDir, relative(rootDir, fileName)), text: generated.get(key) ?? sourceFile.text });
    generated.delete(key);
  }
  // the registration module has no original
  for (const [fileName, text] of generated) {
    outputs.push({ path: join(outDir, relative(rootDir, fileName)), text });
  }

  return outputs.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * `src/cache.ts:4:12 - error wirekit/lifetime/singleton-captures-scoped: ...`
 */
export function formatDiagnostic(diagnostic: ResolvedDiagnostic, program: ts.Program, cwd: string): string {
  let where = "";
  if (diagnostic.location) {
    const sourceFile = program.getSourceFile(diagnostic.location.file);
    const file = toPosix(relative(cwd, diagnostic.location.file));
    if (sourceFile) {
      const { line, character } = sourceFile.getLineAndCharacterOfPosition(diagnostic.location.start);
      where = `${file}:${line + 1}:${character + 1} - `;
    } else {
      where = `${file} - `;
    }
  }
  return `${where}${diagnostic.severity} ${diagnostic.code}: ${diagnostic.message}`;
}

function isInside(dir: string, fileName: string): boolean {
  const rel = relative(dir, fileName);
  return rel !== "" && !rel.startsWith("..") && !isAbsolute(rel);
}

function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
