/**
 * In-Memory TypeScript Program
 *
 * Create TypeScript programs from inline source strings, so a test can state the
 * classes it analyzes next to its assertions.
 */

import ts from "typescript";
import {
  buildDependencyGraph,
  extractDescriptors,
  normalizeOptions,
  type DependencyGraph,
  type ExtractionResult,
  type GeneratorOptions,
} from "@wirekit/generator";

/**
 * Create a TypeScript program from in-memory file contents.
 *
 * @param files - Map of file paths to source content
 * @param rootNames - Entry point files (defaults to all files)
 * @param options - Additional compiler options
 *
 * @example
 * const { program } = createProgramFromMemory({
 *   "/src/cache.ts": `
 *     @Singleton()
 *     export class Cache {}
 *   `,
 * });
 */
export function createProgramFromMemory(
  files: Record<string, string>,
  rootNames?: string[],
  options: ts.CompilerOptions = {},
): { program: ts.Program; host: ts.CompilerHost } {
  const opts: ts.CompilerOptions = {
    target: ts.ScriptTarget.ES2022,
    module: ts.ModuleKind.ESNext,
    moduleResolution: ts.ModuleResolutionKind.Bundler,
    strict: true,
    noEmit: true,
    experimentalDecorators: true,
    ...options,
  };

  const normalize = (f: string): string => f.replace(/\\/g, "/");
  const mem = new Map(Object.entries(files).map(([k, v]) => [normalize(k), v]));

  const dirs = new Set<string>(["/"]);
  for (const path of mem.keys()) {
    let dir = path;
    while ((dir = dir.substring(0, dir.lastIndexOf("/"))) && dir !== "") {
      dirs.add(dir);
    }
  }

  const roots = rootNames ?? Object.keys(files);
  const base = ts.createCompilerHost(opts, true);

  const host: ts.CompilerHost = {
    ...base,
    getCurrentDirectory: () => "/",
    getCanonicalFileName: (f) => normalize(f),
    fileExists: (f) => mem.has(normalize(f)) || base.fileExists(f),
    readFile: (f) => mem.get(normalize(f)) ?? base.readFile(f),
    directoryExists: (d) => dirs.has(normalize(d)) || (base.directoryExists?.(d) ?? false),
    getSourceFile: (f, lang, onErr, shouldCreate) => {
      const text = mem.get(normalize(f));
      if (text !== undefined) {
        return ts.createSourceFile(f, text, lang, true);
      }
      return base.getSourceFile(f, lang, onErr, shouldCreate);
    },
  };

  const program = ts.createProgram(roots, opts, host);
  return { program, host };
}

/** Extraction plus graph for inline sources. */
export function graphFromMemory(
  files: Record<string, string>,
  options: GeneratorOptions = {},
): { extraction: ExtractionResult; graph: DependencyGraph } {
  const { program } = createProgramFromMemory(files);
  const extraction = extractDescriptors(program);
  const graph = buildDependencyGraph(extraction, normalizeOptions(options));
  return { extraction, graph };
}

/** `"/src/app.ts#Cache"` */
export function idOf(file: string, name: string): string {
  return `${file}#${name}`;
}
