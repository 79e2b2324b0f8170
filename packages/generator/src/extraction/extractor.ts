import ts from "typescript";
import type { DependencyDescriptor, TypeDescriptor, TypeId } from "../model/types.js";
import type { RawDiagnostic } from "../diagnostics/types.js";
import type { GeneratorDiagnosticCode } from "../diagnostics/catalog.js";
import { createGeneratorEmitter } from "../diagnostics/emitter.js";
import { debug } from "../shared/debug.js";
import { nullLogger, type Logger } from "../types.js";
import { collectExportedNames, locationOf, normalizeFileName, typeIdOf } from "./ast-helpers.js";
import { extractClass, extractInterface, type DeclarationContext, type ExtractedDeclaration } from "./class-extractor.js";

export interface ExtractionResult {
  /** Keyed by id, in file order then declaration order. */
  readonly types: ReadonlyMap<TypeId, TypeDescriptor>;
  readonly dependencies: ReadonlyMap<TypeId, readonly DependencyDescriptor[]>;
  readonly diagnostics: readonly RawDiagnostic<GeneratorDiagnosticCode>[];
}

/**
 * Read every top-level class and interface of the program's own sources.
 *
 * Declaration files are skipped; types they declare stay as unresolved references.
 */
export function extractDescriptors(program: ts.Program, logger: Logger = nullLogger): ExtractionResult {
  const checker = program.getTypeChecker();
  const emitter = createGeneratorEmitter("extract");
  const types = new Map<TypeId, TypeDescriptor>();
  const dependencies = new Map<TypeId, readonly DependencyDescriptor[]>();

  const sourceFiles = program
    .getSourceFiles()
    .filter((sf) => !sf.isDeclarationFile && !program.isSourceFileFromExternalLibrary(sf))
    .sort((a, b) => compareFileNames(a.fileName, b.fileName));

  for (const sourceFile of sourceFiles) {
    const ctx: DeclarationContext = {
      checker,
      sourceFile,
      exportedNames: collectExportedNames(sourceFile),
      emitter,
    };
    for (const statement of sourceFile.statements) {
      const extracted = extractStatement(statement, ctx);
      if (!extracted) continue;
      const { descriptor } = extracted;
      if (types.has(descriptor.id)) {
        // declaration merging; the first declaration carries the markers
        debug.extract("merged-declaration", { id: descriptor.id });
        continue;
      }
      types.set(descriptor.id, descriptor);
      dependencies.set(descriptor.id, extracted.dependencies);
      debug.extract("type", {
        id: descriptor.id,
        kind: descriptor.kind,
        lifetime: descriptor.lifetime,
        dependencies: extracted.dependencies.length,
      });
    }
  }

  logger.info(`[wirekit] Extracted ${types.size} types from ${sourceFiles.length} files`);
  return { types, dependencies, diagnostics: emitter.diagnostics };
}

function extractStatement(statement: ts.Statement, ctx: DeclarationContext): ExtractedDeclaration | null | undefined {
  if (ts.isClassDeclaration(statement) && statement.name) {
    const id = typeIdOf(ctx.sourceFile.fileName, statement.name.text);
    return ctx.emitter.isolate(id, locationOf(statement.name, ctx.sourceFile), () => extractClass(statement, ctx));
  }
  if (ts.isInterfaceDeclaration(statement)) {
    const id = typeIdOf(ctx.sourceFile.fileName, statement.name.text);
    return ctx.emitter.isolate(id, locationOf(statement.name, ctx.sourceFile), () => extractInterface(statement, ctx));
  }
  return null;
}

function compareFileNames(a: string, b: string): number {
  const left = normalizeFileName(a);
  const right = normalizeFileName(b);
  return left < right ? -1 : left > right ? 1 : 0;
}
