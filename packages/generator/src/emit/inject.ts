import type ts from "typescript";
import { normalizeFileName } from "../extraction/ast-helpers.js";
import { applyEdits, insert } from "./edit.js";
import type { ConstructorArtifact } from "./constructor.js";

/**
 * Source text of `sourceFile` with the generated members of its classes inserted
 * after each class body's opening brace. Artifacts for other files are ignored.
 */
export function injectConstructors(
  sourceFile: Pick<ts.SourceFile, "fileName" | "text">,
  artifacts: readonly ConstructorArtifact[],
): string {
  const file = normalizeFileName(sourceFile.fileName);
  const edits = artifacts
    .filter((artifact) => artifact.file === file)
    .map((artifact) => insert(artifact.position, artifact.text));
  return edits.length === 0 ? sourceFile.text : applyEdits(sourceFile.text, edits);
}
