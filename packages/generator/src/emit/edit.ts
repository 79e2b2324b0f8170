/**
 * Text edits over a source file.
 */

export interface SourceEdit {
  readonly position: number;
  readonly text: string;
}

/**
 * Apply insertions bottom to top so earlier positions stay valid.
 * Insertions at the same position keep their given order.
 */
export function applyEdits(source: string, edits: readonly SourceEdit[]): string {
  const sorted = edits
    .map((edit, index) => ({ edit, index }))
    .sort((a, b) => b.edit.position - a.edit.position || b.index - a.index);

  let result = source;
  for (const { edit } of sorted) {
    result = result.slice(0, edit.position) + edit.text + result.slice(edit.position);
  }
  return result;
}

export function insert(position: number, text: string): SourceEdit {
  return { position, text };
}
