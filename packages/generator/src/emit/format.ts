/**
 * Formatting helpers for generated TypeScript.
 */

export const INDENT = "  ";

/**
 * Escape a string for a double-quoted literal.
 */
export function escapeString(str: string): string {
  return str
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t")
    .replace(/\0/g, "\\0");
}

export function quote(str: string): string {
  return `"${escapeString(str)}"`;
}
