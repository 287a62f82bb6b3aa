/**
 * Pure text utility functions for indentation.
 */

/**
 * Gets the indentation level (leading whitespace count) of a line.
 */
export function getIndentLevel(lineText: string): number {
  const match = lineText.match(/^(\s*)/);
  return match ? match[1].length : 0;
}

/**
 * A line is blank when it is empty or holds only whitespace.
 */
export function isBlankLine(lineText: string): boolean {
  return /^\s*$/.test(lineText);
}

/**
 * 1-based column of the first non-whitespace character.
 * Blank lines fall back to column 1.
 */
export function firstNonWhitespaceColumn(lineText: string): number {
  const index = lineText.search(/\S/);
  return index === -1 ? 1 : index + 1;
}
