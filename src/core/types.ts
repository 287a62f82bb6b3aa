/**
 * Core types for indentation navigation.
 * These interfaces decouple the navigator from the editor host.
 */

/**
 * Line-indexed view of the document the navigator works on.
 *
 * Lines and columns are 1-based. Every read reflects the live document;
 * implementations must not cache indentation between calls.
 */
export interface LineSource {
  /** Number of lines in the document */
  lineCount(): number;
  /** Text of a line, or undefined when the position does not exist */
  textOf(line: number): string | undefined;
  /** Leading whitespace width of a line, -1 when the position does not exist */
  indentWidthOf(line: number): number;
  /** Line the cursor is on */
  currentCursor(): number;
  setCursor(line: number, column: number): void;
  /** First line of the active selection (its anchor for linewise blocks) */
  currentSelectionStart(): number;
  /** Selects whole lines from `startLine` to `endLine`, inclusive */
  setSelection(startLine: number, endLine: number): void;
  /** Column of the first non-whitespace character, 1 for blank lines */
  firstNonWhitespaceColumn(line: number): number;
}

/** Where a block selection is anchored */
export enum BlockMode {
  /** Anchor at the cursor line; used when an operator awaits its range */
  OperatorPending = "operatorPending",
  /** Anchor at the start of the existing selection */
  VisualExtend = "visualExtend",
}

/**
 * Why a request left the editor untouched.
 * - boundary: cursor already on the first/last line
 * - invalid-position: an indentation lookup hit a line that does not exist
 * - no-candidate: the scan reached the document edge without a match
 */
export type NoopReason = "boundary" | "invalid-position" | "no-candidate";

export interface Noop {
  kind: "noop";
  reason: NoopReason;
}

export type NavigationResult =
  | { kind: "moved"; line: number; column: number }
  | Noop;

export type BlockExtentResult =
  | { kind: "selected"; startLine: number; endLine: number }
  /** Nothing follows the start line that belongs to its block */
  | { kind: "unchanged"; startLine: number; endLine: number }
  | Noop;

/** Scan direction for line skipping */
export type Direction = "forward" | "backward";
