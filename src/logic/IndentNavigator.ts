/**
 * Indentation-aware cursor motions and block selection.
 *
 * Skipping moves to the nearest non-blank line whose indentation is less than
 * or equal to the cursor line's. Blank lines are never compared, never
 * stopped on.
 *
 * A block is the start line plus:
 * 1. every following line indented strictly deeper than the start line
 * 2. the blank lines directly after that run
 *
 * Every request either applies its whole change through the LineSource or
 * leaves it untouched and reports why.
 */

import {
  BlockMode,
  type BlockExtentResult,
  type Direction,
  type LineSource,
  type NavigationResult,
  type Noop,
  type NoopReason,
} from "../core/types";
import { isBlankLine } from "./text-utils";

function noop(reason: NoopReason): Noop {
  return { kind: "noop", reason };
}

/** Out-of-range lines are never blank. */
function isBlankAt(source: LineSource, line: number): boolean {
  const text = source.textOf(line);
  return text !== undefined && isBlankLine(text);
}

export class IndentNavigator {
  skipForward(source: LineSource, count = 1): NavigationResult {
    return this.skip(source, "forward", count);
  }

  skipBackward(source: LineSource, count = 1): NavigationResult {
    return this.skip(source, "backward", count);
  }

  /**
   * Repeats a single skip `count` times, each step starting where the last
   * one left the cursor. Stops at the first step that cannot move.
   */
  skip(source: LineSource, direction: Direction, count = 1): NavigationResult {
    let result = this.skipOnce(source, direction);
    for (let i = 1; i < count && result.kind === "moved"; i++) {
      const next = this.skipOnce(source, direction);
      if (next.kind !== "moved") {
        break;
      }
      result = next;
    }
    return result;
  }

  /**
   * Selects the indented block under the anchor line, linewise.
   *
   * OperatorPending anchors at the cursor line; VisualExtend anchors at the
   * start of the current selection and rebuilds the selection from there.
   * Returns `unchanged` without touching the selection when no line after
   * the anchor belongs to its block.
   */
  computeBlockExtent(source: LineSource, mode: BlockMode): BlockExtentResult {
    const startLine =
      mode === BlockMode.VisualExtend
        ? source.currentSelectionStart()
        : source.currentCursor();

    const baseIndent = source.indentWidthOf(startLine);
    if (baseIndent < 0) {
      return noop("invalid-position");
    }

    const lineCount = source.lineCount();
    let endLine = startLine;

    while (
      endLine < lineCount &&
      source.indentWidthOf(endLine + 1) > baseIndent
    ) {
      endLine++;
    }

    // Kept separate from the body walk: blanks are absorbed whatever their width.
    while (endLine < lineCount && isBlankAt(source, endLine + 1)) {
      endLine++;
    }

    if (endLine === startLine) {
      return { kind: "unchanged", startLine, endLine };
    }

    source.setSelection(startLine, endLine);
    return { kind: "selected", startLine, endLine };
  }

  private skipOnce(source: LineSource, direction: Direction): NavigationResult {
    const cursor = source.currentCursor();
    const lineCount = source.lineCount();
    const step = direction === "forward" ? 1 : -1;

    const atEdge = direction === "forward" ? cursor >= lineCount : cursor <= 1;
    if (atEdge) {
      return noop("boundary");
    }

    const baseIndent = source.indentWidthOf(cursor);
    if (baseIndent < 0) {
      return noop("invalid-position");
    }

    for (let line = cursor + step; line >= 1 && line <= lineCount; line += step) {
      const text = source.textOf(line);
      if (text === undefined) {
        return noop("invalid-position");
      }
      if (isBlankLine(text)) {
        continue;
      }

      const indent = source.indentWidthOf(line);
      if (indent < 0) {
        return noop("invalid-position");
      }
      if (indent <= baseIndent) {
        const column = source.firstNonWhitespaceColumn(line);
        source.setCursor(line, column);
        return { kind: "moved", line, column };
      }
    }

    return noop("no-candidate");
  }
}

let sharedNavigator: IndentNavigator | null = null;

/**
 * Returns the navigator shared by every command, creating it on first use.
 */
export function getIndentNavigator(): IndentNavigator {
  if (!sharedNavigator) {
    sharedNavigator = new IndentNavigator();
  }
  return sharedNavigator;
}
