/**
 * Helpers shared by the command handlers that don't touch the editor API.
 */

import type { BlockExtentResult, NavigationResult } from "../core/types";

export type CommandResult = NavigationResult | BlockExtentResult;

/**
 * Reads the repeat count from keybinding args: `{ "count": 3 }`.
 * Anything other than a positive integer counts as 1.
 */
export function readCount(args: unknown): number {
  if (typeof args === "object" && args !== null && "count" in args) {
    const count = args.count;
    if (typeof count === "number" && Number.isInteger(count) && count > 0) {
      return count;
    }
  }
  return 1;
}

/**
 * One-line summary of a command outcome for the output channel.
 */
export function describeResult(result: CommandResult): string {
  switch (result.kind) {
    case "moved":
      return `moved to ${result.line}:${result.column}`;
    case "selected":
      return `selected lines ${result.startLine}-${result.endLine}`;
    case "unchanged":
      return `no block under line ${result.startLine}`;
    case "noop":
      return `no-op (${result.reason})`;
  }
}
