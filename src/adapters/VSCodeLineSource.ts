/**
 * Adapter that wraps a VS Code TextEditor to implement LineSource.
 * Used in the extension runtime to connect the active editor to IndentNavigator.
 *
 * LineSource positions are 1-based; VS Code positions are 0-based.
 */

import * as vscode from "vscode";
import type { LineSource } from "../core/types";
import { firstNonWhitespaceColumn, getIndentLevel } from "../logic/text-utils";

export class VSCodeLineSource implements LineSource {
  constructor(private readonly editor: vscode.TextEditor) {}

  private get document(): vscode.TextDocument {
    return this.editor.document;
  }

  private isValidLine(line: number): boolean {
    return Number.isInteger(line) && line >= 1 && line <= this.document.lineCount;
  }

  lineCount(): number {
    return this.document.lineCount;
  }

  textOf(line: number): string | undefined {
    if (!this.isValidLine(line)) {
      return undefined;
    }
    return this.document.lineAt(line - 1).text;
  }

  indentWidthOf(line: number): number {
    const text = this.textOf(line);
    return text === undefined ? -1 : getIndentLevel(text);
  }

  currentCursor(): number {
    return this.editor.selection.active.line + 1;
  }

  setCursor(line: number, column: number): void {
    const position = new vscode.Position(line - 1, column - 1);
    this.editor.selection = new vscode.Selection(position, position);
    this.editor.revealRange(new vscode.Range(position, position));
  }

  currentSelectionStart(): number {
    return this.editor.selection.start.line + 1;
  }

  /**
   * Selects whole lines, anchored at the start of `startLine` with the
   * active end after the last character of `endLine`.
   */
  setSelection(startLine: number, endLine: number): void {
    const anchor = new vscode.Position(startLine - 1, 0);
    const active = this.document.lineAt(endLine - 1).range.end;
    this.editor.selection = new vscode.Selection(anchor, active);
    this.editor.revealRange(new vscode.Range(active, active));
  }

  firstNonWhitespaceColumn(line: number): number {
    const text = this.textOf(line);
    return text === undefined ? 1 : firstNonWhitespaceColumn(text);
  }
}
