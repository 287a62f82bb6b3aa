/**
 * Indent Navigator - move and select by indentation.
 *
 * Skips to the next/previous line at the same or lower indentation and
 * selects indented blocks linewise. Works on any language; only leading
 * whitespace is considered.
 */

import * as vscode from "vscode";
import { VSCodeLineSource } from "./adapters/VSCodeLineSource";
import { BlockMode, type LineSource } from "./core/types";
import {
  type CommandResult,
  describeResult,
  readCount,
} from "./logic/command-utils";
import { getIndentNavigator } from "./logic/IndentNavigator";

const CONFIG_SECTION = "indentNavigator";

let outputChannel: vscode.OutputChannel;
let statusBarItem: vscode.StatusBarItem;
let enabled = true;

/**
 * Updates the status bar item to reflect current state.
 */
function updateStatusBar(): void {
  if (enabled) {
    statusBarItem.text = "$(check) Indent";
    statusBarItem.tooltip = "Indent Navigator: Enabled (click to disable)";
  } else {
    statusBarItem.text = "$(x) Indent";
    statusBarItem.tooltip = "Indent Navigator: Disabled (click to enable)";
  }
}

/**
 * Logs a message to the output channel.
 */
function log(message: string): void {
  const timestamp = new Date().toLocaleTimeString();
  outputChannel.appendLine(`[${timestamp}] ${message}`);
}

/**
 * Runs a navigator action against the active editor.
 * Does nothing when disabled or when the document's language is switched off.
 */
function runOnActiveEditor(
  name: string,
  action: (source: LineSource, editor: vscode.TextEditor) => CommandResult
): void {
  if (!enabled) {
    return;
  }

  const editor = vscode.window.activeTextEditor;
  if (!editor) {
    return;
  }

  const config = vscode.workspace.getConfiguration(CONFIG_SECTION);
  const enabledLanguages = config.get<Record<string, boolean>>(
    "enabledLanguages",
    {}
  );
  const langId = editor.document.languageId;
  if (enabledLanguages[langId] === false) {
    return;
  }

  try {
    const result = action(new VSCodeLineSource(editor), editor);
    if (config.get<boolean>("verboseLogging", false)) {
      log(`${name}: ${describeResult(result)}`);
    }
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    log(`${name} failed: ${errorMsg}`);
    void vscode.window.showErrorMessage(`Indent Navigator: ${errorMsg}`);
  }
}

/**
 * Activates the extension.
 */
export function activate(context: vscode.ExtensionContext): void {
  // Create output channel for logging
  outputChannel = vscode.window.createOutputChannel("Indent Navigator");
  context.subscriptions.push(outputChannel);

  // Create status bar item
  statusBarItem = vscode.window.createStatusBarItem(
    vscode.StatusBarAlignment.Right,
    100
  );
  statusBarItem.command = `${CONFIG_SECTION}.toggle`;
  updateStatusBar();
  statusBarItem.show();
  context.subscriptions.push(statusBarItem);

  log("Activating...");

  const navigator = getIndentNavigator();

  context.subscriptions.push(
    vscode.commands.registerCommand(`${CONFIG_SECTION}.toggle`, () => {
      enabled = !enabled;
      updateStatusBar();
      log(`Toggled: ${enabled ? "enabled" : "disabled"}`);
      void vscode.window.showInformationMessage(
        `Indent Navigator: ${enabled ? "Enabled" : "Disabled"}`
      );
    })
  );

  context.subscriptions.push(
    vscode.commands.registerCommand(
      `${CONFIG_SECTION}.nextIndentBlock`,
      (args?: unknown) =>
        runOnActiveEditor("nextIndentBlock", (source) =>
          navigator.skipForward(source, readCount(args))
        )
    )
  );

  context.subscriptions.push(
    vscode.commands.registerCommand(
      `${CONFIG_SECTION}.prevIndentBlock`,
      (args?: unknown) =>
        runOnActiveEditor("prevIndentBlock", (source) =>
          navigator.skipBackward(source, readCount(args))
        )
    )
  );

  context.subscriptions.push(
    vscode.commands.registerCommand(`${CONFIG_SECTION}.selectIndentBlock`, () =>
      runOnActiveEditor("selectIndentBlock", (source) =>
        navigator.computeBlockExtent(source, BlockMode.OperatorPending)
      )
    )
  );

  // Without a selection there is no anchor to extend; start from the cursor.
  context.subscriptions.push(
    vscode.commands.registerCommand(`${CONFIG_SECTION}.extendIndentBlock`, () =>
      runOnActiveEditor("extendIndentBlock", (source, editor) =>
        navigator.computeBlockExtent(
          source,
          editor.selection.isEmpty
            ? BlockMode.OperatorPending
            : BlockMode.VisualExtend
        )
      )
    )
  );

  log("Activated successfully");
}

/**
 * Deactivates the extension.
 */
export function deactivate(): void {
  if (outputChannel) {
    log("Deactivating...");
  }
}
