/**
 * Block Extent Tests
 *
 * Tests for selecting the indented block under a line: the strictly deeper
 * body, then any blank lines directly after it.
 */

import * as assert from "assert";
import { BlockMode } from "../../core/types";
import { IndentNavigator } from "../../logic/IndentNavigator";
import { createMockLineSource } from "../mocks/MockLineSource";
import { doc } from "../test-helpers";

suite("Block Extent Tests", () => {
  const navigator = new IndentNavigator();

  test("selects the indented body under the cursor line", () => {
    const source = createMockLineSource(["a", "  b", "  c", "d"]);

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, { kind: "selected", startLine: 1, endLine: 3 });
    assert.deepStrictEqual(source.mutations, [
      { type: "selection", startLine: 1, endLine: 3 },
    ]);
  });

  test("absorbs blank lines after the body", () => {
    const source = createMockLineSource(["a", "    b", "    c", "", "", "d"]);

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, { kind: "selected", startLine: 1, endLine: 5 });
    assert.deepStrictEqual(source.selection, { startLine: 1, endLine: 5 });
  });

  test("absorbs whitespace-only lines after the body", () => {
    const source = createMockLineSource(["  a", "    b", " ", "\t", "  c"]);

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, { kind: "selected", startLine: 1, endLine: 4 });
  });

  test("stops at the first line not deeper than the start line", () => {
    const source = doc([0, 2, 4, 2, 0], 2);

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, { kind: "selected", startLine: 2, endLine: 3 });
  });

  test("does not resume the body after absorbed blank lines", () => {
    const source = createMockLineSource(["a", "  b", "", "  c"]);

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, { kind: "selected", startLine: 1, endLine: 3 });
  });

  test("keeps deeper whitespace-only lines inside the body", () => {
    const source = createMockLineSource(["a", "  b", "      ", "  c", "d"]);

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, { kind: "selected", startLine: 1, endLine: 4 });
  });

  test("absorbs blank lines even without an indented body", () => {
    const source = createMockLineSource(["a", "", "", "b"]);

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, { kind: "selected", startLine: 1, endLine: 3 });
  });

  test("stops at the end of the document", () => {
    const source = createMockLineSource(["a", "  b", "", ""]);

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, { kind: "selected", startLine: 1, endLine: 4 });
  });

  test("leaves the selection alone when nothing belongs to the block", () => {
    const source = doc([0, 0]);

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, {
      kind: "unchanged",
      startLine: 1,
      endLine: 1,
    });
    assert.strictEqual(source.selection, null);
    assert.deepStrictEqual(source.mutations, []);
  });

  test("leaves the selection alone on the last line", () => {
    const source = doc([0, 2], 2);

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, {
      kind: "unchanged",
      startLine: 2,
      endLine: 2,
    });
    assert.deepStrictEqual(source.mutations, []);
  });

  test("aborts without mutation when the start line does not exist", () => {
    const source = doc([0, 2, 0], 9);

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, {
      kind: "noop",
      reason: "invalid-position",
    });
    assert.deepStrictEqual(source.mutations, []);
  });
});

suite("Visual Extend Tests", () => {
  const navigator = new IndentNavigator();

  test("extends from the selection anchor, not the cursor", () => {
    const source = createMockLineSource(["a", "  b", "  c", "d"], {
      cursorLine: 2,
      selection: { startLine: 1, endLine: 2 },
    });

    const result = navigator.computeBlockExtent(source, BlockMode.VisualExtend);

    assert.deepStrictEqual(result, { kind: "selected", startLine: 1, endLine: 3 });
    assert.deepStrictEqual(source.selection, { startLine: 1, endLine: 3 });
    assert.strictEqual(source.cursorLine, 3);
  });

  test("operator-pending on the same source anchors at the cursor", () => {
    const source = createMockLineSource(["a", "  b", "  c", "d"], {
      cursorLine: 2,
      selection: { startLine: 1, endLine: 2 },
    });

    const result = navigator.computeBlockExtent(
      source,
      BlockMode.OperatorPending
    );

    assert.deepStrictEqual(result, {
      kind: "unchanged",
      startLine: 2,
      endLine: 2,
    });
    assert.deepStrictEqual(source.selection, { startLine: 1, endLine: 2 });
  });

  test("re-establishes a selection that already covers the block", () => {
    const source = createMockLineSource(["a", "  b", "  c", "d"], {
      cursorLine: 3,
      selection: { startLine: 1, endLine: 3 },
    });

    const result = navigator.computeBlockExtent(source, BlockMode.VisualExtend);

    assert.deepStrictEqual(result, { kind: "selected", startLine: 1, endLine: 3 });
    assert.deepStrictEqual(source.mutations, [
      { type: "selection", startLine: 1, endLine: 3 },
    ]);
  });

  test("aborts without mutation when the anchor does not exist", () => {
    const source = createMockLineSource(["a", "  b"], {
      selection: { startLine: 5, endLine: 6 },
    });

    const result = navigator.computeBlockExtent(source, BlockMode.VisualExtend);

    assert.deepStrictEqual(result, {
      kind: "noop",
      reason: "invalid-position",
    });
    assert.deepStrictEqual(source.mutations, []);
  });
});
