import test from "node:test";
import assert from "node:assert/strict";
import { reclampSelection, SessionSelection } from "../src/sessions/selection.js";

test("removing a session before the selection shifts it left", () => {
  assert.equal(reclampSelection(2, 0, 2), 1);
});

test("removing the selected session keeps the index while it is in range", () => {
  assert.equal(reclampSelection(1, 1, 2), 1);
  assert.equal(reclampSelection(1, 1, 1), 0);
});

test("removing after the selection leaves it unchanged", () => {
  assert.equal(reclampSelection(0, 2, 2), 0);
});

test("no sessions left means no selection", () => {
  assert.equal(reclampSelection(0, 0, 0), null);
  assert.equal(reclampSelection(null, 0, 3), null);
});

test("select clamps into range", () => {
  const selection = new SessionSelection();
  assert.equal(selection.index, null);

  assert.equal(selection.select(5, 3), 2);
  assert.equal(selection.select(-1, 3), 0);
  assert.equal(selection.select(0, 0), null);

  selection.select(2, 3);
  assert.equal(selection.sessionRemoved(2, 2), 1);
  assert.equal(selection.index, 1);
});
