import assert from "node:assert/strict";
import { test } from "vitest";

import {
  addToVariable,
  coerceNumber,
  compareValues,
  createVariableStore,
  interpolate,
  resolveOperand,
} from "../../../src/runtime/variables.js";

test("coerceNumber reads numbers, numeric text and booleans", () => {
  assert.equal(coerceNumber(5), 5);
  assert.equal(coerceNumber("  3.5 "), 3.5);
  assert.equal(coerceNumber("1e3"), 1000);
  assert.equal(coerceNumber(true), 1);
  assert.equal(coerceNumber(false), 0);
  assert.equal(coerceNumber("abc"), null);
  assert.equal(coerceNumber(""), null);
  assert.equal(coerceNumber(Number.NaN), null);
  assert.equal(coerceNumber(undefined), null);
});

test("compareValues compares numerically when both sides are numeric", () => {
  assert.equal(compareValues("10", ">", 9), true);
  assert.equal(compareValues(2, "<=", 2), true);
  assert.equal(compareValues(true, "==", 1), true);
  assert.equal(compareValues(3, "!=", "3"), false);
});

test("compareValues falls back to equality for text", () => {
  assert.equal(compareValues("abc", "==", "abc"), true);
  assert.equal(compareValues("a", "!=", "b"), true);
  assert.equal(compareValues("abc", "<", 1), false);
  assert.equal(compareValues(undefined, ">=", 0), false);
  assert.equal(compareValues(undefined, "!=", 0), true);
});

test("interpolate substitutes known names and leaves unknown ones", () => {
  const vars = { name: "Ava", gold: 5, "party.size": 3 };
  assert.equal(interpolate("Hi ${name}, $gold gold, $missing", vars), "Hi Ava, 5 gold, $missing");
  assert.equal(interpolate("${party.size} travellers", vars), "3 travellers");
  assert.equal(interpolate("cost: $5", vars), "cost: $5");
});

test("resolveOperand reads literals and references", () => {
  const vars = { gold: 7 };
  assert.equal(resolveOperand({ type: "literal", value: "x" }, vars), "x");
  assert.equal(resolveOperand({ type: "ref", name: "gold" }, vars), 7);
  assert.equal(resolveOperand({ type: "ref", name: "silver" }, vars), undefined);
});

test("addToVariable starts non-numeric values from zero", () => {
  assert.equal(addToVariable(undefined, 3), 3);
  assert.equal(addToVariable(2, 3), 5);
  assert.equal(addToVariable("x", 3), 3);
});

test("createVariableStore has no inherited members", () => {
  const vars = createVariableStore([["__proto__", 1]]);
  assert.equal(Object.getPrototypeOf(vars), null);
  assert.deepEqual(Object.keys(vars), ["__proto__"]);
  assert.equal(resolveOperand({ type: "ref", name: "__proto__" }, vars), 1);
  assert.equal(interpolate("$constructor", vars), "$constructor");
});
