import assert from "node:assert/strict";
import { test } from "vitest";

import { applyEase, sampleTrack, type AnimationTrack } from "../../../src/runtime/animation.js";

test("easing curves", () => {
  assert.equal(applyEase("linear", 0.4), 0.4);
  assert.equal(applyEase("linear", 2), 1);
  assert.equal(applyEase("in", 0.5), 0.25);
  assert.equal(applyEase("out", 0.5), 0.75);
  assert.equal(applyEase("inout", 0.25), 0.125);
  assert.equal(applyEase("inout", 0.75), 0.875);
});

test("sampleTrack interpolates until the duration elapses", () => {
  const track: AnimationTrack = {
    action: "move",
    startMs: 1000,
    durationMs: 1000,
    ease: "linear",
    from: [0, 0],
    to: [100, 50],
  };
  assert.deepEqual(sampleTrack(track, 1500), { values: [50, 25], done: false });
  assert.deepEqual(sampleTrack(track, 2000), { values: [100, 50], done: true });
  assert.deepEqual(sampleTrack({ ...track, durationMs: 0 }, 1000), { values: [100, 50], done: true });
});
