import type { EaseKind } from "../core/types.js";

export type AnimationAction = "move" | "size" | "alpha";

export interface AnimationTrack {
  action: AnimationAction;
  startMs: number;
  durationMs: number;
  ease: EaseKind;
  from: number[];
  to: number[];
}

export type SpriteTracks = Partial<Record<AnimationAction, AnimationTrack>>;

export const ANIMATION_ACTIONS: readonly AnimationAction[] = ["move", "size", "alpha"];

export const applyEase = (kind: EaseKind, t: number): number => {
  const clamped = Math.min(1, Math.max(0, t));
  switch (kind) {
    case "linear":
      return clamped;
    case "in":
      return clamped * clamped;
    case "out":
      return 1 - (1 - clamped) * (1 - clamped);
    case "inout":
      return clamped < 0.5 ? 2 * clamped * clamped : 1 - Math.pow(-2 * clamped + 2, 2) / 2;
  }
};

export interface TrackSample {
  values: number[];
  done: boolean;
}

export const sampleTrack = (track: AnimationTrack, nowMs: number): TrackSample => {
  const ratio = track.durationMs <= 0 ? 1 : (nowMs - track.startMs) / track.durationMs;
  if (ratio >= 1) {
    return { values: [...track.to], done: true };
  }
  const eased = applyEase(track.ease, ratio);
  const values = track.to.map((target, i) => {
    const start = track.from[i] ?? target;
    return start + (target - start) * eased;
  });
  return { values, done: false };
};
