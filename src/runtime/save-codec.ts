import fs from "node:fs";
import path from "node:path";

import type { HudStyle, TransitionStyle, VarValue } from "../core/types.js";
import { createLogger } from "../core/logger.js";
import { TRANSITION_STYLES } from "../compiler/grammar.js";
import {
  createInitialState,
  type CharacterState,
  type Hotspot,
  type RuntimeState,
  type SpriteState,
} from "./state.js";
import { createVariableStore } from "./variables.js";

const log = createLogger("save");

export const SAVE_VERSION = 2;

type Pair = [number, number];
type Quad = [number, number, number, number];

export interface SavedBackground {
  kind: "color" | "image";
  value: string;
  float_amp?: number | null;
  float_speed?: number | null;
}

export interface SavedTransition {
  style: TransitionStyle;
  seconds: number;
  elapsed_ms: number;
}

export interface SavedSprite {
  kind: "image" | "rect" | "char";
  value: string;
  anchor: string | null;
  z: number;
  pos: Pair;
  size: Pair | null;
  alpha: number;
  float_amp: number | null;
  float_speed: number | null;
  transition?: SavedTransition | null;
  /** The sprite is fading out and goes away once its transition ends. */
  leaving?: boolean;
}

export interface SavedItem {
  name: string;
  desc: string;
  icon: string | null;
  count: number;
}

export interface SavedMeter {
  label: string;
  min: number;
  max: number;
  value: number;
  color: string | null;
}

export interface SavedHudButton {
  name: string;
  style: HudStyle;
  text: string | null;
  icon: string | null;
  target: string;
  rect: Quad;
}

export interface SavedMapPoint {
  label: string;
  target: string;
  pos: Pair;
  points: Pair[];
}

export interface SavedHotspot {
  name: string;
  target: string;
  rect: Quad | null;
  points: Pair[] | null;
}

export interface SavedCharacter {
  display_name: string | null;
  color: string | null;
  voice_tag: string | null;
  pos: Pair | null;
  anchor: string | null;
  z: number | null;
  float_amp: number | null;
  float_speed: number | null;
  sprites: Record<string, string>;
}

export type SavedWaiting =
  | { type: "timer"; remaining_ms: number }
  | { type: "voice" }
  | { type: "video" }
  | {
      type: "choice";
      prompt: string;
      options: Array<[string, string]>;
      selected: number;
      timeout_ms: number | null;
      timeout_default: number | null;
      timeout_elapsed_ms: number;
    }
  | { type: "input"; variable: string; prompt: string; default: string | null; buffer: string };

export interface SavedPhone {
  active: boolean;
  contact: string;
  messages: Array<{ side: "left" | "right"; text: string }>;
  awaiting_advance?: boolean;
}

export interface SaveData {
  save_version: number;
  script_path: string;
  index: number;
  background: SavedBackground;
  vars: Record<string, VarValue>;
  sprites: Record<string, SavedSprite>;
  inventory: Record<string, SavedItem>;
  inventory_page: number;
  inventory_open: boolean;
  meters: Record<string, SavedMeter>;
  hud_buttons: SavedHudButton[];
  music: { path: string; loop: boolean; channel?: string } | null;
  echo?: string | null;
  waiting: SavedWaiting | null;
  dialogue?: { speaker: string | null; text: string } | null;
  characters: Record<string, SavedCharacter>;
  hotspots: SavedHotspot[];
  hotspot_debug: boolean;
  map: { active: boolean; image: string | null; points: SavedMapPoint[] };
  camera: { pan_x: number; pan_y: number; zoom: number };
  phone?: SavedPhone | null;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);
const isNumber = (value: unknown): value is number => typeof value === "number" && Number.isFinite(value);
const isString = (value: unknown): value is string => typeof value === "string";
const isBool = (value: unknown): value is boolean => typeof value === "boolean";
const isNullableString = (value: unknown): value is string | null => value === null || isString(value);
const isNullableNumber = (value: unknown): value is number | null => value === null || isNumber(value);
const isOptional = <T>(value: unknown, guard: (entry: unknown) => entry is T): value is T | null | undefined =>
  value === undefined || value === null || guard(value);
const isPair = (value: unknown): value is Pair =>
  Array.isArray(value) && value.length === 2 && value.every(isNumber);
const isQuad = (value: unknown): value is Quad =>
  Array.isArray(value) && value.length === 4 && value.every(isNumber);
const isArrayOf = <T>(value: unknown, guard: (entry: unknown) => entry is T): value is T[] =>
  Array.isArray(value) && value.every(guard);
const isRecordOf = <T>(value: unknown, guard: (entry: unknown) => entry is T): value is Record<string, T> =>
  isRecord(value) && Object.values(value).every(guard);
const isVarValue = (value: unknown): value is VarValue => isNumber(value) || isString(value) || isBool(value);

const isBackground = (value: unknown): value is SavedBackground =>
  isRecord(value) &&
  (value.kind === "color" || value.kind === "image") &&
  isString(value.value) &&
  isOptional(value.float_amp, isNumber) &&
  isOptional(value.float_speed, isNumber);

const isTransitionStyle = (value: unknown): value is TransitionStyle =>
  TRANSITION_STYLES.some((style) => style === value);

const isTransition = (value: unknown): value is SavedTransition =>
  isRecord(value) && isTransitionStyle(value.style) && isNumber(value.seconds) && isNumber(value.elapsed_ms);

const isSprite = (value: unknown): value is SavedSprite =>
  isRecord(value) &&
  (value.kind === "image" || value.kind === "rect" || value.kind === "char") &&
  isString(value.value) &&
  isNullableString(value.anchor) &&
  isNumber(value.z) &&
  isPair(value.pos) &&
  (value.size === null || isPair(value.size)) &&
  isNumber(value.alpha) &&
  isNullableNumber(value.float_amp) &&
  isNullableNumber(value.float_speed) &&
  isOptional(value.transition, isTransition) &&
  isOptional(value.leaving, isBool);

const isItem = (value: unknown): value is SavedItem =>
  isRecord(value) && isString(value.name) && isString(value.desc) && isNullableString(value.icon) && isNumber(value.count);

const isMeter = (value: unknown): value is SavedMeter =>
  isRecord(value) &&
  isString(value.label) &&
  isNumber(value.min) &&
  isNumber(value.max) &&
  isNumber(value.value) &&
  isNullableString(value.color);

const isHudButton = (value: unknown): value is SavedHudButton =>
  isRecord(value) &&
  isString(value.name) &&
  (value.style === "text" || value.style === "icon" || value.style === "both") &&
  isNullableString(value.text) &&
  isNullableString(value.icon) &&
  isString(value.target) &&
  isQuad(value.rect);

const isMapPoint = (value: unknown): value is SavedMapPoint =>
  isRecord(value) && isString(value.label) && isString(value.target) && isPair(value.pos) && isArrayOf(value.points, isPair);

const isHotspot = (value: unknown): value is SavedHotspot =>
  isRecord(value) &&
  isString(value.name) &&
  isString(value.target) &&
  (value.rect === null || isQuad(value.rect)) &&
  (value.points === null || isArrayOf(value.points, isPair)) &&
  (value.rect !== null || value.points !== null);

const isCharacter = (value: unknown): value is SavedCharacter =>
  isRecord(value) &&
  isNullableString(value.display_name) &&
  isNullableString(value.color) &&
  isNullableString(value.voice_tag) &&
  (value.pos === null || isPair(value.pos)) &&
  isNullableString(value.anchor) &&
  isNullableNumber(value.z) &&
  isNullableNumber(value.float_amp) &&
  isNullableNumber(value.float_speed) &&
  isRecordOf(value.sprites, isString);

const isOptionPair = (value: unknown): value is [string, string] =>
  Array.isArray(value) && value.length === 2 && value.every(isString);

const isWaiting = (value: unknown): value is SavedWaiting => {
  if (!isRecord(value)) {
    return false;
  }
  switch (value.type) {
    case "timer":
      return isNumber(value.remaining_ms);
    case "voice":
    case "video":
      return true;
    case "choice":
      return (
        isString(value.prompt) &&
        isArrayOf(value.options, isOptionPair) &&
        value.options.length > 0 &&
        isNumber(value.selected) &&
        isNullableNumber(value.timeout_ms) &&
        isNullableNumber(value.timeout_default) &&
        isNumber(value.timeout_elapsed_ms)
      );
    case "input":
      return (
        isString(value.variable) &&
        isString(value.prompt) &&
        isNullableString(value.default) &&
        isString(value.buffer)
      );
    default:
      return false;
  }
};

const isMessage = (value: unknown): value is { side: "left" | "right"; text: string } =>
  isRecord(value) && (value.side === "left" || value.side === "right") && isString(value.text);

const isPhone = (value: unknown): value is SavedPhone =>
  isRecord(value) &&
  isBool(value.active) &&
  isString(value.contact) &&
  isArrayOf(value.messages, isMessage) &&
  isOptional(value.awaiting_advance, isBool);

const isMusic = (value: unknown): value is { path: string; loop: boolean; channel?: string } =>
  isRecord(value) && isString(value.path) && isBool(value.loop) && (value.channel === undefined || isString(value.channel));

const isDialogue = (value: unknown): value is { speaker: string | null; text: string } =>
  isRecord(value) && isNullableString(value.speaker) && isString(value.text);

export const isSaveData = (value: unknown): value is SaveData => {
  if (!isRecord(value)) {
    return false;
  }
  const map = value.map;
  const camera = value.camera;
  return (
    value.save_version === SAVE_VERSION &&
    isString(value.script_path) &&
    isNumber(value.index) &&
    Number.isInteger(value.index) &&
    value.index >= 0 &&
    isBackground(value.background) &&
    isRecordOf(value.vars, isVarValue) &&
    isRecordOf(value.sprites, isSprite) &&
    isRecordOf(value.inventory, isItem) &&
    isNumber(value.inventory_page) &&
    isBool(value.inventory_open) &&
    isRecordOf(value.meters, isMeter) &&
    isArrayOf(value.hud_buttons, isHudButton) &&
    (value.music === null || isMusic(value.music)) &&
    isOptional(value.echo, isString) &&
    (value.waiting === null || isWaiting(value.waiting)) &&
    isOptional(value.dialogue, isDialogue) &&
    isRecordOf(value.characters, isCharacter) &&
    isArrayOf(value.hotspots, isHotspot) &&
    isBool(value.hotspot_debug) &&
    isRecord(map) &&
    isBool(map.active) &&
    isNullableString(map.image) &&
    isArrayOf(map.points, isMapPoint) &&
    isRecord(camera) &&
    isNumber(camera.pan_x) &&
    isNumber(camera.pan_y) &&
    isNumber(camera.zoom) &&
    camera.zoom > 0 &&
    isOptional(value.phone, isPhone)
  );
};

/** Project-relative path with `/` separators; paths outside the root stay absolute. */
export const toProjectRelative = (projectRoot: string, scriptPath: string): string => {
  const relative = path.relative(path.resolve(projectRoot), path.resolve(scriptPath));
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    return path.resolve(scriptPath).split(path.sep).join("/");
  }
  return relative.split(path.sep).join("/");
};

export const fromProjectRelative = (projectRoot: string, scriptPath: string): string =>
  path.isAbsolute(scriptPath) ? path.resolve(scriptPath) : path.resolve(projectRoot, ...scriptPath.split("/"));

export const slotSavePath = (savePath: string, slot: string): string =>
  path.join(path.dirname(savePath), "slots", `${slot}.json`);

const pairOrNull = (value: readonly [number, number] | undefined): Pair | null =>
  value ? [value[0], value[1]] : null;

const encodeSprite = (sprite: SpriteState, nowMs: number): SavedSprite => ({
  kind: sprite.kind,
  value: sprite.value,
  anchor: sprite.anchor ?? null,
  z: sprite.z,
  pos: [sprite.pos[0], sprite.pos[1]],
  size: pairOrNull(sprite.size),
  alpha: sprite.alpha,
  float_amp: sprite.floatAmp ?? null,
  float_speed: sprite.floatSpeed ?? null,
  transition: sprite.transition
    ? {
        style: sprite.transition.style,
        seconds: sprite.transition.seconds,
        elapsed_ms: Math.max(0, nowMs - sprite.transition.startedMs),
      }
    : null,
  leaving: sprite.leaving === true,
});

const encodeCharacter = (character: CharacterState): SavedCharacter => ({
  display_name: character.displayName ?? null,
  color: character.color ?? null,
  voice_tag: character.voiceTag ?? null,
  pos: pairOrNull(character.pos),
  anchor: character.anchor ?? null,
  z: character.z ?? null,
  float_amp: character.floatAmp ?? null,
  float_speed: character.floatSpeed ?? null,
  sprites: { ...character.sprites },
});

const encodeHotspot = (hotspot: Hotspot): SavedHotspot => ({
  name: hotspot.name,
  target: hotspot.target,
  rect: hotspot.shape.type === "rect" ? [...hotspot.shape.rect] : null,
  points: hotspot.shape.type === "poly" ? hotspot.shape.points.map((point): Pair => [point[0], point[1]]) : null,
});

const encodeWaiting = (state: RuntimeState, nowMs: number): SavedWaiting | null => {
  if (state.choice) {
    const choice = state.choice;
    return {
      type: "choice",
      prompt: choice.prompt,
      options: choice.options.map((option) => [option.text, option.target]),
      selected: choice.selected,
      timeout_ms: choice.timeoutMs ?? null,
      timeout_default: choice.timeoutDefault ?? null,
      timeout_elapsed_ms: Math.max(0, nowMs - choice.startedMs),
    };
  }
  if (state.input) {
    return {
      type: "input",
      variable: state.input.variable,
      prompt: state.input.prompt,
      default: state.input.defaultValue ?? null,
      buffer: state.input.buffer,
    };
  }
  if (!state.wait) {
    return null;
  }
  if (state.wait.type === "timer") {
    return { type: "timer", remaining_ms: Math.max(0, state.wait.untilMs - nowMs) };
  }
  return { type: state.wait.type };
};

const mapEntries = <T, U>(source: Map<string, T>, encode: (entry: T) => U): Record<string, U> => {
  const out: Record<string, U> = {};
  for (const [key, entry] of source) {
    out[key] = encode(entry);
  }
  return out;
};

const withoutNull = <T>(value: T | null | undefined): T | undefined => (value === null ? undefined : value);

export const encodeSave = (state: RuntimeState, scriptPath: string, nowMs: number): SaveData => ({
  save_version: SAVE_VERSION,
  script_path: scriptPath,
  index: state.index,
  background: {
    kind: state.background.kind,
    value: state.background.value,
    float_amp: state.background.floatAmp ?? null,
    float_speed: state.background.floatSpeed ?? null,
  },
  vars: { ...state.vars },
  sprites: mapEntries(state.sprites, (sprite) => encodeSprite(sprite, nowMs)),
  inventory: mapEntries(state.inventory, (item) => ({
    name: item.name,
    desc: item.description,
    icon: item.icon ?? null,
    count: item.count,
  })),
  inventory_page: state.inventoryPage,
  inventory_open: state.inventoryOpen,
  meters: mapEntries(state.meters, (meter) => ({
    label: meter.label,
    min: meter.min,
    max: meter.max,
    value: meter.value,
    color: meter.color ?? null,
  })),
  hud_buttons: [...state.hud.values()].map((button) => ({
    name: button.name,
    style: button.style,
    text: button.text ?? null,
    icon: button.icon ?? null,
    target: button.target,
    rect: [...button.rect],
  })),
  music: state.music ? { path: state.music.path, loop: state.music.loop, channel: state.music.channel } : null,
  echo: state.echo,
  waiting: encodeWaiting(state, nowMs),
  dialogue: state.dialogue ? { speaker: state.dialogue.speaker ?? null, text: state.dialogue.text } : null,
  characters: mapEntries(state.characters, encodeCharacter),
  hotspots: [...state.hotspots.values()].map(encodeHotspot),
  hotspot_debug: state.hotspotDebug,
  map: {
    active: state.map.active,
    image: state.map.image ?? null,
    points: state.map.points.map((point) => ({
      label: point.label,
      target: point.target,
      pos: [point.pos[0], point.pos[1]],
      points: point.points.map((entry): Pair => [entry[0], entry[1]]),
    })),
  },
  camera: { pan_x: state.camera.panX, pan_y: state.camera.panY, zoom: state.camera.zoom },
  phone: state.phone.active || state.phone.messages.length > 0
    ? {
        active: state.phone.active,
        contact: state.phone.contact,
        messages: state.phone.messages.map((message) => ({ ...message })),
        awaiting_advance: state.phone.awaitingAdvance,
      }
    : null,
});

/**
 * Rebuilds interpreter state from a snapshot. Sprite transitions are rebased on
 * `nowMs`; other transient presentation state (animation tracks, video,
 * notifications, blends) starts empty.
 */
export const decodeSave = (data: SaveData, nowMs: number): RuntimeState => {
  const state = createInitialState();
  state.index = data.index;
  state.vars = createVariableStore(Object.entries(data.vars));
  state.background = {
    kind: data.background.kind,
    value: data.background.value,
    floatAmp: withoutNull(data.background.float_amp),
    floatSpeed: withoutNull(data.background.float_speed),
  };
  for (const [id, sprite] of Object.entries(data.sprites)) {
    const restored: SpriteState = {
      id,
      kind: sprite.kind,
      value: sprite.value,
      anchor: withoutNull(sprite.anchor),
      z: sprite.z,
      pos: [sprite.pos[0], sprite.pos[1]],
      size: sprite.size ? [sprite.size[0], sprite.size[1]] : undefined,
      alpha: sprite.alpha,
      floatAmp: withoutNull(sprite.float_amp),
      floatSpeed: withoutNull(sprite.float_speed),
    };
    if (sprite.transition) {
      restored.transition = {
        style: sprite.transition.style,
        seconds: sprite.transition.seconds,
        startedMs: nowMs - sprite.transition.elapsed_ms,
      };
    }
    if (sprite.leaving) {
      restored.leaving = true;
    }
    state.sprites.set(id, restored);
  }
  for (const [ident, character] of Object.entries(data.characters)) {
    state.characters.set(ident, {
      ident,
      displayName: withoutNull(character.display_name),
      color: withoutNull(character.color),
      voiceTag: withoutNull(character.voice_tag),
      pos: withoutNull(character.pos),
      anchor: withoutNull(character.anchor),
      z: withoutNull(character.z),
      floatAmp: withoutNull(character.float_amp),
      floatSpeed: withoutNull(character.float_speed),
      sprites: { ...character.sprites },
    });
  }
  for (const [id, item] of Object.entries(data.inventory)) {
    state.inventory.set(id, {
      name: item.name,
      description: item.desc,
      icon: withoutNull(item.icon),
      count: item.count,
    });
  }
  state.inventoryPage = data.inventory_page;
  state.inventoryOpen = data.inventory_open;
  for (const [variable, meter] of Object.entries(data.meters)) {
    state.meters.set(variable, {
      label: meter.label,
      min: meter.min,
      max: meter.max,
      value: meter.value,
      color: withoutNull(meter.color),
    });
  }
  for (const button of data.hud_buttons) {
    state.hud.set(button.name, {
      name: button.name,
      style: button.style,
      text: withoutNull(button.text),
      icon: withoutNull(button.icon),
      rect: [...button.rect],
      target: button.target,
    });
  }
  state.music = data.music
    ? { channel: data.music.channel ?? "music", path: data.music.path, loop: data.music.loop }
    : null;
  state.echo = data.echo ?? null;

  const waiting = data.waiting;
  if (waiting?.type === "choice") {
    state.choice = {
      prompt: waiting.prompt,
      options: waiting.options.map(([text, target]) => ({ text, target })),
      selected: Math.min(Math.max(0, waiting.selected), waiting.options.length - 1),
      timeoutMs: withoutNull(waiting.timeout_ms),
      timeoutDefault: withoutNull(waiting.timeout_default),
      startedMs: nowMs - waiting.timeout_elapsed_ms,
    };
  } else if (waiting?.type === "input") {
    state.input = {
      variable: waiting.variable,
      prompt: waiting.prompt,
      defaultValue: withoutNull(waiting.default),
      buffer: waiting.buffer,
    };
  } else if (waiting?.type === "timer") {
    state.wait = { type: "timer", untilMs: nowMs + waiting.remaining_ms };
  } else if (waiting) {
    state.wait = { type: waiting.type };
  }

  if (data.dialogue) {
    const speaker = withoutNull(data.dialogue.speaker);
    const character = speaker === undefined ? undefined : state.characters.get(speaker);
    state.dialogue = {
      speaker,
      name: character?.displayName ?? speaker,
      color: character?.color,
      text: data.dialogue.text,
    };
  }
  for (const hotspot of data.hotspots) {
    state.hotspots.set(hotspot.name, {
      name: hotspot.name,
      target: hotspot.target,
      shape: hotspot.rect
        ? { type: "rect", rect: [...hotspot.rect] }
        : { type: "poly", points: (hotspot.points ?? []).map((point): Pair => [point[0], point[1]]) },
    });
  }
  state.hotspotDebug = data.hotspot_debug;
  state.map = {
    active: data.map.active,
    image: withoutNull(data.map.image),
    points: data.map.points.map((point) => ({
      label: point.label,
      target: point.target,
      pos: [point.pos[0], point.pos[1]],
      points: point.points.map((entry): Pair => [entry[0], entry[1]]),
    })),
  };
  state.camera = { panX: data.camera.pan_x, panY: data.camera.pan_y, zoom: data.camera.zoom };
  if (data.phone) {
    state.phone = {
      active: data.phone.active,
      contact: data.phone.contact,
      messages: data.phone.messages.map((message) => ({ ...message })),
      awaitingAdvance: data.phone.awaiting_advance ?? false,
    };
  }
  return state;
};

/**
 * Writes beside the target and renames over it so readers never see a partial
 * file. A filesystem failure is logged and reported as `false`.
 */
export const writeSaveAtomic = (filePath: string, data: SaveData): boolean => {
  const tmpPath = `${filePath}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmpPath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
    fs.renameSync(tmpPath, filePath);
    return true;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`could not write save ${filePath}: ${message}`);
    if (fs.existsSync(tmpPath)) {
      fs.unlinkSync(tmpPath);
    }
    return false;
  }
};

/** Returns null for a missing, unreadable or malformed save. */
export const readSave = (filePath: string): SaveData | null => {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`ignoring unreadable save ${filePath}: ${message}`);
    return null;
  }
  if (!isSaveData(parsed)) {
    log.warn(`ignoring save with unexpected shape: ${filePath}`);
    return null;
  }
  return parsed;
};
