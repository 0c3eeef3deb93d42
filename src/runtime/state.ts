import type {
  ChoiceOption,
  HudStyle,
  Point,
  TransitionStyle,
  VideoFit,
} from "../core/types.js";
import type { SpriteTracks } from "./animation.js";
import type { Surface, VideoPlayback } from "./collaborators.js";
import { identityCamera, type Camera } from "./geometry.js";
import { createVariableStore, type VariableStore } from "./variables.js";

export interface TransitionState {
  style: TransitionStyle;
  seconds: number;
  startedMs: number;
}

export interface SpriteState {
  id: string;
  kind: "image" | "rect" | "char";
  /** Image path or rect color. */
  value: string;
  anchor?: string;
  z: number;
  pos: [number, number];
  size?: [number, number];
  /** 0..255 */
  alpha: number;
  floatAmp?: number;
  floatSpeed?: number;
  transition?: TransitionState;
  /** Set by a hide with a transition; the sprite goes away when it elapses. */
  leaving?: boolean;
}

export interface BackgroundState {
  kind: "color" | "image";
  value: string;
  floatAmp?: number;
  floatSpeed?: number;
  transition?: TransitionState;
}

export const defaultBackground = (): BackgroundState => ({ kind: "color", value: "#000000" });

export interface DialogueState {
  speaker?: string;
  /** Display name from the character definition, else the speaker id. */
  name?: string;
  color?: string;
  text: string;
}

export interface ChoiceState {
  prompt: string;
  options: ChoiceOption[];
  selected: number;
  timeoutMs?: number;
  /** 1-based option number taken when the timeout elapses. */
  timeoutDefault?: number;
  startedMs: number;
}

export interface InputState {
  variable: string;
  prompt: string;
  defaultValue?: string;
  buffer: string;
}

export type WaitState =
  | { type: "timer"; untilMs: number }
  | { type: "voice" }
  | { type: "video" };

export interface InventoryItem {
  name: string;
  description: string;
  icon?: string;
  count: number;
}

export interface MeterState {
  label: string;
  min: number;
  max: number;
  value: number;
  color?: string;
}

export interface HudButton {
  name: string;
  style: HudStyle;
  text?: string;
  icon?: string;
  rect: [number, number, number, number];
  target: string;
}

export interface MapPoint {
  label: string;
  target: string;
  pos: [number, number];
  points: Array<[number, number]>;
}

export interface MapState {
  active: boolean;
  image?: string;
  points: MapPoint[];
}

export type HotspotShape =
  | { type: "rect"; rect: [number, number, number, number] }
  | { type: "poly"; points: Array<[number, number]> };

export interface Hotspot {
  name: string;
  shape: HotspotShape;
  target: string;
}

export interface PhoneMessage {
  side: "left" | "right";
  text: string;
}

export interface PhoneState {
  active: boolean;
  contact: string;
  messages: PhoneMessage[];
  /** True while the newest message waits for an advance. */
  awaitingAdvance: boolean;
}

export interface Notification {
  message: string;
  untilMs: number;
}

export interface MusicState {
  channel: string;
  path: string;
  loop: boolean;
}

export interface VideoState {
  path: string;
  loop: boolean;
  fit: VideoFit;
  playback: VideoPlayback;
  frame: Surface | null;
}

export interface BlendState {
  style: TransitionStyle;
  seconds: number;
  startedMs: number;
}

export interface CharacterState {
  ident: string;
  displayName?: string;
  color?: string;
  voiceTag?: string;
  pos?: Point;
  anchor?: string;
  z?: number;
  floatAmp?: number;
  floatSpeed?: number;
  sprites: Record<string, string>;
}

export const clonePoint = (point: Point): [number, number] => [point[0], point[1]];

/** Every piece of mutable interpreter state; the save codec reads and rebuilds it. */
export interface RuntimeState {
  index: number;
  vars: VariableStore;
  background: BackgroundState;
  sprites: Map<string, SpriteState>;
  tracks: Map<string, SpriteTracks>;
  characters: Map<string, CharacterState>;
  dialogue: DialogueState | null;
  choice: ChoiceState | null;
  input: InputState | null;
  wait: WaitState | null;
  inventory: Map<string, InventoryItem>;
  inventoryPage: number;
  inventoryOpen: boolean;
  meters: Map<string, MeterState>;
  hud: Map<string, HudButton>;
  hotspots: Map<string, Hotspot>;
  hotspotDebug: boolean;
  map: MapState;
  camera: Camera;
  phone: PhoneState;
  music: MusicState | null;
  echo: string | null;
  notification: Notification | null;
  blend: BlendState | null;
  loading: string | null;
  video: VideoState | null;
}

export const emptyPhone = (): PhoneState => ({
  active: false,
  contact: "",
  messages: [],
  awaitingAdvance: false,
});

export const createInitialState = (): RuntimeState => ({
  index: 0,
  vars: createVariableStore(),
  background: defaultBackground(),
  sprites: new Map(),
  tracks: new Map(),
  characters: new Map(),
  dialogue: null,
  choice: null,
  input: null,
  wait: null,
  inventory: new Map(),
  inventoryPage: 0,
  inventoryOpen: false,
  meters: new Map(),
  hud: new Map(),
  hotspots: new Map(),
  hotspotDebug: false,
  map: { active: false, points: [] },
  camera: identityCamera(),
  phone: emptyPhone(),
  music: null,
  echo: null,
  notification: null,
  blend: null,
  loading: null,
  video: null,
});
