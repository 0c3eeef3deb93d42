import type {
  Command,
  EaseKind,
  Point,
  TransitionStyle,
  VarOperand,
  VideoFit,
} from "../core/types.js";
import type { TokenCursor } from "./cursor.js";

export interface ParseSession {
  /** Shared across every file of one load so synthetic labels never collide. */
  checkCounter: number;
}

export interface StatementContext {
  readonly cursor: TokenCursor;
  readonly session: ParseSession;
  emit(command: Command): void;
  /** Parses a `{ ... }` body in place, emitting its commands. */
  parseBody(): void;
  /** Resolves a script path relative to the current file and requires it to exist. */
  resolveScript(relativePath: string): string;
}

export type StatementParser = (ctx: StatementContext) => void;

export const TRANSITION_STYLES: readonly TransitionStyle[] = [
  "fade",
  "wipe",
  "slide",
  "dissolve",
  "zoom",
  "blur",
  "flash",
  "shake",
  "none",
];

export const EASE_KINDS: readonly EaseKind[] = ["linear", "in", "out", "inout"];

export const VIDEO_FITS: readonly VideoFit[] = ["contain", "cover", "stretch"];

export const ANCHOR_WORDS: ReadonlySet<string> = new Set(["left", "right", "center", "top", "bottom", "middle"]);

const MODIFIER_WORDS = new Set(["z", "fade", "float", "size", "pos"]);

/** Removes keys whose value is undefined so omitted modifiers stay absent. */
export const dropUndefined = <T extends object>(value: T): T => {
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) {
      Reflect.deleteProperty(value, key);
    }
  }
  return value;
};

interface VisualModifiers {
  z?: number;
  fade?: number;
  transitionStyle?: TransitionStyle;
  transitionSeconds?: number;
  floatAmp?: number;
  floatSpeed?: number;
  size?: Point;
  pos?: Point;
  anchor?: string;
  numbers: number[];
}

const isTransitionStyle = (value: string): value is TransitionStyle =>
  TRANSITION_STYLES.some((style) => style === value);

const parseVisualModifiers = (cursor: TokenCursor, domain: string): VisualModifiers => {
  const mods: VisualModifiers = { numbers: [] };
  const anchors: string[] = [];
  while (!cursor.atStatementEnd()) {
    const token = cursor.next();
    if (token.type === "number") {
      mods.numbers.push(Number(token.value));
      continue;
    }
    if (token.type !== "word") {
      cursor.fail("PARSE_UNEXPECTED_TOKEN", `Unexpected "${token.value}" in ${domain} statement.`, token.span);
    }
    const word = token.value;
    if (word === "z") {
      mods.z = cursor.expectInt("z order");
    } else if (word === "fade") {
      const seconds = cursor.expectNumber("fade seconds");
      mods.fade = seconds;
      mods.transitionStyle = "fade";
      mods.transitionSeconds = seconds;
    } else if (word === "float") {
      mods.floatAmp = cursor.expectNumber("float amplitude");
      mods.floatSpeed = cursor.expectNumber("float speed");
    } else if (word === "size") {
      mods.size = [cursor.expectNumber("width"), cursor.expectNumber("height")];
    } else if (word === "pos") {
      mods.pos = [cursor.expectNumber("x"), cursor.expectNumber("y")];
    } else if (ANCHOR_WORDS.has(word)) {
      anchors.push(word);
    } else if (cursor.peekType() === "number") {
      const style = cursor.oneOf(word, TRANSITION_STYLES, `${domain} transition style`, token.span);
      mods.transitionStyle = style;
      mods.transitionSeconds = cursor.expectNumber("transition seconds");
    } else {
      cursor.fail("PARSE_UNEXPECTED_TOKEN", `Unexpected "${word}" in ${domain} statement.`, token.span);
    }
  }
  if (anchors.length > 0) {
    mods.anchor = anchors.join(" ");
  }
  return mods;
};

const pairFrom = (cursor: TokenCursor, numbers: number[], what: string): Point | undefined => {
  if (numbers.length === 0) {
    return undefined;
  }
  if (numbers.length !== 2) {
    return cursor.fail("PARSE_ARITY", `Expected two numbers for ${what} but found ${numbers.length}.`);
  }
  return [numbers[0], numbers[1]];
};

const noBareNumbers = (cursor: TokenCursor, mods: VisualModifiers, domain: string): void => {
  if (mods.numbers.length > 0) {
    cursor.fail("PARSE_ARITY", `Unexpected number in ${domain} statement.`);
  }
};

const transitionOf = (mods: VisualModifiers) => ({
  fade: mods.fade,
  transitionStyle: mods.transitionStyle,
  transitionSeconds: mods.transitionSeconds,
});

const floatOf = (mods: VisualModifiers) => ({
  floatAmp: mods.floatAmp,
  floatSpeed: mods.floatSpeed,
});

/** A color literal, a quoted string or a bare word such as `black`. */
const parseColorValue = (cursor: TokenCursor, what: string): string => {
  const token = cursor.next();
  if (token.type === "color" || token.type === "string" || token.type === "word") {
    return token.value;
  }
  return cursor.fail("PARSE_EXPECTED_COLOR", `Expected ${what} but found "${token.value}".`, token.span);
};

export const parseOperand = (cursor: TokenCursor, what: string): VarOperand => {
  const token = cursor.next();
  if (token.type === "number") {
    return { type: "literal", value: Number(token.value) };
  }
  if (token.type === "string" || token.type === "color") {
    return { type: "literal", value: token.value };
  }
  if (token.type === "word") {
    if (token.value === "true" || token.value === "false") {
      return { type: "literal", value: token.value === "true" };
    }
    if (token.value.startsWith("$") && token.value.length > 1) {
      return { type: "ref", name: token.value.slice(1) };
    }
    return { type: "literal", value: token.value };
  }
  return cursor.fail("PARSE_EXPECTED_VALUE", `Expected ${what} but found "${token.value}".`, token.span);
};

const parseTarget = (cursor: TokenCursor): string => {
  cursor.expect("arrow", '"->"');
  return cursor.expectWord("target label");
};

const parseRect = (cursor: TokenCursor): readonly [number, number, number, number] => [
  cursor.expectNumber("x"),
  cursor.expectNumber("y"),
  cursor.expectNumber("width"),
  cursor.expectNumber("height"),
];

const parsePointList = (cursor: TokenCursor, what: string): Point[] => {
  const numbers: number[] = [];
  while (cursor.peekType() === "number") {
    numbers.push(cursor.expectNumber(what));
  }
  if (numbers.length % 2 !== 0) {
    cursor.fail("PARSE_ARITY", `${what} needs x/y pairs but found ${numbers.length} numbers.`);
  }
  const points: Point[] = [];
  for (let i = 0; i < numbers.length; i += 2) {
    points.push([numbers[i], numbers[i + 1]]);
  }
  return points;
};

export const parseSay = (ctx: StatementContext, speaker?: string): void => {
  const text = ctx.cursor.expectString("dialogue text");
  ctx.cursor.endStatement();
  ctx.emit(dropUndefined({ kind: "say", speaker, text }));
};

const parseJump: StatementParser = ({ cursor, emit }) => {
  const target = cursor.expectWord("jump target");
  cursor.endStatement();
  emit({ kind: "jump", target });
};

const parseScene: StatementParser = ({ cursor, emit }) => {
  const kindToken = cursor.expect("word", "scene kind");
  const sceneKind = cursor.oneOf(kindToken.value, ["color", "image"] as const, "scene kind", kindToken.span);
  const value = sceneKind === "color"
    ? parseColorValue(cursor, "scene color")
    : cursor.expectString("scene image path");
  const mods = parseVisualModifiers(cursor, "scene");
  noBareNumbers(cursor, mods, "scene");
  cursor.endStatement();
  emit(dropUndefined({ kind: "scene", sceneKind, value, ...transitionOf(mods), ...floatOf(mods) }));
};

const parseShowAsset = (cursor: TokenCursor, domain: string): Command => {
  const kindToken = cursor.expect("word", "sprite kind");
  const spriteKind = cursor.oneOf(kindToken.value, ["image", "rect"] as const, `${domain} kind`, kindToken.span);
  const name = cursor.expectWord("sprite name");
  const value = spriteKind === "rect"
    ? parseColorValue(cursor, "rect color")
    : cursor.expectString("image path");
  const mods = parseVisualModifiers(cursor, domain);
  let size = mods.size;
  let numbers = mods.numbers;
  if (spriteKind === "rect" && size === undefined) {
    if (numbers.length < 2) {
      cursor.fail("PARSE_ARITY", "rect needs a width and height.");
    }
    size = [numbers[0], numbers[1]];
    numbers = numbers.slice(2);
  }
  const pos = mods.pos ?? pairFrom(cursor, numbers, `${domain} position`);
  cursor.endStatement();
  return dropUndefined({
    kind: "show",
    spriteKind,
    name,
    value,
    size,
    pos,
    anchor: mods.anchor,
    z: mods.z,
    ...transitionOf(mods),
    ...floatOf(mods),
  });
};

const parseAdd: StatementParser = ({ cursor, emit }) => {
  emit(parseShowAsset(cursor, "add"));
};

const isExpressionWord = (cursor: TokenCursor): boolean => {
  const token = cursor.peek();
  if (token?.type !== "word") {
    return false;
  }
  if (MODIFIER_WORDS.has(token.value) || ANCHOR_WORDS.has(token.value)) {
    return false;
  }
  return !(isTransitionStyle(token.value) && cursor.peekType(1) === "number");
};

const parseShow: StatementParser = ({ cursor, emit }) => {
  if ((cursor.isWord("image") || cursor.isWord("rect")) && cursor.peekType(1) === "word") {
    emit(parseShowAsset(cursor, "show"));
    return;
  }
  const ident = cursor.expectWord("character id");
  const expression = isExpressionWord(cursor) ? cursor.expectWord("expression") : undefined;
  const mods = parseVisualModifiers(cursor, "show");
  const pos = mods.pos ?? pairFrom(cursor, mods.numbers, "show position");
  cursor.endStatement();
  emit(dropUndefined({
    kind: "showChar",
    ident,
    expression,
    pos,
    anchor: mods.anchor,
    z: mods.z,
    ...transitionOf(mods),
    ...floatOf(mods),
  }));
};

const parseOff: StatementParser = ({ cursor, emit }) => {
  const name = cursor.expectWord("sprite name");
  const mods = parseVisualModifiers(cursor, "off");
  noBareNumbers(cursor, mods, "off");
  cursor.endStatement();
  emit(dropUndefined({ kind: "hide", name, ...transitionOf(mods) }));
};

const parseCamera: StatementParser = ({ cursor, emit }) => {
  if (cursor.accept("word", "reset")) {
    cursor.endStatement();
    emit({ kind: "camera", panX: 0, panY: 0, zoom: 1 });
    return;
  }
  const panX = cursor.expectNumber("camera pan x");
  const panY = cursor.expectNumber("camera pan y");
  const zoom = cursor.expectNumber("camera zoom");
  if (zoom <= 0) {
    cursor.fail("PARSE_RANGE", "camera zoom must be greater than zero.");
  }
  cursor.endStatement();
  emit({ kind: "camera", panX, panY, zoom });
};

const parseEase = (cursor: TokenCursor): EaseKind => {
  if (cursor.peekType() !== "word") {
    return "linear";
  }
  const token = cursor.next();
  return cursor.oneOf(token.value, EASE_KINDS, "animate ease", token.span);
};

const parseAnimate: StatementParser = ({ cursor, emit }) => {
  if (cursor.accept("word", "stop")) {
    const name = cursor.peekType() === "word" ? cursor.expectWord("sprite name") : undefined;
    cursor.endStatement();
    emit(dropUndefined({ kind: "animate", action: "stop", name }));
    return;
  }
  const name = cursor.expectWord("sprite name");
  const actionToken = cursor.expect("word", "animate action");
  const action = cursor.oneOf(actionToken.value, ["move", "size", "alpha"] as const, "animate action", actionToken.span);
  if (action === "alpha") {
    const to = cursor.expectNumber("alpha value");
    const seconds = cursor.expectNumber("animate seconds");
    const ease = parseEase(cursor);
    cursor.endStatement();
    emit({ kind: "animate", action, name, to, seconds, ease });
    return;
  }
  const to: Point = [cursor.expectNumber("animate x"), cursor.expectNumber("animate y")];
  const seconds = cursor.expectNumber("animate seconds");
  const ease = parseEase(cursor);
  cursor.endStatement();
  emit({ kind: "animate", action, name, to, seconds, ease });
};

const parsePlay: StatementParser = ({ cursor, emit }) => {
  const channel = cursor.peekType() === "word" ? cursor.expectWord("music channel") : "music";
  const path = cursor.expectString("music path");
  const loop = cursor.atStatementEnd() ? true : cursor.expectBool("music loop");
  cursor.endStatement();
  emit({ kind: "music", channel, path, loop });
};

const parseSound: StatementParser = ({ cursor, emit }) => {
  const channel = cursor.peekType() === "word" ? cursor.expectWord("sound channel") : undefined;
  const path = cursor.expectString("sound path");
  cursor.endStatement();
  emit(dropUndefined({ kind: "sound", channel, path }));
};

const parseEcho: StatementParser = ({ cursor, emit }) => {
  if (cursor.accept("word", "stop")) {
    cursor.endStatement();
    emit({ kind: "echo", action: "stop" });
    return;
  }
  const path = cursor.expectString("echo path");
  cursor.accept("word", "start");
  cursor.endStatement();
  emit({ kind: "echo", action: "start", path });
};

const parseVoice: StatementParser = ({ cursor, emit }) => {
  const character = cursor.peekType() === "word" ? cursor.expectWord("character id") : undefined;
  const path = cursor.expectString("voice path");
  cursor.endStatement();
  emit(dropUndefined({ kind: "voice", character, path }));
};

const parseMute: StatementParser = ({ cursor, emit }) => {
  const target = cursor.peekType() === "word" ? cursor.expectWord("mute target") : "all";
  cursor.endStatement();
  emit({ kind: "mute", target });
};

const parsePreload: StatementParser = ({ cursor, emit }) => {
  const assetKind = cursor.expectWord("asset kind");
  const path = cursor.expectString("asset path");
  cursor.endStatement();
  emit({ kind: "preload", assetKind, path });
};

const parseCache: StatementParser = ({ cursor, emit }) => {
  const actionToken = cursor.expect("word", "cache action");
  const action = cursor.oneOf(actionToken.value, ["clear", "pin", "unpin"] as const, "cache action", actionToken.span);
  if (action === "clear") {
    const targetToken = cursor.expect("word", "cache target");
    const target = cursor.oneOf(
      targetToken.value,
      ["images", "scripts", "runtime", "scene", "script"] as const,
      "cache clear target",
      targetToken.span
    );
    if (target === "script") {
      const path = cursor.expectString("script path");
      cursor.endStatement();
      emit({ kind: "cacheClear", target, path });
      return;
    }
    cursor.endStatement();
    emit({ kind: "cacheClear", target: target === "scene" ? "runtime" : target });
    return;
  }
  const assetKind = cursor.expectWord("asset kind");
  const path = cursor.expectString("asset path");
  cursor.endStatement();
  emit({ kind: action === "pin" ? "cachePin" : "cacheUnpin", assetKind, path });
};

const parseGc: StatementParser = ({ cursor, emit }) => {
  cursor.endStatement();
  emit({ kind: "gc" });
};

const parseWait: StatementParser = ({ cursor, emit }) => {
  if (cursor.accept("word", "voice")) {
    cursor.endStatement();
    emit({ kind: "waitVoice" });
    return;
  }
  if (cursor.accept("word", "video")) {
    cursor.endStatement();
    emit({ kind: "waitVideo" });
    return;
  }
  const seconds = cursor.expectNumber("wait seconds");
  cursor.endStatement();
  emit({ kind: "wait", seconds });
};

const parseNotify: StatementParser = ({ cursor, emit }) => {
  const text = cursor.expectString("notification text");
  const seconds = cursor.peekType() === "number" ? cursor.expectNumber("notification seconds") : undefined;
  cursor.endStatement();
  emit(dropUndefined({ kind: "notify", text, seconds }));
};

const parseBlend: StatementParser = ({ cursor, emit }) => {
  const styleToken = cursor.expect("word", "blend style");
  const style = cursor.oneOf(styleToken.value, TRANSITION_STYLES, "blend style", styleToken.span);
  const seconds = cursor.expectNumber("blend seconds");
  cursor.endStatement();
  emit({ kind: "blend", style, seconds });
};

const slotStatement = (kind: "save" | "load"): StatementParser => ({ cursor, emit }) => {
  const slot = cursor.peekType() === "word" ? cursor.expectWord("save slot") : undefined;
  cursor.endStatement();
  emit(dropUndefined({ kind, slot }));
};

const parseSet: StatementParser = ({ cursor, emit }) => {
  const name = cursor.expectWord("variable name");
  const value = parseOperand(cursor, "variable value");
  cursor.endStatement();
  emit({ kind: "setVar", name, value });
};

const parseTrack: StatementParser = ({ cursor, emit }) => {
  const words: string[] = [];
  while (cursor.peekType() === "word") {
    words.push(cursor.expectWord("tracked name"));
  }
  if (words.length === 0) {
    cursor.fail("PARSE_EXPECTED_WORD", "track needs a variable name.");
  }
  const amount = cursor.expectNumber("track amount");
  cursor.endStatement();
  emit({ kind: "addVar", name: words.join("_"), amount });
};

const parseInput: StatementParser = ({ cursor, emit }) => {
  const variable = cursor.expectWord("input variable");
  const prompt = cursor.expectString("input prompt");
  const defaultValue = cursor.accept("word", "default") ? cursor.expectString("input default") : undefined;
  cursor.endStatement();
  emit(dropUndefined({ kind: "input", variable, prompt, defaultValue }));
};

const parsePhone: StatementParser = ({ cursor, emit }) => {
  const actionToken = cursor.expect("word", "phone action");
  const action = cursor.oneOf(actionToken.value, ["open", "msg", "close"] as const, "phone action", actionToken.span);
  if (action === "open") {
    const contact = cursor.expectString("phone contact");
    cursor.endStatement();
    emit({ kind: "phone", action, contact });
    return;
  }
  if (action === "msg") {
    const sideToken = cursor.expect("word", "message side");
    const side = cursor.oneOf(sideToken.value, ["left", "right"] as const, "phone message side", sideToken.span);
    const text = cursor.expectString("message text");
    cursor.endStatement();
    emit({ kind: "phone", action, side, text });
    return;
  }
  cursor.endStatement();
  emit({ kind: "phone", action });
};

const parseMeter: StatementParser = ({ cursor, emit }) => {
  const actionToken = cursor.expect("word", "meter action");
  const action = cursor.oneOf(
    actionToken.value,
    ["show", "hide", "update", "clear"] as const,
    "meter action",
    actionToken.span
  );
  if (action === "clear") {
    cursor.endStatement();
    emit({ kind: "meter", action });
    return;
  }
  const variable = cursor.expectWord("meter variable");
  if (action !== "show") {
    cursor.endStatement();
    emit({ kind: "meter", action, variable });
    return;
  }
  const label = cursor.expectString("meter label");
  const min = cursor.expectNumber("meter min");
  const max = cursor.expectNumber("meter max");
  if (max <= min) {
    cursor.fail("PARSE_RANGE", "meter max must be greater than min.");
  }
  const color = cursor.accept("word", "color") ? parseColorValue(cursor, "meter color") : undefined;
  cursor.endStatement();
  emit(dropUndefined({ kind: "meter", action, variable, label, min, max, color }));
};

const parseItem: StatementParser = ({ cursor, emit }) => {
  const actionToken = cursor.expect("word", "item action");
  const action = cursor.oneOf(actionToken.value, ["add", "remove", "clear"] as const, "item action", actionToken.span);
  if (action === "clear") {
    cursor.endStatement();
    emit({ kind: "item", action });
    return;
  }
  const id = cursor.expectWord("item id");
  if (action === "remove") {
    const amount = cursor.accept("word", "amount") ? cursor.expectInt("item amount") : 1;
    cursor.endStatement();
    emit({ kind: "item", action, id, amount });
    return;
  }
  const name = cursor.expectString("item name");
  const description = cursor.expectString("item description");
  let icon: string | undefined;
  let amount = 1;
  while (!cursor.atStatementEnd()) {
    if (cursor.accept("word", "icon")) {
      icon = cursor.expectString("item icon");
    } else if (cursor.accept("word", "amount")) {
      amount = cursor.expectInt("item amount");
    } else {
      cursor.fail("PARSE_UNEXPECTED_TOKEN", `Unexpected "${cursor.next().value}" in item statement.`);
    }
  }
  cursor.endStatement();
  emit(dropUndefined({ kind: "item", action, id, name, description, icon, amount }));
};

const parseMap: StatementParser = ({ cursor, emit }) => {
  const actionToken = cursor.expect("word", "map action");
  const action = cursor.oneOf(actionToken.value, ["show", "poi", "hide"] as const, "map action", actionToken.span);
  if (action === "show") {
    const image = cursor.expectString("map image");
    cursor.endStatement();
    emit({ kind: "map", action, image });
    return;
  }
  if (action === "hide") {
    cursor.endStatement();
    emit({ kind: "map", action });
    return;
  }
  const label = cursor.expectString("point label");
  const pos: Point = [cursor.expectNumber("point x"), cursor.expectNumber("point y")];
  const polygon = parsePointList(cursor, "map point polygon");
  if (polygon.length > 0 && polygon.length < 3) {
    cursor.fail("PARSE_ARITY", "map point polygon needs at least three points.");
  }
  const target = parseTarget(cursor);
  cursor.endStatement();
  emit(dropUndefined({
    kind: "map",
    action,
    label,
    pos,
    points: polygon.length > 0 ? polygon : undefined,
    target,
  }));
};

const parseVideo: StatementParser = ({ cursor, emit }) => {
  const actionToken = cursor.expect("word", "video action");
  const action = cursor.oneOf(actionToken.value, ["play", "stop"] as const, "video action", actionToken.span);
  if (action === "stop") {
    cursor.endStatement();
    emit({ kind: "video", action });
    return;
  }
  const path = cursor.expectString("video path");
  let loop = false;
  let fit: VideoFit = "contain";
  while (!cursor.atStatementEnd()) {
    if (cursor.accept("word", "loop")) {
      loop = cursor.expectBool("video loop");
    } else if (cursor.accept("word", "fit")) {
      const fitToken = cursor.expect("word", "video fit");
      fit = cursor.oneOf(fitToken.value, VIDEO_FITS, "video fit", fitToken.span);
    } else {
      cursor.fail("PARSE_UNEXPECTED_TOKEN", `Unexpected "${cursor.next().value}" in video statement.`);
    }
  }
  cursor.endStatement();
  emit({ kind: "video", action, path, loop, fit });
};

const parseHotspot: StatementParser = ({ cursor, emit }) => {
  const actionToken = cursor.expect("word", "hotspot action");
  const action = cursor.oneOf(
    actionToken.value,
    ["add", "poly", "remove", "clear", "debug"] as const,
    "hotspot action",
    actionToken.span
  );
  if (action === "clear") {
    cursor.endStatement();
    emit({ kind: "hotspotRemove", name: null });
    return;
  }
  if (action === "debug") {
    const stateToken = cursor.expect("word", "on or off");
    const state = cursor.oneOf(stateToken.value, ["on", "off"] as const, "hotspot debug", stateToken.span);
    cursor.endStatement();
    emit({ kind: "hotspotDebug", enabled: state === "on" });
    return;
  }
  const name = cursor.expectWord("hotspot name");
  if (action === "remove") {
    cursor.endStatement();
    emit({ kind: "hotspotRemove", name });
    return;
  }
  if (action === "add") {
    const rect = parseRect(cursor);
    const target = parseTarget(cursor);
    cursor.endStatement();
    emit({ kind: "hotspotAdd", name, rect, target });
    return;
  }
  const points = parsePointList(cursor, "hotspot polygon");
  if (points.length < 3) {
    cursor.fail("PARSE_ARITY", "hotspot polygon needs at least three points.");
  }
  const target = parseTarget(cursor);
  cursor.endStatement();
  emit({ kind: "hotspotPoly", name, points, target });
};

const parseHud: StatementParser = ({ cursor, emit }) => {
  const actionToken = cursor.expect("word", "hud action");
  const action = cursor.oneOf(actionToken.value, ["add", "remove", "clear"] as const, "hud action", actionToken.span);
  if (action === "clear") {
    cursor.endStatement();
    emit({ kind: "hudRemove", name: null });
    return;
  }
  const name = cursor.expectWord("hud button name");
  if (action === "remove") {
    cursor.endStatement();
    emit({ kind: "hudRemove", name });
    return;
  }
  const styleToken = cursor.expect("word", "hud style");
  const style = cursor.oneOf(styleToken.value, ["text", "icon", "both"] as const, "hud style", styleToken.span);
  let text: string | undefined;
  let icon: string | undefined;
  if (style === "text") {
    text = cursor.expectString("hud text");
  } else if (style === "icon") {
    icon = cursor.expectString("hud icon");
  } else {
    icon = cursor.expectString("hud icon");
    text = cursor.expectString("hud text");
  }
  const rect = parseRect(cursor);
  const target = parseTarget(cursor);
  cursor.endStatement();
  emit(dropUndefined({ kind: "hudAdd", name, style, text, icon, rect, target }));
};

export const SIMPLE_STATEMENTS: Readonly<Record<string, StatementParser>> = {
  go: parseJump,
  goto: parseJump,
  scene: parseScene,
  add: parseAdd,
  show: parseShow,
  off: parseOff,
  camera: parseCamera,
  animate: parseAnimate,
  play: parsePlay,
  sound: parseSound,
  echo: parseEcho,
  voice: parseVoice,
  mute: parseMute,
  preload: parsePreload,
  cache: parseCache,
  gc: parseGc,
  wait: parseWait,
  notify: parseNotify,
  blend: parseBlend,
  save: slotStatement("save"),
  load: slotStatement("load"),
  set: parseSet,
  track: parseTrack,
  input: parseInput,
  phone: parsePhone,
  meter: parseMeter,
  item: parseItem,
  map: parseMap,
  video: parseVideo,
  hotspot: parseHotspot,
  hud: parseHud,
};
