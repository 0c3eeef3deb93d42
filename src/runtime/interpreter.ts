import path from "node:path";

import { VnScriptError } from "../core/errors.js";
import { createLogger } from "../core/logger.js";
import type {
  AnimateCommand,
  CacheClearCommand,
  CharacterDefCommand,
  Command,
  ItemCommand,
  MapCommand,
  MeterCommand,
  PhoneCommand,
  Point,
  Program,
  ShowCharCommand,
  ShowCommand,
  TransitionFields,
  VarValue,
  VideoCommand,
} from "../core/types.js";
import { ScriptLoader } from "../compiler/loader.js";
import { ANIMATION_ACTIONS, sampleTrack, type AnimationAction, type AnimationTrack } from "./animation.js";
import {
  NullAssetManager,
  type AssetManager,
  type VideoBackend,
} from "./collaborators.js";
import {
  defaultFeatureFlags,
  resolveUiConfig,
  type FeatureFlags,
  type UiConfig,
  type UiConfigOverrides,
} from "./config.js";
import {
  DEFAULT_SCREEN,
  anchorPosition,
  distance,
  identityCamera,
  pointInPolygon,
  pointInRect,
  screenToWorld,
  type ScreenSize,
} from "./geometry.js";
import { menuEntries, moveSelection, parseSlotAction, type MenuState } from "./menus.js";
import {
  decodeSave,
  encodeSave,
  fromProjectRelative,
  readSave,
  slotSavePath,
  toProjectRelative,
  writeSaveAtomic,
  type SaveData,
} from "./save-codec.js";
import {
  clonePoint,
  createInitialState,
  defaultBackground,
  emptyPhone,
  type CharacterState,
  type RuntimeState,
  type SpriteState,
  type TransitionState,
} from "./state.js";
import {
  addToVariable,
  coerceNumber,
  compareValues,
  interpolate,
  resolveOperand,
} from "./variables.js";

const log = createLogger("runtime");

const MAX_STEPS_PER_FRAME = 10000;
const INVENTORY_TOGGLE = "inventory_toggle";
const AUDIO_KINDS: ReadonlySet<string> = new Set(["audio", "sound", "sounds", "sfx", "music", "voice", "voices"]);

export type RuntimeStatus =
  | "titleMenu"
  | "pauseMenu"
  | "mapOverlay"
  | "waitingChoice"
  | "waitingInput"
  | "waitingTimer"
  | "waitingVoice"
  | "waitingVideo"
  | "dialogue"
  | "phone"
  | "running"
  | "ended";

export type InputKey =
  | "advance"
  | "up"
  | "down"
  | "confirm"
  | "back"
  | "menu"
  | "inventory"
  | "quicksave"
  | "quickload"
  | "backspace"
  | "pageUp"
  | "pageDown";

export type InputEvent =
  | { type: "click"; x: number; y: number }
  | { type: "key"; key: InputKey }
  | { type: "text"; text: string }
  | { type: "choose"; index: number };

export interface RuntimeOptions {
  program: Program;
  /** Defaults to the directory of the program's script. */
  projectRoot?: string;
  /** Quick-save file; numbered slots live in `slots/` beside it. */
  savePath?: string;
  assets?: AssetManager;
  video?: VideoBackend;
  loader?: ScriptLoader;
  ui?: UiConfigOverrides;
  features?: Partial<FeatureFlags>;
  screen?: ScreenSize;
}

const stripRoot = (target: string): string => (target.startsWith("::") ? target.slice(2) : target);

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const characterFromDef = (command: CharacterDefCommand): CharacterState => ({
  ident: command.ident,
  displayName: command.displayName,
  color: command.color,
  voiceTag: command.voiceTag,
  pos: command.pos,
  anchor: command.anchor,
  z: command.z,
  floatAmp: command.floatAmp,
  floatSpeed: command.floatSpeed,
  sprites: { ...command.sprites },
});

const spriteForExpression = (character: CharacterState, expression: string | undefined): string | undefined => {
  if (expression !== undefined && Object.hasOwn(character.sprites, expression)) {
    return character.sprites[expression];
  }
  return Object.hasOwn(character.sprites, "default") ? character.sprites.default : undefined;
};

/**
 * Frame-stepped interpreter over a resolved program. The caller owns the
 * instance and drives it with `frame`; nothing here keeps global state.
 */
export class VnRuntime {
  state: RuntimeState;
  program: Program;
  menu: MenuState | null = null;
  quitRequested = false;

  readonly projectRoot: string;
  readonly savePath: string;
  readonly assets: AssetManager;
  readonly loader: ScriptLoader;
  readonly ui: UiConfig;
  readonly features: FeatureFlags;
  readonly screen: ScreenSize;

  private readonly entryProgram: Program;
  private readonly videoBackend: VideoBackend | null;
  private nowMs = 0;

  constructor(options: RuntimeOptions) {
    this.program = options.program;
    this.entryProgram = options.program;
    this.projectRoot = path.resolve(options.projectRoot ?? path.dirname(options.program.scriptPath));
    this.savePath = options.savePath ?? path.join(this.projectRoot, "saves", "quick.json");
    this.assets = options.assets ?? new NullAssetManager(this.projectRoot);
    this.videoBackend = options.video ?? null;
    this.loader = options.loader ?? new ScriptLoader();
    this.ui = resolveUiConfig(options.ui);
    this.features = { ...defaultFeatureFlags(), ...options.features };
    this.screen = options.screen ?? DEFAULT_SCREEN;
    this.loader.remember(options.program);
    this.state = createInitialState();
    this.registerCharacters(this.program);
    if (this.ui.titleMenu.enabled) {
      this.menu = { kind: "title", mode: "main", selected: 0 };
    }
  }

  get currentTimeMs(): number {
    return this.nowMs;
  }

  get status(): RuntimeStatus {
    if (this.menu) {
      return this.menu.kind === "title" ? "titleMenu" : "pauseMenu";
    }
    if (this.state.map.active) {
      return "mapOverlay";
    }
    if (this.state.choice) {
      return "waitingChoice";
    }
    if (this.state.input) {
      return "waitingInput";
    }
    if (this.state.phone.awaitingAdvance) {
      return "phone";
    }
    if (this.state.wait) {
      switch (this.state.wait.type) {
        case "timer":
          return "waitingTimer";
        case "voice":
          return "waitingVoice";
        case "video":
          return "waitingVideo";
      }
    }
    if (this.state.dialogue) {
      return "dialogue";
    }
    return this.state.index >= this.program.commands.length ? "ended" : "running";
  }

  /**
   * One tick: route input, advance clocks, then execute until something blocks.
   * Input that closes an overlay lets the script continue in the same tick.
   */
  frame(events: readonly InputEvent[], nowMs: number): RuntimeStatus {
    this.nowMs = nowMs;
    for (const event of events) {
      this.handleEvent(event);
    }
    this.checkChoiceTimeout();
    if (this.overlayActive()) {
      return this.status;
    }
    this.advanceClocks();
    return this.run();
  }

  run(): RuntimeStatus {
    let guard = 0;
    while (guard < MAX_STEPS_PER_FRAME) {
      guard += 1;
      const status = this.status;
      if (status !== "running") {
        return status;
      }
      const command = this.program.commands[this.state.index];
      this.state.index += 1;
      this.executeCommand(command);
    }
    throw new VnScriptError(
      "RUNTIME_GUARD_EXCEEDED",
      `Execution guard exceeded ${MAX_STEPS_PER_FRAME} commands in one frame.`
    );
  }

  jump(target: string): void {
    const name = stripRoot(target);
    if (name === INVENTORY_TOGGLE) {
      if (this.features.items) {
        this.toggleInventory();
      }
      return;
    }
    if (!Object.hasOwn(this.program.labels, name)) {
      log.error(`unknown label "${name}" in ${this.program.scriptPath}`);
      throw new VnScriptError("RUNTIME_LABEL_UNKNOWN", `Unknown label "${name}".`);
    }
    this.state.index = this.program.labels[name];
  }

  /** Picks an option of the pending choice, or a point of the open map overlay. */
  choose(index: number): void {
    const choice = this.state.choice;
    if (choice) {
      if (!Number.isInteger(index) || index < 0 || index >= choice.options.length) {
        throw new VnScriptError("RUNTIME_CHOICE_INDEX", `Choice index ${index} is out of range.`);
      }
      const target = choice.options[index].target;
      this.state.choice = null;
      this.jump(target);
      return;
    }
    if (this.state.map.active) {
      const point = this.state.map.points[index];
      if (!Number.isInteger(index) || point === undefined) {
        throw new VnScriptError("RUNTIME_CHOICE_INDEX", `Map point index ${index} is out of range.`);
      }
      this.state.map.active = false;
      this.jump(point.target);
      return;
    }
    throw new VnScriptError("RUNTIME_NO_PENDING_CHOICE", "No pending choice.");
  }

  submitInput(text?: string): void {
    const input = this.state.input;
    if (!input) {
      throw new VnScriptError("RUNTIME_NO_PENDING_INPUT", "No pending input.");
    }
    const typed = text ?? input.buffer;
    this.state.vars[input.variable] = typed.length > 0 ? typed : input.defaultValue ?? "";
    this.state.input = null;
    this.refreshMeter(input.variable);
  }

  /** Dismisses the current dialogue line or phone message. */
  advance(): boolean {
    if (this.state.phone.awaitingAdvance) {
      this.state.phone.awaitingAdvance = false;
      return true;
    }
    if (this.state.dialogue) {
      this.state.dialogue = null;
      return true;
    }
    return false;
  }

  toggleInventory(): void {
    this.state.inventoryOpen = !this.state.inventoryOpen;
  }

  inventoryPageCount(): number {
    return Math.max(1, Math.ceil(this.state.inventory.size / this.ui.inventoryItemsPerPage));
  }

  scrollInventoryPage(delta: number): number {
    this.state.inventoryPage = clamp(this.state.inventoryPage + delta, 0, this.inventoryPageCount() - 1);
    return this.state.inventoryPage;
  }

  openPauseMenu(): boolean {
    if (this.menu || !this.ui.pauseMenu.enabled) {
      return false;
    }
    this.menu = { kind: "pause", mode: "main", selected: 0 };
    return true;
  }

  executeMenuAction(action: string): void {
    const menu = this.menu;
    if (!menu) {
      return;
    }
    const slot = parseSlotAction(action);
    if (slot !== null) {
      const slotId = `slot_${slot}`;
      if (menu.mode === "save") {
        if (this.saveSlot(slotId) !== null) {
          this.closeMenuAfterSave(menu);
        }
      } else if (this.loadSlot(slotId)) {
        this.menu = null;
      }
      return;
    }
    switch (action) {
      case "new_game":
        this.restart();
        return;
      case "continue":
        if (this.loadQuick()) {
          this.menu = null;
        } else {
          log.info("continue: no usable quick save");
        }
        return;
      case "open_save":
        menu.mode = "save";
        menu.selected = 0;
        return;
      case "open_load":
        menu.mode = "load";
        menu.selected = 0;
        return;
      case "back":
        menu.mode = "main";
        menu.selected = 0;
        return;
      case "resume":
        if (menu.kind === "pause") {
          this.menu = null;
        }
        return;
      case "quit":
        this.quitRequested = true;
        return;
      case "quick_save":
        if (this.saveQuick() !== null) {
          this.closeMenuAfterSave(menu);
        }
        return;
      case "quick_load":
        if (this.loadQuick() || menu.kind === "pause") {
          this.menu = null;
        }
        return;
      default:
        log.warn(`unknown menu action "${action}"`);
    }
  }

  /** Starts over from the entry script with fresh state. */
  restart(): void {
    this.closeVideo();
    this.program = this.entryProgram;
    this.state = createInitialState();
    this.registerCharacters(this.program);
    this.menu = null;
  }

  snapshot(): SaveData {
    return encodeSave(this.state, toProjectRelative(this.projectRoot, this.program.scriptPath), this.nowMs);
  }

  /** Path written, or null when the save could not be written. */
  saveQuick(): string | null {
    return this.saveTo(this.savePath);
  }

  saveSlot(slot: string): string | null {
    return this.saveTo(slotSavePath(this.savePath, slot));
  }

  loadQuick(): boolean {
    return this.loadFrom(this.savePath);
  }

  loadSlot(slot: string): boolean {
    return this.loadFrom(slotSavePath(this.savePath, slot));
  }

  /** Replaces state with a snapshot; returns false and keeps state when it cannot be applied. */
  restoreSave(data: SaveData): boolean {
    const scriptPath = fromProjectRelative(this.projectRoot, data.script_path);
    let program = this.program;
    if (path.resolve(scriptPath) !== path.resolve(program.scriptPath)) {
      try {
        program = this.loader.load(scriptPath);
      } catch (error: unknown) {
        log.warn(`cannot load saved script ${scriptPath}: ${errorMessage(error)}`);
        return false;
      }
    }
    if (data.index > program.commands.length) {
      log.warn(`saved index ${data.index} is past the end of ${program.scriptPath}`);
      return false;
    }
    this.closeVideo();
    this.state = decodeSave(data, this.nowMs);
    this.program = program;
    this.registerCharacters(program);
    if (this.state.music) {
      this.assets.playMusic(this.state.music.path, this.state.music.loop);
    }
    if (this.state.echo) {
      this.assets.playEcho(this.state.echo);
    }
    return true;
  }

  dispose(): void {
    this.closeVideo();
  }

  executeCommand(command: Command): void {
    switch (command.kind) {
      case "label":
        return;
      case "say": {
        const character = command.speaker ? this.state.characters.get(command.speaker) : undefined;
        this.state.dialogue = {
          speaker: command.speaker,
          name: character?.displayName ?? command.speaker,
          color: character?.color,
          text: interpolate(command.text, this.state.vars),
        };
        return;
      }
      case "jump":
        this.jump(command.target);
        return;
      case "choice":
        this.state.choice = {
          prompt: interpolate(command.prompt, this.state.vars),
          options: command.options.map((option) => ({
            text: interpolate(option.text, this.state.vars),
            target: option.target,
          })),
          selected: 0,
          timeoutMs: command.timeout === undefined ? undefined : command.timeout * 1000,
          timeoutDefault: command.timeoutDefault,
          startedMs: this.nowMs,
        };
        return;
      case "scene":
        if (command.sceneKind === "image") {
          this.assets.loadImage(command.value, "bg");
        }
        this.state.background = {
          kind: command.sceneKind,
          value: command.value,
          floatAmp: command.floatAmp,
          floatSpeed: command.floatSpeed,
          transition: this.transitionOf(command),
        };
        this.state.sprites.clear();
        this.state.tracks.clear();
        return;
      case "show":
        this.applyShow(command);
        return;
      case "showChar":
        this.applyShowChar(command);
        return;
      case "hide": {
        const sprite = this.state.sprites.get(command.name);
        if (!sprite) {
          log.warn(`hide: no sprite named "${command.name}"`);
          return;
        }
        const transition = this.transitionOf(command);
        if (transition && transition.seconds > 0) {
          sprite.transition = transition;
          sprite.leaving = true;
        } else {
          this.removeSprite(command.name);
        }
        return;
      }
      case "camera":
        this.state.camera = { panX: command.panX, panY: command.panY, zoom: command.zoom };
        return;
      case "animate":
        this.applyAnimate(command);
        return;
      case "music":
        this.state.music = { channel: command.channel, path: command.path, loop: command.loop };
        this.assets.playMusic(command.path, command.loop);
        return;
      case "sound":
        this.assets.playSound(command.path);
        return;
      case "echo":
        if (command.action === "start" && command.path !== undefined) {
          this.state.echo = command.path;
          this.assets.playEcho(command.path);
        } else {
          this.state.echo = null;
          this.assets.stopEcho();
        }
        return;
      case "voice":
        this.assets.playVoice(this.voicePath(command.character, command.path));
        return;
      case "mute":
        this.assets.mute(command.target);
        if (command.target === "music" || command.target === "all") {
          this.state.music = null;
        }
        if (command.target === "echo" || command.target === "all") {
          this.state.echo = null;
        }
        return;
      case "preload":
        if (AUDIO_KINDS.has(command.assetKind)) {
          this.assets.preloadSound(command.path);
        } else {
          this.assets.preloadImage(command.path, command.assetKind);
        }
        return;
      case "cacheClear":
        this.applyCacheClear(command);
        return;
      case "cachePin":
      case "cacheUnpin":
        this.applyPin(command.kind === "cachePin", command.assetKind, command.path);
        return;
      case "gc":
        this.collectGarbage();
        return;
      case "wait":
        if (command.seconds > 0) {
          this.state.wait = { type: "timer", untilMs: this.nowMs + command.seconds * 1000 };
        }
        return;
      case "waitVoice":
        if (this.assets.isVoicePlaying()) {
          this.state.wait = { type: "voice" };
        }
        return;
      case "waitVideo":
        if (this.state.video) {
          this.state.wait = { type: "video" };
        }
        return;
      case "notify":
        this.state.notification = {
          message: interpolate(command.text, this.state.vars),
          untilMs: this.nowMs + (command.seconds ?? this.ui.notifySeconds) * 1000,
        };
        return;
      case "blend":
        this.state.blend = { style: command.style, seconds: command.seconds, startedMs: this.nowMs };
        return;
      case "save":
        if (command.slot === undefined) {
          this.saveQuick();
        } else {
          this.saveSlot(command.slot);
        }
        return;
      case "load":
        if (command.slot === undefined) {
          this.loadQuick();
        } else {
          this.loadSlot(command.slot);
        }
        return;
      case "setVar": {
        const value = resolveOperand(command.value, this.state.vars);
        if (value === undefined) {
          log.warn(`set ${command.name}: source variable is not defined`);
          return;
        }
        this.state.vars[command.name] = value;
        this.refreshMeter(command.name);
        return;
      }
      case "addVar":
        this.state.vars[command.name] = addToVariable(this.readVar(command.name), command.amount);
        this.refreshMeter(command.name);
        return;
      case "ifJump":
        if (compareValues(this.readVar(command.name), command.op, resolveOperand(command.value, this.state.vars))) {
          this.jump(command.target);
        }
        return;
      case "call": {
        const program = this.loader.load(command.resolvedPath);
        this.program = program;
        this.registerCharacters(program);
        this.state.loading = null;
        this.jump(command.label);
        return;
      }
      case "loading":
        this.state.loading = command.action === "start"
          ? interpolate(command.text ?? "Loading...", this.state.vars)
          : null;
        return;
      case "characterDef":
        this.state.characters.set(command.ident, characterFromDef(command));
        return;
      case "input":
        this.state.input = {
          variable: command.variable,
          prompt: interpolate(command.prompt, this.state.vars),
          defaultValue: command.defaultValue,
          buffer: "",
        };
        return;
      case "phone":
        this.applyPhone(command);
        return;
      case "meter":
        this.applyMeter(command);
        return;
      case "item":
        this.applyItem(command);
        return;
      case "map":
        this.applyMap(command);
        return;
      case "video":
        this.applyVideo(command);
        return;
      case "hotspotAdd":
        this.state.hotspots.set(command.name, {
          name: command.name,
          shape: { type: "rect", rect: [...command.rect] },
          target: command.target,
        });
        return;
      case "hotspotPoly":
        this.state.hotspots.set(command.name, {
          name: command.name,
          shape: { type: "poly", points: command.points.map(clonePoint) },
          target: command.target,
        });
        return;
      case "hotspotRemove":
        if (command.name === null) {
          this.state.hotspots.clear();
        } else {
          this.state.hotspots.delete(command.name);
        }
        return;
      case "hotspotDebug":
        this.state.hotspotDebug = command.enabled;
        return;
      case "hudAdd":
        if (!this.features.hud) {
          log.debug(`hud disabled; ignoring button "${command.name}"`);
          return;
        }
        this.state.hud.set(command.name, {
          name: command.name,
          style: command.style,
          text: command.text,
          icon: command.icon,
          rect: [...command.rect],
          target: command.target,
        });
        return;
      case "hudRemove":
        if (command.name === null) {
          this.state.hud.clear();
        } else {
          this.state.hud.delete(command.name);
        }
        return;
      default: {
        const exhaustive: never = command;
        throw new VnScriptError("RUNTIME_UNKNOWN_COMMAND", `Unhandled command ${JSON.stringify(exhaustive)}.`);
      }
    }
  }

  private overlayActive(): boolean {
    return (
      this.menu !== null ||
      this.state.map.active ||
      this.state.choice !== null ||
      this.state.input !== null ||
      this.state.phone.awaitingAdvance
    );
  }

  private handleEvent(event: InputEvent): void {
    if (this.menu) {
      this.handleMenuEvent(this.menu, event);
      return;
    }
    if (this.state.map.active) {
      this.handleMapEvent(event);
      return;
    }
    if (this.state.choice) {
      this.handleChoiceEvent(event);
      return;
    }
    if (this.state.input) {
      this.handleInputEvent(event);
      return;
    }
    if (this.state.phone.awaitingAdvance) {
      if (event.type === "click" || (event.type === "key" && (event.key === "advance" || event.key === "confirm"))) {
        this.state.phone.awaitingAdvance = false;
      }
      return;
    }
    if (event.type === "click") {
      this.handleClick([event.x, event.y]);
      return;
    }
    if (event.type !== "key") {
      return;
    }
    switch (event.key) {
      case "menu":
        this.openPauseMenu();
        return;
      case "quicksave":
        this.saveQuick();
        return;
      case "quickload":
        this.loadQuick();
        return;
      case "inventory":
        if (this.features.items) {
          this.toggleInventory();
        }
        return;
      case "pageUp":
        this.scrollInventoryPage(-1);
        return;
      case "pageDown":
        this.scrollInventoryPage(1);
        return;
      case "back":
        this.state.inventoryOpen = false;
        return;
      case "advance":
      case "confirm":
        this.state.dialogue = null;
        return;
      default:
        return;
    }
  }

  private handleMenuEvent(menu: MenuState, event: InputEvent): void {
    if (event.type === "choose") {
      const entry = menuEntries(menu, this.ui)[event.index];
      if (entry) {
        menu.selected = event.index;
        this.executeMenuAction(entry.action);
      }
      return;
    }
    if (event.type !== "key") {
      return;
    }
    if (event.key === "up" || event.key === "down") {
      moveSelection(menu, this.ui, event.key === "up" ? -1 : 1);
    } else if (event.key === "confirm") {
      const entry = menuEntries(menu, this.ui)[menu.selected];
      if (entry) {
        this.executeMenuAction(entry.action);
      }
    } else if (event.key === "back" || event.key === "menu") {
      if (menu.mode !== "main") {
        this.executeMenuAction("back");
      } else if (menu.kind === "pause") {
        this.menu = null;
      }
    }
  }

  private handleMapEvent(event: InputEvent): void {
    if (event.type === "key" && event.key === "back") {
      this.state.map.active = false;
      return;
    }
    if (event.type === "choose") {
      if (this.state.map.points[event.index]) {
        this.choose(event.index);
      }
      return;
    }
    if (event.type !== "click") {
      return;
    }
    const click: Point = [event.x, event.y];
    for (const point of this.state.map.points) {
      const hit = point.points.length >= 3
        ? pointInPolygon(click, point.points)
        : distance(click, point.pos) <= this.ui.mapPointRadius;
      if (hit) {
        this.state.map.active = false;
        this.jump(point.target);
        return;
      }
    }
  }

  private handleChoiceEvent(event: InputEvent): void {
    const choice = this.state.choice;
    if (!choice) {
      return;
    }
    if (event.type === "choose") {
      if (Number.isInteger(event.index) && event.index >= 0 && event.index < choice.options.length) {
        this.choose(event.index);
      } else {
        log.warn(`ignoring out-of-range choice ${event.index}`);
      }
      return;
    }
    if (event.type !== "key") {
      return;
    }
    const count = choice.options.length;
    if (event.key === "up") {
      choice.selected = (choice.selected - 1 + count) % count;
    } else if (event.key === "down") {
      choice.selected = (choice.selected + 1) % count;
    } else if (event.key === "confirm") {
      this.choose(choice.selected);
    }
  }

  private handleInputEvent(event: InputEvent): void {
    const input = this.state.input;
    if (!input) {
      return;
    }
    if (event.type === "text") {
      input.buffer += event.text;
    } else if (event.type === "key" && event.key === "backspace") {
      input.buffer = input.buffer.slice(0, -1);
    } else if (event.type === "key" && event.key === "confirm") {
      this.submitInput();
    }
  }

  private handleClick(point: Point): void {
    if (this.features.hud) {
      for (const button of this.state.hud.values()) {
        if (pointInRect(point, button.rect)) {
          this.followTarget(button.target);
          return;
        }
      }
    }
    if (this.state.dialogue) {
      this.state.dialogue = null;
      return;
    }
    const world = screenToWorld(point, this.state.camera, this.screen);
    for (const hotspot of this.state.hotspots.values()) {
      const hit = hotspot.shape.type === "rect"
        ? pointInRect(world, hotspot.shape.rect)
        : pointInPolygon(world, hotspot.shape.points);
      if (hit) {
        this.followTarget(hotspot.target);
        return;
      }
    }
  }

  /** Jump taken from a click; interrupts the current line and timer. */
  private followTarget(target: string): void {
    if (stripRoot(target) !== INVENTORY_TOGGLE) {
      this.state.dialogue = null;
      this.state.wait = null;
    }
    this.jump(target);
  }

  private checkChoiceTimeout(): void {
    const choice = this.state.choice;
    if (!choice || choice.timeoutMs === undefined || this.menu) {
      return;
    }
    if (this.nowMs - choice.startedMs < choice.timeoutMs) {
      return;
    }
    const index = clamp((choice.timeoutDefault ?? 1) - 1, 0, choice.options.length - 1);
    log.debug(`choice timed out; taking option ${index + 1}`);
    this.choose(index);
  }

  private advanceClocks(): void {
    const now = this.nowMs;
    const wait = this.state.wait;
    if (wait?.type === "timer" && now >= wait.untilMs) {
      this.state.wait = null;
    } else if (wait?.type === "voice" && !this.assets.isVoicePlaying()) {
      this.state.wait = null;
    }
    if (this.state.notification && now >= this.state.notification.untilMs) {
      this.state.notification = null;
    }
    if (this.state.blend && now >= this.state.blend.startedMs + this.state.blend.seconds * 1000) {
      this.state.blend = null;
    }
    for (const sprite of [...this.state.sprites.values()]) {
      const transition = sprite.transition;
      if (sprite.leaving && transition && now >= transition.startedMs + transition.seconds * 1000) {
        this.removeSprite(sprite.id);
      }
    }
    this.advanceAnimations();
    this.updateVideo();
    if (this.state.wait?.type === "video" && !this.state.video) {
      this.state.wait = null;
    }
  }

  private advanceAnimations(): void {
    for (const [id, entry] of this.state.tracks) {
      const sprite = this.state.sprites.get(id);
      if (!sprite) {
        this.state.tracks.delete(id);
        continue;
      }
      for (const action of ANIMATION_ACTIONS) {
        const track = entry[action];
        if (!track) {
          continue;
        }
        const sample = sampleTrack(track, this.nowMs);
        this.applyTrackValues(sprite, action, sample.values);
        if (sample.done) {
          delete entry[action];
        }
      }
      if (ANIMATION_ACTIONS.every((action) => entry[action] === undefined)) {
        this.state.tracks.delete(id);
      }
    }
  }

  private applyTrackValues(sprite: SpriteState, action: AnimationAction, values: readonly number[]): void {
    if (action === "alpha") {
      sprite.alpha = clamp(values[0] ?? sprite.alpha, 0, 255);
    } else if (action === "move") {
      sprite.pos = [values[0] ?? sprite.pos[0], values[1] ?? sprite.pos[1]];
    } else {
      const current = sprite.size ?? [0, 0];
      sprite.size = [values[0] ?? current[0], values[1] ?? current[1]];
    }
  }

  private transitionOf(fields: TransitionFields): TransitionState | undefined {
    const seconds = fields.transitionSeconds ?? fields.fade;
    if (seconds === undefined) {
      return undefined;
    }
    return { style: fields.transitionStyle ?? "fade", seconds, startedMs: this.nowMs };
  }

  private readVar(name: string): VarValue | undefined {
    return Object.hasOwn(this.state.vars, name) ? this.state.vars[name] : undefined;
  }

  private removeSprite(id: string): void {
    this.state.sprites.delete(id);
    this.state.tracks.delete(id);
  }

  private registerCharacters(program: Program): void {
    for (const command of program.commands) {
      if (command.kind === "characterDef" && !this.state.characters.has(command.ident)) {
        this.state.characters.set(command.ident, characterFromDef(command));
      }
    }
  }

  private placeSprite(
    sprite: Omit<SpriteState, "pos" | "alpha">,
    pos: Point | undefined,
    existing: SpriteState | undefined
  ): void {
    let placed: [number, number];
    if (pos) {
      placed = clonePoint(pos);
    } else if (sprite.anchor !== undefined || !existing) {
      placed = anchorPosition(sprite.anchor, sprite.size ?? [0, 0], this.screen);
    } else {
      placed = existing.pos;
    }
    this.state.sprites.set(sprite.id, { ...sprite, pos: placed, alpha: existing?.alpha ?? 255 });
  }

  private applyShow(command: ShowCommand): void {
    const existing = this.state.sprites.get(command.name);
    let size = command.size ? clonePoint(command.size) : undefined;
    if (command.spriteKind === "image") {
      const surface = this.assets.loadImage(command.value, "sprites");
      size = size ?? (surface ? [surface.width, surface.height] : existing?.size);
    } else {
      size = size ?? existing?.size ?? [0, 0];
      this.assets.makeRectSurface(command.value, size);
    }
    this.placeSprite(
      {
        id: command.name,
        kind: command.spriteKind,
        value: command.value,
        anchor: command.anchor ?? existing?.anchor,
        z: command.z ?? existing?.z ?? 0,
        size,
        floatAmp: command.floatAmp ?? existing?.floatAmp,
        floatSpeed: command.floatSpeed ?? existing?.floatSpeed,
        transition: this.transitionOf(command),
      },
      command.pos,
      existing
    );
  }

  private applyShowChar(command: ShowCharCommand): void {
    const character = this.state.characters.get(command.ident);
    if (!character) {
      log.warn(`show: unknown character "${command.ident}"`);
      return;
    }
    const spritePath = spriteForExpression(character, command.expression);
    if (spritePath === undefined) {
      log.warn(`show: character "${command.ident}" has no sprite for "${command.expression ?? "default"}"`);
      return;
    }
    const existing = this.state.sprites.get(command.ident);
    const surface = this.assets.loadImage(spritePath, "sprites");
    this.placeSprite(
      {
        id: command.ident,
        kind: "char",
        value: spritePath,
        anchor: command.anchor ?? character.anchor,
        z: command.z ?? character.z ?? existing?.z ?? 0,
        size: surface ? [surface.width, surface.height] : existing?.size,
        floatAmp: command.floatAmp ?? character.floatAmp,
        floatSpeed: command.floatSpeed ?? character.floatSpeed,
        transition: this.transitionOf(command),
      },
      command.pos ?? character.pos,
      existing
    );
  }

  private applyAnimate(command: AnimateCommand): void {
    if (command.action === "stop") {
      if (command.name === undefined) {
        this.state.tracks.clear();
      } else {
        this.state.tracks.delete(command.name);
      }
      return;
    }
    const sprite = this.state.sprites.get(command.name);
    if (!sprite) {
      log.warn(`animate: no sprite named "${command.name}"`);
      return;
    }
    let from: number[];
    let to: number[];
    if (command.action === "alpha") {
      from = [sprite.alpha];
      to = [command.to];
    } else {
      const current = command.action === "move" ? sprite.pos : sprite.size ?? [0, 0];
      from = [current[0], current[1]];
      to = [command.to[0], command.to[1]];
    }
    const track: AnimationTrack = {
      action: command.action,
      startMs: this.nowMs,
      durationMs: command.seconds * 1000,
      ease: command.ease,
      from,
      to,
    };
    const entry = this.state.tracks.get(command.name) ?? {};
    if (track.durationMs <= 0) {
      delete entry[command.action];
      this.applyTrackValues(sprite, command.action, to);
    } else {
      entry[command.action] = track;
    }
    this.state.tracks.set(command.name, entry);
  }

  /** Characters with a voice tag read voices from their tag folder unless the path is explicit. */
  private voicePath(characterId: string | undefined, voicePath: string): string {
    const tag = characterId ? this.state.characters.get(characterId)?.voiceTag : undefined;
    if (!tag || voicePath.startsWith(".") || voicePath.startsWith("/") || path.isAbsolute(voicePath)) {
      return voicePath;
    }
    return `${tag}/${voicePath}`;
  }

  private applyPin(pin: boolean, assetKind: string, assetPath: string): void {
    if (AUDIO_KINDS.has(assetKind)) {
      if (pin) {
        this.assets.pinSound(assetPath);
      } else {
        this.assets.unpinSound(assetPath);
      }
    } else if (pin) {
      this.assets.pinImage(assetPath, assetKind);
    } else {
      this.assets.unpinImage(assetPath, assetKind);
    }
  }

  private applyCacheClear(command: CacheClearCommand): void {
    switch (command.target) {
      case "images":
        this.assets.clearImages();
        return;
      case "scripts":
        this.loader.clear();
        return;
      case "script": {
        const target = path.resolve(path.dirname(this.program.scriptPath), command.path ?? "");
        this.loader.evict(target);
        if (target === path.resolve(this.program.scriptPath)) {
          this.state.sprites.clear();
          this.state.tracks.clear();
          this.state.dialogue = null;
        }
        return;
      }
      case "runtime":
        this.loader.clear();
        this.state.sprites.clear();
        this.state.tracks.clear();
        this.state.hotspots.clear();
        this.closeVideo();
        this.state.dialogue = null;
        this.state.notification = null;
        this.state.wait = null;
        this.state.camera = identityCamera();
        this.state.background = defaultBackground();
        return;
    }
  }

  private collectGarbage(): void {
    const images = new Set<string>();
    if (this.state.background.kind === "image") {
      images.add(this.assets.resolvePath(this.state.background.value, "bg"));
    }
    for (const sprite of this.state.sprites.values()) {
      if (sprite.kind !== "rect") {
        images.add(this.assets.resolvePath(sprite.value, "sprites"));
      }
    }
    const sounds = new Set<string>();
    if (this.state.music) {
      sounds.add(this.assets.resolvePath(this.state.music.path, "music"));
    }
    if (this.state.echo) {
      sounds.add(this.assets.resolvePath(this.state.echo, "sfx"));
    }
    this.assets.pruneImages(images);
    this.assets.pruneSounds(sounds);
  }

  private applyPhone(command: PhoneCommand): void {
    if (command.action === "open") {
      this.state.phone = { ...emptyPhone(), active: true, contact: command.contact };
    } else if (command.action === "msg") {
      if (!this.state.phone.active) {
        log.warn("phone msg with no open conversation");
      }
      this.state.phone.messages.push({ side: command.side, text: interpolate(command.text, this.state.vars) });
      this.state.phone.awaitingAdvance = true;
    } else {
      this.state.phone = emptyPhone();
    }
  }

  private meterValue(variable: string, min: number, max: number): number {
    return clamp(coerceNumber(this.readVar(variable)) ?? min, min, max);
  }

  private refreshMeter(variable: string): void {
    const meter = this.state.meters.get(variable);
    if (meter) {
      meter.value = this.meterValue(variable, meter.min, meter.max);
    }
  }

  private applyMeter(command: MeterCommand): void {
    switch (command.action) {
      case "show":
        this.state.meters.set(command.variable, {
          label: command.label,
          min: command.min,
          max: command.max,
          color: command.color,
          value: this.meterValue(command.variable, command.min, command.max),
        });
        return;
      case "update":
        this.refreshMeter(command.variable);
        return;
      case "hide":
        this.state.meters.delete(command.variable);
        return;
      case "clear":
        this.state.meters.clear();
        return;
    }
  }

  private applyItem(command: ItemCommand): void {
    const inventory = this.state.inventory;
    if (command.action === "add") {
      const existing = inventory.get(command.id);
      if (existing) {
        existing.count += command.amount;
      } else {
        inventory.set(command.id, {
          name: command.name,
          description: command.description,
          icon: command.icon,
          count: command.amount,
        });
      }
    } else if (command.action === "remove") {
      const existing = inventory.get(command.id);
      if (existing) {
        existing.count -= command.amount;
        if (existing.count <= 0) {
          inventory.delete(command.id);
        }
      }
    } else {
      inventory.clear();
    }
    this.scrollInventoryPage(0);
  }

  private applyMap(command: MapCommand): void {
    if (command.action === "hide") {
      this.state.map.active = false;
      return;
    }
    if (command.action === "poi") {
      this.state.map.points.push({
        label: command.label,
        target: command.target,
        pos: clonePoint(command.pos),
        points: (command.points ?? []).map(clonePoint),
      });
      return;
    }
    this.state.map = { active: true, image: command.image, points: [] };
    let next = this.program.commands[this.state.index];
    while (next && next.kind === "map" && next.action === "poi") {
      this.applyMap(next);
      this.state.index += 1;
      next = this.program.commands[this.state.index];
    }
  }

  private applyVideo(command: VideoCommand): void {
    this.closeVideo();
    if (command.action === "stop") {
      return;
    }
    if (!this.videoBackend) {
      log.warn(`no video backend; skipping ${command.path}`);
      return;
    }
    const playback = this.videoBackend.createPlayback(this.assets.resolvePath(command.path, "video"), command.loop);
    const first = playback.update(this.nowMs);
    this.state.video = { path: command.path, loop: command.loop, fit: command.fit, playback, frame: first.frame };
    if (first.finished && !command.loop) {
      this.closeVideo();
    }
  }

  private updateVideo(): void {
    const video = this.state.video;
    if (!video) {
      return;
    }
    const next = video.playback.update(this.nowMs);
    video.frame = next.frame ?? video.frame;
    if (next.finished && !video.loop) {
      this.closeVideo();
    }
  }

  private closeVideo(): void {
    if (this.state.video) {
      this.state.video.playback.close();
      this.state.video = null;
    }
  }

  private closeMenuAfterSave(menu: MenuState): void {
    if (menu.kind === "pause") {
      this.menu = null;
    } else {
      menu.mode = "main";
      menu.selected = 0;
    }
  }

  private saveTo(filePath: string): string | null {
    if (!writeSaveAtomic(filePath, this.snapshot())) {
      return null;
    }
    log.info(`saved ${filePath}`);
    return filePath;
  }

  private loadFrom(filePath: string): boolean {
    const data = readSave(filePath);
    if (!data) {
      return false;
    }
    return this.restoreSave(data);
  }
}
