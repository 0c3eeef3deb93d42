export interface SourcePosition {
  line: number;
  column: number;
}

export interface SourceSpan {
  start: SourcePosition;
  end: SourcePosition;
}

export type VarValue = number | string | boolean;

export type VarOperand =
  | { type: "literal"; value: VarValue }
  | { type: "ref"; name: string };

export type CompareOp = "==" | "!=" | ">" | ">=" | "<" | "<=";

export type TransitionStyle =
  | "fade"
  | "wipe"
  | "slide"
  | "dissolve"
  | "zoom"
  | "blur"
  | "flash"
  | "shake"
  | "none";

export type EaseKind = "linear" | "in" | "out" | "inout";

export type VideoFit = "contain" | "cover" | "stretch";

export type Point = readonly [number, number];

export interface TransitionFields {
  readonly fade?: number;
  readonly transitionStyle?: TransitionStyle;
  readonly transitionSeconds?: number;
}

export interface FloatFields {
  readonly floatAmp?: number;
  readonly floatSpeed?: number;
}

export interface LabelCommand {
  readonly kind: "label";
  readonly name: string;
}

export interface SayCommand {
  readonly kind: "say";
  readonly speaker?: string;
  readonly text: string;
}

export interface JumpCommand {
  readonly kind: "jump";
  readonly target: string;
}

export interface ChoiceOption {
  readonly text: string;
  readonly target: string;
}

export interface ChoiceCommand {
  readonly kind: "choice";
  readonly prompt: string;
  readonly options: readonly ChoiceOption[];
  readonly timeout?: number;
  /** 1-based option number picked when the timeout elapses. */
  readonly timeoutDefault?: number;
}

export interface SceneCommand extends TransitionFields, FloatFields {
  readonly kind: "scene";
  readonly sceneKind: "color" | "image";
  readonly value: string;
}

export interface ShowCommand extends TransitionFields, FloatFields {
  readonly kind: "show";
  readonly spriteKind: "image" | "rect";
  readonly name: string;
  readonly value: string;
  readonly size?: Point;
  readonly pos?: Point;
  readonly anchor?: string;
  readonly z?: number;
}

export interface ShowCharCommand extends TransitionFields, FloatFields {
  readonly kind: "showChar";
  readonly ident: string;
  readonly expression?: string;
  readonly pos?: Point;
  readonly anchor?: string;
  readonly z?: number;
}

export interface HideCommand extends TransitionFields {
  readonly kind: "hide";
  readonly name: string;
}

export interface CameraCommand {
  readonly kind: "camera";
  readonly panX: number;
  readonly panY: number;
  readonly zoom: number;
}

export type AnimateCommand =
  | {
      readonly kind: "animate";
      readonly action: "move" | "size";
      readonly name: string;
      readonly to: Point;
      readonly seconds: number;
      readonly ease: EaseKind;
    }
  | {
      readonly kind: "animate";
      readonly action: "alpha";
      readonly name: string;
      readonly to: number;
      readonly seconds: number;
      readonly ease: EaseKind;
    }
  | {
      readonly kind: "animate";
      readonly action: "stop";
      readonly name?: string;
    };

export interface MusicCommand {
  readonly kind: "music";
  readonly channel: string;
  readonly path: string;
  readonly loop: boolean;
}

export interface SoundCommand {
  readonly kind: "sound";
  readonly channel?: string;
  readonly path: string;
}

export interface EchoCommand {
  readonly kind: "echo";
  readonly action: "start" | "stop";
  readonly path?: string;
}

export interface VoiceCommand {
  readonly kind: "voice";
  readonly character?: string;
  readonly path: string;
}

export interface MuteCommand {
  readonly kind: "mute";
  readonly target: string;
}

export interface PreloadCommand {
  readonly kind: "preload";
  readonly assetKind: string;
  readonly path: string;
}

export interface CacheClearCommand {
  readonly kind: "cacheClear";
  readonly target: "images" | "scripts" | "runtime" | "script";
  readonly path?: string;
}

export interface CachePinCommand {
  readonly kind: "cachePin" | "cacheUnpin";
  readonly assetKind: string;
  readonly path: string;
}

export interface GcCommand {
  readonly kind: "gc";
}

export interface WaitCommand {
  readonly kind: "wait";
  readonly seconds: number;
}

export interface WaitVoiceCommand {
  readonly kind: "waitVoice";
}

export interface WaitVideoCommand {
  readonly kind: "waitVideo";
}

export interface NotifyCommand {
  readonly kind: "notify";
  readonly text: string;
  readonly seconds?: number;
}

export interface BlendCommand {
  readonly kind: "blend";
  readonly style: TransitionStyle;
  readonly seconds: number;
}

export interface SaveCommand {
  readonly kind: "save" | "load";
  readonly slot?: string;
}

export interface SetVarCommand {
  readonly kind: "setVar";
  readonly name: string;
  readonly value: VarOperand;
}

export interface AddVarCommand {
  readonly kind: "addVar";
  readonly name: string;
  readonly amount: number;
}

export interface IfJumpCommand {
  readonly kind: "ifJump";
  readonly name: string;
  readonly op: CompareOp;
  readonly value: VarOperand;
  readonly target: string;
}

export interface CallCommand {
  readonly kind: "call";
  /** Path as written, relative to the calling script. */
  readonly path: string;
  readonly resolvedPath: string;
  readonly label: string;
}

export interface LoadingCommand {
  readonly kind: "loading";
  readonly action: "start" | "end";
  readonly text?: string;
}

export interface CharacterDefCommand extends FloatFields {
  readonly kind: "characterDef";
  readonly ident: string;
  readonly displayName?: string;
  readonly color?: string;
  readonly voiceTag?: string;
  readonly pos?: Point;
  readonly anchor?: string;
  readonly z?: number;
  readonly sprites: Readonly<Record<string, string>>;
}

export interface InputCommand {
  readonly kind: "input";
  readonly variable: string;
  readonly prompt: string;
  readonly defaultValue?: string;
}

export type PhoneCommand =
  | { readonly kind: "phone"; readonly action: "open"; readonly contact: string }
  | {
      readonly kind: "phone";
      readonly action: "msg";
      readonly side: "left" | "right";
      readonly text: string;
    }
  | { readonly kind: "phone"; readonly action: "close" };

export type MeterCommand =
  | {
      readonly kind: "meter";
      readonly action: "show";
      readonly variable: string;
      readonly label: string;
      readonly min: number;
      readonly max: number;
      readonly color?: string;
    }
  | { readonly kind: "meter"; readonly action: "hide" | "update"; readonly variable: string }
  | { readonly kind: "meter"; readonly action: "clear" };

export type ItemCommand =
  | {
      readonly kind: "item";
      readonly action: "add";
      readonly id: string;
      readonly name: string;
      readonly description: string;
      readonly icon?: string;
      readonly amount: number;
    }
  | { readonly kind: "item"; readonly action: "remove"; readonly id: string; readonly amount: number }
  | { readonly kind: "item"; readonly action: "clear" };

export type MapCommand =
  | { readonly kind: "map"; readonly action: "show"; readonly image: string }
  | {
      readonly kind: "map";
      readonly action: "poi";
      readonly label: string;
      readonly pos: Point;
      readonly points?: readonly Point[];
      readonly target: string;
    }
  | { readonly kind: "map"; readonly action: "hide" };

export type VideoCommand =
  | {
      readonly kind: "video";
      readonly action: "play";
      readonly path: string;
      readonly loop: boolean;
      readonly fit: VideoFit;
    }
  | { readonly kind: "video"; readonly action: "stop" };

export interface HotspotAddCommand {
  readonly kind: "hotspotAdd";
  readonly name: string;
  readonly rect: readonly [number, number, number, number];
  readonly target: string;
}

export interface HotspotPolyCommand {
  readonly kind: "hotspotPoly";
  readonly name: string;
  readonly points: readonly Point[];
  readonly target: string;
}

export interface HotspotRemoveCommand {
  readonly kind: "hotspotRemove";
  /** null clears every hotspot. */
  readonly name: string | null;
}

export interface HotspotDebugCommand {
  readonly kind: "hotspotDebug";
  readonly enabled: boolean;
}

export type HudStyle = "text" | "icon" | "both";

export interface HudAddCommand {
  readonly kind: "hudAdd";
  readonly name: string;
  readonly style: HudStyle;
  readonly text?: string;
  readonly icon?: string;
  readonly rect: readonly [number, number, number, number];
  readonly target: string;
}

export interface HudRemoveCommand {
  readonly kind: "hudRemove";
  /** null clears every button. */
  readonly name: string | null;
}

export type Command =
  | LabelCommand
  | SayCommand
  | JumpCommand
  | ChoiceCommand
  | SceneCommand
  | ShowCommand
  | ShowCharCommand
  | HideCommand
  | CameraCommand
  | AnimateCommand
  | MusicCommand
  | SoundCommand
  | EchoCommand
  | VoiceCommand
  | MuteCommand
  | PreloadCommand
  | CacheClearCommand
  | CachePinCommand
  | GcCommand
  | WaitCommand
  | WaitVoiceCommand
  | WaitVideoCommand
  | NotifyCommand
  | BlendCommand
  | SaveCommand
  | SetVarCommand
  | AddVarCommand
  | IfJumpCommand
  | CallCommand
  | LoadingCommand
  | CharacterDefCommand
  | InputCommand
  | PhoneCommand
  | MeterCommand
  | ItemCommand
  | MapCommand
  | VideoCommand
  | HotspotAddCommand
  | HotspotPolyCommand
  | HotspotRemoveCommand
  | HotspotDebugCommand
  | HudAddCommand
  | HudRemoveCommand;

export type CommandKind = Command["kind"];

export interface Program {
  /** Absolute path of the root script, or a virtual name for in-memory sources. */
  readonly scriptPath: string;
  readonly commands: readonly Command[];
  readonly labels: Readonly<Record<string, number>>;
}
