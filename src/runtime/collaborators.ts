/** Opaque drawable handle produced by an asset manager. */
export interface Surface {
  readonly width: number;
  readonly height: number;
}

export interface AssetManager {
  loadImage(assetPath: string, kind: string): Surface | null;
  resolvePath(assetPath: string, kind: string): string;
  makeColorSurface(color: string, size: readonly [number, number]): Surface;
  makeRectSurface(color: string, size: readonly [number, number]): Surface;
  playSound(assetPath: string): void;
  playMusic(assetPath: string, loop: boolean): void;
  playEcho(assetPath: string): void;
  stopEcho(): void;
  playVoice(assetPath: string): void;
  isVoicePlaying(): boolean;
  mute(target: string): void;
  clearImages(): void;
  clearSounds(): void;
  clearAll(): void;
  pruneImages(keep: ReadonlySet<string>): void;
  pruneSounds(keep: ReadonlySet<string>): void;
  pinImage(assetPath: string, kind: string): void;
  unpinImage(assetPath: string, kind: string): void;
  pinSound(assetPath: string): void;
  unpinSound(assetPath: string): void;
  preloadImage(assetPath: string, kind: string): void;
  preloadSound(assetPath: string): void;
}

export interface VideoFrame {
  frame: Surface | null;
  finished: boolean;
}

export interface VideoPlayback {
  update(nowMs: number): VideoFrame;
  close(): void;
}

export interface VideoBackend {
  createPlayback(videoPath: string, loop: boolean): VideoPlayback;
}

export type AssetCall = { method: keyof AssetManager; args: unknown[] };

/**
 * Surface-free asset manager for headless runs. It records every call so
 * callers can inspect what the runtime asked for.
 */
export class NullAssetManager implements AssetManager {
  readonly calls: AssetCall[] = [];
  voicePlaying = false;

  constructor(private readonly assetRoot = ".") {}

  private record(method: keyof AssetManager, ...args: unknown[]): void {
    this.calls.push({ method, args });
  }

  callsTo(method: keyof AssetManager): unknown[][] {
    return this.calls.filter((call) => call.method === method).map((call) => call.args);
  }

  loadImage(assetPath: string, kind: string): Surface | null {
    this.record("loadImage", assetPath, kind);
    return { width: 0, height: 0 };
  }

  resolvePath(assetPath: string, kind: string): string {
    return `${this.assetRoot}/${kind}/${assetPath}`;
  }

  makeColorSurface(color: string, size: readonly [number, number]): Surface {
    this.record("makeColorSurface", color, size);
    return { width: size[0], height: size[1] };
  }

  makeRectSurface(color: string, size: readonly [number, number]): Surface {
    this.record("makeRectSurface", color, size);
    return { width: size[0], height: size[1] };
  }

  playSound(assetPath: string): void {
    this.record("playSound", assetPath);
  }

  playMusic(assetPath: string, loop: boolean): void {
    this.record("playMusic", assetPath, loop);
  }

  playEcho(assetPath: string): void {
    this.record("playEcho", assetPath);
  }

  stopEcho(): void {
    this.record("stopEcho");
  }

  playVoice(assetPath: string): void {
    this.record("playVoice", assetPath);
  }

  isVoicePlaying(): boolean {
    return this.voicePlaying;
  }

  mute(target: string): void {
    this.record("mute", target);
  }

  clearImages(): void {
    this.record("clearImages");
  }

  clearSounds(): void {
    this.record("clearSounds");
  }

  clearAll(): void {
    this.record("clearAll");
  }

  pruneImages(keep: ReadonlySet<string>): void {
    this.record("pruneImages", [...keep].sort());
  }

  pruneSounds(keep: ReadonlySet<string>): void {
    this.record("pruneSounds", [...keep].sort());
  }

  pinImage(assetPath: string, kind: string): void {
    this.record("pinImage", assetPath, kind);
  }

  unpinImage(assetPath: string, kind: string): void {
    this.record("unpinImage", assetPath, kind);
  }

  pinSound(assetPath: string): void {
    this.record("pinSound", assetPath);
  }

  unpinSound(assetPath: string): void {
    this.record("unpinSound", assetPath);
  }

  preloadImage(assetPath: string, kind: string): void {
    this.record("preloadImage", assetPath, kind);
  }

  preloadSound(assetPath: string): void {
    this.record("preloadSound", assetPath);
  }
}
