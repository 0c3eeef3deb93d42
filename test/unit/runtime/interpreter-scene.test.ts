import assert from "node:assert/strict";
import { afterAll, test } from "vitest";

import type { VideoBackend, VideoPlayback } from "../../../src/runtime/collaborators.js";
import { captureLogs, click, key, makeRuntime } from "../../helpers/runtime.js";

const logs = captureLogs();
afterAll(() => {
  logs.restore();
});

class FakePlayback implements VideoPlayback {
  updates = 0;
  closed = false;

  constructor(private readonly frames: number) {}

  update(): { frame: { width: number; height: number }; finished: boolean } {
    this.updates += 1;
    return { frame: { width: 320, height: 180 }, finished: this.updates >= this.frames };
  }

  close(): void {
    this.closed = true;
  }
}

class FakeVideoBackend implements VideoBackend {
  readonly opened: Array<{ path: string; loop: boolean; playback: FakePlayback }> = [];

  constructor(private readonly frames: number) {}

  createPlayback(videoPath: string, loop: boolean): VideoPlayback {
    const playback = new FakePlayback(this.frames);
    this.opened.push({ path: videoPath, loop, playback });
    return playback;
  }
}

test("rects and images are placed by position, size and anchor", () => {
  const { runtime, assets } = makeRuntime(
    'add rect box #ff0000 100 50 pos 10 20 z 2;\nshow image logo "logo.png" right top;\nwait 1;'
  );
  runtime.frame([], 0);
  const box = runtime.state.sprites.get("box");
  assert.equal(box?.kind, "rect");
  assert.deepEqual(box?.pos, [10, 20]);
  assert.deepEqual(box?.size, [100, 50]);
  assert.equal(box?.z, 2);
  assert.equal(box?.alpha, 255);
  const logo = runtime.state.sprites.get("logo");
  assert.equal(logo?.kind, "image");
  assert.deepEqual(logo?.pos, [1280, 0]);
  assert.deepEqual(assets.callsTo("makeRectSurface"), [["#ff0000", [100, 50]]]);
  assert.deepEqual(assets.callsTo("loadImage"), [["logo.png", "sprites"]]);
});

test("showing an existing sprite again keeps its position and z", () => {
  const { runtime } = makeRuntime("add rect box #fff 10 10 pos 5 6 z 3;\nadd rect box #000 20 20;\nwait 1;");
  runtime.frame([], 0);
  const box = runtime.state.sprites.get("box");
  assert.equal(box?.value, "#000");
  assert.deepEqual(box?.pos, [5, 6]);
  assert.deepEqual(box?.size, [20, 20]);
  assert.equal(box?.z, 3);
});

test("scene replaces the background and clears sprites", () => {
  const { runtime, assets } = makeRuntime(
    'add rect box #fff 1 1;\nscene image "room.png" fade 0.5 float 2 1;\nwait 1;'
  );
  runtime.frame([], 250);
  assert.equal(runtime.state.sprites.size, 0);
  assert.deepEqual(runtime.state.background, {
    kind: "image",
    value: "room.png",
    floatAmp: 2,
    floatSpeed: 1,
    transition: { style: "fade", seconds: 0.5, startedMs: 250 },
  });
  assert.deepEqual(assets.callsTo("loadImage"), [["room.png", "bg"]]);
});

test("characters show the sprite for an expression, falling back to default", () => {
  const { runtime, assets } = makeRuntime(`
character ava { name "Ava"; pos 300 400; z 5; sprite default "ava/n.png"; sprite happy "ava/h.png"; }
show ava happy;
wait 1;
show ava grumpy;
show bob;
wait 1;
`);
  runtime.frame([], 0);
  const ava = runtime.state.sprites.get("ava");
  assert.equal(ava?.kind, "char");
  assert.equal(ava?.value, "ava/h.png");
  assert.deepEqual(ava?.pos, [300, 400]);
  assert.equal(ava?.z, 5);
  runtime.frame([], 1000);
  assert.equal(runtime.state.sprites.get("ava")?.value, "ava/n.png");
  assert.equal(runtime.state.sprites.has("bob"), false);
  assert.deepEqual(assets.callsTo("loadImage"), [
    ["ava/h.png", "sprites"],
    ["ava/n.png", "sprites"],
  ]);
  assert.deepEqual(logs.records[logs.records.length - 1], {
    level: "warn",
    scope: "runtime",
    message: 'show: unknown character "bob"',
  });
});

test("hide with a transition keeps the sprite until it finishes", () => {
  const { runtime } = makeRuntime('add rect box #fff 10 10;\noff box fade 1;\nwait 2;\noff ghost;\n"done";');
  runtime.frame([], 0);
  assert.equal(runtime.state.sprites.get("box")?.leaving, true);
  runtime.frame([], 999);
  assert.equal(runtime.state.sprites.has("box"), true);
  runtime.frame([], 1000);
  assert.equal(runtime.state.sprites.has("box"), false);
  assert.equal(runtime.frame([], 2000), "dialogue");
  assert.deepEqual(logs.records[logs.records.length - 1], {
    level: "warn",
    scope: "runtime",
    message: 'hide: no sprite named "ghost"',
  });
});

test("animations tween sprite properties over time", () => {
  const { runtime } = makeRuntime(
    "add rect box #fff 10 10 pos 0 0;\nanimate box move 100 50 1;\nanimate box size 30 30 2 in;\nanimate box alpha 0 0;\nwait 5;"
  );
  runtime.frame([], 0);
  const box = runtime.state.sprites.get("box");
  assert.equal(box?.alpha, 0);
  runtime.frame([], 500);
  assert.deepEqual(box?.pos, [50, 25]);
  runtime.frame([], 1000);
  assert.deepEqual(box?.pos, [100, 50]);
  assert.deepEqual(box?.size, [15, 15]);
  assert.deepEqual(Object.keys(runtime.state.tracks.get("box") ?? {}), ["size"]);
  runtime.frame([], 2000);
  assert.deepEqual(box?.size, [30, 30]);
  assert.equal(runtime.state.tracks.size, 0);
});

test("animate stop cancels tracks", () => {
  const { runtime } = makeRuntime(
    "add rect a #fff 1 1;\nadd rect b #fff 1 1;\nanimate a move 9 9 1;\nanimate b move 9 9 1;\nanimate stop a;\nwait 1;\nanimate stop;\nwait 1;"
  );
  runtime.frame([], 0);
  assert.deepEqual([...runtime.state.tracks.keys()], ["b"]);
  runtime.frame([], 500);
  runtime.frame([], 1000);
  assert.equal(runtime.state.tracks.size, 0);
  assert.deepEqual(runtime.state.sprites.get("a")?.pos, [640, 719]);
});

test("hotspot clicks are mapped through the camera", () => {
  const { runtime } = makeRuntime(
    'camera 100 0 2;\nhotspot add door 600 300 80 120 -> door_open;\nwait 10;\nlabel door_open:\n"Opened.";'
  );
  assert.equal(runtime.frame([], 0), "waitingTimer");
  assert.equal(runtime.frame([click(640, 360)], 0), "waitingTimer");
  assert.equal(runtime.frame([click(740, 360)], 0), "dialogue");
  assert.equal(runtime.state.dialogue?.text, "Opened.");
});

test("polygon hotspots and hotspot removal", () => {
  const { runtime } = makeRuntime(
    'hotspot poly tri 0 0 100 0 0 100 -> hit;\nhotspot add gone 0 0 10 10 -> hit;\nhotspot remove gone;\nhotspot debug on;\nwait 10;\nlabel hit:\n"hit";'
  );
  runtime.frame([], 0);
  assert.deepEqual([...runtime.state.hotspots.keys()], ["tri"]);
  assert.equal(runtime.state.hotspotDebug, true);
  runtime.frame([click(90, 90)], 0);
  assert.equal(runtime.status, "waitingTimer");
  runtime.frame([click(10, 10)], 0);
  assert.equal(runtime.state.dialogue?.text, "hit");
});

test("a click first dismisses dialogue before reaching hotspots", () => {
  const { runtime } = makeRuntime('hotspot add all 0 0 1280 720 -> hit;\n"Look.";\nwait 10;\nlabel hit:\n"hit";');
  runtime.frame([], 0);
  assert.equal(runtime.frame([click(5, 5)], 0), "waitingTimer");
  assert.equal(runtime.frame([click(5, 5)], 0), "dialogue");
  assert.equal(runtime.state.dialogue?.text, "hit");
});

test("hud buttons take clicks before dialogue and can toggle the inventory", () => {
  const { runtime } = makeRuntime(
    'item add key "Key" "Opens things.";\nhud add bag text "Bag" 0 0 100 40 -> inventory_toggle;\n"Look around.";'
  );
  runtime.frame([], 0);
  runtime.frame([click(10, 10)], 0);
  assert.equal(runtime.state.inventoryOpen, true);
  assert.equal(runtime.state.dialogue?.text, "Look around.");
  runtime.frame([key("back")], 0);
  assert.equal(runtime.state.inventoryOpen, false);
  runtime.frame([key("inventory")], 0);
  assert.equal(runtime.state.inventoryOpen, true);
  runtime.frame([click(500, 500)], 0);
  assert.equal(runtime.state.dialogue, null);
});

test("feature flags switch off hud buttons and the inventory", () => {
  const { runtime } = makeRuntime(
    'hud add bag text "Bag" 0 0 100 40 -> inventory_toggle;\nhotspot add all 0 0 1280 720 -> inventory_toggle;\nwait 10;',
    { features: { hud: false, items: false } }
  );
  runtime.frame([], 0);
  assert.equal(runtime.state.hud.size, 0);
  runtime.frame([click(10, 10), key("inventory")], 0);
  assert.equal(runtime.state.inventoryOpen, false);
  assert.equal(runtime.status, "waitingTimer");
});

test("map overlays consume their points and route clicks", () => {
  const source = `
map show "town.png";
map poi "Bakery" 100 200 -> bakery;
map poi "Plaza" 0 0 400 300 500 300 500 400 -> plaza;
"unreached";
label bakery:
"bread";
label plaza:
"plaza";
`;
  const first = makeRuntime(source).runtime;
  assert.equal(first.frame([], 0), "mapOverlay");
  assert.equal(first.state.map.image, "town.png");
  assert.deepEqual(
    first.state.map.points.map((point) => point.label),
    ["Bakery", "Plaza"]
  );
  first.frame([click(300, 300)], 0);
  assert.equal(first.status, "mapOverlay");
  assert.equal(first.frame([click(110, 205)], 0), "dialogue");
  assert.equal(first.state.map.active, false);
  assert.equal(first.state.dialogue?.text, "bread");

  const second = makeRuntime(source).runtime;
  second.frame([], 0);
  second.frame([click(480, 320)], 0);
  second.frame([], 0);
  assert.equal(second.state.dialogue?.text, "plaza");

  const third = makeRuntime(source).runtime;
  third.frame([], 0);
  third.frame([key("back")], 0);
  assert.equal(third.frame([], 0), "dialogue");
  assert.equal(third.state.dialogue?.text, "unreached");

  const fourth = makeRuntime(source).runtime;
  fourth.frame([], 0);
  assert.equal(fourth.frame([{ type: "choose", index: 1 }], 0), "dialogue");
  assert.equal(fourth.state.dialogue?.text, "plaza");
});

test("video playback runs through the backend and blocks wait video", () => {
  const backend = new FakeVideoBackend(3);
  const { runtime, dir } = makeRuntime('video play "intro.webm" fit cover;\nwait video;\n"after video";', {
    video: backend,
  });
  assert.equal(runtime.frame([], 0), "waitingVideo");
  assert.deepEqual(
    backend.opened.map((entry) => [entry.path, entry.loop]),
    [[`${dir}/video/intro.webm`, false]]
  );
  assert.equal(runtime.state.video?.fit, "cover");
  assert.equal(runtime.frame([], 100), "waitingVideo");
  assert.equal(runtime.frame([], 200), "dialogue");
  assert.equal(runtime.state.video, null);
  assert.equal(backend.opened[0].playback.closed, true);
});

test("looping video keeps playing until stopped or disposed", () => {
  const backend = new FakeVideoBackend(1);
  const { runtime } = makeRuntime('video play "loop.webm" loop true;\nwait 1;\nvideo stop;\nvideo play "b.webm" loop true;\nwait 1;', {
    video: backend,
  });
  runtime.frame([], 0);
  assert.notEqual(runtime.state.video, null);
  runtime.frame([], 1000);
  assert.equal(backend.opened[0].playback.closed, true);
  assert.equal(runtime.state.video?.path, "b.webm");
  runtime.dispose();
  assert.equal(runtime.state.video, null);
  assert.equal(backend.opened[1].playback.closed, true);
});

test("without a video backend playback is skipped", () => {
  const { runtime } = makeRuntime('video play "intro.webm";\nwait video;\n"after";');
  assert.equal(runtime.frame([], 0), "dialogue");
  assert.deepEqual(logs.records[logs.records.length - 1], {
    level: "warn",
    scope: "runtime",
    message: "no video backend; skipping intro.webm",
  });
});
