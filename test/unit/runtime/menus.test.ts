import assert from "node:assert/strict";
import { test } from "vitest";

import { isMenuAction, resolveUiConfig } from "../../../src/runtime/config.js";
import { menuEntries, moveSelection, parseSlotAction, slotName, type MenuState } from "../../../src/runtime/menus.js";

test("main pages list the configured buttons", () => {
  const ui = resolveUiConfig();
  const title: MenuState = { kind: "title", mode: "main", selected: 0 };
  assert.deepEqual(
    menuEntries(title, ui).map((entry) => entry.label),
    ["New Game", "Continue", "Load", "Quit"]
  );
  const pause: MenuState = { kind: "pause", mode: "main", selected: 0 };
  assert.equal(menuEntries(pause, ui)[0].action, "resume");
});

test("save and load pages list slots and a back entry", () => {
  const ui = resolveUiConfig({ slots: 2 });
  const menu: MenuState = { kind: "pause", mode: "save", selected: 0 };
  assert.deepEqual(menuEntries(menu, ui), [
    { label: "Slot 1", action: "slot_1" },
    { label: "Slot 2", action: "slot_2" },
    { label: "Back", action: "back" },
  ]);
});

test("moveSelection wraps in both directions", () => {
  const ui = resolveUiConfig();
  const menu: MenuState = { kind: "title", mode: "main", selected: 0 };
  moveSelection(menu, ui, -1);
  assert.equal(menu.selected, 3);
  moveSelection(menu, ui, 1);
  assert.equal(menu.selected, 0);
});

test("slot actions round-trip through their names", () => {
  assert.equal(slotName(3), "slot_3");
  assert.equal(parseSlotAction("slot_3"), 3);
  assert.equal(parseSlotAction("slot_x"), null);
  assert.equal(parseSlotAction("new_game"), null);
});

test("ui overrides merge over defaults", () => {
  const ui = resolveUiConfig({ titleMenu: { enabled: true }, notifySeconds: 4 });
  assert.equal(ui.titleMenu.enabled, true);
  assert.equal(ui.titleMenu.buttons.length, 4);
  assert.equal(ui.notifySeconds, 4);
  assert.equal(ui.slots, 6);
  assert.equal(isMenuAction("quit"), true);
  assert.equal(isMenuAction("dance"), false);
  assert.equal(isMenuAction(3), false);
});
