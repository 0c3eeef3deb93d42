import type { MenuAction, UiConfig } from "./config.js";

export type MenuKind = "title" | "pause";
export type MenuMode = "main" | "save" | "load";

export interface MenuState {
  kind: MenuKind;
  mode: MenuMode;
  selected: number;
}

/** Slot actions are spelled `slot_<n>`; `back` leaves a save/load page. */
export type MenuEntryAction = MenuAction | `slot_${number}` | "back";

export interface MenuEntry {
  label: string;
  action: MenuEntryAction;
}

const SLOT_ACTION = /^slot_(\d+)$/;

export const parseSlotAction = (action: string): number | null => {
  const match = SLOT_ACTION.exec(action);
  return match ? Number(match[1]) : null;
};

export const slotName = (slot: number): `slot_${number}` => `slot_${slot}`;

export const menuEntries = (menu: MenuState, ui: UiConfig): MenuEntry[] => {
  if (menu.mode === "main") {
    const config = menu.kind === "title" ? ui.titleMenu : ui.pauseMenu;
    return config.buttons.map((button) => ({ label: button.label, action: button.action }));
  }
  const entries: MenuEntry[] = [];
  for (let slot = 1; slot <= ui.slots; slot += 1) {
    entries.push({ label: `Slot ${slot}`, action: slotName(slot) });
  }
  entries.push({ label: "Back", action: "back" });
  return entries;
};

export const moveSelection = (menu: MenuState, ui: UiConfig, delta: number): void => {
  const count = menuEntries(menu, ui).length;
  if (count === 0) {
    return;
  }
  menu.selected = (menu.selected + delta + count) % count;
};
