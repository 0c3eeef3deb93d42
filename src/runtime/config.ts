export type MenuAction =
  | "new_game"
  | "continue"
  | "open_save"
  | "open_load"
  | "resume"
  | "quit"
  | "quick_save"
  | "quick_load";

export const MENU_ACTIONS: readonly MenuAction[] = [
  "new_game",
  "continue",
  "open_save",
  "open_load",
  "resume",
  "quit",
  "quick_save",
  "quick_load",
];

export const isMenuAction = (value: unknown): value is MenuAction =>
  typeof value === "string" && MENU_ACTIONS.some((action) => action === value);

export interface MenuButton {
  label: string;
  action: MenuAction;
}

export interface MenuConfig {
  enabled: boolean;
  buttons: MenuButton[];
}

export interface UiConfig {
  titleMenu: MenuConfig;
  pauseMenu: MenuConfig;
  /** Number of numbered save slots offered by the save/load pages. */
  slots: number;
  inventoryItemsPerPage: number;
  notifySeconds: number;
  /** Click radius in pixels around a map point without a polygon. */
  mapPointRadius: number;
}

export interface FeatureFlags {
  items: boolean;
  hud: boolean;
}

export const DEFAULT_TITLE_BUTTONS: MenuButton[] = [
  { label: "New Game", action: "new_game" },
  { label: "Continue", action: "continue" },
  { label: "Load", action: "open_load" },
  { label: "Quit", action: "quit" },
];

export const DEFAULT_PAUSE_BUTTONS: MenuButton[] = [
  { label: "Resume", action: "resume" },
  { label: "Quick Save", action: "quick_save" },
  { label: "Quick Load", action: "quick_load" },
  { label: "Save", action: "open_save" },
  { label: "Load", action: "open_load" },
  { label: "Quit", action: "quit" },
];

export const defaultUiConfig = (): UiConfig => ({
  titleMenu: { enabled: false, buttons: DEFAULT_TITLE_BUTTONS.map((button) => ({ ...button })) },
  pauseMenu: { enabled: true, buttons: DEFAULT_PAUSE_BUTTONS.map((button) => ({ ...button })) },
  slots: 6,
  inventoryItemsPerPage: 10,
  notifySeconds: 2.5,
  mapPointRadius: 24,
});

export const defaultFeatureFlags = (): FeatureFlags => ({ items: true, hud: true });

export interface UiConfigOverrides {
  titleMenu?: Partial<MenuConfig>;
  pauseMenu?: Partial<MenuConfig>;
  slots?: number;
  inventoryItemsPerPage?: number;
  notifySeconds?: number;
  mapPointRadius?: number;
}

export const resolveUiConfig = (overrides: UiConfigOverrides = {}): UiConfig => {
  const base = defaultUiConfig();
  return {
    titleMenu: { ...base.titleMenu, ...overrides.titleMenu },
    pauseMenu: { ...base.pauseMenu, ...overrides.pauseMenu },
    slots: overrides.slots ?? base.slots,
    inventoryItemsPerPage: overrides.inventoryItemsPerPage ?? base.inventoryItemsPerPage,
    notifySeconds: overrides.notifySeconds ?? base.notifySeconds,
    mapPointRadius: overrides.mapPointRadius ?? base.mapPointRadius,
  };
};
