export * from "./animation.js";
export * from "./collaborators.js";
export * from "./config.js";
export * from "./geometry.js";
export * from "./interpreter.js";
export * from "./menus.js";
export * from "./save-codec.js";
export * from "./state.js";
export * from "./variables.js";
