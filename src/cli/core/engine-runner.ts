import { createRuntime, resumeRuntime, type CreateRuntimeOptions } from "../../api.js";
import { VnScriptError } from "../../core/errors.js";
import type { SaveData } from "../../runtime/save-codec.js";
import type { DialogueState, PhoneMessage } from "../../runtime/state.js";
import type { VnRuntime } from "../../runtime/interpreter.js";
import type { LoadedProject } from "./project-loader.js";

/** Virtual time added per tick while something plays out on its own. */
export const RUNNER_TICK_MS = 100;
const MAX_RUNNER_TICKS = 100000;

export interface BoundaryChoice {
  index: number;
  text: string;
}

export interface BoundaryResult {
  event: "CHOICES" | "INPUT" | "END";
  texts: string[];
  choices: BoundaryChoice[];
  choicePromptText: string | null;
  inputPromptText: string | null;
  inputDefaultText: string | null;
}

export interface StartedProject {
  runtime: VnRuntime;
  boundary: BoundaryResult;
}

export const formatDialogue = (dialogue: DialogueState): string =>
  dialogue.name ? `${dialogue.name}: ${dialogue.text}` : dialogue.text;

export const formatPhoneMessage = (contact: string, message: PhoneMessage): string =>
  message.side === "right" ? `[phone] me: ${message.text}` : `[phone] ${contact}: ${message.text}`;

const boundary = (event: BoundaryResult["event"], texts: string[]): BoundaryResult => ({
  event,
  texts,
  choices: [],
  choicePromptText: null,
  inputPromptText: null,
  inputDefaultText: null,
});

/**
 * Drives the runtime on a virtual clock until it needs a decision. Dialogue
 * and phone messages are collected as text, timers are skipped forward and
 * map overlays are offered as choices.
 */
export const runToBoundary = (runtime: VnRuntime): BoundaryResult => {
  const texts: string[] = [];
  let now = runtime.currentTimeMs;
  for (let tick = 0; tick < MAX_RUNNER_TICKS; tick += 1) {
    const status = runtime.frame([], now);
    const state = runtime.state;
    switch (status) {
      case "titleMenu":
        runtime.executeMenuAction("new_game");
        break;
      case "pauseMenu":
        runtime.menu = null;
        break;
      case "dialogue":
        if (state.dialogue) {
          texts.push(formatDialogue(state.dialogue));
        }
        runtime.advance();
        break;
      case "phone": {
        const message = state.phone.messages[state.phone.messages.length - 1];
        if (message) {
          texts.push(formatPhoneMessage(state.phone.contact, message));
        }
        runtime.advance();
        break;
      }
      case "waitingTimer":
        now = state.wait?.type === "timer" ? Math.max(now, state.wait.untilMs) : now + RUNNER_TICK_MS;
        break;
      case "waitingVoice":
      case "waitingVideo":
      case "running":
        now += RUNNER_TICK_MS;
        break;
      case "waitingChoice":
        return {
          ...boundary("CHOICES", texts),
          choices: (state.choice?.options ?? []).map((option, index) => ({ index, text: option.text })),
          choicePromptText: state.choice && state.choice.prompt.length > 0 ? state.choice.prompt : null,
        };
      case "mapOverlay":
        return {
          ...boundary("CHOICES", texts),
          choices: state.map.points.map((point, index) => ({ index, text: point.label })),
        };
      case "waitingInput":
        return {
          ...boundary("INPUT", texts),
          inputPromptText: state.input?.prompt ?? null,
          inputDefaultText: state.input?.defaultValue ?? null,
        };
      case "ended":
        return boundary("END", texts);
    }
  }
  throw new VnScriptError("CLI_RUNNER_STALLED", `Runtime did not reach a boundary in ${MAX_RUNNER_TICKS} ticks.`);
};

const runtimeOptionsFor = (project: LoadedProject): CreateRuntimeOptions => ({
  scriptPath: project.entryPath,
  projectRoot: project.root,
  savePath: project.savePath,
  ui: project.ui,
  features: project.features,
});

export const startProject = (project: LoadedProject): StartedProject => {
  const runtime = createRuntime(runtimeOptionsFor(project));
  return { runtime, boundary: runToBoundary(runtime) };
};

export const resumeProject = (project: LoadedProject, save: SaveData): StartedProject => {
  const runtime = resumeRuntime({ ...runtimeOptionsFor(project), save });
  return { runtime, boundary: runToBoundary(runtime) };
};

export const chooseAndContinue = (runtime: VnRuntime, choiceIndex: number): BoundaryResult => {
  runtime.choose(choiceIndex);
  return runToBoundary(runtime);
};

export const submitInputAndContinue = (runtime: VnRuntime, text: string): BoundaryResult => {
  runtime.submitInput(text);
  return runToBoundary(runtime);
};
