import React, { useEffect, useReducer, useRef, useState } from "react";
import { Box, Text, render, useApp, useInput } from "ink";

import { VnScriptError } from "../../core/errors.js";
import type { RuntimeState } from "../../runtime/state.js";
import {
  chooseAndContinue,
  resumeProject,
  startProject,
  submitInputAndContinue,
  type BoundaryChoice,
  type BoundaryResult,
  type StartedProject,
} from "../core/engine-runner.js";
import { FlagSet } from "../core/flags.js";
import {
  loadProjectSource,
  resolveProjectSource,
  type LoadedProject,
  type ProjectSource,
} from "../core/project-loader.js";
import { createPlayerState, loadPlayerState, savePlayerState } from "../core/state-store.js";

export const DEFAULT_STATE_FILE = "./.vnscript/player-state.json";
const TUI_FLAGS = new Set(["example", "project", "state-file"]);
const CHOICE_ROWS = 5;
const CHARS_PER_SECOND = 60;
const TICK_MS = Math.floor(1000 / CHARS_PER_SECOND);
const ELLIPSIS = "…";
// title, status, hud, divider, prompt, choice rows, scroll hint, keys
const CHROME_ROWS = 6 + CHOICE_ROWS + 1;

export interface TuiOptions {
  source: ProjectSource;
  stateFile: string;
}

export const parseTuiArgs = (argv: readonly string[]): TuiOptions => {
  const flags = FlagSet.parse(argv);
  for (const name of flags.names()) {
    if (!TUI_FLAGS.has(name)) {
      throw new VnScriptError("CLI_ARG_FORMAT", `Unknown argument for tui mode: --${name}`);
    }
  }
  const stateFile = flags.get("state-file") ?? DEFAULT_STATE_FILE;
  if (stateFile.length === 0) {
    throw new VnScriptError("CLI_ARG_MISSING", "--state-file cannot be empty.");
  }
  return { source: resolveProjectSource(flags.get("project"), flags.get("example")), stateFile };
};

export const truncateToWidth = (value: string, width: number): string => {
  if (width <= 0) {
    return "";
  }
  if (value.length <= width) {
    return value;
  }
  return width === 1 ? ELLIPSIS : `${value.slice(0, width - 1)}${ELLIPSIS}`;
};

/** Breaks at spaces; words wider than a row are split hard. */
export const wrapLineToWidth = (value: string, width: number): string[] => {
  if (width <= 0 || value.length === 0) {
    return [""];
  }
  const rows: string[] = [];
  let row = "";
  for (const word of value.split(" ")) {
    let rest = word;
    while (rest.length > width) {
      if (row.length > 0) {
        rows.push(row);
        row = "";
      }
      rows.push(rest.slice(0, width));
      rest = rest.slice(width);
    }
    if (row.length === 0) {
      row = rest;
    } else if (row.length + 1 + rest.length <= width) {
      row = `${row} ${rest}`;
    } else {
      rows.push(row);
      row = rest;
    }
  }
  rows.push(row);
  return rows;
};

/** Meters, item count and the current notification, or null when there is nothing to show. */
export const formatHudLine = (state: Pick<RuntimeState, "meters" | "inventory" | "notification">): string | null => {
  const parts = [...state.meters.values()].map((meter) => `${meter.label} ${meter.value}/${meter.max}`);
  if (state.inventory.size > 0) {
    parts.push(`items ${state.inventory.size}`);
  }
  if (state.notification) {
    parts.push(state.notification.message);
  }
  return parts.length > 0 ? parts.join(" | ") : null;
};

export interface ViewModel {
  lines: string[];
  pending: string[];
  typing: string | null;
  typed: number;
  choices: BoundaryChoice[];
  prompt: string | null;
  inputMode: boolean;
  inputDefault: string | null;
  buffer: string;
  cursor: number;
  scroll: number;
  ended: boolean;
  hud: string | null;
  notice: string;
}

export type ViewAction =
  | { type: "boundary"; boundary: BoundaryResult; hud: string | null; replace: boolean; notice: string }
  | { type: "tick" }
  | { type: "flush" }
  | { type: "move"; delta: -1 | 1 }
  | { type: "type"; text: string }
  | { type: "erase" }
  | { type: "notice"; text: string };

const blankView = (): ViewModel => ({
  lines: [],
  pending: [],
  typing: null,
  typed: 0,
  choices: [],
  prompt: null,
  inputMode: false,
  inputDefault: null,
  buffer: "",
  cursor: 0,
  scroll: 0,
  ended: false,
  hud: null,
  notice: "ready",
});

export const isStreaming = (view: ViewModel): boolean => view.typing !== null || view.pending.length > 0;

/** Finished lines plus the part of the current line typed so far. */
export const visibleLines = (view: ViewModel): string[] =>
  view.typing === null ? view.lines : [...view.lines, view.typing.slice(0, view.typed)];

const tick = (view: ViewModel): ViewModel => {
  if (view.typing === null) {
    const [next, ...rest] = view.pending;
    if (next === undefined) {
      return view;
    }
    if (next.length === 0) {
      return { ...view, pending: rest, lines: [...view.lines, next] };
    }
    return { ...view, pending: rest, typing: next, typed: 1 };
  }
  if (view.typed >= view.typing.length) {
    return { ...view, lines: [...view.lines, view.typing], typing: null, typed: 0 };
  }
  return { ...view, typed: view.typed + 1 };
};

const scrollFor = (cursor: number, scroll: number, total: number): number => {
  if (total <= CHOICE_ROWS) {
    return 0;
  }
  if (cursor < scroll) {
    return cursor;
  }
  return cursor >= scroll + CHOICE_ROWS ? cursor - CHOICE_ROWS + 1 : scroll;
};

export const viewReducer = (view: ViewModel, action: ViewAction): ViewModel => {
  switch (action.type) {
    case "boundary": {
      const { boundary } = action;
      const transcript: Pick<ViewModel, "lines" | "pending" | "typing" | "typed"> = action.replace
        ? { lines: [], pending: boundary.texts, typing: null, typed: 0 }
        : { lines: view.lines, pending: [...view.pending, ...boundary.texts], typing: view.typing, typed: view.typed };
      return {
        ...view,
        ...transcript,
        choices: boundary.choices,
        prompt: boundary.choicePromptText ?? boundary.inputPromptText,
        inputMode: boundary.event === "INPUT",
        inputDefault: boundary.inputDefaultText,
        buffer: "",
        cursor: 0,
        scroll: 0,
        ended: boundary.event === "END",
        hud: action.hud,
        notice: action.notice,
      };
    }
    case "tick":
      return tick(view);
    case "flush":
      return {
        ...view,
        lines: [...view.lines, ...(view.typing === null ? [] : [view.typing]), ...view.pending],
        pending: [],
        typing: null,
        typed: 0,
      };
    case "move": {
      if (view.choices.length === 0) {
        return { ...view, notice: "no pending choice" };
      }
      const cursor = Math.max(0, Math.min(view.choices.length - 1, view.cursor + action.delta));
      return { ...view, cursor, scroll: scrollFor(cursor, view.scroll, view.choices.length) };
    }
    case "type":
      return { ...view, buffer: view.buffer + action.text };
    case "erase":
      return { ...view, buffer: view.buffer.slice(0, -1) };
    case "notice":
      return { ...view, notice: action.text };
  }
};

export const initialView = (boundary: BoundaryResult, hud: string | null): ViewModel =>
  viewReducer(blankView(), { type: "boundary", boundary, hud, replace: true, notice: "ready" });

const readTerminalSize = () => ({
  columns: process.stdout.columns ?? 80,
  rows: process.stdout.rows ?? 24,
});

const useTerminalSize = () => {
  const [size, setSize] = useState(readTerminalSize);
  useEffect(() => {
    const onResize = (): void => {
      setSize(readTerminalSize());
    };
    process.stdout.on("resize", onResize);
    return () => {
      process.stdout.off("resize", onResize);
    };
  }, []);
  return size;
};

const PlayerApp = ({ project, stateFile }: { project: LoadedProject; stateFile: string }) => {
  const { exit } = useApp();
  const size = useTerminalSize();
  const [started] = useState(() => startProject(project));
  const runtimeRef = useRef(started.runtime);
  const [view, dispatch] = useReducer(viewReducer, started, (first: StartedProject) =>
    initialView(first.boundary, formatHudLine(first.runtime.state))
  );
  const streaming = isStreaming(view);

  useEffect(() => {
    if (!streaming) {
      return;
    }
    const timer = globalThis.setTimeout(() => {
      dispatch({ type: "tick" });
    }, TICK_MS);
    return () => {
      globalThis.clearTimeout(timer);
    };
  }, [streaming, view.typing, view.typed, view.pending.length]);

  const show = (boundary: BoundaryResult, notice: string, replace = false): void => {
    dispatch({ type: "boundary", boundary, hud: formatHudLine(runtimeRef.current.state), replace, notice });
  };

  const swapRuntime = (next: StartedProject, notice: string): void => {
    runtimeRef.current.dispose();
    runtimeRef.current = next.runtime;
    show(next.boundary, notice, true);
  };

  const chooseSelected = (): void => {
    const choice = view.choices[view.cursor];
    if (!choice) {
      dispatch({ type: "notice", text: "no pending choice" });
      return;
    }
    show(chooseAndContinue(runtimeRef.current, choice.index), `chose ${choice.index}`);
  };

  const submitBuffer = (): void => {
    const text = view.buffer;
    const notice = text.length > 0 ? `entered ${JSON.stringify(text)}` : "accepted default";
    show(submitInputAndContinue(runtimeRef.current, text), notice);
  };

  const save = (): void => {
    if (view.ended) {
      dispatch({ type: "notice", text: "nothing to save after the end" });
      return;
    }
    savePlayerState(stateFile, createPlayerState(project.id, runtimeRef.current.snapshot()));
    dispatch({ type: "notice", text: `saved to ${stateFile}` });
  };

  const load = (): void => {
    const state = loadPlayerState(stateFile);
    if (state.projectId !== project.id) {
      throw new VnScriptError(
        "CLI_STATE_MISMATCH",
        `State project mismatch. expected=${project.id} actual=${state.projectId}`
      );
    }
    swapRuntime(resumeProject(project, state.save), `loaded from ${stateFile}`);
  };

  useInput((input, key) => {
    try {
      if (key.escape) {
        exit();
      } else if (streaming) {
        if (key.return) {
          dispatch({ type: "flush" });
        }
      } else if (view.inputMode) {
        if (key.return) {
          submitBuffer();
        } else if (key.backspace || key.delete) {
          dispatch({ type: "erase" });
        } else if (input.length > 0 && !key.ctrl && !key.meta) {
          dispatch({ type: "type", text: input });
        }
      } else if (key.upArrow || key.downArrow) {
        dispatch({ type: "move", delta: key.upArrow ? -1 : 1 });
      } else if (key.return) {
        chooseSelected();
      } else if (input === "q") {
        exit();
      } else if (input === "r") {
        swapRuntime(startProject(project), "restarted");
      } else if (input === "s") {
        save();
      } else if (input === "l") {
        load();
      }
    } catch (error: unknown) {
      dispatch({ type: "notice", text: error instanceof Error ? error.message : "unknown error" });
    }
  });

  const width = Math.max(16, size.columns - 2);
  const textRows = Math.max(1, size.rows - CHROME_ROWS - (view.ended ? 1 : 0));
  const wrapped = visibleLines(view).flatMap((line) => wrapLineToWidth(line, width));
  const shownChoices = streaming || view.inputMode ? [] : view.choices;
  const choiceRows = Array.from({ length: CHOICE_ROWS }, (_unused, row) => {
    const position = view.scroll + row;
    const choice = shownChoices[position];
    if (!choice) {
      return { key: `empty-${row}`, text: " ", selected: false };
    }
    const text = truncateToWidth(choice.text, width - 2);
    const selected = position === view.cursor;
    return { key: `choice-${choice.index}`, text: selected ? `> ${text}` : `  ${text}`, selected };
  });
  const scrollHint =
    shownChoices.length > CHOICE_ROWS
      ? `${view.scroll + 1}-${Math.min(view.scroll + CHOICE_ROWS, shownChoices.length)} of ${shownChoices.length}`
      : " ";
  const fallback = view.inputDefault ? ` (default ${view.inputDefault})` : "";
  const promptLine =
    view.inputMode && !streaming
      ? `${view.prompt ?? "input"}${fallback}: ${view.buffer}_`
      : view.prompt ?? "choices (up/down + enter):";
  const keys = view.inputMode
    ? "keys: type | enter submit | backspace erase | esc quit"
    : "keys: up/down move | enter choose | s save | l load | r restart | q quit";

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text bold>{truncateToWidth(project.title, width)}</Text>
      <Text color="gray">{truncateToWidth(`${view.notice} | state ${stateFile}`, width)}</Text>
      <Text color="magenta">{truncateToWidth(view.hud ?? " ", width)}</Text>
      {wrapped.slice(-textRows).map((line, index) => (
        <Text key={`line-${index}`}>{line}</Text>
      ))}
      <Text color="gray">{"─".repeat(width)}</Text>
      <Text color="cyan">{truncateToWidth(promptLine, width)}</Text>
      {choiceRows.map((row) => (
        <Text key={row.key} color={row.selected ? "green" : undefined}>
          {row.text}
        </Text>
      ))}
      <Text color="gray">{scrollHint}</Text>
      {view.ended && <Text color="green">[end]</Text>}
      <Text color="yellow">{truncateToWidth(keys, width)}</Text>
    </Box>
  );
};

export const runTuiCommand = async (argv: readonly string[]): Promise<number> => {
  try {
    const options = parseTuiArgs(argv);
    const project = loadProjectSource(options.source);
    const app = render(<PlayerApp project={project} stateFile={options.stateFile} />);
    await app.waitUntilExit();
    return 0;
  } catch (error: unknown) {
    process.stderr.write(`${error instanceof Error ? error.message : "Unknown TUI error."}\n`);
    return 1;
  }
};
