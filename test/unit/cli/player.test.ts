import assert from "node:assert/strict";

import { test, vi } from "vitest";

import { USAGE, runPlayerCli } from "../../../src/cli/player.js";

test("runPlayerCli usage and error paths", async () => {
  const writes: string[] = [];
  const errWrites: string[] = [];
  const stdout = vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    writes.push(String(chunk));
    return true;
  });
  const stderr = vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    errWrites.push(String(chunk));
    return true;
  });

  try {
    assert.equal(await runPlayerCli([]), 0);
    assert.equal(await runPlayerCli(["--help"]), 0);
    assert.equal(await runPlayerCli(["-h"]), 0);
    assert.equal(await runPlayerCli(["bad-mode"]), 1);
    assert.equal(await runPlayerCli(["toString"]), 1);
    assert.equal(await runPlayerCli(["agent"]), 1);
    assert.equal(await runPlayerCli(["tui"]), 1);

    assert.equal(writes[0], USAGE);
    assert.ok(USAGE.startsWith("vnscript-player <mode> [options]\n"));
    assert.equal(writes[2], USAGE);
    assert.ok(writes.includes("ERROR_CODE:CLI_AGENT_USAGE\n"));
    assert.equal(errWrites[0], `Unknown mode: bad-mode\n\n${USAGE}`);
    assert.equal(errWrites[1], `Unknown mode: toString\n\n${USAGE}`);
  } finally {
    stdout.mockRestore();
    stderr.mockRestore();
  }
});

test("runPlayerCli routes agent mode", async () => {
  const writes: string[] = [];
  const stdout = vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    writes.push(String(chunk));
    return true;
  });
  try {
    assert.equal(await runPlayerCli(["agent", "list"]), 0);
    assert.equal(writes[0], "RESULT:OK\n");
    assert.equal(writes[1], 'PROJECT:01-hello|"Hello"\n');
  } finally {
    stdout.mockRestore();
  }
});
