import assert from "node:assert/strict";
import { afterEach, test } from "vitest";

import {
  createLogger,
  getLogLevel,
  onLog,
  setLogLevel,
  setLogSink,
  type LogRecord,
} from "../../../src/core/logger.js";

const initialLevel = getLogLevel();

afterEach(() => {
  setLogSink(null);
  setLogLevel(initialLevel);
});

test("records below the threshold are not written to the sink", () => {
  const written: LogRecord[] = [];
  setLogSink((record) => written.push(record));
  setLogLevel("warn");
  const log = createLogger("unit");
  log.debug("hidden");
  log.info("hidden too");
  log.warn("careful");
  log.error("broken");
  assert.deepEqual(written, [
    { level: "warn", scope: "unit", message: "careful" },
    { level: "error", scope: "unit", message: "broken" },
  ]);
});

test("lowering the threshold lets debug records through", () => {
  const written: string[] = [];
  setLogSink((record) => written.push(`${record.level}:${record.message}`));
  setLogLevel("debug");
  createLogger("unit").debug("details");
  assert.deepEqual(written, ["debug:details"]);
  assert.equal(getLogLevel(), "debug");
});

test("listeners see every record and can unsubscribe", () => {
  setLogSink(() => undefined);
  setLogLevel("error");
  const seen: LogRecord[] = [];
  const stop = onLog((record) => seen.push(record));
  const log = createLogger("listener");
  log.info("first");
  stop();
  log.info("second");
  assert.deepEqual(seen, [{ level: "info", scope: "listener", message: "first" }]);
});

test("setLogSink returns the previous sink", () => {
  const first = (): void => undefined;
  setLogSink(first);
  const previous = setLogSink(null);
  assert.equal(previous, first);
});
