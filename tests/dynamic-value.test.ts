import assert from "node:assert/strict";
import test from "node:test";
import { RESOLVE_ERROR_SENTINEL, producer, resolve_dynamic, static_value } from "../src/commands/dynamic-value.ts";
import { recording_logger } from "./helpers.ts";

test("static value is returned unchanged", () => {
  const list = ["a", "b"];
  const logger = recording_logger();
  assert.equal(resolve_dynamic(static_value(list), logger), list);
  assert.equal(logger.records.length, 0);
});

test("producer is evaluated on every resolve", () => {
  let calls = 0;
  const value = producer(() => {
    calls += 1;
    return calls;
  });
  const logger = recording_logger();
  assert.equal(resolve_dynamic(value, logger), 1);
  assert.equal(resolve_dynamic(value, logger), 2);
});

test("failing producer yields the sentinel and logs the error", () => {
  const logger = recording_logger();
  const value = producer<string[]>(() => {
    throw new Error("config map missing");
  });
  assert.equal(resolve_dynamic(value, logger), RESOLVE_ERROR_SENTINEL);
  assert.equal(RESOLVE_ERROR_SENTINEL, "<error getting value>");
  assert.deepEqual(logger.records, [
    { level: "error", msg: "error getting dynamic value", ctx: { error: "config map missing" } },
  ]);
});
