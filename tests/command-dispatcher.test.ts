import assert from "node:assert/strict";
import test from "node:test";
import { define_command } from "../src/commands/define.ts";
import { CommandDispatcher } from "../src/commands/dispatcher.ts";
import { CommandRegistry } from "../src/commands/registry.ts";
import type { CommandContext } from "../src/commands/types.ts";
import { collect_say, recording_logger } from "./helpers.ts";

function setup(opts: { case_insensitive?: boolean; handler_timeout_ms?: number } = {}) {
  const logger = recording_logger();
  const registry = new CommandRegistry(logger);
  const seen: CommandContext[] = [];
  registry.declare(define_command({ name: "hello", description: "Greet the bot" }), async (ctx) => {
    seen.push(ctx);
    await ctx.say("hi there");
  });
  registry.declare(define_command({
    name: "list-aws-vms",
    description: "List AWS EC2 instances",
    arguments: { state: {} },
    aliases: ["aws-vms"],
  }), (ctx) => { seen.push(ctx); });
  const dispatcher = new CommandDispatcher(registry, {
    case_insensitive: opts.case_insensitive ?? true,
    handler_timeout_ms: opts.handler_timeout_ms ?? 1000,
  }, logger);
  return { logger, registry, dispatcher, seen };
}

test("known command runs its handler with parsed context", async () => {
  const { dispatcher, seen, logger } = setup();
  const { say, said } = collect_say();
  const outcome = await dispatcher.dispatch({ text: "<@UBOT> hello extra", user_id: "U1", say, region: "us-east-1" });

  assert.deepEqual(outcome, { kind: "dispatched", command: "hello" });
  assert.deepEqual(said, ["hi there"]);
  assert.equal(seen.length, 1);
  assert.equal(seen[0].user_id, "U1");
  assert.equal(seen[0].region, "us-east-1");
  assert.equal(seen[0].command_line, "hello extra");
  assert.deepEqual(seen[0].params, { named: {}, positional: ["extra"] });
  assert.deepEqual(logger.records.find((r) => r.msg === "dispatch"), {
    level: "info",
    msg: "dispatch",
    ctx: { command: "hello", user: "U1" },
  });
});

test("aliases and mixed case reach the same handler", async () => {
  const { dispatcher, seen } = setup();
  const { say } = collect_say();
  const outcome = await dispatcher.dispatch({ text: "AWS-VMS --State=stopped", user_id: "U1", say, region: "us-east-1" });
  assert.deepEqual(outcome, { kind: "dispatched", command: "aws-vms" });
  assert.deepEqual(seen[0].params.named, { state: "stopped" });
});

test("case-sensitive mode treats other casing as unknown", async () => {
  const { dispatcher, seen } = setup({ case_insensitive: false });
  const { say, said } = collect_say();
  const outcome = await dispatcher.dispatch({ text: "Hello", user_id: "U1", say, region: "us-east-1" });
  assert.deepEqual(outcome, { kind: "not_found", command: "Hello", suggestions: ["hello"] });
  assert.deepEqual(said, ["Hello <@U1>! Command `Hello` not found. Did you mean: hello?"]);
  assert.equal(seen.length, 0);
});

test("typo gets a close suggestion", async () => {
  const { dispatcher } = setup();
  const { say, said } = collect_say();
  const outcome = await dispatcher.dispatch({ text: "list-asw-vms", user_id: "U1", say, region: "us-east-1" });
  assert.deepEqual(outcome, { kind: "not_found", command: "list-asw-vms", suggestions: ["list-aws-vms"] });
  assert.deepEqual(said, ["Hello <@U1>! Command `list-asw-vms` not found. Did you mean: list-aws-vms?"]);
});

test("unknown command without suggestions points at help", async () => {
  const { dispatcher } = setup();
  const { say, said } = collect_say();
  await dispatcher.dispatch({ text: "zzzz", user_id: "U1", say, region: "us-east-1" });
  assert.deepEqual(said, ["Hello <@U1>! Command `zzzz` not found. Use `help` to see all available commands."]);
});

test("empty input and lone mention get the generic reply", async () => {
  const { dispatcher } = setup();
  const { say, said } = collect_say();
  assert.deepEqual(await dispatcher.dispatch({ text: "   ", user_id: "U1", say, region: "us-east-1" }), { kind: "empty" });
  assert.deepEqual(await dispatcher.dispatch({ text: "<@UBOT>", user_id: "U1", say, region: "us-east-1" }), { kind: "empty" });
  const generic = "Hello <@U1>! I couldn't understand your request. Please try again or type 'help' for assistance.";
  assert.deepEqual(said, [generic, generic]);
});

test("handler errors are logged and reported to the requester", async () => {
  const { dispatcher, registry, logger } = setup();
  registry.declare(define_command({ name: "boom" }), () => {
    throw new Error("kaboom");
  });
  const { say, said } = collect_say();
  const outcome = await dispatcher.dispatch({ text: "boom", user_id: "U1", say, region: "us-east-1" });
  assert.deepEqual(outcome, { kind: "failed", command: "boom", reason: "error" });
  assert.deepEqual(said, ["Sorry <@U1>, an error occurred while running `boom`."]);
  assert.deepEqual(logger.records.find((r) => r.level === "error"), {
    level: "error",
    msg: "handler failed",
    ctx: { command: "boom", user: "U1", error: "kaboom" },
  });
});

test("handlers that exceed the timeout are reported as timed out", async () => {
  const { dispatcher, registry, logger } = setup({ handler_timeout_ms: 20 });
  registry.declare(define_command({ name: "slow" }), () => new Promise<void>(() => undefined));
  const { say, said } = collect_say();
  const outcome = await dispatcher.dispatch({ text: "slow", user_id: "U1", say, region: "us-east-1" });
  assert.deepEqual(outcome, { kind: "failed", command: "slow", reason: "timeout" });
  assert.deepEqual(said, ["Sorry <@U1>, `slow` timed out after 0s."]);
  assert.equal(logger.records.some((r) => r.level === "warn" && r.msg === "handler timed out"), true);
});

test("addressed and bare forms reach the same handler with the same params", async () => {
  const { dispatcher, seen } = setup();
  const { say } = collect_say();
  const texts = [
    "<@UBOT> list-aws-vms --state=running",
    "list-aws-vms --state=running",
    "<@UBOT|ops-bot> list-aws-vms --state=running",
  ];
  for (const text of texts) {
    assert.deepEqual(
      await dispatcher.dispatch({ text, user_id: "U1", say, region: "us-east-1" }),
      { kind: "dispatched", command: "list-aws-vms" },
      text,
    );
  }
  assert.equal(seen.length, 3);
  for (const ctx of seen) {
    assert.equal(ctx.params.named.state, "running");
    assert.equal(ctx.command_line, "list-aws-vms --state=running");
  }
});
