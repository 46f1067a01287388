import assert from "node:assert/strict";
import test from "node:test";
import { define_command } from "../src/commands/define.ts";
import { GeneralHelpCache } from "../src/commands/general-help.ts";
import { HelpFormatter } from "../src/commands/help-formatter.ts";
import { HelpRequestHandler, has_help_flag, strip_help_tokens } from "../src/commands/help.handler.ts";
import { CommandRegistry } from "../src/commands/registry.ts";
import { collect_say, recording_logger } from "./helpers.ts";

const HELLO_HELP = "Hello <@U1>! Here's help for `hello`:\n\n*hello*\n_Greet the bot_\n\n*Aliases:* hi";

function setup(formatter_override?: (registry: CommandRegistry) => HelpFormatter) {
  const logger = recording_logger();
  const registry = new CommandRegistry(logger);
  registry.declare(define_command({ name: "hello", description: "Greet the bot", aliases: ["hi"] }), () => undefined);
  registry.declare(define_command({
    name: "list-aws-vms",
    description: "List AWS EC2 instances",
    arguments: { state: { description: "Instance state" } },
  }), () => undefined);
  const formatter = formatter_override ? formatter_override(registry) : new HelpFormatter(registry, logger);
  const general_help = new GeneralHelpCache(registry);
  const help = new HelpRequestHandler({ registry, formatter, general_help, case_insensitive: true, logger });
  const entry = help.as_command();
  registry.declare(entry.metadata, entry.handler);
  return { logger, registry, general_help, help, entry };
}

test("help flag detection", () => {
  assert.equal(has_help_flag("help hello"), true);
  assert.equal(has_help_flag("hello --help"), true);
  assert.equal(has_help_flag("hello -h"), true);
  assert.equal(has_help_flag("hello h"), true);
  assert.equal(has_help_flag("hello HELP"), true);
  assert.equal(has_help_flag("hello"), false);
  assert.equal(has_help_flag("--help"), false);
  assert.equal(has_help_flag("hello world"), false);
});

test("help tokens are stripped from both ends", () => {
  assert.equal(strip_help_tokens("help hello"), "hello");
  assert.equal(strip_help_tokens("hello --help"), "hello");
  assert.equal(strip_help_tokens("help"), "");
  assert.equal(strip_help_tokens("list-aws-vms --state=running -h"), "list-aws-vms --state=running");
});

test("plain help replies with the general command list", async () => {
  const { help, general_help } = setup();
  const { say, said } = collect_say();
  assert.equal(await help.try_handle("help", "U1", say), true);
  assert.deepEqual(said, [`Hello <@U1>! Here's what I can help you with:\n\n${general_help.get_general_help()}`]);
});

test("help for a command in every accepted form", async () => {
  const { help } = setup();
  for (const text of ["help hello", "Help hi", "hello --help", "HELLO -h", "<@UBOT> hello help"]) {
    const { say, said } = collect_say();
    assert.equal(await help.try_handle(text, "U1", say), true, text);
    const expected = text === "Help hi"
      ? "Hello <@U1>! Here's help for `hi`:\n\n*hi*\n_Greet the bot_\n\n*Aliases:* hi"
      : HELLO_HELP;
    assert.deepEqual(said, [expected], text);
  }
});

test("trailing flags after the command do not affect the target", async () => {
  const { help } = setup();
  const { say, said } = collect_say();
  await help.try_handle("list-aws-vms --state=running --help", "U1", say);
  assert.deepEqual(said, [[
    "Hello <@U1>! Here's help for `list-aws-vms`:",
    "",
    "*list-aws-vms*",
    "_List AWS EC2 instances_",
    "",
    "*Usage:* `list-aws-vms [--state=<state>]`",
    "",
    "*Arguments:*",
    "  `--state` - Instance state",
  ].join("\n")]);
});

test("help for an unknown command suggests close names", async () => {
  const { help } = setup();
  const first = collect_say();
  await help.try_handle("help helo", "U1", first.say);
  assert.deepEqual(first.said, ["Hello <@U1>! Command `helo` not found. Did you mean: hello?"]);

  const second = collect_say();
  await help.try_handle("help nonexistent", "U1", second.say);
  assert.deepEqual(second.said, ["Hello <@U1>! Command `nonexistent` not found. Use `help` to see all available commands."]);
});

test("ordinary commands are left to the dispatcher", async () => {
  const { help } = setup();
  const { say, said } = collect_say();
  assert.equal(await help.try_handle("hello", "U1", say), false);
  assert.equal(await help.try_handle("hello world", "U1", say), false);
  assert.equal(await help.try_handle("", "U1", say), false);
  assert.deepEqual(said, []);
});

test("the help command registers only its alias", async () => {
  const { registry, entry } = setup();
  assert.equal(registry.lookup("help"), null);
  assert.equal(registry.lookup("commands")?.metadata, entry.metadata);

  const { say, said } = collect_say();
  await entry.handler({
    say,
    user_id: "U1",
    params: { named: { command: "hello" }, positional: [] },
    region: "us-east-1",
    command_line: "commands --command=hello",
  });
  assert.deepEqual(said, [HELLO_HELP]);
});

test("rendering failures are reported to the requester", async () => {
  class BrokenFormatter extends HelpFormatter {
    format_command_help(): string {
      throw new Error("render broke");
    }
  }
  const { help, logger } = setup((registry) => new BrokenFormatter(registry, recording_logger()));
  const { say, said } = collect_say();
  await help.try_handle("help hello", "U1", say);
  assert.deepEqual(said, ["Sorry <@U1>, I encountered an error while generating help information."]);
  assert.deepEqual(logger.records.find((r) => r.level === "error"), {
    level: "error",
    msg: "help rendering failed",
    ctx: { target: "hello", error: "render broke" },
  });
});
