import type { Logger } from "../logger.js";
import { error_message } from "../utils/common.js";
import { parse_command_line, tokenize } from "./command-line.js";
import { define_command } from "./define.js";
import type { GeneralHelpCache } from "./general-help.js";
import type { HelpFormatter } from "./help-formatter.js";
import { HELP_COMMAND, type CommandRegistry } from "./registry.js";
import { apology, command_not_found_reply, greeting } from "./replies.js";
import { suggest_commands } from "./suggest.js";
import type { CommandEntry, SayFn } from "./types.js";

const HELP_FLAG = /^(?:-{0,2}h|-{0,2}help)$/i;

function is_help_word(token: string): boolean {
  return token.toLowerCase() === HELP_COMMAND;
}

/** `help <x>` 이거나, 다른 토큰 뒤에 `help`/`-h`/`--help`/`h` 로 끝나는 라인. */
export function has_help_flag(line: string): boolean {
  const tokens = tokenize(line);
  if (tokens.length < 2) return false;
  return is_help_word(tokens[0]) || HELP_FLAG.test(tokens[tokens.length - 1]);
}

/** 선행 `help` 와 후행 help 플래그 토큰을 제거한 대상 명령. */
export function strip_help_tokens(line: string): string {
  const tokens = tokenize(line);
  while (tokens.length > 0 && is_help_word(tokens[0])) tokens.shift();
  while (tokens.length > 0 && HELP_FLAG.test(tokens[tokens.length - 1])) tokens.pop();
  return tokens.join(" ");
}

export type HelpRequestHandlerDeps = {
  registry: CommandRegistry;
  formatter: HelpFormatter;
  general_help: GeneralHelpCache;
  case_insensitive: boolean;
  logger: Logger;
};

/** `help [명령]` 과 `<명령> --help` 를 디스패처보다 먼저 처리. */
export class HelpRequestHandler {
  private readonly registry: CommandRegistry;
  private readonly formatter: HelpFormatter;
  private readonly general_help: GeneralHelpCache;
  private readonly case_insensitive: boolean;
  private readonly logger: Logger;

  constructor(deps: HelpRequestHandlerDeps) {
    this.registry = deps.registry;
    this.formatter = deps.formatter;
    this.general_help = deps.general_help;
    this.case_insensitive = deps.case_insensitive;
    this.logger = deps.logger;
  }

  /** 도움말 요청이면 응답하고 true. */
  async try_handle(text: string, user_id: string, say: SayFn): Promise<boolean> {
    const parsed = parse_command_line(text, this.case_insensitive);
    if (!parsed) return false;
    if (parsed.key !== HELP_COMMAND && !has_help_flag(parsed.line)) return false;
    await this.handle_help_request(say, user_id, strip_help_tokens(parsed.line));
    return true;
  }

  async handle_help_request(say: SayFn, user_id: string, target?: string): Promise<void> {
    let reply: string;
    try {
      reply = this.render_reply(user_id, tokenize(String(target || ""))[0] || "");
    } catch (error) {
      this.logger.error("help rendering failed", { target, error: error_message(error) });
      reply = `${apology(user_id)}I encountered an error while generating help information.`;
    }
    await say(reply);
  }

  /** 레지스트리에 선언할 help 명령. 정식 이름 `help` 는 등록되지 않고 별칭만 들어간다. */
  as_command(): CommandEntry {
    return {
      metadata: define_command({
        name: HELP_COMMAND,
        description: "Show available commands or detailed help for one command",
        arguments: {
          command: { description: "Command to describe" },
        },
        examples: ["help", "help list-aws-vms", "list-aws-vms --help"],
        aliases: ["commands"],
      }),
      handler: (ctx) => this.handle_help_request(ctx.say, ctx.user_id, ctx.params.named.command || ctx.params.positional.join(" ")),
    };
  }

  private render_reply(user_id: string, raw_target: string): string {
    if (!raw_target) {
      return `${greeting(user_id)}Here's what I can help you with:\n\n${this.general_help.get_general_help()}`;
    }
    const target = this.case_insensitive ? raw_target.toLowerCase() : raw_target;
    if (this.registry.lookup(target)) {
      const help = this.formatter.format_command_help(target, true);
      return `${greeting(user_id)}Here's help for \`${target}\`:\n\n${help}`;
    }
    const suggestions = suggest_commands(raw_target, this.registry.all_keys());
    return command_not_found_reply(user_id, raw_target, suggestions);
  }
}
