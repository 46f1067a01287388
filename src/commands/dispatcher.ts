import type { Logger } from "../logger.js";
import { error_message } from "../utils/common.js";
import { parse_command_line } from "./command-line.js";
import { parse_command_params } from "./params.js";
import type { CommandRegistry } from "./registry.js";
import {
  command_not_found_reply,
  handler_error_reply,
  handler_timeout_reply,
  not_understood_reply,
} from "./replies.js";
import { suggest_commands } from "./suggest.js";
import type { CommandContext, CommandHandler, SayFn } from "./types.js";

export type DispatchRequest = {
  text: string;
  user_id: string;
  say: SayFn;
  region: string;
};

export type DispatchOutcome =
  | { kind: "dispatched"; command: string }
  | { kind: "failed"; command: string; reason: "error" | "timeout" }
  | { kind: "not_found"; command: string; suggestions: string[] }
  | { kind: "empty" };

/** 레지스트리 기반·패턴 기반 디스패처가 공유하는 계약. */
export interface MessageDispatcher {
  dispatch(req: DispatchRequest): Promise<DispatchOutcome>;
}

export type HandlerRunOptions = {
  timeout_ms: number;
  logger: Logger;
};

/**
 * 핸들러 실행. 예외·타임아웃은 로그 후 요청자에게 보고하고 outcome으로 돌려준다.
 * 재시도하지 않는다.
 */
export async function run_command_handler(
  command: string,
  handler: CommandHandler,
  ctx: CommandContext,
  opts: HandlerRunOptions,
): Promise<DispatchOutcome> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), opts.timeout_ms);
  });
  try {
    const run = Promise.resolve().then(() => handler(ctx)).then(() => "done" as const);
    const result = await Promise.race([run, timeout]);
    if (result === "timeout") {
      void run.catch((error: unknown) => {
        opts.logger.error("handler failed after timeout", { command, error: error_message(error) });
      });
      opts.logger.warn("handler timed out", { command, user: ctx.user_id, timeout_ms: opts.timeout_ms });
      await ctx.say(handler_timeout_reply(ctx.user_id, command, opts.timeout_ms));
      return { kind: "failed", command, reason: "timeout" };
    }
    return { kind: "dispatched", command };
  } catch (error) {
    opts.logger.error("handler failed", { command, user: ctx.user_id, error: error_message(error) });
    await ctx.say(handler_error_reply(ctx.user_id, command));
    return { kind: "failed", command, reason: "error" };
  } finally {
    clearTimeout(timer);
  }
}

export type CommandDispatcherOptions = {
  case_insensitive: boolean;
  handler_timeout_ms: number;
};

/** 텍스트 → 레지스트리 조회 → 핸들러. 실패 시 제안 또는 기본 안내. */
export class CommandDispatcher implements MessageDispatcher {
  constructor(
    private readonly registry: CommandRegistry,
    private readonly options: CommandDispatcherOptions,
    private readonly logger: Logger,
  ) {}

  async dispatch(req: DispatchRequest): Promise<DispatchOutcome> {
    const parsed = parse_command_line(req.text, this.options.case_insensitive);
    if (!parsed) {
      await req.say(not_understood_reply(req.user_id));
      return { kind: "empty" };
    }

    const entry = this.registry.lookup(parsed.key);
    if (!entry) {
      const suggestions = suggest_commands(parsed.command, this.registry.all_keys());
      this.logger.debug("command not found", { command: parsed.command, suggestions: suggestions.length });
      await req.say(command_not_found_reply(req.user_id, parsed.command, suggestions));
      return { kind: "not_found", command: parsed.command, suggestions };
    }

    this.logger.info("dispatch", { command: parsed.key, user: req.user_id });
    const ctx: CommandContext = {
      say: req.say,
      user_id: req.user_id,
      params: parse_command_params(parsed.args),
      region: req.region,
      command_line: parsed.line,
    };
    return run_command_handler(parsed.key, entry.handler, ctx, {
      timeout_ms: this.options.handler_timeout_ms,
      logger: this.logger,
    });
  }
}
