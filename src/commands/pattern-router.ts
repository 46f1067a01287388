import type { Logger } from "../logger.js";
import { escape_regexp } from "../utils/common.js";
import { parse_command_line, tokenize } from "./command-line.js";
import {
  run_command_handler,
  type DispatchOutcome,
  type DispatchRequest,
  type MessageDispatcher,
} from "./dispatcher.js";
import { parse_command_params } from "./params.js";
import type { CommandRegistry } from "./registry.js";
import { command_not_found_reply, not_understood_reply } from "./replies.js";
import { suggest_commands } from "./suggest.js";
import type { CommandHandler } from "./types.js";

/** 멘션을 제거한 명령 라인을 받는다. */
export type RoutePredicate = (line: string) => boolean;

export type PatternRoute = {
  readonly name: string;
  readonly match: RoutePredicate;
  readonly handler: CommandHandler;
};

export function match_exact(token: string): RoutePredicate {
  return (line) => tokenize(line)[0] === token;
}

export function match_prefix(prefix: string): RoutePredicate {
  return (line) => line.startsWith(prefix);
}

export function match_substring(needle: string): RoutePredicate {
  return (line) => line.includes(needle);
}

export function match_regex(pattern: RegExp): RoutePredicate {
  return (line) => {
    pattern.lastIndex = 0;
    return pattern.test(line);
  };
}

/** 명령 키를 단어 경계까지 포함한 prefix 로 매칭. */
export function match_command_word(key: string): RoutePredicate {
  return match_regex(new RegExp(`^${escape_regexp(key)}(?:\\s|$)`));
}

/**
 * 레지스트리 키마다 prefix 경로 하나. 긴 키가 먼저 오도록 정렬해
 * 짧은 키(`list`)가 더 구체적인 키(`list-aws-vms`)를 가리지 않게 한다.
 */
export function routes_from_registry(registry: CommandRegistry): PatternRoute[] {
  return registry.all_keys()
    .sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0))
    .flatMap((key) => {
      const entry = registry.lookup(key);
      return entry ? [{ name: key, match: match_command_word(key), handler: entry.handler }] : [];
    });
}

export type PatternRouterOptions = {
  case_insensitive: boolean;
  handler_timeout_ms: number;
};

/** 등록 순서대로 술어를 검사해 처음 매칭된 경로에 위임. 경로 순서가 곧 우선순위. */
export class PatternRouter implements MessageDispatcher {
  constructor(
    private readonly routes: readonly PatternRoute[],
    private readonly options: PatternRouterOptions,
    private readonly logger: Logger,
  ) {}

  find_route(line: string): PatternRoute | null {
    for (const route of this.routes) {
      if (route.match(line)) return route;
    }
    return null;
  }

  async dispatch(req: DispatchRequest): Promise<DispatchOutcome> {
    const parsed = parse_command_line(req.text, false);
    if (!parsed) {
      await req.say(not_understood_reply(req.user_id));
      return { kind: "empty" };
    }
    const line = this.options.case_insensitive ? parsed.line.toLowerCase() : parsed.line;
    const route = this.find_route(line);
    if (!route) {
      const suggestions = suggest_commands(parsed.command, this.routes.map((r) => r.name));
      await req.say(command_not_found_reply(req.user_id, parsed.command, suggestions));
      return { kind: "not_found", command: parsed.command, suggestions };
    }

    this.logger.info("dispatch", { route: route.name, user: req.user_id });
    return run_command_handler(route.name, route.handler, {
      say: req.say,
      user_id: req.user_id,
      params: parse_command_params(parsed.args),
      region: req.region,
      command_line: parsed.line,
    }, {
      timeout_ms: this.options.handler_timeout_ms,
      logger: this.logger,
    });
  }
}
