export type {
  ArgumentSpec,
  CommandContext,
  CommandEntry,
  CommandHandler,
  CommandMetadata,
  CommandParams,
  DefaultValue,
  DynamicValue,
  SayFn,
} from "./types.js";
export { format_mention } from "./types.js";
export { RESOLVE_ERROR_SENTINEL, producer, resolve_dynamic, static_value } from "./dynamic-value.js";
export { define_command, NO_DESCRIPTION } from "./define.js";
export type { ArgumentInput, CommandInput } from "./define.js";
export { CommandRegistry, HELP_COMMAND } from "./registry.js";
export { HelpFormatter, MAX_RENDERED_CHOICES } from "./help-formatter.js";
export { GeneralHelpCache } from "./general-help.js";
export { HelpRequestHandler, has_help_flag, strip_help_tokens } from "./help.handler.js";
export { parse_command_line, strip_addressing_token, tokenize } from "./command-line.js";
export { parse_command_params } from "./params.js";
export { suggest_commands, MAX_SUGGESTIONS } from "./suggest.js";
export { CommandDispatcher, run_command_handler } from "./dispatcher.js";
export type { DispatchOutcome, DispatchRequest, MessageDispatcher } from "./dispatcher.js";
export {
  PatternRouter,
  match_command_word,
  match_exact,
  match_prefix,
  match_regex,
  match_substring,
  routes_from_registry,
} from "./pattern-router.js";
export type { PatternRoute, RoutePredicate } from "./pattern-router.js";
export { register_builtin_commands } from "./builtin/index.js";
export type { BuiltinCommandDeps } from "./builtin/index.js";
