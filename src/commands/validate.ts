import type { Logger } from "../logger.js";
import { RESOLVE_ERROR_SENTINEL, resolve_dynamic } from "./dynamic-value.js";
import type { CommandMetadata, CommandParams } from "./types.js";

/** 필수 인자 누락과 선택지 밖의 값을 사람이 읽을 문장으로. 선택지 해석이 실패하면 검사를 건너뛴다. */
export function validate_params(metadata: CommandMetadata, params: CommandParams, logger: Logger): string[] {
  const problems: string[] = [];
  for (const arg of metadata.arguments.values()) {
    const value = params.named[arg.name];
    if (value === undefined) {
      if (arg.required) problems.push(`missing required argument \`--${arg.name}\``);
      continue;
    }
    if (!arg.choices) continue;
    const choices = resolve_dynamic(arg.choices, logger);
    if (typeof choices === "string" || choices.length === 0) continue;
    if (!choices.includes(value)) {
      problems.push(`invalid value \`${value}\` for \`--${arg.name}\` (expected one of: ${choices.join(", ")})`);
    }
  }
  return problems;
}

/** 전달된 값, 없으면 선언된 default. 둘 다 없거나 default 해석이 실패하면 undefined. */
export function param_or_default(
  metadata: CommandMetadata,
  params: CommandParams,
  name: string,
  logger: Logger,
): string | undefined {
  const value = params.named[name];
  if (value !== undefined) return value;
  const arg = metadata.arguments.get(name);
  if (!arg?.default) return undefined;
  const fallback = resolve_dynamic(arg.default, logger);
  return fallback === RESOLVE_ERROR_SENTINEL ? undefined : String(fallback);
}
