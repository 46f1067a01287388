import type { CommandParams } from "./types.js";

/**
 * 명령 키 뒤 토큰에서 `--key=value` 를 추출.
 * `--flag` 는 "true", 나머지는 positional. 같은 키가 반복되면 마지막 값.
 */
export function parse_command_params(tokens: readonly string[]): CommandParams {
  const named: Record<string, string> = {};
  const positional: string[] = [];
  for (const token of tokens) {
    const m = token.match(/^--([A-Za-z0-9][A-Za-z0-9_-]*)(?:=(.*))?$/);
    if (!m) {
      positional.push(token);
      continue;
    }
    named[m[1].toLowerCase()] = m[2] ?? "true";
  }
  return { named, positional };
}
