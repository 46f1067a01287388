/** Slack 멘션 토큰 `<@U123>` / `<@!U123>` / `<@U123|name>`. */
const ADDRESSING_TOKEN = /^<@[^>\s]+>$/;

export type ParsedCommandLine = {
  /** 조회에 쓰는 키. 대소문자 무시 모드면 소문자. */
  key: string;
  /** 사용자가 입력한 그대로의 명령 토큰. */
  command: string;
  args: string[];
  /** 멘션을 제거한 명령 라인. */
  line: string;
};

export function tokenize(text: string): string[] {
  return String(text || "").split(/\s+/).filter(Boolean);
}

export function is_addressing_token(token: string): boolean {
  return ADDRESSING_TOKEN.test(token);
}

/** 뒤에 토큰이 더 있을 때만 선행 멘션을 제거. */
export function strip_addressing_token(tokens: readonly string[]): string[] {
  if (tokens.length > 1 && is_addressing_token(tokens[0])) return tokens.slice(1);
  return [...tokens];
}

/** 비었거나 멘션만 있는 입력이면 null. */
export function parse_command_line(text: string, case_insensitive: boolean): ParsedCommandLine | null {
  const tokens = strip_addressing_token(tokenize(text));
  if (tokens.length === 0) return null;
  if (tokens.length === 1 && is_addressing_token(tokens[0])) return null;
  const [command, ...args] = tokens;
  return {
    key: case_insensitive ? command.toLowerCase() : command,
    command,
    args,
    line: tokens.join(" "),
  };
}
