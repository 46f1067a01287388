/** 정적 값 또는 렌더링 시점에 평가되는 producer. */
export type DynamicValue<T> =
  | { readonly kind: "static"; readonly value: T }
  | { readonly kind: "producer"; readonly produce: () => T };

export type DefaultValue = string | number | boolean;

export type ArgumentSpec = {
  readonly name: string;
  readonly required: boolean;
  readonly description: string;
  readonly choices?: DynamicValue<readonly string[]>;
  readonly default?: DynamicValue<DefaultValue>;
};

export type CommandMetadata = {
  readonly name: string;
  readonly description: string;
  /** 선언 순서가 usage·상세 도움말의 순서. */
  readonly arguments: ReadonlyMap<string, ArgumentSpec>;
  readonly examples: readonly string[];
  readonly aliases: readonly string[];
};

export type CommandParams = {
  /** `--key=value` 토큰. key는 소문자. */
  named: Record<string, string>;
  positional: string[];
};

/** 핸들러의 유일한 출력 경로. */
export type SayFn = (content: string) => Promise<void>;

export type CommandContext = {
  say: SayFn;
  user_id: string;
  params: CommandParams;
  region: string;
  /** 멘션을 제거한 명령 라인. */
  command_line: string;
};

export type CommandHandler = (ctx: CommandContext) => void | Promise<void>;

export type CommandEntry = {
  readonly handler: CommandHandler;
  readonly metadata: CommandMetadata;
};

/** Slack `<@U123>` 형식 멘션. */
export function format_mention(user_id: string): string {
  return `<@${user_id}>`;
}
