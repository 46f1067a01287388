import { static_value } from "./dynamic-value.js";
import type { ArgumentSpec, CommandMetadata, DefaultValue, DynamicValue } from "./types.js";

export type ArgumentInput = {
  required?: boolean;
  description?: string;
  /** 배열은 정적 선택지, producer(...)는 렌더링 시 평가. */
  choices?: readonly string[] | DynamicValue<readonly string[]>;
  default?: DefaultValue | DynamicValue<DefaultValue>;
};

export type CommandInput = {
  name: string;
  description?: string;
  /** 키 삽입 순서가 인자 순서가 된다. */
  arguments?: Record<string, ArgumentInput>;
  examples?: readonly string[];
  aliases?: readonly string[];
};

export const NO_DESCRIPTION = "No description available";

function is_string_list(v: readonly string[] | DynamicValue<readonly string[]>): v is readonly string[] {
  return Array.isArray(v);
}

function to_choices(input: ArgumentInput["choices"]): DynamicValue<readonly string[]> | undefined {
  if (input === undefined) return undefined;
  if (is_string_list(input)) return static_value(Object.freeze([...input]));
  return input;
}

function to_default(input: ArgumentInput["default"]): DynamicValue<DefaultValue> | undefined {
  if (input === undefined) return undefined;
  if (typeof input === "object") return input;
  return static_value(input);
}

function build_argument(name: string, input: ArgumentInput): ArgumentSpec {
  if (!name || /\s/.test(name)) throw new Error(`argument_name_invalid:${name}`);
  const choices = to_choices(input.choices);
  const fallback = to_default(input.default);
  return Object.freeze({
    name,
    required: input.required ?? false,
    description: input.description ?? "",
    ...(choices ? { choices } : {}),
    ...(fallback ? { default: fallback } : {}),
  });
}

/** 명령 메타데이터 값 객체를 만든다. 결과는 동결되어 이후 변경되지 않는다. */
export function define_command(input: CommandInput): CommandMetadata {
  const name = String(input.name || "").trim();
  if (!name || /\s/.test(name)) throw new Error(`command_name_invalid:${input.name}`);
  const aliases = [...(input.aliases || [])].map((a) => a.trim()).filter(Boolean);
  for (const alias of aliases) {
    if (/\s/.test(alias)) throw new Error(`alias_invalid:${alias}`);
  }
  const args = new Map<string, ArgumentSpec>();
  for (const [arg_name, arg] of Object.entries(input.arguments || {})) {
    args.set(arg_name, build_argument(arg_name, arg));
  }
  return Object.freeze({
    name,
    description: String(input.description || "").trim() || NO_DESCRIPTION,
    arguments: args,
    examples: Object.freeze([...(input.examples || [])]),
    aliases: Object.freeze(aliases),
  });
}
