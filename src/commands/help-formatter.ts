import type { Logger } from "../logger.js";
import { RESOLVE_ERROR_SENTINEL, resolve_dynamic } from "./dynamic-value.js";
import type { CommandRegistry } from "./registry.js";
import type { ArgumentSpec, CommandMetadata } from "./types.js";

export const MAX_RENDERED_CHOICES = 10;

export function format_not_found(name: string): string {
  return `Command '${name}' not found.`;
}

/** 상세 도움말용 usage: `--name=<name>` / `[--name=<name>]`. */
export function format_flag_usage(name: string, metadata: CommandMetadata): string {
  const parts = [name];
  for (const arg of metadata.arguments.values()) {
    parts.push(arg.required ? `--${arg.name}=<${arg.name}>` : `[--${arg.name}=<${arg.name}>]`);
  }
  return parts.join(" ");
}

/** 전체 목록용 usage: `<name>` / `[name]`. */
export function format_compact_usage(name: string, metadata: CommandMetadata): string {
  const parts = [name];
  for (const arg of metadata.arguments.values()) {
    parts.push(arg.required ? `<${arg.name}>` : `[${arg.name}]`);
  }
  return parts.join(" ");
}

export class HelpFormatter {
  constructor(
    private readonly registry: CommandRegistry,
    private readonly logger: Logger,
  ) {}

  format_command_help(name: string, detailed = false): string {
    const entry = this.registry.lookup(name);
    if (!entry) return format_not_found(name);
    const { metadata } = entry;
    if (!detailed) return `\`${name}\` - ${metadata.description}`;

    const lines = [`*${name}*`, `_${metadata.description}_`, ""];

    if (metadata.arguments.size > 0) {
      lines.push(`*Usage:* \`${format_flag_usage(name, metadata)}\``, "");
      lines.push("*Arguments:*");
      for (const arg of metadata.arguments.values()) {
        lines.push(this.format_argument_line(arg));
      }
      lines.push("");
    }

    if (metadata.examples.length > 0) {
      lines.push("*Examples:*");
      for (const example of metadata.examples) lines.push(`  \`${example}\``);
      lines.push("");
    }

    if (metadata.aliases.length > 0) {
      lines.push(`*Aliases:* ${metadata.aliases.join(", ")}`, "");
    }

    return lines.join("\n").trim();
  }

  private format_argument_line(arg: ArgumentSpec): string {
    let line = `  \`--${arg.name}\``;
    if (arg.required) line += " *(required)*";
    line += ` - ${arg.description || "No description"}`;

    if (arg.choices) {
      const choices = resolve_dynamic(arg.choices, this.logger);
      if (typeof choices === "string") {
        line += ` (Options: ${RESOLVE_ERROR_SENTINEL})`;
      } else if (choices.length > MAX_RENDERED_CHOICES) {
        line += ` (Options: ${choices.slice(0, MAX_RENDERED_CHOICES).join(", ")}, ...)`;
      } else if (choices.length > 0) {
        line += ` (Options: ${choices.join(", ")})`;
      }
    }

    if (arg.default) {
      line += ` (Default: ${String(resolve_dynamic(arg.default, this.logger))})`;
    }
    return line;
  }
}
