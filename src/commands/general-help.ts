import { format_compact_usage } from "./help-formatter.js";
import type { CommandRegistry } from "./registry.js";

/**
 * 전체 명령 목록 텍스트. 최초 호출 시 한 번만 만들고 이후엔 그대로 반환한다.
 * 무효화 경로가 없으므로 기동 시 등록이 끝난 뒤에 호출해야 한다.
 */
export class GeneralHelpCache {
  private cached: string | null = null;

  constructor(private readonly registry: CommandRegistry) {}

  is_built(): boolean {
    return this.cached !== null;
  }

  get_general_help(): string {
    if (this.cached === null) this.cached = this.build();
    return this.cached;
  }

  private build(): string {
    const commands = [...this.registry.unique_commands()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    const lines = ["*Available Commands:*"];
    for (const [key, metadata] of commands) {
      lines.push(`\`${format_compact_usage(key, metadata)}\` - ${metadata.description}`);
    }

    lines.push("", "For detailed help on any command, use: `help <command-name>` or `<command-name> --help`");
    const first = commands[0]?.[0];
    if (first) lines.push("", `Example: \`help ${first}\` or \`${first} --help\``);
    return lines.join("\n");
  }
}
