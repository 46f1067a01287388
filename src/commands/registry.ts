import type { Logger } from "../logger.js";
import type { CommandEntry, CommandHandler, CommandMetadata } from "./types.js";

/** `help`는 별도 경로로 처리되므로 선언 경로에서는 자기 이름으로 등록하지 않는다. */
export const HELP_COMMAND = "help";

/**
 * dispatch key(정식 이름 + 별칭) → (handler, metadata).
 * 같은 명령의 모든 키는 동일한 metadata 객체를 가리킨다.
 * 동일 키 재등록은 마지막 등록이 이긴다.
 */
export class CommandRegistry {
  private readonly entries = new Map<string, CommandEntry>();

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.entries.size;
  }

  register(name: string, handler: CommandHandler, metadata: CommandMetadata): void {
    const entry: CommandEntry = { handler, metadata };
    this.put(name, entry);
    for (const alias of metadata.aliases) this.put(alias, entry);
  }

  /** 메타데이터 선언 경로. 정식 이름이 `help`면 별칭만 등록한다. */
  declare(metadata: CommandMetadata, handler: CommandHandler): void {
    const entry: CommandEntry = { handler, metadata };
    if (metadata.name !== HELP_COMMAND) this.put(metadata.name, entry);
    for (const alias of metadata.aliases) this.put(alias, entry);
  }

  lookup(name: string): CommandEntry | null {
    return this.entries.get(name) || null;
  }

  all_keys(): string[] {
    return [...this.entries.keys()];
  }

  /** metadata 동일성 기준 중복 제거. 처음 만난 키가 정식 키. */
  unique_commands(): Map<string, CommandMetadata> {
    const seen = new Set<CommandMetadata>();
    const out = new Map<string, CommandMetadata>();
    for (const [key, entry] of this.entries) {
      if (seen.has(entry.metadata)) continue;
      seen.add(entry.metadata);
      out.set(key, entry.metadata);
    }
    return out;
  }

  private put(key: string, entry: CommandEntry): void {
    const prev = this.entries.get(key);
    if (prev && prev.metadata !== entry.metadata && prev.metadata.name !== entry.metadata.name) {
      this.logger.warn("dispatch key overwritten", { key, previous: prev.metadata.name, next: entry.metadata.name });
    }
    this.entries.set(key, entry);
  }
}
