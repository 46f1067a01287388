import type { OutboundMessage } from "../bus/types.js";
import type { ChannelHealth, ChatChannel, SendResult } from "./types.js";

export type LineWriter = (line: string) => void;

/** 토큰 없이 로컬에서 돌릴 때 응답을 표준 출력으로. */
export class ConsoleChannel implements ChatChannel {
  readonly provider = "console" as const;
  private sent = 0;

  constructor(private readonly write: LineWriter = (line) => process.stdout.write(`${line}\n`)) {}

  async send(message: OutboundMessage): Promise<SendResult> {
    this.sent += 1;
    this.write(message.content);
    return { ok: true, message_id: String(this.sent) };
  }

  get_health(): ChannelHealth {
    return { provider: this.provider };
  }
}
