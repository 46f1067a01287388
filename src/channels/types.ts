import type { OutboundMessage } from "../bus/types.js";

export type ChannelProvider = "slack" | "console";

export type SendResult = { ok: boolean; message_id?: string; error?: string };

export type ChannelHealth = {
  provider: ChannelProvider;
  last_error?: string;
};

/** 응답 전송만 담당. 수신 루프는 이 저장소 밖에 있다. */
export interface ChatChannel {
  readonly provider: ChannelProvider;
  send(message: OutboundMessage): Promise<SendResult>;
  get_health(): ChannelHealth;
}
