import { randomUUID } from "node:crypto";
import type { InboundMessage } from "../bus/types.js";
import type { ChatChannel } from "../channels/types.js";
import type { DispatchOutcome, MessageDispatcher } from "../commands/dispatcher.js";
import type { HelpRequestHandler } from "../commands/help.handler.js";
import type { Logger } from "../logger.js";
import type { AccessGate } from "../security/access-gate.js";
import { error_message, now_iso } from "../utils/common.js";

export type BotServiceDeps = {
  channel: ChatChannel;
  gate: AccessGate;
  help: HelpRequestHandler;
  dispatcher: MessageDispatcher;
  region: string;
  logger: Logger;
};

export type HandleResult = "ignored" | "denied" | "help" | DispatchOutcome["kind"];

/**
 * 인바운드 한 건 → 접근 제어 → help → 디스패치. 모든 응답은 같은 채팅/스레드로 나간다.
 * 메시지마다 독립된 promise 로 처리되어 느린 핸들러가 다른 메시지를 막지 않는다.
 */
export class BotService {
  private readonly channel: ChatChannel;
  private readonly gate: AccessGate;
  private readonly help: HelpRequestHandler;
  private readonly dispatcher: MessageDispatcher;
  private readonly region: string;
  private readonly logger: Logger;
  private readonly inflight = new Set<Promise<void>>();

  constructor(deps: BotServiceDeps) {
    this.channel = deps.channel;
    this.gate = deps.gate;
    this.help = deps.help;
    this.dispatcher = deps.dispatcher;
    this.region = deps.region;
    this.logger = deps.logger;
  }

  get inflight_count(): number {
    return this.inflight.size;
  }

  /** 기다리지 않고 처리 시작. 실패는 로그만 남긴다. */
  submit(message: InboundMessage): void {
    const task = this.handle_message(message)
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.error("inbound handling failed", { id: message.id, error: error_message(error) });
      })
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  /** 진행 중인 처리가 모두 끝날 때까지 대기. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  async handle_message(message: InboundMessage): Promise<HandleResult> {
    if (message.from_bot) return "ignored";
    const user_id = message.sender_id;
    const say = (content: string) => this.send_reply(message, content);

    if (!this.gate.is_allowed(user_id)) {
      this.logger.warn("unauthorized user", { user: user_id, chat: message.chat_id });
      await say(this.gate.denial_reply(user_id));
      return "denied";
    }

    const text = String(message.content || "").trim();
    this.logger.debug("inbound", { user: user_id, chat: message.chat_id, text: text.slice(0, 80) });

    if (await this.help.try_handle(text, user_id, say)) return "help";

    const outcome = await this.dispatcher.dispatch({ text, user_id, say, region: this.region });
    return outcome.kind;
  }

  private async send_reply(message: InboundMessage, content: string): Promise<void> {
    const result = await this.channel.send({
      id: randomUUID().slice(0, 12),
      provider: message.provider,
      sender_id: "bot",
      chat_id: message.chat_id,
      content,
      at: now_iso(),
      reply_to: message.thread_id,
      metadata: { in_reply_to: message.id },
    });
    if (!result.ok) {
      this.logger.warn("reply failed", { chat: message.chat_id, error: result.error });
    }
  }
}
