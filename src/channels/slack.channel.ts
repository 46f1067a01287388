import { randomUUID } from "node:crypto";
import type { InboundMessage, OutboundMessage } from "../bus/types.js";
import { ensure_json_object, error_message, now_iso } from "../utils/common.js";
import type { ChannelHealth, ChatChannel, SendResult } from "./types.js";

export type FetchLike = typeof fetch;

export type SlackChannelOptions = {
  bot_token: string;
  default_channel?: string;
  api_base?: string;
  chunk_size?: number;
  fetch_impl?: FetchLike;
};

const SLACK_EVENT_TYPES = new Set(["message", "app_mention"]);

/** Slack Events API 의 `message` / `app_mention` 이벤트를 InboundMessage 로. 그 외는 null. */
export function to_inbound_message(event: unknown): InboundMessage | null {
  const raw = ensure_json_object(event);
  if (!raw || !SLACK_EVENT_TYPES.has(String(raw.type || ""))) return null;
  const subtype = String(raw.subtype || "").toLowerCase();
  if (subtype === "message_changed" || subtype === "message_deleted") return null;
  const from_bot = (typeof raw.bot_id === "string" && raw.bot_id.trim().length > 0) || subtype === "bot_message";
  const ts = String(raw.ts || "");
  return {
    id: ts || randomUUID().slice(0, 12),
    provider: "slack",
    sender_id: String(raw.user || raw.bot_id || "unknown"),
    chat_id: String(raw.channel || ""),
    content: String(raw.text || ""),
    at: now_iso(),
    thread_id: typeof raw.thread_ts === "string" ? raw.thread_ts : undefined,
    from_bot,
    metadata: { message_id: ts, event_type: String(raw.type) },
  };
}

/** 긴 본문을 줄/공백 경계에서 나눈다. */
export function split_text_chunks(raw: string, max_chars: number): string[] {
  const text = String(raw || "");
  const max = Math.max(500, Number(max_chars || 3500));
  if (text.length <= max) return [text];
  const out: string[] = [];
  let cursor = 0;
  while (cursor < text.length) {
    const remain = text.length - cursor;
    if (remain <= max) {
      out.push(text.slice(cursor).trim());
      break;
    }
    const probe = text.slice(cursor, cursor + max);
    const hard_break = Math.max(probe.lastIndexOf("\n\n"), probe.lastIndexOf("\n"), probe.lastIndexOf(" "));
    const take = hard_break > Math.floor(max * 0.55) ? hard_break : max;
    out.push(text.slice(cursor, cursor + take).trim());
    cursor += take;
  }
  return out.filter((v) => Boolean(v.trim()));
}

export class SlackChannel implements ChatChannel {
  readonly provider = "slack" as const;
  private readonly bot_token: string;
  private readonly default_channel: string;
  private readonly api_base: string;
  private readonly chunk_size: number;
  private readonly fetch_impl: FetchLike;
  private last_error = "";

  constructor(options: SlackChannelOptions) {
    this.bot_token = options.bot_token;
    this.default_channel = options.default_channel || "";
    this.api_base = (options.api_base || "https://slack.com/api").replace(/\/+$/, "");
    this.chunk_size = Math.max(500, options.chunk_size ?? 3200);
    this.fetch_impl = options.fetch_impl || fetch;
  }

  async send(message: OutboundMessage): Promise<SendResult> {
    const channel = String(message.chat_id || this.default_channel || "");
    if (!channel) return this.fail("chat_id_required");
    if (!this.bot_token) return this.fail("slack_bot_token_missing");
    const text = String(message.content || "");
    if (!text.trim()) return { ok: true };

    const thread_ts = String(message.reply_to || message.thread_id || "").trim() || undefined;
    const chunks = split_text_chunks(text, this.chunk_size);
    let root_ts = "";
    try {
      for (let idx = 0; idx < chunks.length; idx += 1) {
        const prefix = chunks.length > 1 ? `[${idx + 1}/${chunks.length}]\n` : "";
        const posted = await this.post_text_message(channel, `${prefix}${chunks[idx]}`, thread_ts);
        if (!posted.ok) return this.fail(posted.error || "post_failed");
        if (!root_ts) root_ts = posted.message_id || "";
      }
      return { ok: true, message_id: root_ts };
    } catch (error) {
      return this.fail(error_message(error));
    }
  }

  get_health(): ChannelHealth {
    return {
      provider: this.provider,
      last_error: this.last_error || undefined,
    };
  }

  private fail(error: string): SendResult {
    this.last_error = error;
    return { ok: false, error };
  }

  private async post_text_message(channel: string, text: string, thread_ts?: string): Promise<SendResult> {
    const payload: Record<string, unknown> = { channel, text };
    if (thread_ts) payload.thread_ts = thread_ts;
    const response = await this.fetch_impl(`${this.api_base}/chat.postMessage`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.bot_token}`,
        "Content-Type": "application/json; charset=utf-8",
      },
      body: JSON.stringify(payload),
    });
    const data: Record<string, unknown> = ensure_json_object(await response.json().catch(() => null)) || {};
    if (!response.ok || data.ok !== true) {
      return { ok: false, error: String(data.error || `http_${response.status}`) };
    }
    return { ok: true, message_id: String(data.ts || "") };
  }
}
