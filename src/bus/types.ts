export type BaseMessage = {
  id: string;
  provider: string;
  sender_id: string;
  chat_id: string;
  content: string;
  at: string;
  thread_id?: string;
  metadata?: Record<string, unknown>;
};

export type InboundMessage = BaseMessage & {
  /** 봇 자신이나 다른 봇이 보낸 메시지. */
  from_bot?: boolean;
};

export type OutboundMessage = BaseMessage & {
  reply_to?: string;
};
