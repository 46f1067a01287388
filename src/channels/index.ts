export type { ChannelHealth, ChannelProvider, ChatChannel, SendResult } from "./types.js";
export { SlackChannel, split_text_chunks, to_inbound_message } from "./slack.channel.js";
export type { FetchLike, SlackChannelOptions } from "./slack.channel.js";
export { ConsoleChannel } from "./console.channel.js";
