import { format_mention } from "./types.js";

export function greeting(user_id: string): string {
  return user_id ? `Hello ${format_mention(user_id)}! ` : "Hello! ";
}

export function apology(user_id: string): string {
  return user_id ? `Sorry ${format_mention(user_id)}, ` : "Sorry, ";
}

export function not_understood_reply(user_id: string): string {
  return `${greeting(user_id)}I couldn't understand your request. Please try again or type 'help' for assistance.`;
}

export function command_not_found_reply(user_id: string, command: string, suggestions: readonly string[]): string {
  if (suggestions.length > 0) {
    return `${greeting(user_id)}Command \`${command}\` not found. Did you mean: ${suggestions.join(", ")}?`;
  }
  return `${greeting(user_id)}Command \`${command}\` not found. Use \`help\` to see all available commands.`;
}

export function handler_error_reply(user_id: string, command: string): string {
  return `${apology(user_id)}an error occurred while running \`${command}\`.`;
}

export function handler_timeout_reply(user_id: string, command: string, timeout_ms: number): string {
  return `${apology(user_id)}\`${command}\` timed out after ${Math.round(timeout_ms / 1000)}s.`;
}
