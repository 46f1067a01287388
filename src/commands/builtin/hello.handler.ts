import { define_command } from "../define.js";
import { greeting } from "../replies.js";
import type { CommandEntry } from "../types.js";

export function create_hello_command(): CommandEntry {
  return {
    metadata: define_command({
      name: "hello",
      description: "Greet the bot",
      examples: ["hello"],
      aliases: ["hi"],
    }),
    handler: async (ctx) => {
      await ctx.say(`${greeting(ctx.user_id)}How can I assist you today?`);
    },
  };
}
