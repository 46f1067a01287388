import { define_command } from "../define.js";
import { greeting } from "../replies.js";
import type { CommandEntry } from "../types.js";

/** 라벨 → URL. */
export type TeamLinks = Readonly<Record<string, string>>;

export function create_team_links_command(links: TeamLinks): CommandEntry {
  return {
    metadata: define_command({
      name: "list-team-links",
      description: "List useful team links",
      examples: ["list-team-links"],
      aliases: ["team-links"],
    }),
    handler: async (ctx) => {
      const entries = Object.entries(links);
      if (entries.length === 0) {
        await ctx.say(`${greeting(ctx.user_id)}No team links are configured.`);
        return;
      }
      const lines = entries.map(([label, url]) => `• <${url}|${label}>`);
      await ctx.say([`${greeting(ctx.user_id)}Here are the team links:`, ...lines].join("\n"));
    },
  };
}
