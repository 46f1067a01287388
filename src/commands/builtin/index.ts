import type { AwsVmProvider, OpenStackVmProvider } from "../../cloud/types.js";
import type { Logger } from "../../logger.js";
import type { HelpRequestHandler } from "../help.handler.js";
import type { CommandRegistry } from "../registry.js";
import type { CommandEntry } from "../types.js";
import { create_aws_commands } from "./aws.handler.js";
import { create_hello_command } from "./hello.handler.js";
import { create_openstack_commands } from "./openstack.handler.js";
import { create_team_links_command, type TeamLinks } from "./team-links.handler.js";

export { create_aws_commands, AWS_INSTANCE_STATES, AWS_INSTANCE_TYPES } from "./aws.handler.js";
export { create_openstack_commands, OPENSTACK_FLAVORS, OPENSTACK_STATUSES } from "./openstack.handler.js";
export { create_hello_command } from "./hello.handler.js";
export { create_team_links_command } from "./team-links.handler.js";
export type { TeamLinks } from "./team-links.handler.js";

export type BuiltinCommandDeps = {
  help: HelpRequestHandler;
  aws: AwsVmProvider;
  openstack: OpenStackVmProvider;
  team_links: TeamLinks;
  os_image_map: () => Readonly<Record<string, string>>;
  logger: Logger;
};

export function create_builtin_commands(deps: BuiltinCommandDeps): CommandEntry[] {
  return [
    deps.help.as_command(),
    create_hello_command(),
    create_team_links_command(deps.team_links),
    ...create_aws_commands({ provider: deps.aws, logger: deps.logger.child("aws") }),
    ...create_openstack_commands({
      provider: deps.openstack,
      os_image_map: deps.os_image_map,
      logger: deps.logger.child("openstack"),
    }),
  ];
}

/** 기동 단계에서 한 번 호출. 이후 레지스트리는 읽기 전용으로 쓴다. */
export function register_builtin_commands(registry: CommandRegistry, deps: BuiltinCommandDeps): number {
  const entries = create_builtin_commands(deps);
  for (const entry of entries) registry.declare(entry.metadata, entry.handler);
  return entries.length;
}
