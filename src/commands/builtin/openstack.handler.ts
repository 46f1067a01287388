import type { OpenStackVmProvider } from "../../cloud/types.js";
import type { Logger } from "../../logger.js";
import { error_message } from "../../utils/common.js";
import { define_command } from "../define.js";
import { producer } from "../dynamic-value.js";
import { apology, greeting } from "../replies.js";
import type { CommandContext, CommandEntry, CommandMetadata } from "../types.js";
import { param_or_default, validate_params } from "../validate.js";
import { format_vm_line, invalid_params_reply } from "./format.js";

export const OPENSTACK_STATUSES = ["ACTIVE", "SHUTOFF", "ERROR"] as const;

export const OPENSTACK_FLAVORS = [
  "m1.tiny", "m1.small", "m1.medium", "m1.large", "m1.xlarge",
  "ci.cpu.small", "ci.cpu.medium", "ci.cpu.large",
  "t2.micro", "t2.small", "t2.medium", "t3.micro", "t3.small", "t3.medium",
  "c5.large", "c5.xlarge", "c5.2xlarge",
  "r5.large", "r5.xlarge",
  "i3.large", "i3.xlarge",
] as const;

export type OpenStackCommandDeps = {
  provider: OpenStackVmProvider;
  /** OS 이름 → 이미지 id. 호출 시점에 읽는다. */
  os_image_map: () => Readonly<Record<string, string>>;
  logger: Logger;
};

export function create_openstack_commands(deps: OpenStackCommandDeps): CommandEntry[] {
  const { provider, os_image_map, logger } = deps;

  async function check(ctx: CommandContext, metadata: CommandMetadata): Promise<boolean> {
    const problems = validate_params(metadata, ctx.params, logger);
    if (problems.length === 0) return true;
    await ctx.say(invalid_params_reply(ctx.user_id, metadata.name, problems));
    return false;
  }

  const list_meta = define_command({
    name: "list-openstack-vms",
    description: "List OpenStack servers",
    arguments: {
      status: {
        description: "Server status to filter by",
        choices: [...OPENSTACK_STATUSES],
        default: "ACTIVE",
      },
      flavor: {
        description: "Flavor to filter by",
        choices: producer(() => [...OPENSTACK_FLAVORS]),
      },
    },
    examples: ["list-openstack-vms", "list-openstack-vms --status=SHUTOFF"],
    aliases: ["openstack-vms"],
  });

  const create_meta = define_command({
    name: "create-openstack-vm",
    description: "Create an OpenStack server",
    arguments: {
      name: { required: true, description: "Server name" },
      os: {
        required: true,
        description: "Operating system image",
        choices: producer(() => Object.keys(os_image_map())),
      },
      flavor: {
        required: true,
        description: "Server flavor",
        choices: producer(() => [...OPENSTACK_FLAVORS]),
      },
      network: { required: true, description: "Network to attach" },
      "key-name": { description: "SSH key pair name" },
    },
    examples: ["create-openstack-vm --name=test-vm --os=fedora --flavor=m1.small --network=provider_net_shared"],
  });

  return [
    {
      metadata: list_meta,
      handler: async (ctx) => {
        if (!(await check(ctx, list_meta))) return;
        const status = param_or_default(list_meta, ctx.params, "status", logger) || OPENSTACK_STATUSES[0];
        try {
          const servers = await provider.list_servers({ status, flavor: ctx.params.named.flavor });
          if (servers.length === 0) {
            await ctx.say(`:no_entry_sign: There are currently *no ${status} VMs* in OpenStack.`);
            return;
          }
          await ctx.say([`*OpenStack ${status} VMs* (${servers.length})`, ...servers.map(format_vm_line)].join("\n"));
        } catch (error) {
          logger.error("openstack list failed", { user: ctx.user_id, error: error_message(error) });
          await ctx.say(":x: An error occurred while fetching the list of VMs.");
        }
      },
    },
    {
      metadata: create_meta,
      handler: async (ctx) => {
        if (!(await check(ctx, create_meta))) return;
        const os_name = ctx.params.named.os;
        const image_id = os_image_map()[os_name];
        if (!image_id) {
          await ctx.say(`${apology(ctx.user_id)}no image is configured for OS \`${os_name}\`.`);
          return;
        }
        try {
          const vm = await provider.create_server({
            name: ctx.params.named.name,
            image_id,
            flavor: ctx.params.named.flavor,
            network: ctx.params.named.network,
            key_name: ctx.params.named["key-name"],
          });
          await ctx.say(`${greeting(ctx.user_id)}Successfully created OpenStack VM: ${vm.name || vm.id} (${vm.id})`);
        } catch (error) {
          logger.error("openstack create failed", { user: ctx.user_id, error: error_message(error) });
          await ctx.say(`${apology(ctx.user_id)}an error occurred creating the OpenStack VM: ${error_message(error)}`);
        }
      },
    },
  ];
}
