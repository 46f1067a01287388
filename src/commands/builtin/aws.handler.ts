import type { AwsModifyAction, AwsVmProvider } from "../../cloud/types.js";
import type { Logger } from "../../logger.js";
import { error_message } from "../../utils/common.js";
import { define_command } from "../define.js";
import { producer } from "../dynamic-value.js";
import { apology, greeting } from "../replies.js";
import type { CommandContext, CommandEntry, CommandMetadata } from "../types.js";
import { param_or_default, validate_params } from "../validate.js";
import { format_vm_line, invalid_params_reply } from "./format.js";

export const AWS_INSTANCE_STATES = ["pending", "running", "shutting-down", "terminated", "stopping", "stopped"] as const;
export const AWS_INSTANCE_TYPES = ["t2.micro", "t2.small", "t2.medium", "t3.micro", "t3.small", "t3.medium"] as const;
const AWS_MODIFY_ACTIONS: readonly AwsModifyAction[] = ["start", "stop", "terminate"];

function parse_action(value: string | undefined): AwsModifyAction | null {
  return AWS_MODIFY_ACTIONS.find((a) => a === value) ?? null;
}

export type AwsCommandDeps = {
  provider: AwsVmProvider;
  logger: Logger;
};

export function create_aws_commands(deps: AwsCommandDeps): CommandEntry[] {
  const { provider, logger } = deps;

  /** 검증 실패면 안내 후 false. */
  async function check(ctx: CommandContext, metadata: CommandMetadata): Promise<boolean> {
    const problems = validate_params(metadata, ctx.params, logger);
    if (problems.length === 0) return true;
    await ctx.say(invalid_params_reply(ctx.user_id, metadata.name, problems));
    return false;
  }

  async function report_failure(ctx: CommandContext, action: string, error: unknown): Promise<void> {
    logger.error(`aws ${action} failed`, { user: ctx.user_id, region: ctx.region, error: error_message(error) });
    await ctx.say(`${apology(ctx.user_id)}an error occurred ${action}: ${error_message(error)}`);
  }

  const list_meta = define_command({
    name: "list-aws-vms",
    description: "List AWS EC2 instances in the configured region",
    arguments: {
      state: {
        description: "Instance state to filter by",
        choices: producer(() => [...AWS_INSTANCE_STATES]),
        default: "running",
      },
      type: {
        description: "Instance type to filter by",
        choices: [...AWS_INSTANCE_TYPES],
      },
    },
    examples: ["list-aws-vms", "list-aws-vms --state=stopped", "list-aws-vms --type=t3.micro"],
    aliases: ["aws-vms"],
  });

  const create_meta = define_command({
    name: "create-aws-vm",
    description: "Create an AWS EC2 instance",
    arguments: {
      name: { required: true, description: "Name tag for the instance" },
      type: {
        description: "Instance type",
        choices: [...AWS_INSTANCE_TYPES],
        default: "t3.micro",
      },
      "key-name": { description: "SSH key pair name" },
    },
    examples: ["create-aws-vm --name=test-vm", "create-aws-vm --name=test-vm --type=t3.small"],
  });

  const modify_meta = define_command({
    name: "aws-modify-vm",
    description: "Start, stop or terminate an AWS EC2 instance",
    arguments: {
      "vm-id": { required: true, description: "EC2 instance id" },
      action: {
        required: true,
        description: "Action to perform",
        choices: [...AWS_MODIFY_ACTIONS],
      },
    },
    examples: ["aws-modify-vm --vm-id=i-0123456789 --action=stop"],
  });

  return [
    {
      metadata: list_meta,
      handler: async (ctx) => {
        if (!(await check(ctx, list_meta))) return;
        const state = param_or_default(list_meta, ctx.params, "state", logger);
        try {
          const instances = await provider.list_instances(ctx.region, { state, type: ctx.params.named.type });
          if (instances.length === 0) {
            await ctx.say(state
              ? `There are currently no ${state} EC2 instances to retrieve`
              : "There are currently no EC2 instances to retrieve");
            return;
          }
          const lines = instances.map(format_vm_line);
          await ctx.say([`*AWS EC2 instances in ${ctx.region}* (${instances.length})`, ...lines].join("\n"));
        } catch (error) {
          await report_failure(ctx, "listing the EC2 instances", error);
        }
      },
    },
    {
      metadata: create_meta,
      handler: async (ctx) => {
        if (!(await check(ctx, create_meta))) return;
        const name = ctx.params.named.name;
        const instance_type = param_or_default(create_meta, ctx.params, "type", logger) || AWS_INSTANCE_TYPES[0];
        try {
          const vm = await provider.create_instance(ctx.region, {
            name,
            instance_type,
            key_name: ctx.params.named["key-name"],
            requested_by: ctx.user_id,
          });
          await ctx.say(`${greeting(ctx.user_id)}Successfully created EC2 instance: ${vm.name || vm.id} (${vm.id})`);
        } catch (error) {
          await report_failure(ctx, "creating the EC2 instance", error);
        }
      },
    },
    {
      metadata: modify_meta,
      handler: async (ctx) => {
        if (!(await check(ctx, modify_meta))) return;
        const action = parse_action(ctx.params.named.action);
        if (!action) return;
        const instance_id = ctx.params.named["vm-id"];
        try {
          const vm = await provider.modify_instance(ctx.region, instance_id, action);
          await ctx.say(`${greeting(ctx.user_id)}EC2 instance ${vm.id} is now ${vm.state}.`);
        } catch (error) {
          await report_failure(ctx, `running ${action} on the EC2 instance`, error);
        }
      },
    },
  ];
}
