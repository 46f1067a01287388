import { resolve } from "node:path";
import { createInterface } from "node:readline";
import { fileURLToPath } from "node:url";
import { BotService } from "./bot/service.js";
import type { AwsVmProvider, OpenStackVmProvider } from "./cloud/types.js";
import { ConsoleChannel, SlackChannel, type ChatChannel, type FetchLike } from "./channels/index.js";
import {
  CommandDispatcher,
  CommandRegistry,
  GeneralHelpCache,
  HelpFormatter,
  HelpRequestHandler,
  PatternRouter,
  register_builtin_commands,
  routes_from_registry,
  type MessageDispatcher,
} from "./commands/index.js";
import { load_config_from_env, type AppConfig } from "./config/schema.js";
import { create_logger, type Logger } from "./logger.js";
import { AccessGate } from "./security/access-gate.js";
import { error_message, now_iso } from "./utils/common.js";
import { load_env_files } from "./utils/env.js";

export interface RuntimeApp {
  config: AppConfig;
  registry: CommandRegistry;
  general_help: GeneralHelpCache;
  help: HelpRequestHandler;
  dispatcher: MessageDispatcher;
  channel: ChatChannel;
  bot: BotService;
  logger: Logger;
}

export type RuntimeOptions = {
  env?: NodeJS.ProcessEnv;
  aws?: AwsVmProvider;
  openstack?: OpenStackVmProvider;
  channel?: ChatChannel;
  fetch_impl?: FetchLike;
};

/** SDK 래퍼가 주입되지 않았을 때. 핸들러가 잡아서 사용자에게 보고한다. */
function unconfigured(provider: string): never {
  throw new Error(`${provider}_provider_not_configured`);
}

const UNCONFIGURED_AWS: AwsVmProvider = {
  list_instances: async () => unconfigured("aws"),
  create_instance: async () => unconfigured("aws"),
  modify_instance: async () => unconfigured("aws"),
};

const UNCONFIGURED_OPENSTACK: OpenStackVmProvider = {
  list_servers: async () => unconfigured("openstack"),
  create_server: async () => unconfigured("openstack"),
};

export function createRuntime(options?: RuntimeOptions): RuntimeApp {
  const config = load_config_from_env(options?.env);
  const logger = create_logger("bot", config.logLevel);

  const registry = new CommandRegistry(logger.child("registry"));
  const formatter = new HelpFormatter(registry, logger.child("help"));
  const general_help = new GeneralHelpCache(registry);
  const help = new HelpRequestHandler({
    registry,
    formatter,
    general_help,
    case_insensitive: config.dispatch.caseInsensitive,
    logger: logger.child("help"),
  });

  const declared = register_builtin_commands(registry, {
    help,
    aws: options?.aws || UNCONFIGURED_AWS,
    openstack: options?.openstack || UNCONFIGURED_OPENSTACK,
    team_links: config.teamLinks,
    os_image_map: () => config.cloud.openstackOsImageMap,
    logger: logger.child("commands"),
  });
  logger.info("commands registered", { commands: declared, keys: registry.size });

  const dispatcher_options = {
    case_insensitive: config.dispatch.caseInsensitive,
    handler_timeout_ms: config.dispatch.handlerTimeoutMs,
  };
  const dispatcher: MessageDispatcher = config.dispatch.matchMode === "pattern"
    ? new PatternRouter(routes_from_registry(registry), dispatcher_options, logger.child("router"))
    : new CommandDispatcher(registry, dispatcher_options, logger.child("dispatch"));

  const channel = options?.channel || (config.slack.botToken
    ? new SlackChannel({
      bot_token: config.slack.botToken,
      default_channel: config.slack.defaultChannel,
      api_base: config.slack.apiBase,
      fetch_impl: options?.fetch_impl,
    })
    : new ConsoleChannel());

  const bot = new BotService({
    channel,
    gate: new AccessGate({
      restrict: config.access.restrictToAllowedUsers,
      allowed_users: config.access.allowedUsers,
      admin_contact: config.access.adminContact,
    }),
    help,
    dispatcher,
    region: config.cloud.awsDefaultRegion,
    logger: logger.child("service"),
  });

  return { config, registry, general_help, help, dispatcher, channel, bot, logger };
}

function is_main_entry(): boolean {
  const argv1 = process.argv[1];
  if (!argv1) return false;
  const entry = resolve(argv1).toLowerCase();
  const current = resolve(fileURLToPath(import.meta.url)).toLowerCase();
  return entry === current;
}

if (is_main_entry()) {
  void (async () => {
    const boot_logger = create_logger("boot");
    const env_load = load_env_files(process.cwd());
    if (env_load.loaded > 0) {
      boot_logger.info(`loaded env vars=${env_load.loaded} files=${env_load.files.join(",")}`);
    }

    // 로컬 콘솔 모드: 표준 입력 한 줄 = 메시지 한 건. Slack 이벤트 수신은 호스트 쪽 몫.
    const app = createRuntime({ channel: new ConsoleChannel() });
    // 등록이 끝난 뒤에 만들어야 목록이 완전하다.
    app.general_help.get_general_help();

    const rl = createInterface({ input: process.stdin });
    let seq = 0;
    rl.on("line", (line) => {
      seq += 1;
      app.bot.submit({
        id: `console-${seq}`,
        provider: "slack",
        sender_id: process.env.BOT_CONSOLE_USER || "console",
        chat_id: "console",
        content: line,
        at: now_iso(),
      });
    });
    rl.on("close", () => {
      void app.bot.drain().then(() => process.exit(0));
    });
  })().catch((error: unknown) => {
    create_logger("boot").error(`bootstrap failed: ${error_message(error)}`);
    process.exit(1);
  });
}
