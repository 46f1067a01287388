import { z } from "zod";

type Env = NodeJS.ProcessEnv;

function env_bool(env: Env, key: string, fallback: boolean): boolean {
  const v = String(env[key] || "").trim().toLowerCase();
  if (!v) return fallback;
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return fallback;
}

function env_str(env: Env, key: string, fallback: string): string {
  return String(env[key] || "").trim() || fallback;
}

function env_num(env: Env, key: string, fallback: number): number {
  const raw = String(env[key] || "").trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

/** JSON 객체 문자열 환경 변수. 파싱 불가면 기동 실패로 처리. */
function env_json(env: Env, key: string): unknown {
  const raw = String(env[key] || "").trim();
  if (!raw) return {};
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error(`${key.toLowerCase()}_invalid_json`);
  }
}

const StringMapSchema = z.record(z.string(), z.string());

const SlackSchema = z.object({
  botToken: z.string(),
  defaultChannel: z.string(),
  apiBase: z.string().url(),
});

const AccessSchema = z.object({
  restrictToAllowedUsers: z.boolean(),
  /** 표시 이름 → Slack user id. */
  allowedUsers: StringMapSchema,
  adminContact: z.string().min(1),
});

const DispatchSchema = z.object({
  caseInsensitive: z.boolean(),
  matchMode: z.enum(["registry", "pattern"]),
  handlerTimeoutMs: z.number().int().min(1_000),
});

const CloudSchema = z.object({
  awsDefaultRegion: z.string().min(1),
  /** OS 이름 → 이미지 id. create-openstack-vm 의 --os 선택지. */
  openstackOsImageMap: StringMapSchema,
});

export const AppConfigSchema = z.object({
  logLevel: z.enum(["debug", "info", "warn", "error"]),
  slack: SlackSchema,
  access: AccessSchema,
  dispatch: DispatchSchema,
  cloud: CloudSchema,
  /** 라벨 → URL. list-team-links 출력. */
  teamLinks: StringMapSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type MatchMode = AppConfig["dispatch"]["matchMode"];

export function load_config_from_env(env: Env = process.env): AppConfig {
  const raw = {
    logLevel: env_str(env, "LOG_LEVEL", "info").toLowerCase(),
    slack: {
      botToken: env_str(env, "SLACK_BOT_TOKEN", ""),
      defaultChannel: env_str(env, "SLACK_DEFAULT_CHANNEL", ""),
      apiBase: env_str(env, "SLACK_API_BASE", "https://slack.com/api"),
    },
    access: {
      restrictToAllowedUsers: env_bool(env, "RESTRICT_TO_ALLOWED_USERS", false),
      allowedUsers: env_json(env, "ALLOWED_SLACK_USERS"),
      adminContact: env_str(env, "BOT_ADMIN_CONTACT", "the bot administrators"),
    },
    dispatch: {
      caseInsensitive: env_bool(env, "BOT_CASE_INSENSITIVE", true),
      matchMode: env_str(env, "BOT_MATCH_MODE", "registry").toLowerCase(),
      handlerTimeoutMs: Math.max(1_000, env_num(env, "BOT_HANDLER_TIMEOUT_MS", 120_000)),
    },
    cloud: {
      awsDefaultRegion: env_str(env, "AWS_DEFAULT_REGION", "us-east-1"),
      openstackOsImageMap: env_json(env, "OPENSTACK_OS_IMAGE_MAP"),
    },
    teamLinks: env_json(env, "TEAM_LINKS"),
  };

  return AppConfigSchema.parse(raw);
}
