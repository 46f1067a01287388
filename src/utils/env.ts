import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";

export type EnvLoadSummary = { loaded: number; files: string[] };

function parse_line(line: string): { key: string; value: string } | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  const body = trimmed.startsWith("export ") ? trimmed.slice(7).trim() : trimmed;
  const eq = body.indexOf("=");
  if (eq <= 0) return null;
  const key = body.slice(0, eq).trim();
  let value = body.slice(eq + 1).trim();
  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }
  return { key, value };
}

/** 이미 설정된 프로세스 환경 변수는 덮어쓰지 않는다. */
function load_one(path: string, env: NodeJS.ProcessEnv): number {
  if (!existsSync(path)) return 0;
  const raw = readFileSync(path, "utf-8");
  let loaded = 0;
  for (const line of raw.split(/\r?\n/)) {
    const parsed = parse_line(line);
    if (!parsed || env[parsed.key] !== undefined) continue;
    env[parsed.key] = parsed.value;
    loaded += 1;
  }
  return loaded;
}

/** `.env.local` 이 `.env` 보다 먼저 읽혀 우선한다. */
export function load_env_files(workspace: string, env: NodeJS.ProcessEnv = process.env): EnvLoadSummary {
  const base = resolve(workspace);
  const candidates = [join(base, ".env.local"), join(base, ".env")];
  let loaded = 0;
  const files: string[] = [];
  for (const path of candidates) {
    const n = load_one(path, env);
    if (n > 0) {
      loaded += n;
      files.push(path);
    }
  }
  return { loaded, files };
}
