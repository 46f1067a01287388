export function now_iso(): string {
  return new Date().toISOString();
}

export function escape_regexp(value: string): string {
  return String(value || "").replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** catch로 받은 값을 메시지 문자열로. */
export function error_message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** unknown 값을 Record<string, unknown>으로 안전 변환. 배열·null·프리미티브 → null. */
export function ensure_json_object(v: unknown): Record<string, unknown> | null {
  if (!v || typeof v !== "object" || Array.isArray(v)) return null;
  return { ...v };
}
