export const MAX_SUGGESTIONS = 5;
const MAX_EDIT_DISTANCE = 2;

/**
 * 부분 문자열(대소문자 무시) 매칭을 키 순서대로, 이어서 편집 거리 2 이내 키를 가까운 순으로.
 * 중복 제거 후 최대 5개.
 */
export function suggest_commands(input: string, keys: readonly string[], limit = MAX_SUGGESTIONS): string[] {
  const needle = String(input || "").trim().toLowerCase();
  if (!needle) return [];
  const out: string[] = [];
  for (const key of keys) {
    if (key.toLowerCase().includes(needle)) out.push(key);
  }
  const near = keys
    .filter((key) => !out.includes(key))
    .map((key) => ({ key, dist: levenshtein(needle, key.toLowerCase()) }))
    .filter((c) => c.dist <= MAX_EDIT_DISTANCE)
    .sort((a, b) => a.dist - b.dist);
  for (const c of near) out.push(c.key);
  return out.slice(0, Math.max(0, limit));
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;
  const m = a.length;
  const n = b.length;
  let prev = Array.from({ length: n + 1 }, (_, i) => i);
  let curr = new Array<number>(n + 1);
  for (let i = 1; i <= m; i++) {
    curr[0] = i;
    for (let j = 1; j <= n; j++) {
      curr[j] = a[i - 1] === b[j - 1]
        ? prev[j - 1]
        : 1 + Math.min(prev[j - 1], prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[n];
}
