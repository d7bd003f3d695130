import { createHash } from "crypto";

/**
 * 将任意值转成“规范化”字符串：
 * - 删除对象中值为 null / undefined 的字段
 * - 对象 key 按字典序深度排序
 *
 * 语义相同的对局快照/规则文档总能得到同一个字符串，用于 rules_id 与 state_hash。
 */
export function canonical_stringify(input: unknown): string {
  return JSON.stringify(canonicalize(input));
}

/**
 * 计算 SHA-256，返回带前缀的十六进制表示。
 *
 * 示例：
 *   hash_sha256("hello")
 *   => "sha256:2cf24dba5...9ca5"
 */
export function hash_sha256(text: string): string {
  const h = createHash("sha256").update(text, "utf8").digest("hex");
  return `sha256:${h}`;
}

/** canonical_stringify + hash_sha256 的组合 */
export function canonical_hash(input: unknown): string {
  return hash_sha256(canonical_stringify(input));
}

function canonicalize(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(canonicalize);

  if (v && typeof v === "object") {
    const out: Record<string, unknown> = {};
    const entries: Array<[string, unknown]> = Object.entries(v);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, val] of entries) {
      if (val === null || typeof val === "undefined") continue; // 过滤 null / undefined
      out[k] = canonicalize(val);
    }
    return out;
  }

  return v;
}
