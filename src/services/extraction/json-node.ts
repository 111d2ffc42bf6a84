/**
 * Total accessors over untyped JSON trees. Every lookup returns a value or a default; none throws.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(node: unknown): node is JsonRecord {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

/** Walks object keys; any missing or non-object step yields undefined. */
export function path(node: unknown, ...keys: string[]): unknown {
  let current: unknown = node;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** Strings as-is, finite numbers and booleans stringified, anything else the fallback. */
export function asText(node: unknown, fallback = ''): string {
  if (typeof node === 'string') return node;
  if (typeof node === 'number') return Number.isFinite(node) ? String(node) : fallback;
  if (typeof node === 'boolean') return String(node);
  return fallback;
}

export function asNumber(node: unknown): number | undefined {
  if (typeof node === 'number') return Number.isFinite(node) ? node : undefined;
  if (typeof node === 'string' && node.trim() !== '') {
    const n = Number(node);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function asArray(node: unknown): unknown[] {
  return Array.isArray(node) ? node : [];
}

/** Non-empty text values found at `key` on each element of `nodes`. */
export function textsAt(nodes: unknown[], key: string): string[] {
  return nodes.map((n) => asText(path(n, key))).filter((t) => t.length > 0);
}
