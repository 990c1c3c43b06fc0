import { createHash } from "crypto";

/** SHA-256 of a UTF-8 string. */
export function sha256String(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/**
 * Canonical JSON stringify with deep-sorted keys.
 * Used for deterministic hashing of nested objects.
 */
export function canonicalJsonStringify(obj: unknown): string {
  return JSON.stringify(sortKeysDeep(obj));
}

function sortKeysDeep(obj: unknown): unknown {
  if (obj === null || typeof obj !== "object") return obj;
  if (Array.isArray(obj)) return obj.map(sortKeysDeep);
  const record = obj as Record<string, unknown>;
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = sortKeysDeep(record[key]);
  }
  return sorted;
}

/** Compute SHA-256 of a canonical JSON representation. */
export function contentHash(obj: unknown): string {
  return sha256String(canonicalJsonStringify(obj));
}
