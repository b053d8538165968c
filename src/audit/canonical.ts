/**
 * Canonical JSON serialization and secret redaction for usage events.
 *
 * Canonical form:
 *   1. Keys sorted lexicographically at every nesting level.
 *   2. `undefined` values omitted, never serialized as null.
 *   3. Dates serialized as ISO 8601 UTC strings.
 *   4. Arrays keep element order.
 *
 * Identical logical input gives byte-identical output.
 */

export function canonicalJson(value: unknown): string {
  return JSON.stringify(toSortedValue(value));
}

function toSortedValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map(toSortedValue);
  }

  if (typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    );
    for (const [key, v] of entries) {
      if (v !== undefined) {
        sorted[key] = toSortedValue(v);
      }
    }
    return sorted;
  }

  return value;
}

// ---------------------------------------------------------------------------
// Redaction
// ---------------------------------------------------------------------------

export const REDACTED = "[REDACTED]";

/** Keys (compared lowercase) whose values never reach the ledger. */
export const SECRET_KEYS: ReadonlySet<string> = new Set([
  "password",
  "private_key",
  "private_key_file",
  "private_key_passphrase",
  "token",
  "access_token",
  "api_key",
  "secret",
]);

/**
 * Deep copy of `value` with every secret-keyed value replaced by
 * {@link REDACTED}.
 */
export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }
  if (value !== null && typeof value === "object" && !(value instanceof Date)) {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      out[key] = SECRET_KEYS.has(key.toLowerCase()) ? REDACTED : redactSecrets(v);
    }
    return out;
  }
  return value;
}

/** {@link redactSecrets} for a payload record. */
export function redactPayload(
  payload: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(payload)) {
    out[key] = SECRET_KEYS.has(key.toLowerCase()) ? REDACTED : redactSecrets(v);
  }
  return out;
}
