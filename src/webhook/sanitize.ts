/**
 * Secret Sanitization for Safe Logging
 *
 * Replaces OAuth and application tokens with '[REDACTED]' before a webhook
 * payload reaches the logs. Bitrix24 sends `auth[application_token]`,
 * `auth[access_token]` and friends with every outbound event.
 *
 * - Arrays are replaced with '[Array(N)]' summaries (never iterated into)
 * - Depth limit of 10 stops runaway recursion
 */

/** Field names whose values must never appear in logs */
export const SECRET_FIELDS: ReadonlySet<string> = new Set([
  'application_token',
  'access_token',
  'refresh_token',
  'client_secret',
  'member_id',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively sanitize a value for safe logging.
 *
 * Primitives pass through, secret values become '[REDACTED]', arrays become
 * '[Array(N)]', and objects nested deeper than MAX_DEPTH become '[Object]'.
 */
export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  if (!isRecord(obj)) {
    return obj;
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = SECRET_FIELDS.has(key) ? REDACTED : sanitizeForLog(value, depth + 1);
  }
  return result;
}
