/**
 * Redaction of secrets and personal data before values reach the logs.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values are always redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
  "cookie",
  "accesstoken",
  "refreshtoken",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair: sensitive keys lose their value entirely,
 * email addresses inside strings are masked.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Shallow copy of a caller-supplied record (e.g. upload metadata) that is safe
 * to attach to a log line. Nested objects are redacted one level deep.
 */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(record)) {
    if (value !== null && typeof value === "object" && !Array.isArray(value) && !isSensitiveKey(key)) {
      const nested: Record<string, unknown> = {};
      for (const [nestedKey, nestedValue] of Object.entries(value)) {
        nested[nestedKey] = redactValue(nestedKey, nestedValue);
      }
      result[key] = nested;
    } else {
      result[key] = redactValue(key, value);
    }
  }

  return result;
}

/**
 * JSON paths handed to pino's `redact` option.
 */
export const REDACT_PATHS: string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  // One level of nesting (config.password, headers.authorization)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.cookie",
];
