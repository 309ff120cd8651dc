/**
 * PII Redaction Logic
 *
 * Detects and redacts secrets and personally identifiable information from
 * log output.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "cohereapikey",
  "databaseurl",
  "database_url",
  "redisurl",
  "authorization",
  "cookie",
  "accesstoken",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair.
 *
 * - If the key matches a known sensitive field name the entire value is replaced
 *   with "[REDACTED]".
 * - If the value is a string that contains email-like patterns, those patterns
 *   are replaced with "[REDACTED]".
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    EMAIL_REGEX.lastIndex = 0;
    if (EMAIL_REGEX.test(value)) {
      EMAIL_REGEX.lastIndex = 0;
      return value.replace(EMAIL_REGEX, REDACTED);
    }
  }

  return value;
}

/**
 * Apply {@link redactValue} to every top-level field of a log object.
 * Used as Pino's `formatters.log`.
 */
export function redactFields(object: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(object)) {
    result[key] = redactValue(key, value);
  }
  return result;
}

/**
 * JSON paths for Pino's `redact` option: the property names that carry
 * secrets in this system, at the top level and one level nested
 * (e.g. `config.cohereApiKey`).
 */
export const REDACT_PATHS: string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "cohereApiKey",
  "databaseUrl",
  "redisUrl",
  "authorization",
  "cookie",
  "accessToken",
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.cohereApiKey",
  "*.databaseUrl",
  "*.redisUrl",
  "*.authorization",
  "*.cookie",
  "*.accessToken",
];
