/**
 * Secret Redaction
 *
 * Credentials reach the logger through the parsed configuration and through
 * request headers. Both are censored before they are written.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values are always censored (matched case-insensitively).
 */
const SECRET_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "qdrantapikey",
  "cohereapikey",
  "authorization",
  "cookie",
]);

function isSecretKey(key: string): boolean {
  return SECRET_KEYS.has(key.toLowerCase());
}

/**
 * Return a deep copy of `value` in which every property with a secret key
 * holds "[REDACTED]". Used to log configuration objects safely.
 */
export function redactSecrets<T>(value: T): T;
export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSecrets(item));
  }

  if (typeof value === "object" && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = isSecretKey(key) && inner !== undefined ? REDACTED : redactSecrets(inner);
    }
    return result;
  }

  return value;
}

/**
 * Paths for pino's `redact` option: the secret keys at the top level and one
 * level of nesting (e.g. `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "qdrantApiKey",
  "cohereApiKey",
  "authorization",
  "cookie",
].flatMap((key) => [key, `*.${key}`]);
