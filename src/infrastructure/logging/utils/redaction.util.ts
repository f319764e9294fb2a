const REDACT_KEYS = new Set([
  'password',
  'pass',
  'pwd',
  'token',
  'access_token',
  'refresh_token',
  'authorization',
  'apikey',
  'api_key',
  'groq_api_key',
  'client_secret',
  'secret',
  'cookie',
  'set-cookie',
  'auth',
  'credentials',
]);

export function shouldRedact(key: string): boolean {
  return REDACT_KEYS.has(key.toLowerCase());
}

export function deepRedact(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map((v) => deepRedact(v));
  if (value instanceof Date) return value;
  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      result[key] = shouldRedact(key) ? '[REDACTED]' : deepRedact(v);
    }
    return result;
  }
  return value;
}

/** Redacts the top-level keys of a record, recursing into values. */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(record)) {
    result[key] = shouldRedact(key) ? '[REDACTED]' : deepRedact(v);
  }
  return result;
}
