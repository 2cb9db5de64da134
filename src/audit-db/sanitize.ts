const REDACTED = '[REDACTED]';

// Columns of the user/auth tables that must never reach the audit log.
const SECRET_KEYS = new Set([
  'password',
  'password_hash',
  'new_password',
  'current_password',
  'token',
  'access_token',
  'refresh_token',
  'secret',
  'authorization',
  'cookie',
  'session_id',
  'api_key',
]);

const SECRET_PATTERNS: RegExp[] = [
  /eyJ[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}/g, // JWTs
  /Bearer\s+[a-zA-Z0-9._~+/=-]+/g,
  /pbkdf2:sha256:\d+\$[^\s"]+/g, // salted pbkdf2 password hashes
];

function scrub(text: string): string {
  return SECRET_PATTERNS.reduce((acc, pattern) => acc.replace(pattern, REDACTED), text);
}

function sanitizeEntry(key: string, value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (SECRET_KEYS.has(key.toLowerCase())) return REDACTED;
  if (typeof value === 'string') return scrub(value);
  if (Array.isArray(value)) return value.map((item) => sanitizeEntry('', item));
  if (typeof value === 'object') return sanitizeValues(Object.fromEntries(Object.entries(value)));
  return value;
}

/** Redacts secret columns and credential-shaped strings from old/new value snapshots. */
export function sanitizeValues(values: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    result[key] = sanitizeEntry(key, value);
  }
  return result;
}
