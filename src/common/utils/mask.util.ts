const SENSITIVE_KEYS = ['api_key', 'apikey', 'token', 'password', 'secret'];

/**
 * 로그 출력용 민감 키 마스킹 (중첩 객체 포함)
 */
export function maskSensitive(value: unknown, depth = 0): unknown {
  if (value == null) return value;
  if (depth > 4) return '[truncated]';
  if (Array.isArray(value)) {
    return value.map((item) => maskSensitive(item, depth + 1));
  }
  if (typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      out[key] = SENSITIVE_KEYS.includes(key.toLowerCase())
        ? maskedValue(entry)
        : maskSensitive(entry, depth + 1);
    }
    return out;
  }
  return value;
}

function maskedValue(entry: unknown): string {
  return typeof entry === 'string' && entry.length === 0 ? '' : '[masked]';
}
