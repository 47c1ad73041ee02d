/**
 * @dockhand/logger - Sensitive Data Sanitizer
 * Masks sensitive fields and known secret values in log output
 */

export const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'authorization',
  'private_key',
  'privatekey',
  'passphrase',
] as const;

const REDACTED = '****';

/**
 * Recursively mask sensitive data in objects.
 * Partially reveals long values (first 4 and last 4 chars).
 */
export function maskSensitiveData(obj: unknown): unknown {
  if (!obj || typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map(maskSensitiveData);
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some(k => lowerKey.includes(k))) {
      if (typeof value === 'string' && value.length > 8) {
        masked[key] = `${value.slice(0, 4)}${REDACTED}${value.slice(-4)}`;
      } else {
        masked[key] = REDACTED;
      }
    } else if (typeof value === 'object' && value !== null) {
      masked[key] = maskSensitiveData(value);
    } else {
      masked[key] = value;
    }
  }
  return masked;
}

/**
 * Replace every occurrence of each secret in free text.
 * Command output (git errors echo the clone URL) is the usual carrier.
 */
export function redactSecrets(text: string, secrets: Iterable<string>): string {
  let result = text;
  for (const secret of secrets) {
    if (!secret) continue;
    result = result.split(secret).join(REDACTED);
  }
  return result;
}
