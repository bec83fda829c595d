/**
 * Credential Sanitizer Utility
 *
 * Security log lines must never carry managed-store credentials.
 *
 * Exclusion Rules:
 * - Never log: credentials (IDENTIFIED BY ...), passwords, tokens, API keys
 * - Always log: permissionId, principal, resource, eventType, timestamp, success
 */

/**
 * Redact credentials from driver or statement text.
 *
 * @returns Sanitized message (max 500 chars)
 */
export function sanitizeErrorMessage(error: string): string {
  if (!error) {
    return '';
  }

  let sanitized = error;

  // Statement text echoed back by the driver
  sanitized = sanitized.replace(
    /IDENTIFIED\s+BY\s+('(?:[^'\\]|\\.|'')*'|\S+)/gi,
    'IDENTIFIED BY [REDACTED]',
  );

  sanitized = sanitized.replace(
    /(password|passwd|pwd|credential)\s*[=:]\s*('[^']*'|"[^"]*"|\S+)/gi,
    '$1=[REDACTED]',
  );

  // Remove tokens
  sanitized = sanitized.replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]');
  sanitized = sanitized.replace(/token[:\s]+[^\s]+/gi, 'token: [REDACTED]');
  sanitized = sanitized.replace(
    /api[_-]?key[:\s]+[^\s]+/gi,
    'api_key: [REDACTED]',
  );

  // Truncate to prevent excessive logging
  return sanitized.substring(0, 500);
}

/**
 * Drop metadata keys that look like secrets
 */
export function sanitizeMetadata(
  metadata: Record<string, unknown>,
): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (/password|passwd|credential|secret|token/i.test(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'string') {
      sanitized[key] = sanitizeErrorMessage(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}
