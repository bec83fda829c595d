import { sanitizeErrorMessage, sanitizeMetadata } from './credential-sanitizer.util';

describe('CredentialSanitizer', () => {
  describe('sanitizeErrorMessage', () => {
    it('should redact credentials echoed in statement text', () => {
      expect(
        sanitizeErrorMessage(
          "Error in: CREATE USER 'alice'@'%' IDENTIFIED BY 'test-secret1'",
        ),
      ).toBe("Error in: CREATE USER 'alice'@'%' IDENTIFIED BY [REDACTED]");
    });

    it('should redact key/value secrets', () => {
      expect(sanitizeErrorMessage('login failed password=test-secret')).toBe(
        'login failed password=[REDACTED]',
      );
      expect(sanitizeErrorMessage('credential: abc123 rejected')).toBe(
        'credential=[REDACTED] rejected',
      );
    });

    it('should keep prose about passwords', () => {
      expect(sanitizeErrorMessage('Password must be at least 8 characters')).toBe(
        'Password must be at least 8 characters',
      );
    });

    it('should redact bearer tokens', () => {
      expect(sanitizeErrorMessage('Authorization: Bearer abc.def.ghi')).toBe(
        'Authorization: Bearer [TOKEN_REDACTED]',
      );
    });

    it('should truncate to 500 characters', () => {
      expect(sanitizeErrorMessage('x'.repeat(600))).toHaveLength(500);
      expect(sanitizeErrorMessage('')).toBe('');
    });
  });

  describe('sanitizeMetadata', () => {
    it('should redact secret-looking keys and sanitize string values', () => {
      expect(
        sanitizeMetadata({
          password: 'test-secret',
          attempts: 3,
          note: 'retry with password=test-secret',
        }),
      ).toEqual({
        password: '[REDACTED]',
        attempts: 3,
        note: 'retry with password=[REDACTED]',
      });
    });
  });
});
