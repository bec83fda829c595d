import { Logger } from '@nestjs/common';
import { ManagedStoreError } from '../errors/managed-store.error';
import {
  validateCredential,
  validateDatabaseName,
  validateEventName,
  validateHost,
  validatePermission,
  validatePermissionTarget,
  validatePrincipalName,
  validateResourceDescriptor,
  validateTableName,
  validateTimeRange,
} from './input-validator';

function failureOf(check: () => void): ManagedStoreError {
  try {
    check();
  } catch (error) {
    if (error instanceof ManagedStoreError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ManagedStoreError');
}

describe('InputValidator', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe('validatePrincipalName', () => {
    it.each(['alice', 'app.reader', 'svc_$1', 'a'.repeat(32)])(
      'should accept %s',
      (name) => {
        expect(() => validatePrincipalName(name)).not.toThrow();
      },
    );

    it('should reject a missing name', () => {
      const error = failureOf(() => validatePrincipalName(''));

      expect(error.kind).toBe('validation');
      expect(error.retryable).toBe(false);
      expect(error.message).toBe(
        "Required parameter 'principalName' is null or empty",
      );
    });

    it('should reject names longer than 32 characters', () => {
      const name = 'a'.repeat(33);

      expect(failureOf(() => validatePrincipalName(name)).message).toBe(
        `Invalid identifier '${name}': exceeds maximum length of 32 characters`,
      );
    });

    it('should reject quotes and other punctuation', () => {
      expect(failureOf(() => validatePrincipalName("bob'--")).message).toBe(
        "Invalid identifier 'bob'--': contains invalid characters. Only alphanumeric, underscore, dot, and dollar sign are allowed",
      );
    });

    it('should reject a leading digit', () => {
      expect(failureOf(() => validatePrincipalName('9lives')).message).toBe(
        "Invalid identifier '9lives': cannot start with a digit",
      );
    });

    it('should warn but accept system account names', () => {
      expect(() => validatePrincipalName('root')).not.toThrow();
      expect(() => validatePrincipalName('mysql.sys')).not.toThrow();

      expect(warnSpy).toHaveBeenCalledWith(
        "Principal name 'root' matches a system account",
      );
      expect(warnSpy).toHaveBeenCalledWith(
        "Principal name 'mysql.sys' matches a system account",
      );
    });
  });

  describe('validateHost', () => {
    it.each(['%', 'localhost', '10.0.%', 'app-01.internal', 'db_host'])(
      'should accept %s',
      (host) => {
        expect(() => validateHost(host)).not.toThrow();
      },
    );

    it('should reject a missing host', () => {
      expect(failureOf(() => validateHost(undefined)).message).toBe(
        "Required parameter 'principalHost' is null or empty",
      );
    });

    it('should reject hosts longer than 64 characters', () => {
      const host = 'h'.repeat(65);

      expect(failureOf(() => validateHost(host)).message).toBe(
        `Host '${host}' exceeds maximum length of 64 characters`,
      );
    });

    it('should reject spaces and quotes', () => {
      expect(failureOf(() => validateHost("local host'")).message).toBe(
        "Invalid host pattern 'local host''. Allowed characters: alphanumeric, dot, hyphen, underscore, percent",
      );
    });
  });

  describe('validateDatabaseName / validateTableName', () => {
    it('should accept 64-character identifiers', () => {
      expect(() => validateDatabaseName('d'.repeat(64))).not.toThrow();
      expect(() => validateTableName('t'.repeat(64))).not.toThrow();
    });

    it('should reject 65-character identifiers', () => {
      const name = 't'.repeat(65);

      expect(failureOf(() => validateTableName(name)).message).toBe(
        `Invalid identifier '${name}': exceeds maximum length of 64 characters`,
      );
    });

    it('should reject dots and dashes', () => {
      expect(failureOf(() => validateDatabaseName('sales-db')).message).toBe(
        "Invalid identifier 'sales-db': contains invalid characters. Only alphanumeric, underscore, and dollar sign are allowed",
      );
    });

    it('should reject a leading digit', () => {
      expect(failureOf(() => validateTableName('2024_orders')).message).toBe(
        "Invalid identifier '2024_orders': cannot start with a digit",
      );
    });

    it('should name the missing parameter', () => {
      expect(failureOf(() => validateDatabaseName(null)).message).toBe(
        "Required parameter 'databaseName' is null or empty",
      );
      expect(failureOf(() => validateTableName('')).message).toBe(
        "Required parameter 'tableName' is null or empty",
      );
    });

    it('should warn on system schemas', () => {
      validateDatabaseName('information_schema');

      expect(warnSpy).toHaveBeenCalledWith(
        "Database name 'information_schema' is a system schema",
      );
    });
  });

  describe('validateEventName', () => {
    it('should accept generated revoke event names', () => {
      expect(() => validateEventName('revoke_perm_42')).not.toThrow();
    });

    it('should reject names with spaces', () => {
      expect(failureOf(() => validateEventName('drop me')).message).toBe(
        "Invalid identifier 'drop me': contains invalid characters. Only alphanumeric, underscore, and dollar sign are allowed",
      );
    });
  });

  describe('validateResourceDescriptor', () => {
    it.each(['*', 'sales', 'sales.orders', 'sales.*'])(
      'should accept %s',
      (descriptor) => {
        expect(() => validateResourceDescriptor(descriptor)).not.toThrow();
      },
    );

    it.each(['.orders', 'sales.'])(
      'should reject the half-empty descriptor %s',
      (descriptor) => {
        expect(failureOf(() => validateResourceDescriptor(descriptor)).message).toBe(
          `Invalid resource name '${descriptor}': invalid format. Expected 'database.table'`,
        );
      },
    );

    it('should reject more than one dot through the table name', () => {
      expect(failureOf(() => validateResourceDescriptor('a.b.c')).message).toBe(
        "Invalid identifier 'b.c': contains invalid characters. Only alphanumeric, underscore, and dollar sign are allowed",
      );
    });

    it('should reject injected statements', () => {
      expect(
        failureOf(() => validateResourceDescriptor('sales; DROP TABLE x')).kind,
      ).toBe('validation');
    });

    it('should reject a missing descriptor', () => {
      expect(failureOf(() => validateResourceDescriptor('')).message).toBe(
        "Required parameter 'resourceName' is null or empty",
      );
    });
  });

  describe('validateCredential', () => {
    it('should accept 8 characters with a letter and a digit', () => {
      expect(() => validateCredential('abcdefg1')).not.toThrow();
    });

    it('should reject 7 characters', () => {
      expect(failureOf(() => validateCredential('abcdef1')).message).toBe(
        'Credential must be at least 8 characters long',
      );
    });

    it('should reject more than 256 characters', () => {
      expect(
        failureOf(() => validateCredential(`a1${'x'.repeat(255)}`)).message,
      ).toBe('Credential exceeds maximum length of 256 characters');
    });

    it.each(['abcdefgh', '12345678'])(
      'should reject %s without both a letter and a digit',
      (credential) => {
        expect(failureOf(() => validateCredential(credential)).message).toBe(
          'Credential must contain at least one letter and one digit',
        );
      },
    );
  });

  describe('validateTimeRange', () => {
    const now = new Date('2026-10-19T12:00:00Z');
    const hours = (count: number) =>
      new Date(now.getTime() + count * 60 * 60 * 1000);

    it('should accept a range starting now', () => {
      expect(() => validateTimeRange(now, hours(2), now)).not.toThrow();
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('should reject an end equal to the start', () => {
      expect(failureOf(() => validateTimeRange(hours(1), hours(1), now)).message).toBe(
        'Invalid time range: end time must be after start time',
      );
    });

    it('should reject an end in the past', () => {
      expect(
        failureOf(() => validateTimeRange(hours(-3), hours(-1), now)).message,
      ).toBe('Invalid time range: end time cannot be in the past');
    });

    it('should reject missing or invalid dates', () => {
      expect(failureOf(() => validateTimeRange(null, hours(1), now)).message).toBe(
        "Required parameter 'startTime' is null or empty",
      );
      expect(
        failureOf(() => validateTimeRange(now, new Date('not a date'), now))
          .message,
      ).toBe("Required parameter 'endTime' is null or empty");
    });

    it('should warn on a past start, a long range and a short range', () => {
      validateTimeRange(hours(-1), hours(24 * 400), now);
      validateTimeRange(now, new Date(now.getTime() + 30 * 60 * 1000), now);

      expect(warnSpy).toHaveBeenCalledWith(
        'Permission start time 2026-10-19T11:00:00.000Z is in the past',
      );
      expect(warnSpy).toHaveBeenCalledWith(
        expect.stringContaining('Permission duration exceeds 1 year'),
      );
      expect(warnSpy).toHaveBeenCalledWith(
        expect.stringContaining('Permission duration is less than 1 hour'),
      );
    });
  });

  describe('validatePermission', () => {
    const now = new Date('2026-10-19T12:00:00Z');

    it('should report the first violation', () => {
      const error = failureOf(() =>
        validatePermission(
          {
            principalName: 'bad name',
            principalHost: 'bad host',
            resourceName: 'sales',
            startTime: now,
            endTime: new Date('2026-10-20T12:00:00Z'),
          },
          now,
        ),
      );

      expect(error.message).toBe(
        "Invalid identifier 'bad name': contains invalid characters. Only alphanumeric, underscore, dot, and dollar sign are allowed",
      );
    });

    it('should check the time range last', () => {
      const error = failureOf(() =>
        validatePermission(
          {
            principalName: 'alice',
            principalHost: '%',
            resourceName: 'sales.orders',
            startTime: new Date('2026-10-19T08:00:00Z'),
            endTime: new Date('2026-10-19T10:00:00Z'),
          },
          now,
        ),
      );

      expect(error.message).toBe(
        'Invalid time range: end time cannot be in the past',
      );
    });

    it('should skip the time range for target-only checks', () => {
      expect(() =>
        validatePermissionTarget({
          principalName: 'alice',
          principalHost: '%',
          resourceName: 'sales.orders',
        }),
      ).not.toThrow();
    });
  });
});
