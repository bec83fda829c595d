import { Logger } from '@nestjs/common';
import { ManagedStoreError } from '../errors/managed-store.error';

/**
 * Input validation for values that end up inside managed-store statements.
 *
 * Every function returns normally or throws a validation ManagedStoreError.
 * Warnings (system accounts, odd time ranges) are logged only.
 */

const logger = new Logger('InputValidator');

const MAX_IDENTIFIER_LENGTH = 64;
const MAX_PRINCIPAL_NAME_LENGTH = 32;
const MIN_CREDENTIAL_LENGTH = 8;
const MAX_CREDENTIAL_LENGTH = 256;

const PRINCIPAL_NAME_PATTERN = /^[A-Za-z0-9_$.]+$/;
const IDENTIFIER_PATTERN = /^[A-Za-z0-9_$]+$/;
const HOST_PATTERN = /^[%A-Za-z0-9._-]+$/;
const LEADING_DIGIT = /^[0-9]/;

const SYSTEM_SCHEMAS = new Set([
  'mysql',
  'information_schema',
  'performance_schema',
  'sys',
]);

const ONE_HOUR_MS = 60 * 60 * 1000;

export interface PermissionTarget {
  principalName: string;
  principalHost: string;
  resourceName: string;
  startTime: Date;
  endTime: Date;
}

function requireValue(
  value: string | null | undefined,
  parameterName: string,
): string {
  if (value === null || value === undefined || value === '') {
    throw ManagedStoreError.missingParameter(parameterName);
  }
  return value;
}

function validateSchemaIdentifier(
  value: string | null | undefined,
  parameterName: string,
): string {
  const identifier = requireValue(value, parameterName);

  if (identifier.length > MAX_IDENTIFIER_LENGTH) {
    throw ManagedStoreError.invalidIdentifier(
      identifier,
      `exceeds maximum length of ${MAX_IDENTIFIER_LENGTH} characters`,
    );
  }

  if (!IDENTIFIER_PATTERN.test(identifier)) {
    throw ManagedStoreError.invalidIdentifier(
      identifier,
      'contains invalid characters. Only alphanumeric, underscore, and dollar sign are allowed',
    );
  }

  if (LEADING_DIGIT.test(identifier)) {
    throw ManagedStoreError.invalidIdentifier(
      identifier,
      'cannot start with a digit',
    );
  }

  return identifier;
}

export function validatePrincipalName(name: string | null | undefined): void {
  const principalName = requireValue(name, 'principalName');

  if (principalName.length > MAX_PRINCIPAL_NAME_LENGTH) {
    throw ManagedStoreError.invalidIdentifier(
      principalName,
      `exceeds maximum length of ${MAX_PRINCIPAL_NAME_LENGTH} characters`,
    );
  }

  if (!PRINCIPAL_NAME_PATTERN.test(principalName)) {
    throw ManagedStoreError.invalidIdentifier(
      principalName,
      'contains invalid characters. Only alphanumeric, underscore, dot, and dollar sign are allowed',
    );
  }

  if (LEADING_DIGIT.test(principalName)) {
    throw ManagedStoreError.invalidIdentifier(
      principalName,
      'cannot start with a digit',
    );
  }

  const lowered = principalName.toLowerCase();
  if (lowered === 'root' || lowered === 'mysql' || lowered.startsWith('mysql.')) {
    logger.warn(`Principal name '${principalName}' matches a system account`);
  }
}

export function validateHost(host: string | null | undefined): void {
  const value = requireValue(host, 'principalHost');

  if (value.length > MAX_IDENTIFIER_LENGTH) {
    throw ManagedStoreError.validation(
      `Host '${value}' exceeds maximum length of ${MAX_IDENTIFIER_LENGTH} characters`,
    );
  }

  if (!HOST_PATTERN.test(value)) {
    throw ManagedStoreError.validation(
      `Invalid host pattern '${value}'. Allowed characters: alphanumeric, dot, hyphen, underscore, percent`,
    );
  }
}

export function validateDatabaseName(name: string | null | undefined): void {
  const database = validateSchemaIdentifier(name, 'databaseName');

  if (SYSTEM_SCHEMAS.has(database.toLowerCase())) {
    logger.warn(`Database name '${database}' is a system schema`);
  }
}

export function validateTableName(name: string | null | undefined): void {
  validateSchemaIdentifier(name, 'tableName');
}

export function validateEventName(name: string | null | undefined): void {
  const eventName = requireValue(name, 'eventName');

  if (eventName.length > MAX_IDENTIFIER_LENGTH) {
    throw ManagedStoreError.invalidIdentifier(
      eventName,
      `exceeds maximum length of ${MAX_IDENTIFIER_LENGTH} characters`,
    );
  }

  if (!IDENTIFIER_PATTERN.test(eventName)) {
    throw ManagedStoreError.invalidIdentifier(
      eventName,
      'contains invalid characters. Only alphanumeric, underscore, and dollar sign are allowed',
    );
  }
}

/**
 * Accepts `*`, `database`, `database.table` and `database.*`.
 */
export function validateResourceDescriptor(
  descriptor: string | null | undefined,
): void {
  const resourceName = requireValue(descriptor, 'resourceName');

  if (resourceName === '*') {
    return;
  }

  const dot = resourceName.indexOf('.');
  if (dot === -1) {
    validateDatabaseName(resourceName);
    return;
  }

  const database = resourceName.slice(0, dot);
  const table = resourceName.slice(dot + 1);
  if (!database || !table) {
    throw ManagedStoreError.invalidResource(
      resourceName,
      "invalid format. Expected 'database.table'",
    );
  }

  validateDatabaseName(database);
  if (table !== '*') {
    validateTableName(table);
  }
}

export function validateCredential(credential: string | null | undefined): void {
  const value = requireValue(credential, 'credential');

  if (value.length < MIN_CREDENTIAL_LENGTH) {
    throw ManagedStoreError.validation(
      `Credential must be at least ${MIN_CREDENTIAL_LENGTH} characters long`,
    );
  }

  if (value.length > MAX_CREDENTIAL_LENGTH) {
    throw ManagedStoreError.validation(
      `Credential exceeds maximum length of ${MAX_CREDENTIAL_LENGTH} characters`,
    );
  }

  if (!/\p{L}/u.test(value) || !/\p{Nd}/u.test(value)) {
    throw ManagedStoreError.validation(
      'Credential must contain at least one letter and one digit',
    );
  }
}

function isValidDate(value: Date | null | undefined): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

export function validateTimeRange(
  startTime: Date | null | undefined,
  endTime: Date | null | undefined,
  now: Date = new Date(),
): void {
  if (!isValidDate(startTime)) {
    throw ManagedStoreError.missingParameter('startTime');
  }

  if (!isValidDate(endTime)) {
    throw ManagedStoreError.missingParameter('endTime');
  }

  if (endTime.getTime() <= startTime.getTime()) {
    throw ManagedStoreError.invalidTimeRange('end time must be after start time');
  }

  if (startTime.getTime() < now.getTime()) {
    logger.warn(`Permission start time ${startTime.toISOString()} is in the past`);
  }

  if (endTime.getTime() < now.getTime()) {
    throw ManagedStoreError.invalidTimeRange('end time cannot be in the past');
  }

  const oneYearAfterStart = new Date(startTime.getTime());
  oneYearAfterStart.setUTCFullYear(oneYearAfterStart.getUTCFullYear() + 1);
  if (oneYearAfterStart.getTime() < endTime.getTime()) {
    logger.warn(
      `Permission duration exceeds 1 year. Start: ${startTime.toISOString()}, End: ${endTime.toISOString()}`,
    );
  }

  if (startTime.getTime() + ONE_HOUR_MS > endTime.getTime()) {
    logger.warn(
      `Permission duration is less than 1 hour. Start: ${startTime.toISOString()}, End: ${endTime.toISOString()}`,
    );
  }
}

/**
 * Full pre-flight check for a permission; the first violation wins.
 */
export function validatePermission(
  target: PermissionTarget,
  now: Date = new Date(),
): void {
  validatePrincipalName(target.principalName);
  validateHost(target.principalHost);
  validateResourceDescriptor(target.resourceName);
  validateTimeRange(target.startTime, target.endTime, now);
}

/**
 * Identifier-only check, for steps whose outcome does not depend on the time
 * range (approval, immediate revocation).
 */
export function validatePermissionTarget(
  target: Pick<PermissionTarget, 'principalName' | 'principalHost' | 'resourceName'>,
): void {
  validatePrincipalName(target.principalName);
  validateHost(target.principalHost);
  validateResourceDescriptor(target.resourceName);
}
