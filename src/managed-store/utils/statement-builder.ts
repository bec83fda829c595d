import { PermissionType } from '../../permissions/domain/enums/permission-type.enum';
import { ManagedStoreError } from '../errors/managed-store.error';
import {
  validateDatabaseName,
  validateEventName,
  validateHost,
  validatePrincipalName,
  validateResourceDescriptor,
  validateTableName,
} from './input-validator';

/**
 * Statement Builder
 *
 * Pure functions producing the SQL text sent to the managed store.
 * Identifiers are backtick-quoted, principals are single-quoted literals and
 * credentials are only ever returned as bound parameters.
 *
 * Every builder re-validates its inputs, so a statement can only be produced
 * from values that passed the input validator.
 */

const MAX_IDENTIFIER_LENGTH = 64;

export type ResourceScope =
  | { type: 'GLOBAL' }
  | { type: 'DATABASE'; database: string }
  | { type: 'TABLE'; database: string; table: string };

export interface BoundStatement {
  sql: string;
  params: string[];
}

export interface RevokeEventDefinition {
  eventName: string;
  scheduleAt: Date;
  privileges: readonly string[];
  resourceName: string;
  principalName: string;
  principalHost: string;
}

const PRIVILEGES_BY_TYPE: Record<PermissionType, readonly string[]> = {
  [PermissionType.READ]: ['SELECT'],
  [PermissionType.WRITE]: ['SELECT', 'INSERT', 'UPDATE'],
  [PermissionType.DELETE]: ['SELECT', 'DELETE'],
  [PermissionType.EXECUTE]: ['EXECUTE'],
  [PermissionType.ADMIN]: ['ALL PRIVILEGES'],
};

const SYSTEM_PRINCIPALS = ['root', 'mysql.sys', 'mysql.session', 'mysql.infoschema'];

// ==================== Quoting ====================

export function quoteIdentifier(identifier: string): string {
  if (!identifier) {
    throw ManagedStoreError.missingParameter('identifier');
  }

  if (identifier.length > MAX_IDENTIFIER_LENGTH) {
    throw ManagedStoreError.invalidIdentifier(
      identifier,
      `exceeds maximum length of ${MAX_IDENTIFIER_LENGTH} characters`,
    );
  }

  return '`' + identifier.replace(/`/g, '``') + '`';
}

export function unquoteIdentifier(quoted: string): string {
  if (quoted.length < 2 || !quoted.startsWith('`') || !quoted.endsWith('`')) {
    throw ManagedStoreError.validation(`Malformed quoted identifier: ${quoted}`);
  }

  return unescapeDoubled(quoted, '`');
}

/**
 * Escape a value for use inside single quotes, without the quotes.
 */
export function escapeLiteral(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "''");
}

export function quoteLiteral(value: string): string {
  return `'${escapeLiteral(value)}'`;
}

export function unquoteLiteral(quoted: string): string {
  if (quoted.length < 2 || !quoted.startsWith("'") || !quoted.endsWith("'")) {
    throw ManagedStoreError.validation(`Malformed quoted literal: ${quoted}`);
  }

  return unescapeDoubled(quoted, "'", '\\');
}

/**
 * Strip the outer quotes and collapse each doubled escape character back to
 * one. A lone escape character inside the body is malformed.
 */
function unescapeDoubled(quoted: string, ...escapes: string[]): string {
  const body = quoted.slice(1, -1);
  let result = '';

  for (let i = 0; i < body.length; i++) {
    const char = body[i];
    if (escapes.includes(char)) {
      if (body[i + 1] !== char) {
        throw ManagedStoreError.validation(`Malformed quoted value: ${quoted}`);
      }
      i++;
    }
    result += char;
  }

  return result;
}

function quotePrincipal(principalName: string, principalHost: string): string {
  return `${quoteLiteral(principalName)}@${quoteLiteral(principalHost)}`;
}

function checkPrincipal(principalName: string, principalHost: string): void {
  validatePrincipalName(principalName);
  validateHost(principalHost);
}

// ==================== Privileges and scope ====================

export function privilegesFor(type: PermissionType): readonly string[] {
  return PRIVILEGES_BY_TYPE[type];
}

/**
 * `*` is global, a descriptor with a dot is a table (or `db.*`, treated as
 * the whole database), anything else is a database.
 */
export function resolveResourceScope(resourceName: string): ResourceScope {
  validateResourceDescriptor(resourceName);

  if (resourceName === '*') {
    return { type: 'GLOBAL' };
  }

  const dot = resourceName.indexOf('.');
  if (dot === -1) {
    return { type: 'DATABASE', database: resourceName };
  }

  const database = resourceName.slice(0, dot);
  const table = resourceName.slice(dot + 1);
  if (table === '*') {
    return { type: 'DATABASE', database };
  }

  return { type: 'TABLE', database, table };
}

export function formatResourceScope(scope: ResourceScope): string {
  switch (scope.type) {
    case 'GLOBAL':
      return '*.*';
    case 'DATABASE':
      validateDatabaseName(scope.database);
      return `${quoteIdentifier(scope.database)}.*`;
    case 'TABLE':
      validateDatabaseName(scope.database);
      validateTableName(scope.table);
      return `${quoteIdentifier(scope.database)}.${quoteIdentifier(scope.table)}`;
  }
}

function privilegeList(privileges: readonly string[]): string {
  if (privileges.length === 0) {
    throw ManagedStoreError.missingParameter('privileges');
  }
  return privileges.join(', ');
}

// ==================== Account statements ====================

export function buildCreateUser(
  principalName: string,
  principalHost: string,
  credential: string,
): BoundStatement {
  checkPrincipal(principalName, principalHost);

  return {
    sql: `CREATE USER IF NOT EXISTS ${quotePrincipal(principalName, principalHost)} IDENTIFIED BY ?`,
    params: [credential],
  };
}

export function buildDropUser(principalName: string, principalHost: string): string {
  checkPrincipal(principalName, principalHost);
  return `DROP USER IF EXISTS ${quotePrincipal(principalName, principalHost)}`;
}

export function buildAlterUserCredential(
  principalName: string,
  principalHost: string,
  credential: string,
): BoundStatement {
  checkPrincipal(principalName, principalHost);

  return {
    sql: `ALTER USER ${quotePrincipal(principalName, principalHost)} IDENTIFIED BY ?`,
    params: [credential],
  };
}

// ==================== Privilege statements ====================

export function buildGrant(
  privileges: readonly string[],
  resourceName: string,
  principalName: string,
  principalHost: string,
): string {
  const privs = privilegeList(privileges);
  checkPrincipal(principalName, principalHost);
  const scope = formatResourceScope(resolveResourceScope(resourceName));

  return `GRANT ${privs} ON ${scope} TO ${quotePrincipal(principalName, principalHost)}`;
}

export function buildRevoke(
  privileges: readonly string[],
  resourceName: string,
  principalName: string,
  principalHost: string,
): string {
  const privs = privilegeList(privileges);
  checkPrincipal(principalName, principalHost);
  const scope = formatResourceScope(resolveResourceScope(resourceName));

  return `REVOKE ${privs} ON ${scope} FROM ${quotePrincipal(principalName, principalHost)}`;
}

// ==================== Scheduled revocation ====================

export function revokeEventName(permissionId: number): string {
  if (!Number.isSafeInteger(permissionId) || permissionId < 0) {
    throw ManagedStoreError.validation(
      `Invalid permission id for revoke event: ${permissionId}`,
    );
  }

  const eventName = `revoke_perm_${permissionId}`;
  validateEventName(eventName);
  return eventName;
}

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC. The managed store session time zone is
 * expected to be UTC as well.
 */
export function formatTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw ManagedStoreError.missingParameter('scheduleAt');
  }

  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function buildCreateRevokeEvent(event: RevokeEventDefinition): string {
  validateEventName(event.eventName);
  const revoke = buildRevoke(
    event.privileges,
    event.resourceName,
    event.principalName,
    event.principalHost,
  );

  return (
    `CREATE EVENT ${quoteIdentifier(event.eventName)} ` +
    `ON SCHEDULE AT ${quoteLiteral(formatTimestamp(event.scheduleAt))} ` +
    `DO BEGIN ${revoke}; END`
  );
}

export function buildDropEvent(eventName: string): string {
  validateEventName(eventName);
  return `DROP EVENT IF EXISTS ${quoteIdentifier(eventName)}`;
}

// ==================== Catalog queries ====================

export function buildPrincipalExistsQuery(
  principalName: string,
  principalHost: string,
): BoundStatement {
  checkPrincipal(principalName, principalHost);

  return {
    sql: 'SELECT COUNT(*) AS count FROM mysql.user WHERE User = ? AND Host = ?',
    params: [principalName, principalHost],
  };
}

export function buildListPrincipalsQuery(): BoundStatement {
  const excluded = SYSTEM_PRINCIPALS.map(quoteLiteral).join(', ');

  return {
    sql:
      'SELECT User AS user, Host AS host, account_locked AS accountLocked, ' +
      'password_expired AS passwordExpired FROM mysql.user ' +
      `WHERE User NOT IN (${excluded}) ORDER BY User, Host`,
    params: [],
  };
}

export function buildGetPrincipalQuery(
  principalName: string,
  principalHost: string,
): BoundStatement {
  checkPrincipal(principalName, principalHost);

  return {
    sql:
      'SELECT User AS user, Host AS host, account_locked AS accountLocked, ' +
      'password_expired AS passwordExpired FROM mysql.user ' +
      'WHERE User = ? AND Host = ?',
    params: [principalName, principalHost],
  };
}

export function buildShowGrantsQuery(
  principalName: string,
  principalHost: string,
): string {
  checkPrincipal(principalName, principalHost);
  return `SHOW GRANTS FOR ${quotePrincipal(principalName, principalHost)}`;
}

export function buildDatabaseExistsQuery(database: string): BoundStatement {
  validateDatabaseName(database);

  return {
    sql: 'SELECT SCHEMA_NAME AS name FROM information_schema.SCHEMATA WHERE SCHEMA_NAME = ?',
    params: [database],
  };
}

export function buildTableExistsQuery(
  database: string,
  table: string,
): BoundStatement {
  validateDatabaseName(database);
  validateTableName(table);

  return {
    sql:
      'SELECT TABLE_NAME AS name FROM information_schema.TABLES ' +
      'WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ?',
    params: [database, table],
  };
}

export const EVENT_SCHEDULER_STATUS_QUERY = "SHOW VARIABLES LIKE 'event_scheduler'";

export const ENABLE_EVENT_SCHEDULER_STATEMENT = 'SET GLOBAL event_scheduler = ON';
