import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomInt } from 'crypto';
import { AllConfigType } from '../../config/config.type';
import {
  ManagedStoreError,
  guardManagedStoreCall,
} from '../errors/managed-store.error';
import {
  ManagedStoreConnection,
  ManagedStoreRow,
} from '../ports/managed-store-connection.port';
import {
  validateCredential,
  validateHost,
  validatePrincipalName,
  validateResourceDescriptor,
} from '../utils/input-validator';
import {
  buildAlterUserCredential,
  buildCreateUser,
  buildDatabaseExistsQuery,
  buildDropUser,
  buildGetPrincipalQuery,
  buildListPrincipalsQuery,
  buildPrincipalExistsQuery,
  buildShowGrantsQuery,
  buildTableExistsQuery,
  resolveResourceScope,
} from '../utils/statement-builder';

export interface PrincipalInfo {
  name: string;
  host: string;
  accountLocked: boolean;
  passwordExpired: boolean;
}

// Alphanumeric only, so generated credentials never need escaping
const CREDENTIAL_ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

function stringColumn(row: ManagedStoreRow, column: string): string {
  const value = row[column];
  if (typeof value === 'string') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  return value === null || value === undefined ? '' : String(value);
}

function countColumn(rows: ManagedStoreRow[]): number {
  const value = rows[0]?.count;
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' || typeof value === 'bigint') {
    return Number(value);
  }
  return 0;
}

function toPrincipalInfo(row: ManagedStoreRow): PrincipalInfo {
  return {
    name: stringColumn(row, 'user'),
    host: stringColumn(row, 'host'),
    accountLocked: stringColumn(row, 'accountLocked').toUpperCase() === 'Y',
    passwordExpired: stringColumn(row, 'passwordExpired').toUpperCase() === 'Y',
  };
}

/**
 * Account management on the managed store.
 *
 * Principals created implicitly (on activation) get a generated credential
 * that is never logged or persisted.
 */
@Injectable()
export class PrincipalAccountService {
  private readonly logger = new Logger(PrincipalAccountService.name);

  constructor(
    private readonly connection: ManagedStoreConnection,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async principalExists(
    principalName: string,
    principalHost: string,
  ): Promise<boolean> {
    const statement = buildPrincipalExistsQuery(principalName, principalHost);

    const rows = await guardManagedStoreCall(
      () => this.connection.query(statement.sql, statement.params),
      (cause) =>
        ManagedStoreError.operationFailed(
          `Failed to look up principal '${principalName}'@'${principalHost}'`,
          cause,
        ),
    );

    return countColumn(rows) > 0;
  }

  /**
   * Create the principal with a generated credential when it is absent.
   * @returns true when the principal was created by this call
   */
  async ensurePrincipalExists(
    principalName: string,
    principalHost: string,
  ): Promise<boolean> {
    validatePrincipalName(principalName);
    validateHost(principalHost);

    if (await this.principalExists(principalName, principalHost)) {
      this.logger.debug(
        `Principal '${principalName}'@'${principalHost}' already exists`,
      );
      return false;
    }

    const statement = buildCreateUser(
      principalName,
      principalHost,
      this.generateCredential(),
    );

    await guardManagedStoreCall(
      () => this.connection.update(statement.sql, statement.params),
      (cause) =>
        ManagedStoreError.operationFailed(
          `Failed to create principal '${principalName}'@'${principalHost}'`,
          cause,
        ),
    );

    this.logger.log(`Created principal '${principalName}'@'${principalHost}'`);
    this.logger.warn(
      `Generated credential for principal '${principalName}' must be delivered to its owner out of band`,
    );
    return true;
  }

  async createPrincipal(
    principalName: string,
    principalHost: string,
    credential: string,
  ): Promise<void> {
    validatePrincipalName(principalName);
    validateHost(principalHost);
    validateCredential(credential);

    if (await this.principalExists(principalName, principalHost)) {
      throw new ManagedStoreError({
        kind: 'operation',
        code: 'PRINCIPAL_EXISTS',
        message: `Principal '${principalName}'@'${principalHost}' already exists`,
        retryable: false,
      });
    }

    const statement = buildCreateUser(principalName, principalHost, credential);
    await guardManagedStoreCall(
      () => this.connection.update(statement.sql, statement.params),
      (cause) =>
        ManagedStoreError.operationFailed(
          `Failed to create principal '${principalName}'@'${principalHost}'`,
          cause,
        ),
    );

    this.logger.log(`Created principal '${principalName}'@'${principalHost}'`);
  }

  async dropPrincipal(
    principalName: string,
    principalHost: string,
  ): Promise<void> {
    await this.requirePrincipal(principalName, principalHost);

    await guardManagedStoreCall(
      () => this.connection.execute(buildDropUser(principalName, principalHost)),
      (cause) =>
        ManagedStoreError.operationFailed(
          `Failed to drop principal '${principalName}'@'${principalHost}'`,
          cause,
        ),
    );

    this.logger.log(`Dropped principal '${principalName}'@'${principalHost}'`);
  }

  async changeCredential(
    principalName: string,
    principalHost: string,
    credential: string,
  ): Promise<void> {
    validateCredential(credential);
    await this.requirePrincipal(principalName, principalHost);

    const statement = buildAlterUserCredential(
      principalName,
      principalHost,
      credential,
    );
    await guardManagedStoreCall(
      () => this.connection.update(statement.sql, statement.params),
      (cause) =>
        ManagedStoreError.operationFailed(
          `Failed to change credential for '${principalName}'@'${principalHost}'`,
          cause,
        ),
    );

    this.logger.log(
      `Changed credential for principal '${principalName}'@'${principalHost}'`,
    );
  }

  /**
   * All principals except the store's built-in system accounts
   */
  async listPrincipals(): Promise<PrincipalInfo[]> {
    const statement = buildListPrincipalsQuery();
    const rows = await guardManagedStoreCall(
      () => this.connection.query(statement.sql, statement.params),
      (cause) => ManagedStoreError.operationFailed('Failed to list principals', cause),
    );

    return rows.map(toPrincipalInfo);
  }

  async getPrincipal(
    principalName: string,
    principalHost: string,
  ): Promise<PrincipalInfo> {
    const statement = buildGetPrincipalQuery(principalName, principalHost);
    const rows = await guardManagedStoreCall(
      () => this.connection.query(statement.sql, statement.params),
      (cause) =>
        ManagedStoreError.operationFailed(
          `Failed to read principal '${principalName}'@'${principalHost}'`,
          cause,
        ),
    );

    if (rows.length === 0) {
      throw ManagedStoreError.principalNotFound(principalName, principalHost);
    }

    return toPrincipalInfo(rows[0]);
  }

  /**
   * GRANT lines as reported by SHOW GRANTS
   */
  async listPrincipalGrants(
    principalName: string,
    principalHost: string,
  ): Promise<string[]> {
    await this.requirePrincipal(principalName, principalHost);

    const rows = await guardManagedStoreCall(
      () =>
        this.connection.query(buildShowGrantsQuery(principalName, principalHost)),
      (cause) =>
        ManagedStoreError.operationFailed(
          `Failed to list grants for '${principalName}'@'${principalHost}'`,
          cause,
        ),
    );

    // SHOW GRANTS returns one column named after the principal
    return rows
      .map((row) => Object.values(row)[0])
      .filter((value): value is string => typeof value === 'string');
  }

  async resourceExists(resourceName: string): Promise<boolean> {
    validateResourceDescriptor(resourceName);

    const scope = resolveResourceScope(resourceName);
    if (scope.type === 'GLOBAL') {
      return true;
    }

    const statement =
      scope.type === 'DATABASE'
        ? buildDatabaseExistsQuery(scope.database)
        : buildTableExistsQuery(scope.database, scope.table);

    const rows = await guardManagedStoreCall(
      () => this.connection.query(statement.sql, statement.params),
      (cause) =>
        ManagedStoreError.operationFailed(
          `Failed to look up resource '${resourceName}'`,
          cause,
        ),
    );

    return rows.length > 0;
  }

  private async requirePrincipal(
    principalName: string,
    principalHost: string,
  ): Promise<void> {
    if (!(await this.principalExists(principalName, principalHost))) {
      throw ManagedStoreError.principalNotFound(principalName, principalHost);
    }
  }

  /**
   * Random alphanumeric credential containing at least one letter and one digit
   */
  private generateCredential(): string {
    const length = this.configService.getOrThrow(
      'managedStore.generatedCredentialLength',
      { infer: true },
    );

    let credential = '';
    while (!/[A-Za-z]/.test(credential) || !/[0-9]/.test(credential)) {
      credential = Array.from(
        { length },
        () => CREDENTIAL_ALPHABET[randomInt(CREDENTIAL_ALPHABET.length)],
      ).join('');
    }
    return credential;
  }
}
