import { Injectable, Logger } from '@nestjs/common';
import { PermissionType } from '../../permissions/domain/enums/permission-type.enum';
import {
  ManagedStoreError,
  guardManagedStoreCall,
} from '../errors/managed-store.error';
import { ManagedStoreConnection } from '../ports/managed-store-connection.port';
import {
  validatePermission,
  validatePermissionTarget,
} from '../utils/input-validator';
import {
  ENABLE_EVENT_SCHEDULER_STATEMENT,
  EVENT_SCHEDULER_STATUS_QUERY,
  buildCreateRevokeEvent,
  buildDropEvent,
  buildGrant,
  buildRevoke,
  formatTimestamp,
  privilegesFor,
  revokeEventName,
} from '../utils/statement-builder';
import { PrincipalAccountService } from './principal-account.service';

/**
 * Everything the executor needs to know about one time-bounded grant
 */
export interface ScheduledGrant {
  permissionId: number;
  principalName: string;
  principalHost: string;
  resourceName: string;
  type: PermissionType;
  startTime: Date;
  endTime: Date;
}

export interface GrantOutcome {
  principalCreated: boolean;
  eventName: string;
  revokeAt: string;
}

/**
 * Grant/Revoke Executor
 *
 * Applies privilege changes on the managed store and keeps a one-shot
 * `revoke_perm_<id>` event per permission so access is withdrawn at the end
 * time even if this service is down.
 *
 * All steps are idempotent: principal creation is skipped when present,
 * GRANT is additive and scheduling drops the event before creating it.
 */
@Injectable()
export class GrantExecutorService {
  private readonly logger = new Logger(GrantExecutorService.name);

  constructor(
    private readonly connection: ManagedStoreConnection,
    private readonly principalAccounts: PrincipalAccountService,
  ) {}

  /**
   * Ensure principal, grant, then schedule the automatic revoke.
   * A failure before scheduling leaves no event behind.
   *
   * An end time already past `now` is rejected before anything is granted:
   * the store discards a one-shot event scheduled in the past, so nothing
   * would ever revoke the grant.
   */
  async grantWithAutoRevoke(
    grant: ScheduledGrant,
    now: Date = new Date(),
  ): Promise<GrantOutcome> {
    validatePermission(grant, now);

    this.logger.log(
      `Granting ${grant.type} on ${grant.resourceName} to '${grant.principalName}'@'${grant.principalHost}' until ${grant.endTime.toISOString()}`,
    );

    const principalCreated = await this.principalAccounts.ensurePrincipalExists(
      grant.principalName,
      grant.principalHost,
    );
    await this.grantPrivileges(grant);
    const eventName = await this.scheduleAutoRevoke(grant);

    return {
      principalCreated,
      eventName,
      revokeAt: formatTimestamp(grant.endTime),
    };
  }

  async grantPrivileges(
    grant: Pick<
      ScheduledGrant,
      'principalName' | 'principalHost' | 'resourceName' | 'type'
    >,
  ): Promise<void> {
    const privileges = privilegesFor(grant.type);
    const sql = buildGrant(
      privileges,
      grant.resourceName,
      grant.principalName,
      grant.principalHost,
    );

    await guardManagedStoreCall(
      () => this.connection.execute(sql),
      (cause) =>
        ManagedStoreError.grantFailed(
          grant.principalName,
          grant.resourceName,
          cause,
        ),
    );

    this.logger.log(
      `Granted ${privileges.join(', ')} on ${grant.resourceName} to '${grant.principalName}'@'${grant.principalHost}'`,
    );
  }

  /**
   * Replace the permission's revoke event with one firing at `endTime`.
   * @returns the event name
   */
  async scheduleAutoRevoke(grant: ScheduledGrant): Promise<string> {
    const eventName = revokeEventName(grant.permissionId);
    const dropSql = buildDropEvent(eventName);
    const createSql = buildCreateRevokeEvent({
      eventName,
      scheduleAt: grant.endTime,
      privileges: privilegesFor(grant.type),
      resourceName: grant.resourceName,
      principalName: grant.principalName,
      principalHost: grant.principalHost,
    });

    await guardManagedStoreCall(
      async () => {
        await this.connection.execute(dropSql);
        await this.connection.execute(createSql);
      },
      (cause) => ManagedStoreError.scheduleFailed(eventName, cause),
    );

    this.logger.log(
      `Scheduled revoke event '${eventName}' at ${formatTimestamp(grant.endTime)}`,
    );
    return eventName;
  }

  /**
   * Revoke immediately and drop the pending revoke event.
   */
  async revokeNow(
    grant: Pick<
      ScheduledGrant,
      'permissionId' | 'principalName' | 'principalHost' | 'resourceName' | 'type'
    >,
  ): Promise<void> {
    validatePermissionTarget(grant);

    const privileges = privilegesFor(grant.type);
    const revokeSql = buildRevoke(
      privileges,
      grant.resourceName,
      grant.principalName,
      grant.principalHost,
    );
    const dropSql = buildDropEvent(revokeEventName(grant.permissionId));

    await guardManagedStoreCall(
      async () => {
        await this.connection.execute(revokeSql);
        await this.connection.execute(dropSql);
      },
      (cause) =>
        ManagedStoreError.revokeFailed(
          grant.principalName,
          grant.resourceName,
          cause,
        ),
    );

    this.logger.log(
      `Revoked ${privileges.join(', ')} on ${grant.resourceName} from '${grant.principalName}'@'${grant.principalHost}'`,
    );
  }

  /**
   * Drop the revoke event of a permission that never got its privileges.
   */
  async cancelAutoRevoke(permissionId: number): Promise<void> {
    const eventName = revokeEventName(permissionId);

    await guardManagedStoreCall(
      () => this.connection.execute(buildDropEvent(eventName)),
      (cause) =>
        ManagedStoreError.scheduleFailed(
          eventName,
          cause,
          `Failed to drop revoke event '${eventName}'`,
        ),
    );

    this.logger.debug(`Dropped revoke event '${eventName}' (if present)`);
  }

  async isEventSchedulerEnabled(): Promise<boolean> {
    const rows = await guardManagedStoreCall(
      () => this.connection.query(EVENT_SCHEDULER_STATUS_QUERY),
      (cause) =>
        ManagedStoreError.operationFailed(
          'Failed to read event scheduler status',
          cause,
        ),
    );

    const value = rows[0]?.Value;
    return typeof value === 'string' && value.toUpperCase() === 'ON';
  }

  async enableEventScheduler(): Promise<void> {
    await guardManagedStoreCall(
      () => this.connection.execute(ENABLE_EVENT_SCHEDULER_STATEMENT),
      (cause) =>
        ManagedStoreError.operationFailed(
          'Failed to enable event scheduler',
          cause,
        ),
    );

    this.logger.log('Enabled managed store event scheduler');
  }
}
