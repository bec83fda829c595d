import { Injectable, Logger } from '@nestjs/common';
import { ManagedStoreError } from '../../../managed-store/errors/managed-store.error';
import {
  validateHost,
  validatePermissionTarget,
  validatePrincipalName,
  validateResourceDescriptor,
  validateTimeRange,
} from '../../../managed-store/utils/input-validator';
import { Permission } from '../entities/permission.entity';
import {
  PermissionAuditEntry,
  SYSTEM_ACTOR,
} from '../entities/permission-event.entity';
import { PermissionEventType } from '../enums/permission-event-type.enum';
import { PermissionStatus } from '../enums/permission-status.enum';
import { PermissionType } from '../enums/permission-type.enum';
import {
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
} from '../errors/permission-lifecycle.errors';
import { PermissionEventPublisher } from '../ports/permission-event.publisher.port';
import {
  PermissionChanges,
  PermissionRepositoryPort,
} from '../ports/permission.repository.port';
import { PrincipalDirectoryPort } from '../ports/principal-directory.port';
import { PermissionStateMachine } from '../utils/permission-state-machine.util';

export interface CreatePermissionInput {
  principalName: string;
  principalHost: string;
  resourceName: string;
  type: PermissionType;
  startTime: Date;
  endTime: Date;
  description?: string;
}

/**
 * Permission Lifecycle Domain Service
 *
 * Owns Permission.status and its timestamps. Every transition re-reads the
 * permission and commits through a conditional update on the status it saw,
 * so a concurrent transition that won the race surfaces as InvalidStateError.
 *
 * Managed-store side effects never happen here: each transition publishes a
 * domain event that the orchestrator consumes off the caller's path.
 */
@Injectable()
export class PermissionLifecycleDomainService {
  private readonly logger = new Logger(PermissionLifecycleDomainService.name);

  constructor(
    private readonly permissionRepository: PermissionRepositoryPort,
    private readonly principalDirectory: PrincipalDirectoryPort,
    private readonly eventPublisher: PermissionEventPublisher,
  ) {}

  /**
   * @throws InvalidArgumentError when identifiers or time range are invalid
   * @throws NotFoundError when the principal is unknown to the directory
   */
  async create(input: CreatePermissionInput, actor: string): Promise<Permission> {
    if (!Object.values(PermissionType).includes(input.type)) {
      throw new InvalidArgumentError(`Unknown permission type: ${input.type}`);
    }

    this.assertValid(() => {
      validatePrincipalName(input.principalName);
      validateHost(input.principalHost);
      validateResourceDescriptor(input.resourceName);
      validateTimeRange(input.startTime, input.endTime);
    });

    const exists = await this.principalDirectory.principalExists(
      input.principalName,
      input.principalHost,
    );
    if (!exists) {
      throw new NotFoundError(
        `Principal '${input.principalName}'@'${input.principalHost}' does not exist`,
      );
    }

    const now = new Date();
    const permission = await this.permissionRepository.create(
      {
        principalName: input.principalName,
        principalHost: input.principalHost,
        resourceName: input.resourceName,
        type: input.type,
        startTime: input.startTime,
        endTime: input.endTime,
        description: input.description,
        createdBy: actor,
      },
      {
        eventType: PermissionEventType.CREATED,
        triggeredBy: actor,
        details: `Permission created for '${input.principalName}'@'${input.principalHost}' on resource ${input.resourceName}`,
        success: true,
        eventTime: now,
      },
    );

    this.logger.log(
      `Permission ${permission.id} created by ${actor} (${input.type} on ${input.resourceName})`,
    );
    this.eventPublisher.publish({
      type: PermissionEventType.CREATED,
      permission,
      actor,
      occurredAt: now,
    });

    return permission;
  }

  /**
   * PENDING → APPROVED, then straight on to ACTIVE when the start time has
   * already been reached.
   */
  async approve(id: number, actor: string): Promise<Permission> {
    const current = await this.getPermission(id);
    PermissionStateMachine.validateTransition(
      current.status,
      PermissionStatus.APPROVED,
    );

    // Identifiers may have been stored by an older rule set
    this.assertValid(() => validatePermissionTarget(current));

    const now = new Date();
    const approved = await this.commit(
      current,
      {
        status: PermissionStatus.APPROVED,
        approvedBy: actor,
        approvedAt: now,
      },
      {
        eventType: PermissionEventType.APPROVED,
        triggeredBy: actor,
        details: `Permission approved by ${actor}`,
        success: true,
        eventTime: now,
      },
    );

    this.logger.log(`Permission ${id} approved by ${actor}`);
    this.eventPublisher.publish({
      type: PermissionEventType.APPROVED,
      permission: approved,
      actor,
      occurredAt: now,
    });

    if (approved.startTime.getTime() <= now.getTime()) {
      return this.activate(id);
    }

    return approved;
  }

  /**
   * APPROVED → ACTIVE. The ACTIVATED audit row is written by the orchestrator
   * once the grant has actually been applied (or has failed).
   */
  async activate(id: number): Promise<Permission> {
    const current = await this.getPermission(id);
    PermissionStateMachine.validateTransition(
      current.status,
      PermissionStatus.ACTIVE,
    );

    const activated = await this.commit(current, {
      status: PermissionStatus.ACTIVE,
    });

    this.logger.log(`Permission ${id} activated`);
    this.eventPublisher.publish({
      type: PermissionEventType.ACTIVATED,
      permission: activated,
      actor: SYSTEM_ACTOR,
      occurredAt: new Date(),
    });

    return activated;
  }

  async revoke(id: number, actor: string): Promise<Permission> {
    const current = await this.getPermission(id);
    PermissionStateMachine.validateTransition(
      current.status,
      PermissionStatus.REVOKED,
    );

    const now = new Date();
    const revoked = await this.commit(current, {
      status: PermissionStatus.REVOKED,
      revokedBy: actor,
      revokedAt: now,
    });

    this.logger.log(
      `Permission ${id} revoked by ${actor} (was ${current.status})`,
    );
    this.eventPublisher.publish({
      type: PermissionEventType.REVOKED,
      permission: revoked,
      actor,
      occurredAt: now,
      previousStatus: current.status,
    });

    return revoked;
  }

  /**
   * Move the end time later. Status is unchanged.
   *
   * @throws InvalidArgumentError unless newEndTime is after the current end
   * @throws InvalidStateError when the permission is EXPIRED or REVOKED
   */
  async extend(id: number, newEndTime: Date, actor: string): Promise<Permission> {
    const current = await this.getPermission(id);

    if (Number.isNaN(newEndTime.getTime())) {
      throw new InvalidArgumentError('New end time is not a valid date');
    }

    if (newEndTime.getTime() <= current.endTime.getTime()) {
      throw new InvalidArgumentError(
        `New end time ${newEndTime.toISOString()} must be after current end time ${current.endTime.toISOString()}`,
      );
    }

    if (!PermissionStateMachine.canExtend(current.status)) {
      throw new InvalidStateError(
        `Permission ${id} is ${current.status} and can no longer be extended`,
      );
    }

    const now = new Date();
    const extended = await this.commit(
      current,
      { endTime: newEndTime },
      {
        eventType: PermissionEventType.EXTENDED,
        triggeredBy: actor,
        details: `Permission extended by ${actor} from ${current.endTime.toISOString()} to ${newEndTime.toISOString()}`,
        success: true,
        eventTime: now,
      },
    );

    this.logger.log(
      `Permission ${id} extended by ${actor} to ${newEndTime.toISOString()}`,
    );
    this.eventPublisher.publish({
      type: PermissionEventType.EXTENDED,
      permission: extended,
      actor,
      occurredAt: now,
      previousEndTime: current.endTime,
    });

    return extended;
  }

  /**
   * ACTIVE → EXPIRED. Privileges are withdrawn by the scheduled revoke
   * event on the managed store, not here.
   */
  async expire(id: number): Promise<Permission> {
    const current = await this.getPermission(id);
    PermissionStateMachine.validateTransition(
      current.status,
      PermissionStatus.EXPIRED,
    );

    const expired = await this.commit(current, {
      status: PermissionStatus.EXPIRED,
    });

    this.logger.log(`Permission ${id} expired`);
    this.eventPublisher.publish({
      type: PermissionEventType.EXPIRED,
      permission: expired,
      actor: SYSTEM_ACTOR,
      occurredAt: new Date(),
    });

    return expired;
  }

  // ==================== Queries ====================

  /**
   * @throws NotFoundError when the id is unknown
   */
  async getPermission(id: number): Promise<Permission> {
    const permission = await this.permissionRepository.findById(id);
    if (!permission) {
      throw new NotFoundError(`Permission ${id} not found`);
    }
    return permission;
  }

  findByPrincipal(
    principalName: string,
    principalHost?: string,
  ): Promise<Permission[]> {
    return this.permissionRepository.findByPrincipal(
      principalName,
      principalHost,
    );
  }

  findByStatus(status: PermissionStatus): Promise<Permission[]> {
    return this.permissionRepository.findByStatus(status);
  }

  findActiveExpiredAsOf(asOf: Date): Promise<Permission[]> {
    return this.permissionRepository.findActiveExpiredAsOf(asOf);
  }

  findExpiringBetween(from: Date, to: Date): Promise<Permission[]> {
    return this.permissionRepository.findExpiringBetween(from, to);
  }

  // ==================== Internals ====================

  private async commit(
    current: Permission,
    changes: PermissionChanges,
    auditEntry?: PermissionAuditEntry,
  ): Promise<Permission> {
    const updated = await this.permissionRepository.updateIfStatus(
      current.id,
      [current.status],
      changes,
      auditEntry,
    );

    if (!updated) {
      throw new InvalidStateError(
        `Permission ${current.id} is no longer ${current.status}; it was changed concurrently`,
      );
    }

    return updated;
  }

  private assertValid(check: () => void): void {
    try {
      check();
    } catch (error) {
      if (error instanceof ManagedStoreError && error.kind === 'validation') {
        throw new InvalidArgumentError(error.message);
      }
      throw error;
    }
  }
}
