import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccessAuditEventType, AuditService } from '../../audit/audit.service';
import { AllConfigType } from '../../config/config.type';
import { formatTimestamp } from '../../managed-store/utils/statement-builder';
import {
  GrantExecutorService,
  ScheduledGrant,
} from '../../managed-store/services/grant-executor.service';
import { Permission } from '../domain/entities/permission.entity';
import { SYSTEM_ACTOR } from '../domain/entities/permission-event.entity';
import { PermissionEventType } from '../domain/enums/permission-event-type.enum';
import {
  PermissionActivatedEvent,
  PermissionDomainEvent,
  PermissionExpiredEvent,
  PermissionExtendedEvent,
  PermissionRevokedEvent,
} from '../domain/events/permission-domain-event';
import { PermissionEventRepositoryPort } from '../domain/ports/permission-event.repository.port';
import { PermissionStateMachine } from '../domain/utils/permission-state-machine.util';
import { PermissionEventBus } from './permission-event-bus';
import { RetryPolicy, RetryResult, runWithRetry } from './retry-policy';

function principalOf(permission: Permission): string {
  return `'${permission.principalName}'@'${permission.principalHost}'`;
}

function toScheduledGrant(permission: Permission): ScheduledGrant {
  return {
    permissionId: permission.id,
    principalName: permission.principalName,
    principalHost: permission.principalHost,
    resourceName: permission.resourceName,
    type: permission.type,
    startTime: permission.startTime,
    endTime: permission.endTime,
  };
}

/**
 * Audit text for a failed managed-store step
 */
export function describeFailure(
  prefix: string,
  result: Extract<RetryResult<unknown>, { ok: false }>,
): string {
  const { failure } = result;

  if (failure.kind === 'validation') {
    return `${prefix} (validation error): ${failure.message}`;
  }
  if (failure.kind === 'not-found') {
    return `${prefix} (principal not found): ${failure.message}`;
  }
  if (result.exhausted) {
    return `${prefix} after ${result.attempts} attempts: ${failure.message}`;
  }
  return `${prefix}: ${failure.message}`;
}

/**
 * Permission Event Orchestrator
 *
 * Turns lifecycle events into managed-store changes and records the outcome
 * as PermissionEvent rows. Runs on the keyed event channel, so it never
 * blocks or fails a transition; every failure ends in an audit row.
 *
 * Only reads permissions; status is owned by the lifecycle service.
 */
@Injectable()
export class PermissionEventOrchestrator implements OnModuleInit {
  private readonly logger = new Logger(PermissionEventOrchestrator.name);
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly eventBus: PermissionEventBus,
    private readonly grantExecutor: GrantExecutorService,
    private readonly eventRepository: PermissionEventRepositoryPort,
    private readonly auditService: AuditService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.retryPolicy = {
      maxAttempts: configService.getOrThrow('permission.retryMaxAttempts', {
        infer: true,
      }),
      initialDelayMs: configService.getOrThrow(
        'permission.retryInitialDelayMs',
        { infer: true },
      ),
      multiplier: configService.getOrThrow('permission.retryMultiplier', {
        infer: true,
      }),
      maxDelayMs: configService.getOrThrow('permission.retryMaxDelayMs', {
        infer: true,
      }),
    };
  }

  onModuleInit(): void {
    this.eventBus.subscribe((event) => this.handle(event));
  }

  async handle(event: PermissionDomainEvent): Promise<void> {
    switch (event.type) {
      case PermissionEventType.ACTIVATED:
        return this.handleActivated(event);
      case PermissionEventType.REVOKED:
        return this.handleRevoked(event);
      case PermissionEventType.EXTENDED:
        return this.handleExtended(event);
      case PermissionEventType.EXPIRED:
        return this.handleExpired(event);
      case PermissionEventType.CREATED:
      case PermissionEventType.APPROVED:
        // Audited by the lifecycle service; nothing to apply
        this.logger.debug(
          `No managed-store action for ${event.type} on permission ${event.permission.id}`,
        );
        return;
    }
  }

  private async handleActivated(event: PermissionActivatedEvent): Promise<void> {
    const permission = event.permission;
    this.logger.log(`Applying grant for permission ${permission.id}`);

    const result = await runWithRetry(
      () => this.grantExecutor.grantWithAutoRevoke(toScheduledGrant(permission)),
      this.retryPolicy,
    );

    if (result.ok) {
      await this.record(
        permission,
        PermissionEventType.ACTIVATED,
        SYSTEM_ACTOR,
        true,
        `Permission activated. Access granted to ${principalOf(permission)} on ${permission.resourceName} with auto-revoke scheduled at ${result.value.revokeAt} UTC`,
      );
      this.auditService.logAccessEvent({
        event: AccessAuditEventType.GRANT_APPLIED,
        actor: SYSTEM_ACTOR,
        success: true,
        permissionId: permission.id,
        principal: principalOf(permission),
        resourceName: permission.resourceName,
        metadata: {
          type: permission.type,
          principalCreated: result.value.principalCreated,
          attempts: result.attempts,
        },
      });
      return;
    }

    this.logger.error(
      `Grant for permission ${permission.id} failed after ${result.attempts} attempt(s): ${result.failure.message}`,
    );
    await this.record(
      permission,
      PermissionEventType.ACTIVATED,
      SYSTEM_ACTOR,
      false,
      describeFailure('Failed to activate permission', result),
    );
    this.auditService.logAccessEvent({
      event: AccessAuditEventType.GRANT_FAILED,
      actor: SYSTEM_ACTOR,
      success: false,
      permissionId: permission.id,
      principal: principalOf(permission),
      resourceName: permission.resourceName,
      errorMessage: result.failure.message,
      metadata: { code: result.failure.code, attempts: result.attempts },
    });
  }

  private async handleRevoked(event: PermissionRevokedEvent): Promise<void> {
    const permission = event.permission;
    const wasGranted = PermissionStateMachine.holdsPrivileges(
      event.previousStatus,
    );

    const result = wasGranted
      ? await runWithRetry(
          () => this.grantExecutor.revokeNow(toScheduledGrant(permission)),
          this.retryPolicy,
        )
      : await runWithRetry(
          () => this.grantExecutor.cancelAutoRevoke(permission.id),
          this.retryPolicy,
        );

    if (result.ok) {
      const details = wasGranted
        ? `Permission revoked by ${event.actor}. Access removed from ${principalOf(permission)}`
        : `Permission revoked by ${event.actor} while ${event.previousStatus}. No access had been granted to ${principalOf(permission)}`;

      await this.record(
        permission,
        PermissionEventType.REVOKED,
        event.actor,
        true,
        details,
      );
      this.auditService.logAccessEvent({
        event: AccessAuditEventType.REVOKE_APPLIED,
        actor: event.actor,
        success: true,
        permissionId: permission.id,
        principal: principalOf(permission),
        resourceName: permission.resourceName,
        metadata: { previousStatus: event.previousStatus },
      });
      return;
    }

    this.logger.error(
      `Revoke for permission ${permission.id} failed after ${result.attempts} attempt(s): ${result.failure.message}`,
    );
    await this.record(
      permission,
      PermissionEventType.REVOKED,
      event.actor,
      false,
      describeFailure('Failed to revoke permission', result),
    );
    this.auditService.logAccessEvent({
      event: AccessAuditEventType.REVOKE_FAILED,
      actor: event.actor,
      success: false,
      permissionId: permission.id,
      principal: principalOf(permission),
      resourceName: permission.resourceName,
      errorMessage: result.failure.message,
      metadata: {
        code: result.failure.code,
        attempts: result.attempts,
        previousStatus: event.previousStatus,
      },
    });
  }

  /**
   * Only an ACTIVE permission has a revoke event to move; a permission that
   * is not active yet picks up the new end time when it is activated.
   */
  private async handleExtended(event: PermissionExtendedEvent): Promise<void> {
    const permission = event.permission;

    if (!PermissionStateMachine.holdsPrivileges(permission.status)) {
      this.logger.debug(
        `Permission ${permission.id} extended while ${permission.status}; no schedule to move`,
      );
      return;
    }

    const result = await runWithRetry(
      () => this.grantExecutor.scheduleAutoRevoke(toScheduledGrant(permission)),
      this.retryPolicy,
    );

    if (result.ok) {
      await this.record(
        permission,
        PermissionEventType.MODIFIED,
        event.actor,
        true,
        `Auto-revoke rescheduled from ${formatTimestamp(event.previousEndTime)} UTC to ${formatTimestamp(permission.endTime)} UTC after extension by ${event.actor}`,
      );
      this.auditService.logAccessEvent({
        event: AccessAuditEventType.AUTO_REVOKE_RESCHEDULED,
        actor: event.actor,
        success: true,
        permissionId: permission.id,
        principal: principalOf(permission),
        resourceName: permission.resourceName,
      });
      return;
    }

    this.logger.error(
      `Rescheduling auto-revoke for permission ${permission.id} failed: ${result.failure.message}`,
    );
    await this.record(
      permission,
      PermissionEventType.EXTENDED,
      event.actor,
      false,
      describeFailure('Failed to reschedule auto-revoke after extension', result),
    );
    this.auditService.logAccessEvent({
      event: AccessAuditEventType.AUTO_REVOKE_RESCHEDULE_FAILED,
      actor: event.actor,
      success: false,
      permissionId: permission.id,
      principal: principalOf(permission),
      resourceName: permission.resourceName,
      errorMessage: result.failure.message,
      metadata: { code: result.failure.code, attempts: result.attempts },
    });
  }

  private async handleExpired(event: PermissionExpiredEvent): Promise<void> {
    const permission = event.permission;

    await this.record(
      permission,
      PermissionEventType.EXPIRED,
      SYSTEM_ACTOR,
      true,
      `Permission expired. Access should be revoked automatically by scheduled event for ${principalOf(permission)}`,
    );
    this.auditService.logAccessEvent({
      event: AccessAuditEventType.PERMISSION_EXPIRED,
      actor: SYSTEM_ACTOR,
      success: true,
      permissionId: permission.id,
      principal: principalOf(permission),
      resourceName: permission.resourceName,
    });
  }

  private async record(
    permission: Permission,
    eventType: PermissionEventType,
    triggeredBy: string,
    success: boolean,
    details: string,
  ): Promise<void> {
    await this.eventRepository.append({
      permissionId: permission.id,
      eventType,
      triggeredBy,
      details,
      success,
      eventTime: new Date(),
    });
  }
}
