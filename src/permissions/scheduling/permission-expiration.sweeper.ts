import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { AccessAuditEventType, AuditService } from '../../audit/audit.service';
import { AllConfigType } from '../../config/config.type';
import { GrantExecutorService } from '../../managed-store/services/grant-executor.service';
import { SYSTEM_ACTOR } from '../domain/entities/permission-event.entity';
import { PermissionLifecycleDomainService } from '../domain/services/permission-lifecycle.domain.service';

export const EXPIRATION_SWEEP_INTERVAL = 'permission-expiration-sweep';
export const SCHEDULER_CHECK_TIMEOUT =
  'managed-store-event-scheduler-check-initial';
export const SCHEDULER_CHECK_INTERVAL = 'managed-store-event-scheduler-check';

export interface SweepSummary {
  examined: number;
  expired: number;
  failed: number;
  // true when the run was skipped because another was still in progress
  skipped: boolean;
}

/**
 * Background job that finalizes expired permissions
 *
 * - Every sweep interval, moves ACTIVE permissions whose end time has passed
 *   to EXPIRED. Privileges themselves are withdrawn by the revoke event on
 *   the managed store; the sweep only brings the record store in line.
 * - On a long period, checks that the managed store's event scheduler is on,
 *   since without it no scheduled revoke ever fires.
 *
 * Periods come from configuration, so jobs are registered through the
 * SchedulerRegistry rather than decorators.
 */
@Injectable()
export class PermissionExpirationSweeper
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(PermissionExpirationSweeper.name);
  private sweepInProgress = false;

  constructor(
    private readonly lifecycle: PermissionLifecycleDomainService,
    private readonly grantExecutor: GrantExecutorService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly auditService: AuditService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  onApplicationBootstrap(): void {
    const sweepIntervalMs = this.configService.getOrThrow(
      'permission.sweepIntervalMs',
      { infer: true },
    );
    const checkInitialDelayMs = this.configService.getOrThrow(
      'permission.schedulerCheckInitialDelayMs',
      { infer: true },
    );
    const checkIntervalMs = this.configService.getOrThrow(
      'permission.schedulerCheckIntervalMs',
      { infer: true },
    );

    this.schedulerRegistry.addInterval(
      EXPIRATION_SWEEP_INTERVAL,
      setInterval(() => {
        void this.sweep().catch((error: unknown) =>
          this.logger.error('Expiration sweep failed', error),
        );
      }, sweepIntervalMs),
    );

    this.schedulerRegistry.addTimeout(
      SCHEDULER_CHECK_TIMEOUT,
      setTimeout(() => {
        void this.checkEventScheduler().catch((error: unknown) =>
          this.logger.error('Event scheduler check failed', error),
        );
      }, checkInitialDelayMs),
    );

    this.schedulerRegistry.addInterval(
      SCHEDULER_CHECK_INTERVAL,
      setInterval(() => {
        void this.checkEventScheduler().catch((error: unknown) =>
          this.logger.error('Event scheduler check failed', error),
        );
      }, checkIntervalMs),
    );

    this.logger.log(
      `Expiration sweep every ${sweepIntervalMs}ms; event scheduler check every ${checkIntervalMs}ms`,
    );
  }

  onApplicationShutdown(): void {
    for (const name of [EXPIRATION_SWEEP_INTERVAL, SCHEDULER_CHECK_INTERVAL]) {
      if (this.schedulerRegistry.doesExist('interval', name)) {
        this.schedulerRegistry.deleteInterval(name);
      }
    }
    if (this.schedulerRegistry.doesExist('timeout', SCHEDULER_CHECK_TIMEOUT)) {
      this.schedulerRegistry.deleteTimeout(SCHEDULER_CHECK_TIMEOUT);
    }
  }

  /**
   * Expire every ACTIVE permission whose end time is at or before `now`.
   * A failure on one record is logged and the run moves on.
   */
  async sweep(now: Date = new Date()): Promise<SweepSummary> {
    if (this.sweepInProgress) {
      this.logger.warn('Previous expiration sweep still running; skipping');
      return { examined: 0, expired: 0, failed: 0, skipped: true };
    }

    this.sweepInProgress = true;
    const startTime = Date.now();

    try {
      const candidates = await this.lifecycle.findActiveExpiredAsOf(now);
      let expired = 0;
      let failed = 0;

      for (const permission of candidates) {
        try {
          await this.lifecycle.expire(permission.id);
          expired++;
        } catch (error) {
          failed++;
          this.logger.error(
            `Failed to expire permission ${permission.id}: ${error instanceof Error ? error.message : String(error)}`,
          );
        }
      }

      const summary: SweepSummary = {
        examined: candidates.length,
        expired,
        failed,
        skipped: false,
      };

      if (candidates.length > 0) {
        this.logger.log(
          `Expiration sweep completed in ${Date.now() - startTime}ms: ${expired} expired, ${failed} failed`,
        );
        this.auditService.logAccessEvent({
          event: AccessAuditEventType.EXPIRATION_SWEEP_COMPLETED,
          actor: SYSTEM_ACTOR,
          success: failed === 0,
          metadata: {
            examined: summary.examined,
            expired,
            failed,
          },
        });
      }

      return summary;
    } finally {
      this.sweepInProgress = false;
    }
  }

  /**
   * @returns whether the event scheduler is on after the check
   */
  async checkEventScheduler(): Promise<boolean> {
    if (await this.grantExecutor.isEventSchedulerEnabled()) {
      this.logger.debug('Managed store event scheduler is enabled');
      return true;
    }

    this.logger.warn(
      'Managed store event scheduler is DISABLED; attempting to enable it',
    );

    try {
      await this.grantExecutor.enableEventScheduler();
    } catch (error) {
      this.logger.error(
        'COULD NOT ENABLE THE EVENT SCHEDULER. Scheduled auto-revokes will not run until it is enabled (SET GLOBAL event_scheduler = ON)',
        error instanceof Error ? error.stack : undefined,
      );
      this.auditService.logAccessEvent({
        event: AccessAuditEventType.EVENT_SCHEDULER_DISABLED,
        actor: SYSTEM_ACTOR,
        success: false,
        errorMessage: error instanceof Error ? error.message : String(error),
      });
      return false;
    }

    this.logger.warn(
      'Managed store event scheduler was disabled and has been enabled. Auto-revokes that were due while it was off have not run',
    );
    this.auditService.logAccessEvent({
      event: AccessAuditEventType.EVENT_SCHEDULER_DISABLED,
      actor: SYSTEM_ACTOR,
      success: true,
      metadata: { enabled: true },
    });
    return true;
  }
}
