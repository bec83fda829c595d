import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import {
  sanitizeErrorMessage,
  sanitizeMetadata,
} from './utils/credential-sanitizer.util';

export interface AccessAuditEventData {
  event: AccessAuditEventType;
  actor: string; // Human identity or SYSTEM
  success: boolean;
  permissionId?: number;
  principal?: string; // 'name'@'host'
  resourceName?: string;
  errorMessage?: string;
  metadata?: Record<string, unknown>; // Additional event-specific data
}

export enum AccessAuditEventType {
  GRANT_APPLIED = 'GRANT_APPLIED',
  GRANT_FAILED = 'GRANT_FAILED',
  REVOKE_APPLIED = 'REVOKE_APPLIED',
  REVOKE_FAILED = 'REVOKE_FAILED',
  AUTO_REVOKE_RESCHEDULED = 'AUTO_REVOKE_RESCHEDULED',
  AUTO_REVOKE_RESCHEDULE_FAILED = 'AUTO_REVOKE_RESCHEDULE_FAILED',
  PERMISSION_EXPIRED = 'PERMISSION_EXPIRED',
  EXPIRATION_SWEEP_COMPLETED = 'EXPIRATION_SWEEP_COMPLETED',
  EVENT_SCHEDULER_DISABLED = 'EVENT_SCHEDULER_DISABLED',
}

/**
 * Audit Service for security logging of managed-store access changes
 *
 * Requirements:
 * - Lines contain actor, timestamp, event type and outcome
 * - NO credentials: generated or supplied passwords never reach a log line
 * - Lines are single-line JSON so the log pipeline can index them
 *
 * The permission_events table stays the system of record; these lines feed
 * alerting and cross-system correlation.
 */
@Injectable()
export class AuditService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  logAccessEvent(data: AccessAuditEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: this.configService.get('app.name', { infer: true }),
      component: 'permissions',
      event: data.event,
      actor: data.actor,
      success: data.success,
      permissionId: data.permissionId,
      principal: data.principal,
      resourceName: data.resourceName,
      errorType: data.errorMessage
        ? sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: sanitizeMetadata(data.metadata) } : {}),
    };

    // Structured JSON logging
    console.info(JSON.stringify(logEntry));
  }
}
