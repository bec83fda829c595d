import { Permission } from '../entities/permission.entity';
import { PermissionEventType } from '../enums/permission-event-type.enum';
import { PermissionStatus } from '../enums/permission-status.enum';

interface PermissionEventBase {
  permission: Permission; // Snapshot after the transition
  actor: string;
  occurredAt: Date;
}

export type PermissionCreatedEvent = PermissionEventBase & {
  type: PermissionEventType.CREATED;
};

export type PermissionApprovedEvent = PermissionEventBase & {
  type: PermissionEventType.APPROVED;
};

export type PermissionActivatedEvent = PermissionEventBase & {
  type: PermissionEventType.ACTIVATED;
};

export type PermissionRevokedEvent = PermissionEventBase & {
  type: PermissionEventType.REVOKED;
  previousStatus: PermissionStatus; // ACTIVE means privileges must be withdrawn
};

export type PermissionExpiredEvent = PermissionEventBase & {
  type: PermissionEventType.EXPIRED;
};

export type PermissionExtendedEvent = PermissionEventBase & {
  type: PermissionEventType.EXTENDED;
  previousEndTime: Date;
};

export type PermissionDomainEvent =
  | PermissionCreatedEvent
  | PermissionApprovedEvent
  | PermissionActivatedEvent
  | PermissionRevokedEvent
  | PermissionExpiredEvent
  | PermissionExtendedEvent;
