import { PermissionEventType } from '../enums/permission-event-type.enum';

export const SYSTEM_ACTOR = 'SYSTEM';

/**
 * Append-only audit row. Failed attempts are recorded with the type of the
 * transition that was attempted and success = false.
 */
export interface PermissionEvent {
  id: number;
  permissionId: number;
  eventType: PermissionEventType;
  triggeredBy: string; // Human identity or SYSTEM
  details: string;
  success: boolean;
  eventTime: Date;
  createdAt: Date;
}

export type PermissionAuditEntry = Omit<
  PermissionEvent,
  'id' | 'permissionId' | 'createdAt'
>;

export type NewPermissionEvent = Omit<PermissionEvent, 'id' | 'createdAt'>;
