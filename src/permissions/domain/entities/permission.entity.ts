import { PermissionStatus } from '../enums/permission-status.enum';
import { PermissionType } from '../enums/permission-type.enum';

/**
 * Domain entity for a time-bounded privilege grant on the managed store.
 *
 * Never physically deleted: EXPIRED and REVOKED rows are kept for audit.
 */
export interface Permission {
  id: number;
  principalName: string; // Account name on the managed store
  principalHost: string; // '%', a literal host or an IP pattern
  resourceName: string; // '*', 'db', 'db.*' or 'db.table'
  type: PermissionType;
  startTime: Date;
  endTime: Date; // Always after startTime
  status: PermissionStatus;
  description?: string;
  createdBy: string;
  approvedBy?: string;
  approvedAt?: Date;
  revokedBy?: string;
  revokedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}
