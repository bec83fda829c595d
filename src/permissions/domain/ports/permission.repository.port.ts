import { NullableType } from '../../../utils/types/nullable.type';
import { Permission } from '../entities/permission.entity';
import { PermissionAuditEntry } from '../entities/permission-event.entity';
import { PermissionStatus } from '../enums/permission-status.enum';

export type NewPermission = Omit<
  Permission,
  | 'id'
  | 'status'
  | 'approvedBy'
  | 'approvedAt'
  | 'revokedBy'
  | 'revokedAt'
  | 'createdAt'
  | 'updatedAt'
>;

export type PermissionChanges = Partial<
  Pick<
    Permission,
    'status' | 'endTime' | 'approvedBy' | 'approvedAt' | 'revokedBy' | 'revokedAt'
  >
>;

export abstract class PermissionRepositoryPort {
  /**
   * Persist a PENDING permission together with its CREATED audit row
   * (single transaction)
   */
  abstract create(
    data: NewPermission,
    createdEntry: PermissionAuditEntry,
  ): Promise<Permission>;

  abstract findById(id: number): Promise<NullableType<Permission>>;

  /**
   * Apply `changes` only while the stored status is one of `expectedStatuses`,
   * appending `auditEntry` in the same transaction.
   * @returns the updated permission, or null when the status no longer matched
   */
  abstract updateIfStatus(
    id: number,
    expectedStatuses: PermissionStatus[],
    changes: PermissionChanges,
    auditEntry?: PermissionAuditEntry,
  ): Promise<NullableType<Permission>>;

  /**
   * ACTIVE permissions whose end time is at or before `asOf`
   */
  abstract findActiveExpiredAsOf(asOf: Date): Promise<Permission[]>;

  abstract findByPrincipal(
    principalName: string,
    principalHost?: string,
  ): Promise<Permission[]>;

  abstract findByStatus(status: PermissionStatus): Promise<Permission[]>;

  /**
   * ACTIVE permissions ending within [from, to]
   */
  abstract findExpiringBetween(from: Date, to: Date): Promise<Permission[]>;
}
