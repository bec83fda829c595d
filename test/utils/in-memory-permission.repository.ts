import { Permission } from '../../src/permissions/domain/entities/permission.entity';
import {
  NewPermissionEvent,
  PermissionAuditEntry,
  PermissionEvent,
} from '../../src/permissions/domain/entities/permission-event.entity';
import { PermissionEventType } from '../../src/permissions/domain/enums/permission-event-type.enum';
import { PermissionStatus } from '../../src/permissions/domain/enums/permission-status.enum';
import { PermissionEventRepositoryPort } from '../../src/permissions/domain/ports/permission-event.repository.port';
import {
  NewPermission,
  PermissionChanges,
  PermissionRepositoryPort,
} from '../../src/permissions/domain/ports/permission.repository.port';
import { NullableType } from '../../src/utils/types/nullable.type';

/**
 * Record-store stand-ins with the same conditional-update semantics as the
 * relational adapters.
 */
export class InMemoryPermissionEventRepository extends PermissionEventRepositoryPort {
  readonly rows: PermissionEvent[] = [];
  private nextId = 1;

  constructor(
    private readonly permissionLookup: (
      id: number,
    ) => Permission | undefined = () => undefined,
  ) {
    super();
  }

  async append(entry: NewPermissionEvent): Promise<PermissionEvent> {
    const row: PermissionEvent = {
      ...entry,
      id: this.nextId++,
      createdAt: new Date(),
    };
    this.rows.push(row);
    return { ...row };
  }

  async findByPermissionId(permissionId: number): Promise<PermissionEvent[]> {
    return this.sorted(this.rows.filter((row) => row.permissionId === permissionId));
  }

  async findByPrincipal(
    principalName: string,
    principalHost?: string,
  ): Promise<PermissionEvent[]> {
    return this.sorted(
      this.rows.filter((row) => {
        const permission = this.permissionLookup(row.permissionId);
        return (
          permission !== undefined &&
          permission.principalName === principalName &&
          (principalHost === undefined ||
            permission.principalHost === principalHost)
        );
      }),
    );
  }

  async findBetween(from: Date, to: Date): Promise<PermissionEvent[]> {
    return this.sorted(
      this.rows.filter(
        (row) =>
          row.eventTime.getTime() >= from.getTime() &&
          row.eventTime.getTime() <= to.getTime(),
      ),
    );
  }

  async findByEventType(
    eventType: PermissionEventType,
  ): Promise<PermissionEvent[]> {
    return this.sorted(this.rows.filter((row) => row.eventType === eventType));
  }

  /**
   * Event types recorded for a permission, oldest first
   */
  typesFor(permissionId: number): PermissionEventType[] {
    return this.rows
      .filter((row) => row.permissionId === permissionId)
      .map((row) => row.eventType);
  }

  private sorted(rows: PermissionEvent[]): PermissionEvent[] {
    return rows
      .map((row) => ({ ...row }))
      .sort(
        (a, b) => a.eventTime.getTime() - b.eventTime.getTime() || a.id - b.id,
      );
  }
}

export class InMemoryPermissionRepository extends PermissionRepositoryPort {
  private readonly permissions = new Map<number, Permission>();
  private nextId = 1;

  readonly events = new InMemoryPermissionEventRepository((id) =>
    this.permissions.get(id),
  );

  async create(
    data: NewPermission,
    createdEntry: PermissionAuditEntry,
  ): Promise<Permission> {
    const now = new Date();
    const permission: Permission = {
      ...data,
      id: this.nextId++,
      status: PermissionStatus.PENDING,
      createdAt: now,
      updatedAt: now,
    };

    this.permissions.set(permission.id, permission);
    await this.events.append({ ...createdEntry, permissionId: permission.id });
    return { ...permission };
  }

  async findById(id: number): Promise<NullableType<Permission>> {
    const permission = this.permissions.get(id);
    return permission ? { ...permission } : null;
  }

  async updateIfStatus(
    id: number,
    expectedStatuses: PermissionStatus[],
    changes: PermissionChanges,
    auditEntry?: PermissionAuditEntry,
  ): Promise<NullableType<Permission>> {
    const current = this.permissions.get(id);
    if (!current || !expectedStatuses.includes(current.status)) {
      return null;
    }

    const updated: Permission = { ...current, ...changes, updatedAt: new Date() };
    this.permissions.set(id, updated);

    if (auditEntry) {
      await this.events.append({ ...auditEntry, permissionId: id });
    }
    return { ...updated };
  }

  async findActiveExpiredAsOf(asOf: Date): Promise<Permission[]> {
    return this.select(
      (permission) =>
        permission.status === PermissionStatus.ACTIVE &&
        permission.endTime.getTime() <= asOf.getTime(),
    );
  }

  async findByPrincipal(
    principalName: string,
    principalHost?: string,
  ): Promise<Permission[]> {
    return this.select(
      (permission) =>
        permission.principalName === principalName &&
        (principalHost === undefined || permission.principalHost === principalHost),
    );
  }

  async findByStatus(status: PermissionStatus): Promise<Permission[]> {
    return this.select((permission) => permission.status === status);
  }

  async findExpiringBetween(from: Date, to: Date): Promise<Permission[]> {
    return this.select(
      (permission) =>
        permission.status === PermissionStatus.ACTIVE &&
        permission.endTime.getTime() >= from.getTime() &&
        permission.endTime.getTime() <= to.getTime(),
    );
  }

  /**
   * Overwrite fields directly, bypassing the lifecycle (test setup only)
   */
  force(id: number, changes: Partial<Permission>): void {
    const current = this.permissions.get(id);
    if (!current) {
      throw new Error(`No permission ${id}`);
    }
    this.permissions.set(id, { ...current, ...changes });
  }

  private select(predicate: (permission: Permission) => boolean): Permission[] {
    return [...this.permissions.values()]
      .filter(predicate)
      .sort((a, b) => a.endTime.getTime() - b.endTime.getTime() || a.id - b.id)
      .map((permission) => ({ ...permission }));
  }
}
