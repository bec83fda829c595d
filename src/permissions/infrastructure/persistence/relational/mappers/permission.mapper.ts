import { Permission } from '../../../../domain/entities/permission.entity';
import { PermissionEntity } from '../entities/permission.entity';

export class PermissionMapper {
  static toDomain(entity: PermissionEntity): Permission {
    return {
      id: entity.id,
      principalName: entity.principalName,
      principalHost: entity.principalHost,
      resourceName: entity.resourceName,
      type: entity.type,
      startTime: entity.startTime,
      endTime: entity.endTime,
      status: entity.status,
      description: entity.description ?? undefined,
      createdBy: entity.createdBy,
      approvedBy: entity.approvedBy ?? undefined,
      approvedAt: entity.approvedAt ?? undefined,
      revokedBy: entity.revokedBy ?? undefined,
      revokedAt: entity.revokedAt ?? undefined,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }
}
