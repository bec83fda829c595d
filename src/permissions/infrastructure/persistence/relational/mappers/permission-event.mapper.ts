import {
  NewPermissionEvent,
  PermissionEvent,
} from '../../../../domain/entities/permission-event.entity';
import { PermissionEventEntity } from '../entities/permission-event.entity';

export class PermissionEventMapper {
  static toDomain(entity: PermissionEventEntity): PermissionEvent {
    return {
      id: entity.id,
      permissionId: entity.permissionId,
      eventType: entity.eventType,
      triggeredBy: entity.triggeredBy,
      details: entity.details,
      success: entity.success,
      eventTime: entity.eventTime,
      createdAt: entity.createdAt,
    };
  }

  static toPersistence(entry: NewPermissionEvent): PermissionEventEntity {
    const entity = new PermissionEventEntity();
    entity.permissionId = entry.permissionId;
    entity.eventType = entry.eventType;
    entity.triggeredBy = entry.triggeredBy;
    entity.details = entry.details;
    entity.success = entry.success;
    entity.eventTime = entry.eventTime;
    return entity;
  }
}
