import {
  NewPermissionEvent,
  PermissionEvent,
} from '../entities/permission-event.entity';
import { PermissionEventType } from '../enums/permission-event-type.enum';

export abstract class PermissionEventRepositoryPort {
  abstract append(entry: NewPermissionEvent): Promise<PermissionEvent>;

  /**
   * Oldest first
   */
  abstract findByPermissionId(permissionId: number): Promise<PermissionEvent[]>;

  abstract findByPrincipal(
    principalName: string,
    principalHost?: string,
  ): Promise<PermissionEvent[]>;

  abstract findBetween(from: Date, to: Date): Promise<PermissionEvent[]>;

  abstract findByEventType(
    eventType: PermissionEventType,
  ): Promise<PermissionEvent[]>;
}
