import { Injectable } from '@nestjs/common';
import { PermissionEvent } from './domain/entities/permission-event.entity';
import { PermissionEventType } from './domain/enums/permission-event-type.enum';
import { InvalidArgumentError } from './domain/errors/permission-lifecycle.errors';
import { PermissionEventRepositoryPort } from './domain/ports/permission-event.repository.port';
import { PermissionLifecycleDomainService } from './domain/services/permission-lifecycle.domain.service';

/**
 * Read side of the permission_events audit trail
 */
@Injectable()
export class PermissionHistoryService {
  constructor(
    private readonly eventRepository: PermissionEventRepositoryPort,
    private readonly lifecycle: PermissionLifecycleDomainService,
  ) {}

  /**
   * @throws NotFoundError when the permission id is unknown
   */
  async listByPermission(permissionId: number): Promise<PermissionEvent[]> {
    await this.lifecycle.getPermission(permissionId);
    return this.eventRepository.findByPermissionId(permissionId);
  }

  listByPrincipal(
    principalName: string,
    principalHost?: string,
  ): Promise<PermissionEvent[]> {
    return this.eventRepository.findByPrincipal(principalName, principalHost);
  }

  async listBetween(from: Date, to: Date): Promise<PermissionEvent[]> {
    if (Number.isNaN(from.getTime()) || Number.isNaN(to.getTime())) {
      throw new InvalidArgumentError('History window bounds must be valid dates');
    }
    if (from.getTime() > to.getTime()) {
      throw new InvalidArgumentError(
        `History window start ${from.toISOString()} is after its end ${to.toISOString()}`,
      );
    }
    return this.eventRepository.findBetween(from, to);
  }

  listByEventType(eventType: PermissionEventType): Promise<PermissionEvent[]> {
    return this.eventRepository.findByEventType(eventType);
  }
}
