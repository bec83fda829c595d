import { Injectable, Logger } from '@nestjs/common';
import { Permission } from './domain/entities/permission.entity';
import { PermissionStatus } from './domain/enums/permission-status.enum';
import { InvalidArgumentError } from './domain/errors/permission-lifecycle.errors';
import {
  CreatePermissionInput,
  PermissionLifecycleDomainService,
} from './domain/services/permission-lifecycle.domain.service';
import { TemporaryAccessRequestDto } from './dto/temporary-access-request.dto';
import { validateDto } from '../utils/validate-dto';

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export interface TemporaryAccessResult {
  permissions: Permission[];
  startTime: Date;
  endTime: Date;
}

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }
}

/**
 * Permissions Service
 *
 * Application-facing entry point. Lifecycle calls pass straight through to
 * the domain service; the temporary-access helpers compose them.
 */
@Injectable()
export class PermissionsService {
  private readonly logger = new Logger(PermissionsService.name);

  constructor(private readonly lifecycle: PermissionLifecycleDomainService) {}

  requestPermission(
    input: CreatePermissionInput,
    actor: string,
  ): Promise<Permission> {
    return this.lifecycle.create(input, actor);
  }

  approve(id: number, actor: string): Promise<Permission> {
    return this.lifecycle.approve(id, actor);
  }

  revoke(id: number, actor: string): Promise<Permission> {
    return this.lifecycle.revoke(id, actor);
  }

  extend(id: number, newEndTime: Date, actor: string): Promise<Permission> {
    return this.lifecycle.extend(id, newEndTime, actor);
  }

  getPermission(id: number): Promise<Permission> {
    return this.lifecycle.getPermission(id);
  }

  findByPrincipal(
    principalName: string,
    principalHost?: string,
  ): Promise<Permission[]> {
    return this.lifecycle.findByPrincipal(principalName, principalHost);
  }

  findByStatus(status: PermissionStatus): Promise<Permission[]> {
    return this.lifecycle.findByStatus(status);
  }

  /**
   * Grant every requested type on every requested resource, starting now and
   * lasting `durationDays`. Each permission is created and approved at once,
   * so it activates immediately.
   *
   * Stops at the first failure; permissions already granted stay in place.
   *
   * @throws BadRequestException when the request payload is malformed
   */
  async grantTemporaryAccess(
    payload: unknown,
    actor: string,
  ): Promise<TemporaryAccessResult> {
    const request = await validateDto(TemporaryAccessRequestDto, payload);

    const startTime = new Date();
    const endTime = new Date(startTime.getTime() + request.durationDays * DAY_MS);
    const description =
      request.description ??
      `Temporary access - ${request.durationDays} day(s)`;

    this.logger.log(
      `Granting temporary access to '${request.principalName}'@'${request.principalHost}' for ${request.durationDays} day(s)`,
    );

    const permissions: Permission[] = [];
    for (const resourceName of request.resourceNames) {
      for (const type of request.permissionTypes) {
        const created = await this.lifecycle.create(
          {
            principalName: request.principalName,
            principalHost: request.principalHost,
            resourceName,
            type,
            startTime,
            endTime,
            description,
          },
          actor,
        );
        permissions.push(await this.lifecycle.approve(created.id, actor));
      }
    }

    return { permissions, startTime, endTime };
  }

  /**
   * Push the end time back by whole days from the current end time
   */
  async extendByDays(
    id: number,
    additionalDays: number,
    actor: string,
  ): Promise<Permission> {
    assertPositiveInteger(additionalDays, 'additionalDays');

    const current = await this.lifecycle.getPermission(id);
    const newEndTime = new Date(
      current.endTime.getTime() + additionalDays * DAY_MS,
    );
    return this.lifecycle.extend(id, newEndTime, actor);
  }

  /**
   * ACTIVE permissions ending within the next `hours`
   */
  listExpiringWithin(hours: number, now: Date = new Date()): Promise<Permission[]> {
    assertPositiveInteger(hours, 'hours');
    return this.lifecycle.findExpiringBetween(
      now,
      new Date(now.getTime() + hours * HOUR_MS),
    );
  }
}
