import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, In, LessThanOrEqual, Repository } from 'typeorm';
import { Permission } from '../../../../domain/entities/permission.entity';
import { PermissionAuditEntry } from '../../../../domain/entities/permission-event.entity';
import { PermissionStatus } from '../../../../domain/enums/permission-status.enum';
import {
  NewPermission,
  PermissionChanges,
  PermissionRepositoryPort,
} from '../../../../domain/ports/permission.repository.port';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { PermissionEntity } from '../entities/permission.entity';
import { PermissionMapper } from '../mappers/permission.mapper';
import { PermissionEventMapper } from '../mappers/permission-event.mapper';

@Injectable()
export class PermissionRelationalRepository implements PermissionRepositoryPort {
  constructor(
    @InjectRepository(PermissionEntity)
    private readonly repository: Repository<PermissionEntity>,
  ) {}

  async create(
    data: NewPermission,
    createdEntry: PermissionAuditEntry,
  ): Promise<Permission> {
    return this.repository.manager.transaction(async (manager) => {
      const entity = manager.create(PermissionEntity, {
        principalName: data.principalName,
        principalHost: data.principalHost,
        resourceName: data.resourceName,
        type: data.type,
        startTime: data.startTime,
        endTime: data.endTime,
        status: PermissionStatus.PENDING,
        description: data.description ?? null,
        createdBy: data.createdBy,
      });
      const saved = await manager.save(entity);

      await manager.save(
        PermissionEventMapper.toPersistence({
          ...createdEntry,
          permissionId: saved.id,
        }),
      );

      return PermissionMapper.toDomain(saved);
    });
  }

  async findById(id: number): Promise<NullableType<Permission>> {
    const entity = await this.repository.findOne({
      where: { id },
    });

    return entity ? PermissionMapper.toDomain(entity) : null;
  }

  async updateIfStatus(
    id: number,
    expectedStatuses: PermissionStatus[],
    changes: PermissionChanges,
    auditEntry?: PermissionAuditEntry,
  ): Promise<NullableType<Permission>> {
    return this.repository.manager.transaction(async (manager) => {
      const result = await manager.update(
        PermissionEntity,
        { id, status: In(expectedStatuses) },
        changes,
      );

      if (!result.affected) {
        return null;
      }

      if (auditEntry) {
        await manager.save(
          PermissionEventMapper.toPersistence({
            ...auditEntry,
            permissionId: id,
          }),
        );
      }

      const updated = await manager.findOneByOrFail(PermissionEntity, { id });
      return PermissionMapper.toDomain(updated);
    });
  }

  async findActiveExpiredAsOf(asOf: Date): Promise<Permission[]> {
    const entities = await this.repository.find({
      where: {
        status: PermissionStatus.ACTIVE,
        endTime: LessThanOrEqual(asOf),
      },
      order: { endTime: 'ASC' },
    });

    return entities.map(PermissionMapper.toDomain);
  }

  async findByPrincipal(
    principalName: string,
    principalHost?: string,
  ): Promise<Permission[]> {
    const entities = await this.repository.find({
      where: principalHost ? { principalName, principalHost } : { principalName },
      order: { createdAt: 'DESC' },
    });

    return entities.map(PermissionMapper.toDomain);
  }

  async findByStatus(status: PermissionStatus): Promise<Permission[]> {
    const entities = await this.repository.find({
      where: { status },
      order: { createdAt: 'DESC' },
    });

    return entities.map(PermissionMapper.toDomain);
  }

  async findExpiringBetween(from: Date, to: Date): Promise<Permission[]> {
    const entities = await this.repository.find({
      where: {
        status: PermissionStatus.ACTIVE,
        endTime: Between(from, to),
      },
      order: { endTime: 'ASC' },
    });

    return entities.map(PermissionMapper.toDomain);
  }
}

