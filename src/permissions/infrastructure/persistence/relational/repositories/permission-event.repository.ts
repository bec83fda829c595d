import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, Repository } from 'typeorm';
import {
  NewPermissionEvent,
  PermissionEvent,
} from '../../../../domain/entities/permission-event.entity';
import { PermissionEventType } from '../../../../domain/enums/permission-event-type.enum';
import { PermissionEventRepositoryPort } from '../../../../domain/ports/permission-event.repository.port';
import { PermissionEventEntity } from '../entities/permission-event.entity';
import { PermissionEventMapper } from '../mappers/permission-event.mapper';

@Injectable()
export class PermissionEventRelationalRepository
  implements PermissionEventRepositoryPort
{
  constructor(
    @InjectRepository(PermissionEventEntity)
    private readonly repository: Repository<PermissionEventEntity>,
  ) {}

  async append(entry: NewPermissionEvent): Promise<PermissionEvent> {
    const saved = await this.repository.save(
      PermissionEventMapper.toPersistence(entry),
    );
    return PermissionEventMapper.toDomain(saved);
  }

  async findByPermissionId(permissionId: number): Promise<PermissionEvent[]> {
    const entities = await this.repository.find({
      where: { permissionId },
      order: { eventTime: 'ASC', id: 'ASC' },
    });

    return entities.map(PermissionEventMapper.toDomain);
  }

  async findByPrincipal(
    principalName: string,
    principalHost?: string,
  ): Promise<PermissionEvent[]> {
    const entities = await this.repository.find({
      where: {
        permission: principalHost
          ? { principalName, principalHost }
          : { principalName },
      },
      order: { eventTime: 'DESC', id: 'DESC' },
    });

    return entities.map(PermissionEventMapper.toDomain);
  }

  async findBetween(from: Date, to: Date): Promise<PermissionEvent[]> {
    const entities = await this.repository.find({
      where: { eventTime: Between(from, to) },
      order: { eventTime: 'ASC', id: 'ASC' },
    });

    return entities.map(PermissionEventMapper.toDomain);
  }

  async findByEventType(
    eventType: PermissionEventType,
  ): Promise<PermissionEvent[]> {
    const entities = await this.repository.find({
      where: { eventType },
      order: { eventTime: 'DESC', id: 'DESC' },
    });

    return entities.map(PermissionEventMapper.toDomain);
  }
}
