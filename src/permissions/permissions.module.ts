import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditModule } from '../audit/audit.module';
import { ManagedStoreModule } from '../managed-store/managed-store.module';
import permissionConfig from './config/permission.config';
import { PermissionEventPublisher } from './domain/ports/permission-event.publisher.port';
import { PermissionEventRepositoryPort } from './domain/ports/permission-event.repository.port';
import { PermissionRepositoryPort } from './domain/ports/permission.repository.port';
import { PrincipalDirectoryPort } from './domain/ports/principal-directory.port';
import { PermissionLifecycleDomainService } from './domain/services/permission-lifecycle.domain.service';
import { PermissionEventBus } from './events/permission-event-bus';
import { PermissionEventOrchestrator } from './events/permission-event.orchestrator';
import { ManagedStorePrincipalDirectory } from './infrastructure/identity/managed-store-principal.directory';
import { PermissionEventEntity } from './infrastructure/persistence/relational/entities/permission-event.entity';
import { PermissionEntity } from './infrastructure/persistence/relational/entities/permission.entity';
import { PermissionEventRelationalRepository } from './infrastructure/persistence/relational/repositories/permission-event.repository';
import { PermissionRelationalRepository } from './infrastructure/persistence/relational/repositories/permission.repository';
import { PermissionHistoryService } from './permission-history.service';
import { PermissionsService } from './permissions.service';
import { PermissionExpirationSweeper } from './scheduling/permission-expiration.sweeper';

@Module({
  imports: [
    // Configuration
    ConfigModule.forFeature(permissionConfig),

    // Record store
    TypeOrmModule.forFeature([PermissionEntity, PermissionEventEntity]),

    // Expiration sweep and event scheduler check
    ScheduleModule.forRoot(),

    // Audit logging
    AuditModule,

    // Grant executor and principal accounts
    ManagedStoreModule,
  ],
  providers: [
    // Application layer
    PermissionsService,
    PermissionHistoryService,

    // Domain layer
    PermissionLifecycleDomainService,

    // Event channel and its consumer
    PermissionEventBus,
    {
      provide: PermissionEventPublisher,
      useExisting: PermissionEventBus,
    },
    PermissionEventOrchestrator,

    // Background jobs
    PermissionExpirationSweeper,

    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: PermissionRepositoryPort,
      useClass: PermissionRelationalRepository,
    },
    {
      provide: PermissionEventRepositoryPort,
      useClass: PermissionEventRelationalRepository,
    },
    {
      provide: PrincipalDirectoryPort,
      useClass: ManagedStorePrincipalDirectory,
    },
  ],
  exports: [PermissionsService, PermissionHistoryService, PermissionEventBus],
})
export class PermissionsModule {}
