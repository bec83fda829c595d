import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource, DataSourceOptions } from 'typeorm';
import managedStoreConfig from './config/managed-store.config';
import { ManagedStoreConnection } from './ports/managed-store-connection.port';
import {
  MANAGED_STORE_DATA_SOURCE,
  ManagedStoreTypeOrmConfigService,
} from './infrastructure/managed-store-typeorm-config.service';
import { TypeOrmManagedStoreConnection } from './infrastructure/typeorm-managed-store.connection';
import { GrantExecutorService } from './services/grant-executor.service';
import { PrincipalAccountService } from './services/principal-account.service';

@Module({
  imports: [
    // Configuration
    ConfigModule.forFeature(managedStoreConfig),

    // Named MariaDB connection (raw statements only)
    TypeOrmModule.forRootAsync({
      name: MANAGED_STORE_DATA_SOURCE,
      imports: [ConfigModule.forFeature(managedStoreConfig)],
      useClass: ManagedStoreTypeOrmConfigService,
      dataSourceFactory: async (options?: DataSourceOptions) => {
        if (!options) {
          throw new Error('Managed store data source options are missing');
        }
        return new DataSource(options).initialize();
      },
    }),
  ],
  providers: [
    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: ManagedStoreConnection,
      useClass: TypeOrmManagedStoreConnection,
    },

    PrincipalAccountService,
    GrantExecutorService,
  ],
  exports: [ManagedStoreConnection, PrincipalAccountService, GrantExecutorService],
})
export class ManagedStoreModule {}
