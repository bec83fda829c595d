import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { AllConfigType } from '../../config/config.type';

export const MANAGED_STORE_DATA_SOURCE = 'managed';

/**
 * Named MariaDB connection used only for raw statements, so it carries no
 * entities and never synchronizes.
 */
@Injectable()
export class ManagedStoreTypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    return {
      name: MANAGED_STORE_DATA_SOURCE,
      type: 'mariadb',
      host: this.configService.getOrThrow('managedStore.host', { infer: true }),
      port: this.configService.getOrThrow('managedStore.port', { infer: true }),
      username: this.configService.get('managedStore.username', {
        infer: true,
      }),
      password: this.configService.get('managedStore.password', {
        infer: true,
      }),
      timezone: 'Z',
      entities: [],
      synchronize: false,
      migrationsRun: false,
      extra: {
        connectionLimit: this.configService.getOrThrow(
          'managedStore.maxConnections',
          { infer: true },
        ),
      },
    };
  }
}
