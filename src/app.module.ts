import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource, DataSourceOptions } from 'typeorm';
import appConfig from './config/app.config';
import databaseConfig from './database/config/database.config';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import managedStoreConfig from './managed-store/config/managed-store.config';
import permissionConfig from './permissions/config/permission.config';
import { PermissionsModule } from './permissions/permissions.module';

const infrastructureDatabaseModule = TypeOrmModule.forRootAsync({
  useClass: TypeOrmConfigService,
  dataSourceFactory: async (options?: DataSourceOptions) => {
    if (!options) {
      throw new Error('Record store data source options are missing');
    }
    return new DataSource(options).initialize();
  },
});

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, databaseConfig, managedStoreConfig, permissionConfig],
      envFilePath: ['.env'],
    }),
    infrastructureDatabaseModule,
    PermissionsModule,
  ],
})
export class AppModule {}
