import { AppConfig } from './app-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { ManagedStoreConfig } from '../managed-store/config/managed-store-config.type';
import { PermissionConfig } from '../permissions/config/permission-config.type';

export type AllConfigType = {
  app: AppConfig;
  database: DatabaseConfig;
  managedStore: ManagedStoreConfig;
  permission: PermissionConfig;
};
