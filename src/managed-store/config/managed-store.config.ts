import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { ManagedStoreConfig } from './managed-store-config.type';
import validateConfig from '../../utils/validate-config';

class EnvironmentVariablesValidator {
  @IsString()
  @IsOptional()
  MANAGED_DB_HOST?: string;

  @IsInt()
  @Min(0)
  @Max(65535)
  @IsOptional()
  MANAGED_DB_PORT?: number;

  @IsString()
  @IsOptional()
  MANAGED_DB_USERNAME?: string;

  @IsString()
  @IsOptional()
  MANAGED_DB_PASSWORD?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  MANAGED_DB_MAX_CONNECTIONS?: number;

  // Generated credentials must still satisfy validateCredential (8..256)
  @IsInt()
  @Min(8)
  @Max(256)
  @IsOptional()
  MANAGED_DB_GENERATED_CREDENTIAL_LENGTH?: number;
}

export default registerAs<ManagedStoreConfig>('managedStore', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    host: process.env.MANAGED_DB_HOST || 'localhost',
    port: process.env.MANAGED_DB_PORT
      ? parseInt(process.env.MANAGED_DB_PORT, 10)
      : 3306,
    username: process.env.MANAGED_DB_USERNAME,
    password: process.env.MANAGED_DB_PASSWORD,
    maxConnections: process.env.MANAGED_DB_MAX_CONNECTIONS
      ? parseInt(process.env.MANAGED_DB_MAX_CONNECTIONS, 10)
      : 5,
    generatedCredentialLength: process.env
      .MANAGED_DB_GENERATED_CREDENTIAL_LENGTH
      ? parseInt(process.env.MANAGED_DB_GENERATED_CREDENTIAL_LENGTH, 10)
      : 20,
  };
});
