import { registerAs } from '@nestjs/config';
import { IsInt, IsNumber, IsOptional, Min } from 'class-validator';
import { PermissionConfig } from './permission-config.type';
import validateConfig from '../../utils/validate-config';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1000)
  @IsOptional()
  PERMISSION_SWEEP_INTERVAL_MS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  PERMISSION_SCHEDULER_CHECK_INITIAL_DELAY_MS?: number;

  @IsInt()
  @Min(1000)
  @IsOptional()
  PERMISSION_SCHEDULER_CHECK_INTERVAL_MS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  PERMISSION_RETRY_MAX_ATTEMPTS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  PERMISSION_RETRY_INITIAL_DELAY_MS?: number;

  @IsNumber()
  @Min(1)
  @IsOptional()
  PERMISSION_RETRY_MULTIPLIER?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  PERMISSION_RETRY_MAX_DELAY_MS?: number;
}

function intFromEnv(value: string | undefined, fallback: number): number {
  return value ? parseInt(value, 10) : fallback;
}

export default registerAs<PermissionConfig>('permission', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    sweepIntervalMs: intFromEnv(process.env.PERMISSION_SWEEP_INTERVAL_MS, 300000),
    schedulerCheckInitialDelayMs: intFromEnv(
      process.env.PERMISSION_SCHEDULER_CHECK_INITIAL_DELAY_MS,
      5000,
    ),
    // 6 hours
    schedulerCheckIntervalMs: intFromEnv(
      process.env.PERMISSION_SCHEDULER_CHECK_INTERVAL_MS,
      21600000,
    ),
    retryMaxAttempts: intFromEnv(process.env.PERMISSION_RETRY_MAX_ATTEMPTS, 3),
    retryInitialDelayMs: intFromEnv(
      process.env.PERMISSION_RETRY_INITIAL_DELAY_MS,
      1000,
    ),
    retryMultiplier: process.env.PERMISSION_RETRY_MULTIPLIER
      ? parseFloat(process.env.PERMISSION_RETRY_MULTIPLIER)
      : 2,
    retryMaxDelayMs: intFromEnv(process.env.PERMISSION_RETRY_MAX_DELAY_MS, 5000),
  };
});
