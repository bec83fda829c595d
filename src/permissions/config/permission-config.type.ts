export type PermissionConfig = {
  sweepIntervalMs: number;
  schedulerCheckInitialDelayMs: number;
  schedulerCheckIntervalMs: number;
  retryMaxAttempts: number;
  retryInitialDelayMs: number;
  retryMultiplier: number;
  retryMaxDelayMs: number;
};
