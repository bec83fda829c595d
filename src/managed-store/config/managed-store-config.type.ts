export type ManagedStoreConfig = {
  host: string;
  port: number;
  username?: string;
  password?: string;
  maxConnections: number;
  generatedCredentialLength: number;
};
