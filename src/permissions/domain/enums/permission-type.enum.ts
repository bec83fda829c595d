export enum PermissionType {
  READ = 'READ', // SELECT
  WRITE = 'WRITE', // SELECT, INSERT, UPDATE
  DELETE = 'DELETE', // SELECT, DELETE
  EXECUTE = 'EXECUTE', // EXECUTE
  ADMIN = 'ADMIN', // ALL PRIVILEGES
}
