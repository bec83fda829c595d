export enum PermissionEventType {
  CREATED = 'CREATED',
  APPROVED = 'APPROVED',
  ACTIVATED = 'ACTIVATED',
  EXPIRED = 'EXPIRED',
  REVOKED = 'REVOKED',
  EXTENDED = 'EXTENDED',
  MODIFIED = 'MODIFIED', // Auto-revoke schedule moved after an extension
}
