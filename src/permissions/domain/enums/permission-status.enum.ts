export enum PermissionStatus {
  PENDING = 'PENDING', // Requested, awaiting approval
  APPROVED = 'APPROVED', // Approved, waiting for start time
  ACTIVE = 'ACTIVE', // Privileges granted on the managed store
  EXPIRED = 'EXPIRED', // End time reached (terminal)
  REVOKED = 'REVOKED', // Withdrawn before expiry (terminal)
}
