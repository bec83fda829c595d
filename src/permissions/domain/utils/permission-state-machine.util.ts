import { PermissionStatus } from '../enums/permission-status.enum';
import { InvalidStateError } from '../errors/permission-lifecycle.errors';

/**
 * Permission State Machine Utility
 *
 * Valid Transitions:
 * - PENDING → APPROVED (approver)
 * - APPROVED → ACTIVE (automatic, start time reached)
 * - ACTIVE → EXPIRED (automatic, end time reached)
 * - PENDING | APPROVED | ACTIVE → REVOKED (any actor)
 *
 * EXPIRED and REVOKED are terminal.
 */
export class PermissionStateMachine {
  private static readonly VALID_TRANSITIONS: Map<
    PermissionStatus,
    PermissionStatus[]
  > = new Map([
    [
      PermissionStatus.PENDING,
      [PermissionStatus.APPROVED, PermissionStatus.REVOKED],
    ],
    [
      PermissionStatus.APPROVED,
      [PermissionStatus.ACTIVE, PermissionStatus.REVOKED],
    ],
    [
      PermissionStatus.ACTIVE,
      [PermissionStatus.EXPIRED, PermissionStatus.REVOKED],
    ],
    // EXPIRED and REVOKED are terminal (no transitions allowed)
  ]);

  static isValidTransition(
    fromStatus: PermissionStatus,
    toStatus: PermissionStatus,
  ): boolean {
    const validTargets = this.VALID_TRANSITIONS.get(fromStatus);
    if (!validTargets) {
      return false;
    }

    return validTargets.includes(toStatus);
  }

  /**
   * @throws InvalidStateError if transition is invalid
   */
  static validateTransition(
    fromStatus: PermissionStatus,
    toStatus: PermissionStatus,
  ): void {
    if (!this.isValidTransition(fromStatus, toStatus)) {
      throw new InvalidStateError(
        `Invalid state transition: ${fromStatus} → ${toStatus}. ` +
          `Valid transitions from ${fromStatus}: ${this.getValidTargetStates(fromStatus).join(', ') || 'none'}`,
      );
    }
  }

  static getValidTargetStates(fromStatus: PermissionStatus): PermissionStatus[] {
    return this.VALID_TRANSITIONS.get(fromStatus) || [];
  }

  static isTerminal(status: PermissionStatus): boolean {
    return (
      status === PermissionStatus.EXPIRED || status === PermissionStatus.REVOKED
    );
  }

  /**
   * End time may only move while the permission is still live
   */
  static canExtend(status: PermissionStatus): boolean {
    return !this.isTerminal(status);
  }

  /**
   * Whether privileges are currently granted on the managed store
   */
  static holdsPrivileges(status: PermissionStatus): boolean {
    return status === PermissionStatus.ACTIVE;
  }
}
