import { PermissionDomainEvent } from '../events/permission-domain-event';

/**
 * Hands lifecycle events to asynchronous consumers. Must not block the
 * caller on consumer work.
 */
export abstract class PermissionEventPublisher {
  abstract publish(event: PermissionDomainEvent): void;
}
