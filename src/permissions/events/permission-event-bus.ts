import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { PermissionDomainEvent } from '../domain/events/permission-domain-event';
import { PermissionEventPublisher } from '../domain/ports/permission-event.publisher.port';

export type PermissionEventHandler = (
  event: PermissionDomainEvent,
) => Promise<void>;

/**
 * In-process event channel keyed by permission id.
 *
 * Events for one permission are handled strictly in publish order; events for
 * different permissions run concurrently. Publishing never waits for
 * handlers, and a failing handler is logged without affecting the others.
 */
@Injectable()
export class PermissionEventBus
  extends PermissionEventPublisher
  implements OnApplicationShutdown
{
  private readonly logger = new Logger(PermissionEventBus.name);
  private readonly handlers: PermissionEventHandler[] = [];
  private readonly tails = new Map<number, Promise<void>>();

  /**
   * @returns a function that removes the handler
   */
  subscribe(handler: PermissionEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      const index = this.handlers.indexOf(handler);
      if (index !== -1) {
        this.handlers.splice(index, 1);
      }
    };
  }

  publish(event: PermissionDomainEvent): void {
    const key = event.permission.id;
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(() => this.dispatch(event));

    this.tails.set(key, next);
    void next.then(() => {
      if (this.tails.get(key) === next) {
        this.tails.delete(key);
      }
    });
  }

  /**
   * Resolves once every published event, including ones published by
   * handlers while draining, has been handled.
   */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all([...this.tails.values()]);
    }
  }

  get pendingKeys(): number {
    return this.tails.size;
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.tails.size > 0) {
      this.logger.log(
        `Draining ${this.tails.size} permission event channel(s) before shutdown`,
      );
    }
    await this.drain();
  }

  private async dispatch(event: PermissionDomainEvent): Promise<void> {
    for (const handler of [...this.handlers]) {
      try {
        await handler(event);
      } catch (error) {
        this.logger.error(
          `Handler failed for ${event.type} on permission ${event.permission.id}: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
      }
    }
  }
}
