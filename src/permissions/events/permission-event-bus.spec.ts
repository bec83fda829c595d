import { Logger } from '@nestjs/common';
import { Permission } from '../domain/entities/permission.entity';
import { PermissionEventType } from '../domain/enums/permission-event-type.enum';
import { PermissionStatus } from '../domain/enums/permission-status.enum';
import { PermissionType } from '../domain/enums/permission-type.enum';
import { PermissionDomainEvent } from '../domain/events/permission-domain-event';
import { PermissionEventBus } from './permission-event-bus';

function permissionWithId(id: number): Permission {
  const now = new Date('2026-10-19T12:00:00Z');
  return {
    id,
    principalName: 'alice',
    principalHost: '%',
    resourceName: 'sales',
    type: PermissionType.READ,
    startTime: now,
    endTime: new Date('2026-10-19T14:00:00Z'),
    status: PermissionStatus.ACTIVE,
    createdBy: 'admin',
    createdAt: now,
    updatedAt: now,
  };
}

function eventFor(
  id: number,
  type: PermissionEventType.CREATED | PermissionEventType.APPROVED | PermissionEventType.ACTIVATED,
): PermissionDomainEvent {
  return {
    type,
    permission: permissionWithId(id),
    actor: 'admin',
    occurredAt: new Date('2026-10-19T12:00:00Z'),
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('PermissionEventBus', () => {
  let bus: PermissionEventBus;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
    bus = new PermissionEventBus();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should handle events for one permission in publish order', async () => {
    const handled: string[] = [];
    const gate = deferred();

    bus.subscribe(async (event) => {
      if (event.type === PermissionEventType.CREATED) {
        await gate.promise;
      }
      handled.push(event.type);
    });

    bus.publish(eventFor(1, PermissionEventType.CREATED));
    bus.publish(eventFor(1, PermissionEventType.APPROVED));
    bus.publish(eventFor(1, PermissionEventType.ACTIVATED));

    expect(handled).toEqual([]);
    gate.resolve();
    await bus.drain();

    expect(handled).toEqual(['CREATED', 'APPROVED', 'ACTIVATED']);
  });

  it('should not hold back other permissions behind a slow one', async () => {
    const handled: number[] = [];
    const gate = deferred();

    bus.subscribe(async (event) => {
      if (event.permission.id === 1) {
        await gate.promise;
      }
      handled.push(event.permission.id);
    });

    bus.publish(eventFor(1, PermissionEventType.CREATED));
    bus.publish(eventFor(2, PermissionEventType.CREATED));

    // Let permission 2's channel run while permission 1 is still blocked
    await new Promise((resolve) => setImmediate(resolve));
    expect(handled).toEqual([2]);
    expect(bus.pendingKeys).toBe(1);

    gate.resolve();
    await bus.drain();

    expect(handled).toEqual([2, 1]);
    expect(bus.pendingKeys).toBe(0);
  });

  it('should keep delivering after a handler fails', async () => {
    const second = jest.fn().mockResolvedValue(undefined);
    bus.subscribe(async () => {
      throw new Error('store unreachable');
    });
    bus.subscribe(second);

    bus.publish(eventFor(3, PermissionEventType.CREATED));
    bus.publish(eventFor(3, PermissionEventType.APPROVED));
    await bus.drain();

    expect(second).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith(
      'Handler failed for CREATED on permission 3: store unreachable',
      expect.any(String),
    );
  });

  it('should drain events published by handlers', async () => {
    const handled: string[] = [];
    bus.subscribe(async (event) => {
      handled.push(`${event.permission.id}:${event.type}`);
      if (event.permission.id === 4) {
        bus.publish(eventFor(5, PermissionEventType.CREATED));
      }
    });

    bus.publish(eventFor(4, PermissionEventType.CREATED));
    await bus.drain();

    expect(handled).toEqual(['4:CREATED', '5:CREATED']);
  });

  it('should stop delivering to an unsubscribed handler', async () => {
    const handler = jest.fn().mockResolvedValue(undefined);
    const unsubscribe = bus.subscribe(handler);

    bus.publish(eventFor(6, PermissionEventType.CREATED));
    await bus.drain();
    unsubscribe();
    bus.publish(eventFor(6, PermissionEventType.APPROVED));
    await bus.drain();

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should drain on shutdown', async () => {
    const handler = jest.fn().mockResolvedValue(undefined);
    bus.subscribe(handler);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

    bus.publish(eventFor(7, PermissionEventType.CREATED));
    await bus.onApplicationShutdown();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(bus.pendingKeys).toBe(0);
  });
});
