import {
  ManagedStoreConnection,
  ManagedStoreRow,
} from '../../src/managed-store/ports/managed-store-connection.port';
import { formatTimestamp } from '../../src/managed-store/utils/statement-builder';

interface ScheduledEvent {
  name: string;
  scheduleAt: string;
  body: string;
}

interface FailureRule {
  pattern: RegExp;
  error: Error;
  remaining: number;
}

const PRINCIPAL = "'([^']*)'@'([^']*)'";

const GRANT = new RegExp(`^GRANT (.+) ON (\\S+) TO ${PRINCIPAL}$`);
const REVOKE = new RegExp(`^REVOKE (.+) ON (\\S+) FROM ${PRINCIPAL}$`);
const CREATE_EVENT =
  /^CREATE EVENT `([^`]+)` ON SCHEDULE AT '([^']+)' DO BEGIN (.+); END$/;
const DROP_EVENT = /^DROP EVENT IF EXISTS `([^`]+)`$/;
const CREATE_USER = new RegExp(`^CREATE USER IF NOT EXISTS ${PRINCIPAL} IDENTIFIED BY \\?$`);
const ALTER_USER = new RegExp(`^ALTER USER ${PRINCIPAL} IDENTIFIED BY \\?$`);
const DROP_USER = new RegExp(`^DROP USER IF EXISTS ${PRINCIPAL}$`);
const SHOW_GRANTS = new RegExp(`^SHOW GRANTS FOR ${PRINCIPAL}$`);

export function driverError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

/**
 * Managed-store stand-in that understands exactly the statements the
 * statement builder produces and keeps accounts, privileges and scheduled
 * events in memory.
 */
export class InMemoryManagedStore extends ManagedStoreConnection {
  readonly statements: string[] = [];
  readonly scheduledEvents = new Map<string, ScheduledEvent>();
  eventSchedulerEnabled = true;
  canEnableEventScheduler = true;

  private readonly principals = new Map<string, string>();
  private readonly privileges = new Map<string, Set<string>>();
  private readonly failures: FailureRule[] = [];

  addPrincipal(name: string, host: string, credential = 'test-secret1'): void {
    this.principals.set(this.key(name, host), credential);
  }

  hasPrincipal(name: string, host: string): boolean {
    return this.principals.has(this.key(name, host));
  }

  /**
   * `PRIVILEGE ON scope` entries currently held, sorted
   */
  privilegesOf(name: string, host: string): string[] {
    return [...(this.privileges.get(this.key(name, host)) ?? [])].sort();
  }

  /**
   * Make the next `times` statements matching `pattern` throw `error`
   */
  failWhen(pattern: RegExp, error: Error, times = 1): void {
    this.failures.push({ pattern, error, remaining: times });
  }

  statementsMatching(pattern: RegExp): string[] {
    return this.statements.filter((sql) => pattern.test(sql));
  }

  /**
   * Run every scheduled event due at `now`, as the store's event scheduler
   * would. Events are one-shot and removed once run.
   */
  async fireDueEvents(now: Date): Promise<string[]> {
    if (!this.eventSchedulerEnabled) {
      return [];
    }

    const due = [...this.scheduledEvents.values()].filter(
      (event) => event.scheduleAt <= formatTimestamp(now),
    );
    for (const event of due) {
      this.scheduledEvents.delete(event.name);
      await this.execute(event.body);
    }
    return due.map((event) => event.name);
  }

  async execute(sql: string): Promise<void> {
    this.record(sql);

    let match: RegExpExecArray | null;

    if ((match = GRANT.exec(sql))) {
      const [, privileges, scope, name, host] = match;
      const key = this.key(name, host);
      if (!this.principals.has(key)) {
        throw driverError(
          "Can't find any matching row in the user table",
          'ER_PASSWORD_NO_MATCH',
        );
      }
      const held = this.privileges.get(key) ?? new Set<string>();
      for (const privilege of privileges.split(', ')) {
        held.add(`${privilege} ON ${scope}`);
      }
      this.privileges.set(key, held);
      return;
    }

    if ((match = REVOKE.exec(sql))) {
      const [, privileges, scope, name, host] = match;
      const held = this.privileges.get(this.key(name, host));
      for (const privilege of privileges.split(', ')) {
        held?.delete(`${privilege} ON ${scope}`);
      }
      return;
    }

    if ((match = CREATE_EVENT.exec(sql))) {
      const [, name, scheduleAt, body] = match;
      if (this.scheduledEvents.has(name)) {
        throw driverError(`Event '${name}' already exists`, 'ER_EVENT_ALREADY_EXISTS');
      }
      this.scheduledEvents.set(name, { name, scheduleAt, body });
      return;
    }

    if ((match = DROP_EVENT.exec(sql))) {
      this.scheduledEvents.delete(match[1]);
      return;
    }

    if ((match = DROP_USER.exec(sql))) {
      const key = this.key(match[1], match[2]);
      this.principals.delete(key);
      this.privileges.delete(key);
      return;
    }

    if (sql === 'SET GLOBAL event_scheduler = ON') {
      if (!this.canEnableEventScheduler) {
        throw driverError(
          'Access denied; you need (at least one of) the SUPER privilege(s) for this operation',
          'ER_SPECIFIC_ACCESS_DENIED_ERROR',
        );
      }
      this.eventSchedulerEnabled = true;
      return;
    }

    throw new Error(`Unsupported statement: ${sql}`);
  }

  async query(
    sql: string,
    params: readonly unknown[] = [],
  ): Promise<ManagedStoreRow[]> {
    this.record(sql);

    if (sql.startsWith('SELECT COUNT(*) AS count FROM mysql.user')) {
      const [name, host] = params;
      return [{ count: this.principals.has(this.key(String(name), String(host))) ? 1 : 0 }];
    }

    if (sql === "SHOW VARIABLES LIKE 'event_scheduler'") {
      return [
        {
          Variable_name: 'event_scheduler',
          Value: this.eventSchedulerEnabled ? 'ON' : 'OFF',
        },
      ];
    }

    const grants = SHOW_GRANTS.exec(sql);
    if (grants) {
      const [, name, host] = grants;
      const column = `Grants for ${name}@${host}`;
      return [
        { [column]: `GRANT USAGE ON *.* TO \`${name}\`@\`${host}\`` },
        ...this.privilegesOf(name, host).map((entry) => ({
          [column]: `GRANT ${entry} TO \`${name}\`@\`${host}\``,
        })),
      ];
    }

    return [];
  }

  async update(sql: string, params: readonly unknown[]): Promise<number> {
    this.record(sql);

    let match: RegExpExecArray | null;

    if ((match = CREATE_USER.exec(sql))) {
      const key = this.key(match[1], match[2]);
      if (this.principals.has(key)) {
        return 0;
      }
      this.principals.set(key, String(params[0]));
      return 1;
    }

    if ((match = ALTER_USER.exec(sql))) {
      const key = this.key(match[1], match[2]);
      if (!this.principals.has(key)) {
        throw driverError(
          `Operation ALTER USER failed for '${match[1]}'@'${match[2]}'`,
          'ER_CANNOT_USER',
        );
      }
      this.principals.set(key, String(params[0]));
      return 0;
    }

    throw new Error(`Unsupported statement: ${sql}`);
  }

  private record(sql: string): void {
    this.statements.push(sql);

    const rule = this.failures.find(
      (candidate) => candidate.remaining > 0 && candidate.pattern.test(sql),
    );
    if (rule) {
      rule.remaining--;
      throw rule.error;
    }
  }

  private key(name: string, host: string): string {
    return `${name}@${host}`;
  }
}
