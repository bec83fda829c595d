export type ManagedStoreRow = Record<string, unknown>;

/**
 * Raw SQL access to the managed store.
 *
 * Implementations surface driver errors unchanged; callers classify them.
 */
export abstract class ManagedStoreConnection {
  /**
   * Run a statement that returns no rows (GRANT, CREATE EVENT, ...)
   */
  abstract execute(sql: string): Promise<void>;

  abstract query(
    sql: string,
    params?: readonly unknown[],
  ): Promise<ManagedStoreRow[]>;

  /**
   * Run a parameterized statement
   * @returns affected row count
   */
  abstract update(sql: string, params: readonly unknown[]): Promise<number>;
}
