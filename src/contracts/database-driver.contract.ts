import type { QueryBuilderContract, RawRecord } from "./query-builder.contract";

/** Supported driver lifecycle events. */
export type DriverEvent = "connected" | "disconnected" | string;

/** Listener signature for driver lifecycle events. */
export type DriverEventListener = (...args: unknown[]) => void;

/** Representation of an opened transaction. */
export interface DriverTransactionContract<TContext = unknown> {
  /** Driver-specific transaction context (session, connection, ...). */
  context: TContext;
  /** Commit the transaction. */
  commit(): Promise<void>;
  /** Rollback the transaction. */
  rollback(): Promise<void>;
}

/** Result returned after insert operations. */
export type InsertResult<TDocument = Record<string, unknown>> = {
  document: TDocument;
};

/** Result returned after update operations. */
export type UpdateResult = {
  modifiedCount: number;
};

/**
 * Database-agnostic update operations.
 *
 * @example
 * ```typescript
 * // Set fields
 * { $set: { age: 31, name: "Alice" } }
 *
 * // Remove fields
 * { $unset: { tempField: 1 } }
 * ```
 */
export type UpdateOperations = {
  /** Set field values */
  $set?: Record<string, unknown>;
  /** Remove/unset fields */
  $unset?: Record<string, 1 | true>;
};

/**
 * Driver contract consumed by the model layer.
 *
 * This is the persistence boundary of the association engine: everything an
 * association needs from storage goes through a driver, either directly
 * (insert, update, delete) or through one of its query builders.
 */
export interface DriverContract {
  /**
   * The name of the driver.
   *
   * @example "mongodb", "memory"
   */
  readonly name: string;

  /** Whether the underlying connection is currently established. */
  readonly isConnected: boolean;

  /** Establish the underlying database connection/pool. */
  connect(): Promise<void>;
  /** Close the underlying database connection/pool. */
  disconnect(): Promise<void>;

  /** Register event listeners (connected/disconnected/custom). */
  on(event: DriverEvent, listener: DriverEventListener): void;

  /** Remove a previously registered listener. */
  off(event: DriverEvent, listener: DriverEventListener): void;

  /** Insert a single document/row into the given table. */
  insert(
    table: string,
    document: Record<string, unknown>,
    options?: Record<string, unknown>,
  ): Promise<InsertResult>;

  /** Update documents/rows matching the filter. */
  update(
    table: string,
    filter: Record<string, unknown>,
    update: UpdateOperations,
    options?: Record<string, unknown>,
  ): Promise<UpdateResult>;

  /** Delete a single document that matches the provided filter. */
  delete(
    table: string,
    filter?: Record<string, unknown>,
    options?: Record<string, unknown>,
  ): Promise<number>;

  /** Delete documents/rows matching the filter. */
  deleteMany(
    table: string,
    filter?: Record<string, unknown>,
    options?: Record<string, unknown>,
  ): Promise<number>;

  /** Obtain a query builder for custom querying. */
  queryBuilder(table: string): QueryBuilderContract<RawRecord>;

  /** Start a new transaction scope. */
  beginTransaction(): Promise<DriverTransactionContract>;
}
