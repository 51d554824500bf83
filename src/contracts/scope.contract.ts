import type { WhereObject } from "./query-builder.contract";

/**
 * Identity key accepted by scope lookups.
 */
export type PrimaryKeyValue = string | number;

/**
 * A deferred query representing "all records related to an owner through one
 * relationship". Nothing is executed until one of the async methods runs.
 *
 * @template TModel - The related model type
 */
export interface ScopeContract<TModel> {
  /**
   * Whether this is an empty scope that never reaches storage.
   */
  readonly isNone: boolean;

  /**
   * Fetch every related record.
   */
  toList(): Promise<TModel[]>;

  /**
   * Fetch a single column of every related record.
   */
  pluck(field: string): Promise<unknown[]>;

  /**
   * Check whether any related record exists, optionally narrowed to a primary
   * key value or an extra filter.
   */
  existsBy(idOrFilter?: PrimaryKeyValue | WhereObject): Promise<boolean>;

  /**
   * Count related records.
   */
  count(): Promise<number>;

  /**
   * Fetch related records projecting only the given fields.
   */
  select(...fields: string[]): Promise<TModel[]>;

  /**
   * Delete every related record in bulk without loading them.
   */
  deleteAll(): Promise<number>;

  /**
   * Return an empty scope with the same creation defaults.
   */
  none(): ScopeContract<TModel>;

  /**
   * Attribute defaults implied by the relationship, used when building new
   * members (e.g. `{ authorId: 1 }`).
   */
  scopeForCreate(): Record<string, unknown>;
}
