/**
 * Ordering direction supported by query builders.
 */
export type OrderDirection = "asc" | "desc";

/**
 * Supported comparison operators.
 */
export type WhereOperator = "=" | "!=" | ">" | ">=" | "<" | "<=" | "in" | "notIn";

/**
 * Object-based predicate definition.
 */
export type WhereObject = Record<string, unknown>;

/**
 * A single recorded where clause.
 */
export type WhereClause = {
  field: string;
  operator: WhereOperator;
  value: unknown;
};

/**
 * Raw record as returned by storage.
 */
export type RawRecord = Record<string, unknown>;

/**
 * Callback used to turn a raw record into its hydrated form (usually a model).
 */
export type HydrateCallback<TOutput> = (data: RawRecord, index: number) => TOutput;

/**
 * Contract that all query builders must implement.
 *
 * Only the subset the association engine relies on is described here;
 * drivers are free to offer more.
 *
 * @template T - The type of records returned by the query
 */
export interface QueryBuilderContract<T = RawRecord> {
  /**
   * Table name
   */
  readonly table: string;

  /**
   * Derive a builder, with the same conditions, whose results go through the
   * given callback.
   *
   * @example
   * ```typescript
   * driver.queryBuilder("users").hydrate((data) => new User(data));
   * ```
   */
  hydrate<TOutput>(callback: HydrateCallback<TOutput>): QueryBuilderContract<TOutput>;

  /**
   * Add a where clause.
   *
   * @example
   * ```typescript
   * query.where("authorId", 1);
   * query.where("age", ">", 18);
   * query.where({ authorId: 1, published: true });
   * ```
   */
  where(field: string, value: unknown): this;
  where(field: string, operator: WhereOperator, value: unknown): this;
  where(conditions: WhereObject): this;

  /**
   * Match the field against any of the given values.
   */
  whereIn(field: string, values: unknown[]): this;

  /**
   * Restrict the projected fields.
   */
  select(fields: string[]): this;

  /**
   * Order the results by the given field.
   */
  orderBy(field: string, direction?: OrderDirection): this;

  /**
   * Limit the number of returned records.
   */
  limit(value: number): this;

  /**
   * Execute the query and return all matching records.
   */
  get(): Promise<T[]>;

  /**
   * Execute the query and return the first matching record.
   */
  first(): Promise<T | null>;

  /**
   * Count matching records.
   */
  count(): Promise<number>;

  /**
   * Return the raw values of one field for every matching record.
   */
  pluck(field: string): Promise<unknown[]>;

  /**
   * Whether at least one record matches.
   */
  exists(): Promise<boolean>;
}
