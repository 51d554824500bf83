import type {
  HydrateCallback,
  OrderDirection,
  QueryBuilderContract,
  RawRecord,
  WhereClause,
  WhereObject,
  WhereOperator,
} from "../contracts";

/**
 * Conditions and modifiers collected by a query builder.
 */
export type QueryState = {
  wheres: WhereClause[];
  fields?: string[];
  orders: { field: string; direction: OrderDirection }[];
  limit?: number;
};

const WHERE_OPERATORS: readonly WhereOperator[] = ["=", "!=", ">", ">=", "<", "<=", "in", "notIn"];

function isWhereOperator(value: unknown): value is WhereOperator {
  return WHERE_OPERATORS.some((operator) => operator === value);
}

/**
 * Driver-independent part of a query builder: clause collection and
 * hydration. Drivers only translate the collected state into their own
 * query language.
 *
 * @template T - The type of records returned by the query
 */
export abstract class BaseQueryBuilder<T = RawRecord> implements QueryBuilderContract<T> {
  protected readonly state: QueryState;

  protected constructor(
    public readonly table: string,
    protected readonly hydrateCallback: HydrateCallback<T>,
    state?: QueryState,
  ) {
    this.state = state
      ? {
          wheres: [...state.wheres],
          fields: state.fields ? [...state.fields] : undefined,
          orders: [...state.orders],
          limit: state.limit,
        }
      : { wheres: [], orders: [] };
  }

  public abstract hydrate<TOutput>(callback: HydrateCallback<TOutput>): BaseQueryBuilder<TOutput>;

  /**
   * Fetch raw records matching the current state.
   */
  protected abstract fetch(limit?: number): Promise<RawRecord[]>;

  public abstract count(): Promise<number>;

  public abstract pluck(field: string): Promise<unknown[]>;

  /**
   * Recorded where clauses, in the order they were added.
   */
  public get wheres(): readonly WhereClause[] {
    return this.state.wheres;
  }

  public where(field: string, value: unknown): this;
  public where(field: string, operator: WhereOperator, value: unknown): this;
  public where(conditions: WhereObject): this;
  public where(
    fieldOrConditions: string | WhereObject,
    operatorOrValue?: unknown,
    value?: unknown,
  ): this {
    if (typeof fieldOrConditions !== "string") {
      for (const [field, fieldValue] of Object.entries(fieldOrConditions)) {
        this.state.wheres.push({ field, operator: "=", value: fieldValue });
      }

      return this;
    }

    // three arguments: (field, operator, value)
    if (arguments.length >= 3 && isWhereOperator(operatorOrValue)) {
      this.state.wheres.push({ field: fieldOrConditions, operator: operatorOrValue, value });
      return this;
    }

    this.state.wheres.push({ field: fieldOrConditions, operator: "=", value: operatorOrValue });

    return this;
  }

  public whereIn(field: string, values: unknown[]): this {
    this.state.wheres.push({ field, operator: "in", value: [...values] });
    return this;
  }

  public select(fields: string[]): this {
    this.state.fields = [...fields];
    return this;
  }

  public orderBy(field: string, direction: OrderDirection = "asc"): this {
    this.state.orders.push({ field, direction });
    return this;
  }

  public limit(value: number): this {
    this.state.limit = value;
    return this;
  }

  public async get(): Promise<T[]> {
    const records = await this.fetch();

    return records.map((record, index) => this.hydrateCallback(record, index));
  }

  public async first(): Promise<T | null> {
    const [record] = await this.fetch(1);

    return record === undefined ? null : this.hydrateCallback(record, 0);
  }

  public async exists(): Promise<boolean> {
    const records = await this.fetch(1);

    return records.length > 0;
  }
}
