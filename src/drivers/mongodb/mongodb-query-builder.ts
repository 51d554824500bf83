import type { Document } from "mongodb";
import type { HydrateCallback, RawRecord, WhereClause } from "../../contracts";
import { BaseQueryBuilder, type QueryState } from "../../query/base-query-builder";
import type { MongoDbDriver } from "./mongodb-driver";

const OPERATORS_MAP = {
  "!=": "$ne",
  ">": "$gt",
  ">=": "$gte",
  "<": "$lt",
  "<=": "$lte",
  in: "$in",
  notIn: "$nin",
} as const;

/**
 * Translate where clauses into a MongoDB filter document.
 *
 * @example
 * ```typescript
 * buildMongoFilter([
 *   { field: "authorId", operator: "=", value: 1 },
 *   { field: "id", operator: "in", value: [3, 4] },
 * ]);
 * // { $and: [{ authorId: 1 }, { id: { $in: [3, 4] } }] }
 * ```
 */
export function buildMongoFilter(wheres: readonly WhereClause[]): Document {
  const conditions: Document[] = wheres.map(({ field, operator, value }) =>
    operator === "=" ? { [field]: value } : { [field]: { [OPERATORS_MAP[operator]]: value } },
  );

  if (conditions.length === 0) return {};

  if (conditions.length === 1) return conditions[0];

  return { $and: conditions };
}

/**
 * MongoDB query builder compiling the collected state into an aggregation
 * pipeline.
 */
export class MongoQueryBuilder<T = RawRecord> extends BaseQueryBuilder<T> {
  public constructor(
    table: string,
    private readonly driver: MongoDbDriver,
    hydrateCallback: HydrateCallback<T>,
    state?: QueryState,
  ) {
    super(table, hydrateCallback, state);
  }

  public hydrate<TOutput>(callback: HydrateCallback<TOutput>): MongoQueryBuilder<TOutput> {
    return new MongoQueryBuilder(this.table, this.driver, callback, this.state);
  }

  /**
   * Build the aggregation pipeline for the current state.
   *
   * @example
   * ```typescript
   * query.where("authorId", 1).orderBy("id").select(["id"]).buildPipeline();
   * // [
   * //   { $match: { authorId: 1 } },
   * //   { $sort: { id: 1 } },
   * //   { $project: { _id: 0, id: 1 } },
   * // ]
   * ```
   */
  public buildPipeline(limit = this.state.limit): Document[] {
    const pipeline: Document[] = [];

    if (this.state.wheres.length > 0) {
      pipeline.push({ $match: buildMongoFilter(this.state.wheres) });
    }

    if (this.state.orders.length > 0) {
      const sort: Document = {};

      for (const { field, direction } of this.state.orders) {
        sort[field] = direction === "asc" ? 1 : -1;
      }

      pipeline.push({ $sort: sort });
    }

    if (limit !== undefined) {
      pipeline.push({ $limit: limit });
    }

    if (this.state.fields && this.state.fields.length > 0) {
      const projection: Document = { _id: 0 };

      for (const field of this.state.fields) {
        projection[field] = 1;
      }

      pipeline.push({ $project: projection });
    }

    return pipeline;
  }

  protected async fetch(limit?: number): Promise<RawRecord[]> {
    return await this.driver.aggregate(this.table, this.buildPipeline(limit ?? this.state.limit));
  }

  public async count(): Promise<number> {
    const [result] = await this.driver.aggregate(this.table, [
      ...this.buildPipeline(),
      { $count: "total" },
    ]);

    const total = result?.total;

    return typeof total === "number" ? total : 0;
  }

  public async pluck(field: string): Promise<unknown[]> {
    const records = await this.driver.aggregate(this.table, [
      ...this.buildPipeline(),
      { $project: { _id: 0, value: `$${field}` } },
    ]);

    return records.map((record) => record.value).filter((value) => value !== undefined);
  }
}
