import type {
  DriverContract,
  DriverEvent,
  DriverEventListener,
  DriverTransactionContract,
  HydrateCallback,
  InsertResult,
  RawRecord,
  UpdateOperations,
  UpdateResult,
  WhereClause,
} from "../../src/contracts";
import { BaseQueryBuilder, type QueryState } from "../../src/query/base-query-builder";

function matchesClause(record: RawRecord, { field, operator, value }: WhereClause): boolean {
  const actual = record[field];

  switch (operator) {
    case "=":
      return actual === value;
    case "!=":
      return actual !== value;
    case "in":
      return Array.isArray(value) && value.includes(actual);
    case "notIn":
      return Array.isArray(value) && !value.includes(actual);
    default: {
      if (typeof actual !== "number" || typeof value !== "number") return false;

      if (operator === ">") return actual > value;
      if (operator === ">=") return actual >= value;
      if (operator === "<") return actual < value;

      return actual <= value;
    }
  }
}

function matchesFilter(record: RawRecord, filter: RawRecord): boolean {
  return Object.entries(filter).every(([field, value]) => record[field] === value);
}

/**
 * Query builder over the in-memory tables.
 */
export class MemoryQueryBuilder<T = RawRecord> extends BaseQueryBuilder<T> {
  public constructor(
    table: string,
    private readonly driver: MemoryDriver,
    hydrateCallback: HydrateCallback<T>,
    state?: QueryState,
  ) {
    super(table, hydrateCallback, state);
  }

  public hydrate<TOutput>(callback: HydrateCallback<TOutput>): MemoryQueryBuilder<TOutput> {
    return new MemoryQueryBuilder(this.table, this.driver, callback, this.state);
  }

  protected async fetch(limit = this.state.limit): Promise<RawRecord[]> {
    this.driver.queries.push(this.table);

    let records = this.matching();

    for (const { field, direction } of [...this.state.orders].reverse()) {
      records = [...records].sort((left, right) => {
        const a = String(left[field]);
        const b = String(right[field]);
        const order = a < b ? -1 : a > b ? 1 : 0;

        return direction === "asc" ? order : -order;
      });
    }

    if (limit !== undefined) {
      records = records.slice(0, limit);
    }

    const fields = this.state.fields;

    return records.map((record) => {
      if (!fields || fields.length === 0) return { ...record };

      return Object.fromEntries(fields.map((field) => [field, record[field]]));
    });
  }

  public async count(): Promise<number> {
    this.driver.queries.push(this.table);

    return this.matching().length;
  }

  public async pluck(field: string): Promise<unknown[]> {
    this.driver.queries.push(this.table);

    return this.matching()
      .map((record) => record[field])
      .filter((value) => value !== undefined);
  }

  private matching(): RawRecord[] {
    return this.driver
      .rows(this.table)
      .filter((record) => this.state.wheres.every((clause) => matchesClause(record, clause)));
  }
}

/**
 * Driver keeping tables in memory, in insertion order.
 *
 * Numeric ids are assigned per table starting at 1. Transactions snapshot
 * every table and restore the snapshot on rollback.
 */
export class MemoryDriver implements DriverContract {
  public readonly name = "memory";
  public isConnected = false;

  /**
   * Table name of every executed read query, in order.
   */
  public readonly queries: string[] = [];

  public transactions = { begun: 0, committed: 0, rolledBack: 0 };

  private tables = new Map<string, RawRecord[]>();
  private readonly counters = new Map<string, number>();
  private readonly listeners = new Map<DriverEvent, DriverEventListener[]>();

  public async connect(): Promise<void> {
    this.isConnected = true;
    this.emit("connected");
  }

  public async disconnect(): Promise<void> {
    this.isConnected = false;
    this.emit("disconnected");
  }

  public on(event: DriverEvent, listener: DriverEventListener): void {
    this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener]);
  }

  public off(event: DriverEvent, listener: DriverEventListener): void {
    this.listeners.set(
      event,
      (this.listeners.get(event) ?? []).filter((registered) => registered !== listener),
    );
  }

  public rows(table: string): RawRecord[] {
    let rows = this.tables.get(table);

    if (!rows) {
      rows = [];
      this.tables.set(table, rows);
    }

    return rows;
  }

  /**
   * Insert rows directly, bypassing models.
   */
  public seed(table: string, records: RawRecord[]): void {
    for (const record of records) {
      const row = { ...record };

      if (row.id === undefined) {
        row.id = this.nextId(table);
      } else if (typeof row.id === "number") {
        this.counters.set(table, Math.max(this.counters.get(table) ?? 0, row.id));
      }

      this.rows(table).push(row);
    }
  }

  public async insert(table: string, document: RawRecord): Promise<InsertResult> {
    const row = { ...document };

    if (row.id === undefined) {
      row.id = this.nextId(table);
    }

    this.rows(table).push(row);

    return { document: { ...row } };
  }

  public async update(
    table: string,
    filter: RawRecord,
    update: UpdateOperations,
  ): Promise<UpdateResult> {
    const row = this.rows(table).find((record) => matchesFilter(record, filter));

    if (!row) return { modifiedCount: 0 };

    Object.assign(row, update.$set ?? {});

    for (const column of Object.keys(update.$unset ?? {})) {
      delete row[column];
    }

    return { modifiedCount: 1 };
  }

  public async delete(table: string, filter: RawRecord = {}): Promise<number> {
    const rows = this.rows(table);
    const index = rows.findIndex((record) => matchesFilter(record, filter));

    if (index === -1) return 0;

    rows.splice(index, 1);

    return 1;
  }

  public async deleteMany(table: string, filter: RawRecord = {}): Promise<number> {
    const rows = this.rows(table);
    const kept = rows.filter((record) => !matchesFilter(record, filter));

    this.tables.set(table, kept);

    return rows.length - kept.length;
  }

  public queryBuilder(table: string): MemoryQueryBuilder {
    return new MemoryQueryBuilder(table, this, (data) => data);
  }

  public async beginTransaction(): Promise<DriverTransactionContract<undefined>> {
    const snapshot = new Map(
      [...this.tables].map(([table, rows]) => [table, rows.map((row) => ({ ...row }))]),
    );

    this.transactions.begun++;

    return {
      context: undefined,
      commit: async () => {
        this.transactions.committed++;
      },
      rollback: async () => {
        this.tables = snapshot;
        this.transactions.rolledBack++;
      },
    };
  }

  private nextId(table: string): number {
    const id = (this.counters.get(table) ?? 0) + 1;

    this.counters.set(table, id);

    return id;
  }

  private emit(event: DriverEvent): void {
    for (const listener of this.listeners.get(event) ?? []) {
      listener();
    }
  }
}
