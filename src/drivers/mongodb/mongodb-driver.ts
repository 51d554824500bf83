import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import {
  ClientSession,
  MongoClient,
  type Db,
  type Document,
  type MongoClientOptions,
  type TransactionOptions,
} from "mongodb";
import { EventEmitter } from "node:events";
import type {
  DriverContract,
  DriverEvent,
  DriverEventListener,
  DriverTransactionContract,
  InsertResult,
  RawRecord,
  UpdateOperations,
  UpdateResult,
} from "../../contracts";
import { transactionContext } from "../../context/transaction-context";
import { MongoQueryBuilder } from "./mongodb-query-builder";
import type { MongoDbConnectionOptions, MongoDriverOptions } from "./types";

const DEFAULT_TRANSACTION_OPTIONS: TransactionOptions = {
  readPreference: "primary",
  readConcern: { level: "local" },
  writeConcern: { w: "majority" },
};

/**
 * MongoDB driver implementation of the driver contract.
 *
 * It encapsulates the native Mongo client, exposes lifecycle events, and
 * attaches the session of the running transaction to every operation.
 *
 * @example
 * ```typescript
 * const driver = new MongoDbDriver({ database: "blog" });
 * await driver.connect();
 *
 * dataSourceRegistry.register(new DataSource({ name: "primary", driver, isDefault: true }));
 * ```
 */
export class MongoDbDriver implements DriverContract {
  public readonly name = "mongodb";

  public client?: MongoClient;
  public database?: Db;

  private readonly events = new EventEmitter();
  private connected = false;
  private readonly transactionOptions: TransactionOptions;

  public constructor(
    private readonly config: MongoDbConnectionOptions,
    private readonly driverOptions: MongoDriverOptions = {},
  ) {
    this.transactionOptions = {
      ...DEFAULT_TRANSACTION_OPTIONS,
      ...driverOptions.transactionOptions,
    };
  }

  public get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Establish a MongoDB connection using the configured options.
   * Throws if the connection attempt fails.
   */
  public async connect(): Promise<void> {
    if (this.connected) return;

    const client = new MongoClient(this.resolveUri(), this.buildClientOptions());

    try {
      log.info(
        "database.mongodb",
        "connection",
        `Connecting to database ${colors.bold(colors.yellowBright(this.config.database))}`,
      );

      await client.connect();

      this.client = client;
      this.database = client.db(this.config.database);
      this.connected = true;

      log.success("database.mongodb", "connection", "Connected to database");

      client.on("close", () => {
        if (!this.connected) return;

        this.connected = false;
        this.emit("disconnected");
        log.warn("database.mongodb", "connection", "Disconnected from database");
      });

      this.emit("connected");
    } catch (error) {
      await client.close();
      this.emit("disconnected");

      log.error(
        "database.mongodb",
        "connection",
        `Failed to connect to database: ${error instanceof Error ? error.message : String(error)}`,
      );

      throw error;
    }
  }

  public async disconnect(): Promise<void> {
    if (!this.client) return;

    try {
      await this.client.close();
    } finally {
      this.connected = false;
      this.emit("disconnected");
    }
  }

  public on(event: DriverEvent, listener: DriverEventListener): void {
    this.events.on(event, listener);
  }

  public off(event: DriverEvent, listener: DriverEventListener): void {
    this.events.off(event, listener);
  }

  /**
   * Insert a single document, assigning the next numeric `id` first unless
   * disabled or already present.
   */
  public async insert(table: string, document: RawRecord): Promise<InsertResult> {
    const payload: RawRecord = { ...document };

    if (this.driverOptions.autoGenerateId !== false && payload.id === undefined) {
      payload.id = await this.nextId(table);
    }

    const result = await this.getDatabase()
      .collection(table)
      .insertOne(payload, { session: this.session() });

    return {
      document: {
        ...payload,
        _id: result.insertedId,
      },
    };
  }

  /**
   * Update the first document that matches the filter.
   */
  public async update(
    table: string,
    filter: RawRecord,
    update: UpdateOperations,
  ): Promise<UpdateResult> {
    const result = await this.getDatabase()
      .collection(table)
      .updateOne(filter, update, { session: this.session() });

    return { modifiedCount: result.modifiedCount };
  }

  /**
   * Delete the first document that matches the filter.
   */
  public async delete(table: string, filter: RawRecord = {}): Promise<number> {
    const result = await this.getDatabase()
      .collection(table)
      .deleteOne(filter, { session: this.session() });

    return result.deletedCount > 0 ? 1 : 0;
  }

  public async deleteMany(table: string, filter: RawRecord = {}): Promise<number> {
    const result = await this.getDatabase()
      .collection(table)
      .deleteMany(filter, { session: this.session() });

    return result.deletedCount;
  }

  /**
   * Run an aggregation pipeline, stripping `_id` from the results.
   */
  public async aggregate(table: string, pipeline: Document[]): Promise<RawRecord[]> {
    const documents = await this.getDatabase()
      .collection(table)
      .aggregate<RawRecord>(pipeline, { session: this.session() })
      .toArray();

    return documents.map(({ _id, ...document }) => document);
  }

  /**
   * Provide a Mongo-backed query builder for the given collection.
   */
  public queryBuilder(table: string): MongoQueryBuilder {
    return new MongoQueryBuilder(table, this, (data) => data);
  }

  /**
   * Begin a MongoDB transaction, returning commit/rollback helpers.
   */
  public async beginTransaction(): Promise<DriverTransactionContract<ClientSession>> {
    const session = this.getClient().startSession();

    session.startTransaction(this.transactionOptions);

    let finished = false;

    const finalize = async (operation: () => Promise<void>): Promise<void> => {
      if (finished) return;

      try {
        await operation();
      } finally {
        finished = true;
        await session.endSession();
      }
    };

    return {
      context: session,
      commit: async () => {
        await finalize(async () => {
          await session.commitTransaction();
        });
      },
      rollback: async () => {
        await finalize(async () => {
          await session.abortTransaction();
        });
      },
    };
  }

  public getClient(): MongoClient {
    if (!this.client) {
      throw new Error("Mongo driver is not connected.");
    }

    return this.client;
  }

  public getDatabase(): Db {
    if (!this.database) {
      throw new Error(
        "Database not available. Ensure the driver is connected before accessing the database.",
      );
    }

    return this.database;
  }

  /**
   * Next value of the per-collection counter.
   */
  private async nextId(table: string): Promise<number> {
    const counters = this.getDatabase().collection(
      this.driverOptions.counterCollection ?? "counters",
    );

    const counter = await counters.findOneAndUpdate(
      { collection: table },
      { $inc: { id: 1 } },
      { upsert: true, returnDocument: "after", session: this.session() },
    );

    const id: unknown = counter?.id;

    if (typeof id !== "number") {
      throw new Error(`Could not generate an id for "${table}".`);
    }

    return id;
  }

  /**
   * Session of the transaction open on this driver in the current async
   * context, if any.
   */
  private session(): ClientSession | undefined {
    const session = transactionContext.getTransaction(this)?.context;

    return session instanceof ClientSession ? session : undefined;
  }

  private resolveUri(): string {
    if (this.config.uri) {
      return this.config.uri;
    }

    const host = this.config.host ?? "localhost";
    const port = this.config.port ?? 27017;

    return `mongodb://${host}:${port}`;
  }

  private buildClientOptions(): MongoClientOptions {
    const options: MongoClientOptions = {
      ...this.config.clientOptions,
    };

    if (this.config.username && !options.auth) {
      options.auth = {
        username: this.config.username,
        password: this.config.password,
      };
    }

    if (this.config.authSource && !options.authSource) {
      options.authSource = this.config.authSource;
    }

    return options;
  }

  private emit(event: DriverEvent, ...args: unknown[]): void {
    this.events.emit(event, ...args);
  }
}
