import type { MongoClientOptions, TransactionOptions } from "mongodb";

/**
 * Connection settings of the MongoDB driver.
 */
export type MongoDbConnectionOptions = {
  database: string;
  uri?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  authSource?: string;
  clientOptions?: MongoClientOptions;
};

/**
 * MongoDB driver-specific options.
 */
export type MongoDriverOptions = {
  /**
   * Assign an auto-incremented numeric `id` to inserted documents that have
   * none, so models can keep `id` as their primary key.
   *
   * @default true
   */
  autoGenerateId?: boolean;

  /**
   * Collection holding the last generated id of every collection.
   *
   * @default "counters"
   */
  counterCollection?: string;

  /**
   * Transaction options applied to every transaction.
   */
  transactionOptions?: TransactionOptions;
};
