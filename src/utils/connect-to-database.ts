import type { DataSource } from "../data-source/data-source";
import { dataSourceRegistry } from "../data-source/data-source-registry";
import { MongoDbDriver } from "../drivers/mongodb/mongodb-driver";
import type { MongoDbConnectionOptions, MongoDriverOptions } from "../drivers/mongodb/types";

/**
 * Connection options for establishing a MongoDB connection.
 */
export type ConnectionOptions = MongoDbConnectionOptions & {
  /**
   * Unique name for this data source.
   * @default "default"
   */
  name?: string;

  /**
   * Whether this should be the default data source.
   * @default true
   */
  isDefault?: boolean;

  /**
   * Driver-specific options: `autoGenerateId`, `counterCollection`,
   * `transactionOptions`.
   */
  driverOptions?: MongoDriverOptions;
};

/**
 * Connect to MongoDB and register the data source.
 *
 * @example
 * ```typescript
 * const dataSource = await connectToDatabase({
 *   database: "blog",
 *   host: "localhost",
 *   driverOptions: { counterCollection: "counters" },
 *   clientOptions: { maxPoolSize: 10 },
 * });
 * ```
 */
export async function connectToDatabase(options: ConnectionOptions): Promise<DataSource> {
  const { name = "default", isDefault = true, driverOptions, ...connection } = options;

  const driver = new MongoDbDriver(connection, driverOptions);
  const dataSource = dataSourceRegistry.register({ name, driver, isDefault });

  try {
    await driver.connect();
  } catch (error) {
    throw new Error(
      `Failed to connect to mongodb database: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return dataSource;
}
