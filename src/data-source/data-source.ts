import type { DriverContract } from "../contracts";
import { transactionContext } from "../context/transaction-context";
import { logAssociation, logAssociationError } from "../utils/association-logger";

/**
 * Configuration options used when registering a data source.
 */
export type DataSourceOptions = {
  /** Unique name identifying the data source. */
  name: string;
  /** Driver bound to the data source. */
  driver: DriverContract;
  /** Whether this data source should be considered the default one. */
  isDefault?: boolean;
};

/**
 * Wrapper that couples a driver with its metadata.
 *
 * A data source represents a database connection with all its associated
 * services, including the transaction scope used by association mutations.
 *
 * @example
 * ```typescript
 * const dataSource = new DataSource({
 *   name: "primary",
 *   driver: new MongoDbDriver({ database: "myapp" }),
 *   isDefault: true,
 * });
 *
 * await dataSource.transaction(async () => {
 *   await post.save();
 *   await comment.save();
 * });
 * ```
 */
export class DataSource {
  /** Unique name identifying this data source. */
  public readonly name: string;

  /** Database driver for executing queries. */
  public readonly driver: DriverContract;

  /** Whether this is the default data source. */
  public readonly isDefault: boolean;

  /**
   * Create a new data source.
   *
   * @param options - Configuration options
   */
  public constructor(options: DataSourceOptions) {
    this.name = options.name;
    this.driver = options.driver;
    this.isDefault = Boolean(options.isDefault);
  }

  /**
   * Whether the current async context runs inside a transaction opened on
   * this data source's driver.
   */
  public get inTransaction(): boolean {
    return transactionContext.getTransaction(this.driver) !== undefined;
  }

  /**
   * Run the callback inside a single transaction.
   *
   * Commits when the callback resolves and rolls back when it throws. When the
   * caller already runs inside a transaction of this driver the callback
   * simply joins it, so nested calls commit or roll back together with the
   * outermost one. Calls started from unrelated async flows get their own
   * transaction.
   *
   * @param callback - Work to execute atomically
   * @returns Whatever the callback returns
   */
  public async transaction<TResult>(callback: () => Promise<TResult>): Promise<TResult> {
    if (this.inTransaction) {
      return await callback();
    }

    const transaction = await this.driver.beginTransaction();

    logAssociation("transaction", `Transaction opened on "${this.name}"`);

    try {
      const result = await transactionContext.runWith(this.driver, transaction, callback);
      await transaction.commit();

      logAssociation("transaction", `Transaction committed on "${this.name}"`);

      return result;
    } catch (error) {
      await transaction.rollback();

      logAssociationError(
        "transaction",
        `Transaction rolled back on "${this.name}": ${error instanceof Error ? error.message : String(error)}`,
      );

      throw error;
    }
  }
}
