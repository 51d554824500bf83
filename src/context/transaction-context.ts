import { Context, contextManager } from "@warlock.js/context";
import type { DriverContract, DriverTransactionContract } from "../contracts";

type OpenTransactions = ReadonlyMap<DriverContract, DriverTransactionContract>;

type TransactionContextStore = {
  transactions?: OpenTransactions;
};

/**
 * Transactions opened in the current async context, by driver.
 *
 * Work started outside a `DataSource.transaction()` callback never sees the
 * transactions opened inside it, so concurrent callers each get their own.
 * Drivers read the transaction (session, connection) of the running
 * operation from here.
 */
class TransactionContext extends Context<TransactionContextStore> {
  /**
   * Transaction of the given driver open in this context, if any
   */
  public getTransaction(driver: DriverContract): DriverTransactionContract | undefined {
    return this.get("transactions")?.get(driver);
  }

  /**
   * Run the callback in a child context where the transaction is open.
   */
  public async runWith<TResult>(
    driver: DriverContract,
    transaction: DriverTransactionContract,
    callback: () => Promise<TResult>,
  ): Promise<TResult> {
    const transactions = new Map(this.get("transactions"));

    transactions.set(driver, transaction);

    return await this.run({ transactions }, callback);
  }

  public buildStore(): TransactionContextStore {
    return { transactions: undefined };
  }
}

export const transactionContext = new TransactionContext();

contextManager.register("associations.transaction", transactionContext);
