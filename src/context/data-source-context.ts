import { Context, contextManager } from "@warlock.js/context";
import type { DataSource } from "../data-source/data-source";

type DataSourceOverride = string | DataSource;

type DataSourceContextStore = {
  dataSource?: DataSourceOverride;
};

/**
 * Per-request data source override.
 *
 * When set, `dataSourceRegistry.get()` (without a name) resolves to this data
 * source instead of the registry default, so every model and association
 * inside the request reads and writes through it.
 */
class DataSourceContext extends Context<DataSourceContextStore> {
  /**
   * Get the overriding data source (name or instance), if any
   */
  public getDataSource(): DataSourceOverride | undefined {
    return this.get("dataSource");
  }

  /**
   * Override the data source for the current context
   */
  public setDataSource(dataSource: DataSourceOverride): void {
    this.set("dataSource", dataSource);
  }

  public buildStore(): DataSourceContextStore {
    return { dataSource: undefined };
  }
}

export const dataSourceContext = new DataSourceContext();

contextManager.register("associations.datasource", dataSourceContext);
