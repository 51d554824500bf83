import { EventEmitter } from "node:events";
import { dataSourceContext } from "../context/data-source-context";
import { MissingDataSourceError } from "../errors/missing-data-source.error";
import { DataSource, type DataSourceOptions } from "./data-source";

/**
 * Event types emitted by the DataSourceRegistry.
 *
 * - `registered`: any data source was registered
 * - `default-registered`: a data source became the default one
 */
export type DataSourceRegistryEvent = "registered" | "default-registered";

/**
 * Callback signature for registry events.
 */
export type DataSourceRegistryListener = (dataSource: DataSource) => void;

/**
 * Registry of named data sources.
 *
 * Models resolve their driver through it: by the name declared on the model
 * class, through a context override, or falling back to the default source.
 */
class DataSourceRegistry {
  private readonly sources = new Map<string, DataSource>();
  private defaultSource?: DataSource;
  private readonly events = new EventEmitter();

  /**
   * Register a new data source.
   *
   * The first registered source, or any source flagged `isDefault`, becomes
   * the default one.
   *
   * @param options - Data source configuration
   * @returns The registered data source instance
   */
  public register(options: DataSourceOptions): DataSource {
    const source = new DataSource(options);
    this.sources.set(source.name, source);

    const isNewDefault = source.isDefault || !this.defaultSource;

    if (isNewDefault) {
      this.defaultSource = source;
    }

    this.events.emit("registered", source);

    if (isNewDefault) {
      this.events.emit("default-registered", source);
    }

    return source;
  }

  /**
   * Remove a data source by name
   */
  public unregister(name: string): void {
    const source = this.sources.get(name);

    if (!source) return;

    this.sources.delete(name);

    if (this.defaultSource === source) {
      this.defaultSource = undefined;
    }
  }

  /**
   * Remove every data source, including the default one
   */
  public clear(): void {
    this.defaultSource = undefined;
    this.sources.clear();
  }

  /**
   * Listen for registry events.
   *
   * @example
   * ```typescript
   * dataSourceRegistry.on("default-registered", (source) => {
   *   console.log(`Default data source set to "${source.name}"`);
   * });
   * ```
   */
  public on(event: DataSourceRegistryEvent, listener: DataSourceRegistryListener): void {
    this.events.on(event, listener);
  }

  /**
   * Stop listening for a registry event.
   */
  public off(event: DataSourceRegistryEvent, listener: DataSourceRegistryListener): void {
    this.events.off(event, listener);
  }

  /**
   * Retrieve a data source by name, or the one in effect for the current
   * context when no name is given.
   *
   * @throws {MissingDataSourceError} If the requested source is not registered
   */
  public get(name?: string): DataSource {
    if (name != null) {
      const source = this.sources.get(name);

      if (!source) {
        throw new MissingDataSourceError(`Data source "${name}" is not registered.`, name);
      }

      return source;
    }

    const override = dataSourceContext.getDataSource();

    if (override instanceof DataSource) {
      return override;
    }

    if (override) {
      const source = this.sources.get(override);

      if (!source) {
        throw new MissingDataSourceError(
          `Data source "${override}" is not registered (context override).`,
          override,
        );
      }

      return source;
    }

    if (!this.defaultSource) {
      throw new MissingDataSourceError("No default data source registered.");
    }

    return this.defaultSource;
  }

  /**
   * Get all registered data sources.
   */
  public getAllDataSources(): DataSource[] {
    return Array.from(this.sources.values());
  }
}

export const dataSourceRegistry = new DataSourceRegistry();
