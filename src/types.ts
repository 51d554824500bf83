/**
 * How related records are embedded when a model is serialized.
 *
 * - `objects`: nested rendering of each related record
 * - `ids`: only the related primary keys
 */
export type EmbedMode = "objects" | "ids";

/**
 * How the writer treats attributes the validation schema does not declare.
 *
 * - `allow`: keep them (foreign keys need not be declared)
 * - `strip`: drop them from the model before saving
 * - `fail`: reject the save with a validation error
 */
export type StrictMode = "allow" | "strip" | "fail";

export type AssociationsConfigurations = {
  /**
   * Debug level
   * Could be one of the following values: `error`, `warn`, `info`
   *
   * At `info`, association loads, cascades and transactions are logged.
   * @default `warn`
   */
  debugLevel?: "error" | "warn" | "info";
  /**
   * Default embed mode for associations that do not declare `embed`
   *
   * @default "objects"
   */
  embed?: EmbedMode;
  /**
   * Name of the data source used by models that do not declare one.
   * When omitted the registry default is used.
   */
  dataSource?: string;
  /**
   * Unknown-attribute policy for models that do not declare `strictMode`
   *
   * @default "allow"
   */
  strictMode?: StrictMode;
};
