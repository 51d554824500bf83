/**
 * Raised when a model asks for a data source the registry does not know.
 */
export class MissingDataSourceError extends Error {
  /**
   * Name that failed to resolve, absent when no default source exists
   */
  public readonly dataSourceName?: string;

  public constructor(message: string, dataSourceName?: string) {
    super(message);
    this.name = "MissingDataSourceError";
    this.dataSourceName = dataSourceName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MissingDataSourceError);
    }
  }
}
