/**
 * Error thrown when a relationship is declared with an invalid name or option.
 *
 * Raised at declaration time so a misconfigured relation never surfaces
 * later during a request.
 *
 * @example
 * ```typescript
 * hasMany("Post", { foreignKey: "authorId", fooBar: true });
 * // ConfigurationError: Unknown option "fooBar" for hasMany relation. Allowed options: ...
 * ```
 */
export class ConfigurationError extends Error {
  /**
   * Relation name the declaration refers to (when known).
   */
  public readonly relationName?: string;

  /**
   * Creates a new ConfigurationError.
   *
   * @param message - Descriptive error message
   * @param relationName - Optional relation name that failed
   */
  public constructor(message: string, relationName?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.relationName = relationName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}
