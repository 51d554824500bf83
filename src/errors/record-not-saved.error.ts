/**
 * Error thrown when a persisting mutation is attempted on an association
 * whose owner has not been saved yet.
 *
 * @example
 * ```typescript
 * const user = new User({ name: "Alice" });
 * await user.association("posts").create({ title: "Hello" });
 * // RecordNotSavedError: You cannot call create unless the parent is saved
 * ```
 */
export class RecordNotSavedError extends Error {
  /**
   * Name of the owner model class.
   */
  public readonly modelName?: string;

  public constructor(message: string, modelName?: string) {
    super(message);
    this.name = "RecordNotSavedError";
    this.modelName = modelName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RecordNotSavedError);
    }
  }
}
