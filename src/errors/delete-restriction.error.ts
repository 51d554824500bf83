/**
 * Error thrown by a `restrictWithException` dependency when the owner still
 * has dependent records. The owner is not deleted.
 */
export class DeleteRestrictionError extends Error {
  /**
   * Name of the association that blocked the deletion.
   */
  public readonly relationName: string;

  public constructor(relationName: string) {
    super(`Cannot delete record because of dependent ${relationName}`);
    this.name = "DeleteRestrictionError";
    this.relationName = relationName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DeleteRestrictionError);
    }
  }
}
