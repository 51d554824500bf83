/**
 * Error thrown when records looked up by primary key do not all exist.
 *
 * @example
 * ```typescript
 * await user.collectionAssociation("posts").setIds([1, 99]);
 * // RecordNotFoundError: Couldn't find all Post records with id (1, 99): found 1, missing 99
 * ```
 */
export class RecordNotFoundError extends Error {
  public readonly modelName: string;

  /**
   * Keys that matched no record.
   */
  public readonly missingIds: unknown[];

  public constructor(modelName: string, primaryKey: string, ids: unknown[], missingIds: unknown[]) {
    super(
      `Couldn't find all ${modelName} records with ${primaryKey} (${ids.join(", ")}): ` +
        `found ${ids.length - missingIds.length}, missing ${missingIds.join(", ")}`,
    );
    this.name = "RecordNotFoundError";
    this.modelName = modelName;
    this.missingIds = missingIds;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RecordNotFoundError);
    }
  }
}
