/**
 * Remover service contract for deleting models from the database.
 *
 * The remover orchestrates the complete deletion pipeline:
 * 1. Validation (model must be persisted and carry a primary key)
 * 2. Dependent associations (restrict, destroy or bulk delete)
 * 3. Event emission (deleting, deleted)
 * 4. Driver execution
 *
 * @example
 * ```typescript
 * const user = await User.find(1);
 * const remover = new DatabaseRemover(user);
 * const result = await remover.destroy();
 *
 * console.log(result.success); // true
 * ```
 */
export interface RemoverContract {
  /**
   * Destroy (delete) the model instance from the database.
   *
   * @throws {DeleteRestrictionError} If a `restrictWithException` dependency blocks it
   * @throws {Error} If the model is new or the record was not found
   */
  destroy(options?: RemoverOptions): Promise<RemoverResult>;
}

/**
 * Options for controlling the delete operation.
 */
export type RemoverOptions = {
  /**
   * Skip lifecycle event emission.
   *
   * @default false
   */
  skipEvents?: boolean;
};

/**
 * Result returned after a delete operation.
 */
export type RemoverResult = {
  /**
   * Whether the record was deleted.
   *
   * `false` when a `restrictWithError` dependency halted the deletion; the
   * reason is recorded on `model.errors`.
   */
  success: boolean;

  /**
   * Number of records deleted (0 or 1).
   */
  deletedCount: number;
};
