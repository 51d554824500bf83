/**
 * Writer service contract for persisting models to the database.
 *
 * The writer orchestrates the complete save pipeline:
 * 1. Validation (via @warlock.js/seal)
 * 2. Saving unsaved belongs-to targets so their keys can be linked
 * 3. Event emission (saving, validating, creating/updating, saved)
 * 4. Driver execution (insert or update)
 * 5. Saving unsaved members of loaded/built collections (autosave)
 *
 * @example
 * ```typescript
 * const user = new User({ name: "Alice" });
 * const writer = new DatabaseWriter(user);
 * const result = await writer.save();
 *
 * console.log(result.isNew); // true (was an insert)
 * ```
 */
export interface WriterContract {
  /**
   * Save the model instance to the database.
   *
   * @throws {RecordInvalidError} If validation fails
   */
  save(options?: WriterOptions): Promise<WriterResult>;
}

/**
 * Options for controlling the save operation.
 */
export type WriterOptions = {
  /**
   * Skip validation.
   *
   * @default false
   */
  skipValidation?: boolean;

  /**
   * Skip lifecycle event emission.
   *
   * @default false
   */
  skipEvents?: boolean;

  /**
   * Do not save unsaved associated records along with the model.
   *
   * @default false
   */
  skipAutosave?: boolean;
};

/**
 * Result returned after a successful save operation.
 */
export type WriterResult = {
  /**
   * Whether the save operation succeeded.
   */
  success: boolean;

  /**
   * The saved document with all database-generated fields.
   */
  document: Record<string, unknown>;

  /**
   * Whether this was an insert operation.
   */
  isNew: boolean;

  /**
   * Number of records modified (for updates only).
   */
  modifiedCount?: number;
};
