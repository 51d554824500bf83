import { getSealConfig, v, type ObjectValidator } from "@warlock.js/seal";
import { getAssociationsConfig } from "../config";
import type { DriverContract, UpdateOperations } from "../contracts/database-driver.contract";
import type {
  WriterContract,
  WriterOptions,
  WriterResult,
} from "../contracts/database-writer.contract";
import type { DataSource } from "../data-source/data-source";
import { RecordInvalidError } from "../errors/record-invalid.error";
import type { Model } from "../model/model";
import type { ModelConstructor, ModelError } from "../model/types";
import type { BelongsToAssociation } from "../relations/belongs-to-association";
import type { HasManyAssociation } from "../relations/has-many-association";
import type { StrictMode } from "../types";

/**
 * Associations holding records that must be saved along with the model.
 */
type PendingAutosave = {
  /** Saved before the model, so their keys can be copied onto it */
  singular: BelongsToAssociation[];
  /** Saved after the model, once its key is known */
  collections: HasManyAssociation[];
};

/**
 * Database writer service that orchestrates model persistence.
 *
 * Handles the complete save pipeline:
 * 1. Skip when a saved model has neither changes nor unsaved related records
 * 2. Emit `saving`
 * 3. Save unsaved belongs-to targets and copy their keys onto the model
 * 4. Emit `validating`, validate via the @warlock.js/seal schema, emit `validated`
 * 5. Emit `creating`/`updating` and execute the insert or update
 * 6. Reset the dirty tracker and the `isNew` flag
 * 7. Save unsaved members of built or loaded collections
 * 8. Emit `saved` and `created`/`updated`
 *
 * Steps 3 to 7 share one transaction whenever related records are saved too.
 *
 * @example
 * ```typescript
 * const user = new User({ name: "Alice" });
 * user.collectionAssociation("posts").build({ title: "Draft" });
 *
 * await new DatabaseWriter(user).save(); // inserts the user, then the post
 * ```
 */
export class DatabaseWriter implements WriterContract {
  private readonly model: Model;
  private readonly ctor: ModelConstructor;
  private readonly dataSource: DataSource;
  private readonly driver: DriverContract;
  private readonly table: string;
  private readonly primaryKey: string;
  private readonly schema?: ObjectValidator;

  public constructor(model: Model) {
    this.model = model;
    this.ctor = model.self();
    this.dataSource = this.ctor.getDataSource();
    this.driver = this.dataSource.driver;
    this.table = this.ctor.table;
    this.primaryKey = this.ctor.primaryKey;
    this.schema = this.ctor.schema;
  }

  /**
   * Save the model instance to the database.
   *
   * @throws {RecordInvalidError} If validation fails; the errors are also set on the model
   */
  public async save(options: WriterOptions = {}): Promise<WriterResult> {
    const isInsert = this.model.isNew;
    const pending = options.skipAutosave
      ? { singular: [], collections: [] }
      : this.pendingAutosave();

    const hasPending = pending.singular.length > 0 || pending.collections.length > 0;

    if (!isInsert && !this.model.hasChanges() && !hasPending) {
      return {
        success: true,
        document: this.model.data,
        isNew: false,
        modifiedCount: 0,
      };
    }

    if (!hasPending) {
      return await this.performSave(isInsert, options, pending);
    }

    const before = { ...this.model.data };

    try {
      return await this.dataSource.transaction(() =>
        this.performSave(isInsert, options, pending),
      );
    } catch (error) {
      if (isInsert) {
        this.model.isNew = true;
        this.model.replaceData(before);
      }

      throw error;
    }
  }

  private async performSave(
    isInsert: boolean,
    options: WriterOptions,
    pending: PendingAutosave,
  ): Promise<WriterResult> {
    const mode = isInsert ? "insert" : "update";

    this.model.isSaving = true;

    try {
      if (!options.skipEvents) {
        await this.model.emitEvent("saving", { isInsert, mode });
      }

      for (const association of pending.singular) {
        await association.saveTarget();
      }

      await this.validate(isInsert, options);

      let modifiedCount: number | undefined;

      if (isInsert) {
        await this.performInsert(options);
      } else {
        modifiedCount = await this.performUpdate(options);
      }

      this.model.dirtyTracker.reset(this.model.data);
      this.model.isNew = false;

      for (const association of pending.collections) {
        await association.saveTarget();
      }

      if (!options.skipEvents) {
        await this.model.emitEvent("saved", { isInsert, mode });
        await this.model.emitEvent(isInsert ? "created" : "updated");
      }

      return {
        success: true,
        document: this.model.data,
        isNew: isInsert,
        modifiedCount,
      };
    } finally {
      this.model.isSaving = false;
    }
  }

  /**
   * Relationships whose held records need saving with the model.
   *
   * Only relationships that were touched on this instance (built, assigned
   * or loaded) are inspected.
   */
  private pendingAutosave(): PendingAutosave {
    const pending: PendingAutosave = { singular: [], collections: [] };

    for (const name of this.model.associationStates.keys()) {
      if (!this.ctor.reflectOnAssociation(name)) continue;

      const association = this.model.association(name);

      if (association.type === "hasMany") {
        if (association.target.some((record) => record.isNew && !record.isSaving)) {
          pending.collections.push(association);
        }

        continue;
      }

      const [target] = association.target;

      if (target && target.isNew && !target.isSaving) {
        pending.singular.push(association);
      }
    }

    return pending;
  }

  /**
   * Validate the model data against the schema.
   *
   * @throws {RecordInvalidError} If validation fails
   */
  private async validate(isInsert: boolean, options: WriterOptions): Promise<void> {
    this.model.errors = [];

    if (!options.skipEvents) {
      await this.model.emitEvent("validating", { isInsert });
    }

    if (options.skipValidation || !this.schema) {
      return;
    }

    // updates only check the attributes present on the model
    const validationSchema = isInsert
      ? this.schema.clone()
      : this.schema.clone(Object.keys(this.model.data)).extend({
          id: v.int(),
          _id: v.any(),
        });

    const strictMode = this.strictMode();

    if (strictMode === "strip") {
      validationSchema.stripUnknown();
    } else {
      validationSchema.allowUnknown(strictMode === "allow");
    }

    const result = await v.validate(validationSchema, this.model.data, {
      context: {
        model: this.model,
      },
      ...getSealConfig(),
    });

    if (!result.isValid) {
      const errors: ModelError[] = result.errors.map((error) => ({
        input: String(error.input),
        error: String(error.error),
        type: error.type === undefined ? undefined : String(error.type),
      }));

      this.model.errors = errors;

      if (!options.skipEvents) {
        await this.model.emitEvent("validated", { isValid: false, errors });
      }

      throw new RecordInvalidError(this.ctor.name, errors);
    }

    const validated = Object.fromEntries(
      Object.entries(result.data).filter(([, value]) => value !== undefined),
    );

    if (strictMode === "strip") {
      this.model.replaceData(validated);
    } else {
      // take casted values back, leaving attributes the schema does not know
      this.model.merge(validated);
    }

    if (!options.skipEvents) {
      await this.model.emitEvent("validated", { isValid: true });
    }
  }

  /**
   * Unknown-attribute policy of the model class, then the configured one.
   */
  private strictMode(): StrictMode {
    return this.ctor.strictMode ?? getAssociationsConfig("strictMode") ?? "allow";
  }

  private async performInsert(options: WriterOptions): Promise<void> {
    if (!options.skipEvents) {
      await this.model.emitEvent("creating");
    }

    const result = await this.driver.insert(this.table, { ...this.model.data });

    // the driver may add generated keys (id, _id)
    this.model.merge(result.document);
  }

  /**
   * @returns Number of modified records
   */
  private async performUpdate(options: WriterOptions): Promise<number> {
    if (!this.model.hasChanges()) {
      return 0;
    }

    if (!options.skipEvents) {
      await this.model.emitEvent("updating");
    }

    const filter = { [this.primaryKey]: this.model.get(this.primaryKey) };
    const result = await this.driver.update(this.table, filter, this.buildUpdateOperations());

    return result.modifiedCount;
  }

  /**
   * Build update operations from the model's dirty tracker.
   *
   * @example
   * ```typescript
   * post.set("title", "Final");
   * post.unset("authorId");
   * // { $set: { title: "Final" }, $unset: { authorId: 1 } }
   * ```
   */
  private buildUpdateOperations(): UpdateOperations {
    const operations: UpdateOperations = {};
    const removedColumns = this.model.getRemovedColumns();
    const dirtyColumns = this.model
      .getDirtyColumns()
      .filter((column) => !removedColumns.includes(column));

    if (dirtyColumns.length > 0) {
      operations.$set = {};

      for (const column of dirtyColumns) {
        operations.$set[column] = this.model.data[column];
      }
    }

    if (removedColumns.length > 0) {
      operations.$unset = {};

      for (const column of removedColumns) {
        operations.$unset[column] = 1;
      }
    }

    return operations;
  }
}
