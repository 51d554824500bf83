import { clone, get, merge, only, set } from "@mongez/reinforcements";
import type { ObjectValidator } from "@warlock.js/seal";
import type {
  PrimaryKeyValue,
  QueryBuilderContract,
  RemoverOptions,
  RemoverResult,
  WriterOptions,
} from "../contracts";
import { getAssociationsConfig } from "../config";
import type { DataSource } from "../data-source/data-source";
import { dataSourceRegistry } from "../data-source/data-source-registry";
import { DatabaseDirtyTracker } from "../database-dirty-tracker";
import { ConfigurationError } from "../errors/configuration.error";
import type { ModelEventContext, ModelEventListener, ModelEventName } from "../events/model-events";
import { ModelEvents, globalModelEvents } from "../events/model-events";
import type { AssociationState } from "../relations/association-state";
import type { BelongsToAssociation } from "../relations/belongs-to-association";
import { createAssociation, type AnyAssociation } from "../relations/create-association";
import type { HasManyAssociation } from "../relations/has-many-association";
import type { Reflection } from "../relations/reflection";
import type { ReflectionRegistry } from "../relations/reflection-registry";
import { getRelationTable, type RelationAccessor } from "../relations/relation-builder";
import type { RelationValue, RelationsDeclaration } from "../relations/types";
import { DatabaseRemover } from "../remover/database-remover";
import { Resource, type ResourceConstructor } from "../resource/resource";
import type { StrictMode } from "../types";
import { DatabaseWriter } from "../writer/database-writer";
import { getModelFromRegistry } from "./register-model";
import {
  isModelConstructor,
  type ModelAttributes,
  type ModelConstructor,
  type ModelError,
  type ModelSnapshot,
} from "./types";

/**
 * Sentinel value used to distinguish between undefined and missing fields.
 */
const MISSING_VALUE = Symbol("missing");

function copyStates(states: Map<string, AssociationState>): Map<string, AssociationState> {
  const copy = new Map<string, AssociationState>();

  for (const [name, state] of states) {
    copy.set(name, { ...state, target: [...state.target] });
  }

  return copy;
}

/**
 * Each model class gets its own event emitter.
 */
const modelEventsRegistry = new WeakMap<object, ModelEvents<Model>>();

/**
 * Base class of every model.
 *
 * Provides:
 * - Attribute accessors with dot-notation support (get, set, has, unset, merge)
 * - Dirty tracking for partial updates
 * - Lifecycle events (saving, created, deleting, ...)
 * - Relationship declarations through `static relations`, resolved lazily
 *   by per-instance association runtimes
 *
 * @example
 * ```typescript
 * @RegisterModel()
 * class User extends Model {
 *   public static table = "users";
 *   public static relations = {
 *     posts: hasMany("Post", { dependent: "destroy" }),
 *   };
 * }
 *
 * const user = await User.create({ name: "Alice" });
 * const posts = user.collectionAssociation("posts");
 * await posts.create({ title: "Hello" });
 * ```
 */
export abstract class Model {
  /**
   * Table/collection name
   */
  public static table: string;

  /**
   * Primary key column
   */
  public static primaryKey = "id";

  /**
   * Data source name or instance; the registry default is used when omitted.
   */
  public static dataSource?: string | DataSource;

  /**
   * Validation schema run by the writer before every save.
   *
   * @example
   * ```typescript
   * public static schema = v.object({
   *   title: v.string().required(),
   * });
   * ```
   */
  public static schema?: ObjectValidator;

  /**
   * How attributes missing from `schema` are treated on save; the configured
   * `strictMode` applies when omitted.
   *
   * @example
   * ```typescript
   * class Invoice extends Model {
   *   public static strictMode: StrictMode = "fail";
   * }
   * ```
   */
  public static strictMode?: StrictMode;

  /**
   * Relationship declarations.
   *
   * @example
   * ```typescript
   * public static relations = {
   *   posts: hasMany("Post"),
   *   team: belongsTo("Team"),
   * };
   * ```
   */
  public static relations: RelationsDeclaration = {};

  /**
   * Resource class used by `serialize()`; the base `Resource` when omitted.
   *
   * @example
   * ```typescript
   * class User extends Model {
   *   public static resource = UserResource;
   * }
   * ```
   */
  public static resource?: ResourceConstructor;

  /**
   * Whether this instance has not been inserted yet (or was destroyed).
   */
  public isNew = true;

  /**
   * Set once the record has been deleted.
   */
  public isDestroyed = false;

  /**
   * Set by the writer while this instance is being saved.
   */
  public isSaving = false;

  /**
   * Raw attributes backing this instance.
   */
  public data: ModelAttributes;

  public readonly dirtyTracker: DatabaseDirtyTracker;

  /**
   * Instance-level lifecycle listeners.
   */
  public readonly events = new ModelEvents<Model>();

  /**
   * Validation and cascade errors of the last save or destroy attempt.
   */
  public errors: ModelError[] = [];

  /**
   * Relationship whose `dependent: "destroy"` cascade is destroying this
   * record, if any.
   */
  public destroyedByAssociation?: Reflection;

  /**
   * Per-relationship resolution state, keyed by relationship name.
   */
  public readonly associationStates = new Map<string, AssociationState>();

  public constructor(initialData: ModelAttributes = {}) {
    this.data = { ...initialData };
    this.dirtyTracker = new DatabaseDirtyTracker(this.data);
  }

  /**
   * Get a model class by the name it was registered under.
   */
  public static getModel(name: string): ModelConstructor | undefined {
    return getModelFromRegistry(name);
  }

  // ============================================================================
  // ATTRIBUTES
  // ============================================================================

  /**
   * Primary key value, when the record has one.
   */
  public get id(): PrimaryKeyValue | undefined {
    const value: unknown = this.get(this.self().primaryKey);

    return typeof value === "string" || typeof value === "number" ? value : undefined;
  }

  /**
   * Read an attribute, supporting dot-notation paths.
   *
   * @example
   * ```typescript
   * user.get("name"); // "Alice"
   * user.get("address.city", "Unknown");
   * ```
   */
  public get<TValue = unknown>(field: string, defaultValue?: TValue): TValue {
    return get(this.data, field, defaultValue);
  }

  /**
   * Get only the values of the given fields
   */
  public only(fields: string[]): ModelAttributes {
    return only(this.data, fields);
  }

  /**
   * Set an attribute and mark it as dirty.
   */
  public set(field: string, value: unknown): this {
    set(this.data, field, value);

    const [column] = field.split(".");
    this.dirtyTracker.mergeChanges({ [column]: this.data[column] });

    return this;
  }

  public has(field: string): boolean {
    return get(this.data, field, MISSING_VALUE) !== MISSING_VALUE;
  }

  /**
   * Remove one or more top-level attributes.
   */
  public unset(...fields: string[]): this {
    for (const field of fields) {
      delete this.data[field];
    }

    this.dirtyTracker.unset(fields);

    return this;
  }

  /**
   * Deep-merge values into the attributes.
   */
  public merge(values: ModelAttributes): this {
    this.data = merge(this.data, values);

    const changed: ModelAttributes = {};

    for (const column of Object.keys(values)) {
      changed[column] = this.data[column];
    }

    this.dirtyTracker.mergeChanges(changed);

    return this;
  }

  /**
   * Replace the attributes entirely, keeping the dirty baseline.
   */
  public replaceData(data: ModelAttributes): void {
    this.data = { ...data };
    this.dirtyTracker.replaceCurrentData(this.data);
  }

  /**
   * Take fresh values for every attribute that has no unsaved change,
   * leaving locally modified attributes untouched.
   */
  public refreshFrom(values: ModelAttributes): this {
    const fresh: ModelAttributes = {};

    for (const [column, value] of Object.entries(values)) {
      if (this.isDirty(column)) continue;

      this.data[column] = value;
      fresh[column] = value;
    }

    this.dirtyTracker.syncOriginal(fresh);

    return this;
  }

  public hasChanges(): boolean {
    return this.dirtyTracker.hasChanges();
  }

  public isDirty(column: string): boolean {
    return this.dirtyTracker.isDirty(column);
  }

  public getDirtyColumns(): string[] {
    return this.dirtyTracker.getDirtyColumns();
  }

  public getRemovedColumns(): string[] {
    return this.dirtyTracker.getRemovedColumns();
  }

  /**
   * Whether the record exists in storage.
   */
  public isPersisted(): boolean {
    return !this.isNew && !this.isDestroyed;
  }

  /**
   * Copy of the attributes, change tracking, persistence flags and
   * relationship states. Errors are not part of it.
   */
  public snapshot(): ModelSnapshot {
    return {
      data: clone(this.data),
      original: this.dirtyTracker.originalData(),
      isNew: this.isNew,
      isDestroyed: this.isDestroyed,
      associationStates: copyStates(this.associationStates),
    };
  }

  /**
   * Put back the state captured by `snapshot()`.
   */
  public restore(snapshot: ModelSnapshot): void {
    this.isNew = snapshot.isNew;
    this.isDestroyed = snapshot.isDestroyed;
    this.dirtyTracker.reset(snapshot.original);
    this.replaceData(snapshot.data);

    this.associationStates.clear();

    for (const [name, state] of copyStates(snapshot.associationStates)) {
      this.associationStates.set(name, state);
    }
  }

  // ============================================================================
  // ERRORS
  // ============================================================================

  /**
   * Record an error on the model; use `"base"` as input for errors about the
   * record as a whole.
   */
  public addError(input: string, error: string, type?: string): this {
    this.errors.push({ input, error, type });
    return this;
  }

  public hasErrors(): boolean {
    return this.errors.length > 0;
  }

  // ============================================================================
  // EVENTS
  // ============================================================================

  /**
   * Emit a lifecycle event to instance, class and global listeners, in that
   * order.
   */
  public async emitEvent(event: ModelEventName, context: ModelEventContext = {}): Promise<void> {
    await this.events.emit(event, this, context);
    await this.self().events().emit(event, this, context);
    await globalModelEvents.emit(event, this, context);
  }

  public on(event: ModelEventName, listener: ModelEventListener<Model>): () => void {
    return this.events.on(event, listener);
  }

  public off(event: ModelEventName, listener: ModelEventListener<Model>): void {
    this.events.off(event, listener);
  }

  /**
   * Listeners registered for this model class.
   *
   * @example
   * ```typescript
   * Post.events().onSaving((post) => {
   *   post.set("slug", String(post.get("title")).toLowerCase());
   * });
   * ```
   */
  public static events(): ModelEvents<Model> {
    let events = modelEventsRegistry.get(this);

    if (!events) {
      events = new ModelEvents<Model>();
      modelEventsRegistry.set(this, events);
    }

    return events;
  }

  /**
   * Listeners shared by every model class.
   */
  public static globalEvents(): ModelEvents<Model> {
    return globalModelEvents;
  }

  // ============================================================================
  // RELATIONSHIPS
  // ============================================================================

  /**
   * Every relationship of this class, including inherited ones.
   */
  public static reflections(this: ModelConstructor): ReflectionRegistry {
    return getRelationTable(this).registry;
  }

  /**
   * Reflection of the named relationship, if declared.
   */
  public static reflectOnAssociation(
    this: ModelConstructor,
    name: string,
  ): Reflection | undefined {
    return getRelationTable(this).registry.get(name);
  }

  /**
   * Accessor table built for this class, keyed by relationship name.
   */
  public static relationAccessors(this: ModelConstructor): ReadonlyMap<string, RelationAccessor> {
    return getRelationTable(this).accessors;
  }

  /**
   * Create the runtime of the named relationship bound to this instance.
   *
   * @throws {ConfigurationError} If no such relationship is declared
   */
  public association(name: string): AnyAssociation {
    const reflection = this.self().reflectOnAssociation(name);

    if (!reflection) {
      throw new ConfigurationError(
        `Association "${name}" is not declared on ${this.constructor.name}.`,
        name,
      );
    }

    return createAssociation(this, reflection);
  }

  /**
   * Runtime of a has-many relationship.
   *
   * @throws {ConfigurationError} If the relationship is missing or is not a collection
   */
  public collectionAssociation(name: string): HasManyAssociation {
    const association = this.association(name);

    if (association.type !== "hasMany") {
      throw new ConfigurationError(`Association "${name}" is not a collection.`, name);
    }

    return association;
  }

  /**
   * Runtime of a belongs-to or has-one relationship.
   *
   * @throws {ConfigurationError} If the relationship is missing or is a collection
   */
  public singularAssociation(name: string): BelongsToAssociation {
    const association = this.association(name);

    if (association.type === "hasMany") {
      throw new ConfigurationError(`Association "${name}" is a collection.`, name);
    }

    return association;
  }

  /**
   * Read a relationship through the accessor table: a collection proxy for
   * has-many, the related model or `null` otherwise.
   */
  public async related(name: string, forceReload = false): Promise<RelationValue> {
    return await this.accessor(name).read(this, forceReload);
  }

  /**
   * Assign a relationship through the accessor table.
   */
  public async setRelated(name: string, value: Model | Model[] | null): Promise<void> {
    await this.accessor(name).write(this, value);
  }

  /**
   * Raw value stored under the relationship name, without resolving it.
   */
  public relatedRaw(name: string): unknown {
    return this.accessor(name).readRaw(this);
  }

  private accessor(name: string): RelationAccessor {
    const accessor = this.self().relationAccessors().get(name);

    if (!accessor) {
      throw new ConfigurationError(
        `Association "${name}" is not declared on ${this.constructor.name}.`,
        name,
      );
    }

    return accessor;
  }

  // ============================================================================
  // PERSISTENCE
  // ============================================================================

  /**
   * Resolve the data source of this model class.
   *
   * Resolution order: the `dataSource` name or instance declared on the class,
   * then the configured `dataSource` name. When neither is set the registry
   * resolves its default, which the context override replaces.
   */
  public static getDataSource(): DataSource {
    const ref = this.dataSource ?? getAssociationsConfig("dataSource");

    if (typeof ref === "string") {
      return dataSourceRegistry.get(ref);
    }

    return ref ?? dataSourceRegistry.get();
  }

  /**
   * Create a query builder hydrating rows into models of this class.
   */
  public static query<TModel extends Model>(
    this: ModelConstructor<TModel>,
  ): QueryBuilderContract<TModel> {
    return this.getDataSource()
      .driver.queryBuilder(this.table)
      .hydrate((data) => {
        const model = new this(data);
        model.isNew = false;
        return model;
      });
  }

  /**
   * Find a record by its primary key.
   */
  public static async find<TModel extends Model>(
    this: ModelConstructor<TModel>,
    id: PrimaryKeyValue,
  ): Promise<TModel | null> {
    return await this.query().where(this.primaryKey, id).first();
  }

  /**
   * Find the records with the given primary keys; order is not guaranteed.
   */
  public static async findMany<TModel extends Model>(
    this: ModelConstructor<TModel>,
    ids: PrimaryKeyValue[],
  ): Promise<TModel[]> {
    if (ids.length === 0) return [];

    return await this.query().whereIn(this.primaryKey, ids).get();
  }

  /**
   * Build and save a new record.
   */
  public static async create<TModel extends Model>(
    this: ModelConstructor<TModel>,
    data: ModelAttributes = {},
  ): Promise<TModel> {
    const model = new this(data);
    await model.save();
    return model;
  }

  /**
   * Run the callback in a transaction of this model's data source.
   */
  public static async transaction<TResult>(callback: () => Promise<TResult>): Promise<TResult> {
    return await this.getDataSource().transaction(callback);
  }

  /**
   * Insert or update the record, autosaving unsaved related records.
   *
   * @throws {RecordInvalidError} If validation fails; errors are kept on `errors`
   */
  public async save(options?: WriterOptions): Promise<this> {
    const writer = new DatabaseWriter(this);
    await writer.save(options);
    return this;
  }

  /**
   * Delete the record, applying the `dependent` policy of every has-many
   * relationship first.
   *
   * @throws {DeleteRestrictionError} If a `restrictWithException` collection is not empty
   */
  public async destroy(options?: RemoverOptions): Promise<RemoverResult> {
    const remover = new DatabaseRemover(this);
    return await remover.destroy(options);
  }

  /**
   * Get the class of this instance.
   */
  public self(): ModelConstructor {
    const ctor = this.constructor;

    if (!isModelConstructor(ctor)) {
      throw new Error(`${ctor.name} is not a model class.`);
    }

    return ctor;
  }

  /**
   * Render the model and its relationships through its resource class.
   */
  public async serialize(): Promise<ModelAttributes> {
    const resource = this.self().resource ?? Resource;

    return await new resource(this).serialize();
  }

  public toJSON(): ModelAttributes {
    return this.data;
  }
}
