import type { PrimaryKeyValue } from "../contracts";
import { RecordInvalidError } from "../errors/record-invalid.error";
import { RecordNotFoundError } from "../errors/record-not-found.error";
import { RecordNotSavedError } from "../errors/record-not-saved.error";
import type { Model } from "../model/model";
import type { ModelAttributes, ModelSnapshot } from "../model/types";
import { logAssociation } from "../utils/association-logger";
import { Association } from "./association";
import { CollectionProxy } from "./collection-proxy";

/**
 * Callback invoked with each record built or created through a collection.
 */
export type RecordCallback = (record: Model) => void;

/**
 * Predicate over collection members.
 */
export type RecordPredicate = (record: Model) => boolean;

/**
 * Id value accepted by `setIds`; blank entries are dropped.
 */
export type IdInput = PrimaryKeyValue | null | undefined;

/**
 * Thrown inside a transaction to roll it back without surfacing an error.
 */
class RollbackRequest extends Error {}

/**
 * Runtime of a collection-valued relationship.
 *
 * The target may mix records fetched from storage with records built locally
 * and not saved yet; loading merges both without duplicating a record that
 * is held locally and fetched again.
 */
export abstract class CollectionAssociation extends Association {
  // ============================================================================
  // READING
  // ============================================================================

  /**
   * Collection proxy of this relationship, reloading first when forced or
   * when the owner's key changed since the last load.
   */
  public async reader(forceReload = false): Promise<CollectionProxy> {
    this.refreshState();

    if (forceReload || this.isStale()) {
      await this.reload();
    }

    return new CollectionProxy(this);
  }

  /**
   * Discard the target and load it again.
   */
  public async reload(): Promise<Model[]> {
    this.reset();
    return await this.loadTarget();
  }

  /**
   * Fetch the related records when warranted and merge them with the
   * records already held.
   */
  public async loadTarget(): Promise<Model[]> {
    this.refreshState();

    if (this.isStale()) {
      this.reset();
    }

    if (this.findTarget()) {
      const fetched = await this.scope().toList();

      for (const record of fetched) {
        this.linkInverse(record);
      }

      this.replaceTarget(this.mergeTargetLists(fetched, this.target));

      logAssociation(
        "load",
        `${this.owner.constructor.name}#${this.name}: fetched ${fetched.length}, holding ${this.target.length}`,
      );
    }

    this.markLoaded();

    return this.target;
  }

  /**
   * Fetched records that are already held keep the held instance, which takes
   * every fetched attribute it has not modified. Held records that are not
   * saved yet are appended; held persisted records missing from the fetch no
   * longer belong to the collection.
   */
  protected mergeTargetLists(persisted: Model[], memory: Model[]): Model[] {
    if (memory.length === 0) return persisted;

    const remaining = [...memory];

    const merged = persisted.map((record) => {
      const index = remaining.findIndex((held) => this.isSameRecord(held, record));

      if (index === -1) return record;

      const [held] = remaining.splice(index, 1);

      held.refreshFrom(record.data);

      return held;
    });

    return [...merged, ...remaining.filter((record) => record.isNew)];
  }

  /**
   * Primary keys of the members: from the target when loaded, through a
   * projection query otherwise.
   */
  public async ids(): Promise<unknown[]> {
    if (this.isLoaded()) {
      return this.target.map((record) => record.id);
    }

    return await this.scope().pluck(this.relatedModel().primaryKey);
  }

  public async idsReader(): Promise<unknown[]> {
    return await this.ids();
  }

  /**
   * Whether the collection has no members, without loading it when possible.
   */
  public async isEmpty(): Promise<boolean> {
    if (this.isLoaded()) {
      return this.target.length === 0;
    }

    return this.target.length === 0 && !(await this.scope().existsBy());
  }

  public async any(predicate?: RecordPredicate): Promise<boolean> {
    if (!predicate) {
      return !(await this.isEmpty());
    }

    return (await this.loadTarget()).some(predicate);
  }

  public async many(predicate?: RecordPredicate): Promise<boolean> {
    if (!predicate) {
      return (await this.size()) > 1;
    }

    return (await this.loadTarget()).filter(predicate).length > 1;
  }

  /**
   * Number of members, loading the collection unless it is loaded already or
   * the owner has no identity.
   */
  public async size(): Promise<number> {
    if (this.isLoaded() || this.isNullScope()) {
      return this.target.length;
    }

    return (await this.loadTarget()).length;
  }

  /**
   * Whether the record is a member. Records of another type are rejected
   * without querying; unsaved records are looked up in memory.
   */
  public async includes(record: Model): Promise<boolean> {
    if (!this.isRelatedRecord(record)) return false;

    if (record.isNew) {
      return this.target.includes(record);
    }

    if (this.isLoaded()) {
      return this.target.some((member) => this.isSameRecord(member, record));
    }

    const id = record.id;

    if (id === undefined) return false;

    return await this.scope().existsBy(id);
  }

  /**
   * Members matching the predicate (after loading), or every member
   * projected to the given fields (through the scope).
   */
  public async select(predicate: RecordPredicate): Promise<Model[]>;
  public async select(...fields: string[]): Promise<Model[]>;
  public async select(...args: [RecordPredicate] | string[]): Promise<Model[]> {
    const [first] = args;

    if (typeof first === "function") {
      return (await this.loadTarget()).filter(first);
    }

    const fields = args.filter((arg): arg is string => typeof arg === "string");

    return await this.scope().select(...fields);
  }

  // ============================================================================
  // BUILDING
  // ============================================================================

  /**
   * Build unsaved members linked to the owner and add them to the target.
   *
   * @example
   * ```typescript
   * const post = posts.build({ title: "Draft" });
   * const [a, b] = posts.build([{ title: "A" }, { title: "B" }]);
   * ```
   */
  public build(attributes?: ModelAttributes, callback?: RecordCallback): Model;
  public build(attributes: ModelAttributes[], callback?: RecordCallback): Model[];
  public build(
    attributes: ModelAttributes | ModelAttributes[] = {},
    callback?: RecordCallback,
  ): Model | Model[] {
    if (Array.isArray(attributes)) {
      return attributes.map((item) => this.build(item, callback));
    }

    const record = this.buildRecord(attributes);

    callback?.(record);
    this.addToTarget(record);

    return record;
  }

  /**
   * Build and save members. A member failing validation is returned unsaved
   * with its `errors` filled.
   *
   * @throws {RecordNotSavedError} If the owner is not saved
   */
  public async create(attributes?: ModelAttributes, callback?: RecordCallback): Promise<Model>;
  public async create(attributes: ModelAttributes[], callback?: RecordCallback): Promise<Model[]>;
  public async create(
    attributes: ModelAttributes | ModelAttributes[] = {},
    callback?: RecordCallback,
  ): Promise<Model | Model[]> {
    return await this.createRecords(attributes, callback, false);
  }

  /**
   * Build and save members, rolling everything back on the first validation
   * failure.
   *
   * @throws {RecordNotSavedError} If the owner is not saved
   * @throws {RecordInvalidError} If a member fails validation
   */
  public async createOrFail(
    attributes?: ModelAttributes,
    callback?: RecordCallback,
  ): Promise<Model>;
  public async createOrFail(
    attributes: ModelAttributes[],
    callback?: RecordCallback,
  ): Promise<Model[]>;
  public async createOrFail(
    attributes: ModelAttributes | ModelAttributes[] = {},
    callback?: RecordCallback,
  ): Promise<Model | Model[]> {
    return await this.createRecords(attributes, callback, true);
  }

  private async createRecords(
    attributes: ModelAttributes | ModelAttributes[],
    callback: RecordCallback | undefined,
    raise: boolean,
  ): Promise<Model | Model[]> {
    if (!this.owner.isPersisted()) {
      throw new RecordNotSavedError(
        "You cannot call create unless the parent is saved",
        this.owner.constructor.name,
      );
    }

    return await this.atomically([], async () => {
      if (!Array.isArray(attributes)) {
        return await this.createRecord(attributes, callback, raise);
      }

      const records: Model[] = [];

      for (const item of attributes) {
        records.push(await this.createRecord(item, callback, raise));
      }

      return records;
    });
  }

  private async createRecord(
    attributes: ModelAttributes,
    callback: RecordCallback | undefined,
    raise: boolean,
  ): Promise<Model> {
    const record = this.buildRecord(attributes);

    callback?.(record);

    await this.insertRecord(record, raise);
    this.addToTarget(record);

    return record;
  }

  // ============================================================================
  // ADDING & REPLACING
  // ============================================================================

  /**
   * Add records to the collection. Nested lists are flattened.
   *
   * For an unsaved owner the target is loaded and the records appended; they
   * are saved along with the owner. For a saved owner each record is saved
   * with its foreign key set, in one transaction that is rolled back when any
   * record fails validation.
   *
   * @returns `false` if any record could not be saved
   * @throws {TypeMismatchError} If a record is not an instance of the related model
   */
  public async concat(...records: (Model | Model[])[]): Promise<boolean> {
    const list = records.flat();

    if (this.owner.isNew) {
      await this.loadTarget();

      for (const record of list) {
        this.assertRelatedRecord(record);
        this.addToTarget(record);
      }

      return true;
    }

    return await this.rollbackUnless(list, () => this.concatRecords(list));
  }

  public async push(...records: (Model | Model[])[]): Promise<boolean> {
    return await this.concat(...records);
  }

  private async concatRecords(records: Model[]): Promise<boolean> {
    let result = true;

    for (const record of records) {
      this.assertRelatedRecord(record);

      if (!(await this.insertRecord(record, false))) {
        result = false;
      }

      this.addToTarget(record);
    }

    return result;
  }

  /**
   * Make the collection hold exactly the given records, in that order.
   *
   * For a saved owner, members left out are removed (destroyed with
   * `dependent: "destroy"`, detached otherwise) and new records are saved,
   * all in one transaction.
   *
   * @returns `false` if a new record could not be saved; nothing is changed then
   * @throws {TypeMismatchError} If a record is not an instance of the related model
   */
  public async replace(records: Model[]): Promise<boolean> {
    for (const record of records) {
      this.assertRelatedRecord(record);
    }

    if (this.owner.isNew) {
      this.replaceTarget([]);

      for (const record of records) {
        this.addToTarget(record);
      }

      this.markLoaded();

      return true;
    }

    const original = [...(await this.loadTarget())];
    const next = records.map(
      (record) => original.find((member) => this.isSameRecord(member, record)) ?? record,
    );

    const saved = await this.rollbackUnless([...original, ...records], async () => {
      for (const member of original) {
        if (!next.includes(member)) {
          await this.removeRecord(member);
        }
      }

      let result = true;

      for (const record of next) {
        if (original.includes(record)) continue;

        if (!(await this.insertRecord(record, false))) {
          result = false;
        }
      }

      return result;
    });

    if (saved) {
      this.replaceTarget(next);
    }

    this.markLoaded();

    return saved;
  }

  public async writer(records: Model[]): Promise<boolean> {
    return await this.replace(records);
  }

  /**
   * Replace the members by the records with the given primary keys, in the
   * given order. Blank entries are dropped and duplicates collapse.
   *
   * @throws {RecordNotFoundError} If some keys match no record
   */
  public async setIds(ids: IdInput | IdInput[]): Promise<boolean> {
    const list = (Array.isArray(ids) ? ids : [ids]).filter(
      (id): id is PrimaryKeyValue => id != null && String(id).trim() !== "",
    );

    const unique: PrimaryKeyValue[] = [];
    const seen = new Set<string>();

    for (const id of list) {
      if (seen.has(String(id))) continue;

      seen.add(String(id));
      unique.push(id);
    }

    const Related = this.relatedModel();
    const found = await Related.findMany(unique);
    const byId = new Map(found.map((record) => [String(record.id), record]));

    const records: Model[] = [];
    const missing: PrimaryKeyValue[] = [];

    for (const id of unique) {
      const record = byId.get(String(id));

      if (record) {
        records.push(record);
      } else {
        missing.push(id);
      }
    }

    if (missing.length > 0) {
      throw new RecordNotFoundError(Related.name, Related.primaryKey, unique, missing);
    }

    return await this.replace(records);
  }

  public async idsWriter(ids: IdInput | IdInput[]): Promise<boolean> {
    return await this.setIds(ids);
  }

  // ============================================================================
  // AUTOSAVE
  // ============================================================================

  /**
   * Save the unsaved members held in the target, linking them to the owner
   * first. Members being saved already are skipped.
   */
  public async saveTarget(): Promise<void> {
    for (const record of this.target) {
      if (!record.isNew || record.isSaving) continue;

      this.linkInverse(record);
      await record.save();
    }
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  /**
   * Remove a member dropped by `replace`.
   */
  protected abstract removeRecord(record: Model): Promise<void>;

  /**
   * Point the record at the owner: set its foreign key and prime the matching
   * belongs-to relationship on it.
   */
  protected abstract linkInverse(record: Model): void;

  protected buildRecord(attributes: ModelAttributes): Model {
    const Related = this.relatedModel();
    const defaults = this.scope({ nullify: false }).scopeForCreate();
    const record = new Related({ ...this.definedOnly(defaults), ...attributes });

    this.linkInverse(record);

    return record;
  }

  /**
   * Save the record linked to the owner.
   *
   * @returns `false` if the record failed validation and `raise` is off
   */
  protected async insertRecord(record: Model, raise: boolean): Promise<boolean> {
    this.linkInverse(record);

    if (raise) {
      await record.save();
      return true;
    }

    try {
      await record.save();
      return true;
    } catch (error) {
      if (error instanceof RecordInvalidError) {
        return false;
      }

      throw error;
    }
  }

  protected addToTarget(record: Model): void {
    if (this.target.includes(record)) return;

    const index = this.target.findIndex((member) => this.isSameRecord(member, record));

    if (index === -1) {
      this.target.push(record);
    } else {
      this.target[index] = record;
    }
  }

  /**
   * Same class and same primary key; unsaved records only match themselves.
   */
  protected isSameRecord(left: Model, right: Model): boolean {
    if (left === right) return true;

    if (left.constructor !== right.constructor) return false;

    const id = left.id;

    return id !== undefined && String(id) === String(right.id);
  }

  private definedOnly(attributes: ModelAttributes): ModelAttributes {
    return Object.fromEntries(
      Object.entries(attributes).filter(([, value]) => value !== undefined),
    );
  }

  /**
   * Run the work in a transaction. When it rolls back, the target, its status
   * and the given records (plus current members) get their previous in-memory
   * state back; validation errors stay on the records.
   */
  private async atomically<TResult>(
    records: Model[],
    work: () => Promise<TResult>,
  ): Promise<TResult> {
    const state = { ...this.state, target: [...this.target] };
    const snapshots = new Map<Model, ModelSnapshot>();

    for (const record of [...this.target, ...records]) {
      if (!snapshots.has(record)) {
        snapshots.set(record, record.snapshot());
      }
    }

    try {
      return await this.transaction(work);
    } catch (error) {
      for (const [record, snapshot] of snapshots) {
        record.restore(snapshot);
      }

      this.owner.associationStates.set(this.name, state);

      throw error;
    }
  }

  /**
   * Run the work atomically and roll it back when it reports failure.
   */
  private async rollbackUnless(
    records: Model[],
    work: () => Promise<boolean>,
  ): Promise<boolean> {
    try {
      return await this.atomically(records, async () => {
        if (!(await work())) {
          throw new RollbackRequest("Rolled back: a record could not be saved");
        }

        return true;
      });
    } catch (error) {
      if (error instanceof RollbackRequest) {
        return false;
      }

      throw error;
    }
  }
}
