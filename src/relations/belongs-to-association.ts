import { areEqual } from "@mongez/reinforcements";
import type { WhereObject } from "../contracts";
import type { Model } from "../model/model";
import { Association } from "./association";
import type { Reflection } from "./reflection";

/**
 * Runtime of a belongs-to (or has-one) relationship: the owner holds the
 * foreign key pointing at a single related record.
 *
 * @example
 * ```typescript
 * const author = post.singularAssociation("author");
 * await author.reader(); // User | null
 * author.writer(otherUser); // sets post.authorId
 * ```
 */
export class BelongsToAssociation extends Association {
  public readonly type: "belongsTo" | "hasOne";

  public constructor(owner: Model, reflection: Reflection) {
    super(owner, reflection);
    this.type = reflection.type === "hasOne" ? "hasOne" : "belongsTo";
  }

  public linkingValue(): unknown {
    return this.owner.get(this.reflection.foreignKey);
  }

  public foreignKeyPresent(): boolean {
    return this.linkingValue() != null;
  }

  public findTarget(): boolean {
    return !this.isLoaded() && this.foreignKeyPresent();
  }

  protected scopeFilter(): WhereObject {
    return { [this.reflection.localKey]: this.linkingValue() };
  }

  /**
   * The related record, or `null` when the owner has no foreign key value.
   */
  public async reader(forceReload = false): Promise<Model | null> {
    this.refreshState();

    if (forceReload || this.isStale()) {
      this.reset();
    }

    if (!this.isLoaded()) {
      await this.loadTarget();
    }

    return this.target[0] ?? null;
  }

  public async loadTarget(): Promise<Model | null> {
    if (this.findTarget()) {
      const [record] = await this.scope().toList();

      this.replaceTarget(record ? [record] : []);
    }

    this.markLoaded();

    return this.target[0] ?? null;
  }

  /**
   * Point the owner at the record, or clear the link with `null`. An unsaved
   * record gets saved, and linked, when the owner is saved.
   *
   * @throws {TypeMismatchError} If the record is not an instance of the related model
   */
  public writer(record: Model | null): void {
    const foreignKey = this.reflection.foreignKey;

    if (record === null) {
      if (this.owner.has(foreignKey)) {
        this.owner.unset(foreignKey);
      }

      this.replaceTarget([]);
      this.markLoaded();

      return;
    }

    this.assertRelatedRecord(record);

    const key = record.get(this.reflection.localKey);

    if (key === undefined) {
      if (this.owner.has(foreignKey)) {
        this.owner.unset(foreignKey);
      }
    } else if (!areEqual(this.owner.get(foreignKey), key)) {
      this.owner.set(foreignKey, key);
    }

    this.replaceTarget([record]);
    this.markLoaded();
  }

  /**
   * Save an unsaved target and copy its key onto the owner. Runs before the
   * owner itself is saved.
   */
  public async saveTarget(): Promise<void> {
    const [record] = this.target;

    if (!record) return;

    if (record.isNew && !record.isSaving) {
      await record.save();
    }

    const key = record.get(this.reflection.localKey);

    if (key !== undefined && !areEqual(this.owner.get(this.reflection.foreignKey), key)) {
      this.owner.set(this.reflection.foreignKey, key);
    }

    if (this.isLoaded() || this.isStale()) {
      this.markLoaded();
    }
  }
}
