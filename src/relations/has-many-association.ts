import { areEqual } from "@mongez/reinforcements";
import type { WhereObject } from "../contracts";
import { DeleteRestrictionError } from "../errors/delete-restriction.error";
import type { Model } from "../model/model";
import type { ModelAttributes } from "../model/types";
import { logAssociation } from "../utils/association-logger";
import { CollectionAssociation } from "./collection-association";
import type { Reflection } from "./reflection";

/**
 * Runtime of a has-many relationship: the foreign key lives on the related
 * records and points at the owner's local key.
 *
 * @example
 * ```typescript
 * const posts = user.collectionAssociation("posts");
 *
 * await posts.isEmpty(); // existence query, nothing loaded
 * posts.build({ title: "Draft" });
 * await posts.create({ title: "Published" });
 * await posts.setIds([3, 1]);
 * ```
 */
export class HasManyAssociation extends CollectionAssociation {
  public readonly type = "hasMany";

  public linkingValue(): unknown {
    return this.owner.get(this.reflection.localKey);
  }

  protected scopeFilter(): WhereObject {
    return { [this.reflection.foreignKey]: this.linkingValue() };
  }

  protected creationAttributes(): ModelAttributes {
    return { [this.reflection.foreignKey]: this.linkingValue() };
  }

  protected linkInverse(record: Model): void {
    const foreignKey = this.reflection.foreignKey;
    const key = this.linkingValue();

    if (key !== undefined && !areEqual(record.get(foreignKey), key)) {
      record.set(foreignKey, key);
    }

    const inverse = this.inverseReflection(record);

    if (inverse) {
      record.associationStates.set(inverse.name, {
        status: "loaded",
        target: [this.owner],
        snapshot: record.get(foreignKey),
      });
    }
  }

  /**
   * Belongs-to relationship of the related model pointing back at the owner
   * through the same foreign key.
   */
  public inverseReflection(record: Model): Reflection | undefined {
    const ownerModel = this.owner.self();

    return record
      .self()
      .reflections()
      .all()
      .find(
        (reflection) =>
          !reflection.isCollection &&
          reflection.foreignKey === this.reflection.foreignKey &&
          reflection.pointsAt(ownerModel),
      );
  }

  protected async removeRecord(record: Model): Promise<void> {
    if (this.reflection.dependent === "destroy") {
      record.destroyedByAssociation = this.reflection;
      await record.destroy();
      return;
    }

    record.unset(this.reflection.foreignKey);

    const inverse = this.inverseReflection(record);

    if (inverse) {
      record.associationStates.delete(inverse.name);
    }

    if (record.isPersisted()) {
      await record.save();
    }
  }

  /**
   * Apply the `dependent` policy before the owner is deleted.
   *
   * @returns `false` when deletion must not proceed (`restrictWithError`)
   * @throws {DeleteRestrictionError} With `restrictWithException` when members exist
   */
  public async handleDependency(): Promise<boolean> {
    const policy = this.reflection.dependent;

    switch (policy) {
      case "restrictWithException":
        if (!(await this.isEmpty())) {
          throw new DeleteRestrictionError(this.name);
        }

        return true;

      case "restrictWithError":
        if (!(await this.isEmpty())) {
          this.owner.addError(
            "base",
            `Cannot delete record because dependent ${this.name} exist`,
            "restrictDependentDestroy",
          );

          return false;
        }

        return true;

      case "destroy": {
        const records = [...(await this.loadTarget())];

        for (const record of records) {
          if (!record.isPersisted()) continue;

          record.destroyedByAssociation = this.reflection;
          await record.destroy();
        }

        this.reset();

        logAssociation("dependent", `Destroyed ${records.length} ${this.name} record(s)`);

        return true;
      }

      case "deleteAll": {
        const deletedCount = await this.scope().deleteAll();

        this.reset();

        logAssociation("dependent", `Deleted ${deletedCount} ${this.name} record(s)`);

        return true;
      }

      default:
        return true;
    }
  }
}
