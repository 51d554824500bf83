import type { PrimaryKeyValue, ScopeContract, WhereObject } from "../contracts";
import type { Model } from "../model/model";
import type { ModelAttributes, ModelConstructor } from "../model/types";

/**
 * Records of a related model matching a fixed filter, e.g. every post whose
 * `authorId` is the owner's id.
 */
export class RelationScope<TModel extends Model> implements ScopeContract<TModel> {
  public readonly isNone = false;

  public constructor(
    private readonly model: ModelConstructor<TModel>,
    private readonly filter: WhereObject,
    private readonly creationAttributes: ModelAttributes = {},
  ) {}

  public async toList(): Promise<TModel[]> {
    return await this.query().get();
  }

  public async pluck(field: string): Promise<unknown[]> {
    return await this.query().pluck(field);
  }

  public async existsBy(idOrFilter?: PrimaryKeyValue | WhereObject): Promise<boolean> {
    const query = this.query();

    if (idOrFilter === undefined) {
      return await query.exists();
    }

    if (typeof idOrFilter === "object") {
      return await query.where(idOrFilter).exists();
    }

    return await query.where(this.model.primaryKey, idOrFilter).exists();
  }

  public async count(): Promise<number> {
    return await this.query().count();
  }

  public async select(...fields: string[]): Promise<TModel[]> {
    return await this.query().select(fields).get();
  }

  public async deleteAll(): Promise<number> {
    const driver = this.model.getDataSource().driver;

    return await driver.deleteMany(this.model.table, this.filter);
  }

  public none(): ScopeContract<TModel> {
    return new EmptyScope<TModel>(this.creationAttributes);
  }

  public scopeForCreate(): ModelAttributes {
    return { ...this.creationAttributes };
  }

  private query() {
    return this.model.query().where(this.filter);
  }
}

/**
 * Scope that matches nothing and never reaches storage. Used while the owner
 * has no identity yet, so its relationships cannot match another owner's
 * records.
 */
export class EmptyScope<TModel extends Model> implements ScopeContract<TModel> {
  public readonly isNone = true;

  public constructor(private readonly creationAttributes: ModelAttributes = {}) {}

  public async toList(): Promise<TModel[]> {
    return [];
  }

  public async pluck(): Promise<unknown[]> {
    return [];
  }

  public async existsBy(): Promise<boolean> {
    return false;
  }

  public async count(): Promise<number> {
    return 0;
  }

  public async select(): Promise<TModel[]> {
    return [];
  }

  public async deleteAll(): Promise<number> {
    return 0;
  }

  public none(): ScopeContract<TModel> {
    return this;
  }

  public scopeForCreate(): ModelAttributes {
    return { ...this.creationAttributes };
  }
}
