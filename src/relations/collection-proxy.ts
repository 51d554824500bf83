import type { Model } from "../model/model";
import type { ModelAttributes } from "../model/types";
import type {
  CollectionAssociation,
  IdInput,
  RecordCallback,
  RecordPredicate,
} from "./collection-association";

/**
 * Caller-facing view of a collection relationship.
 *
 * Every operation delegates to the association runtime; reading methods load
 * the collection lazily, on first use.
 *
 * @example
 * ```typescript
 * const posts = await user.related("posts");
 *
 * if (posts instanceof CollectionProxy) {
 *   await posts.push(new Post({ title: "Hello" }));
 *   const titles = (await posts.toArray()).map((post) => post.get("title"));
 * }
 * ```
 */
export class CollectionProxy {
  public constructor(public readonly association: CollectionAssociation) {}

  /**
   * Every member, loading the collection if needed.
   */
  public async toArray(): Promise<Model[]> {
    return [...(await this.association.loadTarget())];
  }

  public async first(): Promise<Model | null> {
    const [record] = await this.toArray();

    return record ?? null;
  }

  /**
   * Number of members currently held, without loading anything.
   */
  public get length(): number {
    return this.association.target.length;
  }

  public isLoaded(): boolean {
    return this.association.isLoaded();
  }

  public async size(): Promise<number> {
    return await this.association.size();
  }

  public async isEmpty(): Promise<boolean> {
    return await this.association.isEmpty();
  }

  public async any(predicate?: RecordPredicate): Promise<boolean> {
    return await this.association.any(predicate);
  }

  public async many(predicate?: RecordPredicate): Promise<boolean> {
    return await this.association.many(predicate);
  }

  public async includes(record: Model): Promise<boolean> {
    return await this.association.includes(record);
  }

  public async ids(): Promise<unknown[]> {
    return await this.association.ids();
  }

  public async setIds(ids: IdInput | IdInput[]): Promise<boolean> {
    return await this.association.setIds(ids);
  }

  public build(attributes?: ModelAttributes, callback?: RecordCallback): Model;
  public build(attributes: ModelAttributes[], callback?: RecordCallback): Model[];
  public build(
    attributes: ModelAttributes | ModelAttributes[] = {},
    callback?: RecordCallback,
  ): Model | Model[] {
    return Array.isArray(attributes)
      ? this.association.build(attributes, callback)
      : this.association.build(attributes, callback);
  }

  public async create(attributes?: ModelAttributes, callback?: RecordCallback): Promise<Model>;
  public async create(attributes: ModelAttributes[], callback?: RecordCallback): Promise<Model[]>;
  public async create(
    attributes: ModelAttributes | ModelAttributes[] = {},
    callback?: RecordCallback,
  ): Promise<Model | Model[]> {
    return Array.isArray(attributes)
      ? await this.association.create(attributes, callback)
      : await this.association.create(attributes, callback);
  }

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
    return Array.isArray(attributes)
      ? await this.association.createOrFail(attributes, callback)
      : await this.association.createOrFail(attributes, callback);
  }

  /**
   * Add records; resolves to this proxy, or `false` when a record could not
   * be saved.
   */
  public async concat(...records: (Model | Model[])[]): Promise<this | false> {
    return (await this.association.concat(...records)) ? this : false;
  }

  public async push(...records: (Model | Model[])[]): Promise<this | false> {
    return await this.concat(...records);
  }

  public async replace(records: Model[]): Promise<boolean> {
    return await this.association.replace(records);
  }

  public async select(predicate: RecordPredicate): Promise<Model[]>;
  public async select(...fields: string[]): Promise<Model[]>;
  public async select(...args: [RecordPredicate] | string[]): Promise<Model[]> {
    const [first] = args;

    if (typeof first === "function") {
      return await this.association.select(first);
    }

    return await this.association.select(
      ...args.filter((arg): arg is string => typeof arg === "string"),
    );
  }

  /**
   * Reload the members from storage.
   */
  public async reload(): Promise<this> {
    await this.association.reload();
    return this;
  }

  /**
   * Forget the loaded members; storage is untouched.
   */
  public reset(): this {
    this.association.reset();
    return this;
  }
}
