import { except, only } from "@mongez/reinforcements";
import { getAssociationsConfig } from "../config";
import type { Model } from "../model/model";
import type { ModelAttributes } from "../model/types";
import type { Reflection } from "../relations/reflection";
import type { EmbedMode } from "../types";

/**
 * Resource class accepted by `serializer` and `eachSerializer`.
 */
export type ResourceConstructor = new (model: Model) => Resource;

/**
 * Key under which ids of a to-many relationship are rendered.
 *
 * @example
 * ```typescript
 * idsKey("posts"); // "postIds"
 * idsKey("categories"); // "categoryIds"
 * ```
 */
export function idsKey(relationName: string): string {
  if (relationName.endsWith("ies")) {
    return `${relationName.slice(0, -3)}yIds`;
  }

  if (relationName.endsWith("s")) {
    return `${relationName.slice(0, -1)}Ids`;
  }

  return `${relationName}Ids`;
}

/**
 * Renders a model and its declared relationships into a plain object.
 *
 * Attributes are filtered by the `only`/`except` lists of the resource;
 * each relationship is rendered according to its declaration options:
 * `virtualValue`, `embed`, `only`, `except`, `serializer` and
 * `eachSerializer`.
 *
 * @example
 * ```typescript
 * class UserResource extends Resource {
 *   protected except = ["password"];
 * }
 *
 * await new UserResource(user).serialize();
 * // { id: 1, name: "Alice", posts: [{ id: 3, title: "Hello", userId: 1 }] }
 * ```
 */
export class Resource {
  /**
   * Attributes kept in the output; every attribute when empty.
   */
  protected only: string[] = [];

  /**
   * Attributes and relationships left out of the output.
   */
  protected except: string[] = [];

  public constructor(public readonly model: Model) {}

  public async serialize(): Promise<ModelAttributes> {
    const output = this.filterAttributes(this.model.data, this.only, this.except);

    for (const reflection of this.model.self().reflections().all()) {
      if (this.except.includes(reflection.name)) continue;

      await this.renderRelation(reflection, output);
    }

    return output;
  }

  protected async renderRelation(reflection: Reflection, output: ModelAttributes): Promise<void> {
    const options = reflection.options;

    if (options.virtualValue !== undefined) {
      output[reflection.name] = options.virtualValue;
      return;
    }

    const embed: EmbedMode = options.embed ?? getAssociationsConfig("embed") ?? "objects";

    if (reflection.isCollection) {
      const association = this.model.collectionAssociation(reflection.name);

      if (embed === "ids") {
        const ids = await association.ids();

        output[idsKey(reflection.name)] = ids.map((id) => id ?? null);
        return;
      }

      const records = await association.loadTarget();
      const serializer = options.eachSerializer ?? options.serializer;

      output[reflection.name] = await Promise.all(
        records.map((record) => this.renderRecord(record, reflection, serializer)),
      );

      return;
    }

    const record = await this.model.singularAssociation(reflection.name).reader();

    if (embed === "ids") {
      output[`${reflection.name}Id`] = record?.id ?? null;
      return;
    }

    output[reflection.name] = record
      ? await this.renderRecord(record, reflection, options.serializer)
      : null;
  }

  /**
   * Render one related record: through its resource class when one is
   * declared, otherwise as its filtered attributes (no nested relationships).
   */
  protected async renderRecord(
    record: Model,
    reflection: Reflection,
    serializer?: ResourceConstructor,
  ): Promise<ModelAttributes> {
    if (serializer) {
      return await new serializer(record).serialize();
    }

    return this.filterAttributes(
      record.data,
      reflection.options.only ?? [],
      reflection.options.except ?? [],
    );
  }

  protected filterAttributes(
    data: ModelAttributes,
    onlyColumns: string[],
    exceptColumns: string[],
  ): ModelAttributes {
    const kept: ModelAttributes = onlyColumns.length > 0 ? only(data, onlyColumns) : { ...data };

    return exceptColumns.length > 0 ? except(kept, exceptColumns) : kept;
  }
}
