import { ConfigurationError } from "../errors/configuration.error";
import { getModelFromRegistry } from "../model/register-model";
import type { ModelConstructor } from "../model/types";
import type {
  DependentPolicy,
  RelatedModelReference,
  RelationKind,
  RelationType,
  ToManyRelationOptions,
} from "./types";

/**
 * Parameters of a reflection.
 */
export type ReflectionParams = {
  type: RelationType;
  name: string;
  owner: ModelConstructor;
  model: RelatedModelReference;
  options: ToManyRelationOptions;
};

/**
 * Immutable description of one declared relationship.
 *
 * A reflection is created once per declaration and shared, read-only, by
 * every association runtime built against it. Keys that depend on the
 * related model are resolved on demand so models may reference each other
 * by name before both are defined.
 *
 * @example
 * ```typescript
 * const reflection = User.reflectOnAssociation("posts");
 * reflection.kind; // "toMany"
 * reflection.foreignKey; // "userId"
 * reflection.relatedModel(); // Post
 * ```
 */
export class Reflection {
  public readonly type: RelationType;
  public readonly kind: RelationKind;
  public readonly name: string;
  public readonly owner: ModelConstructor;
  public readonly options: Readonly<ToManyRelationOptions>;
  private readonly model: RelatedModelReference;

  public constructor(params: ReflectionParams) {
    this.type = params.type;
    this.kind = params.type === "hasMany" ? "toMany" : "toOne";
    this.name = params.name;
    this.owner = params.owner;
    this.model = params.model;
    this.options = Object.freeze({ ...params.options });

    Object.freeze(this);
  }

  public get isCollection(): boolean {
    return this.kind === "toMany";
  }

  /**
   * Name of the related model class.
   */
  public get relatedModelName(): string {
    return typeof this.model === "string" ? this.model : this.model.name;
  }

  /**
   * Resolve the related model class.
   *
   * @throws {ConfigurationError} If the model was declared by a name that is not registered
   */
  public relatedModel(): ModelConstructor {
    if (typeof this.model !== "string") {
      return this.model;
    }

    const model = getModelFromRegistry(this.model);

    if (!model) {
      throw new ConfigurationError(
        `Model "${this.model}" used by relation "${this.name}" of ${this.owner.name} is not registered. ` +
          `Decorate it with @RegisterModel().`,
        this.name,
      );
    }

    return model;
  }

  /**
   * Whether the related model is the given class.
   */
  public pointsAt(model: ModelConstructor): boolean {
    if (typeof this.model !== "string") {
      return this.model === model;
    }

    return this.model === model.name || getModelFromRegistry(this.model) === model;
  }

  /**
   * Column holding the link: on the related model for has-many, on the
   * owner otherwise.
   */
  public get foreignKey(): string {
    if (this.options.foreignKey) {
      return this.options.foreignKey;
    }

    if (this.kind === "toMany") {
      const ownerName = this.owner.name;
      return `${ownerName.charAt(0).toLowerCase()}${ownerName.slice(1)}Id`;
    }

    return `${this.name}Id`;
  }

  /**
   * Column the foreign key points at: on the owner for has-many, on the
   * related model otherwise.
   */
  public get localKey(): string {
    if (this.options.localKey) {
      return this.options.localKey;
    }

    return this.kind === "toMany" ? this.owner.primaryKey : this.relatedModel().primaryKey;
  }

  public get dependent(): DependentPolicy | undefined {
    return this.options.dependent;
  }
}
