/**
 * @fileoverview Relation type definitions.
 *
 * Declarations (`hasMany(...)`, `belongsTo(...)`, `hasOne(...)`) produce
 * `RelationDeclaration` values; the relation builder turns each of them into
 * an immutable `Reflection` stored in the owner's registry.
 */

import type { Model } from "../model/model";
import type { ModelConstructor } from "../model/types";
import type { ResourceConstructor } from "../resource/resource";
import type { EmbedMode } from "../types";
import type { CollectionProxy } from "./collection-proxy";

// ============================================================================
// RELATION TYPES
// ============================================================================

/**
 * The type of relationship between models.
 *
 * - `hasMany`: one-to-many, the foreign key lives on the related model
 * - `belongsTo`: the foreign key lives on this model
 * - `hasOne`: alias of `belongsTo`, for records that point at a single owner
 */
export type RelationType = "belongsTo" | "hasOne" | "hasMany";

/**
 * Cardinality of a relationship.
 */
export type RelationKind = "toOne" | "toMany";

/**
 * What happens to related records when the owner is destroyed.
 *
 * - `restrictWithException`: refuse, throwing `DeleteRestrictionError`
 * - `restrictWithError`: refuse, recording an error on the owner
 * - `destroy`: load and destroy each related record (runs their events)
 * - `deleteAll`: bulk delete without loading
 */
export type DependentPolicy = "restrictWithException" | "restrictWithError" | "destroy" | "deleteAll";

/**
 * Related model, either as a class or as the name it was registered under.
 * Names allow models to reference each other without circular imports.
 */
export type RelatedModelReference = string | ModelConstructor;

// ============================================================================
// RELATION OPTIONS
// ============================================================================

/**
 * Options accepted by every relationship.
 */
export type BaseRelationOptions = {
  /**
   * Value rendered verbatim by resources instead of looking the relation up.
   */
  virtualValue?: unknown;

  /**
   * Whether resources render related records as nested objects or as keys.
   *
   * @default configuration `embed`, falling back to "objects"
   */
  embed?: EmbedMode;

  /**
   * Attributes of the related records omitted by resources.
   */
  except?: string[];

  /**
   * Attributes of the related records kept by resources.
   */
  only?: string[];

  /**
   * Resource class rendering the related record(s).
   */
  serializer?: ResourceConstructor;

  /**
   * Column holding the link.
   *
   * - hasMany: column on the related model, defaults to `{ownerName}Id`
   * - belongsTo/hasOne: column on this model, defaults to `{relationName}Id`
   */
  foreignKey?: string;

  /**
   * Column the foreign key points at.
   *
   * - hasMany: column on this model, defaults to its primary key
   * - belongsTo/hasOne: column on the related model, defaults to its primary key
   */
  localKey?: string;
};

/**
 * Options accepted by collection relationships.
 *
 * @example
 * ```typescript
 * static relations = {
 *   posts: hasMany("Post", { dependent: "destroy", eachSerializer: PostResource }),
 * };
 * ```
 */
export type ToManyRelationOptions = BaseRelationOptions & {
  /**
   * Resource class rendering each member; wins over `serializer`.
   */
  eachSerializer?: ResourceConstructor;

  /**
   * Cascade policy applied when the owner is destroyed. No cascade runs when
   * omitted.
   */
  dependent?: DependentPolicy;
};

export type RelationOptions = BaseRelationOptions | ToManyRelationOptions;

// ============================================================================
// DECLARATIONS
// ============================================================================

/**
 * Value produced by the declaration helpers.
 */
export type RelationDeclaration =
  | {
      readonly type: "hasMany";
      readonly model: RelatedModelReference;
      readonly options: ToManyRelationOptions;
    }
  | {
      readonly type: "belongsTo" | "hasOne";
      readonly model: RelatedModelReference;
      readonly options: BaseRelationOptions;
    };

/**
 * Shape of a model's `static relations`.
 */
export type RelationsDeclaration = Record<string, RelationDeclaration>;

/**
 * Value produced by reading a relationship: a collection proxy for to-many
 * relationships, the related model (or `null`) for to-one relationships.
 */
export type RelationValue = CollectionProxy | Model | null;
