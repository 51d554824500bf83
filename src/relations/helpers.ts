/**
 * @fileoverview Helper functions for declaring model relationships.
 *
 * @example
 * ```typescript
 * import { belongsTo, hasMany, Model } from "model-associations";
 *
 * class User extends Model {
 *   static relations = {
 *     posts: hasMany("Post", { dependent: "destroy" }),
 *     team: belongsTo("Team"),
 *   };
 * }
 * ```
 */

import { ConfigurationError } from "../errors/configuration.error";
import type { EmbedMode } from "../types";
import type {
  BaseRelationOptions,
  DependentPolicy,
  RelatedModelReference,
  RelationDeclaration,
  RelationType,
  ToManyRelationOptions,
} from "./types";

/**
 * Option keys every relationship accepts.
 */
export const BASE_OPTION_KEYS: readonly string[] = [
  "virtualValue",
  "embed",
  "except",
  "only",
  "serializer",
  "foreignKey",
  "localKey",
];

/**
 * Option keys collection relationships accept.
 */
export const TO_MANY_OPTION_KEYS: readonly string[] = [
  ...BASE_OPTION_KEYS,
  "eachSerializer",
  "dependent",
];

const DEPENDENT_POLICIES: readonly DependentPolicy[] = [
  "restrictWithException",
  "restrictWithError",
  "destroy",
  "deleteAll",
];

const EMBED_MODES: readonly EmbedMode[] = ["objects", "ids"];

/**
 * Check relationship options against the allow-list of the relationship type.
 *
 * @throws {ConfigurationError} On an unknown key or an unsupported value
 */
export function validateRelationOptions(
  type: RelationType,
  options: object,
  relationName?: string,
): void {
  const allowed = type === "hasMany" ? TO_MANY_OPTION_KEYS : BASE_OPTION_KEYS;
  const unknownKeys = Object.keys(options).filter((key) => !allowed.includes(key));

  if (unknownKeys.length > 0) {
    throw new ConfigurationError(
      `Unknown option${unknownKeys.length > 1 ? "s" : ""} ${unknownKeys
        .map((key) => `"${key}"`)
        .join(", ")} for ${type} relation${relationName ? ` "${relationName}"` : ""}. ` +
        `Allowed options: ${allowed.join(", ")}.`,
      relationName,
    );
  }

  const values: Record<string, unknown> = Object.fromEntries(Object.entries(options));
  const { dependent, embed } = values;

  if (dependent !== undefined && !DEPENDENT_POLICIES.some((policy) => policy === dependent)) {
    throw new ConfigurationError(
      `Invalid dependent policy "${String(dependent)}". ` +
        `Expected one of: ${DEPENDENT_POLICIES.join(", ")}.`,
      relationName,
    );
  }

  if (embed !== undefined && !EMBED_MODES.some((mode) => mode === embed)) {
    throw new ConfigurationError(
      `Invalid embed mode "${String(embed)}". Expected "objects" or "ids".`,
      relationName,
    );
  }
}

// ============================================================================
// HAS MANY
// ============================================================================

/**
 * Declare a one-to-many relationship. The foreign key is stored on the
 * related model.
 *
 * @param model - Related model class or registered name
 *
 * @example
 * ```typescript
 * static relations = {
 *   posts: hasMany("Post"),
 *   comments: hasMany(Comment, { foreignKey: "writerId", dependent: "deleteAll" }),
 * };
 * ```
 */
export function hasMany(
  model: RelatedModelReference,
  options: ToManyRelationOptions = {},
): RelationDeclaration {
  validateRelationOptions("hasMany", options);

  return { type: "hasMany", model, options };
}

// ============================================================================
// BELONGS TO
// ============================================================================

/**
 * Declare that this model points at a single related record through one of
 * its own columns.
 *
 * @example
 * ```typescript
 * // Post.authorId references User.id
 * static relations = {
 *   author: belongsTo("User", { foreignKey: "authorId" }),
 * };
 * ```
 */
export function belongsTo(
  model: RelatedModelReference,
  options: BaseRelationOptions = {},
): RelationDeclaration {
  validateRelationOptions("belongsTo", options);

  return { type: "belongsTo", model, options };
}

/**
 * Alias of `belongsTo`; the foreign key lives on this model.
 */
export function hasOne(
  model: RelatedModelReference,
  options: BaseRelationOptions = {},
): RelationDeclaration {
  validateRelationOptions("hasOne", options);

  return { type: "hasOne", model, options };
}
