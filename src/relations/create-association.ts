import type { Model } from "../model/model";
import { BelongsToAssociation } from "./belongs-to-association";
import { HasManyAssociation } from "./has-many-association";
import type { Reflection } from "./reflection";

/**
 * Every concrete association runtime.
 */
export type AnyAssociation = BelongsToAssociation | HasManyAssociation;

/**
 * Build the runtime of a relationship for one owner instance.
 */
export function createAssociation(owner: Model, reflection: Reflection): AnyAssociation {
  switch (reflection.type) {
    case "hasMany":
      return new HasManyAssociation(owner, reflection);
    case "belongsTo":
    case "hasOne":
      return new BelongsToAssociation(owner, reflection);
  }
}
