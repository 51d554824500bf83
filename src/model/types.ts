import type { AssociationState } from "../relations/association-state";
import type { Model } from "./model";

/**
 * Raw attribute bag backing a model instance.
 */
export type ModelAttributes = Record<string, unknown>;

/**
 * In-memory state of a model taken before a transaction, put back when the
 * transaction rolls back.
 */
export type ModelSnapshot = {
  data: ModelAttributes;
  original: ModelAttributes;
  isNew: boolean;
  isDestroyed: boolean;
  associationStates: Map<string, AssociationState>;
};

/**
 * A single validation or cascade error recorded on a model.
 *
 * `input` is the attribute name, or `"base"` for errors about the record as a
 * whole (e.g. a `restrictWithError` cascade).
 */
export type ModelError = {
  input: string;
  error: string;
  type?: string;
};

/**
 * Concrete model class, as accepted by relation declarations and the
 * association runtime.
 */
export type ModelConstructor<TModel extends Model = Model> = (new (
  attributes?: ModelAttributes,
) => TModel) &
  Pick<
    typeof Model,
    | "table"
    | "primaryKey"
    | "dataSource"
    | "schema"
    | "strictMode"
    | "relations"
    | "resource"
    | "getDataSource"
    | "query"
    | "find"
    | "findMany"
    | "create"
    | "transaction"
    | "events"
    | "reflections"
    | "reflectOnAssociation"
    | "relationAccessors"
  >;

/**
 * Whether the value is a model class.
 */
export function isModelConstructor(value: unknown): value is ModelConstructor {
  return typeof value === "function" && "primaryKey" in value && "relations" in value;
}
