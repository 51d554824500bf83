export type {
  BaseRelationOptions,
  DependentPolicy,
  RelatedModelReference,
  RelationDeclaration,
  RelationKind,
  RelationOptions,
  RelationsDeclaration,
  RelationType,
  RelationValue,
  ToManyRelationOptions,
} from "./types";

export { belongsTo, hasMany, hasOne, validateRelationOptions } from "./helpers";

export * from "./association";
export * from "./association-state";
export * from "./belongs-to-association";
export * from "./collection-association";
export * from "./collection-proxy";
export * from "./create-association";
export * from "./has-many-association";
export * from "./reflection";
export * from "./reflection-registry";
export * from "./relation-builder";
export * from "./relation-scope";
