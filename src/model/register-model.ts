import { buildRelations } from "../relations/relation-builder";
import type { ModelConstructor } from "./types";

/**
 * Options for the RegisterModel decorator
 */
export type RegisterModelOptions = {
  /**
   * Name the model is registered under; defaults to the class name.
   *
   * @example
   * ```typescript
   * @RegisterModel({ name: "Writer" })
   * export class User extends Model {}
   * ```
   */
  name?: string;
};

/**
 * Model classes by registered name, used to resolve relations declared with a
 * model name instead of a class.
 */
const modelsRegistry = new Map<string, ModelConstructor>();

/**
 * Class decorator registering a model and building its relationships.
 *
 * Relationship names and options are checked here, at class definition, so
 * a misconfigured model fails before any instance exists.
 *
 * @throws {ConfigurationError} If a relationship declaration is invalid
 *
 * @example
 * ```typescript
 * @RegisterModel()
 * export class User extends Model {
 *   public static table = "users";
 *   public static relations = { posts: hasMany("Post") };
 * }
 *
 * Model.getModel("User"); // User
 * ```
 */
export function RegisterModel(options?: RegisterModelOptions) {
  return function <T extends ModelConstructor>(target: T): T {
    const modelName = options?.name || target.name;

    if (!modelName) {
      throw new Error(
        "@RegisterModel decorator: Unable to determine model name. " +
          "Please provide a name in options or ensure your class has a name.",
      );
    }

    buildRelations(target);
    modelsRegistry.set(modelName, target);

    return target;
  };
}

/**
 * Register a model class without the decorator.
 */
export function registerModelInRegistry(name: string, model: ModelConstructor): void {
  modelsRegistry.set(name, model);
}

/**
 * Get a model class by its registered name.
 */
export function getModelFromRegistry(name: string): ModelConstructor | undefined {
  return modelsRegistry.get(name);
}

/**
 * Get all registered models.
 */
export function getAllModelsFromRegistry(): Map<string, ModelConstructor> {
  return new Map(modelsRegistry);
}

/**
 * Remove every registered model.
 */
export function cleanupModelsRegistry(): void {
  modelsRegistry.clear();
}

export function removeModelFromRegistry(name: string): void {
  modelsRegistry.delete(name);
}
