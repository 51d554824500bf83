import { ConfigurationError } from "../errors/configuration.error";
import { TypeMismatchError } from "../errors/type-mismatch.error";
import type { Model } from "../model/model";
import { isModelConstructor, type ModelConstructor } from "../model/types";
import { createAssociation } from "./create-association";
import { validateRelationOptions } from "./helpers";
import { Reflection } from "./reflection";
import { ReflectionRegistry } from "./reflection-registry";
import type { RelationDeclaration, RelationValue } from "./types";

/**
 * Entry of a model class accessor table.
 *
 * - `read`: resolve the relationship (collection proxy or related model)
 * - `write`: assign it (`replace` for collections)
 * - `readRaw`: the value stored under the relationship name without
 *   resolving anything; a getter or method the class already defines under
 *   that name is preserved and used here
 */
export type RelationAccessor = {
  readonly reflection: Reflection;
  read(owner: Model, forceReload?: boolean): Promise<RelationValue>;
  write(owner: Model, value: Model | Model[] | null): Promise<void>;
  readRaw(owner: Model): unknown;
};

/**
 * Registry and accessor table of one model class.
 */
export type RelationTable = {
  readonly registry: ReflectionRegistry;
  readonly accessors: ReadonlyMap<string, RelationAccessor>;
};

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

const relationTables = new WeakMap<object, RelationTable>();

/**
 * Validate one declaration and turn it into a reflection.
 *
 * @throws {ConfigurationError} On an invalid name or option
 */
export function buildReflection(
  owner: ModelConstructor,
  name: string,
  declaration: RelationDeclaration,
): Reflection {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new ConfigurationError(
      `Invalid relation name "${name}" on ${owner.name}: names must be plain identifiers.`,
      name,
    );
  }

  validateRelationOptions(declaration.type, declaration.options, name);

  return new Reflection({
    type: declaration.type,
    name,
    owner,
    model: declaration.model,
    options: declaration.options,
  });
}

/**
 * Build the registry and accessor table of a model class, once.
 *
 * Inherited relationships come from the parent class table, which is built
 * first when needed.
 */
export function buildRelations(owner: ModelConstructor): RelationTable {
  const existing = relationTables.get(owner);

  if (existing) return existing;

  const parent: unknown = Object.getPrototypeOf(owner);
  const parentTable = isModelConstructor(parent) ? buildRelations(parent) : undefined;

  const own: Reflection[] = [];

  if (Object.prototype.hasOwnProperty.call(owner, "relations")) {
    for (const [name, declaration] of Object.entries(owner.relations)) {
      own.push(buildReflection(owner, name, declaration));
    }
  }

  const accessors = new Map(parentTable?.accessors);

  for (const reflection of own) {
    accessors.set(reflection.name, createAccessor(owner, reflection));
  }

  const table: RelationTable = {
    registry: ReflectionRegistry.compose(parentTable?.registry, own),
    accessors,
  };

  relationTables.set(owner, table);

  return table;
}

/**
 * Relation table of a model class, built on first use for classes that were
 * not decorated with `@RegisterModel()`.
 */
export function getRelationTable(owner: ModelConstructor): RelationTable {
  return relationTables.get(owner) ?? buildRelations(owner);
}

function createAccessor(owner: ModelConstructor, reflection: Reflection): RelationAccessor {
  const existingMember = findMember(owner.prototype, reflection.name);

  return {
    reflection,
    async read(model, forceReload = false) {
      const association = createAssociation(model, reflection);

      return await association.reader(forceReload);
    },
    async write(model, value) {
      const association = createAssociation(model, reflection);

      if (association.type === "hasMany") {
        if (!Array.isArray(value)) {
          throw new TypeMismatchError(reflection.name, "An array of records", describe(value));
        }

        await association.writer(value);
        return;
      }

      if (Array.isArray(value)) {
        throw new TypeMismatchError(reflection.name, "A single record", "an array");
      }

      await association.writer(value);
    },
    readRaw(model) {
      if (existingMember) {
        return existingMember.call(model);
      }

      return model.get(reflection.name);
    },
  };
}

/**
 * Getter or method defined under the given name on the class prototype chain.
 */
function findMember(prototype: object, name: string): ((this: Model) => unknown) | undefined {
  let current: object | null = prototype;

  while (current && current !== Object.prototype) {
    const descriptor = Object.getOwnPropertyDescriptor(current, name);

    if (descriptor?.get) {
      const getter = descriptor.get;
      return function (this: Model) {
        return getter.call(this);
      };
    }

    if (descriptor && typeof descriptor.value === "function") {
      const method: (this: Model) => unknown = descriptor.value;
      return method;
    }

    current = Object.getPrototypeOf(current);
  }

  return undefined;
}

function describe(value: unknown): string {
  if (value === null) return "null";

  return typeof value === "object" ? value.constructor.name : typeof value;
}
