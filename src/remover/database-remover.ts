import type { DriverContract } from "../contracts/database-driver.contract";
import type {
  RemoverContract,
  RemoverOptions,
  RemoverResult,
} from "../contracts/database-remover.contract";
import type { DataSource } from "../data-source/data-source";
import type { Model } from "../model/model";
import type { ModelConstructor } from "../model/types";
import type { Reflection } from "../relations/reflection";
import { logAssociation } from "../utils/association-logger";

/**
 * Raised inside the destroy transaction when a dependency halts the deletion,
 * so whatever earlier dependencies already removed is rolled back.
 */
class DestroyHalted extends Error {
  public constructor() {
    super("Destroy halted by a dependent association");
    this.name = "DestroyHalted";
  }
}

/**
 * Database remover service that orchestrates model deletion.
 *
 * Handles the complete deletion pipeline:
 * 1. Ensure the model is persisted and has a primary key
 * 2. Apply the `dependent` policy of every has-many relationship
 * 3. Emit `deleting`
 * 4. Delete the record through the driver
 * 5. Flag the model as destroyed and emit `deleted`
 *
 * Steps 2 to 5 share one transaction when any dependency is declared.
 */
export class DatabaseRemover implements RemoverContract {
  private readonly model: Model;
  private readonly ctor: ModelConstructor;
  private readonly dataSource: DataSource;
  private readonly driver: DriverContract;

  public constructor(model: Model) {
    this.model = model;
    this.ctor = model.self();
    this.dataSource = this.ctor.getDataSource();
    this.driver = this.dataSource.driver;
  }

  public async destroy(options: RemoverOptions = {}): Promise<RemoverResult> {
    if (!this.model.isPersisted()) {
      throw new Error(
        `Cannot destroy ${this.ctor.name} instance that hasn't been saved to the database.`,
      );
    }

    const id = this.model.id;

    if (id === undefined) {
      throw new Error(
        `Cannot destroy ${this.ctor.name}: primary key "${this.ctor.primaryKey}" is missing.`,
      );
    }

    const dependents = this.ctor
      .reflections()
      .collections()
      .filter((reflection) => reflection.dependent !== undefined);

    this.model.errors = [];

    if (dependents.length === 0) {
      return await this.performDestroy(id, dependents, options);
    }

    try {
      return await this.dataSource.transaction(() =>
        this.performDestroy(id, dependents, options),
      );
    } catch (error) {
      if (error instanceof DestroyHalted) {
        return { success: false, deletedCount: 0 };
      }

      throw error;
    }
  }

  private async performDestroy(
    id: string | number,
    dependents: Reflection[],
    options: RemoverOptions,
  ): Promise<RemoverResult> {
    for (const reflection of dependents) {
      const association = this.model.collectionAssociation(reflection.name);

      if (!(await association.handleDependency())) {
        logAssociation(
          "dependent",
          `Destroy of ${this.ctor.name} #${id} halted by "${reflection.name}"`,
        );

        throw new DestroyHalted();
      }
    }

    if (!options.skipEvents) {
      await this.model.emitEvent("deleting");
    }

    const deletedCount = await this.driver.delete(this.ctor.table, {
      [this.ctor.primaryKey]: id,
    });

    if (deletedCount === 0) {
      throw new Error(`${this.ctor.name} #${id} was not found in "${this.ctor.table}".`);
    }

    this.model.isNew = true;
    this.model.isDestroyed = true;

    if (!options.skipEvents) {
      await this.model.emitEvent("deleted", { deletedCount });
    }

    return { success: true, deletedCount };
  }
}
