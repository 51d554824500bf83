import { areEqual } from "@mongez/reinforcements";
import type { ScopeContract, WhereObject } from "../contracts";
import { TypeMismatchError } from "../errors/type-mismatch.error";
import type { Model } from "../model/model";
import type { ModelAttributes, ModelConstructor } from "../model/types";
import { logAssociation } from "../utils/association-logger";
import {
  createAssociationState,
  transition,
  type AssociationEvent,
  type AssociationState,
} from "./association-state";
import type { Reflection } from "./reflection";
import { EmptyScope, RelationScope } from "./relation-scope";

/**
 * Options of `scope()`.
 */
export type ScopeOptions = {
  /**
   * Return an empty scope while the owner has no identity.
   *
   * @default true
   */
  nullify?: boolean;
};

/**
 * Runtime of one relationship bound to one owner instance.
 *
 * Runtimes are transient: they are created on every access and keep their
 * state on the owner (`owner.associationStates`), so creating one is cheap.
 * Creating a runtime checks whether the owner's linking attribute changed
 * since the last load and marks the state stale if so.
 */
export abstract class Association {
  public readonly owner: Model;
  public readonly reflection: Reflection;

  public constructor(owner: Model, reflection: Reflection) {
    this.owner = owner;
    this.reflection = reflection;

    this.refreshState();
  }

  /**
   * Value of the owner's attribute the relationship hangs on: the local key
   * for has-many, the foreign key for belongs-to.
   */
  public abstract linkingValue(): unknown;

  /**
   * Filter matching the related records.
   */
  protected abstract scopeFilter(): WhereObject;

  /**
   * Attributes new related records start with.
   */
  protected creationAttributes(): ModelAttributes {
    return {};
  }

  public get name(): string {
    return this.reflection.name;
  }

  /**
   * State stored on the owner, created on first access.
   */
  protected get state(): AssociationState {
    let state = this.owner.associationStates.get(this.name);

    if (!state) {
      state = createAssociationState(this.linkingValue());
      this.owner.associationStates.set(this.name, state);
    }

    return state;
  }

  /**
   * Records currently held, loaded or built.
   */
  public get target(): Model[] {
    return this.state.target;
  }

  protected replaceTarget(records: Model[]): void {
    this.state.target = records;
  }

  public relatedModel(): ModelConstructor {
    return this.reflection.relatedModel();
  }

  public isLoaded(): boolean {
    return this.state.status === "loaded";
  }

  public isStale(): boolean {
    return this.state.status === "stale";
  }

  /**
   * Whether the owner carries the foreign key of this relationship.
   * Always false when the key lives on the related records.
   */
  public foreignKeyPresent(): boolean {
    return false;
  }

  /**
   * Whether the owner has no identity to scope related records by.
   */
  public isNullScope(): boolean {
    return this.owner.isNew && !this.foreignKeyPresent();
  }

  /**
   * Whether a fetch is warranted to resolve the target.
   */
  public findTarget(): boolean {
    return !this.isLoaded() && (!this.owner.isNew || this.foreignKeyPresent());
  }

  /**
   * Deferred query of the related records.
   */
  public scope({ nullify = true }: ScopeOptions = {}): ScopeContract<Model> {
    if (nullify && this.isNullScope()) {
      return new EmptyScope<Model>(this.creationAttributes());
    }

    return new RelationScope<Model>(
      this.relatedModel(),
      this.scopeFilter(),
      this.creationAttributes(),
    );
  }

  /**
   * Mark the state stale when the owner's linking attribute differs from the
   * value it was loaded with.
   */
  public refreshState(): void {
    const state = this.state;

    if (!areEqual(state.snapshot, this.linkingValue())) {
      this.apply("keyChanged");
    }
  }

  public markLoaded(): void {
    this.apply("load");
    this.state.snapshot = this.linkingValue();
  }

  /**
   * Forget the target; storage is left untouched.
   */
  public reset(): void {
    this.apply("reset");
    this.replaceTarget([]);
  }

  /**
   * Whether the record can be held by this relationship.
   */
  public isRelatedRecord(record: unknown): record is Model {
    return record instanceof this.relatedModel();
  }

  /**
   * @throws {TypeMismatchError} If the record is not an instance of the related model
   */
  protected assertRelatedRecord(record: unknown): asserts record is Model {
    if (!this.isRelatedRecord(record)) {
      throw new TypeMismatchError(
        this.name,
        this.relatedModel().name,
        record instanceof Object ? record.constructor.name : String(record),
      );
    }
  }

  /**
   * Run the callback in a transaction of the owner's data source.
   */
  protected async transaction<TResult>(callback: () => Promise<TResult>): Promise<TResult> {
    return await this.owner.self().transaction(callback);
  }

  private apply(event: AssociationEvent): void {
    const state = this.state;
    const status = transition(state.status, event);

    if (status !== state.status) {
      logAssociation(
        "state",
        `${this.owner.constructor.name}#${this.name}: ${state.status} -> ${status} (${event})`,
      );
    }

    state.status = status;
  }
}
