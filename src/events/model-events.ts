import type { Model } from "../model/model";

/**
 * Lifecycle events emitted while a model is validated, saved or destroyed.
 */
export type ModelEventName =
  | "validating"
  | "validated"
  | "saving"
  | "saved"
  | "creating"
  | "created"
  | "updating"
  | "updated"
  | "deleting"
  | "deleted";

/**
 * Extra information passed along with an event, e.g. `{ isInsert: true }`
 * for `saving` or `{ deletedCount: 1 }` for `deleted`.
 */
export type ModelEventContext = Record<string, unknown>;

/** Signature of an event listener registered against a model lifecycle hook. */
export type ModelEventListener<TModel> = (
  model: TModel,
  context: ModelEventContext,
) => void | Promise<void>;

/**
 * Async event emitter powering model lifecycle hooks.
 *
 * Listeners run sequentially in registration order and are awaited, so a
 * listener that throws aborts the operation that emitted the event.
 */
export class ModelEvents<TModel> {
  public readonly listeners = new Map<ModelEventName, Set<ModelEventListener<TModel>>>();

  /**
   * Register a listener for the given event.
   * Returns an unsubscribe function for convenience.
   */
  public on(event: ModelEventName, listener: ModelEventListener<TModel>): () => void {
    let listeners = this.listeners.get(event);

    if (!listeners) {
      listeners = new Set();
      this.listeners.set(event, listeners);
    }

    listeners.add(listener);

    return () => this.off(event, listener);
  }

  /**
   * Register a listener that automatically unsubscribes after the first call.
   */
  public once(event: ModelEventName, listener: ModelEventListener<TModel>): () => void {
    const wrapper: ModelEventListener<TModel> = async (model, context) => {
      this.off(event, wrapper);
      await listener(model, context);
    };

    return this.on(event, wrapper);
  }

  public off(event: ModelEventName, listener: ModelEventListener<TModel>): void {
    const listeners = this.listeners.get(event);

    if (!listeners) return;

    listeners.delete(listener);

    if (listeners.size === 0) {
      this.listeners.delete(event);
    }
  }

  public async emit(
    event: ModelEventName,
    model: TModel,
    context: ModelEventContext = {},
  ): Promise<void> {
    const listeners = this.listeners.get(event);

    if (!listeners) return;

    for (const listener of Array.from(listeners)) {
      await listener(model, context);
    }
  }

  public clear(): void {
    this.listeners.clear();
  }

  /**
   * Fired before validation on both insert and update.
   */
  public onSaving(listener: ModelEventListener<TModel>): () => void {
    return this.on("saving", listener);
  }

  public onSaved(listener: ModelEventListener<TModel>): () => void {
    return this.on("saved", listener);
  }

  public onCreated(listener: ModelEventListener<TModel>): () => void {
    return this.on("created", listener);
  }

  /**
   * Fired after dependent associations were handled and right before the
   * record is deleted.
   */
  public onDeleting(listener: ModelEventListener<TModel>): () => void {
    return this.on("deleting", listener);
  }

  public onDeleted(listener: ModelEventListener<TModel>): () => void {
    return this.on("deleted", listener);
  }
}

/**
 * Listeners shared by every model class.
 */
export const globalModelEvents = new ModelEvents<Model>();
