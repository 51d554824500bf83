import type { Model } from "../model/model";

/**
 * Resolution status of a relationship on one owner.
 *
 * - `notLoaded`: the target holds at most locally built records
 * - `loaded`: the target is the full known membership
 * - `stale`: the owner's linking attribute changed since the last load, the
 *   target must be discarded before reuse
 */
export type AssociationStatus = "notLoaded" | "loaded" | "stale";

/**
 * Events driving the status.
 */
export type AssociationEvent = "load" | "reset" | "keyChanged";

/**
 * State kept on the owner for each relationship.
 *
 * `snapshot` is the owner's linking attribute value at the last load.
 * To-one relationships hold zero or one record in `target`.
 */
export type AssociationState = {
  status: AssociationStatus;
  target: Model[];
  snapshot: unknown;
};

const transitions: Record<AssociationStatus, Record<AssociationEvent, AssociationStatus>> = {
  notLoaded: { load: "loaded", reset: "notLoaded", keyChanged: "notLoaded" },
  loaded: { load: "loaded", reset: "notLoaded", keyChanged: "stale" },
  stale: { load: "loaded", reset: "notLoaded", keyChanged: "stale" },
};

/**
 * Next status after the given event.
 */
export function transition(status: AssociationStatus, event: AssociationEvent): AssociationStatus {
  return transitions[status][event];
}

export function createAssociationState(snapshot: unknown): AssociationState {
  return { status: "notLoaded", target: [], snapshot };
}
