import { log } from "@warlock.js/logger";
import { getAssociationsDebugLevel } from "../config";

/**
 * Log an association lifecycle message (load, cascade, transaction).
 *
 * Only emitted when the configured debug level is `info`.
 */
export function logAssociation(action: string, message: string): void {
  if (getAssociationsDebugLevel() !== "info") return;

  log.info("associations", action, message);
}

/**
 * Log an association failure regardless of the debug level.
 */
export function logAssociationError(action: string, message: string): void {
  log.error("associations", action, message);
}
