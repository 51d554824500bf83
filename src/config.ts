import type { AssociationsConfigurations } from "./types";

let configurations: Partial<AssociationsConfigurations> = {};

export function setAssociationsConfigurations(
  associationsConfigurations: AssociationsConfigurations,
) {
  configurations = {
    ...configurations,
    ...associationsConfigurations,
  };
}

export function getAssociationsConfigurations(): AssociationsConfigurations {
  return configurations;
}

export function getAssociationsConfig<Key extends keyof AssociationsConfigurations>(
  key: Key,
): AssociationsConfigurations[Key] {
  return configurations[key];
}

export function getAssociationsDebugLevel(): NonNullable<AssociationsConfigurations["debugLevel"]> {
  return configurations.debugLevel || "warn";
}

/**
 * Reset configurations to their defaults
 */
export function resetAssociationsConfigurations() {
  configurations = {};
}
