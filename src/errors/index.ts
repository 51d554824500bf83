export * from "./configuration.error";
export * from "./delete-restriction.error";
export * from "./missing-data-source.error";
export * from "./record-invalid.error";
export * from "./record-not-found.error";
export * from "./record-not-saved.error";
export * from "./type-mismatch.error";
