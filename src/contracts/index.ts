export * from "./database-driver.contract";
export * from "./database-remover.contract";
export * from "./database-writer.contract";
export * from "./query-builder.contract";
export * from "./scope.contract";
