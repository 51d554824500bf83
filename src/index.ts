// Configuration
export * from "./config";
export * from "./types";

// Contracts
export * from "./contracts";

// Data Source
export * from "./context/data-source-context";
export * from "./context/transaction-context";
export * from "./data-source/data-source";
export * from "./data-source/data-source-registry";

// Errors
export * from "./errors";

// Core Services
export * from "./database-dirty-tracker";
export * from "./events/model-events";
export * from "./model/model";
export * from "./model/register-model";
export * from "./model/types";
export * from "./query/base-query-builder";
export * from "./remover/database-remover";
export * from "./resource/resource";
export * from "./writer/database-writer";

// Relations
export * from "./relations";

// MongoDB Driver
export * from "./drivers/mongodb/mongodb-driver";
export * from "./drivers/mongodb/mongodb-query-builder";
export * from "./drivers/mongodb/types";
export * from "./utils/connect-to-database";

// Re-export MongoDB client types for convenience
export type { MongoClientOptions, TransactionOptions } from "mongodb";
