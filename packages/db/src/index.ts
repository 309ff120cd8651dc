export * from "./schema/index.js";
export { createDbClient, closeDbClient, type DbClient, type DbClientOptions } from "./client.js";
export { getSchemaSql } from "./schema-sql.js";
