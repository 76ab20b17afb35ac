/**
 * PostgreSQL adapters.
 */

export { createPgDatabase, type PgDatabase, type SqlExecutor } from "./pool.js";
export { createUserQueries, type UserQueries } from "./user.queries.js";
export { createPgUserRepository } from "./pg-user.repository.js";
export { pgMigrateUp, pgMigrateDown } from "./migrations.js";
