/**
 * Postgres migration runner.
 *
 * Each migration runs inside its own transaction together with the
 * bookkeeping insert, so a failed migration leaves nothing behind.
 */

import type { Logger } from "../../../core/ports/logger.js";
import type { PgDatabase, SqlExecutor } from "./pool.js";

interface PgMigration {
  readonly version: string;
  readonly name: string;
  readonly up: string; // raw SQL
  readonly down: string;
}

/**
 * The unique index on email is what makes concurrent sign-ups with the same
 * address safe; the service's pre-check alone is not atomic with the insert.
 */
export const migrations: readonly PgMigration[] = [
  {
    version: "001",
    name: "create_users",
    up: `
      CREATE TABLE IF NOT EXISTS users (
        id            UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        email         VARCHAR(255) NOT NULL,
        password_hash VARCHAR(255) NOT NULL CHECK (password_hash <> ''),
        first_name    VARCHAR(100) NOT NULL,
        last_name     VARCHAR(100) NOT NULL,
        role          TEXT NOT NULL DEFAULT 'gamer'
                      CHECK (role IN ('gamer', 'admin', 'super_admin')),
        status        TEXT NOT NULL DEFAULT 'active'
                      CHECK (status IN ('active', 'inactive', 'suspended')),
        avatar_url    VARCHAR(500),
        phone         VARCHAR(20),
        created_at    TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at    TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
      CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email ON users(email);
      CREATE INDEX IF NOT EXISTS idx_users_created_at ON users(created_at DESC);
    `,
    down: `
      DROP INDEX IF EXISTS idx_users_created_at;
      DROP INDEX IF EXISTS idx_users_email;
      DROP TABLE IF EXISTS users;
    `,
  },
  {
    version: "002",
    name: "index_users_role_status",
    up: `
      CREATE INDEX IF NOT EXISTS idx_users_role_status ON users(role, status);
    `,
    down: `
      DROP INDEX IF EXISTS idx_users_role_status;
    `,
  },
];

const statements = (sql: string): string[] =>
  sql
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

const ensureMigrationsTable = async (exec: SqlExecutor): Promise<void> => {
  await exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version     TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
};

const getAppliedVersions = async (exec: SqlExecutor): Promise<Set<string>> => {
  const { rows } = await exec("SELECT version FROM _migrations ORDER BY version");
  const versions = new Set<string>();
  for (const row of rows) {
    if (typeof row === "object" && row !== null && "version" in row) {
      versions.add(String(row.version));
    }
  }
  return versions;
};

/** Apply pending migrations in order. Returns how many ran. */
export const pgMigrateUp = async (db: PgDatabase, logger: Logger): Promise<number> => {
  await ensureMigrationsTable(db.exec);
  const applied = await getAppliedVersions(db.exec);

  let count = 0;
  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;

    await db.transaction(async (tx) => {
      for (const stmt of statements(migration.up)) {
        await tx(stmt);
      }
      await tx("INSERT INTO _migrations (version, name) VALUES ($1, $2)", [
        migration.version,
        migration.name,
      ]);
    });

    logger.info("Migration applied", { version: migration.version, name: migration.name });
    count++;
  }

  if (count === 0) {
    logger.debug("Database schema up to date");
  }
  return count;
};

/** Roll back the most recent `steps` applied migrations. Returns how many ran. */
export const pgMigrateDown = async (db: PgDatabase, logger: Logger, steps = 1): Promise<number> => {
  await ensureMigrationsTable(db.exec);
  const applied = await getAppliedVersions(db.exec);

  const toRevert = [...migrations]
    .reverse()
    .filter((m) => applied.has(m.version))
    .slice(0, steps);

  for (const migration of toRevert) {
    await db.transaction(async (tx) => {
      for (const stmt of statements(migration.down)) {
        await tx(stmt);
      }
      await tx("DELETE FROM _migrations WHERE version = $1", [migration.version]);
    });

    logger.info("Migration reverted", { version: migration.version, name: migration.name });
  }

  return toRevert.length;
};
