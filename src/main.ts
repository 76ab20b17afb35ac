import { createHealthService } from "./application/services/health.service.js";
import { createUserService } from "./application/services/user.service.js";
import type { UserRepository } from "./core/ports/user.repository.js";
import { loadConfig } from "./infrastructure/config/config.js";
import { createInMemoryUserRepository } from "./infrastructure/database/in-memory-user.repository.js";
import {
  type PgDatabase,
  createPgDatabase,
  createPgUserRepository,
  createUserQueries,
  pgMigrateUp,
} from "./infrastructure/database/postgres/index.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { createPasswordHasher } from "./infrastructure/security/password-hasher.js";
import { createRouter } from "./presentation/routes/router.js";
import { createServer } from "./presentation/server.js";
import { printShutdown, printStartupBanner } from "./shared/cli.js";
import { Tokens, createContainer } from "./shared/container.js";

const VERSION = process.env["npm_package_version"] ?? "1.0.0";

/** Hard stop if in-flight requests don't drain */
const SHUTDOWN_GRACE_MS = 10_000;

/**
 * Bootstrap: compose the dependency graph, then start the server.
 * Fail-fast on misconfiguration or an unreachable database.
 */
const bootstrap = async (): Promise<void> => {
  const bootStart = performance.now();

  // 1. Config (validated, exits on error)
  const config = loadConfig();

  // 2. Infrastructure
  const logger = createLogger({ level: config.log.level, format: config.log.format });
  const container = createContainer();
  container.register(Tokens.Config, config);
  container.register(Tokens.Logger, logger);
  container.register(Tokens.PasswordHasher, createPasswordHasher(config.security.bcryptCost));

  // 3. Storage: Postgres when configured, otherwise process-local memory
  let db: PgDatabase | null = null;
  let userRepo: UserRepository;
  if (config.database.url !== undefined) {
    db = createPgDatabase(
      {
        url: config.database.url,
        poolMax: config.database.poolMax,
        statementTimeoutMs: config.database.statementTimeoutMs,
      },
      logger.child({ component: "postgres" }),
    );
    await pgMigrateUp(db, logger.child({ component: "migrations" }));
    userRepo = createPgUserRepository(createUserQueries(db.exec));
  } else {
    if (config.env === "production") {
      logger.warn("DATABASE_URL is not set; users are kept in memory and lost on exit");
    }
    userRepo = createInMemoryUserRepository();
  }
  container.register(Tokens.UserRepository, userRepo);

  // 4. Application services
  container.register(
    Tokens.UserService,
    createUserService({
      userRepo: container.resolve(Tokens.UserRepository),
      passwordHasher: container.resolve(Tokens.PasswordHasher),
      logger: logger.child({ service: "user" }),
    }),
  );
  container.register(
    Tokens.HealthService,
    createHealthService({
      userRepo: container.resolve(Tokens.UserRepository),
      logger: logger.child({ service: "health" }),
      version: VERSION,
    }),
  );

  // 5. Presentation
  const router = createRouter({
    userService: container.resolve(Tokens.UserService),
    healthService: container.resolve(Tokens.HealthService),
    logger,
  });
  const server = createServer({ config, logger, router });

  // 6. Start
  const address = await server.start();
  printStartupBanner({
    config,
    version: VERSION,
    port: address.port,
    bootTimeMs: performance.now() - bootStart,
    storage: db ? "postgres" : "memory",
  });

  // 7. Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    printShutdown(signal);

    const force = setTimeout(() => {
      logger.error("Shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_GRACE_MS);
    force.unref();

    try {
      await server.stop();
      await db?.close();
      process.exit(0);
    } catch (e: unknown) {
      logger.error("Error during shutdown", { error: e });
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  // 8. Safety net
  process.on("unhandledRejection", (reason) => {
    logger.fatal("Unhandled promise rejection", {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });
};

bootstrap().catch((e: unknown) => {
  process.stderr.write(`Failed to start: ${e instanceof Error ? e.message : String(e)}\n`);
  process.exit(1);
});
