import { timeout } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { UserRepository } from "../../core/ports/user.repository.js";

export interface HealthStatus {
  readonly status: "ok" | "down";
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly checks: Record<string, ComponentHealth>;
}

export interface ComponentHealth {
  readonly status: "ok" | "down";
  readonly latencyMs?: number | undefined;
  readonly details?: string | undefined;
}

export interface HealthService {
  /** Readiness: round-trips to the database */
  check(): Promise<HealthStatus>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly logger: Logger;
  readonly version: string;
  /** Upper bound on the database ping */
  readonly pingTimeoutMs?: number;
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

export const createHealthService = (deps: Deps): HealthService => {
  const { userRepo, logger, version } = deps;
  const pingTimeoutMs = deps.pingTimeoutMs ?? 2_000;

  return {
    async check(): Promise<HealthStatus> {
      logger.debug("Running readiness check");
      const start = performance.now();

      // TIMEOUT as the abort reason, the same as an overrunning request
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(timeout()), pingTimeoutMs);
      const ping = await userRepo.ping(controller.signal).finally(() => clearTimeout(timer));
      let database: ComponentHealth;
      if (ping.ok) {
        database = { status: "ok", latencyMs: round2(performance.now() - start) };
      } else {
        logger.warn("Readiness check failed", { component: "database", code: ping.error.code });
        database = { status: "down", details: ping.error.message };
      }

      const checks: Record<string, ComponentHealth> = { database };
      const status = database.status;

      return {
        status,
        version,
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
        checks,
      };
    },
  };
};
