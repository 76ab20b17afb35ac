import type { HealthService } from "../application/services/health.service.js";
import type { UserService } from "../application/services/user.service.js";
import type { Logger } from "../core/ports/logger.js";
import type { PasswordHasher } from "../core/ports/password-hasher.js";
import type { UserRepository } from "../core/ports/user.repository.js";
import type { AppConfig } from "../infrastructure/config/config.js";

/**
 * Minimal DI container. Tokens carry the type they resolve to, so
 * `resolve(Tokens.UserService)` is a UserService without a type argument.
 */

// Phantom parameter: never set at runtime
export interface Token<T> {
  readonly key: symbol;
  readonly __type?: T;
}

export const token = <T>(name: string): Token<T> => ({ key: Symbol.for(name) });

export interface Container {
  register<T>(token: Token<T>, instance: T): void;
  resolve<T>(token: Token<T>): T;
  has(token: Token<unknown>): boolean;
}

export const createContainer = (): Container => {
  const registry = new Map<symbol, unknown>();

  return {
    register<T>(t: Token<T>, instance: T): void {
      if (registry.has(t.key)) {
        throw new Error(`[Container] Token already registered: ${t.key.toString()}`);
      }
      registry.set(t.key, instance);
    },

    resolve<T>(t: Token<T>): T {
      if (!registry.has(t.key)) {
        throw new Error(`[Container] Token not registered: ${t.key.toString()}`);
      }
      // register() is the only writer and pairs each key with a T
      return registry.get(t.key) as T;
    },

    has(t: Token<unknown>): boolean {
      return registry.has(t.key);
    },
  };
};

/** Well-known DI tokens */
export const Tokens = {
  Config: token<AppConfig>("Config"),
  Logger: token<Logger>("Logger"),
  UserRepository: token<UserRepository>("UserRepository"),
  PasswordHasher: token<PasswordHasher>("PasswordHasher"),
  UserService: token<UserService>("UserService"),
  HealthService: token<HealthService>("HealthService"),
} as const;
