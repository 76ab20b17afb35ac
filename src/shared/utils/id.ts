import { randomUUID } from "node:crypto";

/**
 * Generate a cryptographically random request identifier (UUIDv4).
 */
export const generateId = (): string => randomUUID();

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Postgres rejects anything else in a UUID column */
export const isUuid = (value: string): boolean => UUID_RE.test(value);
