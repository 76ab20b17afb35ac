import type { Logger } from "../core/ports/logger.js";
import type { RequestId } from "../core/types/brand.js";

/**
 * Typed request context handed to every route handler.
 */
export interface RequestContext {
  readonly requestId: RequestId;
  readonly startTime: number;
  readonly ip: string;
  readonly method: string;
  readonly path: string;
  /** Aborted on client disconnect, or with a TIMEOUT reason when the request overruns */
  readonly signal: AbortSignal;
  /** Request-scoped logger with requestId pre-bound */
  readonly logger: Logger;
}
