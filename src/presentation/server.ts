import { type IncomingMessage, type ServerResponse, createServer as createHttpServer } from "node:http";
import type { AddressInfo } from "node:net";
import { type AppError, badRequest, cancelled, internal, timeout } from "../core/errors/app-error.js";
import type { Logger } from "../core/ports/logger.js";
import { brand } from "../core/types/brand.js";
import { type Result, err, ok } from "../core/types/result.js";
import type { AppConfig } from "../infrastructure/config/config.js";
import { formatAccessLog, formatCorsRejectLog } from "../shared/log-format.js";
import { generateId } from "../shared/utils/id.js";
import type { RequestContext } from "./context.js";
import { errorResponse } from "./handlers/response.js";
import { corsHeaders, handlePreflight } from "./middleware/cors.js";
import { SECURITY_HEADERS } from "./middleware/security-headers.js";
import type { Router } from "./routes/router.js";

type ServerConfig = Pick<AppConfig, "port" | "host" | "cors" | "log" | "http">;

interface ServerDeps {
  readonly config: ServerConfig;
  readonly logger: Logger;
  readonly router: Router;
  /** Destination for pretty access-log lines; defaults to stdout */
  readonly accessLog?: (line: string) => void;
}

/** Per-request facts only the transport knows */
export interface ConnectionInfo {
  readonly ip: string;
  readonly signal: AbortSignal;
}

/**
 * Extract pathname from a full URL string without allocating a URL object.
 */
const extractPath = (url: string): string => {
  const start = url.indexOf("/", url.indexOf("//") + 2);
  if (start === -1) return "/";
  const qIdx = url.indexOf("?", start);
  return qIdx === -1 ? url.substring(start) : url.substring(start, qIdx);
};

const round2 = (n: number): number => Math.round(n * 100) / 100;

export const createServer = (deps: ServerDeps) => {
  const { config, logger, router } = deps;
  const writeAccess = deps.accessLog ?? ((line: string) => void process.stdout.write(line));
  const shouldLog = config.log.level === "debug" || config.log.level === "info";
  const origins = config.cors.origins;

  const logAccess = (
    method: string,
    path: string,
    status: number,
    durationMs: number,
    ip: string,
    requestId: string,
  ): void => {
    if (!shouldLog) return;
    if (config.log.format === "json") {
      logger.info("HTTP request", { method, path, status, durationMs, ip, requestId });
      return;
    }
    writeAccess(formatAccessLog(method, path, status, durationMs, ip, requestId));
  };

  /**
   * Transport-independent pipeline: preflight, request id, routing,
   * cross-cutting headers, access log. Unhandled throws become a bare 500.
   */
  const handle = async (req: Request, conn: ConnectionInfo): Promise<Response> => {
    const start = performance.now();
    const method = req.method;
    const origin = req.headers.get("origin");

    const preflight = handlePreflight(origins, req);
    if (preflight) {
      if (preflight.status === 403 && shouldLog) writeAccess(formatCorsRejectLog(origin ?? "none"));
      for (const [k, v] of Object.entries(SECURITY_HEADERS)) preflight.headers.set(k, v);
      return preflight;
    }

    const path = extractPath(req.url);
    // blank counts as absent
    const requestId = req.headers.get("x-request-id")?.trim() || generateId();

    const ctx: RequestContext = {
      requestId: brand<string, "RequestId">(requestId),
      startTime: start,
      ip: conn.ip,
      method,
      path,
      signal: conn.signal,
      logger: logger.child({ requestId }),
    };

    let response: Response;
    try {
      response = await router.handle(req, ctx);
    } catch (e: unknown) {
      logger.error("Unhandled error", { requestId, method, path, error: e });
      response = errorResponse(internal(), requestId);
    }

    const headers = response.headers;
    headers.set("X-Request-Id", requestId);
    for (const [k, v] of Object.entries(SECURITY_HEADERS)) headers.set(k, v);
    const cors = corsHeaders(origins, origin);
    if (cors) {
      for (const [k, v] of Object.entries(cors)) headers.set(k, v);
    } else if (shouldLog && origin !== null) {
      writeAccess(formatCorsRejectLog(origin));
    }

    logAccess(method, path, response.status, round2(performance.now() - start), conn.ip, requestId);
    return response;
  };

  // ── node:http adapter ──

  /** Drains the whole body even past the limit so the socket stays usable for the reply */
  const readBody = async (incoming: IncomingMessage): Promise<Result<string | null, AppError>> => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    for await (const chunk of incoming) {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buf.length;
      if (size > config.http.maxBodyBytes) tooLarge = true;
      if (!tooLarge) chunks.push(buf);
    }

    if (tooLarge) return err(badRequest("Request body too large"));
    return ok(chunks.length === 0 ? null : Buffer.concat(chunks).toString("utf8"));
  };

  const toHeaders = (incoming: IncomingMessage): Headers => {
    const headers = new Headers();
    for (const [key, value] of Object.entries(incoming.headers)) {
      if (value === undefined) continue;
      if (Array.isArray(value)) {
        for (const v of value) headers.append(key, v);
      } else {
        headers.set(key, value);
      }
    }
    return headers;
  };

  const writeResponse = async (outgoing: ServerResponse, response: Response): Promise<void> => {
    outgoing.statusCode = response.status;
    response.headers.forEach((value, key) => {
      outgoing.setHeader(key, value);
    });
    const body = Buffer.from(await response.arrayBuffer());
    outgoing.end(body);
  };

  const onRequest = async (incoming: IncomingMessage, outgoing: ServerResponse): Promise<void> => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(timeout()), config.http.requestTimeoutMs);
    outgoing.on("close", () => {
      if (!outgoing.writableFinished) controller.abort(cancelled("Client closed request"));
    });

    const method = incoming.method ?? "GET";
    const ip = incoming.socket.remoteAddress ?? "unknown";

    try {
      const body = method === "GET" || method === "HEAD" ? ok(null) : await readBody(incoming);
      if (!body.ok) {
        await writeResponse(outgoing, errorResponse(body.error, generateId()));
        return;
      }

      const req = new Request(new URL(incoming.url ?? "/", "http://localhost"), {
        method,
        headers: toHeaders(incoming),
        body: body.value,
        signal: controller.signal,
      });

      const response = await handle(req, { ip, signal: controller.signal });
      if (outgoing.destroyed) return;
      await writeResponse(outgoing, response);
    } finally {
      clearTimeout(timer);
    }
  };

  const server = createHttpServer((incoming, outgoing) => {
    onRequest(incoming, outgoing).catch((e: unknown) => {
      logger.error("Failed to serve request", { error: e });
      if (!outgoing.headersSent) {
        outgoing.statusCode = 500;
        outgoing.setHeader("Content-Type", "application/json");
      }
      outgoing.end(JSON.stringify({ error: { code: "INTERNAL", message: "Internal server error" } }));
    });
  });

  return {
    handle,

    /** Resolves once listening; port 0 picks a free port */
    start(): Promise<AddressInfo> {
      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          const address = server.address();
          if (address === null || typeof address === "string") {
            reject(new Error("Server is not listening on a TCP port"));
            return;
          }
          resolve(address);
        });
      });
    },

    /** Stop accepting connections and wait for in-flight requests */
    stop(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.close((e) => (e ? reject(e) : resolve()));
        server.closeIdleConnections();
      });
    },
  };
};

export type HttpServer = ReturnType<typeof createServer>;
