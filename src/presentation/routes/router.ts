import type { HealthService } from "../../application/services/health.service.js";
import type { UserService } from "../../application/services/user.service.js";
import type { Logger } from "../../core/ports/logger.js";
import type { RequestContext } from "../context.js";
import { authHandlers } from "../handlers/auth.handler.js";
import { healthHandler } from "../handlers/health.handler.js";
import { userHandlers } from "../handlers/user.handler.js";

/**
 * Static routes use O(1) map lookup.
 * Routes carrying a user id use prefix matching.
 */
type RouteHandler = (req: Request, ctx: RequestContext) => Promise<Response>;

interface RouterDeps {
  readonly userService: UserService;
  readonly healthService: HealthService;
  readonly logger: Logger;
}

const USERS_PREFIX = "/api/v1/users/";

export const createRouter = (deps: RouterDeps) => {
  const { logger } = deps;
  const health = healthHandler(deps.healthService);
  const auth = authHandlers(deps.userService, logger.child({ layer: "handler", handler: "auth" }));
  const users = userHandlers(deps.userService, logger.child({ layer: "handler", handler: "user" }));

  const notFound404 = (method: string, path: string, requestId: string): Response => {
    logger.debug("Route not found", { method, path });
    return Response.json(
      { error: { code: "NOT_FOUND", message: `${method} ${path} not found` }, requestId },
      { status: 404 },
    );
  };

  const routes = new Map<string, RouteHandler>([
    ["GET /health", async () => health.shallowCheck()],
    ["GET /readiness", async () => health.deepCheck()],

    ["POST /api/v1/auth/login", auth.login],

    ["POST /api/v1/users", users.create],
    ["GET /api/v1/users", users.list],
    // Registered ahead of the :id matcher so "lookup" is never taken for an id
    ["GET /api/v1/users/lookup", users.lookup],
  ]);

  /** /api/v1/users/:id and /api/v1/users/:id/status */
  const matchUser = (method: string, path: string): RouteHandler | null => {
    if (!path.startsWith(USERS_PREFIX)) return null;

    const rest = path.substring(USERS_PREFIX.length);
    const slashIdx = rest.indexOf("/");

    if (slashIdx === -1) {
      if (rest.length === 0) return null;
      switch (method) {
        case "GET":
          return (req, ctx) => users.get(req, ctx, rest);
        case "PUT":
          return (req, ctx) => users.update(req, ctx, rest);
        case "DELETE":
          return (req, ctx) => users.remove(req, ctx, rest);
        default:
          return null;
      }
    }

    const userId = rest.substring(0, slashIdx);
    const action = rest.substring(slashIdx + 1);
    if (method === "PATCH" && action === "status") {
      return (req, ctx) => users.setStatus(req, ctx, userId);
    }
    return null;
  };

  return {
    handle(req: Request, ctx: RequestContext): Promise<Response> {
      const handler = routes.get(`${req.method} ${ctx.path}`) ?? matchUser(req.method, ctx.path);
      if (handler) return handler(req, ctx);

      return Promise.resolve(notFound404(req.method, ctx.path, ctx.requestId));
    },
  };
};

export type Router = ReturnType<typeof createRouter>;
