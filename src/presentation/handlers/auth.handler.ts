import { loginDto } from "../../application/dtos/user.dto.js";
import type { UserService } from "../../application/services/user.service.js";
import type { Logger } from "../../core/ports/logger.js";
import type { RequestContext } from "../context.js";
import { validateBody } from "../middleware/validate.js";
import { errorResponse, jsonResponse } from "./response.js";

export const authHandlers = (userService: UserService, logger: Logger) => ({
  /** Credential check only; no session or token is issued */
  login: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const body = await req.json().catch(() => null);
    const validated = validateBody(loginDto, body);
    if (!validated.ok) {
      logger.warn("Login validation failed", { requestId: ctx.requestId, ip: ctx.ip });
      return errorResponse(validated.error, ctx.requestId);
    }

    const result = await userService.login(validated.value, ctx.signal);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);

    return jsonResponse(result.value);
  },
});
