import {
  createUserDto,
  listUsersQuery,
  lookupUserQuery,
  updateUserDto,
  updateUserStatusDto,
} from "../../application/dtos/user.dto.js";
import type { UserService } from "../../application/services/user.service.js";
import { UserStatus } from "../../core/entities/user.entity.js";
import { type AppError, badRequest } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import { type UserId, brand } from "../../core/types/brand.js";
import { normalizePage } from "../../core/types/pagination.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { isUuid } from "../../shared/utils/id.js";
import type { RequestContext } from "../context.js";
import { queryObject, validateBody, validateQuery } from "../middleware/validate.js";
import {
  createdResponse,
  errorResponse,
  jsonResponse,
  noContentResponse,
  pagedResponse,
} from "./response.js";

const parseUserId = (raw: string): Result<UserId, AppError> =>
  isUuid(raw) ? ok(brand<string, "UserId">(raw)) : err(badRequest("Invalid user ID"));

export const userHandlers = (userService: UserService, logger: Logger) => {
  return {
    create: async (req: Request, ctx: RequestContext): Promise<Response> => {
      const body = await req.json().catch(() => null);
      const validated = validateBody(createUserDto, body);
      if (!validated.ok) {
        logger.warn("Create user validation failed", { requestId: ctx.requestId });
        return errorResponse(validated.error, ctx.requestId);
      }

      const result = await userService.createUser(validated.value, ctx.signal);
      if (!result.ok) return errorResponse(result.error, ctx.requestId);

      return createdResponse(result.value);
    },

    list: async (req: Request, ctx: RequestContext): Promise<Response> => {
      const filters = validateQuery(listUsersQuery, req.url);
      if (!filters.ok) return errorResponse(filters.error, ctx.requestId);

      // Out-of-range paging is clamped, never rejected
      const query = queryObject(req.url);
      const page = normalizePage(query["page"], query["limit"]);

      const result = await userService.listUsers({ ...filters.value, ...page }, ctx.signal);
      if (!result.ok) return errorResponse(result.error, ctx.requestId);

      return pagedResponse(result.value, { ...page, count: result.value.length });
    },

    lookup: async (req: Request, ctx: RequestContext): Promise<Response> => {
      const query = validateQuery(lookupUserQuery, req.url);
      if (!query.ok) return errorResponse(query.error, ctx.requestId);

      const result = await userService.getUserByEmail(query.value.email, ctx.signal);
      if (!result.ok) return errorResponse(result.error, ctx.requestId);

      return jsonResponse(result.value);
    },

    get: async (_req: Request, ctx: RequestContext, rawId: string): Promise<Response> => {
      const id = parseUserId(rawId);
      if (!id.ok) return errorResponse(id.error, ctx.requestId);

      const result = await userService.getUserById(id.value, ctx.signal);
      if (!result.ok) return errorResponse(result.error, ctx.requestId);

      return jsonResponse(result.value);
    },

    update: async (req: Request, ctx: RequestContext, rawId: string): Promise<Response> => {
      const id = parseUserId(rawId);
      if (!id.ok) return errorResponse(id.error, ctx.requestId);

      const body = await req.json().catch(() => null);
      const validated = validateBody(updateUserDto, body);
      if (!validated.ok) {
        logger.warn("Update user validation failed", { requestId: ctx.requestId, userId: id.value });
        return errorResponse(validated.error, ctx.requestId);
      }

      const result = await userService.updateUser(id.value, validated.value, ctx.signal);
      if (!result.ok) return errorResponse(result.error, ctx.requestId);

      return jsonResponse(result.value);
    },

    /** Soft delete: the record stays, its status becomes inactive */
    remove: async (_req: Request, ctx: RequestContext, rawId: string): Promise<Response> => {
      const id = parseUserId(rawId);
      if (!id.ok) return errorResponse(id.error, ctx.requestId);

      const result = await userService.updateUserStatus(id.value, UserStatus.INACTIVE, ctx.signal);
      if (!result.ok) return errorResponse(result.error, ctx.requestId);

      return noContentResponse();
    },

    setStatus: async (req: Request, ctx: RequestContext, rawId: string): Promise<Response> => {
      const id = parseUserId(rawId);
      if (!id.ok) return errorResponse(id.error, ctx.requestId);

      const body = await req.json().catch(() => null);
      const validated = validateBody(updateUserStatusDto, body);
      if (!validated.ok) return errorResponse(validated.error, ctx.requestId);

      const result = await userService.updateUserStatus(
        id.value,
        validated.value.status,
        ctx.signal,
      );
      if (!result.ok) return errorResponse(result.error, ctx.requestId);

      return noContentResponse();
    },
  };
};

export type UserHandlers = ReturnType<typeof userHandlers>;
