import type { Request, RequestHandler, Response } from "express";
import { z } from "zod";
import type { AppContext } from "./context.js";
import { parseApiError } from "./errors.js";
import { serializeError } from "./logger.js";
import type { UserRecord } from "./storage/types.js";

export const CompanyParamsSchema = z.object({
  companyId: z.string().min(1)
});

export function parseOrReply<T>(
  value: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  response: Response
): T | null {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }

  const firstIssue = parsed.error.issues.at(0);
  response.status(400).json({
    code: "INVALID_REQUEST",
    message: firstIssue?.message ?? "Invalid request"
  });
  return null;
}

export function readHeaderValue(value: unknown): string | null {
  if (typeof value === "string") {
    return value;
  }

  if (Array.isArray(value)) {
    const first = value.find((entry) => typeof entry === "string");
    return typeof first === "string" ? first : null;
  }

  return null;
}

export function requestIdFromRequest(response: Response): string {
  const requestId: unknown = response.locals.requestId;
  return typeof requestId === "string" && requestId.trim().length > 0 ? requestId : "unknown";
}

export function currentSessionToken(context: AppContext, request: Request): string | null {
  return context.services.auth.readSessionToken({
    cookie: request.headers.cookie,
    authorization: request.headers.authorization
  });
}

export function sendApiError(
  context: AppContext,
  request: Request,
  response: Response,
  error: unknown
): void {
  const parsed = parseApiError(error);
  if (parsed.status >= 500) {
    context.logger.error(
      {
        event: "api.unhandled_error",
        requestId: requestIdFromRequest(response),
        method: request.method,
        path: request.originalUrl,
        code: parsed.code,
        status: parsed.status,
        error: serializeError(error)
      },
      "Request failed"
    );
  }

  response.status(parsed.status).json({
    code: parsed.code,
    message: parsed.message
  });
}

export interface ActorRequest {
  request: Request;
  response: Response;
  actor: UserRecord;
  now: Date;
}

/** Resolves the session to an active user before running the handler; failures become JSON errors. */
export function actorRoute(
  context: AppContext,
  handler: (input: ActorRequest) => Promise<void>
): RequestHandler {
  return async (request, response) => {
    try {
      const now = context.now();
      const actor = await context.services.auth.requireActor(
        currentSessionToken(context, request),
        now
      );
      await handler({ request, response, actor, now });
    } catch (error) {
      sendApiError(context, request, response, error);
    }
  };
}
