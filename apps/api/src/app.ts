import { randomUUID } from "node:crypto";
import cors from "cors";
import express, { type ErrorRequestHandler, type Express, type Request } from "express";
import { readSessionTokenFromCookie } from "./auth-service.js";
import type { AppContext } from "./context.js";
import { registerAuthRoutes } from "./features/auth/route.js";
import { registerCompanyRoutes } from "./features/companies/route.js";
import { registerEntraRoutes } from "./features/entra/route.js";
import { registerMonitoringRoutes } from "./features/monitoring/route.js";
import { registerSystemRoutes } from "./features/system/route.js";
import { readHeaderValue, sendApiError } from "./http.js";

interface JsonParseError extends Error {
  status?: number;
  type?: string;
}

function isMalformedJsonError(error: unknown): error is JsonParseError {
  if (!(error instanceof SyntaxError)) {
    return false;
  }

  return "type" in error && error.type === "entity.parse.failed";
}

function parseRequestIdCandidate(value: unknown): string | null {
  const candidate = readHeaderValue(value)?.trim();
  if (!candidate || !/^[A-Za-z0-9._:-]{1,128}$/u.test(candidate)) {
    return null;
  }

  return candidate;
}

export function buildAllowedOrigins(candidates: string[]): Set<string> {
  const origins = new Set<string>();

  for (const value of candidates) {
    const trimmed = value.trim();
    if (!trimmed || !URL.canParse(trimmed)) {
      continue;
    }

    origins.add(new URL(trimmed).origin);
  }

  return origins;
}

function readRequestOrigin(request: Request): string | null {
  const origin = readHeaderValue(request.headers.origin)?.trim();
  if (origin) {
    return origin;
  }

  const referer = readHeaderValue(request.headers.referer)?.trim();
  if (!referer || !URL.canParse(referer)) {
    return null;
  }

  return new URL(referer).origin;
}

export function buildApiApp(options: { context: AppContext }): Express {
  const { context } = options;
  const allowedOrigins = buildAllowedOrigins([
    ...context.config.allowedOrigins,
    context.config.webBaseUrl
  ]);

  const shouldApplyCsrfCheck = (request: Request): boolean => {
    if (request.method === "GET" || request.method === "HEAD" || request.method === "OPTIONS") {
      return false;
    }

    // Browsers attach cookies on their own; a bearer token has to be set by the caller.
    const { cookieName } = context.services.auth;
    return readSessionTokenFromCookie(request.headers.cookie, cookieName) !== null;
  };

  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", context.config.trustProxy);
  app.use(cors({ origin: [...allowedOrigins], credentials: true }));
  app.use(express.json());
  app.use((request, response, next) => {
    const requestId =
      parseRequestIdCandidate(request.headers["x-request-id"]) ??
      parseRequestIdCandidate(request.headers["x-correlation-id"]) ??
      randomUUID();

    response.locals.requestId = requestId;
    response.setHeader("x-request-id", requestId);
    next();
  });

  app.use((request, response, next) => {
    if (!shouldApplyCsrfCheck(request)) {
      next();
      return;
    }

    const requestOrigin = readRequestOrigin(request);
    if (!requestOrigin) {
      response.status(403).json({
        code: "CSRF_ORIGIN_REQUIRED",
        message: "Origin header is required for state-changing requests"
      });
      return;
    }

    if (allowedOrigins.has(requestOrigin)) {
      next();
      return;
    }

    response.status(403).json({
      code: "CSRF_ORIGIN_DENIED",
      message: "Cross-origin state-changing requests are not allowed"
    });
  });

  registerSystemRoutes(app, context);
  registerAuthRoutes(app, context);
  registerMonitoringRoutes(app, context);
  registerCompanyRoutes(app, context);
  registerEntraRoutes(app, context);

  app.use((_request, response) => {
    response.status(404).json({
      code: "NOT_FOUND",
      message: "Route not found"
    });
  });

  const errorHandler: ErrorRequestHandler = (error, request, response, next) => {
    if (response.headersSent) {
      next(error);
      return;
    }

    if (isMalformedJsonError(error)) {
      response.status(400).json({
        code: "INVALID_JSON",
        message: "Malformed JSON request body"
      });
      return;
    }

    sendApiError(context, request, response, error);
  };

  app.use(errorHandler);

  return app;
}
