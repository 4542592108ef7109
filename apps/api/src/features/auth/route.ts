import {
  LoginRequestSchema,
  ProfileUpdateRequestSchema,
  RegisterRequestSchema
} from "@app-monitor/contracts";
import type { Express } from "express";
import type { AppContext } from "../../context.js";
import { actorRoute, currentSessionToken, parseOrReply, sendApiError } from "../../http.js";
import { toUser } from "../../presenters.js";
import { AttemptLimiter, limitAttemptsByClient } from "../../rate-limiter.js";

export function registerAuthRoutes(app: Express, context: AppContext): void {
  const { auth } = context.services;
  const limiter = new AttemptLimiter({
    windowMs: context.config.authRateLimitWindowMs,
    maxAttempts: context.config.authRateLimitMax
  });
  const limit = (action: string) =>
    limitAttemptsByClient(limiter, {
      action,
      now: context.now,
      message: "Too many authentication requests"
    });

  app.post("/v1/auth/register", limit("register"), async (request, response) => {
    const body = parseOrReply(request.body, RegisterRequestSchema, response);
    if (!body) {
      return;
    }

    try {
      const user = await auth.register({ ...body, now: context.now() });
      response.status(201).json({ user: toUser(user) });
    } catch (error) {
      sendApiError(context, request, response, error);
    }
  });

  app.post("/v1/auth/login", limit("login"), async (request, response) => {
    const body = parseOrReply(request.body, LoginRequestSchema, response);
    if (!body) {
      return;
    }

    try {
      const result = await auth.login({
        identifier: body.identifier,
        password: body.password,
        now: context.now()
      });

      response.setHeader("set-cookie", auth.createSessionCookie(result.sessionToken));
      response.status(200).json({ user: toUser(result.user) });
    } catch (error) {
      sendApiError(context, request, response, error);
    }
  });

  app.post("/v1/auth/logout", async (request, response) => {
    try {
      await auth.logout({
        sessionToken: currentSessionToken(context, request),
        now: context.now()
      });

      response.setHeader("set-cookie", auth.clearSessionCookie());
      response.status(204).send();
    } catch (error) {
      sendApiError(context, request, response, error);
    }
  });

  app.get("/v1/auth/me", async (request, response) => {
    try {
      const user = await auth.resolveActor(currentSessionToken(context, request), context.now());
      response.status(200).json({
        authenticated: user !== null,
        user: user ? toUser(user) : null
      });
    } catch (error) {
      sendApiError(context, request, response, error);
    }
  });

  app.patch(
    "/v1/profile",
    actorRoute(context, async ({ request, response, actor }) => {
      const body = parseOrReply(request.body, ProfileUpdateRequestSchema, response);
      if (!body) {
        return;
      }

      const user = await auth.updateProfile(actor, body);
      response.status(200).json({ user: toUser(user) });
    })
  );
}
