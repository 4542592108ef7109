import { SignInWindowQuerySchema, type SyncFailureCode } from "@app-monitor/contracts";
import type { Express } from "express";
import { z } from "zod";
import type { AppContext } from "../../context.js";
import { CompanyParamsSchema, actorRoute, parseOrReply } from "../../http.js";

const ApplicationParamsSchema = CompanyParamsSchema.extend({
  appId: z.string().min(1)
});

const RoleParamsSchema = CompanyParamsSchema.extend({
  roleId: z.string().min(1)
});

const SYNC_FAILURE_STATUS: Record<SyncFailureCode, number> = {
  FORBIDDEN: 403,
  NOT_CONFIGURED: 409,
  CONFLICT: 409,
  DIRECTORY_AUTH_FAILED: 502,
  SYNC_FAILED: 502
};

type Outcome = { success: true } | { success: false; code: SyncFailureCode };

export function syncResultStatus(result: Outcome): number {
  return result.success ? 200 : SYNC_FAILURE_STATUS[result.code];
}

/** A failed probe is still a completed test; only the gates change the status code. */
export function connectionTestStatus(result: Outcome): number {
  if (result.success) {
    return 200;
  }

  return result.code === "FORBIDDEN" || result.code === "NOT_CONFIGURED"
    ? SYNC_FAILURE_STATUS[result.code]
    : 200;
}

export function registerEntraRoutes(app: Express, context: AppContext): void {
  const { sync, directory } = context.services;

  app.post(
    "/v1/companies/:companyId/entra/sync",
    actorRoute(context, async ({ request, response, actor, now }) => {
      const params = parseOrReply(request.params, CompanyParamsSchema, response);
      if (!params) {
        return;
      }

      const result = await sync.syncApplications({ actor, companyId: params.companyId, now });
      response.status(syncResultStatus(result)).json(result);
    })
  );

  app.post(
    "/v1/companies/:companyId/entra/test-connection",
    actorRoute(context, async ({ request, response, actor }) => {
      const params = parseOrReply(request.params, CompanyParamsSchema, response);
      if (!params) {
        return;
      }

      const result = await sync.testConnection({ actor, companyId: params.companyId });
      response.status(connectionTestStatus(result)).json(result);
    })
  );

  app.get(
    "/v1/companies/:companyId/entra/users",
    actorRoute(context, async ({ request, response, actor }) => {
      const params = parseOrReply(request.params, CompanyParamsSchema, response);
      if (!params) {
        return;
      }

      response.status(200).json({ items: await directory.listUsers(actor, params.companyId) });
    })
  );

  app.get(
    "/v1/companies/:companyId/entra/sign-ins",
    actorRoute(context, async ({ request, response, actor }) => {
      const params = parseOrReply(request.params, CompanyParamsSchema, response);
      if (!params) {
        return;
      }
      const query = parseOrReply(request.query, SignInWindowQuerySchema, response);
      if (!query) {
        return;
      }

      response.status(200).json(await directory.listSignIns(actor, params.companyId, query.days));
    })
  );

  app.get(
    "/v1/companies/:companyId/entra/applications/:appId/sign-ins",
    actorRoute(context, async ({ request, response, actor }) => {
      const params = parseOrReply(request.params, ApplicationParamsSchema, response);
      if (!params) {
        return;
      }
      const query = parseOrReply(request.query, SignInWindowQuerySchema, response);
      if (!query) {
        return;
      }

      response
        .status(200)
        .json(
          await directory.listApplicationSignIns(actor, params.companyId, params.appId, query.days)
        );
    })
  );

  app.get(
    "/v1/companies/:companyId/entra/roles",
    actorRoute(context, async ({ request, response, actor }) => {
      const params = parseOrReply(request.params, CompanyParamsSchema, response);
      if (!params) {
        return;
      }

      response.status(200).json({ items: await directory.listRoles(actor, params.companyId) });
    })
  );

  app.get(
    "/v1/companies/:companyId/entra/roles/:roleId/members",
    actorRoute(context, async ({ request, response, actor }) => {
      const params = parseOrReply(request.params, RoleParamsSchema, response);
      if (!params) {
        return;
      }

      const members = await directory.listRoleMembers(actor, params.companyId, params.roleId);
      response.status(200).json({ items: members });
    })
  );

  app.get(
    "/v1/companies/:companyId/entra/permissions",
    actorRoute(context, async ({ request, response, actor }) => {
      const params = parseOrReply(request.params, CompanyParamsSchema, response);
      if (!params) {
        return;
      }

      response.status(200).json(await directory.permissionsStatus(actor, params.companyId));
    })
  );
}
