import {
  CompanySetupRequestSchema,
  CompanyUserCreateRequestSchema,
  IntegrationCredentialRequestSchema
} from "@app-monitor/contracts";
import type { Express } from "express";
import type { AppContext } from "../../context.js";
import { CompanyParamsSchema, actorRoute, parseOrReply } from "../../http.js";
import {
  toCompany,
  toIntegrationSummary,
  toSsoApplication,
  toUser
} from "../../presenters.js";

export function registerCompanyRoutes(app: Express, context: AppContext): void {
  const { companies } = context.services;

  app.post(
    "/v1/companies",
    actorRoute(context, async ({ request, response, actor, now }) => {
      const body = parseOrReply(request.body, CompanySetupRequestSchema, response);
      if (!body) {
        return;
      }

      const result = await companies.setupCompany(actor, body, now);
      response.status(201).json({
        company: toCompany(result.company),
        integration: toIntegrationSummary(result.integration),
        user: toUser(result.user)
      });
    })
  );

  app.get(
    "/v1/companies/current",
    actorRoute(context, async ({ response, actor }) => {
      const view = await companies.getCompany(actor);
      response.status(200).json({
        company: toCompany(view.company),
        integration: view.integration ? toIntegrationSummary(view.integration) : null,
        applications: view.applications.map(toSsoApplication)
      });
    })
  );

  app.put(
    "/v1/companies/:companyId/integration",
    actorRoute(context, async ({ request, response, actor }) => {
      const params = parseOrReply(request.params, CompanyParamsSchema, response);
      if (!params) {
        return;
      }
      const body = parseOrReply(request.body, IntegrationCredentialRequestSchema, response);
      if (!body) {
        return;
      }

      const integration = await companies.configureIntegration(actor, params.companyId, body);
      response.status(200).json(toIntegrationSummary(integration));
    })
  );

  app.get(
    "/v1/companies/:companyId/users",
    actorRoute(context, async ({ request, response, actor }) => {
      const params = parseOrReply(request.params, CompanyParamsSchema, response);
      if (!params) {
        return;
      }

      const users = await companies.listUsers(actor, params.companyId);
      response.status(200).json({ items: users.map(toUser) });
    })
  );

  app.post(
    "/v1/companies/:companyId/users",
    actorRoute(context, async ({ request, response, actor, now }) => {
      const params = parseOrReply(request.params, CompanyParamsSchema, response);
      if (!params) {
        return;
      }
      const body = parseOrReply(request.body, CompanyUserCreateRequestSchema, response);
      if (!body) {
        return;
      }

      const user = await companies.addUser(actor, params.companyId, body, now);
      response.status(201).json({ user: toUser(user) });
    })
  );

  app.get(
    "/v1/companies/:companyId/applications",
    actorRoute(context, async ({ request, response, actor }) => {
      const params = parseOrReply(request.params, CompanyParamsSchema, response);
      if (!params) {
        return;
      }

      const applications = await companies.listApplications(actor, params.companyId);
      response.status(200).json({ items: applications.map(toSsoApplication) });
    })
  );
}
