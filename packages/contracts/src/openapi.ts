import {
  OpenAPIRegistry,
  OpenApiGeneratorV31,
  type RouteConfig,
  extendZodWithOpenApi
} from "@asteasolutions/zod-to-openapi";
import { z } from "zod";
import {
  ApiErrorSchema,
  ApplicationsResponseSchema,
  AuthMeResponseSchema,
  AuthUserResponseSchema,
  CompanySetupRequestSchema,
  CompanySetupResponseSchema,
  CompanyUserCreateRequestSchema,
  CompanyUsersResponseSchema,
  CompanyViewResponseSchema,
  ConnectionTestResultSchema,
  DashboardResponseSchema,
  DirectoryObjectsResponseSchema,
  DirectoryRolesResponseSchema,
  DirectoryUsersResponseSchema,
  EventCreateRequestSchema,
  EventSchema,
  EventsResponseSchema,
  HealthResponseSchema,
  IntegrationCredentialRequestSchema,
  IntegrationSummarySchema,
  LoginRequestSchema,
  MetricCreateRequestSchema,
  MetricSchema,
  MetricsResponseSchema,
  PermissionsStatusSchema,
  PreferencesSchema,
  PreferencesUpdateRequestSchema,
  ProfileUpdateRequestSchema,
  RegisterRequestSchema,
  SignInWindowQuerySchema,
  SignInsResponseSchema,
  SyncResultSchema,
  UserSchema
} from "./schemas.js";

export const API_VERSION = "v1";

const CompanyParamsSchema = z.object({
  companyId: z.string().min(1)
});

const ApplicationParamsSchema = CompanyParamsSchema.extend({
  appId: z.string().min(1)
});

const RoleParamsSchema = CompanyParamsSchema.extend({
  roleId: z.string().min(1)
});

let zodExtended = false;

function ensureZodExtended() {
  if (!zodExtended) {
    extendZodWithOpenApi(z);
    zodExtended = true;
  }
}

function jsonContent(schema: z.ZodTypeAny) {
  return {
    "application/json": {
      schema
    }
  };
}

function errorResponses(statuses: number[]): RouteConfig["responses"] {
  const descriptions: Record<number, string> = {
    400: "Invalid request",
    401: "Authentication required",
    403: "Authorization failed",
    404: "Resource not found",
    409: "Conflicting state",
    429: "Too many requests",
    502: "Directory service failure"
  };

  const responses: RouteConfig["responses"] = {};
  for (const status of statuses) {
    responses[status] = {
      description: descriptions[status] ?? "Error",
      content: jsonContent(ApiErrorSchema)
    };
  }
  return responses;
}

const sessionSecurity = [{ sessionCookieAuth: [] }];

export function buildOpenApiDocument(): Record<string, unknown> {
  ensureZodExtended();
  const registry = new OpenAPIRegistry();

  registry.registerComponent("securitySchemes", "sessionCookieAuth", {
    type: "apiKey",
    in: "cookie",
    name: "app_monitor_session"
  });

  registry.register("HealthResponse", HealthResponseSchema);
  registry.register("ApiError", ApiErrorSchema);
  registry.register("User", UserSchema);
  registry.register("Preferences", PreferencesSchema);
  registry.register("Metric", MetricSchema);
  registry.register("SystemEvent", EventSchema);
  registry.register("IntegrationSummary", IntegrationSummarySchema);
  registry.register("SyncResult", SyncResultSchema);
  registry.register("ConnectionTestResult", ConnectionTestResultSchema);
  registry.register("DashboardResponse", DashboardResponseSchema);

  registry.registerPath({
    method: "get",
    path: "/health",
    operationId: "getHealth",
    summary: "Get API health status",
    tags: ["System"],
    responses: {
      200: { description: "API health status", content: jsonContent(HealthResponseSchema) }
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/auth/register",
    operationId: "register",
    summary: "Create a user account",
    tags: ["Auth"],
    request: { body: { required: true, content: jsonContent(RegisterRequestSchema) } },
    responses: {
      201: { description: "Account created", content: jsonContent(AuthUserResponseSchema) },
      ...errorResponses([400, 409, 429])
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/auth/login",
    operationId: "login",
    summary: "Sign in with email or username and start a session",
    tags: ["Auth"],
    request: { body: { required: true, content: jsonContent(LoginRequestSchema) } },
    responses: {
      200: { description: "Signed in", content: jsonContent(AuthUserResponseSchema) },
      ...errorResponses([400, 401, 429])
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/auth/logout",
    operationId: "logout",
    summary: "End the current session",
    tags: ["Auth"],
    security: sessionSecurity,
    responses: {
      204: { description: "Session ended" }
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/auth/me",
    operationId: "getAuthMe",
    summary: "Get the signed-in user",
    tags: ["Auth"],
    security: sessionSecurity,
    responses: {
      200: { description: "Session state", content: jsonContent(AuthMeResponseSchema) }
    }
  });

  registry.registerPath({
    method: "patch",
    path: "/v1/profile",
    operationId: "updateProfile",
    summary: "Update the signed-in user's profile",
    tags: ["Profile"],
    security: sessionSecurity,
    request: { body: { required: true, content: jsonContent(ProfileUpdateRequestSchema) } },
    responses: {
      200: { description: "Updated user", content: jsonContent(AuthUserResponseSchema) },
      ...errorResponses([400, 401, 409])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/preferences",
    operationId: "getPreferences",
    summary: "Get dashboard preferences",
    tags: ["Profile"],
    security: sessionSecurity,
    responses: {
      200: { description: "Preferences", content: jsonContent(PreferencesSchema) },
      ...errorResponses([401])
    }
  });

  registry.registerPath({
    method: "put",
    path: "/v1/preferences",
    operationId: "updatePreferences",
    summary: "Update dashboard preferences",
    tags: ["Profile"],
    security: sessionSecurity,
    request: { body: { required: true, content: jsonContent(PreferencesUpdateRequestSchema) } },
    responses: {
      200: { description: "Preferences", content: jsonContent(PreferencesSchema) },
      ...errorResponses([400, 401])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/metrics",
    operationId: "listMetrics",
    summary: "List the latest metrics",
    tags: ["Monitoring"],
    security: sessionSecurity,
    responses: {
      200: { description: "Metrics", content: jsonContent(MetricsResponseSchema) },
      ...errorResponses([401])
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/metrics",
    operationId: "recordMetric",
    summary: "Record a metric",
    tags: ["Monitoring"],
    security: sessionSecurity,
    request: { body: { required: true, content: jsonContent(MetricCreateRequestSchema) } },
    responses: {
      201: { description: "Metric recorded", content: jsonContent(MetricSchema) },
      ...errorResponses([400, 401])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/events",
    operationId: "listEvents",
    summary: "List the latest system events",
    tags: ["Monitoring"],
    security: sessionSecurity,
    responses: {
      200: { description: "Events", content: jsonContent(EventsResponseSchema) },
      ...errorResponses([401])
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/events",
    operationId: "recordEvent",
    summary: "Record a system event",
    tags: ["Monitoring"],
    security: sessionSecurity,
    request: { body: { required: true, content: jsonContent(EventCreateRequestSchema) } },
    responses: {
      201: { description: "Event recorded", content: jsonContent(EventSchema) },
      ...errorResponses([400, 401])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/dashboard",
    operationId: "getDashboard",
    summary: "Get the dashboard summary with sync state",
    tags: ["Monitoring"],
    security: sessionSecurity,
    responses: {
      200: { description: "Dashboard", content: jsonContent(DashboardResponseSchema) },
      ...errorResponses([401])
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/companies",
    operationId: "setupCompany",
    summary: "Create a company with its Entra ID integration",
    tags: ["Companies"],
    security: sessionSecurity,
    request: { body: { required: true, content: jsonContent(CompanySetupRequestSchema) } },
    responses: {
      201: { description: "Company created", content: jsonContent(CompanySetupResponseSchema) },
      ...errorResponses([400, 401, 409])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/companies/current",
    operationId: "getCurrentCompany",
    summary: "Get the signed-in user's company",
    tags: ["Companies"],
    security: sessionSecurity,
    responses: {
      200: { description: "Company", content: jsonContent(CompanyViewResponseSchema) },
      ...errorResponses([401, 404])
    }
  });

  registry.registerPath({
    method: "put",
    path: "/v1/companies/{companyId}/integration",
    operationId: "configureIntegration",
    summary: "Replace the Entra ID credential of a company",
    tags: ["Companies"],
    security: sessionSecurity,
    request: {
      params: CompanyParamsSchema,
      body: { required: true, content: jsonContent(IntegrationCredentialRequestSchema) }
    },
    responses: {
      200: { description: "Integration", content: jsonContent(IntegrationSummarySchema) },
      ...errorResponses([400, 401, 403])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/companies/{companyId}/users",
    operationId: "listCompanyUsers",
    summary: "List company users",
    tags: ["Companies"],
    security: sessionSecurity,
    request: { params: CompanyParamsSchema },
    responses: {
      200: { description: "Users", content: jsonContent(CompanyUsersResponseSchema) },
      ...errorResponses([401, 403])
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/companies/{companyId}/users",
    operationId: "addCompanyUser",
    summary: "Add a user to a company",
    tags: ["Companies"],
    security: sessionSecurity,
    request: {
      params: CompanyParamsSchema,
      body: { required: true, content: jsonContent(CompanyUserCreateRequestSchema) }
    },
    responses: {
      201: { description: "User created", content: jsonContent(AuthUserResponseSchema) },
      ...errorResponses([400, 401, 403, 409])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/companies/{companyId}/applications",
    operationId: "listApplications",
    summary: "List the SSO application inventory",
    tags: ["Applications"],
    security: sessionSecurity,
    request: { params: CompanyParamsSchema },
    responses: {
      200: { description: "Applications", content: jsonContent(ApplicationsResponseSchema) },
      ...errorResponses([401, 403])
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/companies/{companyId}/entra/sync",
    operationId: "syncApplications",
    summary: "Synchronize applications from Entra ID",
    tags: ["Entra ID"],
    security: sessionSecurity,
    request: { params: CompanyParamsSchema },
    responses: {
      200: { description: "Sync succeeded", content: jsonContent(SyncResultSchema) },
      403: { description: "Insufficient permissions", content: jsonContent(SyncResultSchema) },
      409: { description: "Not configured or conflict", content: jsonContent(SyncResultSchema) },
      502: { description: "Directory failure", content: jsonContent(SyncResultSchema) },
      ...errorResponses([401])
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/companies/{companyId}/entra/test-connection",
    operationId: "testEntraConnection",
    summary: "Validate the Entra ID credential",
    tags: ["Entra ID"],
    security: sessionSecurity,
    request: { params: CompanyParamsSchema },
    responses: {
      200: { description: "Connection result", content: jsonContent(ConnectionTestResultSchema) },
      403: {
        description: "Insufficient permissions",
        content: jsonContent(ConnectionTestResultSchema)
      },
      409: { description: "Not configured", content: jsonContent(ConnectionTestResultSchema) },
      ...errorResponses([401])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/companies/{companyId}/entra/users",
    operationId: "listDirectoryUsers",
    summary: "List directory users",
    tags: ["Entra ID"],
    security: sessionSecurity,
    request: { params: CompanyParamsSchema },
    responses: {
      200: { description: "Directory users", content: jsonContent(DirectoryUsersResponseSchema) },
      ...errorResponses([401, 403, 409, 502])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/companies/{companyId}/entra/sign-ins",
    operationId: "listSignIns",
    summary: "List sign-in logs for a trailing window",
    tags: ["Entra ID"],
    security: sessionSecurity,
    request: { params: CompanyParamsSchema, query: SignInWindowQuerySchema },
    responses: {
      200: { description: "Sign-ins", content: jsonContent(SignInsResponseSchema) },
      ...errorResponses([400, 401, 403, 409, 502])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/companies/{companyId}/entra/applications/{appId}/sign-ins",
    operationId: "listApplicationSignIns",
    summary: "List sign-ins for one application",
    tags: ["Entra ID"],
    security: sessionSecurity,
    request: { params: ApplicationParamsSchema, query: SignInWindowQuerySchema },
    responses: {
      200: { description: "Sign-ins", content: jsonContent(SignInsResponseSchema) },
      ...errorResponses([400, 401, 403, 409, 502])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/companies/{companyId}/entra/roles",
    operationId: "listDirectoryRoles",
    summary: "List activated directory roles",
    tags: ["Entra ID"],
    security: sessionSecurity,
    request: { params: CompanyParamsSchema },
    responses: {
      200: { description: "Roles", content: jsonContent(DirectoryRolesResponseSchema) },
      ...errorResponses([401, 403, 409, 502])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/companies/{companyId}/entra/roles/{roleId}/members",
    operationId: "listDirectoryRoleMembers",
    summary: "List members of a directory role",
    tags: ["Entra ID"],
    security: sessionSecurity,
    request: { params: RoleParamsSchema },
    responses: {
      200: { description: "Members", content: jsonContent(DirectoryObjectsResponseSchema) },
      ...errorResponses([401, 403, 409, 502])
    }
  });

  registry.registerPath({
    method: "get",
    path: "/v1/companies/{companyId}/entra/permissions",
    operationId: "getDirectoryPermissions",
    summary: "Report the Graph permissions the integration needs",
    tags: ["Entra ID"],
    security: sessionSecurity,
    request: { params: CompanyParamsSchema },
    responses: {
      200: { description: "Permissions status", content: jsonContent(PermissionsStatusSchema) },
      ...errorResponses([401, 403, 409, 502])
    }
  });

  const generator = new OpenApiGeneratorV31(registry.definitions);
  return generator.generateDocument({
    openapi: "3.1.0",
    info: {
      title: "App Monitor API",
      version: API_VERSION,
      description: "Application metrics, system events and Entra ID SSO application inventory"
    },
    servers: [{ url: "http://localhost:3001" }],
    tags: [
      { name: "System", description: "Platform system endpoints" },
      { name: "Auth", description: "Accounts and sessions" },
      { name: "Profile", description: "Profile and dashboard preferences" },
      { name: "Monitoring", description: "Metrics, events and dashboard summary" },
      { name: "Companies", description: "Companies, members and integration credentials" },
      { name: "Applications", description: "SSO application inventory" },
      { name: "Entra ID", description: "Directory sync and read views" }
    ]
  }) as unknown as Record<string, unknown>;
}
