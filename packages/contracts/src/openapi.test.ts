import { describe, expect, it } from "vitest";
import { buildOpenApiDocument } from "./openapi.js";

type OperationMap = Record<string, { operationId?: string } | undefined>;

describe("buildOpenApiDocument", () => {
  it("exposes auth, monitoring and entra paths with operation ids", () => {
    const document = buildOpenApiDocument() as {
      openapi?: string;
      paths?: Record<string, OperationMap>;
      components?: {
        securitySchemes?: Record<string, unknown>;
      };
    };

    expect(document.openapi).toBe("3.1.0");
    expect(document.paths?.["/health"]?.get?.operationId).toBe("getHealth");
    expect(document.paths?.["/v1/auth/register"]?.post?.operationId).toBe("register");
    expect(document.paths?.["/v1/auth/login"]?.post?.operationId).toBe("login");
    expect(document.paths?.["/v1/auth/logout"]?.post?.operationId).toBe("logout");
    expect(document.paths?.["/v1/auth/me"]?.get?.operationId).toBe("getAuthMe");
    expect(document.paths?.["/v1/preferences"]?.put?.operationId).toBe("updatePreferences");
    expect(document.paths?.["/v1/metrics"]?.post?.operationId).toBe("recordMetric");
    expect(document.paths?.["/v1/events"]?.get?.operationId).toBe("listEvents");
    expect(document.paths?.["/v1/dashboard"]?.get?.operationId).toBe("getDashboard");
    expect(document.paths?.["/v1/companies"]?.post?.operationId).toBe("setupCompany");
    expect(document.paths?.["/v1/companies/{companyId}/entra/sync"]?.post?.operationId).toBe(
      "syncApplications"
    );
    expect(
      document.paths?.["/v1/companies/{companyId}/entra/test-connection"]?.post?.operationId
    ).toBe("testEntraConnection");
    expect(
      document.paths?.["/v1/companies/{companyId}/entra/applications/{appId}/sign-ins"]?.get
        ?.operationId
    ).toBe("listApplicationSignIns");
    expect(
      document.paths?.["/v1/companies/{companyId}/entra/roles/{roleId}/members"]?.get?.operationId
    ).toBe("listDirectoryRoleMembers");
    expect(document.components?.securitySchemes?.sessionCookieAuth).toEqual({
      type: "apiKey",
      in: "cookie",
      name: "app_monitor_session"
    });
  });

  it("documents the sign-in window query parameter", () => {
    const document = buildOpenApiDocument() as {
      paths?: Record<
        string,
        { get?: { parameters?: Array<{ name?: string; in?: string; required?: boolean }> } }
      >;
    };

    const parameters = document.paths?.["/v1/companies/{companyId}/entra/sign-ins"]?.get
      ?.parameters;
    expect(parameters).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ name: "companyId", in: "path", required: true }),
        expect.objectContaining({ name: "days", in: "query" })
      ])
    );
  });
});
