import {
  createFetchJsonFixture,
  manualClock,
  type FetchRouteFixture,
  type ManualClock
} from "@app-monitor/testkit";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { buildApiApp } from "./app.js";
import { loadApiConfig } from "./config.js";
import { createAppContext } from "./context.js";
import { type LoggerSink, createLogger } from "./logger.js";
import { InMemoryRepository } from "./storage/memory-repository.js";
import type { MetricRecord } from "./storage/types.js";

const ORIGIN = "https://app.example.test";
const TOKEN_PATH = "/tenant-1/oauth2/v2.0/token";
const APPLICATIONS_PATH = "/v1.0/applications";

const tokenOk: FetchRouteFixture = { body: { access_token: "token-1", expires_in: 3600 } };

const registration = {
  firstName: "Ada",
  lastName: "Lovelace",
  email: "ada@contoso.example",
  password: "test-password",
  confirmPassword: "test-password",
  agreeTerms: true
};

const companySetup = {
  companyName: "Contoso",
  domain: "contoso.example",
  tenantId: "tenant-1",
  clientId: "client-1",
  clientSecret: "test-secret"
};

class FailingMetricsRepository extends InMemoryRepository {
  async listMetrics(): Promise<MetricRecord[]> {
    throw new Error("sensitive database detail");
  }
}

function createHarness(
  options: {
    env?: NodeJS.ProcessEnv;
    routes?: Record<string, FetchRouteFixture>;
    repository?: InMemoryRepository;
    clock?: ManualClock;
  } = {}
) {
  const lines: string[] = [];
  const record = (line: string) => {
    lines.push(line);
  };
  const sink: LoggerSink = { error: record, warn: record, info: record, debug: record };
  const clock = options.clock ?? manualClock("2026-03-01T10:00:00.000Z");
  const fixture = createFetchJsonFixture({ [TOKEN_PATH]: tokenOk, ...options.routes });
  const config = loadApiConfig({
    NODE_ENV: "test",
    WEB_BASE_URL: ORIGIN,
    AUTH_RATE_LIMIT_MAX: "50",
    ENTRA_AUTHORITY_HOST: "https://login.example.test",
    ENTRA_GRAPH_BASE_URL: "https://graph.example.test/v1.0",
    ...options.env
  });
  const context = createAppContext({
    config,
    logger: createLogger("debug", { sink, now: clock.now }),
    repository: options.repository ?? new InMemoryRepository(),
    fetchImpl: fixture.fetch,
    now: clock.now
  });

  return { app: buildApiApp({ context }), clock, fixture, lines };
}

type Harness = ReturnType<typeof createHarness>;

function sessionCookieFrom(response: request.Response): string {
  const header: unknown = response.headers["set-cookie"];
  const first = Array.isArray(header) ? header.at(0) : header;
  if (typeof first !== "string") {
    throw new Error("Expected a session cookie");
  }
  return first.split(";")[0] ?? "";
}

async function loginAs(
  harness: Harness,
  account: { email: string; password: string } = registration
): Promise<string> {
  const login = await request(harness.app)
    .post("/v1/auth/login")
    .send({ identifier: account.email, password: account.password });
  expect(login.status).toBe(200);
  return sessionCookieFrom(login);
}

async function setupCompany(harness: Harness): Promise<{ cookie: string; companyId: string }> {
  await request(harness.app).post("/v1/auth/register").send(registration).expect(201);
  const cookie = await loginAs(harness);
  const setup = await request(harness.app)
    .post("/v1/companies")
    .set("cookie", cookie)
    .set("origin", ORIGIN)
    .send(companySetup);
  expect(setup.status).toBe(201);
  return { cookie, companyId: String(setup.body.company.id) };
}

describe("API app", () => {
  it("returns health status without framework headers", async () => {
    const { app } = createHarness();

    const response = await request(app).get("/health").set("x-request-id", "req-123");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: "ok", timestamp: "2026-03-01T10:00:00.000Z" });
    expect(response.headers["x-powered-by"]).toBeUndefined();
    expect(response.headers["x-request-id"]).toBe("req-123");
  });

  it("serves the openapi document", async () => {
    const { app } = createHarness();

    const response = await request(app).get("/openapi.json");

    expect(response.status).toBe(200);
    expect(response.body.openapi).toBe("3.1.0");
    expect(response.body.paths["/v1/companies/{companyId}/entra/sync"]).toBeTruthy();
  });

  it("returns JSON for unknown routes and malformed bodies", async () => {
    const { app } = createHarness();

    const missing = await request(app).get("/does-not-exist");
    const malformed = await request(app)
      .post("/v1/auth/login")
      .set("content-type", "application/json")
      .send("{");

    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ code: "NOT_FOUND", message: "Route not found" });
    expect(malformed.status).toBe(400);
    expect(malformed.body).toEqual({ code: "INVALID_JSON", message: "Malformed JSON request body" });
  });

  it("registers accounts and reports validation failures", async () => {
    const { app } = createHarness();

    const created = await request(app).post("/v1/auth/register").send(registration);
    const mismatch = await request(app)
      .post("/v1/auth/register")
      .send({ ...registration, email: "grace@contoso.example", confirmPassword: "other" });
    const duplicate = await request(app)
      .post("/v1/auth/register")
      .send({ ...registration, email: "ADA@contoso.example" });

    expect(created.status).toBe(201);
    expect(created.body.user).toMatchObject({
      username: "ada",
      email: "ada@contoso.example",
      role: "user",
      companyId: null
    });
    expect(created.body.user.passwordHash).toBeUndefined();
    expect(mismatch.status).toBe(400);
    expect(mismatch.body).toEqual({ code: "INVALID_REQUEST", message: "Passwords do not match" });
    expect(duplicate.status).toBe(409);
    expect(duplicate.body).toEqual({ code: "EMAIL_TAKEN", message: "Email already registered" });
  });

  it("logs in with a session cookie and resolves the current user", async () => {
    const harness = createHarness();
    await request(harness.app).post("/v1/auth/register").send(registration).expect(201);

    const login = await request(harness.app)
      .post("/v1/auth/login")
      .send({ identifier: "ada", password: "test-password" });
    const cookie = sessionCookieFrom(login);
    const me = await request(harness.app).get("/v1/auth/me").set("cookie", cookie);
    const anonymous = await request(harness.app).get("/v1/auth/me");
    const rejected = await request(harness.app)
      .post("/v1/auth/login")
      .send({ identifier: "ada", password: "wrong-password" });

    expect(login.status).toBe(200);
    expect(String(login.headers["set-cookie"])).toContain(
      "; Path=/; HttpOnly; SameSite=Lax; Max-Age=28800"
    );
    expect(me.body).toMatchObject({ authenticated: true, user: { username: "ada" } });
    expect(anonymous.body).toEqual({ authenticated: false, user: null });
    expect(rejected.status).toBe(401);
    expect(rejected.body).toEqual({
      code: "INVALID_CREDENTIALS",
      message: "Invalid email/username or password"
    });
    expect(harness.lines.join("\n")).not.toContain("test-password");
  });

  it("accepts bearer session tokens", async () => {
    const harness = createHarness();
    await request(harness.app).post("/v1/auth/register").send(registration).expect(201);
    const token = (await loginAs(harness)).split("=")[1] ?? "";

    const response = await request(harness.app)
      .get("/v1/preferences")
      .set("authorization", `Bearer ${token}`);

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      theme: "light",
      dashboardLayout: "default",
      notificationsEnabled: true,
      refreshInterval: 30
    });
  });

  it("accepts bearer-authenticated writes without an origin header", async () => {
    const harness = createHarness();
    await request(harness.app).post("/v1/auth/register").send(registration).expect(201);
    const token = (await loginAs(harness)).split("=")[1] ?? "";

    const response = await request(harness.app)
      .post("/v1/metrics")
      .set("authorization", `Bearer ${token}`)
      .send({ metricType: "memory", value: 512, unit: "MB" });

    expect(response.status).toBe(201);
    expect(response.body).toMatchObject({ metricType: "memory", value: 512, unit: "MB" });
  });

  it("rate limits login attempts by the connecting address", async () => {
    const { app } = createHarness({ env: { AUTH_RATE_LIMIT_MAX: "2" } });
    const statuses: number[] = [];

    for (const forwardedFor of ["203.0.113.1", "203.0.113.2", "203.0.113.3", "203.0.113.4"]) {
      const response = await request(app)
        .post("/v1/auth/login")
        .set("x-forwarded-for", forwardedFor)
        .send({ identifier: "ada", password: "wrong-password" });
      statuses.push(response.status);
    }
    const blocked = await request(app)
      .post("/v1/auth/login")
      .send({ identifier: "ada", password: "wrong-password" });
    const register = await request(app).post("/v1/auth/register").send(registration);

    expect(statuses).toEqual([401, 401, 429, 429]);
    expect(blocked.status).toBe(429);
    expect(blocked.headers["retry-after"]).toBe("60");
    expect(blocked.body).toEqual({
      code: "RATE_LIMITED",
      message: "Too many authentication requests"
    });
    expect(register.status).toBe(201);
  });

  it("keys the rate limit on the forwarded address behind a trusted proxy", async () => {
    const { app } = createHarness({ env: { AUTH_RATE_LIMIT_MAX: "1", TRUST_PROXY: "true" } });
    const attempt = (ip: string) =>
      request(app)
        .post("/v1/auth/login")
        .set("x-forwarded-for", ip)
        .send({ identifier: "ada", password: "wrong-password" });

    expect((await attempt("198.51.100.1")).status).toBe(401);
    expect((await attempt("198.51.100.1")).status).toBe(429);
    expect((await attempt("198.51.100.2")).status).toBe(401);
  });

  it("guards state-changing requests that carry a session", async () => {
    const harness = createHarness();
    await request(harness.app).post("/v1/auth/register").send(registration).expect(201);
    const cookie = await loginAs(harness);

    const foreign = await request(harness.app)
      .post("/v1/auth/logout")
      .set("cookie", cookie)
      .set("origin", "https://evil.example");
    const missing = await request(harness.app).post("/v1/auth/logout").set("cookie", cookie);
    const allowed = await request(harness.app)
      .post("/v1/auth/logout")
      .set("cookie", cookie)
      .set("referer", `${ORIGIN}/settings`);
    const afterLogout = await request(harness.app).get("/v1/dashboard").set("cookie", cookie);

    expect(foreign.status).toBe(403);
    expect(foreign.body).toEqual({
      code: "CSRF_ORIGIN_DENIED",
      message: "Cross-origin state-changing requests are not allowed"
    });
    expect(missing.status).toBe(403);
    expect(missing.body).toEqual({
      code: "CSRF_ORIGIN_REQUIRED",
      message: "Origin header is required for state-changing requests"
    });
    expect(allowed.status).toBe(204);
    expect(String(allowed.headers["set-cookie"])).toBe(
      "app_monitor_session=; Path=/; HttpOnly; SameSite=Lax; Max-Age=0"
    );
    expect(afterLogout.status).toBe(401);
    expect(afterLogout.body).toEqual({ code: "UNAUTHORIZED", message: "Authentication required" });
  });

  it("records metrics and events and rejects unknown preference keys", async () => {
    const harness = createHarness();
    await request(harness.app).post("/v1/auth/register").send(registration).expect(201);
    const cookie = await loginAs(harness);
    const post = (path: string) =>
      request(harness.app).post(path).set("cookie", cookie).set("origin", ORIGIN);

    const metric = await post("/v1/metrics").send({ metricType: "cpu", value: 42.5, unit: "%" });
    const event = await post("/v1/events").send({ eventType: "login", message: "Signed in" });
    const invalidMetric = await post("/v1/metrics").send({ metricType: "cpu" });
    const preferences = await request(harness.app)
      .put("/v1/preferences")
      .set("cookie", cookie)
      .set("origin", ORIGIN)
      .send({ theme: "dark", colour: "teal" });
    const metrics = await request(harness.app).get("/v1/metrics").set("cookie", cookie);

    expect(metric.status).toBe(201);
    expect(metric.body).toMatchObject({
      metricType: "cpu",
      value: 42.5,
      unit: "%",
      description: null,
      timestamp: "2026-03-01T10:00:00.000Z"
    });
    expect(event.status).toBe(201);
    expect(event.body).toMatchObject({ severity: "info", source: "user", eventData: null });
    expect(invalidMetric.status).toBe(400);
    expect(invalidMetric.body).toEqual({ code: "INVALID_REQUEST", message: "value is required" });
    expect(preferences.status).toBe(400);
    expect(preferences.body).toEqual({
      code: "INVALID_REQUEST",
      message: "Unrecognized key(s) in object: 'colour'"
    });
    expect(metrics.body.items).toHaveLength(1);
  });

  it("sets up a company without exposing the client secret", async () => {
    const harness = createHarness();

    const { cookie, companyId } = await setupCompany(harness);
    const current = await request(harness.app).get("/v1/companies/current").set("cookie", cookie);

    expect(current.status).toBe(200);
    expect(current.body.company).toMatchObject({ id: companyId, name: "Contoso" });
    expect(current.body.integration).toEqual({
      tenantId: "tenant-1",
      clientId: "client-1",
      clientSecretConfigured: true,
      isActive: true,
      syncStatus: "pending",
      lastSync: null,
      lastSyncError: null
    });
    expect(JSON.stringify(current.body)).not.toContain("test-secret");
    expect(harness.lines.join("\n")).not.toContain("test-secret");
  });

  it("syncs applications and shows sync age on the dashboard", async () => {
    const clock = manualClock("2026-03-01T10:00:00.000Z");
    const harness = createHarness({
      clock,
      routes: {
        [APPLICATIONS_PATH]: {
          body: {
            value: [
              { id: "a1", displayName: "Slack" },
              { id: "a2", displayName: "Zoom", signInAudience: "AzureADMultipleOrgs" }
            ]
          }
        }
      }
    });
    const { cookie, companyId } = await setupCompany(harness);

    const sync = await request(harness.app)
      .post(`/v1/companies/${companyId}/entra/sync`)
      .set("cookie", cookie)
      .set("origin", ORIGIN);
    clock.advanceSeconds(90);
    const resync = await request(harness.app)
      .post(`/v1/companies/${companyId}/entra/sync`)
      .set("cookie", cookie)
      .set("origin", ORIGIN);
    clock.advanceSeconds(30);
    const applications = await request(harness.app)
      .get(`/v1/companies/${companyId}/applications`)
      .set("cookie", cookie);
    const dashboard = await request(harness.app).get("/v1/dashboard").set("cookie", cookie);

    expect(sync.status).toBe(200);
    expect(sync.body).toEqual({
      success: true,
      count: 2,
      created: 2,
      updated: 0,
      unchanged: 0,
      message: "Synced 2 applications from Entra ID",
      lastSync: "2026-03-01T10:00:00.000Z"
    });
    expect(resync.body).toMatchObject({ success: true, created: 0, unchanged: 2 });
    expect(
      applications.body.items.map((app: { name: string; appType: string }) => [
        app.name,
        app.appType
      ])
    ).toEqual([
      ["Slack", "web"],
      ["Zoom", "AzureADMultipleOrgs"]
    ]);
    expect(dashboard.body.sync).toEqual({
      status: "active",
      lastSync: "2026-03-01T10:01:30.000Z",
      lastSyncAgeSeconds: 30,
      lastSyncError: null
    });
    expect(harness.fixture.callsTo(TOKEN_PATH)).toHaveLength(1);
  });

  it("maps a rejected tenant credential to 502 and records the error state", async () => {
    const harness = createHarness({
      routes: {
        [TOKEN_PATH]: {
          status: 401,
          body: {
            error: "invalid_client",
            error_description: "AADSTS7000215: Invalid client secret provided.\r\nTrace ID: t-1"
          }
        }
      }
    });
    const { cookie, companyId } = await setupCompany(harness);

    const sync = await request(harness.app)
      .post(`/v1/companies/${companyId}/entra/sync`)
      .set("cookie", cookie)
      .set("origin", ORIGIN);
    const dashboard = await request(harness.app).get("/v1/dashboard").set("cookie", cookie);
    const roles = await request(harness.app)
      .get(`/v1/companies/${companyId}/entra/roles`)
      .set("cookie", cookie);

    expect(sync.status).toBe(502);
    expect(sync.body).toEqual({
      success: false,
      code: "DIRECTORY_AUTH_FAILED",
      error: "AADSTS7000215: Invalid client secret provided.",
      retryable: false
    });
    expect(dashboard.body.sync).toEqual({
      status: "error",
      lastSync: null,
      lastSyncAgeSeconds: null,
      lastSyncError: "AADSTS7000215: Invalid client secret provided."
    });
    expect(roles.status).toBe(502);
    expect(roles.body).toEqual({
      code: "DIRECTORY_AUTH_FAILED",
      message: "AADSTS7000215: Invalid client secret provided."
    });
  });

  it("keeps members away from sync while letting them read directory views", async () => {
    const harness = createHarness({
      routes: {
        "/v1.0/auditLogs/signIns": { body: { value: [] } }
      }
    });
    const { cookie, companyId } = await setupCompany(harness);
    const added = await request(harness.app)
      .post(`/v1/companies/${companyId}/users`)
      .set("cookie", cookie)
      .set("origin", ORIGIN)
      .send({
        email: "grace@contoso.example",
        firstName: "Grace",
        lastName: "Hopper",
        role: "user",
        password: "test-password"
      });
    const memberCookie = await loginAs(harness, {
      email: "grace@contoso.example",
      password: "test-password"
    });

    const sync = await request(harness.app)
      .post(`/v1/companies/${companyId}/entra/sync`)
      .set("cookie", memberCookie)
      .set("origin", ORIGIN);
    const users = await request(harness.app)
      .get(`/v1/companies/${companyId}/users`)
      .set("cookie", memberCookie);
    const signIns = await request(harness.app)
      .get(`/v1/companies/${companyId}/entra/sign-ins?days=30`)
      .set("cookie", memberCookie);
    const outOfRange = await request(harness.app)
      .get(`/v1/companies/${companyId}/entra/sign-ins?days=0`)
      .set("cookie", memberCookie);

    expect(added.status).toBe(201);
    expect(added.body.user).toMatchObject({ username: "grace", companyId, role: "user" });
    expect(sync.status).toBe(403);
    expect(sync.body).toEqual({
      success: false,
      code: "FORBIDDEN",
      error: "Insufficient permissions",
      retryable: false
    });
    expect(users.status).toBe(403);
    expect(signIns.status).toBe(200);
    expect(signIns.body).toEqual({ windowDays: 30, items: [] });
    expect(outOfRange.status).toBe(400);
    expect(outOfRange.body.code).toBe("INVALID_REQUEST");
    expect(harness.fixture.callsTo(APPLICATIONS_PATH)).toHaveLength(0);
  });

  it("reports connection tests with a 200 even when the probe fails", async () => {
    const harness = createHarness({
      routes: {
        "/v1.0/organization": { body: { value: [{ id: "tenant-1", displayName: "Contoso" }] } },
        [APPLICATIONS_PATH]: { body: { value: [{ id: "a1", displayName: "Slack" }] } }
      }
    });
    const { cookie, companyId } = await setupCompany(harness);
    const probe = () =>
      request(harness.app)
        .post(`/v1/companies/${companyId}/entra/test-connection`)
        .set("cookie", cookie)
        .set("origin", ORIGIN);

    const success = await probe();
    harness.fixture.setRoute("/v1.0/organization", { status: 403, body: {} });
    const failure = await probe();

    expect(success.status).toBe(200);
    expect(success.body).toEqual({
      success: true,
      message: "Connection successful! Found 1 applications.",
      tenantName: "Contoso",
      tenantId: "tenant-1",
      appCount: 1
    });
    expect(failure.status).toBe(200);
    expect(failure.body).toEqual({
      success: false,
      code: "SYNC_FAILED",
      error: "Could not read organization details"
    });
  });

  it("redacts unexpected errors and logs them with the request id", async () => {
    const harness = createHarness({ repository: new FailingMetricsRepository() });
    await request(harness.app).post("/v1/auth/register").send(registration).expect(201);
    const cookie = await loginAs(harness);

    const response = await request(harness.app)
      .get("/v1/metrics")
      .set("cookie", cookie)
      .set("x-request-id", "req-123");

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      code: "INTERNAL_SERVER_ERROR",
      message: "Unexpected server error"
    });
    const logged = harness.lines.find((line) => line.includes('"event":"api.unhandled_error"'));
    expect(logged).toContain('"requestId":"req-123"');
    expect(logged).toContain('"path":"/v1/metrics"');
  });
});
