import { describe, expect, it } from "vitest";
import { MonitoringService } from "./monitoring-service.js";
import { InMemoryRepository } from "./storage/memory-repository.js";
import type { UserRecord } from "./storage/types.js";

const NOW = new Date("2026-03-01T10:00:00.000Z");

async function createFixture() {
  const repository = new InMemoryRepository();
  const service = new MonitoringService({ repository });
  const actor = await repository.createUser({
    username: "ada",
    email: "ada@contoso.example",
    firstName: "Ada",
    lastName: "Lovelace",
    passwordHash: "scrypt$salt$hash",
    isActive: true,
    isAdmin: false,
    role: "user",
    companyId: null,
    createdAt: NOW
  });
  return { repository, service, actor };
}

describe("MonitoringService", () => {
  it("records metrics and lists the newest first", async () => {
    const { service, actor } = await createFixture();

    await service.recordMetric(actor, { metricType: "cpu", value: 40, unit: "%" }, NOW);
    await service.recordMetric(
      actor,
      { metricType: "memory", value: 512, description: "" },
      new Date("2026-03-01T10:05:00.000Z")
    );

    const metrics = await service.listMetrics(actor);

    expect(metrics.map((metric) => [metric.metricType, metric.unit, metric.description])).toEqual([
      ["memory", null, null],
      ["cpu", "%", null]
    ]);
  });

  it("keeps event severity and source as given", async () => {
    const { service, actor } = await createFixture();

    const event = await service.recordEvent(
      actor,
      {
        eventType: "deploy",
        message: "Release 42 shipped",
        severity: "warning",
        source: "ci",
        eventData: { build: 42 }
      },
      NOW
    );

    expect(event).toMatchObject({
      userId: actor.id,
      severity: "warning",
      source: "ci",
      eventData: { build: 42 },
      timestamp: NOW
    });
    expect(await service.listEvents(actor)).toHaveLength(1);
  });

  it("creates default preferences on first read and merges updates", async () => {
    const { service, actor } = await createFixture();

    expect(await service.getPreferences(actor)).toEqual({
      userId: actor.id,
      theme: "light",
      dashboardLayout: "default",
      notificationsEnabled: true,
      refreshInterval: 30
    });

    const updated = await service.updatePreferences(actor, { theme: "dark", refreshInterval: 60 });

    expect(updated).toEqual({
      userId: actor.id,
      theme: "dark",
      dashboardLayout: "default",
      notificationsEnabled: true,
      refreshInterval: 60
    });
  });

  it("reports sync age on the dashboard", async () => {
    const { repository, service, actor } = await createFixture();
    const { company, user } = await repository.setupCompany({
      company: {
        name: "Contoso",
        domain: null,
        industry: null,
        employeeCount: null,
        isActive: true,
        createdAt: NOW
      },
      credential: { tenantId: "tenant-1", clientId: "client-1", clientSecret: "test-secret" },
      adminUserId: actor.id,
      now: NOW
    });
    await repository.markSyncSucceeded(company.id, NOW);
    await repository.markSyncFailed(company.id, "Invalid client secret provided.");

    const dashboard = await service.getDashboard(user, new Date("2026-03-01T10:02:30.000Z"));

    expect(dashboard.company?.id).toBe(company.id);
    expect(dashboard.sync).toEqual({
      status: "error",
      lastSync: NOW,
      lastSyncAgeSeconds: 150,
      lastSyncError: "Invalid client secret provided."
    });
  });

  it("limits the dashboard to recent activity", async () => {
    const { service, actor } = await createFixture();
    for (let index = 0; index < 12; index += 1) {
      const at = new Date(NOW.getTime() + index * 1000);
      await service.recordMetric(actor, { metricType: "cpu", value: index }, at);
      await service.recordEvent(
        actor,
        { eventType: "tick", message: `tick ${index}`, severity: "info", source: "user" },
        at
      );
    }

    const dashboard = await service.getDashboard(actor, NOW);

    expect(dashboard.company).toBeNull();
    expect(dashboard.sync).toBeNull();
    expect(dashboard.metrics).toHaveLength(8);
    expect(dashboard.metrics[0]?.value).toBe(11);
    expect(dashboard.events).toHaveLength(10);
  });

  it("starts a user without a company on an empty dashboard", async () => {
    const { service, actor } = await createFixture();
    const detached: UserRecord = { ...actor, companyId: null };

    const dashboard = await service.getDashboard(detached, NOW);

    expect(dashboard.applications).toEqual([]);
  });
});
