import type {
  EventCreateRequest,
  MetricCreateRequest,
  PreferencesUpdateRequest
} from "@app-monitor/contracts";
import { DEFAULT_PREFERENCES } from "./auth-service.js";
import type {
  AppRepository,
  ApplicationRecord,
  CompanyRecord,
  EventRecord,
  MetricRecord,
  PreferenceRecord,
  UserRecord
} from "./storage/types.js";

export const METRICS_PAGE_SIZE = 100;
export const EVENTS_PAGE_SIZE = 50;
export const DASHBOARD_METRICS = 8;
export const DASHBOARD_EVENTS = 10;

export interface SyncSnapshot {
  status: "pending" | "active" | "error";
  lastSync: Date | null;
  lastSyncAgeSeconds: number | null;
  lastSyncError: string | null;
}

export interface DashboardView {
  user: UserRecord;
  company: CompanyRecord | null;
  applications: ApplicationRecord[];
  metrics: MetricRecord[];
  events: EventRecord[];
  sync: SyncSnapshot | null;
}

export class MonitoringService {
  private readonly repository: AppRepository;

  constructor(input: { repository: AppRepository }) {
    this.repository = input.repository;
  }

  async listMetrics(actor: UserRecord): Promise<MetricRecord[]> {
    return this.repository.listMetrics(actor.id, METRICS_PAGE_SIZE);
  }

  async recordMetric(
    actor: UserRecord,
    request: MetricCreateRequest,
    now: Date
  ): Promise<MetricRecord> {
    return this.repository.insertMetric({
      userId: actor.id,
      metricType: request.metricType,
      value: request.value,
      unit: request.unit ?? null,
      description: request.description || null,
      timestamp: now
    });
  }

  async listEvents(actor: UserRecord): Promise<EventRecord[]> {
    return this.repository.listEvents(actor.id, EVENTS_PAGE_SIZE);
  }

  async recordEvent(actor: UserRecord, request: EventCreateRequest, now: Date): Promise<EventRecord> {
    return this.repository.insertEvent({
      userId: actor.id,
      eventType: request.eventType,
      severity: request.severity,
      message: request.message,
      source: request.source,
      eventData: request.eventData ?? null,
      timestamp: now
    });
  }

  async getPreferences(actor: UserRecord): Promise<PreferenceRecord> {
    const existing = await this.repository.findPreferences(actor.id);
    if (existing) {
      return existing;
    }

    return this.repository.savePreferences({ userId: actor.id, ...DEFAULT_PREFERENCES });
  }

  async updatePreferences(
    actor: UserRecord,
    patch: PreferencesUpdateRequest
  ): Promise<PreferenceRecord> {
    const current = await this.getPreferences(actor);

    return this.repository.savePreferences({
      userId: actor.id,
      theme: patch.theme ?? current.theme,
      dashboardLayout: patch.dashboardLayout ?? current.dashboardLayout,
      notificationsEnabled: patch.notificationsEnabled ?? current.notificationsEnabled,
      refreshInterval: patch.refreshInterval ?? current.refreshInterval
    });
  }

  async getDashboard(actor: UserRecord, now: Date): Promise<DashboardView> {
    const companyId = actor.companyId;
    const [company, applications, integration, metrics, events] = await Promise.all([
      companyId ? this.repository.findCompanyById(companyId) : null,
      companyId ? this.repository.listApplications(companyId) : [],
      companyId ? this.repository.findIntegrationByCompany(companyId) : null,
      this.repository.listMetrics(actor.id, DASHBOARD_METRICS),
      this.repository.listEvents(actor.id, DASHBOARD_EVENTS)
    ]);

    return {
      user: actor,
      company,
      applications,
      metrics,
      events,
      sync: integration
        ? {
            status: integration.syncStatus,
            lastSync: integration.lastSync,
            lastSyncAgeSeconds: integration.lastSync
              ? Math.max(0, Math.floor((now.getTime() - integration.lastSync.getTime()) / 1000))
              : null,
            lastSyncError: integration.lastSyncError
          }
        : null
    };
  }
}
