import type {
  Company,
  DashboardResponse,
  IntegrationSummary,
  Metric,
  Preferences,
  SsoApplication,
  SyncState,
  SystemEvent,
  User
} from "@app-monitor/contracts";
import type { DashboardView, SyncSnapshot } from "./monitoring-service.js";
import type {
  ApplicationRecord,
  CompanyRecord,
  EventRecord,
  IntegrationRecord,
  MetricRecord,
  PreferenceRecord,
  UserRecord
} from "./storage/types.js";

function isoOrNull(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function toUser(record: UserRecord): User {
  return {
    id: record.id,
    username: record.username,
    email: record.email,
    firstName: record.firstName,
    lastName: record.lastName,
    isActive: record.isActive,
    isAdmin: record.isAdmin,
    role: record.role,
    companyId: record.companyId,
    createdAt: record.createdAt.toISOString(),
    lastLogin: isoOrNull(record.lastLogin)
  };
}

export function toCompany(record: CompanyRecord): Company {
  return {
    id: record.id,
    name: record.name,
    domain: record.domain,
    industry: record.industry,
    employeeCount: record.employeeCount,
    isActive: record.isActive,
    createdAt: record.createdAt.toISOString()
  };
}

/** The client secret never leaves the server; only its presence is reported. */
export function toIntegrationSummary(record: IntegrationRecord): IntegrationSummary {
  return {
    tenantId: record.tenantId,
    clientId: record.clientId,
    clientSecretConfigured: record.clientSecret.trim().length > 0,
    isActive: record.isActive,
    syncStatus: record.syncStatus,
    lastSync: isoOrNull(record.lastSync),
    lastSyncError: record.lastSyncError
  };
}

export function toSsoApplication(record: ApplicationRecord): SsoApplication {
  return {
    id: record.id,
    companyId: record.companyId,
    entraAppId: record.entraAppId,
    name: record.name,
    appType: record.appType,
    isActive: record.isActive,
    lastActivity: isoOrNull(record.lastActivity),
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString()
  };
}

export function toPreferences(record: PreferenceRecord): Preferences {
  return {
    theme: record.theme,
    dashboardLayout: record.dashboardLayout,
    notificationsEnabled: record.notificationsEnabled,
    refreshInterval: record.refreshInterval
  };
}

export function toMetric(record: MetricRecord): Metric {
  return {
    id: record.id,
    metricType: record.metricType,
    value: record.value,
    unit: record.unit,
    description: record.description,
    timestamp: record.timestamp.toISOString()
  };
}

export function toSystemEvent(record: EventRecord): SystemEvent {
  return {
    id: record.id,
    eventType: record.eventType,
    severity: record.severity,
    message: record.message,
    source: record.source,
    eventData: record.eventData,
    timestamp: record.timestamp.toISOString()
  };
}

export function toSyncState(snapshot: SyncSnapshot): SyncState {
  return {
    status: snapshot.status,
    lastSync: isoOrNull(snapshot.lastSync),
    lastSyncAgeSeconds: snapshot.lastSyncAgeSeconds,
    lastSyncError: snapshot.lastSyncError
  };
}

export function toDashboard(view: DashboardView): DashboardResponse {
  return {
    user: toUser(view.user),
    company: view.company ? toCompany(view.company) : null,
    applications: view.applications.map(toSsoApplication),
    metrics: view.metrics.map(toMetric),
    events: view.events.map(toSystemEvent),
    sync: view.sync ? toSyncState(view.sync) : null
  };
}
