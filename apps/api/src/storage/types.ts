export type UserRole = "admin" | "user";
export type SyncStatus = "pending" | "active" | "error";
export type Theme = "light" | "dark";
export type DashboardLayout = "default" | "compact" | "detailed";
export type EventSeverity = "info" | "warning" | "error" | "critical";

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  isActive: boolean;
  isAdmin: boolean;
  role: UserRole;
  companyId: string | null;
  createdAt: Date;
  lastLogin: Date | null;
}

export type NewUser = Omit<UserRecord, "id" | "lastLogin">;

export type UserPatch = Partial<
  Pick<UserRecord, "firstName" | "lastName" | "email" | "role" | "companyId" | "lastLogin">
>;

export interface CompanyRecord {
  id: string;
  name: string;
  domain: string | null;
  industry: string | null;
  employeeCount: number | null;
  isActive: boolean;
  createdAt: Date;
}

export interface TenantCredential {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface IntegrationRecord extends TenantCredential {
  id: string;
  companyId: string;
  isActive: boolean;
  lastSync: Date | null;
  syncStatus: SyncStatus;
  lastSyncError: string | null;
  createdAt: Date;
}

export interface ApplicationRecord {
  id: string;
  companyId: string;
  entraAppId: string;
  name: string;
  appType: string;
  isActive: boolean;
  lastActivity: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewApplication {
  companyId: string;
  entraAppId: string;
  name: string;
  appType: string;
  isActive: boolean;
  now: Date;
}

export interface ApplicationPatch {
  name: string;
  appType: string;
  isActive: boolean;
  now: Date;
}

export interface SessionRecord {
  id: string;
  userId: string;
  tokenHash: string;
  createdAt: Date;
  expiresAt: Date;
  revokedAt: Date | null;
  lastSeenAt: Date;
}

export interface PreferenceRecord {
  userId: string;
  theme: Theme;
  dashboardLayout: DashboardLayout;
  notificationsEnabled: boolean;
  refreshInterval: number;
}

export interface MetricRecord {
  id: string;
  userId: string;
  metricType: string;
  value: number;
  unit: string | null;
  description: string | null;
  timestamp: Date;
}

export type NewMetric = Omit<MetricRecord, "id">;

export interface EventRecord {
  id: string;
  userId: string;
  eventType: string;
  severity: EventSeverity;
  message: string;
  source: string;
  eventData: Record<string, unknown> | null;
  timestamp: Date;
}

export type NewEvent = Omit<EventRecord, "id">;

export interface CompanySetup {
  company: Omit<CompanyRecord, "id">;
  credential: TenantCredential;
  adminUserId: string;
  now: Date;
}

/**
 * Data access for every record the API owns. Unique violations surface as `ConflictError`
 * from both implementations.
 */
export interface AppRepository {
  createUser(input: NewUser): Promise<UserRecord>;
  findUserById(id: string): Promise<UserRecord | null>;
  findUserByEmail(email: string): Promise<UserRecord | null>;
  findUserByUsername(username: string): Promise<UserRecord | null>;
  updateUser(id: string, patch: UserPatch): Promise<UserRecord | null>;
  listUsersByCompany(companyId: string): Promise<UserRecord[]>;

  setupCompany(
    input: CompanySetup
  ): Promise<{ company: CompanyRecord; integration: IntegrationRecord; user: UserRecord }>;
  findCompanyById(id: string): Promise<CompanyRecord | null>;

  findIntegrationByCompany(companyId: string): Promise<IntegrationRecord | null>;
  replaceIntegrationCredential(
    companyId: string,
    credential: TenantCredential
  ): Promise<IntegrationRecord | null>;
  markSyncSucceeded(companyId: string, at: Date): Promise<void>;
  markSyncFailed(companyId: string, message: string): Promise<void>;

  listApplications(companyId: string): Promise<ApplicationRecord[]>;
  findApplication(companyId: string, entraAppId: string): Promise<ApplicationRecord | null>;
  insertApplication(input: NewApplication): Promise<ApplicationRecord>;
  updateApplication(id: string, patch: ApplicationPatch): Promise<ApplicationRecord | null>;

  createSession(input: Omit<SessionRecord, "id" | "revokedAt">): Promise<SessionRecord>;
  findSessionByTokenHash(tokenHash: string): Promise<SessionRecord | null>;
  touchSession(id: string, at: Date): Promise<void>;
  revokeSession(tokenHash: string, at: Date): Promise<void>;

  findPreferences(userId: string): Promise<PreferenceRecord | null>;
  savePreferences(record: PreferenceRecord): Promise<PreferenceRecord>;

  insertMetric(input: NewMetric): Promise<MetricRecord>;
  listMetrics(userId: string, limit: number): Promise<MetricRecord[]>;
  insertEvent(input: NewEvent): Promise<EventRecord>;
  listEvents(userId: string, limit: number): Promise<EventRecord[]>;

  close(): Promise<void>;
}
