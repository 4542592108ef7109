import { randomUUID } from "node:crypto";
import { ConflictError } from "../errors.js";
import type {
  AppRepository,
  ApplicationPatch,
  ApplicationRecord,
  CompanyRecord,
  CompanySetup,
  EventRecord,
  IntegrationRecord,
  MetricRecord,
  NewApplication,
  NewEvent,
  NewMetric,
  NewUser,
  PreferenceRecord,
  SessionRecord,
  TenantCredential,
  UserPatch,
  UserRecord
} from "./types.js";

function applicationKey(companyId: string, entraAppId: string) {
  return `${companyId}:${entraAppId}`;
}

function newestFirst<T extends { timestamp: Date }>(records: T[], limit: number): T[] {
  return [...records]
    .reverse()
    .sort((left, right) => right.timestamp.getTime() - left.timestamp.getTime())
    .slice(0, limit)
    .map((record) => ({ ...record }));
}

export class InMemoryRepository implements AppRepository {
  private readonly users = new Map<string, UserRecord>();
  private readonly companies = new Map<string, CompanyRecord>();
  private readonly integrations = new Map<string, IntegrationRecord>();
  private readonly applications = new Map<string, ApplicationRecord>();
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly preferences = new Map<string, PreferenceRecord>();
  private readonly metrics: MetricRecord[] = [];
  private readonly events: EventRecord[] = [];

  async createUser(input: NewUser): Promise<UserRecord> {
    this.assertUniqueUser(null, input.email, input.username);

    const user: UserRecord = { ...input, id: randomUUID(), lastLogin: null };
    this.users.set(user.id, user);
    return { ...user };
  }

  async findUserById(id: string): Promise<UserRecord | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const normalized = email.toLowerCase();
    for (const user of this.users.values()) {
      if (user.email === normalized) {
        return { ...user };
      }
    }
    return null;
  }

  async findUserByUsername(username: string): Promise<UserRecord | null> {
    for (const user of this.users.values()) {
      if (user.username === username) {
        return { ...user };
      }
    }
    return null;
  }

  async updateUser(id: string, patch: UserPatch): Promise<UserRecord | null> {
    const existing = this.users.get(id);
    if (!existing) {
      return null;
    }

    if (patch.email !== undefined) {
      this.assertUniqueUser(id, patch.email, null);
    }

    const updated: UserRecord = { ...existing, ...patch };
    this.users.set(id, updated);
    return { ...updated };
  }

  async listUsersByCompany(companyId: string): Promise<UserRecord[]> {
    return [...this.users.values()]
      .filter((user) => user.companyId === companyId)
      .sort((left, right) => left.createdAt.getTime() - right.createdAt.getTime())
      .map((user) => ({ ...user }));
  }

  async setupCompany(
    input: CompanySetup
  ): Promise<{ company: CompanyRecord; integration: IntegrationRecord; user: UserRecord }> {
    const admin = this.users.get(input.adminUserId);
    if (!admin) {
      throw new ConflictError("User no longer exists", "USER_NOT_FOUND");
    }

    const company: CompanyRecord = { ...input.company, id: randomUUID() };
    const integration: IntegrationRecord = {
      ...input.credential,
      id: randomUUID(),
      companyId: company.id,
      isActive: true,
      lastSync: null,
      syncStatus: "pending",
      lastSyncError: null,
      createdAt: input.now
    };
    const user: UserRecord = { ...admin, companyId: company.id, role: "admin" };

    this.companies.set(company.id, company);
    this.integrations.set(company.id, integration);
    this.users.set(user.id, user);

    return { company: { ...company }, integration: { ...integration }, user: { ...user } };
  }

  async findCompanyById(id: string): Promise<CompanyRecord | null> {
    const company = this.companies.get(id);
    return company ? { ...company } : null;
  }

  async findIntegrationByCompany(companyId: string): Promise<IntegrationRecord | null> {
    const integration = this.integrations.get(companyId);
    return integration ? { ...integration } : null;
  }

  async replaceIntegrationCredential(
    companyId: string,
    credential: TenantCredential
  ): Promise<IntegrationRecord | null> {
    const existing = this.integrations.get(companyId);
    if (!existing) {
      return null;
    }

    const updated: IntegrationRecord = {
      ...existing,
      ...credential,
      isActive: true,
      syncStatus: "pending",
      lastSyncError: null
    };
    this.integrations.set(companyId, updated);
    return { ...updated };
  }

  async markSyncSucceeded(companyId: string, at: Date): Promise<void> {
    const existing = this.integrations.get(companyId);
    if (existing) {
      this.integrations.set(companyId, {
        ...existing,
        syncStatus: "active",
        lastSync: at,
        lastSyncError: null
      });
    }
  }

  async markSyncFailed(companyId: string, message: string): Promise<void> {
    const existing = this.integrations.get(companyId);
    if (existing) {
      this.integrations.set(companyId, {
        ...existing,
        syncStatus: "error",
        lastSyncError: message
      });
    }
  }

  async listApplications(companyId: string): Promise<ApplicationRecord[]> {
    return [...this.applications.values()]
      .filter((application) => application.companyId === companyId)
      .sort(
        (left, right) =>
          left.name.localeCompare(right.name) || left.entraAppId.localeCompare(right.entraAppId)
      )
      .map((application) => ({ ...application }));
  }

  async findApplication(companyId: string, entraAppId: string): Promise<ApplicationRecord | null> {
    const application = this.applications.get(applicationKey(companyId, entraAppId));
    return application ? { ...application } : null;
  }

  async insertApplication(input: NewApplication): Promise<ApplicationRecord> {
    const key = applicationKey(input.companyId, input.entraAppId);
    if (this.applications.has(key)) {
      throw new ConflictError(`Application ${input.entraAppId} already exists for this company`);
    }

    const application: ApplicationRecord = {
      id: randomUUID(),
      companyId: input.companyId,
      entraAppId: input.entraAppId,
      name: input.name,
      appType: input.appType,
      isActive: input.isActive,
      lastActivity: null,
      createdAt: input.now,
      updatedAt: input.now
    };
    this.applications.set(key, application);
    return { ...application };
  }

  async updateApplication(id: string, patch: ApplicationPatch): Promise<ApplicationRecord | null> {
    for (const [key, application] of this.applications) {
      if (application.id !== id) {
        continue;
      }

      const updated: ApplicationRecord = {
        ...application,
        name: patch.name,
        appType: patch.appType,
        isActive: patch.isActive,
        updatedAt: patch.now
      };
      this.applications.set(key, updated);
      return { ...updated };
    }
    return null;
  }

  async createSession(input: Omit<SessionRecord, "id" | "revokedAt">): Promise<SessionRecord> {
    const session: SessionRecord = { ...input, id: randomUUID(), revokedAt: null };
    this.sessions.set(session.tokenHash, session);
    return { ...session };
  }

  async findSessionByTokenHash(tokenHash: string): Promise<SessionRecord | null> {
    const session = this.sessions.get(tokenHash);
    return session ? { ...session } : null;
  }

  async touchSession(id: string, at: Date): Promise<void> {
    for (const [tokenHash, session] of this.sessions) {
      if (session.id === id) {
        this.sessions.set(tokenHash, { ...session, lastSeenAt: at });
        return;
      }
    }
  }

  async revokeSession(tokenHash: string, at: Date): Promise<void> {
    const session = this.sessions.get(tokenHash);
    if (session && session.revokedAt === null) {
      this.sessions.set(tokenHash, { ...session, revokedAt: at });
    }
  }

  async findPreferences(userId: string): Promise<PreferenceRecord | null> {
    const preferences = this.preferences.get(userId);
    return preferences ? { ...preferences } : null;
  }

  async savePreferences(record: PreferenceRecord): Promise<PreferenceRecord> {
    this.preferences.set(record.userId, { ...record });
    return { ...record };
  }

  async insertMetric(input: NewMetric): Promise<MetricRecord> {
    const metric: MetricRecord = { ...input, id: randomUUID() };
    this.metrics.push(metric);
    return { ...metric };
  }

  async listMetrics(userId: string, limit: number): Promise<MetricRecord[]> {
    return newestFirst(
      this.metrics.filter((metric) => metric.userId === userId),
      limit
    );
  }

  async insertEvent(input: NewEvent): Promise<EventRecord> {
    const event: EventRecord = { ...input, id: randomUUID() };
    this.events.push(event);
    return { ...event };
  }

  async listEvents(userId: string, limit: number): Promise<EventRecord[]> {
    return newestFirst(
      this.events.filter((event) => event.userId === userId),
      limit
    );
  }

  async close(): Promise<void> {}

  private assertUniqueUser(selfId: string | null, email: string, username: string | null): void {
    for (const user of this.users.values()) {
      if (user.id === selfId) {
        continue;
      }
      if (user.email === email) {
        throw new ConflictError("Email already registered", "EMAIL_TAKEN");
      }
      if (username !== null && user.username === username) {
        throw new ConflictError("Username already taken", "USERNAME_TAKEN");
      }
    }
  }
}
