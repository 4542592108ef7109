import { randomUUID } from "node:crypto";
import { Pool } from "pg";
import { ConflictError } from "../errors.js";
import type {
  AppRepository,
  ApplicationPatch,
  ApplicationRecord,
  CompanyRecord,
  CompanySetup,
  DashboardLayout,
  EventRecord,
  EventSeverity,
  IntegrationRecord,
  MetricRecord,
  NewApplication,
  NewEvent,
  NewMetric,
  NewUser,
  PreferenceRecord,
  SessionRecord,
  SyncStatus,
  TenantCredential,
  Theme,
  UserPatch,
  UserRecord,
  UserRole
} from "./types.js";

type UserRow = {
  id: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  is_active: boolean;
  is_admin: boolean;
  role: string;
  company_id: string | null;
  created_at: Date;
  last_login: Date | null;
};

type CompanyRow = {
  id: string;
  name: string;
  domain: string | null;
  industry: string | null;
  employee_count: number | null;
  is_active: boolean;
  created_at: Date;
};

type IntegrationRow = {
  id: string;
  company_id: string;
  tenant_id: string;
  client_id: string;
  client_secret: string;
  is_active: boolean;
  last_sync: Date | null;
  sync_status: string;
  last_sync_error: string | null;
  created_at: Date;
};

type ApplicationRow = {
  id: string;
  company_id: string;
  entra_app_id: string;
  name: string;
  app_type: string;
  is_active: boolean;
  last_activity: Date | null;
  created_at: Date;
  updated_at: Date;
};

type SessionRow = {
  id: string;
  user_id: string;
  token_hash: string;
  created_at: Date;
  expires_at: Date;
  revoked_at: Date | null;
  last_seen_at: Date;
};

type PreferenceRow = {
  user_id: string;
  theme: string;
  dashboard_layout: string;
  notifications_enabled: boolean;
  refresh_interval: number;
};

type MetricRow = {
  id: string;
  user_id: string;
  metric_type: string;
  value: number;
  unit: string | null;
  description: string | null;
  recorded_at: Date;
};

type EventRow = {
  id: string;
  user_id: string;
  event_type: string;
  severity: string;
  message: string;
  source: string;
  event_data: unknown;
  occurred_at: Date;
};

const USER_COLUMNS = `
  id, username, email, first_name, last_name, password_hash, is_active, is_admin, role,
  company_id, created_at, last_login
`;

const INTEGRATION_COLUMNS = `
  id, company_id, tenant_id, client_id, client_secret, is_active, last_sync, sync_status,
  last_sync_error, created_at
`;

const APPLICATION_COLUMNS = `
  id, company_id, entra_app_id, name, app_type, is_active, last_activity, created_at, updated_at
`;

function toUserRole(value: string): UserRole {
  return value === "admin" ? "admin" : "user";
}

function toSyncStatus(value: string): SyncStatus {
  if (value === "active" || value === "error") {
    return value;
  }
  return "pending";
}

function toTheme(value: string): Theme {
  return value === "dark" ? "dark" : "light";
}

function toDashboardLayout(value: string): DashboardLayout {
  if (value === "compact" || value === "detailed") {
    return value;
  }
  return "default";
}

function toSeverity(value: string): EventSeverity {
  if (value === "warning" || value === "error" || value === "critical") {
    return value;
  }
  return "info";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mapUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    passwordHash: row.password_hash,
    isActive: row.is_active,
    isAdmin: row.is_admin,
    role: toUserRole(row.role),
    companyId: row.company_id,
    createdAt: row.created_at,
    lastLogin: row.last_login
  };
}

function mapCompany(row: CompanyRow): CompanyRecord {
  return {
    id: row.id,
    name: row.name,
    domain: row.domain,
    industry: row.industry,
    employeeCount: row.employee_count,
    isActive: row.is_active,
    createdAt: row.created_at
  };
}

function mapIntegration(row: IntegrationRow): IntegrationRecord {
  return {
    id: row.id,
    companyId: row.company_id,
    tenantId: row.tenant_id,
    clientId: row.client_id,
    clientSecret: row.client_secret,
    isActive: row.is_active,
    lastSync: row.last_sync,
    syncStatus: toSyncStatus(row.sync_status),
    lastSyncError: row.last_sync_error,
    createdAt: row.created_at
  };
}

function mapApplication(row: ApplicationRow): ApplicationRecord {
  return {
    id: row.id,
    companyId: row.company_id,
    entraAppId: row.entra_app_id,
    name: row.name,
    appType: row.app_type,
    isActive: row.is_active,
    lastActivity: row.last_activity,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function mapSession(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    userId: row.user_id,
    tokenHash: row.token_hash,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    revokedAt: row.revoked_at,
    lastSeenAt: row.last_seen_at
  };
}

function mapPreferences(row: PreferenceRow): PreferenceRecord {
  return {
    userId: row.user_id,
    theme: toTheme(row.theme),
    dashboardLayout: toDashboardLayout(row.dashboard_layout),
    notificationsEnabled: row.notifications_enabled,
    refreshInterval: row.refresh_interval
  };
}

function mapMetric(row: MetricRow): MetricRecord {
  return {
    id: row.id,
    userId: row.user_id,
    metricType: row.metric_type,
    value: row.value,
    unit: row.unit,
    description: row.description,
    timestamp: row.recorded_at
  };
}

function mapEvent(row: EventRow): EventRecord {
  return {
    id: row.id,
    userId: row.user_id,
    eventType: row.event_type,
    severity: toSeverity(row.severity),
    message: row.message,
    source: row.source,
    eventData: isRecord(row.event_data) ? row.event_data : null,
    timestamp: row.occurred_at
  };
}

/** Translates PostgreSQL unique violations (SQLSTATE 23505) into `ConflictError`. */
export function translateUniqueViolation(error: unknown): unknown {
  if (!(error instanceof Error) || !("code" in error) || error.code !== "23505") {
    return error;
  }

  const constraint =
    "constraint" in error && typeof error.constraint === "string" ? error.constraint : "";

  if (constraint === "users_email_key") {
    return new ConflictError("Email already registered", "EMAIL_TAKEN");
  }
  if (constraint === "users_username_key") {
    return new ConflictError("Username already taken", "USERNAME_TAKEN");
  }
  if (constraint === "sso_applications_company_app_key") {
    return new ConflictError("Application already exists for this company");
  }
  return new ConflictError("Resource already exists");
}

export class PostgresRepository implements AppRepository {
  private readonly pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  static fromUrl(databaseUrl: string): PostgresRepository {
    return new PostgresRepository(new Pool({ connectionString: databaseUrl }));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async createUser(input: NewUser): Promise<UserRecord> {
    try {
      const result = await this.pool.query<UserRow>(
        `
          insert into users (
            id, username, email, first_name, last_name, password_hash, is_active, is_admin,
            role, company_id, created_at
          ) values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11::timestamptz)
          returning ${USER_COLUMNS}
        `,
        [
          randomUUID(),
          input.username,
          input.email,
          input.firstName,
          input.lastName,
          input.passwordHash,
          input.isActive,
          input.isAdmin,
          input.role,
          input.companyId,
          input.createdAt.toISOString()
        ]
      );
      return mapUser(this.requireRow(result.rows, "users"));
    } catch (error) {
      throw translateUniqueViolation(error);
    }
  }

  async findUserById(id: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(
      `select ${USER_COLUMNS} from users where id = $1`,
      [id]
    );
    const row = result.rows.at(0);
    return row ? mapUser(row) : null;
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(
      `select ${USER_COLUMNS} from users where email = $1`,
      [email.toLowerCase()]
    );
    const row = result.rows.at(0);
    return row ? mapUser(row) : null;
  }

  async findUserByUsername(username: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(
      `select ${USER_COLUMNS} from users where username = $1`,
      [username]
    );
    const row = result.rows.at(0);
    return row ? mapUser(row) : null;
  }

  async updateUser(id: string, patch: UserPatch): Promise<UserRecord | null> {
    const assignments: string[] = [];
    const values: unknown[] = [id];
    const assign = (column: string, value: unknown, cast = "") => {
      values.push(value);
      assignments.push(`${column} = $${values.length}${cast}`);
    };

    if (patch.firstName !== undefined) {
      assign("first_name", patch.firstName);
    }
    if (patch.lastName !== undefined) {
      assign("last_name", patch.lastName);
    }
    if (patch.email !== undefined) {
      assign("email", patch.email);
    }
    if (patch.role !== undefined) {
      assign("role", patch.role);
    }
    if (patch.companyId !== undefined) {
      assign("company_id", patch.companyId);
    }
    if (patch.lastLogin !== undefined) {
      assign("last_login", patch.lastLogin?.toISOString() ?? null, "::timestamptz");
    }

    if (assignments.length === 0) {
      return this.findUserById(id);
    }

    try {
      const result = await this.pool.query<UserRow>(
        `
          update users
          set ${assignments.join(", ")}
          where id = $1
          returning ${USER_COLUMNS}
        `,
        values
      );
      const row = result.rows.at(0);
      return row ? mapUser(row) : null;
    } catch (error) {
      throw translateUniqueViolation(error);
    }
  }

  async listUsersByCompany(companyId: string): Promise<UserRecord[]> {
    const result = await this.pool.query<UserRow>(
      `select ${USER_COLUMNS} from users where company_id = $1 order by created_at asc, username asc`,
      [companyId]
    );
    return result.rows.map(mapUser);
  }

  async setupCompany(
    input: CompanySetup
  ): Promise<{ company: CompanyRecord; integration: IntegrationRecord; user: UserRecord }> {
    const client = await this.pool.connect();

    try {
      await client.query("begin");

      const companyResult = await client.query<CompanyRow>(
        `
          insert into companies (id, name, domain, industry, employee_count, is_active, created_at)
          values ($1, $2, $3, $4, $5, $6, $7::timestamptz)
          returning id, name, domain, industry, employee_count, is_active, created_at
        `,
        [
          randomUUID(),
          input.company.name,
          input.company.domain,
          input.company.industry,
          input.company.employeeCount,
          input.company.isActive,
          input.company.createdAt.toISOString()
        ]
      );
      const company = mapCompany(this.requireRow(companyResult.rows, "companies"));

      const userResult = await client.query<UserRow>(
        `
          update users
          set company_id = $2, role = 'admin'
          where id = $1
          returning ${USER_COLUMNS}
        `,
        [input.adminUserId, company.id]
      );
      const userRow = userResult.rows.at(0);
      if (!userRow) {
        throw new ConflictError("User no longer exists", "USER_NOT_FOUND");
      }

      const integrationResult = await client.query<IntegrationRow>(
        `
          insert into entra_integrations (
            id, company_id, tenant_id, client_id, client_secret, is_active, sync_status, created_at
          ) values ($1, $2, $3, $4, $5, true, 'pending', $6::timestamptz)
          returning ${INTEGRATION_COLUMNS}
        `,
        [
          randomUUID(),
          company.id,
          input.credential.tenantId,
          input.credential.clientId,
          input.credential.clientSecret,
          input.now.toISOString()
        ]
      );

      await client.query("commit");

      return {
        company,
        integration: mapIntegration(this.requireRow(integrationResult.rows, "entra_integrations")),
        user: mapUser(userRow)
      };
    } catch (error) {
      await client.query("rollback");
      throw translateUniqueViolation(error);
    } finally {
      client.release();
    }
  }

  async findCompanyById(id: string): Promise<CompanyRecord | null> {
    const result = await this.pool.query<CompanyRow>(
      `
        select id, name, domain, industry, employee_count, is_active, created_at
        from companies
        where id = $1
      `,
      [id]
    );
    const row = result.rows.at(0);
    return row ? mapCompany(row) : null;
  }

  async findIntegrationByCompany(companyId: string): Promise<IntegrationRecord | null> {
    const result = await this.pool.query<IntegrationRow>(
      `select ${INTEGRATION_COLUMNS} from entra_integrations where company_id = $1`,
      [companyId]
    );
    const row = result.rows.at(0);
    return row ? mapIntegration(row) : null;
  }

  async replaceIntegrationCredential(
    companyId: string,
    credential: TenantCredential
  ): Promise<IntegrationRecord | null> {
    const result = await this.pool.query<IntegrationRow>(
      `
        update entra_integrations
        set tenant_id = $2,
            client_id = $3,
            client_secret = $4,
            is_active = true,
            sync_status = 'pending',
            last_sync_error = null
        where company_id = $1
        returning ${INTEGRATION_COLUMNS}
      `,
      [companyId, credential.tenantId, credential.clientId, credential.clientSecret]
    );
    const row = result.rows.at(0);
    return row ? mapIntegration(row) : null;
  }

  async markSyncSucceeded(companyId: string, at: Date): Promise<void> {
    await this.pool.query(
      `
        update entra_integrations
        set sync_status = 'active', last_sync = $2::timestamptz, last_sync_error = null
        where company_id = $1
      `,
      [companyId, at.toISOString()]
    );
  }

  async markSyncFailed(companyId: string, message: string): Promise<void> {
    await this.pool.query(
      `
        update entra_integrations
        set sync_status = 'error', last_sync_error = $2
        where company_id = $1
      `,
      [companyId, message]
    );
  }

  async listApplications(companyId: string): Promise<ApplicationRecord[]> {
    const result = await this.pool.query<ApplicationRow>(
      `
        select ${APPLICATION_COLUMNS}
        from sso_applications
        where company_id = $1
        order by name asc, entra_app_id asc
      `,
      [companyId]
    );
    return result.rows.map(mapApplication);
  }

  async findApplication(companyId: string, entraAppId: string): Promise<ApplicationRecord | null> {
    const result = await this.pool.query<ApplicationRow>(
      `
        select ${APPLICATION_COLUMNS}
        from sso_applications
        where company_id = $1 and entra_app_id = $2
      `,
      [companyId, entraAppId]
    );
    const row = result.rows.at(0);
    return row ? mapApplication(row) : null;
  }

  async insertApplication(input: NewApplication): Promise<ApplicationRecord> {
    try {
      const result = await this.pool.query<ApplicationRow>(
        `
          insert into sso_applications (
            id, company_id, entra_app_id, name, app_type, is_active, created_at, updated_at
          ) values ($1, $2, $3, $4, $5, $6, $7::timestamptz, $7::timestamptz)
          returning ${APPLICATION_COLUMNS}
        `,
        [
          randomUUID(),
          input.companyId,
          input.entraAppId,
          input.name,
          input.appType,
          input.isActive,
          input.now.toISOString()
        ]
      );
      return mapApplication(this.requireRow(result.rows, "sso_applications"));
    } catch (error) {
      throw translateUniqueViolation(error);
    }
  }

  async updateApplication(id: string, patch: ApplicationPatch): Promise<ApplicationRecord | null> {
    const result = await this.pool.query<ApplicationRow>(
      `
        update sso_applications
        set name = $2, app_type = $3, is_active = $4, updated_at = $5::timestamptz
        where id = $1
        returning ${APPLICATION_COLUMNS}
      `,
      [id, patch.name, patch.appType, patch.isActive, patch.now.toISOString()]
    );
    const row = result.rows.at(0);
    return row ? mapApplication(row) : null;
  }

  async createSession(input: Omit<SessionRecord, "id" | "revokedAt">): Promise<SessionRecord> {
    const result = await this.pool.query<SessionRow>(
      `
        insert into auth_sessions (id, user_id, token_hash, created_at, expires_at, last_seen_at)
        values ($1, $2, $3, $4::timestamptz, $5::timestamptz, $6::timestamptz)
        returning id, user_id, token_hash, created_at, expires_at, revoked_at, last_seen_at
      `,
      [
        randomUUID(),
        input.userId,
        input.tokenHash,
        input.createdAt.toISOString(),
        input.expiresAt.toISOString(),
        input.lastSeenAt.toISOString()
      ]
    );
    return mapSession(this.requireRow(result.rows, "auth_sessions"));
  }

  async findSessionByTokenHash(tokenHash: string): Promise<SessionRecord | null> {
    const result = await this.pool.query<SessionRow>(
      `
        select id, user_id, token_hash, created_at, expires_at, revoked_at, last_seen_at
        from auth_sessions
        where token_hash = $1
      `,
      [tokenHash]
    );
    const row = result.rows.at(0);
    return row ? mapSession(row) : null;
  }

  async touchSession(id: string, at: Date): Promise<void> {
    await this.pool.query(
      "update auth_sessions set last_seen_at = $2::timestamptz where id = $1",
      [id, at.toISOString()]
    );
  }

  async revokeSession(tokenHash: string, at: Date): Promise<void> {
    await this.pool.query(
      `
        update auth_sessions
        set revoked_at = $2::timestamptz
        where token_hash = $1 and revoked_at is null
      `,
      [tokenHash, at.toISOString()]
    );
  }

  async findPreferences(userId: string): Promise<PreferenceRecord | null> {
    const result = await this.pool.query<PreferenceRow>(
      `
        select user_id, theme, dashboard_layout, notifications_enabled, refresh_interval
        from user_preferences
        where user_id = $1
      `,
      [userId]
    );
    const row = result.rows.at(0);
    return row ? mapPreferences(row) : null;
  }

  async savePreferences(record: PreferenceRecord): Promise<PreferenceRecord> {
    const result = await this.pool.query<PreferenceRow>(
      `
        insert into user_preferences (
          user_id, theme, dashboard_layout, notifications_enabled, refresh_interval
        ) values ($1, $2, $3, $4, $5)
        on conflict (user_id) do update
        set theme = excluded.theme,
            dashboard_layout = excluded.dashboard_layout,
            notifications_enabled = excluded.notifications_enabled,
            refresh_interval = excluded.refresh_interval
        returning user_id, theme, dashboard_layout, notifications_enabled, refresh_interval
      `,
      [
        record.userId,
        record.theme,
        record.dashboardLayout,
        record.notificationsEnabled,
        record.refreshInterval
      ]
    );
    return mapPreferences(this.requireRow(result.rows, "user_preferences"));
  }

  async insertMetric(input: NewMetric): Promise<MetricRecord> {
    const result = await this.pool.query<MetricRow>(
      `
        insert into app_metrics (id, user_id, metric_type, value, unit, description, recorded_at)
        values ($1, $2, $3, $4, $5, $6, $7::timestamptz)
        returning id, user_id, metric_type, value, unit, description, recorded_at
      `,
      [
        randomUUID(),
        input.userId,
        input.metricType,
        input.value,
        input.unit,
        input.description,
        input.timestamp.toISOString()
      ]
    );
    return mapMetric(this.requireRow(result.rows, "app_metrics"));
  }

  async listMetrics(userId: string, limit: number): Promise<MetricRecord[]> {
    const result = await this.pool.query<MetricRow>(
      `
        select id, user_id, metric_type, value, unit, description, recorded_at
        from app_metrics
        where user_id = $1
        order by recorded_at desc
        limit $2
      `,
      [userId, limit]
    );
    return result.rows.map(mapMetric);
  }

  async insertEvent(input: NewEvent): Promise<EventRecord> {
    const result = await this.pool.query<EventRow>(
      `
        insert into system_events (
          id, user_id, event_type, severity, message, source, event_data, occurred_at
        ) values ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::timestamptz)
        returning id, user_id, event_type, severity, message, source, event_data, occurred_at
      `,
      [
        randomUUID(),
        input.userId,
        input.eventType,
        input.severity,
        input.message,
        input.source,
        input.eventData === null ? null : JSON.stringify(input.eventData),
        input.timestamp.toISOString()
      ]
    );
    return mapEvent(this.requireRow(result.rows, "system_events"));
  }

  async listEvents(userId: string, limit: number): Promise<EventRecord[]> {
    const result = await this.pool.query<EventRow>(
      `
        select id, user_id, event_type, severity, message, source, event_data, occurred_at
        from system_events
        where user_id = $1
        order by occurred_at desc
        limit $2
      `,
      [userId, limit]
    );
    return result.rows.map(mapEvent);
  }

  private requireRow<Row>(rows: Row[], table: string): Row {
    const row = rows.at(0);
    if (!row) {
      throw new Error(`Expected ${table} to return a row`);
    }
    return row;
  }
}
