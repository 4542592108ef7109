import type { Pool } from "pg";
import { describe, expect, it } from "vitest";
import { ConflictError } from "../errors.js";
import { PostgresRepository, translateUniqueViolation } from "./postgres-repository.js";

interface RecordedQuery {
  text: string;
  values: unknown[];
}

type ScriptedResult = { rows: Record<string, unknown>[] } | Error;

class FakePool {
  readonly queries: RecordedQuery[] = [];
  released = 0;
  private readonly script: ScriptedResult[];

  constructor(script: ScriptedResult[] = []) {
    this.script = [...script];
  }

  async query(text: string, values: unknown[] = []) {
    this.queries.push({ text: text.replace(/\s+/gu, " ").trim(), values });
    const next = this.script.shift() ?? { rows: [] };
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async connect() {
    return {
      query: (text: string, values?: unknown[]) => this.query(text, values),
      release: () => {
        this.released += 1;
      }
    };
  }

  async end() {}

  asPool(): Pool {
    return this as unknown as Pool;
  }
}

function uniqueViolation(constraint: string): Error {
  return Object.assign(new Error("duplicate key value violates unique constraint"), {
    code: "23505",
    constraint
  });
}

const applicationRow = {
  id: "app-row-1",
  company_id: "company-1",
  entra_app_id: "a1",
  name: "Slack",
  app_type: "web",
  is_active: true,
  last_activity: null,
  created_at: new Date("2026-03-01T10:00:00.000Z"),
  updated_at: new Date("2026-03-01T10:00:00.000Z")
};

describe("translateUniqueViolation", () => {
  it("maps known constraints to conflict codes", () => {
    expect(translateUniqueViolation(uniqueViolation("users_email_key"))).toMatchObject({
      code: "EMAIL_TAKEN"
    });
    expect(
      translateUniqueViolation(uniqueViolation("sso_applications_company_app_key"))
    ).toBeInstanceOf(ConflictError);
  });

  it("passes other errors through", () => {
    const error = new Error("connection reset");
    expect(translateUniqueViolation(error)).toBe(error);
  });
});

describe("PostgresRepository", () => {
  it("maps application rows to records", async () => {
    const pool = new FakePool([{ rows: [applicationRow] }]);
    const repository = new PostgresRepository(pool.asPool());

    const application = await repository.findApplication("company-1", "a1");

    expect(application).toEqual({
      id: "app-row-1",
      companyId: "company-1",
      entraAppId: "a1",
      name: "Slack",
      appType: "web",
      isActive: true,
      lastActivity: null,
      createdAt: new Date("2026-03-01T10:00:00.000Z"),
      updatedAt: new Date("2026-03-01T10:00:00.000Z")
    });
    expect(pool.queries[0]?.values).toEqual(["company-1", "a1"]);
  });

  it("raises a conflict when a concurrent insert wins the unique constraint", async () => {
    const pool = new FakePool([uniqueViolation("sso_applications_company_app_key")]);
    const repository = new PostgresRepository(pool.asPool());

    await expect(
      repository.insertApplication({
        companyId: "company-1",
        entraAppId: "a1",
        name: "Slack",
        appType: "web",
        isActive: true,
        now: new Date("2026-03-01T10:00:00.000Z")
      })
    ).rejects.toMatchObject({ code: "CONFLICT", status: 409 });
  });

  it("only updates the columns present in a user patch", async () => {
    const pool = new FakePool([{ rows: [] }]);
    const repository = new PostgresRepository(pool.asPool());

    await repository.updateUser("user-1", {
      firstName: "Ada",
      lastLogin: new Date("2026-03-01T10:00:00.000Z")
    });

    expect(pool.queries[0]?.text).toContain(
      "set first_name = $2, last_login = $3::timestamptz where id = $1"
    );
    expect(pool.queries[0]?.values).toEqual(["user-1", "Ada", "2026-03-01T10:00:00.000Z"]);
  });

  it("leaves last_sync untouched when recording a failed sync", async () => {
    const pool = new FakePool();
    const repository = new PostgresRepository(pool.asPool());

    await repository.markSyncFailed("company-1", "Directory unavailable");

    expect(pool.queries[0]?.text).toBe(
      "update entra_integrations set sync_status = 'error', last_sync_error = $2 where company_id = $1"
    );
  });

  it("rolls back company setup when the admin user is gone", async () => {
    const pool = new FakePool([
      { rows: [] },
      {
        rows: [
          {
            id: "company-1",
            name: "Contoso",
            domain: null,
            industry: null,
            employee_count: null,
            is_active: true,
            created_at: new Date("2026-03-01T10:00:00.000Z")
          }
        ]
      },
      { rows: [] }
    ]);
    const repository = new PostgresRepository(pool.asPool());

    await expect(
      repository.setupCompany({
        company: {
          name: "Contoso",
          domain: null,
          industry: null,
          employeeCount: null,
          isActive: true,
          createdAt: new Date("2026-03-01T10:00:00.000Z")
        },
        credential: { tenantId: "tenant-1", clientId: "client-1", clientSecret: "test-secret" },
        adminUserId: "missing-user",
        now: new Date("2026-03-01T10:00:00.000Z")
      })
    ).rejects.toMatchObject({ code: "USER_NOT_FOUND" });

    expect(pool.queries.map((query) => query.text.split(" ")[0])).toEqual([
      "begin",
      "insert",
      "update",
      "rollback"
    ]);
    expect(pool.released).toBe(1);
  });
});
