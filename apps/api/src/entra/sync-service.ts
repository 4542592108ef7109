import type { ConnectionTestResult, SyncFailureCode, SyncResult } from "@app-monitor/contracts";
import { ConflictError, TokenAcquisitionError, errorMessage } from "../errors.js";
import { type Logger, serializeError } from "../logger.js";
import type {
  AppRepository,
  ApplicationRecord,
  IntegrationRecord,
  UserRecord
} from "../storage/types.js";
import type { DirectoryClientRegistry } from "./client-registry.js";
import type { DirectoryClient } from "./directory-client.js";
import type { RemoteApplication } from "./graph.js";

export const DEFAULT_APPLICATION_TYPE = "web";

export function canManageCompany(actor: UserRecord, companyId: string): boolean {
  return (
    actor.isActive && actor.companyId === companyId && (actor.role === "admin" || actor.isAdmin)
  );
}

export function isCompanyMember(actor: UserRecord, companyId: string): boolean {
  return actor.isActive && actor.companyId === companyId;
}

export function hasUsableCredential(integration: IntegrationRecord | null): boolean {
  return Boolean(
    integration?.isActive &&
      integration.tenantId.trim() &&
      integration.clientId.trim() &&
      integration.clientSecret.trim()
  );
}

interface DesiredApplication {
  name: string;
  appType: string;
  isActive: boolean;
}

function desiredState(remote: RemoteApplication): DesiredApplication {
  return {
    name: remote.displayName || remote.appId || remote.id,
    appType: remote.signInAudience || DEFAULT_APPLICATION_TYPE,
    isActive: remote.enabled ?? true
  };
}

function differs(existing: ApplicationRecord, desired: DesiredApplication): boolean {
  return (
    existing.name !== desired.name ||
    existing.appType !== desired.appType ||
    existing.isActive !== desired.isActive
  );
}

type GateFailure = { code: "FORBIDDEN" | "NOT_CONFIGURED"; error: string };
type Gate = { ok: true; client: DirectoryClient } | ({ ok: false } & GateFailure);

function classifyFailure(error: unknown): {
  code: SyncFailureCode;
  error: string;
  retryable: boolean;
} {
  if (error instanceof TokenAcquisitionError) {
    return { code: "DIRECTORY_AUTH_FAILED", error: error.message, retryable: false };
  }

  if (error instanceof ConflictError) {
    return { code: "CONFLICT", error: error.message, retryable: true };
  }

  return { code: "SYNC_FAILED", error: errorMessage(error), retryable: false };
}

export interface DirectorySyncServiceOptions {
  repository: AppRepository;
  registry: DirectoryClientRegistry;
  logger: Logger;
  updateExisting: boolean;
}

/**
 * Pulls application registrations from a company's directory into its local inventory.
 *
 * Local applications are keyed by `(companyId, remote id)` and are never removed when the
 * directory stops reporting them. Authorization and configuration are checked before any network
 * call; neither gate touches the sync state.
 */
export class DirectorySyncService {
  private readonly repository: AppRepository;
  private readonly registry: DirectoryClientRegistry;
  private readonly logger: Logger;
  private readonly updateExisting: boolean;

  constructor(options: DirectorySyncServiceOptions) {
    this.repository = options.repository;
    this.registry = options.registry;
    this.logger = options.logger;
    this.updateExisting = options.updateExisting;
  }

  async syncApplications(input: {
    actor: UserRecord;
    companyId: string;
    now: Date;
  }): Promise<SyncResult> {
    const { actor, companyId, now } = input;
    const gate = await this.openGate(actor, companyId);
    if (!gate.ok) {
      return { success: false, code: gate.code, error: gate.error, retryable: false };
    }

    this.logger.info(
      { event: "directory.sync_started", companyId, actorId: actor.id },
      "Directory sync started"
    );

    try {
      const remotes = await gate.client.getApplications();
      let created = 0;
      let updated = 0;
      let unchanged = 0;

      for (const remote of remotes) {
        const desired = desiredState(remote);
        const existing = await this.repository.findApplication(companyId, remote.id);

        if (!existing) {
          await this.repository.insertApplication({
            companyId,
            entraAppId: remote.id,
            ...desired,
            now
          });
          created += 1;
        } else if (this.updateExisting && differs(existing, desired)) {
          await this.repository.updateApplication(existing.id, { ...desired, now });
          updated += 1;
        } else {
          unchanged += 1;
        }
      }

      await this.repository.markSyncSucceeded(companyId, now);

      this.logger.info(
        {
          event: "directory.sync_completed",
          companyId,
          count: remotes.length,
          created,
          updated,
          unchanged
        },
        "Directory sync completed"
      );

      return {
        success: true,
        count: remotes.length,
        created,
        updated,
        unchanged,
        message: `Synced ${remotes.length} applications from Entra ID`,
        lastSync: now.toISOString()
      };
    } catch (error) {
      const failure = classifyFailure(error);
      try {
        await this.repository.markSyncFailed(companyId, failure.error);
      } catch (stateError) {
        this.logger.error(
          {
            event: "directory.sync_state_write_failed",
            companyId,
            error: serializeError(stateError)
          },
          "Could not record the failed sync"
        );
      }

      this.logger.error(
        {
          event: "directory.sync_failed",
          companyId,
          code: failure.code,
          error: serializeError(error)
        },
        "Directory sync failed"
      );

      return { success: false, ...failure };
    }
  }

  async testConnection(input: {
    actor: UserRecord;
    companyId: string;
  }): Promise<ConnectionTestResult> {
    const gate = await this.openGate(input.actor, input.companyId);
    if (!gate.ok) {
      return { success: false, code: gate.code, error: gate.error };
    }

    const probe = await gate.client.testConnection();
    if (!probe.success) {
      this.logger.warn(
        { event: "directory.connection_test_failed", companyId: input.companyId, stage: probe.stage },
        "Directory connection test failed"
      );
      return {
        success: false,
        code: probe.stage === "token" ? "DIRECTORY_AUTH_FAILED" : "SYNC_FAILED",
        error: probe.error
      };
    }

    const applications = await gate.client.getApplications();
    return {
      success: true,
      message: `Connection successful! Found ${applications.length} applications.`,
      tenantName: probe.tenantName,
      tenantId: probe.tenantId,
      appCount: applications.length
    };
  }

  private async openGate(actor: UserRecord, companyId: string): Promise<Gate> {
    if (!canManageCompany(actor, companyId)) {
      return { ok: false, code: "FORBIDDEN", error: "Insufficient permissions" };
    }

    const integration = await this.repository.findIntegrationByCompany(companyId);
    if (!integration || !hasUsableCredential(integration)) {
      return { ok: false, code: "NOT_CONFIGURED", error: "Entra ID not configured" };
    }

    return {
      ok: true,
      client: this.registry.clientFor(companyId, {
        tenantId: integration.tenantId,
        clientId: integration.clientId,
        clientSecret: integration.clientSecret
      })
    };
  }
}
