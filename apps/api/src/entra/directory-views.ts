import type {
  DirectoryObject,
  DirectoryRole,
  DirectoryUser,
  PermissionsStatus,
  SignInRecord
} from "@app-monitor/contracts";
import { AuthorizationError, ConfigurationError } from "../errors.js";
import type { AppRepository, UserRecord } from "../storage/types.js";
import type { DirectoryClientRegistry } from "./client-registry.js";
import type { DirectoryClient } from "./directory-client.js";
import { hasUsableCredential, isCompanyMember } from "./sync-service.js";

/**
 * Read-only directory pages for company members. Outages degrade to empty lists;
 * token failures propagate as `TokenAcquisitionError`.
 */
export class DirectoryViewService {
  private readonly repository: AppRepository;
  private readonly registry: DirectoryClientRegistry;
  private readonly defaultWindowDays: number;

  constructor(input: {
    repository: AppRepository;
    registry: DirectoryClientRegistry;
    defaultWindowDays: number;
  }) {
    this.repository = input.repository;
    this.registry = input.registry;
    this.defaultWindowDays = input.defaultWindowDays;
  }

  async listUsers(actor: UserRecord, companyId: string): Promise<DirectoryUser[]> {
    const client = await this.clientFor(actor, companyId);
    return client.getUsers();
  }

  async listSignIns(
    actor: UserRecord,
    companyId: string,
    days?: number
  ): Promise<{ windowDays: number; items: SignInRecord[] }> {
    const client = await this.clientFor(actor, companyId);
    const windowDays = days ?? this.defaultWindowDays;
    return { windowDays, items: await client.getSignInLogs(windowDays) };
  }

  async listApplicationSignIns(
    actor: UserRecord,
    companyId: string,
    appId: string,
    days?: number
  ): Promise<{ windowDays: number; items: SignInRecord[] }> {
    const client = await this.clientFor(actor, companyId);
    const windowDays = days ?? this.defaultWindowDays;
    return { windowDays, items: await client.getApplicationSignIns(appId, windowDays) };
  }

  async listRoles(actor: UserRecord, companyId: string): Promise<DirectoryRole[]> {
    const client = await this.clientFor(actor, companyId);
    return client.getDirectoryRoles();
  }

  async listRoleMembers(
    actor: UserRecord,
    companyId: string,
    roleId: string
  ): Promise<DirectoryObject[]> {
    const client = await this.clientFor(actor, companyId);
    return client.getDirectoryRoleMembers(roleId);
  }

  async permissionsStatus(actor: UserRecord, companyId: string): Promise<PermissionsStatus> {
    const client = await this.clientFor(actor, companyId);
    return client.getPermissionsStatus();
  }

  private async clientFor(actor: UserRecord, companyId: string): Promise<DirectoryClient> {
    if (!isCompanyMember(actor, companyId)) {
      throw new AuthorizationError();
    }

    const integration = await this.repository.findIntegrationByCompany(companyId);
    if (!integration || !hasUsableCredential(integration)) {
      throw new ConfigurationError();
    }

    return this.registry.clientFor(companyId, {
      tenantId: integration.tenantId,
      clientId: integration.clientId,
      clientSecret: integration.clientSecret
    });
  }
}
