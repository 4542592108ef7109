import type {
  CompanySetupRequest,
  CompanyUserCreateRequest,
  IntegrationCredentialRequest
} from "@app-monitor/contracts";
import type { AuthService } from "./auth-service.js";
import type { DirectoryClientRegistry } from "./entra/client-registry.js";
import { canManageCompany, isCompanyMember } from "./entra/sync-service.js";
import { ApiError, AuthorizationError, ConflictError } from "./errors.js";
import type { Logger } from "./logger.js";
import type {
  AppRepository,
  ApplicationRecord,
  CompanyRecord,
  IntegrationRecord,
  UserRecord
} from "./storage/types.js";

export interface CompanyView {
  company: CompanyRecord;
  integration: IntegrationRecord | null;
  applications: ApplicationRecord[];
}

export interface CompanyServiceInput {
  repository: AppRepository;
  registry: DirectoryClientRegistry;
  authService: AuthService;
  logger: Logger;
}

export class CompanyService {
  private readonly repository: AppRepository;
  private readonly registry: DirectoryClientRegistry;
  private readonly authService: AuthService;
  private readonly logger: Logger;

  constructor(input: CompanyServiceInput) {
    this.repository = input.repository;
    this.registry = input.registry;
    this.authService = input.authService;
    this.logger = input.logger;
  }

  async setupCompany(
    actor: UserRecord,
    request: CompanySetupRequest,
    now: Date
  ): Promise<{ company: CompanyRecord; integration: IntegrationRecord; user: UserRecord }> {
    if (actor.companyId) {
      throw new ConflictError("You already belong to a company", "ALREADY_IN_COMPANY");
    }

    const result = await this.repository.setupCompany({
      company: {
        name: request.companyName,
        domain: request.domain ?? null,
        industry: request.industry ?? null,
        employeeCount: request.employeeCount ?? null,
        isActive: true,
        createdAt: now
      },
      credential: {
        tenantId: request.tenantId,
        clientId: request.clientId,
        clientSecret: request.clientSecret
      },
      adminUserId: actor.id,
      now
    });

    this.logger.info(
      {
        event: "company.setup",
        companyId: result.company.id,
        userId: actor.id,
        tenantId: result.integration.tenantId
      },
      "Company setup completed"
    );
    return result;
  }

  async getCompany(actor: UserRecord): Promise<CompanyView> {
    const company = actor.companyId ? await this.repository.findCompanyById(actor.companyId) : null;
    if (!company) {
      throw new ApiError(404, "COMPANY_NOT_FOUND", "Please complete company setup first");
    }

    const [integration, applications] = await Promise.all([
      this.repository.findIntegrationByCompany(company.id),
      this.repository.listApplications(company.id)
    ]);
    return { company, integration, applications };
  }

  /** Replaces the tenant credential and drops the cached client built from the old one. */
  async configureIntegration(
    actor: UserRecord,
    companyId: string,
    credential: IntegrationCredentialRequest
  ): Promise<IntegrationRecord> {
    this.assertAdmin(actor, companyId);

    const integration = await this.repository.replaceIntegrationCredential(companyId, credential);
    if (!integration) {
      throw new ApiError(404, "NOT_FOUND", "Company not found");
    }

    this.registry.invalidate(companyId);
    this.logger.info(
      { event: "company.integration_configured", companyId, tenantId: integration.tenantId },
      "Directory integration reconfigured"
    );
    return integration;
  }

  async listUsers(actor: UserRecord, companyId: string): Promise<UserRecord[]> {
    this.assertAdmin(actor, companyId, "Insufficient permissions to view users");
    return this.repository.listUsersByCompany(companyId);
  }

  async addUser(
    actor: UserRecord,
    companyId: string,
    request: CompanyUserCreateRequest,
    now: Date
  ): Promise<UserRecord> {
    this.assertAdmin(actor, companyId);

    return this.authService.createCompanyUser({
      email: request.email,
      firstName: request.firstName,
      lastName: request.lastName,
      password: request.password,
      role: request.role,
      companyId,
      now
    });
  }

  async listApplications(actor: UserRecord, companyId: string): Promise<ApplicationRecord[]> {
    if (!isCompanyMember(actor, companyId)) {
      throw new AuthorizationError();
    }

    return this.repository.listApplications(companyId);
  }

  private assertAdmin(actor: UserRecord, companyId: string, message?: string): void {
    if (!canManageCompany(actor, companyId)) {
      throw new AuthorizationError(message);
    }
  }
}
