import { AuthService } from "./auth-service.js";
import { CompanyService } from "./company-service.js";
import type { ApiConfig } from "./config.js";
import { DirectoryClientRegistry, createEntraClientFactory } from "./entra/client-registry.js";
import { DirectoryViewService } from "./entra/directory-views.js";
import { DirectorySyncService } from "./entra/sync-service.js";
import type { Logger } from "./logger.js";
import { MonitoringService } from "./monitoring-service.js";
import type { AppRepository } from "./storage/types.js";

export interface AppServices {
  auth: AuthService;
  companies: CompanyService;
  monitoring: MonitoringService;
  sync: DirectorySyncService;
  directory: DirectoryViewService;
}

export interface AppContext {
  config: ApiConfig;
  logger: Logger;
  repository: AppRepository;
  registry: DirectoryClientRegistry;
  services: AppServices;
  now: () => Date;
}

/** Wires every service around one repository and one per-company directory client registry. */
export function createAppContext(input: {
  config: ApiConfig;
  logger: Logger;
  repository: AppRepository;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}): AppContext {
  const { config, logger, repository } = input;
  const now = input.now ?? (() => new Date());

  const registry = new DirectoryClientRegistry({
    factory: createEntraClientFactory({
      config: config.entra,
      logger,
      fetchImpl: input.fetchImpl,
      now
    })
  });

  const auth = new AuthService({
    repository,
    logger,
    sessionTtlSeconds: config.sessionTtlSeconds,
    cookieName: config.sessionCookieName,
    cookieSecure: config.sessionCookieSecure
  });

  return {
    config,
    logger,
    repository,
    registry,
    now,
    services: {
      auth,
      companies: new CompanyService({ repository, registry, authService: auth, logger }),
      monitoring: new MonitoringService({ repository }),
      sync: new DirectorySyncService({
        repository,
        registry,
        logger,
        updateExisting: config.entra.syncUpdateExisting
      }),
      directory: new DirectoryViewService({
        repository,
        registry,
        defaultWindowDays: config.entra.signInWindowDays
      })
    }
  };
}
