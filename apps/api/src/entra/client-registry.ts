import { createHash } from "node:crypto";
import type { EntraConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type { TenantCredential } from "../storage/types.js";
import { type DirectoryClient, EntraDirectoryClient } from "./directory-client.js";

export type DirectoryClientFactory = (credential: TenantCredential) => DirectoryClient;

interface RegistryEntry {
  fingerprint: string;
  client: DirectoryClient;
}

export function credentialFingerprint(credential: TenantCredential): string {
  return createHash("sha256")
    .update(`${credential.tenantId}:${credential.clientId}:${credential.clientSecret}`)
    .digest("hex");
}

/**
 * Keeps one directory client per company so cached tokens survive across requests. A client is
 * rebuilt whenever the company's credential changes.
 */
export class DirectoryClientRegistry {
  private readonly factory: DirectoryClientFactory;
  private readonly entries = new Map<string, RegistryEntry>();

  constructor(input: { factory: DirectoryClientFactory }) {
    this.factory = input.factory;
  }

  clientFor(companyId: string, credential: TenantCredential): DirectoryClient {
    const fingerprint = credentialFingerprint(credential);
    const existing = this.entries.get(companyId);
    if (existing && existing.fingerprint === fingerprint) {
      return existing.client;
    }

    const client = this.factory(credential);
    this.entries.set(companyId, { fingerprint, client });
    return client;
  }

  invalidate(companyId: string): void {
    this.entries.delete(companyId);
  }

  get size(): number {
    return this.entries.size;
  }
}

export function createEntraClientFactory(input: {
  config: EntraConfig;
  logger: Logger;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}): DirectoryClientFactory {
  return (credential) =>
    new EntraDirectoryClient({
      credential,
      authorityHost: input.config.authorityHost,
      graphBaseUrl: input.config.graphBaseUrl,
      scope: input.config.graphScope,
      requestTimeoutMs: input.config.requestTimeoutMs,
      signInWindowDays: input.config.signInWindowDays,
      maxPages: input.config.maxPages,
      fetchImpl: input.fetchImpl,
      now: input.now,
      logger: input.logger
    });
}
