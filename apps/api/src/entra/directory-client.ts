import type {
  DirectoryObject,
  DirectoryRole,
  DirectoryUser,
  PermissionsStatus,
  SignInRecord
} from "@app-monitor/contracts";
import { TokenAcquisitionError, errorMessage } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import type { TenantCredential } from "../storage/types.js";
import {
  CollectionEnvelopeSchema,
  type ItemParser,
  type Organization,
  REQUIRED_GRAPH_PERMISSIONS,
  type RemoteApplication,
  TokenErrorSchema,
  TokenResponseSchema,
  buildSignInFilter,
  escapeODataString,
  parseApplication,
  parseDirectoryObject,
  parseDirectoryRole,
  parseOrganization,
  parseSignIn,
  parseUser
} from "./graph.js";

export const TOKEN_EXPIRY_MARGIN_SECONDS = 300;
const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

export type ConnectionProbe =
  | { success: true; tenantId: string; tenantName: string | null }
  | { success: false; stage: "token" | "directory"; error: string };

/**
 * Read access to one tenant's directory. List reads are best effort: a transport failure,
 * timeout, error status or malformed payload is logged and yields an empty result. Failing to
 * acquire a token is never absorbed and surfaces as `TokenAcquisitionError`.
 */
export interface DirectoryClient {
  getApplications(): Promise<RemoteApplication[]>;
  getApplication(id: string): Promise<RemoteApplication | null>;
  getUsers(): Promise<DirectoryUser[]>;
  getUser(id: string): Promise<DirectoryUser | null>;
  getSignInLogs(windowDays?: number): Promise<SignInRecord[]>;
  getApplicationSignIns(appId: string, windowDays?: number): Promise<SignInRecord[]>;
  getDirectoryRoles(): Promise<DirectoryRole[]>;
  getDirectoryRoleMembers(roleId: string): Promise<DirectoryObject[]>;
  getOrganization(): Promise<Organization | null>;
  getPermissionsStatus(): Promise<PermissionsStatus>;
  testConnection(): Promise<ConnectionProbe>;
}

export interface EntraDirectoryClientOptions {
  credential: TenantCredential;
  authorityHost: string;
  graphBaseUrl: string;
  scope: string;
  requestTimeoutMs: number;
  signInWindowDays: number;
  maxPages: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
  logger?: Logger;
}

interface CachedToken {
  accessToken: string;
  expiresAt: Date;
}

type GetResult = { ok: true; body: unknown } | { ok: false; status: number | null };

function firstLine(value: string): string {
  return value.split(/\r?\n/u)[0]?.trim() ?? value;
}

function resolveLifetimeSeconds(raw: number | string | undefined): number {
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : DEFAULT_TOKEN_LIFETIME_SECONDS;
}

export class EntraDirectoryClient implements DirectoryClient {
  private readonly credential: TenantCredential;
  private readonly authorityHost: string;
  private readonly graphBaseUrl: string;
  private readonly graphOrigin: string;
  private readonly scope: string;
  private readonly requestTimeoutMs: number;
  private readonly signInWindowDays: number;
  private readonly maxPages: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private cachedToken: CachedToken | null = null;
  private pendingToken: Promise<string> | null = null;

  constructor(options: EntraDirectoryClientOptions) {
    this.credential = options.credential;
    this.authorityHost = options.authorityHost.replace(/\/+$/u, "");
    this.graphBaseUrl = options.graphBaseUrl.replace(/\/+$/u, "");
    this.graphOrigin = new URL(this.graphBaseUrl).origin;
    this.scope = options.scope;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.signInWindowDays = options.signInWindowDays;
    this.maxPages = options.maxPages;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Returns the cached bearer token while it is valid. A token is treated as expired
   * `TOKEN_EXPIRY_MARGIN_SECONDS` before the lifetime the token endpoint reported.
   */
  async getAccessToken(): Promise<string> {
    if (this.cachedToken && this.now().getTime() < this.cachedToken.expiresAt.getTime()) {
      return this.cachedToken.accessToken;
    }

    this.pendingToken ??= this.requestToken().finally(() => {
      this.pendingToken = null;
    });
    return this.pendingToken;
  }

  async getApplications(): Promise<RemoteApplication[]> {
    return this.listCollection("/applications", undefined, parseApplication);
  }

  async getApplication(id: string): Promise<RemoteApplication | null> {
    return this.getOne(`/applications/${encodeURIComponent(id)}`, parseApplication);
  }

  async getUsers(): Promise<DirectoryUser[]> {
    return this.listCollection("/users", undefined, parseUser);
  }

  async getUser(id: string): Promise<DirectoryUser | null> {
    return this.getOne(`/users/${encodeURIComponent(id)}`, parseUser);
  }

  async getSignInLogs(windowDays?: number): Promise<SignInRecord[]> {
    const filter = buildSignInFilter({
      now: this.now(),
      windowDays: this.resolveWindowDays(windowDays)
    });
    return this.listCollection("/auditLogs/signIns", { $filter: filter }, parseSignIn);
  }

  async getApplicationSignIns(appId: string, windowDays?: number): Promise<SignInRecord[]> {
    const filter = buildSignInFilter({
      now: this.now(),
      windowDays: this.resolveWindowDays(windowDays),
      appId
    });
    return this.listCollection("/auditLogs/signIns", { $filter: filter }, parseSignIn);
  }

  async getDirectoryRoles(): Promise<DirectoryRole[]> {
    return this.listCollection("/directoryRoles", undefined, parseDirectoryRole);
  }

  async getDirectoryRoleMembers(roleId: string): Promise<DirectoryObject[]> {
    return this.listCollection(
      `/directoryRoles/${encodeURIComponent(roleId)}/members`,
      undefined,
      parseDirectoryObject
    );
  }

  async getOrganization(): Promise<Organization | null> {
    const organizations = await this.listCollection("/organization", undefined, parseOrganization);
    return organizations.at(0) ?? null;
  }

  async getPermissionsStatus(): Promise<PermissionsStatus> {
    const registration = await this.getOne(
      `/applications(appId='${encodeURIComponent(escapeODataString(this.credential.clientId))}')`,
      parseApplication
    );

    return {
      configured: registration !== null,
      requiredPermissions: [...REQUIRED_GRAPH_PERMISSIONS],
      message:
        registration !== null
          ? "Application registration is readable. Confirm admin consent covers every required permission."
          : "Could not read the application registration. Grant the required application permissions and admin consent."
    };
  }

  async testConnection(): Promise<ConnectionProbe> {
    try {
      await this.getAccessToken();
    } catch (error) {
      return {
        success: false,
        stage: "token",
        error: `Authentication failed: ${errorMessage(error)}`
      };
    }

    try {
      const organization = await this.getOrganization();
      if (!organization) {
        return { success: false, stage: "directory", error: "Could not read organization details" };
      }

      return {
        success: true,
        tenantId: organization.id,
        tenantName: organization.displayName
      };
    } catch (error) {
      return { success: false, stage: "directory", error: errorMessage(error) };
    }
  }

  private resolveWindowDays(windowDays: number | undefined): number {
    const days = windowDays ?? this.signInWindowDays;
    if (!Number.isInteger(days) || days < 1) {
      throw new RangeError(`Sign-in window must be a positive number of days, got ${days}`);
    }
    return days;
  }

  private async requestToken(): Promise<string> {
    const issuedAt = this.now();
    const tokenUrl = `${this.authorityHost}/${encodeURIComponent(this.credential.tenantId)}/oauth2/v2.0/token`;
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.credential.clientId,
      client_secret: this.credential.clientSecret,
      scope: this.scope
    });

    let response: Response;
    try {
      response = await this.fetchImpl(tokenUrl, {
        method: "POST",
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          accept: "application/json"
        },
        body,
        signal: AbortSignal.timeout(this.requestTimeoutMs)
      });
    } catch (error) {
      this.logger.warn(
        {
          event: "directory.token_request_failed",
          tenantId: this.credential.tenantId,
          reason: errorMessage(error)
        },
        "Token request did not complete"
      );
      throw new TokenAcquisitionError(`Token request failed: ${errorMessage(error)}`);
    }

    const payload: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const details = TokenErrorSchema.safeParse(payload);
      const reason =
        (details.success && (details.data.error_description || details.data.error)) ||
        `Token endpoint failed with ${response.status}`;

      this.logger.warn(
        {
          event: "directory.token_rejected",
          tenantId: this.credential.tenantId,
          status: response.status
        },
        "Token endpoint rejected the client credentials"
      );
      throw new TokenAcquisitionError(firstLine(reason), response.status);
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenAcquisitionError("Token endpoint returned no access token", response.status);
    }

    const lifetimeSeconds = resolveLifetimeSeconds(parsed.data.expires_in);
    this.cachedToken = {
      accessToken: parsed.data.access_token,
      expiresAt: new Date(
        issuedAt.getTime() + (lifetimeSeconds - TOKEN_EXPIRY_MARGIN_SECONDS) * 1000
      )
    };

    this.logger.debug(
      {
        event: "directory.token_acquired",
        tenantId: this.credential.tenantId,
        expiresAt: this.cachedToken.expiresAt.toISOString()
      },
      "Acquired directory access token"
    );
    return this.cachedToken.accessToken;
  }

  private buildUrl(path: string, query?: Record<string, string>): string {
    const url = `${this.graphBaseUrl}${path}`;
    if (!query) {
      return url;
    }

    const search = Object.entries(query)
      .map(([key, value]) => `${key}=${encodeURIComponent(value)}`)
      .join("&");
    return `${url}?${search}`;
  }

  private async get(url: string, path: string): Promise<GetResult> {
    const token = await this.getAccessToken();

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          authorization: `Bearer ${token}`,
          accept: "application/json"
        },
        signal: AbortSignal.timeout(this.requestTimeoutMs)
      });
    } catch (error) {
      this.logger.warn(
        { event: "directory.fetch_failed", path, status: null, reason: errorMessage(error) },
        "Directory request did not complete"
      );
      return { ok: false, status: null };
    }

    if (!response.ok) {
      this.logger.warn(
        { event: "directory.fetch_failed", path, status: response.status },
        "Directory request returned an error status"
      );
      return { ok: false, status: response.status };
    }

    const body: unknown = await response.json().catch(() => undefined);
    if (body === undefined) {
      this.logger.warn(
        { event: "directory.fetch_failed", path, status: response.status, reason: "invalid json" },
        "Directory response was not JSON"
      );
      return { ok: false, status: response.status };
    }

    return { ok: true, body };
  }

  private async getOne<T>(path: string, parseItem: ItemParser<T>): Promise<T | null> {
    const result = await this.get(this.buildUrl(path), path);
    if (!result.ok) {
      return null;
    }

    const item = parseItem(result.body);
    if (item === null) {
      this.logger.warn(
        { event: "directory.payload_invalid", path },
        "Directory returned an unexpected payload"
      );
    }
    return item;
  }

  private async listCollection<T>(
    path: string,
    query: Record<string, string> | undefined,
    parseItem: ItemParser<T>
  ): Promise<T[]> {
    const items: T[] = [];
    let nextUrl: string | null = this.buildUrl(path, query);
    let pages = 0;

    while (nextUrl !== null) {
      if (pages >= this.maxPages) {
        this.logger.warn(
          { event: "directory.page_limit_reached", path, pages },
          "Stopped following directory pages at the configured limit"
        );
        break;
      }

      const result = await this.get(nextUrl, path);
      if (!result.ok) {
        return [];
      }

      const envelope = CollectionEnvelopeSchema.safeParse(result.body);
      if (!envelope.success) {
        this.logger.warn(
          { event: "directory.payload_invalid", path },
          "Directory returned an unexpected collection payload"
        );
        return [];
      }

      pages += 1;
      for (const raw of envelope.data.value) {
        const item = parseItem(raw);
        if (item !== null) {
          items.push(item);
        }
      }

      nextUrl = this.acceptNextLink(envelope.data["@odata.nextLink"], path);
    }

    return items;
  }

  private acceptNextLink(nextLink: string | undefined, path: string): string | null {
    if (!nextLink) {
      return null;
    }

    try {
      if (new URL(nextLink).origin === this.graphOrigin) {
        return nextLink;
      }
    } catch {
      // fall through to the rejection below
    }

    this.logger.warn(
      { event: "directory.next_link_rejected", path },
      "Ignored a next page link outside the directory API"
    );
    return null;
  }
}
