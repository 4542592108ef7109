import { createHash, randomBytes, scrypt, timingSafeEqual } from "node:crypto";
import type { ProfileUpdateRequest, RegisterRequest } from "@app-monitor/contracts";
import { ApiError, ConflictError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { AppRepository, UserRecord } from "./storage/types.js";

export const DEFAULT_SESSION_COOKIE_NAME = "app_monitor_session";
const SCRYPT_KEY_LENGTH = 64;
const SCRYPT_SALT_BYTES = 16;
const MAX_USERNAME_ATTEMPTS = 1000;

export const DEFAULT_PREFERENCES = {
  theme: "light",
  dashboardLayout: "default",
  notificationsEnabled: true,
  refreshInterval: 30
} as const;

function normalizeEmail(value: string): string {
  return value.trim().toLowerCase();
}

function hashValue(value: string): string {
  return createHash("sha256").update(value).digest("hex");
}

function randomToken(bytes = 32): string {
  return randomBytes(bytes).toString("base64url");
}

function nowPlusSeconds(now: Date, seconds: number): Date {
  return new Date(now.getTime() + seconds * 1000);
}

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, SCRYPT_KEY_LENGTH, (error, derivedKey) => {
      if (error) {
        reject(error);
        return;
      }

      resolve(derivedKey);
    });
  });
}

/** Encodes as `scrypt$<salt>$<hash>`, both base64url. */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SCRYPT_SALT_BYTES);
  const derived = await deriveKey(password, salt);
  return `scrypt$${salt.toString("base64url")}$${derived.toString("base64url")}`;
}

export async function verifyPassword(password: string, encoded: string): Promise<boolean> {
  const [scheme, salt, hash] = encoded.split("$");
  if (scheme !== "scrypt" || !salt || !hash) {
    return false;
  }

  const expected = Buffer.from(hash, "base64url");
  const derived = await deriveKey(password, Buffer.from(salt, "base64url"));
  return expected.length === derived.length && timingSafeEqual(expected, derived);
}

export function usernameBaseFromEmail(email: string): string {
  const localPart = normalizeEmail(email).split("@").at(0) ?? "";
  return localPart || "user";
}

export function readSessionTokenFromCookie(
  cookieHeader: string | undefined,
  cookieName = DEFAULT_SESSION_COOKIE_NAME
): string | null {
  if (!cookieHeader) {
    return null;
  }

  const pieces = cookieHeader.split(";");
  for (const piece of pieces) {
    const [rawName, ...rest] = piece.trim().split("=");
    if (rawName !== cookieName) {
      continue;
    }

    const value = rest.join("=");
    return value ? decodeURIComponent(value) : null;
  }

  return null;
}

export function readBearerToken(authorizationHeader: string | undefined): string | null {
  const match = authorizationHeader?.match(/^Bearer\s+(\S+)$/iu);
  return match?.[1] ?? null;
}

interface NewAccount {
  email: string;
  firstName: string;
  lastName: string;
  password: string;
  role: UserRecord["role"];
  now: Date;
}

export interface AuthServiceInput {
  repository: AppRepository;
  logger: Logger;
  sessionTtlSeconds: number;
  cookieName?: string;
  cookieSecure: boolean;
}

export class AuthService {
  private readonly repository: AppRepository;
  private readonly logger: Logger;
  private readonly sessionTtlSeconds: number;
  private readonly cookieSecure: boolean;
  readonly cookieName: string;

  constructor(input: AuthServiceInput) {
    this.repository = input.repository;
    this.logger = input.logger;
    this.sessionTtlSeconds = input.sessionTtlSeconds;
    this.cookieName = input.cookieName ?? DEFAULT_SESSION_COOKIE_NAME;
    this.cookieSecure = input.cookieSecure;
  }

  async register(input: RegisterRequest & { now: Date }): Promise<UserRecord> {
    const user = await this.createAccount({ ...input, role: "user", companyId: null });

    this.logger.info(
      { event: "auth.registered", userId: user.id, username: user.username },
      "User registered"
    );
    return user;
  }

  /** Creates a member account on behalf of a company admin. */
  async createCompanyUser(input: NewAccount & { companyId: string }): Promise<UserRecord> {
    const user = await this.createAccount(input);

    this.logger.info(
      { event: "auth.company_user_created", userId: user.id, companyId: input.companyId },
      "Company user created"
    );
    return user;
  }

  async login(input: {
    identifier: string;
    password: string;
    now: Date;
  }): Promise<{ user: UserRecord; sessionToken: string }> {
    const identifier = input.identifier.trim();
    const candidate =
      (await this.repository.findUserByEmail(normalizeEmail(identifier))) ??
      (await this.repository.findUserByUsername(identifier));

    const verified =
      candidate !== null && (await verifyPassword(input.password, candidate.passwordHash));
    if (!candidate || !verified || !candidate.isActive) {
      this.logger.warn({ event: "auth.login_rejected" }, "Login rejected");
      throw new ApiError(401, "INVALID_CREDENTIALS", "Invalid email/username or password");
    }

    const user = (await this.repository.updateUser(candidate.id, { lastLogin: input.now })) ?? {
      ...candidate,
      lastLogin: input.now
    };

    const sessionToken = randomToken();
    await this.repository.createSession({
      userId: user.id,
      tokenHash: hashValue(sessionToken),
      createdAt: input.now,
      expiresAt: nowPlusSeconds(input.now, this.sessionTtlSeconds),
      lastSeenAt: input.now
    });

    this.logger.info({ event: "auth.login", userId: user.id }, "User logged in");
    return { user, sessionToken };
  }

  async logout(input: { sessionToken: string | null; now: Date }): Promise<void> {
    if (!input.sessionToken) {
      return;
    }

    await this.repository.revokeSession(hashValue(input.sessionToken), input.now);
  }

  async resolveActor(sessionToken: string | null, now: Date): Promise<UserRecord | null> {
    if (!sessionToken) {
      return null;
    }

    const session = await this.repository.findSessionByTokenHash(hashValue(sessionToken));
    if (!session || session.revokedAt || session.expiresAt.getTime() <= now.getTime()) {
      return null;
    }

    const user = await this.repository.findUserById(session.userId);
    if (!user || !user.isActive) {
      return null;
    }

    await this.repository.touchSession(session.id, now);
    return user;
  }

  async requireActor(sessionToken: string | null, now: Date): Promise<UserRecord> {
    const actor = await this.resolveActor(sessionToken, now);
    if (!actor) {
      throw new ApiError(401, "UNAUTHORIZED", "Authentication required");
    }

    return actor;
  }

  async updateProfile(actor: UserRecord, patch: ProfileUpdateRequest): Promise<UserRecord> {
    const email = patch.email === undefined ? undefined : normalizeEmail(patch.email);
    if (email !== undefined && email !== actor.email) {
      const holder = await this.repository.findUserByEmail(email);
      if (holder && holder.id !== actor.id) {
        throw new ConflictError("Email already taken by another user", "EMAIL_TAKEN");
      }
    }

    const updated = await this.repository.updateUser(actor.id, {
      ...(patch.firstName === undefined ? {} : { firstName: patch.firstName.trim() }),
      ...(patch.lastName === undefined ? {} : { lastName: patch.lastName.trim() }),
      ...(email === undefined ? {} : { email })
    });
    if (!updated) {
      throw new ApiError(404, "NOT_FOUND", "User not found");
    }

    return updated;
  }

  createSessionCookie(sessionToken: string): string {
    const secure = this.cookieSecure ? "; Secure" : "";
    return `${this.cookieName}=${encodeURIComponent(sessionToken)}; Path=/; HttpOnly; SameSite=Lax; Max-Age=${this.sessionTtlSeconds}${secure}`;
  }

  clearSessionCookie(): string {
    const secure = this.cookieSecure ? "; Secure" : "";
    return `${this.cookieName}=; Path=/; HttpOnly; SameSite=Lax; Max-Age=0${secure}`;
  }

  readSessionToken(headers: { cookie?: string; authorization?: string }): string | null {
    return (
      readSessionTokenFromCookie(headers.cookie, this.cookieName) ??
      readBearerToken(headers.authorization)
    );
  }

  private async createAccount(
    input: NewAccount & { companyId: string | null }
  ): Promise<UserRecord> {
    const email = normalizeEmail(input.email);
    if (await this.repository.findUserByEmail(email)) {
      throw new ConflictError("Email already registered", "EMAIL_TAKEN");
    }

    const user = await this.repository.createUser({
      username: await this.nextAvailableUsername(email),
      email,
      firstName: input.firstName.trim(),
      lastName: input.lastName.trim(),
      passwordHash: await hashPassword(input.password),
      isActive: true,
      isAdmin: false,
      role: input.role,
      companyId: input.companyId,
      createdAt: input.now
    });
    await this.repository.savePreferences({ userId: user.id, ...DEFAULT_PREFERENCES });
    return user;
  }

  private async nextAvailableUsername(email: string): Promise<string> {
    const base = usernameBaseFromEmail(email);
    if (!(await this.repository.findUserByUsername(base))) {
      return base;
    }

    for (let counter = 1; counter <= MAX_USERNAME_ATTEMPTS; counter += 1) {
      const candidate = `${base}${counter}`;
      if (!(await this.repository.findUserByUsername(candidate))) {
        return candidate;
      }
    }

    throw new ConflictError("Could not allocate a username", "USERNAME_TAKEN");
  }
}
