import { z } from "zod";

const BooleanStringSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false"]))
  .transform((value) => value === "true");

const CsvStringSchema = z.string().transform((value) =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
);

const PositiveIntegerStringSchema = z
  .string()
  .trim()
  .regex(/^\d+$/u, "must be a positive integer")
  .transform((value) => Number.parseInt(value, 10))
  .pipe(z.number().int().positive());

const TrustProxySchema = z.union([
  z.boolean(),
  z.number().int().nonnegative(),
  z.array(z.string())
]);

/** `true`/`false`, a hop count, or a CSV of trusted proxy addresses and subnets. */
const TrustProxyStringSchema = z
  .string()
  .trim()
  .transform((value): z.infer<typeof TrustProxySchema> => {
    const lowered = value.toLowerCase();
    if (lowered === "true" || lowered === "false") {
      return lowered === "true";
    }
    if (/^\d+$/u.test(value)) {
      return Number.parseInt(value, 10);
    }
    return value
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  });

const NodeEnvSchema = z.enum(["development", "test", "production"]);

const ApiConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
  databaseUrl: z.string().min(1).optional(),
  webBaseUrl: z.string().url(),
  allowedOrigins: z.array(z.string().min(1)),
  sessionTtlSeconds: z.number().int().positive(),
  sessionCookieName: z.string().regex(/^[A-Za-z0-9_-]+$/u),
  sessionCookieSecure: z.boolean(),
  authRateLimitWindowMs: z.number().int().positive(),
  authRateLimitMax: z.number().int().positive(),
  trustProxy: TrustProxySchema,
  entra: z.object({
    authorityHost: z.string().url(),
    graphBaseUrl: z.string().url(),
    graphScope: z.string().min(1),
    requestTimeoutMs: z.number().int().positive(),
    signInWindowDays: z.number().int().min(1).max(90),
    maxPages: z.number().int().positive(),
    syncUpdateExisting: z.boolean()
  })
});

export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type EntraConfig = ApiConfig["entra"];

const DEFAULT_WEB_BASE_URL = "http://localhost:3000";

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function describeIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path].filter((part) => part !== undefined).join(".");
    return `${path || "env"}: ${issue.message}`;
  });
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Reads API settings from environment variables. Blank values fall back to defaults;
 * malformed values fail fast with every offending key listed.
 */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const issues: string[] = [];

  const read = <T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, string>): T | undefined => {
    const present = blankToUndefined(env[key]);
    if (present === undefined) {
      return undefined;
    }

    const parsed = schema.safeParse(present);
    if (!parsed.success) {
      issues.push(...describeIssues(parsed.error, key));
      return undefined;
    }
    return parsed.data;
  };

  const nodeEnv = read("NODE_ENV", NodeEnvSchema) ?? "development";
  const webBaseUrl = blankToUndefined(env.WEB_BASE_URL) ?? DEFAULT_WEB_BASE_URL;

  const candidate = {
    nodeEnv,
    host: blankToUndefined(env.API_HOST) ?? "0.0.0.0",
    port: read("API_PORT", PositiveIntegerStringSchema) ?? 3001,
    logLevel: blankToUndefined(env.LOG_LEVEL)?.toLowerCase() ?? "info",
    databaseUrl: blankToUndefined(env.DATABASE_URL),
    webBaseUrl,
    allowedOrigins: read("CORS_ALLOWED_ORIGINS", CsvStringSchema) ?? [webBaseUrl],
    sessionTtlSeconds: read("AUTH_SESSION_TTL_SECONDS", PositiveIntegerStringSchema) ?? 28_800,
    sessionCookieName: blankToUndefined(env.AUTH_COOKIE_NAME) ?? "app_monitor_session",
    sessionCookieSecure:
      read("AUTH_COOKIE_SECURE", BooleanStringSchema) ?? nodeEnv === "production",
    authRateLimitWindowMs:
      read("AUTH_RATE_LIMIT_WINDOW_MS", PositiveIntegerStringSchema) ?? 60_000,
    authRateLimitMax: read("AUTH_RATE_LIMIT_MAX", PositiveIntegerStringSchema) ?? 20,
    trustProxy: read("TRUST_PROXY", TrustProxyStringSchema) ?? false,
    entra: {
      authorityHost:
        blankToUndefined(env.ENTRA_AUTHORITY_HOST) ?? "https://login.microsoftonline.com",
      graphBaseUrl:
        blankToUndefined(env.ENTRA_GRAPH_BASE_URL) ?? "https://graph.microsoft.com/v1.0",
      graphScope: blankToUndefined(env.ENTRA_GRAPH_SCOPE) ?? "https://graph.microsoft.com/.default",
      requestTimeoutMs: read("ENTRA_REQUEST_TIMEOUT_MS", PositiveIntegerStringSchema) ?? 10_000,
      signInWindowDays: read("ENTRA_SIGN_IN_WINDOW_DAYS", PositiveIntegerStringSchema) ?? 7,
      maxPages: read("ENTRA_MAX_PAGES", PositiveIntegerStringSchema) ?? 20,
      syncUpdateExisting: read("ENTRA_SYNC_UPDATE_EXISTING", BooleanStringSchema) ?? true
    }
  };

  const parsed = ApiConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    issues.push(...describeIssues(parsed.error));
  }

  if (issues.length > 0 || !parsed.success) {
    throw new ConfigError(`Invalid API configuration: ${issues.join("; ")}`);
  }

  return parsed.data;
}
