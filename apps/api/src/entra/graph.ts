import type {
  DirectoryObject,
  DirectoryRole,
  DirectoryUser,
  SignInRecord
} from "@app-monitor/contracts";
import { z } from "zod";

export const REQUIRED_GRAPH_PERMISSIONS = [
  "Application.Read.All",
  "User.Read.All",
  "AuditLog.Read.All",
  "Directory.Read.All"
] as const;

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.union([z.number(), z.string()]).optional()
});

export const TokenErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional()
});

export const CollectionEnvelopeSchema = z.object({
  value: z.array(z.unknown()),
  "@odata.nextLink": z.string().optional()
});

const GraphApplicationSchema = z.object({
  id: z.string().min(1),
  appId: z.string().nullish(),
  displayName: z.string().nullish(),
  signInAudience: z.string().nullish(),
  enabled: z.boolean().nullish(),
  createdDateTime: z.string().nullish()
});

const GraphUserSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().nullish(),
  userPrincipalName: z.string().nullish(),
  mail: z.string().nullish(),
  accountEnabled: z.boolean().nullish()
});

const GraphSignInSchema = z.object({
  id: z.string().min(1),
  createdDateTime: z.string().nullish(),
  userPrincipalName: z.string().nullish(),
  appId: z.string().nullish(),
  appDisplayName: z.string().nullish(),
  ipAddress: z.string().nullish(),
  status: z
    .object({
      errorCode: z.number().int().nullish(),
      failureReason: z.string().nullish()
    })
    .nullish()
});

const GraphDirectoryRoleSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().nullish(),
  description: z.string().nullish(),
  roleTemplateId: z.string().nullish()
});

const GraphDirectoryObjectSchema = z.object({
  "@odata.type": z.string().nullish(),
  id: z.string().min(1),
  displayName: z.string().nullish(),
  userPrincipalName: z.string().nullish()
});

const GraphOrganizationSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().nullish()
});

/** An application registration as the directory reports it. */
export interface RemoteApplication {
  id: string;
  appId: string | null;
  displayName: string | null;
  signInAudience: string | null;
  enabled: boolean | null;
  createdDateTime: string | null;
}

export interface Organization {
  id: string;
  displayName: string | null;
}

export type ItemParser<T> = (raw: unknown) => T | null;

export const parseApplication: ItemParser<RemoteApplication> = (raw) => {
  const parsed = GraphApplicationSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  return {
    id: parsed.data.id,
    appId: parsed.data.appId ?? null,
    displayName: parsed.data.displayName ?? null,
    signInAudience: parsed.data.signInAudience ?? null,
    enabled: parsed.data.enabled ?? null,
    createdDateTime: parsed.data.createdDateTime ?? null
  };
};

export const parseUser: ItemParser<DirectoryUser> = (raw) => {
  const parsed = GraphUserSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  return {
    id: parsed.data.id,
    displayName: parsed.data.displayName ?? null,
    userPrincipalName: parsed.data.userPrincipalName ?? null,
    mail: parsed.data.mail ?? null,
    accountEnabled: parsed.data.accountEnabled ?? null
  };
};

export const parseSignIn: ItemParser<SignInRecord> = (raw) => {
  const parsed = GraphSignInSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  return {
    id: parsed.data.id,
    createdDateTime: parsed.data.createdDateTime ?? null,
    userPrincipalName: parsed.data.userPrincipalName ?? null,
    appId: parsed.data.appId ?? null,
    appDisplayName: parsed.data.appDisplayName ?? null,
    ipAddress: parsed.data.ipAddress ?? null,
    errorCode: parsed.data.status?.errorCode ?? null,
    failureReason: parsed.data.status?.failureReason ?? null
  };
};

export const parseDirectoryRole: ItemParser<DirectoryRole> = (raw) => {
  const parsed = GraphDirectoryRoleSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  return {
    id: parsed.data.id,
    displayName: parsed.data.displayName ?? null,
    description: parsed.data.description ?? null,
    roleTemplateId: parsed.data.roleTemplateId ?? null
  };
};

export const parseDirectoryObject: ItemParser<DirectoryObject> = (raw) => {
  const parsed = GraphDirectoryObjectSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const odataType = parsed.data["@odata.type"];
  return {
    id: parsed.data.id,
    objectType: odataType ? odataType.replace(/^#microsoft\.graph\./u, "") : null,
    displayName: parsed.data.displayName ?? null,
    userPrincipalName: parsed.data.userPrincipalName ?? null
  };
};

export const parseOrganization: ItemParser<Organization> = (raw) => {
  const parsed = GraphOrganizationSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  return {
    id: parsed.data.id,
    displayName: parsed.data.displayName ?? null
  };
};

/** ISO-8601 UTC with microsecond precision, e.g. `2026-03-01T10:00:00.000000Z`. */
export function formatGraphTimestamp(instant: Date): string {
  return instant.toISOString().replace(/\.(\d{3})Z$/u, ".$1000Z");
}

export function escapeODataString(value: string): string {
  return value.replace(/'/gu, "''");
}

export function buildSignInFilter(input: {
  now: Date;
  windowDays: number;
  appId?: string;
}): string {
  const start = new Date(input.now.getTime() - input.windowDays * 24 * 60 * 60 * 1000);
  const clauses = [
    `createdDateTime ge ${formatGraphTimestamp(start)}`,
    `createdDateTime le ${formatGraphTimestamp(input.now)}`
  ];

  if (input.appId !== undefined) {
    clauses.push(`appId eq '${escapeODataString(input.appId)}'`);
  }

  return clauses.join(" and ");
}
