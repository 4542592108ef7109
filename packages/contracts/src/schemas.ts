import { z } from "zod";

export const HealthStatusSchema = z.literal("ok");

export const HealthResponseSchema = z.object({
  status: HealthStatusSchema,
  timestamp: z.string().datetime()
});

export const ApiErrorSchema = z.object({
  code: z.string().min(1),
  message: z.string().min(1)
});

const RequiredText = (message: string) => z.string().trim().min(1, message);

export const UserRoleSchema = z.enum(["admin", "user"]);

export const UserSchema = z.object({
  id: z.string().min(1),
  username: z.string().min(1),
  email: z.string().email(),
  firstName: z.string(),
  lastName: z.string(),
  isActive: z.boolean(),
  isAdmin: z.boolean(),
  role: UserRoleSchema,
  companyId: z.string().min(1).nullable(),
  createdAt: z.string().datetime(),
  lastLogin: z.string().datetime().nullable()
});

export const RegisterRequestSchema = z
  .object({
    firstName: RequiredText("All fields are required"),
    lastName: RequiredText("All fields are required"),
    email: RequiredText("All fields are required").email("Please enter a valid email address"),
    password: z.string().min(1, "All fields are required"),
    confirmPassword: z.string().min(1, "All fields are required"),
    agreeTerms: z.boolean().default(false)
  })
  .superRefine((value, ctx) => {
    if (value.password !== value.confirmPassword) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["confirmPassword"],
        message: "Passwords do not match"
      });
      return;
    }

    if (value.password.length < 6) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["password"],
        message: "Password must be at least 6 characters long"
      });
      return;
    }

    if (!value.agreeTerms) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["agreeTerms"],
        message: "You must agree to the terms and conditions"
      });
    }
  });

export const LoginRequestSchema = z.object({
  identifier: RequiredText("Please enter both email/username and password"),
  password: z.string().min(1, "Please enter both email/username and password")
});

export const AuthUserResponseSchema = z.object({
  user: UserSchema
});

export const AuthMeResponseSchema = z.object({
  authenticated: z.boolean(),
  user: UserSchema.nullable()
});

export const ProfileUpdateRequestSchema = z
  .object({
    firstName: RequiredText("First name cannot be empty").optional(),
    lastName: RequiredText("Last name cannot be empty").optional(),
    email: z.string().trim().email("Please enter a valid email address").optional()
  })
  .strict();

export const ThemeSchema = z.enum(["light", "dark"]);
export const DashboardLayoutSchema = z.enum(["default", "compact", "detailed"]);

export const PreferencesSchema = z.object({
  theme: ThemeSchema,
  dashboardLayout: DashboardLayoutSchema,
  notificationsEnabled: z.boolean(),
  refreshInterval: z.number().int().min(10).max(3600)
});

export const PreferencesUpdateRequestSchema = PreferencesSchema.partial().strict();

export const MetricSchema = z.object({
  id: z.string().min(1),
  metricType: z.string().min(1),
  value: z.number(),
  unit: z.string().nullable(),
  description: z.string().nullable(),
  timestamp: z.string().datetime()
});

export const MetricCreateRequestSchema = z.object({
  metricType: RequiredText("metricType is required"),
  value: z.number({ required_error: "value is required" }).finite(),
  unit: z.string().trim().min(1).max(32).optional(),
  description: z.string().trim().max(500).optional()
});

export const MetricsResponseSchema = z.object({
  items: z.array(MetricSchema)
});

export const EventSeveritySchema = z.enum(["info", "warning", "error", "critical"]);

export const EventSchema = z.object({
  id: z.string().min(1),
  eventType: z.string().min(1),
  severity: EventSeveritySchema,
  message: z.string().min(1),
  source: z.string().min(1),
  eventData: z.record(z.unknown()).nullable(),
  timestamp: z.string().datetime()
});

export const EventCreateRequestSchema = z.object({
  eventType: RequiredText("eventType is required"),
  message: RequiredText("message is required"),
  severity: EventSeveritySchema.default("info"),
  source: z.string().trim().min(1).max(64).default("user"),
  eventData: z.record(z.unknown()).optional()
});

export const EventsResponseSchema = z.object({
  items: z.array(EventSchema)
});

export const CompanySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  domain: z.string().nullable(),
  industry: z.string().nullable(),
  employeeCount: z.number().int().nullable(),
  isActive: z.boolean(),
  createdAt: z.string().datetime()
});

export const SyncStatusSchema = z.enum(["pending", "active", "error"]);

export const IntegrationSummarySchema = z.object({
  tenantId: z.string().min(1),
  clientId: z.string().min(1),
  clientSecretConfigured: z.boolean(),
  isActive: z.boolean(),
  syncStatus: SyncStatusSchema,
  lastSync: z.string().datetime().nullable(),
  lastSyncError: z.string().nullable()
});

export const SsoApplicationSchema = z.object({
  id: z.string().min(1),
  companyId: z.string().min(1),
  entraAppId: z.string().min(1),
  name: z.string().min(1),
  appType: z.string().min(1),
  isActive: z.boolean(),
  lastActivity: z.string().datetime().nullable(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime()
});

export const ApplicationsResponseSchema = z.object({
  items: z.array(SsoApplicationSchema)
});

export const IntegrationCredentialRequestSchema = z.object({
  tenantId: RequiredText("tenantId is required"),
  clientId: RequiredText("clientId is required"),
  clientSecret: RequiredText("clientSecret is required")
});

export const CompanySetupRequestSchema = IntegrationCredentialRequestSchema.extend({
  companyName: RequiredText("companyName is required").max(120),
  domain: z.string().trim().min(1).max(255).optional(),
  industry: z.string().trim().min(1).max(120).optional(),
  employeeCount: z.number().int().positive().optional()
});

export const CompanySetupResponseSchema = z.object({
  company: CompanySchema,
  integration: IntegrationSummarySchema,
  user: UserSchema
});

export const CompanyViewResponseSchema = z.object({
  company: CompanySchema,
  integration: IntegrationSummarySchema.nullable(),
  applications: z.array(SsoApplicationSchema)
});

export const CompanyUserCreateRequestSchema = z.object({
  email: z.string().trim().email("Please enter a valid email address"),
  firstName: RequiredText("firstName is required"),
  lastName: RequiredText("lastName is required"),
  role: UserRoleSchema.default("user"),
  password: z.string().min(6, "Password must be at least 6 characters long")
});

export const CompanyUsersResponseSchema = z.object({
  items: z.array(UserSchema)
});

export const SyncSuccessSchema = z.object({
  success: z.literal(true),
  count: z.number().int().nonnegative(),
  created: z.number().int().nonnegative(),
  updated: z.number().int().nonnegative(),
  unchanged: z.number().int().nonnegative(),
  message: z.string().min(1),
  lastSync: z.string().datetime()
});

export const SyncFailureCodeSchema = z.enum([
  "FORBIDDEN",
  "NOT_CONFIGURED",
  "DIRECTORY_AUTH_FAILED",
  "CONFLICT",
  "SYNC_FAILED"
]);

export const SyncFailureSchema = z.object({
  success: z.literal(false),
  code: SyncFailureCodeSchema,
  error: z.string().min(1),
  retryable: z.boolean()
});

export const SyncResultSchema = z.discriminatedUnion("success", [
  SyncSuccessSchema,
  SyncFailureSchema
]);

export const ConnectionTestSuccessSchema = z.object({
  success: z.literal(true),
  message: z.string().min(1),
  tenantName: z.string().nullable(),
  tenantId: z.string().nullable(),
  appCount: z.number().int().nonnegative()
});

export const ConnectionTestFailureSchema = z.object({
  success: z.literal(false),
  code: SyncFailureCodeSchema,
  error: z.string().min(1)
});

export const ConnectionTestResultSchema = z.discriminatedUnion("success", [
  ConnectionTestSuccessSchema,
  ConnectionTestFailureSchema
]);

export const SyncStateSchema = z.object({
  status: SyncStatusSchema,
  lastSync: z.string().datetime().nullable(),
  lastSyncAgeSeconds: z.number().int().nonnegative().nullable(),
  lastSyncError: z.string().nullable()
});

export const DashboardResponseSchema = z.object({
  user: UserSchema,
  company: CompanySchema.nullable(),
  applications: z.array(SsoApplicationSchema),
  metrics: z.array(MetricSchema),
  events: z.array(EventSchema),
  sync: SyncStateSchema.nullable()
});

export const DirectoryUserSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().nullable(),
  userPrincipalName: z.string().nullable(),
  mail: z.string().nullable(),
  accountEnabled: z.boolean().nullable()
});

export const SignInRecordSchema = z.object({
  id: z.string().min(1),
  createdDateTime: z.string().nullable(),
  userPrincipalName: z.string().nullable(),
  appId: z.string().nullable(),
  appDisplayName: z.string().nullable(),
  ipAddress: z.string().nullable(),
  errorCode: z.number().int().nullable(),
  failureReason: z.string().nullable()
});

export const DirectoryRoleSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().nullable(),
  description: z.string().nullable(),
  roleTemplateId: z.string().nullable()
});

export const DirectoryObjectSchema = z.object({
  id: z.string().min(1),
  objectType: z.string().nullable(),
  displayName: z.string().nullable(),
  userPrincipalName: z.string().nullable()
});

export const DirectoryUsersResponseSchema = z.object({
  items: z.array(DirectoryUserSchema)
});

export const SignInsResponseSchema = z.object({
  windowDays: z.number().int().positive(),
  items: z.array(SignInRecordSchema)
});

export const DirectoryRolesResponseSchema = z.object({
  items: z.array(DirectoryRoleSchema)
});

export const DirectoryObjectsResponseSchema = z.object({
  items: z.array(DirectoryObjectSchema)
});

export const PermissionsStatusSchema = z.object({
  configured: z.boolean(),
  requiredPermissions: z.array(z.string().min(1)),
  message: z.string().min(1)
});

export const SignInWindowQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(90).optional()
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type ApiErrorBody = z.infer<typeof ApiErrorSchema>;
export type UserRole = z.infer<typeof UserRoleSchema>;
export type User = z.infer<typeof UserSchema>;
export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;
export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type AuthMeResponse = z.infer<typeof AuthMeResponseSchema>;
export type ProfileUpdateRequest = z.infer<typeof ProfileUpdateRequestSchema>;
export type Theme = z.infer<typeof ThemeSchema>;
export type DashboardLayout = z.infer<typeof DashboardLayoutSchema>;
export type Preferences = z.infer<typeof PreferencesSchema>;
export type PreferencesUpdateRequest = z.infer<typeof PreferencesUpdateRequestSchema>;
export type Metric = z.infer<typeof MetricSchema>;
export type MetricCreateRequest = z.infer<typeof MetricCreateRequestSchema>;
export type EventSeverity = z.infer<typeof EventSeveritySchema>;
export type SystemEvent = z.infer<typeof EventSchema>;
export type EventCreateRequest = z.infer<typeof EventCreateRequestSchema>;
export type Company = z.infer<typeof CompanySchema>;
export type SyncStatus = z.infer<typeof SyncStatusSchema>;
export type IntegrationSummary = z.infer<typeof IntegrationSummarySchema>;
export type SsoApplication = z.infer<typeof SsoApplicationSchema>;
export type IntegrationCredentialRequest = z.infer<typeof IntegrationCredentialRequestSchema>;
export type CompanySetupRequest = z.infer<typeof CompanySetupRequestSchema>;
export type CompanySetupResponse = z.infer<typeof CompanySetupResponseSchema>;
export type CompanyViewResponse = z.infer<typeof CompanyViewResponseSchema>;
export type CompanyUserCreateRequest = z.infer<typeof CompanyUserCreateRequestSchema>;
export type SyncFailureCode = z.infer<typeof SyncFailureCodeSchema>;
export type SyncResult = z.infer<typeof SyncResultSchema>;
export type ConnectionTestResult = z.infer<typeof ConnectionTestResultSchema>;
export type SyncState = z.infer<typeof SyncStateSchema>;
export type DashboardResponse = z.infer<typeof DashboardResponseSchema>;
export type DirectoryUser = z.infer<typeof DirectoryUserSchema>;
export type SignInRecord = z.infer<typeof SignInRecordSchema>;
export type DirectoryRole = z.infer<typeof DirectoryRoleSchema>;
export type DirectoryObject = z.infer<typeof DirectoryObjectSchema>;
export type PermissionsStatus = z.infer<typeof PermissionsStatusSchema>;
