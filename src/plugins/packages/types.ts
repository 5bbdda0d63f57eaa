import { z } from 'zod';

export const PACKAGE_STATUSES = ['pending', 'approved', 'denied', 'installed', 'failed', 'uninstalled'] as const;
export type PackageStatus = (typeof PACKAGE_STATUSES)[number];

export const SAFETY_LEVELS = ['LOW', 'MEDIUM', 'HIGH', 'UNKNOWN'] as const;
export type SafetyLevel = (typeof SAFETY_LEVELS)[number];

/** npm package name, optionally scoped. */
export const PACKAGE_NAME_PATTERN = /^(?:@[a-z0-9-~][a-z0-9-._~]*\/)?[a-z0-9-~][a-z0-9-._~]*$/;

export const PackageMetadataSchema = z.object({
  safety_score: z.number().min(0).max(100),
  safety_level: z.enum(SAFETY_LEVELS),
  safety_reasons: z.array(z.string()).default([]),
  version: z.string().nullable(),
  author: z.string().nullable(),
  downloads_last_month: z.number().int().nonnegative(),
  first_release: z.string().nullable().default(null),
  last_release: z.string().nullable(),
  total_releases: z.number().int().nonnegative().default(0),
  description: z.string().nullable(),
});
export type PackageMetadata = z.infer<typeof PackageMetadataSchema>;

export const PackageRecordSchema = z.object({
  package_name: z.string(),
  status: z.enum(PACKAGE_STATUSES),
  metadata: PackageMetadataSchema,
  reason: z.string(),
  requested_by: z.string(),
  usage_count: z.number().int().nonnegative(),
  installed_version: z.string().nullable(),
  last_error: z.string().nullable(),
  requested_at: z.string(),
  approved_at: z.string().nullable(),
  installed_at: z.string().nullable(),
  last_used_at: z.string().nullable(),
  updated_at: z.string(),
});
export type PackageRecord = z.infer<typeof PackageRecordSchema>;

export const PackageDocumentSchema = z.object({
  packages: z.array(PackageRecordSchema),
});
export type PackageDocument = z.infer<typeof PackageDocumentSchema>;

export const RequestInstallInputSchema = z.object({
  package_name: z.string().trim().min(1),
  reason: z.string().default(''),
  requested_by: z.string().min(1).default('user'),
});
export type RequestInstallInput = z.infer<typeof RequestInstallInputSchema>;

export const ListPackagesInputSchema = z.object({
  status: z.enum(PACKAGE_STATUSES).optional(),
});

export interface SyncReport {
  added: PackageRecord[];
  removed: PackageRecord[];
}

/** Installs into the execution environment. */
export interface PackageInstaller {
  install(name: string, version?: string): Promise<{ version: string }>;
  uninstall(name: string): Promise<void>;
  /** Package name to installed version. */
  listInstalled(): Promise<Map<string, string>>;
}

/** External package index; null when the package is unknown to it. */
export interface PackageIndex {
  lookup(name: string): Promise<PackageMetadata | null>;
}
