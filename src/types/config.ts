/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

// Zod schemas
export const SourceConfigSchema = z.object({
  baseUrl: z.url(),
  timeout: z.number().int().positive(), // In milliseconds, per request attempt
  userAgent: z.string(),
});

export const RateLimitConfigSchema = z.object({
  capacity: z.number().int().positive(),
  refillPerSecond: z.number().positive(),
});

export const DiscoveryConfigSchema = z.object({
  rateLimit: RateLimitConfigSchema,
  concurrency: z.number().int().min(1).max(50),
  maxPages: z.number().int().positive(),
});

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().positive(),
  baseDelay: z.number().int().nonnegative(), // In milliseconds
  maxDelay: z.number().int().nonnegative(), // In milliseconds
});

export const ExportConfigSchema = z.object({
  directory: z.string(),
  concurrency: z.number().int().min(1).max(50),
  stateFile: z.string(),
  timezone: z.string().refine(isTimeZone, "Unknown IANA time zone"),
});

export const JournalConfigSchema = z.object({
  fileName: z.string(),
  // Path to a custom Handlebars template, null uses the built-in one
  template: z.string().nullable(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
});

export const ExporterConfigSchema = z.object({
  source: SourceConfigSchema,
  rateLimit: RateLimitConfigSchema,
  discovery: DiscoveryConfigSchema,
  retry: RetryConfigSchema,
  export: ExportConfigSchema,
  journal: JournalConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialExporterConfigSchema = ExporterConfigSchema.partial().extend({
  source: SourceConfigSchema.partial().optional(),
  rateLimit: RateLimitConfigSchema.partial().optional(),
  discovery: DiscoveryConfigSchema.partial()
    .extend({ rateLimit: RateLimitConfigSchema.partial().optional() })
    .optional(),
  retry: RetryConfigSchema.partial().optional(),
  export: ExportConfigSchema.partial().optional(),
  journal: JournalConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type ExportConfig = z.infer<typeof ExportConfigSchema>;
export type JournalConfig = z.infer<typeof JournalConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ExporterConfig = z.infer<typeof ExporterConfigSchema>;
export type PartialExporterConfig = z.infer<typeof PartialExporterConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
