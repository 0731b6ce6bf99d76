/**
 * Drama Collector — Configuration Schema
 */

import { z } from 'zod';
import { SourceKindSchema } from '../types/record';

export const ExportFormatSchema = z.enum(['json', 'csv', 'markdown', 'pdf']);
export type ExportFormat = z.infer<typeof ExportFormatSchema>;

export const ValidationLevelSchema = z.enum(['strict', 'moderate', 'lenient']);
export type ValidationLevel = z.infer<typeof ValidationLevelSchema>;

export const SourceConfigSchema = z.object({
  kind: SourceKindSchema,
  enabled: z.boolean().default(true),
  priority: z.number().int().min(0),
  /** Requests per second; null means unlimited */
  rateLimit: z.number().min(0).nullable().default(5),
  burst: z.number().positive().optional(),
  maxRetries: z.number().int().min(0).default(3),
  retryDelayMs: z.number().int().min(0).default(1000),
  timeoutMs: z.number().int().positive().default(30_000),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().optional(),
});
export type SourceConfig = z.infer<typeof SourceConfigSchema>;

export const SchedulerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  collectionIntervalHours: z.number().positive().default(6),
  /** UTC hour; scheduled jobs do not start during it */
  maintenanceHour: z.number().int().min(0).max(23).default(2),
  autoRetryFailedJobs: z.boolean().default(true),
  scheduledRetries: z.number().int().min(0).default(1),
  checkIntervalSeconds: z.number().int().positive().default(60),
  historyRetentionHours: z.number().positive().default(24),
  historyMaxEntries: z.number().int().positive().default(100),
  defaultCount: z.number().int().positive().default(50),
});
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;

export const ProcessingConfigSchema = z.object({
  maxConcurrentJobs: z.number().int().positive().default(1),
  /** 0-10, records scoring below are dropped */
  qualityThreshold: z.number().min(0).max(10).default(7),
  validationLevel: ValidationLevelSchema.default('moderate'),
});
export type ProcessingConfig = z.infer<typeof ProcessingConfigSchema>;

export const AggregatorConfigSchema = z.object({
  corroborationBonus: z.number().min(0).max(1).default(0.05),
  enrichDetails: z.boolean().default(true),
  /** How many top records get a detail fetch */
  detailLimit: z.number().int().min(0).default(20),
});
export type AggregatorSettings = z.infer<typeof AggregatorConfigSchema>;

export const ExportConfigSchema = z.object({
  enabled: z.boolean().default(false),
  formats: z.array(ExportFormatSchema).min(1).default(['json', 'csv']),
  outputDirectory: z.string().min(1).default('./data/exports'),
  includeMetadata: z.boolean().default(true),
  compress: z.boolean().default(false),
  /** TTF/OTF font for PDF output; the built-in Helvetica has no CJK glyphs */
  pdfFontPath: z.string().optional(),
});
export type ExportConfig = z.infer<typeof ExportConfigSchema>;

export const StoreConfigSchema = z.object({
  driver: z.enum(['memory', 'supabase']).default('memory'),
  table: z.string().min(1).default('drama_records'),
  supabaseUrl: z.string().url().optional(),
  supabaseServiceRoleKey: z.string().optional(),
});
export type StoreConfig = z.infer<typeof StoreConfigSchema>;

export const SystemConfigSchema = z.object({
  appName: z.string().default('Drama Collector'),
  environment: z.string().default('development'),
  scheduler: SchedulerConfigSchema.default({}),
  processing: ProcessingConfigSchema.default({}),
  aggregator: AggregatorConfigSchema.default({}),
  sources: z.record(z.string().min(1), SourceConfigSchema).refine(
    (sources) => Object.keys(sources).length > 0,
    { message: 'At least one source must be configured' }
  ),
  export: ExportConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  server: z.object({ port: z.number().int().min(1).max(65535).default(8000) }).default({}),
});
export type SystemConfig = z.infer<typeof SystemConfigSchema>;
export type SystemConfigInput = z.input<typeof SystemConfigSchema>;
