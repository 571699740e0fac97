/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

export const InputConfigSchema = z.string();

export const ImagesConfigSchema = z.object({
  count: z.number().int().positive(),
});

export const RequestConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
  userAgent: z.string().min(1),
});

export const StorageConfigSchema = z.object({
  originals: z.string(),
  output: z.string(),
});

export const ConcurrencyConfigSchema = z.object({
  pages: z.number().int().positive(),
  downloads: z.number().int().positive(),
});

export const ParserConfigSchema = z.object({
  excludeKeywords: z.array(z.string()),
});

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
  // Directory for per-run log files, null disables the file sink
  directory: z.string().nullable(),
});

export const HarvestConfigSchema = z.object({
  input: InputConfigSchema,
  images: ImagesConfigSchema,
  request: RequestConfigSchema,
  storage: StorageConfigSchema,
  concurrency: ConcurrencyConfigSchema,
  parser: ParserConfigSchema,
  logging: LoggingConfigSchema,
});

export const PartialHarvestConfigSchema = HarvestConfigSchema.partial().extend(
  {
    images: ImagesConfigSchema.partial().optional(),
    request: RequestConfigSchema.partial().optional(),
    storage: StorageConfigSchema.partial().optional(),
    concurrency: ConcurrencyConfigSchema.partial().optional(),
    parser: ParserConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  },
);

export type ImagesConfig = z.infer<typeof ImagesConfigSchema>;
export type RequestConfig = z.infer<typeof RequestConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type ConcurrencyConfig = z.infer<typeof ConcurrencyConfigSchema>;
export type ParserConfig = z.infer<typeof ParserConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;
export type PartialHarvestConfig = z.infer<typeof PartialHarvestConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
