import type { LogLevel } from '@pdfloom/logger';

import cron from 'node-cron';
import { tmpdir } from 'node:os';
import { z } from 'zod';

const MiB = 1024 * 1024;

const positiveInt = z.coerce.number().int().positive();
const seconds = z.coerce.number().positive();

/**
 * Environment variables read at startup.
 */
export const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  MAX_WORKERS: positiveInt.max(64).default(4),
  OCR_LANGUAGE: z.string().min(1).default('eng'),
  UPLOAD_DIR: z.string().min(1).optional(),
  MAX_UPLOAD_BYTES: positiveInt.default(16 * MiB),
  CACHE_TTL_SECONDS: seconds.default(3600),
  ACTIVE_RETENTION_SECONDS: seconds.default(300),
  TASK_RETENTION_SECONDS: seconds.default(3600),
  DOWNLOAD_TIMEOUT_MS: positiveInt.default(30_000),
  MAINTENANCE_CRON: z
    .string()
    .refine((expression) => cron.validate(expression), {
      message: 'Invalid cron expression',
    })
    .default('* * * * *'),
  MAX_PAGE_FAILURE_RATIO: z.coerce.number().min(0).max(1).default(1),
  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('info'),
});

export interface ServerConfig {
  port: number;
  host: string;
  maxWorkers: number;
  ocrLanguage: string;
  /** Uploads and downloads are written here */
  uploadDir: string;
  maxUploadBytes: number;
  cacheTtlMs: number;
  activeRetentionMs: number;
  taskRetentionMs: number;
  downloadTimeoutMs: number;
  maintenanceCron: string;
  maxPageFailureRatio: number;
  logLevel: LogLevel;
}

/**
 * Read the server configuration from environment variables.
 *
 * @throws Error listing every invalid variable
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const result = serverEnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid server configuration: ${details}`);
  }

  const vars = result.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    maxWorkers: vars.MAX_WORKERS,
    ocrLanguage: vars.OCR_LANGUAGE,
    uploadDir: vars.UPLOAD_DIR ?? tmpdir(),
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
    cacheTtlMs: vars.CACHE_TTL_SECONDS * 1000,
    activeRetentionMs: vars.ACTIVE_RETENTION_SECONDS * 1000,
    taskRetentionMs: vars.TASK_RETENTION_SECONDS * 1000,
    downloadTimeoutMs: vars.DOWNLOAD_TIMEOUT_MS,
    maintenanceCron: vars.MAINTENANCE_CRON,
    maxPageFailureRatio: vars.MAX_PAGE_FAILURE_RATIO,
    logLevel: vars.LOG_LEVEL,
  };
}
