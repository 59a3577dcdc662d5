/**
 * Runtime Configuration
 * Reads the server settings from the environment (after dotenv has run)
 */

import path from 'node:path';

import { z } from 'zod';

import { ConfigError } from './errors.js';

/** Decimal megabyte, so MAX_SIZE_MB=0.002 allows 2000 bytes */
export const BYTES_PER_MB = 1_000_000;

export interface AppConfig {
  port: number;
  host: string;
  cleanupHours: number;
  maxSizeMb: number;
  maxSizeBytes: number;
  maxTextBytes: number;
  maxFilesPerUpload: number;
  storageDir: string;
  sweepIntervalMs: number;
  allowedOrigins: string[] | '*';
  tls: { certPath: string; keyPath: string } | null;
}

const optionalString = z.string().trim().optional();

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
    HOST: z.string().trim().default('0.0.0.0'),
    CLEANUP_HOURS: z.coerce.number().positive().default(24),
    MAX_SIZE_MB: z.coerce.number().positive().default(1024),
    MAX_TEXT_MB: z.coerce.number().positive().default(10),
    STORAGE_DIR: z.string().trim().default('./shared_files'),
    SSL_CERT: optionalString,
    SSL_KEY: optionalString,
    SWEEP_INTERVAL_MINUTES: z.coerce.number().positive().default(5),
    MAX_FILES_PER_UPLOAD: z.coerce.number().int().min(1).max(1000).default(10),
    ALLOWED_ORIGINS: optionalString,
  })
  .refine(
    (env) => (env.SSL_CERT === undefined) === (env.SSL_KEY === undefined),
    { message: 'SSL_CERT and SSL_KEY must be set together', path: ['SSL_CERT'] }
  );

function parseOrigins(raw: string | undefined): string[] | '*' {
  if (raw === undefined || raw === '*') {
    return '*';
  }
  const origins = raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin !== '');
  return origins.length > 0 ? origins : '*';
}

/**
 * Build the application config from environment variables
 *
 * @throws ConfigError when a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings in .env files count as unset
  const blanksRemoved = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value === undefined || value.trim() !== ''
    )
  );
  const parsed = envSchema.safeParse(blanksRemoved);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') ?? 'environment';
    throw new ConfigError(
      `Invalid configuration (${field}): ${issue?.message ?? 'unknown error'}`
    );
  }

  const vars = parsed.data;
  const maxSizeBytes = Math.floor(vars.MAX_SIZE_MB * BYTES_PER_MB);
  if (maxSizeBytes < 1) {
    throw new ConfigError('Invalid configuration (MAX_SIZE_MB): below one byte');
  }
  // Text is buffered in memory, so it gets its own cap, never above the file cap
  const maxTextBytes = Math.min(Math.floor(vars.MAX_TEXT_MB * BYTES_PER_MB), maxSizeBytes);
  if (maxTextBytes < 1) {
    throw new ConfigError('Invalid configuration (MAX_TEXT_MB): below one byte');
  }

  return {
    port: vars.PORT,
    host: vars.HOST,
    cleanupHours: vars.CLEANUP_HOURS,
    maxSizeMb: vars.MAX_SIZE_MB,
    maxSizeBytes,
    maxTextBytes,
    maxFilesPerUpload: vars.MAX_FILES_PER_UPLOAD,
    storageDir: path.resolve(vars.STORAGE_DIR),
    sweepIntervalMs: Math.round(vars.SWEEP_INTERVAL_MINUTES * 60_000),
    allowedOrigins: parseOrigins(vars.ALLOWED_ORIGINS),
    tls:
      vars.SSL_CERT !== undefined && vars.SSL_KEY !== undefined
        ? {
            certPath: path.resolve(vars.SSL_CERT),
            keyPath: path.resolve(vars.SSL_KEY),
          }
        : null,
  };
}
