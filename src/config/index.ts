/**
 * @fileoverview Loads and validates application configuration from the
 * environment. Values come from `process.env` (optionally seeded by a `.env`
 * file) and are parsed with zod so every consumer sees typed, defaulted values.
 * @module src/config/index
 */
import dotenv from 'dotenv';
import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

dotenv.config();

const LOG_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'crit',
  'silent',
] as const;

export type ConfigLogLevel = (typeof LOG_LEVELS)[number];

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
});

function readPackageInfo(): z.infer<typeof PackageJsonSchema> {
  try {
    const raw = readFileSync(
      new URL('../../package.json', import.meta.url),
      'utf-8',
    );
    return PackageJsonSchema.parse(JSON.parse(raw));
  } catch {
    return { name: 'structure-finder-mcp-server', version: '0.0.0' };
  }
}

const EnvSchema = z.object({
  MCP_SERVER_NAME: z.string().min(1).optional(),
  MCP_SERVER_VERSION: z.string().min(1).optional(),
  MCP_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  RCSB_SEARCH_URL: z
    .string()
    .url()
    .default('https://search.rcsb.org/rcsbsearch/v2/query'),
  RCSB_DATA_URL: z.string().url().default('https://data.rcsb.org'),
  RCSB_FILES_URL: z.string().url().default('https://files.rcsb.org/download'),
  RCSB_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  RCSB_METADATA_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  RCSB_FILE_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  STRUCTURE_FINDER_DEFAULT_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1)
    .max(20)
    .default(10),
  STRUCTURE_FINDER_CACHE_TTL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(15 * 60 * 1000),
  STRUCTURE_FINDER_CACHE_MAX_ENTRIES: z.coerce
    .number()
    .int()
    .positive()
    .default(100),
});

/**
 * Fully resolved application configuration.
 */
export interface AppConfig {
  mcpServerName: string;
  mcpServerVersion: string;
  logLevel: ConfigLogLevel;
  environment: 'development' | 'production' | 'test';
  rcsb: {
    searchUrl: string;
    dataUrl: string;
    filesUrl: string;
    searchTimeoutMs: number;
    metadataTimeoutMs: number;
    fileTimeoutMs: number;
  };
  structureFinder: {
    defaultConcurrency: number;
    cacheTtlMs: number;
    cacheMaxEntries: number;
  };
}

/**
 * Parses an environment map into an {@link AppConfig}.
 * @throws {McpError} ConfigurationError when a variable fails validation.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new McpError(
      JsonRpcErrorCode.ConfigurationError,
      `Invalid environment configuration: ${issues.join('; ')}`,
      { issues },
    );
  }

  const e = parsed.data;
  const pkg = readPackageInfo();

  return {
    mcpServerName: e.MCP_SERVER_NAME ?? pkg.name,
    mcpServerVersion: e.MCP_SERVER_VERSION ?? pkg.version,
    logLevel: e.MCP_LOG_LEVEL,
    environment: e.NODE_ENV,
    rcsb: {
      searchUrl: e.RCSB_SEARCH_URL,
      dataUrl: e.RCSB_DATA_URL.replace(/\/+$/, ''),
      filesUrl: e.RCSB_FILES_URL.replace(/\/+$/, ''),
      searchTimeoutMs: e.RCSB_SEARCH_TIMEOUT_MS,
      metadataTimeoutMs: e.RCSB_METADATA_TIMEOUT_MS,
      fileTimeoutMs: e.RCSB_FILE_TIMEOUT_MS,
    },
    structureFinder: {
      defaultConcurrency: e.STRUCTURE_FINDER_DEFAULT_CONCURRENCY,
      cacheTtlMs: e.STRUCTURE_FINDER_CACHE_TTL_MS,
      cacheMaxEntries: e.STRUCTURE_FINDER_CACHE_MAX_ENTRIES,
    },
  };
}

export const config: AppConfig = parseConfig(process.env);
