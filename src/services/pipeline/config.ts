/**
 * Pipeline configuration
 *
 * @module services/pipeline/config
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir } from 'os';
import { REGISTRY_DB_FILENAME } from '../storage/database.js';

export const DEFAULT_STORAGE_PATH = path.join(homedir(), '.hypothesis-attestation');

export const DEFAULT_CAPABILITY_TIMEOUT_MS = 120_000;

export const EXECUTION_MODES = ['dag', 'sequential'] as const;

export type ExecutionMode = (typeof EXECUTION_MODES)[number];

export const PipelineConfigSchema = z.object({
  storagePath: z.string().min(1).default(DEFAULT_STORAGE_PATH),
  authorId: z.string().min(1).default('anonymous'),
  capabilityTimeoutMs: z.number().int().positive().default(DEFAULT_CAPABILITY_TIMEOUT_MS),
  executionMode: z.enum(EXECUTION_MODES).default('dag'),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? parseInt(raw, 10) : undefined;
}

/**
 * Load configuration from HYPOTHESIS_* environment variables, then overrides.
 *
 * @throws ZodError when a value is out of range
 */
export function loadPipelineConfig(overrides?: Partial<PipelineConfig>): PipelineConfig {
  const envConfig = {
    storagePath: process.env.HYPOTHESIS_STORAGE_PATH || undefined,
    authorId: process.env.HYPOTHESIS_AUTHOR_ID || undefined,
    capabilityTimeoutMs: envInt('HYPOTHESIS_CAPABILITY_TIMEOUT_MS'),
    executionMode: process.env.HYPOTHESIS_EXECUTION_MODE || undefined,
  };

  return PipelineConfigSchema.parse({ ...envConfig, ...overrides });
}

/**
 * Registry database file under the configured storage path
 */
export function registryDatabasePath(config: PipelineConfig): string {
  return path.join(config.storagePath, REGISTRY_DB_FILENAME);
}
