/**
 * Vault configuration: directory layout, state file location, pagination
 * limits and HTTP retry policy.
 *
 * Resolved from (lowest to highest precedence) built-in defaults, an
 * optional JSON config file, and CLI flags / environment variables.
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { homedir } from 'node:os';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './readwise/client.js';

export interface VaultConfig {
  vaultPath: string;
  stateFile: string;
  documentsDir: string;
  archivesDir: string;
  dailyReviewsDir: string;
  highlightsDir: string;
  /** Page size requested during document backfill. */
  pageSize: number;
  maxBackfillPages: number;
  maxHighlightPages: number;
  /** Delay between pagination requests. */
  paginationDelayMs: number;
  request: RetryPolicy;
}

export const DEFAULT_VAULT_PATH = resolve(homedir(), 'Notes');

export const DEFAULT_LAYOUT = {
  stateFile: '.claude/state/readwise-import.json',
  documentsDir: '2 Resources/Readwise/Documents',
  archivesDir: '3 Archives/Readwise',
  dailyReviewsDir: '2 Resources/Readwise/Daily Reviews',
  highlightsDir: '2 Resources/Readwise/Highlights',
} as const;

export const DEFAULT_LIMITS = {
  pageSize: 50,
  maxBackfillPages: 100,
  maxHighlightPages: 1000,
  paginationDelayMs: 500,
} as const;

/** Zod schema for the optional JSON config file. */
const VaultConfigFileSchema = z.object({
  vaultPath: z.string().optional(),
  stateFile: z.string().optional(),
  documentsDir: z.string().optional(),
  archivesDir: z.string().optional(),
  dailyReviewsDir: z.string().optional(),
  highlightsDir: z.string().optional(),
  pageSize: z.number().int().min(1).max(100).optional(),
  maxBackfillPages: z.number().int().min(1).optional(),
  maxHighlightPages: z.number().int().min(1).optional(),
  paginationDelayMs: z.number().int().min(0).optional(),
  request: z
    .object({
      maxRetries: z.number().int().min(0).max(10).optional(),
      baseDelayMs: z.number().int().min(0).optional(),
      maxDelayMs: z.number().int().min(0).optional(),
      backoffMultiplier: z.number().min(1).optional(),
      timeoutMs: z.number().int().min(1).optional(),
    })
    .optional(),
});

export type VaultConfigFile = z.infer<typeof VaultConfigFileSchema>;

/** Load and validate a JSON config file. */
export function loadVaultConfigFile(path: string): VaultConfigFile {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`);
  }

  try {
    const content = readFileSync(path, 'utf-8');
    const data: unknown = JSON.parse(content);
    return VaultConfigFileSchema.parse(data);
  } catch (error) {
    throw new Error(`Invalid config: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** Values coming from the command line and environment. */
export interface ConfigOverrides {
  vaultPath?: string;
  stateFile?: string;
}

function inVault(vaultPath: string, path: string): string {
  return isAbsolute(path) ? path : resolve(vaultPath, path);
}

/** Build the effective configuration. Relative paths are taken inside the vault. */
export function resolveVaultConfig(
  file: VaultConfigFile = {},
  overrides: ConfigOverrides = {},
): VaultConfig {
  const vaultPath = resolve(overrides.vaultPath ?? file.vaultPath ?? DEFAULT_VAULT_PATH);

  return {
    vaultPath,
    stateFile: inVault(vaultPath, overrides.stateFile ?? file.stateFile ?? DEFAULT_LAYOUT.stateFile),
    documentsDir: inVault(vaultPath, file.documentsDir ?? DEFAULT_LAYOUT.documentsDir),
    archivesDir: inVault(vaultPath, file.archivesDir ?? DEFAULT_LAYOUT.archivesDir),
    dailyReviewsDir: inVault(vaultPath, file.dailyReviewsDir ?? DEFAULT_LAYOUT.dailyReviewsDir),
    highlightsDir: inVault(vaultPath, file.highlightsDir ?? DEFAULT_LAYOUT.highlightsDir),
    pageSize: file.pageSize ?? DEFAULT_LIMITS.pageSize,
    maxBackfillPages: file.maxBackfillPages ?? DEFAULT_LIMITS.maxBackfillPages,
    maxHighlightPages: file.maxHighlightPages ?? DEFAULT_LIMITS.maxHighlightPages,
    paginationDelayMs: file.paginationDelayMs ?? DEFAULT_LIMITS.paginationDelayMs,
    request: { ...DEFAULT_RETRY_POLICY, ...file.request },
  };
}
