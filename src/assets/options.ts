import path from 'node:path';

import { InvalidArgumentError } from 'commander';

import { DEFAULT_MAX_SIZE_BYTES, BYTES_PER_GB } from '@/assets/fetcher';
import { isLogLevel, type LogLevel } from '@/logger';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export type CommonCliOptionsInput = {
  projectPath?: string;
  packages?: string[];
  logLevel?: string;
  ui?: boolean;
};

export type DownloadCliOptionsInput = CommonCliOptionsInput & {
  verifyOnly?: boolean;
  maxSize?: number;
};

export type SyncCliOptionsInput = CommonCliOptionsInput & {
  placeholders?: boolean;
  listOnly?: boolean;
  vendor?: string;
};

export type ExportCliOptionsInput = CommonCliOptionsInput & {
  editorPath?: string;
  dryRun?: boolean;
};

export type VerifyCliOptionsInput = CommonCliOptionsInput & {
  purge?: boolean;
};

export type CommonOptions = {
  projectPath: string;
  packages: string[];
  logLevel: LogLevel;
  ui: boolean;
};

export type DownloadOptions = CommonOptions & {
  verifyOnly: boolean;
  maxSizeBytes: number;
};

export type SyncOptions = CommonOptions & {
  placeholders: boolean;
  listOnly: boolean;
  vendor?: string;
};

export type ExportOptions = CommonOptions & {
  editorPath?: string;
  dryRun: boolean;
};

export type VerifyOptions = CommonOptions & {
  purge: boolean;
};

export const parsePositiveNumber = (value: string): number => {
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
};

const resolveLogLevel = (value: string | undefined, env: NodeJS.ProcessEnv): LogLevel => {
  const candidate = value?.trim() || env.LOG_LEVEL?.trim();
  return candidate && isLogLevel(candidate) ? candidate : DEFAULT_LOG_LEVEL;
};

export const normalizeCommonOptions = (
  options: CommonCliOptionsInput,
  cwd: string,
  env: NodeJS.ProcessEnv,
): CommonOptions => ({
  projectPath: path.resolve(cwd, options.projectPath?.trim() || '.'),
  packages: (options.packages ?? []).map((name) => name.trim()).filter(Boolean),
  logLevel: resolveLogLevel(options.logLevel, env),
  ui: options.ui ?? true,
});

export const normalizeDownloadOptions = (
  options: DownloadCliOptionsInput,
  cwd: string,
  env: NodeJS.ProcessEnv,
): DownloadOptions => ({
  ...normalizeCommonOptions(options, cwd, env),
  verifyOnly: Boolean(options.verifyOnly),
  maxSizeBytes:
    options.maxSize !== undefined ? Math.floor(options.maxSize * BYTES_PER_GB) : DEFAULT_MAX_SIZE_BYTES,
});

export const normalizeSyncOptions = (
  options: SyncCliOptionsInput,
  cwd: string,
  env: NodeJS.ProcessEnv,
): SyncOptions => ({
  ...normalizeCommonOptions(options, cwd, env),
  placeholders: options.placeholders ?? true,
  listOnly: Boolean(options.listOnly),
  vendor: options.vendor?.trim() || undefined,
});

export const normalizeExportOptions = (
  options: ExportCliOptionsInput,
  cwd: string,
  env: NodeJS.ProcessEnv,
): ExportOptions => ({
  ...normalizeCommonOptions(options, cwd, env),
  editorPath: options.editorPath?.trim() || undefined,
  dryRun: Boolean(options.dryRun),
});

export const normalizeVerifyOptions = (
  options: VerifyCliOptionsInput,
  cwd: string,
  env: NodeJS.ProcessEnv,
): VerifyOptions => ({
  ...normalizeCommonOptions(options, cwd, env),
  purge: Boolean(options.purge),
});
