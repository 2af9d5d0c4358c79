import { stat } from 'node:fs/promises';

import { PreconditionError, errorMessage } from '@/assets/errors';
import { isSuccessfulEntry } from '@/assets/report';
import type { PackageRecord, PackageRunEntry, RunContext, RunSummary } from '@/assets/types';

export const ensureProjectDirectory = async (projectPath: string): Promise<void> => {
  const projectStats = await stat(projectPath).catch(() => null);
  if (!projectStats || !projectStats.isDirectory()) {
    throw new PreconditionError(`Project path not found: ${projectPath}`);
  }
};

export const failedEntry = (packageName: string, error: unknown): PackageRunEntry => ({
  packageName,
  status: 'failed',
  error: errorMessage(error),
});

/**
 * Processes records one at a time in discovery order. Whatever a handler
 * throws is folded into a failed entry for that package.
 */
export const runEachPackage = async (
  context: RunContext,
  records: readonly PackageRecord[],
  handle: (record: PackageRecord) => Promise<PackageRunEntry>,
): Promise<PackageRunEntry[]> => {
  const entries: PackageRunEntry[] = [];

  for (const [index, record] of records.entries()) {
    context.notify({
      type: 'package-start',
      packageName: record.name,
      index: index + 1,
      total: records.length,
    });
    context.logger.info(
      { package: record.name, from: record.relativePath },
      `[${index + 1}/${records.length}] Processing ${record.name}`,
    );

    let entry: PackageRunEntry;
    try {
      entry = await handle(record);
    } catch (error) {
      entry = failedEntry(record.name, error);
    }

    if (entry.status === 'failed') {
      context.logger.error({ package: record.name, reason: entry.error }, 'Package failed');
    }

    entries.push(entry);
    context.notify({ type: 'package-done', entry });
  }

  return entries;
};

export const buildRunSummary = (
  title: string,
  entries: readonly PackageRunEntry[],
  extras: Partial<Pick<RunSummary, 'reportPath' | 'notes'>> = {},
): RunSummary => {
  const successes = entries.filter(isSuccessfulEntry);
  const failed = entries.filter((entry) => entry.status === 'failed').length;

  return {
    title,
    total: successes.length + failed,
    success: successes.length,
    failed,
    skipped: entries.filter((entry) => entry.status === 'skipped' || entry.status === 'planned').length,
    totalSizeBytes: successes.reduce((sum, entry) => sum + (entry.sizeBytes ?? 0), 0),
    reportPath: extras.reportPath,
    notes: extras.notes ?? [],
  };
};
