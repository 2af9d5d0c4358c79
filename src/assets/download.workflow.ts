import type { AxiosInstance } from 'axios';

import { discoverPackages, filterPackages } from '@/assets/discovery';
import { createRemoteFetcher, type RemoteFetcher } from '@/assets/fetcher';
import { loadLedger, saveLedger, upsertEntry, type LedgerDocument } from '@/assets/ledger';
import { extractFileId } from '@/assets/links';
import type { DownloadOptions } from '@/assets/options';
import { toArtifactFileName } from '@/assets/paths';
import {
  formatMegabytes,
  formatThroughput,
  summarizeRun,
  writeRunReport,
} from '@/assets/report';
import { buildRunSummary, ensureProjectDirectory, runEachPackage } from '@/assets/run';
import type { PackageRecord, PackageRunEntry, RunContext } from '@/assets/types';
import { runVerifyWorkflow } from '@/assets/verify.workflow';
import { verifyArtifacts } from '@/assets/verify';

export type DownloadWorkflowDeps = {
  fetcher?: RemoteFetcher;
  http?: AxiosInstance;
};

export const downloadPackage = async (
  fetcher: RemoteFetcher,
  record: PackageRecord,
  maxSizeBytes: number,
): Promise<PackageRunEntry> => {
  if (!record.remoteLink) {
    return { packageName: record.name, status: 'skipped', error: 'no remote link' };
  }

  const result = await fetcher.fetchPreferred(
    record.remoteLink,
    toArtifactFileName(record.name),
    maxSizeBytes,
    record.name,
  );

  if (!result.ok) {
    return { packageName: record.name, status: 'failed', error: result.error.message };
  }

  return {
    packageName: record.name,
    status: result.artifact.sourceMethod === 'cache' ? 'cached' : 'downloaded',
    sizeBytes: result.artifact.sizeBytes,
    localPath: result.artifact.localPath,
    link: record.remoteLink,
  };
};

// Records a mapping only when it is new or the link changed.
const recordLinks = (
  ledger: LedgerDocument,
  records: readonly PackageRecord[],
  entries: readonly PackageRunEntry[],
  now: Date,
): LedgerDocument => {
  let next = ledger;
  for (const entry of entries) {
    const record = records.find((candidate) => candidate.name === entry.packageName);
    const link = record?.remoteLink;
    if (!link || (entry.status !== 'downloaded' && entry.status !== 'cached')) {
      continue;
    }
    const fileId = extractFileId(link);
    if (fileId && next.entries[entry.packageName]?.link !== link) {
      next = upsertEntry(next, entry.packageName, fileId, link, now);
    }
  }
  return next;
};

export const runDownloadWorkflow = async (
  context: RunContext,
  options: DownloadOptions,
  deps: DownloadWorkflowDeps = {},
): Promise<number> => {
  const { layout, logger } = context;

  if (options.verifyOnly) {
    return runVerifyWorkflow(context, { purge: false });
  }

  await ensureProjectDirectory(context.projectPath);
  const startedAt = context.now();

  context.notify({ type: 'stage', message: 'Scanning for pointer files...' });
  const ledger = await loadLedger(layout.ledgerPath, logger);
  const discovered = await discoverPackages({
    roots: layout.searchRoots,
    projectPath: context.projectPath,
    vendorDirectory: ledger.vendorDirectory,
    logger,
  });

  const selected = filterPackages(discovered, options.packages).filter((record) => record.hasLink);
  if (selected.length === 0) {
    logger.warn('No pointer files with remote links found');
    context.notify({ type: 'summary', summary: buildRunSummary('Download', []) });
    return 0;
  }

  logger.info(`Found ${selected.length} packages to download`);
  context.notify({ type: 'stage', message: `Downloading ${selected.length} packages...` });

  const fetcher =
    deps.fetcher ??
    createRemoteFetcher({
      cacheDir: layout.downloadDir,
      logger,
      tool: context.tool,
      http: deps.http,
      platform: context.platform,
    });

  const entries = await runEachPackage(context, selected, (record) =>
    downloadPackage(fetcher, record, options.maxSizeBytes),
  );

  const finishedAt = context.now();
  const elapsedMs = finishedAt.getTime() - startedAt.getTime();
  const report = summarizeRun(entries, {
    timestamp: finishedAt,
    platform: context.platform,
    projectPath: context.projectPath,
    elapsedMs,
  });
  const reportPath = await writeRunReport(report, layout.downloadDir, 'download_report');

  await saveLedger(layout.ledgerPath, {
    ...recordLinks(ledger, selected, entries, finishedAt),
    lastDownloadAt: finishedAt.toISOString(),
  });

  logger.info(
    {
      total: report.totalCount,
      success: report.successCount,
      failed: report.failureCount,
      elapsedSeconds: (elapsedMs / 1000).toFixed(2),
      report: reportPath,
    },
    `Download summary: ${report.successCount}/${report.totalCount} packages, ${formatMegabytes(report.totalSizeBytes)}`,
  );

  const notes: string[] = [];
  const throughput = formatThroughput(report.totalSizeBytes, elapsedMs);
  if (throughput) {
    logger.info(`Average speed: ${throughput}`);
    notes.push(`average speed ${throughput}`);
  }

  const verification = await verifyArtifacts(layout.downloadDir, logger);
  logger.info(`Verified ${verification.valid.length} valid packages`);
  notes.push(`${verification.valid.length} valid package(s) in cache`);
  if (verification.corrupted.length > 0) {
    notes.push(`${verification.corrupted.length} package(s) look corrupted`);
  }

  context.notify({
    type: 'summary',
    summary: buildRunSummary('Download', entries, { reportPath, notes }),
  });

  return report.failureCount > 0 ? 1 : 0;
};
