import { stat } from 'node:fs/promises';
import path from 'node:path';

import { runCatalogWorkflow } from '@/assets/catalog.workflow';
import { discoverPackages, filterPackages } from '@/assets/discovery';
import { createPlaceholderPackage } from '@/assets/exporter';
import { loadLedger, saveLedger, upsertEntry, type LedgerDocument } from '@/assets/ledger';
import type { SyncOptions } from '@/assets/options';
import { toArtifactFileName } from '@/assets/paths';
import { buildCatalog, summarizeRun, writeCatalog, writeRunReport } from '@/assets/report';
import { buildRunSummary, ensureProjectDirectory, runEachPackage } from '@/assets/run';
import type { PackageRecord, PackageRunEntry, RunContext } from '@/assets/types';
import { ensureUploaderReady, rewritePointerFile, uploadArtifact } from '@/assets/uploader';

const findExistingExport = async (exportDir: string, record: PackageRecord): Promise<string | null> => {
  const candidate = path.join(exportDir, toArtifactFileName(record.name));
  const existing = await stat(candidate).catch(() => null);
  return existing?.isFile() ? candidate : null;
};

type SyncState = {
  ledger: LedgerDocument;
};

const syncPackage = async (
  context: RunContext,
  options: SyncOptions,
  state: SyncState,
  record: PackageRecord,
): Promise<PackageRunEntry> => {
  const { layout, logger } = context;

  if (record.hasLink && record.remoteLink) {
    logger.info({ package: record.name }, 'Already has a remote link');
    return { packageName: record.name, status: 'already-synced', link: record.remoteLink };
  }

  let artifactPath = await findExistingExport(layout.exportDir, record);
  if (artifactPath) {
    logger.info({ package: record.name, file: path.basename(artifactPath) }, 'Using existing export');
  } else if (options.placeholders) {
    artifactPath = await createPlaceholderPackage(layout.exportDir, record.name, logger);
  } else {
    return {
      packageName: record.name,
      status: 'failed',
      error: `No export found in ${layout.exportDir}`,
    };
  }

  const { size: sizeBytes } = await stat(artifactPath);
  const upload = await uploadArtifact(
    context.tool,
    artifactPath,
    state.ledger.remoteFolderId,
    logger,
  );
  if (!upload.ok) {
    return { packageName: record.name, status: 'failed', error: upload.error.message };
  }

  const updatedAt = context.now();
  if (state.ledger.autoUpdateInstructions) {
    await rewritePointerFile(record.pointerFilePath, upload.uploaded.link, record.name, updatedAt);
    logger.info({ file: record.relativePath }, 'Pointer file updated');
  }

  state.ledger = upsertEntry(
    state.ledger,
    record.name,
    upload.uploaded.fileId,
    upload.uploaded.link,
    updatedAt,
  );

  return {
    packageName: record.name,
    status: 'uploaded',
    sizeBytes,
    localPath: artifactPath,
    link: upload.uploaded.link,
  };
};

/**
 * Packages without a link are uploaded and their pointer files rewritten;
 * packages that already have one count as successes and are left untouched.
 */
export const runSyncWorkflow = async (context: RunContext, options: SyncOptions): Promise<number> => {
  const { layout, logger } = context;

  if (options.listOnly) {
    return runCatalogWorkflow(context, { packages: options.packages, vendor: options.vendor });
  }

  await ensureProjectDirectory(context.projectPath);
  const startedAt = context.now();

  context.notify({ type: 'stage', message: 'Checking upload tool...' });
  await ensureUploaderReady(context.tool);

  const state: SyncState = { ledger: await loadLedger(layout.ledgerPath, logger) };
  const vendorDirectory = options.vendor ?? state.ledger.vendorDirectory;
  const discover = () =>
    discoverPackages({
      roots: layout.searchRoots,
      projectPath: context.projectPath,
      vendorDirectory,
      logger,
    });

  context.notify({ type: 'stage', message: 'Scanning for pointer files...' });
  const records = filterPackages(await discover(), options.packages);
  logger.info(`Found ${records.length} packages`);

  context.notify({ type: 'stage', message: `Syncing ${records.length} packages...` });
  const entries = await runEachPackage(context, records, (record) =>
    syncPackage(context, options, state, record),
  );

  const finishedAt = context.now();
  await saveLedger(layout.ledgerPath, { ...state.ledger, lastSyncAt: finishedAt.toISOString() });

  const report = summarizeRun(entries, {
    timestamp: finishedAt,
    platform: context.platform,
    projectPath: context.projectPath,
    elapsedMs: finishedAt.getTime() - startedAt.getTime(),
  });
  const reportPath = await writeRunReport(report, layout.exportDir, 'sync_report');

  logger.info(
    { total: report.totalCount, success: report.successCount, report: reportPath },
    `Sync summary: ${report.successCount}/${report.totalCount} packages`,
  );

  const notes: string[] = [];
  if (report.successCount > 0) {
    const sections = buildCatalog(await discover(), vendorDirectory);
    await writeCatalog(layout.catalogPath, sections, finishedAt);
    notes.push(`catalog written to ${path.basename(layout.catalogPath)}`);
  }

  context.notify({
    type: 'summary',
    summary: buildRunSummary('Sync', entries, { reportPath, notes }),
  });

  return report.successCount === report.totalCount ? 0 : 1;
};
