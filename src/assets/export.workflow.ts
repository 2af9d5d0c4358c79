import { stat } from 'node:fs/promises';

import { discoverPackages, filterPackages } from '@/assets/discovery';
import { MissingToolError, PreconditionError } from '@/assets/errors';
import { directorySize, exportPackage, isEditorRunning } from '@/assets/exporter';
import { loadLedger, saveLedger } from '@/assets/ledger';
import type { ExportOptions } from '@/assets/options';
import { resolveEditorPath } from '@/assets/paths';
import { formatMegabytes, summarizeRun, writeRunReport } from '@/assets/report';
import { buildRunSummary, ensureProjectDirectory, runEachPackage } from '@/assets/run';
import type { PackageRunEntry, RunContext } from '@/assets/types';

const pathExists = async (candidate: string): Promise<boolean> =>
  (await stat(candidate).catch(() => null)) !== null;

const resolveEditor = async (context: RunContext, explicitPath?: string): Promise<string> => {
  if (explicitPath) {
    if (!(await pathExists(explicitPath))) {
      throw new MissingToolError('Unity editor', `No editor at ${explicitPath}`);
    }
    return explicitPath;
  }

  const detected = await resolveEditorPath(context.platform, context.env, pathExists);
  if (!detected) {
    throw new MissingToolError('Unity editor', 'Set UNITY_PATH or pass --editor-path');
  }
  return detected;
};

/** Exports each package folder under Assets/Packages with the editor in batch mode. */
export const runExportWorkflow = async (
  context: RunContext,
  options: ExportOptions,
): Promise<number> => {
  const { layout, logger } = context;
  await ensureProjectDirectory(context.projectPath);
  const startedAt = context.now();

  context.notify({ type: 'stage', message: 'Scanning for packages...' });
  const ledger = await loadLedger(layout.ledgerPath, logger);
  const records = filterPackages(
    await discoverPackages({
      roots: [layout.packagesRoot],
      projectPath: context.projectPath,
      vendorDirectory: ledger.vendorDirectory,
      logger,
    }),
    options.packages,
  );
  logger.info(`Found ${records.length} packages to export`);

  if (options.dryRun) {
    const entries: PackageRunEntry[] = [];
    for (const record of records) {
      const sizeBytes = await directorySize(record.packagePath);
      logger.info(`  - ${record.name} (${formatMegabytes(sizeBytes)})`);
      entries.push({ packageName: record.name, status: 'planned', sizeBytes, localPath: record.packagePath });
    }
    context.notify({
      type: 'summary',
      summary: buildRunSummary('Export (dry run)', entries, { notes: ['dry run, nothing exported'] }),
    });
    return 0;
  }

  const editorPath = await resolveEditor(context, options.editorPath);
  logger.info({ editor: editorPath }, 'Using Unity editor');

  if (await isEditorRunning(context.tool, context.platform, logger)) {
    throw new PreconditionError('Unity is running. Close it before exporting packages.');
  }

  context.notify({ type: 'stage', message: `Exporting ${records.length} packages...` });
  const entries = await runEachPackage(context, records, async (record) => {
    const result = await exportPackage(
      { layout, editorPath, tool: context.tool, logger },
      record,
    );
    if (!result.ok) {
      return { packageName: record.name, status: 'failed', error: result.error.message };
    }
    logger.info(
      { package: record.name, size: formatMegabytes(result.exported.sizeBytes) },
      'Exported',
    );
    return {
      packageName: record.name,
      status: 'exported',
      sizeBytes: result.exported.sizeBytes,
      localPath: result.exported.localPath,
    };
  });

  const finishedAt = context.now();
  const report = summarizeRun(entries, {
    timestamp: finishedAt,
    platform: context.platform,
    projectPath: context.projectPath,
    elapsedMs: finishedAt.getTime() - startedAt.getTime(),
  });

  const reportPath =
    report.successCount > 0 ? await writeRunReport(report, layout.exportDir, 'manifest') : undefined;

  await saveLedger(layout.ledgerPath, {
    ...ledger,
    lastExportAt: finishedAt.toISOString(),
    exportedPackages: entries
      .filter((entry) => entry.status === 'exported')
      .map((entry) => entry.packageName),
  });

  logger.info(
    { total: report.totalCount, success: report.successCount, failed: report.failureCount },
    `Export summary: ${report.successCount}/${report.totalCount} packages`,
  );

  context.notify({
    type: 'summary',
    summary: buildRunSummary('Export', entries, { reportPath }),
  });

  return report.failureCount > 0 ? 1 : 0;
};
