import { discoverPackages, filterPackages } from '@/assets/discovery';
import { loadLedger } from '@/assets/ledger';
import { buildCatalog, writeCatalog } from '@/assets/report';
import { buildRunSummary, ensureProjectDirectory } from '@/assets/run';
import type { PackageRunEntry, RunContext } from '@/assets/types';

export type CatalogWorkflowOptions = {
  packages: string[];
  vendor?: string;
};

export const runCatalogWorkflow = async (
  context: RunContext,
  options: CatalogWorkflowOptions,
): Promise<number> => {
  const { layout, logger } = context;
  await ensureProjectDirectory(context.projectPath);

  context.notify({ type: 'stage', message: 'Scanning for pointer files...' });
  const ledger = await loadLedger(layout.ledgerPath, logger);
  const vendorDirectory = options.vendor ?? ledger.vendorDirectory;
  const records = filterPackages(
    await discoverPackages({
      roots: layout.searchRoots,
      projectPath: context.projectPath,
      vendorDirectory,
      logger,
    }),
    options.packages,
  );

  const sections = buildCatalog(records, vendorDirectory);
  await writeCatalog(layout.catalogPath, sections, context.now());
  logger.info({ path: layout.catalogPath }, 'Catalog written');

  const entries: PackageRunEntry[] = records.map((record) =>
    record.remoteLink
      ? { packageName: record.name, status: 'already-synced', link: record.remoteLink }
      : { packageName: record.name, status: 'skipped', error: 'no remote link' },
  );

  context.notify({
    type: 'summary',
    summary: buildRunSummary('Catalog', entries, { reportPath: layout.catalogPath }),
  });

  return 0;
};
