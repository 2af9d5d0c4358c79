import { runCatalogWorkflow } from '@/assets/catalog.workflow';
import { type CommandRuntime, executeWorkflow } from '@/assets/command';
import { normalizeSyncOptions, type SyncCliOptionsInput } from '@/assets/options';
import { runSyncWorkflow } from '@/assets/sync.workflow';

export const syncCommandHandler = async (
  rawOptions: SyncCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> => {
  const options = normalizeSyncOptions(rawOptions, runtime?.cwd ?? process.cwd(), runtime?.env ?? process.env);

  return executeWorkflow('Sync', options, (context) => runSyncWorkflow(context, options), runtime);
};

export const catalogCommandHandler = async (
  rawOptions: SyncCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> => {
  const options = normalizeSyncOptions(rawOptions, runtime?.cwd ?? process.cwd(), runtime?.env ?? process.env);

  return executeWorkflow(
    'Catalog',
    options,
    (context) => runCatalogWorkflow(context, { packages: options.packages, vendor: options.vendor }),
    runtime,
  );
};
