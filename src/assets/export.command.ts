import { type CommandRuntime, executeWorkflow } from '@/assets/command';
import { runExportWorkflow } from '@/assets/export.workflow';
import { type ExportCliOptionsInput, normalizeExportOptions } from '@/assets/options';

export const exportCommandHandler = async (
  rawOptions: ExportCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> => {
  const options = normalizeExportOptions(
    rawOptions,
    runtime?.cwd ?? process.cwd(),
    runtime?.env ?? process.env,
  );

  return executeWorkflow('Export', options, (context) => runExportWorkflow(context, options), runtime);
};
