import { type CommandRuntime, executeWorkflow } from '@/assets/command';
import { runDownloadWorkflow } from '@/assets/download.workflow';
import { type DownloadCliOptionsInput, normalizeDownloadOptions } from '@/assets/options';

export const downloadCommandHandler = async (
  rawOptions: DownloadCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> => {
  const options = normalizeDownloadOptions(
    rawOptions,
    runtime?.cwd ?? process.cwd(),
    runtime?.env ?? process.env,
  );

  return executeWorkflow(
    options.verifyOnly ? 'Verification' : 'Download',
    options,
    (context) => runDownloadWorkflow(context, options),
    runtime,
  );
};
