import { type CommandRuntime, executeWorkflow } from '@/assets/command';
import { normalizeVerifyOptions, type VerifyCliOptionsInput } from '@/assets/options';
import { runVerifyWorkflow } from '@/assets/verify.workflow';

export const verifyCommandHandler = async (
  rawOptions: VerifyCliOptionsInput,
  runtime?: CommandRuntime,
): Promise<number> => {
  const options = normalizeVerifyOptions(
    rawOptions,
    runtime?.cwd ?? process.cwd(),
    runtime?.env ?? process.env,
  );

  return executeWorkflow(
    'Verification',
    options,
    (context) => runVerifyWorkflow(context, { purge: options.purge }),
    runtime,
  );
};
