import { buildRunSummary, ensureProjectDirectory } from '@/assets/run';
import { formatMegabytes } from '@/assets/report';
import type { PackageRunEntry, RunContext } from '@/assets/types';
import {
  purgeCorruptedArtifacts,
  type VerificationResult,
  verifyArtifacts,
} from '@/assets/verify';

export type VerifyWorkflowOptions = {
  purge: boolean;
};

export const toVerificationEntries = (result: VerificationResult): PackageRunEntry[] => [
  ...result.valid.map((artifact) => ({
    packageName: artifact.fileName,
    status: 'cached' as const,
    sizeBytes: artifact.sizeBytes,
    localPath: artifact.localPath,
  })),
  ...result.corrupted.map((artifact) => ({
    packageName: artifact.fileName,
    status: 'failed' as const,
    sizeBytes: artifact.sizeBytes,
    error: `only ${artifact.sizeBytes} bytes, might be corrupted`,
  })),
];

/** Corrupted artifacts are reported but the run still succeeds. */
export const runVerifyWorkflow = async (
  context: RunContext,
  options: VerifyWorkflowOptions,
): Promise<number> => {
  const { layout, logger } = context;
  await ensureProjectDirectory(context.projectPath);

  context.notify({ type: 'stage', message: `Verifying ${layout.downloadDir}` });
  logger.info('Verifying existing downloads...');

  const result = await verifyArtifacts(layout.downloadDir, logger);

  logger.info(`Found ${result.valid.length} valid packages`);
  for (const artifact of result.valid) {
    logger.info(`  - ${artifact.fileName} (${formatMegabytes(artifact.sizeBytes)})`);
  }

  const notes: string[] = [];
  if (result.unverifiable.length > 0) {
    notes.push(`${result.unverifiable.length} package(s) could not be checked`);
  }

  if (options.purge && result.corrupted.length > 0) {
    const removed = await purgeCorruptedArtifacts(result.corrupted, logger);
    notes.push(`removed ${removed.length} corrupted package(s)`);
  }

  context.notify({
    type: 'summary',
    summary: buildRunSummary('Verification', toVerificationEntries(result), { notes }),
  });

  return 0;
};
