import { readdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';

import type { Logger } from 'pino';

import { errorMessage } from '@/assets/errors';
import { ARTIFACT_EXTENSION } from '@/assets/paths';

// Archives at or below this size are truncated downloads or error pages.
export const MIN_ARTIFACT_BYTES = 100;

export type VerifiedArtifact = {
  fileName: string;
  localPath: string;
  sizeBytes: number;
};

export type VerificationWarning = VerifiedArtifact & {
  reason: 'too-small';
};

export type UnverifiableArtifact = {
  fileName: string;
  localPath: string;
  error: string;
};

export type VerificationResult = {
  valid: VerifiedArtifact[];
  corrupted: VerificationWarning[];
  unverifiable: UnverifiableArtifact[];
};

export const verifyArtifacts = async (
  cacheDir: string,
  logger: Logger,
): Promise<VerificationResult> => {
  const result: VerificationResult = { valid: [], corrupted: [], unverifiable: [] };

  const names = await readdir(cacheDir).catch(() => null);
  if (!names) {
    return result;
  }

  const artifacts = names.filter((name) => name.endsWith(ARTIFACT_EXTENSION)).sort();

  for (const fileName of artifacts) {
    const localPath = path.join(cacheDir, fileName);
    try {
      const stats = await stat(localPath);
      if (!stats.isFile()) {
        logger.debug({ file: fileName }, 'Not a file, skipping');
        continue;
      }
      if (stats.size > MIN_ARTIFACT_BYTES) {
        result.valid.push({ fileName, localPath, sizeBytes: stats.size });
      } else {
        logger.warn({ file: fileName, sizeBytes: stats.size }, 'Package too small, might be corrupted');
        result.corrupted.push({ fileName, localPath, sizeBytes: stats.size, reason: 'too-small' });
      }
    } catch (error) {
      logger.warn({ file: fileName, err: errorMessage(error) }, 'Could not verify package');
      result.unverifiable.push({ fileName, localPath, error: errorMessage(error) });
    }
  }

  return result;
};

export const purgeCorruptedArtifacts = async (
  corrupted: readonly VerificationWarning[],
  logger: Logger,
): Promise<string[]> => {
  const removed: string[] = [];
  for (const artifact of corrupted) {
    try {
      await rm(artifact.localPath);
      removed.push(artifact.fileName);
      logger.info({ file: artifact.fileName }, 'Removed corrupted package');
    } catch (error) {
      logger.warn({ file: artifact.fileName, err: errorMessage(error) }, 'Could not remove package');
    }
  }
  return removed;
};
