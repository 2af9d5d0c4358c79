import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Logger } from 'pino';

import {
  MissingToolError,
  PreconditionError,
  UploadFailedError,
  errorMessage,
} from '@/assets/errors';
import { type ExternalTool, summarizeToolError } from '@/assets/external-tool';
import { formatDisplayTimestamp } from '@/assets/lib/time';
import { buildShareLink } from '@/assets/links';
import type { Outcome } from '@/assets/types';

export const UPLOAD_TOOL = 'gdrive';
export const UPLOAD_TIMEOUT_MS = 30 * 60 * 1000;

export type UploadedArtifact = {
  fileId: string;
  link: string;
};

/** Throws when the upload utility is missing or has no signed-in account. */
export const ensureUploaderReady = async (tool: ExternalTool): Promise<void> => {
  if (!(await tool.isAvailable(UPLOAD_TOOL))) {
    throw new MissingToolError(UPLOAD_TOOL, 'Install with: brew install gdrive');
  }

  const result = await tool.run(UPLOAD_TOOL, ['account', 'list']);
  if (result.exitCode !== 0 || result.stdout.includes('No accounts')) {
    throw new PreconditionError(
      `${UPLOAD_TOOL} not authenticated. Run: ${UPLOAD_TOOL} account add, then run this command again`,
    );
  }
};

export const parseUploadedFileId = (stdout: string): string | null =>
  stdout.match(/Id:\s*(\S+)/)?.[1] ?? null;

export const uploadArtifact = async (
  tool: ExternalTool,
  filePath: string,
  parentFolderId: string | null,
  logger: Logger,
): Promise<Outcome<{ uploaded: UploadedArtifact }>> => {
  const fileName = path.basename(filePath);
  logger.info({ file: fileName }, 'Uploading to remote storage');

  try {
    const result = await tool.run(
      UPLOAD_TOOL,
      ['files', 'upload', '--parent', parentFolderId ?? 'root', filePath],
      { timeoutMs: UPLOAD_TIMEOUT_MS },
    );

    if (result.exitCode !== 0) {
      const reason = result.timedOut
        ? 'upload timed out'
        : summarizeToolError(result.stderr, `exit code ${result.exitCode}`);
      return { ok: false, error: new UploadFailedError(fileName, reason) };
    }

    const fileId = parseUploadedFileId(result.stdout);
    if (!fileId) {
      return {
        ok: false,
        error: new UploadFailedError(fileName, `could not read file ID from ${UPLOAD_TOOL} output`),
      };
    }

    const link = buildShareLink(fileId);
    logger.info({ file: fileName, link }, 'Uploaded');
    return { ok: true, uploaded: { fileId, link } };
  } catch (error) {
    return { ok: false, error: new UploadFailedError(fileName, errorMessage(error)) };
  }
};

export const renderPointerFile = (link: string, packageName: string, updatedAt: Date): string =>
  `Download the necessary file(s) from the following link:

${link}

Instructions:
1. Download the .unitypackage file from the above link.
2. Open Unity and go to Assets > Import Package > Custom Package.
3. Select the downloaded .unitypackage file and import it into your project.

Package: ${packageName}
Last Updated: ${formatDisplayTimestamp(updatedAt)}
Synced with package-sync
`;

export const rewritePointerFile = async (
  pointerFilePath: string,
  link: string,
  packageName: string,
  updatedAt: Date,
): Promise<void> => {
  await writeFile(pointerFilePath, renderPointerFile(link, packageName, updatedAt), 'utf8');
};
