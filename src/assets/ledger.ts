import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { Logger } from 'pino';
import { z } from 'zod';

import { DEFAULT_VENDOR_DIRECTORY } from '@/assets/discovery';
import { ConfigParseError, errorMessage } from '@/assets/errors';

export const LedgerEntrySchema = z.object({
  remoteFileId: z.string(),
  link: z.string(),
  updatedAt: z.string(),
});

export const LedgerDocumentSchema = z
  .object({
    remoteFolder: z.string(),
    remoteFolderId: z.string().nullable(),
    vendorDirectory: z.string().min(1),
    autoUpdateInstructions: z.boolean(),
    lastSyncAt: z.string().nullable(),
    lastDownloadAt: z.string().nullable(),
    lastExportAt: z.string().nullable(),
    exportedPackages: z.array(z.string()),
    entries: z.record(LedgerEntrySchema),
  })
  .passthrough();

export type LedgerDocument = z.infer<typeof LedgerDocumentSchema>;

export const createDefaultLedger = (): LedgerDocument => ({
  remoteFolder: 'Unity_Packages',
  remoteFolderId: null,
  vendorDirectory: DEFAULT_VENDOR_DIRECTORY,
  autoUpdateInstructions: true,
  lastSyncAt: null,
  lastDownloadAt: null,
  lastExportAt: null,
  exportedPackages: [],
  entries: {},
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Persisted top-level keys replace their defaults wholesale; keys missing from
 * the file keep the default and keys unknown to this version are carried over.
 */
export const mergeOverDefaults = (
  persisted: Record<string, unknown>,
): ReturnType<typeof LedgerDocumentSchema.safeParse> =>
  LedgerDocumentSchema.safeParse({ ...createDefaultLedger(), ...persisted });

export const loadLedger = async (ledgerPath: string, logger: Logger): Promise<LedgerDocument> => {
  let raw: string;
  try {
    raw = await readFile(ledgerPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return createDefaultLedger();
    }
    const failure = new ConfigParseError(ledgerPath, errorMessage(error));
    logger.warn({ err: failure.toJSON() }, 'Unreadable ledger file, using defaults');
    return createDefaultLedger();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const failure = new ConfigParseError(ledgerPath, errorMessage(error));
    logger.warn({ err: failure.toJSON() }, 'Invalid ledger file, using defaults');
    return createDefaultLedger();
  }

  if (!isRecord(parsed)) {
    const failure = new ConfigParseError(ledgerPath, 'expected a JSON object');
    logger.warn({ err: failure.toJSON() }, 'Invalid ledger file, using defaults');
    return createDefaultLedger();
  }

  const merged = mergeOverDefaults(parsed);
  if (!merged.success) {
    const failure = new ConfigParseError(ledgerPath, merged.error.issues[0]?.message ?? 'invalid shape');
    logger.warn({ err: failure.toJSON() }, 'Invalid ledger file, using defaults');
    return createDefaultLedger();
  }

  return merged.data;
};

export const serializeLedger = (doc: LedgerDocument): string => `${JSON.stringify(doc, null, 2)}\n`;

export const saveLedger = async (ledgerPath: string, doc: LedgerDocument): Promise<void> => {
  const tempPath = `${ledgerPath}.${process.pid}.tmp`;
  await mkdir(dirname(ledgerPath), { recursive: true });
  try {
    await writeFile(tempPath, serializeLedger(doc), 'utf8');
    await rename(tempPath, ledgerPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
};

export const upsertEntry = (
  doc: LedgerDocument,
  packageName: string,
  remoteFileId: string,
  link: string,
  now: Date = new Date(),
): LedgerDocument => ({
  ...doc,
  entries: {
    ...doc.entries,
    [packageName]: { remoteFileId, link, updatedAt: now.toISOString() },
  },
});
