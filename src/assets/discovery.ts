import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import type { Logger } from 'pino';

import { errorMessage } from '@/assets/errors';
import { findFirstRemoteLink } from '@/assets/links';
import { POINTER_FILE_NAME } from '@/assets/paths';
import type { PackageRecord } from '@/assets/types';

export const DEFAULT_VENDOR_DIRECTORY = 'LeartesStudios';

export type DiscoverOptions = {
  roots: string[];
  projectPath: string;
  vendorDirectory?: string;
  logger: Logger;
};

const normalizeRelativePath = (value: string): string => value.split(path.sep).join('/');

const byName = (left: Dirent, right: Dirent): number =>
  left.name < right.name ? -1 : left.name > right.name ? 1 : 0;

/**
 * A vendor directory holds named sub-collections, each its own package. A
 * pointer file directly under the vendor directory names the vendor itself.
 */
export const derivePackageIdentity = (
  root: string,
  pointerFilePath: string,
  vendorDirectory: string,
): { name: string; packagePath: string } => {
  const segments = path.relative(root, pointerFilePath).split(path.sep);
  const vendorIndex = segments.indexOf(vendorDirectory);

  if (vendorIndex === -1) {
    const packagePath = path.dirname(pointerFilePath);
    return { name: path.basename(packagePath), packagePath };
  }

  const subCollection = segments[vendorIndex + 1];
  if (subCollection !== undefined && vendorIndex + 1 < segments.length - 1) {
    return {
      name: `${vendorDirectory}/${subCollection}`,
      packagePath: path.join(root, ...segments.slice(0, vendorIndex + 2)),
    };
  }

  return {
    name: vendorDirectory,
    packagePath: path.join(root, ...segments.slice(0, vendorIndex + 1)),
  };
};

const walkForPointerFiles = async (dir: string, logger: Logger, out: string[]): Promise<void> => {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    logger.warn({ dir, err: errorMessage(error) }, 'Skipping unreadable directory');
    return;
  }

  entries.sort(byName);

  for (const entry of entries) {
    if (entry.isFile() && entry.name === POINTER_FILE_NAME) {
      out.push(path.join(dir, entry.name));
    }
  }

  for (const entry of entries) {
    if (!entry.isDirectory() || entry.name === '.git') {
      continue;
    }
    await walkForPointerFiles(path.join(dir, entry.name), logger, out);
  }
};

const createPackageRecord = async (
  root: string,
  pointerFilePath: string,
  options: DiscoverOptions,
): Promise<PackageRecord | null> => {
  let content: string;
  try {
    content = await readFile(pointerFilePath, 'utf8');
  } catch (error) {
    options.logger.warn(
      { file: pointerFilePath, err: errorMessage(error) },
      'Error reading pointer file',
    );
    return null;
  }

  const { name, packagePath } = derivePackageIdentity(
    root,
    pointerFilePath,
    options.vendorDirectory ?? DEFAULT_VENDOR_DIRECTORY,
  );
  const remoteLink = findFirstRemoteLink(content);

  return {
    name,
    sourcePath: path.dirname(pointerFilePath),
    packagePath,
    pointerFilePath,
    relativePath: normalizeRelativePath(path.relative(options.projectPath, pointerFilePath)),
    remoteLink,
    hasLink: remoteLink !== null,
  };
};

export const discoverPackages = async (options: DiscoverOptions): Promise<PackageRecord[]> => {
  const records: PackageRecord[] = [];
  const seen = new Set<string>();

  for (const root of options.roots) {
    const rootStats = await stat(root).catch(() => null);
    if (!rootStats || !rootStats.isDirectory()) {
      options.logger.debug({ root }, 'Search root not found, skipping');
      continue;
    }

    const pointerFiles: string[] = [];
    await walkForPointerFiles(root, options.logger, pointerFiles);

    for (const pointerFilePath of pointerFiles) {
      const record = await createPackageRecord(root, pointerFilePath, options);
      if (!record || seen.has(record.name)) {
        continue;
      }
      seen.add(record.name);
      records.push(record);
    }
  }

  return records;
};

export const filterPackages = (
  records: readonly PackageRecord[],
  names: readonly string[],
): PackageRecord[] => {
  if (names.length === 0) {
    return [...records];
  }
  const wanted = new Set(names);
  return records.filter((record) => wanted.has(record.name));
};
