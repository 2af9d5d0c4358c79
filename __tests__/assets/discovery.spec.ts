import path from 'node:path';

import { afterEach, expect, it } from 'vitest';

import { derivePackageIdentity, discoverPackages, filterPackages } from '@/assets/discovery';
import { resolveProjectLayout } from '@/assets/paths';

import { cleanupTempDirs, createTempDir, silentLogger, writePointerFile } from './support';

afterEach(cleanupTempDirs);

const linkFor = (id: string) => `https://drive.google.com/file/d/${id}/view?usp=sharing`;

it('names packages after the vendor hierarchy', () => {
  const root = path.join(path.sep, 'project', 'Assets', 'Packages');

  expect(
    derivePackageIdentity(root, path.join(root, 'Vendor', 'Sub', 'DownloadInstructions.txt'), 'Vendor'),
  ).toEqual({ name: 'Vendor/Sub', packagePath: path.join(root, 'Vendor', 'Sub') });

  expect(
    derivePackageIdentity(
      root,
      path.join(root, 'Vendor', 'Sub', 'Meshes', 'DownloadInstructions.txt'),
      'Vendor',
    ),
  ).toEqual({ name: 'Vendor/Sub', packagePath: path.join(root, 'Vendor', 'Sub') });

  expect(
    derivePackageIdentity(root, path.join(root, 'Vendor', 'DownloadInstructions.txt'), 'Vendor'),
  ).toEqual({ name: 'Vendor', packagePath: path.join(root, 'Vendor') });

  expect(
    derivePackageIdentity(root, path.join(root, 'Plain', 'DownloadInstructions.txt'), 'Vendor'),
  ).toEqual({ name: 'Plain', packagePath: path.join(root, 'Plain') });
});

it('discovers pointer files across roots and keeps the first record per name', async () => {
  const projectPath = await createTempDir('package-sync-discovery-');
  const layout = resolveProjectLayout(projectPath);

  await writePointerFile(layout.packagesRoot, 'Plain', `Link:\n${linkFor('plainId')}\n`);
  await writePointerFile(layout.packagesRoot, 'Vendor', `${linkFor('vendorId')}\n`);
  await writePointerFile(layout.packagesRoot, 'Vendor/Sub', `${linkFor('subId')}\n`);
  await writePointerFile(path.join(projectPath, 'Assets', 'Audio'), 'Ambient', 'Not uploaded yet.\n');
  await writePointerFile(path.join(projectPath, 'Assets', 'Audio'), 'Plain', `${linkFor('otherId')}\n`);

  const records = await discoverPackages({
    roots: layout.searchRoots,
    projectPath,
    vendorDirectory: 'Vendor',
    logger: silentLogger(),
  });

  expect(records.map((record) => record.name)).toEqual(['Plain', 'Vendor', 'Vendor/Sub', 'Ambient']);
  expect(records[0]).toEqual({
    name: 'Plain',
    sourcePath: path.join(layout.packagesRoot, 'Plain'),
    packagePath: path.join(layout.packagesRoot, 'Plain'),
    pointerFilePath: path.join(layout.packagesRoot, 'Plain', 'DownloadInstructions.txt'),
    relativePath: 'Assets/Packages/Plain/DownloadInstructions.txt',
    remoteLink: linkFor('plainId'),
    hasLink: true,
  });
  expect(records[3]?.remoteLink).toBeNull();
  expect(records[3]?.hasLink).toBe(false);
});

it('skips search roots that do not exist', async () => {
  const projectPath = await createTempDir('package-sync-discovery-empty-');

  const records = await discoverPackages({
    roots: resolveProjectLayout(projectPath).searchRoots,
    projectPath,
    logger: silentLogger(),
  });

  expect(records).toEqual([]);
});

it('uses the default vendor directory when none is configured', async () => {
  const projectPath = await createTempDir('package-sync-discovery-default-');
  const layout = resolveProjectLayout(projectPath);
  await writePointerFile(layout.packagesRoot, 'LeartesStudios/CastleKit', `${linkFor('castle')}\n`);

  const records = await discoverPackages({
    roots: [layout.packagesRoot],
    projectPath,
    logger: silentLogger(),
  });

  expect(records.map((record) => record.name)).toEqual(['LeartesStudios/CastleKit']);
});

it('filters records by exact name and keeps everything for an empty filter', async () => {
  const projectPath = await createTempDir('package-sync-discovery-filter-');
  const layout = resolveProjectLayout(projectPath);
  await writePointerFile(layout.packagesRoot, 'Alpha', `${linkFor('a')}\n`);
  await writePointerFile(layout.packagesRoot, 'Beta', `${linkFor('b')}\n`);

  const records = await discoverPackages({ roots: [layout.packagesRoot], projectPath, logger: silentLogger() });

  expect(filterPackages(records, []).map((record) => record.name)).toEqual(['Alpha', 'Beta']);
  expect(filterPackages(records, ['Beta', 'Missing']).map((record) => record.name)).toEqual(['Beta']);
});
