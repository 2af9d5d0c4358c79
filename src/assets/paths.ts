import path from 'node:path';

export const POINTER_FILE_NAME = 'DownloadInstructions.txt';
export const ARTIFACT_EXTENSION = '.unitypackage';

export type ProjectLayout = {
  projectPath: string;
  searchRoots: string[];
  packagesRoot: string;
  downloadDir: string;
  exportDir: string;
  editorScriptDir: string;
  ledgerPath: string;
  catalogPath: string;
  logPath: string;
};

export const resolveProjectLayout = (projectPath: string): ProjectLayout => {
  const root = path.resolve(projectPath);
  const packagesRoot = path.join(root, 'Assets', 'Packages');
  const downloadDir = path.join(root, 'PackageDownloads');

  return {
    projectPath: root,
    searchRoots: [packagesRoot, path.join(root, 'Assets', 'Audio')],
    packagesRoot,
    downloadDir,
    exportDir: path.join(root, 'PackageExports'),
    editorScriptDir: path.join(root, 'Assets', 'Editor'),
    ledgerPath: path.join(root, '.package-sync', 'ledger.json'),
    catalogPath: path.join(root, 'PACKAGE_DOWNLOADS.md'),
    logPath: path.join(downloadDir, 'package-sync.log'),
  };
};

export const toArtifactFileName = (packageName: string): string =>
  `${packageName.replace(/[/ ]/g, '_')}${ARTIFACT_EXTENSION}`;

const EDITOR_VERSIONS = ['6000.0.26f1', '6000.0.37f1'];

export const knownEditorLocations = (platform: NodeJS.Platform): string[] => {
  if (platform === 'win32') {
    return [
      ...EDITOR_VERSIONS.map((version) => `C:/Program Files/Unity/Hub/Editor/${version}/Editor/Unity.exe`),
      'C:/Program Files/Unity/Editor/Unity.exe',
    ];
  }

  if (platform === 'darwin') {
    return [
      ...EDITOR_VERSIONS.map(
        (version) => `/Applications/Unity/Hub/Editor/${version}/Unity.app/Contents/MacOS/Unity`,
      ),
      '/Applications/Unity/Unity.app/Contents/MacOS/Unity',
    ];
  }

  if (platform === 'linux') {
    return ['/opt/Unity/Editor/Unity', `/home/runner/Unity/Hub/Editor/${EDITOR_VERSIONS[0]}/Editor/Unity`];
  }

  return [];
};

/**
 * Install locations are probed first; `UNITY_PATH` is consulted only when none
 * of them exists.
 */
export const resolveEditorPath = async (
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv,
  exists: (candidate: string) => Promise<boolean>,
): Promise<string | null> => {
  for (const candidate of knownEditorLocations(platform)) {
    if (await exists(candidate)) {
      return candidate;
    }
  }

  const override = env.UNITY_PATH?.trim();
  if (override && (await exists(override))) {
    return override;
  }

  return null;
};
