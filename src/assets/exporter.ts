import { mkdir, mkdtemp, readdir, rm, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { Logger } from 'pino';
import { create as createTarball } from 'tar';

import { ExportFailedError, MissingToolError, errorMessage } from '@/assets/errors';
import type { ExternalTool } from '@/assets/external-tool';
import { type ProjectLayout, toArtifactFileName } from '@/assets/paths';
import type { Outcome, PackageRecord } from '@/assets/types';

export const EXPORT_TIMEOUT_MS = 5 * 60 * 1000;
export const EXPORT_SCRIPT_NAME = 'PackageExporter.cs';

export type EditorExportOptions = {
  layout: ProjectLayout;
  editorPath: string;
  tool: ExternalTool;
  logger: Logger;
  timeoutMs?: number;
};

export type ExportedPackage = {
  packageName: string;
  localPath: string;
  sizeBytes: number;
};

const toEditorPath = (value: string): string => value.split(path.sep).join('/');

/** Editor-side batch method that exports one asset folder and exits. */
export const renderExportScript = (assetPath: string, outputPath: string): string => `using UnityEngine;
using UnityEditor;
using System.IO;

public class PackageExporter
{
    public static void ExportPackage()
    {
        string packagePath = "${assetPath}";
        string outputPath = "${outputPath}";

        if (!Directory.Exists(packagePath))
        {
            Debug.LogError($"Package path does not exist: {packagePath}");
            EditorApplication.Exit(1);
            return;
        }

        string outputDir = Path.GetDirectoryName(outputPath);
        if (!Directory.Exists(outputDir))
        {
            Directory.CreateDirectory(outputDir);
        }

        try
        {
            AssetDatabase.ExportPackage(
                packagePath,
                outputPath,
                ExportPackageOptions.Recurse | ExportPackageOptions.IncludeDependencies
            );
            EditorApplication.Exit(0);
        }
        catch (System.Exception e)
        {
            Debug.LogError($"Failed to export package: {e.Message}");
            EditorApplication.Exit(1);
        }
    }
}
`;

export const isEditorRunning = async (
  tool: ExternalTool,
  platform: NodeJS.Platform,
  logger: Logger,
): Promise<boolean> => {
  try {
    if (platform === 'win32') {
      const result = await tool.run('tasklist', ['/FI', 'IMAGENAME eq Unity.exe']);
      return result.stdout.includes('Unity.exe');
    }
    const result = await tool.run('pgrep', ['-f', 'Unity']);
    return result.exitCode === 0;
  } catch (error) {
    if (error instanceof MissingToolError) {
      logger.debug({ err: error.message }, 'Process listing unavailable, assuming editor is closed');
      return false;
    }
    throw error;
  }
};

export const exportPackage = async (
  options: EditorExportOptions,
  record: PackageRecord,
): Promise<Outcome<{ exported: ExportedPackage }>> => {
  const { layout, logger } = options;
  const outputPath = path.join(layout.exportDir, toArtifactFileName(record.name));
  const scriptPath = path.join(layout.editorScriptDir, EXPORT_SCRIPT_NAME);
  const assetPath = toEditorPath(path.relative(layout.projectPath, record.packagePath));
  const logName = `export_${path.parse(outputPath).name}.log`;

  try {
    await mkdir(layout.exportDir, { recursive: true });
    await mkdir(layout.editorScriptDir, { recursive: true });
    // Only a file the editor writes during this run counts as the export.
    await rm(outputPath, { force: true });
    await writeFile(scriptPath, renderExportScript(assetPath, toEditorPath(outputPath)), 'utf8');

    logger.info({ package: record.name, output: path.basename(outputPath) }, 'Exporting package');

    const result = await options.tool.run(
      options.editorPath,
      [
        '-batchmode',
        '-projectPath',
        layout.projectPath,
        '-executeMethod',
        'PackageExporter.ExportPackage',
        '-logFile',
        path.join(layout.exportDir, logName),
        '-quit',
      ],
      { timeoutMs: options.timeoutMs ?? EXPORT_TIMEOUT_MS },
    );

    if (result.timedOut) {
      return { ok: false, error: new ExportFailedError(record.name, 'export timed out') };
    }

    const exported = await stat(outputPath).catch(() => null);
    if (!exported) {
      const reason = result.stderr.trim() || `editor exited with code ${result.exitCode}`;
      return { ok: false, error: new ExportFailedError(record.name, reason) };
    }

    return {
      ok: true,
      exported: { packageName: record.name, localPath: outputPath, sizeBytes: exported.size },
    };
  } catch (error) {
    return { ok: false, error: new ExportFailedError(record.name, errorMessage(error)) };
  } finally {
    await rm(scriptPath, { force: true });
  }
};

/**
 * Stand-in archive for hosts without the editor: a gzipped tarball holding a
 * single README, the same container format as a real export.
 */
export const createPlaceholderPackage = async (
  exportDir: string,
  packageName: string,
  logger: Logger,
): Promise<string> => {
  const outputPath = path.join(exportDir, toArtifactFileName(packageName));
  const staging = await mkdtemp(path.join(os.tmpdir(), 'package-sync-placeholder-'));

  logger.info({ package: packageName }, 'Creating placeholder package');

  try {
    await mkdir(exportDir, { recursive: true });
    await writeFile(
      path.join(staging, 'README.txt'),
      `Placeholder for ${packageName}\nExport with Unity to get actual package`,
      'utf8',
    );
    await createTarball({ gzip: true, file: outputPath, cwd: staging }, ['README.txt']);
  } finally {
    await rm(staging, { recursive: true, force: true });
  }

  return outputPath;
};

export const directorySize = async (dir: string): Promise<number> => {
  const entries = await readdir(dir, { withFileTypes: true }).catch(() => []);
  let total = 0;
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(entryPath);
    } else if (entry.isFile()) {
      const stats = await stat(entryPath).catch(() => null);
      total += stats?.size ?? 0;
    }
  }
  return total;
};
