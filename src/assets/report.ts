import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { formatDisplayTimestamp, formatFileTimestamp } from '@/assets/lib/time';
import type { PackageRecord, PackageRunEntry, PackageRunStatus } from '@/assets/types';

export const BYTES_PER_MB = 1024 * 1024;
export const THIRD_PARTY_CATEGORY = 'Third Party';

const SUCCESS_STATUSES: ReadonlySet<PackageRunStatus> = new Set([
  'downloaded',
  'cached',
  'already-synced',
  'uploaded',
  'exported',
]);

export type RunReport = Readonly<{
  timestamp: string;
  platform: string;
  projectPath: string;
  totalCount: number;
  successCount: number;
  failureCount: number;
  totalSizeBytes: number;
  elapsedMs: number;
  artifacts: readonly string[];
}>;

export type RunReportMeta = {
  timestamp: Date;
  platform: string;
  projectPath: string;
  elapsedMs: number;
};

export type ReportDocument = {
  timestamp: string;
  platform: string;
  projectPath: string;
  statistics: {
    total: number;
    success: number;
    failed: number;
    totalSizeMB: number;
  };
  files: string[];
};

export const isSuccessfulEntry = (entry: PackageRunEntry): boolean =>
  SUCCESS_STATUSES.has(entry.status);

/** Skipped and planned entries are not counted. */
export const summarizeRun = (
  entries: readonly PackageRunEntry[],
  meta: RunReportMeta,
): RunReport => {
  const successes = entries.filter(isSuccessfulEntry);
  const failures = entries.filter((entry) => entry.status === 'failed');

  return {
    timestamp: meta.timestamp.toISOString(),
    platform: meta.platform,
    projectPath: meta.projectPath,
    totalCount: successes.length + failures.length,
    successCount: successes.length,
    failureCount: failures.length,
    totalSizeBytes: successes.reduce((sum, entry) => sum + (entry.sizeBytes ?? 0), 0),
    elapsedMs: meta.elapsedMs,
    artifacts: successes.flatMap((entry) => (entry.localPath ? [entry.localPath] : [])),
  };
};

const roundTo2 = (value: number): number => Math.round(value * 100) / 100;

export const toReportDocument = (report: RunReport): ReportDocument => ({
  timestamp: report.timestamp,
  platform: report.platform,
  projectPath: report.projectPath,
  statistics: {
    total: report.totalCount,
    success: report.successCount,
    failed: report.failureCount,
    totalSizeMB: roundTo2(report.totalSizeBytes / BYTES_PER_MB),
  },
  files: [...report.artifacts],
});

export const formatMegabytes = (bytes: number): string => `${(bytes / BYTES_PER_MB).toFixed(2)} MB`;

/** Average throughput in megabits per second, or `null` when there is nothing to measure. */
export const formatThroughput = (totalBytes: number, elapsedMs: number): string | null => {
  if (totalBytes <= 0 || elapsedMs <= 0) {
    return null;
  }
  const megabits = (totalBytes / BYTES_PER_MB) * 8;
  return `${(megabits / (elapsedMs / 1000)).toFixed(2)} Mbps`;
};

const isAlreadyExists = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'EEXIST';

/**
 * Writes `<prefix>_YYYYMMDD_HHMMSS.json`. Files are created exclusively, so a
 * second report in the same second gets a numeric suffix instead of
 * overwriting the first.
 */
export const writeRunReport = async (
  report: RunReport,
  dir: string,
  prefix = 'download_report',
): Promise<string> => {
  await mkdir(dir, { recursive: true });

  const stamp = formatFileTimestamp(new Date(report.timestamp));
  const body = `${JSON.stringify(toReportDocument(report), null, 2)}\n`;

  for (let attempt = 0; ; attempt += 1) {
    const suffix = attempt === 0 ? '' : `_${attempt}`;
    const reportPath = path.join(dir, `${prefix}_${stamp}${suffix}.json`);
    try {
      await writeFile(reportPath, body, { encoding: 'utf8', flag: 'wx' });
      return reportPath;
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }
  }
};

export type CatalogItem = { name: string; link: string };

export type CatalogSection = { category: string; items: CatalogItem[] };

const byCodePoint = (left: CatalogItem, right: CatalogItem): number =>
  left.name < right.name ? -1 : left.name > right.name ? 1 : 0;

/** Sections appear in the order their first package was discovered. */
export const buildCatalog = (
  packages: readonly PackageRecord[],
  vendorDirectory: string,
): CatalogSection[] => {
  const sections = new Map<string, CatalogItem[]>();

  for (const record of packages) {
    if (!record.hasLink || !record.remoteLink) {
      continue;
    }
    const category = record.name.includes(vendorDirectory) ? vendorDirectory : THIRD_PARTY_CATEGORY;
    const items = sections.get(category) ?? [];
    items.push({ name: record.name, link: record.remoteLink });
    sections.set(category, items);
  }

  return [...sections.entries()].map(([category, items]) => ({
    category,
    items: [...items].sort(byCodePoint),
  }));
};

export const renderCatalog = (sections: readonly CatalogSection[], generatedAt: Date): string => {
  let content = '# Unity Package Downloads\n\n';
  content += `Generated: ${formatDisplayTimestamp(generatedAt)}\n\n`;

  for (const section of sections) {
    content += `\n## ${section.category}\n\n`;
    for (const item of section.items) {
      content += `- [${item.name}](${item.link})\n`;
    }
  }

  return content;
};

export const writeCatalog = async (
  catalogPath: string,
  sections: readonly CatalogSection[],
  generatedAt: Date,
): Promise<string> => {
  await writeFile(catalogPath, renderCatalog(sections, generatedAt), 'utf8');
  return catalogPath;
};
