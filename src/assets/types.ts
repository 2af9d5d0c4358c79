import type { Logger } from 'pino';

import type { PackageSyncError } from '@/assets/errors';
import type { ExternalTool } from '@/assets/external-tool';
import type { ProjectLayout } from '@/assets/paths';

export type PackageRecord = Readonly<{
  name: string;
  sourcePath: string;
  packagePath: string;
  pointerFilePath: string;
  relativePath: string;
  remoteLink: string | null;
  hasLink: boolean;
}>;

export type FetchMethod = 'primary' | 'fallback' | 'cache';

export type FetchedArtifact = Readonly<{
  packageName: string;
  localPath: string;
  sizeBytes: number;
  sourceMethod: FetchMethod;
}>;

/** Per-package operations report failure as a value, never by throwing. */
export type Outcome<T extends object> = ({ ok: true } & T) | { ok: false; error: PackageSyncError };

export type FetchResult = Outcome<{ artifact: FetchedArtifact }>;

export type PackageRunStatus =
  | 'downloaded'
  | 'cached'
  | 'skipped'
  | 'already-synced'
  | 'uploaded'
  | 'exported'
  | 'planned'
  | 'failed';

export type PackageRunEntry = {
  packageName: string;
  status: PackageRunStatus;
  sizeBytes?: number;
  localPath?: string;
  link?: string;
  error?: string;
};

export type RunSummary = {
  title: string;
  total: number;
  success: number;
  failed: number;
  skipped: number;
  totalSizeBytes: number;
  reportPath?: string;
  notes: string[];
};

export type WorkflowEvent =
  | { type: 'stage'; message: string }
  | { type: 'package-start'; packageName: string; index: number; total: number }
  | { type: 'package-done'; entry: PackageRunEntry }
  | { type: 'summary'; summary: RunSummary };

export type WorkflowObserver = (event: WorkflowEvent) => void;

export type RunContext = {
  projectPath: string;
  layout: ProjectLayout;
  logger: Logger;
  tool: ExternalTool;
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
  now: () => Date;
  notify: WorkflowObserver;
};
