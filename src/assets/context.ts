import type { Logger } from 'pino';

import { createProcessTool, type ExternalTool } from '@/assets/external-tool';
import { resolveProjectLayout } from '@/assets/paths';
import type { RunContext, WorkflowObserver } from '@/assets/types';

export type RunContextInput = {
  projectPath: string;
  logger: Logger;
  tool?: ExternalTool;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  notify?: WorkflowObserver;
};

export const createRunContext = (input: RunContextInput): RunContext => {
  const platform = input.platform ?? process.platform;
  const layout = resolveProjectLayout(input.projectPath);

  return {
    projectPath: layout.projectPath,
    layout,
    logger: input.logger,
    tool: input.tool ?? createProcessTool(platform),
    platform,
    env: input.env ?? process.env,
    now: input.now ?? (() => new Date()),
    notify: input.notify ?? (() => undefined),
  };
};
