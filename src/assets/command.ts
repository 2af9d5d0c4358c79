import { errorMessage } from '@/assets/errors';
import { createRunContext } from '@/assets/context';
import type { ExternalTool } from '@/assets/external-tool';
import type { CommonOptions } from '@/assets/options';
import { resolveProjectLayout } from '@/assets/paths';
import { ensureProjectDirectory } from '@/assets/run';
import type { RunContext, WorkflowObserver } from '@/assets/types';
import { runWorkflowInkApplication } from '@/assets/ui';
import { createLogger } from '@/logger';

export type CommandRuntime = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  interactive?: boolean;
  tool?: ExternalTool;
};

export type Workflow = (context: RunContext) => Promise<number>;

/**
 * Runs a workflow behind the progress board when stdout is a terminal, or
 * with pretty logs on stdout otherwise. While the board is up, logs go to a
 * file under the download directory.
 */
export const executeWorkflow = async (
  title: string,
  options: CommonOptions,
  workflow: Workflow,
  runtime: CommandRuntime = {},
): Promise<number> => {
  const layout = resolveProjectLayout(options.projectPath);
  const interactive = options.ui && (runtime.interactive ?? Boolean(process.stdout.isTTY));

  try {
    await ensureProjectDirectory(layout.projectPath);

    const logger = createLogger({
      level: options.logLevel,
      pretty: !interactive,
      destination: interactive ? layout.logPath : undefined,
    });

    const contextFor = (notify?: WorkflowObserver) =>
      createRunContext({
        projectPath: layout.projectPath,
        logger,
        tool: runtime.tool,
        env: runtime.env,
        notify,
      });

    const code = interactive
      ? await runWorkflowInkApplication({
          title,
          projectPath: layout.projectPath,
          logPath: layout.logPath,
          run: (notify) => workflow(contextFor(notify)),
        })
      : await workflow(contextFor());

    if (code !== 0) {
      process.exitCode = code;
    }
    return code;
  } catch (error) {
    console.error(`package-sync ${title.toLowerCase()} failed: ${errorMessage(error)}`);
    process.exitCode = 1;
    return 1;
  }
};
