import { render } from 'ink';

import type { WorkflowObserver } from '@/assets/types';
import { RunApplication } from '@/assets/ui/run.application';

export type WorkflowInkOptions = {
  title: string;
  projectPath: string;
  logPath: string;
  run: (notify: WorkflowObserver) => Promise<number>;
};

export const runWorkflowInkApplication = async (options: WorkflowInkOptions): Promise<number> => {
  let exitCode = 0;

  const { waitUntilExit } = render(
    <RunApplication
      title={options.title}
      projectPath={options.projectPath}
      logPath={options.logPath}
      run={options.run}
      onComplete={(code) => {
        exitCode = code;
      }}
    />,
  );

  await waitUntilExit();
  return exitCode;
};
