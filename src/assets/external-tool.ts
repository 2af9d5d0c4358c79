import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { MissingToolError } from '@/assets/errors';

const execFileAsync = promisify(execFile);

export type ToolInvocation = {
  cwd?: string;
  timeoutMs?: number;
};

export type ToolResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

/**
 * Process capability used by the fetcher, exporter and uploader. Core logic
 * only talks to this interface; tests substitute an in-memory fake.
 */
export interface ExternalTool {
  isAvailable(command: string): Promise<boolean>;
  /** Resolves with the exit status; rejects with `MissingToolError` when the command cannot be spawned. */
  run(command: string, args: string[], options?: ToolInvocation): Promise<ToolResult>;
}

type ExecFailure = {
  code?: number | string;
  killed: boolean;
  signal: string | null;
  stdout: string;
  stderr: string;
  message: string;
};

// execFile rejects with an Error carrying the exit status and captured output.
const readExecFailure = (error: unknown): ExecFailure => {
  const fields = new Map<string, unknown>(
    error !== null && typeof error === 'object' ? Object.entries(error) : [],
  );
  const text = (key: string): string => {
    const value = fields.get(key);
    return typeof value === 'string' ? value : '';
  };
  const code = fields.get('code');

  return {
    code: typeof code === 'number' || typeof code === 'string' ? code : undefined,
    killed: fields.get('killed') === true,
    signal: text('signal') || null,
    stdout: text('stdout'),
    stderr: text('stderr'),
    message: error instanceof Error ? error.message : String(error),
  };
};

export const summarizeToolError = (stderr: string, fallback: string): string => {
  const trimmed = stderr.trim();
  if (!trimmed) {
    return fallback;
  }
  return trimmed.split(/\r?\n/).slice(0, 6).join('\n');
};

export const createProcessTool = (platform: NodeJS.Platform = process.platform): ExternalTool => {
  const run = async (
    command: string,
    args: string[],
    options?: ToolInvocation,
  ): Promise<ToolResult> => {
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        cwd: options?.cwd,
        timeout: options?.timeoutMs,
        maxBuffer: 16 * 1024 * 1024,
        windowsHide: true,
      });
      return { exitCode: 0, stdout, stderr, timedOut: false };
    } catch (error) {
      const failure = readExecFailure(error);
      if (failure.code === 'ENOENT') {
        throw new MissingToolError(command);
      }

      return {
        exitCode: typeof failure.code === 'number' ? failure.code : 1,
        stdout: failure.stdout,
        stderr: failure.stderr || failure.message,
        timedOut: failure.killed && failure.signal !== null,
      };
    }
  };

  return {
    run,
    async isAvailable(command) {
      const locator = platform === 'win32' ? 'where' : 'which';
      try {
        const result = await run(locator, [command]);
        return result.exitCode === 0;
      } catch (error) {
        if (error instanceof MissingToolError) {
          return false;
        }
        throw error;
      }
    },
  };
};
