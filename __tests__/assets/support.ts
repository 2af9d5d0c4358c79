import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import axios, { AxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import pino, { type Logger } from 'pino';

import { createRunContext } from '@/assets/context';
import type { ExternalTool, ToolInvocation, ToolResult } from '@/assets/external-tool';
import { POINTER_FILE_NAME } from '@/assets/paths';
import type { RunContext, WorkflowEvent } from '@/assets/types';

const tempRoots: string[] = [];

export const createTempDir = async (prefix: string): Promise<string> => {
  const root = await mkdtemp(path.join(os.tmpdir(), prefix));
  tempRoots.push(root);
  return root;
};

export const cleanupTempDirs = async (): Promise<void> => {
  while (tempRoots.length > 0) {
    const root = tempRoots.pop();
    if (root) {
      await rm(root, { recursive: true, force: true });
    }
  }
};

export const silentLogger = (): Logger => pino({ level: 'silent' });

export type LogLine = { level: number; msg: string } & Record<string, unknown>;

/** Logger that keeps every JSON line it writes. */
export const captureLogger = (): { logger: Logger; lines: LogLine[] } => {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(chunk: string) {
        const parsed: unknown = JSON.parse(chunk);
        if (parsed && typeof parsed === 'object' && 'level' in parsed && 'msg' in parsed) {
          const { level, msg } = parsed;
          lines.push({ ...parsed, level: Number(level), msg: String(msg) });
        }
      },
    },
  );
  return { logger, lines };
};

export const ok = (stdout = ''): ToolResult => ({ exitCode: 0, stdout, stderr: '', timedOut: false });

export const failed = (stderr: string, exitCode = 1): ToolResult => ({
  exitCode,
  stdout: '',
  stderr,
  timedOut: false,
});

export type ToolCall = {
  command: string;
  args: string[];
  options?: ToolInvocation;
};

export type FakeToolHandler = (call: ToolCall) => ToolResult | Promise<ToolResult>;

export const createFakeTool = (
  handler: FakeToolHandler,
  available: (command: string) => boolean = () => true,
): { tool: ExternalTool; calls: ToolCall[] } => {
  const calls: ToolCall[] = [];
  const tool: ExternalTool = {
    async isAvailable(command) {
      return available(command);
    },
    async run(command, args, options) {
      const call = { command, args, options };
      calls.push(call);
      return handler(call);
    },
  };
  return { tool, calls };
};

export const writePointerFile = async (
  root: string,
  relativeDir: string,
  content: string,
): Promise<string> => {
  const dir = path.join(root, relativeDir);
  await mkdir(dir, { recursive: true });
  const pointerPath = path.join(dir, POINTER_FILE_NAME);
  await writeFile(pointerPath, content, 'utf8');
  return pointerPath;
};

export type HttpRoute = (url: string) => { status: number; body: string | Buffer };

const STATUS_TEXT: Record<number, string> = { 200: 'OK', 404: 'Not Found', 500: 'Internal Server Error' };

/**
 * Axios instance served by an in-process adapter. Non-2xx statuses and bodies
 * over `maxContentLength` reject the way the node http adapter does.
 */
export const createHttp = (
  route: HttpRoute,
): { http: AxiosInstance; requests: string[]; contentLimits: Array<number | undefined> } => {
  const requests: string[] = [];
  const contentLimits: Array<number | undefined> = [];
  const http = axios.create({
    adapter: async (config) => {
      const url = config.url ?? '';
      requests.push(url);
      contentLimits.push(config.maxContentLength);
      const { status, body } = route(url);
      const data = Buffer.isBuffer(body) ? body : Buffer.from(body);
      const limit = config.maxContentLength;
      if (limit !== undefined && limit > -1 && data.length > limit) {
        throw new AxiosError(`maxContentLength size of ${limit} exceeded`, AxiosError.ERR_BAD_RESPONSE, config);
      }
      const response: AxiosResponse = {
        data,
        status,
        statusText: STATUS_TEXT[status] ?? 'Error',
        headers: {},
        config,
      };
      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          AxiosError.ERR_BAD_REQUEST,
          config,
          null,
          response,
        );
      }
      return response;
    },
  });
  return { http, requests, contentLimits };
};

export const FIXED_NOW = new Date(2024, 4, 17, 9, 30, 15);

export const createTestContext = (
  projectPath: string,
  overrides: { tool?: ExternalTool; logger?: Logger; env?: NodeJS.ProcessEnv } = {},
): { context: RunContext; events: WorkflowEvent[] } => {
  const events: WorkflowEvent[] = [];
  const context = createRunContext({
    projectPath,
    logger: overrides.logger ?? silentLogger(),
    tool: overrides.tool ?? createFakeTool(() => ok()).tool,
    platform: 'linux',
    env: overrides.env ?? {},
    now: () => FIXED_NOW,
    notify: (event) => events.push(event),
  });
  return { context, events };
};
