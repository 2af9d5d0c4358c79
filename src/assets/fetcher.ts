import { mkdir, open, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'pino';

import {
  LinkExtractionError,
  MissingToolError,
  NotFoundError,
  type PackageSyncError,
  SizeLimitExceededError,
  TransportError,
  errorMessage,
} from '@/assets/errors';
import { type ExternalTool, type ToolResult, summarizeToolError } from '@/assets/external-tool';
import {
  defaultInterstitialDetector,
  type InterstitialDetector,
  SNIFF_LIMIT_BYTES,
} from '@/assets/interstitial';
import { buildDirectDownloadUrl, extractFileId } from '@/assets/links';
import type { FetchedArtifact, FetchMethod, FetchResult } from '@/assets/types';

// Hosts answer empty or library user agents with an error page.
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

export const DEFAULT_FETCH_TIMEOUT_MS = 10 * 60 * 1000;
export const BYTES_PER_GB = 1024 * 1024 * 1024;
export const DEFAULT_MAX_SIZE_BYTES = 5 * BYTES_PER_GB;

// curl's exit status when --max-filesize stops a transfer.
const CURL_FILESIZE_EXCEEDED = 63;

export type RemoteFetcherOptions = {
  cacheDir: string;
  logger: Logger;
  tool: ExternalTool;
  http?: AxiosInstance;
  detector?: InterstitialDetector;
  timeoutMs?: number;
  platform?: NodeJS.Platform;
};

type FetchOperation = (
  link: string,
  destinationName: string,
  maxSizeBytes: number,
  packageName?: string,
) => Promise<FetchResult>;

/**
 * `packageName` defaults to the destination file name without its extension.
 */
export interface RemoteFetcher {
  /** Direct network fetch, including the large-file confirmation handshake. */
  fetch: FetchOperation;
  /** Download through curl; falls back to `fetch` when curl is not installed. */
  fetchViaExternalTool: FetchOperation;
  /** External tool first, network fetch when the tool run fails. */
  fetchPreferred: FetchOperation;
}

const packageNameOf = (destinationName: string): string => path.parse(destinationName).name;

const toBuffer = (data: unknown): Buffer => {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === 'string') {
    return Buffer.from(data);
  }
  return Buffer.alloc(0);
};

const toTransportFailure = (error: unknown, url: string): PackageSyncError => {
  if (axios.isAxiosError(error) && error.response) {
    if (error.response.status === 404) {
      return new NotFoundError(url);
    }
    return new TransportError(`HTTP Error ${error.response.status}: ${error.response.statusText}`, {
      url,
      status: error.response.status,
    });
  }
  return new TransportError(`Download failed: ${errorMessage(error)}`, { url });
};

const isContentLengthExceeded = (error: unknown): boolean =>
  axios.isAxiosError(error) &&
  !error.response &&
  /maxContentLength size of -?\d+ exceeded/.test(error.message);

const readHead = async (filePath: string): Promise<Buffer> => {
  const handle = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(SNIFF_LIMIT_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_LIMIT_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
};

const fail = (error: PackageSyncError): FetchResult => ({ ok: false, error });

const succeed = (
  packageName: string,
  localPath: string,
  sizeBytes: number,
  sourceMethod: FetchMethod,
): FetchResult => ({
  ok: true,
  artifact: { packageName, localPath, sizeBytes, sourceMethod },
});

export const createRemoteFetcher = (options: RemoteFetcherOptions): RemoteFetcher => {
  const http = options.http ?? axios.create();
  const detector = options.detector ?? defaultInterstitialDetector;
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const curl = (options.platform ?? process.platform) === 'win32' ? 'curl.exe' : 'curl';
  const { logger } = options;

  const destinationPath = (destinationName: string) => path.join(options.cacheDir, destinationName);

  const findCached = async (
    destinationName: string,
    packageName: string,
  ): Promise<FetchedArtifact | null> => {
    const localPath = destinationPath(destinationName);
    const existing = await stat(localPath).catch(() => null);
    if (!existing || !existing.isFile()) {
      return null;
    }
    logger.info({ file: destinationName }, 'File already exists');
    return {
      packageName,
      localPath,
      sizeBytes: existing.size,
      sourceMethod: 'cache',
    };
  };

  const get = async (url: string, maxSizeBytes: number): Promise<Buffer> => {
    const response = await http.get<unknown>(url, {
      responseType: 'arraybuffer',
      headers: { 'User-Agent': BROWSER_USER_AGENT },
      timeout: timeoutMs,
      maxRedirects: 10,
      maxContentLength: maxSizeBytes,
    });
    return toBuffer(response.data);
  };

  const fetchDirect: FetchOperation = async (
    link,
    destinationName,
    maxSizeBytes,
    packageName = packageNameOf(destinationName),
  ) => {
    const cached = await findCached(destinationName, packageName);
    if (cached) {
      return { ok: true, artifact: cached };
    }

    const fileId = extractFileId(link);
    if (!fileId) {
      return fail(new LinkExtractionError(link));
    }

    const directUrl = buildDirectDownloadUrl(fileId);
    logger.info({ file: destinationName, fileId }, 'Downloading from remote host');

    let payload: Buffer;
    try {
      payload = await get(directUrl, maxSizeBytes);
      const token = detector.detect(payload);
      if (token) {
        logger.debug({ file: destinationName }, 'Large-file warning page, confirming download');
        payload = await get(`${directUrl}&confirm=${token}`, maxSizeBytes);
      }
    } catch (error) {
      if (isContentLengthExceeded(error)) {
        return fail(new SizeLimitExceededError(null, maxSizeBytes));
      }
      return fail(toTransportFailure(error, link));
    }

    if (payload.length > maxSizeBytes) {
      return fail(new SizeLimitExceededError(payload.length, maxSizeBytes));
    }

    const localPath = destinationPath(destinationName);
    const partPath = `${localPath}.part`;
    try {
      await mkdir(options.cacheDir, { recursive: true });
      await writeFile(partPath, payload);
      await rename(partPath, localPath);
    } catch (error) {
      await rm(partPath, { force: true });
      return fail(new TransportError(`Could not write ${destinationName}: ${errorMessage(error)}`));
    }

    logger.info({ file: destinationName, sizeBytes: payload.length }, 'Downloaded');
    return succeed(packageName, localPath, payload.length, 'fallback');
  };

  const runCurl = (url: string, outputPath: string, maxSizeBytes: number): Promise<ToolResult> =>
    options.tool.run(
      curl,
      [
        '-L',
        '--fail',
        '--silent',
        '--show-error',
        '--max-filesize',
        String(maxSizeBytes),
        '-o',
        outputPath,
        '-H',
        `User-Agent: ${BROWSER_USER_AGENT}`,
        url,
      ],
      { timeoutMs },
    );

  const sniffWarningPage = async (filePath: string): Promise<string | null> => {
    const head = await readHead(filePath).catch(() => null);
    return head ? detector.detect(head) : null;
  };

  const fetchViaExternalTool: FetchOperation = async (
    link,
    destinationName,
    maxSizeBytes,
    packageName = packageNameOf(destinationName),
  ) => {
    const fileId = extractFileId(link);
    if (!fileId) {
      return fail(new LinkExtractionError(link));
    }

    const cached = await findCached(destinationName, packageName);
    if (cached) {
      return { ok: true, artifact: cached };
    }

    const localPath = destinationPath(destinationName);
    const partPath = `${localPath}.part`;
    const directUrl = buildDirectDownloadUrl(fileId);
    logger.info({ file: destinationName }, `Downloading with ${curl}`);

    let result: ToolResult;
    try {
      await mkdir(options.cacheDir, { recursive: true });
      result = await runCurl(directUrl, partPath, maxSizeBytes);

      const token = result.exitCode === 0 ? await sniffWarningPage(partPath) : null;
      if (token) {
        logger.debug({ file: destinationName }, 'Large-file warning page, confirming download');
        result = await runCurl(`${directUrl}&confirm=${token}`, partPath, maxSizeBytes);
        if (result.exitCode === 0 && (await sniffWarningPage(partPath))) {
          await rm(partPath, { force: true });
          return fail(
            new TransportError(`${curl} download returned the warning page again`, { link }),
          );
        }
      }
    } catch (error) {
      if (error instanceof MissingToolError) {
        logger.warn(`${curl} not found, falling back to direct download`);
        return fetchDirect(link, destinationName, maxSizeBytes, packageName);
      }
      await rm(partPath, { force: true });
      return fail(new TransportError(`${curl} download error: ${errorMessage(error)}`));
    }

    const written = await stat(partPath).catch(() => null);
    if (result.exitCode !== 0 || !written) {
      await rm(partPath, { force: true });
      if (result.exitCode === CURL_FILESIZE_EXCEEDED) {
        return fail(new SizeLimitExceededError(null, maxSizeBytes));
      }
      const reason = result.timedOut
        ? 'timed out'
        : summarizeToolError(result.stderr, `exit code ${result.exitCode}`);
      logger.warn({ file: destinationName, reason }, `${curl} download failed`);
      return fail(new TransportError(`${curl} download failed: ${reason}`, { link }));
    }

    if (written.size > maxSizeBytes) {
      await rm(partPath, { force: true });
      return fail(new SizeLimitExceededError(written.size, maxSizeBytes));
    }

    try {
      await rename(partPath, localPath);
    } catch (error) {
      await rm(partPath, { force: true });
      return fail(new TransportError(`Could not write ${destinationName}: ${errorMessage(error)}`));
    }

    logger.info({ file: destinationName, sizeBytes: written.size }, 'Downloaded');
    return succeed(packageName, localPath, written.size, 'primary');
  };

  return {
    fetch: fetchDirect,
    fetchViaExternalTool,
    async fetchPreferred(link, destinationName, maxSizeBytes, packageName) {
      const viaTool = await fetchViaExternalTool(link, destinationName, maxSizeBytes, packageName);
      if (viaTool.ok || viaTool.error.kind !== 'transport') {
        return viaTool;
      }
      return fetchDirect(link, destinationName, maxSizeBytes, packageName);
    },
  };
};
