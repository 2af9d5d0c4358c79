import { readFile, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, expect, it } from 'vitest';

import { MissingToolError } from '@/assets/errors';
import { createRemoteFetcher } from '@/assets/fetcher';
import { buildDirectDownloadUrl } from '@/assets/links';

import {
  cleanupTempDirs,
  createFakeTool,
  createHttp,
  createTempDir,
  failed,
  ok,
  silentLogger,
} from './support';

afterEach(cleanupTempDirs);

const LINK = 'https://drive.google.com/file/d/fileAbc123/view?usp=sharing';
const DIRECT_URL = buildDirectDownloadUrl('fileAbc123');

const unusedTool = () =>
  createFakeTool(() => {
    throw new Error('external tool should not run');
  });

it('downloads once and serves the cached file on the next call', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-');
  const payload = 'P'.repeat(512);
  const { http, requests } = createHttp(() => ({ status: 200, body: payload }));
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool: unusedTool().tool, http });

  const first = await fetcher.fetch(LINK, 'Vendor_Pack.unitypackage', 1024, 'Vendor/Pack');
  const second = await fetcher.fetch(LINK, 'Vendor_Pack.unitypackage', 1024, 'Vendor/Pack');

  expect(first).toEqual({
    ok: true,
    artifact: {
      packageName: 'Vendor/Pack',
      localPath: path.join(cacheDir, 'Vendor_Pack.unitypackage'),
      sizeBytes: 512,
      sourceMethod: 'fallback',
    },
  });
  expect(second.ok && second.artifact.sourceMethod).toBe('cache');
  expect(second.ok && second.artifact.sizeBytes).toBe(512);
  expect(requests).toEqual([DIRECT_URL]);
  expect(await readFile(path.join(cacheDir, 'Vendor_Pack.unitypackage'), 'utf8')).toBe(payload);
});

it('derives the package name from the destination when none is given', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-name-');
  const { http } = createHttp(() => ({ status: 200, body: 'x'.repeat(200) }));
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool: unusedTool().tool, http });

  const result = await fetcher.fetch(LINK, 'Ambient.unitypackage', 1024);

  expect(result.ok && result.artifact.packageName).toBe('Ambient');
});

it('confirms the large-file warning page and stores the real payload', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-confirm-');
  const warningPage = '<html><title>Virus scan warning</title><a href="/uc?confirm=tok_9&id=x">ok</a></html>';
  const { http, requests } = createHttp((url) =>
    url.includes('confirm=') ? { status: 200, body: 'REAL'.repeat(64) } : { status: 200, body: warningPage },
  );
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool: unusedTool().tool, http });

  const result = await fetcher.fetch(LINK, 'Big.unitypackage', 1024);

  expect(requests).toEqual([DIRECT_URL, `${DIRECT_URL}&confirm=tok_9`]);
  expect(result.ok && result.artifact.sizeBytes).toBe(256);
  expect(await readFile(path.join(cacheDir, 'Big.unitypackage'), 'utf8')).toBe('REAL'.repeat(64));
});

it('accepts a payload of exactly the size limit and rejects one byte more without writing', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-cap-');

  const exact = await createRemoteFetcher({
    cacheDir,
    logger: silentLogger(),
    tool: unusedTool().tool,
    http: createHttp(() => ({ status: 200, body: 'e'.repeat(100) })).http,
  }).fetch(LINK, 'Exact.unitypackage', 100);
  expect(exact.ok && exact.artifact.sizeBytes).toBe(100);

  const over = await createRemoteFetcher({
    cacheDir,
    logger: silentLogger(),
    tool: unusedTool().tool,
    http: createHttp(() => ({ status: 200, body: 'o'.repeat(101) })).http,
  }).fetch(LINK, 'Over.unitypackage', 100);

  expect(over.ok).toBe(false);
  expect(!over.ok && over.error.kind).toBe('size-limit-exceeded');
  expect(await readdir(cacheDir)).toEqual(['Exact.unitypackage']);
});

it('hands the size limit to the HTTP client so an oversized body is cut off while streaming', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-stream-cap-');
  const { http, contentLimits } = createHttp(() => ({ status: 200, body: Buffer.alloc(4096, 1) }));
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool: unusedTool().tool, http });

  const result = await fetcher.fetch(LINK, 'Stream.unitypackage', 1024);

  expect(contentLimits).toEqual([1024]);
  expect(!result.ok && result.error.kind).toBe('size-limit-exceeded');
  expect(!result.ok && result.error.message).toBe('File too large: exceeds the 1024 byte limit');
  expect(await readdir(cacheDir)).toEqual([]);
});

it('reports a missing remote file as not found', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-404-');
  const { http } = createHttp(() => ({ status: 404, body: 'missing' }));
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool: unusedTool().tool, http });

  const result = await fetcher.fetch(LINK, 'Gone.unitypackage', 1024);

  expect(result.ok).toBe(false);
  expect(!result.ok && result.error.kind).toBe('not-found');
  expect(!result.ok && result.error.message).toBe(`File not found (404): ${LINK}`);
  expect(await readdir(cacheDir)).toEqual([]);
});

it('reports other HTTP failures as transport errors', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-500-');
  const { http } = createHttp(() => ({ status: 500, body: 'boom' }));
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool: unusedTool().tool, http });

  const result = await fetcher.fetch(LINK, 'Broken.unitypackage', 1024);

  expect(!result.ok && result.error.kind).toBe('transport');
  expect(!result.ok && result.error.message).toBe('HTTP Error 500: Internal Server Error');
});

it('fails without a request when the link has no file id', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-badlink-');
  const { http, requests } = createHttp(() => ({ status: 200, body: 'unused' }));
  const { tool, calls } = unusedTool();
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool, http });

  const result = await fetcher.fetchPreferred('https://drive.google.com/drive/folders', 'X.unitypackage', 1024);

  expect(!result.ok && result.error.kind).toBe('link-extraction');
  expect(requests).toEqual([]);
  expect(calls).toEqual([]);
});

it('downloads through curl when it is installed', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-curl-');
  const { http, requests } = createHttp(() => ({ status: 200, body: 'unused' }));
  const { tool, calls } = createFakeTool(async ({ args }) => {
    const output = args[args.indexOf('-o') + 1];
    if (output) {
      await writeFile(output, 'c'.repeat(300));
    }
    return ok();
  });
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool, http, platform: 'linux' });

  const result = await fetcher.fetchViaExternalTool(LINK, 'Curl.unitypackage', 2048);

  expect(result).toEqual({
    ok: true,
    artifact: {
      packageName: 'Curl',
      localPath: path.join(cacheDir, 'Curl.unitypackage'),
      sizeBytes: 300,
      sourceMethod: 'primary',
    },
  });
  expect(calls[0]?.command).toBe('curl');
  expect(calls[0]?.args).toContain('--max-filesize');
  expect(calls[0]?.args).toContain('2048');
  expect(calls[0]?.args.at(-1)).toBe(DIRECT_URL);
  expect(requests).toEqual([]);
  expect(await readdir(cacheDir)).toEqual(['Curl.unitypackage']);
});

it('falls back to the direct fetch when curl is not installed', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-nocurl-');
  const { http, requests } = createHttp(() => ({ status: 200, body: 'n'.repeat(128) }));
  const { tool } = createFakeTool(({ command }) => {
    throw new MissingToolError(command);
  });
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool, http });

  const result = await fetcher.fetchViaExternalTool(LINK, 'NoCurl.unitypackage', 1024);

  expect(result.ok && result.artifact.sourceMethod).toBe('fallback');
  expect(requests).toEqual([DIRECT_URL]);
});

it('retries with the direct fetch after a failed curl run', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-retry-');
  const { http, requests } = createHttp(() => ({ status: 200, body: 'r'.repeat(150) }));
  const { tool, calls } = createFakeTool(() =>
    failed('curl: (22) The requested URL returned error: 403', 22),
  );
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool, http });

  const result = await fetcher.fetchPreferred(LINK, 'Retry.unitypackage', 1024);

  expect(calls).toHaveLength(1);
  expect(requests).toEqual([DIRECT_URL]);
  expect(result.ok && result.artifact.sourceMethod).toBe('fallback');
  expect(await readdir(cacheDir)).toEqual(['Retry.unitypackage']);
});

it('does not retry when curl reports an oversized payload', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-curl-cap-');
  const { http, requests } = createHttp(() => ({ status: 200, body: 'unused' }));
  const { tool } = createFakeTool(async ({ args }) => {
    const output = args[args.indexOf('-o') + 1];
    if (output) {
      await writeFile(output, 'z'.repeat(64));
    }
    return ok();
  });
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool, http });

  const result = await fetcher.fetchPreferred(LINK, 'Huge.unitypackage', 32);

  expect(!result.ok && result.error.kind).toBe('size-limit-exceeded');
  expect(requests).toEqual([]);
  expect(await readdir(cacheDir)).toEqual([]);
});

it('stops without a direct fetch when curl itself hits the size limit', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-curl-limit-');
  const { http, requests } = createHttp(() => ({ status: 200, body: 'unused' }));
  const { tool, calls } = createFakeTool(() => failed('curl: (63) Maximum file size exceeded', 63));
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool, http });

  const result = await fetcher.fetchPreferred(LINK, 'Capped.unitypackage', 100);

  expect(calls).toHaveLength(1);
  expect(requests).toEqual([]);
  expect(!result.ok && result.error.kind).toBe('size-limit-exceeded');
  expect(!result.ok && result.error.message).toBe('File too large: exceeds the 100 byte limit');
  expect(await readdir(cacheDir)).toEqual([]);
});

const WARNING_PAGE =
  '<html><title>Virus scan warning</title><form action="/uc?export=download&confirm=tok_9&id=fileAbc123"></form></html>';

it('confirms the warning page curl saved and keeps the real payload', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-curl-confirm-');
  const { http, requests } = createHttp(() => ({ status: 200, body: 'unused' }));
  const { tool, calls } = createFakeTool(async ({ args }) => {
    const output = args[args.indexOf('-o') + 1];
    const url = args.at(-1) ?? '';
    if (output) {
      await writeFile(output, url.includes('confirm=') ? 'REAL'.repeat(64) : WARNING_PAGE);
    }
    return ok();
  });
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool, http });

  const result = await fetcher.fetchPreferred(LINK, 'Guarded.unitypackage', 1024);

  expect(calls.map((call) => call.args.at(-1))).toEqual([DIRECT_URL, `${DIRECT_URL}&confirm=tok_9`]);
  expect(requests).toEqual([]);
  expect(result).toEqual({
    ok: true,
    artifact: {
      packageName: 'Guarded',
      localPath: path.join(cacheDir, 'Guarded.unitypackage'),
      sizeBytes: 256,
      sourceMethod: 'primary',
    },
  });
  expect(await readFile(path.join(cacheDir, 'Guarded.unitypackage'), 'utf8')).toBe('REAL'.repeat(64));
});

it('falls back to the direct fetch when curl keeps getting the warning page', async () => {
  const cacheDir = await createTempDir('package-sync-fetch-curl-stuck-');
  const { http, requests } = createHttp((url) =>
    url.includes('confirm=') ? { status: 200, body: 'D'.repeat(300) } : { status: 200, body: WARNING_PAGE },
  );
  const { tool, calls } = createFakeTool(async ({ args }) => {
    const output = args[args.indexOf('-o') + 1];
    if (output) {
      await writeFile(output, WARNING_PAGE);
    }
    return ok();
  });
  const fetcher = createRemoteFetcher({ cacheDir, logger: silentLogger(), tool, http });

  const result = await fetcher.fetchPreferred(LINK, 'Stuck.unitypackage', 1024);

  expect(calls).toHaveLength(2);
  expect(requests).toEqual([DIRECT_URL, `${DIRECT_URL}&confirm=tok_9`]);
  expect(result.ok && result.artifact.sourceMethod).toBe('fallback');
  expect(result.ok && result.artifact.sizeBytes).toBe(300);
  expect(await readdir(cacheDir)).toEqual(['Stuck.unitypackage']);
});
