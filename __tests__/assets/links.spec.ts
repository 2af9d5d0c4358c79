import { expect, it } from 'vitest';

import {
  buildDirectDownloadUrl,
  buildShareLink,
  extractFileId,
  findFirstRemoteLink,
} from '@/assets/links';

it('extracts file ids from every supported link shape', () => {
  expect(extractFileId('https://drive.google.com/file/d/1AbC_d-9/view?usp=sharing')).toBe('1AbC_d-9');
  expect(extractFileId('https://drive.google.com/uc?export=download&id=XyZ_123')).toBe('XyZ_123');
  expect(extractFileId('https://drive.google.com/open?id=open-id_42')).toBe('open-id_42');
});

it('prefers the path segment over a query id', () => {
  expect(extractFileId('https://drive.google.com/file/d/pathId/view?id=queryId')).toBe('pathId');
});

it('returns null for links without a file id', () => {
  expect(extractFileId('https://example.com/downloads/package.zip')).toBeNull();
  expect(extractFileId('')).toBeNull();
});

it('builds direct download and share links from an id', () => {
  expect(buildDirectDownloadUrl('abc')).toBe('https://drive.google.com/uc?export=download&id=abc');
  expect(buildShareLink('abc')).toBe('https://drive.google.com/file/d/abc/view?usp=sharing');
});

it('finds only the first remote link in pointer text', () => {
  const content = [
    'Download the necessary file(s) from the following link:',
    '',
    'https://drive.google.com/file/d/first/view?usp=sharing',
    'Mirror: https://drive.google.com/file/d/second/view',
  ].join('\n');

  expect(findFirstRemoteLink(content)).toBe('https://drive.google.com/file/d/first/view?usp=sharing');
  expect(findFirstRemoteLink('No link yet, run sync first.')).toBeNull();
});
