const FILE_ID_PATTERNS: readonly RegExp[] = [
  /\/file\/d\/([a-zA-Z0-9_-]+)/,
  /id=([a-zA-Z0-9_-]+)/,
  /\/open\?id=([a-zA-Z0-9_-]+)/,
];

const REMOTE_LINK = /https:\/\/drive\.google\.com\/\S+/;

export const extractFileId = (url: string): string | null => {
  for (const pattern of FILE_ID_PATTERNS) {
    const match = url.match(pattern);
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
};

export const buildDirectDownloadUrl = (fileId: string): string =>
  `https://drive.google.com/uc?export=download&id=${fileId}`;

export const buildShareLink = (fileId: string): string =>
  `https://drive.google.com/file/d/${fileId}/view?usp=sharing`;

// Only the first link counts when a pointer file carries several.
export const findFirstRemoteLink = (content: string): string | null =>
  content.match(REMOTE_LINK)?.[0] ?? null;
