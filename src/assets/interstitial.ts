/**
 * Large files are served behind a "can't scan for viruses" page instead of the
 * payload. The page is plain HTML, so detection is content sniffing and is
 * kept behind this interface to be swapped when the host changes its markup.
 */
export interface InterstitialDetector {
  /** Returns the confirmation token when `body` is the warning page, else `null`. */
  detect(body: Buffer): string | null;
}

// Warning pages are a few kilobytes; anything past this is payload.
export const SNIFF_LIMIT_BYTES = 1024 * 1024;

const WARNING_MARKERS = ['confirm=', 'virus scan warning'];

const TOKEN_PATTERNS: readonly RegExp[] = [
  /confirm=([a-zA-Z0-9_-]+)/,
  /name="confirm"\s+value="([a-zA-Z0-9_-]+)"/,
];

export const createPatternDetector = (
  markers: readonly string[] = WARNING_MARKERS,
  tokenPatterns: readonly RegExp[] = TOKEN_PATTERNS,
): InterstitialDetector => ({
  detect(body) {
    const head = body.subarray(0, SNIFF_LIMIT_BYTES).toString('latin1');
    const lowered = head.toLowerCase();
    if (!markers.some((marker) => lowered.includes(marker))) {
      return null;
    }

    for (const pattern of tokenPatterns) {
      const token = head.match(pattern)?.[1];
      if (token) {
        return token;
      }
    }
    return null;
  },
});

export const defaultInterstitialDetector = createPatternDetector();
