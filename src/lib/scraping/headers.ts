/**
 * Identity Header Rotation
 * Each request goes out under one of a fixed set of browser identities
 */

export interface BrowserFingerprint {
  userAgent: string;
  acceptLanguage: string;
  accept: string;
  secChUa?: string;
  secChUaPlatform?: string;
}

export const BROWSER_FINGERPRINTS: readonly BrowserFingerprint[] = [
  // Chrome on Windows
  {
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    acceptLanguage: 'uk-UA,uk;q=0.9,en-US;q=0.8,en;q=0.7',
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    secChUa: '"Not_A Brand";v="8", "Chromium";v="120", "Google Chrome";v="120"',
    secChUaPlatform: '"Windows"',
  },
  // Firefox on Windows
  {
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
    acceptLanguage: 'uk-UA,uk;q=0.8,en-US;q=0.5,en;q=0.3',
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
  },
  // Safari on Mac
  {
    userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15',
    acceptLanguage: 'uk-UA,uk;q=0.9',
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  },
];

/**
 * Pick a fingerprint; `random` must return a value in [0, 1)
 */
export function getRandomFingerprint(random: () => number = Math.random): BrowserFingerprint {
  const index = Math.min(
    BROWSER_FINGERPRINTS.length - 1,
    Math.floor(random() * BROWSER_FINGERPRINTS.length)
  );
  return BROWSER_FINGERPRINTS[index];
}

export function buildHeaders(fingerprint: BrowserFingerprint): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': fingerprint.userAgent,
    'Accept-Language': fingerprint.acceptLanguage,
    'Accept': fingerprint.accept,
  };

  // Chromium-only client hints
  if (fingerprint.secChUa) headers['Sec-Ch-Ua'] = fingerprint.secChUa;
  if (fingerprint.secChUaPlatform) headers['Sec-Ch-Ua-Platform'] = fingerprint.secChUaPlatform;

  return headers;
}

export function getRandomHeaders(random: () => number = Math.random): Record<string, string> {
  return buildHeaders(getRandomFingerprint(random));
}
