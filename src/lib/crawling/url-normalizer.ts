/**
 * URL Normalization Utilities
 * Candidate URLs are the identity of a car across runs, so they are only
 * touched where a browser would treat two spellings as the same page.
 */

/**
 * Drop the fragment; everything else is left as the site wrote it
 */
export function normalizeUrl(url: string, baseUrl?: string): string {
  const absolute = baseUrl ? resolveUrl(url, baseUrl) : url;
  const hashIndex = absolute.indexOf('#');
  return hashIndex === -1 ? absolute : absolute.slice(0, hashIndex);
}

/**
 * Resolve relative URL to absolute
 */
export function resolveUrl(url: string, baseUrl: string): string {
  if (url.startsWith('http://') || url.startsWith('https://')) {
    return url;
  }
  try {
    return new URL(url, baseUrl).href;
  } catch {
    return url;
  }
}

/**
 * Listing page URL for a 1-based page number
 */
export function listingPageUrl(startUrl: string, page: number): string {
  const url = new URL(startUrl);
  url.searchParams.set('page', String(page));
  return url.href;
}
