/**
 * Address bar input handling.
 */

export interface NormalizeUrlOptions {
  homeUrl: string;
  searchUrl: string;
}

/**
 * Turn address bar text into a URL to load.
 *
 * - blank input opens the home page
 * - a bare host such as `example.com/path` gets `https://`
 * - anything else without a scheme that has spaces or no dot is a search
 * - text with a scheme is used as is
 */
export function normalizeUrl(input: string, options: NormalizeUrlOptions): string {
  const text = input.trim();
  if (!text) {
    return options.homeUrl;
  }

  const hasScheme = text.includes('://');
  const hasSpace = text.includes(' ');
  const hasDot = text.includes('.');

  if (!hasSpace && hasDot && !hasScheme) {
    return `https://${text}`;
  }
  if (!hasScheme && (hasSpace || !hasDot)) {
    return `${options.searchUrl}${encodeQueryText(text)}`;
  }
  return text;
}

/**
 * Percent-encode everything except `A-Za-z0-9-._~`. encodeURIComponent
 * leaves `!'()*` alone.
 */
export function encodeQueryText(text: string): string {
  return encodeURIComponent(text).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

export function isSecureUrl(url: string): boolean {
  try {
    const protocol = new URL(url).protocol;
    return protocol === 'https:' || protocol === 'chrome:';
  } catch {
    return false;
  }
}
