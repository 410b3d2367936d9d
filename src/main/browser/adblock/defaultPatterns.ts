/**
 * Built-in rule set, used when no patterns have been saved.
 */
export const DEFAULT_FILTER_PATTERNS: readonly string[] = Object.freeze([
  'doubleclick.net',
  'googlesyndication',
  'adservice.google.',
  'pagead2.googlesyndication.com',
  '/ads?',
  '/adserver',
  '.ads.',
  'ads.',
  'advert',
  'adclick',
  'tracking',
  'analytics.js',
  'googletagservices',
  'adsystem',
]);
