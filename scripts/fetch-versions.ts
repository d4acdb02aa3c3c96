/**
 * Resolves upstream versions: the newest release of a major line from a
 * dist directory listing, and the latest Yarn release
 */

import axios from 'axios';

export const YARN_LATEST_VERSION_URL = 'https://yarnpkg.com/latest-version';

export type FetchText = (url: string) => Promise<string>;

export async function fetchText(url: string): Promise<string> {
  const response = await axios.get<string>(url, {
    responseType: 'text',
    decompress: true,
  });
  return response.data;
}

/**
 * Parse version string to comparable array
 */
function parseVersion(version: string): number[] {
  return version.split('.').map((n) => parseInt(n, 10));
}

/**
 * Compare two version strings
 * Returns: -1 if a < b, 0 if a === b, 1 if a > b
 */
export function compareVersions(a: string, b: string): number {
  const aParts = parseVersion(a);
  const bParts = parseVersion(b);

  for (let i = 0; i < Math.max(aParts.length, bParts.length); i++) {
    const aVal = aParts[i] ?? 0;
    const bVal = bParts[i] ?? 0;

    if (aVal < bVal) return -1;
    if (aVal > bVal) return 1;
  }

  return 0;
}

/**
 * Link targets of every anchor in an HTML directory listing
 */
export function parseListing(html: string): string[] {
  const hrefs: string[] = [];
  const anchor = /<a\s[^>]*?href\s*=\s*"([^"]*)"/gi;

  let match: RegExpExecArray | null;
  while ((match = anchor.exec(html)) !== null) {
    const href = match[1];
    if (href !== undefined) {
      hrefs.push(href);
    }
  }

  return hrefs;
}

/**
 * Newest `major.minor.patch` listed for `major`, or undefined when the
 * listing has none
 */
export function latestFromListing(html: string, major: string): string | undefined {
  const prefix = `v${major}.`;

  const candidates = parseListing(html)
    .filter((href) => href.startsWith(prefix))
    .map((href) => href.slice(1).replace(/\/$/, ''))
    .filter((version) => /^\d+\.\d+\.\d+$/.test(version))
    // minor.patch
    .map((version) => version.split('.').slice(1).join('.'));

  if (candidates.length === 0) {
    return undefined;
  }

  candidates.sort(compareVersions);
  return `${major}.${candidates[candidates.length - 1]}`;
}

export async function resolveFullVersion(
  baseUri: string,
  major: string,
  get: FetchText = fetchText
): Promise<string | undefined> {
  const html = await get(baseUri);
  return latestFromListing(html, major);
}

export async function fetchYarnVersion(get: FetchText = fetchText): Promise<string> {
  const version = (await get(YARN_LATEST_VERSION_URL)).trim();
  if (!version) {
    throw new Error(`Empty response from ${YARN_LATEST_VERSION_URL}`);
  }
  return version;
}
