/**
 * Plugin Version Gate
 *
 * Version parsing and comparison for selecting between the output schemas of
 * different plugin releases. Pure functions; no lookups.
 *
 * @module translators/version-gate
 */

/**
 * Output field set of the notifier publisher
 */
export type PublisherSchema = 'current' | 'legacy';

/**
 * Parsed version
 */
export interface ParsedVersion {
  /** Numeric release components, e.g. [0, 1, 8] */
  release: number[];
  /** Pre-release tag (e.g. 'SNAPSHOT', 'beta1'); null for a final release */
  prerelease: string | null;
}

const VERSION_PATTERN = /^v?(\d+(?:\.\d+)*)(.*)$/i;

/**
 * Parse a version string.
 *
 * Text that does not start with a number parses as release 0.
 * Build metadata after `+` is ignored.
 */
export function parseVersion(text: string): ParsedVersion {
  const match = text.trim().match(VERSION_PATTERN);
  if (!match) {
    return { release: [0], prerelease: null };
  }

  const [, numbers = '0', rest = ''] = match;
  const release = numbers.split('.').map(Number);
  const suffix = rest.split('+')[0]?.replace(/^[-._]/, '') ?? '';

  return {
    release,
    prerelease: suffix === '' ? null : suffix,
  };
}

/**
 * Compare two versions.
 *
 * Release components are compared numerically with missing components
 * taken as zero; a pre-release sorts below its final release.
 *
 * @returns negative if a < b, zero if equal, positive if a > b
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);
  const length = Math.max(left.release.length, right.release.length);

  for (let i = 0; i < length; i++) {
    const diff = (left.release[i] ?? 0) - (right.release[i] ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }

  if (left.prerelease === right.prerelease) return 0;
  if (left.prerelease === null) return 1;
  if (right.prerelease === null) return -1;
  return comparePrerelease(left.prerelease, right.prerelease);
}

/**
 * Compare pre-release tags run by run: digit runs numerically, the rest as
 * text, so `beta2` sorts below `beta10`.
 */
function comparePrerelease(a: string, b: string): number {
  const left = a.split(/(\d+)/).filter((part) => part !== '');
  const right = b.split(/(\d+)/).filter((part) => part !== '');
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const l = left[i] ?? '';
    const r = right[i] ?? '';
    if (l === r) continue;

    const numeric = /^\d+$/;
    if (numeric.test(l) && numeric.test(r)) {
      return Number(l) < Number(r) ? -1 : 1;
    }
    return l < r ? -1 : 1;
  }

  return Math.sign(left.length - right.length);
}

/**
 * Pick the publisher field set for a reported plugin version
 */
export function selectPublisherSchema(reported: string, baseline: string): PublisherSchema {
  return compareVersions(reported, baseline) >= 0 ? 'current' : 'legacy';
}
