/**
 * DDM Status Kernel — Dotted Version Comparison
 *
 * Versions are dotted strings such as `26.3` or `15.7.1`. A segment counts
 * only if it is made entirely of decimal digits; anything else (`0beta`,
 * `b1`, an empty segment) is dropped from the sequence. Dropping shifts the
 * remaining segments left, so `13.beta.2` compares as `13.2`.
 *
 * Missing trailing positions compare as 0: `13.2` equals `13.2.0`.
 */

export type VersionOrdering = -1 | 0 | 1;

const DIGITS = /^\d+$/;

/**
 * Split a dotted version string into its numeric segments.
 *
 * Never throws. An empty or placeholder string (`''`, `'–'`) yields `[]`.
 */
export function parseVersion(text: string): number[] {
  const parts: number[] = [];
  for (const segment of text.split('.')) {
    if (!DIGITS.test(segment)) continue;
    const value = Number(segment);
    if (Number.isSafeInteger(value)) {
      parts.push(value);
    }
  }
  return parts;
}

/**
 * Compare two parsed version sequences position by position.
 */
export function compareVersionParts(
  a: ReadonlyArray<number>,
  b: ReadonlyArray<number>,
): VersionOrdering {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? 0;
    const right = b[i] ?? 0;
    if (left < right) return -1;
    if (left > right) return 1;
  }
  return 0;
}

/**
 * Compare two dotted version strings.
 *
 * @returns -1 if `a < b`, 1 if `a > b`, 0 if equal at every position
 *
 * @example
 * compareVersions('13.2', '13.2.1');   // -1
 * compareVersions('14.0', '13.9.9');   // 1
 */
export function compareVersions(a: string, b: string): VersionOrdering {
  return compareVersionParts(parseVersion(a), parseVersion(b));
}
