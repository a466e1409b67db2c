/**
 * Dotted release version helpers
 */

const DOTTED_VERSION_PATTERN = /^\d+(\.\d+)+$/;

/**
 * Check for a dotted numeric version such as "24.04" or "24.04.3"
 */
export function isDottedVersion(version: string): boolean {
    return DOTTED_VERSION_PATTERN.test(version);
}

/**
 * Numeric comparison of dotted versions; missing components count as 0
 */
export function compareVersions(a: string, b: string): number {
    const left = a.split('.').map(part => parseInt(part, 10) || 0);
    const right = b.split('.').map(part => parseInt(part, 10) || 0);
    const length = Math.max(left.length, right.length);

    for (let i = 0; i < length; i++) {
        const diff = (left[i] ?? 0) - (right[i] ?? 0);
        if (diff !== 0) {
            return diff;
        }
    }
    return a.localeCompare(b);
}

/**
 * Release series of a version: its first two components ("24.04.3" -> "24.04")
 */
export function seriesOf(version: string): string {
    return version.split('.').slice(0, 2).join('.');
}
