/**
 * SHA256SUMS manifest parsing
 */

import { manifestParseError, PipelineIssue } from './error-utils';

const SHA256_PATTERN = /^[0-9a-fA-F]{64}$/;

export interface ParsedManifest {
    /** Filename -> lower-case hex sha256 */
    entries: Map<string, string>;
    /** Lines that did not match `<sha256> <filename>` */
    issues: PipelineIssue[];
}

/**
 * Parse one manifest line into hash and filename, or null when it does not
 * match. Any run of whitespace separates the two fields; a leading `*`
 * (binary mode marker) on the filename is dropped.
 */
export function parseManifestLine(line: string): { sha256: string; fileName: string } | null {
    const match = /^(\S+)\s+(.+)$/.exec(line.trim());
    if (!match || match[1] === undefined || match[2] === undefined) {
        return null;
    }

    const sha256 = match[1];
    const fileName = match[2].trim().replace(/^\*/, '');
    if (!SHA256_PATTERN.test(sha256) || !fileName) {
        return null;
    }
    return { sha256: sha256.toLowerCase(), fileName };
}

/**
 * Parse a whole manifest. Blank lines and `#` comments are skipped; a later
 * line for the same filename replaces an earlier one.
 */
export function parseManifest(text: string, source: string): ParsedManifest {
    const entries = new Map<string, string>();
    const issues: PipelineIssue[] = [];

    text.split(/\r?\n/).forEach((raw, index) => {
        const line = raw.trim();
        if (!line || line.startsWith('#')) {
            return;
        }

        const parsed = parseManifestLine(line);
        if (!parsed) {
            issues.push(manifestParseError(source, index + 1, line));
            return;
        }
        entries.set(parsed.fileName, parsed.sha256);
    });

    return { entries, issues };
}
