/**
 * Unit tests for SHA256SUMS parsing
 */

import { IssueKind } from '../../../src/utils/error-utils';
import { parseManifest, parseManifestLine } from '../../../src/utils/manifest-utils';
import { KUBUNTU_SHA256 } from '../../helpers/fixtures';

const SOURCE = 'https://mirror.test/kubuntu/releases/noble/release/SHA256SUMS';

describe('Manifest Utilities', () => {
    describe('parseManifestLine', () => {
        test('should split hash and filename on two spaces', () => {
            expect(parseManifestLine(`${KUBUNTU_SHA256}  kubuntu-24.04.3-desktop-amd64.iso`)).toEqual({
                sha256: KUBUNTU_SHA256,
                fileName: 'kubuntu-24.04.3-desktop-amd64.iso',
            });
        });

        test('should tolerate a single space or a tab', () => {
            expect(parseManifestLine(`${KUBUNTU_SHA256} a.iso`)?.fileName).toBe('a.iso');
            expect(parseManifestLine(`${KUBUNTU_SHA256}\ta.iso`)?.fileName).toBe('a.iso');
        });

        test('should drop the binary-mode asterisk', () => {
            expect(parseManifestLine(`${KUBUNTU_SHA256} *kubuntu.iso`)?.fileName).toBe('kubuntu.iso');
        });

        test('should lower-case the hash', () => {
            expect(parseManifestLine(`${'AB'.repeat(32)}  x.iso`)?.sha256).toBe('ab'.repeat(32));
        });

        test('should reject lines without a valid hash or filename', () => {
            expect(parseManifestLine('not-a-hash  file.iso')).toBeNull();
            expect(parseManifestLine(KUBUNTU_SHA256)).toBeNull();
            expect(parseManifestLine(`${KUBUNTU_SHA256.slice(1)}  short.iso`)).toBeNull();
        });
    });

    describe('parseManifest', () => {
        test('should map filenames to hashes and skip blanks and comments', () => {
            const text = [
                '# generated',
                `${KUBUNTU_SHA256}  kubuntu-24.04.3-desktop-amd64.iso`,
                '',
                `${'c'.repeat(64)} *kubuntu-24.04.3-desktop-amd64.manifest`,
            ].join('\n');

            const result = parseManifest(text, SOURCE);

            expect(result.issues).toEqual([]);
            expect(result.entries.size).toBe(2);
            expect(result.entries.get('kubuntu-24.04.3-desktop-amd64.iso')).toBe(KUBUNTU_SHA256);
            expect(result.entries.get('kubuntu-24.04.3-desktop-amd64.manifest')).toBe('c'.repeat(64));
        });

        test('should handle CRLF line endings', () => {
            const result = parseManifest(`${KUBUNTU_SHA256}  a.iso\r\n${'d'.repeat(64)}  b.iso\r\n`, SOURCE);
            expect([...result.entries.keys()]).toEqual(['a.iso', 'b.iso']);
        });

        test('should report malformed lines and keep parsing', () => {
            const result = parseManifest(`garbage line\n${KUBUNTU_SHA256}  a.iso`, SOURCE);

            expect(result.entries.get('a.iso')).toBe(KUBUNTU_SHA256);
            expect(result.issues).toHaveLength(1);
            expect(result.issues[0]).toEqual({
                kind: IssueKind.MANIFEST_PARSE,
                title: 'Unrecognized manifest line 1',
                url: SOURCE,
                line: 1,
                detail: 'garbage line',
            });
        });
    });
});
