/**
 * Unit tests for the catalog validator
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    validateCatalogDirectory,
    validateCatalogDocument,
    validateCatalogFile,
} from '../../../src/services/catalog-validator';
import { ConsoleLogger, LogLevel } from '../../../src/utils/logger';
import { createTempDir, KUBUNTU_SHA256, removeTempDir } from '../../helpers/fixtures';

const KEY = 'test.catalog:kubuntu:kubuntu:desktop:24.04.3:amd64';

function createProductFields(): Record<string, string> {
    return {
        aliases: '24.04.3,noble',
        arch: 'amd64',
        image_type: 'desktop',
        os: 'kubuntu',
        release: 'noble',
        release_codename: 'Noble Numbat',
        release_title: '24.04.3',
        version: '24.04.3',
    };
}

function createDocument(items: Record<string, unknown>): Record<string, unknown> {
    return {
        datatype: 'image-downloads',
        format: 'products:1.0',
        content_id: 'test.catalog:kubuntu',
        products: {
            [KEY]: { ...createProductFields(), versions: { '24.04.3': { items } } },
        },
    };
}

function createValidDocument(): Record<string, unknown> {
    return createDocument({
        iso: {
            ftype: 'iso',
            path: 'noble/release/kubuntu-24.04.3-desktop-amd64.iso',
            sha256: KUBUNTU_SHA256,
            size: 4329504768,
        },
    });
}

describe('Catalog Validator', () => {
    describe('validateCatalogDocument', () => {
        test('should accept a well-formed document', () => {
            expect(validateCatalogDocument(createValidDocument())).toEqual({ errors: [], warnings: [], products: 1 });
        });

        test('should report missing header fields and a wrong format', () => {
            const result = validateCatalogDocument({ format: 'products:2.0', products: {} });

            expect(result.errors).toEqual([
                'Missing top-level field: datatype',
                'Missing top-level field: content_id',
                "Invalid format: products:2.0, expected 'products:1.0'",
                "Invalid datatype: undefined, expected 'image-downloads'",
            ]);
            expect(result.warnings).toEqual(['No products defined']);
        });

        test('should reject non-object products', () => {
            const document = createValidDocument();
            document['products'] = [];

            expect(validateCatalogDocument(document).errors).toEqual(['products must be an object']);
        });

        test('should report missing product fields and versions', () => {
            const document = createValidDocument();
            document['products'] = { [KEY]: { arch: 'amd64', versions: {} } };

            expect(validateCatalogDocument(document).errors).toEqual([
                `Product ${KEY} missing fields: aliases, image_type, os, release, release_codename, release_title, version`,
                `Product ${KEY} has no versions`,
            ]);
        });

        test('should check item fields and types', () => {
            const result = validateCatalogDocument(createDocument({ iso: { ftype: 'squashfs', path: 'a.iso', size: '12' } }));

            expect(result.errors).toEqual([
                `Product ${KEY} version 24.04.3 iso missing: sha256`,
                `Product ${KEY} version 24.04.3 size must be a number`,
                `Product ${KEY} version 24.04.3 ftype should be 'iso', got 'squashfs'`,
            ]);
        });

        test('should warn about unresolved checksums and sizes', () => {
            const result = validateCatalogDocument(createDocument({ iso: { ftype: 'iso', path: 'a.iso', sha256: '', size: 0 } }));

            expect(result.errors).toEqual([]);
            expect(result.warnings).toEqual([
                `Product ${KEY} version 24.04.3 has empty SHA256`,
                `Product ${KEY} version 24.04.3 has zero size`,
            ]);
        });

        test('should report a version without an iso item', () => {
            const document = createDocument({ squashfs: {} });

            expect(validateCatalogDocument(document).errors)
                .toEqual([`Product ${KEY} version 24.04.3 missing 'iso' in items`]);
        });
    });

    describe('files and directories', () => {
        let tempDir: string;
        const logger = new ConsoleLogger(LogLevel.ERROR);

        beforeEach(() => {
            tempDir = createTempDir('catalog-validator-test-');
        });

        afterEach(() => {
            removeTempDir(tempDir);
        });

        test('should report invalid JSON', async () => {
            const filePath = path.join(tempDir, 'broken.json');
            fs.writeFileSync(filePath, '{ "datatype": ');

            const result = await validateCatalogFile(filePath);

            expect(result.file).toBe(filePath);
            expect(result.errors).toHaveLength(1);
            expect(result.errors[0]).toMatch(/^Invalid JSON: /);
        });

        test('should validate every JSON file in a directory', async () => {
            fs.writeFileSync(path.join(tempDir, 'kubuntu.json'), JSON.stringify(createValidDocument()));
            fs.writeFileSync(path.join(tempDir, 'xubuntu.json'), JSON.stringify({ products: {} }));
            fs.writeFileSync(path.join(tempDir, 'README.txt'), 'ignored');

            const result = await validateCatalogDirectory(tempDir, logger);

            expect(result.files.map(file => path.basename(file.file))).toEqual(['kubuntu.json', 'xubuntu.json']);
            expect(result.files[0]?.errors).toEqual([]);
            expect(result.files[1]?.errors.length).toBeGreaterThan(0);
            expect(result.valid).toBe(false);
        });

        test('should fail an empty directory', async () => {
            expect(await validateCatalogDirectory(tempDir, logger)).toEqual({
                files: [],
                errors: [`No JSON files found in ${tempDir}`],
                valid: false,
            });
        });
    });
});
