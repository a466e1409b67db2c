/**
 * Catalog Validator
 * @fileoverview Checks generated documents against the products:1.0 schema the
 * boot-menu consumer expects
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CATALOG_FORMAT } from '../config/constants';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { isRecord } from '../utils/type-guards';

export const REQUIRED_TOP_LEVEL = ['datatype', 'format', 'content_id', 'products'] as const;
export const REQUIRED_PRODUCT = [
    'aliases', 'arch', 'image_type', 'os', 'release',
    'release_codename', 'release_title', 'version', 'versions',
] as const;
export const REQUIRED_ITEM = ['ftype', 'path', 'sha256', 'size'] as const;

export interface ValidationResult {
    errors: string[];
    warnings: string[];
    products: number;
}

export interface FileValidationResult extends ValidationResult {
    file: string;
}

export interface DirectoryValidationResult {
    files: FileValidationResult[];
    errors: string[];
    valid: boolean;
}

function missingFields(value: Record<string, unknown>, fields: readonly string[]): string[] {
    return fields.filter(field => !(field in value));
}

function validateItem(productId: string, version: string, item: unknown, result: ValidationResult): void {
    const role = CATALOG_FORMAT.FILE_ROLE;
    if (!isRecord(item)) {
        result.errors.push(`Product ${productId} version ${version} missing '${role}' in items`);
        return;
    }

    const missing = missingFields(item, REQUIRED_ITEM);
    if (missing.length > 0) {
        result.errors.push(`Product ${productId} version ${version} ${role} missing: ${missing.join(', ')}`);
    }
    if (item['sha256'] === '') {
        result.warnings.push(`Product ${productId} version ${version} has empty SHA256`);
    }
    if (item['size'] === 0) {
        result.warnings.push(`Product ${productId} version ${version} has zero size`);
    }
    if (item['size'] !== undefined && typeof item['size'] !== 'number') {
        result.errors.push(`Product ${productId} version ${version} size must be a number`);
    }
    if (item['ftype'] !== undefined && item['ftype'] !== CATALOG_FORMAT.FTYPE) {
        result.errors.push(
            `Product ${productId} version ${version} ftype should be '${CATALOG_FORMAT.FTYPE}', got '${String(item['ftype'])}'`
        );
    }
}

/**
 * Validate one parsed catalog document
 */
export function validateCatalogDocument(data: unknown): ValidationResult {
    const result: ValidationResult = { errors: [], warnings: [], products: 0 };

    if (!isRecord(data)) {
        result.errors.push('Document must be a JSON object');
        return result;
    }

    for (const field of missingFields(data, REQUIRED_TOP_LEVEL)) {
        result.errors.push(`Missing top-level field: ${field}`);
    }
    if (data['format'] !== CATALOG_FORMAT.FORMAT) {
        result.errors.push(`Invalid format: ${String(data['format'])}, expected '${CATALOG_FORMAT.FORMAT}'`);
    }
    if (data['datatype'] !== CATALOG_FORMAT.DATATYPE) {
        result.errors.push(`Invalid datatype: ${String(data['datatype'])}, expected '${CATALOG_FORMAT.DATATYPE}'`);
    }

    const products = data['products'];
    if (products === undefined) {
        return result;
    }
    if (!isRecord(products)) {
        result.errors.push('products must be an object');
        return result;
    }

    const entries = Object.entries(products);
    result.products = entries.length;
    if (entries.length === 0) {
        result.warnings.push('No products defined');
        return result;
    }

    for (const [productId, product] of entries) {
        if (!isRecord(product)) {
            result.errors.push(`Product ${productId} must be an object`);
            continue;
        }

        const missing = missingFields(product, REQUIRED_PRODUCT);
        if (missing.length > 0) {
            result.errors.push(`Product ${productId} missing fields: ${missing.join(', ')}`);
        }

        const versions = product['versions'];
        if (!isRecord(versions) || Object.keys(versions).length === 0) {
            result.errors.push(`Product ${productId} has no versions`);
            continue;
        }

        for (const [version, versionData] of Object.entries(versions)) {
            const items = isRecord(versionData) ? versionData['items'] : undefined;
            if (!isRecord(items)) {
                result.errors.push(`Product ${productId} version ${version} missing 'items'`);
                continue;
            }
            validateItem(productId, version, items[CATALOG_FORMAT.FILE_ROLE], result);
        }
    }

    return result;
}

/**
 * Validate a catalog file on disk
 */
export async function validateCatalogFile(filePath: string): Promise<FileValidationResult> {
    const content = await fs.readFile(filePath, 'utf8');
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (error: unknown) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        return { file: filePath, errors: [`Invalid JSON: ${errorMessage}`], warnings: [], products: 0 };
    }
    return { file: filePath, ...validateCatalogDocument(data) };
}

/**
 * Validate every .json file in a directory
 */
export async function validateCatalogDirectory(
    directory: string,
    logger: Logger = defaultLogger
): Promise<DirectoryValidationResult> {
    const names = (await fs.readdir(directory))
        .filter(name => name.endsWith(CATALOG_FORMAT.FILE_EXTENSION))
        .sort();

    if (names.length === 0) {
        return { files: [], errors: [`No JSON files found in ${directory}`], valid: false };
    }

    const files: FileValidationResult[] = [];
    for (const name of names) {
        const result = await validateCatalogFile(path.join(directory, name));
        logger.info('Validated catalog', {
            file: name,
            products: result.products,
            errors: result.errors.length,
            warnings: result.warnings.length,
        });
        for (const error of result.errors) {
            logger.error(error, { file: name });
        }
        for (const warning of result.warnings) {
            logger.warn(warning, { file: name });
        }
        files.push(result);
    }

    return { files, errors: [], valid: files.every(file => file.errors.length === 0) };
}
