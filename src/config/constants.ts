/**
 * Application constants and environment-driven defaults for spin-catalog
 */

// Store and output locations
export const VERSIONS_DIR = process.env['VERSIONS_DIR'] || 'config/versions';
export const SPINS_CONFIG = process.env['SPINS_CONFIG'] || 'config/spins.yaml';
export const OUTPUT_DIR = process.env['OUTPUT_DIR'] || 'output';

// Logging configuration
export const LOG_LEVEL = process.env['LOG_LEVEL'] || 'info';

export const SERVICE_NAME = 'spin-catalog';
export const SERVICE_VERSION = '1.0.0';

export const UPSTREAM = {
    MANIFEST_FILE: 'SHA256SUMS',
    USER_AGENT: process.env['USER_AGENT'] || `${SERVICE_NAME}/${SERVICE_VERSION}`,
    HTTP_TIMEOUT_MS: parseInt(process.env['HTTP_TIMEOUT_MS'] || '10000', 10), // 10 seconds
    MAX_REDIRECTS: 5,
} as const;

export const CATALOG_FORMAT = {
    DATATYPE: 'image-downloads',
    FORMAT: 'products:1.0',
    FILE_ROLE: 'iso',
    FTYPE: 'iso',
    FILE_EXTENSION: '.json',
} as const;

export const TEMPLATE_DEFAULTS = {
    IMAGE_TYPE: 'desktop',
    ARCHITECTURES: ['amd64'],
} as const;

export const VERSION_FILE_EXTENSIONS = ['.yaml', '.yml'] as const;

export const EXIT_CODES = {
    SUCCESS: 0,
    FAILURE: 1,
    PARTIAL: 2,
} as const;
