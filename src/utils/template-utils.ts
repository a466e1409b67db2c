/**
 * Path template helpers
 * @fileoverview Renders {{placeholder}} templates and builds upstream URLs
 */

/**
 * Values substituted into path templates
 */
export interface TemplateVariables {
    release: string;
    name: string;
    version: string;
    image_type: string;
    arch: string;
}

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/**
 * Substitute known placeholders; unknown ones are left untouched.
 * Accepts both `{{release}}` and `{{ release }}`.
 */
export function renderTemplate(template: string, variables: Partial<TemplateVariables>): string {
    return template.replace(PLACEHOLDER_PATTERN, (match, key: string) => {
        const value = lookupVariable(variables, key);
        return value === undefined ? match : value;
    });
}

/**
 * Names of placeholders in a template that the variables do not cover
 */
export function findUnresolvedPlaceholders(template: string, variables: Partial<TemplateVariables>): string[] {
    const missing: string[] = [];
    for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
        const key = match[1];
        if (key !== undefined && lookupVariable(variables, key) === undefined && !missing.includes(key)) {
            missing.push(key);
        }
    }
    return missing;
}

function lookupVariable(variables: Partial<TemplateVariables>, key: string): string | undefined {
    switch (key) {
        case 'release':
        case 'name':
        case 'version':
        case 'image_type':
        case 'arch':
            return variables[key];
        default:
            return undefined;
    }
}

/**
 * Last path segment of a relative path or URL
 */
export function fileNameOf(path: string): string {
    const segments = path.split('/').filter(segment => segment.length > 0);
    return segments[segments.length - 1] ?? '';
}

/**
 * Everything before the last path segment, without a trailing slash
 */
export function directoryOf(path: string): string {
    const index = path.lastIndexOf('/');
    return index <= 0 ? '' : path.slice(0, index);
}

/**
 * Join a base URL and relative path segments with single slashes
 */
export function joinUrl(base: string, ...segments: string[]): string {
    const parts = [base.replace(/\/+$/, '')];
    for (const segment of segments) {
        const trimmed = segment.replace(/^\/+|\/+$/g, '');
        if (trimmed) {
            parts.push(trimmed);
        }
    }
    return parts.join('/');
}
