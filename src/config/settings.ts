/**
 * Spin definition and release table loading
 */

import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { ReleaseInfo, Settings, SpinDefinition } from '../types/settings';
import { SettingsError } from '../utils/error-utils';
import { Logger } from '../utils/logger';
import { isRecord, isStringArray } from '../utils/type-guards';

function requireString(value: unknown, field: string, source: string): string {
    if (typeof value !== 'string' || value.length === 0) {
        throw new SettingsError(`${field} must be a non-empty string`, source);
    }
    return value;
}

function toSpinDefinition(id: string, value: unknown, source: string): SpinDefinition {
    if (!isRecord(value)) {
        throw new SettingsError(`spins.${id} must be a mapping`, source);
    }

    const definition: SpinDefinition = {
        name: requireString(value['name'], `spins.${id}.name`, source),
        content_id: requireString(value['content_id'], `spins.${id}.content_id`, source),
        url_base: requireString(value['url_base'], `spins.${id}.url_base`, source),
        path_template: requireString(value['path_template'], `spins.${id}.path_template`, source),
    };

    if (value['image_type'] !== undefined) {
        definition.image_type = requireString(value['image_type'], `spins.${id}.image_type`, source);
    }
    if (value['architectures'] !== undefined) {
        const architectures = value['architectures'];
        if (!isStringArray(architectures) || architectures.length === 0) {
            throw new SettingsError(`spins.${id}.architectures must be a non-empty list of strings`, source);
        }
        definition.architectures = Object.freeze([...architectures]);
    }
    return Object.freeze(definition);
}

function toReleaseInfo(slug: string, value: unknown, source: string): ReleaseInfo {
    if (!isRecord(value)) {
        throw new SettingsError(`releases.${slug} must be a mapping`, source);
    }
    return Object.freeze({
        codename: requireString(value['codename'], `releases.${slug}.codename`, source),
        series: requireString(value['series'], `releases.${slug}.series`, source),
    });
}

/**
 * Validate raw settings data and return a frozen Settings object
 */
export function createSettings(raw: unknown, source = 'settings'): Settings {
    if (!isRecord(raw)) {
        throw new SettingsError('expected a mapping with "spins" and "releases"', source);
    }

    const rawSpins = raw['spins'];
    const rawReleases = raw['releases'];
    if (!isRecord(rawSpins)) {
        throw new SettingsError('"spins" must be a mapping', source);
    }
    if (!isRecord(rawReleases)) {
        throw new SettingsError('"releases" must be a mapping', source);
    }

    const spins: Record<string, SpinDefinition> = {};
    for (const [id, value] of Object.entries(rawSpins)) {
        spins[id] = toSpinDefinition(id, value, source);
    }

    const releases: Record<string, ReleaseInfo> = {};
    for (const [slug, value] of Object.entries(rawReleases)) {
        releases[slug] = toReleaseInfo(slug, value, source);
    }

    return Object.freeze({
        spins: Object.freeze(spins),
        releases: Object.freeze(releases),
    });
}

/**
 * Load settings from a YAML file
 */
export function loadSettings(filePath: string, logger?: Logger): Settings {
    logger?.debug('Loading spin definitions', { file: filePath });

    const content = fs.readFileSync(filePath, 'utf-8');
    let raw: unknown;
    try {
        raw = parseYaml(content);
    } catch (error: unknown) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        throw new SettingsError(`invalid YAML: ${errorMessage}`, filePath);
    }

    const settings = createSettings(raw, filePath);
    logger?.debug('Loaded spin definitions', {
        spins: Object.keys(settings.spins).length,
        releases: Object.keys(settings.releases).length,
    });
    return settings;
}

/**
 * Find the release slug whose series matches, e.g. "24.04" -> "noble"
 */
export function findReleaseBySeries(settings: Settings, series: string): string | undefined {
    return Object.keys(settings.releases).find(slug => settings.releases[slug]?.series === series);
}
