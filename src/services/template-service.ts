/**
 * Version template generation
 * @fileoverview New descriptors start with every spin from the definition
 * table and unresolved checksums
 */

import { CATALOG_FORMAT, TEMPLATE_DEFAULTS } from '../config/constants';
import { findReleaseBySeries } from '../config/settings';
import { Spin, VersionDescriptor } from '../types/descriptor';
import { Settings } from '../types/settings';
import { isDottedVersion, seriesOf } from '../utils/version-utils';

/**
 * Build an unresolved descriptor for a version. Throws when the version is
 * not dotted or its series has no release entry.
 */
export function createVersionTemplate(version: string, settings: Settings): VersionDescriptor {
    if (!isDottedVersion(version)) {
        throw new Error(`Invalid version "${version}": expected a dotted version such as 24.04.3`);
    }

    const series = seriesOf(version);
    const releaseSlug = findReleaseBySeries(settings, series);
    const release = releaseSlug ? settings.releases[releaseSlug] : undefined;
    if (!releaseSlug || !release) {
        throw new Error(`No release is configured for series ${series}`);
    }

    const descriptor: VersionDescriptor = { version, spin_groups: {} };
    for (const [spinId, definition] of Object.entries(settings.spins)) {
        const spin: Spin = {
            name: spinId,
            image_type: definition.image_type ?? TEMPLATE_DEFAULTS.IMAGE_TYPE,
            version,
            release: releaseSlug,
            release_codename: release.codename,
            release_title: version,
            architectures: [...(definition.architectures ?? TEMPLATE_DEFAULTS.ARCHITECTURES)],
            files: {
                [CATALOG_FORMAT.FILE_ROLE]: {
                    path_template: definition.path_template,
                    sha256: '',
                    size: 0,
                },
            },
        };

        descriptor.spin_groups[spinId] = {
            name: definition.name,
            content_id: definition.content_id,
            spins: [spin],
        };
    }

    return descriptor;
}
