/**
 * Shared test data builders
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createSettings } from '../../src/config/settings';
import { Spin, VersionDescriptor } from '../../src/types/descriptor';
import { Settings } from '../../src/types/settings';

export const KUBUNTU_SHA256 = '8c69dd380e5a8969b77ca1708da59f0b9a50d0c151f0a65917180585697dd1e6';
export const XUBUNTU_SHA256 = 'a'.repeat(64);
export const LUBUNTU_SHA256 = 'b'.repeat(64);

export const PATH_TEMPLATE = '{{release}}/release/{{name}}-{{version}}-{{image_type}}-{{arch}}.iso';

export function createTestSettings(): Settings {
    return createSettings({
        spins: {
            kubuntu: {
                name: 'Kubuntu',
                content_id: 'test.catalog:kubuntu',
                url_base: 'https://mirror.test/kubuntu/releases/',
                path_template: PATH_TEMPLATE,
            },
            xubuntu: {
                name: 'Xubuntu',
                content_id: 'test.catalog:xubuntu',
                url_base: 'https://mirror.test/xubuntu/releases/',
                path_template: PATH_TEMPLATE,
            },
            lubuntu: {
                name: 'Lubuntu',
                content_id: 'test.catalog:lubuntu',
                url_base: 'https://mirror.test/lubuntu/releases/',
                path_template: PATH_TEMPLATE,
                architectures: ['amd64', 'arm64'],
            },
        },
        releases: {
            jammy: { codename: 'Jammy Jellyfish', series: '22.04' },
            noble: { codename: 'Noble Numbat', series: '24.04' },
        },
    });
}

export function createSpin(overrides: Partial<Spin> = {}, sha256 = '', size = 0): Spin {
    return {
        name: 'kubuntu',
        image_type: 'desktop',
        version: '24.04.3',
        release: 'noble',
        release_codename: 'Noble Numbat',
        release_title: '24.04.3',
        architectures: ['amd64'],
        files: {
            iso: { path_template: PATH_TEMPLATE, sha256, size },
        },
        ...overrides,
    };
}

export function createDescriptor(version: string, groups: Record<string, Spin[]>): VersionDescriptor {
    const descriptor: VersionDescriptor = { version, spin_groups: {} };
    for (const [groupId, spins] of Object.entries(groups)) {
        descriptor.spin_groups[groupId] = { content_id: `test.catalog:${groupId}`, spins };
    }
    return descriptor;
}

export const DESCRIPTOR_YAML = `# Ubuntu 24.04.3 test descriptor
version: 24.04.3
spin_groups:
  kubuntu:
    name: Kubuntu
    content_id: test.catalog:kubuntu
    spins:
      - name: kubuntu
        image_type: desktop
        version: 24.04.3
        release: noble
        release_codename: Noble Numbat
        release_title: 24.04.3
        architectures:
          - amd64
        files:
          iso:
            path_template: "${PATH_TEMPLATE}"
            sha256: "" # filled in by the resolver
            size: 0
  xubuntu:
    name: Xubuntu
    content_id: test.catalog:xubuntu
    spins:
      - name: xubuntu
        image_type: desktop
        version: 24.04.3
        release: noble
        release_codename: Noble Numbat
        release_title: 24.04.3
        architectures:
          - amd64
        files:
          iso:
            path_template: "${PATH_TEMPLATE}"
            sha256: ""
            size: 0
`;

export const createTempDir = (prefix: string): string => {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
};

export const removeTempDir = (dirPath: string): void => {
    fs.rmSync(dirPath, { recursive: true, force: true });
};
