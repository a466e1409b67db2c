/**
 * Version descriptor validation and helpers
 */

import { FileMetadata, Spin, SpinGroup, VersionDescriptor } from '../types/descriptor';
import { IssueContext, malformedDescriptor, PipelineIssue } from './error-utils';
import { TemplateVariables } from './template-utils';
import { isNonNegativeInteger, isRecord, isStringArray } from './type-guards';
import { isDottedVersion } from './version-utils';

const SHA256_PATTERN = /^[0-9a-fA-F]{64}$/;

const REQUIRED_SPIN_FIELDS = ['name', 'image_type', 'version', 'release', 'release_codename', 'release_title'] as const;

/**
 * A file record is complete when both its checksum and its size are known
 */
export function isComplete(file: FileMetadata | undefined): file is FileMetadata {
    return file !== undefined && file.sha256 !== '' && file.size > 0;
}

/**
 * Template variables for one spin/architecture pair
 */
export function templateVariables(spin: Spin, arch: string): TemplateVariables {
    return {
        release: spin.release,
        name: spin.name,
        version: spin.version,
        image_type: spin.image_type,
        arch,
    };
}

export interface DescriptorParseResult {
    /** Null when the descriptor as a whole is unusable */
    descriptor: VersionDescriptor | null;
    issues: PipelineIssue[];
    /**
     * Group id -> source position of each kept spin. Dropped spins shift
     * later ones, so in-memory indexes map back to document indexes here.
     */
    positions: Record<string, number[]>;
}

function parseFileMetadata(value: unknown, role: string): FileMetadata | string {
    if (!isRecord(value)) {
        return `files.${role} must be a mapping`;
    }

    const { path_template: pathTemplate, sha256, size, url } = value;
    if (typeof pathTemplate !== 'string' || pathTemplate.length === 0) {
        return `files.${role}.path_template must be a non-empty string`;
    }
    if (typeof sha256 !== 'string') {
        return `files.${role}.sha256 must be a string`;
    }
    if (sha256 !== '' && !SHA256_PATTERN.test(sha256)) {
        return `files.${role}.sha256 must be empty or 64 hex characters`;
    }
    if (!isNonNegativeInteger(size)) {
        return `files.${role}.size must be a non-negative integer`;
    }

    const file: FileMetadata = { path_template: pathTemplate, sha256, size };
    if (url !== undefined) {
        if (typeof url !== 'string') {
            return `files.${role}.url must be a string`;
        }
        file.url = url;
    }
    return file;
}

function parseSpin(value: unknown): Spin | string {
    if (!isRecord(value)) {
        return 'spin entry must be a mapping';
    }

    for (const field of REQUIRED_SPIN_FIELDS) {
        if (typeof value[field] !== 'string') {
            return `${field} must be a string`;
        }
    }

    const architectures = value['architectures'];
    if (!isStringArray(architectures)) {
        return 'architectures must be a list of strings';
    }

    const rawFiles = value['files'];
    if (!isRecord(rawFiles) || rawFiles['iso'] === undefined) {
        return 'files.iso is required';
    }

    const files: Record<string, FileMetadata> = {};
    for (const [role, rawFile] of Object.entries(rawFiles)) {
        const file = parseFileMetadata(rawFile, role);
        if (typeof file === 'string') {
            return file;
        }
        files[role] = file;
    }

    return {
        name: String(value['name']),
        image_type: String(value['image_type']),
        version: String(value['version']),
        release: String(value['release']),
        release_codename: String(value['release_codename']),
        release_title: String(value['release_title']),
        architectures: [...architectures],
        files,
    };
}

/**
 * Validate a raw descriptor. Malformed spins and groups are dropped and
 * reported; the descriptor is rejected only when its top level is unusable.
 */
export function parseVersionDescriptor(raw: unknown, expectedVersion?: string, file?: string): DescriptorParseResult {
    const issues: PipelineIssue[] = [];
    const base: IssueContext = file ? { file } : {};

    if (!isRecord(raw)) {
        return { descriptor: null, issues: [malformedDescriptor('descriptor must be a mapping', base)], positions: {} };
    }

    const version = raw['version'];
    if (typeof version !== 'string' || !isDottedVersion(version)) {
        return {
            descriptor: null,
            issues: [malformedDescriptor('version must be a quoted dotted version string', base)],
            positions: {},
        };
    }

    const context: IssueContext = { ...base, version };
    if (expectedVersion !== undefined && version !== expectedVersion) {
        return {
            descriptor: null,
            issues: [malformedDescriptor(`version ${version} does not match store key ${expectedVersion}`, context)],
            positions: {},
        };
    }

    const rawGroups = raw['spin_groups'];
    if (!isRecord(rawGroups)) {
        return { descriptor: null, issues: [malformedDescriptor('spin_groups must be a mapping', context)], positions: {} };
    }

    const spinGroups: Record<string, SpinGroup> = {};
    const positions: Record<string, number[]> = {};
    for (const [groupId, rawGroup] of Object.entries(rawGroups)) {
        const groupContext: IssueContext = { ...context, group: groupId };
        if (!isRecord(rawGroup)) {
            issues.push(malformedDescriptor('spin group must be a mapping', groupContext));
            continue;
        }

        const contentId = rawGroup['content_id'];
        const rawSpins = rawGroup['spins'];
        const groupName = rawGroup['name'];
        if (typeof contentId !== 'string' || !Array.isArray(rawSpins)) {
            issues.push(malformedDescriptor('spin group needs content_id and a spins list', groupContext));
            continue;
        }

        const spins: Spin[] = [];
        const kept: number[] = [];
        rawSpins.forEach((rawSpin: unknown, index: number) => {
            const spin = parseSpin(rawSpin);
            if (typeof spin === 'string') {
                const rawName = isRecord(rawSpin) ? rawSpin['name'] : undefined;
                const name = typeof rawName === 'string' ? rawName : `#${index}`;
                issues.push(malformedDescriptor(spin, { ...groupContext, spin: name }));
                return;
            }
            spins.push(spin);
            kept.push(index);
        });

        const group: SpinGroup = { content_id: contentId, spins };
        if (typeof groupName === 'string') {
            group.name = groupName;
        }
        spinGroups[groupId] = group;
        positions[groupId] = kept;
    }

    return { descriptor: { version, spin_groups: spinGroups }, issues, positions };
}
