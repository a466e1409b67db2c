/**
 * Version Store
 * @fileoverview Per-version YAML descriptors on disk: load, validate, update in place, save
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Document, isMap, parseDocument, YAMLMap } from 'yaml';
import { VERSION_FILE_EXTENSIONS } from '../config/constants';
import { FileLocation, FileUpdate, VersionDescriptor } from '../types/descriptor';
import { parseVersionDescriptor } from '../utils/descriptor-utils';
import { malformedDescriptor, PipelineIssue } from '../utils/error-utils';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { writeFileAtomic } from '../utils/file-utils';
import { compareVersions } from '../utils/version-utils';

/**
 * A descriptor together with the YAML document it was read from. The document
 * keeps comments, key order and quoting, so writing it back only changes the
 * scalars that were updated.
 */
export interface StoredDescriptor {
    version: string;
    filePath: string;
    document: Document;
    descriptor: VersionDescriptor;
    /** Group id -> document position of each in-memory spin */
    positions: Record<string, number[]>;
}

export interface DescriptorLoadResult {
    stored: StoredDescriptor | null;
    issues: PipelineIssue[];
}

export interface StoreLoadResult {
    descriptors: StoredDescriptor[];
    issues: PipelineIssue[];
}

export interface VersionStoreConfig {
    directory: string;
    logger?: Logger;
}

/**
 * Parse descriptor text into a document and a validated descriptor
 */
export function parseDescriptorText(text: string, expectedVersion?: string, filePath = '<memory>'): DescriptorLoadResult {
    const document = parseDocument(text);
    if (document.errors.length > 0) {
        const detail = document.errors.map(error => error.message).join('; ');
        return { stored: null, issues: [malformedDescriptor(`invalid YAML: ${detail}`, { file: filePath })] };
    }

    const { descriptor, issues, positions } = parseVersionDescriptor(document.toJS(), expectedVersion, filePath);
    if (!descriptor) {
        return { stored: null, issues };
    }

    return {
        stored: { version: descriptor.version, filePath, document, descriptor, positions },
        issues,
    };
}

function findSpinNode(stored: StoredDescriptor, location: FileLocation): YAMLMap | undefined {
    const position = stored.positions[location.group]?.[location.index];
    if (position === undefined) {
        return undefined;
    }
    const node = stored.document.getIn(['spin_groups', location.group, 'spins', position], true);
    return isMap(node) && node.get('name') === location.spin ? node : undefined;
}

/**
 * Write resolved checksums into both the document and the descriptor.
 * Returns the number of file records changed.
 */
export function applyFileUpdates(stored: StoredDescriptor, updates: FileUpdate[]): number {
    let applied = 0;

    for (const update of updates) {
        const spin = stored.descriptor.spin_groups[update.group]?.spins[update.index];
        const spinNode = findSpinNode(stored, update);
        if (!spin || spin.name !== update.spin || !spinNode) {
            continue;
        }

        spinNode.setIn(['files', update.role, 'sha256'], update.sha256);
        spinNode.setIn(['files', update.role, 'size'], update.size);

        const file = spin.files[update.role];
        if (file) {
            file.sha256 = update.sha256;
            file.size = update.size;
        }
        applied++;
    }

    return applied;
}

/**
 * Serialize a document back to YAML text
 */
export function serializeDocument(document: Document): string {
    return document.toString({ lineWidth: 0 });
}

/**
 * Directory of <version>.yaml descriptors
 */
export class VersionStore {
    private readonly directory: string;
    private readonly logger: Logger;

    constructor(config: VersionStoreConfig) {
        this.directory = config.directory;
        this.logger = config.logger || defaultLogger;
    }

    /**
     * Path of the descriptor file for a version (.yaml)
     */
    pathFor(version: string): string {
        return path.join(this.directory, `${version}${VERSION_FILE_EXTENSIONS[0]}`);
    }

    /**
     * Versions present in the store, in ascending numeric order
     */
    async listVersions(): Promise<string[]> {
        const entries = await fs.readdir(this.directory, { withFileTypes: true });
        const versions = entries
            .filter(entry => entry.isFile())
            .map(entry => entry.name)
            .filter(name => VERSION_FILE_EXTENSIONS.some(ext => name.endsWith(ext)))
            .map(name => name.slice(0, name.lastIndexOf('.')));

        return [...new Set(versions)].sort(compareVersions);
    }

    private async resolveFile(version: string): Promise<string> {
        for (const ext of VERSION_FILE_EXTENSIONS) {
            const candidate = path.join(this.directory, `${version}${ext}`);
            const exists = await fs.access(candidate).then(() => true, () => false);
            if (exists) {
                return candidate;
            }
        }
        return this.pathFor(version);
    }

    /**
     * Load one descriptor by version
     */
    async load(version: string): Promise<DescriptorLoadResult> {
        return this.loadFile(await this.resolveFile(version), version);
    }

    /**
     * Load a descriptor from an explicit file path; the file stem is the store key
     */
    async loadFile(filePath: string, expectedVersion?: string): Promise<DescriptorLoadResult> {
        const stem = path.basename(filePath).replace(/\.ya?ml$/, '');
        const text = await fs.readFile(filePath, 'utf8');
        const result = parseDescriptorText(text, expectedVersion ?? stem, filePath);

        for (const issue of result.issues) {
            this.logger.warn(issue.title, { file: filePath, detail: issue.detail, group: issue.group, spin: issue.spin });
        }
        return result;
    }

    /**
     * Load every descriptor; malformed ones are reported and skipped
     */
    async loadAll(): Promise<StoreLoadResult> {
        const descriptors: StoredDescriptor[] = [];
        const issues: PipelineIssue[] = [];

        for (const version of await this.listVersions()) {
            const result = await this.load(version);
            issues.push(...result.issues);
            if (result.stored) {
                descriptors.push(result.stored);
            }
        }

        this.logger.debug('Loaded version store', {
            directory: this.directory,
            descriptors: descriptors.length,
            issues: issues.length,
        });
        return { descriptors, issues };
    }

    /**
     * Persist a descriptor back to the file it was loaded from
     */
    async save(stored: StoredDescriptor): Promise<void> {
        await writeFileAtomic(stored.filePath, serializeDocument(stored.document));
        this.logger.debug('Saved version descriptor', { file: stored.filePath });
    }

    /**
     * Add a new descriptor; an existing one is never overwritten
     */
    async create(descriptor: VersionDescriptor): Promise<string> {
        const filePath = this.pathFor(descriptor.version);
        const existing = await this.listVersions().catch((error: NodeJS.ErrnoException): string[] => {
            if (error.code === 'ENOENT') {
                return [];
            }
            throw error;
        });
        if (existing.includes(descriptor.version)) {
            throw new Error(`Descriptor for ${descriptor.version} already exists in ${this.directory}`);
        }

        const document = new Document(descriptor);
        await writeFileAtomic(filePath, serializeDocument(document));
        this.logger.info('Created version descriptor', { file: filePath, version: descriptor.version });
        return filePath;
    }
}
