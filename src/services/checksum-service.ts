/**
 * Checksum Service
 * @fileoverview Fills missing sha256/size fields of a version descriptor from
 * the upstream SHA256SUMS manifests
 */

import axios, { AxiosInstance } from 'axios';
import { CATALOG_FORMAT, UPSTREAM } from '../config/constants';
import { FileUpdate, Spin, VersionDescriptor } from '../types/descriptor';
import { Settings } from '../types/settings';
import { applyFileUpdates, DescriptorLoadResult, VersionStore } from '../store/version-store';
import { isComplete, templateVariables } from '../utils/descriptor-utils';
import {
    IssueCollector,
    IssueContext,
    malformedDescriptor,
    missingFilename,
    networkError,
    PipelineIssue,
} from '../utils/error-utils';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { parseManifest, ParsedManifest } from '../utils/manifest-utils';
import { directoryOf, fileNameOf, findUnresolvedPlaceholders, joinUrl, renderTemplate } from '../utils/template-utils';

/**
 * Service configuration
 */
export interface ChecksumServiceConfig {
    settings: Settings;
    timeout?: number;
    userAgent?: string;
    manifestFile?: string;
    logger?: Logger;
}

export interface ResolveOptions {
    /** Re-resolve records that are already complete */
    refresh?: boolean;
}

export interface UpdateOptions extends ResolveOptions {
    /** Fetch and parse, but never write the descriptor */
    dryRun?: boolean;
}

/**
 * `partial` covers every run that reported issues, including runs where no
 * entry resolved; only I/O errors escape as exceptions
 */
export type ResolutionStatus = 'success' | 'partial';

export interface ResolutionReport {
    version: string;
    /** File records a resolution was attempted for */
    attempted: number;
    /** Records whose checksum or size changed */
    updated: number;
    /** Records that resolved to the values already stored */
    unchanged: number;
    /** Complete records left alone */
    skipped: number;
    updates: FileUpdate[];
    issues: PipelineIssue[];
    status: ResolutionStatus;
    dryRun: boolean;
    persisted: boolean;
}

/**
 * Upstream location of one spin's artifact
 */
export interface ArtifactLocation {
    fileName: string;
    artifactUrl: string;
    manifestUrl: string;
}

/**
 * Outcome of resolving one spin: new values when found, plus any issues
 */
export interface SpinResolution {
    resolved: { sha256: string; size: number } | null;
    issues: PipelineIssue[];
}

type ManifestResult = { manifest: ParsedManifest } | { error: unknown };

/**
 * Checksum Service
 */
export class ChecksumService {
    private httpClient: AxiosInstance;
    private settings: Settings;
    private manifestFile: string;
    private logger: Logger;
    private manifests = new Map<string, Promise<ManifestResult>>();
    private reportedManifests = new Set<string>();

    constructor(config: ChecksumServiceConfig) {
        this.httpClient = axios.create({
            timeout: config.timeout || UPSTREAM.HTTP_TIMEOUT_MS,
            maxRedirects: UPSTREAM.MAX_REDIRECTS,
            headers: {
                'User-Agent': config.userAgent || UPSTREAM.USER_AGENT,
            },
        });

        this.settings = config.settings;
        this.manifestFile = config.manifestFile || UPSTREAM.MANIFEST_FILE;
        this.logger = config.logger || defaultLogger;
    }

    /**
     * Fetch and parse a manifest. Throws when the request fails.
     */
    async fetchManifest(url: string): Promise<ParsedManifest> {
        const response = await this.httpClient.get<string>(url, {
            responseType: 'text',
            headers: { 'Accept': 'text/plain' },
        });

        if (typeof response.data !== 'string') {
            throw new Error(`Expected a text manifest from ${url}`);
        }

        const manifest = parseManifest(response.data, url);
        this.logger.info('Fetched manifest', { url, entries: manifest.entries.size });
        return manifest;
    }

    /**
     * Size of a remote file from the content-length of a HEAD request
     */
    async fetchContentLength(url: string): Promise<number> {
        const response = await this.httpClient.head(url);
        const header: unknown = response.headers['content-length'];
        const size = typeof header === 'string' || typeof header === 'number' ? Number(header) : NaN;

        if (!Number.isInteger(size) || size <= 0) {
            throw new Error(`No usable content-length for ${url}`);
        }
        return size;
    }

    /**
     * Fetch each manifest URL at most once per service instance
     */
    private getManifest(url: string): Promise<ManifestResult> {
        let pending = this.manifests.get(url);
        if (!pending) {
            pending = this.fetchManifest(url).then(
                (manifest): ManifestResult => ({ manifest }),
                (error: unknown): ManifestResult => ({ error })
            );
            this.manifests.set(url, pending);
        }
        return pending;
    }

    /**
     * Work out where a spin's artifact and its manifest live upstream
     */
    locateArtifact(groupId: string, spin: Spin, arch: string, role: string = CATALOG_FORMAT.FILE_ROLE): ArtifactLocation | null {
        const file = spin.files[role];
        const definition = this.settings.spins[spin.name] ?? this.settings.spins[groupId];
        const urlBase = file?.url || definition?.url_base;
        if (!file || !urlBase) {
            return null;
        }

        const variables = templateVariables(spin, arch);
        const relativePath = renderTemplate(file.path_template, variables);
        const base = renderTemplate(urlBase, variables);

        return {
            fileName: fileNameOf(relativePath),
            artifactUrl: joinUrl(base, relativePath),
            manifestUrl: joinUrl(base, directoryOf(relativePath), this.manifestFile),
        };
    }

    /**
     * Resolve one spin's file record against its primary (first) architecture
     */
    async resolveSpin(
        groupId: string,
        spin: Spin,
        context: IssueContext,
        role: string = CATALOG_FORMAT.FILE_ROLE
    ): Promise<SpinResolution> {
        const arch = spin.architectures[0];
        if (arch === undefined) {
            return { resolved: null, issues: [malformedDescriptor('spin lists no architectures', context)] };
        }
        if (spin.architectures.length > 1) {
            this.logger.warn('Spin lists several architectures; resolving the first', {
                ...context,
                architectures: spin.architectures,
            });
        }

        const archContext: IssueContext = { ...context, arch };
        const file = spin.files[role];
        const unresolved = file ? findUnresolvedPlaceholders(file.path_template, templateVariables(spin, arch)) : [];
        if (unresolved.length > 0) {
            return {
                resolved: null,
                issues: [malformedDescriptor(`unknown placeholder in path_template: ${unresolved.join(', ')}`, archContext)],
            };
        }

        const location = this.locateArtifact(groupId, spin, arch, role);
        if (!location) {
            return { resolved: null, issues: [malformedDescriptor(`no url_base known for spin ${spin.name}`, archContext)] };
        }

        const result = await this.getManifest(location.manifestUrl);
        if ('error' in result) {
            return { resolved: null, issues: [networkError(location.manifestUrl, result.error, archContext)] };
        }

        const issues: PipelineIssue[] = [];
        if (!this.reportedManifests.has(location.manifestUrl)) {
            this.reportedManifests.add(location.manifestUrl);
            issues.push(...result.manifest.issues);
        }

        const sha256 = result.manifest.entries.get(location.fileName);
        if (sha256 === undefined) {
            this.logger.debug('Manifest entries', {
                url: location.manifestUrl,
                files: [...result.manifest.entries.keys()],
            });
            issues.push(missingFilename(location.fileName, location.manifestUrl, archContext));
            return { resolved: null, issues };
        }

        try {
            const size = await this.fetchContentLength(location.artifactUrl);
            return { resolved: { sha256, size }, issues };
        } catch (error) {
            issues.push(networkError(location.artifactUrl, error, archContext));
            return { resolved: null, issues };
        }
    }

    /**
     * Resolve every incomplete file record of a descriptor. The descriptor is
     * not modified; the returned updates say what would change.
     */
    async resolveDescriptor(descriptor: VersionDescriptor, options: ResolveOptions = {}): Promise<ResolutionReport> {
        const role = CATALOG_FORMAT.FILE_ROLE;
        const collector = new IssueCollector();
        const updates: FileUpdate[] = [];
        let attempted = 0;
        let unchanged = 0;
        let skipped = 0;

        for (const [groupId, group] of Object.entries(descriptor.spin_groups)) {
            for (const [index, spin] of group.spins.entries()) {
                const file = spin.files[role];
                if (isComplete(file) && !options.refresh) {
                    skipped++;
                    continue;
                }

                attempted++;
                const context: IssueContext = { version: descriptor.version, group: groupId, spin: spin.name };
                const { resolved, issues } = await this.resolveSpin(groupId, spin, context, role);
                for (const issue of issues) {
                    this.logger.warn(issue.title, { ...context, kind: issue.kind, detail: issue.detail });
                }
                collector.add(...issues);

                if (!resolved) {
                    continue;
                }

                const previousSha256 = file?.sha256 ?? '';
                const previousSize = file?.size ?? 0;
                if (resolved.sha256 === previousSha256 && resolved.size === previousSize) {
                    this.logger.info('Already up to date', { ...context });
                    unchanged++;
                    continue;
                }

                this.logger.info('Resolved checksum', { ...context, sha256: resolved.sha256, size: resolved.size });
                updates.push({
                    group: groupId,
                    spin: spin.name,
                    index,
                    imageType: spin.image_type,
                    role,
                    sha256: resolved.sha256,
                    size: resolved.size,
                    previousSha256,
                    previousSize,
                });
            }
        }

        return {
            version: descriptor.version,
            attempted,
            updated: updates.length,
            unchanged,
            skipped,
            updates,
            issues: collector.all(),
            status: collector.size > 0 ? 'partial' : 'success',
            dryRun: false,
            persisted: false,
        };
    }

    /**
     * Load a version from the store, resolve it and write it back
     */
    async updateVersion(store: VersionStore, version: string, options: UpdateOptions = {}): Promise<ResolutionReport> {
        const loaded = await store.load(version);
        return this.updateLoaded(store, loaded, version, options);
    }

    /**
     * Same as updateVersion, for a descriptor file given by path
     */
    async updateFile(store: VersionStore, filePath: string, options: UpdateOptions = {}): Promise<ResolutionReport> {
        const loaded = await store.loadFile(filePath);
        return this.updateLoaded(store, loaded, filePath, options);
    }

    private async updateLoaded(
        store: VersionStore,
        loaded: DescriptorLoadResult,
        label: string,
        options: UpdateOptions
    ): Promise<ResolutionReport> {
        const dryRun = options.dryRun ?? false;
        if (!loaded.stored) {
            return {
                version: label,
                attempted: 0,
                updated: 0,
                unchanged: 0,
                skipped: 0,
                updates: [],
                issues: loaded.issues,
                status: 'partial',
                dryRun,
                persisted: false,
            };
        }

        const stored = loaded.stored;
        this.logger.info('Processing version', { version: stored.version, file: stored.filePath });
        const report = await this.resolveDescriptor(stored.descriptor, options);
        report.issues = [...loaded.issues, ...report.issues];
        report.dryRun = dryRun;
        if (report.status === 'success' && report.issues.length > 0) {
            report.status = 'partial';
        }

        if (report.updates.length === 0) {
            this.logger.info('All checksums are up to date', { version: stored.version });
            return report;
        }

        if (dryRun) {
            for (const update of report.updates) {
                this.logger.info('[DRY RUN] Would update', { ...update });
            }
            return report;
        }

        applyFileUpdates(stored, report.updates);
        await store.save(stored);
        report.persisted = true;
        this.logger.info('Updated checksums', { version: stored.version, updated: report.updated, file: stored.filePath });
        return report;
    }
}
