/**
 * Catalog Service
 * @fileoverview Turns the version store into one products:1.0 document per spin
 */

import * as path from 'path';
import { CATALOG_FORMAT } from '../config/constants';
import { CatalogDocument, CatalogProduct } from '../types/catalog';
import { Spin, VersionDescriptor } from '../types/descriptor';
import { Settings } from '../types/settings';
import { VersionStore } from '../store/version-store';
import { isComplete, templateVariables } from '../utils/descriptor-utils';
import { duplicateProductKey, IssueCollector, IssueKind, malformedDescriptor, PipelineIssue } from '../utils/error-utils';
import { writeFileAtomic } from '../utils/file-utils';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { renderTemplate } from '../utils/template-utils';

/**
 * Service configuration
 */
export interface CatalogServiceConfig {
    settings: Settings;
    /** Do not emit documents for spins without any complete entry */
    skipEmpty?: boolean;
    logger?: Logger;
}

export interface CatalogSummary {
    documents: number;
    products: number;
    /** Entries left out because their checksum or size is unresolved */
    filtered: number;
    duplicates: number;
    malformed: number;
}

export interface CatalogBuildResult {
    /** Spin identifier -> document, in output order */
    documents: Map<string, CatalogDocument>;
    issues: PipelineIssue[];
    summary: CatalogSummary;
}

/**
 * Product key: <content_id>:<spin_name>:<image_type>:<version>:<arch>
 */
export function productKey(contentId: string, spin: Spin, arch: string): string {
    return [contentId, spin.name, spin.image_type, spin.version, arch].join(':');
}

/**
 * Alias string: "<version>,<release>"
 */
export function productAliases(spin: Spin): string {
    return `${spin.version},${spin.release}`;
}

/**
 * Empty document skeleton with the fields in schema order
 */
export function createCatalogDocument(contentId: string): CatalogDocument {
    return {
        datatype: CATALOG_FORMAT.DATATYPE,
        format: CATALOG_FORMAT.FORMAT,
        content_id: contentId,
        products: {},
    };
}

/**
 * Catalog Service
 */
export class CatalogService {
    private settings: Settings;
    private skipEmpty: boolean;
    private logger: Logger;

    constructor(config: CatalogServiceConfig) {
        this.settings = config.settings;
        this.skipEmpty = config.skipEmpty ?? false;
        this.logger = config.logger || defaultLogger;
    }

    /**
     * Build the catalog entry for one spin/architecture; the spin's iso
     * record must be complete
     */
    buildProduct(spin: Spin, arch: string, codename: string): CatalogProduct {
        const role = CATALOG_FORMAT.FILE_ROLE;
        const file = spin.files[role];
        if (!isComplete(file)) {
            throw new Error(`Cannot build a product for ${spin.name} ${spin.version} without a checksum and size`);
        }

        return {
            aliases: productAliases(spin),
            arch,
            image_type: spin.image_type,
            os: spin.name,
            release: spin.release,
            release_codename: codename,
            release_title: spin.release_title,
            version: spin.version,
            versions: {
                [spin.version]: {
                    items: {
                        [role]: {
                            ftype: CATALOG_FORMAT.FTYPE,
                            path: renderTemplate(file.path_template, templateVariables(spin, arch)),
                            sha256: file.sha256,
                            size: file.size,
                        },
                    },
                },
            },
        };
    }

    /**
     * Group every complete entry of the given descriptors into one document
     * per spin identifier. Descriptors should be in load order; on a key
     * collision the later one wins and the collision is reported.
     */
    buildCatalogs(descriptors: VersionDescriptor[]): CatalogBuildResult {
        const documents = new Map<string, CatalogDocument>();
        const collector = new IssueCollector();
        let products = 0;
        let filtered = 0;

        if (!this.skipEmpty) {
            for (const [spinId, definition] of Object.entries(this.settings.spins)) {
                documents.set(spinId, createCatalogDocument(definition.content_id));
            }
        }

        for (const descriptor of descriptors) {
            for (const [groupId, group] of Object.entries(descriptor.spin_groups)) {
                const contentId = this.settings.spins[groupId]?.content_id ?? group.content_id;

                for (const spin of group.spins) {
                    const context = { version: descriptor.version, group: groupId, spin: spin.name };
                    const release = this.settings.releases[spin.release];
                    if (!release) {
                        collector.add(malformedDescriptor(`unknown release "${spin.release}"`, context));
                        continue;
                    }

                    if (!isComplete(spin.files[CATALOG_FORMAT.FILE_ROLE])) {
                        filtered += spin.architectures.length;
                        this.logger.debug('Skipping incomplete entry', context);
                        continue;
                    }

                    let document = documents.get(groupId);
                    if (!document) {
                        document = createCatalogDocument(contentId);
                        documents.set(groupId, document);
                    }

                    const codename = spin.release_codename || release.codename;
                    for (const arch of spin.architectures) {
                        const key = productKey(contentId, spin, arch);
                        if (key in document.products) {
                            collector.add(duplicateProductKey(key, { ...context, arch }));
                        } else {
                            products++;
                        }
                        document.products[key] = this.buildProduct(spin, arch, codename);
                    }
                }
            }
        }

        const summary: CatalogSummary = {
            documents: documents.size,
            products,
            filtered,
            duplicates: collector.count(IssueKind.DUPLICATE_PRODUCT_KEY),
            malformed: collector.count(IssueKind.MALFORMED_DESCRIPTOR),
        };

        return { documents, issues: collector.all(), summary };
    }

    /**
     * Write each document as <output-dir>/<spin_identifier>.json
     */
    async writeCatalogs(documents: Map<string, CatalogDocument>, outputDir: string): Promise<string[]> {
        const written: string[] = [];

        for (const [spinId, document] of documents) {
            const filePath = path.join(outputDir, `${spinId}${CATALOG_FORMAT.FILE_EXTENSION}`);
            await writeFileAtomic(filePath, `${JSON.stringify(document, null, 2)}\n`);
            this.logger.info('Wrote catalog', {
                spin: spinId,
                file: filePath,
                products: Object.keys(document.products).length,
            });
            written.push(filePath);
        }

        return written;
    }

    /**
     * Load the whole store, build the catalogs and write them out
     */
    async generate(store: VersionStore, outputDir: string): Promise<CatalogBuildResult & { files: string[] }> {
        const loaded = await store.loadAll();
        const result = this.buildCatalogs(loaded.descriptors.map(stored => stored.descriptor));
        const issues = [...loaded.issues, ...result.issues];
        const summary: CatalogSummary = {
            ...result.summary,
            malformed: result.summary.malformed + loaded.issues.length,
        };

        const files = await this.writeCatalogs(result.documents, outputDir);
        this.logger.info('Catalog generation complete', { ...summary });
        return { documents: result.documents, issues, summary, files };
    }
}
