#!/usr/bin/env node
/**
 * spin-catalog command line
 */

import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { EXIT_CODES, OUTPUT_DIR, SERVICE_NAME, SPINS_CONFIG, VERSIONS_DIR } from './config/constants';
import { loadSettings } from './config/settings';
import { CatalogService } from './services/catalog-service';
import { validateCatalogDirectory } from './services/catalog-validator';
import { ChecksumService, ResolutionReport } from './services/checksum-service';
import { createVersionTemplate } from './services/template-service';
import { VersionStore } from './store/version-store';
import { ConsoleLogger, LogLevel } from './utils/logger';

const logger = new ConsoleLogger();

process.on('unhandledRejection', (reason) => {
    logger.error('FATAL: Unhandled Promise Rejection', { reason: String(reason) });
    process.exit(EXIT_CODES.FAILURE);
});

function exitCodeFor(reports: ResolutionReport[]): number {
    return reports.some(report => report.status === 'partial') ? EXIT_CODES.PARTIAL : EXIT_CODES.SUCCESS;
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
    await yargs(argv)
        .scriptName(SERVICE_NAME)
        .version(false)
        .option('versions-dir', {
            type: 'string',
            description: 'Directory holding <version>.yaml descriptors',
            default: VERSIONS_DIR,
        })
        .option('spins-config', {
            type: 'string',
            description: 'Spin definition and release table',
            default: SPINS_CONFIG,
        })
        .option('verbose', {
            alias: 'v',
            type: 'boolean',
            description: 'Enable debug output',
            default: false,
        })
        .middleware((args) => {
            if (args.verbose) {
                logger.setLevel(LogLevel.DEBUG);
            }
        })
        .command(
            'checksums [versions..]',
            'Fetch SHA256 checksums and sizes from the upstream SHA256SUMS files',
            (command) => command
                .positional('versions', {
                    type: 'string',
                    array: true,
                    description: 'Versions to update (e.g. 24.04.3)',
                })
                .option('all', {
                    type: 'boolean',
                    description: 'Update every version in the store',
                    default: false,
                })
                .option('file', {
                    type: 'string',
                    array: true,
                    description: 'Descriptor file(s) to update',
                })
                .option('dry-run', {
                    type: 'boolean',
                    description: 'Show what would be updated without writing',
                    default: false,
                })
                .option('refresh', {
                    type: 'boolean',
                    description: 'Re-resolve entries that already have a checksum',
                    default: false,
                })
                .example('$0 checksums 24.04.3', 'Update one version')
                .example('$0 checksums --all --dry-run', 'Show what every version would get'),
            async (args) => {
                const settings = loadSettings(args['spins-config'], logger);
                const store = new VersionStore({ directory: args['versions-dir'], logger });
                const service = new ChecksumService({ settings, logger });
                const options = { dryRun: args['dry-run'], refresh: args.refresh };

                const versions = args.all ? await store.listVersions() : (args.versions ?? []);
                const files = args.file ?? [];
                if (versions.length === 0 && files.length === 0) {
                    throw new Error('Name at least one version, --file or --all');
                }

                const reports: ResolutionReport[] = [];
                for (const version of versions) {
                    reports.push(await service.updateVersion(store, version, options));
                }
                for (const file of files) {
                    reports.push(await service.updateFile(store, file, options));
                }

                for (const report of reports) {
                    logger.info('Checksum run finished', {
                        version: report.version,
                        status: report.status,
                        attempted: report.attempted,
                        updated: report.updated,
                        unchanged: report.unchanged,
                        skipped: report.skipped,
                        issues: report.issues.length,
                        persisted: report.persisted,
                        dryRun: report.dryRun,
                    });
                }
                process.exitCode = exitCodeFor(reports);
            }
        )
        .command(
            'catalog',
            'Generate one products:1.0 JSON catalog per spin',
            (command) => command
                .option('output-dir', {
                    type: 'string',
                    description: 'Directory to write <spin>.json files into',
                    default: OUTPUT_DIR,
                })
                .option('skip-empty', {
                    type: 'boolean',
                    description: 'Do not write catalogs for spins without complete entries',
                    default: false,
                }),
            async (args) => {
                const settings = loadSettings(args['spins-config'], logger);
                const store = new VersionStore({ directory: args['versions-dir'], logger });
                const service = new CatalogService({ settings, skipEmpty: args['skip-empty'], logger });

                const result = await service.generate(store, args['output-dir']);
                for (const issue of result.issues) {
                    logger.warn(issue.title, { ...issue });
                }
                process.exitCode = EXIT_CODES.SUCCESS;
            }
        )
        .command(
            'validate',
            'Validate generated catalogs against the products:1.0 schema',
            (command) => command
                .option('output-dir', {
                    type: 'string',
                    description: 'Directory holding the generated catalogs',
                    default: OUTPUT_DIR,
                }),
            async (args) => {
                const result = await validateCatalogDirectory(args['output-dir'], logger);
                for (const error of result.errors) {
                    logger.error(error);
                }
                const errorCount = result.files.reduce((total, file) => total + file.errors.length, 0);
                const warningCount = result.files.reduce((total, file) => total + file.warnings.length, 0);
                logger.info('Validation finished', {
                    files: result.files.length,
                    errors: errorCount,
                    warnings: warningCount,
                    valid: result.valid,
                });
                process.exitCode = result.valid ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
            }
        )
        .command(
            'template <version>',
            'Create a descriptor with unresolved checksums for a new version',
            (command) => command
                .positional('version', {
                    type: 'string',
                    demandOption: true,
                    description: 'Version to create (e.g. 24.04.3)',
                }),
            async (args) => {
                const settings = loadSettings(args['spins-config'], logger);
                const store = new VersionStore({ directory: args['versions-dir'], logger });
                await store.create(createVersionTemplate(args.version, settings));
            }
        )
        .demandCommand(1)
        .strict()
        .help()
        .fail((message, error, instance) => {
            // Command errors go to the caller of main()
            if (error) {
                throw error;
            }
            logger.error(message);
            instance.showHelp();
            process.exitCode = EXIT_CODES.FAILURE;
        })
        .parseAsync();
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.error('Fatal error', { error: error instanceof Error ? error.message : String(error) });
        process.exitCode = EXIT_CODES.FAILURE;
    });
}
