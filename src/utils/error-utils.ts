/**
 * Error Utilities
 * @fileoverview Per-entry pipeline issues and their aggregation
 */

/**
 * Issue kinds reported by the resolver and the catalog builder.
 * None of them aborts a run.
 */
export enum IssueKind {
    NETWORK = 'network_error',
    MANIFEST_PARSE = 'manifest_parse_error',
    MISSING_FILENAME = 'missing_filename',
    MALFORMED_DESCRIPTOR = 'malformed_descriptor',
    DUPLICATE_PRODUCT_KEY = 'duplicate_product_key',
}

/**
 * Where an issue occurred
 */
export interface IssueContext {
    version?: string;
    group?: string;
    spin?: string;
    arch?: string;
    url?: string;
    file?: string;
    line?: number;
}

export interface PipelineIssue extends IssueContext {
    kind: IssueKind;
    title: string;
    detail?: string;
}

/**
 * Create a standardized issue record
 */
export function createIssue(
    kind: IssueKind,
    title: string,
    context: IssueContext = {},
    detail?: string
): PipelineIssue {
    return {
        kind,
        title,
        ...context,
        ...(detail && { detail }),
    };
}

/**
 * Describe a thrown value, including the HTTP status when the value carries one
 */
export function describeError(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    if (typeof error === 'object' && error !== null && 'response' in error) {
        const response: unknown = error.response;
        if (typeof response === 'object' && response !== null && 'status' in response) {
            return `HTTP ${String(response.status)}: ${message}`;
        }
    }
    return message;
}

export function networkError(url: string, error: unknown, context: IssueContext = {}): PipelineIssue {
    return createIssue(IssueKind.NETWORK, `Request to ${url} failed`, { ...context, url }, describeError(error));
}

export function manifestParseError(url: string, line: number, content: string): PipelineIssue {
    return createIssue(
        IssueKind.MANIFEST_PARSE,
        `Unrecognized manifest line ${line}`,
        { url, line },
        content
    );
}

export function missingFilename(fileName: string, url: string, context: IssueContext = {}): PipelineIssue {
    return createIssue(
        IssueKind.MISSING_FILENAME,
        `${fileName} is not listed in ${url}`,
        { ...context, url, file: fileName }
    );
}

export function malformedDescriptor(detail: string, context: IssueContext = {}): PipelineIssue {
    return createIssue(IssueKind.MALFORMED_DESCRIPTOR, 'Malformed version descriptor', context, detail);
}

export function duplicateProductKey(key: string, context: IssueContext = {}): PipelineIssue {
    return createIssue(
        IssueKind.DUPLICATE_PRODUCT_KEY,
        `Product key ${key} is produced more than once; the later entry wins`,
        context
    );
}

/**
 * Collects issues over a run so they can be reported together at the end
 */
export class IssueCollector {
    private readonly issues: PipelineIssue[] = [];

    add(...issues: PipelineIssue[]): void {
        this.issues.push(...issues);
    }

    all(): PipelineIssue[] {
        return [...this.issues];
    }

    get size(): number {
        return this.issues.length;
    }

    count(kind: IssueKind): number {
        return this.issues.filter(issue => issue.kind === kind).length;
    }

    /**
     * Issue counts keyed by kind, omitting kinds that did not occur
     */
    summary(): Partial<Record<IssueKind, number>> {
        const result: Partial<Record<IssueKind, number>> = {};
        for (const issue of this.issues) {
            result[issue.kind] = (result[issue.kind] ?? 0) + 1;
        }
        return result;
    }
}

/**
 * Raised when the spin-definition or release tables cannot be used
 */
export class SettingsError extends Error {
    constructor(message: string, public readonly source?: string) {
        super(source ? `${source}: ${message}` : message);
        this.name = 'SettingsError';
    }
}
