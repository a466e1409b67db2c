/**
 * Spin definition and release tables shared by every component
 */

/**
 * Upstream location and naming of one spin
 */
export interface SpinDefinition {
    /** Display name, e.g. "Kubuntu" */
    name: string;
    content_id: string;
    url_base: string;
    path_template: string;
    image_type?: string;
    architectures?: readonly string[];
}

/**
 * Release codename entry keyed by its slug (e.g. "noble")
 */
export interface ReleaseInfo {
    /** Display form, e.g. "Noble Numbat" */
    codename: string;
    /** Two-component series, e.g. "24.04" */
    series: string;
}

export interface Settings {
    readonly spins: Readonly<Record<string, Readonly<SpinDefinition>>>;
    readonly releases: Readonly<Record<string, Readonly<ReleaseInfo>>>;
}
