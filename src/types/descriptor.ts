/**
 * Version descriptor types
 * @fileoverview Mirrors the on-disk layout of config/versions/<version>.yaml
 */

/**
 * Checksum and size record for one downloadable artifact.
 * An empty sha256 and a zero size mean "not resolved yet".
 */
export interface FileMetadata {
    path_template: string;
    sha256: string;
    size: number;
    /** Overrides the spin definition's url_base */
    url?: string;
}

/**
 * One buildable image variant of a spin
 */
export interface Spin {
    name: string;
    image_type: string;
    version: string;
    release: string;
    release_codename: string;
    release_title: string;
    architectures: string[];
    files: Record<string, FileMetadata>;
}

/**
 * All tracked variants of a spin for one release train
 */
export interface SpinGroup {
    name?: string;
    content_id: string;
    spins: Spin[];
}

/**
 * One Ubuntu release train (e.g. 24.04.3)
 */
export interface VersionDescriptor {
    version: string;
    spin_groups: Record<string, SpinGroup>;
}

/**
 * Location of one file record inside a descriptor
 */
export interface FileLocation {
    group: string;
    spin: string;
    /** Position of the spin within its group */
    index: number;
    imageType: string;
    role: string;
}

/**
 * Resolved checksum/size for one file record
 */
export interface FileUpdate extends FileLocation {
    sha256: string;
    size: number;
    previousSha256: string;
    previousSize: number;
}
