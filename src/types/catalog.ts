/**
 * products:1.0 catalog types
 * @fileoverview Field names follow the external image-downloads schema exactly
 */

export interface CatalogItem {
    ftype: string;
    path: string;
    sha256: string;
    size: number;
}

export interface CatalogVersion {
    items: Record<string, CatalogItem>;
}

export interface CatalogProduct {
    aliases: string;
    arch: string;
    image_type: string;
    os: string;
    release: string;
    release_codename: string;
    release_title: string;
    version: string;
    versions: Record<string, CatalogVersion>;
}

export interface CatalogDocument {
    datatype: string;
    format: string;
    content_id: string;
    products: Record<string, CatalogProduct>;
    /** Present in the upstream reference format; never emitted here */
    updated?: string;
}
