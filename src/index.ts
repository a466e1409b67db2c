/**
 * spin-catalog public API
 */

export * from './config/constants';
export { createSettings, findReleaseBySeries, loadSettings } from './config/settings';
export * from './services/catalog-service';
export * from './services/catalog-validator';
export * from './services/checksum-service';
export * from './services/template-service';
export * from './store/version-store';
export * from './types/catalog';
export * from './types/descriptor';
export * from './types/settings';
export { isComplete, parseVersionDescriptor, templateVariables } from './utils/descriptor-utils';
export * from './utils/error-utils';
export { ConsoleLogger, Logger, LogLevel } from './utils/logger';
export { parseManifest, parseManifestLine } from './utils/manifest-utils';
export { renderTemplate, TemplateVariables } from './utils/template-utils';
export { compareVersions } from './utils/version-utils';
