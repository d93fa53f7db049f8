/**
 * template-forge - template registry and resolution engine
 *
 * @example
 * ```typescript
 * import { TemplateManager } from 'template-forge';
 *
 * const manager = await TemplateManager.create();
 * const { path, metadata } = await manager.resolve('vue', 'basic');
 * ```
 */

export { TemplateManager, type TemplateManagerOptions } from './registry/template-manager.js';
export { CacheStore, cacheKey, type CacheStats, type Clock } from './registry/cache-store.js';
export { Registry } from './registry/registry.js';
export * from './sources/index.js';
export * from './errors.js';
export * from './types/template.js';
export {
  defaultRegistryConfig,
  loadConfigOrDefault,
  loadRegistryConfig,
  parseRegistryConfig,
  resolveConfigPath,
} from './utils/config-loader.js';
export {
  RegistryConfigSchema,
  TemplateMetadataSchema,
  TemplateSourceSchema,
  TemplateVariableSchema,
} from './schemas/registry-schemas.js';
export { ConsoleLogger, NoopLogger, LogLevel, createLogger, type Logger, type LogContext } from './utils/logger.js';
