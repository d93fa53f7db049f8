/**
 * Template Manager
 *
 * Orchestrates the registry, the cache store and the source adapters.
 * Listing is fail-soft per registry entry; resolution tries enabled entries
 * one at a time in priority order and the first success wins.
 */

import type {
  FetchedTemplate,
  RegistryConfig,
  RegistryEntry,
  ResolvedTemplate,
  TemplateMetadata,
} from '../types/template.js';
import {
  SourceUnavailableError,
  TemplateNotFoundError,
  extractErrorMessage,
  isTemplateForgeError,
} from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { loadConfigOrDefault } from '../utils/config-loader.js';
import { createSourceAdapters, fetchFromSource, listFromSource } from '../sources/index.js';
import type { FetchFn, SourceAdapters } from '../sources/types.js';
import type { GitRunner } from '../sources/git-source.js';
import { CacheStore, cacheKey, type CacheStats, type Clock } from './cache-store.js';
import { Registry } from './registry.js';

export interface TemplateManagerOptions {
  /** Replace individual adapters (tests, custom transports) */
  adapters?: Partial<SourceAdapters>;
  logger?: Logger;
  /** Epoch-millisecond clock used for cache timestamps */
  clock?: Clock;
  fetch?: FetchFn;
  /** HTTP transport timeout for remote adapters */
  timeoutMs?: number;
  gitRunner?: GitRunner;
}

export class TemplateManager {
  private readonly registry: Registry;
  private readonly cache: CacheStore;
  private readonly adapters: SourceAdapters;
  private readonly logger: Logger;

  constructor(
    readonly config: RegistryConfig,
    options: TemplateManagerOptions = {}
  ) {
    this.logger = options.logger ?? createLogger();
    this.registry = new Registry(config.entries);
    this.cache = new CacheStore(config.cacheTtlSeconds, options.clock);
    this.adapters = {
      ...createSourceAdapters({
        cacheDir: config.cacheDir,
        logger: this.logger,
        fetch: options.fetch,
        timeoutMs: options.timeoutMs,
        gitRunner: options.gitRunner,
      }),
      ...options.adapters,
    };
  }

  /**
   * Build a manager from a config file, $TEMPLATE_FORGE_CONFIG,
   * ./template-forge.yaml, or the built-in defaults
   */
  static async create(configPath?: string, options: TemplateManagerOptions = {}): Promise<TemplateManager> {
    const config = await loadConfigOrDefault(configPath);
    return new TemplateManager(config, options);
  }

  /**
   * List templates from every enabled entry, in priority order.
   * Entries that fail are logged and skipped; results are not deduplicated.
   */
  async listTemplates(projectType?: string): Promise<TemplateMetadata[]> {
    const templates: TemplateMetadata[] = [];

    for (const entry of this.registry.enabledEntries()) {
      let listed: TemplateMetadata[];
      try {
        listed = await listFromSource(this.adapters, entry.source);
      } catch (error) {
        this.logger.warn(
          `Failed to load templates from registry '${entry.name}': ${extractErrorMessage(error)}`,
          { entry: entry.name, source: entry.source.type }
        );
        continue;
      }

      for (const template of listed) {
        if (projectType === undefined || template.projectType === projectType) {
          templates.push(template);
        }
      }
    }

    return templates;
  }

  /**
   * Resolve a template to a directory on disk plus its metadata
   *
   * @throws TemplateNotFoundError when no enabled entry provides the template
   * @throws IntegrityError, TemplateProcessingError, ConfigurationError unchanged from the adapter
   */
  async resolve(projectType: string, templateName: string): Promise<ResolvedTemplate> {
    const key = cacheKey(projectType, templateName);

    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug('Template cache hit', { key, path: cached.resolvedPath });
      return {
        path: cached.resolvedPath,
        metadata: cached.metadata,
        source: cached.source,
        fromCache: true,
      };
    }

    const attempted: string[] = [];
    for (const entry of this.registry.enabledEntries()) {
      attempted.push(entry.name);
      this.logger.debug('Trying registry entry', { key, entry: entry.name, priority: entry.priority });

      const fetched = await this.tryEntry(entry, key, templateName);
      if (!fetched) {
        continue;
      }

      if (fetched.metadata.projectType !== projectType) {
        this.logger.warn(
          `Registry '${entry.name}' has template '${templateName}' for project type '${fetched.metadata.projectType}', not '${projectType}'`,
          { key, entry: entry.name }
        );
        continue;
      }

      const stored = this.cache.put(key, {
        metadata: fetched.metadata,
        resolvedPath: fetched.path,
        source: entry.name,
        cachedAt: this.cache.now(),
      });
      this.logger.info(`Resolved ${key} from registry '${entry.name}'`, { key, entry: entry.name, path: fetched.path });

      return { path: stored.resolvedPath, metadata: stored.metadata, source: stored.source, fromCache: false };
    }

    throw new TemplateNotFoundError(key, { attempted });
  }

  /**
   * One resolution attempt. Returns undefined when the entry cannot provide
   * the template and the next entry should be tried; rethrows errors that
   * must reach the caller.
   */
  private async tryEntry(
    entry: RegistryEntry,
    key: string,
    templateName: string
  ): Promise<FetchedTemplate | undefined> {
    try {
      return await fetchFromSource(this.adapters, entry.source, templateName);
    } catch (error) {
      if (isTemplateForgeError(error) && !(error instanceof SourceUnavailableError || error instanceof TemplateNotFoundError)) {
        throw error;
      }

      this.logger.warn(`Registry '${entry.name}' could not provide ${key}: ${extractErrorMessage(error)}`, {
        key,
        entry: entry.name,
        source: entry.source.type,
        code: isTemplateForgeError(error) ? error.code : 'UNKNOWN',
      });
      return undefined;
    }
  }

  /**
   * Drop one cached resolution
   */
  invalidate(projectType: string, templateName: string): boolean {
    return this.cache.delete(cacheKey(projectType, templateName));
  }

  clearCache(): void {
    this.cache.clear();
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  /**
   * Configured entries, disabled ones included, in configuration order
   */
  entries(): readonly RegistryEntry[] {
    return this.registry.entries;
  }
}
