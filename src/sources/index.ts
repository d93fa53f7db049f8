/**
 * Source adapters and variant dispatch
 */

import type { FetchedTemplate, TemplateMetadata, TemplateSource } from '../types/template.js';
import type { AdapterOptions, HttpTransportOptions, SourceAdapters } from './types.js';
import { LocalSourceAdapter } from './local-source.js';
import { GitSourceAdapter, type GitRunner } from './git-source.js';
import { HttpSourceAdapter } from './http-source.js';
import { PackageRegistrySourceAdapter } from './package-registry-source.js';

export type CreateSourceAdaptersOptions = AdapterOptions &
  HttpTransportOptions & {
    gitRunner?: GitRunner;
  };

export function createSourceAdapters(options: CreateSourceAdaptersOptions): SourceAdapters {
  const { logger } = options;
  return {
    local: new LocalSourceAdapter(logger.child('local')),
    git: new GitSourceAdapter({ ...options, logger: logger.child('git'), runner: options.gitRunner }),
    http: new HttpSourceAdapter({ ...options, logger: logger.child('http') }),
    npm: new PackageRegistrySourceAdapter({ ...options, logger: logger.child('npm') }),
  };
}

export function listFromSource(adapters: SourceAdapters, source: TemplateSource): Promise<TemplateMetadata[]> {
  switch (source.type) {
    case 'local':
      return adapters.local.fetchList(source);
    case 'git':
      return adapters.git.fetchList(source);
    case 'http':
      return adapters.http.fetchList(source);
    case 'npm':
      return adapters.npm.fetchList(source);
  }
}

export function fetchFromSource(
  adapters: SourceAdapters,
  source: TemplateSource,
  templateName: string
): Promise<FetchedTemplate> {
  switch (source.type) {
    case 'local':
      return adapters.local.fetchOne(source, templateName);
    case 'git':
      return adapters.git.fetchOne(source, templateName);
    case 'http':
      return adapters.http.fetchOne(source, templateName);
    case 'npm':
      return adapters.npm.fetchOne(source, templateName);
  }
}

export type { SourceAdapter, SourceAdapters, FetchFn } from './types.js';
export { LocalSourceAdapter } from './local-source.js';
export { GitSourceAdapter, ProcessGitRunner, GitCommandError, applyGitAuth, redactCredentials } from './git-source.js';
export type { GitRunner, GitRunResult } from './git-source.js';
export { HttpSourceAdapter } from './http-source.js';
export { PackageRegistrySourceAdapter, encodePackageName, resolvePackageVersion } from './package-registry-source.js';
