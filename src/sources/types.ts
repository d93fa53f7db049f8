/**
 * Source adapter contract
 */

import type {
  FetchedTemplate,
  TemplateMetadata,
  TemplateSource,
  TemplateSourceType,
} from '../types/template.js';
import type { Logger } from '../utils/logger.js';

/**
 * Materializes templates from one kind of source
 */
export interface SourceAdapter<S extends TemplateSource = TemplateSource> {
  readonly kind: S['type'];

  /** Metadata of every template the source provides */
  fetchList(source: S): Promise<TemplateMetadata[]>;

  /** Materialize one template on disk */
  fetchOne(source: S, templateName: string): Promise<FetchedTemplate>;
}

export type SourceOf<K extends TemplateSourceType> = Extract<TemplateSource, { type: K }>;

export type SourceAdapters = {
  [K in TemplateSourceType]: SourceAdapter<SourceOf<K>>;
};

export type FetchFn = typeof fetch;

export interface AdapterOptions {
  /** Root of the on-disk cache for remote sources */
  cacheDir: string;
  logger: Logger;
}

export interface HttpTransportOptions {
  fetch?: FetchFn;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}
