/**
 * Local filesystem source
 */

import { resolve } from 'path';
import type { FetchedTemplate, LocalSource, TemplateMetadata } from '../types/template.js';
import type { Logger } from '../utils/logger.js';
import type { SourceAdapter } from './types.js';
import { ensureDirectory, findInTemplateRoot, listTemplateRoot } from './template-root.js';

export class LocalSourceAdapter implements SourceAdapter<LocalSource> {
  readonly kind = 'local';

  constructor(private readonly logger: Logger) {}

  async fetchList(source: LocalSource): Promise<TemplateMetadata[]> {
    const root = resolve(source.path);
    await ensureDirectory(root, { source: 'local' });
    return listTemplateRoot(root, this.logger);
  }

  async fetchOne(source: LocalSource, templateName: string): Promise<FetchedTemplate> {
    const root = resolve(source.path);
    await ensureDirectory(root, { source: 'local' });
    return findInTemplateRoot(root, templateName);
  }
}
