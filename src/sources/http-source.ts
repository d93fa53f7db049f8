/**
 * HTTP archive source
 *
 * Downloads a tarball, verifies it against the configured checksum and
 * extracts it into `<cacheDir>/http/<hash(url, checksum)>`. With a checksum,
 * an extraction whose marker records the same digest is reused; without one,
 * every fetch downloads again.
 */

import { join, resolve } from 'path';
import type { FetchedTemplate, HttpSource, TemplateMetadata } from '../types/template.js';
import { ConfigurationError } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { cacheHash, digest, formatDigest, parseChecksum } from '../utils/integrity.js';
import { CACHE_SUBDIRS } from '../constants.js';
import type { AdapterOptions, HttpTransportOptions, SourceAdapter } from './types.js';
import { HttpTransport, authHeaders } from './transport.js';
import { extractArchive, readIntegrityMarker, verifyDigest } from './archive.js';
import { findInTemplateRoot, listTemplateRoot } from './template-root.js';
import { InFlight } from './in-flight.js';

export type HttpSourceAdapterOptions = AdapterOptions & HttpTransportOptions;

export class HttpSourceAdapter implements SourceAdapter<HttpSource> {
  readonly kind = 'http';

  private readonly transport: HttpTransport;
  private readonly cacheDir: string;
  private readonly logger: Logger;
  private readonly extractions = new InFlight<string>();

  constructor(options: HttpSourceAdapterOptions) {
    this.transport = new HttpTransport(options);
    this.cacheDir = options.cacheDir;
    this.logger = options.logger;
  }

  async fetchList(source: HttpSource): Promise<TemplateMetadata[]> {
    const root = await this.materialize(source);
    return listTemplateRoot(root, this.logger);
  }

  async fetchOne(source: HttpSource, templateName: string): Promise<FetchedTemplate> {
    const root = await this.materialize(source);
    return findInTemplateRoot(root, templateName);
  }

  extractPath(source: HttpSource): string {
    return join(resolve(this.cacheDir), CACHE_SUBDIRS.HTTP, cacheHash(source.url, source.checksum));
  }

  private materialize(source: HttpSource): Promise<string> {
    const targetDir = this.extractPath(source);
    return this.extractions.run(targetDir, () => this.download(source, targetDir));
  }

  private async download(source: HttpSource, targetDir: string): Promise<string> {
    const expected = source.checksum === undefined ? null : parseChecksum(source.checksum);

    if (source.checksum !== undefined && expected === null) {
      throw new ConfigurationError(`Unsupported checksum format for ${source.url}`, { url: source.url });
    }

    if (expected && (await readIntegrityMarker(targetDir)) === formatDigest(expected)) {
      this.logger.debug('Reusing extracted archive', { url: source.url, path: targetDir });
      return targetDir;
    }

    this.logger.debug('Downloading template archive', { url: source.url });
    const data = await this.transport.getBuffer(source.url, authHeaders(source.auth));

    // Verify before anything touches the cache directory
    if (expected) {
      verifyDigest(data, expected, source.url);
    }

    const recorded = expected ? formatDigest(expected) : `sha256:${digest(data, 'sha256')}`;
    await extractArchive(data, targetDir, recorded, source.url, { collapseSingleRoot: true });
    return targetDir;
  }
}
