/**
 * Package registry (npm) source
 *
 * Resolves `package@version` (exact version or dist-tag) against the
 * registry's packument, then downloads, verifies and extracts the tarball.
 * The tarball's leading `package/` directory is stripped, so the package root
 * is the template root.
 */

import { join, resolve } from 'path';
import { z } from 'zod';
import type { FetchedTemplate, PackageRegistrySource, TemplateMetadata } from '../types/template.js';
import { SourceUnavailableError, TemplateNotFoundError } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { formatZodError, sanitizeObject } from '../utils/json-utils.js';
import { cacheHash, formatDigest, parseChecksum, type ExpectedDigest } from '../utils/integrity.js';
import { CACHE_SUBDIRS, DEFAULT_NPM_REGISTRY } from '../constants.js';
import type { AdapterOptions, HttpTransportOptions, SourceAdapter } from './types.js';
import { HttpStatusError, HttpTransport } from './transport.js';
import { extractArchive, readIntegrityMarker, verifyDigest } from './archive.js';
import { findInTemplateRoot, listTemplateRoot } from './template-root.js';
import { InFlight } from './in-flight.js';

const PackumentSchema = z.object({
  'dist-tags': z.record(z.string()).default({}),
  versions: z
    .record(
      z.object({
        version: z.string(),
        dist: z.object({
          tarball: z.string().url(),
          integrity: z.string().optional(),
          shasum: z.string().optional(),
        }),
      })
    )
    .default({}),
});

export type Packument = z.infer<typeof PackumentSchema>;

export interface ResolvedPackage {
  version: string;
  tarball: string;
  expected: ExpectedDigest | null;
}

/**
 * Registry URL path for a package name (`@scope/name` → `@scope%2Fname`)
 */
export function encodePackageName(name: string): string {
  return name.startsWith('@') ? `@${encodeURIComponent(name.slice(1))}` : encodeURIComponent(name);
}

/**
 * Strongest digest the registry published for a version
 */
function expectedDigest(dist: { integrity?: string; shasum?: string }): ExpectedDigest | null {
  if (dist.integrity) {
    // SRI strings may list several hashes separated by whitespace
    const candidates = dist.integrity
      .split(/\s+/)
      .map(part => parseChecksum(part))
      .filter((parsed): parsed is ExpectedDigest => parsed !== null);
    const strongest =
      candidates.find(c => c.algorithm === 'sha512') ??
      candidates.find(c => c.algorithm === 'sha256') ??
      candidates[0];
    if (strongest) {
      return strongest;
    }
  }
  if (dist.shasum) {
    return parseChecksum(`sha1:${dist.shasum}`);
  }
  return null;
}

/**
 * Record lookup that ignores inherited keys such as `constructor`
 */
function ownValue<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Pick the version a request refers to: an exact version wins over a dist-tag
 */
export function resolvePackageVersion(
  packument: Packument,
  packageName: string,
  requested: string
): ResolvedPackage {
  const version = ownValue(packument.versions, requested) ? requested : ownValue(packument['dist-tags'], requested);
  const manifest = version === undefined ? undefined : ownValue(packument.versions, version);

  if (version === undefined || manifest === undefined) {
    throw new TemplateNotFoundError(`${packageName}@${requested}`, { package: packageName, version: requested });
  }

  return {
    version,
    tarball: manifest.dist.tarball,
    expected: expectedDigest(manifest.dist),
  };
}

export type PackageRegistrySourceAdapterOptions = AdapterOptions & HttpTransportOptions;

export class PackageRegistrySourceAdapter implements SourceAdapter<PackageRegistrySource> {
  readonly kind = 'npm';

  private readonly transport: HttpTransport;
  private readonly cacheDir: string;
  private readonly logger: Logger;
  private readonly extractions = new InFlight<string>();

  constructor(options: PackageRegistrySourceAdapterOptions) {
    this.transport = new HttpTransport(options);
    this.cacheDir = options.cacheDir;
    this.logger = options.logger;
  }

  async fetchList(source: PackageRegistrySource): Promise<TemplateMetadata[]> {
    const root = await this.materialize(source);
    return listTemplateRoot(root, this.logger);
  }

  async fetchOne(source: PackageRegistrySource, templateName: string): Promise<FetchedTemplate> {
    const root = await this.materialize(source);
    return findInTemplateRoot(root, templateName);
  }

  private registryUrl(source: PackageRegistrySource): string {
    return (source.registry ?? DEFAULT_NPM_REGISTRY).replace(/\/+$/, '');
  }

  async fetchPackument(source: PackageRegistrySource): Promise<Packument> {
    const url = `${this.registryUrl(source)}/${encodePackageName(source.package)}`;

    let raw: unknown;
    try {
      raw = await this.transport.getJson(url);
    } catch (error) {
      if (error instanceof HttpStatusError && error.status === 404) {
        throw new TemplateNotFoundError(`${source.package}@${source.version}`, { registry: url }, error);
      }
      throw error;
    }

    const result = PackumentSchema.safeParse(sanitizeObject(raw));
    if (!result.success) {
      throw new SourceUnavailableError(`Malformed package metadata from ${url}: ${formatZodError(result.error)}`, {
        url,
      });
    }
    return result.data;
  }

  private async materialize(source: PackageRegistrySource): Promise<string> {
    const registry = this.registryUrl(source);
    const packument = await this.fetchPackument(source);
    const resolved = resolvePackageVersion(packument, source.package, source.version);
    const origin = `${source.package}@${resolved.version}`;

    const targetDir = join(
      resolve(this.cacheDir),
      CACHE_SUBDIRS.NPM,
      cacheHash(source.package, resolved.version, registry)
    );

    return this.extractions.run(targetDir, () => this.download(resolved, origin, targetDir));
  }

  private async download(resolved: ResolvedPackage, origin: string, targetDir: string): Promise<string> {
    if (resolved.expected && (await readIntegrityMarker(targetDir)) === formatDigest(resolved.expected)) {
      this.logger.debug('Reusing extracted package', { package: origin, path: targetDir });
      return targetDir;
    }

    this.logger.debug('Downloading template package', { package: origin, tarball: resolved.tarball });
    const data = await this.transport.getBuffer(resolved.tarball);

    if (resolved.expected) {
      verifyDigest(data, resolved.expected, origin);
    }

    const recorded = resolved.expected ? formatDigest(resolved.expected) : `unverified:${resolved.version}`;
    await extractArchive(data, targetDir, recorded, origin, { strip: 1 });
    return targetDir;
  }
}
