/**
 * Template registry types
 */

export type VariableType =
  | { kind: 'string' }
  | { kind: 'boolean' }
  | { kind: 'number' }
  | { kind: 'choice'; options: string[] };

export interface TemplateVariable {
  /** Substitution key */
  name: string;
  description: string;
  /** Ignored by consumers when `required` is true */
  default?: string;
  required: boolean;
  type: VariableType;
}

export interface TemplateMetadata {
  name: string;
  version: string;
  description: string;
  author: string;
  /** Project type this template scaffolds (vue, react, java, ...) */
  projectType: string;
  variables: TemplateVariable[];
  dependencies: string[];
  tags: string[];
}

export interface GitAuth {
  username?: string;
  token?: string;
}

export interface HttpAuth {
  bearerToken?: string;
  basicAuth?: {
    username: string;
    password: string;
  };
}

export interface LocalSource {
  type: 'local';
  path: string;
}

export interface GitSource {
  type: 'git';
  url: string;
  /** Defaults to the repository's default branch */
  branch?: string;
  /** Path inside the checkout used as the template root */
  subfolder?: string;
  auth?: GitAuth;
}

export interface HttpSource {
  type: 'http';
  url: string;
  /** `sha256:<hex>`, `sha512:<hex>`, bare sha256 hex, or an SRI string */
  checksum?: string;
  auth?: HttpAuth;
}

export interface PackageRegistrySource {
  type: 'npm';
  package: string;
  /** Exact version or dist-tag */
  version: string;
  /** Defaults to the public npm registry */
  registry?: string;
}

export type TemplateSource = LocalSource | GitSource | HttpSource | PackageRegistrySource;

export type TemplateSourceType = TemplateSource['type'];

export interface RegistryEntry {
  /** Unique within a configuration */
  name: string;
  source: TemplateSource;
  enabled: boolean;
  /** Lower number is tried first */
  priority: number;
}

export interface RegistryConfig {
  entries: readonly RegistryEntry[];
  /** Directory where remote sources are materialized */
  cacheDir: string;
  cacheTtlSeconds: number;
}

/**
 * A template materialized on disk by a source adapter
 */
export interface FetchedTemplate {
  path: string;
  metadata: TemplateMetadata;
}

/**
 * Result of a resolution handed to the rendering stage
 */
export interface ResolvedTemplate extends FetchedTemplate {
  /** Name of the registry entry that produced the template */
  source: string;
  fromCache: boolean;
}

export interface CacheEntry {
  readonly metadata: TemplateMetadata;
  readonly resolvedPath: string;
  /** Registry entry that produced this entry */
  readonly source: string;
  /** Epoch milliseconds */
  readonly cachedAt: number;
}

/**
 * Default value a consumer should offer for a variable
 */
export function effectiveDefault(variable: TemplateVariable): string | undefined {
  return variable.required ? undefined : variable.default;
}
