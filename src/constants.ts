/**
 * Application-wide constants
 */

/** Descriptor file every template directory carries */
export const TEMPLATE_DESCRIPTOR_FILE = 'template.json';

/** Default local template directory */
export const DEFAULT_TEMPLATES_DIR = './templates';

/** Default directory for materialized remote templates */
export const DEFAULT_CACHE_DIR = './.template_cache';

/** One hour */
export const DEFAULT_CACHE_TTL_SECONDS = 3600;

export const DEFAULT_NPM_REGISTRY = 'https://registry.npmjs.org';

/** Transport timeout for archive and packument downloads */
export const DEFAULT_HTTP_TIMEOUT_MS = 60_000;

/** Config file looked up in the working directory when none is given */
export const DEFAULT_CONFIG_FILE = 'template-forge.yaml';

/** Environment variable naming a config file */
export const CONFIG_ENV_VAR = 'TEMPLATE_FORGE_CONFIG';

// Cache sub-directories per source kind
export const CACHE_SUBDIRS = {
  GIT: 'git',
  HTTP: 'http',
  NPM: 'npm',
} as const;

/** Suffix of the marker file written beside an extracted archive, recording its verified digest */
export const INTEGRITY_MARKER_SUFFIX = '.integrity.json';
