/**
 * Registry Configuration Loader
 * Loads registry configuration from YAML or JSON files with Zod validation
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { dirname, extname, isAbsolute, resolve } from 'path';
import yaml from 'js-yaml';
import { RegistryConfigSchema } from '../schemas/registry-schemas.js';
import type { RegistryConfig, RegistryEntry, TemplateSource } from '../types/template.js';
import { ConfigurationError, extractErrorMessage } from '../errors.js';
import { deepFreeze, formatZodError, sanitizeObject } from './json-utils.js';
import {
  CONFIG_ENV_VAR,
  DEFAULT_CACHE_DIR,
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_CONFIG_FILE,
  DEFAULT_TEMPLATES_DIR,
} from '../constants.js';

const SUPPORTED_EXTENSIONS = ['.yaml', '.yml', '.json'];

function resolveFrom(baseDir: string, target: string): string {
  return isAbsolute(target) ? target : resolve(baseDir, target);
}

function resolveSourcePaths(source: TemplateSource, baseDir: string): TemplateSource {
  if (source.type === 'local') {
    return { ...source, path: resolveFrom(baseDir, source.path) };
  }
  return source;
}

/**
 * Configuration used when no file is supplied: one local entry at ./templates
 */
export function defaultRegistryConfig(): RegistryConfig {
  const config: RegistryConfig = {
    entries: [
      {
        name: 'local',
        source: { type: 'local', path: DEFAULT_TEMPLATES_DIR },
        enabled: true,
        priority: 0,
      },
    ],
    cacheDir: DEFAULT_CACHE_DIR,
    cacheTtlSeconds: DEFAULT_CACHE_TTL_SECONDS,
  };
  return deepFreeze(config);
}

/**
 * Validate a raw configuration object.
 *
 * When `baseDir` is given, relative `cacheDir` and local source paths are
 * resolved against it. The returned config is deeply frozen.
 */
export function parseRegistryConfig(raw: unknown, baseDir?: string): RegistryConfig {
  const result = RegistryConfigSchema.safeParse(sanitizeObject(raw ?? {}));
  if (!result.success) {
    throw new ConfigurationError(`Invalid registry configuration: ${formatZodError(result.error)}`, {
      issues: result.error.issues.map(issue => issue.message),
    });
  }

  const config = result.data;
  if (baseDir === undefined) {
    return deepFreeze(config);
  }

  const entries: RegistryEntry[] = config.entries.map(entry => ({
    ...entry,
    source: resolveSourcePaths(entry.source, baseDir),
  }));

  return deepFreeze({
    entries,
    cacheDir: resolveFrom(baseDir, config.cacheDir),
    cacheTtlSeconds: config.cacheTtlSeconds,
  });
}

/**
 * Load a registry configuration file (.yaml, .yml or .json)
 */
export async function loadRegistryConfig(filePath: string): Promise<RegistryConfig> {
  const ext = extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(ext)) {
    throw new ConfigurationError(
      `Invalid config filename: ${filePath}. Only .yaml, .yml and .json files are supported.`,
      { filePath }
    );
  }

  let contents: string;
  try {
    contents = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read config file ${filePath}: ${extractErrorMessage(error)}`,
      { filePath },
      error
    );
  }

  let raw: unknown;
  try {
    raw = ext === '.json' ? JSON.parse(contents) : yaml.load(contents);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse config file ${filePath}: ${extractErrorMessage(error)}`,
      { filePath },
      error
    );
  }

  return parseRegistryConfig(raw, dirname(resolve(filePath)));
}

/**
 * Pick the config file to load: explicit path, then $TEMPLATE_FORGE_CONFIG,
 * then ./template-forge.yaml when it exists. Undefined means "use defaults".
 */
export function resolveConfigPath(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string | undefined {
  if (explicitPath) {
    return resolve(cwd, explicitPath);
  }

  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return resolve(cwd, fromEnv);
  }

  const candidate = resolve(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(candidate) ? candidate : undefined;
}

export async function loadConfigOrDefault(explicitPath?: string): Promise<RegistryConfig> {
  const configPath = resolveConfigPath(explicitPath);
  return configPath ? loadRegistryConfig(configPath) : defaultRegistryConfig();
}
