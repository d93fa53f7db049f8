/**
 * Template root scanning
 *
 * A materialized root is either a single template (template.json at its top
 * level) or a collection whose immediate subdirectories are templates.
 */

import { readdir, stat } from 'fs/promises';
import { basename, join } from 'path';
import { TemplateMetadataSchema } from '../schemas/registry-schemas.js';
import type { FetchedTemplate, TemplateMetadata } from '../types/template.js';
import {
  SourceUnavailableError,
  TemplateNotFoundError,
  TemplateProcessingError,
  extractErrorMessage,
} from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { parseJsonFile } from '../utils/json-utils.js';
import { TEMPLATE_DESCRIPTOR_FILE } from '../constants.js';

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export function hasDescriptor(dir: string): Promise<boolean> {
  return isFile(join(dir, TEMPLATE_DESCRIPTOR_FILE));
}

/**
 * Fail with SourceUnavailable unless `dir` is an existing directory
 */
export async function ensureDirectory(dir: string, context: Record<string, unknown> = {}): Promise<void> {
  if (!(await isDirectory(dir))) {
    throw new SourceUnavailableError(`Template directory does not exist or is not a directory: ${dir}`, {
      ...context,
      path: dir,
    });
  }
}

/**
 * Read and validate the descriptor of a template directory
 */
export async function readTemplateMetadata(templateDir: string): Promise<TemplateMetadata> {
  const descriptorPath = join(templateDir, TEMPLATE_DESCRIPTOR_FILE);
  const result = await parseJsonFile(descriptorPath, TemplateMetadataSchema);

  if (!result.success) {
    throw new TemplateProcessingError(`Invalid template descriptor ${descriptorPath}: ${result.error}`, {
      path: descriptorPath,
    });
  }
  return result.data;
}

/**
 * List the templates under a root, in directory-name order.
 * Subdirectories with a broken descriptor are logged and skipped.
 */
export async function listTemplateRoot(root: string, logger: Logger): Promise<TemplateMetadata[]> {
  if (await hasDescriptor(root)) {
    return [await readTemplateMetadata(root)];
  }

  const dirents = await readdir(root, { withFileTypes: true });
  const names = dirents
    .filter(dirent => dirent.isDirectory() && !dirent.name.startsWith('.'))
    .map(dirent => dirent.name)
    .sort();

  const templates: TemplateMetadata[] = [];
  for (const name of names) {
    const templateDir = join(root, name);
    if (!(await hasDescriptor(templateDir))) {
      continue;
    }

    try {
      templates.push(await readTemplateMetadata(templateDir));
    } catch (error) {
      logger.warn(`Skipping template "${name}": ${extractErrorMessage(error)}`, { root });
    }
  }
  return templates;
}

/**
 * Locate one template under a root
 */
export async function findInTemplateRoot(root: string, templateName: string): Promise<FetchedTemplate> {
  if (await hasDescriptor(root)) {
    const metadata = await readTemplateMetadata(root);
    if (metadata.name === templateName) {
      return { path: root, metadata };
    }
    throw new TemplateNotFoundError(templateName, { root });
  }

  // Template names are single path segments
  if (templateName === '' || templateName !== basename(templateName) || templateName === '..' || templateName === '.') {
    throw new TemplateNotFoundError(templateName, { root });
  }

  const templateDir = join(root, templateName);
  if (!(await isDirectory(templateDir))) {
    throw new TemplateNotFoundError(templateName, { root });
  }

  return { path: templateDir, metadata: await readTemplateMetadata(templateDir) };
}
