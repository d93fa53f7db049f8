/**
 * JSON Parsing Utilities
 *
 * Descriptor and config files come from remote archives and repositories,
 * so parsed objects are stripped of prototype-polluting keys before use.
 */

import { readFile, writeFile, rename, rm } from 'fs/promises';
import { z } from 'zod';

const DANGEROUS_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

export type ParseResult<T> = { success: true; data: T } | { success: false; error: string };

/**
 * Recursively remove dangerous keys from parsed JSON
 */
export function sanitizeObject(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(item => sanitizeObject(item));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (DANGEROUS_KEYS.has(key)) {
      continue;
    }
    sanitized[key] = sanitizeObject(entry);
  }
  return sanitized;
}

/**
 * Freeze `value` and everything reachable from it, in place
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Parse JSON string and validate it against a Zod schema
 */
export function parseJson<T>(jsonString: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseResult<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(jsonString);
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    };
  }

  const result = schema.safeParse(sanitizeObject(raw));
  if (!result.success) {
    return { success: false, error: `Validation failed: ${formatZodError(result.error)}` };
  }
  return { success: true, data: result.data };
}

/**
 * Read a JSON file and validate it against a Zod schema
 */
export async function parseJsonFile<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<ParseResult<T>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : 'Failed to read file',
    };
  }
  return parseJson(content, schema);
}

/**
 * Write JSON through a temporary file so readers never see a partial document
 */
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  try {
    await writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf8');
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Flatten Zod issues into a single line: `path.to.field: message; ...`
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
