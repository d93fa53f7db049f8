/**
 * Archive extraction into the template cache
 *
 * Archives are unpacked into a temporary sibling directory and renamed into
 * place, so a reader never sees a half-extracted tree. A marker file beside
 * the directory records the digest the content was verified against.
 */

import { randomBytes } from 'crypto';
import { existsSync } from 'fs';
import { mkdir, readdir, rename, rm, stat, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { extract } from 'tar';
import { z } from 'zod';
import { IntegrityError, SourceUnavailableError, extractErrorMessage } from '../errors.js';
import { digest, formatDigest, type ExpectedDigest } from '../utils/integrity.js';
import { parseJsonFile, writeJsonFileAtomic } from '../utils/json-utils.js';
import { INTEGRITY_MARKER_SUFFIX } from '../constants.js';

const IntegrityMarkerSchema = z.object({
  digest: z.string(),
  origin: z.string(),
  extractedAt: z.string(),
});

export interface ExtractOptions {
  /** Leading path components to drop, as with `tar --strip-components` */
  strip?: number;
  /** Use the only top-level directory of the archive as the root */
  collapseSingleRoot?: boolean;
}

function markerPath(targetDir: string): string {
  return `${targetDir}${INTEGRITY_MARKER_SUFFIX}`;
}

function tempSibling(targetDir: string, label: string): string {
  return `${targetDir}.${label}-${randomBytes(4).toString('hex')}`;
}

/**
 * Throw IntegrityError unless `data` matches `expected`
 */
export function verifyDigest(data: Uint8Array, expected: ExpectedDigest, origin: string): void {
  const actual = digest(data, expected.algorithm);
  if (actual !== expected.hex) {
    throw new IntegrityError(
      `Checksum mismatch for ${origin}`,
      formatDigest(expected),
      `${expected.algorithm}:${actual}`,
      { origin }
    );
  }
}

/**
 * Digest recorded for an already extracted directory, if any
 */
export async function readIntegrityMarker(targetDir: string): Promise<string | undefined> {
  if (!existsSync(targetDir)) {
    return undefined;
  }
  const result = await parseJsonFile(markerPath(targetDir), IntegrityMarkerSchema);
  return result.success ? result.data.digest : undefined;
}

async function writeIntegrityMarker(targetDir: string, recordedDigest: string, origin: string): Promise<void> {
  await writeJsonFileAtomic(markerPath(targetDir), {
    digest: recordedDigest,
    origin,
    extractedAt: new Date().toISOString(),
  });
}

async function singleRootDir(dir: string): Promise<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  if (entries.length === 1 && entries[0].isDirectory()) {
    return join(dir, entries[0].name);
  }
  return dir;
}

/**
 * Extract a tarball (gzip or plain) into `targetDir`, replacing any previous
 * content, and record `recordedDigest` in the marker file.
 */
export async function extractArchive(
  data: Buffer,
  targetDir: string,
  recordedDigest: string,
  origin: string,
  options: ExtractOptions = {}
): Promise<void> {
  await mkdir(dirname(targetDir), { recursive: true });

  const archiveFile = tempSibling(targetDir, 'download');
  const stagingDir = tempSibling(targetDir, 'staging');
  const retiredDir = tempSibling(targetDir, 'retired');

  try {
    await writeFile(archiveFile, data);
    await mkdir(stagingDir, { recursive: true });

    try {
      await extract({ file: archiveFile, cwd: stagingDir, strip: options.strip ?? 0, strict: true });
    } catch (error) {
      throw new SourceUnavailableError(
        `Failed to extract archive from ${origin}: ${extractErrorMessage(error)}`,
        { origin },
        error
      );
    }

    const contentRoot = options.collapseSingleRoot ? await singleRootDir(stagingDir) : stagingDir;
    if (!(await stat(contentRoot)).isDirectory()) {
      throw new SourceUnavailableError(`Archive from ${origin} has no content`, { origin });
    }

    // Swap by rename so the target path is never a partially deleted tree
    await rm(markerPath(targetDir), { force: true });
    if (existsSync(targetDir)) {
      await rename(targetDir, retiredDir);
    }
    await rename(contentRoot, targetDir);
    await writeIntegrityMarker(targetDir, recordedDigest, origin);
  } finally {
    await rm(archiveFile, { force: true });
    await rm(stagingDir, { recursive: true, force: true });
    await rm(retiredDir, { recursive: true, force: true });
  }
}
