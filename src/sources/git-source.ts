/**
 * Git repository source
 *
 * Repositories are shallow-cloned into `<cacheDir>/git/<hash>` where the hash
 * covers url, branch and subfolder. An existing checkout is refreshed with a
 * shallow fetch of the requested ref followed by a hard reset, so the served
 * tree always matches that ref.
 */

import { spawn } from 'child_process';
import { existsSync } from 'fs';
import { mkdir, rm, stat } from 'fs/promises';
import { join, relative, resolve, isAbsolute } from 'path';
import type { FetchedTemplate, GitAuth, GitSource, TemplateMetadata } from '../types/template.js';
import { SourceUnavailableError, TemplateNotFoundError, extractErrorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { cacheHash } from '../utils/integrity.js';
import { CACHE_SUBDIRS } from '../constants.js';
import type { AdapterOptions, SourceAdapter } from './types.js';
import { findInTemplateRoot, listTemplateRoot } from './template-root.js';
import { InFlight } from './in-flight.js';

export interface GitRunResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs git commands; replaced by a fake in tests
 */
export interface GitRunner {
  run(args: string[], options?: { cwd?: string }): Promise<GitRunResult>;
}

export class GitCommandError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(message);
    this.name = 'GitCommandError';
  }
}

/**
 * GitRunner backed by the `git` executable
 */
export class ProcessGitRunner implements GitRunner {
  run(args: string[], options: { cwd?: string } = {}): Promise<GitRunResult> {
    return new Promise((resolvePromise, reject) => {
      // SECURITY: array args, no shell; never prompt for credentials
      const proc = spawn('git', args, {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      });

      let stdout = '';
      let stderr = '';

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (error) => {
        reject(new GitCommandError(`Failed to start git: ${error.message}`, null, stderr));
      });

      proc.on('close', (code) => {
        if (code === 0) {
          resolvePromise({ stdout, stderr });
          return;
        }
        reject(new GitCommandError(`git ${args[0]} exited with code ${code}`, code, stderr));
      });
    });
  }
}

/**
 * Embed credentials into an http(s) clone URL. Other URL forms (ssh, local
 * paths) are returned unchanged.
 */
export function applyGitAuth(url: string, auth?: GitAuth): string {
  if (!auth || (!auth.username && !auth.token)) {
    return url;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return url;
  }

  if (auth.token) {
    parsed.username = encodeURIComponent(auth.username ?? 'x-access-token');
    parsed.password = encodeURIComponent(auth.token);
  } else if (auth.username) {
    parsed.username = encodeURIComponent(auth.username);
  }
  return parsed.toString();
}

/**
 * Strip credentials from text destined for logs or error messages
 */
export function redactCredentials(text: string, auth?: GitAuth): string {
  let redacted = text.replace(/(https?:\/\/)[^/@\s]+@/g, '$1***@');
  if (auth?.token) {
    redacted = redacted.split(auth.token).join('***');
  }
  return redacted;
}

export interface GitSourceAdapterOptions extends AdapterOptions {
  runner?: GitRunner;
}

export class GitSourceAdapter implements SourceAdapter<GitSource> {
  readonly kind = 'git';

  private readonly runner: GitRunner;
  private readonly cacheDir: string;
  private readonly logger: Logger;
  private readonly checkouts = new InFlight<void>();

  constructor(options: GitSourceAdapterOptions) {
    this.runner = options.runner ?? new ProcessGitRunner();
    this.cacheDir = options.cacheDir;
    this.logger = options.logger;
  }

  async fetchList(source: GitSource): Promise<TemplateMetadata[]> {
    const root = await this.materialize(source);
    return listTemplateRoot(root, this.logger);
  }

  async fetchOne(source: GitSource, templateName: string): Promise<FetchedTemplate> {
    const root = await this.materialize(source);
    return findInTemplateRoot(root, templateName);
  }

  /**
   * Deterministic checkout location for a source
   */
  checkoutPath(source: GitSource): string {
    return join(
      resolve(this.cacheDir),
      CACHE_SUBDIRS.GIT,
      cacheHash(source.url, source.branch, source.subfolder)
    );
  }

  /**
   * Clone or update the repository and return the template root.
   * Concurrent calls for the same checkout share one clone or update.
   */
  private async materialize(source: GitSource): Promise<string> {
    const checkoutDir = this.checkoutPath(source);

    await this.checkouts.run(checkoutDir, () =>
      existsSync(join(checkoutDir, '.git')) ? this.update(source, checkoutDir) : this.clone(source, checkoutDir)
    );

    return this.templateRoot(source, checkoutDir);
  }

  private async clone(source: GitSource, checkoutDir: string): Promise<void> {
    this.logger.debug('Cloning template repository', {
      url: redactCredentials(source.url, source.auth),
      branch: source.branch,
    });

    // A directory without .git is a leftover from an interrupted clone
    await rm(checkoutDir, { recursive: true, force: true });
    await mkdir(join(checkoutDir, '..'), { recursive: true });

    const args = ['clone', '--depth', '1', '--single-branch'];
    if (source.branch) {
      args.push('--branch', source.branch);
    }
    args.push(applyGitAuth(source.url, source.auth), checkoutDir);

    try {
      await this.runner.run(args);
      // Keep credentials out of .git/config
      await this.runner.run(['remote', 'set-url', 'origin', source.url], { cwd: checkoutDir });
    } catch (error) {
      await rm(checkoutDir, { recursive: true, force: true });
      throw this.unavailable('clone', source, error);
    }
  }

  private async update(source: GitSource, checkoutDir: string): Promise<void> {
    this.logger.debug('Updating template repository', {
      url: redactCredentials(source.url, source.auth),
      branch: source.branch,
    });

    try {
      await this.runner.run(
        ['fetch', '--depth', '1', applyGitAuth(source.url, source.auth), source.branch ?? 'HEAD'],
        { cwd: checkoutDir }
      );
      await this.runner.run(['reset', '--hard', 'FETCH_HEAD'], { cwd: checkoutDir });
    } catch (error) {
      throw this.unavailable('fetch', source, error);
    }
  }

  private async templateRoot(source: GitSource, checkoutDir: string): Promise<string> {
    if (!source.subfolder) {
      return checkoutDir;
    }

    const root = resolve(checkoutDir, source.subfolder);
    const rel = relative(checkoutDir, root);
    const escapes = rel.startsWith('..') || isAbsolute(rel);

    let exists = false;
    if (!escapes) {
      try {
        exists = (await stat(root)).isDirectory();
      } catch {
        exists = false;
      }
    }

    if (!exists) {
      throw new TemplateNotFoundError(`${redactCredentials(source.url, source.auth)}#${source.subfolder}`, {
        subfolder: source.subfolder,
      });
    }
    return root;
  }

  private unavailable(operation: string, source: GitSource, error: unknown): SourceUnavailableError {
    const stderr = error instanceof GitCommandError ? error.stderr.trim() : '';
    const detail = redactCredentials(stderr || extractErrorMessage(error), source.auth);
    return new SourceUnavailableError(
      `git ${operation} failed for ${redactCredentials(source.url, source.auth)}: ${detail}`,
      { url: redactCredentials(source.url, source.auth), branch: source.branch }
    );
  }
}
