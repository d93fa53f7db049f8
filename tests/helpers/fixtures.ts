import { mkdtemp, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { create } from 'tar';
import type { LogContext, Logger } from '../../src/utils/logger.js';

export async function makeTempDir(prefix = 'template-forge-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface DescriptorFields {
  name: string;
  projectType: string;
  version?: string;
  description?: string;
}

/**
 * Write `<dir>/template.json` plus one content file
 */
export async function writeTemplate(dir: string, fields: DescriptorFields): Promise<void> {
  await mkdir(dir, { recursive: true });
  await writeFile(
    join(dir, 'template.json'),
    JSON.stringify({
      name: fields.name,
      version: fields.version ?? '1.0.0',
      description: fields.description ?? '',
      project_type: fields.projectType,
    })
  );
  await writeFile(join(dir, 'README.md'), `# ${fields.name}\n`);
}

/**
 * Gzipped tarball of `entries` (paths relative to `cwd`)
 */
export async function packTarball(cwd: string, entries: string[]): Promise<Buffer> {
  const file = join(cwd, `.pack-${Date.now()}.tgz`);
  await create({ gzip: true, file, cwd }, entries);
  const data = await readFile(file);
  await rm(file, { force: true });
  return data;
}

export interface LogRecord {
  level: 'debug' | 'info' | 'warn';
  message: string;
  scope?: string;
  context?: LogContext;
}

/**
 * Logger that keeps every record for assertions; children share the records
 */
export class RecordingLogger implements Logger {
  constructor(
    readonly records: LogRecord[] = [],
    private readonly scope?: string
  ) {}

  debug(message: string, context?: LogContext): void {
    this.records.push({ level: 'debug', message, scope: this.scope, context });
  }

  info(message: string, context?: LogContext): void {
    this.records.push({ level: 'info', message, scope: this.scope, context });
  }

  warn(message: string, context?: LogContext): void {
    this.records.push({ level: 'warn', message, scope: this.scope, context });
  }

  child(scope: string): Logger {
    return new RecordingLogger(this.records, scope);
  }

  messages(level: LogRecord['level']): string[] {
    return this.records.filter(record => record.level === level).map(record => record.message);
  }
}
