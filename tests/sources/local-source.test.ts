import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { LocalSourceAdapter } from '../../src/sources/local-source.js';
import { SourceUnavailableError, TemplateNotFoundError, TemplateProcessingError } from '../../src/errors.js';
import { RecordingLogger, makeTempDir, removeDir, writeTemplate } from '../helpers/fixtures.js';

describe('LocalSourceAdapter', () => {
  let root: string;
  let logger: RecordingLogger;
  let adapter: LocalSourceAdapter;

  beforeEach(async () => {
    root = await makeTempDir();
    logger = new RecordingLogger();
    adapter = new LocalSourceAdapter(logger);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('fetchList', () => {
    it('should list templates in directory-name order', async () => {
      await writeTemplate(join(root, 'zeta'), { name: 'zeta', projectType: 'vue' });
      await writeTemplate(join(root, 'alpha'), { name: 'alpha', projectType: 'react' });

      const templates = await adapter.fetchList({ type: 'local', path: root });

      expect(templates.map(t => t.name)).toEqual(['alpha', 'zeta']);
    });

    it('should ignore files, hidden directories and directories without a descriptor', async () => {
      await writeTemplate(join(root, 'basic'), { name: 'basic', projectType: 'vue' });
      await writeTemplate(join(root, '.hidden'), { name: 'hidden', projectType: 'vue' });
      await mkdir(join(root, 'assets'));
      await writeFile(join(root, 'notes.txt'), 'not a template');

      const templates = await adapter.fetchList({ type: 'local', path: root });

      expect(templates.map(t => t.name)).toEqual(['basic']);
    });

    it('should skip a broken descriptor with a warning', async () => {
      await writeTemplate(join(root, 'good'), { name: 'good', projectType: 'vue' });
      await mkdir(join(root, 'broken'));
      await writeFile(join(root, 'broken', 'template.json'), '{ not json');

      const templates = await adapter.fetchList({ type: 'local', path: root });

      expect(templates.map(t => t.name)).toEqual(['good']);
      expect(logger.messages('warn')).toHaveLength(1);
      expect(logger.messages('warn')[0]).toMatch(/^Skipping template "broken": Invalid template descriptor /);
    });

    it('should treat a root with its own descriptor as a single template', async () => {
      await writeTemplate(root, { name: 'solo', projectType: 'java' });
      await writeTemplate(join(root, 'nested'), { name: 'nested', projectType: 'java' });

      const templates = await adapter.fetchList({ type: 'local', path: root });

      expect(templates.map(t => t.name)).toEqual(['solo']);
    });

    it('should fail with SourceUnavailable for a missing root', async () => {
      await expect(adapter.fetchList({ type: 'local', path: join(root, 'missing') })).rejects.toBeInstanceOf(
        SourceUnavailableError
      );
    });

    it('should fail with SourceUnavailable when the root is a file', async () => {
      const file = join(root, 'file.txt');
      await writeFile(file, '');

      await expect(adapter.fetchList({ type: 'local', path: file })).rejects.toThrow(
        `Template directory does not exist or is not a directory: ${file}`
      );
    });
  });

  describe('fetchOne', () => {
    it('should return the template directory and its metadata', async () => {
      await writeTemplate(join(root, 'basic'), { name: 'basic', projectType: 'vue', description: 'Starter' });

      const fetched = await adapter.fetchOne({ type: 'local', path: root }, 'basic');

      expect(fetched.path).toBe(join(root, 'basic'));
      expect(fetched.metadata).toEqual({
        name: 'basic',
        version: '1.0.0',
        description: 'Starter',
        author: '',
        projectType: 'vue',
        variables: [],
        dependencies: [],
        tags: [],
      });
    });

    it('should match a single-template root by name', async () => {
      await writeTemplate(root, { name: 'solo', projectType: 'java' });

      const fetched = await adapter.fetchOne({ type: 'local', path: root }, 'solo');
      expect(fetched.path).toBe(root);

      await expect(adapter.fetchOne({ type: 'local', path: root }, 'other')).rejects.toBeInstanceOf(
        TemplateNotFoundError
      );
    });

    it('should report a missing template as not found', async () => {
      await expect(adapter.fetchOne({ type: 'local', path: root }, 'missing')).rejects.toThrow(
        'Template not found: missing'
      );
    });

    it('should not follow names that leave the root', async () => {
      await writeTemplate(join(root, 'inner', 'basic'), { name: 'basic', projectType: 'vue' });

      await expect(adapter.fetchOne({ type: 'local', path: join(root, 'inner') }, '..')).rejects.toBeInstanceOf(
        TemplateNotFoundError
      );
      await expect(adapter.fetchOne({ type: 'local', path: root }, 'inner/basic')).rejects.toBeInstanceOf(
        TemplateNotFoundError
      );
    });

    it('should report an empty name as not found instead of reading the root', async () => {
      await writeTemplate(join(root, 'basic'), { name: 'basic', projectType: 'vue' });

      await expect(adapter.fetchOne({ type: 'local', path: root }, '')).rejects.toBeInstanceOf(TemplateNotFoundError);
    });

    it('should fail with TemplateProcessing when the descriptor is missing', async () => {
      await mkdir(join(root, 'bare'));

      await expect(adapter.fetchOne({ type: 'local', path: root }, 'bare')).rejects.toBeInstanceOf(
        TemplateProcessingError
      );
    });

    it('should fail with TemplateProcessing when required fields are missing', async () => {
      await mkdir(join(root, 'partial'));
      await writeFile(join(root, 'partial', 'template.json'), JSON.stringify({ name: 'partial', version: '1.0.0' }));

      await expect(adapter.fetchOne({ type: 'local', path: root }, 'partial')).rejects.toThrow(
        `Invalid template descriptor ${join(root, 'partial', 'template.json')}: Validation failed: projectType: Required`
      );
    });
  });
});
