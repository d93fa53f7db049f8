import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import {
  defaultRegistryConfig,
  loadRegistryConfig,
  parseRegistryConfig,
  resolveConfigPath,
} from '../../src/utils/config-loader.js';
import { ConfigurationError } from '../../src/errors.js';
import { makeTempDir, removeDir } from '../helpers/fixtures.js';

describe('config-loader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('defaultRegistryConfig', () => {
    it('should provide one local entry and the default cache settings', () => {
      const config = defaultRegistryConfig();

      expect(config).toEqual({
        entries: [{ name: 'local', source: { type: 'local', path: './templates' }, enabled: true, priority: 0 }],
        cacheDir: './.template_cache',
        cacheTtlSeconds: 3600,
      });
      expect(Object.isFrozen(config.entries[0])).toBe(true);
    });
  });

  describe('parseRegistryConfig', () => {
    it('should accept the snake_case file format', () => {
      const config = parseRegistryConfig({
        cache_dir: '/var/cache/templates',
        cache_ttl: 600,
        registries: [
          { name: 'local', source: { type: 'local', path: '/srv/templates' } },
          { name: 'remote', source: { type: 'git', url: 'https://example.test/t.git' }, priority: 5, enabled: false },
        ],
      });

      expect(config.cacheDir).toBe('/var/cache/templates');
      expect(config.cacheTtlSeconds).toBe(600);
      expect(config.entries).toEqual([
        { name: 'local', source: { type: 'local', path: '/srv/templates' }, enabled: true, priority: 0 },
        { name: 'remote', source: { type: 'git', url: 'https://example.test/t.git' }, enabled: false, priority: 5 },
      ]);
    });

    it('should fill defaults for an empty document', () => {
      expect(parseRegistryConfig(undefined)).toEqual({
        entries: [],
        cacheDir: './.template_cache',
        cacheTtlSeconds: 3600,
      });
    });

    it('should resolve relative paths against the base directory', () => {
      const config = parseRegistryConfig(
        { cacheDir: 'cache', registries: [{ name: 'local', source: { type: 'local', path: 'templates' } }] },
        '/srv/project'
      );

      expect(config.cacheDir).toBe('/srv/project/cache');
      expect(config.entries[0].source).toEqual({ type: 'local', path: '/srv/project/templates' });
    });

    it('should reject duplicate registry names', () => {
      expect(() =>
        parseRegistryConfig({
          registries: [
            { name: 'dup', source: { type: 'local', path: '/a' } },
            { name: 'dup', source: { type: 'local', path: '/b' } },
          ],
        })
      ).toThrow('Invalid registry configuration: registries.1.name: duplicate registry name "dup"');
    });

    it('should reject unknown source types', () => {
      expect(() =>
        parseRegistryConfig({ registries: [{ name: 'x', source: { type: 'ftp', url: 'ftp://example.test' } }] })
      ).toThrow(ConfigurationError);
    });

    it('should reject negative priorities', () => {
      expect(() =>
        parseRegistryConfig({ registries: [{ name: 'x', source: { type: 'local', path: '/a' }, priority: -1 }] })
      ).toThrow(ConfigurationError);
    });

    it('should reject unsupported http checksums', () => {
      expect(() =>
        parseRegistryConfig({
          registries: [
            { name: 'x', source: { type: 'http', url: 'https://example.test/a.tgz', checksum: 'md5:0123' } },
          ],
        })
      ).toThrow('registries.0.source.checksum: unsupported checksum format');
    });
  });

  describe('loadRegistryConfig', () => {
    it('should load a YAML file', async () => {
      const file = join(dir, 'template-forge.yaml');
      await writeFile(
        file,
        [
          'cache_dir: .cache',
          'cache_ttl: 120',
          'registries:',
          '  - name: local',
          '    source:',
          '      type: local',
          '      path: ./templates',
          '  - name: packages',
          '    priority: 2',
          '    source:',
          '      type: npm',
          '      package: "@acme/templates"',
          '      version: latest',
        ].join('\n')
      );

      const config = await loadRegistryConfig(file);

      expect(config.cacheDir).toBe(join(dir, '.cache'));
      expect(config.cacheTtlSeconds).toBe(120);
      expect(config.entries.map(e => e.name)).toEqual(['local', 'packages']);
      expect(config.entries[0].source).toEqual({ type: 'local', path: join(dir, 'templates') });
      expect(config.entries[1].source).toEqual({ type: 'npm', package: '@acme/templates', version: 'latest' });
    });

    it('should load a JSON file', async () => {
      const file = join(dir, 'registry.json');
      await writeFile(file, JSON.stringify({ cacheTtlSeconds: 0, entries: [] }));

      const config = await loadRegistryConfig(file);

      expect(config.cacheTtlSeconds).toBe(0);
      expect(config.entries).toEqual([]);
    });

    it('should load the example configuration', async () => {
      const file = fileURLToPath(new URL('../../template-forge.example.yaml', import.meta.url));

      const config = await loadRegistryConfig(file);

      expect(config.entries.map(e => e.name)).toEqual(['local', 'company', 'archive', 'packages']);
      expect(config.entries.find(e => e.name === 'archive')?.enabled).toBe(false);
    });

    it('should reject other extensions', async () => {
      await expect(loadRegistryConfig(join(dir, 'registry.toml'))).rejects.toThrow(
        `Invalid config filename: ${join(dir, 'registry.toml')}. Only .yaml, .yml and .json files are supported.`
      );
    });

    it('should wrap read failures in ConfigurationError', async () => {
      await expect(loadRegistryConfig(join(dir, 'missing.yaml'))).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should wrap parse failures in ConfigurationError', async () => {
      const file = join(dir, 'broken.json');
      await writeFile(file, '{ "registries": ');

      await expect(loadRegistryConfig(file)).rejects.toThrow(`Failed to parse config file ${file}`);
    });
  });

  describe('resolveConfigPath', () => {
    it('should prefer an explicit path', () => {
      expect(resolveConfigPath('conf/a.yaml', { TEMPLATE_FORGE_CONFIG: '/etc/b.yaml' }, '/work')).toBe(
        '/work/conf/a.yaml'
      );
    });

    it('should fall back to the environment variable', () => {
      expect(resolveConfigPath(undefined, { TEMPLATE_FORGE_CONFIG: '/etc/b.yaml' }, '/work')).toBe('/etc/b.yaml');
    });

    it('should use template-forge.yaml in the working directory when present', async () => {
      expect(resolveConfigPath(undefined, {}, dir)).toBeUndefined();

      await writeFile(join(dir, 'template-forge.yaml'), 'registries: []\n');
      expect(resolveConfigPath(undefined, {}, dir)).toBe(join(dir, 'template-forge.yaml'));
    });
  });
});
