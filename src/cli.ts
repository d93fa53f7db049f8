#!/usr/bin/env node
import { createRequire } from 'module';
import { Command } from 'commander';
import { z } from 'zod';
import { createTemplatesCommand } from './commands/templates.js';
import { createCacheCommand } from './commands/cache.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../package.json'));

const program = new Command('template-forge')
  .description('Resolve project templates from local, git, http and npm sources')
  .version(pkg.version)
  .option('-c, --config <path>', 'Registry configuration file (.yaml, .yml or .json)');

program.addCommand(createTemplatesCommand(program));
program.addCommand(createCacheCommand(program));

await program.parseAsync(process.argv);
