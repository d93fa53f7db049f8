/**
 * Templates command: list and resolve templates through the registry
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { TemplateManager } from '../registry/template-manager.js';
import type { RegistryEntry, TemplateMetadata, TemplateSource, TemplateVariable } from '../types/template.js';
import { effectiveDefault } from '../types/template.js';
import { extractErrorMessage, isTemplateForgeError } from '../errors.js';
import { redactCredentials } from '../sources/git-source.js';

type GlobalOptions = {
  config?: string;
};

function describeType(variable: TemplateVariable): string {
  return variable.type.kind === 'choice' ? `choice(${variable.type.options.join('|')})` : variable.type.kind;
}

export function formatTemplateLine(template: TemplateMetadata): string {
  return `  ${template.projectType.padEnd(10)} ${template.name.padEnd(20)} ${template.version.padEnd(10)} ${template.description}`.trimEnd();
}

export function formatVariables(variables: TemplateVariable[]): string[] {
  return variables.map(variable => {
    const flag = variable.required ? chalk.red('required') : chalk.gray(`default: ${effectiveDefault(variable) ?? '-'}`);
    return `  ${variable.name} (${describeType(variable)}) ${flag}${variable.description ? ` - ${variable.description}` : ''}`;
  });
}

export function describeSource(source: TemplateSource): string {
  switch (source.type) {
    case 'local':
      return source.path;
    case 'git': {
      const url = redactCredentials(source.url, source.auth);
      const ref = source.branch ? `#${source.branch}` : '';
      return source.subfolder ? `${url}${ref} (${source.subfolder})` : `${url}${ref}`;
    }
    case 'http':
      return redactCredentials(source.url);
    case 'npm':
      return `${source.package}@${source.version}`;
  }
}

export function formatEntryLine(entry: RegistryEntry): string {
  const status = entry.enabled ? chalk.green('enabled ') : chalk.gray('disabled');
  return `  ${entry.name.padEnd(16)} ${entry.source.type.padEnd(6)} ${String(entry.priority).padStart(3)} ${status} ${describeSource(entry.source)}`;
}

function reportError(action: string, error: unknown): never {
  const code = isTemplateForgeError(error) ? ` [${error.code}]` : '';
  console.error(chalk.red(`❌ Error ${action}${code}: ${extractErrorMessage(error)}`));
  process.exit(1);
}

export function createTemplatesCommand(program: Command): Command {
  const templatesCommand = new Command('templates')
    .description('List and resolve project templates')
    .alias('template');

  templatesCommand
    .command('list')
    .description('List templates from every enabled registry entry')
    .option('-t, --type <projectType>', 'Only templates for this project type')
    .option('-j, --json', 'Output in JSON format')
    .action(async (options: { type?: string; json?: boolean }) => {
      try {
        const { config } = program.opts<GlobalOptions>();
        const manager = await TemplateManager.create(config);
        const templates = await manager.listTemplates(options.type);

        if (options.json) {
          console.log(JSON.stringify(templates, null, 2));
          return;
        }

        if (templates.length === 0) {
          console.log('No templates found.');
          return;
        }

        console.log(chalk.bold.blue('📦 Available Templates'));
        console.log(chalk.gray('─'.repeat(60)));
        for (const template of templates) {
          console.log(formatTemplateLine(template));
        }
      } catch (error) {
        reportError('listing templates', error);
      }
    });

  templatesCommand
    .command('registries')
    .description('Show configured registry entries, disabled ones included')
    .option('-j, --json', 'Output in JSON format')
    .action(async (options: { json?: boolean }) => {
      try {
        const { config } = program.opts<GlobalOptions>();
        const manager = await TemplateManager.create(config);
        const entries = manager.entries();

        if (options.json) {
          console.log(JSON.stringify(entries.map(entry => ({ ...entry, source: describeSource(entry.source) })), null, 2));
          return;
        }

        if (entries.length === 0) {
          console.log('No registries configured.');
          return;
        }

        console.log(chalk.bold.blue('🗂  Registries'));
        console.log(chalk.gray('─'.repeat(60)));
        for (const entry of entries) {
          console.log(formatEntryLine(entry));
        }
      } catch (error) {
        reportError('loading registries', error);
      }
    });

  templatesCommand
    .command('resolve <project-type> <template-name>')
    .description('Resolve a template and print where it was materialized')
    .option('-j, --json', 'Output in JSON format')
    .action(async (projectType: string, templateName: string, options: { json?: boolean }) => {
      try {
        const { config } = program.opts<GlobalOptions>();
        const manager = await TemplateManager.create(config);
        const resolved = await manager.resolve(projectType, templateName);

        if (options.json) {
          console.log(JSON.stringify(resolved, null, 2));
          return;
        }

        const { metadata } = resolved;
        console.log(chalk.bold(`${metadata.name}@${metadata.version}`), chalk.gray(`(${resolved.source})`));
        console.log(`  Path:   ${chalk.cyan(resolved.path)}`);
        if (metadata.description) {
          console.log(`  About:  ${metadata.description}`);
        }
        if (metadata.author) {
          console.log(`  Author: ${metadata.author}`);
        }
        if (metadata.tags.length > 0) {
          console.log(`  Tags:   ${metadata.tags.join(', ')}`);
        }
        if (metadata.variables.length > 0) {
          console.log(chalk.bold('Variables:'));
          for (const line of formatVariables(metadata.variables)) {
            console.log(line);
          }
        }
      } catch (error) {
        reportError('resolving template', error);
      }
    });

  return templatesCommand;
}
