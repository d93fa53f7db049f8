/**
 * Zod schemas for registry configuration and template descriptors
 * Ensures type safety for files read from disk, repositories and archives
 */

import { z } from 'zod';
import type {
  RegistryConfig,
  RegistryEntry,
  TemplateMetadata,
  TemplateSource,
  TemplateVariable,
  VariableType,
} from '../types/template.js';
import { parseChecksum } from '../utils/integrity.js';
import { DEFAULT_CACHE_DIR, DEFAULT_CACHE_TTL_SECONDS } from '../constants.js';

// Schemas take `unknown` input; outputs are pinned to the hand-written interfaces
type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const SimpleKindSchema = z.enum(['string', 'boolean', 'number']);
const ChoiceOptionsSchema = z.array(z.string()).min(1, 'choice variables need at least one option');

// Accepts "string", { kind: "string" }, { kind: "choice", options } and { choice: { options } }
export const VariableTypeSchema: Schema<VariableType> = z.union([
  SimpleKindSchema.transform((kind): VariableType => ({ kind })),
  z.object({ kind: SimpleKindSchema }).transform(({ kind }): VariableType => ({ kind })),
  z.object({ kind: z.literal('choice'), options: ChoiceOptionsSchema })
    .transform(({ options }): VariableType => ({ kind: 'choice', options })),
  z.object({ choice: z.object({ options: ChoiceOptionsSchema }) })
    .transform(({ choice }): VariableType => ({ kind: 'choice', options: choice.options })),
]);

const ScalarDefaultSchema = z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value));

export const TemplateVariableSchema: Schema<TemplateVariable> = z
  .object({
    name: z.string().min(1),
    description: z.string().default(''),
    default: ScalarDefaultSchema.nullish(),
    required: z.boolean().default(false),
    type: VariableTypeSchema.optional(),
    var_type: VariableTypeSchema.optional(),
  })
  .transform((value): TemplateVariable => {
    const variable: TemplateVariable = {
      name: value.name,
      description: value.description,
      required: value.required,
      type: value.type ?? value.var_type ?? { kind: 'string' },
    };
    if (value.default !== undefined && value.default !== null) {
      variable.default = value.default;
    }
    return variable;
  });

export const TemplateMetadataSchema: Schema<TemplateMetadata> = z
  .object({
    name: z.string().min(1),
    version: z.string().min(1),
    description: z.string().default(''),
    author: z.string().default(''),
    projectType: z.string().min(1).optional(),
    project_type: z.string().min(1).optional(),
    variables: z.array(TemplateVariableSchema).default([]),
    dependencies: z.array(z.string()).default([]),
    tags: z.array(z.string()).default([]),
  })
  .transform((value, ctx): TemplateMetadata => {
    const projectType = value.projectType ?? value.project_type;
    if (projectType === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['projectType'],
        message: 'Required',
      });
      return z.NEVER;
    }
    return {
      name: value.name,
      version: value.version,
      description: value.description,
      author: value.author,
      projectType,
      variables: value.variables,
      dependencies: value.dependencies,
      tags: value.tags,
    };
  });

const LocalSourceSchema = z.object({
  type: z.literal('local'),
  path: z.string().min(1),
});

const GitSourceSchema = z.object({
  type: z.literal('git'),
  url: z.string().min(1),
  branch: z.string().min(1).optional(),
  subfolder: z.string().min(1).optional(),
  auth: z
    .object({
      username: z.string().optional(),
      token: z.string().optional(),
    })
    .optional(),
});

const HttpSourceSchema = z.object({
  type: z.literal('http'),
  url: z.string().url(),
  checksum: z
    .string()
    .refine(value => parseChecksum(value) !== null, 'unsupported checksum format')
    .optional(),
  auth: z
    .object({
      bearerToken: z.string().min(1).optional(),
      basicAuth: z
        .object({
          username: z.string(),
          password: z.string(),
        })
        .optional(),
    })
    .optional(),
});

const PackageRegistrySourceSchema = z.object({
  type: z.literal('npm'),
  package: z.string().min(1),
  version: z.string().min(1),
  registry: z.string().url().optional(),
});

export const TemplateSourceSchema: Schema<TemplateSource> = z.discriminatedUnion('type', [
  LocalSourceSchema,
  GitSourceSchema,
  HttpSourceSchema,
  PackageRegistrySourceSchema,
]);

export const RegistryEntrySchema: Schema<RegistryEntry> = z.object({
  name: z.string().min(1),
  source: TemplateSourceSchema,
  enabled: z.boolean().default(true),
  priority: z.number().int().nonnegative().default(0),
});

export const RegistryConfigSchema: Schema<RegistryConfig> = z
  .object({
    cacheDir: z.string().min(1).optional(),
    cache_dir: z.string().min(1).optional(),
    cacheTtlSeconds: z.number().int().nonnegative().optional(),
    cache_ttl: z.number().int().nonnegative().optional(),
    registries: z.array(RegistryEntrySchema).optional(),
    entries: z.array(RegistryEntrySchema).optional(),
  })
  .transform((value, ctx): RegistryConfig => {
    const entries = value.registries ?? value.entries ?? [];

    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['registries', index, 'name'],
          message: `duplicate registry name "${entry.name}"`,
        });
      }
      seen.add(entry.name);
    });

    return {
      entries,
      cacheDir: value.cacheDir ?? value.cache_dir ?? DEFAULT_CACHE_DIR,
      cacheTtlSeconds: value.cacheTtlSeconds ?? value.cache_ttl ?? DEFAULT_CACHE_TTL_SECONDS,
    };
  });
