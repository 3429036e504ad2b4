import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { entityMappingSchema, type EntityMapping } from '@schemabridge/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = process.env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

export const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict()
  .optional();

export const catalogFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    logging: loggingSchema,
    entities: z.array(entityMappingSchema).min(1),
  })
  .strict()
  .superRefine((value, ctx) => {
    const names = new Set<string>();
    value.entities.forEach((entity, i) => {
      if (names.has(entity.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate entity name: ${entity.name}`,
          path: ['entities', i, 'name'],
        });
      }
      names.add(entity.name);
    });
  });

export type CatalogFile = z.infer<typeof catalogFileSchema>;

export function formatZodError(err: z.ZodError, label = 'Invalid mapping catalog'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Parse and validate catalog JSON text
 * @throws ConfigError
 */
export function parseCatalog(content: string, options?: EnvExpansionOptions): CatalogFile {
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(
      `Mapping catalog is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = catalogFileSchema.safeParse(expandEnvVars(parsed, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

/**
 * Read a catalog file relative to the working directory
 * @throws ConfigError
 */
export async function loadCatalog(
  catalogPath: string,
  options?: EnvExpansionOptions
): Promise<CatalogFile> {
  const absolutePath = resolve(process.cwd(), catalogPath);
  const content = await readFile(absolutePath, 'utf-8');
  return parseCatalog(content, options);
}

/**
 * Look up an entity by name
 * @throws ConfigError if the catalog has no such entity
 */
export function findEntity(catalog: CatalogFile, name: string): EntityMapping {
  const entity = catalog.entities.find((e) => e.name === name);
  if (!entity) {
    const available = catalog.entities.map((e) => e.name).join(', ');
    throw new ConfigError(`Unknown entity "${name}". Available entities: ${available}`);
  }
  return entity;
}
