/**
 * Application Configuration
 *
 * Zod schema plus a layered loader. Layers, lowest precedence first:
 * schema defaults, environment variables, an optional YAML config file, and
 * explicit overrides (CLI flags).
 */

import { z } from 'zod';
import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import { createErrorGuidance, ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import { PATH_STRATEGY_NAMES } from '@/lib/image/path-strategy';
import { Failure, Success, type Result } from '@/types';
import { hasEnv, parseBoolEnv, parseListEnv, parseStringEnv } from './env-utils';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export const OUTPUT_FORMATS = ['table', 'json', 'yaml'] as const;

const LogLevelSchema = z.enum(LOG_LEVELS);
const OutputFormatSchema = z.enum(OUTPUT_FORMATS);
const PathStrategySchema = z.enum(PATH_STRATEGY_NAMES);
const RegistryListSchema = z.array(z.string().min(1)).default([]);
const RegistryMappingSchema = z
  .object({
    source: z.string().min(1),
    target: z.string().min(1),
  })
  .strict();

export const AppConfigSchema = z
  .object({
    logging: z
      .object({
        /** Unset means the logger's own resolution (LOG_LEVEL, test env) applies */
        level: LogLevelSchema.optional(),
      })
      .strict()
      .default({}),
    detection: z
      .object({
        sourceRegistries: RegistryListSchema,
        excludeRegistries: RegistryListSchema,
        globalRegistry: z.string().min(1).optional(),
        strict: z.boolean().default(false),
        templateMode: z.boolean().default(false),
      })
      .strict()
      .default({}),
    rewrite: z
      .object({
        targetRegistry: z.string().min(1).optional(),
        /** Per-source targets, first match wins; `targetRegistry` covers the rest */
        registryMappings: z.array(RegistryMappingSchema).default([]),
        pathStrategy: PathStrategySchema.default('prefix-source-registry'),
      })
      .strict()
      .default({}),
    output: z
      .object({
        format: OutputFormatSchema.default('table'),
      })
      .strict()
      .default({}),
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * A partial configuration layer. Undefined fields fall through to the layer
 * below.
 */
export interface ConfigOverrides {
  logging?: { level?: string | undefined };
  detection?: {
    sourceRegistries?: string[] | undefined;
    excludeRegistries?: string[] | undefined;
    globalRegistry?: string | undefined;
    strict?: boolean | undefined;
    templateMode?: boolean | undefined;
  };
  rewrite?: { targetRegistry?: string | undefined; pathStrategy?: string | undefined };
  output?: { format?: string | undefined };
}

function optionalString(key: string): string | undefined {
  return hasEnv(key) ? parseStringEnv(key, '') : undefined;
}

function optionalBool(key: string): boolean | undefined {
  return hasEnv(key) ? parseBoolEnv(key, false) : undefined;
}

function optionalList(key: string): string[] | undefined {
  return hasEnv(key) ? parseListEnv(key) : undefined;
}

/**
 * Read the environment layer
 */
export function readEnvConfig(): ConfigOverrides {
  return {
    logging: { level: optionalString('LOG_LEVEL') },
    detection: {
      sourceRegistries: optionalList('IMAGE_SOURCE_REGISTRIES'),
      excludeRegistries: optionalList('IMAGE_EXCLUDE_REGISTRIES'),
      globalRegistry: optionalString('IMAGE_GLOBAL_REGISTRY'),
      strict: optionalBool('IMAGE_STRICT'),
      templateMode: optionalBool('IMAGE_TEMPLATE_MODE'),
    },
    rewrite: {
      targetRegistry: optionalString('IMAGE_TARGET_REGISTRY'),
      pathStrategy: optionalString('IMAGE_PATH_STRATEGY'),
    },
    output: { format: optionalString('OUTPUT_FORMAT') },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge `layer` over `base`. Undefined and null values are skipped (an
 * empty YAML section decodes to null); arrays and scalars replace.
 */
export function mergeConfigLayers(
  base: Record<string, unknown>,
  layer: unknown,
): Record<string, unknown> {
  if (!isRecord(layer)) {
    return base;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(layer)) {
    if (value === undefined || value === null) {
      continue;
    }
    const current = merged[key];
    merged[key] = isRecord(value) ? mergeConfigLayers(isRecord(current) ? current : {}, value) : value;
  }
  return merged;
}

async function readConfigFile(path: string): Promise<Result<Record<string, unknown>>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const message = ERROR_MESSAGES.FILE_READ_FAILED(path, extractErrorMessage(error));
    return Failure(
      message,
      createErrorGuidance(message, 'The configuration file could not be read', 'Check the --config path', {
        configFile: path,
      }),
    );
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    const message = ERROR_MESSAGES.YAML_PARSE_FAILED(path, extractErrorMessage(error));
    return Failure(message, createErrorGuidance(message, undefined, 'Fix the YAML syntax', { configFile: path }));
  }

  if (parsed === null || parsed === undefined) {
    return Success({});
  }
  if (!isRecord(parsed)) {
    const message = ERROR_MESSAGES.CONFIG_INVALID(`${path} must contain a mapping`);
    return Failure(message, createErrorGuidance(message, undefined, undefined, { configFile: path }));
  }
  return Success(parsed);
}

export interface LoadConfigOptions {
  configFile?: string;
  overrides?: ConfigOverrides;
}

/**
 * Build and validate the effective configuration
 */
export async function loadAppConfig(options: LoadConfigOptions = {}): Promise<Result<AppConfig>> {
  let raw = mergeConfigLayers({}, readEnvConfig());

  if (options.configFile) {
    const fileResult = await readConfigFile(options.configFile);
    if (!fileResult.ok) {
      return fileResult;
    }
    raw = mergeConfigLayers(raw, fileResult.value);
  }

  raw = mergeConfigLayers(raw, options.overrides);

  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    const message = ERROR_MESSAGES.CONFIG_INVALID(issues);
    return Failure(
      message,
      createErrorGuidance(
        message,
        'One or more configuration values are out of range',
        'Check environment variables, the config file and command-line flags',
        { issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) },
      ),
    );
  }
  return Success(parsed.data);
}
