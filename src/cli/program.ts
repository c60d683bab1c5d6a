/**
 * Top-level commander program
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { createInspectCommand } from './commands/inspect';

const PackageJsonSchema = z.object({ version: z.string() });

// src/cli/ and dist/cli/ are both two levels below the package root
function readPackageVersion(): string {
  try {
    const parsed = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8')),
    );
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name('image-ref-scanner')
    .description('Find and normalize container image references in Helm values')
    .version(readPackageVersion())
    .addCommand(createInspectCommand())
    .addHelpText(
      'after',
      `

Examples:
  $ image-ref-scanner inspect values.yaml
  $ image-ref-scanner inspect values.yaml --source-registries docker.io,quay.io --strict
  $ image-ref-scanner inspect values.yaml --target-registry registry.example.com --output json

Environment Variables:
  LOG_LEVEL                  Logging level
  IMAGE_SOURCE_REGISTRIES    Comma-separated source registries
  IMAGE_EXCLUDE_REGISTRIES   Comma-separated excluded registries
  IMAGE_GLOBAL_REGISTRY      Registry for references that name none
  IMAGE_STRICT               Report unsupported candidates (true/false)
  IMAGE_TEMPLATE_MODE        Keep templated values (true/false)
  IMAGE_TARGET_REGISTRY      Registry for proposed targets
  IMAGE_PATH_STRATEGY        prefix-source-registry or flat
  OUTPUT_FORMAT              table, json or yaml
`,
    );
  return program;
}
