/**
 * Inspect CLI Command
 *
 * Detects container image references in a values file and prints a report.
 */

import { Command } from 'commander';
import { inspectValues, loadValuesFile } from '@/app/inspector';
import { loadAppConfig, type ConfigOverrides } from '@/config/app-config';
import { createLogger } from '@/lib/logger';
import { formatResultError } from '../error-formatting';
import { renderReport } from '../render';

export interface InspectOptions {
  sourceRegistries?: string[];
  excludeRegistries?: string[];
  globalRegistry?: string;
  strict?: boolean;
  templateMode?: boolean;
  targetRegistry?: string;
  pathStrategy?: string;
  output?: string;
  config?: string;
  logLevel?: string;
}

/** Where command output goes; stdout for reports, stderr for errors */
export interface CommandIO {
  out(text: string): void;
  err(text: string): void;
}

const consoleIO: CommandIO = {
  out: (text) => console.info(text),
  err: (text) => console.error(text),
};

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function toOverrides(options: InspectOptions): ConfigOverrides {
  return {
    logging: { level: options.logLevel },
    detection: {
      sourceRegistries: options.sourceRegistries,
      excludeRegistries: options.excludeRegistries,
      globalRegistry: options.globalRegistry,
      strict: options.strict,
      templateMode: options.templateMode,
    },
    rewrite: { targetRegistry: options.targetRegistry, pathStrategy: options.pathStrategy },
    output: { format: options.output },
  };
}

/**
 * Run the inspect command and return its exit code
 */
export async function runInspect(
  file: string,
  options: InspectOptions,
  io: CommandIO = consoleIO,
): Promise<number> {
  const configResult = await loadAppConfig({ configFile: options.config, overrides: toOverrides(options) });
  if (!configResult.ok) {
    formatResultError(configResult, 'Could not load configuration').forEach((line) => io.err(line));
    return 1;
  }
  const config = configResult.value;
  const logger = createLogger({ level: config.logging.level }).child({ module: 'inspect' });

  const values = await loadValuesFile(file);
  if (!values.ok) {
    formatResultError(values, 'Failed to load values').forEach((line) => io.err(line));
    return 1;
  }

  const report = inspectValues(values.value, config, logger);
  if (!report.ok) {
    formatResultError(report, 'Inspection failed').forEach((line) => io.err(line));
    return 1;
  }

  logger.info(
    { file, detected: report.value.detected.length, unsupported: report.value.unsupported.length },
    'Inspection complete',
  );
  io.out(renderReport(report.value, config.output.format));
  return 0;
}

/**
 * Create inspect CLI command
 */
export function createInspectCommand(io: CommandIO = consoleIO): Command {
  const cmd = new Command('inspect');
  cmd
    .description('Detect container image references in a Helm values file')
    .argument('<values-file>', 'YAML or JSON values file')
    .option('--source-registries <list>', 'comma-separated registries to treat as in scope', parseList)
    .option('--exclude-registries <list>', 'comma-separated registries to ignore', parseList)
    .option('--global-registry <name>', 'registry for references that name none')
    .option('--strict', 'report ambiguous and out-of-scope candidates as unsupported')
    .option('--template-mode', 'keep values containing template markers')
    .option('--target-registry <name>', 'propose rewritten references under this registry')
    .option('--path-strategy <name>', 'target path layout: prefix-source-registry, flat')
    .option('--output <format>', 'output format: table, json, yaml')
    .option('--config <file>', 'YAML configuration file')
    .option('--log-level <level>', 'logging level: fatal, error, warn, info, debug, trace, silent')
    .action(async (file: string, options: InspectOptions) => {
      process.exitCode = await runInspect(file, options, io);
    });
  return cmd;
}
