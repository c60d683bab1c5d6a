/**
 * Inspection service
 *
 * Loads a values document, runs image detection with the effective
 * configuration, and proposes target references when a target registry is
 * configured. Everything here returns a Result; nothing throws past this
 * boundary.
 */

import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import type { AppConfig } from '@/config/app-config';
import { createErrorGuidance, ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import {
  detectImages,
  DetectionError,
  findImageError,
  findTargetRegistry,
  formatReference,
  getPathStrategy,
  type DetectedImage,
  type DetectionResult,
  type PathStrategy,
  type UnsupportedImage,
} from '@/lib/image';
import { createLogger, createTimer, type Logger } from '@/lib/logger';
import { Failure, Success, formatPath, toValueNode, type Result, type ValueNode } from '@/types';

export interface ProposedImage {
  /** Formatted path of the detection this proposal belongs to */
  path: string;
  source: string;
  target: string;
}

export interface InspectionReport {
  detected: DetectedImage[];
  unsupported: UnsupportedImage[];
  /**
   * Only for non-templated detections whose registry has a mapped target or
   * when a default target registry is set
   */
  proposals: ProposedImage[];
  globalRegistry?: string;
}

/**
 * Read and decode a YAML (or JSON) values file. An empty document decodes to
 * an empty map.
 */
export async function loadValuesFile(path: string): Promise<Result<unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const message = ERROR_MESSAGES.FILE_READ_FAILED(path, extractErrorMessage(error));
    return Failure(
      message,
      createErrorGuidance(message, 'The values file could not be read', 'Check that the file exists and is readable', {
        file: path,
      }),
    );
  }

  try {
    const decoded = yaml.load(content, { filename: path });
    return Success(decoded ?? {});
  } catch (error) {
    const message = ERROR_MESSAGES.YAML_PARSE_FAILED(path, extractErrorMessage(error));
    return Failure(
      message,
      createErrorGuidance(message, 'The values file is not valid YAML', 'Fix the YAML syntax and retry', {
        file: path,
      }),
    );
  }
}

function proposeTarget(image: DetectedImage, strategy: PathStrategy, targetRegistry: string): ProposedImage {
  const { reference } = image;
  const target = formatReference({
    registry: targetRegistry,
    repository: strategy.generatePath(reference),
    tag: reference.tag,
    digest: reference.digest,
  });
  return { path: formatPath(image.path), source: formatReference(reference), target };
}

function detectionFailure(error: unknown): Result<DetectionResult> {
  if (error instanceof DetectionError) {
    const path = formatPath(error.path);
    const code = findImageError(error)?.code;
    const message = ERROR_MESSAGES.DETECTION_FAILED(path, error.message);
    return Failure(
      message,
      createErrorGuidance(
        message,
        'An image-shaped map has a field of the wrong type or an invalid value',
        `Correct the value at "${path}" or remove the map`,
        { path, code },
      ),
    );
  }
  const message = ERROR_MESSAGES.OPERATION_FAILED('Image detection', extractErrorMessage(error));
  return Failure(message, createErrorGuidance(message));
}

function runDetection(tree: ValueNode, config: AppConfig, logger: Logger): Result<DetectionResult> {
  const { detection } = config;
  try {
    return Success(
      detectImages(
        tree,
        {
          sourceRegistries: detection.sourceRegistries,
          excludeRegistries: detection.excludeRegistries,
          globalRegistry: detection.globalRegistry,
          strict: detection.strict,
          templateMode: detection.templateMode,
        },
        { logger },
      ),
    );
  } catch (error) {
    return detectionFailure(error);
  }
}

/**
 * Detect images in decoded values and build a report.
 */
export function inspectValues(
  values: unknown,
  config: AppConfig,
  logger: Logger = createLogger({ level: config.logging.level }).child({ module: 'inspector' }),
): Result<InspectionReport> {
  const timer = createTimer(logger, 'inspect-values');

  let tree: ValueNode;
  try {
    tree = toValueNode(values);
  } catch (error) {
    timer.error(error);
    const message = ERROR_MESSAGES.UNSUPPORTED_VALUE(extractErrorMessage(error));
    return Failure(message, createErrorGuidance(message, 'Values must be plain YAML or JSON data'));
  }

  const detection = runDetection(tree, config, logger);
  if (!detection.ok) {
    timer.error(detection.error);
    return detection;
  }

  const proposals: ProposedImage[] = [];
  const { targetRegistry, registryMappings, pathStrategy } = config.rewrite;
  if (targetRegistry || registryMappings.length > 0) {
    const strategy = getPathStrategy(pathStrategy);
    if (!strategy.ok) {
      timer.error(strategy.error);
      return strategy;
    }
    for (const image of detection.value.detected) {
      if (image.templated) {
        continue;
      }
      const target = findTargetRegistry(registryMappings, image.reference.registry) ?? targetRegistry;
      if (target) {
        proposals.push(proposeTarget(image, strategy.value, target));
      }
    }
  }

  const report: InspectionReport = {
    detected: detection.value.detected,
    unsupported: detection.value.unsupported,
    proposals,
  };
  if (detection.value.globalRegistry) {
    report.globalRegistry = detection.value.globalRegistry;
  }

  timer.end({
    detected: report.detected.length,
    unsupported: report.unsupported.length,
    proposals: proposals.length,
  });
  return Success(report);
}
