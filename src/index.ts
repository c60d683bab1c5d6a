/**
 * Container image reference detection for Helm values and similar documents
 */

/** @public */
export {
  detectImages,
  parseImageReference,
  looksLikeImageReference,
  normalizeRegistry,
  normalizeReference,
  isSourceRegistry,
  isInScope,
  classifyPath,
  formatReference,
  getPathStrategy,
  sanitizeRegistryForPath,
  validRegistryName,
  validRepositoryName,
  validTag,
  validDigest,
  hasErrorCode,
  ImageReferenceError,
  DetectionError,
} from './lib/image';

/** @public */
export type {
  Reference,
  DetectedImage,
  UnsupportedImage,
  DetectionContext,
  DetectionResult,
  ImageErrorCode,
  PathStrategy,
} from './lib/image';

/** @public */
export { inspectValues, loadValuesFile } from './app/inspector';
/** @public */
export type { InspectionReport, ProposedImage } from './app/inspector';

/** @public */
export { loadAppConfig, AppConfigSchema } from './config';
/** @public */
export type { AppConfig } from './config';

/** @public */
export { toValueNode, toPlainValue, formatPath, getValueAtPath, Success, Failure } from './types';
/** @public */
export type { ValueNode, ValuePath, Result, ErrorGuidance } from './types';
