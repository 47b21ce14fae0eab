export { config } from './config';
export type { Config, LoggingConfig, TraversalConfig, ClassificationConfig } from './config';
export { logger, createComponentLogger, flushLogs } from './logger';
export { findProjectRoot, resolveProjectPath } from './project-root';
export {
  ExternalTypeClassifier,
  ClassificationRulesError,
  getDefaultClassifier,
} from './external-type-classifier';
export type { PresumedKind, ExternalClassification } from './external-type-classifier';
