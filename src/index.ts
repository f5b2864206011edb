// Main entry point
export { TrackReconciler, ReconcilerBuilder } from './builder/reconciler-builder.js'

// Core classes
export { Reconciler, copyReconcilerConfig } from './core/reconciler.js'
export type { ReconcilerOptions, ReconcileResult } from './core/reconciler.js'
export { MergeEngine, mergeRecords, resolveMergeConfig } from './merge/merge-engine.js'

// Types
export * from './types/index.js'

// Normalization
export {
  normalizeSource,
  normalizeSources,
  createSourceRecord,
  computeCompleteness,
  extractFields,
  computeConfidence,
  matchesQuery,
  CONFIDENCE_RULES,
  MUSICBRAINZ_UNSCORED_CONFIDENCE,
  YOUTUBE_CONFIDENCE_CAP,
} from './sources/index.js'
export type { NormalizeResult, ConfidenceInput, ConfidenceRule } from './sources/index.js'
export { foldText, tokenize } from './core/normalizers/index.js'
export { tokenOverlap, foldedEquals, numbersWithin } from './core/comparators.js'

// Scoring
export { overallScore, rankRecords, roundScore } from './scoring/index.js'
export type { RankedRecord } from './scoring/index.js'

// Merge
export {
  detectCorroboration,
  valuesAgree,
  collectCandidates,
  decideField,
  applyOverrides,
  resetOverrides,
  toTrackMetadata,
  summarizeMerge,
  formatSummary,
  summarizeSources,
  formatSources,
  fingerprintRecords,
  validateReconcilerConfig,
  validateMergeConfig,
} from './merge/index.js'
export type {
  OverrideResult,
  FieldSummary,
  SourceSummary,
  CorroborationResult,
} from './merge/index.js'

// Errors
export { ReconcilerError, InvalidParameterError, ConfigurationError } from './utils/errors.js'
export { InvalidSourceRecordError } from './sources/index.js'
export {
  NoMetadataAvailableError,
  OverrideNotApplicableError,
  MergeValidationError,
} from './merge/index.js'

// Logging
export type { Logger } from './utils/logger.js'
export { defaultLogger, createSilentLogger, createPrefixedLogger } from './utils/logger.js'
