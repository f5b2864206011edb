/**
 * Field-level merge, corroboration and overrides
 * @module merge
 */

// Engine
export { MergeEngine, mergeRecords, resolveMergeConfig } from './merge-engine.js'
export {
  fieldValue,
  compareCandidates,
  collectCandidates,
  emptyDecision,
  copyDecision,
  decideField,
} from './field-selection.js'

// Corroboration
export { valuesAgree, detectCorroboration } from './corroboration.js'
export type { ProvidedValue, CorroborationResult } from './corroboration.js'

// Overrides
export { applyOverrides, resetOverrides } from './override-applier.js'
export type { OverrideResult } from './override-applier.js'

// Assembly
export {
  calculateMergeConfidence,
  calculateStats,
  assembleMergedMetadata,
  buildFieldDecisions,
} from './merge-stats.js'

// Views
export {
  toTrackMetadata,
  summarizeMerge,
  formatSummary,
  summarizeSources,
  formatSources,
} from './summary.js'
export type { FieldSummary, SourceSummary } from './summary.js'
export { fingerprintRecords, stableStringify, FINGERPRINT_NAMESPACE } from './fingerprint.js'

// Errors
export {
  NoMetadataAvailableError,
  OverrideNotApplicableError,
  MergeValidationError,
} from './merge-error.js'

// Validation
export {
  validateMergeConfig,
  validateNormalizerOptions,
  validateReconcilerConfig,
  validateSourceRecords,
  validatePins,
  hasAnyValue,
  requireUsableRecords,
  requireSameProviders,
} from './validation.js'
