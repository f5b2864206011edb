export {
  computeCompleteness,
  createSourceRecord,
  extractFields,
  normalizeSource,
  normalizeSources,
} from './normalizer.js'
export type { NormalizeResult } from './normalizer.js'
export {
  CONFIDENCE_RULES,
  MUSICBRAINZ_UNSCORED_CONFIDENCE,
  YOUTUBE_CONFIDENCE_CAP,
  computeConfidence,
  matchesQuery,
  clampUnit,
} from './confidence-rules.js'
export type { ConfidenceInput, ConfidenceRule } from './confidence-rules.js'
export { InvalidSourceRecordError } from './source-error.js'
