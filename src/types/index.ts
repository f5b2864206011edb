export type { Provider } from './provider.js'
export {
  PROVIDER_PRIORITY,
  providerRank,
  compareProviders,
  isProvider,
  resolveProvider,
} from './provider.js'

export type {
  TrackFieldTypes,
  FieldName,
  TrackFields,
  FieldValue,
} from './track.js'
export {
  UNIVERSAL_FIELDS,
  TEXT_FIELDS,
  isFieldName,
  hasValue,
  createTrackFields,
} from './track.js'

export type { TrackQuery, ProviderPayload, SourceRecord } from './record.js'

export type {
  FieldCandidate,
  FieldDecision,
  FieldDecisions,
  MergeStats,
  MergedMetadata,
  FieldPins,
  TrackMetadata,
} from './merge.js'

export type {
  ScoringWeights,
  CorroborationOptions,
  MergeConfig,
  NormalizerOptions,
  ReconcilerConfig,
} from './config.js'
export {
  DEFAULT_SCORING_WEIGHTS,
  DEFAULT_MERGE_CONFIG,
  DEFAULT_NORMALIZER_OPTIONS,
  DEFAULT_RECONCILER_CONFIG,
} from './config.js'
