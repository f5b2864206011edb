export {
  SCORE_DECIMALS,
  roundScore,
  overallScore,
  rankRecords,
} from './scorer.js'
export type { RankedRecord } from './scorer.js'
