export {
  normalizeWhitespace,
  stripDiacritics,
  unifyPunctuation,
  foldText,
  tokenize,
} from './text.js'
export {
  cleanText,
  extractYear,
  cleanDuration,
  cleanGenre,
  cleanUrl,
  MAX_GENRE_TAGS,
} from './values.js'
