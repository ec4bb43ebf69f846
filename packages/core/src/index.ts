// @yomikata/core - Kanji reading alignment, okurigana detection and furigana rendering

// Connection primitives (no env parsing beyond the URL helpers)
export {
  type ConnectionSpec,
  DB_URL_ENV,
  parseConnectionUrl,
  getConnectionFromEnv,
  setConnection,
  getConnection,
  closeConnection,
  defineCache,
  resetCache,
  setDebug,
  dp,
  DEBUG
} from './conn.js';

// Shared types
export type * from './types.js';

// Character utilities
export {
  HIRAGANA_REGEX,
  KATAKANA_REGEX,
  KANA_REGEX,
  KANJI_REGEX,
  DIGIT_REGEX,
  REPEATER,
  asHiragana,
  asKatakana,
  isKana,
  isDigits,
  getKatakanaPositions,
  rendakuVariants,
  isRendakuOf,
  collapseDoubledKanji
} from './characters.js';

export { normalizeDigits, digitsToKanji } from './numbers.js';
export { splitToMora } from './mora.js';
export { orderedPartitions, countPartitions } from './partitions.js';

// Kanji reading sources
export * from './kanji.js';

// Matching
export {
  CONJUGATABLE_LAST_OKURI,
  getConjugatableOkuriganaStem,
  guessPartOfSpeech,
  startsWithOkuriganaConjugation,
  checkOkuriganaForInflection
} from './inflection.js';
export {
  type VariantMatch,
  checkReadingMatch,
  cleanDictReading,
  getVerbNounFormOkuri,
  getKunyomiReadingVariants,
  matchOnyomiToMora,
  matchKunyomiToMora,
  matchReadingToMora,
  extractOkuriganaForMatch
} from './reading-matcher.js';
export { type AlignmentOptions, findFirstCompleteAlignment, unmatchedAlignment } from './alignment.js';

// Exceptions and jukujikun
export {
  ExceptionTableError,
  parseExceptionTable,
  getExceptionTable,
  exceptionKey,
  checkException
} from './exceptions.js';
export {
  type JukujikunPatch,
  type JukujikunOptions,
  splitMoraForJukujikun,
  resolveJukujikunOkurigana,
  processJukujikunPositions,
  applyJukujikunPatch
} from './jukujikun.js';

// Okurigana detection
export { OkuriPrefix, type HeadWordType, getHeadWordType, detectOkurigana } from './okurigana.js';
export {
  KUROMOJI_DICT_ENV,
  createKuromojiAnalyzer,
  memoizeAnalyzer,
  mapPartOfSpeech,
  mapInflection
} from './analyzer.js';

// Rendering
export {
  constructWrappedFuriWord,
  reconstructFurigana,
  restoreKatakana,
  tagForReadingClass
} from './reconstruct.js';
export {
  type HighlightContext,
  type ContextOptions,
  type WordAlignment,
  EMPTY_READING_PLACEHOLDER,
  createContext,
  resolveOptions,
  kanaFilter,
  furiganaReverser,
  expandNumerals,
  findWordTokens,
  cleanOkuriganaMix,
  processWord,
  highlightText,
  alignReading
} from './highlight.js';
export { type WordReadingType, checkWordReadingType } from './reading-type.js';

// Word lookup
export { type WordSplit, wordUpToOkuri, highlightInflectedWords, wordHighlight } from './word-highlight.js';
