// Shared type definitions for yomikata
// Reading data, alignment results and render entries used across the core modules

// ============================================================================
// KANJI READING DATA
// ============================================================================

/**
 * Dictionary readings for one kanji. Onyomi are usually katakana, kunyomi
 * hiragana with a `.` before the inflectable part (e.g. `た.べる`).
 */
export interface KanjiReadingData {
  onyomi: string[];
  kunyomi: string[];
}

export type KanjiTable = ReadonlyMap<string, KanjiReadingData>;

// ============================================================================
// MATCHING
// ============================================================================

export type ReadingClass = 'onyomi' | 'kunyomi' | 'jukujikun';

export type ReadingVariant =
  | 'plain'
  | 'rendaku'
  | 'small_tsu'
  | 'rendaku_small_tsu'
  | 'vowel_change'
  | 'u_dropped'
  | 'n_change';

export interface ReadingMatchInfo {
  /** The mora of the word this kanji covers */
  matchedMora: string;
  /** The dictionary reading that matched, okurigana marker included */
  dictForm: string;
  matchType: ReadingClass;
  variant: ReadingVariant;
  kanji: string;
  okurigana: string;
  restKana: string;
}

export type PositionResult =
  | { kind: 'matched'; match: ReadingMatchInfo }
  | { kind: 'unmatched' };

export interface MoraSplit {
  moraList: string[];
  /** Character indices of the reading that were katakana */
  katakanaPositions: number[];
}

/**
 * Alignment of a whole word's reading to its kanji. One entry of `positions`
 * and `moraSplit` per kanji position.
 */
export interface MoraAlignment {
  positions: PositionResult[];
  moraSplit: string[][];
  unmatchedPositions: number[];
  isComplete: boolean;
  finalOkurigana: string;
  finalRestKana: string;
}

// ============================================================================
// OKURIGANA
// ============================================================================

export type OkuriResultType = 'full_okuri' | 'partial_okuri' | 'empty_okuri' | 'no_okuri';

export type PartOfSpeech =
  | 'v1'
  | 'v5u'
  | 'v5k'
  | 'v5k-s'
  | 'v5g'
  | 'v5s'
  | 'v5t'
  | 'v5n'
  | 'v5b'
  | 'v5m'
  | 'v5r'
  | 'v5r-i'
  | 'vk'
  | 'vs'
  | 'vs-i'
  | 'vs-s'
  | 'adj-i';

export interface OkuriResult {
  okurigana: string;
  restKana: string;
  result: OkuriResultType;
  partOfSpeech: PartOfSpeech | null;
}

export interface DetectedOkurigana {
  okurigana: string;
  rest: string;
  /** True for a suru compound (勉強する) */
  verbLike: boolean;
}

// ============================================================================
// EXCEPTIONS
// ============================================================================

export interface ExceptionMora {
  type: ReadingClass;
  mora: string;
}

export type ExceptionTable = ReadonlyMap<string, readonly ExceptionMora[]>;

// ============================================================================
// RENDERING
// ============================================================================

export type WrapTag = 'on' | 'kun' | 'juk' | 'mix';

export interface RenderEntry {
  kanji: string;
  tag: WrapTag;
  furigana: string;
  highlight: boolean;
  isNum: boolean;
}

export type FuriganaMode = 'furigana' | 'furikanji' | 'kana_only';

export interface HighlightOptions {
  kanjiToHighlight?: string | null;
  returnType?: FuriganaMode;
  withTags?: boolean;
  mergeConsecutive?: boolean;
  onyomiToKatakana?: boolean;
  includeSuruOkuri?: boolean;
}

export type ResolvedHighlightOptions = Required<Omit<HighlightOptions, 'kanjiToHighlight'>> & {
  kanjiToHighlight: string | null;
};

export interface WordToken {
  word: string;
  reading: string;
  trailingKana: string;
  kanjiToHighlight: string | null;
}

// ============================================================================
// MORPHOLOGICAL ANALYZER
// ============================================================================

export type AnalyzerPartOfSpeech =
  | 'noun'
  | 'na_adjective'
  | 'verb'
  | 'i_adjective'
  | 'adverb'
  | 'particle'
  | 'bound_auxiliary'
  | 'other';

export type Inflection =
  | 'dictionary_form'
  | 'imperfective'
  | 'continuative'
  | 'continuative_ta'
  | 'continuative_te'
  | 'hypothetical'
  | 'imperative'
  | 'other';

export interface AnalyzerToken {
  /** Surface form as it appears in the text */
  word: string;
  /** Dictionary form, or the surface form for unknown words */
  headword: string;
  partOfSpeech: AnalyzerPartOfSpeech;
  inflectionType: Inflection | null;
}

/**
 * Tokenizer used to find where a word's inflected tail ends.
 */
export interface MorphAnalyzer {
  tokenize(text: string): AnalyzerToken[];
}
