// yomikata/highlight - Furigana markup in, aligned and highlighted markup out

import { dp } from './conn.js';
import {
  asHiragana,
  asKatakana,
  collapseDoubledKanji,
  isDigits,
  isKana,
  REPEATER
} from './characters.js';
import { splitToMora } from './mora.js';
import { digitsToKanji } from './numbers.js';
import { findFirstCompleteAlignment } from './alignment.js';
import { extractOkuriganaForMatch } from './reading-matcher.js';
import { checkException, getExceptionTable } from './exceptions.js';
import { applyJukujikunPatch, processJukujikunPositions, resolveJukujikunOkurigana } from './jukujikun.js';
import { detectOkurigana, OkuriPrefix } from './okurigana.js';
import { reconstructFurigana, restoreKatakana, tagForReadingClass } from './reconstruct.js';
import { JsonKanjiSource, loadKanjiTable } from './kanji.js';
import type { KanjiReadingSource } from './kanji.js';
import type {
  DetectedOkurigana,
  ExceptionTable,
  HighlightOptions,
  KanjiTable,
  MoraAlignment,
  MorphAnalyzer,
  ReadingClass,
  RenderEntry,
  ResolvedHighlightOptions,
  WordToken
} from './types.js';

// word[reading]okurigana
export const WORD_TOKEN_REGEX = /([\d０-９々一-龯㐀-䶿]+)\[(.+?)\]([ぁ-ん]*)/g;
const FURIGANA_REGEX = /( ?)([^ >]+?)\[(.+?)\]/g;

export const EMPTY_READING_PLACEHOLDER = '？';

export interface HighlightContext {
  source: KanjiReadingSource;
  analyzer: MorphAnalyzer | null;
  exceptions: ExceptionTable;
  /** Upper bound on the partitions tried per word */
  maxPartitions?: number;
}

export interface ContextOptions {
  source?: KanjiReadingSource;
  analyzer?: MorphAnalyzer | null;
  exceptions?: ExceptionTable;
  maxPartitions?: number;
}

/**
 * Wire up the collaborators. Readings default to the bundled JSON file; no
 * analyzer means okurigana is found from the conjugation tables alone.
 */
export function createContext(options: ContextOptions = {}): HighlightContext {
  return {
    source: options.source ?? new JsonKanjiSource(),
    analyzer: options.analyzer ?? null,
    exceptions: options.exceptions ?? getExceptionTable(),
    maxPartitions: options.maxPartitions
  };
}

export function resolveOptions(options: HighlightOptions = {}): ResolvedHighlightOptions {
  return {
    kanjiToHighlight: options.kanjiToHighlight ?? null,
    returnType: options.returnType ?? 'furigana',
    withTags: options.withTags ?? true,
    mergeConsecutive: options.mergeConsecutive ?? true,
    onyomiToKatakana: options.onyomiToKatakana ?? true,
    includeSuruOkuri: options.includeSuruOkuri ?? false
  };
}

/**
 * Anki's kana filter: keep only the bracketed readings.
 */
export function kanaFilter(text: string): string {
  return text
    .replace(/&nbsp;/g, ' ')
    .replace(FURIGANA_REGEX, (match: string, _space: string, _word: string, reading: string) =>
      reading.startsWith('sound:') ? match : reading
    );
}

/**
 * Swap word and reading: ` 漢字[かんじ]` -> ` かんじ[漢字]`.
 */
export function furiganaReverser(text: string): string {
  return text
    .replace(/&nbsp;/g, ' ')
    .replace(FURIGANA_REGEX, (match: string, space: string, word: string, reading: string) =>
      reading.startsWith('sound:') ? match : `${space}${reading}[${word}]`
    );
}

interface ExpandedPosition {
  /** Index of the character in the word as written */
  sourceIndex: number;
  /** The digit run this position spells out, if any */
  numeral: string | null;
}

/**
 * Spell out digit runs as kanji numerals so they can be matched: 40分 -> 四十分.
 */
export function expandNumerals(word: string): { expanded: string; positions: ExpandedPosition[] } {
  const chars = [...word];
  let expanded = '';
  const positions: ExpandedPosition[] = [];
  let index = 0;
  while (index < chars.length) {
    if (!isDigits(chars[index])) {
      expanded += chars[index];
      positions.push({ sourceIndex: index, numeral: null });
      index++;
      continue;
    }
    let end = index;
    while (end < chars.length && isDigits(chars[end])) end++;
    const run = chars.slice(index, end).join('');
    for (const kanji of digitsToKanji(run)) {
      expanded += kanji;
      positions.push({ sourceIndex: index, numeral: run });
    }
    index = end;
  }
  return { expanded, positions };
}

function highlightedSourceIndices(word: string, kanjiToHighlight: string | null): Set<number> {
  const indices = new Set<number>();
  if (!kanjiToHighlight) return indices;
  const chars = [...word];
  const start = chars.indexOf(kanjiToHighlight);
  if (start === -1) return indices;
  indices.add(start);
  if (chars[start + 1] === REPEATER) indices.add(start + 1);
  return indices;
}

export function isWholeWordHighlight(word: string, kanjiToHighlight: string | null): boolean {
  const chars = [...word];
  if (chars.length === 2 && chars[1] === REPEATER) return true;
  if (!kanjiToHighlight) return false;
  return word === kanjiToHighlight
    || word === kanjiToHighlight + REPEATER
    || word === kanjiToHighlight.repeat(2);
}

function trailingForException(
  word: string,
  alignment: MoraAlignment,
  trailingKana: string,
  table: KanjiTable,
  analyzer: MorphAnalyzer | null
): DetectedOkurigana {
  const last = alignment.positions[alignment.positions.length - 1];
  if (!last || last.kind !== 'matched') return { okurigana: '', rest: trailingKana, verbLike: false };
  if (last.match.matchType === 'jukujikun') {
    const reading = alignment.positions
      .map((position) => (position.kind === 'matched' ? position.match.matchedMora : ''))
      .join('');
    return resolveJukujikunOkurigana(word, reading, trailingKana, analyzer);
  }
  const chars = [...word];
  const kanji = chars[chars.length - 1] === REPEATER ? chars[chars.length - 2] : chars[chars.length - 1];
  const { okurigana, restKana } = extractOkuriganaForMatch(
    last.match.matchType, last.match.dictForm, trailingKana, kanji, table
  );
  return { okurigana, rest: restKana, verbLike: false };
}

/**
 * Exception table first, then the partition search with jukujikun filling
 * whatever it leaves unmatched.
 */
function alignWord(
  word: string,
  hiragana: string,
  moraList: readonly string[],
  trailingKana: string,
  table: KanjiTable,
  context: Pick<HighlightContext, 'analyzer' | 'exceptions' | 'maxPartitions'>,
  isWholeWord: boolean,
  numeralPositions: ReadonlySet<number>
): { alignment: MoraAlignment; trailing: DetectedOkurigana } {
  const exception = checkException(word, hiragana, context.exceptions);
  if (exception) {
    return {
      alignment: exception,
      trailing: trailingForException(word, exception, trailingKana, table, context.analyzer)
    };
  }

  const lastIndex = [...word].length - 1;
  let alignment = findFirstCompleteAlignment(word, trailingKana, moraList, table, {
    isWholeWord,
    maxPartitions: context.maxPartitions
  });
  const lastWasMatched = alignment.positions[lastIndex]?.kind === 'matched';

  let patchedTrailing: DetectedOkurigana | null = null;
  if (!alignment.isComplete) {
    const patch = processJukujikunPositions(word, alignment, trailingKana, table, {
      exceptions: context.exceptions,
      analyzer: context.analyzer,
      numeralPositions
    });
    alignment = applyJukujikunPatch(alignment, patch);
    patchedTrailing = patch.trailing;
  }
  let trailing: DetectedOkurigana = patchedTrailing ?? {
    okurigana: alignment.finalOkurigana,
    rest: alignment.finalRestKana,
    verbLike: false
  };

  // Onyomi compounds conjugate through する and friends, which the tables only partly cover
  const last = alignment.positions[lastIndex];
  if (
    lastWasMatched
    && !trailing.okurigana
    && trailingKana
    && context.analyzer
    && last?.kind === 'matched'
    && last.match.matchType === 'onyomi'
  ) {
    const detected = detectOkurigana(context.analyzer, word, hiragana, trailingKana, OkuriPrefix.Word);
    if (detected.okurigana) trailing = detected;
  }
  return { alignment, trailing };
}

/**
 * Align and render one `word[reading]okurigana` token. The kanji table must
 * already hold the readings of the word's kanji.
 */
export function processWord(
  token: WordToken,
  table: KanjiTable,
  context: Pick<HighlightContext, 'analyzer' | 'exceptions' | 'maxPartitions'>,
  options: ResolvedHighlightOptions
): string {
  const { word, reading, trailingKana } = token;

  if (reading.startsWith('sound:')) {
    return `${word}[${reading}]${trailingKana}`;
  }
  if (!reading) {
    return (options.returnType === 'kana_only' ? EMPTY_READING_PLACEHOLDER : word) + trailingKana;
  }
  if (!isKana(reading)) {
    dp('processWord - reading is not kana', word, reading);
    return `<err>${word}[${reading}]</err>${trailingKana}`;
  }

  // 清清 renders as 清々
  const collapsed = collapseDoubledKanji(word);
  const sourceChars = [...collapsed];
  const isWholeWord = isWholeWordHighlight(collapsed, token.kanjiToHighlight);
  const { expanded, positions } = expandNumerals(collapsed);
  const expandedChars = [...expanded];
  const numeralPositions = new Set(
    positions.flatMap((position, index) => (position.numeral === null ? [] : [index]))
  );

  const { moraList, katakanaPositions } = splitToMora(reading, expandedChars.length);
  const hiragana = asHiragana(reading);

  const { alignment, trailing } = alignWord(
    expanded, hiragana, moraList, trailingKana, table, context, isWholeWord, numeralPositions
  );

  const highlighted = highlightedSourceIndices(collapsed, token.kanjiToHighlight);

  // One entry per aligned position
  const aligned: RenderEntry[] = expandedChars.map((kanji, index) => {
    const position = alignment.positions[index];
    const readingClass: ReadingClass = position?.kind === 'matched' ? position.match.matchType : 'jukujikun';
    const furigana = position?.kind === 'matched'
      ? position.match.matchedMora
      : (alignment.moraSplit[index] ?? []).join('');
    return {
      kanji,
      tag: tagForReadingClass(readingClass),
      furigana,
      highlight: highlighted.has(positions[index].sourceIndex),
      isNum: positions[index].numeral !== null
    };
  });

  const cased = restoreKatakana(aligned, katakanaPositions).map((entry) =>
    options.onyomiToKatakana && entry.tag === 'on' ? { ...entry, furigana: asKatakana(entry.furigana) } : entry
  );

  // Back to the digit runs as written
  const entries: RenderEntry[] = [];
  for (let index = 0; index < cased.length; index++) {
    const entry = cased[index];
    const { sourceIndex, numeral } = positions[index];
    if (numeral === null) {
      entries.push({ ...entry, kanji: sourceChars[sourceIndex] });
      continue;
    }
    let end = index;
    while (end + 1 < cased.length && positions[end + 1].sourceIndex === sourceIndex) end++;
    const run = cased.slice(index, end + 1);
    if (run.every((part) => part.tag === entry.tag)) {
      entries.push({ ...entry, kanji: numeral, furigana: run.map((part) => part.furigana).join('') });
    } else {
      run.forEach((part, offset) => entries.push({ ...part, kanji: offset === 0 ? numeral : '' }));
    }
    index = end;
  }

  const firstHighlighted = aligned.find((entry) => entry.highlight);
  const highlightMatchType: ReadingClass | null = firstHighlighted
    ? readingClassForTag(firstHighlighted.tag)
    : null;

  return reconstructFurigana(
    {
      entries,
      okurigana: trailing.okurigana,
      restKana: trailing.rest,
      highlightMatchType,
      wordLength: sourceChars.length,
      isWholeWord,
      verbLike: trailing.verbLike
    },
    options
  );
}

function readingClassForTag(tag: RenderEntry['tag']): ReadingClass | null {
  switch (tag) {
    case 'on':
      return 'onyomi';
    case 'kun':
      return 'kunyomi';
    case 'juk':
      return 'jukujikun';
    case 'mix':
      return null;
  }
}

/**
 * Tidy spacing left behind by rendering: the leading space of a rendered
 * word goes inside any tag that opens right before it.
 */
export function cleanSpacing(text: string): string {
  return text
    .replace(/ {2}/g, ' ')
    .replace(/ <(b|on|kun|juk|mix)> /g, '<$1> ')
    .replace(/ <b><(on|kun|juk|mix)> /g, '<b><$1> ');
}

// 消え去[きえさ]る: okurigana written inside a compound's reading
const OKURIGANA_MIX_REGEX = /([\d々一-龯㐀-䶿]+)([ぁ-ん]+)([\d々一-龯㐀-䶿]*)([ぁ-ん]*)\[(.+?)\2(.*?)\4\]/g;

/**
 * Give each kanji run of a word with okurigana in the middle its own
 * reading: 消え去[きえさ]る -> 消[き]え去[さ]る.
 */
export function cleanOkuriganaMix(text: string): string {
  return text.replace(
    OKURIGANA_MIX_REGEX,
    (_match: string, kanji: string, okurigana: string, nextKanji: string, nextOkurigana: string, reading: string, nextReading: string) =>
      nextReading
        ? `${kanji}[${reading}]${okurigana}${nextKanji}[${nextReading}]${nextOkurigana}`
        : `${kanji}[${reading}]${okurigana}`
  );
}

export function findWordTokens(text: string, kanjiToHighlight: string | null = null): WordToken[] {
  return [...text.matchAll(WORD_TOKEN_REGEX)].map((match) => ({
    word: match[1],
    reading: match[2],
    trailingKana: match[3],
    kanjiToHighlight
  }));
}

/**
 * Rewrite every `word[reading]okurigana` token in `text`, highlighting the
 * reading of `kanjiToHighlight` where it occurs.
 */
export async function highlightText(
  text: string,
  options: HighlightOptions = {},
  context: HighlightContext = createContext()
): Promise<string> {
  const resolved = resolveOptions(options);
  const cleaned = cleanOkuriganaMix(text);
  const tokens = findWordTokens(cleaned, resolved.kanjiToHighlight);
  const kanji = tokens.map((token) => expandNumerals(collapseDoubledKanji(token.word)).expanded).join('');
  const table = await loadKanjiTable(context.source, kanji);

  const processed = cleaned.replace(
    WORD_TOKEN_REGEX,
    (match: string, word: string, reading: string, trailingKana: string) => {
      try {
        return processWord({ word, reading, trailingKana, kanjiToHighlight: resolved.kanjiToHighlight }, table, context, resolved);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Failed to align ${word}[${reading}]: ${message}`);
        dp('highlightText - token left as is', match, error);
        return match;
      }
    }
  );
  return cleanSpacing(processed);
}

export interface WordAlignment {
  /** The word as aligned: doubled kanji collapsed, digits spelled out */
  word: string;
  moraList: string[];
  alignment: MoraAlignment;
  okurigana: string;
  restKana: string;
}

/**
 * Align a single word without rendering it.
 */
export async function alignReading(
  word: string,
  reading: string,
  trailingKana = '',
  context: HighlightContext = createContext()
): Promise<WordAlignment> {
  if (!isKana(reading)) {
    throw new Error(`Reading must be kana: ${reading}`);
  }
  const { expanded, positions } = expandNumerals(collapseDoubledKanji(word));
  const numeralPositions = new Set(
    positions.flatMap((position, index) => (position.numeral === null ? [] : [index]))
  );
  const table = await loadKanjiTable(context.source, expanded);
  const { moraList } = splitToMora(reading, [...expanded].length);
  const { alignment, trailing } = alignWord(
    expanded, asHiragana(reading), moraList, trailingKana, table, context, false, numeralPositions
  );
  return { word: expanded, moraList, alignment, okurigana: trailing.okurigana, restKana: trailing.rest };
}
