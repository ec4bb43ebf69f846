// yomikata/jukujikun - Readings for kanji no dictionary reading accounts for

import { dp } from './conn.js';
import { asHiragana, PARTICLE_HEADS, REPEATER } from './characters.js';
import { splitToMora } from './mora.js';
import { cleanDictReading } from './reading-matcher.js';
import { getExceptionTable, splitExceptionKey } from './exceptions.js';
import { kanjiLookupKey } from './kanji.js';
import { detectOkurigana, OkuriPrefix } from './okurigana.js';
import type {
  DetectedOkurigana,
  ExceptionTable,
  KanjiTable,
  MoraAlignment,
  MorphAnalyzer,
  PositionResult,
  ReadingClass,
  ReadingMatchInfo
} from './types.js';

export interface JukujikunOptions {
  exceptions?: ExceptionTable;
  analyzer?: MorphAnalyzer | null;
  /** Positions holding a kanji numeral spelled out from a digit */
  numeralPositions?: ReadonlySet<number>;
}

/**
 * Readings to fill in over an incomplete alignment. `matches` holds both the
 * jukujikun readings and any ordinary matches synthesized around an exception.
 */
export interface JukujikunPatch {
  matches: ReadonlyMap<number, ReadingMatchInfo>;
  /** Set only when the last position was unmatched */
  trailing: DetectedOkurigana | null;
}

function syntheticMatch(kanji: string, mora: string, matchType: ReadingClass): ReadingMatchInfo {
  return { matchedMora: mora, dictForm: mora, matchType, variant: 'plain', kanji, okurigana: '', restKana: '' };
}

/**
 * Split mora evenly over `count` kanji, the remainder going one each to the
 * first positions.
 */
export function splitMoraForJukujikun(moraList: readonly string[], count: number): string[] {
  if (count <= 0) return [];
  const perKanji = Math.floor(moraList.length / count);
  const remainder = moraList.length % count;

  const result: string[] = [];
  let index = 0;
  for (let i = 0; i < count; i++) {
    const end = index + perKanji + (i < remainder ? 1 : 0);
    result.push(moraList.slice(index, end).join(''));
    index = end;
  }
  return result;
}

/**
 * Okurigana after a word whose last kanji has no dictionary reading. Without an
 * analyzer answer, trailing kana that does not start like a particle is all
 * taken as okurigana (清々しい).
 */
export function resolveJukujikunOkurigana(
  word: string,
  reading: string,
  remainingKana: string,
  analyzer: MorphAnalyzer | null | undefined
): DetectedOkurigana {
  if (!remainingKana) return { okurigana: '', rest: '', verbLike: false };

  let detected: DetectedOkurigana = { okurigana: '', rest: remainingKana, verbLike: false };
  if (analyzer) {
    detected = detectOkurigana(analyzer, word, reading, remainingKana, OkuriPrefix.Reading);
  }

  if (!detected.okurigana && remainingKana.length > 1 && !PARTICLE_HEADS.has(remainingKana[0])) {
    dp('resolveJukujikunOkurigana - taking all trailing kana', word, remainingKana);
    return { okurigana: remainingKana, rest: '', verbLike: detected.verbLike };
  }
  return detected;
}

function guessSyntheticClass(kanji: string, mora: string, table: KanjiTable): ReadingClass {
  const data = table.get(kanjiLookupKey(kanji));
  if (!data) return 'onyomi';
  if (data.onyomi.some((onyomi) => asHiragana(cleanDictReading(onyomi)) === mora)) return 'onyomi';
  if (data.kunyomi.some((kunyomi) => cleanDictReading(kunyomi).split('.')[0] === mora)) return 'kunyomi';
  return 'onyomi';
}

/**
 * Fill the unmatched positions of `alignment`.
 *
 * A known exception found inside the word wins; otherwise the mora left over
 * by the matched positions are shared out evenly. When the last kanji is among
 * the unmatched ones, its trailing okurigana is worked out here as well.
 */
export function processJukujikunPositions(
  word: string,
  alignment: MoraAlignment,
  remainingKana: string,
  table: KanjiTable,
  options: JukujikunOptions = {}
): JukujikunPatch {
  const chars = [...word];
  const matches = new Map<number, ReadingMatchInfo>();
  const unmatched = new Set(alignment.unmatchedPositions);

  if (unmatched.size === 0) return { matches, trailing: null };

  const isMatched = (pos: number) => matches.has(pos) || alignment.positions[pos]?.kind === 'matched';
  const fullFurigana = alignment.moraSplit.flat().join('');
  const exceptions = options.exceptions ?? getExceptionTable();

  for (const [key, entries] of exceptions) {
    const parts = splitExceptionKey(key);
    if (!parts || !word.includes(parts.word) || !fullFurigana.includes(parts.furigana)) continue;

    const exceptionChars = [...parts.word];
    let searchFrom = 0;
    let firstStart = -1;
    while (searchFrom <= chars.length - exceptionChars.length) {
      const start = findSubsequence(chars, exceptionChars, searchFrom);
      if (start === -1) break;
      if (firstStart === -1) firstStart = start;

      entries.forEach((entry, offset) => {
        // Onyomi and kunyomi entries keep whatever the alignment matched
        if (entry.type !== 'jukujikun') return;
        const pos = start + offset;
        matches.set(pos, syntheticMatch(chars[pos], entry.mora, 'jukujikun'));
        unmatched.add(pos);
      });

      // One kanji in front of the exception reads as the kana in front of its reading
      if (searchFrom === 0 && start === 1 && alignment.positions[0]?.kind !== 'matched') {
        const prefix = fullFurigana.slice(0, fullFurigana.indexOf(parts.furigana));
        if (prefix) matches.set(0, syntheticMatch(chars[0], prefix, 'onyomi'));
      }
      searchFrom = start + exceptionChars.length;
    }

    const end = firstStart + entries.length;
    for (let pos = 0; pos < chars.length; pos++) {
      if (pos >= firstStart && pos < end) continue;
      if (isMatched(pos)) continue;
      const mora = (alignment.moraSplit[pos] ?? []).join('');
      if (!mora) continue;
      matches.set(pos, syntheticMatch(chars[pos], mora, guessSyntheticClass(chars[pos], mora, table)));
    }
    dp('processJukujikunPositions - exception', key, [...matches.entries()]);
    break;
  }

  if (!matches.size) {
    const jukuPositions = [...unmatched].sort((a, b) => a - b);
    const leftover = alignment.moraSplit
      .filter((_, pos) => alignment.positions[pos]?.kind !== 'matched')
      .map((mora) => mora.join(''))
      .join('');
    const moraList = splitToMora(leftover, jukuPositions.length).moraList;
    if (moraList.length > 0) {
      const redistributed = splitMoraForJukujikun(moraList, jukuPositions.length);
      jukuPositions.forEach((pos, index) => {
        const kanji = chars[pos];
        const mora = redistributed[index];
        // Numerals and the する stems of 為 inflect like ordinary kunyomi
        const asKunyomi = options.numeralPositions?.has(pos) === true
          || (kanji === '為' && (mora === 'し' || mora === 'さ'));
        matches.set(pos, syntheticMatch(kanji, mora, asKunyomi ? 'kunyomi' : 'jukujikun'));
      });
    }
  }

  const lastIndex = chars.length - 1;
  const lastMatch = matches.get(lastIndex);
  if (!unmatched.has(lastIndex) || !lastMatch) {
    return { matches, trailing: null };
  }

  let lastWord = chars[lastIndex];
  let lastReading = lastMatch.matchedMora;
  if (lastWord === REPEATER && lastIndex > 0) {
    lastWord = chars[lastIndex - 1] + REPEATER;
    lastReading = (matches.get(lastIndex - 1)?.matchedMora ?? '') + lastReading;
  }
  const trailing = resolveJukujikunOkurigana(lastWord, lastReading, remainingKana, options.analyzer);
  return { matches, trailing };
}

function findSubsequence(haystack: readonly string[], needle: readonly string[], from: number): number {
  outer: for (let i = from; i <= haystack.length - needle.length; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return i;
  }
  return -1;
}

/**
 * New alignment with the patch's readings filled in. Positions the patch does
 * not cover stay unmatched.
 */
export function applyJukujikunPatch(alignment: MoraAlignment, patch: JukujikunPatch): MoraAlignment {
  const positions = alignment.positions.map((position, pos): PositionResult => {
    const match = patch.matches.get(pos);
    return match ? { kind: 'matched', match } : position;
  });
  const moraSplit = alignment.moraSplit.map((mora, pos) => {
    const match = patch.matches.get(pos);
    return match ? [match.matchedMora] : [...mora];
  });
  const unmatchedPositions = alignment.unmatchedPositions.filter((pos) => !patch.matches.has(pos));

  return {
    positions,
    moraSplit,
    unmatchedPositions,
    isComplete: unmatchedPositions.length === 0,
    finalOkurigana: patch.trailing ? patch.trailing.okurigana : alignment.finalOkurigana,
    finalRestKana: patch.trailing ? patch.trailing.rest : alignment.finalRestKana
  };
}
