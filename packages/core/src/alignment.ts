// yomikata/alignment - Distribute a word's mora across its kanji

import { dp } from './conn.js';
import { REPEATER, SMALL_YOON, isRendakuOf } from './characters.js';
import { countPartitions, orderedPartitions } from './partitions.js';
import { extractOkuriganaForMatch, matchReadingToMora } from './reading-matcher.js';
import { kanjiLookupKey } from './kanji.js';
import type { KanjiTable, MoraAlignment, PositionResult, ReadingMatchInfo } from './types.js';

export interface AlignmentOptions {
  /** Try kunyomi before onyomi, used when the highlighted kanji is the whole word */
  isWholeWord?: boolean;
  /** Stop after this many candidate partitions */
  maxPartitions?: number;
}

const UNMATCHED: PositionResult = { kind: 'unmatched' };

function matched(match: ReadingMatchInfo): PositionResult {
  return { kind: 'matched', match };
}

export function containsRepeater(chars: readonly string[]): boolean {
  return chars.slice(1).includes(REPEATER);
}

/**
 * A repeater must cover as many mora as the kanji it repeats.
 */
export function isValidSplitForRepeaters(chars: readonly string[], split: readonly (readonly string[])[]): boolean {
  for (let i = 1; i < chars.length; i++) {
    if (chars[i] === REPEATER && split[i].length !== split[i - 1].length) {
      return false;
    }
  }
  return true;
}

export function matchedMoraCount(alignment: MoraAlignment): number {
  let count = 0;
  for (const position of alignment.positions) {
    if (position.kind === 'matched') count += position.match.matchedMora.length;
  }
  return count;
}

/**
 * All positions unmatched, one mora each, the trailing kana left as is.
 */
export function unmatchedAlignment(kanjiCount: number, moraList: readonly string[], okurigana: string): MoraAlignment {
  const moraSplit: string[][] = [];
  for (let i = 0; i < kanjiCount; i++) {
    moraSplit.push(i < moraList.length ? [moraList[i]] : []);
  }
  // Mora beyond the kanji count stay with the last position
  if (kanjiCount > 0 && moraList.length > kanjiCount) {
    moraSplit[kanjiCount - 1].push(...moraList.slice(kanjiCount));
  }
  return {
    positions: moraSplit.map(() => UNMATCHED),
    moraSplit,
    unmatchedPositions: moraSplit.map((_, index) => index),
    isComplete: false,
    finalOkurigana: '',
    finalRestKana: okurigana
  };
}

/**
 * Try every order-preserving split of `moraList` over the kanji of `word` and
 * return the first one where every kanji matches a dictionary reading. When
 * none does, return the split with the fewest unmatched kanji, ties going to
 * the one that matched the most kana.
 */
export function findFirstCompleteAlignment(
  word: string,
  okurigana: string,
  moraList: readonly string[],
  table: KanjiTable,
  options: AlignmentOptions = {}
): MoraAlignment {
  const chars = [...word];
  const kanjiCount = chars.length;

  if (kanjiCount === 0) {
    return {
      positions: [],
      moraSplit: [],
      unmatchedPositions: [],
      isComplete: true,
      finalOkurigana: '',
      finalRestKana: okurigana
    };
  }

  dp('findFirstCompleteAlignment', word, moraList, `${countPartitions(moraList.length, kanjiCount)} partitions`);

  const hasRepeater = containsRepeater(chars);
  const isWholeWord = options.isWholeWord ?? false;
  const maxPartitions = options.maxPartitions ?? Infinity;

  let best: MoraAlignment | null = null;
  let bestUnmatched = kanjiCount + 1;
  let bestCharsMatched = 0;
  const yoonSplits: string[][] = [];

  const lookup = (char: string) => table.get(kanjiLookupKey(char));

  const processSplit = (split: readonly string[], skipYoonCheck: boolean): MoraAlignment => {
    const positions: PositionResult[] = [];
    const unmatchedPositions: number[] = [];
    let finalOkurigana = '';
    let finalRestKana = '';

    let i = 0;
    while (i < kanjiCount) {
      const kanji = chars[i];
      const isLast = i === kanjiCount - 1;
      const nextKanji = i < kanjiCount - 1 ? chars[i + 1] : '';
      const nextIsRepeater = nextKanji === REPEATER || nextKanji === kanji;
      const moraSequence = split[i] ?? '';
      const data = lookup(kanji);

      const withOkuri = isLast && !nextIsRepeater;
      const match = matchReadingToMora(
        kanji, moraSequence, data, withOkuri ? okurigana : '', withOkuri, isWholeWord
      );

      // きゃ could be the previous kanji's き plus this kanji's ゃ-less yōon reading
      const prevSequence = i > 0 ? split[i - 1] : null;
      if (
        !skipYoonCheck
        && !nextIsRepeater
        && prevSequence !== null
        && moraSequence.length === 2
        && SMALL_YOON.includes(moraSequence[1])
      ) {
        const small = moraSequence[1];
        const yoonMatch = matchReadingToMora(
          kanji, small, data, withOkuri ? okurigana : '', withOkuri, isWholeWord
        );
        if (yoonMatch) {
          const yoonSplit = [...split];
          yoonSplit[i - 1] = prevSequence + moraSequence[0];
          yoonSplit[i] = small;
          yoonSplits.push(yoonSplit);
        }
      }

      if (match && nextIsRepeater) {
        const secondMora = split[i + 1] ?? '';
        if (secondMora !== moraSequence && !isRendakuOf(moraSequence, secondMora)) {
          // Accepted anyway: repetition carries the first reading's type
          dp('findFirstCompleteAlignment - repeater reading differs', moraSequence, secondMora);
        }

        const repeaterMatch: ReadingMatchInfo = { ...match, matchedMora: secondMora, kanji: REPEATER };
        const repeaterIsLast = i + 1 === kanjiCount - 1;
        if (repeaterIsLast) {
          const extracted = extractOkuriganaForMatch(match.matchType, match.dictForm, okurigana, kanji, table);
          repeaterMatch.okurigana = extracted.okurigana;
          repeaterMatch.restKana = extracted.restKana;
          finalOkurigana = extracted.okurigana;
          finalRestKana = extracted.restKana;
        }

        positions.push(matched(match), matched(repeaterMatch));
        i += 2;
        continue;
      }

      if (match) {
        if (isLast) {
          const extracted = extractOkuriganaForMatch(match.matchType, match.dictForm, okurigana, kanji, table);
          match.okurigana = extracted.okurigana;
          match.restKana = extracted.restKana;
          finalOkurigana = extracted.okurigana;
          finalRestKana = extracted.restKana;
        }
        positions.push(matched(match));
      } else {
        positions.push(UNMATCHED);
        unmatchedPositions.push(i);
        if (nextIsRepeater) {
          positions.push(UNMATCHED);
          unmatchedPositions.push(i + 1);
          i += 2;
          continue;
        }
      }
      i++;
    }

    const last = positions[kanjiCount - 1];
    if (last && last.kind === 'matched' && !finalOkurigana) {
      const extracted = extractOkuriganaForMatch(
        last.match.matchType, last.match.dictForm, okurigana, chars[kanjiCount - 1] === REPEATER ? chars[kanjiCount - 2] : chars[kanjiCount - 1], table
      );
      finalOkurigana = extracted.okurigana;
      finalRestKana = extracted.restKana;
    }
    if (!last || last.kind === 'unmatched') {
      finalRestKana = okurigana;
    }

    return {
      positions,
      moraSplit: split.map((sequence) => moraOf(sequence, moraList)),
      unmatchedPositions,
      isComplete: unmatchedPositions.length === 0,
      finalOkurigana,
      finalRestKana
    };
  };

  const consider = (alignment: MoraAlignment): void => {
    const unmatched = alignment.unmatchedPositions.length;
    const charsMatched = matchedMoraCount(alignment);
    if (
      (unmatched < bestUnmatched && charsMatched >= bestCharsMatched)
      || (unmatched <= bestUnmatched && charsMatched > bestCharsMatched)
    ) {
      best = alignment;
      bestUnmatched = unmatched;
      bestCharsMatched = charsMatched;
    }
  };

  let tried = 0;
  for (const partition of orderedPartitions(moraList, kanjiCount)) {
    if (hasRepeater && !isValidSplitForRepeaters(chars, partition)) continue;
    if (tried++ >= maxPartitions) break;

    const alignment = processSplit(partition.map((group) => group.join('')), false);
    if (alignment.isComplete) {
      dp('findFirstCompleteAlignment - complete', alignment.moraSplit);
      return alignment;
    }
    consider(alignment);
  }

  for (const split of yoonSplits) {
    const alignment = processSplit(split, true);
    if (alignment.isComplete) {
      dp('findFirstCompleteAlignment - complete after yoon repair', alignment.moraSplit);
      return alignment;
    }
    consider(alignment);
  }

  if (best) {
    dp('findFirstCompleteAlignment - best partial', best);
    return best;
  }

  return unmatchedAlignment(kanjiCount, moraList, okurigana);
}

/**
 * Re-split a joined group back into mora of the original list. Yōon repair
 * can move a single kana across a boundary, so fall back to characters.
 */
function moraOf(sequence: string, moraList: readonly string[]): string[] {
  const result: string[] = [];
  let rest = sequence;
  while (rest) {
    const mora = moraList.find((candidate) => candidate.length > 0 && rest.startsWith(candidate));
    const piece = mora ?? rest[0];
    result.push(piece);
    rest = rest.slice(piece.length);
  }
  return result;
}
