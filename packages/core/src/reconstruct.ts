// yomikata/reconstruct - Render aligned readings back into furigana markup

import { dp } from './conn.js';
import { asKatakana, isDigits } from './characters.js';
import { digitsToKanji } from './numbers.js';
import type { FuriganaMode, ReadingClass, RenderEntry, WrapTag } from './types.js';

export interface ConstructOptions {
  returnType: FuriganaMode;
  mergeConsecutive: boolean;
  withTags: boolean;
  applyHighlight?: boolean;
}

export function tagForReadingClass(readingClass: ReadingClass): WrapTag {
  switch (readingClass) {
    case 'onyomi':
      return 'on';
    case 'kunyomi':
      return 'kun';
    case 'jukujikun':
      return 'juk';
  }
}

/**
 * Whether `next` folds into `cur`, and the tag and number flag of the result.
 */
function mergeStep(
  cur: RenderEntry,
  next: RenderEntry,
  isLastNext: boolean,
  { returnType, mergeConsecutive }: ConstructOptions
): { tag: WrapTag; isNum: boolean } | null {
  const sameTag = next.tag === cur.tag;
  const sameHighlight = next.highlight === cur.highlight;

  // Repeated kanji read the same way
  if (
    (next.kanji === cur.kanji || next.kanji === '々')
    && sameTag
    && sameHighlight
    && (mergeConsecutive || !(cur.isNum && next.isNum))
    && (mergeConsecutive || cur.kanji !== '' || next.kanji !== '')
  ) {
    return { tag: cur.tag, isNum: cur.isNum && next.isNum };
  }

  if (mergeConsecutive && sameTag && sameHighlight) {
    // Keep a number and its counter apart when one of them is highlighted
    if (cur.isNum !== next.isNum && (cur.highlight || next.highlight)) return null;
    return { tag: cur.tag, isNum: cur.isNum && next.isNum };
  }

  // The rest of a spelled-out number
  if (returnType !== 'kana_only' && cur.isNum && next.kanji === '' && sameHighlight) {
    return { tag: 'mix', isNum: true };
  }

  if (returnType !== 'kana_only' && cur.isNum && next.isNum && sameHighlight) {
    return { tag: sameTag ? cur.tag : 'mix', isNum: true };
  }

  if (mergeConsecutive && returnType === 'furikanji' && cur.isNum && !next.isNum) {
    if (isLastNext && sameTag) return { tag: cur.tag, isNum: false };
    return null;
  }

  // More kanji than mora in the input reading
  if (next.furigana === '') {
    return { tag: cur.tag, isNum: cur.isNum };
  }

  return null;
}

/**
 * Merge adjacent entries per the options and render each as a `kanji[kana]`,
 * `kana[kanji]` or bare kana run, wrapped in its reading tag and `<b>`.
 */
export function constructWrappedFuriWord(entries: readonly RenderEntry[], options: ConstructOptions): string {
  const { returnType, withTags } = options;
  const applyHighlight = options.applyHighlight ?? true;

  let result = '';
  let index = 0;
  while (index < entries.length) {
    let cur: RenderEntry = { ...entries[index] };

    while (index + 1 < entries.length) {
      const next = entries[index + 1];
      const merged = mergeStep(cur, next, index + 2 >= entries.length, options);
      if (!merged) break;
      cur = {
        kanji: cur.kanji + next.kanji,
        tag: merged.tag,
        highlight: cur.highlight,
        furigana: cur.furigana + next.furigana,
        isNum: merged.isNum
      };
      index++;
    }

    let tag = cur.tag;
    // Long numbers read across several kanji numerals
    if (
      cur.isNum
      && returnType !== 'kana_only'
      && tag !== 'mix'
      && isDigits(cur.kanji)
      && [...digitsToKanji(cur.kanji)].length >= 3
    ) {
      tag = 'mix';
    }

    index++;
    let base: string;
    if (returnType === 'kana_only') {
      base = cur.furigana;
    } else if (!cur.kanji) {
      continue;
    } else if (returnType === 'furikanji') {
      base = ` ${cur.furigana}[${cur.kanji}]`;
    } else {
      base = ` ${cur.kanji}[${cur.furigana}]`;
    }

    let wrapped = withTags ? `<${tag}>${base}</${tag}>` : base;
    if (applyHighlight && cur.highlight) {
      wrapped = `<b>${wrapped}</b>`;
    }
    result += wrapped;
  }
  return result;
}

export interface ReconstructInput {
  /** One entry per rendered position, highlight flags already set */
  entries: readonly RenderEntry[];
  okurigana: string;
  restKana: string;
  /** How the highlighted kanji was read, null when nothing is highlighted */
  highlightMatchType: ReadingClass | null;
  /** Word length in characters, as written */
  wordLength: number;
  /** The highlight covers the whole word (字, 人々) */
  isWholeWord: boolean;
  /** The okurigana belongs to a suru compound */
  verbLike: boolean;
}

export interface ReconstructOptions {
  returnType: FuriganaMode;
  withTags: boolean;
  mergeConsecutive: boolean;
  includeSuruOkuri: boolean;
}

function renderSegment(entries: readonly RenderEntry[], options: ReconstructOptions): string {
  if (options.withTags) {
    return constructWrappedFuriWord(entries, { ...options, applyHighlight: false });
  }
  const kanji = entries.map((entry) => entry.kanji).join('');
  const furigana = entries.map((entry) => entry.furigana).join('');
  switch (options.returnType) {
    case 'kana_only':
      return furigana;
    case 'furikanji':
      return ` ${furigana}[${kanji}]`;
    case 'furigana':
      return ` ${kanji}[${furigana}]`;
  }
}

/**
 * Split the entries around the highlighted run, render each part, and attach
 * okurigana and the remaining kana.
 *
 * Okurigana stays with the last part. It is moved outside the highlight when
 * the highlight is that last part and the okurigana conjugates a compound
 * read with onyomi or jukujikun (勉強しません), unless `includeSuruOkuri`.
 * A highlight over the whole word keeps its okurigana except for a bare する.
 */
export function reconstructFurigana(input: ReconstructInput, options: ReconstructOptions): string {
  const { entries, okurigana } = input;
  let restKana = input.restKana;

  const first = entries.findIndex((entry) => entry.highlight);
  let last = first;
  while (first !== -1 && last + 1 < entries.length && entries[last + 1].highlight) last++;

  const segments: Array<{ entries: RenderEntry[]; highlight: boolean }> = first === -1
    ? [{ entries: [...entries], highlight: false }]
    : [
        { entries: entries.slice(0, first), highlight: false },
        { entries: entries.slice(first, last + 1), highlight: true },
        { entries: entries.slice(last + 1), highlight: false }
      ].filter((segment) => segment.entries.length > 0);

  const okuriOutOfHighlight = !options.includeSuruOkuri && (
    input.verbLike
    || (
      (input.highlightMatchType === 'onyomi' || input.highlightMatchType === 'jukujikun')
      && ((!input.isWholeWord && input.wordLength > 1) || okurigana === 'する')
    )
  );
  const wrappedOkurigana = options.withTags && okurigana ? `<oku>${okurigana}</oku>` : okurigana;

  dp('reconstructFurigana', segments.length, okurigana, restKana, okuriOutOfHighlight);

  let result = '';
  segments.forEach((segment, index) => {
    let part = renderSegment(segment.entries, options);
    if (index === segments.length - 1) {
      if (segment.highlight && okuriOutOfHighlight) {
        restKana = wrappedOkurigana + restKana;
      } else {
        part += wrappedOkurigana;
      }
    }
    result += segment.highlight ? `<b>${part}</b>` : part;
  });
  return result + restKana;
}

/**
 * Put back the katakana of the original reading. Entries consume the reading
 * in order, so each one's characters line up with a slice of it.
 */
export function restoreKatakana(entries: readonly RenderEntry[], katakanaPositions: readonly number[]): RenderEntry[] {
  if (katakanaPositions.length === 0) return entries.map((entry) => ({ ...entry }));
  const katakana = new Set(katakanaPositions);
  let offset = 0;
  return entries.map((entry) => {
    let furigana = '';
    for (const char of entry.furigana) {
      furigana += katakana.has(offset) ? asKatakana(char) : char;
      offset++;
    }
    return { ...entry, furigana };
  });
}
