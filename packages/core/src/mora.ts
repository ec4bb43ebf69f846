// yomikata/mora - Split kana readings into mora

import {
  asHiragana,
  getKatakanaPositions,
  LONG_VOWEL_MARK,
  PALATALIZED_MORA,
  SINGLE_MORA,
  SOKUON
} from './characters.js';
import { dp } from './conn.js';
import type { MoraSplit } from './types.js';

function isBaseMora(text: string): boolean {
  if (text.length === 2) {
    return PALATALIZED_MORA.has(text) || (SINGLE_MORA.has(text[0]) && text[1] === LONG_VOWEL_MARK);
  }
  return text.length === 1 && (SINGLE_MORA.has(text) || text === 'ん');
}

/**
 * Read one mora starting at `start`. Two-kana forms win over single kana,
 * and a following っ is folded into the mora it follows.
 */
function readMora(text: string, start: number): string {
  for (const length of [2, 1]) {
    const base = text.slice(start, start + length);
    if (base.length !== length || !isBaseMora(base)) continue;
    return text[start + length] === SOKUON ? base + SOKUON : base;
  }
  return text[start];
}

/**
 * Segment a reading into mora.
 *
 * The reading is normalized to hiragana first; katakana positions are returned
 * so the original case can be restored when rendering. A standalone ん is merged
 * into the preceding mora when there are more mora than kanji, and an elongated
 * mora is split off its ー when there are fewer.
 */
export function splitToMora(reading: string, kanjiCount: number): MoraSplit {
  const katakanaPositions = getKatakanaPositions(reading);
  const text = asHiragana(reading);

  let moraList: string[] = [];
  let index = 0;
  while (index < text.length) {
    const mora = readMora(text, index);
    moraList.push(mora);
    index += mora.length;
  }

  if (moraList.includes('ん') && moraList.length > kanjiCount) {
    const merged: string[] = [];
    for (const mora of moraList) {
      if (mora === 'ん' && merged.length > 0) {
        merged[merged.length - 1] += mora;
      } else {
        merged.push(mora);
      }
    }
    moraList = merged;
  }

  if (text.includes(LONG_VOWEL_MARK) && moraList.length < kanjiCount) {
    const expanded: string[] = [];
    for (const mora of moraList) {
      if (mora.length >= 2 && mora.endsWith(LONG_VOWEL_MARK)) {
        expanded.push(mora.slice(0, -1), LONG_VOWEL_MARK);
      } else {
        expanded.push(mora);
      }
    }
    moraList = expanded;
  }

  dp('splitToMora', reading, kanjiCount, moraList);
  return { moraList, katakanaPositions };
}
