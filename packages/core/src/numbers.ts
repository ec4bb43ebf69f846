// yomikata/numbers - Arabic numerals to kanji numerals

import { DIGIT_REGEX } from './characters.js';

const DIGIT_KANJI = '〇一二三四五六七八九';
const ZERO_KANJI = '零';
// One slot per power of ten; blanks are powers without their own kanji
const POWER_KANJI = '一十百千万   億   兆   京';

/**
 * Half-width digit string for a run of (possibly full-width) digits.
 */
export function normalizeDigits(text: string): string {
  let result = '';
  for (const char of text) {
    const code = char.charCodeAt(0);
    result += code >= 0xff10 && code <= 0xff19 ? String.fromCharCode(code - 0xff10 + 0x30) : char;
  }
  return result;
}

function numberToKanji(n: bigint): string {
  let mp = 1n;
  let mc = '';
  let p = 1n;

  for (let i = 0; i < POWER_KANJI.length && p <= n; i++) {
    const c = POWER_KANJI[i];
    if (c !== ' ') {
      mp = p;
      mc = c;
    }
    p *= 10n;
  }

  if (mp === 1n) {
    return DIGIT_KANJI[Number(n)];
  }

  const qt = n / mp;
  const rem = n % mp;

  // 十, 百 and 千 drop a leading 一 (百, not 一百)
  const qtStr = qt === 1n && mp <= 1000n ? '' : numberToKanji(qt);
  const remStr = rem === 0n ? '' : numberToKanji(rem);

  return qtStr + mc + remStr;
}

/**
 * Convert a run of digits to kanji numerals: 4567 -> 四千五百六十七,
 * １０ -> 十. Any other text is returned unchanged.
 */
export function digitsToKanji(text: string): string {
  if (!DIGIT_REGEX.test(text)) return text;

  const n = BigInt(normalizeDigits(text));
  if (n === 0n) return ZERO_KANJI;

  // A lone 一 in front of a large unit is dropped too: 億, 万 rather than 一億, 一万
  return numberToKanji(n).replace(/(^|[万億兆京])一(?=[万億兆京])/g, '$1');
}
