// yomikata/characters - Kana tables, phonetic rule tables and character classification

// Hiragana and katakana blocks are offset by 0x60 from ぁ/ァ up to ゖ/ヶ
const KANA_OFFSET = 0x60;

export const HIRAGANA_REGEX = /^[ぁ-ゖー]+$/;
export const KATAKANA_REGEX = /^[ァ-ヺー]+$/;
export const KANA_REGEX = /^[ぁ-ゖァ-ヺー]+$/;
export const KANJI_REGEX = /[々〆一-鿿㐀-䶿]/;
export const DIGIT_REGEX = /^[0-9０-９]+$/;

export const REPEATER = '々';

/**
 * Convert katakana to hiragana, leaving everything else untouched.
 */
export function asHiragana(text: string): string {
  let result = '';
  for (const char of text) {
    const code = char.charCodeAt(0);
    result += code >= 0x30a1 && code <= 0x30f6 ? String.fromCharCode(code - KANA_OFFSET) : char;
  }
  return result;
}

/**
 * Convert hiragana to katakana, leaving everything else untouched.
 */
export function asKatakana(text: string): string {
  let result = '';
  for (const char of text) {
    const code = char.charCodeAt(0);
    result += code >= 0x3041 && code <= 0x3096 ? String.fromCharCode(code + KANA_OFFSET) : char;
  }
  return result;
}

export function isKatakanaChar(char: string): boolean {
  const code = char.charCodeAt(0);
  return code >= 0x30a1 && code <= 0x30fa;
}

export function isKana(text: string): boolean {
  return KANA_REGEX.test(text);
}

export function isDigits(text: string): boolean {
  return DIGIT_REGEX.test(text);
}

/**
 * Indices of katakana characters in a reading, so case can be restored
 * after matching has run on the hiragana form.
 */
export function getKatakanaPositions(text: string): number[] {
  const positions: number[] = [];
  let index = 0;
  for (const char of text) {
    if (isKatakanaChar(char)) positions.push(index);
    index++;
  }
  return positions;
}

// Voicing alternation of the first kana of a reading in compounds
export const RENDAKU_MAP: Readonly<Record<string, readonly string[]>> = {
  か: ['が'], き: ['ぎ'], く: ['ぐ'], け: ['げ'], こ: ['ご'],
  さ: ['ざ'], し: ['じ'], す: ['ず'], せ: ['ぜ'], そ: ['ぞ'],
  た: ['だ'], ち: ['ぢ'], つ: ['づ'], て: ['で'], と: ['ど'],
  は: ['ば', 'ぱ'], ひ: ['び', 'ぴ'], ふ: ['ぶ', 'ぷ'], へ: ['べ', 'ぺ'], ほ: ['ぼ', 'ぽ'],
  う: ['ぬ']
};

export function rendakuVariants(reading: string): string[] {
  if (!reading) return [];
  const voiced = RENDAKU_MAP[reading[0]];
  if (!voiced) return [];
  return voiced.map((kana) => kana + reading.slice(1));
}

export function isRendakuOf(plain: string, voiced: string): boolean {
  return rendakuVariants(plain).includes(voiced);
}

// Final kana that may geminate into っ
export const SMALL_TSU_FINALS = 'つちくきりんう';

// First-kana vowel contraction
export const VOWEL_CHANGE_MAP: Readonly<Record<string, readonly string[]>> = {
  あ: ['や', 'ゃ'],
  お: ['よ', 'ょ'],
  う: ['ゆ', 'ゅ']
};

export const YOON_SMALL_MAP: Readonly<Record<string, string>> = {
  や: 'ゃ',
  ゆ: 'ゅ',
  よ: 'ょ'
};

export const SMALL_YOON = 'ゃゅょ';

// Terminal kana that turn into ん before certain consonants (e.g. 三位 さんみ)
export const N_CHANGE_FINALS = 'のに';

// Plain single mora
export const SINGLE_MORA = new Set(
  [...'あいうえおかきくけこがぎぐげごさしすせそざじずぜぞたちつてとだぢづでどなにぬねのはひふへほばびぶべぼぱぴぷぺぽまみむめもやゆよらりるれろわゐゑをゔぁぃぅぇぉゎ']
);

// Two-kana palatalized and small-vowel combinations
export const PALATALIZED_MORA = new Set([
  'くぃ', 'きゃ', 'きゅ', 'きぇ', 'きょ', 'ぐぃ', 'ぎゃ', 'ぎゅ', 'ぎぇ', 'ぎょ',
  'すぃ', 'しゃ', 'しゅ', 'しぇ', 'しょ', 'ずぃ', 'じゃ', 'じゅ', 'じぇ', 'じょ',
  'てぃ', 'とぅ', 'ちゃ', 'ちゅ', 'ちぇ', 'ちょ', 'でぃ', 'どぅ', 'ぢゃ', 'でゅ', 'ぢゅ', 'ぢぇ', 'ぢょ',
  'つぁ', 'つぃ', 'つぇ', 'つぉ', 'づぁ', 'づぃ', 'づぇ', 'づぉ',
  'ひぃ', 'ほぅ', 'ひゃ', 'ひゅ', 'ひぇ', 'ひょ', 'びぃ', 'びゃ', 'びゅ', 'びぇ', 'びょ',
  'ぴぃ', 'ぴゃ', 'ぴゅ', 'ぴぇ', 'ぴょ', 'ふぁ', 'ふぃ', 'ふぇ', 'ふぉ',
  'ゔぁ', 'ゔぃ', 'ゔぇ', 'ゔぉ', 'ぬぃ', 'にゃ', 'にゅ', 'にぇ', 'にょ',
  'むぃ', 'みゃ', 'みゅ', 'みぇ', 'みょ', 'るぃ', 'りゃ', 'りゅ', 'りぇ', 'りょ', 'いぇ'
]);

export const SOKUON = 'っ';
export const LONG_VOWEL_MARK = 'ー';

// Kana rows, used by the okurigana rules to tell ichidan stems from godan ones
const I_ROW = 'いきぎしじちぢにひびぴみり';
const E_ROW = 'えけげせぜてでねへべぺめれ';

export function isIOrERow(char: string): boolean {
  return I_ROW.includes(char) || E_ROW.includes(char);
}

// Particles that should not be swallowed as okurigana after an unmatched kanji
export const PARTICLE_HEADS = new Set(['を', 'は', 'が', 'に', 'で', 'と', 'も', 'へ', 'の', 'や', 'か']);

// First kana of the okurigana of an onyomi す/する verb (呈す, 愛する)
export const ONYOMI_GODAN_SU_FIRST_KANA = 'さしすせそ';

/**
 * Replace a doubled kanji with the repeater glyph: 人人 -> 人々
 */
export function collapseDoubledKanji(word: string): string {
  const chars = [...word];
  for (let i = 1; i < chars.length; i++) {
    if (chars[i] === chars[i - 1] && KANJI_REGEX.test(chars[i]) && chars[i] !== REPEATER) {
      chars[i] = REPEATER;
    }
  }
  return chars.join('');
}
