// yomikata/okurigana - Find the inflected tail after a word with a morphological analyzer

import { dp } from './conn.js';
import type { AnalyzerToken, DetectedOkurigana, MorphAnalyzer } from './types.js';

/**
 * What the analyzed text starts with: the word as written, or its kana
 * reading. Some words only tokenize correctly one way.
 */
export enum OkuriPrefix {
  Word = 'word',
  Reading = 'reading'
}

export type HeadWordType = 'i_adjective' | 'na_adjective' | 'verb' | 'adverb' | 'noun';

const STOP_WORDS = new Set(['だろう', 'でしょう', 'なら', 'から']);
const CAUSATIVE_PASSIVE_HEADWORDS = new Set(['れる', 'られる', 'せる', 'させる', 'てる']);

export function getHeadWordType(token: AnalyzerToken): HeadWordType | null {
  // An i-adjective in its く form is tagged as an adverb
  if (token.partOfSpeech === 'i_adjective' || (token.partOfSpeech === 'adverb' && token.word.endsWith('く'))) {
    return 'i_adjective';
  }
  if (token.partOfSpeech === 'na_adjective') return 'na_adjective';
  if (token.partOfSpeech === 'verb') return 'verb';
  if (token.partOfSpeech === 'adverb') return 'adverb';
  // 止め, 恥ずかしげ
  if (token.partOfSpeech === 'noun') return 'noun';
  return null;
}

function verbContinues(tokens: readonly AnalyzerToken[], index: number): boolean {
  const token = tokens[index];
  const prev = index > 0 ? tokens[index - 1] : undefined;
  const prevPrev = index > 1 ? tokens[index - 2] : undefined;
  const next = index < tokens.length - 1 ? tokens[index + 1] : undefined;

  // ている, でいる
  if (token.partOfSpeech === 'particle' && (token.word === 'て' || (token.word === 'で' && next?.headword === 'いる'))) {
    return true;
  }
  if (
    token.partOfSpeech === 'verb'
    && token.headword === 'いる'
    && (prev?.word === 'て' || prev?.word === 'で')
    && prevPrev?.headword !== 'ない'
  ) {
    return true;
  }
  if (token.partOfSpeech === 'verb' && CAUSATIVE_PASSIVE_HEADWORDS.has(token.headword)) return true;
  if (token.partOfSpeech === 'bound_auxiliary' && token.headword === 'ない') return true;
  return token.partOfSpeech === 'particle'
    && (token.word === 'て' || token.word === 'で')
    && prev?.headword === 'ない';
}

/**
 * Whether the token at `index` still belongs to the inflected tail of a word of
 * type `wordType`, and whether it marks a suru compound.
 */
export function continuesConjugation(
  tokens: readonly AnalyzerToken[],
  index: number,
  wordType: HeadWordType
): { add: boolean; suru: boolean } {
  const token = tokens[index];
  if (STOP_WORDS.has(token.word)) return { add: false, suru: false };

  switch (wordType) {
    case 'verb': {
      const add = (
        token.partOfSpeech === 'bound_auxiliary'
        && token.inflectionType !== null
        && token.headword !== 'だ'
        && token.headword !== 'です'
      ) || verbContinues(tokens, index);
      return { add, suru: add && token.headword === 'する' };
    }
    case 'i_adjective': {
      const add = (
        token.partOfSpeech === 'bound_auxiliary'
        && (
          token.inflectionType === 'continuative_ta'
          || token.inflectionType === 'continuative_te'
          || token.inflectionType === 'hypothetical'
          || token.word === 'た'
          || token.word === 'ない'
        )
      )
        || (token.partOfSpeech === 'particle' && (token.word === 'て' || token.word === 'ば'))
        || token.word === 'さ'
        || (token.partOfSpeech === 'bound_auxiliary' && token.headword === 'う');
      return { add, suru: false };
    }
    case 'na_adjective':
      return { add: token.word === 'な', suru: false };
    case 'adverb':
    case 'noun': {
      const add = (token.partOfSpeech === 'verb' && token.headword === 'する')
        || (token.partOfSpeech === 'bound_auxiliary' && token.headword !== 'だ')
        || verbContinues(tokens, index)
        || (token.partOfSpeech === 'particle' && token.word === 'って');
      return { add, suru: token.headword === 'する' };
    }
  }
}

function noOkurigana(maybeOkuri: string): DetectedOkurigana {
  return { okurigana: '', rest: maybeOkuri, verbLike: false };
}

/**
 * Hand-checked splits the analyzer gets wrong.
 */
function checkDetectorExceptions(word: string, reading: string, maybeOkuri: string): DetectedOkurigana | null {
  // 久しぶり tokenizes as one noun
  if (word === '久' && reading === 'ひさ' && maybeOkuri.startsWith('しぶり')) {
    return { okurigana: 'し', rest: maybeOkuri.slice(1), verbLike: false };
  }
  if (word === '仄々' && reading === 'ほのぼの') {
    for (const okurigana of ['した', 'しい', 'し']) {
      if (maybeOkuri.startsWith(okurigana)) {
        return { okurigana, rest: maybeOkuri.slice(okurigana.length), verbLike: false };
      }
    }
  }
  return null;
}

/**
 * Split `maybeOkuri` into the conjugated tail of `word` (read as `reading`)
 * and whatever follows it.
 *
 * The text handed to the analyzer starts with either the word or its reading.
 * When the first token is not something that inflects, the other prefix is
 * tried once before giving up.
 */
export function detectOkurigana(
  analyzer: MorphAnalyzer,
  word: string,
  reading: string,
  maybeOkuri: string,
  strategy: OkuriPrefix = OkuriPrefix.Word
): DetectedOkurigana {
  if (!maybeOkuri) return { okurigana: '', rest: '', verbLike: false };

  const exception = checkDetectorExceptions(word, reading, maybeOkuri);
  if (exception) return exception;

  let current = strategy;
  for (let attempt = 0; attempt < 2; attempt++) {
    let prefix: string;
    if (current === OkuriPrefix.Word) {
      // 為 and 抉 get the wrong headword when written as kanji
      const useReading = (word === '為' && reading === 'し') || word === '抉' || !word;
      prefix = useReading ? reading : word;
      if (useReading) current = OkuriPrefix.Reading;
    } else {
      prefix = reading || word;
      if (!reading) current = OkuriPrefix.Word;
    }
    if (!prefix) return noOkurigana(maybeOkuri);

    const tokens = analyzer.tokenize(prefix + maybeOkuri);
    dp('detectOkurigana', prefix + maybeOkuri, tokens.map((t) => `${t.word}/${t.partOfSpeech}`).join(' '));
    if (tokens.length === 0) return noOkurigana(maybeOkuri);

    const first = tokens[0];
    const wordType = getHeadWordType(first);
    if (!wordType) {
      if (attempt === 0 && current === OkuriPrefix.Word && reading) {
        current = OkuriPrefix.Reading;
        continue;
      }
      return noOkurigana(maybeOkuri);
    }

    let okurigana = first.word.slice(prefix.length);
    // 恥ずかしげ: the げ is 気, not a conjugation
    if (wordType === 'noun' && first.word.endsWith('げ')) {
      okurigana = first.word.slice(prefix.length, -1);
      return { okurigana, rest: maybeOkuri.slice(okurigana.length), verbLike: false };
    }

    let rest = maybeOkuri.slice(okurigana.length);
    let verbLike = false;
    const restTokens = tokens.slice(1);
    for (let index = 0; index < restTokens.length; index++) {
      const { add, suru } = continuesConjugation(restTokens, index, wordType);
      if (!add) break;
      okurigana += restTokens[index].word;
      rest = rest.slice(restTokens[index].word.length);
      if (suru) verbLike = true;
    }
    return { okurigana, rest, verbLike };
  }

  return noOkurigana(maybeOkuri);
}
