// yomikata/word-highlight - Bold every occurrence of a dictionary-form word, inflections included

import { dp } from './conn.js';
import { asHiragana, asKatakana, HIRAGANA_REGEX, isKana, KATAKANA_REGEX } from './characters.js';
import { CONJUGATABLE_LAST_OKURI, checkOkuriganaForInflection } from './inflection.js';
import { continuesConjugation, detectOkurigana, getHeadWordType, OkuriPrefix, type HeadWordType } from './okurigana.js';
import { createContext, highlightText, type HighlightContext } from './highlight.js';

const WORD_PART_REGEX = /([\d々一-龯㐀-䶿]+)\[(.+?)\]([ぁ-ん]*)/g;
const WORD_WITH_OPTIONAL_FURIGANA_REGEX = /([\d々一-龯㐀-䶿]+)(?:\[([^\]]*?)\])?([ぁ-ん]*)/;
const LAST_KANJI_FURIGANA_REGEX = /([一-龯㐀-䶿])々?(?:\[([^\]]*?)\])?$/;
const CONSECUTIVE_FURIGANA_REGEX = / ([\d々一-龯㐀-䶿]+)\[([^\]]*?)\] ([\d々一-龯㐀-䶿]+)\[([^\]]*?)\]/;
const READING_TAG_REGEX = /<\/?(?:on|kun|juk|mix|oku)>/g;

// Noun forms of godan verbs: 書き -> 書く
const NOUN_FORM_ENDINGS: Readonly<Record<string, string>> = {
  き: 'く',
  ぎ: 'ぐ',
  し: 'す',
  ち: 'つ',
  に: 'ぬ',
  び: 'ぶ',
  み: 'む',
  り: 'る'
};

export interface WordSplit {
  /** Everything before the last kanji run, spacing kept */
  before: string;
  kanji: string;
  furigana: string;
  okurigana: string;
}

/**
 * Split a word in furigana syntax at its last `kanji[reading]okurigana` part,
 * the only part that can inflect: やり 直[なお]す -> `やり `, 直, なお, す.
 */
export function wordUpToOkuri(word: string): WordSplit {
  const matches = [...word.matchAll(WORD_PART_REGEX)];
  const last = matches[matches.length - 1];
  if (!last || last.index === undefined) {
    return { before: word, kanji: '', furigana: '', okurigana: '' };
  }

  const kanji = last[1];
  let before = word.slice(0, last.index).trimEnd();
  let position = before.length;
  while (position < word.length && word[position] !== kanji[0]) {
    before += word[position];
    position++;
  }
  return { before, kanji, furigana: last[2], okurigana: last[3] };
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex source matching `word` with an optional leading space, each hiragana
 * also matching its katakana.
 */
function makeWordPattern(word: string): string {
  const escaped = escapeRegex(word.replace(/^ /, ''));
  return `\\s?${escaped.replace(/[ぁ-ん]/g, (char) => `(?:${char}|${asKatakana(char)})`)}`;
}

function wordTypeOfBaseForm(ending: string): HeadWordType | null {
  const partsOfSpeech = CONJUGATABLE_LAST_OKURI[ending] ?? [];
  if (partsOfSpeech.some((pos) => pos.startsWith('v'))) return 'verb';
  if (partsOfSpeech.includes('adj-i')) return 'i_adjective';
  return null;
}

/**
 * Bold each analyzer token whose headword is `baseForm`, together with the
 * tokens that conjugate it. Without an analyzer the word is matched as
 * written, hiragana and katakana alike.
 */
export function highlightInflectedWords(
  text: string,
  baseForm: string,
  context: HighlightContext,
  depth = 0
): string {
  if (!text || !baseForm || depth >= 2) return text;

  const { analyzer } = context;
  if (!analyzer) {
    return text.replace(new RegExp(makeWordPattern(baseForm), 'g'), (match) => `<b>${match}</b>`);
  }

  const stem = baseForm.slice(0, -1);
  let ending = asHiragana(baseForm.slice(-1));
  if (!CONJUGATABLE_LAST_OKURI[ending] && NOUN_FORM_ENDINGS[ending]) {
    ending = NOUN_FORM_ENDINGS[ending];
  }
  const wordType = wordTypeOfBaseForm(ending);
  const headword = stem + (KATAKANA_REGEX.test(stem) ? asKatakana(ending) : ending);

  const tokens = analyzer.tokenize(text);
  dp('highlightInflectedWords', headword, wordType, tokens.map((t) => t.word).join(' '));

  let result = '';
  let cursor = 0;
  let open = false;
  tokens.forEach((token, index) => {
    // The analyzer drops whitespace, so carry the gaps over from the text
    const at = text.indexOf(token.word, cursor);
    const gap = at === -1 ? '' : text.slice(cursor, at);
    if (at !== -1) cursor = at + token.word.length;

    if (open) {
      if (wordType !== null && continuesConjugation(tokens, index, wordType).add) {
        result += gap + token.word;
        return;
      }
      result += '</b>';
      open = false;
    }
    if ((token.headword === headword && getHeadWordType(token) === wordType) || token.headword === stem) {
      result += `<b>${gap}${token.word}`;
      open = true;
    } else {
      result += gap + token.word;
    }
  });
  if (open) result += '</b>';
  result += text.slice(cursor);

  if (result.includes('<b>')) return result;

  // Try the other script
  if (HIRAGANA_REGEX.test(baseForm)) return highlightInflectedWords(text, asKatakana(baseForm), context, depth + 1);
  if (KATAKANA_REGEX.test(baseForm)) return highlightInflectedWords(text, asHiragana(baseForm), context, depth + 1);
  return highlightInflectedWords(text, asHiragana(baseForm), context, depth + 1);
}

/**
 * Render with one furigana block per kanji and strip the reading tags, so a
 * word can be matched against part of a longer compound.
 */
async function splitPerKanji(text: string, context: HighlightContext): Promise<string> {
  const rendered = await highlightText(
    text,
    { withTags: true, mergeConsecutive: false, onyomiToKatakana: false },
    context
  );
  return rendered.replace(READING_TAG_REGEX, '');
}

function mergeConsecutiveFurigana(text: string): string {
  let merged = text;
  let match = CONSECUTIVE_FURIGANA_REGEX.exec(merged);
  while (match) {
    const [whole, kanji, furigana, nextKanji, nextFurigana] = match;
    merged = `${merged.slice(0, match.index)} ${kanji}${nextKanji}[${furigana}${nextFurigana}]${merged.slice(match.index + whole.length)}`;
    match = CONSECUTIVE_FURIGANA_REGEX.exec(merged);
  }
  return merged;
}

/**
 * Length of the okurigana at the start of `maybeOkuri` that inflects `word`
 * read as `reading`, whose dictionary okurigana is `endingOkurigana`.
 */
function inflectedLength(
  word: string,
  reading: string,
  endingOkurigana: string,
  maybeOkuri: string,
  context: HighlightContext
): number {
  const kana = asHiragana(maybeOkuri);
  if (context.analyzer) {
    return detectOkurigana(context.analyzer, word, reading, kana, OkuriPrefix.Word).okurigana.length;
  }
  const lastKanji = [...word].pop() ?? '';
  const checked = checkOkuriganaForInflection(endingOkurigana, lastKanji, kana);
  return checked.result === 'no_okuri' ? 0 : checked.okurigana.length;
}

function wrapRanges(text: string, ranges: ReadonlyArray<{ start: number; end: number }>): string {
  let result = text;
  // From the end so earlier offsets stay valid
  for (const { start, end } of [...ranges].reverse()) {
    result = `${result.slice(0, start)}<b>${result.slice(start, end)}</b>${result.slice(end)}`;
  }
  return result;
}

/**
 * Bold every occurrence of `word` in `text`, both in furigana syntax. The
 * word is given in dictionary form and matches its inflections:
 * `私は 食[た]べている` with `食[た]べる` -> `私は<b> 食[た]べている</b>`.
 * Words read in kana alone are found through the analyzer.
 */
export async function wordHighlight(
  text: string,
  word: string,
  context: HighlightContext = createContext()
): Promise<string> {
  if (!text || !word) return text;
  const hiraganaWord = asHiragana(word);
  if (isKana(hiraganaWord)) return highlightInflectedWords(text, hiraganaWord, context);

  const parts = WORD_WITH_OPTIONAL_FURIGANA_REGEX.exec(hiraganaWord);
  const endingOkurigana = parts?.[3] ?? '';
  const kanji = parts?.[1] ?? '';
  const furigana = parts?.[2] ?? '';
  dp('wordHighlight', hiraganaWord, kanji, furigana, endingOkurigana);

  if (!endingOkurigana) {
    const simple = text.replace(new RegExp(makeWordPattern(hiraganaWord), 'g'), (match) => `<b>${match}</b>`);
    if (simple !== text || !furigana) return simple;
  }

  const stem = endingOkurigana ? hiraganaWord.slice(0, -endingOkurigana.length) : hiraganaWord;

  if (!furigana) {
    const pattern = new RegExp(`${makeWordPattern(stem)}([ぁ-んァ-ン]*)`, 'g');
    const ranges = [...text.matchAll(pattern)].map((match) => {
      const start = match.index ?? 0;
      const maybeOkuri = match[1];
      const end = start + match[0].length - maybeOkuri.length;
      return { start, end: end + inflectedLength(kanji, furigana, endingOkurigana, maybeOkuri, context) };
    });
    return wrapRanges(text, ranges);
  }

  // Match per kanji so the word is found inside longer compounds
  const splitWord = await splitPerKanji(stem, context);
  const splitText = await splitPerKanji(text, context);
  const last = LAST_KANJI_FURIGANA_REGEX.exec(splitWord);
  const lastKanji = last?.[1] ?? '';
  const lastFurigana = last?.[2] ?? '';

  const pattern = new RegExp(`${makeWordPattern(splitWord)}([ぁ-んァ-ン]*)`, 'g');
  const ranges = [...splitText.matchAll(pattern)].map((match) => {
    const start = match.index ?? 0;
    const maybeOkuri = match[1];
    const end = start + match[0].length - maybeOkuri.length;
    if (!endingOkurigana) return { start, end };
    const length = inflectedLength(lastKanji, lastFurigana, endingOkurigana, maybeOkuri, context)
      || inflectedLength(kanji, furigana, endingOkurigana, maybeOkuri, context);
    return { start, end: end + length };
  });

  return mergeConsecutiveFurigana(wrapRanges(splitText, ranges)).replace(/^(<b>)? /, '$1');
}
