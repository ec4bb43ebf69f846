// yomikata/reading-type - Classify a rendered word by the reading tags it carries

export type WordReadingType = 'kun' | 'on' | 'juk' | 'mix' | '';

const TRAILING_KANA_REGEX = /(?:<oku>[ぁ-んァ-ン]+<\/oku>)?(?:[ぁ-んァ-ン]+)?$/;
const READING_TAG_REGEX = /<(kun|on|juk)>/g;

/**
 * Which reading a tagged word uses: `kun`, `on` or `juk` when every tag
 * agrees, `mix` when they differ, and an empty string for untagged input.
 * Okurigana and kana after the word are ignored.
 */
export function checkWordReadingType(wordWithTags: string): WordReadingType {
  const word = wordWithTags.replace(TRAILING_KANA_REGEX, '');
  const tags = new Set([...word.matchAll(READING_TAG_REGEX)].map((match) => match[1]));
  if (tags.size > 1) return 'mix';
  if (tags.has('kun')) return 'kun';
  if (tags.has('on')) return 'on';
  if (tags.has('juk')) return 'juk';
  return '';
}
