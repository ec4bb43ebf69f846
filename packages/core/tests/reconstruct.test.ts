// Furigana rendering tests
import { describe, test, expect } from 'vitest';
import {
  constructWrappedFuriWord,
  reconstructFurigana,
  restoreKatakana,
  tagForReadingClass,
  type RenderEntry,
  type WrapTag
} from '../src/index.js';

function entry(kanji: string, tag: WrapTag, furigana: string, highlight = false, isNum = false): RenderEntry {
  return { kanji, tag, furigana, highlight, isNum };
}

const furigana = { returnType: 'furigana', mergeConsecutive: true, withTags: true } as const;

describe('constructWrappedFuriWord', () => {
  test('highlighted kanji is rendered on its own', () => {
    const entries = [entry('漢', 'on', 'かん', true), entry('字', 'on', 'じ')];
    expect(constructWrappedFuriWord(entries, furigana)).toBe('<b><on> 漢[かん]</on></b><on> 字[じ]</on>');
  });

  test('different reading types are not merged', () => {
    const entries = [entry('友', 'kun', 'とも'), entry('達', 'on', 'だち')];
    expect(constructWrappedFuriWord(entries, furigana)).toBe('<kun> 友[とも]</kun><on> 達[だち]</on>');
  });

  describe('number with counter', () => {
    const entries = [entry('11', 'on', 'じゅういっ', false, true), entry('個', 'on', 'こ')];

    test('kana, split', () => {
      expect(constructWrappedFuriWord(entries, { ...furigana, returnType: 'kana_only', mergeConsecutive: false }))
        .toBe('<on>じゅういっ</on><on>こ</on>');
    });

    test('furigana, split', () => {
      expect(constructWrappedFuriWord(entries, { ...furigana, mergeConsecutive: false }))
        .toBe('<on> 11[じゅういっ]</on><on> 個[こ]</on>');
    });

    test('furigana, merged', () => {
      expect(constructWrappedFuriWord(entries, furigana)).toBe('<on> 11個[じゅういっこ]</on>');
    });
  });

  describe('number spelled with two kanji numerals', () => {
    const entries = [
      entry('40', 'kun', 'よん', false, true),
      entry('', 'on', 'じゅっ', false, true),
      entry('分', 'on', 'ぷん')
    ];

    test('kana, split', () => {
      expect(constructWrappedFuriWord(entries, { ...furigana, returnType: 'kana_only', mergeConsecutive: false }))
        .toBe('<kun>よん</kun><on>じゅっ</on><on>ぷん</on>');
    });

    test('kana, merged', () => {
      expect(constructWrappedFuriWord(entries, { ...furigana, returnType: 'kana_only' }))
        .toBe('<kun>よん</kun><on>じゅっぷん</on>');
    });

    test('furigana keeps the numeral whole under a mixed tag', () => {
      expect(constructWrappedFuriWord(entries, { ...furigana, mergeConsecutive: false }))
        .toBe('<mix> 40[よんじゅっ]</mix><on> 分[ぷん]</on>');
    });
  });
});

describe('reconstructFurigana', () => {
  const options = { returnType: 'furigana', withTags: true, mergeConsecutive: true, includeSuruOkuri: false } as const;

  test('kunyomi okurigana stays inside the highlight', () => {
    expect(reconstructFurigana({
      entries: [entry('食', 'kun', 'た', true)],
      okurigana: 'べる',
      restKana: '',
      highlightMatchType: 'kunyomi',
      wordLength: 1,
      isWholeWord: true,
      verbLike: false
    }, options)).toBe('<b><kun> 食[た]</kun><oku>べる</oku></b>');
  });

  test('する okurigana of an onyomi compound goes outside the highlight', () => {
    const input = {
      entries: [entry('勉', 'on', 'べん'), entry('強', 'on', 'きょう', true)],
      okurigana: 'しません',
      restKana: '',
      highlightMatchType: 'onyomi' as const,
      wordLength: 2,
      isWholeWord: false,
      verbLike: false
    };
    expect(reconstructFurigana(input, options))
      .toBe('<on> 勉[べん]</on><b><on> 強[きょう]</on></b><oku>しません</oku>');
    expect(reconstructFurigana(input, { ...options, includeSuruOkuri: true }))
      .toBe('<on> 勉[べん]</on><b><on> 強[きょう]</on><oku>しません</oku></b>');
  });

  test('analyzer suru compound respects includeSuruOkuri', () => {
    const input = {
      entries: [entry('勉', 'on', 'べん'), entry('強', 'on', 'きょう', true)],
      okurigana: 'ずる',
      restKana: '',
      highlightMatchType: 'onyomi' as const,
      wordLength: 2,
      isWholeWord: false,
      verbLike: true
    };
    expect(reconstructFurigana(input, options))
      .toBe('<on> 勉[べん]</on><b><on> 強[きょう]</on></b><oku>ずる</oku>');
    expect(reconstructFurigana(input, { ...options, includeSuruOkuri: true }))
      .toBe('<on> 勉[べん]</on><b><on> 強[きょう]</on><oku>ずる</oku></b>');
  });

  test('a highlight over the whole word keeps its okurigana', () => {
    const input = {
      entries: [entry('清', 'juk', 'すが', true), entry('々', 'juk', 'すが', true)],
      okurigana: 'しい',
      restKana: '',
      highlightMatchType: 'jukujikun' as const,
      wordLength: 2,
      isWholeWord: true,
      verbLike: false
    };
    expect(reconstructFurigana(input, options)).toBe('<b><juk> 清々[すがすが]</juk><oku>しい</oku></b>');
    expect(reconstructFurigana(input, { ...options, returnType: 'kana_only', withTags: false }))
      .toBe('<b>すがすがしい</b>');
    expect(reconstructFurigana({ ...input, okurigana: 'する' }, options))
      .toBe('<b><juk> 清々[すがすが]</juk></b><oku>する</oku>');
  });

  test('untagged furikanji', () => {
    expect(reconstructFurigana({
      entries: [entry('漢', 'on', 'かん'), entry('字', 'on', 'じ')],
      okurigana: '',
      restKana: 'を',
      highlightMatchType: null,
      wordLength: 2,
      isWholeWord: false,
      verbLike: false
    }, { ...options, returnType: 'furikanji', withTags: false })).toBe(' かんじ[漢字]を');
  });
});

describe('Rendering helpers', () => {
  test('reading classes map to tags', () => {
    expect(tagForReadingClass('onyomi')).toBe('on');
    expect(tagForReadingClass('kunyomi')).toBe('kun');
    expect(tagForReadingClass('jukujikun')).toBe('juk');
  });

  test('katakana is restored by position in the reading', () => {
    const restored = restoreKatakana([entry('漢', 'on', 'かん'), entry('字', 'on', 'じ')], [2]);
    expect(restored.map((e) => e.furigana)).toEqual(['かん', 'ジ']);
  });
});
