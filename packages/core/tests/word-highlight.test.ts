// Word lookup: dictionary-form words found in furigana text
import { describe, test, expect } from 'vitest';
import { highlightInflectedWords, wordHighlight, wordUpToOkuri } from '../src/index.js';
import { createTestContext, ScriptedAnalyzer, token } from './fixtures.js';

const context = createTestContext();

describe('wordUpToOkuri', () => {
  test('kana before the last kanji is kept with its space', () => {
    expect(wordUpToOkuri('やり 直[なお]す')).toEqual({ before: 'やり ', kanji: '直', furigana: 'なお', okurigana: 'す' });
  });

  test('earlier kanji stay in front', () => {
    expect(wordUpToOkuri(' 入[い]れ込[こ]む')).toEqual({ before: ' 入[い]れ', kanji: '込', furigana: 'こ', okurigana: 'む' });
    expect(wordUpToOkuri('意[い]を決[けっ]する')).toEqual({ before: '意[い]を', kanji: '決', furigana: 'けっ', okurigana: 'する' });
  });

  test('kana only', () => {
    expect(wordUpToOkuri('したためる')).toEqual({ before: 'したためる', kanji: '', furigana: '', okurigana: '' });
  });
});

describe('wordHighlight', () => {
  test('word without okurigana', async () => {
    expect(await wordHighlight('私[わたし]は 日本語[にほんご]を', '日本語[にほんご]', context))
      .toBe('私[わたし]は<b> 日本語[にほんご]</b>を');
  });

  test('part of a longer compound', async () => {
    expect(await wordHighlight('漢字[かんじ]を 書[か]く', '字[じ]', context))
      .toBe('漢[かん]<b> 字[じ]</b>を 書[か]く');
  });

  test('inflected verb', async () => {
    expect(await wordHighlight('私は 食[た]べさせるな!', '食[た]べる', context))
      .toBe('私は<b> 食[た]べさせる</b>な!');
  });

  test('other words are merged back', async () => {
    expect(await wordHighlight('漢字[かんじ]を 書[か]く', '書[か]く', context))
      .toBe('漢字[かんじ]を<b> 書[か]く</b>');
  });

  test('kanji word written without furigana', async () => {
    expect(await wordHighlight('パンを食べた', '食べる', context)).toBe('パンを<b>食べた</b>');
  });

  test('kana word matches katakana', async () => {
    expect(await wordHighlight('タレコミがあった', 'たれこみ', context)).toBe('<b>タレコミ</b>があった');
  });

  test('empty input', async () => {
    expect(await wordHighlight('', '食[た]べる', context)).toBe('');
    expect(await wordHighlight('食[た]べる', '', context)).toBe('食[た]べる');
  });
});

describe('highlightInflectedWords', () => {
  const analyzer = new ScriptedAnalyzer({
    'このケーキ、おいしくない？': [
      token('この', 'この', 'other'),
      token('ケーキ', 'ケーキ', 'noun'),
      token('、', '、', 'other'),
      token('おいしく', 'おいしい', 'i_adjective', 'continuative'),
      token('ない', 'ない', 'bound_auxiliary', 'dictionary_form'),
      token('？', '？', 'other')
    ],
    'よく みている': [
      token('よく', 'よく', 'adverb'),
      token('み', 'みる', 'verb', 'continuative'),
      token('て', 'て', 'particle'),
      token('いる', 'いる', 'verb', 'dictionary_form')
    ]
  });
  const withAnalyzer = createTestContext({ analyzer });

  test('adjective with its conjugation', () => {
    expect(highlightInflectedWords('このケーキ、おいしくない？', 'おいしい', withAnalyzer))
      .toBe('このケーキ、<b>おいしくない</b>？');
  });

  test('spaces dropped by the analyzer are kept', () => {
    expect(highlightInflectedWords('よく みている', 'みる', withAnalyzer)).toBe('よく<b> みている</b>');
  });

  test('no match leaves the text as is', () => {
    expect(highlightInflectedWords('このケーキ、おいしくない？', 'まずい', withAnalyzer))
      .toBe('このケーキ、おいしくない？');
  });
});
