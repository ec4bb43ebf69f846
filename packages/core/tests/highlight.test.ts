// End-to-end furigana highlighting tests
import { describe, test, expect, vi, afterEach } from 'vitest';
import {
  cleanOkuriganaMix,
  EMPTY_READING_PLACEHOLDER,
  expandNumerals,
  findWordTokens,
  furiganaReverser,
  highlightText,
  kanaFilter,
  processWord,
  resolveOptions,
  type ExceptionMora,
  type HighlightOptions
} from '../src/index.js';
import { createTestContext, ScriptedAnalyzer, token as analyzed } from './fixtures.js';

const context = createTestContext();
const highlight = (text: string, options: HighlightOptions = {}) => highlightText(text, options, context);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('highlightText', () => {
  test('onyomi compound in katakana', async () => {
    expect(await highlight('漢字[かんじ]')).toBe('<on> 漢字[カンジ]</on>');
  });

  test('one block per kanji without merging', async () => {
    expect(await highlight('漢字[かんじ]', { mergeConsecutive: false })).toBe('<on> 漢[カン]</on><on> 字[ジ]</on>');
  });

  test('untagged output keeps the leading space', async () => {
    expect(await highlight('漢字[かんじ]', { withTags: false })).toBe(' 漢字[カンジ]');
  });

  describe('一見', () => {
    test('small tsu onyomi highlighted', async () => {
      expect(await highlight('一見[いっけん]', { kanjiToHighlight: '一' }))
        .toBe('<b><on> 一[イッ]</on></b><on> 見[ケン]</on>');
    });

    test('untagged', async () => {
      expect(await highlight('一見[いっけん]', { kanjiToHighlight: '一', withTags: false }))
        .toBe('<b> 一[イッ]</b> 見[ケン]');
    });

    test('kana only', async () => {
      expect(await highlight('一見[いっけん]', { kanjiToHighlight: '一', returnType: 'kana_only', withTags: false }))
        .toBe('<b>イッ</b>ケン');
      expect(await highlight('一見[いっけん]', { kanjiToHighlight: '一', returnType: 'kana_only' }))
        .toBe('<b><on>イッ</on></b><on>ケン</on>');
    });
  });

  describe('exceptions and jukujikun', () => {
    test('尻尾 from the exception table', async () => {
      expect(await highlight('尻尾[しっぽ]', { kanjiToHighlight: '尻' }))
        .toBe('<b><kun> 尻[しっ]</kun></b><kun> 尾[ぽ]</kun>');
    });

    test('風邪 is jukujikun', async () => {
      expect(await highlight('風邪[かぜ]', { kanjiToHighlight: '風' }))
        .toBe('<b><juk> 風[か]</juk></b><juk> 邪[ぜ]</juk>');
      expect(await highlight('風邪[かぜ]')).toBe('<juk> 風邪[かぜ]</juk>');
    });

    test('大人 falls back to an even jukujikun split', async () => {
      expect(await highlight('大人[おとな]', { kanjiToHighlight: '大' }))
        .toBe('<b><juk> 大[おと]</juk></b><juk> 人[な]</juk>');
      expect(await highlight('大人[おとな]', { kanjiToHighlight: '大', withTags: false }))
        .toBe('<b> 大[おと]</b> 人[な]');
    });
  });

  describe('suru okurigana', () => {
    const base: HighlightOptions = { kanjiToHighlight: '強', onyomiToKatakana: false };

    test('stays outside the highlight', async () => {
      expect(await highlight('勉強[べんきょう]しません', base))
        .toBe('<on> 勉[べん]</on><b><on> 強[きょう]</on></b><oku>しません</oku>');
    });

    test('untagged', async () => {
      expect(await highlight('勉強[べんきょう]しません', { ...base, withTags: false }))
        .toBe(' 勉[べん]<b> 強[きょう]</b>しません');
      expect(await highlight('勉強[べんきょう]しません', { ...base, withTags: false, returnType: 'kana_only' }))
        .toBe('べん<b>きょう</b>しません');
    });

    test('included when asked', async () => {
      expect(await highlight('勉強[べんきょう]しません', { ...base, includeSuruOkuri: true }))
        .toBe('<on> 勉[べん]</on><b><on> 強[きょう]</on><oku>しません</oku></b>');
    });
  });

  describe('suru okurigana found by the analyzer', () => {
    const analyzer = new ScriptedAnalyzer({
      勉強ずる: [analyzed('勉強', '勉強', 'noun'), analyzed('ずる', 'する', 'verb', 'dictionary_form')],
      なぞしません: [
        analyzed('なぞ', 'なぞ', 'noun'),
        analyzed('し', 'する', 'verb', 'continuative'),
        analyzed('ませ', 'ます', 'bound_auxiliary', 'imperfective'),
        analyzed('ん', 'ん', 'bound_auxiliary', 'dictionary_form')
      ]
    });
    const withAnalyzer = createTestContext({ analyzer });

    test('onyomi compound', async () => {
      expect(await highlightText('勉強[べんきょう]ずる', { kanjiToHighlight: '強' }, withAnalyzer))
        .toBe('<on> 勉[ベン]</on><b><on> 強[キョウ]</on></b><oku>ずる</oku>');
      expect(await highlightText('勉強[べんきょう]ずる', { kanjiToHighlight: '強', includeSuruOkuri: true }, withAnalyzer))
        .toBe('<on> 勉[ベン]</on><b><on> 強[キョウ]</on><oku>ずる</oku></b>');
    });

    test('jukujikun word with no dictionary reading', async () => {
      expect(await highlightText('謎[なぞ]しません', { kanjiToHighlight: '謎' }, withAnalyzer))
        .toBe('<b><juk> 謎[なぞ]</juk></b><oku>しません</oku>');
      expect(await highlightText('謎[なぞ]しません', { kanjiToHighlight: '謎', includeSuruOkuri: true }, withAnalyzer))
        .toBe('<b><juk> 謎[なぞ]</juk><oku>しません</oku></b>');
    });
  });

  test('kunyomi okurigana is highlighted with its kanji', async () => {
    expect(await highlight('食[た]べる', { kanjiToHighlight: '食' })).toBe('<b><kun> 食[た]</kun><oku>べる</oku></b>');
  });

  describe('doubled kanji', () => {
    test('are written with the repeater', async () => {
      expect(await highlight('清清[すがすが]しい')).toBe('<juk> 清々[すがすが]</juk><oku>しい</oku>');
    });

    test('okurigana stays inside a whole-word highlight', async () => {
      expect(await highlight('清清[すがすが]しい', { kanjiToHighlight: '清' }))
        .toBe('<b><juk> 清々[すがすが]</juk><oku>しい</oku></b>');
      expect(await highlight('清清[すがすが]しい', { kanjiToHighlight: '清', returnType: 'kana_only', withTags: false }))
        .toBe('<b>すがすがしい</b>');
    });
  });

  describe('okurigana inside the reading', () => {
    test('each kanji run gets its own reading', async () => {
      expect(await highlight('消え去[きえさ]る'))
        .toBe('<kun> 消[き]</kun><oku>え</oku><kun> 去[さ]</kun><oku>る</oku>');
    });

    test('the second kanji can be highlighted', async () => {
      expect(await highlight('消え去[きえさ]る', { kanjiToHighlight: '去' }))
        .toBe('<kun> 消[き]</kun><oku>え</oku><b><kun> 去[さ]</kun><oku>る</oku></b>');
    });
  });

  test('repeater word is highlighted whole', async () => {
    expect(await highlight('悠々[ゆうゆう]', { kanjiToHighlight: '悠' })).toBe('<b><on> 悠々[ユウユウ]</on></b>');
  });

  describe('numbers', () => {
    test('full-width digits with a counter', async () => {
      expect(await highlight('１０分[じゅっぷん]', { mergeConsecutive: false }))
        .toBe('<on> １０[ジュッ]</on><on> 分[プン]</on>');
      expect(await highlight('１０分[じゅっぷん]')).toBe('<on> １０分[ジュップン]</on>');
    });

    test('a numeral read across reading types is mixed', async () => {
      expect(await highlight('40分[よんじゅっぷん]', { onyomiToKatakana: false }))
        .toBe('<mix> 40[よんじゅっ]</mix><on> 分[ぷん]</on>');
    });

    test('digit runs expand to kanji numerals', () => {
      expect(expandNumerals('40分')).toEqual({
        expanded: '四十分',
        positions: [
          { sourceIndex: 0, numeral: '40' },
          { sourceIndex: 0, numeral: '40' },
          { sourceIndex: 2, numeral: null }
        ]
      });
    });
  });

  describe('several words', () => {
    test('tagged output pulls the space into the tag', async () => {
      expect(await highlight('漢字[かんじ]を 書[か]く'))
        .toBe('<on> 漢字[カンジ]</on>を<kun> 書[か]</kun><oku>く</oku>');
    });

    test('untagged output keeps it', async () => {
      expect(await highlight('漢字[かんじ]を 書[か]く', { withTags: false })).toBe(' 漢字[カンジ]を 書[か]く');
    });
  });

  test('a reading that is not kana is marked as an error', async () => {
    expect(await highlight('字[ji]')).toBe('<err>字[ji]</err>');
  });

  test('a word that fails to align is left as written', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const broken = new Map<string, ExceptionMora[]>([['漢字_かんじ', [{ type: 'onyomi', mora: 'かんじ' }]]]);
    const result = await highlightText('漢字[かんじ]です', {}, createTestContext({ exceptions: broken }));
    expect(result).toBe('漢字[かんじ]です');
    expect(spy).toHaveBeenCalledWith('Failed to align 漢字[かんじ]: Exception for 漢字 has 1 readings for 2 characters');
  });

});

describe('processWord', () => {
  const token = { word: '字', trailingKana: '', kanjiToHighlight: null };

  test('empty reading renders a placeholder in kana mode', () => {
    expect(processWord({ ...token, reading: '' }, new Map(), context, resolveOptions({ returnType: 'kana_only' })))
      .toBe(EMPTY_READING_PLACEHOLDER);
    expect(processWord({ ...token, reading: '' }, new Map(), context, resolveOptions())).toBe('字');
  });

  test('sound references pass through', () => {
    expect(processWord({ ...token, reading: 'sound:ji.mp3' }, new Map(), context, resolveOptions()))
      .toBe('字[sound:ji.mp3]');
  });
});

describe('Markup helpers', () => {
  test('tokens carry their trailing hiragana', () => {
    expect(findWordTokens('漢字[かんじ]を 書[か]く', '字')).toEqual([
      { word: '漢字', reading: 'かんじ', trailingKana: 'を', kanjiToHighlight: '字' },
      { word: '書', reading: 'か', trailingKana: 'く', kanjiToHighlight: '字' }
    ]);
  });

  test('okurigana written inside a reading is moved out', () => {
    expect(cleanOkuriganaMix('消え去[きえさ]る')).toBe('消[き]え去[さ]る');
    expect(cleanOkuriganaMix('隣り合わせ[となりあわせ]')).toBe('隣[とな]り合[あ]わせ');
    expect(cleanOkuriganaMix('歯止め[はどめ]')).toBe('歯止[はど]め');
    expect(cleanOkuriganaMix('漢字[かんじ]を 書[か]く')).toBe('漢字[かんじ]を 書[か]く');
  });

  test('kana filter keeps only readings', () => {
    expect(kanaFilter(' 漢字[かんじ]を')).toBe('かんじを');
  });

  test('reverser swaps word and reading', () => {
    expect(furiganaReverser(' 漢字[かんじ]')).toBe(' かんじ[漢字]');
    expect(furiganaReverser('&nbsp;漢字[かんじ]')).toBe(' かんじ[漢字]');
  });
});
