// Alignment search, exception table and jukujikun fallback tests
import { describe, test, expect } from 'vitest';
import {
  alignReading,
  applyJukujikunPatch,
  checkException,
  exceptionKey,
  ExceptionTableError,
  findFirstCompleteAlignment,
  getExceptionTable,
  parseExceptionTable,
  processJukujikunPositions,
  resolveJukujikunOkurigana,
  splitMoraForJukujikun,
  splitToMora,
  unmatchedAlignment
} from '../src/index.js';
import { isValidSplitForRepeaters } from '../src/alignment.js';
import { createTestContext, testTable } from './fixtures.js';

describe('findFirstCompleteAlignment', () => {
  test('onyomi compound', () => {
    const alignment = findFirstCompleteAlignment('漢字', '', ['かん', 'じ'], testTable());
    expect(alignment.isComplete).toBe(true);
    expect(alignment.moraSplit).toEqual([['かん'], ['じ']]);
    expect(alignment.positions.map((p) => (p.kind === 'matched' ? p.match.matchType : null)))
      .toEqual(['onyomi', 'onyomi']);
  });

  test('kunyomi with okurigana', () => {
    const alignment = findFirstCompleteAlignment('食', 'べる', ['た'], testTable());
    expect(alignment.isComplete).toBe(true);
    expect(alignment.finalOkurigana).toBe('べる');
    expect(alignment.finalRestKana).toBe('');
  });

  test('repeater takes the reading of the kanji before it', () => {
    const { moraList } = splitToMora('ゆうゆう', 2);
    const alignment = findFirstCompleteAlignment('悠々', '', moraList, testTable());
    expect(alignment.isComplete).toBe(true);
    expect(alignment.moraSplit).toEqual([['ゆ', 'う'], ['ゆ', 'う']]);
    const second = alignment.positions[1];
    expect(second.kind === 'matched' && second.match.kanji).toBe('々');
  });

  test('voiced repetition of a kunyomi', () => {
    const { moraList } = splitToMora('ひとびと', 2);
    const alignment = findFirstCompleteAlignment('人々', '', moraList, testTable());
    expect(alignment.isComplete).toBe(true);
    expect(alignment.positions.map((p) => (p.kind === 'matched' ? p.match.matchedMora : null))).toEqual(['ひと', 'びと']);
  });

  test('a zero partition budget falls back to the unmatched split', () => {
    const alignment = findFirstCompleteAlignment('漢字', '', ['かん', 'じ'], testTable(), { maxPartitions: 0 });
    expect(alignment.isComplete).toBe(false);
    expect(alignment.unmatchedPositions).toEqual([0, 1]);
  });

  test('unmatched alignment keeps extra mora on the last kanji', () => {
    expect(unmatchedAlignment(2, ['あ', 'い', 'う'], 'ね')).toMatchObject({
      moraSplit: [['あ'], ['い', 'う']],
      isComplete: false,
      finalRestKana: 'ね'
    });
  });

  test('repeater splits must be the same length', () => {
    expect(isValidSplitForRepeaters(['人', '々'], [['ひと'], ['びと']])).toBe(true);
    expect(isValidSplitForRepeaters(['人', '々'], [['ひ'], ['と', 'び', 'と']])).toBe(false);
  });
});

describe('alignReading', () => {
  test('digits are spelled out before aligning', async () => {
    const result = await alignReading('40分', 'よんじゅっぷん', '', createTestContext());
    expect(result.word).toBe('四十分');
    expect(result.moraList).toEqual(['よん', 'じゅっ', 'ぷん']);
    expect(result.alignment.isComplete).toBe(true);
  });

  test('full-width and half-width digits split the same way', async () => {
    const full = await alignReading('１０分', 'じゅっぷん', '', createTestContext());
    const half = await alignReading('10分', 'じゅっぷん', '', createTestContext());
    expect(full.word).toBe('十分');
    expect(full.moraList).toEqual(['じゅっ', 'ぷん']);
    expect(full.alignment.moraSplit).toEqual(half.alignment.moraSplit);
  });

  test('rejects a reading that is not kana', async () => {
    await expect(alignReading('字', 'ji', '', createTestContext())).rejects.toThrow('Reading must be kana: ji');
  });
});

describe('Exception table', () => {
  test('bundled table has 風邪 as jukujikun', () => {
    const alignment = checkException('風邪', 'かぜ', getExceptionTable());
    expect(alignment?.moraSplit).toEqual([['か'], ['ぜ']]);
    expect(alignment?.positions.every((p) => p.kind === 'matched' && p.match.matchType === 'jukujikun')).toBe(true);
  });

  test('lookup is by word and hiragana furigana', () => {
    expect(exceptionKey('尻尾', 'しっぽ')).toBe('尻尾_しっぽ');
    expect(checkException('尻尾', 'しりお', getExceptionTable())).toBeNull();
  });

  test('every entry needs one reading per character', () => {
    expect(() => parseExceptionTable({ 風邪_かぜ: [{ type: 'jukujikun', mora: 'かぜ' }] }))
      .toThrow(ExceptionTableError);
  });

  test('readings must spell the furigana', () => {
    expect(() => parseExceptionTable({
      風邪_かぜ: [{ type: 'jukujikun', mora: 'か' }, { type: 'jukujikun', mora: 'せ' }]
    })).toThrow('do not spell its furigana');
  });

  test('unknown reading types are rejected', () => {
    expect(() => parseExceptionTable({ 字_じ: [{ type: 'nanori', mora: 'じ' }] }))
      .toThrow('needs a reading type and mora');
  });
});

describe('Jukujikun', () => {
  test('mora are shared out evenly, the first positions taking the remainder', () => {
    expect(splitMoraForJukujikun(['お', 'と', 'な'], 2)).toEqual(['おと', 'な']);
    expect(splitMoraForJukujikun(['あ', 'い', 'う', 'え', 'お'], 3)).toEqual(['あい', 'うえ', 'お']);
  });

  test('unmatched kanji are filled as jukujikun', () => {
    const table = testTable();
    const moraList = splitToMora('おとな', 2).moraList;
    const alignment = findFirstCompleteAlignment('大人', '', moraList, table);
    expect(alignment.isComplete).toBe(false);

    const patch = processJukujikunPositions('大人', alignment, '', table, { exceptions: new Map() });
    const patched = applyJukujikunPatch(alignment, patch);
    expect(patched.isComplete).toBe(true);
    expect(patched.moraSplit).toEqual([['おと'], ['な']]);
  });

  test('trailing kana without an analyzer', () => {
    expect(resolveJukujikunOkurigana('大人', 'おとな', 'しい', null))
      .toEqual({ okurigana: 'しい', rest: '', verbLike: false });
    expect(resolveJukujikunOkurigana('大人', 'おとな', 'が', null))
      .toEqual({ okurigana: '', rest: 'が', verbLike: false });
    expect(resolveJukujikunOkurigana('大人', 'おとな', 'がある', null))
      .toEqual({ okurigana: '', rest: 'がある', verbLike: false });
  });
});
