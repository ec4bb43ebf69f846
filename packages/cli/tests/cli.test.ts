// CLI tests against an in-memory kanji source
import { describe, test, expect } from 'vitest';
import { createContext, MemoryKanjiSource } from '@yomikata/core';
import { createProgram, parseMode, runCli } from '../src/index.js';

const context = createContext({
  source: new MemoryKanjiSource({
    漢: { onyomi: ['カン'], kunyomi: [] },
    字: { onyomi: ['ジ'], kunyomi: ['あざ'] },
    書: { onyomi: ['ショ'], kunyomi: ['か.く'] }
  })
});

describe('runCli', () => {
  test('default furigana output', async () => {
    expect(await runCli('漢字[かんじ]', { context })).toBe('<on> 漢字[カンジ]</on>');
  });

  test('kana only, untagged, with a highlight', async () => {
    expect(await runCli('漢字[かんじ]', { mode: 'kana_only', tags: false, kanji: '字', context })).toBe('カン<b>ジ</b>');
  });

  test('furikanji output', async () => {
    expect(await runCli('書[か]く', { mode: 'furikanji', context })).toBe('<kun> か[書]</kun><oku>く</oku>');
  });

  test('JSON alignment per word', async () => {
    const output: unknown = JSON.parse(await runCli('漢字[かんじ]を', { json: true, context }));
    expect(output).toMatchObject([
      { input: '漢字[かんじ]を', word: '漢字', moraList: ['かん', 'じ'], okurigana: '', restKana: 'を' }
    ]);
  });

  test('word highlight', async () => {
    expect(await runCli('漢字[かんじ]を 書[か]く', { word: '書[か]く', context })).toBe('漢字[かんじ]を<b> 書[か]く</b>');
  });

  test('unknown mode', async () => {
    await expect(runCli('漢字[かんじ]', { mode: 'romaji', context }))
      .rejects.toThrow('Unknown mode: romaji (expected furigana, furikanji, kana_only)');
  });
});

describe('createProgram', () => {
  test('flags map to options', () => {
    const program = createProgram();
    program.parse(['-k', '字', '--no-tags', '漢字[かんじ]'], { from: 'user' });
    expect(program.opts()).toMatchObject({ kanji: '字', tags: false, merge: true, katakana: true, mode: 'furigana' });
    expect(program.args).toEqual(['漢字[かんじ]']);
  });

  test('mode defaults to furigana', () => {
    expect(parseMode(undefined)).toBe('furigana');
    expect(parseMode('kana_only')).toBe('kana_only');
  });
});
