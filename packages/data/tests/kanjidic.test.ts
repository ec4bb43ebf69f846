// kanjidic2 extraction tests
import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, test, expect, vi, afterEach } from 'vitest';
import { exportKanjiJson, parseKanjidic, stripAffixMarkers, toKanjiData } from '../src/data/load-kanjidic.js';

const SAMPLE = `<?xml version="1.0" encoding="UTF-8"?>
<kanjidic2>
  <header><file_version>4</file_version></header>
  <character>
    <literal>食</literal>
    <reading_meaning>
      <rmgroup>
        <reading r_type="pinyin">shi2</reading>
        <reading r_type="ja_on">ショク</reading>
        <reading r_type="ja_on">ジキ</reading>
        <reading r_type="ja_kun">く.う</reading>
        <reading r_type="ja_kun">た.べる</reading>
        <meaning>eat</meaning>
      </rmgroup>
    </reading_meaning>
  </character>
  <character>
    <literal>日</literal>
    <reading_meaning>
      <rmgroup>
        <reading r_type="ja_on">ニチ</reading>
        <reading r_type="ja_kun">ひ</reading>
        <reading r_type="ja_kun">-び</reading>
        <reading r_type="ja_kun">-か</reading>
        <reading r_type="ja_kun">ひ</reading>
      </rmgroup>
    </reading_meaning>
  </character>
  <character>
    <literal>〇</literal>
  </character>
</kanjidic2>`;

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseKanjidic', () => {
  test('keeps Japanese readings only', () => {
    expect(parseKanjidic(SAMPLE)).toEqual([
      { literal: '食', onyomi: ['ショク', 'ジキ'], kunyomi: ['く.う', 'た.べる'] },
      { literal: '日', onyomi: ['ニチ'], kunyomi: ['ひ', 'び', 'か'] }
    ]);
  });

  test('rejects other documents', () => {
    expect(() => parseKanjidic('<foo/>')).toThrow('Not a kanjidic2 document');
  });

  test('affix markers', () => {
    expect(stripAffixMarkers('-び')).toBe('び');
    expect(stripAffixMarkers('お-')).toBe('お');
    expect(stripAffixMarkers('た.べる')).toBe('た.べる');
  });
});

describe('exportKanjiJson', () => {
  test('writes the shape the JSON source reads', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kanjidic-'));
    const out = path.join(dir, 'nested', 'kanji.json');
    try {
      const entries = parseKanjidic(SAMPLE);
      exportKanjiJson(entries, out);
      expect(JSON.parse(fs.readFileSync(out, 'utf-8'))).toEqual(toKanjiData(entries));
      expect(console.log).toHaveBeenCalledWith(`✓ Wrote 2 kanji to ${out}`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
