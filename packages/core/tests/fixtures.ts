// Shared test fixtures: a small kanji table and a scripted analyzer
import {
  createContext,
  MemoryKanjiSource,
  type AnalyzerPartOfSpeech,
  type AnalyzerToken,
  type ContextOptions,
  type HighlightContext,
  type Inflection,
  type KanjiReadingData,
  type MorphAnalyzer
} from '../src/index.js';

export const TEST_KANJI: Record<string, KanjiReadingData> = {
  漢: { onyomi: ['カン'], kunyomi: [] },
  字: { onyomi: ['ジ'], kunyomi: ['あざ'] },
  一: { onyomi: ['イチ', 'イツ'], kunyomi: ['ひと', 'ひと.つ'] },
  見: { onyomi: ['ケン'], kunyomi: ['み.る'] },
  尻: { onyomi: ['コウ'], kunyomi: ['しり'] },
  尾: { onyomi: ['ビ'], kunyomi: ['お'] },
  風: { onyomi: ['フウ', 'フ'], kunyomi: ['かぜ', 'かざ'] },
  邪: { onyomi: ['ジャ'], kunyomi: ['よこしま'] },
  大: { onyomi: ['ダイ', 'タイ'], kunyomi: ['おお', 'おお.きい'] },
  人: { onyomi: ['ジン', 'ニン'], kunyomi: ['ひと'] },
  勉: { onyomi: ['ベン'], kunyomi: ['つと.める'] },
  強: { onyomi: ['キョウ', 'ゴウ'], kunyomi: ['つよ.い'] },
  悠: { onyomi: ['ユウ'], kunyomi: [] },
  十: { onyomi: ['ジュウ', 'ジッ'], kunyomi: ['とお', 'と'] },
  分: { onyomi: ['ブン', 'フン', 'ブ'], kunyomi: ['わ.ける'] },
  四: { onyomi: ['シ'], kunyomi: ['よ', 'よ.つ', 'よっ.つ', 'よん'] },
  個: { onyomi: ['コ'], kunyomi: [] },
  時: { onyomi: ['ジ'], kunyomi: ['とき'] },
  間: { onyomi: ['カン', 'ケン'], kunyomi: ['あいだ', 'ま'] },
  食: { onyomi: ['ショク'], kunyomi: ['た.べる', 'く.う'] },
  書: { onyomi: ['ショ'], kunyomi: ['か.く'] },
  為: { onyomi: ['イ'], kunyomi: ['す.る', 'ため'] },
  消: { onyomi: ['ショウ'], kunyomi: ['き.える', 'け.す'] },
  去: { onyomi: ['キョ', 'コ'], kunyomi: ['さ.る'] }
};

export const testTable = (): Map<string, KanjiReadingData> => new Map(Object.entries(TEST_KANJI));

export function createTestContext(options: ContextOptions = {}): HighlightContext {
  return createContext({ source: new MemoryKanjiSource(TEST_KANJI), ...options });
}

export function token(
  word: string,
  headword: string,
  partOfSpeech: AnalyzerPartOfSpeech,
  inflectionType: Inflection | null = null
): AnalyzerToken {
  return { word, headword, partOfSpeech, inflectionType };
}

/**
 * Returns canned tokens per input text and records what it was asked.
 */
export class ScriptedAnalyzer implements MorphAnalyzer {
  readonly calls: string[] = [];

  constructor(private readonly script: Record<string, AnalyzerToken[]>) {}

  tokenize(text: string): AnalyzerToken[] {
    this.calls.push(text);
    return this.script[text] ?? [];
  }
}
