// yomikata/analyzer - kuromoji adapter for the okurigana detector

import path from 'path';
import { createRequire } from 'module';
import kuromoji from 'kuromoji';
import type { IpadicFeatures, Tokenizer } from 'kuromoji';
import { LRUCache } from 'lru-cache';
import { dp } from './conn.js';
import type { AnalyzerPartOfSpeech, AnalyzerToken, Inflection, MorphAnalyzer } from './types.js';

export const KUROMOJI_DICT_ENV = 'YOMIKATA_KUROMOJI_DICT';

const PART_OF_SPEECH_MAP: Readonly<Record<string, AnalyzerPartOfSpeech>> = {
  名詞: 'noun',
  動詞: 'verb',
  形容詞: 'i_adjective',
  副詞: 'adverb',
  助詞: 'particle',
  助動詞: 'bound_auxiliary'
};

/**
 * IPADIC part of speech -> analyzer category. Na-adjective stems are nouns
 * with the 形容動詞語幹 subcategory.
 */
export function mapPartOfSpeech(pos: string, detail?: string): AnalyzerPartOfSpeech {
  if (pos === '名詞' && detail === '形容動詞語幹') return 'na_adjective';
  return PART_OF_SPEECH_MAP[pos] ?? 'other';
}

/**
 * IPADIC conjugated form -> inflection. `*` marks a token that does not conjugate.
 */
export function mapInflection(conjugatedForm: string | undefined): Inflection | null {
  if (!conjugatedForm || conjugatedForm === '*') return null;
  if (conjugatedForm === '連用タ接続') return 'continuative_ta';
  if (conjugatedForm === '連用テ接続') return 'continuative_te';
  if (conjugatedForm.startsWith('仮定')) return 'hypothetical';
  if (conjugatedForm.endsWith('基本形')) return 'dictionary_form';
  if (conjugatedForm.startsWith('未然')) return 'imperfective';
  if (conjugatedForm.startsWith('連用')) return 'continuative';
  if (conjugatedForm.startsWith('命令')) return 'imperative';
  return 'other';
}

export function toAnalyzerToken(token: IpadicFeatures): AnalyzerToken {
  const headword = token.basic_form && token.basic_form !== '*' ? token.basic_form : token.surface_form;
  return {
    word: token.surface_form,
    headword,
    partOfSpeech: mapPartOfSpeech(token.pos, token.pos_detail_1),
    inflectionType: mapInflection(token.conjugated_form)
  };
}

export function defaultDictPath(): string {
  const override = process.env[KUROMOJI_DICT_ENV];
  if (override) return override;
  const require = createRequire(import.meta.url);
  return path.join(path.dirname(require.resolve('kuromoji')), '..', 'dict');
}

function buildTokenizer(dicPath: string): Promise<Tokenizer<IpadicFeatures>> {
  return new Promise((resolve, reject) => {
    kuromoji.builder({ dicPath }).build((err, tokenizer) => {
      if (err) {
        reject(new Error(`Failed to load kuromoji dictionary from ${dicPath}: ${err.message}`));
      } else {
        resolve(tokenizer);
      }
    });
  });
}

/**
 * Wrap any tokenize function with an LRU memo keyed by the input text.
 */
export function memoizeAnalyzer(
  tokenize: (text: string) => AnalyzerToken[],
  max = 10000
): MorphAnalyzer {
  const cache = new LRUCache<string, AnalyzerToken[]>({ max });
  return {
    tokenize(text: string): AnalyzerToken[] {
      const cached = cache.get(text);
      if (cached) return cached;
      const tokens = tokenize(text);
      cache.set(text, tokens);
      return tokens;
    }
  };
}

let analyzerPromise: Promise<MorphAnalyzer> | null = null;

/**
 * Load the IPADIC dictionary shipped with kuromoji. The default analyzer is
 * built once per process.
 */
export async function createKuromojiAnalyzer(dicPath?: string): Promise<MorphAnalyzer> {
  const build = async (): Promise<MorphAnalyzer> => {
    const resolved = dicPath ?? defaultDictPath();
    const start = Date.now();
    const tokenizer = await buildTokenizer(resolved);
    dp(`kuromoji dictionary loaded in ${Date.now() - start}ms`);
    return memoizeAnalyzer((text) => tokenizer.tokenize(text).map(toAnalyzerToken));
  };

  if (dicPath) return build();
  if (!analyzerPromise) {
    analyzerPromise = build().catch((error: unknown) => {
      analyzerPromise = null;
      throw error;
    });
  }
  return analyzerPromise;
}
