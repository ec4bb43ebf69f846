// yomikata/inflection - Dictionary-driven okurigana conjugation matching

import fs from 'fs';
import { fileURLToPath } from 'url';
import { dp } from './conn.js';
import { isIOrERow } from './characters.js';
import type { OkuriResult, OkuriResultType, PartOfSpeech } from './types.js';

/**
 * Parts of speech a dictionary okurigana can conjugate as, keyed by its last kana.
 */
export const CONJUGATABLE_LAST_OKURI: Readonly<Record<string, readonly PartOfSpeech[]>> = {
  う: ['v5u'],
  く: ['v5k'],
  ぐ: ['v5g'],
  す: ['v5s'],
  つ: ['v5t'],
  ぬ: ['v5n'],
  ぶ: ['v5b'],
  む: ['v5m'],
  // godan or ichidan, plus the する classes
  る: ['v5r', 'v1', 'vs', 'vs-i', 'vs-s'],
  い: ['adj-i']
};

const PARTS_OF_SPEECH: readonly PartOfSpeech[] = [
  'v1', 'v5u', 'v5k', 'v5k-s', 'v5g', 'v5s', 'v5t', 'v5n', 'v5b', 'v5m',
  'v5r', 'v5r-i', 'vk', 'vs', 'vs-i', 'vs-s', 'adj-i'
];

function isPartOfSpeech(value: string): value is PartOfSpeech {
  return PARTS_OF_SPEECH.some((pos) => pos === value);
}

interface TrieNode {
  children: Map<string, TrieNode>;
  terminal: boolean;
}

function createNode(): TrieNode {
  return { children: new Map(), terminal: false };
}

function buildTrie(endings: readonly string[]): TrieNode {
  const root = createNode();
  for (const ending of endings) {
    let node = root;
    for (const char of ending) {
      let next = node.children.get(char);
      if (!next) {
        next = createNode();
        node.children.set(char, next);
      }
      node = next;
    }
    node.terminal = true;
  }
  return root;
}

let conjugationTries: Map<PartOfSpeech, TrieNode> | null = null;

export function conjugationDataPath(): string {
  return fileURLToPath(new URL('../data/conjugations.json', import.meta.url));
}

/**
 * Compile a `{ pos: [ending, ...] }` table into one trie per part of speech.
 * An empty ending marks the bare stem as a valid form.
 */
export function compileConjugations(raw: unknown): Map<PartOfSpeech, TrieNode> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('Conjugation table must be an object keyed by part of speech');
  }
  const tries = new Map<PartOfSpeech, TrieNode>();
  for (const [pos, endings] of Object.entries(raw)) {
    if (!isPartOfSpeech(pos)) {
      throw new Error(`Unknown part of speech in conjugation table: ${pos}`);
    }
    if (!Array.isArray(endings) || !endings.every((e): e is string => typeof e === 'string')) {
      throw new Error(`Conjugations for ${pos} must be a string array`);
    }
    tries.set(pos, buildTrie(endings));
  }
  return tries;
}

function getConjugationTries(): Map<PartOfSpeech, TrieNode> {
  if (!conjugationTries) {
    const raw: unknown = JSON.parse(fs.readFileSync(conjugationDataPath(), 'utf-8'));
    conjugationTries = compileConjugations(raw);
  }
  return conjugationTries;
}

/**
 * Split a dictionary okurigana into the part that stays fixed and its
 * conjugating last kana: きい -> き (adj-i), べる -> べ (v5r, v1, ...).
 * Returns a null stem when the okurigana does not conjugate.
 */
export function getConjugatableOkuriganaStem(
  plainOkuri: string
): { stem: string | null; partsOfSpeech: readonly PartOfSpeech[] } {
  if (!plainOkuri) return { stem: null, partsOfSpeech: [] };
  const partsOfSpeech = CONJUGATABLE_LAST_OKURI[plainOkuri[plainOkuri.length - 1]];
  if (!partsOfSpeech) return { stem: null, partsOfSpeech: [] };
  return { stem: plainOkuri.slice(0, -1), partsOfSpeech };
}

/**
 * Pick the conjugation class of a kunyomi from its okurigana and kanji.
 */
export function guessPartOfSpeech(okurigana: string, kanji: string): PartOfSpeech | null {
  const last = okurigana[okurigana.length - 1];
  if (!last) return null;

  if (last === 'い') return 'adj-i';
  if (kanji === '行' && okurigana === 'く') return 'v5k-s';
  if (last === 'る') {
    if (kanji === '為') return 'vs-i';
    if (kanji === '来') return 'vk';
    if (okurigana.endsWith('する')) return 'vs';
    if (kanji === '在' || kanji === '有') return 'v5r-i';
    const beforeRu = okurigana[okurigana.length - 2];
    if (beforeRu && isIOrERow(beforeRu)) return 'v1';
    return 'v5r';
  }
  const candidates = CONJUGATABLE_LAST_OKURI[last];
  return candidates ? candidates[0] : null;
}

/**
 * Find the longest conjugated ending at the start of `kanaText`, which has
 * already had the okurigana stem removed.
 */
export function startsWithOkuriganaConjugation(
  kanaText: string,
  kanjiOkurigana: string,
  kanji: string,
  partOfSpeech?: PartOfSpeech | null
): OkuriResult {
  const noOkuri: OkuriResult = { okurigana: '', restKana: kanaText, result: 'no_okuri', partOfSpeech: null };
  if (!kanaText || !kanjiOkurigana) return noOkuri;

  const pos = partOfSpeech ?? guessPartOfSpeech(kanjiOkurigana, kanji);
  const root = pos ? getConjugationTries().get(pos) : undefined;
  if (!pos || !root) return noOkuri;

  if (!root.children.has(kanaText[0]) && !root.terminal) return noOkuri;

  let okurigana = '';
  let rest = kanaText;
  let node = root;
  let result: OkuriResultType;
  while (true) {
    const next = node.children.get(rest[0]);
    if (!next) {
      result = node.terminal ? 'full_okuri' : 'partial_okuri';
      break;
    }
    node = next;
    okurigana += rest[0];
    rest = rest.slice(1);
    if (!rest) {
      result = node.terminal ? 'full_okuri' : 'partial_okuri';
      break;
    }
  }

  if (!okurigana && root.terminal) {
    result = 'empty_okuri';
  }
  dp('startsWithOkuriganaConjugation', kanaText, kanjiOkurigana, pos, okurigana, result);
  return { okurigana, restKana: rest, result, partOfSpeech: pos };
}

/**
 * Decide how much of the kana after a kanji is the inflected okurigana of a
 * dictionary reading whose okurigana is `readingOkurigana`.
 */
export function checkOkuriganaForInflection(
  readingOkurigana: string,
  kanji: string,
  maybeOkuri: string,
  partOfSpeech?: PartOfSpeech | null
): OkuriResult {
  if (!maybeOkuri || !readingOkurigana) {
    return { okurigana: '', restKana: '', result: 'no_okuri', partOfSpeech: null };
  }

  if (readingOkurigana === maybeOkuri) {
    return { okurigana: readingOkurigana, restKana: '', result: 'full_okuri', partOfSpeech: null };
  }

  const { stem, partsOfSpeech } = getConjugatableOkuriganaStem(readingOkurigana);

  if (stem !== null && stem === maybeOkuri) {
    const detected = partsOfSpeech.length === 1 ? partsOfSpeech[0] : partOfSpeech ?? null;
    return { okurigana: stem, restKana: '', result: 'full_okuri', partOfSpeech: detected };
  }

  if (stem === null || !maybeOkuri.startsWith(stem)) {
    if (maybeOkuri.startsWith(readingOkurigana)) {
      return {
        okurigana: readingOkurigana,
        restKana: maybeOkuri.slice(readingOkurigana.length),
        result: 'full_okuri',
        partOfSpeech: null
      };
    }
    return { okurigana: '', restKana: maybeOkuri, result: 'no_okuri', partOfSpeech: null };
  }

  const trimmed = maybeOkuri.slice(stem.length);
  const conjugated = startsWithOkuriganaConjugation(trimmed, readingOkurigana, kanji, partOfSpeech);
  if (conjugated.result !== 'no_okuri') {
    return { ...conjugated, okurigana: stem + conjugated.okurigana };
  }

  return { okurigana: '', restKana: maybeOkuri, result: 'no_okuri', partOfSpeech: null };
}
