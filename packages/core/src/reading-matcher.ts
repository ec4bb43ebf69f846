// yomikata/reading-matcher - Match one kanji's dictionary readings against a run of mora

import { dp } from './conn.js';
import {
  asHiragana,
  isIOrERow,
  N_CHANGE_FINALS,
  ONYOMI_GODAN_SU_FIRST_KANA,
  rendakuVariants,
  SMALL_TSU_FINALS,
  SOKUON,
  VOWEL_CHANGE_MAP,
  YOON_SMALL_MAP
} from './characters.js';
import { checkOkuriganaForInflection } from './inflection.js';
import type { KanjiReadingData, KanjiTable, ReadingClass, ReadingMatchInfo, ReadingVariant } from './types.js';

export interface VariantMatch {
  reading: string;
  variant: ReadingVariant;
}

/**
 * Check whether `moraString` realizes `reading`, trying sound changes in order:
 * plain, rendaku, small tsu, vowel change, yōon contraction, rendaku with small
 * tsu, う dropped before a っ okurigana, and a final の/に turning into ん.
 */
export function checkReadingMatch(
  reading: string,
  moraString: string,
  okurigana = ''
): VariantMatch | null {
  if (!reading) return null;

  const candidates: VariantMatch[] = [{ reading, variant: 'plain' }];

  const rendakuReadings = rendakuVariants(reading);
  for (const voiced of rendakuReadings) {
    candidates.push({ reading: voiced, variant: 'rendaku' });
  }

  if (SMALL_TSU_FINALS.includes(reading[reading.length - 1])) {
    candidates.push({ reading: reading.slice(0, -1) + SOKUON, variant: 'small_tsu' });
  }

  for (const kana of VOWEL_CHANGE_MAP[reading[0]] ?? []) {
    candidates.push({ reading: kana + reading.slice(1), variant: 'vowel_change' });
  }

  // しよう -> しょう, and the same on the voiced forms
  for (const base of [reading, ...rendakuReadings]) {
    const small = base.length >= 2 ? YOON_SMALL_MAP[base[1]] : undefined;
    if (small) {
      candidates.push({ reading: base[0] + small + base.slice(2), variant: 'vowel_change' });
    }
  }

  for (const voiced of rendakuReadings) {
    if (SMALL_TSU_FINALS.includes(voiced[voiced.length - 1])) {
      candidates.push({ reading: voiced.slice(0, -1) + SOKUON, variant: 'rendaku_small_tsu' });
    }
  }

  // 言う + って -> い + って
  if (okurigana.startsWith(SOKUON)) {
    for (const base of [reading, ...rendakuReadings]) {
      if (base.length > 1 && base.endsWith('う')) {
        candidates.push({ reading: base.slice(0, -1), variant: 'u_dropped' });
      }
    }
  }

  if (reading.length > 1 && N_CHANGE_FINALS.includes(reading[reading.length - 1])) {
    candidates.push({ reading: reading.slice(0, -1) + 'ん', variant: 'n_change' });
  }

  return candidates.find((candidate) => candidate.reading === moraString) ?? null;
}

/**
 * Strip annotations a dictionary reading may carry: `(...)` notes and the
 * `-` marking a prefix or suffix reading.
 */
export function cleanDictReading(reading: string): string {
  return reading.split('(')[0].trim().replace(/^-+|-+$/g, '');
}

/**
 * Okurigana of the noun formed from a verb's stem: く -> き (書き), る -> り (終わり),
 * and ichidan verbs drop their る (食べ). I-adjectives have none.
 */
export function getVerbNounFormOkuri(okurigana: string): string | null {
  if (!okurigana) return null;
  if (okurigana === 'する') return 'し';

  const last = okurigana[okurigana.length - 1];
  const head = okurigana.slice(0, -1);
  if (last === 'る') {
    const beforeRu = head[head.length - 1];
    if (beforeRu && isIOrERow(beforeRu)) return head;
    return head + 'り';
  }

  const nounForms: Record<string, string> = {
    う: 'い', く: 'き', ぐ: 'ぎ', す: 'し', つ: 'ち', ぬ: 'に', ぶ: 'び', む: 'み'
  };
  const noun = nounForms[last];
  return noun ? head + noun : null;
}

interface KunyomiCandidate {
  toMatch: string;
  dictForm: string;
}

/**
 * The forms of a kunyomi tried against mora, in priority order: the stem,
 * the noun form of a verb, and the full reading without its okurigana marker.
 */
export function getKunyomiReadingVariants(kunyomi: string): KunyomiCandidate[] {
  const dictForm = cleanDictReading(kunyomi);
  if (!dictForm) return [];

  const dot = dictForm.indexOf('.');
  const stem = dot === -1 ? dictForm : dictForm.slice(0, dot);
  const okuri = dot === -1 ? '' : dictForm.slice(dot + 1);
  const fullReading = stem + okuri;

  const variants: KunyomiCandidate[] = [{ toMatch: stem, dictForm }];

  if (okuri) {
    const nounOkuri = getVerbNounFormOkuri(okuri);
    if (nounOkuri !== null) {
      const nounForm = stem + nounOkuri;
      if (nounForm !== fullReading && nounForm !== stem) {
        variants.push({ toMatch: nounForm, dictForm });
      }
    }
  }

  if (fullReading !== stem && !variants.some((v) => v.toMatch === fullReading)) {
    variants.push({ toMatch: fullReading, dictForm });
  }

  return variants;
}

function createMatch(
  kanji: string,
  moraSequence: string,
  dictForm: string,
  matchType: ReadingClass,
  variant: ReadingVariant
): ReadingMatchInfo {
  return { matchedMora: moraSequence, dictForm, matchType, variant, kanji, okurigana: '', restKana: '' };
}

export function matchOnyomiToMora(
  kanji: string,
  moraSequence: string,
  data: KanjiReadingData | undefined,
  okurigana: string,
  isLastKanji: boolean
): ReadingMatchInfo | null {
  if (!data || data.onyomi.length === 0) return null;

  for (const onyomi of data.onyomi) {
    const dictForm = cleanDictReading(onyomi);
    if (!dictForm) continue;
    const match = checkReadingMatch(asHiragana(dictForm), moraSequence, isLastKanji ? okurigana : '');
    if (match) {
      return createMatch(kanji, moraSequence, onyomi, 'onyomi', match.variant);
    }
  }
  return null;
}

export function matchKunyomiToMora(
  kanji: string,
  moraSequence: string,
  data: KanjiReadingData | undefined,
  okurigana: string,
  isLastKanji: boolean
): ReadingMatchInfo | null {
  if (!data || data.kunyomi.length === 0) return null;

  // Stems of the irregular verb 為る
  if (kanji === '為' && (moraSequence === 'し' || moraSequence === 'さ')) {
    return createMatch(kanji, moraSequence, 'す.る', 'kunyomi', 'plain');
  }

  const scoring = isLastKanji && okurigana.length > 0;
  let best: ReadingMatchInfo | null = null;
  let bestScore = 0;

  for (const kunyomi of data.kunyomi) {
    for (const { toMatch, dictForm } of getKunyomiReadingVariants(kunyomi)) {
      const match = checkReadingMatch(toMatch, moraSequence, isLastKanji ? okurigana : '');
      if (!match) continue;

      const candidate = createMatch(kanji, moraSequence, dictForm, 'kunyomi', match.variant);
      if (!scoring) return candidate;

      const dot = dictForm.indexOf('.');
      if (dot !== -1) {
        // Prefer the reading whose okurigana covers most of the trailing kana
        const result = checkOkuriganaForInflection(dictForm.slice(dot + 1), kanji, okurigana);
        if (result.result === 'full_okuri') return candidate;
        if (result.okurigana.length > bestScore || best === null) {
          best = candidate;
          bestScore = result.okurigana.length;
        }
      } else if (best === null) {
        best = candidate;
      }
    }
  }

  dp('matchKunyomiToMora', kanji, moraSequence, best?.dictForm ?? null);
  return best;
}

/**
 * Match a kanji against a run of mora, onyomi first unless `preferKunyomi`.
 */
export function matchReadingToMora(
  kanji: string,
  moraSequence: string,
  data: KanjiReadingData | undefined,
  okurigana: string,
  isLastKanji: boolean,
  preferKunyomi = false
): ReadingMatchInfo | null {
  if (preferKunyomi) {
    return matchKunyomiToMora(kanji, moraSequence, data, okurigana, isLastKanji)
      ?? matchOnyomiToMora(kanji, moraSequence, data, okurigana, isLastKanji);
  }
  return matchOnyomiToMora(kanji, moraSequence, data, okurigana, isLastKanji)
    ?? matchKunyomiToMora(kanji, moraSequence, data, okurigana, isLastKanji);
}

/**
 * Split the kana after the last matched kanji into okurigana and the rest.
 */
export function extractOkuriganaForMatch(
  matchType: ReadingClass,
  dictForm: string,
  remainingKana: string,
  kanji: string,
  table: KanjiTable
): { okurigana: string; restKana: string } {
  if (!remainingKana) return { okurigana: '', restKana: '' };

  if (matchType === 'onyomi') {
    if (!ONYOMI_GODAN_SU_FIRST_KANA.includes(remainingKana[0])) {
      return { okurigana: '', restKana: remainingKana };
    }
    if (remainingKana.startsWith('する')) {
      return { okurigana: 'する', restKana: remainingKana.slice(2) };
    }
    // Onyomi す verbs (呈す) conjugate almost like する; take whichever covers more
    const asGodan = checkOkuriganaForInflection('す', kanji, remainingKana);
    const asSuru = checkOkuriganaForInflection('る', kanji, remainingKana, 'vs');
    const best = asSuru.okurigana.length > asGodan.okurigana.length ? asSuru : asGodan;
    if (best.result === 'no_okuri') return { okurigana: '', restKana: remainingKana };
    return { okurigana: best.okurigana, restKana: best.restKana };
  }

  if (matchType === 'kunyomi') {
    let okuriDictForm: string | null = dictForm.includes('.') ? dictForm : null;
    if (!okuriDictForm) {
      // A bare stem matched first (みず before みず.しい); look for the inflecting reading
      for (const kunyomi of table.get(kanji)?.kunyomi ?? []) {
        const reading = cleanDictReading(kunyomi);
        const dot = reading.indexOf('.');
        if (dot === -1) continue;
        if (dictForm === reading.slice(0, dot) || dictForm === reading.replace('.', '')) {
          okuriDictForm = reading;
          break;
        }
      }
    }
    if (!okuriDictForm) return { okurigana: '', restKana: remainingKana };

    const readingOkuri = okuriDictForm.slice(okuriDictForm.indexOf('.') + 1);
    const result = checkOkuriganaForInflection(readingOkuri, kanji, remainingKana);
    if (result.result === 'no_okuri') return { okurigana: '', restKana: remainingKana };
    return { okurigana: result.okurigana, restKana: result.restKana };
  }

  return { okurigana: '', restKana: remainingKana };
}
