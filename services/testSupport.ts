import type { DifficultyTier, Language } from '../types';

// Shared fixtures for the *.test.ts files.

/** Deterministic PRNG (mulberry32) so sampling and shuffles repeat across runs. */
export const seededRandom = (seed: number): (() => number) => {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export interface Clock {
  now: () => number;
  set: (value: number) => void;
  advance: (ms: number) => void;
}

export const fixedClock = (start = Date.UTC(2024, 0, 15, 9, 0, 0)): Clock => {
  let current = start;
  return {
    now: () => current,
    set: (value) => {
      current = value;
    },
    advance: (ms) => {
      current += ms;
    },
  };
};

/**
 * Raw corpus records with distinct surfaces and translations, e.g.
 * `makeEntries('KR', 'BEGINNER', 3, 'kb')` gives kb0..kb2.
 */
export const makeEntries = (
  language: Language,
  tier: DifficultyTier,
  count: number,
  prefix: string
): Record<string, unknown>[] =>
  Array.from({ length: count }, (_, i) => ({
    id: `${prefix}${i}`,
    language,
    surfaceForm: `${language === 'KR' ? '단어' : 'ことば'}${prefix}${i}`,
    translation: `${prefix} word ${i}`,
    partOfSpeech: 'noun',
    difficultyTier: tier,
    usageExamples: [],
    metadata: {},
  }));
