import type { DifficultyTier, Intent, JapaneseEntry, KoreanEntry, Language, VocabularyEntry } from '../types';
import { LANGUAGES, isIntent, isLanguage, isTier } from '../types';
import { InsufficientDataError, LoadError, ValidationError } from './errors';
import {
  foldLongVowels,
  getLemmaCandidates,
  hasHangul,
  hasKana,
  isLatin,
  normalizeToken,
  romanize,
  toHiragana,
} from './linguistics';

export type MatchQuality = 'exact' | 'variant';

export interface CorpusHit {
  entry: VocabularyEntry;
  quality: MatchQuality;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const requireString = (record: Record<string, unknown>, field: string, index: number): string => {
  const value = record[field];
  if (typeof value !== 'string' || !value.trim()) {
    throw new LoadError(`"${field}" must be a non-empty string`, index);
  }
  return value.trim();
};

const optionalString = (record: Record<string, unknown>, field: string, index: number): string | undefined => {
  const value = record[field];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') throw new LoadError(`"${field}" must be a string`, index);
  return value.trim();
};

const stringList = (value: unknown, field: string, index: number): string[] => {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new LoadError(`"${field}" must be a list of strings`, index);
  }
  return value.map((v) => v.trim()).filter(Boolean);
};

type SpeechLevel = NonNullable<KoreanEntry['metadata']['speechLevel']>;
type VerbGroup = NonNullable<JapaneseEntry['metadata']['verbGroup']>;

const SPEECH_LEVELS: readonly SpeechLevel[] = ['Formal', 'Polite', 'Informal'];
const VERB_GROUPS: readonly VerbGroup[] = ['godan', 'ichidan', 'irregular'];

const isSpeechLevel = (value: unknown): value is SpeechLevel => SPEECH_LEVELS.some((l) => l === value);
const isVerbGroup = (value: unknown): value is VerbGroup => VERB_GROUPS.some((g) => g === value);

/**
 * Validates one raw entry into an immutable VocabularyEntry.
 */
export const parseEntry = (raw: unknown, index: number): VocabularyEntry => {
  if (!isRecord(raw)) throw new LoadError('entry must be an object', index);

  const language = raw.language;
  if (!isLanguage(language)) throw new LoadError(`unknown language "${String(language)}"`, index);

  const tierValue = typeof raw.difficultyTier === 'string' ? raw.difficultyTier.toUpperCase() : raw.difficultyTier;
  if (!isTier(tierValue)) throw new LoadError(`unknown difficulty tier "${String(raw.difficultyTier)}"`, index);

  const intents: Intent[] = [];
  for (const intent of stringList(raw.intents, 'intents', index)) {
    const upper = intent.toUpperCase();
    if (!isIntent(upper)) throw new LoadError(`unknown intent "${intent}"`, index);
    intents.push(upper);
  }

  const surfaceForm = requireString(raw, 'surfaceForm', index);
  const canonicalForm = optionalString(raw, 'canonicalForm', index) ?? surfaceForm;
  // Forms that normalize to nothing could never be looked up
  if (!normalizeToken(surfaceForm)) throw new LoadError('"surfaceForm" has no letters to index', index);
  if (!normalizeToken(canonicalForm)) throw new LoadError('"canonicalForm" has no letters to index', index);

  const base = {
    id: requireString(raw, 'id', index),
    surfaceForm,
    canonicalForm,
    translation: requireString(raw, 'translation', index),
    partOfSpeech: (optionalString(raw, 'partOfSpeech', index) ?? 'phrase').toLowerCase(),
    difficultyTier: tierValue,
    usageExamples: Object.freeze(stringList(raw.usageExamples, 'usageExamples', index)),
    culturalNote: optionalString(raw, 'culturalNote', index),
    romanization: optionalString(raw, 'romanization', index),
    intents: intents.length > 0 ? Object.freeze(intents) : undefined,
  };

  const metadata = raw.metadata === undefined ? {} : raw.metadata;
  if (!isRecord(metadata)) throw new LoadError('"metadata" must be an object', index);

  if (language === 'KR') {
    const rawLevel = metadata.speechLevel;
    let speechLevel: SpeechLevel | undefined;
    if (rawLevel !== undefined) {
      if (!isSpeechLevel(rawLevel)) throw new LoadError(`unknown speech level "${String(rawLevel)}"`, index);
      speechLevel = rawLevel;
    }
    const entry: KoreanEntry = {
      ...base,
      language,
      metadata: Object.freeze({ hanja: optionalString(metadata, 'hanja', index), speechLevel }),
    };
    return Object.freeze(entry);
  }

  const rawGroup = metadata.verbGroup;
  let verbGroup: VerbGroup | undefined;
  if (rawGroup !== undefined) {
    if (!isVerbGroup(rawGroup)) throw new LoadError(`unknown verb group "${String(rawGroup)}"`, index);
    verbGroup = rawGroup;
  }
  const entry: JapaneseEntry = {
    ...base,
    language,
    metadata: Object.freeze({
      reading: optionalString(metadata, 'reading', index),
      kanji: optionalString(metadata, 'kanji', index),
      verbGroup,
    }),
  };
  return Object.freeze(entry);
};

const nativeForms = (entry: VocabularyEntry): string[] => {
  const forms = [entry.surfaceForm, entry.canonicalForm];
  if (entry.language === 'JP' && entry.metadata.reading) forms.push(entry.metadata.reading);
  return forms;
};

const variantKeysOf = (entry: VocabularyEntry): string[] => {
  const keys: string[] = [];
  const romanized: string[] = [];

  if (entry.language === 'KR') {
    if (entry.metadata.hanja) keys.push(entry.metadata.hanja);
  } else {
    if (entry.metadata.kanji) keys.push(entry.metadata.kanji);
    if (entry.metadata.reading) keys.push(entry.metadata.reading);
    keys.push(toHiragana(entry.surfaceForm));
  }

  if (entry.romanization) romanized.push(entry.romanization);
  for (const form of nativeForms(entry)) romanized.push(romanize(normalizeToken(form), entry.language));

  for (const r of romanized) {
    keys.push(r);
    if (entry.language === 'JP') keys.push(foldLongVowels(normalizeToken(r)));
  }

  return keys.map(normalizeToken).filter(Boolean);
};

type TokenIndex = Map<string, CorpusHit[]>;

/**
 * Immutable, indexed snapshot of vocabulary entries. Safe to share between sessions.
 */
export class VocabularyCorpus {
  private readonly entriesById = new Map<string, VocabularyEntry>();
  private readonly ordinals = new Map<string, number>();
  private readonly ordered: VocabularyEntry[] = [];
  private readonly indexes: Record<Language, TokenIndex> = { KR: new Map(), JP: new Map() };
  private readonly longestKey: Record<Language, number> = { KR: 0, JP: 0 };

  constructor(entries: readonly VocabularyEntry[]) {
    entries.forEach((entry, i) => {
      if (this.entriesById.has(entry.id)) {
        throw new LoadError(`duplicate entry id "${entry.id}"`, i);
      }
      this.entriesById.set(entry.id, entry);
      this.ordinals.set(entry.id, i);
      this.ordered.push(entry);
      this.indexEntry(entry);
    });
    Object.freeze(this.ordered);
  }

  private indexEntry(entry: VocabularyEntry) {
    const index = this.indexes[entry.language];
    const exactKeys = new Set([normalizeToken(entry.surfaceForm), normalizeToken(entry.canonicalForm)]);

    const put = (key: string, quality: MatchQuality) => {
      const bucket = index.get(key) ?? [];
      if (bucket.some((hit) => hit.entry.id === entry.id)) return;
      bucket.push({ entry, quality });
      index.set(key, bucket);
      if (!isLatin(key)) {
        this.longestKey[entry.language] = Math.max(this.longestKey[entry.language], [...key].length);
      }
    };

    exactKeys.forEach((key) => put(key, 'exact'));
    variantKeysOf(entry)
      .filter((key) => !exactKeys.has(key))
      .forEach((key) => put(key, 'variant'));
  }

  get size(): number {
    return this.ordered.length;
  }

  entries(language?: Language): readonly VocabularyEntry[] {
    return language ? this.ordered.filter((e) => e.language === language) : this.ordered;
  }

  getById(id: string): VocabularyEntry | undefined {
    return this.entriesById.get(id);
  }

  has(id: string): boolean {
    return this.entriesById.has(id);
  }

  /** Insertion position, used as the final deterministic tie-break. */
  ordinalOf(id: string): number {
    return this.ordinals.get(id) ?? Number.MAX_SAFE_INTEGER;
  }

  hasKey(candidate: string, language: Language): boolean {
    return this.indexes[language].has(normalizeToken(candidate));
  }

  maxKeyLength(language: Language): number {
    return this.longestKey[language];
  }

  /**
   * Hits for a token with their match quality. Exact surface/canonical hits come first,
   * then orthographic and inflectional variants, each group in insertion order.
   */
  lookupDetailed(token: string, language: Language): CorpusHit[] {
    const key = normalizeToken(token);
    if (!key) return [];

    const index = this.indexes[language];
    const best = new Map<string, CorpusHit>();

    const collect = (candidate: string, forceVariant: boolean) => {
      for (const hit of index.get(candidate) ?? []) {
        const quality: MatchQuality = forceVariant ? 'variant' : hit.quality;
        const existing = best.get(hit.entry.id);
        if (!existing || (existing.quality === 'variant' && quality === 'exact')) {
          best.set(hit.entry.id, { entry: hit.entry, quality });
        }
      }
    };

    collect(key, false);

    if (hasHangul(key) || hasKana(key)) {
      const romanized = romanize(key, language);
      collect(romanized, true);
      if (language === 'JP') {
        collect(foldLongVowels(romanized), true);
        collect(toHiragana(key), true);
      }
    } else if (language === 'JP' && isLatin(key)) {
      collect(foldLongVowels(key), true);
    }

    for (const lemma of getLemmaCandidates(key, language)) {
      if (lemma && lemma !== key) collect(normalizeToken(lemma), true);
    }

    return [...best.values()].sort((a, b) => {
      if (a.quality !== b.quality) return a.quality === 'exact' ? -1 : 1;
      return this.ordinalOf(a.entry.id) - this.ordinalOf(b.entry.id);
    });
  }

  lookupByToken(token: string, language: Language): VocabularyEntry[] {
    return this.lookupDetailed(token, language).map((hit) => hit.entry);
  }

  /**
   * Draws `count` distinct entries of exactly `tier`. Throws InsufficientDataError
   * when the pool (minus `excludeIds`) is too small.
   */
  sampleByDifficulty(
    language: Language,
    tier: DifficultyTier,
    count: number,
    excludeIds: Iterable<string> = [],
    random: () => number = Math.random
  ): VocabularyEntry[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new ValidationError(`Sample size must be a non-negative integer, got ${count}`);
    }

    const excluded = new Set(excludeIds);
    const pool = this.ordered.filter(
      (e) => e.language === language && e.difficultyTier === tier && !excluded.has(e.id)
    );
    if (pool.length < count) {
      throw new InsufficientDataError(language, tier, count, pool.length);
    }

    // Partial Fisher-Yates
    for (let i = 0; i < count; i++) {
      const j = i + Math.min(pool.length - i - 1, Math.floor(random() * (pool.length - i)));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, count);
  }
}

/**
 * Builds a corpus from raw records. Any malformed record or duplicate id aborts the load.
 */
export const loadCorpus = (source: unknown): VocabularyCorpus => {
  if (!Array.isArray(source)) {
    throw new LoadError('Corpus source must be a list of entries');
  }
  const corpus = new VocabularyCorpus(source.map((raw, i) => parseEntry(raw, i)));

  const counts = LANGUAGES.map((lang) => `${lang}: ${corpus.entries(lang).length}`).join(', ');
  console.info(`[Corpus] Loaded ${corpus.size} entries (${counts})`);
  if (corpus.size === 0) console.warn('[Corpus] Corpus is empty, every message will fall back to clarification');

  return corpus;
};

/**
 * Holds the live snapshot. Reload builds a complete new corpus first and then swaps
 * the reference, so readers see either the old or the new snapshot in full.
 */
export class CorpusHolder {
  private snapshot: VocabularyCorpus;
  private revision = 1;

  constructor(initial: VocabularyCorpus) {
    this.snapshot = initial;
  }

  get current(): VocabularyCorpus {
    return this.snapshot;
  }

  get version(): number {
    return this.revision;
  }

  swap(next: VocabularyCorpus): VocabularyCorpus {
    const previous = this.snapshot;
    this.snapshot = next;
    this.revision++;
    return previous;
  }
}
