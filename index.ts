import sampleEntries from './data/corpus.sample.json';

export * from './types';
export * from './services/errors';
export { createConfig, defaultConfig, loadTutorConfig, validateConfig } from './services/config';
export type { TutorConfig, TutorConfigOverrides, TierMix } from './services/config';
export { CorpusHolder, VocabularyCorpus, loadCorpus, parseEntry } from './services/corpus';
export type { CorpusHit, MatchQuality } from './services/corpus';
export { MatchEngine } from './services/matcher';
export type { MatchOutcome, MatchResult, ScoredCandidate } from './services/matcher';
export { GrammarCorrector } from './services/grammar';
export { defaultRuleBook, parseRuleBook } from './services/rules';
export type { GrammarRule, IntentRule, RuleBook } from './services/rules';
export { ResponseComposer, defaultReplyBook, parseReplyBook } from './services/composer';
export type { Composition, ReplyBook, ReplyTemplates } from './services/composer';
export { AssessmentEngine, toTestView } from './services/assessment';
export type { QuestionView, TestView } from './services/assessment';
export { RatingEngine } from './services/rating';
export type { RatingListener } from './services/rating';
export { levelOf, levelProgress, allocateTierCounts, testScoreDelta } from './services/stats';
export { TutorService } from './services/tutor';
export type { AnswerAck, ProficiencyView, TutorAck, TutorServiceOptions } from './services/tutor';
export type { TutorStorage } from './services/storage';
export { MemoryStorage } from './services/memoryStorage';
export { IndexedDbStorage } from './services/db';
export { KeyedMutex } from './services/keyedLock';
export { parseWordList, createWordListStreamParser } from './services/fileParser';
export type { WordListRow } from './services/fileParser';
export { GeminiEnricher } from './services/gemini';
export type { EntryEnricher, Enrichment } from './services/gemini';
export { importWordList } from './services/sync';
export type { WordListImportOptions, WordListImportResult } from './services/sync';

/** Small bilingual corpus for demos and tests. */
export const sampleCorpus: readonly unknown[] = sampleEntries;
