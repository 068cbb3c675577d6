
export type Language = 'KR' | 'JP';
export type DifficultyTier = 'BEGINNER' | 'INTERMEDIATE' | 'ADVANCED';
export type ExamType = 'TOPIK' | 'JLPT';
export type Intent = 'GREETING' | 'QUESTION' | 'STATEMENT' | 'CORRECTION_REQUEST';
export type ProficiencyLevel = 1 | 2 | 3 | 4 | 5 | 6;

export const LANGUAGES: readonly Language[] = ['KR', 'JP'];
export const TIERS: readonly DifficultyTier[] = ['BEGINNER', 'INTERMEDIATE', 'ADVANCED'];
export const INTENTS: readonly Intent[] = ['GREETING', 'QUESTION', 'STATEMENT', 'CORRECTION_REQUEST'];

export const EXAM_LANGUAGE: Record<ExamType, Language> = {
  TOPIK: 'KR',
  JLPT: 'JP',
};

export const isLanguage = (value: unknown): value is Language =>
  value === 'KR' || value === 'JP';

export const isTier = (value: unknown): value is DifficultyTier =>
  TIERS.some((tier) => tier === value);

export const isIntent = (value: unknown): value is Intent =>
  INTENTS.some((intent) => intent === value);

export const isExamType = (value: unknown): value is ExamType =>
  value === 'TOPIK' || value === 'JLPT';

export const tierIndex = (tier: DifficultyTier): number => TIERS.indexOf(tier);

export interface EntryBase {
  id: string;
  surfaceForm: string;
  canonicalForm: string;
  translation: string;
  partOfSpeech: string;
  difficultyTier: DifficultyTier;
  usageExamples: readonly string[];
  culturalNote?: string;
  romanization?: string;
  intents?: readonly Intent[];
}

export interface KoreanEntry extends EntryBase {
  language: 'KR';
  metadata: {
    hanja?: string;
    speechLevel?: 'Formal' | 'Polite' | 'Informal';
  };
}

export interface JapaneseEntry extends EntryBase {
  language: 'JP';
  metadata: {
    reading?: string; // kana
    kanji?: string;
    verbGroup?: 'godan' | 'ichidan' | 'irregular';
  };
}

export type VocabularyEntry = KoreanEntry | JapaneseEntry;

export interface ConversationContext {
  userId: string;
  language: Language;
  lastMatchedEntryId: string | null;
  turnCount: number;
  recentIntents: Intent[]; // most recent last
  lastClarificationIndex: number | null;
  updatedAt: number;
}

export type PromptVariant = 'MEANING' | 'REVERSE' | 'CLOZE';
export type TestStatus = 'CREATED' | 'IN_PROGRESS' | 'COMPLETED' | 'EXPIRED';

export interface TestQuestion {
  entryId: string;
  tier: DifficultyTier;
  promptVariant: PromptVariant;
  prompt: string;
  choices: string[];
  correctAnswerIndex: number;
}

export type TierCounts = Record<DifficultyTier, number>;

export interface ScoreReport {
  testId: string;
  correctCount: number;
  total: number;
  passed: boolean;
  scoreDelta: number;
  derivedLevelDelta: number;
  correctByTier: TierCounts;
  totalByTier: TierCounts;
}

export interface TestInstance {
  testId: string;
  userId: string;
  examType: ExamType;
  language: Language;
  status: TestStatus;
  questions: TestQuestion[];
  answers: (number | null)[];
  createdAt: number;
  startedAt: number | null;
  expiresAt: number | null;
  report: ScoreReport | null;
}

export interface TestSummary {
  testId: string;
  examType: ExamType;
  correctCount: number;
  total: number;
  passed: boolean;
  scoreDelta: number;
  completedAt: number;
}

export interface ProficiencyRecord {
  userId: string;
  score: number;
  level: ProficiencyLevel;
  testHistory: TestSummary[];
  conversationActivityCount: number;
  wordsLearned: number;
  encounteredEntryIds: string[];
  dailyConversation: { day: string; points: number };
  scoreReachedAt: number;
  scoreSeq: number;
  createdAt: number;
}

export interface Correction {
  span: { start: number; end: number; text: string };
  issueKind: 'PARTICLE_HARMONY' | 'MISSING_PARTICLE' | 'WORD_ORDER' | 'CONJUGATION' | 'SPEECH_LEVEL' | 'PATTERN';
  suggestion: string;
  explanation: string;
  ruleId: string;
}

export type IssueKind = Correction['issueKind'];

export interface ComposedReply {
  text: string;
  intent: Intent;
  matched: boolean;
  corrections: Correction[];
  culturalNote?: string;
}

export interface RatingChange {
  userId: string;
  oldScore: number;
  newScore: number;
  reason: 'TEST' | 'CONVERSATION' | 'RESET';
}

export interface LeaderboardRow {
  rank: number;
  userId: string;
  score: number;
  level: ProficiencyLevel;
  wordsLearned: number;
}
