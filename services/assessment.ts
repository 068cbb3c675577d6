import type {
  DifficultyTier,
  ExamType,
  Language,
  PromptVariant,
  ScoreReport,
  TestInstance,
  TestQuestion,
  TestStatus,
  VocabularyEntry,
} from '../types';
import { EXAM_LANGUAGE, TIERS } from '../types';
import type { TutorConfig } from './config';
import type { CorpusHolder, VocabularyCorpus } from './corpus';
import { InsufficientDataError, InvalidStateError, NotFoundError, ValidationError } from './errors';
import { normalizeToken } from './linguistics';
import type { RatingEngine } from './rating';
import { allocateTierCounts, emptyTierCounts, testScoreDelta } from './stats';
import type { TutorStorage } from './storage';

export interface QuestionView {
  index: number;
  tier: DifficultyTier;
  promptVariant: PromptVariant;
  prompt: string;
  choices: string[];
}

/** What the learner sees: no entry ids, no answer key. */
export interface TestView {
  testId: string;
  examType: ExamType;
  language: Language;
  status: TestStatus;
  questions: QuestionView[];
  answered: number;
  expiresAt: number | null;
}

export interface AssessmentDeps {
  storage: TutorStorage;
  rating: RatingEngine;
  corpus: CorpusHolder;
  config: TutorConfig;
  now?: () => number;
  random?: () => number;
}

const BLANK = '____';

const promptFor = (variant: PromptVariant, entry: VocabularyEntry, example: string): string => {
  switch (variant) {
    case 'MEANING':
      return `What does "${entry.surfaceForm}" mean?`;
    case 'REVERSE':
      return `Which word means "${entry.translation}"?`;
    case 'CLOZE':
      return `Fill in the blank: ${example.split(entry.surfaceForm).join(BLANK)} (${entry.translation})`;
  }
};

export const toTestView = (test: TestInstance): TestView => ({
  testId: test.testId,
  examType: test.examType,
  language: test.language,
  status: test.status,
  questions: test.questions.map((q, index) => ({
    index,
    tier: q.tier,
    promptVariant: q.promptVariant,
    prompt: q.prompt,
    choices: [...q.choices],
  })),
  answered: test.answers.filter((a) => a !== null).length,
  expiresAt: test.expiresAt,
});

/**
 * Builds, runs and scores TOPIK/JLPT style multiple-choice tests. Questions carry
 * their own prompt, choices and answer, so a corpus reload mid-test changes nothing.
 */
export class AssessmentEngine {
  private readonly storage: TutorStorage;
  private readonly rating: RatingEngine;
  private readonly corpus: CorpusHolder;
  private readonly config: TutorConfig;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(deps: AssessmentDeps) {
    this.storage = deps.storage;
    this.rating = deps.rating;
    this.corpus = deps.corpus;
    this.config = deps.config;
    this.now = deps.now ?? Date.now;
    this.random = deps.random ?? Math.random;
  }

  async generate(userId: string, examType: ExamType, questionCount?: number): Promise<TestInstance> {
    const total = questionCount ?? this.config.assessment.defaultQuestionCount;
    if (!Number.isInteger(total) || total < 1) {
      throw new ValidationError(`Question count must be a positive integer, got ${total}`);
    }

    const language = EXAM_LANGUAGE[examType];
    const record = await this.rating.getRecord(userId);
    const level = this.rating.levelOf(record.score);
    const counts = allocateTierCounts(total, this.config.rating.tierMixByLevel[level]);

    const corpus = this.corpus.current;
    const picked: VocabularyEntry[] = [];
    for (const tier of TIERS) {
      picked.push(
        ...corpus.sampleByDifficulty(language, tier, counts[tier], picked.map((e) => e.id), this.random)
      );
    }

    const now = this.now();
    const test: TestInstance = {
      testId: `${examType}_${now}_${this.random().toString(36).slice(2, 7)}`,
      userId,
      examType,
      language,
      status: 'CREATED',
      questions: picked.map((entry) => this.buildQuestion(entry, corpus)),
      answers: picked.map(() => null),
      createdAt: now,
      startedAt: null,
      expiresAt: null,
      report: null,
    };

    await this.storage.saveTestInstance(test);
    console.info(
      `[Assessment] Generated ${test.testId} for ${userId} (level ${level}, ` +
        TIERS.map((t) => `${t}: ${counts[t]}`).join(', ') +
        ')'
    );
    return test;
  }

  async start(testId: string): Promise<TestInstance> {
    const test = await this.load(testId);
    if (test.status !== 'CREATED') {
      throw new InvalidStateError(`Test ${testId} cannot start from ${test.status}`);
    }
    const startedAt = this.now();
    const started: TestInstance = {
      ...test,
      status: 'IN_PROGRESS',
      startedAt,
      expiresAt: startedAt + test.questions.length * this.config.assessment.secondsPerQuestion * 1000,
    };
    await this.storage.saveTestInstance(started);
    return started;
  }

  /**
   * Loads a test, flipping an overdue IN_PROGRESS test to EXPIRED. Answers are kept.
   */
  async getTest(testId: string): Promise<TestInstance> {
    const test = await this.load(testId);
    if (test.status === 'IN_PROGRESS' && test.expiresAt !== null && this.now() >= test.expiresAt) {
      const expired: TestInstance = { ...test, status: 'EXPIRED' };
      await this.storage.saveTestInstance(expired);
      console.info(`[Assessment] ${testId} expired`);
      return expired;
    }
    return test;
  }

  async submitAnswer(testId: string, questionIndex: number, choiceIndex: number): Promise<TestInstance> {
    const test = await this.getTest(testId);
    if (test.status !== 'IN_PROGRESS') {
      throw new InvalidStateError(`Test ${testId} is ${test.status}, answers are closed`);
    }

    const question = test.questions[questionIndex];
    if (!Number.isInteger(questionIndex) || question === undefined) {
      throw new ValidationError(`Question index ${questionIndex} is out of range (0-${test.questions.length - 1})`);
    }
    if (!Number.isInteger(choiceIndex) || choiceIndex < 0 || choiceIndex >= question.choices.length) {
      throw new ValidationError(`Choice index ${choiceIndex} is out of range (0-${question.choices.length - 1})`);
    }

    const answers = [...test.answers];
    answers[questionIndex] = choiceIndex;
    const updated: TestInstance = { ...test, answers };
    await this.storage.saveTestInstance(updated);
    return updated;
  }

  /**
   * Scores the recorded answers and hands the result to the rating engine.
   * Finalizing again returns the stored report without a second rating update.
   */
  async finalize(testId: string): Promise<ScoreReport> {
    const test = await this.getTest(testId);
    if (test.report) return test.report;
    if (test.status === 'CREATED') {
      throw new InvalidStateError(`Test ${testId} was never started`);
    }

    const correctByTier = emptyTierCounts();
    const totalByTier = emptyTierCounts();
    test.questions.forEach((q, i) => {
      totalByTier[q.tier]++;
      if (test.answers[i] === q.correctAnswerIndex) correctByTier[q.tier]++;
    });

    const total = test.questions.length;
    const correctCount = TIERS.reduce((acc, tier) => acc + correctByTier[tier], 0);
    const passed = total > 0 && correctCount / total >= this.config.assessment.passThreshold[test.examType];
    const scored: ScoreReport = {
      testId,
      correctCount,
      total,
      passed,
      scoreDelta: testScoreDelta(correctByTier, passed, this.config.rating),
      derivedLevelDelta: 0,
      correctByTier,
      totalByTier,
    };

    const outcome = await this.rating.recordTestResult(test.userId, test.examType, scored);
    const report: ScoreReport = { ...scored, derivedLevelDelta: outcome.levelDelta };
    const status: TestStatus = test.status === 'EXPIRED' ? 'EXPIRED' : 'COMPLETED';

    await this.storage.saveTestInstance({ ...test, status, report });
    console.info(
      `[Assessment] ${testId} finalized: ${correctCount}/${total} ${passed ? 'passed' : 'failed'} (+${report.scoreDelta})`
    );
    return report;
  }

  private async load(testId: string): Promise<TestInstance> {
    const test = await this.storage.loadTestInstance(testId);
    if (!test) throw new NotFoundError(`Test ${testId} not found`);
    return test;
  }

  private buildQuestion(entry: VocabularyEntry, corpus: VocabularyCorpus): TestQuestion {
    const example = entry.usageExamples.find((e) => e.includes(entry.surfaceForm));
    const variants: PromptVariant[] = example ? ['MEANING', 'REVERSE', 'CLOZE'] : ['MEANING', 'REVERSE'];
    const promptVariant = variants[Math.min(variants.length - 1, Math.floor(this.random() * variants.length))];

    const answerOf = (e: VocabularyEntry) => (promptVariant === 'MEANING' ? e.translation : e.surfaceForm);
    const correct = answerOf(entry);
    // A candidate sharing the cue would be a second right answer
    const cueOf = (e: VocabularyEntry) => (promptVariant === 'MEANING' ? e.surfaceForm : e.translation);
    const distractors = this.pickDistractors(entry, corpus, answerOf, cueOf);

    const position = Math.min(distractors.length, Math.floor(this.random() * (distractors.length + 1)));
    const choices = [...distractors];
    choices.splice(position, 0, correct);

    const prompt = promptFor(promptVariant, entry, example ?? '');

    return { entryId: entry.id, tier: entry.difficultyTier, promptVariant, prompt, choices, correctAnswerIndex: position };
  }

  // Same-tier distractors first, then the rest of the language pool
  private pickDistractors(
    entry: VocabularyEntry,
    corpus: VocabularyCorpus,
    answerOf: (e: VocabularyEntry) => string,
    cueOf: (e: VocabularyEntry) => string
  ): string[] {
    const wanted = this.config.assessment.choicesPerQuestion - 1;
    const pool = corpus.entries(entry.language).filter((e) => e.id !== entry.id);
    const sameTier = this.shuffle(pool.filter((e) => e.difficultyTier === entry.difficultyTier));
    const otherTiers = this.shuffle(pool.filter((e) => e.difficultyTier !== entry.difficultyTier));

    const cue = normalizeToken(cueOf(entry));
    const seen = new Set([normalizeToken(answerOf(entry))]);
    const picked: string[] = [];
    for (const candidate of [...sameTier, ...otherTiers]) {
      if (picked.length >= wanted) break;
      if (normalizeToken(cueOf(candidate)) === cue) continue;
      const value = answerOf(candidate);
      const key = normalizeToken(value);
      if (seen.has(key)) continue;
      seen.add(key);
      picked.push(value);
    }

    if (picked.length === 0) {
      throw new InsufficientDataError(entry.language, entry.difficultyTier, wanted + 1, 1);
    }
    return picked;
  }

  private shuffle<T>(items: T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = Math.min(i, Math.floor(this.random() * (i + 1)));
      [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
  }
}
