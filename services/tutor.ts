import type {
  ComposedReply,
  ExamType,
  Language,
  LeaderboardRow,
  ProficiencyLevel,
  ProficiencyRecord,
  ScoreReport,
  TestSummary,
} from '../types';
import { isExamType, isLanguage } from '../types';
import { AssessmentEngine, toTestView } from './assessment';
import type { TestView } from './assessment';
import { defaultReplyBook, ResponseComposer } from './composer';
import type { ReplyBook } from './composer';
import { createConfig } from './config';
import type { TutorConfig } from './config';
import { resolveContext } from './contexts';
import { CorpusHolder, loadCorpus } from './corpus';
import { TutorError, ValidationError, NotFoundError } from './errors';
import type { TutorErrorCode } from './errors';
import { GrammarCorrector } from './grammar';
import { KeyedMutex } from './keyedLock';
import { MatchEngine } from './matcher';
import { RatingEngine } from './rating';
import type { RatingListener } from './rating';
import { defaultRuleBook } from './rules';
import type { RuleBook } from './rules';
import type { TutorStorage } from './storage';

export interface TutorServiceOptions {
  storage: TutorStorage;
  config?: TutorConfig;
  rules?: RuleBook;
  replies?: ReplyBook;
  now?: () => number;
  random?: () => number;
}

export type TutorAck<T> = ({ ok: true } & T) | { ok: false; error: { code: TutorErrorCode; message: string } };

export type AnswerAck = TutorAck<{ test: TestView; report: ScoreReport | null }>;

export interface ProficiencyView {
  userId: string;
  score: number;
  level: ProficiencyLevel;
  progress: number;
  nextTarget: number;
  testHistory: TestSummary[];
  conversationActivityCount: number;
  wordsLearned: number;
}

// Errors a learner action can cause; reported in the ack instead of thrown
const REJECTED_ACTION_CODES: readonly TutorErrorCode[] = ['INVALID_STATE', 'VALIDATION', 'NOT_FOUND'];

const requireUserId = (userId: unknown): string => {
  if (typeof userId !== 'string' || !userId.trim()) throw new ValidationError('User id must be a non-empty string');
  return userId;
};

/**
 * Inbound surface for the transport layer. Per-user operations are serialized;
 * different users run concurrently against the shared corpus snapshot.
 */
export class TutorService {
  private readonly lock = new KeyedMutex();
  private readonly matcher: MatchEngine;
  private readonly grammar: GrammarCorrector;
  private readonly composer: ResponseComposer;
  private readonly rating: RatingEngine;
  private readonly assessment: AssessmentEngine;
  private readonly now: () => number;

  private constructor(
    private readonly storage: TutorStorage,
    private readonly corpus: CorpusHolder,
    private readonly config: TutorConfig,
    rules: RuleBook,
    replies: ReplyBook,
    now: () => number,
    random: () => number
  ) {
    this.now = now;
    this.matcher = new MatchEngine(rules, config);
    this.grammar = new GrammarCorrector(rules);
    this.composer = new ResponseComposer(replies);
    this.rating = new RatingEngine(storage, config, now);
    this.assessment = new AssessmentEngine({ storage, rating: this.rating, corpus, config, now, random });
  }

  /**
   * Loads the corpus from storage and wires the engines. A malformed corpus aborts
   * with LoadError.
   */
  static async create(options: TutorServiceOptions): Promise<TutorService> {
    const config = options.config ?? createConfig();
    const corpus = loadCorpus(await options.storage.loadCorpus());
    console.info(`[Tutor] Ready with ${corpus.size} entries`);
    return new TutorService(
      options.storage,
      new CorpusHolder(corpus),
      config,
      options.rules ?? defaultRuleBook(),
      options.replies ?? defaultReplyBook(),
      options.now ?? Date.now,
      options.random ?? Math.random
    );
  }

  get corpusVersion(): number {
    return this.corpus.version;
  }

  async handleMessage(userId: string, language: Language, text: string): Promise<ComposedReply> {
    requireUserId(userId);
    if (!isLanguage(language)) throw new ValidationError(`Unsupported language "${String(language)}"`);
    const message = typeof text === 'string' ? text : '';

    return this.lock.runExclusive(userId, async () => {
      const now = this.now();
      const corpus = this.corpus.current;
      const { context, resolution } = resolveContext(
        await this.storage.loadContext(userId),
        userId,
        language,
        now,
        this.config,
        corpus
      );
      if (resolution === 'repaired') {
        console.warn(`[Tutor] Cleared stale entry pointer in ${userId}'s context`);
      }

      const record = await this.rating.getRecord(userId);
      const { result, context: matched } = this.matcher.match(
        message,
        language,
        context,
        this.rating.levelOf(record.score),
        corpus
      );
      const corrections = this.grammar.check(message, result.kind === 'MATCH' ? result.entry : null, language);
      const { reply, context: composed } = this.composer.compose(result, corrections, matched, language, message);

      await this.storage.saveContext({ ...composed, updatedAt: now });
      if (message.trim()) {
        await this.rating.recordConversationTurn(userId, result.kind === 'MATCH' ? result.entry.id : null);
      }
      return reply;
    });
  }

  /** Generates and starts a test. InsufficientDataError reaches the caller. */
  async requestTest(userId: string, examType: ExamType, questionCount?: number): Promise<TestView> {
    requireUserId(userId);
    if (!isExamType(examType)) throw new ValidationError(`Unknown exam type "${String(examType)}"`);

    return this.lock.runExclusive(userId, async () => {
      const created = await this.assessment.generate(userId, examType, questionCount);
      const started = await this.assessment.start(created.testId);
      return toTestView(started);
    });
  }

  /**
   * Records one answer. Rejected actions come back as `{ ok: false }`; the test is
   * finalized as soon as every question has an answer.
   */
  async submitTestAnswer(
    userId: string,
    testId: string,
    questionIndex: number,
    choiceIndex: number
  ): Promise<AnswerAck> {
    requireUserId(userId);
    return this.lock.runExclusive(userId, async (): Promise<AnswerAck> => {
      try {
        await this.ownedTest(userId, testId);
        const updated = await this.assessment.submitAnswer(testId, questionIndex, choiceIndex);
        if (updated.answers.some((a) => a === null)) {
          return { ok: true, test: toTestView(updated), report: null };
        }
        const report = await this.assessment.finalize(testId);
        return { ok: true, test: toTestView(await this.assessment.getTest(testId)), report };
      } catch (error) {
        if (error instanceof TutorError && REJECTED_ACTION_CODES.includes(error.code)) {
          console.warn(`[Tutor] Rejected answer from ${userId} for ${testId}: ${error.message}`);
          return { ok: false, error: { code: error.code, message: error.message } };
        }
        throw error;
      }
    });
  }

  async finalizeTest(userId: string, testId: string): Promise<ScoreReport> {
    requireUserId(userId);
    return this.lock.runExclusive(userId, async () => {
      await this.ownedTest(userId, testId);
      return this.assessment.finalize(testId);
    });
  }

  async getTest(userId: string, testId: string): Promise<TestView> {
    requireUserId(userId);
    return this.lock.runExclusive(userId, async () => toTestView(await this.ownedTest(userId, testId)));
  }

  async getProficiency(userId: string): Promise<ProficiencyView> {
    requireUserId(userId);
    const record = await this.rating.getRecord(userId);
    return this.toProficiencyView(record);
  }

  leaderboard(topN?: number): Promise<LeaderboardRow[]> {
    return this.rating.leaderboard(topN);
  }

  async resetProficiency(userId: string): Promise<ProficiencyView> {
    requireUserId(userId);
    return this.toProficiencyView(await this.rating.resetScore(userId));
  }

  onRatingChange(listener: RatingListener): () => void {
    return this.rating.subscribe(listener);
  }

  /**
   * Rebuilds the corpus from storage and swaps it in whole. On LoadError the
   * current snapshot stays live.
   */
  async reloadCorpus(): Promise<number> {
    const next = loadCorpus(await this.storage.loadCorpus());
    this.corpus.swap(next);
    console.info(`[Tutor] Corpus reloaded (version ${this.corpus.version}, ${next.size} entries)`);
    return this.corpus.version;
  }

  private async ownedTest(userId: string, testId: string) {
    const test = await this.assessment.getTest(testId);
    if (test.userId !== userId) throw new NotFoundError(`Test ${testId} not found`);
    return test;
  }

  private toProficiencyView(record: ProficiencyRecord): ProficiencyView {
    const { level, progress, nextTarget } = this.rating.levelProgress(record.score);
    return {
      userId: record.userId,
      score: record.score,
      level,
      progress,
      nextTarget,
      testHistory: record.testHistory.map((t) => ({ ...t })),
      conversationActivityCount: record.conversationActivityCount,
      wordsLearned: record.wordsLearned,
    };
  }
}
