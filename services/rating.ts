import type {
  ExamType,
  LeaderboardRow,
  ProficiencyLevel,
  ProficiencyRecord,
  RatingChange,
  ScoreReport,
} from '../types';
import type { TutorConfig } from './config';
import { ValidationError } from './errors';
import { KeyedMutex } from './keyedLock';
import { conversationAward, levelOf, levelProgress, utcDay } from './stats';
import type { TutorStorage } from './storage';

export type RatingListener = (change: RatingChange) => void;

export interface TestRatingOutcome {
  record: ProficiencyRecord;
  applied: boolean;
  levelDelta: number;
}

export interface ConversationRatingOutcome {
  record: ProficiencyRecord;
  awarded: number;
}

/**
 * Owns proficiency scores. Every mutation for a user runs under that user's lock,
 * and the score only moves down through `resetScore`.
 */
export class RatingEngine {
  private readonly lock = new KeyedMutex();
  private readonly listeners = new Set<RatingListener>();
  private seq: number | null = null;

  constructor(
    private readonly storage: TutorStorage,
    private readonly config: TutorConfig,
    private readonly now: () => number = Date.now
  ) {}

  levelOf(score: number): ProficiencyLevel {
    return levelOf(score, this.config.rating.levelThresholds);
  }

  levelProgress(score: number) {
    return levelProgress(score, this.config.rating.levelThresholds);
  }

  createRecord(userId: string): ProficiencyRecord {
    const now = this.now();
    return {
      userId,
      score: 0,
      level: 1,
      testHistory: [],
      conversationActivityCount: 0,
      wordsLearned: 0,
      encounteredEntryIds: [],
      dailyConversation: { day: utcDay(now), points: 0 },
      scoreReachedAt: now,
      scoreSeq: 0,
      createdAt: now,
    };
  }

  /** Stored record, or a fresh unsaved one for unknown users. */
  async getRecord(userId: string): Promise<ProficiencyRecord> {
    return (await this.storage.loadProficiency(userId)) ?? this.createRecord(userId);
  }

  subscribe(listener: RatingListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async recordTestResult(userId: string, examType: ExamType, report: ScoreReport): Promise<TestRatingOutcome> {
    return this.lock.runExclusive(userId, async () => {
      const record = await this.getRecord(userId);
      if (record.testHistory.some((t) => t.testId === report.testId)) {
        console.warn(`[Rating] Test ${report.testId} already recorded for ${userId}, ignoring`);
        return { record, applied: false, levelDelta: 0 };
      }

      const delta = Math.max(0, report.scoreDelta);
      const scored = await this.applyScore(record, delta);
      const updated: ProficiencyRecord = {
        ...scored,
        testHistory: [
          ...scored.testHistory,
          {
            testId: report.testId,
            examType,
            correctCount: report.correctCount,
            total: report.total,
            passed: report.passed,
            scoreDelta: delta,
            completedAt: this.now(),
          },
        ],
      };

      await this.storage.saveProficiency(updated);
      this.emitIfChanged(record, updated, 'TEST');
      return { record: updated, applied: true, levelDelta: updated.level - this.levelOf(record.score) };
    });
  }

  async recordConversationTurn(userId: string, entryId: string | null = null): Promise<ConversationRatingOutcome> {
    return this.lock.runExclusive(userId, async () => {
      const record = await this.getRecord(userId);
      const { award, daily } = conversationAward(record.dailyConversation, this.now(), this.config.rating);

      const isNewWord = entryId !== null && !record.encounteredEntryIds.includes(entryId);
      const encounteredEntryIds = isNewWord ? [...record.encounteredEntryIds, entryId] : record.encounteredEntryIds;

      const scored = await this.applyScore(record, award);
      const updated: ProficiencyRecord = {
        ...scored,
        conversationActivityCount: record.conversationActivityCount + 1,
        encounteredEntryIds,
        wordsLearned: encounteredEntryIds.length,
        dailyConversation: daily,
      };

      await this.storage.saveProficiency(updated);
      this.emitIfChanged(record, updated, 'CONVERSATION');
      return { record: updated, awarded: award };
    });
  }

  /** Admin reset; the only operation that lowers a score. History is kept. */
  async resetScore(userId: string): Promise<ProficiencyRecord> {
    return this.lock.runExclusive(userId, async () => {
      const record = await this.getRecord(userId);
      const updated: ProficiencyRecord = {
        ...record,
        score: 0,
        level: 1,
        scoreReachedAt: this.now(),
        scoreSeq: await this.nextSeq(),
      };
      await this.storage.saveProficiency(updated);
      console.info(`[Rating] Score reset for ${userId} (was ${record.score})`);
      this.emitIfChanged(record, updated, 'RESET');
      return updated;
    });
  }

  /**
   * Users with a positive score: highest first, then whoever reached it earlier.
   */
  async leaderboard(topN = 10): Promise<LeaderboardRow[]> {
    if (!Number.isInteger(topN) || topN < 1) {
      throw new ValidationError(`Leaderboard size must be a positive integer, got ${topN}`);
    }
    const records = await this.storage.listProficiency();
    return records
      .filter((r) => r.score > 0)
      .sort((a, b) => b.score - a.score || a.scoreReachedAt - b.scoreReachedAt || a.scoreSeq - b.scoreSeq)
      .slice(0, topN)
      .map((r, i) => ({
        rank: i + 1,
        userId: r.userId,
        score: r.score,
        level: this.levelOf(r.score),
        wordsLearned: r.wordsLearned,
      }));
  }

  private async applyScore(record: ProficiencyRecord, delta: number): Promise<ProficiencyRecord> {
    if (delta <= 0) return record;
    const score = record.score + delta;
    return {
      ...record,
      score,
      level: this.levelOf(score),
      scoreReachedAt: this.now(),
      scoreSeq: await this.nextSeq(),
    };
  }

  // Global tie-break counter, seeded from storage on first use
  private async nextSeq(): Promise<number> {
    const seeded = this.seq ?? (await this.storedMaxSeq());
    const next = Math.max(seeded, this.seq ?? 0) + 1;
    this.seq = next;
    return next;
  }

  private async storedMaxSeq(): Promise<number> {
    const records = await this.storage.listProficiency();
    return records.reduce((max, r) => Math.max(max, r.scoreSeq), 0);
  }

  private emitIfChanged(before: ProficiencyRecord, after: ProficiencyRecord, reason: RatingChange['reason']) {
    if (before.score === after.score) return;
    const change: RatingChange = { userId: after.userId, oldScore: before.score, newScore: after.score, reason };
    this.listeners.forEach((listener) => {
      try {
        listener(change);
      } catch (error) {
        console.error('[Rating] Rating listener failed:', error);
      }
    });
  }
}
