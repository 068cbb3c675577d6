import { beforeEach, describe, expect, it, vi } from 'vitest';
import { sampleCorpus } from '../index';
import type { RatingChange, TestInstance } from '../types';
import { InsufficientDataError, LoadError, ValidationError } from './errors';
import { MemoryStorage } from './memoryStorage';
import { fixedClock, seededRandom } from './testSupport';
import type { Clock } from './testSupport';
import { TutorService } from './tutor';

const HELLO_REPLY = ['안녕! 반가워요. That is "hello" in Korean.', 'Try using "안녕" in a different situation.'].join('\n');

let clock: Clock;

const serviceFor = async (corpus: unknown[] = [...sampleCorpus]) => {
  const storage = new MemoryStorage(corpus);
  const service = await TutorService.create({ storage, now: clock.now, random: seededRandom(11) });
  return { storage, service };
};

const answerKey = async (storage: MemoryStorage, testId: string): Promise<TestInstance> => {
  const test = await storage.loadTestInstance(testId);
  if (!test) throw new Error(`test ${testId} was not stored`);
  return test;
};

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  clock = fixedClock();
});

describe('TutorService.handleMessage', () => {
  it('answers a greeting from a one-entry corpus', async () => {
    const { service, storage } = await serviceFor([
      {
        id: 'kr-annyeong',
        language: 'KR',
        surfaceForm: '안녕',
        translation: 'hello',
        partOfSpeech: 'interjection',
        difficultyTier: 'BEGINNER',
      },
    ]);

    const reply = await service.handleMessage('u1', 'KR', '안녕');
    expect(reply).toEqual({ text: HELLO_REPLY, intent: 'GREETING', matched: true, corrections: [] });
    expect(await storage.loadContext('u1')).toEqual({
      userId: 'u1',
      language: 'KR',
      lastMatchedEntryId: 'kr-annyeong',
      turnCount: 1,
      recentIntents: ['GREETING'],
      lastClarificationIndex: null,
      updatedAt: clock.now(),
    });
  });

  it('gives identical replies for identical histories', async () => {
    const a = await serviceFor();
    const b = await serviceFor();
    for (const text of ['안녕', '사과를 주세요', 'xyz', '책는 재미있어요']) {
      expect(await b.service.handleMessage('u1', 'KR', text)).toEqual(await a.service.handleMessage('u1', 'KR', text));
    }
  });

  it('recovers from a damaged stored context', async () => {
    const { service, storage } = await serviceFor();
    storage.putRawContext('u1', { garbage: true });

    const reply = await service.handleMessage('u1', 'KR', '안녕');
    expect(reply.text).toBe(HELLO_REPLY);
    expect(console.warn).toHaveBeenCalledWith('[Storage] Ignoring malformed context record');
    expect((await storage.loadContext('u1'))?.turnCount).toBe(1);
  });

  it('starts a new conversation after the idle timeout', async () => {
    const { service, storage } = await serviceFor();
    await service.handleMessage('u1', 'KR', '안녕');
    clock.advance(5 * 60 * 1000);
    await service.handleMessage('u1', 'KR', '책');
    expect((await storage.loadContext('u1'))?.turnCount).toBe(2);

    clock.advance(31 * 60 * 1000);
    await service.handleMessage('u1', 'KR', '책');
    expect((await storage.loadContext('u1'))?.turnCount).toBe(1);
  });

  it('starts a new conversation when the language changes', async () => {
    const { service, storage } = await serviceFor();
    await service.handleMessage('u1', 'KR', '안녕');
    const reply = await service.handleMessage('u1', 'JP', 'こんにちは');

    expect(reply.matched).toBe(true);
    expect(await storage.loadContext('u1')).toMatchObject({ language: 'JP', turnCount: 1 });
  });

  it('clears a pointer to an entry removed by a reload', async () => {
    const { service, storage } = await serviceFor();
    await service.handleMessage('u1', 'KR', '안녕');

    storage.setCorpus(sampleCorpus.filter((e) => !(typeof e === 'object' && e !== null && 'id' in e && e.id === 'kr-annyeong')));
    expect(await service.reloadCorpus()).toBe(2);

    const reply = await service.handleMessage('u1', 'KR', 'xyz');
    expect(reply.text).toBe('죄송해요, 잘 모르겠어요. Could you say that another way?');
    expect(console.warn).toHaveBeenCalledWith("[Tutor] Cleared stale entry pointer in u1's context");
    expect(await storage.loadContext('u1')).toMatchObject({
      lastMatchedEntryId: null,
      turnCount: 2,
      lastClarificationIndex: 0,
    });
  });

  it('serializes concurrent messages from one user', async () => {
    const { service, storage } = await serviceFor();
    await Promise.all([service.handleMessage('u1', 'KR', '안녕'), service.handleMessage('u1', 'KR', '책')]);
    expect((await storage.loadContext('u1'))?.turnCount).toBe(2);
  });

  it('earns conversation points for non-empty messages only', async () => {
    const { service } = await serviceFor();
    await service.handleMessage('u1', 'KR', '안녕');
    await service.handleMessage('u1', 'KR', '   ');

    expect(await service.getProficiency('u1')).toEqual({
      userId: 'u1',
      score: 1,
      level: 1,
      progress: 3,
      nextTarget: 30,
      testHistory: [],
      conversationActivityCount: 1,
      wordsLearned: 1,
    });
  });

  it('rejects an empty user id', async () => {
    const { service } = await serviceFor();
    await expect(service.handleMessage('', 'KR', '안녕')).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('TutorService tests', () => {
  it('runs a test end to end and reports the score', async () => {
    const { service, storage } = await serviceFor();
    const view = await service.requestTest('u1', 'TOPIK', 3);
    expect(view).toMatchObject({ examType: 'TOPIK', language: 'KR', status: 'IN_PROGRESS', answered: 0 });
    expect(view.questions.every((q) => !('correctAnswerIndex' in q))).toBe(true);

    const key = await answerKey(storage, view.testId);
    const first = await service.submitTestAnswer('u1', view.testId, 0, key.questions[0].correctAnswerIndex);
    expect(first).toMatchObject({ ok: true, report: null, test: { answered: 1 } });

    await service.submitTestAnswer('u1', view.testId, 1, key.questions[1].correctAnswerIndex);
    const last = await service.submitTestAnswer('u1', view.testId, 2, key.questions[2].correctAnswerIndex);
    expect(last).toMatchObject({
      ok: true,
      test: { status: 'COMPLETED', answered: 3 },
      report: { correctCount: 3, total: 3, passed: true, scoreDelta: 8 },
    });
    expect((await service.getProficiency('u1')).score).toBe(8);
  });

  it('acknowledges rejected answers instead of throwing', async () => {
    const { service } = await serviceFor();
    const view = await service.requestTest('u1', 'TOPIK', 2);

    expect(await service.submitTestAnswer('u1', view.testId, 9, 0)).toMatchObject({
      ok: false,
      error: { code: 'VALIDATION' },
    });
    expect(await service.submitTestAnswer('u2', view.testId, 0, 0)).toEqual({
      ok: false,
      error: { code: 'NOT_FOUND', message: `Test ${view.testId} not found` },
    });
    expect(await service.submitTestAnswer('u1', 'TOPIK_0_none', 0, 0)).toMatchObject({
      ok: false,
      error: { code: 'NOT_FOUND' },
    });
  });

  it('closes an expired test and still scores it', async () => {
    const { service } = await serviceFor();
    const view = await service.requestTest('u1', 'TOPIK', 2);
    clock.advance(2 * 60 * 1000);

    expect(await service.submitTestAnswer('u1', view.testId, 0, 0)).toMatchObject({
      ok: false,
      error: { code: 'INVALID_STATE' },
    });
    expect(await service.finalizeTest('u1', view.testId)).toMatchObject({ correctCount: 0, total: 2, passed: false });
    expect((await service.getTest('u1', view.testId)).status).toBe('EXPIRED');
  });

  it('passes insufficient corpus errors to the caller', async () => {
    const { service } = await serviceFor();
    await expect(service.requestTest('u1', 'JLPT', 10)).rejects.toMatchObject({
      code: 'INSUFFICIENT_DATA',
      requested: 10,
      available: 8,
    });
    await expect(service.requestTest('u1', 'JLPT', 10)).rejects.toBeInstanceOf(InsufficientDataError);
  });
});

describe('TutorService proficiency', () => {
  it('ranks learners and supports resets', async () => {
    const { service } = await serviceFor();
    await service.handleMessage('u1', 'KR', '안녕');
    await service.handleMessage('u2', 'KR', '안녕');
    await service.handleMessage('u2', 'KR', '책');

    expect(await service.leaderboard()).toEqual([
      { rank: 1, userId: 'u2', score: 2, level: 1, wordsLearned: 2 },
      { rank: 2, userId: 'u1', score: 1, level: 1, wordsLearned: 1 },
    ]);

    const reset = await service.resetProficiency('u2');
    expect(reset.score).toBe(0);
    expect((await service.leaderboard()).map((row) => row.userId)).toEqual(['u1']);
  });

  it('publishes rating changes', async () => {
    const { service } = await serviceFor();
    const changes: RatingChange[] = [];
    const unsubscribe = service.onRatingChange((change) => changes.push(change));

    await service.handleMessage('u1', 'KR', '안녕');
    unsubscribe();
    await service.handleMessage('u1', 'KR', '책');

    expect(changes).toEqual([{ userId: 'u1', oldScore: 0, newScore: 1, reason: 'CONVERSATION' }]);
  });
});

describe('TutorService corpus loading', () => {
  it('refuses to start on a malformed corpus', async () => {
    await expect(serviceFor([{ id: 'broken' }])).rejects.toBeInstanceOf(LoadError);
  });

  it('keeps the live corpus when a reload fails', async () => {
    const { service, storage } = await serviceFor();
    storage.setCorpus([{ id: 'broken' }]);

    await expect(service.reloadCorpus()).rejects.toBeInstanceOf(LoadError);
    expect(service.corpusVersion).toBe(1);
    expect((await service.handleMessage('u1', 'KR', '안녕')).matched).toBe(true);
  });
});
