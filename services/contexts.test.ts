import { beforeAll, describe, expect, it, vi } from 'vitest';
import { sampleCorpus } from '../index';
import type { ConversationContext } from '../types';
import { createConfig } from './config';
import { createContext, resolveContext } from './contexts';
import { loadCorpus } from './corpus';
import type { VocabularyCorpus } from './corpus';

const config = createConfig();
const now = 1_700_000_000_000;
let corpus: VocabularyCorpus;

const stored = (overrides: Partial<ConversationContext> = {}): ConversationContext => ({
  ...createContext('u1', 'KR', now - 60_000),
  turnCount: 3,
  recentIntents: ['GREETING', 'QUESTION'],
  lastMatchedEntryId: 'kr-sagwa',
  ...overrides,
});

beforeAll(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
  corpus = loadCorpus(sampleCorpus);
});

describe('resolveContext', () => {
  it('starts fresh without a stored context', () => {
    expect(resolveContext(null, 'u1', 'KR', now, config, corpus)).toEqual({
      context: createContext('u1', 'KR', now),
      resolution: 'fresh',
    });
  });

  it('resumes a recent context', () => {
    const { context, resolution } = resolveContext(stored(), 'u1', 'KR', now, config, corpus);
    expect(resolution).toBe('resumed');
    expect(context.turnCount).toBe(3);
    expect(context.lastMatchedEntryId).toBe('kr-sagwa');
  });

  it('starts fresh after the idle timeout', () => {
    const idle = stored({ updatedAt: now - config.conversation.contextIdleTimeoutMs - 1 });
    expect(resolveContext(idle, 'u1', 'KR', now, config, corpus).resolution).toBe('fresh');
  });

  it('starts fresh when the language changes', () => {
    const { context, resolution } = resolveContext(stored(), 'u1', 'JP', now, config, corpus);
    expect(resolution).toBe('fresh');
    expect(context.language).toBe('JP');
  });

  it('starts fresh for a context that belongs to someone else', () => {
    expect(resolveContext(stored({ userId: 'u2' }), 'u1', 'KR', now, config, corpus).resolution).toBe('fresh');
  });

  it('clears a pointer to an entry the corpus no longer has', () => {
    const { context, resolution } = resolveContext(
      stored({ lastMatchedEntryId: 'kr-removed' }),
      'u1',
      'KR',
      now,
      config,
      corpus
    );
    expect(resolution).toBe('repaired');
    expect(context.lastMatchedEntryId).toBeNull();
    expect(context.turnCount).toBe(3);
  });
});
