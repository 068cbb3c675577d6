import type { ConversationContext, Language } from '../types';
import type { TutorConfig } from './config';
import type { VocabularyCorpus } from './corpus';

export const createContext = (userId: string, language: Language, now: number): ConversationContext => ({
  userId,
  language,
  lastMatchedEntryId: null,
  turnCount: 0,
  recentIntents: [],
  lastClarificationIndex: null,
  updatedAt: now,
});

export type ContextResolution = 'fresh' | 'resumed' | 'repaired';

/**
 * Turns whatever storage returned into a usable context. Absent, foreign, idle or
 * other-language contexts start over; a pointer to an entry the current corpus no
 * longer has is cleared.
 */
export const resolveContext = (
  stored: ConversationContext | null,
  userId: string,
  language: Language,
  now: number,
  config: TutorConfig,
  corpus: VocabularyCorpus
): { context: ConversationContext; resolution: ContextResolution } => {
  if (
    !stored ||
    stored.userId !== userId ||
    stored.language !== language ||
    now - stored.updatedAt > config.conversation.contextIdleTimeoutMs
  ) {
    return { context: createContext(userId, language, now), resolution: 'fresh' };
  }

  const pointer = stored.lastMatchedEntryId;
  if (pointer !== null && corpus.getById(pointer)?.language !== language) {
    return { context: { ...stored, lastMatchedEntryId: null }, resolution: 'repaired' };
  }

  return {
    context: { ...stored, recentIntents: stored.recentIntents.slice(-config.conversation.recentIntentsLimit) },
    resolution: 'resumed',
  };
};
