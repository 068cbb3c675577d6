import type { ConversationContext, ProficiencyRecord, TestInstance } from '../types';

/**
 * Persistence collaborator for the tutor. Corpus entries come back raw and are
 * validated by the corpus loader; the other records are checked on read.
 */
export interface TutorStorage {
  loadCorpus(): Promise<unknown[]>;
  loadContext(userId: string): Promise<ConversationContext | null>;
  saveContext(context: ConversationContext): Promise<void>;
  loadProficiency(userId: string): Promise<ProficiencyRecord | null>;
  saveProficiency(record: ProficiencyRecord): Promise<void>;
  listProficiency(): Promise<ProficiencyRecord[]>;
  loadTestInstance(testId: string): Promise<TestInstance | null>;
  saveTestInstance(test: TestInstance): Promise<void>;
}
