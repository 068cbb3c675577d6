import type { ConversationContext, ProficiencyRecord, TestInstance } from '../types';
import { isConversationContext, isProficiencyRecord, isTestInstance, readRecord } from './records';
import type { TutorStorage } from './storage';

/**
 * In-process storage. Values are cloned on the way in and out so callers never
 * share mutable state with the store.
 */
export class MemoryStorage implements TutorStorage {
  private corpus: unknown[];
  private contexts = new Map<string, unknown>();
  private proficiency = new Map<string, unknown>();
  private tests = new Map<string, unknown>();

  constructor(corpus: unknown[] = []) {
    this.corpus = structuredClone(corpus);
  }

  setCorpus(entries: unknown[]): void {
    this.corpus = structuredClone(entries);
  }

  /** Writes a raw value under a user id, used to simulate damaged records. */
  putRawContext(userId: string, value: unknown): void {
    this.contexts.set(userId, structuredClone(value));
  }

  async loadCorpus(): Promise<unknown[]> {
    return structuredClone(this.corpus);
  }

  async loadContext(userId: string): Promise<ConversationContext | null> {
    return readRecord(structuredClone(this.contexts.get(userId)), isConversationContext, 'context');
  }

  async saveContext(context: ConversationContext): Promise<void> {
    this.contexts.set(context.userId, structuredClone(context));
  }

  async loadProficiency(userId: string): Promise<ProficiencyRecord | null> {
    return readRecord(structuredClone(this.proficiency.get(userId)), isProficiencyRecord, 'proficiency');
  }

  async saveProficiency(record: ProficiencyRecord): Promise<void> {
    this.proficiency.set(record.userId, structuredClone(record));
  }

  async listProficiency(): Promise<ProficiencyRecord[]> {
    return [...this.proficiency.values()]
      .map((value) => readRecord(structuredClone(value), isProficiencyRecord, 'proficiency'))
      .filter((record): record is ProficiencyRecord => record !== null);
  }

  async loadTestInstance(testId: string): Promise<TestInstance | null> {
    return readRecord(structuredClone(this.tests.get(testId)), isTestInstance, 'test');
  }

  async saveTestInstance(test: TestInstance): Promise<void> {
    this.tests.set(test.testId, structuredClone(test));
  }
}
