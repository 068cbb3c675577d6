import { indexedDB as fakeIndexedDB } from 'fake-indexeddb';
import type { ConversationContext, ProficiencyRecord, TestInstance } from '../types';
import { isConversationContext, isProficiencyRecord, isTestInstance, readRecord } from './records';
import type { TutorStorage } from './storage';

const DB_NAME = 'TutorDB';
const DB_VERSION = 2; // v2 adds the tests store
const CORPUS_STORE = 'corpus';
const CONTEXTS_STORE = 'contexts';
const PROFICIENCY_STORE = 'proficiency';
const TESTS_STORE = 'tests';

export interface IndexedDbStorageOptions {
  factory?: IDBFactory;
  name?: string;
}

const promisify = <T>(request: IDBRequest<T>): Promise<T> =>
  new Promise((resolve, reject) => {
    request.onsuccess = () => resolve(request.result);
    request.onerror = () => reject(request.error);
  });

/**
 * IndexedDB-backed storage. On Node the factory defaults to fake-indexeddb;
 * pass `factory` to use a real browser database or an isolated test instance.
 */
export class IndexedDbStorage implements TutorStorage {
  private db: IDBDatabase | null = null;
  private readonly factory: IDBFactory;
  private readonly name: string;

  constructor(options: IndexedDbStorageOptions = {}) {
    this.factory = options.factory ?? fakeIndexedDB;
    this.name = options.name ?? DB_NAME;
  }

  async init(): Promise<IDBDatabase> {
    if (this.db) return this.db;

    const db = await new Promise<IDBDatabase>((resolve, reject) => {
      const request = this.factory.open(this.name, DB_VERSION);

      request.onerror = () => reject(request.error);
      request.onsuccess = () => resolve(request.result);

      request.onupgradeneeded = (event) => {
        const upgrading = request.result;

        // V1 stores
        if (!upgrading.objectStoreNames.contains(CORPUS_STORE)) {
          // Auto-increment keys keep entries in import order
          const corpusStore = upgrading.createObjectStore(CORPUS_STORE, { autoIncrement: true });
          corpusStore.createIndex('id', 'id', { unique: false });
          corpusStore.createIndex('language', 'language', { unique: false });
        }
        if (!upgrading.objectStoreNames.contains(CONTEXTS_STORE)) {
          upgrading.createObjectStore(CONTEXTS_STORE, { keyPath: 'userId' });
        }
        if (!upgrading.objectStoreNames.contains(PROFICIENCY_STORE)) {
          const proficiencyStore = upgrading.createObjectStore(PROFICIENCY_STORE, { keyPath: 'userId' });
          proficiencyStore.createIndex('score', 'score', { unique: false });
        }

        // V2: persisted tests
        if (event.oldVersion < 2 && !upgrading.objectStoreNames.contains(TESTS_STORE)) {
          upgrading.createObjectStore(TESTS_STORE, { keyPath: 'testId' });
        }
      };
    });

    this.db = db;
    return db;
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  // --- Corpus ---

  /**
   * Writes a batch of raw entries in one transaction. With `replace` the store is
   * cleared first, so the next load sees exactly this batch.
   */
  async importCorpus(entries: unknown[], replace = false): Promise<number> {
    const db = await this.init();
    return new Promise((resolve, reject) => {
      const tx = db.transaction(CORPUS_STORE, 'readwrite');
      const store = tx.objectStore(CORPUS_STORE);
      if (replace) store.clear();
      entries.forEach((entry) => store.add(entry));

      tx.oncomplete = () => {
        console.info(`[DB] Imported ${entries.length} corpus entries${replace ? ' (replaced)' : ''}`);
        resolve(entries.length);
      };
      tx.onerror = () => reject(tx.error);
    });
  }

  async loadCorpus(): Promise<unknown[]> {
    const db = await this.init();
    const tx = db.transaction(CORPUS_STORE, 'readonly');
    return promisify<unknown[]>(tx.objectStore(CORPUS_STORE).getAll());
  }

  // --- Contexts ---

  async loadContext(userId: string): Promise<ConversationContext | null> {
    return readRecord(await this.get(CONTEXTS_STORE, userId), isConversationContext, 'context');
  }

  async saveContext(context: ConversationContext): Promise<void> {
    await this.put(CONTEXTS_STORE, context);
  }

  // --- Proficiency ---

  async loadProficiency(userId: string): Promise<ProficiencyRecord | null> {
    return readRecord(await this.get(PROFICIENCY_STORE, userId), isProficiencyRecord, 'proficiency');
  }

  async saveProficiency(record: ProficiencyRecord): Promise<void> {
    await this.put(PROFICIENCY_STORE, record);
  }

  async listProficiency(): Promise<ProficiencyRecord[]> {
    const db = await this.init();
    const tx = db.transaction(PROFICIENCY_STORE, 'readonly');
    const rows = await promisify<unknown[]>(tx.objectStore(PROFICIENCY_STORE).getAll());
    return rows
      .map((row) => readRecord(row, isProficiencyRecord, 'proficiency'))
      .filter((record): record is ProficiencyRecord => record !== null);
  }

  // --- Tests ---

  async loadTestInstance(testId: string): Promise<TestInstance | null> {
    return readRecord(await this.get(TESTS_STORE, testId), isTestInstance, 'test');
  }

  async saveTestInstance(test: TestInstance): Promise<void> {
    await this.put(TESTS_STORE, test);
  }

  // --- Helpers ---

  private async get(storeName: string, key: string): Promise<unknown> {
    const db = await this.init();
    const tx = db.transaction(storeName, 'readonly');
    return promisify<unknown>(tx.objectStore(storeName).get(key));
  }

  private async put(storeName: string, value: object): Promise<void> {
    const db = await this.init();
    return new Promise((resolve, reject) => {
      const tx = db.transaction(storeName, 'readwrite');
      tx.objectStore(storeName).put(value);
      tx.oncomplete = () => resolve();
      tx.onerror = () => reject(tx.error);
    });
  }
}
