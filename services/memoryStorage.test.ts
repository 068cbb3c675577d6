import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createContext } from './contexts';
import { MemoryStorage } from './memoryStorage';

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

describe('MemoryStorage', () => {
  it('hands out copies of stored contexts', async () => {
    const storage = new MemoryStorage();
    await storage.saveContext(createContext('u1', 'KR', 1000));

    const loaded = await storage.loadContext('u1');
    if (!loaded) throw new Error('context was not stored');
    loaded.turnCount = 9;

    expect((await storage.loadContext('u1'))?.turnCount).toBe(0);
  });

  it('hands out copies of the corpus', async () => {
    const source = [{ id: 'a' }];
    const storage = new MemoryStorage(source);
    source.push({ id: 'b' });

    expect(await storage.loadCorpus()).toEqual([{ id: 'a' }]);
  });

  it('treats missing and malformed records as absent', async () => {
    const storage = new MemoryStorage();
    storage.putRawContext('u2', { userId: 'u2', turnCount: 'many' });

    expect(await storage.loadContext('u1')).toBeNull();
    expect(await storage.loadContext('u2')).toBeNull();
    expect(await storage.loadProficiency('u1')).toBeNull();
    expect(await storage.loadTestInstance('t1')).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
