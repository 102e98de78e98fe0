import { createSessionStore, MemoryStore, RedisStore } from '../sessionStore';
import { SessionManager } from '../services/sessionManager';
import { Session } from '../models/SessionModels';

describe('SessionManager', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stores sessions under the user id and clears them', async () => {
    const store = new MemoryStore<Session>();
    const sessions = new SessionManager(store);

    await sessions.set({ state: 'AwaitingYearRange', userId: 5, selectedGenres: ['comedy'] });

    expect(await store.get('5')).toEqual({ state: 'AwaitingYearRange', userId: 5, selectedGenres: ['comedy'] });
    expect(await sessions.get(6)).toBeUndefined();

    await sessions.clear(5);
    expect(await sessions.get(5)).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it('picks the store from the options', () => {
    expect(createSessionStore<Session>()).toBeInstanceOf(MemoryStore);
    expect(createSessionStore<Session>({ redisUrl: 'redis://localhost:6379' })).toBeInstanceOf(RedisStore);
  });
});
