import Redis from 'ioredis';

// Generic async key-value store used for per-user dialogue sessions
export interface KeyValueStore<V> {
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V): Promise<void>;
  delete(key: string): Promise<void>;
}

// --------------------- In-memory store (dev / long-polling / tests) ---------------------
export class MemoryStore<V> implements KeyValueStore<V> {
  private readonly data = new Map<string, V>();

  async get(key: string): Promise<V | undefined> {
    return this.data.get(key);
  }

  async set(key: string, value: V): Promise<void> {
    this.data.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  get size(): number {
    return this.data.size;
  }
}

// --------------------- Redis-backed store (prod / webhook) ---------------------
export class RedisStore<V> implements KeyValueStore<V> {
  private readonly redis: Redis;

  constructor(
    redisUrl: string,
    private readonly ttlSeconds = 60 * 60 * 24, // default TTL 24h
    private readonly keyPrefix = 'film-picker:session:',
  ) {
    this.redis = new Redis(redisUrl, {
      // Lazy connect only when first command is issued – saves cold-start time
      lazyConnect: true,
      maxRetriesPerRequest: 1,
    });
  }

  private async ensureConnected(): Promise<void> {
    if (this.redis.status === 'end' || this.redis.status === 'close') {
      await this.redis.connect();
    }
  }

  async get(key: string): Promise<V | undefined> {
    await this.ensureConnected();
    const json = await this.redis.get(this.keyPrefix + key);
    if (!json) return undefined;
    try {
      return JSON.parse(json) as V;
    } catch (err) {
      console.warn(`[sessionStore] Dropping unreadable session under ${key}`, err);
      return undefined;
    }
  }

  async set(key: string, value: V): Promise<void> {
    await this.ensureConnected();
    await this.redis.set(this.keyPrefix + key, JSON.stringify(value), 'EX', this.ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    await this.ensureConnected();
    await this.redis.del(this.keyPrefix + key);
  }
}

export interface SessionStoreOptions {
  redisUrl?: string;
  ttlSeconds?: number;
}

// --------------------- Factory ---------------------
export function createSessionStore<V>(options: SessionStoreOptions = {}): KeyValueStore<V> {
  if (options.redisUrl) {
    console.info('[sessionStore] Using Redis-backed session store');
    return new RedisStore<V>(options.redisUrl, options.ttlSeconds);
  }
  console.info('[sessionStore] Using in-memory session store');
  return new MemoryStore<V>();
}
