import { Pool, PoolClient, QueryResultRow } from 'pg';
import { StorageError } from '../models/errors';
import { RecommendationRequest, Storage, UserProfile } from '../models/Recommendation';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id BIGINT PRIMARY KEY,
    username VARCHAR(255),
    first_name VARCHAR(255),
    last_name VARCHAR(255),
    created_at TIMESTAMP NOT NULL DEFAULT now()
  );
  CREATE TABLE IF NOT EXISTS film_requests (
    id SERIAL PRIMARY KEY,
    user_id BIGINT NOT NULL REFERENCES users(id),
    genres TEXT NOT NULL,
    years TEXT NOT NULL,
    keywords TEXT,
    model_response TEXT NOT NULL,
    film1 VARCHAR(255),
    film2 VARCHAR(255),
    film3 VARCHAR(255),
    requested_at TIMESTAMP NOT NULL DEFAULT now()
  );
`;

/** Row shape of `film_requests` as read back by `listRequests`. */
export interface FilmRequestRow {
  id: number;
  genres: string;
  years: string;
  keywords: string | null;
  model_response: string;
  film1: string | null;
  film2: string | null;
  film3: string | null;
  requested_at: Date;
}

/**
 * PostgreSQL-backed persistence of user profiles and recommendation requests.
 * Failures of the `Storage` contract are rethrown as StorageError.
 */
export class PostgresStorage implements Storage {
  constructor(private readonly pool: Pool) {}

  /** Creates the tables when missing; run once at startup. */
  async init(): Promise<void> {
    try {
      await this.pool.query(SCHEMA);
    } catch (err) {
      throw new StorageError('Failed to create tables', err);
    }
  }

  async upsertUser(profile: UserProfile): Promise<void> {
    try {
      // Existence check and insert run in one transaction – never overwrite.
      await this.inTransaction(async (client) => {
        const existing = await client.query('SELECT id FROM users WHERE id = $1', [profile.userId]);
        if (existing.rows.length > 0) return;
        await client.query(
          'INSERT INTO users (id, username, first_name, last_name) VALUES ($1, $2, $3, $4)',
          [profile.userId, profile.username, profile.firstName, profile.lastName],
        );
      });
    } catch (err) {
      throw new StorageError(`Failed to save user ${profile.userId}`, err);
    }
  }

  async recordRequest(request: RecommendationRequest): Promise<void> {
    const [film1, film2, film3] = request.titles;
    try {
      await this.pool.query(
        `INSERT INTO film_requests (user_id, genres, years, keywords, model_response, film1, film2, film3)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        [
          request.userId,
          request.genres,
          request.years,
          request.keywords,
          request.modelResponseText,
          film1,
          film2,
          film3,
        ],
      );
    } catch (err) {
      throw new StorageError(`Failed to save film request of user ${request.userId}`, err);
    }
  }

  /** Requests of a user, oldest first. */
  async listRequests(userId: number): Promise<FilmRequestRow[]> {
    return this.select<FilmRequestRow>(
      `SELECT id, genres, years, keywords, model_response, film1, film2, film3, requested_at
       FROM film_requests WHERE user_id = $1 ORDER BY id`,
      [userId],
    );
  }

  async countUsers(): Promise<number> {
    const rows = await this.select<{ id: string | number }>('SELECT id FROM users');
    return rows.length;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async select<T extends QueryResultRow>(text: string, params: unknown[] = []): Promise<T[]> {
    const res = await this.pool.query<T>(text, params);
    return res.rows;
  }

  private async inTransaction(work: (client: PoolClient) => Promise<void>): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await work(client);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        console.warn('[storageService] Rollback failed', rollbackErr);
      });
      throw err;
    } finally {
      client.release();
    }
  }
}
