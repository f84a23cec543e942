/**
 * Food Store
 *
 * The single access point to the SQLite store. One instance is opened at startup,
 * injected into every repository and closed on shutdown.
 *
 * Statements are Kysely `sql` templates: interpolated values are always bound as
 * positional parameters. Each `execute` is one autocommitted statement.
 */

import type { FoodDbClient } from './client.js';
import type { Logger } from 'pino';
import type { RawBuilder } from 'kysely';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Outcome of a data-modifying statement.
 */
export interface ExecuteResult {
  /** Rows inserted, updated or deleted */
  changes: number;
  /** Row id of the last INSERT on this connection, when the statement inserted one */
  lastInsertId: number | undefined;
}

/**
 * Store access contract used by the repositories.
 *
 * Failures (malformed SQL, constraint violations, a closed store) are thrown
 * to the caller; nothing is retried.
 */
export interface FoodStore {
  query<R>(statement: RawBuilder<R>): Promise<R[]>;
  execute(statement: RawBuilder<unknown>): Promise<ExecuteResult>;
  close(): Promise<void>;
}

export interface FoodStoreOptions {
  db: FoodDbClient;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyFoodStore implements FoodStore {
  private readonly db: FoodDbClient;
  private readonly log: Logger;
  private closed = false;

  constructor(options: FoodStoreOptions) {
    this.db = options.db;
    this.log = options.logger.child({ component: 'FoodStore' });
  }

  async query<R>(statement: RawBuilder<R>): Promise<R[]> {
    this.assertOpen();
    const result = await statement.execute(this.db);
    this.log.trace({ rowCount: result.rows.length }, 'Query executed');
    return result.rows;
  }

  async execute(statement: RawBuilder<unknown>): Promise<ExecuteResult> {
    this.assertOpen();
    const result = await statement.execute(this.db);

    const changes = Number(result.numAffectedRows ?? 0n);
    const lastInsertId = result.insertId !== undefined ? Number(result.insertId) : undefined;

    this.log.trace({ changes, lastInsertId }, 'Statement executed');
    return { changes, lastInsertId };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.db.destroy();
    this.log.info('Food store closed');
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Food store is closed');
    }
  }
}

/**
 * Wraps an open Kysely client in the store interface.
 */
export const makeFoodStore = (options: FoodStoreOptions): FoodStore => {
  return new KyselyFoodStore(options);
};
