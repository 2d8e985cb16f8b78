/**
 * Database Connection
 *
 * Pool of SQLite connections (better-sqlite3 wrapped with Drizzle ORM).
 * Each repository owns its own pool, so separate repositories never share
 * connections or state.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import { PoolError, describeError } from './repositories/errors';

export const IN_MEMORY = ':memory:';

export type Db = BetterSQLite3Database<typeof schema>;

export interface PooledConnection {
  readonly id: number;
  readonly db: Db;
  readonly sqlite: Database.Database;
}

export interface ConnectionPoolOptions {
  /** Database file path, or `:memory:` */
  filename: string;
  /** Upper bound on open connections. Forced to 1 for in-memory databases. */
  max?: number;
  acquireTimeoutMillis?: number;
  /** How long a connection waits on a locked file before SQLITE_BUSY */
  busyTimeoutMillis?: number;
}

export interface PoolStatus {
  max: number;
  size: number;
  idle: number;
  waiting: number;
  closed: boolean;
}

interface Waiter {
  resolve: (connection: PooledConnection) => void;
  reject: (error: PoolError) => void;
  timer: NodeJS.Timeout;
}

const DEFAULT_MAX_CONNECTIONS = 10;
const DEFAULT_ACQUIRE_TIMEOUT_MS = 30000;
const DEFAULT_BUSY_TIMEOUT_MS = 5000;

export class ConnectionPool {
  readonly filename: string;
  readonly max: number;
  private readonly acquireTimeoutMillis: number;
  private readonly busyTimeoutMillis: number;
  private readonly connections = new Set<PooledConnection>();
  private readonly idle: PooledConnection[] = [];
  private readonly waiters: Waiter[] = [];
  private nextId = 1;
  private closed = false;

  /**
   * Opens the first connection immediately, so an unusable path fails here
   * with the driver's error.
   */
  constructor(options: ConnectionPoolOptions) {
    this.filename = options.filename;
    this.max = this.isInMemory
      ? 1
      : Math.max(1, options.max ?? DEFAULT_MAX_CONNECTIONS);
    this.acquireTimeoutMillis = options.acquireTimeoutMillis ?? DEFAULT_ACQUIRE_TIMEOUT_MS;
    this.busyTimeoutMillis = options.busyTimeoutMillis ?? DEFAULT_BUSY_TIMEOUT_MS;

    this.idle.push(this.open());
  }

  get isInMemory(): boolean {
    return this.filename === IN_MEMORY;
  }

  /**
   * Take a connection: an idle one, a newly opened one while below `max`,
   * or the next one released, in arrival order.
   */
  acquire(): Promise<PooledConnection> {
    if (this.closed) {
      return Promise.reject(new PoolError('Connection pool is closed'));
    }

    const connection = this.idle.pop();
    if (connection) {
      return Promise.resolve(connection);
    }

    if (this.connections.size < this.max) {
      try {
        return Promise.resolve(this.open());
      } catch (error) {
        return Promise.reject(
          new PoolError(`Failed to open database connection: ${describeError(error)}`, { cause: error })
        );
      }
    }

    return new Promise<PooledConnection>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new PoolError(`Timed out after ${this.acquireTimeoutMillis}ms waiting for a connection`));
        }, this.acquireTimeoutMillis),
      };
      this.waiters.push(waiter);
    });
  }

  release(connection: PooledConnection): void {
    if (!this.connections.has(connection)) {
      return;
    }

    if (this.closed) {
      this.destroy(connection);
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(connection);
      return;
    }

    this.idle.push(connection);
  }

  /**
   * Run `fn` with a pooled connection. The connection goes back to the pool
   * whether `fn` returns or throws.
   */
  async withConnection<T>(fn: (connection: PooledConnection) => T | Promise<T>): Promise<T> {
    const connection = await this.acquire();
    try {
      return await fn(connection);
    } finally {
      this.release(connection);
    }
  }

  status(): PoolStatus {
    return {
      max: this.max,
      size: this.connections.size,
      idle: this.idle.length,
      waiting: this.waiters.length,
      closed: this.closed,
    };
  }

  /**
   * Close idle connections and fail pending acquisitions. Connections in use
   * are closed as they are released.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new PoolError('Connection pool is closed'));
    }

    for (const connection of this.idle.splice(0)) {
      this.destroy(connection);
    }
  }

  private open(): PooledConnection {
    const sqlite = new Database(this.filename);

    try {
      if (!this.isInMemory) {
        sqlite.pragma('journal_mode = WAL');
      }
      sqlite.pragma(`busy_timeout = ${this.busyTimeoutMillis}`);
    } catch (error) {
      sqlite.close();
      throw error;
    }

    const connection: PooledConnection = {
      id: this.nextId++,
      db: drizzle(sqlite, { schema }),
      sqlite,
    };
    this.connections.add(connection);

    return connection;
  }

  private destroy(connection: PooledConnection): void {
    this.connections.delete(connection);
    connection.sqlite.close();
  }
}
