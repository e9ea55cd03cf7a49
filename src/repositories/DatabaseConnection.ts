import pgPromise from 'pg-promise';
import config from '../config';
import logger from '../utils/logger';

// eslint-disable-next-line @typescript-eslint/ban-types
export type Database = pgPromise.IDatabase<{}>;

// Error throttling to prevent log flooding
const errorThrottle = {
  lastError: '',
  lastErrorTime: 0,
  errorCount: 0,
  throttleMs: 5000,
};

const queryPreview = (query: unknown, length: number): string | undefined => (
  typeof query === 'string' ? query.substring(0, length) : undefined
);

const pgp = pgPromise({
  connect: () => {
    logger.debug('New database connection established');
  },
  disconnect: () => {
    logger.debug('Database connection released');
  },
  error: (err: Error, e) => {
    const now = Date.now();
    const errorKey = `${err.message}:${queryPreview(e.query, 50) ?? ''}`;

    if (errorKey === errorThrottle.lastError) {
      errorThrottle.errorCount += 1;
      if (now - errorThrottle.lastErrorTime < errorThrottle.throttleMs) {
        return;
      }
      logger.error(`Database error (repeated x${errorThrottle.errorCount})`, {
        error: err.message,
        query: queryPreview(e.query, 100),
      });
      errorThrottle.errorCount = 0;
    } else {
      logger.error('Database query error', {
        error: err.message,
        query: queryPreview(e.query, 100),
      });
      errorThrottle.errorCount = 1;
    }

    errorThrottle.lastError = errorKey;
    errorThrottle.lastErrorTime = now;
  },
});

/**
 * Database connection manager for the transceivers database
 */
class DatabaseConnection {
  private db: Database;

  constructor() {
    this.db = pgp({
      connectionString: config.database.postgres.url,
      max: config.database.postgres.pool.max,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      keepAlive: true,
      query_timeout: 60000,
    });
  }

  static maskUrl(connectionString: string): string {
    return connectionString.replace(/:[^:@/]+@/, ':****@');
  }

  /**
   * Verifies the pool can hand out a connection
   */
  async verify(): Promise<void> {
    const started = Date.now();
    const connection = await this.db.connect();
    connection.done();
    logger.info('Database connection established', {
      url: DatabaseConnection.maskUrl(config.database.postgres.url),
      durationMs: Date.now() - started,
    });
  }

  getDb(): Database {
    return this.db;
  }

  /**
   * Close database connections and pool
   */
  async close(): Promise<void> {
    try {
      await this.db.$pool.end();
    } finally {
      pgp.end();
    }
  }
}

let connectionInstance: DatabaseConnection | null = null;

/**
 * Get or create database connection instance
 */
export function getConnection(): DatabaseConnection {
  if (!connectionInstance) {
    connectionInstance = new DatabaseConnection();
  }
  return connectionInstance;
}

export { DatabaseConnection };
