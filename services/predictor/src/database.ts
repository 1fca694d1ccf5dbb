/**
 * PostgreSQL Database Client
 */

import pg from 'pg';
import { createLogger } from '@scoreline/shared';
import { config } from './config';

const logger = createLogger('predictor:db', config.logLevel);

export function createDatabase(connectionString: string = config.postgres.url): pg.Pool {
    const pool = new pg.Pool({
        connectionString,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
    });

    pool.on('error', (err) => {
        logger.error('Database pool error', { error: String(err) });
    });

    pool.on('connect', () => {
        logger.debug('New database connection');
    });

    return pool;
}
