import pg from 'pg';
import pino from 'pino';

const logger = pino({ name: 'db' });

export function createPool(connectionString: string): pg.Pool {
  const pool = new pg.Pool({
    connectionString,
    max: 10,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected error on idle database client');
  });

  return pool;
}
