import 'dotenv/config';

import { Pool, neonConfig } from '@neondatabase/serverless';
import { drizzle } from 'drizzle-orm/neon-serverless';
import ws from 'ws';
import * as schema from '../shared/schema';
import { logger } from './logger';

neonConfig.webSocketConstructor = ws;

if (!process.env.DATABASE_URL) {
  throw new Error(
    'DATABASE_URL must be set. Did you forget to provision a database?'
  );
}

const createPool = () => {
  return new Pool({
    connectionString: process.env.DATABASE_URL,
    max: 3,
    idleTimeoutMillis: 20000,
    connectionTimeoutMillis: 8000,
  });
};

const pool = createPool();
export const db = drizzle({ client: pool, schema });

pool.on('error', err => {
  logger('error', `Database pool error: ${err.message}`, 'db');
});

function isConnectionError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.message.includes('Connection terminated') ||
      error.message.includes('connection closed') ||
      error.message.includes('ECONNREFUSED') ||
      error.message.includes('WebSocket'))
  );
}

// Retry transient connection failures with exponential backoff
export const executeWithRetry = async <T>(
  operation: () => Promise<T>,
  operationName = 'database operation',
  maxAttempts = 3
): Promise<T> => {
  const baseDelay = 500;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isConnectionError(error) || attempt >= maxAttempts) {
        logger('error', `${operationName} failed: ${error instanceof Error ? error.message : String(error)}`, 'db');
        throw error;
      }

      const delay = Math.min(baseDelay * Math.pow(2, attempt - 1), 5000);
      logger('warn', `${operationName} attempt ${attempt}/${maxAttempts} failed, retrying in ${delay}ms`, 'db');
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
};

export const getDatabaseHealth = async (): Promise<{
  connected: boolean;
  error?: string;
}> => {
  try {
    await pool.query('SELECT 1');
    return { connected: true };
  } catch (error) {
    return {
      connected: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
};

export const closeDatabase = async () => {
  await pool.end();
};
