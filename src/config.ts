/**
 * Configuration management
 */

import * as dotenv from 'dotenv';
import { CONSTANTS } from './constants';
import type { AuthMode, Config } from './types';

dotenv.config();

const AUTH_MODES: readonly AuthMode[] = ['session', 'apiToken'];

function isAuthMode(value: string): value is AuthMode {
  return AUTH_MODES.some(mode => mode === value);
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const authMode = env.TICKTICK_AUTH_MODE || 'session';

  const problems: string[] = [];
  if (!env.TICKTICK_TOKEN) problems.push('TICKTICK_TOKEN is required');
  if (!isAuthMode(authMode)) {
    problems.push(`TICKTICK_AUTH_MODE must be one of ${AUTH_MODES.join(', ')} (got "${authMode}")`);
  }

  const syncInterval = parseInt(env.SYNC_INTERVAL || '300', 10);
  const requestTimeoutMs = parseInt(env.REQUEST_TIMEOUT_MS || String(CONSTANTS.REQUEST_TIMEOUT_MS), 10);
  if (Number.isNaN(syncInterval) || syncInterval < 60) {
    problems.push('SYNC_INTERVAL must be a number of seconds, at least 60');
  }
  if (Number.isNaN(requestTimeoutMs) || requestTimeoutMs <= 0) {
    problems.push('REQUEST_TIMEOUT_MS must be a positive number');
  }

  if (problems.length > 0 || !isAuthMode(authMode)) {
    throw new Error(
      `Invalid configuration:\n  ${problems.join('\n  ')}\n` +
      'Please check your .env file.'
    );
  }

  return {
    token: env.TICKTICK_TOKEN || '',
    baseUrl: (env.TICKTICK_BASE_URL || CONSTANTS.BASE_URL).replace(/\/$/, ''),
    authMode,
    databasePath: env.DATABASE_PATH || './ticktick_mirror.db',
    syncInterval,
    requestTimeoutMs,
  };
}

export function displayConfig(config: Config): void {
  console.log('\nConfiguration:');
  console.log(`  API: ${config.baseUrl}`);
  console.log(`  Auth mode: ${config.authMode}`);
  console.log(`  Database: ${config.databasePath}`);
  console.log(`  Sync interval: ${config.syncInterval} seconds`);
  console.log(`  Request timeout: ${config.requestTimeoutMs} ms`);
  console.log(`  Token configured: ${!!config.token}`);
  console.log('');
}
