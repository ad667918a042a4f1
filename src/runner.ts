/**
 * Sync runner: keeps the local mirror up to date, once or on a schedule
 */

import * as fs from 'fs';
import * as path from 'path';
import * as schedule from 'node-schedule';
import { MemoryCheckpointStore } from './checkpointStore';
import { TickTickClient } from './client';
import { displayConfig } from './config';
import { CONSTANTS } from './constants';
import { DatabaseManager } from './database';
import type { ApplyResult } from './database';
import type { ApiClientOptions } from './http';
import type { Config } from './types';

export interface SyncRunnerOptions {
  /** Defaults to `.sync.lock` next to the database */
  lockFilePath?: string;
  adapter?: ApiClientOptions['adapter'];
}

interface LockData {
  pid: number;
  timestamp: number;
  startedAt: string;
}

function readLock(content: string): LockData | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    console.log(`Unreadable lock file (${error instanceof Error ? error.message : String(error)})`);
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;
  const pid: unknown = Reflect.get(parsed, 'pid');
  const timestamp: unknown = Reflect.get(parsed, 'timestamp');
  const startedAt: unknown = Reflect.get(parsed, 'startedAt');
  if (typeof pid !== 'number' || typeof timestamp !== 'number') return null;
  return { pid, timestamp, startedAt: typeof startedAt === 'string' ? startedAt : '' };
}

export class SyncRunner {
  readonly db: DatabaseManager;
  readonly client: TickTickClient;
  /** Seeded from the mirror; the mirror's copy only moves when a snapshot is applied */
  private checkpoints: MemoryCheckpointStore;
  private running: boolean = false;
  private scheduleJob?: schedule.Job;
  private lockFilePath: string;
  private hasLock: boolean = false;
  private isCleanedUp: boolean = false;

  constructor(private config: Config, options: SyncRunnerOptions = {}) {
    this.lockFilePath = options.lockFilePath ?? path.join(path.dirname(config.databasePath), '.sync.lock');

    console.log('Initializing sync components...');
    this.db = new DatabaseManager(config.databasePath);
    this.checkpoints = new MemoryCheckpointStore(this.db.getCheckpoint());
    this.client = new TickTickClient({
      baseUrl: config.baseUrl,
      token: config.token,
      authMode: config.authMode,
      timeoutMs: config.requestTimeoutMs,
      adapter: options.adapter,
      checkpointStore: this.checkpoints,
    });

    console.log('Sync runner initialized successfully');
    displayConfig(config);
  }

  /**
   * Take the lock file. False when another live process holds it.
   */
  private acquireLock(): boolean {
    if (fs.existsSync(this.lockFilePath)) {
      const lock = readLock(fs.readFileSync(this.lockFilePath, 'utf8'));
      const lockAge = lock ? Date.now() - lock.timestamp : Infinity;

      if (lockAge > CONSTANTS.LOCK_STALE_MS) {
        console.log('Removing stale lock file...');
        fs.unlinkSync(this.lockFilePath);
      } else if (lock) {
        console.log('Another sync instance is already running.');
        console.log(`Lock acquired at: ${new Date(lock.timestamp).toISOString()}`);
        console.log(`PID: ${lock.pid}`);
        return false;
      }
    }

    const lockData: LockData = {
      pid: process.pid,
      timestamp: Date.now(),
      startedAt: new Date().toISOString(),
    };
    fs.writeFileSync(this.lockFilePath, JSON.stringify(lockData, null, 2));
    this.hasLock = true;
    console.log(`Lock acquired (PID: ${process.pid})`);
    return true;
  }

  private releaseLock(): void {
    if (this.hasLock && fs.existsSync(this.lockFilePath)) {
      fs.unlinkSync(this.lockFilePath);
      this.hasLock = false;
      console.log('Lock released');
    }
  }

  /**
   * One sync cycle: full when the stored checkpoint is 0, delta otherwise.
   * Returns null when another process holds the lock.
   */
  async runOnce(): Promise<ApplyResult | null> {
    if (!this.acquireLock()) {
      console.log('This sync will be skipped and retried in the next cycle.');
      return null;
    }

    const from = this.client.currentCheckpoint();
    try {
      console.log(`\n${'='.repeat(80)}`);
      console.log(`Starting sync at ${new Date().toISOString()}`);
      console.log('='.repeat(80) + '\n');

      const snapshot =
        from === CONSTANTS.FULL_SYNC_CHECKPOINT ? await this.client.fullSync() : await this.client.deltaSync();
      const result = this.db.applySnapshot(snapshot);

      this.db.logSyncOperation({
        operation: 'sync',
        mode: snapshot.mode,
        checkpoint: snapshot.checkpoint,
        details: JSON.stringify({
          from,
          replaced: result.replaced,
          tasksUpserted: result.tasksUpserted,
          tasksDeleted: result.tasksDeleted,
        }),
        status: 'success',
      });

      console.log(`  ✓ Replaced: ${result.replaced.join(', ') || 'nothing'}`);
      console.log(`  ✓ Unchanged: ${result.unchanged.join(', ') || 'nothing'}`);
      console.log(`  ✓ Tasks upserted: ${result.tasksUpserted}, deleted: ${result.tasksDeleted}`);
      console.log(`\n${'='.repeat(80)}`);
      console.log(`Sync completed at ${new Date().toISOString()} (checkpoint ${snapshot.checkpoint})`);
      console.log('='.repeat(80) + '\n');
      return result;
    } catch (error) {
      console.error('Sync failed:', error);
      // The engine may have moved past a snapshot the mirror never took
      this.checkpoints.set(this.db.getCheckpoint());
      this.db.logSyncOperation({
        operation: 'sync',
        checkpoint: from,
        status: 'error',
        errorMessage: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      this.releaseLock();
    }
  }

  async runContinuous(): Promise<void> {
    console.log(`\nStarting continuous sync (interval: ${this.config.syncInterval}s)`);
    console.log('Press Ctrl+C to stop\n');

    this.running = true;
    process.on('SIGINT', () => this.handleShutdown());
    process.on('SIGTERM', () => this.handleShutdown());

    await this.runScheduled();

    const intervalMinutes = Math.max(1, Math.floor(this.config.syncInterval / 60));
    const rule = `*/${intervalMinutes} * * * *`;
    this.scheduleJob = schedule.scheduleJob(rule, () => this.runScheduled());

    await new Promise<void>(resolve => {
      const checkInterval = setInterval(() => {
        if (!this.running) {
          clearInterval(checkInterval);
          resolve();
        }
      }, 1000);
    });
  }

  /**
   * A failed scheduled cycle is logged and retried on the next tick
   */
  private async runScheduled(): Promise<void> {
    if (!this.running) return;
    try {
      await this.runOnce();
    } catch (error) {
      console.error('Scheduled sync failed, retrying next cycle:', error instanceof Error ? error.message : error);
    }
  }

  showStatus(): void {
    console.log('\n' + '='.repeat(80));
    console.log('SYNC STATUS');
    console.log('='.repeat(80));

    console.log(`\nCheckpoint: ${this.client.currentCheckpoint()}`);
    console.log(`Open tasks mirrored: ${this.db.countTasks()}`);

    console.log('\nCollections:');
    const summaries = this.db.getCollectionSummaries();
    if (summaries.length === 0) {
      console.log('  (none yet, run a sync first)');
    }
    for (const summary of summaries) {
      console.log(
        `  ${summary.name}: ${summary.itemCount} item(s), ${summary.state}, checkpoint ${summary.checkpoint}`
      );
    }

    console.log('\nRecent Sync Operations:');
    for (const log of this.db.getRecentSyncLogs(10)) {
      const statusIcon = log.status === 'success' ? '✓' : log.status === 'error' ? '✗' : '⚠';
      const detail = log.status === 'error' ? log.errorMessage : `${log.mode ?? ''} -> ${log.checkpoint ?? ''}`;
      console.log(`  ${statusIcon} ${log.timestamp} - ${log.operation} (${detail})`);
    }

    console.log('='.repeat(80) + '\n');
  }

  /**
   * Forget the checkpoint; the next cycle runs a full sync
   */
  async reset(): Promise<void> {
    await this.client.engine.reset();
    this.db.setCheckpoint(CONSTANTS.FULL_SYNC_CHECKPOINT);
    this.db.logSyncOperation({ operation: 'reset', checkpoint: 0, status: 'success' });
    console.log('Checkpoint reset; the next sync will be a full sync');
  }

  private handleShutdown(): void {
    console.log('\nReceived shutdown signal, shutting down gracefully...');
    this.running = false;
    this.scheduleJob?.cancel();
    this.cleanup();
  }

  cleanup(): void {
    if (this.isCleanedUp) {
      return;
    }
    this.isCleanedUp = true;

    console.log('Cleaning up resources...');
    try {
      this.db.close();
      console.log('Database connection closed');
    } catch (error) {
      console.error('Error closing database:', error);
    }
    this.releaseLock();
    console.log('Shutdown complete');
  }
}
