/**
 * Local mirror of the synced collections, using better-sqlite3
 */

import Database from 'better-sqlite3';
import { COLLECTION_NAMES, CONSTANTS } from './constants';
import type { CollectionName, CollectionState, Snapshot, SyncLog, SyncMode, WireRecord } from './types';

type MirroredCollection = Exclude<CollectionName, 'taskSet'>;

export interface CollectionSummary {
  name: CollectionName;
  state: 'empty' | 'present';
  itemCount: number;
  checkpoint: number;
  updatedAt: string;
}

export interface ApplyResult {
  mode: SyncMode;
  /** Collections whose stored contents changed */
  replaced: CollectionName[];
  /** Collections the delta left untouched */
  unchanged: CollectionName[];
  tasksUpserted: number;
  tasksDeleted: number;
}

interface CheckpointRow {
  checkpoint: number;
}

interface CollectionRow {
  name: string;
  state: string;
  payload: string;
  item_count: number;
  checkpoint: number;
  updated_at: string;
}

interface TaskRow {
  data: string;
}

interface CountRow {
  count: number;
}

interface SyncLogRow {
  id: number;
  timestamp: string;
  operation: string;
  mode: string | null;
  checkpoint: number | null;
  details: string | null;
  status: string;
  error_message: string | null;
}

function isRecord(value: unknown): value is WireRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCollectionName(value: string): value is CollectionName {
  return COLLECTION_NAMES.some(name => name === value);
}

function itemCount(payload: unknown): number {
  if (Array.isArray(payload)) return payload.length;
  if (isRecord(payload)) return Object.keys(payload).length;
  return payload === '' ? 0 : 1;
}

function taskKey(record: WireRecord): string | undefined {
  const id = record.taskId ?? record.id;
  return typeof id === 'string' ? id : undefined;
}

export class DatabaseManager {
  private db: Database.Database;

  constructor(dbPath: string = './ticktick_mirror.db') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.createTables();
  }

  private createTables(): void {
    // Single-row sync state holding the checkpoint
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sync_state (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        checkpoint INTEGER NOT NULL DEFAULT 0,
        last_sync_timestamp TEXT,
        updated_at TEXT DEFAULT CURRENT_TIMESTAMP
      )
    `);

    // Every collection except the task set, one JSON payload each
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS collections (
        name TEXT PRIMARY KEY,
        state TEXT NOT NULL,
        payload TEXT NOT NULL,
        item_count INTEGER NOT NULL DEFAULT 0,
        checkpoint INTEGER NOT NULL,
        updated_at TEXT DEFAULT CURRENT_TIMESTAMP
      )
    `);

    // Open tasks, merged from task set changes
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        project_id TEXT,
        title TEXT,
        status INTEGER,
        data TEXT NOT NULL,
        checkpoint INTEGER NOT NULL,
        updated_at TEXT DEFAULT CURRENT_TIMESTAMP
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sync_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT DEFAULT CURRENT_TIMESTAMP,
        operation TEXT NOT NULL,
        mode TEXT,
        checkpoint INTEGER,
        details TEXT,
        status TEXT,
        error_message TEXT
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_tasks_project ON tasks(project_id);
      CREATE INDEX IF NOT EXISTS idx_sync_log_timestamp ON sync_log(timestamp);
    `);
  }

  // Checkpoint
  getCheckpoint(): number {
    const row = this.db.prepare<[], CheckpointRow>('SELECT checkpoint FROM sync_state WHERE id = 1').get();
    return row?.checkpoint ?? CONSTANTS.FULL_SYNC_CHECKPOINT;
  }

  setCheckpoint(checkpoint: number): void {
    this.db.prepare(`
      INSERT INTO sync_state (id, checkpoint, last_sync_timestamp, updated_at)
      VALUES (1, ?, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP)
      ON CONFLICT(id) DO UPDATE SET
        checkpoint = excluded.checkpoint,
        last_sync_timestamp = excluded.last_sync_timestamp,
        updated_at = excluded.updated_at
    `).run(checkpoint);
  }

  /**
   * Merge a snapshot into the mirror. A full snapshot replaces everything;
   * a delta only touches the collections it carries.
   */
  applySnapshot(snapshot: Snapshot): ApplyResult {
    const result: ApplyResult = {
      mode: snapshot.mode,
      replaced: [],
      unchanged: [],
      tasksUpserted: 0,
      tasksDeleted: 0,
    };

    const apply = this.db.transaction(() => {
      const full = snapshot.mode === 'full';
      const taskSet = snapshot.collections.taskSet;

      if (full) {
        this.db.prepare('DELETE FROM tasks').run();
      }
      if (taskSet.kind !== 'absent') {
        for (const record of [...taskSet.payload.update, ...taskSet.payload.add]) {
          if (this.upsertTask(record, snapshot.checkpoint)) result.tasksUpserted++;
        }
        for (const key of taskSet.payload.delete) {
          if (this.deleteTask(key)) result.tasksDeleted++;
        }
        result.replaced.push('taskSet');
      } else if (full) {
        result.replaced.push('taskSet');
      } else {
        result.unchanged.push('taskSet');
      }

      for (const name of COLLECTION_NAMES) {
        if (name === 'taskSet') continue;
        const state: CollectionState<unknown> = snapshot.collections[name];
        if (state.kind === 'absent') {
          if (full) {
            this.db.prepare('DELETE FROM collections WHERE name = ?').run(name);
            result.replaced.push(name);
          } else {
            result.unchanged.push(name);
          }
          continue;
        }
        this.storeCollection(name, state.kind, state.payload, snapshot.checkpoint);
        result.replaced.push(name);
      }

      // Committed with the data, so the stored checkpoint never runs ahead of the mirror
      this.setCheckpoint(snapshot.checkpoint);
    });

    apply();
    return result;
  }

  private storeCollection(name: MirroredCollection, state: 'empty' | 'present', payload: unknown, checkpoint: number): void {
    this.db.prepare(`
      INSERT INTO collections (name, state, payload, item_count, checkpoint, updated_at)
      VALUES (?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
      ON CONFLICT(name) DO UPDATE SET
        state = excluded.state,
        payload = excluded.payload,
        item_count = excluded.item_count,
        checkpoint = excluded.checkpoint,
        updated_at = excluded.updated_at
    `).run(name, state, JSON.stringify(payload), itemCount(payload), checkpoint);
  }

  private upsertTask(record: WireRecord, checkpoint: number): boolean {
    const id = taskKey(record);
    if (!id) return false;
    this.db.prepare(`
      INSERT INTO tasks (id, project_id, title, status, data, checkpoint, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
      ON CONFLICT(id) DO UPDATE SET
        project_id = excluded.project_id,
        title = excluded.title,
        status = excluded.status,
        data = excluded.data,
        checkpoint = excluded.checkpoint,
        updated_at = excluded.updated_at
    `).run(
      id,
      typeof record.projectId === 'string' ? record.projectId : null,
      typeof record.title === 'string' ? record.title : null,
      typeof record.status === 'number' ? record.status : null,
      JSON.stringify(record),
      checkpoint
    );
    return true;
  }

  private deleteTask(key: WireRecord): boolean {
    const id = taskKey(key);
    if (!id) return false;
    return this.db.prepare('DELETE FROM tasks WHERE id = ?').run(id).changes > 0;
  }

  // Reads
  getTasks(projectId?: string): WireRecord[] {
    const rows = projectId
      ? this.db.prepare<[string], TaskRow>('SELECT data FROM tasks WHERE project_id = ? ORDER BY id').all(projectId)
      : this.db.prepare<[], TaskRow>('SELECT data FROM tasks ORDER BY id').all();
    const records: WireRecord[] = [];
    for (const row of rows) {
      const parsed: unknown = JSON.parse(row.data);
      if (isRecord(parsed)) records.push(parsed);
    }
    return records;
  }

  countTasks(): number {
    const row = this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM tasks').get();
    return row?.count ?? 0;
  }

  /**
   * Stored payload of a collection, or undefined when the mirror has never seen it
   */
  getCollectionPayload(name: MirroredCollection): unknown {
    const row = this.db
      .prepare<[string], CollectionRow>('SELECT * FROM collections WHERE name = ?')
      .get(name);
    return row ? JSON.parse(row.payload) : undefined;
  }

  getCollectionSummaries(): CollectionSummary[] {
    const rows = this.db.prepare<[], CollectionRow>('SELECT * FROM collections ORDER BY name').all();
    const summaries: CollectionSummary[] = [];
    for (const row of rows) {
      if (!isCollectionName(row.name)) continue;
      summaries.push({
        name: row.name,
        state: row.state === 'present' ? 'present' : 'empty',
        itemCount: row.item_count,
        checkpoint: row.checkpoint,
        updatedAt: row.updated_at,
      });
    }
    return summaries;
  }

  // Sync log operations
  logSyncOperation(log: Omit<SyncLog, 'id' | 'timestamp'>): void {
    this.db.prepare(`
      INSERT INTO sync_log (operation, mode, checkpoint, details, status, error_message)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      log.operation,
      log.mode ?? null,
      log.checkpoint ?? null,
      log.details ?? null,
      log.status,
      log.errorMessage ?? null
    );
  }

  getRecentSyncLogs(limit: number = 50): SyncLog[] {
    const rows = this.db.prepare<[number], SyncLogRow>(`
      SELECT * FROM sync_log
      ORDER BY id DESC
      LIMIT ?
    `).all(limit);
    return rows.map(row => this.rowToSyncLog(row));
  }

  private rowToSyncLog(row: SyncLogRow): SyncLog {
    return {
      id: row.id,
      timestamp: row.timestamp,
      operation: row.operation,
      mode: row.mode === 'full' || row.mode === 'delta' ? row.mode : undefined,
      checkpoint: row.checkpoint ?? undefined,
      details: row.details ?? undefined,
      status: row.status === 'success' || row.status === 'error' ? row.status : 'warning',
      errorMessage: row.error_message ?? undefined,
    };
  }

  close(): void {
    this.db.close();
  }
}
