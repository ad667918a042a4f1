/**
 * Client wiring: one HTTP client, one engine, one checkpoint store per instance
 */

import { BatchWriteCoordinator } from './batchWriter';
import type { BatchWriteCoordinatorOptions } from './batchWriter';
import { MemoryCheckpointStore } from './checkpointStore';
import type { CheckpointStore } from './checkpointStore';
import { ApiClient } from './http';
import type { ApiClientOptions } from './http';
import { ColumnManager } from './managers/column';
import type { SyncContext } from './managers/context';
import { FilterManager } from './managers/filter';
import { HabitManager } from './managers/habit';
import { ProjectManager } from './managers/project';
import { SearchManager } from './managers/search';
import { TagManager } from './managers/tag';
import { TaskManager } from './managers/task';
import { UserManager } from './managers/user';
import { ReconciliationEngine } from './reconciliation';
import { SyncProtocolClient } from './syncProtocol';
import type { Snapshot } from './types';

export interface TickTickClientOptions extends ApiClientOptions {
  /** Where the checkpoint lives; in memory (starting at 0) when omitted. */
  checkpointStore?: CheckpointStore;
  onTransition?: BatchWriteCoordinatorOptions['onTransition'];
}

export class TickTickClient {
  readonly http: ApiClient;
  readonly engine: ReconciliationEngine;
  readonly writer: BatchWriteCoordinator;

  readonly task: TaskManager;
  readonly project: ProjectManager;
  readonly tag: TagManager;
  readonly filter: FilterManager;
  readonly habit: HabitManager;
  readonly column: ColumnManager;
  readonly search: SearchManager;
  readonly user: UserManager;

  constructor(options: TickTickClientOptions = {}) {
    this.http = new ApiClient(options);
    this.engine = new ReconciliationEngine(
      new SyncProtocolClient(this.http),
      options.checkpointStore ?? new MemoryCheckpointStore()
    );
    this.writer = new BatchWriteCoordinator(this.http, this.engine, {
      authMode: this.http.authMode,
      onTransition: options.onTransition,
    });

    const ctx: SyncContext = { http: this.http, engine: this.engine, writer: this.writer };
    this.task = new TaskManager(ctx);
    this.project = new ProjectManager(ctx);
    this.tag = new TagManager(ctx);
    this.filter = new FilterManager(ctx);
    this.habit = new HabitManager(ctx);
    this.column = new ColumnManager(ctx);
    this.search = new SearchManager(ctx, this.task);
    this.user = new UserManager(ctx);
  }

  get inboxId(): string {
    return this.engine.getInboxId();
  }

  fullSync(): Promise<Snapshot> {
    return this.engine.fullSync();
  }

  deltaSync(): Promise<Snapshot> {
    return this.engine.deltaSync();
  }

  currentCheckpoint(): number {
    return this.engine.currentCheckpoint();
  }
}
