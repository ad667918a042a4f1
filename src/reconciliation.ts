/**
 * Reconciliation engine: full vs delta sync, checkpoint ownership and the
 * completeness policy for collection reads
 */

import type { CheckpointStore } from './checkpointStore';
import { CONSTANTS } from './constants';
import { IncompleteDataError } from './errors';
import type { SyncProtocolClient } from './syncProtocol';
import type {
  CollectionName,
  CollectionPayloads,
  CollectionState,
  ResolvedCollection,
  Snapshot,
  TaskSetPayload,
} from './types';

function emptyTaskSet(): TaskSetPayload {
  return { update: [], add: [], delete: [], tagUpdate: [], empty: true };
}

function orEmpty<T>(state: CollectionState<T>, empty: T): CollectionState<T> {
  return state.kind === 'absent' ? { kind: 'empty', payload: empty } : state;
}

/**
 * Turn every absent collection of a full snapshot into an empty one.
 * A full response is the complete state, so an omitted key there really is empty.
 * Never call this on a delta snapshot.
 */
export function completeSnapshot(snapshot: Snapshot): Snapshot {
  const c = snapshot.collections;
  return {
    ...snapshot,
    collections: {
      taskSet: orEmpty(c.taskSet, emptyTaskSet()),
      projectProfiles: orEmpty(c.projectProfiles, []),
      projectGroups: orEmpty(c.projectGroups, []),
      tags: orEmpty(c.tags, []),
      filters: orEmpty(c.filters, []),
      orderMetadata: orEmpty(c.orderMetadata, {}),
      remindChanges: orEmpty(c.remindChanges, []),
      inboxId: orEmpty(c.inboxId, ''),
    },
  };
}

/**
 * The complete contents of a collection. Only authoritative (full sync)
 * results qualify; delta data throws instead of guessing.
 */
export function collectionItems<K extends CollectionName>(resolved: ResolvedCollection<K>): CollectionPayloads[K] {
  if (!resolved.authoritative || resolved.state.kind === 'absent') {
    throw new IncompleteDataError(resolved.collection);
  }
  return resolved.state.payload;
}

/**
 * What a delta sync reported for a collection, or null when it was unchanged.
 */
export function changedItems<K extends CollectionName>(resolved: ResolvedCollection<K>): CollectionPayloads[K] | null {
  return resolved.state.kind === 'absent' ? null : resolved.state.payload;
}

export class ReconciliationEngine {
  private queue: Promise<void> = Promise.resolve();
  private inboxId = '';

  constructor(
    private protocol: SyncProtocolClient,
    private store: CheckpointStore
  ) {}

  currentCheckpoint(): number {
    return this.store.get();
  }

  /**
   * Inbox project id from the most recent snapshot that carried one
   */
  getInboxId(): string {
    return this.inboxId;
  }

  /**
   * Forget the checkpoint; the next delta sync becomes a full one.
   * Queued behind any sync already in flight.
   */
  reset(): Promise<void> {
    return this.exclusive(async () => {
      this.store.reset();
    });
  }

  /**
   * Sync from checkpoint 0. The only call whose result can answer
   * "what is the complete current list".
   */
  fullSync(): Promise<Snapshot> {
    return this.exclusive(() => this.runSync(CONSTANTS.FULL_SYNC_CHECKPOINT));
  }

  /**
   * Sync from the stored checkpoint. Collections may come back absent.
   */
  deltaSync(): Promise<Snapshot> {
    return this.exclusive(() => this.runSync(this.store.get()));
  }

  /**
   * Read one collection under the completeness policy: callers that need the
   * full list get a full sync, everyone else gets the delta as-is.
   */
  async resolve<K extends CollectionName>(
    collection: K,
    requiresCompleteness: boolean
  ): Promise<ResolvedCollection<K>> {
    const snapshot = requiresCompleteness ? await this.fullSync() : await this.deltaSync();
    return {
      collection,
      authoritative: snapshot.mode === 'full',
      checkpoint: snapshot.checkpoint,
      state: snapshot.collections[collection],
    };
  }

  private async runSync(from: number): Promise<Snapshot> {
    const raw = await this.protocol.sync(from);
    const snapshot = raw.mode === 'full' ? completeSnapshot(raw) : raw;

    // Only reached with a structurally valid snapshot; errors above leave the store alone.
    if (snapshot.checkpoint < from) {
      console.log(`  ⚠ Server checkpoint went backwards (${from} -> ${snapshot.checkpoint})`);
    }
    this.store.set(snapshot.checkpoint);

    const inbox = snapshot.collections.inboxId;
    if (inbox.kind === 'present') {
      this.inboxId = inbox.payload;
    }
    return snapshot;
  }

  /**
   * Run read-checkpoint / sync / write-checkpoint sequences one at a time
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
