/**
 * Sync protocol client: one batch/check round trip per call
 */

import { z } from 'zod';
import { COLLECTION_NAMES, ENDPOINTS } from './constants';
import { ProtocolError } from './errors';
import type { ApiClient } from './http';
import type {
  CollectionState,
  Snapshot,
  SnapshotCollections,
  SyncMode,
  TaskSetPayload,
  WireRecord,
} from './types';

const recordSchema = z.record(z.unknown());
const recordListSchema = z.array(recordSchema);

const taskSetSchema = z.object({
  update: recordListSchema.nullish(),
  add: recordListSchema.nullish(),
  delete: recordListSchema.nullish(),
  tagUpdate: recordListSchema.nullish(),
  empty: z.boolean().nullish(),
}).passthrough();

/**
 * Top-level shape of a batch/check response. A collection key that is missing
 * or null is "absent"; anything else must have its container shape.
 */
export const syncResponseSchema = z.object({
  checkPoint: z.number().int().nonnegative(),
  syncTaskBean: taskSetSchema.nullish(),
  projectProfiles: recordListSchema.nullish(),
  projectGroups: recordListSchema.nullish(),
  tags: recordListSchema.nullish(),
  filters: recordListSchema.nullish(),
  syncTaskOrderBean: recordSchema.nullish(),
  remindChanges: recordListSchema.nullish(),
  inboxId: z.string().nullish(),
}).passthrough();

type SyncResponse = z.infer<typeof syncResponseSchema>;

function toState<T>(value: T | null | undefined, isEmpty: (payload: T) => boolean): CollectionState<T> {
  if (value === undefined || value === null) {
    return { kind: 'absent' };
  }
  return isEmpty(value) ? { kind: 'empty', payload: value } : { kind: 'present', payload: value };
}

const listIsEmpty = (list: WireRecord[]): boolean => list.length === 0;

function toTaskSet(raw: NonNullable<SyncResponse['syncTaskBean']>): TaskSetPayload {
  return {
    update: raw.update ?? [],
    add: raw.add ?? [],
    delete: raw.delete ?? [],
    tagUpdate: raw.tagUpdate ?? [],
    empty: raw.empty ?? false,
  };
}

function taskSetIsEmpty(taskSet: TaskSetPayload): boolean {
  return (
    taskSet.update.length === 0 &&
    taskSet.add.length === 0 &&
    taskSet.delete.length === 0 &&
    taskSet.tagUpdate.length === 0
  );
}

/**
 * Build the tri-state collection map. Nothing here turns an absent key into
 * an empty container; that decision belongs to the reconciliation engine.
 */
export function parseSnapshot(body: unknown, requestedFrom: number): Snapshot {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ProtocolError('Sync response is not a JSON object');
  }

  const parsed = syncResponseSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.map(String).join('.') : undefined;
    throw new ProtocolError(
      `Malformed sync response${field ? ` at "${field}"` : ''}: ${issue ? issue.message : 'unknown problem'}`,
      field,
      parsed.error
    );
  }

  const data = parsed.data;
  const collections: SnapshotCollections = {
    taskSet: toState(data.syncTaskBean ? toTaskSet(data.syncTaskBean) : data.syncTaskBean, taskSetIsEmpty),
    projectProfiles: toState(data.projectProfiles, listIsEmpty),
    projectGroups: toState(data.projectGroups, listIsEmpty),
    tags: toState(data.tags, listIsEmpty),
    filters: toState(data.filters, listIsEmpty),
    orderMetadata: toState(data.syncTaskOrderBean, meta => Object.keys(meta).length === 0),
    remindChanges: toState(data.remindChanges, listIsEmpty),
    inboxId: toState(data.inboxId, id => id === ''),
  };

  const mode: SyncMode = requestedFrom === 0 ? 'full' : 'delta';
  return {
    checkpoint: data.checkPoint,
    requestedFrom,
    mode,
    collections,
  };
}

export class SyncProtocolClient {
  constructor(private http: ApiClient) {}

  /**
   * Fetch everything that changed since the checkpoint (0 = everything)
   */
  async sync(checkpoint: number): Promise<Snapshot> {
    const response = await this.http.get(`${ENDPOINTS.BATCH_CHECK}/${checkpoint}`);
    const snapshot = parseSnapshot(response.data, checkpoint);

    console.log(
      `  Sync from checkpoint ${checkpoint} -> ${snapshot.checkpoint} ` +
      `(${snapshot.mode}, ${countSent(snapshot)} of ${COLLECTION_NAMES.length} collections sent)`
    );
    return snapshot;
  }
}

function countSent(snapshot: Snapshot): number {
  let count = 0;
  for (const state of Object.values(snapshot.collections)) {
    if (state.kind !== 'absent') count++;
  }
  return count;
}
