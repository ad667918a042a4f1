/**
 * Batch write coordinator: add/update/delete batches keyed by entity type
 */

import { randomBytes } from 'crypto';
import { z } from 'zod';
import { CONSTANTS, ENTITY_TYPES } from './constants';
import { ApiError, ProtocolError, WriteRejected } from './errors';
import type { ApiClient, ApiResponse } from './http';
import type { ReconciliationEngine } from './reconciliation';
import type {
  AuthMode,
  BatchWriteRequest,
  BatchWriteResult,
  DeleteKey,
  EntityType,
  WireRecord,
  WriteState,
} from './types';

/**
 * How the write endpoint answers a successful call.
 * - entity: the body carries the written records; an empty body means "read it back"
 * - ack: the body is an `{ id2etag, id2error }` acknowledgement; always read back
 */
export type ResponseShape = 'entity' | 'ack';

/**
 * Where to read written records back from. Path templates take `{field}`
 * placeholders filled from the written record.
 */
export type RefetchPlan =
  | { via: 'snapshot'; collection: 'tags' | 'filters' | 'projectProfiles' | 'projectGroups' }
  | { via: 'entity'; path: string; query?: Record<string, string> }
  | { via: 'list'; path: string; listKey?: string }
  | { via: 'query'; path: string; bodyKey: string; field: string; listKey?: string };

export interface WritePolicy {
  endpoint: string;
  response: ResponseShape;
  refetch: RefetchPlan;
  /** Key that identifies a written record in the read-back data. */
  matchBy: 'id' | 'name';
  /** Generate a 24-hex id for added records that arrive without one. */
  clientIds: boolean;
  /** Fields lowercased before submission (strings or string arrays). */
  caseFold: readonly string[];
  /** Lowercase bare-string delete keys too. */
  foldDeleteKeys: boolean;
  /** Auth modes under which the server refuses these writes. */
  restrictedUnder: readonly AuthMode[];
}

export const WRITE_POLICIES: Record<EntityType, WritePolicy> = {
  task: {
    endpoint: '/api/v2/batch/task',
    response: 'ack',
    refetch: { via: 'entity', path: '/api/v2/task/{id}', query: { projectId: 'projectId' } },
    matchBy: 'id',
    clientIds: true,
    caseFold: ['tags'],
    foldDeleteKeys: false,
    restrictedUnder: [],
  },
  tag: {
    endpoint: '/api/v2/batch/tag',
    response: 'ack',
    refetch: { via: 'snapshot', collection: 'tags' },
    matchBy: 'name',
    clientIds: false,
    caseFold: ['name', 'newName', 'parent'],
    foldDeleteKeys: true,
    restrictedUnder: [],
  },
  filter: {
    endpoint: '/api/v2/batch/filter',
    response: 'ack',
    refetch: { via: 'snapshot', collection: 'filters' },
    matchBy: 'id',
    clientIds: true,
    caseFold: [],
    foldDeleteKeys: false,
    restrictedUnder: [],
  },
  project: {
    endpoint: '/api/v2/batch/project',
    response: 'ack',
    refetch: { via: 'snapshot', collection: 'projectProfiles' },
    matchBy: 'id',
    clientIds: true,
    caseFold: [],
    foldDeleteKeys: false,
    restrictedUnder: [],
  },
  projectGroup: {
    endpoint: '/api/v2/batch/projectGroup',
    response: 'ack',
    refetch: { via: 'snapshot', collection: 'projectGroups' },
    matchBy: 'id',
    clientIds: true,
    caseFold: [],
    foldDeleteKeys: false,
    restrictedUnder: [],
  },
  column: {
    endpoint: '/api/v2/column',
    response: 'ack',
    refetch: { via: 'list', path: '/api/v2/column/project/{projectId}', listKey: 'columns' },
    matchBy: 'id',
    clientIds: true,
    caseFold: [],
    foldDeleteKeys: false,
    restrictedUnder: [],
  },
  habit: {
    endpoint: '/api/v2/habits/batch',
    response: 'entity',
    refetch: { via: 'list', path: '/api/v2/habits' },
    matchBy: 'id',
    clientIds: true,
    caseFold: [],
    foldDeleteKeys: false,
    restrictedUnder: ['apiToken'],
  },
  habitCheckin: {
    endpoint: '/api/v2/habitCheckins/batch',
    response: 'entity',
    refetch: { via: 'query', path: '/api/v2/habitCheckins/query', bodyKey: 'habitIds', field: 'habitId', listKey: 'checkins' },
    matchBy: 'id',
    clientIds: true,
    caseFold: [],
    foldDeleteKeys: false,
    restrictedUnder: [],
  },
};

const ackSchema = z.object({
  id2etag: z.record(z.string()).optional(),
  id2error: z.record(z.unknown()).optional(),
});

const recordSchema = z.record(z.unknown());

export function generateObjectId(): string {
  return randomBytes(12).toString('hex');
}

/**
 * Tag names are case-insensitive on the server; compare and send them lowercased
 */
export function foldTagName(name: string): string {
  return name.toLowerCase();
}

function foldValue(value: unknown): unknown {
  if (typeof value === 'string') return foldTagName(value);
  if (Array.isArray(value)) return value.map(item => (typeof item === 'string' ? foldTagName(item) : item));
  return value;
}

function foldRecord(record: WireRecord, fields: readonly string[]): WireRecord {
  if (fields.length === 0) return record;
  const folded: WireRecord = { ...record };
  for (const field of fields) {
    if (field in folded) {
      folded[field] = foldValue(folded[field]);
    }
  }
  return folded;
}

function fillTemplate(template: string, record: WireRecord): string {
  return template.replace(/\{(\w+)\}/g, (_match, field: string) => {
    const value = record[field];
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new ProtocolError(`Cannot read back written record: field "${field}" is missing`, field);
    }
    return encodeURIComponent(String(value));
  });
}

/**
 * Pull records out of a read or write response: a bare list, a list under
 * `listKey`, a map of lists under `listKey`, or a single record.
 */
export function extractRecords(data: unknown, listKey?: string): WireRecord[] {
  const list = z.array(recordSchema).safeParse(data);
  if (list.success) return list.data;

  const record = recordSchema.safeParse(data);
  if (!record.success) {
    throw new ProtocolError('Response is neither a record nor a list of records');
  }
  if (listKey && listKey in record.data) {
    const nested = record.data[listKey];
    const nestedList = z.array(recordSchema).safeParse(nested);
    if (nestedList.success) return nestedList.data;
    const grouped = z.record(z.array(recordSchema)).safeParse(nested);
    if (grouped.success) return Object.values(grouped.data).flat();
    throw new ProtocolError(`Response field "${listKey}" does not hold records`, listKey);
  }
  return [record.data];
}

/**
 * Key of a record under the policy's `matchBy`, folded for name-keyed types
 */
function matchKey(policy: WritePolicy, record: WireRecord): string | undefined {
  const value = record[policy.matchBy];
  if (typeof value !== 'string') return undefined;
  return policy.matchBy === 'name' ? foldTagName(value) : value;
}

function isAck(data: unknown): boolean {
  return typeof data === 'object' && data !== null && ('id2etag' in data || 'id2error' in data);
}

export interface BatchWriteCoordinatorOptions {
  authMode?: AuthMode;
  /** Replace or add entries of the policy table. */
  policies?: Partial<Record<EntityType, WritePolicy>>;
  /** Observe each step of the write state machine. */
  onTransition?: (entityType: EntityType, state: WriteState) => void;
}

export class BatchWriteCoordinator {
  private policies: Record<EntityType, WritePolicy>;
  private readOnly = new Set<EntityType>();
  private authMode: AuthMode;
  private onTransition?: (entityType: EntityType, state: WriteState) => void;

  constructor(
    private http: ApiClient,
    private engine: ReconciliationEngine,
    options: BatchWriteCoordinatorOptions = {}
  ) {
    this.authMode = options.authMode ?? http.authMode;
    this.policies = { ...WRITE_POLICIES, ...options.policies };
    this.onTransition = options.onTransition;

    for (const entityType of ENTITY_TYPES) {
      if (this.policies[entityType].restrictedUnder.includes(this.authMode)) {
        this.readOnly.add(entityType);
      }
    }
  }

  policyFor(entityType: EntityType): WritePolicy {
    return this.policies[entityType];
  }

  isWritable(entityType: EntityType): boolean {
    return !this.readOnly.has(entityType);
  }

  /**
   * Submit one batch. Never split into several calls; an all-empty batch is a no-op.
   */
  async submit(
    entityType: EntityType,
    add: WireRecord[] = [],
    update: WireRecord[] = [],
    remove: DeleteKey[] = []
  ): Promise<BatchWriteResult> {
    const policy = this.policies[entityType];
    const request = this.build(policy, add, update, remove);
    this.transition(entityType, 'built');

    if (this.readOnly.has(entityType)) {
      this.transition(entityType, 'rejected');
      throw new WriteRejected(entityType, this.authMode);
    }

    if (request.add.length === 0 && request.update.length === 0 && request.delete.length === 0) {
      this.transition(entityType, 'materialized');
      return { entityType, outcome: 'materialized', records: [], refetched: false, etags: {}, errors: {} };
    }

    const body: Partial<BatchWriteRequest> = {};
    if (request.add.length > 0) body.add = request.add;
    if (request.update.length > 0) body.update = request.update;
    if (request.delete.length > 0) body.delete = request.delete;

    console.log(
      `Submitting ${entityType} batch (add: ${request.add.length}, update: ${request.update.length}, delete: ${request.delete.length})`
    );

    this.transition(entityType, 'submitted');
    let response: ApiResponse;
    try {
      response = await this.http.post(policy.endpoint, { data: body });
    } catch (error) {
      if (error instanceof ApiError && error.status === CONSTANTS.WRITE_REJECTED_STATUS) {
        this.readOnly.add(entityType);
        this.transition(entityType, 'rejected');
        throw new WriteRejected(entityType, this.authMode, error);
      }
      this.transition(entityType, 'failed');
      throw error;
    }

    const written = [...request.add, ...request.update];
    let etags: Record<string, string> = {};
    let errors: Record<string, unknown> = {};

    if (!response.empty && isAck(response.data)) {
      const ack = ackSchema.safeParse(response.data);
      if (!ack.success) {
        this.transition(entityType, 'failed');
        throw new ProtocolError(`Malformed ${entityType} write acknowledgement`, undefined, ack.error);
      }
      etags = ack.data.id2etag ?? {};
      errors = ack.data.id2error ?? {};
    } else if (!response.empty && policy.response === 'entity') {
      let records: WireRecord[];
      try {
        records = extractRecords(response.data);
      } catch (error) {
        this.transition(entityType, 'failed');
        throw error;
      }
      this.transition(entityType, 'materialized');
      return { entityType, outcome: 'materialized', records, refetched: false, etags, errors };
    }

    // Records refused in id2error were never stored; only the rest are read back.
    const stored = written.filter(record => {
      const key = matchKey(policy, record);
      return key === undefined || !(key in errors);
    });
    if (stored.length === 0) {
      this.transition(entityType, 'materialized');
      return { entityType, outcome: 'materialized', records: [], refetched: false, etags, errors };
    }

    this.transition(entityType, 'requires_refetch');
    try {
      const records = await this.refetch(entityType, policy, stored);
      this.transition(entityType, 'materialized');
      console.log(`  ✓ Read back ${records.length} ${entityType} record(s)`);
      return { entityType, outcome: 'materialized', records, refetched: true, etags, errors };
    } catch (error) {
      this.transition(entityType, 'failed');
      throw error;
    }
  }

  private build(policy: WritePolicy, add: WireRecord[], update: WireRecord[], remove: DeleteKey[]): BatchWriteRequest {
    const withIds = policy.clientIds
      ? add.map(record => (typeof record.id === 'string' && record.id ? record : { ...record, id: generateObjectId() }))
      : add;
    return {
      add: withIds.map(record => foldRecord(record, policy.caseFold)),
      update: update.map(record => foldRecord(record, policy.caseFold)),
      delete: remove.map(key => {
        if (typeof key === 'string') return policy.foldDeleteKeys ? foldTagName(key) : key;
        return foldRecord(key, policy.caseFold);
      }),
    };
  }

  private async refetch(
    entityType: EntityType,
    policy: WritePolicy,
    written: WireRecord[]
  ): Promise<WireRecord[]> {
    const plan = policy.refetch;
    let fetched: WireRecord[] = [];

    switch (plan.via) {
      case 'snapshot': {
        const snapshot = await this.engine.fullSync();
        const state = snapshot.collections[plan.collection];
        fetched = state.kind === 'absent' ? [] : state.payload;
        break;
      }
      case 'entity': {
        for (const record of written) {
          const params: Record<string, string> = {};
          for (const [param, field] of Object.entries(plan.query ?? {})) {
            const value = record[field];
            if (typeof value === 'string') params[param] = value;
          }
          const response = await this.http.get(fillTemplate(plan.path, record), { params });
          if (response.empty) {
            throw new ProtocolError(`Follow-up read for ${entityType} returned an empty body`);
          }
          fetched.push(...extractRecords(response.data));
        }
        break;
      }
      case 'list': {
        const paths = [...new Set(written.map(record => fillTemplate(plan.path, record)))];
        for (const path of paths) {
          const response = await this.http.get(path);
          if (!response.empty) fetched.push(...extractRecords(response.data, plan.listKey));
        }
        break;
      }
      case 'query': {
        const keys = [...new Set(written.map(record => record[plan.field]).filter(value => typeof value === 'string'))];
        const response = await this.http.post(plan.path, { data: { [plan.bodyKey]: keys } });
        if (!response.empty) fetched = extractRecords(response.data, plan.listKey);
        break;
      }
    }

    return this.match(entityType, policy, written, fetched);
  }

  /**
   * Pick the read-back record for every written one, in request order
   */
  private match(
    entityType: EntityType,
    policy: WritePolicy,
    written: WireRecord[],
    fetched: WireRecord[]
  ): WireRecord[] {
    const keyOf = (record: WireRecord): string | undefined => matchKey(policy, record);

    const byKey = new Map<string, WireRecord>();
    for (const record of fetched) {
      const key = keyOf(record);
      if (key !== undefined) byKey.set(key, record);
    }

    const records: WireRecord[] = [];
    const missing: string[] = [];
    for (const record of written) {
      const key = keyOf(record);
      if (key === undefined) {
        throw new ProtocolError(`Written ${entityType} record has no "${policy.matchBy}"`, policy.matchBy);
      }
      const found = byKey.get(key);
      if (found) {
        records.push(found);
      } else {
        missing.push(key);
      }
    }

    if (missing.length > 0) {
      throw new ProtocolError(`Follow-up read did not return ${entityType} record(s): ${missing.join(', ')}`);
    }
    return records;
  }

  private transition(entityType: EntityType, state: WriteState): void {
    this.onTransition?.(entityType, state);
  }
}
