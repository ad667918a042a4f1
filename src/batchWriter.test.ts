import { beforeEach, describe, expect, it, vi } from 'vitest';
import { BatchWriteCoordinator, extractRecords, foldTagName } from './batchWriter';
import type { BatchWriteCoordinatorOptions } from './batchWriter';
import { MemoryCheckpointStore } from './checkpointStore';
import { ProtocolError, WriteRejected } from './errors';
import { ApiClient } from './http';
import type { ApiClientOptions } from './http';
import { ReconciliationEngine } from './reconciliation';
import { SyncProtocolClient } from './syncProtocol';
import { FakeServer } from './testing/fakeServer';
import type { EntityType, WriteState } from './types';

function createWriter(
  http: Omit<ApiClientOptions, 'adapter'> = {},
  options: BatchWriteCoordinatorOptions = {}
) {
  const server = new FakeServer();
  const client = new ApiClient({ token: 'test-secret', ...http, adapter: server.adapter });
  const engine = new ReconciliationEngine(new SyncProtocolClient(client), new MemoryCheckpointStore());
  const writer = new BatchWriteCoordinator(client, engine, options);
  return { server, engine, writer };
}

describe('BatchWriteCoordinator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  describe('tag writes', () => {
    it('should lowercase the name, then read the tag back with one full sync', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/batch/tag', { body: { id2etag: { work: 'etag1' }, id2error: {} } });
      server.on('GET', '/api/v3/batch/check/0', {
        body: { checkPoint: 7, tags: [{ name: 'work', label: 'Work', etag: 'etag1' }] },
      });

      const result = await writer.submit('tag', [{ name: 'Work', label: 'Work' }]);

      expect(server.requests[0].body).toEqual({ add: [{ name: 'work', label: 'Work' }] });
      expect(server.requests).toHaveLength(2);
      expect(result).toEqual({
        entityType: 'tag',
        outcome: 'materialized',
        records: [{ name: 'work', label: 'Work', etag: 'etag1' }],
        refetched: true,
        etags: { work: 'etag1' },
        errors: {},
      });
    });

    it('should lowercase delete keys, including sub-tag names', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/batch/tag', { body: { id2etag: {}, id2error: {} } });

      await writer.submit('tag', [], [], ['Work/Deep']);

      expect(server.requests[0].body).toEqual({ delete: ['work/deep'] });
    });

    it('should lowercase the parent of a renamed sub-tag', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/batch/tag', { body: { id2etag: {}, id2error: {} } });
      server.on('GET', '/api/v3/batch/check/0', { body: { checkPoint: 2, tags: [{ name: 'home/garden' }] } });

      await writer.submit('tag', [], [{ name: 'Home/Garden', parent: 'Home', label: 'Garden' }]);

      expect(server.requests[0].body).toEqual({
        update: [{ name: 'home/garden', parent: 'home', label: 'Garden' }],
      });
    });
  });

  describe('task writes', () => {
    it('should issue exactly one read for an empty write response', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/batch/task', { body: '' });
      server.on('GET', '/api/v2/task/t1', { body: { id: 't1', projectId: 'p1', title: 'Pay rent' } });

      const result = await writer.submit('task', [], [{ id: 't1', projectId: 'p1', title: 'Pay rent' }]);

      const reads = server.requests.filter(r => r.method === 'GET');
      expect(reads).toHaveLength(1);
      expect(reads[0].params).toEqual({ projectId: 'p1' });
      expect(result.refetched).toBe(true);
      expect(result.records).toEqual([{ id: 't1', projectId: 'p1', title: 'Pay rent' }]);
    });

    it('should lowercase task tags', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/batch/task', { body: { id2etag: { t1: 'e' } } });
      server.on('GET', '/api/v2/task/t1', { body: { id: 't1', projectId: 'p1', tags: ['urgent'] } });

      await writer.submit('task', [{ id: 't1', projectId: 'p1', tags: ['Urgent'] }]);

      expect(server.requests[0].body).toEqual({ add: [{ id: 't1', projectId: 'p1', tags: ['urgent'] }] });
    });

    it('should materialise a delete-only call without reading anything back', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/batch/task', { body: { id2etag: {}, id2error: {} } });

      const result = await writer.submit('task', [], [], [{ taskId: 't1', projectId: 'p1' }]);

      expect(server.requests).toHaveLength(1);
      expect(server.requests[0].body).toEqual({ delete: [{ taskId: 't1', projectId: 'p1' }] });
      expect(result.records).toEqual([]);
      expect(result.refetched).toBe(false);
    });

    it('should read back only the tasks the server stored', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/batch/task', {
        body: { id2etag: { t1: 'e1' }, id2error: { t2: 'EXCEED_QUOTA' } },
      });
      server.on('GET', '/api/v2/task/t1', { body: { id: 't1', projectId: 'p1', etag: 'e1' } });

      const result = await writer.submit('task', [
        { id: 't1', projectId: 'p1', title: 'Kept' },
        { id: 't2', projectId: 'p1', title: 'Refused' },
      ]);

      expect(server.requests.map(r => `${r.method} ${r.path}`)).toEqual([
        'POST /api/v2/batch/task',
        'GET /api/v2/task/t1',
      ]);
      expect(result.records).toEqual([{ id: 't1', projectId: 'p1', etag: 'e1' }]);
      expect(result.etags).toEqual({ t1: 'e1' });
      expect(result.errors).toEqual({ t2: 'EXCEED_QUOTA' });
    });

    it('should skip the read-back when every task was refused', async () => {
      const states: WriteState[] = [];
      const { server, writer } = createWriter({}, { onTransition: (_type, state) => states.push(state) });
      server.on('POST', '/api/v2/batch/task', { body: { id2etag: {}, id2error: { t1: 'EXCEED_QUOTA' } } });

      const result = await writer.submit('task', [{ id: 't1', projectId: 'p1' }]);

      expect(server.requests).toHaveLength(1);
      expect(result.records).toEqual([]);
      expect(result.refetched).toBe(false);
      expect(states).toEqual(['built', 'submitted', 'materialized']);
    });
  });

  describe('batch shape', () => {
    it('should treat an all-empty batch as a no-op', async () => {
      const { server, writer } = createWriter();

      const result = await writer.submit('project');

      expect(server.requests).toHaveLength(0);
      expect(result.outcome).toBe('materialized');
      expect(result.records).toEqual([]);
    });

    it('should give added records a 24-hex id when they have none', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/batch/filter', { body: { id2etag: {} } });
      server.on('GET', '/api/v3/batch/check/0', () => {
        const body = server.requests[0].body;
        const [added] = extractRecords(body, 'add');
        return { body: { checkPoint: 3, filters: [{ ...added, etag: 'e1' }] } };
      });

      const result = await writer.submit('filter', [{ name: 'Today', rule: '{}' }]);

      expect(result.records[0].id).toMatch(/^[0-9a-f]{24}$/);
      expect(result.records[0].etag).toBe('e1');
    });

    it('should report per-record errors instead of throwing', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/batch/project', {
        body: { id2etag: { p1: 'e1' }, id2error: { p2: 'EXCEED_QUOTA' } },
      });
      server.on('GET', '/api/v3/batch/check/0', {
        body: { checkPoint: 4, projectProfiles: [{ id: 'p1', name: 'Errands' }] },
      });

      const result = await writer.submit('project', [
        { id: 'p1', name: 'Errands' },
        { id: 'p2', name: 'One too many' },
      ]);

      expect(result.records).toEqual([{ id: 'p1', name: 'Errands' }]);
      expect(result.etags).toEqual({ p1: 'e1' });
      expect(result.errors).toEqual({ p2: 'EXCEED_QUOTA' });
    });

    it('should fail when a written record is missing from the read-back', async () => {
      const states: WriteState[] = [];
      const { server, writer } = createWriter({}, { onTransition: (_type, state) => states.push(state) });
      server.on('POST', '/api/v2/batch/projectGroup', { body: { id2etag: { g1: 'e1' } } });
      server.on('GET', '/api/v3/batch/check/0', { body: { checkPoint: 4, projectGroups: [] } });

      await expect(writer.submit('projectGroup', [{ id: 'g1', name: 'Work' }])).rejects.toThrow(ProtocolError);
      expect(states).toEqual(['built', 'submitted', 'requires_refetch', 'failed']);
    });
  });

  describe('refetch plans', () => {
    it('should read the columns of one project once for several written columns', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/column', { body: { id2etag: { c1: 'e1', c2: 'e2' } } });
      server.on('GET', '/api/v2/column/project/p1', {
        body: [
          { id: 'c1', projectId: 'p1', name: 'Todo' },
          { id: 'c2', projectId: 'p1', name: 'Done' },
        ],
      });

      const result = await writer.submit('column', [
        { id: 'c1', projectId: 'p1', name: 'Todo' },
        { id: 'c2', projectId: 'p1', name: 'Done' },
      ]);

      expect(server.requestsTo('GET', '/api/v2/column/project/p1')).toHaveLength(1);
      expect(result.records.map(r => r.name)).toEqual(['Todo', 'Done']);
    });

    it('should query check-ins back by habit when the write body is empty', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/habitCheckins/batch', { body: '' });
      server.on('POST', '/api/v2/habitCheckins/query', {
        body: { checkins: { h1: [{ id: 'c1', habitId: 'h1', status: 2 }] } },
      });

      const result = await writer.submit('habitCheckin', [{ id: 'c1', habitId: 'h1', status: 2 }]);

      expect(server.requestsTo('POST', '/api/v2/habitCheckins/query')[0].body).toEqual({ habitIds: ['h1'] });
      expect(result.records).toEqual([{ id: 'c1', habitId: 'h1', status: 2 }]);
    });
  });

  describe('rejection', () => {
    it('should reject habit writes under apiToken before any request', async () => {
      const { server, writer } = createWriter({ authMode: 'apiToken' });

      const error = await writer.submit('habit', [{ id: 'h1', name: 'Read' }]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WriteRejected);
      expect(error).toMatchObject({ entityType: 'habit', authMode: 'apiToken', code: 'WRITE_REJECTED' });
      expect(server.requests).toHaveLength(0);
      expect(writer.isWritable('habit')).toBe(false);
    });

    it('should still accept habit check-ins under apiToken', async () => {
      const { server, writer } = createWriter({ authMode: 'apiToken' });
      server.on('POST', '/api/v2/habitCheckins/batch', { body: [{ id: 'c1', habitId: 'h1', status: 2 }] });

      const result = await writer.submit('habitCheckin', [{ id: 'c1', habitId: 'h1', status: 2 }]);

      expect(result.records).toEqual([{ id: 'c1', habitId: 'h1', status: 2 }]);
      expect(result.refetched).toBe(false);
    });

    it('should accept habit writes in session mode and use the returned entity', async () => {
      const { server, writer } = createWriter();
      server.on('POST', '/api/v2/habits/batch', { body: [{ id: 'h1', name: 'Read', status: 0 }] });

      const result = await writer.submit('habit', [{ id: 'h1', name: 'Read' }]);

      expect(server.requests).toHaveLength(1);
      expect(result.records).toEqual([{ id: 'h1', name: 'Read', status: 0 }]);
    });

    it('should mark an entity type read-only after a 405', async () => {
      const seen: Array<[EntityType, WriteState]> = [];
      const { server, writer } = createWriter({}, { onTransition: (type, state) => seen.push([type, state]) });
      server.on('POST', '/api/v2/batch/filter', { status: 405, body: '' });

      await expect(writer.submit('filter', [{ id: 'f1', name: 'Today' }])).rejects.toBeInstanceOf(WriteRejected);
      await expect(writer.submit('filter', [{ id: 'f2', name: 'Later' }])).rejects.toBeInstanceOf(WriteRejected);

      expect(server.requests).toHaveLength(1);
      expect(writer.isWritable('filter')).toBe(false);
      expect(seen).toEqual([
        ['filter', 'built'],
        ['filter', 'submitted'],
        ['filter', 'rejected'],
        ['filter', 'built'],
        ['filter', 'rejected'],
      ]);
    });
  });
});

describe('foldTagName', () => {
  it('should lowercase names and keep the separator', () => {
    expect(foldTagName('Work/Deep Focus')).toBe('work/deep focus');
  });
});

describe('extractRecords', () => {
  it('should read bare lists, nested lists, grouped lists and single records', () => {
    expect(extractRecords([{ id: 'a' }])).toEqual([{ id: 'a' }]);
    expect(extractRecords({ columns: [{ id: 'b' }] }, 'columns')).toEqual([{ id: 'b' }]);
    expect(extractRecords({ checkins: { h1: [{ id: 'c' }], h2: [{ id: 'd' }] } }, 'checkins')).toEqual([
      { id: 'c' },
      { id: 'd' },
    ]);
    expect(extractRecords({ id: 'e' })).toEqual([{ id: 'e' }]);
  });

  it('should reject a body that holds no records', () => {
    expect(() => extractRecords('ok')).toThrow(ProtocolError);
  });
});
