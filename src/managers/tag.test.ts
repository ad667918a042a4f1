import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createTestClient } from '../testing/fakeServer';

describe('TagManager', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('should create a tag under its lowercased name and keep the display label', async () => {
    const { server, client } = createTestClient();
    server.on('POST', '/api/v2/batch/tag', { body: { id2etag: { work: 'e1' }, id2error: {} } });
    server.on('GET', '/api/v3/batch/check/0', {
      body: { checkPoint: 3, tags: [{ name: 'work', label: 'Work', etag: 'e1' }] },
    });

    const tag = await client.tag.create('Work');

    expect(server.requests[0].body).toEqual({ add: [{ name: 'work', label: 'Work', sortOrder: 0, color: '' }] });
    expect(tag).toMatchObject({ name: 'work', label: 'Work', etag: 'e1', parent: '' });
  });

  it('should create a sub-tag as "parent/child"', async () => {
    const { server, client } = createTestClient();
    server.on('POST', '/api/v2/batch/tag', { body: { id2etag: { 'work/deep': 'e2' } } });
    server.on('GET', '/api/v3/batch/check/0', {
      body: { checkPoint: 4, tags: [{ name: 'work' }, { name: 'work/deep', label: 'Work/Deep' }] },
    });

    const tag = await client.tag.createSubtag('Work', 'Deep', { color: '#FF0000' });

    expect(server.requests[0].body).toEqual({
      add: [{ name: 'work/deep', label: 'Work/Deep', sortOrder: 0, color: '#FF0000' }],
    });
    expect(tag.parent).toBe('work');
  });

  it('should list the children of a tag whatever case the caller uses', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v3/batch/check/0', {
      body: { checkPoint: 4, tags: [{ name: 'work' }, { name: 'work/deep' }, { name: 'home/garden' }] },
    });

    const children = await client.tag.getChildren('Work');

    expect(children.map(t => t.name)).toEqual(['work/deep']);
  });

  it('should find a tag by name or return undefined', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v3/batch/check/0', { body: { checkPoint: 4, tags: [{ name: 'errands' }] } });

    expect((await client.tag.get('Errands'))?.name).toBe('errands');
    expect(await client.tag.get('missing')).toBeUndefined();
  });

  it('should rename with both names lowercased', async () => {
    const { server, client } = createTestClient();
    server.on('PUT', '/api/v2/tag/rename', { body: '' });

    await client.tag.rename('Work', 'Focus');

    expect(server.requests[0].body).toEqual({ name: 'work', newName: 'focus' });
  });

  it('should delete sub-tags through the batch endpoint', async () => {
    const { server, client } = createTestClient();
    server.on('POST', '/api/v2/batch/tag', { body: { id2etag: {}, id2error: {} } });

    await client.tag.delete('Work/Deep');

    expect(server.requests).toHaveLength(1);
    expect(server.requests[0].body).toEqual({ delete: ['work/deep'] });
  });

  it('should ask for completed tasks by lowercased tag', async () => {
    const { server, client } = createTestClient();
    server.on('POST', '/api/v2/tag/completedTask', { body: [{ id: 't1', tags: ['work'], status: 2 }] });

    const tasks = await client.tag.getCompletedTasks(['Work']);

    expect(server.requests[0].body).toEqual({ tags: ['work'], token: '', limit: 50 });
    expect(tasks.map(t => t.id)).toEqual(['t1']);
  });
});
