import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ProtocolError } from '../errors';
import { createTestClient } from '../testing/fakeServer';

const SYNC = {
  checkPoint: 1,
  syncTaskBean: {
    update: [
      { id: 't1', projectId: 'p1', title: 'Plan trip', tags: ['Travel'], priority: 5, dueDate: '2024-03-15T07:30:00.000+0000' },
      { id: 't2', projectId: 'p1', title: 'Pack', tags: ['travel'], priority: 0 },
      { id: 't3', projectId: 'p2', title: 'Taxes', tags: ['money'], priority: 5 },
    ],
  },
};

describe('SearchManager', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('should match tags whatever their case', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v3/batch/check/0', { body: SYNC });

    const tasks = await client.search.filterTasks({ tag: 'TRAVEL' });

    expect(tasks.map(t => t.id)).toEqual(['t1', 't2']);
  });

  it('should combine criteria', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v3/batch/check/0', { body: SYNC });

    expect((await client.search.filterTasks({ priority: 5, hasDueDate: false })).map(t => t.id)).toEqual(['t3']);
    expect((await client.search.filterTasks({ projectId: 'p1', hasDueDate: true })).map(t => t.id)).toEqual(['t1']);
  });

  it('should pull tasks out of a keyword search', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v2/search/all', { body: { tasks: [{ id: 't7', title: 'Plan trip' }], tags: [] } });

    const tasks = await client.search.searchTasks('trip');

    expect(server.requests[0].params).toEqual({ keywords: 'trip' });
    expect(tasks.map(t => t.title)).toEqual(['Plan trip']);
  });

  it('should return no tasks when the search result has none', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v2/search/all', { body: { tags: [] } });

    expect(await client.search.searchTasks('nothing')).toEqual([]);
  });
});

describe('UserManager', () => {
  it('should ask for web settings by default', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v2/user/preferences/settings', { body: { timeZone: 'Europe/Berlin' } });

    const settings = await client.user.getSettings();

    expect(server.requests[0].params).toEqual({ includeWeb: 'true' });
    expect(settings).toEqual({ timeZone: 'Europe/Berlin' });
  });

  it('should return the profile record', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v2/user/profile', { body: { username: 'someone@example.com' } });

    expect(await client.user.getProfile()).toEqual({ username: 'someone@example.com' });
  });

  it('should send the platform and mtime with preference reads', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v2/user/preferences/habit', { body: { showInCalendar: true } });
    server.on('GET', '/api/v2/user/preferences/ext', { body: { mtime: 5 } });

    expect(await client.user.getHabitPreferences()).toEqual({ showInCalendar: true });
    await client.user.getExtPreferences(1700000000);

    expect(server.requests.map(r => r.params)).toEqual([{ platform: 'web' }, { mtime: 1700000000 }]);
  });

  it('should read lists of notifications and calendar data', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v2/notification/unread', { body: [{ id: 'n1' }] });
    server.on('GET', '/api/v2/calendar/third/accounts', { body: '' });
    server.on('GET', '/api/v2/calendar/bind/events/all', { body: [{ id: 'ev1' }, { id: 'ev2' }] });

    expect(await client.user.getUnreadNotifications()).toEqual([{ id: 'n1' }]);
    expect(await client.user.getCalendarAccounts()).toEqual([]);
    expect((await client.user.getCalendarEvents()).map(e => e.id)).toEqual(['ev1', 'ev2']);
  });

  it('should read the attachment quota as a boolean', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v1/attachment/isUnderQuota', { body: true });

    expect(await client.user.isUnderAttachmentQuota()).toBe(true);
  });

  it('should reject a quota answer that is not a boolean', async () => {
    const { server, client } = createTestClient();
    server.on('GET', '/api/v1/attachment/isUnderQuota', { body: { quota: 1 } });

    await expect(client.user.isUnderAttachmentQuota()).rejects.toBeInstanceOf(ProtocolError);
  });
});
