import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ApiError, AuthError, NotFoundError, RateLimitError, TransportError } from './errors';
import { ApiClient, isEmptyBody } from './http';
import { FakeServer } from './testing/fakeServer';

describe('ApiClient', () => {
  let server: FakeServer;

  beforeEach(() => {
    server = new FakeServer();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  describe('authentication', () => {
    it('should send the session cookie in session mode', async () => {
      server.on('GET', '/api/v2/user/profile', { body: { username: 'someone' } });
      const http = new ApiClient({ token: 'test-secret', adapter: server.adapter });

      await http.get('/api/v2/user/profile');

      expect(server.requests[0].headers['cookie']).toBe('t=test-secret');
      expect(server.requests[0].headers['authorization']).toBeUndefined();
    });

    it('should send a bearer token in apiToken mode', async () => {
      server.on('GET', '/api/v2/user/profile', { body: {} });
      const http = new ApiClient({ token: 'test-secret', authMode: 'apiToken', adapter: server.adapter });

      await http.get('/api/v2/user/profile');

      expect(server.requests[0].headers['authorization']).toBe('Bearer test-secret');
      expect(server.requests[0].headers['cookie']).toBeUndefined();
    });

    it('should send the web client headers', async () => {
      server.on('GET', '/api/v2/user/status', { body: {} });
      const http = new ApiClient({ token: 'test-secret', adapter: server.adapter });

      await http.get('/api/v2/user/status');

      expect(server.requests[0].headers['origin']).toBe('https://ticktick.com');
      expect(JSON.parse(server.requests[0].headers['x-device']).platform).toBe('web');
    });
  });

  describe('responses', () => {
    it('should flag an empty body', async () => {
      server.on('POST', '/api/v2/batch/task', { body: '' });
      const http = new ApiClient({ adapter: server.adapter });

      const response = await http.post('/api/v2/batch/task', { data: { add: [] } });

      expect(response.status).toBe(200);
      expect(response.empty).toBe(true);
    });

    it('should pass query params and JSON bodies through', async () => {
      server.on('POST', '/api/v2/habitCheckins/query', { body: [] });
      const http = new ApiClient({ adapter: server.adapter });

      await http.post('/api/v2/habitCheckins/query', { params: { limit: 5 }, data: { habitIds: ['h1'] } });

      expect(server.requests[0].params).toEqual({ limit: 5 });
      expect(server.requests[0].body).toEqual({ habitIds: ['h1'] });
    });
  });

  describe('error mapping', () => {
    it('should map 401 to AuthError', async () => {
      server.on('GET', '/api/v2/user/profile', { status: 401, body: 'expired' });
      const http = new ApiClient({ adapter: server.adapter });

      const error = await http.get('/api/v2/user/profile').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toBeInstanceOf(TransportError);
    });

    it('should map 404 to NotFoundError', async () => {
      server.on('GET', '/api/v2/task/missing', { status: 404, body: {} });
      const http = new ApiClient({ adapter: server.adapter });

      await expect(http.get('/api/v2/task/missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should map 429 to RateLimitError with Retry-After', async () => {
      server.on('GET', '/api/v3/batch/check/0', { status: 429, body: {}, headers: { 'retry-after': '30' } });
      const http = new ApiClient({ adapter: server.adapter });

      const error = await http.get('/api/v3/batch/check/0').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({ status: 429, retryAfter: 30 });
    });

    it('should keep the server error code and message for other statuses', async () => {
      server.on('POST', '/api/v2/batch/project', {
        status: 500,
        body: { errorCode: 'server_busy', errorMessage: 'try later' },
      });
      const http = new ApiClient({ adapter: server.adapter });

      const error = await http.post('/api/v2/batch/project').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 500, errorCode: 'server_busy', errorMessage: 'try later' });
      expect(error instanceof Error && error.message).toBe('HTTP 500: server_busy - try later');
      expect(console.error).toHaveBeenCalledWith(
        'HTTP POST /api/v2/batch/project -> 500: {"errorCode":"server_busy","errorMessage":"try later"}'
      );
    });

    it('should surface 405 as a plain ApiError', async () => {
      server.on('POST', '/api/v2/habits/batch', { status: 405, body: '' });
      const http = new ApiClient({ adapter: server.adapter });

      const error = await http.post('/api/v2/habits/batch').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 405 });
    });

    it('should map a timeout to TransportError with code TIMEOUT', async () => {
      server.on('GET', '/api/v3/batch/check/0', {
        networkError: { code: 'ECONNABORTED', message: 'timeout of 30000ms exceeded' },
      });
      const http = new ApiClient({ adapter: server.adapter });

      const error = await http.get('/api/v3/batch/check/0').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).not.toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ code: 'TIMEOUT' });
    });
  });
});

describe('isEmptyBody', () => {
  it('should treat missing and blank bodies as empty', () => {
    expect(isEmptyBody(undefined)).toBe(true);
    expect(isEmptyBody(null)).toBe(true);
    expect(isEmptyBody('  \n')).toBe(true);
    expect(isEmptyBody({})).toBe(false);
    expect(isEmptyBody([])).toBe(false);
  });
});
