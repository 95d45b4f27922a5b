import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FetchHttpClient } from '../../../src/infrastructure/http/FetchHttpClient.js';
import { TransportError } from '../../../src/domain/errors/TransportError.js';
import { readJson } from '../../../src/domain/model/HttpExchange.js';

// Mock the global fetch
const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

/** A fetch that only settles by rejecting once its signal aborts. */
function hangUntilAborted(_url: string, init: { signal: AbortSignal }): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const fail = (): void => {
      reject(new Error('This operation was aborted'));
    };
    if (init.signal.aborted) {
      fail();
    } else {
      init.signal.addEventListener('abort', fail, { once: true });
    }
  });
}

function socketError(code: string): TypeError {
  return new TypeError('fetch failed', { cause: Object.assign(new Error(`connect ${code}`), { code }) });
}

describe('FetchHttpClient', () => {
  it('should send a JSON body and return the raw response', async () => {
    mockFetch.mockResolvedValue(
      new Response('{"id":"u-1"}', { status: 201, headers: { 'Content-Type': 'application/json' } }),
    );
    const client = new FetchHttpClient({ baseUrl: 'https://api.example.com/v1' });

    const response = await client.send({ method: 'POST', path: '/users', body: { username: 'alice' } });

    expect(response.status).toBe(201);
    expect(response.headers['content-type']).toBe('application/json');
    expect(readJson(response)).toEqual({ id: 'u-1' });
    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.example.com/v1/users',
      expect.objectContaining({
        method: 'POST',
        headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
        body: '{"username":"alice"}',
      }),
    );
  });

  it('should merge default and request headers, request headers last', async () => {
    mockFetch.mockResolvedValue(new Response(null, { status: 204 }));
    const client = new FetchHttpClient({
      baseUrl: 'https://api.example.com/v1/',
      headers: { Authorization: 'Bearer test-token', 'X-Client': 'web' },
    });

    await client.send({ method: 'DELETE', path: 'sessions/current', headers: { 'X-Client': 'mobile' } });

    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.example.com/v1/sessions/current',
      expect.objectContaining({
        method: 'DELETE',
        headers: { Accept: 'application/json', Authorization: 'Bearer test-token', 'X-Client': 'mobile' },
        body: undefined,
      }),
    );
  });

  it('should return non-2xx responses instead of throwing', async () => {
    mockFetch.mockResolvedValue(new Response('{"error":"duplicate"}', { status: 409 }));
    const client = new FetchHttpClient({ baseUrl: 'https://api.example.com' });

    const response = await client.send({ method: 'POST', path: '/users', body: {} });

    expect(response.status).toBe(409);
    expect(readJson(response)).toEqual({ error: 'duplicate' });
  });

  it('should throw a timeout transport error when the request takes too long', async () => {
    mockFetch.mockImplementation(hangUntilAborted);
    const client = new FetchHttpClient({ baseUrl: 'https://api.example.com', timeout: 5 });

    const pending = client.send({ method: 'POST', path: '/slow', body: {} });

    await expect(pending).rejects.toBeInstanceOf(TransportError);
    await expect(pending).rejects.toMatchObject({
      reason: 'timeout',
      message: 'Request to https://api.example.com/slow timed out after 5ms',
    });
  });

  it('should throw an aborted transport error when the caller aborts', async () => {
    mockFetch.mockImplementation(hangUntilAborted);
    const client = new FetchHttpClient({ baseUrl: 'https://api.example.com' });
    const controller = new AbortController();

    const pending = client.send({ method: 'POST', path: '/users', body: {} }, controller.signal);
    controller.abort('user left');

    await expect(pending).rejects.toMatchObject({ reason: 'aborted', message: 'user left' });
  });

  it('should abort at once when the signal is already aborted', async () => {
    mockFetch.mockImplementation(hangUntilAborted);
    const client = new FetchHttpClient({ baseUrl: 'https://api.example.com' });
    const controller = new AbortController();
    controller.abort('navigated away');

    await expect(client.send({ method: 'POST', path: '/users' }, controller.signal)).rejects.toMatchObject({
      reason: 'aborted',
      message: 'navigated away',
    });
  });

  it('should classify a refused connection', async () => {
    mockFetch.mockRejectedValue(socketError('ECONNREFUSED'));
    const client = new FetchHttpClient({ baseUrl: 'http://localhost:9' });

    await expect(client.send({ method: 'POST', path: '/users' })).rejects.toMatchObject({
      reason: 'connection-refused',
      message: 'Connection refused: http://localhost:9/users',
    });
  });

  it('should find error codes inside aggregate errors', async () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED ::1:9'), { code: 'ECONNREFUSED' });
    mockFetch.mockRejectedValue(new TypeError('fetch failed', { cause: new AggregateError([refused]) }));
    const client = new FetchHttpClient({ baseUrl: 'http://localhost:9' });

    await expect(client.send({ method: 'POST', path: '/users' })).rejects.toMatchObject({
      reason: 'connection-refused',
    });
  });

  it('should classify socket timeouts', async () => {
    mockFetch.mockRejectedValue(socketError('ETIMEDOUT'));
    const client = new FetchHttpClient({ baseUrl: 'https://api.example.com' });

    await expect(client.send({ method: 'POST', path: '/users' })).rejects.toMatchObject({
      reason: 'timeout',
      message: 'Request to https://api.example.com/users timed out (ETIMEDOUT)',
    });
  });

  it('should treat other failures as network errors', async () => {
    mockFetch.mockRejectedValueOnce(socketError('ENOTFOUND')).mockRejectedValueOnce(new TypeError('fetch failed'));
    const client = new FetchHttpClient({ baseUrl: 'https://api.example.com' });

    await expect(client.send({ method: 'POST', path: '/users' })).rejects.toMatchObject({
      reason: 'network',
      message: 'fetch failed (ENOTFOUND)',
    });
    await expect(client.send({ method: 'POST', path: '/users' })).rejects.toMatchObject({
      reason: 'network',
      message: 'fetch failed',
    });
  });
});
