import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HTTPError } from '@relaypost/batch';
import { CircuitBreaker, CircuitOpenError } from '@relaypost/shared';
import { createServerClient, isPermanentHttpError } from '../server-client.js';
import { catchError } from './helpers.js';

// ---------------------------------------------------------------------------
// fetch stub
// ---------------------------------------------------------------------------

const fetchMock = vi.fn<typeof fetch>();

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function requestAt(index: number): { url: string; init: RequestInit | undefined } {
  const call = fetchMock.mock.calls[index];
  if (!call) throw new Error(`no fetch call ${index}`);
  return { url: String(call[0]), init: call[1] };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

describe('createServerClient', () => {
  it('posts messages as base64 JSON and returns the hash', async () => {
    fetchMock.mockResolvedValueOnce(json({ hash: 'h1' }));
    const client = createServerClient({ baseUrl: 'https://server.test/' });

    const result = await client.sendMessage({ recipient: '05ab', data: new Uint8Array([1, 2, 3]), timestamp: 5 });

    expect(result).toEqual({ hash: 'h1' });
    const { url, init } = requestAt(0);
    expect(url).toBe('https://server.test/messages');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({ recipient: '05ab', data: 'AQID', timestamp: 5 });
  });

  it('fetches and decodes the inbox', async () => {
    fetchMock.mockResolvedValueOnce(json({ messages: [{ hash: 'h2', data: 'AQID', timestamp: 9 }] }));
    const client = createServerClient({ baseUrl: 'https://server.test' });

    const messages = await client.fetchMessages('05ab', 'h1');

    expect(requestAt(0).url).toBe('https://server.test/messages?recipient=05ab&since=h1');
    expect(requestAt(0).init?.method).toBe('GET');
    expect(messages).toEqual([{ hash: 'h2', data: new Uint8Array([1, 2, 3]), timestamp: 9 }]);
  });

  it('leaves out the cursor on the first fetch', async () => {
    fetchMock.mockResolvedValueOnce(json({ messages: [] }));
    const client = createServerClient({ baseUrl: 'https://server.test' });

    expect(await client.fetchMessages('05ab', undefined)).toEqual([]);
    expect(requestAt(0).url).toBe('https://server.test/messages?recipient=05ab');
  });

  it('downloads files from absolute URLs', async () => {
    fetchMock.mockResolvedValueOnce(new Response(new Uint8Array([7, 8])));
    const client = createServerClient({ baseUrl: 'https://server.test' });

    expect(await client.downloadFile('https://files.test/f1')).toEqual(new Uint8Array([7, 8]));
    expect(requestAt(0).url).toBe('https://files.test/f1');
  });

  it('rejects an empty download', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 200 }));
    const client = createServerClient({ baseUrl: 'https://server.test' });

    const err = await rejection(client.downloadFile('https://files.test/f1'));
    expect(err).toBeInstanceOf(HTTPError);
    expect(err).toMatchObject({ kind: 'parsingFailed', message: 'Invalid response. (empty file)' });
  });

  it('hands batch replies back undecoded with their headers', async () => {
    fetchMock.mockResolvedValueOnce(new Response('[]', { status: 200, headers: { 'X-Request-Id': 'r1' } }));
    const client = createServerClient({ baseUrl: 'https://server.test' });

    const [info, data] = await client.batch([{ method: 'GET', path: '/rooms' }]);

    expect(info.code).toBe(200);
    expect(info.headers['x-request-id']).toBe('r1');
    expect(new TextDecoder().decode(data)).toBe('[]');
    expect(JSON.parse(String(requestAt(0).init?.body))).toEqual({ requests: [{ method: 'GET', path: '/rooms' }] });
  });

  it('registers push tokens', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));
    const client = createServerClient({ baseUrl: 'https://server.test' });
    const registration = { token: 'test-token', identityId: '05ab', publicKey: 'pk', signature: 'sig' };

    await client.registerPushToken(registration);

    expect(requestAt(0).url).toBe('https://server.test/push/register');
    expect(JSON.parse(String(requestAt(0).init?.body))).toEqual(registration);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe('createServerClient failures', () => {
  it('turns error statuses into HTTPError with the status code', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad recipient', { status: 400 }));
    const client = createServerClient({ baseUrl: 'https://server.test' });

    const err = await rejection(client.sendMessage({ recipient: 'x', data: new Uint8Array(), timestamp: 1 }));

    expect(err).toMatchObject({
      kind: 'invalidResponse',
      statusCode: 400,
      message: 'The server returned an error response. (400: bad recipient)',
    });
    expect(isPermanentHttpError(err)).toBe(true);
  });

  it('retries GETs on server errors', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(json({ messages: [] }));
    const client = createServerClient({ baseUrl: 'https://server.test', retryDelayMs: 0 });

    expect(await client.fetchMessages('05ab', undefined)).toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors', async () => {
    fetchMock.mockResolvedValue(new Response('gone', { status: 404 }));
    const client = createServerClient({ baseUrl: 'https://server.test', retryDelayMs: 0 });

    const err = await rejection(client.downloadFile('https://files.test/f1'));

    expect(err).toMatchObject({ kind: 'invalidResponse', statusCode: 404 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('fails fast once the breaker opens', async () => {
    fetchMock.mockResolvedValue(new Response('down', { status: 500 }));
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 1 });
    const client = createServerClient({ baseUrl: 'https://server.test', breaker });

    await rejection(client.uploadFile(new Uint8Array([1])));
    const err = await rejection(client.uploadFile(new Uint8Array([1])));

    expect(err).toBeInstanceOf(CircuitOpenError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports a timeout', async () => {
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init.signal?.reason));
        }),
    );
    const client = createServerClient({ baseUrl: 'https://server.test', timeoutMs: 10 });

    const err = await rejection(client.registerPushToken({ token: 't', identityId: 'i', publicKey: 'p', signature: 's' }));

    expect(err).toMatchObject({ kind: 'timeout', message: 'The request timed out. (POST https://server.test/push/register)' });
  });
});

describe('isPermanentHttpError', () => {
  it('only matches client errors worth giving up on', () => {
    expect(isPermanentHttpError(new HTTPError('invalidResponse', { statusCode: 403 }))).toBe(true);
    expect(isPermanentHttpError(new HTTPError('invalidResponse', { statusCode: 429 }))).toBe(false);
    expect(isPermanentHttpError(new HTTPError('invalidResponse', { statusCode: 500 }))).toBe(false);
    expect(isPermanentHttpError(new HTTPError('parsingFailed'))).toBe(false);
    expect(isPermanentHttpError(catchError(() => JSON.parse('{')))).toBe(false);
  });
});
