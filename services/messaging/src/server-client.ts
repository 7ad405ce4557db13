import { z } from 'zod';
import { decodedAs, HTTPError, isHTTPError, type ResponseTuple } from '@relaypost/batch';
import { CircuitBreaker, CircuitOpenError, logger, retry } from '@relaypost/shared';

const log = logger.child({ module: 'server-client' });

// ---------------------------------------------------------------------------
// Wire types
// ---------------------------------------------------------------------------

const sendResultSchema = z.object({ hash: z.string().min(1) });

const inboxSchema = z.object({
  messages: z.array(
    z.object({
      hash: z.string().min(1),
      data: z.string(),
      timestamp: z.number().int(),
    }),
  ),
});

const uploadResultSchema = z.object({ id: z.string().min(1), url: z.string().min(1) });

export interface OutgoingEnvelope {
  recipient: string;
  data: Uint8Array;
  timestamp: number;
  ttlMs?: number;
}

export interface IncomingEnvelope {
  hash: string;
  data: Uint8Array;
  timestamp: number;
}

export interface UploadedFile {
  id: string;
  url: string;
}

export interface PushRegistration {
  token: string;
  identityId: string;
  /** base64url ed25519 public key */
  publicKey: string;
  /** base64 signature over the token */
  signature: string;
}

export interface BatchRequest {
  method: 'GET' | 'POST';
  path: string;
  body?: unknown;
}

export interface MessagingApi {
  sendMessage(envelope: OutgoingEnvelope, signal?: AbortSignal): Promise<{ hash: string }>;
  fetchMessages(recipient: string, since: string | undefined, signal?: AbortSignal): Promise<IncomingEnvelope[]>;
  uploadFile(data: Uint8Array, signal?: AbortSignal): Promise<UploadedFile>;
  downloadFile(url: string, signal?: AbortSignal): Promise<Uint8Array>;
  registerPushToken(registration: PushRegistration, signal?: AbortSignal): Promise<void>;
  /** Several requests in one round trip; the reply is decoded by the caller. */
  batch(requests: readonly BatchRequest[], signal?: AbortSignal): Promise<ResponseTuple>;
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

/** Client errors that will fail the same way on every retry. */
export function isPermanentHttpError(error: unknown): boolean {
  if (!isHTTPError(error, 'invalidResponse') || error.statusCode === undefined) return false;
  const status = error.statusCode;
  return status >= 400 && status < 500 && status !== 408 && status !== 429;
}

function isRetryable(error: unknown): boolean {
  return !(error instanceof CircuitOpenError) && !isPermanentHttpError(error);
}

const toBase64 = (data: Uint8Array): string => Buffer.from(data).toString('base64');
const fromBase64 = (text: string): Uint8Array => new Uint8Array(Buffer.from(text, 'base64'));

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface ServerClientOptions {
  baseUrl: string;
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number;
  /** Attempts for idempotent GETs (default: 3) */
  getAttempts?: number;
  retryDelayMs?: number;
  breaker?: CircuitBreaker;
}

export function createServerClient(opts: ServerClientOptions): MessagingApi {
  const baseUrl = opts.baseUrl.replace(/\/+$/, '');
  const timeoutMs = opts.timeoutMs ?? 30_000;
  const getAttempts = opts.getAttempts ?? 3;
  const retryDelayMs = opts.retryDelayMs ?? 1_000;
  const breaker =
    opts.breaker ??
    new CircuitBreaker({
      name: 'messaging-server',
      isFailure: (error) => !isPermanentHttpError(error),
    });

  async function send(method: string, target: string, body: unknown, signal?: AbortSignal): Promise<ResponseTuple> {
    const url = /^https?:\/\//.test(target) ? target : `${baseUrl}${target}`;
    const timeout = AbortSignal.timeout(timeoutMs);

    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err) {
      if (timeout.aborted && !signal?.aborted) {
        throw new HTTPError('timeout', { detail: `${method} ${url}`, cause: err });
      }
      throw err;
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      log.debug({ method, url, status: res.status }, 'server returned error status');
      throw new HTTPError('invalidResponse', {
        statusCode: res.status,
        detail: text ? `${res.status}: ${text}` : String(res.status),
      });
    }

    const headers: Record<string, string> = {};
    res.headers.forEach((value, key) => {
      headers[key] = value;
    });
    const data = new Uint8Array(await res.arrayBuffer());
    return [{ code: res.status, headers }, data.byteLength > 0 ? data : undefined];
  }

  function post(path: string, body: unknown, signal?: AbortSignal): Promise<ResponseTuple> {
    return breaker.execute(() => send('POST', path, body, signal));
  }

  function get(target: string, signal?: AbortSignal): Promise<ResponseTuple> {
    return retry(() => breaker.execute(() => send('GET', target, undefined, signal)), {
      attempts: getAttempts,
      delayMs: retryDelayMs,
      shouldRetry: isRetryable,
      signal,
    });
  }

  return {
    async sendMessage(envelope, signal) {
      const [, result] = await decodedAs(
        post(
          '/messages',
          {
            recipient: envelope.recipient,
            data: toBase64(envelope.data),
            timestamp: envelope.timestamp,
            ttlMs: envelope.ttlMs,
          },
          signal,
        ),
        sendResultSchema,
      );
      return result;
    },

    async fetchMessages(recipient, since, signal) {
      const query = new URLSearchParams({ recipient });
      if (since) query.set('since', since);
      const [, inbox] = await decodedAs(get(`/messages?${query.toString()}`, signal), inboxSchema);
      return inbox.messages.map((m) => ({ hash: m.hash, data: fromBase64(m.data), timestamp: m.timestamp }));
    },

    async uploadFile(data, signal) {
      const [, file] = await decodedAs(post('/files', { data: toBase64(data) }, signal), uploadResultSchema);
      return file;
    },

    async downloadFile(url, signal) {
      const [, data] = await get(url, signal);
      if (!data) throw HTTPError.parsingFailed('empty file');
      return data;
    },

    async registerPushToken(registration, signal) {
      await post('/push/register', registration, signal);
    },

    batch(requests, signal) {
      return post('/batch', { requests }, signal);
    },
  };
}
