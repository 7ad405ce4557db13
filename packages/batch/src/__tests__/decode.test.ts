import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { decoded, decodedAs, type ResponseTuple } from '../decode.js';
import { HTTPError } from '../errors.js';
import { SubResponseType } from '../sub-response.js';

const info = { code: 200, headers: {} };
const encode = (value: unknown) => new TextEncoder().encode(JSON.stringify(value));

describe('decoded', () => {
  it('decodes the pending response as a batch', async () => {
    const Rooms = SubResponseType.of('Rooms', z.array(z.string()));
    const response: Promise<ResponseTuple> = Promise.resolve([info, encode([{ code: 200, headers: {}, body: ['lobby'] }])]);

    const batch = await decoded(response, [Rooms]);

    expect(batch.get(0, Rooms)?.body).toEqual(['lobby']);
  });

  it('rejects with parsingFailed when there is no data', async () => {
    const response: Promise<ResponseTuple> = Promise.resolve([info, undefined]);

    await expect(decoded(response, [])).rejects.toMatchObject({ kind: 'parsingFailed' });
  });

  it('propagates an upstream failure unchanged', async () => {
    const upstream = new HTTPError('timeout');

    await expect(decoded(Promise.reject(upstream), [])).rejects.toBe(upstream);
  });
});

describe('decodedAs', () => {
  it('keeps the response info alongside the decoded value', async () => {
    const response: Promise<ResponseTuple> = Promise.resolve([{ code: 201, headers: { etag: 'x' } }, encode({ hash: 'abc' })]);

    const [responseInfo, value] = await decodedAs(response, z.object({ hash: z.string() }));

    expect(responseInfo).toEqual({ code: 201, headers: { etag: 'x' } });
    expect(value).toEqual({ hash: 'abc' });
  });
});
