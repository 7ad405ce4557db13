import type { z } from 'zod';
import { HTTPError } from './errors.js';
import type { AnyBatchSubResponse, BatchSubResponse, SubResponseDecoder, SubResponseType } from './sub-response.js';

export type ResponseData = Uint8Array | string;

export class BatchResponse {
  constructor(readonly responses: readonly AnyBatchSubResponse[]) {}

  /**
   * Typed access to position `index`; undefined when `type` is not the descriptor
   * that decoded that position.
   */
  get<T>(index: number, type: SubResponseType<T>): BatchSubResponse<T> | undefined {
    const response = this.responses[index];
    return response ? type.from(response) : undefined;
  }
}

const textDecoder = new TextDecoder();

function parseJson(data: ResponseData | undefined | null): unknown {
  if (data === undefined || data === null || data.length === 0) {
    throw HTTPError.parsingFailed('no data');
  }

  const text = typeof data === 'string' ? data : textDecoder.decode(data);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw HTTPError.parsingFailed('response is not JSON', err);
  }
}

/**
 * Decode a multiplexed batch reply. Fails as a whole on a malformed envelope (missing data,
 * non-array, element count mismatch, missing code/headers); body mismatches only flag the
 * affected element.
 */
export function decodeBatchResponse(
  data: ResponseData | undefined | null,
  expectedTypes: readonly SubResponseDecoder[],
): BatchResponse {
  const json = parseJson(data);

  if (!Array.isArray(json)) {
    throw HTTPError.parsingFailed('batch response is not an array');
  }
  if (json.length !== expectedTypes.length) {
    throw HTTPError.parsingFailed(`expected ${expectedTypes.length} sub-responses, got ${json.length}`);
  }

  const responses = expectedTypes.map((type, index) => {
    try {
      return type.decode(json[index]);
    } catch (err) {
      if (err instanceof HTTPError) throw err;
      throw HTTPError.parsingFailed(`sub-response ${index} (${type.name})`, err);
    }
  });

  return new BatchResponse(responses);
}

/** Decode a whole payload as a single value. */
export function decodeBody<T>(data: ResponseData | undefined | null, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const parsed = schema.safeParse(parseJson(data));
  if (!parsed.success) {
    throw HTTPError.parsingFailed('response body does not match the expected shape', parsed.error);
  }
  return parsed.data;
}
