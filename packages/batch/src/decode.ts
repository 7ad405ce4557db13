import type { z } from 'zod';
import { decodeBatchResponse, decodeBody, type BatchResponse } from './batch-response.js';
import { HTTPError } from './errors.js';
import type { ResponseInfo, SubResponseDecoder } from './sub-response.js';

/** What the networking layer hands back: response metadata plus the raw body, if any. */
export type ResponseTuple = readonly [ResponseInfo, Uint8Array | undefined];

/** Pipeline stage: decode a pending response as a batch of `expectedTypes`. */
export async function decoded(
  response: Promise<ResponseTuple>,
  expectedTypes: readonly SubResponseDecoder[],
): Promise<BatchResponse> {
  const [, data] = await response;
  if (!data) throw HTTPError.parsingFailed('no data');
  return decodeBatchResponse(data, expectedTypes);
}

/** Pipeline stage: decode a pending response body as one `T`, keeping the response info. */
export async function decodedAs<T>(
  response: Promise<ResponseTuple>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<[ResponseInfo, T]> {
  const [info, data] = await response;
  if (!data) throw HTTPError.parsingFailed('no data');
  return [info, decodeBody(data, schema)];
}
