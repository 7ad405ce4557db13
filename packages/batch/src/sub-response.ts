import { z } from 'zod';
import { HTTPError } from './errors.js';

export interface ResponseInfo {
  readonly code: number;
  readonly headers: Readonly<Record<string, string>>;
}

/** One element of a multiplexed batch reply. */
export interface BatchSubResponse<T> extends ResponseInfo {
  readonly body: T | undefined;
  /** True only when a body was present but did not match the expected shape */
  readonly failedToParseBody: boolean;
}

export type AnyBatchSubResponse = BatchSubResponse<unknown>;

/** Anything able to decode one raw batch element. */
export interface SubResponseDecoder {
  readonly name: string;
  decode(element: unknown): AnyBatchSubResponse;
}

type BodyKind = 'required' | 'optional' | 'noResponse';

type BodySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const envelopeSchema = z.object({
  code: z.number().int(),
  headers: z.record(z.string()),
  body: z.unknown().optional(),
});

/**
 * Type descriptor for one position of a batch response.
 *
 * `required` bodies that fail validation are flagged with `failedToParseBody`;
 * `optional` bodies that fail validation are dropped silently; `noResponse` never
 * decodes the body. An absent or null body is never a failure.
 */
export class SubResponseType<T> implements SubResponseDecoder {
  private readonly decoded = new WeakMap<AnyBatchSubResponse, BatchSubResponse<T>>();

  private constructor(
    readonly name: string,
    private readonly kind: BodyKind,
    private readonly schema?: BodySchema<T>,
  ) {}

  static of<T>(name: string, schema: BodySchema<T>): SubResponseType<T> {
    return new SubResponseType(name, 'required', schema);
  }

  static optional<T>(name: string, schema: BodySchema<T>): SubResponseType<T> {
    return new SubResponseType(name, 'optional', schema);
  }

  /** For sub-requests whose reply carries no meaningful body. */
  static noResponse(name = 'NoResponse'): SubResponseType<never> {
    return new SubResponseType<never>(name, 'noResponse');
  }

  /**
   * Decode one `{ code, headers, body }` element. A malformed envelope throws
   * `HTTPError(parsingFailed)`; a malformed body does not.
   */
  decode(element: unknown): BatchSubResponse<T> {
    const envelope = envelopeSchema.safeParse(element);
    if (!envelope.success) {
      throw HTTPError.parsingFailed(`invalid ${this.name} sub-response envelope`, envelope.error);
    }

    const { code, headers, body: rawBody } = envelope.data;
    const response: BatchSubResponse<T> = { code, headers, ...this.decodeBody(rawBody) };
    this.decoded.set(response, response);
    return response;
  }

  /** The typed view of `response`, if this descriptor decoded it. */
  from(response: AnyBatchSubResponse): BatchSubResponse<T> | undefined {
    return this.decoded.get(response);
  }

  private decodeBody(raw: unknown): { body: T | undefined; failedToParseBody: boolean } {
    if (raw === undefined || raw === null || this.kind === 'noResponse' || !this.schema) {
      return { body: undefined, failedToParseBody: false };
    }

    const parsed = this.schema.safeParse(raw);
    if (parsed.success) {
      return { body: parsed.data, failedToParseBody: false };
    }
    return { body: undefined, failedToParseBody: this.kind === 'required' };
  }
}
