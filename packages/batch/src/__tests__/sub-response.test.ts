import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { HTTPError } from '../errors.js';
import { SubResponseType } from '../sub-response.js';

const TestType = SubResponseType.of('TestType', z.object({ stringValue: z.string() }));
const OptionalTestType = SubResponseType.optional('TestType?', z.object({ stringValue: z.string() }));
const NoResponse = SubResponseType.noResponse();

const headers = { testKey: 'testValue' };

describe('SubResponseType.decode', () => {
  it('decodes a matching body', () => {
    const response = TestType.decode({ code: 200, headers, body: { stringValue: 'testValue' } });

    expect(response).toEqual({
      code: 200,
      headers: { testKey: 'testValue' },
      body: { stringValue: 'testValue' },
      failedToParseBody: false,
    });
  });

  it('flags a body that does not match the expected shape', () => {
    const response = TestType.decode({ code: 200, headers, body: 'Hello!!!' });

    expect(response.body).toBeUndefined();
    expect(response.failedToParseBody).toBe(true);
  });

  it('flags a body missing a required field', () => {
    const response = TestType.decode({ code: 200, headers, body: { otherValue: 1 } });

    expect(response.failedToParseBody).toBe(true);
  });

  it('treats an absent body as no content', () => {
    const response = TestType.decode({ code: 204, headers });

    expect(response.body).toBeUndefined();
    expect(response.failedToParseBody).toBe(false);
  });

  it('treats a null body as no content', () => {
    const response = TestType.decode({ code: 200, headers, body: null });

    expect(response.failedToParseBody).toBe(false);
  });

  it('does not flag a missing or invalid optional body', () => {
    expect(OptionalTestType.decode({ code: 200, headers }).failedToParseBody).toBe(false);

    const invalid = OptionalTestType.decode({ code: 200, headers, body: 'Hello!!!' });
    expect(invalid.body).toBeUndefined();
    expect(invalid.failedToParseBody).toBe(false);
  });

  it('does not flag a NoResponse body', () => {
    expect(NoResponse.decode({ code: 200, headers })).toEqual({
      code: 200,
      headers: { testKey: 'testValue' },
      body: undefined,
      failedToParseBody: false,
    });
    expect(NoResponse.decode({ code: 200, headers, body: { ignored: true } }).failedToParseBody).toBe(false);
  });

  it('throws parsingFailed when code is missing', () => {
    expect(() => TestType.decode({ headers, body: { stringValue: 'a' } })).toThrow(HTTPError);
  });

  it('throws parsingFailed when headers are missing or not strings', () => {
    expect(() => TestType.decode({ code: 200 })).toThrow(HTTPError);
    expect(() => TestType.decode({ code: 200, headers: { count: 1 } })).toThrow(HTTPError);
  });
});

describe('SubResponseType.from', () => {
  it('recovers the typed view only for responses it decoded', () => {
    const OtherType = SubResponseType.of('OtherType', z.object({ stringValue: z.string() }));
    const response = TestType.decode({ code: 200, headers, body: { stringValue: 'a' } });

    expect(TestType.from(response)?.body?.stringValue).toBe('a');
    expect(OtherType.from(response)).toBeUndefined();
  });
});
