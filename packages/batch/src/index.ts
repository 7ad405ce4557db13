export { HTTPError, isHTTPError, type HTTPErrorKind } from './errors.js';
export {
  SubResponseType,
  type AnyBatchSubResponse,
  type BatchSubResponse,
  type ResponseInfo,
  type SubResponseDecoder,
} from './sub-response.js';
export { BatchResponse, decodeBatchResponse, decodeBody, type ResponseData } from './batch-response.js';
export { decoded, decodedAs, type ResponseTuple } from './decode.js';
