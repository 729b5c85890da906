/**
 * Upstream Module - Barrel Export
 *
 * Client for the external progress service: the fetch-based transport,
 * the retrying gateway, and the wire schemas.
 *
 * @example
 * ```typescript
 * import { ExternalStateGateway, FetchHttpTransport } from '@/upstream';
 *
 * const gateway = new ExternalStateGateway({
 *   transport: new FetchHttpTransport({ baseUrl: config.upstream.baseUrl }),
 * });
 * const user = await gateway.fetchUserContext(1);
 * ```
 */

export { ExternalStateGateway, isRetryableUpstreamError } from './gateway';
export type { ExternalStateGatewayDependencies } from './gateway';

export { FetchHttpTransport, isRetryableStatus } from './transport';
export type { FetchTransportOptions } from './transport';

export {
  TransportFailure,
  UpstreamPayloadError,
  userContextPayloadSchema,
  topicSpecPayloadSchema,
} from './types';
export type {
  HttpMethod,
  HttpTransport,
  TransportRequest,
  TransportOutcome,
  CompleteTopicPayload,
} from './types';
