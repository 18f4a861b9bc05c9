import { TransformResult } from '../domain/models';

/**
 * Raw inbound webhook as seen by a provider
 */
export interface RawWebhookRequest {
  /**
   * Request headers with lower-cased names
   */
  headers: Record<string, string>;

  /**
   * Unparsed request body
   */
  body: Buffer;
}

/**
 * Hook provider adapter interface - one implementation per webhook source
 *
 * Providers classify and extract; they never trigger anything themselves.
 * `transform` must be pure: the same headers and body always yield an
 * equal result, with no I/O and no state kept between calls.
 */
export interface HookProvider {
  /**
   * Unique identifier for this provider (e.g., 'github')
   */
  readonly providerName: string;

  /**
   * Webhook event types this provider can turn into builds
   */
  readonly supportedEvents: readonly string[];

  /**
   * Inspect a raw webhook and describe the builds it asks for.
   * A recognized but irrelevant event is a skip, not an error.
   */
  transform(request: RawWebhookRequest): TransformResult;
}
