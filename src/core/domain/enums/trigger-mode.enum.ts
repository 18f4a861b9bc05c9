/**
 * How trigger requests reach the build API.
 * Decided once from configuration, never per request.
 */
export enum TriggerMode {
  /**
   * Requests are sent over HTTP
   */
  LIVE = 'live',

  /**
   * Requests are only written to the log
   */
  LOG_ONLY = 'log_only',
}
