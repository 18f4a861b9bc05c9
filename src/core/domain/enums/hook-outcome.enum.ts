/**
 * Terminal state of a single hook request
 */
export enum HookOutcome {
  /**
   * Recognized event that needs no build; answered with success
   */
  ACKNOWLEDGED = 'acknowledged',

  /**
   * Request refused before any build was triggered
   */
  REJECTED = 'rejected',

  /**
   * Every trigger was accepted by the build API
   */
  SUCCEEDED = 'succeeded',

  /**
   * At least one trigger failed
   */
  FAILED = 'failed',
}
