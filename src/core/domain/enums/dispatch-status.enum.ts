/**
 * Result of one trigger attempt
 */
export enum DispatchStatus {
  /**
   * Build API accepted the trigger
   */
  TRIGGERED = 'triggered',

  /**
   * Trigger call raised an error
   */
  FAILED = 'failed',
}
