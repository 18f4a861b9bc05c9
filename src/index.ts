/**
 * Build Hook Relay
 *
 * Receives webhooks from source-control services, turns each into zero or
 * more build triggers through a pluggable provider, and reports one
 * aggregated outcome to the caller.
 */

// Export all core components
export * from './core';

// Export adapters
export * from './adapters/providers/github';
export * from './adapters/providers/passthrough';
export * from './adapters/trigger-api';

// Export NestJS module, controllers, decorators and tokens
export * from './modules/hook-relay';

// Environment configuration
export * from './config';

// Export testing utilities
export { FakeTriggerApi, StaticHookProvider } from './testing';
export type { RecordedTrigger } from './testing';
