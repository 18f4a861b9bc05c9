/**
 * Shared Swagger decorators, keeping controllers focused on routing
 */

export * from './hook.decorators';
export * from './health.decorators';
