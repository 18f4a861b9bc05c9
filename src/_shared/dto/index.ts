/**
 * DTOs for the relay API
 */

export * from './hook.dto';
export * from './health.dto';
