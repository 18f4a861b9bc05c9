export * from './http-trigger-api.client';
export * from './log-only-trigger-api.client';
export * from './trigger-api.factory';
