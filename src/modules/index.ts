/**
 * NestJS modules
 */

export * from './hook-relay';
