export * from './trigger-url-resolver';
export * from './trigger-dispatcher';
