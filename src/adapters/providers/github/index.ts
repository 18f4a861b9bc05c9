export * from './github-provider.adapter';
export * from './github-webhook.factory';
export * from './github.types';
