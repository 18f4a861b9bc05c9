export * from './passthrough-provider.adapter';
