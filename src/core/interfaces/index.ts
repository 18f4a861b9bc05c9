// Interface and type exports
export * from './hook-provider.adapter';
export * from './trigger-api.interface';
export * from './lifecycle-hooks.interface';
