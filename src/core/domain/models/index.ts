export * from './trigger-params.model';
export * from './transform-result.model';
