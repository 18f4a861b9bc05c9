/**
 * Relay core - provider contract, registry, fan-out dispatch and the
 * request pipeline. Transport and provider parsing live outside.
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Interfaces and contracts
export * from './interfaces';

// Provider registry
export * from './registry';

// Trigger URL resolution and fan-out
export * from './dispatch';

// Hook processing pipeline
export * from './pipeline';
