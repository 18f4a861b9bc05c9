export * from './hook-outcome.enum';
export * from './dispatch-status.enum';
export * from './trigger-mode.enum';
