/**
 * Injection tokens for the hook relay module
 */

export const HOOK_RELAY_CONFIG = Symbol('HOOK_RELAY_CONFIG');
export const PROVIDER_REGISTRY = Symbol('PROVIDER_REGISTRY');
export const TRIGGER_API = Symbol('TRIGGER_API');
export const HOOK_PROCESSOR = Symbol('HOOK_PROCESSOR');

export const HOOK_RELAY_VERSION = '0.1.0';
