import { HookProvider } from '../interfaces';

export class DuplicateProviderError extends Error {
  constructor(public readonly serviceId: string) {
    super(`Provider already registered: ${serviceId}`);
    this.name = 'DuplicateProviderError';
  }
}

/**
 * Read-only mapping from a service id to its hook provider.
 *
 * Built once at start-up; there is no way to add or remove an entry
 * afterwards. New sources are supported by registering another
 * HookProvider implementation when the registry is constructed.
 */
export class ProviderRegistry {
  private readonly providers: ReadonlyMap<string, HookProvider>;

  constructor(entries: Iterable<readonly [string, HookProvider]>) {
    const providers = new Map<string, HookProvider>();
    for (const [serviceId, provider] of entries) {
      if (providers.has(serviceId)) {
        throw new DuplicateProviderError(serviceId);
      }
      providers.set(serviceId, provider);
    }
    this.providers = providers;
    Object.freeze(this);
  }

  /**
   * Find the provider for a service id; undefined when unsupported
   */
  lookup(serviceId: string): HookProvider | undefined {
    return this.providers.get(serviceId);
  }

  has(serviceId: string): boolean {
    return this.providers.has(serviceId);
  }

  ids(): string[] {
    return [...this.providers.keys()];
  }

  get size(): number {
    return this.providers.size;
  }
}
