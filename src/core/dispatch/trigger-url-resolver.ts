/**
 * Raised when no trigger endpoint can be derived for a request
 */
export class UrlResolutionError extends Error {
  constructor(public readonly reason: string) {
    super(`Failed to create Build Trigger URL: ${reason}`);
    this.name = 'UrlResolutionError';
  }
}

export interface TriggerUrlResolverOptions {
  /**
   * When set, every trigger goes to this URL unchanged
   */
  overrideUrl?: string;

  /**
   * Root of the build API used to derive per-app endpoints
   */
  apiRootUrl: string;
}

const INVALID_SLUG_CHARACTERS = /[\s/?#%]/;

/**
 * Canonical trigger endpoint of an app: `<root>/app/<slug>/build/start.json`
 */
export function buildTriggerUrl(apiRootUrl: string, appSlug: string): URL {
  if (!appSlug) {
    throw new UrlResolutionError('No App Slug specified');
  }
  if (INVALID_SLUG_CHARACTERS.test(appSlug)) {
    throw new UrlResolutionError(`Invalid App Slug: ${appSlug}`);
  }

  let root: URL;
  try {
    root = new URL(apiRootUrl);
  } catch (error) {
    throw new UrlResolutionError(
      `Invalid API root URL (${apiRootUrl}): ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const base = root.href.endsWith('/') ? root.href : `${root.href}/`;
  return new URL(`app/${appSlug}/build/start.json`, base);
}

/**
 * Resolves the trigger endpoint for an app, honoring a configured override
 */
export class TriggerUrlResolver {
  private readonly overrideUrl?: URL;
  private readonly apiRootUrl: string;

  constructor(options: TriggerUrlResolverOptions) {
    this.overrideUrl = options.overrideUrl
      ? new URL(options.overrideUrl)
      : undefined;
    this.apiRootUrl = options.apiRootUrl;
  }

  get hasOverride(): boolean {
    return this.overrideUrl !== undefined;
  }

  resolve(appSlug: string): URL {
    if (this.overrideUrl) {
      return new URL(this.overrideUrl.href);
    }
    return buildTriggerUrl(this.apiRootUrl, appSlug);
  }
}
