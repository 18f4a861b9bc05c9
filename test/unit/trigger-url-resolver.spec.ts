import { buildTriggerUrl, TriggerUrlResolver, UrlResolutionError } from '../../src';

describe('Trigger URL resolution', () => {
  describe('buildTriggerUrl', () => {
    it('should derive the app endpoint from the API root', () => {
      expect(buildTriggerUrl('https://www.bitrise.io', 'a1b2c3').href).toBe(
        'https://www.bitrise.io/app/a1b2c3/build/start.json',
      );
    });

    it('should keep a path on the API root', () => {
      expect(buildTriggerUrl('http://localhost:3000/api/', 'demo').href).toBe(
        'http://localhost:3000/api/app/demo/build/start.json',
      );
      expect(buildTriggerUrl('http://localhost:3000/api', 'demo').href).toBe(
        'http://localhost:3000/api/app/demo/build/start.json',
      );
    });

    it('should reject an empty slug', () => {
      expect(() => buildTriggerUrl('https://www.bitrise.io', '')).toThrow(
        'Failed to create Build Trigger URL: No App Slug specified',
      );
    });

    it.each(['a b', 'a/b', 'a?b', 'a#b', 'a%2F'])('should reject slug %p', (slug) => {
      expect(() => buildTriggerUrl('https://www.bitrise.io', slug)).toThrow(
        `Failed to create Build Trigger URL: Invalid App Slug: ${slug}`,
      );
    });

    it('should reject an invalid API root', () => {
      let thrown: unknown;
      try {
        buildTriggerUrl('not a url', 'demo');
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(UrlResolutionError);
      expect(thrown instanceof UrlResolutionError && thrown.reason).toMatch(
        /^Invalid API root URL \(not a url\): /,
      );
    });
  });

  describe('TriggerUrlResolver', () => {
    it('should derive per-app endpoints without an override', () => {
      const resolver = new TriggerUrlResolver({ apiRootUrl: 'https://www.bitrise.io' });

      expect(resolver.hasOverride).toBe(false);
      expect(resolver.resolve('demo').href).toBe(
        'https://www.bitrise.io/app/demo/build/start.json',
      );
    });

    it('should use the override for every app', () => {
      const resolver = new TriggerUrlResolver({
        overrideUrl: 'http://localhost:8080/trigger',
        apiRootUrl: 'https://www.bitrise.io',
      });

      expect(resolver.hasOverride).toBe(true);
      expect(resolver.resolve('one').href).toBe('http://localhost:8080/trigger');
      expect(resolver.resolve('two').href).toBe('http://localhost:8080/trigger');
    });

    it('should hand out independent copies of the override', () => {
      const resolver = new TriggerUrlResolver({
        overrideUrl: 'http://localhost:8080/trigger',
        apiRootUrl: 'https://www.bitrise.io',
      });

      resolver.resolve('one').pathname = '/changed';

      expect(resolver.resolve('two').href).toBe('http://localhost:8080/trigger');
    });

    it('should still validate slugs when no override is set', () => {
      const resolver = new TriggerUrlResolver({ apiRootUrl: 'https://www.bitrise.io' });

      expect(() => resolver.resolve('')).toThrow(UrlResolutionError);
    });
  });
});
