import {
  HttpTriggerApiClient,
  LogOnlyTriggerApiClient,
  TriggerMode,
  createTriggerApi,
  resolveTriggerMode,
} from '../../src';

describe('Trigger API selection', () => {
  describe('resolveTriggerMode', () => {
    it('should only log outside production', () => {
      expect(resolveTriggerMode({ environment: 'development' })).toBe(TriggerMode.LOG_ONLY);
      expect(resolveTriggerMode({ environment: 'test' })).toBe(TriggerMode.LOG_ONLY);
    });

    it('should call the API in production', () => {
      expect(resolveTriggerMode({ environment: 'production' })).toBe(TriggerMode.LIVE);
    });

    it('should call the API whenever an override URL is set', () => {
      expect(
        resolveTriggerMode({
          environment: 'development',
          sendRequestTo: 'http://localhost:8080/trigger',
        }),
      ).toBe(TriggerMode.LIVE);
    });

    it('should ignore an empty override URL', () => {
      expect(resolveTriggerMode({ environment: 'development', sendRequestTo: '' })).toBe(
        TriggerMode.LOG_ONLY,
      );
    });
  });

  describe('createTriggerApi', () => {
    it('should build the HTTP client for live mode', () => {
      const api = createTriggerApi(TriggerMode.LIVE, { timeoutMs: 2000 });

      expect(api).toBeInstanceOf(HttpTriggerApiClient);
      expect(api.mode).toBe(TriggerMode.LIVE);
    });

    it('should build the logging client for log-only mode', () => {
      const api = createTriggerApi(TriggerMode.LOG_ONLY);

      expect(api).toBeInstanceOf(LogOnlyTriggerApiClient);
      expect(api.mode).toBe(TriggerMode.LOG_ONLY);
    });
  });
});
