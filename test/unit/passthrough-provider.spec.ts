import { PassthroughProviderAdapter, TransformResults } from '../../src';

function request(payload: unknown) {
  return {
    headers: { 'content-type': 'application/json' },
    body: Buffer.from(JSON.stringify(payload)),
  };
}

describe('PassthroughProviderAdapter', () => {
  let adapter: PassthroughProviderAdapter;

  beforeEach(() => {
    adapter = new PassthroughProviderAdapter();
  });

  it('should trigger one build from build_params', () => {
    const result = adapter.transform(
      request({
        build_params: { branch: 'main', workflow_id: 'primary' },
        triggered_by: 'nightly',
      }),
    );

    expect(TransformResults.triggerParams(result)).toEqual([
      {
        build_params: { branch: 'main', workflow_id: 'primary' },
        triggered_by: 'nightly',
      },
    ]);
  });

  it('should trigger one build per item in builds, in order', () => {
    const result = adapter.transform(
      request({
        builds: [
          { build_params: { branch: 'main' } },
          { build_params: { tag: 'v1.2.0' } },
          { build_params: { workflow_id: 'deploy', pull_request_id: 7 } },
        ],
      }),
    );

    expect(TransformResults.triggerParams(result)).toEqual([
      { build_params: { branch: 'main' } },
      { build_params: { tag: 'v1.2.0' } },
      { build_params: { workflow_id: 'deploy', pull_request_id: 7 } },
    ]);
  });

  it('should return zero triggers for an empty builds list', () => {
    const result = adapter.transform(request({ builds: [] }));

    expect(result).toEqual({ kind: 'triggers', triggerParams: [] });
  });

  it('should keep environment items', () => {
    const result = adapter.transform(
      request({
        build_params: {
          branch: 'main',
          environments: [{ mapped_to: 'STAGE', value: 'qa', is_expand: false }],
        },
      }),
    );

    expect(TransformResults.triggerParams(result)[0].build_params.environments).toEqual([
      { mapped_to: 'STAGE', value: 'qa', is_expand: false },
    ]);
  });

  it('should drop fields it does not know', () => {
    const result = adapter.transform(
      request({ build_params: { branch: 'main', priority: 'high' } }),
    );

    expect(TransformResults.triggerParams(result)).toEqual([
      { build_params: { branch: 'main' } },
    ]);
  });

  it('should skip with the given reason', () => {
    const result = adapter.transform(request({ skip: 'docs only' }));

    expect(TransformResults.skipReason(result)).toBe('docs only');
  });

  describe('Errors', () => {
    const errorOf = (payload: unknown) =>
      TransformResults.error(adapter.transform(request(payload)))?.message;

    it('should report an empty body', () => {
      const result = adapter.transform({ headers: {}, body: Buffer.alloc(0) });

      expect(TransformResults.error(result)?.message).toBe(
        'Failed to read content of request body: no or empty request body',
      );
    });

    it('should report invalid JSON', () => {
      const result = adapter.transform({ headers: {}, body: Buffer.from('{') });

      expect(TransformResults.error(result)?.message).toMatch(
        /^Failed to parse request body: /,
      );
    });

    it('should require an object body', () => {
      expect(errorOf(['main'])).toBe('Request body must be a JSON object');
    });

    it('should require a known shape', () => {
      expect(errorOf({ branch: 'main' })).toBe('Expected one of: build_params, builds, skip');
    });

    it('should point at the bad item in builds', () => {
      expect(errorOf({ builds: [{ build_params: { branch: 'main' } }, { branch: 'dev' }] })).toBe(
        'builds[1].build_params must be an object',
      );
    });

    it('should require string fields to be strings', () => {
      expect(errorOf({ build_params: { branch: 42 } })).toBe(
        'body.build_params.branch must be a string',
      );
    });

    it('should require a numeric pull_request_id', () => {
      expect(errorOf({ build_params: { branch: 'main', pull_request_id: '7' } })).toBe(
        'body.build_params.pull_request_id must be a number',
      );
    });

    it('should require environments to be an array', () => {
      expect(errorOf({ build_params: { branch: 'main', environments: {} } })).toBe(
        'body.build_params.environments must be an array',
      );
    });

    it('should validate each environment item', () => {
      expect(
        errorOf({ build_params: { branch: 'main', environments: [{ mapped_to: 'A' }] } }),
      ).toBe('body.build_params.environments[0] needs string mapped_to and value');
    });
  });
});
