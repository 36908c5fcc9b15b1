import { consoleLogger } from '../src/logger';
import { optionsFromEnv, resolveEnvironment, resolveOptions } from '../src/options';

describe('resolveOptions', () => {
  it('should fill in defaults', () => {
    const options = resolveOptions({}, {});

    expect(options).toMatchObject({
      enabled: true,
      environment: 'production',
      enableInDevelopment: true,
      enableInProduction: false,
      thresholdMs: 1000,
      captureStackTrace: true,
      maxStackTraceLines: 20,
      maxQueryLength: 10000,
      captureExecutionPlan: false,
      planTimeoutSeconds: 30,
      databaseProvider: 'auto',
      apiTimeoutMs: 5000,
      batchSize: 10,
      pollIntervalMs: 100,
      errorBackoffMs: 1000,
      queueOverflow: 'drop-oldest',
      sinks: [],
    });
    expect(options.logger).toBe(consoleLogger);
    expect(options.maxQueueSize).toBeUndefined();
  });

  it('should keep explicit values', () => {
    const options = resolveOptions({ thresholdMs: 250, enabled: false, batchSize: 3 }, {});

    expect(options.thresholdMs).toBe(250);
    expect(options.enabled).toBe(false);
    expect(options.batchSize).toBe(3);
  });

  it('should read application identity from the environment', () => {
    const options = resolveOptions({}, { npm_package_name: 'shop-api', npm_package_version: '3.0.1' });

    expect(options.applicationName).toBe('shop-api');
    expect(options.version).toBe('3.0.1');
  });

  it('should prefer APPLICATION_NAME over the package name', () => {
    expect(resolveOptions({}, { APPLICATION_NAME: 'shop', npm_package_name: 'shop-api' }).applicationName).toBe('shop');
  });
});

describe('resolveEnvironment', () => {
  it('should prefer the explicit option, then NODE_ENV', () => {
    expect(resolveEnvironment({ environment: 'staging' }, { NODE_ENV: 'development' })).toBe('staging');
    expect(resolveEnvironment({}, { NODE_ENV: 'development' })).toBe('development');
    expect(resolveEnvironment({}, {})).toBe('production');
  });
});

describe('optionsFromEnv', () => {
  it('should read analyzer variables', () => {
    expect(
      optionsFromEnv({
        QUERY_ANALYZER_ENABLED: 'false',
        QUERY_ANALYZER_THRESHOLD_MS: '250',
        QUERY_ANALYZER_CAPTURE_STACK: 'no',
        QUERY_ANALYZER_CAPTURE_PLAN: '1',
        QUERY_ANALYZER_CONNECTION_STRING: 'postgres://localhost/shop',
        QUERY_ANALYZER_API_ENDPOINT: 'https://reports.example.test',
        QUERY_ANALYZER_API_KEY: 'test-secret',
        QUERY_ANALYZER_PROJECT_ID: 'project-1',
        QUERY_ANALYZER_CSV_DIR: 'reports',
      })
    ).toEqual({
      enabled: false,
      thresholdMs: 250,
      captureStackTrace: false,
      captureExecutionPlan: true,
      connectionString: 'postgres://localhost/shop',
      apiEndpoint: 'https://reports.example.test',
      apiKey: 'test-secret',
      projectId: 'project-1',
      csvDirectory: 'reports',
    });
  });

  it('should ignore values that do not parse', () => {
    expect(optionsFromEnv({ QUERY_ANALYZER_ENABLED: 'maybe', QUERY_ANALYZER_THRESHOLD_MS: '-5' })).toEqual({});
    expect(optionsFromEnv({ QUERY_ANALYZER_THRESHOLD_MS: 'fast' })).toEqual({});
  });
});
