import { describe, it, expect } from 'vitest';
import { loadStoreConfig, repositoryOptionsFromConfig } from './config.js';
import { InvalidConfigError } from './errors.js';
import { escalatingFailurePolicy, loggingFailurePolicy } from './failure-policy.js';
import { silentLogger } from './logger.js';

describe('loadStoreConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadStoreConfig({})).toEqual({
      databaseUrl: undefined,
      storeId: 'default',
      maxConnections: 10,
      failurePolicy: 'escalate',
      logLevel: 'info',
    });
  });

  it('reads every variable', () => {
    const config = loadStoreConfig({
      DATABASE_URL: 'postgres://localhost:5432/strata',
      STRATA_STORE_ID: 'primary',
      STRATA_MAX_CONNECTIONS: '3',
      STRATA_FAILURE_POLICY: 'log',
      STRATA_LOG_LEVEL: 'silent',
    });

    expect(config).toEqual({
      databaseUrl: 'postgres://localhost:5432/strata',
      storeId: 'primary',
      maxConnections: 3,
      failurePolicy: 'log',
      logLevel: 'silent',
    });
  });

  it('treats empty variables as unset', () => {
    expect(loadStoreConfig({ DATABASE_URL: '', STRATA_LOG_LEVEL: '' }).databaseUrl).toBeUndefined();
  });

  it('ignores unrelated variables', () => {
    expect(loadStoreConfig({ HOME: '/home/test' }).storeId).toBe('default');
  });

  it('lists every invalid variable', () => {
    const load = () => loadStoreConfig({ STRATA_MAX_CONNECTIONS: '0', STRATA_FAILURE_POLICY: 'panic' });

    expect(load).toThrow(InvalidConfigError);
    expect(load).toThrow(/^Invalid store configuration: STRATA_MAX_CONNECTIONS: .+; STRATA_FAILURE_POLICY: .+$/);
  });
});

describe('repositoryOptionsFromConfig', () => {
  it('maps the silent level and the failure policy', () => {
    const options = repositoryOptionsFromConfig(loadStoreConfig({ STRATA_LOG_LEVEL: 'silent', STRATA_FAILURE_POLICY: 'log' }));

    expect(options.logger).toBe(silentLogger);
    expect(options.failurePolicy).toBe(loggingFailurePolicy);
  });

  it('escalates by default', () => {
    expect(repositoryOptionsFromConfig(loadStoreConfig({})).failurePolicy).toBe(escalatingFailurePolicy);
  });
});
