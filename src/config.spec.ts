import { loadConfig } from './config';
import { ConfigurationError } from './daiji/errors';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      converter: {
        appendOneBeforeSmallUnits: true,
        overflowPolicy: 'omit',
        largeUnitNames: undefined,
      },
    });
  });

  it('reads every setting', () => {
    const config = loadConfig({
      PORT: '8080',
      DAIJI_APPEND_ONE: 'false',
      DAIJI_OVERFLOW_POLICY: 'fail',
      DAIJI_LARGE_UNITS: ',万, 億',
    });

    expect(config.port).toBe(8080);
    expect(config.converter).toEqual({
      appendOneBeforeSmallUnits: false,
      overflowPolicy: 'fail',
      largeUnitNames: ['', '万', '億'],
    });
  });

  it('accepts 1 and 0 as flags', () => {
    expect(loadConfig({ DAIJI_APPEND_ONE: '0' }).converter.appendOneBeforeSmallUnits).toBe(false);
    expect(loadConfig({ DAIJI_APPEND_ONE: '1' }).converter.appendOneBeforeSmallUnits).toBe(true);
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ HOME: '/tmp', LOG_LEVEL: 'debug' }).port).toBe(3000);
  });

  it.each([
    ['DAIJI_OVERFLOW_POLICY', { DAIJI_OVERFLOW_POLICY: 'round' }],
    ['DAIJI_APPEND_ONE', { DAIJI_APPEND_ONE: 'yes' }],
    ['PORT', { PORT: 'http' }],
    ['PORT', { PORT: '70000' }],
  ])('rejects an invalid %s', (name, env) => {
    expect(() => loadConfig(env)).toThrow(ConfigurationError);
    expect(() => loadConfig(env)).toThrow(new RegExp(`^Invalid environment: ${name}: `));
  });
});
