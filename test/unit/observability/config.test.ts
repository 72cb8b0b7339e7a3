/**
 * Tests for logging configuration
 */

import { detectEnvironment, getObservabilityConfig } from '../../../src/observability/config.js';
import { preserveEnv } from '../../helpers/env-helper.js';

describe('Observability Config', () => {
  let restoreEnv: () => void;

  beforeEach(() => {
    restoreEnv = preserveEnv();
    delete process.env.LOG_LEVEL;
  });

  afterEach(() => {
    restoreEnv();
  });

  describe('detectEnvironment', () => {
    it.each([
      ['test', 'test'],
      ['production', 'production'],
      ['development', 'development'],
      ['staging', 'development'],
    ])('maps NODE_ENV=%s to %s', (nodeEnv, expected) => {
      process.env.NODE_ENV = nodeEnv;
      expect(detectEnvironment()).toBe(expected);
    });
  });

  describe('getObservabilityConfig', () => {
    it('logs everything to a pretty console in development', () => {
      process.env.NODE_ENV = 'development';
      const config = getObservabilityConfig();

      expect(config.level).toBe('debug');
      expect(config.exporters.console).toBe(true);
      expect(config.service.name).toBe('guild-dashboard-edge');
      expect(config.service.namespace).toBe('dev');
    });

    it('logs JSON at info in production', () => {
      process.env.NODE_ENV = 'production';
      const config = getObservabilityConfig();

      expect(config.level).toBe('info');
      expect(config.exporters.console).toBe(false);
      expect(config.service.namespace).toBe('prod');
    });

    it('is silent under test', () => {
      process.env.NODE_ENV = 'test';
      process.env.LOG_LEVEL = 'debug';

      expect(getObservabilityConfig().level).toBe('silent');
    });

    it('honours a valid LOG_LEVEL override', () => {
      process.env.NODE_ENV = 'production';
      process.env.LOG_LEVEL = 'warn';

      expect(getObservabilityConfig().level).toBe('warn');
    });

    it('ignores an unknown LOG_LEVEL', () => {
      process.env.NODE_ENV = 'production';
      process.env.LOG_LEVEL = 'verbose';

      expect(getObservabilityConfig().level).toBe('info');
    });
  });
});
