import { describe, expect, it } from 'vitest';
import { loadProvisionConfig } from './config.js';
import { isProvisionError } from './errors.js';

describe('loadProvisionConfig', () => {
  it('uses fixed defaults with an empty environment', () => {
    expect(loadProvisionConfig({})).toEqual({
      server: '172.20.7.58',
      zabbixVersion: '7.4',
      logDir: '/var/log/zbx-provision',
      probeTimeoutSeconds: 3,
      logLevel: 'info',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadProvisionConfig({
      ZBX_SERVER: 'zbx-proxy.lab.internal',
      ZBX_VERSION: '7.0',
      LOG_DIR: '/tmp/zbx-logs',
      ZBX_DEBIAN_RELEASE: '12',
      ZBX_PROBE_TIMEOUT: '1.5',
      LOG_LEVEL: 'debug',
    });
    expect(config).toEqual({
      server: 'zbx-proxy.lab.internal',
      zabbixVersion: '7.0',
      logDir: '/tmp/zbx-logs',
      debianRelease: 12,
      probeTimeoutSeconds: 1.5,
      logLevel: 'debug',
    });
  });

  it('ignores empty environment variables', () => {
    expect(loadProvisionConfig({ ZBX_SERVER: '' }).server).toBe('172.20.7.58');
  });

  it('prefers CLI overrides to the environment', () => {
    const config = loadProvisionConfig(
      { ZBX_SERVER: '10.0.0.1', ZBX_VERSION: '7.0' },
      { server: '10.0.0.2', zabbixVersion: undefined },
    );
    expect(config.server).toBe('10.0.0.2');
    expect(config.zabbixVersion).toBe('7.0');
  });

  it('rejects a probe timeout beyond the timer limit', () => {
    expect(() => loadProvisionConfig({ ZBX_PROBE_TIMEOUT: '3000000' })).toThrow(
      'Invalid configuration: probeTimeoutSeconds: Number must be less than or equal to 2147483',
    );
  });

  it('names the offending field', () => {
    let caught: unknown;
    try {
      loadProvisionConfig({ ZBX_PROBE_TIMEOUT: 'soon' });
    } catch (err) {
      caught = err;
    }
    expect(isProvisionError(caught, 'E_CONFIG_INVALID')).toBe(true);
    expect(caught instanceof Error && caught.message).toBe(
      'Invalid configuration: probeTimeoutSeconds: Expected number, received nan',
    );
  });
});
