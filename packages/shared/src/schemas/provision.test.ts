import { describe, expect, it } from 'vitest';
import { HostIdentity } from '../types/host.js';
import { ProbeResult, ProvisionConfig } from './provision.js';

describe('ProvisionConfig', () => {
  it('fills every default from an empty input', () => {
    const config = ProvisionConfig.parse({});
    expect(config).toEqual({
      server: '172.20.7.58',
      zabbixVersion: '7.4',
      logDir: '/var/log/zbx-provision',
      probeTimeoutSeconds: 3,
      logLevel: 'info',
    });
  });

  it('coerces numeric strings from the environment', () => {
    const config = ProvisionConfig.parse({ probeTimeoutSeconds: '5', debianRelease: '12' });
    expect(config.probeTimeoutSeconds).toBe(5);
    expect(config.debianRelease).toBe(12);
  });

  it('trims the server address', () => {
    expect(ProvisionConfig.parse({ server: '  zbx.example.internal ' }).server).toBe(
      'zbx.example.internal',
    );
  });

  it('rejects a repository series without a minor version', () => {
    const result = ProvisionConfig.safeParse({ zabbixVersion: '7' });
    expect(result.success).toBe(false);
  });

  it('rejects a non-positive probe timeout', () => {
    expect(ProvisionConfig.safeParse({ probeTimeoutSeconds: 0 }).success).toBe(false);
  });

  it('rejects a probe timeout longer than a timer can wait', () => {
    expect(ProvisionConfig.safeParse({ probeTimeoutSeconds: '2147483' }).success).toBe(true);
    expect(ProvisionConfig.safeParse({ probeTimeoutSeconds: '3000000' }).success).toBe(false);
  });

  it('rejects an unknown log level', () => {
    expect(ProvisionConfig.safeParse({ logLevel: 'verbose' }).success).toBe(false);
  });
});

describe('HostIdentity', () => {
  it('accepts an identity without an address', () => {
    expect(HostIdentity.parse({ hostname: 'pve01' })).toEqual({ hostname: 'pve01' });
  });

  it('rejects an IPv6 primary address', () => {
    expect(HostIdentity.safeParse({ hostname: 'pve01', primaryIpv4: 'fe80::1' }).success).toBe(
      false,
    );
  });
});

describe('ProbeResult', () => {
  it('accepts an unreachable result with a reason', () => {
    const parsed = ProbeResult.parse({
      reachable: false,
      host: '192.0.2.10',
      port: 10051,
      durationMs: 3001,
      error: 'timeout',
    });
    expect(parsed.error).toBe('timeout');
  });
});
