import { describe, expect, it } from 'vitest';
import { isProvisionError } from '../errors.js';
import {
  type HostSources,
  type InterfaceAddress,
  ROUTE_PROBE_ADDRESS,
  displayIp,
  isGlobalIpv4,
  resolveHostIdentity,
  resolvePrimaryIpv4,
} from './host.js';

function createSources(overrides: {
  fqdn?: string;
  shortName?: string;
  routed?: string;
  routeFails?: boolean;
  interfaces?: InterfaceAddress[];
}): HostSources & { routeQueries: string[] } {
  const routeQueries: string[] = [];
  return {
    routeQueries,
    hostname: {
      fqdn: async () => overrides.fqdn,
      shortName: () => overrides.shortName,
    },
    routes: {
      sourceAddressFor: async (destination) => {
        routeQueries.push(destination);
        if (overrides.routeFails) throw new Error('ENETUNREACH');
        return overrides.routed;
      },
    },
    interfaces: { list: () => overrides.interfaces ?? [] },
  };
}

const lo: InterfaceAddress = { iface: 'lo', address: '127.0.0.1', family: 'IPv4', internal: true };
const linkLocal: InterfaceAddress = {
  iface: 'eth1',
  address: '169.254.10.2',
  family: 'IPv4',
  internal: false,
};
const vmbr0: InterfaceAddress = {
  iface: 'vmbr0',
  address: '10.20.0.15',
  family: 'IPv4',
  internal: false,
};
const vmbr1: InterfaceAddress = {
  iface: 'vmbr1',
  address: '10.30.0.15',
  family: 'IPv4',
  internal: false,
};
const v6: InterfaceAddress = { iface: 'vmbr0', address: 'fd00::15', family: 'IPv6', internal: false };

describe('resolveHostIdentity', () => {
  it('prefers the FQDN and the routed source address', async () => {
    const sources = createSources({
      fqdn: 'pve01.lab.internal',
      shortName: 'pve01',
      routed: '10.20.0.15',
      interfaces: [vmbr1],
    });
    expect(await resolveHostIdentity(sources)).toEqual({
      hostname: 'pve01.lab.internal',
      primaryIpv4: '10.20.0.15',
    });
    expect(sources.routeQueries).toEqual([ROUTE_PROBE_ADDRESS]);
  });

  it('falls back to the short hostname when the FQDN is blank', async () => {
    const identity = await resolveHostIdentity(createSources({ fqdn: '  \n', shortName: 'pve01' }));
    expect(identity.hostname).toBe('pve01');
  });

  it('omits the address when nothing is found', async () => {
    const identity = await resolveHostIdentity(
      createSources({ shortName: 'pve01', interfaces: [lo, linkLocal, v6] }),
    );
    expect(identity).toEqual({ hostname: 'pve01' });
    expect(displayIp(identity)).toBe('NOIP');
  });

  it('fails fast when neither hostname lookup yields a name', async () => {
    let caught: unknown;
    try {
      await resolveHostIdentity(createSources({ fqdn: '', shortName: '' }));
    } catch (err) {
      caught = err;
    }
    expect(isProvisionError(caught, 'E_HOSTNAME_UNAVAILABLE')).toBe(true);
  });
});

describe('resolvePrimaryIpv4', () => {
  it('uses the first global interface address when the route lookup is empty', async () => {
    const sources = createSources({ interfaces: [lo, v6, linkLocal, vmbr1, vmbr0] });
    expect(await resolvePrimaryIpv4(sources.routes, sources.interfaces)).toBe('10.30.0.15');
  });

  it('uses the interface fallback when the route lookup throws', async () => {
    const sources = createSources({ routeFails: true, interfaces: [vmbr0] });
    expect(await resolvePrimaryIpv4(sources.routes, sources.interfaces)).toBe('10.20.0.15');
  });
});

describe('isGlobalIpv4', () => {
  it.each([
    [lo, false],
    [linkLocal, false],
    [v6, false],
    [vmbr0, true],
  ])('classifies %o', (addr, expected) => {
    expect(isGlobalIpv4(addr)).toBe(expected);
  });
});
