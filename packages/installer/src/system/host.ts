import { execFile } from 'node:child_process';
import dgram from 'node:dgram';
import os from 'node:os';
import { promisify } from 'node:util';
import { type HostIdentity, NO_IP_SENTINEL } from '@zbx-provision/shared';
import { ProvisionError } from '../errors.js';

const execFileAsync = promisify(execFile);

/** Well-known public address used only as a routing-table key; nothing is sent */
export const ROUTE_PROBE_ADDRESS = '1.1.1.1';

export interface HostnameSource {
  /** FQDN as the resolver library reports it; undefined when unavailable */
  fqdn(): Promise<string | undefined>;
  shortName(): string | undefined;
}

export interface RouteTableQuery {
  /** Preferred source address for traffic to `destination` */
  sourceAddressFor(destination: string): Promise<string | undefined>;
}

export interface InterfaceAddress {
  iface: string;
  address: string;
  family: 'IPv4' | 'IPv6';
  internal: boolean;
}

export interface InterfaceLister {
  list(): InterfaceAddress[];
}

export interface HostSources {
  hostname: HostnameSource;
  routes: RouteTableQuery;
  interfaces: InterfaceLister;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function createHostnameSource(): HostnameSource {
  return {
    async fqdn() {
      try {
        const { stdout } = await execFileAsync('hostname', ['-f'], { timeout: 5_000 });
        return nonEmpty(stdout);
      } catch {
        return undefined;
      }
    },
    shortName() {
      return nonEmpty(os.hostname());
    },
  };
}

/**
 * Connecting a UDP socket makes the kernel pick the route and source
 * address without putting a datagram on the wire.
 */
export function createRouteTableQuery(): RouteTableQuery {
  return {
    sourceAddressFor(destination) {
      return new Promise((resolve) => {
        const socket = dgram.createSocket('udp4');
        let settled = false;
        const done = (address: string | undefined) => {
          if (settled) return;
          settled = true;
          socket.close();
          resolve(address);
        };
        socket.once('error', () => done(undefined));
        socket.connect(53, destination, (err?: Error) => {
          if (err) {
            done(undefined);
            return;
          }
          try {
            const { address } = socket.address();
            done(address === '0.0.0.0' ? undefined : address);
          } catch {
            done(undefined);
          }
        });
      });
    },
  };
}

export function createInterfaceLister(): InterfaceLister {
  return {
    list() {
      const result: InterfaceAddress[] = [];
      for (const [iface, addrs] of Object.entries(os.networkInterfaces())) {
        for (const addr of addrs ?? []) {
          result.push({
            iface,
            address: addr.address,
            family: addr.family,
            internal: addr.internal,
          });
        }
      }
      return result;
    },
  };
}

export function createHostSources(): HostSources {
  return {
    hostname: createHostnameSource(),
    routes: createRouteTableQuery(),
    interfaces: createInterfaceLister(),
  };
}

/** Global scope: not loopback/internal and not link-local (169.254.0.0/16). */
export function isGlobalIpv4(addr: InterfaceAddress): boolean {
  if (addr.family !== 'IPv4' || addr.internal) return false;
  if (addr.address.startsWith('127.')) return false;
  return !addr.address.startsWith('169.254.');
}

export async function resolveHostname(source: HostnameSource): Promise<string> {
  const hostname = nonEmpty(await source.fqdn()) ?? nonEmpty(source.shortName());
  if (!hostname) {
    throw new ProvisionError('E_HOSTNAME_UNAVAILABLE');
  }
  return hostname;
}

export async function resolvePrimaryIpv4(
  routes: RouteTableQuery,
  interfaces: InterfaceLister,
): Promise<string | undefined> {
  const routed = nonEmpty(
    await routes.sourceAddressFor(ROUTE_PROBE_ADDRESS).catch(() => undefined),
  );
  if (routed) return routed;
  return interfaces.list().find(isGlobalIpv4)?.address;
}

/**
 * Hostname and primary outbound IPv4 of this machine. A missing address is
 * a valid, degraded result; only a missing hostname is an error.
 */
export async function resolveHostIdentity(
  sources: HostSources = createHostSources(),
): Promise<HostIdentity> {
  const hostname = await resolveHostname(sources.hostname);
  const primaryIpv4 = await resolvePrimaryIpv4(sources.routes, sources.interfaces);
  return primaryIpv4 ? { hostname, primaryIpv4 } : { hostname };
}

export function displayIp(identity: HostIdentity): string {
  return identity.primaryIpv4 ?? NO_IP_SENTINEL;
}
