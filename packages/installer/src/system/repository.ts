import crypto from 'node:crypto';
import fs from 'node:fs';
import { ProvisionError } from '../errors.js';

export interface DownloadedPackage {
  path: string;
  bytes: number;
  sha256: string;
}

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/** zabbix-release package that registers the vendor apt repository */
export function buildReleasePackageUrl(zabbixVersion: string, debianRelease: number): string {
  return (
    `https://repo.zabbix.com/zabbix/${zabbixVersion}/release/debian/pool/main/z/zabbix-release/` +
    `zabbix-release_latest_${zabbixVersion}+debian${debianRelease}_all.deb`
  );
}

export function sha256Hex(data: Uint8Array): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/**
 * Download `url` to `dest`. The file is written only after a complete 2xx
 * response; its SHA-256 is returned for the evidence log.
 */
export async function downloadReleasePackage(
  url: string,
  dest: string,
  fetchFn: FetchFn = fetch,
  timeoutMs = 60_000,
): Promise<DownloadedPackage> {
  let res: Response;
  try {
    res = await fetchFn(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ProvisionError('E_DOWNLOAD_FAILED', `Failed to download ${url}: ${reason}`, {
      cause: err,
    });
  }
  if (!res.ok) {
    throw new ProvisionError('E_DOWNLOAD_FAILED', `Failed to download ${url} (HTTP ${res.status})`);
  }

  const data = new Uint8Array(await res.arrayBuffer());
  fs.writeFileSync(dest, data);
  return { path: dest, bytes: data.byteLength, sha256: sha256Hex(data) };
}
