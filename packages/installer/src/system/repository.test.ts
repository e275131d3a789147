import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  type FetchFn,
  buildReleasePackageUrl,
  downloadReleasePackage,
  sha256Hex,
} from './repository.js';

describe('buildReleasePackageUrl', () => {
  it('points at the release package for the series and Debian major', () => {
    expect(buildReleasePackageUrl('7.4', 13)).toBe(
      'https://repo.zabbix.com/zabbix/7.4/release/debian/pool/main/z/zabbix-release/zabbix-release_latest_7.4+debian13_all.deb',
    );
  });
});

describe('sha256Hex', () => {
  it('hashes bytes to lowercase hex', () => {
    expect(sha256Hex(new TextEncoder().encode('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });
});

describe('downloadReleasePackage', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'zbx-dl-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the body and reports size and hash', async () => {
    const requested: string[] = [];
    const fetchFn: FetchFn = async (url) => {
      requested.push(url);
      return new Response('abc', { status: 200 });
    };
    const dest = path.join(dir, 'zabbix-release.deb');

    const result = await downloadReleasePackage('https://repo.test/pkg.deb', dest, fetchFn);

    expect(requested).toEqual(['https://repo.test/pkg.deb']);
    expect(result).toEqual({
      path: dest,
      bytes: 3,
      sha256: 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    });
    expect(fs.readFileSync(dest, 'utf-8')).toBe('abc');
  });

  it('fails on a non-2xx response without writing the file', async () => {
    const fetchFn: FetchFn = async () => new Response('missing', { status: 404 });
    const dest = path.join(dir, 'zabbix-release.deb');

    await expect(downloadReleasePackage('https://repo.test/pkg.deb', dest, fetchFn)).rejects.toThrow(
      'Failed to download https://repo.test/pkg.deb (HTTP 404)',
    );
    expect(fs.existsSync(dest)).toBe(false);
  });

  it('wraps network errors', async () => {
    const fetchFn: FetchFn = async () => {
      throw new TypeError('fetch failed');
    };
    await expect(
      downloadReleasePackage('https://repo.test/pkg.deb', path.join(dir, 'x.deb'), fetchFn),
    ).rejects.toMatchObject({
      code: 'E_DOWNLOAD_FAILED',
      message: 'Failed to download https://repo.test/pkg.deb: fetch failed',
    });
  });
});
