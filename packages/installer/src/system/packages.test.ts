import { describe, expect, it } from 'vitest';
import type { ExecFn, ExecOptions } from './exec.js';
import { AptPackageManager, parseDpkgQuery } from './packages.js';

interface Call {
  command: string;
  args: string[];
  options?: ExecOptions;
}

function recordingExec(stdout = ''): { exec: ExecFn; calls: Call[] } {
  const calls: Call[] = [];
  const exec: ExecFn = async (command, args, options) => {
    calls.push({ command, args, options });
    return stdout;
  };
  return { exec, calls };
}

describe('parseDpkgQuery', () => {
  it('splits tab-separated rows and skips blanks', () => {
    expect(parseDpkgQuery('curl\t8.14.1-2\tinstall ok installed\n\n')).toEqual([
      { name: 'curl', version: '8.14.1-2', status: 'install ok installed' },
    ]);
  });
});

describe('AptPackageManager', () => {
  it('installs packages non-interactively', async () => {
    const { exec, calls } = recordingExec();
    await new AptPackageManager(exec).install(['ca-certificates', 'gnupg']);
    expect(calls).toEqual([
      {
        command: 'apt-get',
        args: ['install', '-y', 'ca-certificates', 'gnupg'],
        options: { env: { DEBIAN_FRONTEND: 'noninteractive' } },
      },
    ]);
  });

  it('refreshes the index with apt-get update', async () => {
    const { exec, calls } = recordingExec();
    await new AptPackageManager(exec).update();
    expect(calls[0]?.args).toEqual(['update', '-y']);
  });

  it('installs a local package with dpkg -i', async () => {
    const { exec, calls } = recordingExec();
    await new AptPackageManager(exec).installLocal('/tmp/work/zabbix-release.deb');
    expect(calls[0]).toMatchObject({ command: 'dpkg', args: ['-i', '/tmp/work/zabbix-release.deb'] });
  });

  const DPKG_ROWS = [
    'zabbix-agent2\t1:7.4.2-1+debian13\tinstall ok installed',
    'zabbix-release\t1:7.4-1+debian13\tinstall ok installed',
    'Zabbix-Sender\t1:7.4.2-1+debian13\tinstall ok installed',
    'zabbix-agent\t1:6.0.0-1\tdeinstall ok config-files',
    'curl\t8.14.1-2\tinstall ok installed',
    '',
  ].join('\n');

  it('lists installed packages matching the pattern', async () => {
    const { exec, calls } = recordingExec(DPKG_ROWS);

    const found = await new AptPackageManager(exec).listInstalled(/zabbix-agent2|zabbix-release/);

    expect(found.map((p) => `${p.name} ${p.version}`)).toEqual([
      'zabbix-agent2 1:7.4.2-1+debian13',
      'zabbix-release 1:7.4-1+debian13',
    ]);
    expect(calls[0]).toEqual({
      command: 'dpkg-query',
      args: ['-W', '-f=${Package}\\t${Version}\\t${Status}\\n'],
      options: undefined,
    });
  });

  it('matches case-insensitively and skips removed packages', async () => {
    const { exec } = recordingExec(DPKG_ROWS);
    const found = await new AptPackageManager(exec).listInstalled(/zabbix/);
    expect(found.map((p) => p.name)).toEqual(['zabbix-agent2', 'zabbix-release', 'Zabbix-Sender']);
  });
});
