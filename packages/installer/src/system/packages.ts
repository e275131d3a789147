import { type ExecFn, defaultExec } from './exec.js';

export interface InstalledPackage {
  name: string;
  version: string;
  /** dpkg status triple, e.g. "install ok installed" */
  status: string;
}

export interface PackageManager {
  /** Refresh the package index */
  update(): Promise<string>;
  install(names: readonly string[]): Promise<string>;
  /** Install a downloaded .deb */
  installLocal(debPath: string): Promise<string>;
  /** Installed packages whose name matches `pattern` (case-insensitive) */
  listInstalled(pattern: RegExp): Promise<InstalledPackage[]>;
}

const NONINTERACTIVE = { DEBIAN_FRONTEND: 'noninteractive' };

export const DPKG_QUERY_FORMAT = '${Package}\\t${Version}\\t${Status}\\n';

export function parseDpkgQuery(output: string): InstalledPackage[] {
  const packages: InstalledPackage[] = [];
  for (const line of output.split('\n')) {
    const [name, version, status] = line.split('\t');
    if (!name || version === undefined || status === undefined) continue;
    packages.push({ name, version, status });
  }
  return packages;
}

export class AptPackageManager implements PackageManager {
  private exec: ExecFn;

  constructor(exec?: ExecFn) {
    this.exec = exec ?? defaultExec;
  }

  update(): Promise<string> {
    return this.exec('apt-get', ['update', '-y'], { env: NONINTERACTIVE });
  }

  install(names: readonly string[]): Promise<string> {
    return this.exec('apt-get', ['install', '-y', ...names], { env: NONINTERACTIVE });
  }

  installLocal(debPath: string): Promise<string> {
    return this.exec('dpkg', ['-i', debPath], { env: NONINTERACTIVE });
  }

  async listInstalled(pattern: RegExp): Promise<InstalledPackage[]> {
    const output = await this.exec('dpkg-query', ['-W', `-f=${DPKG_QUERY_FORMAT}`]);
    const flags = pattern.flags.replace('g', '');
    const matcher = new RegExp(pattern.source, flags.includes('i') ? flags : `${flags}i`);
    return parseDpkgQuery(output).filter(
      (pkg) => pkg.status.endsWith(' installed') && matcher.test(pkg.name),
    );
  }
}
