import fs from 'node:fs';

export const OS_RELEASE_PATH = '/etc/os-release';

export interface OsRelease {
  /** Verbatim file contents, kept as evidence */
  raw: string;
  fields: Record<string, string>;
}

function unquote(value: string): string {
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    const inner = value.slice(1, -1);
    return quote === '"' ? inner.replace(/\\(["\\$`])/g, '$1') : inner;
  }
  return value;
}

/** Parse os-release(5) text: KEY=value lines, optional quoting, # comments. */
export function parseOsRelease(raw: string): OsRelease {
  const fields: Record<string, string> = {};
  for (const line of raw.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq <= 0) continue;
    fields[trimmed.slice(0, eq)] = unquote(trimmed.slice(eq + 1));
  }
  return { raw, fields };
}

/** Returns undefined when the file does not exist. */
export function readOsRelease(filePath = OS_RELEASE_PATH): OsRelease | undefined {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
  return parseOsRelease(raw);
}

export function describeOs(release: OsRelease): string {
  return release.fields.PRETTY_NAME ?? release.fields.NAME ?? 'unknown';
}

/** Debian major for the vendor repository; Proxmox VE reports ID=debian. */
export function debianMajor(release: OsRelease): number | undefined {
  const { ID: id, VERSION_ID: versionId } = release.fields;
  if (id !== 'debian' || !versionId) return undefined;
  const major = Number.parseInt(versionId, 10);
  return Number.isNaN(major) ? undefined : major;
}
