import { ProvisionError } from '../errors.js';

export function isRoot(uid: number | undefined = process.getuid?.()): boolean {
  return uid === 0;
}

/** Package and service management need uid 0. */
export function requireRoot(uid: number | undefined = process.getuid?.()): void {
  if (!isRoot(uid)) {
    throw new ProvisionError(
      'E_NOT_ROOT',
      'Run the installer as root, e.g.: sudo zbx-provision install',
    );
  }
}
