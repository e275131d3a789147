import { execFileSync } from 'node:child_process';
import { describeExecFailure } from '../system/exec.js';

export interface ServiceResult {
  success: boolean;
  message: string;
}

/** systemd unit lifecycle, as far as the installer needs it */
export interface ServiceController {
  enableNow(unit: string): ServiceResult;
  getStatus(unit: string): string;
  /** `systemctl status` text for the transcript; never throws */
  statusText(unit: string): string;
}

function isLinux(): boolean {
  return process.platform === 'linux';
}

export function isServiceInstalled(unit: string): boolean {
  if (!isLinux()) return false;
  try {
    execFileSync('systemctl', ['cat', unit], { stdio: 'ignore', timeout: 5_000 });
    return true;
  } catch {
    return false;
  }
}

export function getServiceStatus(unit: string): string {
  if (!isLinux()) return 'unsupported';
  if (!isServiceInstalled(unit)) return 'not-installed';

  try {
    return execFileSync('systemctl', ['is-active', unit], {
      encoding: 'utf-8',
      timeout: 5_000,
    }).trim();
  } catch (err: unknown) {
    // is-active exits non-zero for every state but "active"
    return describeExecFailure('systemctl is-active', err).stdout.trim() || 'inactive';
  }
}

export function enableAndStartService(unit: string): ServiceResult {
  if (!isLinux()) {
    return {
      success: false,
      message: 'systemd services are only supported on Linux.',
    };
  }

  try {
    execFileSync('systemctl', ['enable', '--now', unit], { stdio: 'pipe', timeout: 60_000 });
    return { success: true, message: `${unit} service enabled and started.` };
  } catch (err: unknown) {
    const failure = describeExecFailure(`systemctl enable --now ${unit}`, err);
    return { success: false, message: `Failed to enable service: ${failure.message}` };
  }
}

export function getServiceStatusText(unit: string): string {
  if (!isLinux()) return 'systemd services are only supported on Linux.';

  try {
    return execFileSync('systemctl', ['status', unit, '--no-pager'], {
      encoding: 'utf-8',
      timeout: 10_000,
    });
  } catch (err: unknown) {
    // Exit 3 (inactive) still prints the status block
    const failure = describeExecFailure(`systemctl status ${unit}`, err);
    return failure.stdout || failure.message;
  }
}

export function createServiceController(): ServiceController {
  return {
    enableNow: enableAndStartService,
    getStatus: getServiceStatus,
    statusText: getServiceStatusText,
  };
}
