import path from 'node:path';
import type { HostIdentity } from '@zbx-provision/shared';
import { displayIp } from '../system/host.js';

export interface RunFiles {
  baseName: string;
  logFile: string;
  transcriptFile: string;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as YYYYMMDD-HHMMSS */
export function formatRunTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  return `${day}-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/** Local time as YYYY-MM-DD HH:MM:SS */
export function formatClock(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function runBaseName(identity: HostIdentity, timestamp: string): string {
  const safeHost = identity.hostname.replaceAll('.', '_');
  return `ZabbixAgent2_${safeHost}_${displayIp(identity)}_${timestamp}`;
}

export function runFiles(logDir: string, identity: HostIdentity, timestamp: string): RunFiles {
  const baseName = runBaseName(identity, timestamp);
  return {
    baseName,
    logFile: path.join(logDir, `${baseName}.log`),
    transcriptFile: path.join(logDir, `${baseName}.transcript.txt`),
  };
}
