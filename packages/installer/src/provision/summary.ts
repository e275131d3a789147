import type { StepStatus } from '@zbx-provision/shared';
import { displayIp } from '../system/host.js';
import type { ProvisionReport } from './flow.js';

const STATUS_LABEL: Record<StepStatus, string> = {
  ok: 'OK',
  warn: 'WARN',
  failed: 'FAIL',
  skipped: 'SKIP',
};

/** Plain-text run summary for headless output and the end of a TUI run */
export function formatReport(report: ProvisionReport): string[] {
  const { identity } = report;
  const outcome = report.success ? 'finished' : 'FAILED';
  const lines = [
    `Zabbix Agent 2 install ${outcome} on ${identity.hostname} (${displayIp(identity)})`,
  ];
  for (const step of report.steps) {
    const detail = step.detail ? ` - ${step.detail}` : '';
    lines.push(`  [${STATUS_LABEL[step.status].padEnd(4)}] ${step.title}${detail}`);
  }
  if (report.failure) {
    lines.push(`Failed at ${report.failure.step}: ${report.failure.message}`);
  }
  if (report.backupPath) lines.push(`Backup:     ${report.backupPath}`);
  lines.push(`Log:        ${report.files.logFile}`);
  lines.push(`Transcript: ${report.files.transcriptFile}`);
  return lines;
}
